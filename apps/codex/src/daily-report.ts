import type {
	DailyBucket,
	DailyReportRow,
	DailyTotals,
	PricingOptions,
	TokenUsageEvent,
} from './_types.ts';
import type { ModelUsageRecord } from './model-usage.ts';
import type { CostTally } from './token-utils.ts';
import { isWithinRange, nextDateKey, toDateKey, toEpochMs } from './date-utils.ts';
import { ModelUsageBreakdown, toModelUsageRecords } from './model-usage.ts';
import {
	addCost,
	addUsage,
	costForUsage,
	createCostTally,
	createEmptyUsage,
	settleCost,
} from './token-utils.ts';

export type DailyReportOptions = {
	/** Inclusive `YYYY-MM-DD` lower bound. */
	since?: string;
	/** Inclusive `YYYY-MM-DD` upper bound. */
	until?: string;
	/** Keep only the trailing N events before bucketing. */
	last?: number;
	fillGaps?: boolean;
	/** UTC date the filled range ends at when `until` is not set. */
	today?: string;
	pricing?: PricingOptions;
};

type DailyAccumulator = {
	bucket: DailyBucket;
	cost: CostTally;
	models: ModelUsageBreakdown;
};

function createAccumulator(date: string, pricing?: PricingOptions): DailyAccumulator {
	return {
		bucket: { date, events: 0, ...createEmptyUsage() },
		cost: createCostTally(pricing != null),
		models: new ModelUsageBreakdown(pricing),
	};
}

function takeLast(events: readonly TokenUsageEvent[], last: number | undefined): readonly TokenUsageEvent[] {
	if (last == null) {
		return events;
	}
	if (last <= 0) {
		return [];
	}
	const sorted = [...events].sort((a, b) => toEpochMs(a.timestamp) - toEpochMs(b.timestamp));
	return sorted.slice(-last);
}

function toRow(accumulator: DailyAccumulator): DailyReportRow {
	const { bucket } = accumulator;
	const costUSD = settleCost(accumulator.cost);
	return {
		date: bucket.date,
		events: bucket.events,
		inputTokens: bucket.inputTokens,
		cachedInputTokens: bucket.cachedInputTokens,
		outputTokens: bucket.outputTokens,
		reasoningOutputTokens: bucket.reasoningOutputTokens,
		totalTokens: bucket.totalTokens,
		...(costUSD == null ? {} : { costUSD }),
		models: accumulator.models.names(),
		byModel: accumulator.models.toRecord(),
	};
}

function isZeroRow(row: DailyReportRow): boolean {
	return row.events === 0 && row.totalTokens === 0 && (row.costUSD ?? 0) === 0;
}

/**
 * Folds usage events into UTC-day buckets. With `fillGaps`, every day from the
 * first bucket (or `since`) through `until` (or `today`) gets a row, and
 * leading all-zero days are dropped again.
 */
export function buildDailyReport(
	events: readonly TokenUsageEvent[],
	options: DailyReportOptions = {},
): DailyReportRow[] {
	const { since, until, pricing } = options;
	const accumulators = new Map<string, DailyAccumulator>();

	for (const event of takeLast(events, options.last)) {
		const dateKey = toDateKey(event.timestamp);
		if (!isWithinRange(dateKey, since, until)) {
			continue;
		}

		let accumulator = accumulators.get(dateKey);
		if (accumulator == null) {
			accumulator = createAccumulator(dateKey, pricing);
			accumulators.set(dateKey, accumulator);
		}

		addUsage(accumulator.bucket, event);
		accumulator.bucket.events += 1;
		accumulator.models.add(event);
		if (pricing != null) {
			addCost(accumulator.cost, costForUsage(event, event.model, pricing));
		}
	}

	const dates = Array.from(accumulators.keys()).sort();
	if (options.fillGaps !== true) {
		return dates.flatMap((date) => {
			const accumulator = accumulators.get(date);
			return accumulator == null ? [] : [toRow(accumulator)];
		});
	}

	const first = since ?? dates[0];
	const end = until ?? options.today ?? dates.at(-1);
	if (first == null || end == null) {
		return [];
	}

	const rows: DailyReportRow[] = [];
	for (let date = first; date <= end; date = nextDateKey(date)) {
		rows.push(toRow(accumulators.get(date) ?? createAccumulator(date, pricing)));
	}

	const firstUsed = rows.findIndex((row) => !isZeroRow(row));
	return firstUsed === -1 ? [] : rows.slice(firstUsed);
}

export function summarizeDailyRows(rows: readonly DailyReportRow[]): DailyTotals {
	const totals: DailyTotals = { events: 0, ...createEmptyUsage() };
	let costUSD: number | undefined = rows.length === 0 ? undefined : 0;
	for (const row of rows) {
		addUsage(totals, row);
		totals.events += row.events;
		costUSD = costUSD == null || row.costUSD == null ? undefined : costUSD + row.costUSD;
	}
	return costUSD == null ? totals : { ...totals, costUSD };
}

export type DailyRecord = {
	date: string;
	events: number;
	input_tokens: number;
	cached_input_tokens: number;
	output_tokens: number;
	reasoning_output_tokens: number;
	total_tokens: number;
	cost_usd?: number;
	by_model?: Record<string, ModelUsageRecord>;
};

export type RecordOptions = {
	/** Include per-model sums under `by_model`. */
	breakdown?: boolean;
};

export function toDailyRecord(row: DailyReportRow, options: RecordOptions = {}): DailyRecord {
	return {
		date: row.date,
		events: row.events,
		input_tokens: row.inputTokens,
		cached_input_tokens: row.cachedInputTokens,
		output_tokens: row.outputTokens,
		reasoning_output_tokens: row.reasoningOutputTokens,
		total_tokens: row.totalTokens,
		...(row.costUSD == null ? {} : { cost_usd: row.costUSD }),
		...(options.breakdown === true ? { by_model: toModelUsageRecords(row.byModel) } : {}),
	};
}

if (import.meta.vitest != null) {
	const event = (timestamp: string, input: number, output: number, model?: string): TokenUsageEvent => ({
		timestamp,
		inputTokens: input,
		cachedInputTokens: 0,
		outputTokens: output,
		reasoningOutputTokens: 0,
		totalTokens: input + output,
		...(model == null ? {} : { model }),
	});
	const pricing: PricingOptions = {
		priceTable: {
			models: new Map([['gpt-5', { input: 0.001, output: 0.01 }]]),
			aliases: new Map(),
		},
		billingMode: 'input-only',
	};

	describe('buildDailyReport', () => {
		it('groups events by UTC date and sorts the rows', () => {
			const rows = buildDailyReport([
				event('2025-09-12T01:00:00.000Z', 2_000, 800, 'gpt-5'),
				event('2025-09-11T03:00:00.000Z', 1_000, 500, 'gpt-5'),
				event('2025-09-11T23:59:59.000Z', 400, 200, 'gpt-5-mini'),
			]);

			expect(rows.map((row) => row.date)).toEqual(['2025-09-11', '2025-09-12']);
			expect(rows[0]).toEqual({
				date: '2025-09-11',
				events: 2,
				inputTokens: 1_400,
				cachedInputTokens: 0,
				outputTokens: 700,
				reasoningOutputTokens: 0,
				totalTokens: 2_100,
				models: ['gpt-5', 'gpt-5-mini'],
				byModel: {
					'gpt-5': {
						events: 1,
						inputTokens: 1_000,
						cachedInputTokens: 0,
						outputTokens: 500,
						reasoningOutputTokens: 0,
						totalTokens: 1_500,
					},
					'gpt-5-mini': {
						events: 1,
						inputTokens: 400,
						cachedInputTokens: 0,
						outputTokens: 200,
						reasoningOutputTokens: 0,
						totalTokens: 600,
					},
				},
			});
		});

		it('prices each model of a day separately', () => {
			const [row] = buildDailyReport(
				[
					event('2025-09-11T03:00:00.000Z', 1_000, 100, 'gpt-5'),
					event('2025-09-11T04:00:00.000Z', 500, 50, 'o3'),
				],
				{ pricing },
			);
			expect(row).not.toHaveProperty('costUSD');
			expect(row?.byModel['gpt-5']?.costUSD).toBeCloseTo(0.002, 10);
			expect(row?.byModel.o3).not.toHaveProperty('costUSD');
		});

		it('does not depend on event order', () => {
			const events = [
				event('2025-09-11T03:00:00.000Z', 10, 1),
				event('2025-09-12T03:00:00.000Z', 20, 2),
				event('2025-09-11T05:00:00.000Z', 30, 3),
			];
			expect(buildDailyReport(events)).toEqual(buildDailyReport([...events].reverse()));
		});

		it('applies inclusive date bounds and the trailing event limit', () => {
			const events = [
				event('2025-09-10T03:00:00.000Z', 1, 1),
				event('2025-09-11T03:00:00.000Z', 2, 2),
				event('2025-09-12T03:00:00.000Z', 3, 3),
			];
			expect(
				buildDailyReport(events, { since: '2025-09-11', until: '2025-09-12' }).map((row) => row.date),
			).toEqual(['2025-09-11', '2025-09-12']);
			expect(buildDailyReport(events, { last: 1 }).map((row) => row.inputTokens)).toEqual([3]);
			expect(buildDailyReport(events, { last: 0 })).toEqual([]);
		});

		it('costs each row and leaves cost absent when any event is unpriced', () => {
			const rows = buildDailyReport(
				[
					event('2025-09-11T03:00:00.000Z', 1_000, 100, 'gpt-5'),
					event('2025-09-12T03:00:00.000Z', 1_000, 100, 'gpt-5'),
					event('2025-09-12T04:00:00.000Z', 1_000, 100, 'o3'),
				],
				{ pricing },
			);
			expect(rows[0]?.costUSD).toBeCloseTo(0.002, 10);
			expect(rows[1]).not.toHaveProperty('costUSD');
		});

		it('fills missing days up to today and drops leading empty days', () => {
			const rows = buildDailyReport(
				[event('2025-09-11T03:00:00.000Z', 1_000, 100, 'gpt-5')],
				{ since: '2025-09-08', today: '2025-09-13', fillGaps: true, pricing },
			);
			expect(rows.map((row) => row.date)).toEqual(['2025-09-11', '2025-09-12', '2025-09-13']);
			expect(rows[1]).toMatchObject({ events: 0, totalTokens: 0, costUSD: 0 });
		});

		it('returns no rows when a filled range holds no usage', () => {
			const rows = buildDailyReport([], { since: '2025-09-08', today: '2025-09-10', fillGaps: true });
			expect(rows).toEqual([]);
		});
	});

	describe('summarizeDailyRows', () => {
		it('sums the rows and drops the cost when a row has none', () => {
			const priced = buildDailyReport(
				[
					event('2025-09-11T03:00:00.000Z', 1_000, 100, 'gpt-5'),
					event('2025-09-12T03:00:00.000Z', 2_000, 0, 'gpt-5'),
				],
				{ pricing },
			);
			const totals = summarizeDailyRows(priced);
			expect(totals.totalTokens).toBe(3_100);
			expect(totals.events).toBe(2);
			expect(totals.costUSD).toBeCloseTo(0.004, 10);

			const unpriced = summarizeDailyRows(buildDailyReport([event('2025-09-11T03:00:00.000Z', 1, 1)]));
			expect(unpriced).not.toHaveProperty('costUSD');
		});
	});

	describe('toDailyRecord', () => {
		it('uses snake_case fields and omits an unknown cost', () => {
			const [row] = buildDailyReport([event('2025-09-11T03:00:00.000Z', 5, 2)]);
			expect(row == null ? undefined : toDailyRecord(row)).toEqual({
				date: '2025-09-11',
				events: 1,
				input_tokens: 5,
				cached_input_tokens: 0,
				output_tokens: 2,
				reasoning_output_tokens: 0,
				total_tokens: 7,
			});
		});

		it('adds per-model records when asked for a breakdown', () => {
			const [row] = buildDailyReport([event('2025-09-11T03:00:00.000Z', 5, 2, 'o3')]);
			expect(row == null ? undefined : toDailyRecord(row, { breakdown: true }).by_model).toEqual({
				o3: {
					events: 1,
					input_tokens: 5,
					cached_input_tokens: 0,
					output_tokens: 2,
					reasoning_output_tokens: 0,
					total_tokens: 7,
				},
			});
		});
	});
}
