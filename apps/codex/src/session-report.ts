import type { PricingOptions, SessionReportRow, TokenUsageDelta, TokenUsageEvent } from './_types.ts';
import type { RecordOptions } from './daily-report.ts';
import type { ModelUsageRecord } from './model-usage.ts';
import type { CostTally } from './token-utils.ts';
import { DEFAULT_SESSION_GAP_MINUTES } from './_consts.ts';
import { isWithinRange, toDateKey, toEpochMs } from './date-utils.ts';
import { ModelUsageBreakdown, toModelUsageRecords } from './model-usage.ts';
import {
	addCost,
	addUsage,
	costForUsage,
	createCostTally,
	createEmptyUsage,
	settleCost,
} from './token-utils.ts';

export type SessionReportOptions = {
	/** Silence longer than this closes a session. */
	gapMinutes?: number;
	since?: string;
	until?: string;
	pricing?: PricingOptions;
};

type SessionSummary = {
	start: string;
	end: string;
	events: number;
	usage: TokenUsageDelta;
	cost: CostTally;
	models: ModelUsageBreakdown;
};

function createSummary(timestamp: string, pricing?: PricingOptions): SessionSummary {
	return {
		start: timestamp,
		end: timestamp,
		events: 0,
		usage: createEmptyUsage(),
		cost: createCostTally(pricing != null),
		models: new ModelUsageBreakdown(pricing),
	};
}

/**
 * Splits chronologically ordered events into sessions wherever the silence
 * between two events exceeds `gapMinutes`.
 */
export function buildSessionReport(
	events: readonly TokenUsageEvent[],
	options: SessionReportOptions = {},
): SessionReportRow[] {
	const { since, until, pricing } = options;
	const gapMs = (options.gapMinutes ?? DEFAULT_SESSION_GAP_MINUTES) * 60_000;

	const sorted = events
		.filter((event) => isWithinRange(toDateKey(event.timestamp), since, until))
		.sort((a, b) => toEpochMs(a.timestamp) - toEpochMs(b.timestamp));

	const summaries: SessionSummary[] = [];
	let current: SessionSummary | undefined;
	for (const event of sorted) {
		if (current == null || toEpochMs(event.timestamp) - toEpochMs(current.end) > gapMs) {
			current = createSummary(event.timestamp, pricing);
			summaries.push(current);
		}

		current.end = event.timestamp;
		current.events += 1;
		addUsage(current.usage, event);
		current.models.add(event);
		if (pricing != null) {
			addCost(current.cost, costForUsage(event, event.model, pricing));
		}
	}

	return summaries.map((summary, index) => {
		const next = summaries[index + 1];
		const costUSD = settleCost(summary.cost);
		return {
			start: summary.start,
			end: summary.end,
			durationSec: Math.floor((toEpochMs(summary.end) - toEpochMs(summary.start)) / 1000),
			...(next == null
				? {}
				: { gapToNextSec: Math.floor((toEpochMs(next.start) - toEpochMs(summary.end)) / 1000) }),
			events: summary.events,
			...summary.usage,
			...(costUSD == null ? {} : { costUSD }),
			models: summary.models.names(),
			byModel: summary.models.toRecord(),
		};
	});
}

export type SessionRecord = {
	start: string;
	end: string;
	duration_sec: number;
	gap_to_next_sec: number | null;
	events: number;
	input_tokens: number;
	cached_input_tokens: number;
	output_tokens: number;
	reasoning_output_tokens: number;
	total_tokens: number;
	cost_usd?: number;
	by_model?: Record<string, ModelUsageRecord>;
};

export function toSessionRecord(row: SessionReportRow, options: RecordOptions = {}): SessionRecord {
	return {
		start: row.start,
		end: row.end,
		duration_sec: row.durationSec,
		gap_to_next_sec: row.gapToNextSec ?? null,
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
	const event = (timestamp: string, input: number, model?: string): TokenUsageEvent => ({
		timestamp,
		inputTokens: input,
		cachedInputTokens: 0,
		outputTokens: 10,
		reasoningOutputTokens: 0,
		totalTokens: input + 10,
		...(model == null ? {} : { model }),
	});
	const pricing: PricingOptions = {
		priceTable: {
			models: new Map([['gpt-5', { input: 0.001, output: 0.01 }]]),
			aliases: new Map(),
		},
		billingMode: 'input-only',
	};

	describe('buildSessionReport', () => {
		it('splits sessions on gaps longer than the threshold', () => {
			const rows = buildSessionReport([
				event('2025-09-11T10:20:00.000Z', 300, 'gpt-5'),
				event('2025-09-11T10:00:00.000Z', 100, 'gpt-5'),
				event('2025-09-11T10:10:00.000Z', 200, 'gpt-5-codex'),
				event('2025-09-11T10:30:01.000Z', 400),
			]);

			expect(rows).toHaveLength(2);
			expect(rows[0]).toEqual({
				start: '2025-09-11T10:00:00.000Z',
				end: '2025-09-11T10:20:00.000Z',
				durationSec: 1_200,
				gapToNextSec: 601,
				events: 3,
				inputTokens: 600,
				cachedInputTokens: 0,
				outputTokens: 30,
				reasoningOutputTokens: 0,
				totalTokens: 630,
				models: ['gpt-5', 'gpt-5-codex'],
				byModel: {
					'gpt-5': {
						events: 2,
						inputTokens: 400,
						cachedInputTokens: 0,
						outputTokens: 20,
						reasoningOutputTokens: 0,
						totalTokens: 420,
					},
					'gpt-5-codex': {
						events: 1,
						inputTokens: 200,
						cachedInputTokens: 0,
						outputTokens: 10,
						reasoningOutputTokens: 0,
						totalTokens: 210,
					},
				},
			});
			expect(rows[1]).toMatchObject({
				start: '2025-09-11T10:30:01.000Z',
				durationSec: 0,
				events: 1,
				models: [],
			});
			expect(rows[1]).not.toHaveProperty('gapToNextSec');
		});

		it('honours a custom gap and prices each session', () => {
			const rows = buildSessionReport(
				[
					event('2025-09-11T10:00:00.000Z', 1_000, 'gpt-5'),
					event('2025-09-11T10:30:00.000Z', 1_000, 'gpt-5'),
				],
				{ gapMinutes: 30, pricing },
			);
			expect(rows).toHaveLength(1);
			expect(rows[0]?.costUSD).toBeCloseTo(0.0022, 10);
			expect(rows[0]?.byModel['gpt-5']?.costUSD).toBeCloseTo(0.0022, 10);
		});
	});

	describe('toSessionRecord', () => {
		it('marks the last session with a null gap', () => {
			const [row] = buildSessionReport([event('2025-09-11T10:00:00.000Z', 5)]);
			expect(row == null ? undefined : toSessionRecord(row)).toEqual({
				start: '2025-09-11T10:00:00.000Z',
				end: '2025-09-11T10:00:00.000Z',
				duration_sec: 0,
				gap_to_next_sec: null,
				events: 1,
				input_tokens: 5,
				cached_input_tokens: 0,
				output_tokens: 10,
				reasoning_output_tokens: 0,
				total_tokens: 15,
			});
		});

		it('lists unnamed events under (unknown) in the breakdown', () => {
			const [row] = buildSessionReport([event('2025-09-11T10:00:00.000Z', 5)], { pricing });
			const record = row == null ? undefined : toSessionRecord(row, { breakdown: true });
			expect(record?.by_model).toEqual({
				'(unknown)': {
					events: 1,
					input_tokens: 5,
					cached_input_tokens: 0,
					output_tokens: 10,
					reasoning_output_tokens: 0,
					total_tokens: 15,
				},
			});
			expect(record).not.toHaveProperty('cost_usd');
		});
	});
}
