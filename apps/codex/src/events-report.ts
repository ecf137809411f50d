import type { LogRecord, PricingOptions, TokenUsageDelta, TokenUsageEvent } from './_types.ts';
import { HOUR_MS, LIVE_EVENT_ROWS, SESSION_WINDOW_HOURS } from './_consts.ts';
import { toEpochMs } from './date-utils.ts';
import { splitUsageStream } from './log-parser.ts';
import {
	addCost,
	addUsage,
	costForUsage,
	createCostTally,
	createEmptyUsage,
	settleCost,
} from './token-utils.ts';

export type EventSelection = {
	/** Keep only the trailing N events. */
	last?: number;
	/** Keep only events within this many hours before `now`. */
	sinceHours?: number;
	now?: Date;
};

/**
 * Sorts events chronologically, applies the hour window, then keeps the
 * trailing `last` of what remains.
 */
export function selectEvents(
	events: readonly TokenUsageEvent[],
	selection: EventSelection = {},
): TokenUsageEvent[] {
	const { last, sinceHours } = selection;
	let selected = [...events].sort((a, b) => toEpochMs(a.timestamp) - toEpochMs(b.timestamp));

	if (sinceHours != null) {
		const cutoff = (selection.now ?? new Date()).getTime() - sinceHours * HOUR_MS;
		selected = selected.filter((event) => toEpochMs(event.timestamp) >= cutoff);
	}
	if (last != null) {
		selected = last <= 0 ? [] : selected.slice(-last);
	}
	return selected;
}

export type EventRecord = {
	timestamp: string;
	model: string | null;
	input_tokens: number;
	cached_input_tokens: number;
	output_tokens: number;
	reasoning_output_tokens: number;
	total_tokens: number;
	cost_usd?: number;
};

export function toEventRecord(event: TokenUsageEvent, pricing?: PricingOptions): EventRecord {
	const costUSD = pricing == null ? undefined : costForUsage(event, event.model, pricing);
	return {
		timestamp: event.timestamp,
		model: event.model ?? null,
		input_tokens: event.inputTokens,
		cached_input_tokens: event.cachedInputTokens,
		output_tokens: event.outputTokens,
		reasoning_output_tokens: event.reasoningOutputTokens,
		total_tokens: event.totalTokens,
		...(costUSD == null ? {} : { cost_usd: costUSD }),
	};
}

export type EventTotals = TokenUsageDelta & {
	events: number;
	costUSD?: number;
};

export function summarizeEvents(records: readonly EventRecord[], priced: boolean): EventTotals {
	const usage = createEmptyUsage();
	const cost = createCostTally(priced);
	for (const record of records) {
		addUsage(usage, {
			inputTokens: record.input_tokens,
			cachedInputTokens: record.cached_input_tokens,
			outputTokens: record.output_tokens,
			reasoningOutputTokens: record.reasoning_output_tokens,
			totalTokens: record.total_tokens,
		});
		addCost(cost, record.cost_usd);
	}
	const costUSD = settleCost(cost);
	return { events: records.length, ...usage, ...(costUSD == null ? {} : { costUSD }) };
}

export type RollingEventsSnapshot = {
	since: string;
	now: string;
	hours: number;
	/** The most recent events of the window, oldest first. */
	events: EventRecord[];
	/** Events in the window that did not fit in `events`. */
	omitted: number;
	totals: EventTotals;
};

export type RollingEventWindowOptions = {
	sinceHours?: number;
	maxRows?: number;
	pricing?: PricingOptions;
};

/**
 * Follows the log for the live events view: usage from the last
 * `sinceHours` hours, with older events dropped on every snapshot.
 */
export class RollingEventWindow {
	private events: TokenUsageEvent[] = [];
	private currentModel?: string;

	constructor(private readonly options: RollingEventWindowOptions = {}) {}

	ingest(records: Iterable<LogRecord>): void {
		const stream = splitUsageStream(records, this.currentModel);
		this.currentModel = stream.currentModel;
		for (const event of stream.events) {
			this.events.push(event);
		}
	}

	get retainedEvents(): number {
		return this.events.length;
	}

	snapshot(now: Date): RollingEventsSnapshot {
		const hours = this.options.sinceHours ?? SESSION_WINDOW_HOURS;
		const maxRows = this.options.maxRows ?? LIVE_EVENT_ROWS;
		const { pricing } = this.options;

		this.events = selectEvents(this.events, { sinceHours: hours, now });
		const records = this.events.map((event) => toEventRecord(event, pricing));
		const shown = records.slice(-maxRows);
		return {
			since: new Date(now.getTime() - hours * HOUR_MS).toISOString(),
			now: now.toISOString(),
			hours,
			events: shown,
			omitted: records.length - shown.length,
			totals: summarizeEvents(records, pricing != null),
		};
	}
}

export type RollingEventsRecord = {
	mode: 'events';
	since: string;
	now: string;
	events: EventRecord[];
	totals: {
		events: number;
		input_tokens: number;
		cached_input_tokens: number;
		output_tokens: number;
		reasoning_output_tokens: number;
		total_tokens: number;
		cost_usd?: number;
	};
};

export function toRollingEventsRecord(snapshot: RollingEventsSnapshot): RollingEventsRecord {
	const { totals } = snapshot;
	return {
		mode: 'events',
		since: snapshot.since,
		now: snapshot.now,
		events: snapshot.events,
		totals: {
			events: totals.events,
			input_tokens: totals.inputTokens,
			cached_input_tokens: totals.cachedInputTokens,
			output_tokens: totals.outputTokens,
			reasoning_output_tokens: totals.reasoningOutputTokens,
			total_tokens: totals.totalTokens,
			...(totals.costUSD == null ? {} : { cost_usd: totals.costUSD }),
		},
	};
}

if (import.meta.vitest != null) {
	const event = (timestamp: string, input: number, model?: string): TokenUsageEvent => ({
		timestamp,
		inputTokens: input,
		cachedInputTokens: 0,
		outputTokens: 0,
		reasoningOutputTokens: 0,
		totalTokens: input,
		...(model == null ? {} : { model }),
	});
	const events = [
		event('2025-09-11T09:00:00.000Z', 3),
		event('2025-09-11T06:00:00.000Z', 1),
		event('2025-09-11T08:00:00.000Z', 2),
	];

	describe('selectEvents', () => {
		it('keeps the trailing events in time order', () => {
			expect(selectEvents(events, { last: 2 }).map((e) => e.inputTokens)).toEqual([2, 3]);
			expect(selectEvents(events, { last: 0 })).toEqual([]);
		});

		it('drops events older than the hour window', () => {
			const now = new Date('2025-09-11T10:00:00.000Z');
			const selected = selectEvents(events, { sinceHours: 2, now });
			expect(selected.map((e) => e.inputTokens)).toEqual([2, 3]);
		});
	});

	describe('toEventRecord', () => {
		it('prices the event through its model', () => {
			const record = toEventRecord(event('2025-09-11T09:00:00.000Z', 2_000, 'gpt-5'), {
				priceTable: { models: new Map([['gpt-5', { input: 0.5 }]]), aliases: new Map() },
				billingMode: 'input-only',
			});
			expect(record).toEqual({
				timestamp: '2025-09-11T09:00:00.000Z',
				model: 'gpt-5',
				input_tokens: 2_000,
				cached_input_tokens: 0,
				output_tokens: 0,
				reasoning_output_tokens: 0,
				total_tokens: 2_000,
				cost_usd: 1,
			});
		});

		it('leaves cost out when no rates resolve', () => {
			const record = toEventRecord(event('2025-09-11T09:00:00.000Z', 5), {
				priceTable: { models: new Map(), aliases: new Map() },
				billingMode: 'input-only',
			});
			expect(record).not.toHaveProperty('cost_usd');
			expect(record.model).toBeNull();
		});
	});

	describe('RollingEventWindow', () => {
		const pricing: PricingOptions = {
			priceTable: { models: new Map([['gpt-5', { input: 0.5 }]]), aliases: new Map() },
			billingMode: 'input-only',
		};
		const tokenCount = (timestamp: string, input: number): LogRecord => ({
			kind: 'token-count',
			...event(timestamp, input),
		});
		const records: LogRecord[] = [
			{ kind: 'session-configured', timestamp: '2025-08-25T05:00:00.000Z', model: 'gpt-5' },
			tokenCount('2025-08-25T05:30:00.000Z', 1_000),
			tokenCount('2025-08-25T08:00:00.000Z', 2_000),
			tokenCount('2025-08-25T11:00:00.000Z', 4_000),
		];
		const now = new Date('2025-08-25T12:00:00.000Z');

		it('keeps the last hours of usage and prices it', () => {
			const rolling = new RollingEventWindow({ sinceHours: 5, pricing });
			rolling.ingest(records);
			const snapshot = rolling.snapshot(now);

			expect(snapshot.since).toBe('2025-08-25T07:00:00.000Z');
			const rows = snapshot.events.map((record) => [record.timestamp, record.model, record.cost_usd]);
			expect(rows).toEqual([
				['2025-08-25T08:00:00.000Z', 'gpt-5', 1],
				['2025-08-25T11:00:00.000Z', 'gpt-5', 2],
			]);
			expect(snapshot.totals).toEqual({
				events: 2,
				inputTokens: 6_000,
				cachedInputTokens: 0,
				outputTokens: 0,
				reasoningOutputTokens: 0,
				totalTokens: 6_000,
				costUSD: 3,
			});
			expect(rolling.retainedEvents).toBe(2);
		});

		it('shows only the most recent rows but totals the whole window', () => {
			const rolling = new RollingEventWindow({ sinceHours: 5, maxRows: 1 });
			rolling.ingest(records);
			const snapshot = rolling.snapshot(now);

			expect(snapshot.events.map((record) => record.timestamp)).toEqual(['2025-08-25T11:00:00.000Z']);
			expect(snapshot.omitted).toBe(1);
			expect(snapshot.totals.totalTokens).toBe(6_000);
			expect(snapshot.totals).not.toHaveProperty('costUSD');
		});

		it('carries the configured model across batches', () => {
			const rolling = new RollingEventWindow();
			rolling.ingest(records.slice(0, 1));
			rolling.ingest([tokenCount('2025-08-25T11:30:00.000Z', 10)]);
			expect(rolling.snapshot(now).events[0]?.model).toBe('gpt-5');
		});
	});

	describe('toRollingEventsRecord', () => {
		it('writes the window and its totals in snake_case', () => {
			const rolling = new RollingEventWindow({ sinceHours: 1 });
			rolling.ingest([{ kind: 'token-count', ...event('2025-08-25T11:30:00.000Z', 7) }]);
			expect(toRollingEventsRecord(rolling.snapshot(new Date('2025-08-25T12:00:00.000Z')))).toEqual({
				mode: 'events',
				since: '2025-08-25T11:00:00.000Z',
				now: '2025-08-25T12:00:00.000Z',
				events: [
					{
						timestamp: '2025-08-25T11:30:00.000Z',
						model: null,
						input_tokens: 7,
						cached_input_tokens: 0,
						output_tokens: 0,
						reasoning_output_tokens: 0,
						total_tokens: 7,
					},
				],
				totals: {
					events: 1,
					input_tokens: 7,
					cached_input_tokens: 0,
					output_tokens: 0,
					reasoning_output_tokens: 0,
					total_tokens: 7,
				},
			});
		});
	});
}
