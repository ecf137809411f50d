import type {
	LiveSnapshot,
	LogRecord,
	PricingOptions,
	SessionInput,
	SessionLatch,
	TokenUsageDelta,
	TokenUsageEvent,
} from './_types.ts';
import type { SessionWindowOptions } from './session-window.ts';
import { HOUR_MS, SESSION_WINDOW_HOURS } from './_consts.ts';
import { toEpochMs } from './date-utils.ts';
import { splitUsageStream } from './log-parser.ts';
import { computeSessionWindow, createSessionLatch, resolveSessionState } from './session-window.ts';
import {
	addCost,
	addUsage,
	costForUsage,
	createCostTally,
	createEmptyUsage,
	settleCost,
} from './token-utils.ts';

export type WindowTotals = TokenUsageDelta & {
	events: number;
	costUSD?: number;
};

/**
 * Folds the events with `start <= timestamp < end`. The total is the sum of
 * the per-event totals, never recomputed from the other fields.
 */
export function accumulateWindow(
	events: Iterable<TokenUsageEvent>,
	start: string,
	end: string,
	pricing?: PricingOptions,
): WindowTotals {
	const startMs = toEpochMs(start);
	const endMs = toEpochMs(end);
	const usage = createEmptyUsage();
	const cost = createCostTally(pricing != null);
	let count = 0;

	for (const event of events) {
		const ms = toEpochMs(event.timestamp);
		if (ms < startMs || ms >= endMs) {
			continue;
		}
		addUsage(usage, event);
		count += 1;
		if (pricing != null) {
			addCost(cost, costForUsage(event, event.model, pricing));
		}
	}

	const costUSD = settleCost(cost);
	return costUSD == null ? { ...usage, events: count } : { ...usage, events: count, costUSD };
}

export type LiveSnapshotOptions = {
	pricing?: PricingOptions;
};

export function buildLiveSnapshot(
	events: Iterable<TokenUsageEvent>,
	latch: SessionLatch,
	now: Date,
	options: LiveSnapshotOptions = {},
): LiveSnapshot {
	const state = resolveSessionState(latch, now);
	const nowText = now.toISOString();
	if (state.status !== 'active' || latch.window == null) {
		return { status: 'unavailable', reason: state.status === 'expired' ? 'expired' : 'unset', now: nowText };
	}

	const totals = accumulateWindow(events, state.start, state.end, options.pricing);
	const upToMs = Math.min(now.getTime(), toEpochMs(state.end));
	return {
		status: 'available',
		start: state.start,
		end: state.end,
		now: nowText,
		durationSec: Math.max(0, Math.floor((upToMs - toEpochMs(state.start)) / 1000)),
		trigger: latch.window.trigger,
		...totals,
	};
}

export type LiveRecord =
	| {
		mode: 'session';
		start: string;
		end: string;
		now: string;
		duration_sec: number;
		events: number;
		input_tokens: number;
		cached_input_tokens: number;
		output_tokens: number;
		reasoning_output_tokens: number;
		total_tokens: number;
		cost_usd?: number;
	}
	| {
		mode: 'unavailable';
		reason: 'unset' | 'expired';
		start: null;
		end: null;
		now: string;
		duration_sec: null;
	};

export function toLiveRecord(snapshot: LiveSnapshot): LiveRecord {
	if (snapshot.status === 'unavailable') {
		return {
			mode: 'unavailable',
			reason: snapshot.reason,
			start: null,
			end: null,
			now: snapshot.now,
			duration_sec: null,
		};
	}
	return {
		mode: 'session',
		start: snapshot.start,
		end: snapshot.end,
		now: snapshot.now,
		duration_sec: snapshot.durationSec,
		events: snapshot.events,
		input_tokens: snapshot.inputTokens,
		cached_input_tokens: snapshot.cachedInputTokens,
		output_tokens: snapshot.outputTokens,
		reasoning_output_tokens: snapshot.reasoningOutputTokens,
		total_tokens: snapshot.totalTokens,
		...(snapshot.costUSD == null ? {} : { cost_usd: snapshot.costUSD }),
	};
}

export type LiveSessionTrackerOptions = SessionWindowOptions & LiveSnapshotOptions;

/**
 * Carries records and the session latch between live refreshes. Records are
 * ingested as they are read; each snapshot folds only the inputs that arrived
 * since the previous one into the carried latch.
 */
export class LiveSessionTracker {
	private events: TokenUsageEvent[] = [];
	private history: string[] = [];
	private pending: SessionInput[] = [];
	private latch: SessionLatch = createSessionLatch();
	private currentModel?: string;

	constructor(private readonly options: LiveSessionTrackerOptions = {}) {}

	ingest(records: Iterable<LogRecord>): void {
		const stream = splitUsageStream(records, this.currentModel);
		this.currentModel = stream.currentModel;
		for (const event of stream.events) {
			this.events.push(event);
		}
		for (const input of stream.inputs) {
			this.pending.push(input);
		}
	}

	get retainedEvents(): number {
		return this.events.length;
	}

	get sessionLatch(): SessionLatch {
		return this.latch;
	}

	snapshot(now: Date): LiveSnapshot {
		const evaluation = computeSessionWindow(this.pending, now, {
			gapHours: this.options.gapHours,
			latch: this.latch,
			history: this.history,
		});
		this.latch = evaluation.latch;
		for (const input of this.pending) {
			if (input.kind !== 'usage-limit') {
				this.history.push(input.timestamp);
			}
		}
		this.pending = [];
		this.trim(now);
		return buildLiveSnapshot(this.events, this.latch, now, { pricing: this.options.pricing });
	}

	/**
	 * Every later window starts at or after `now - 5h`: an active window started
	 * within the last window length, and any new one starts at later activity or
	 * at the oldest activity the startup scan finds in that range.
	 */
	private trim(now: Date): void {
		const horizonMs = now.getTime() - SESSION_WINDOW_HOURS * HOUR_MS;
		this.events = this.events.filter((event) => toEpochMs(event.timestamp) >= horizonMs);
		this.history = this.latch.startupArmed
			? this.history.filter((timestamp) => toEpochMs(timestamp) >= horizonMs)
			: [];
	}
}

if (import.meta.vitest != null) {
	const usage = (timestamp: string, input: number, output: number, total: number): TokenUsageEvent => ({
		timestamp,
		inputTokens: input,
		cachedInputTokens: 0,
		outputTokens: output,
		reasoningOutputTokens: 0,
		totalTokens: total,
	});
	const pricing: PricingOptions = {
		priceTable: {
			models: new Map([['gpt-5', { input: 0.001, output: 0.01 }]]),
			aliases: new Map(),
		},
		billingMode: 'input-only',
		fallbackModel: 'gpt-5',
	};

	describe('accumulateWindow', () => {
		it('includes the start, excludes the end and sums producer totals', () => {
			const totals = accumulateWindow(
				[
					usage('2025-08-25T07:59:59.999Z', 1, 1, 2),
					usage('2025-08-25T08:00:00.000Z', 100, 10, 999),
					usage('2025-08-25T12:59:59.000Z', 200, 20, 220),
					usage('2025-08-25T13:00:00.000Z', 300, 30, 330),
				],
				'2025-08-25T08:00:00.000Z',
				'2025-08-25T13:00:00.000Z',
			);
			expect(totals).toEqual({
				inputTokens: 300,
				cachedInputTokens: 0,
				outputTokens: 30,
				reasoningOutputTokens: 0,
				totalTokens: 1_219,
				events: 2,
			});
		});

		it('prices events through the fallback model', () => {
			const totals = accumulateWindow(
				[usage('2025-08-25T08:00:00.000Z', 1_000, 100, 1_100)],
				'2025-08-25T08:00:00.000Z',
				'2025-08-25T13:00:00.000Z',
				pricing,
			);
			expect(totals.costUSD).toBeCloseTo(0.002, 10);
		});
	});

	describe('buildLiveSnapshot', () => {
		const latch: SessionLatch = {
			startupArmed: false,
			lastActivity: '2025-08-25T08:00:00.000Z',
			window: {
				start: '2025-08-25T08:00:00.000Z',
				end: '2025-08-25T13:00:00.000Z',
				trigger: 'startup',
			},
		};

		it('reports the active window with its elapsed duration', () => {
			const snapshot = buildLiveSnapshot(
				[usage('2025-08-25T08:10:00.000Z', 10, 5, 15)],
				latch,
				new Date('2025-08-25T09:30:30.000Z'),
			);
			expect(snapshot).toMatchObject({
				status: 'available',
				durationSec: 5_430,
				trigger: 'startup',
				events: 1,
				totalTokens: 15,
			});
		});

		it('reports unavailable rather than a stale or empty window', () => {
			const now = new Date('2025-08-25T13:00:00.000Z');
			expect(buildLiveSnapshot([], latch, now)).toEqual({
				status: 'unavailable',
				reason: 'expired',
				now: '2025-08-25T13:00:00.000Z',
			});
			expect(buildLiveSnapshot([], createSessionLatch(), now)).toEqual({
				status: 'unavailable',
				reason: 'unset',
				now: '2025-08-25T13:00:00.000Z',
			});
		});
	});

	describe('toLiveRecord', () => {
		it('uses explicit nulls for an unavailable window', () => {
			expect(
				toLiveRecord({ status: 'unavailable', reason: 'unset', now: '2025-08-25T13:00:00.000Z' }),
			).toEqual({
				mode: 'unavailable',
				reason: 'unset',
				start: null,
				end: null,
				now: '2025-08-25T13:00:00.000Z',
				duration_sec: null,
			});
		});

		it('emits snake_case totals for an available window', () => {
			const record = toLiveRecord({
				status: 'available',
				start: '2025-08-25T08:00:00.000Z',
				end: '2025-08-25T13:00:00.000Z',
				now: '2025-08-25T09:00:00.000Z',
				durationSec: 3_600,
				trigger: 'usage-limit',
				events: 2,
				inputTokens: 10,
				cachedInputTokens: 4,
				outputTokens: 3,
				reasoningOutputTokens: 1,
				totalTokens: 13,
				costUSD: 0.5,
			});
			expect(record).toEqual({
				mode: 'session',
				start: '2025-08-25T08:00:00.000Z',
				end: '2025-08-25T13:00:00.000Z',
				now: '2025-08-25T09:00:00.000Z',
				duration_sec: 3_600,
				events: 2,
				input_tokens: 10,
				cached_input_tokens: 4,
				output_tokens: 3,
				reasoning_output_tokens: 1,
				total_tokens: 13,
				cost_usd: 0.5,
			});
		});
	});

	describe('LiveSessionTracker', () => {
		it('keeps the window and model context across refreshes until it expires', () => {
			const tracker = new LiveSessionTracker({ pricing });
			tracker.ingest([
				{ kind: 'session-configured', timestamp: '2025-08-25T07:59:00.000Z', model: 'gpt-5' },
				{ kind: 'token-count', ...usage('2025-08-25T08:00:00.000Z', 1_000, 100, 1_100) },
			]);
			const first = tracker.snapshot(new Date('2025-08-25T09:00:00.000Z'));
			const start = '2025-08-25T08:00:00.000Z';
			expect(first).toMatchObject({ status: 'available', start, events: 1 });

			tracker.ingest([{ kind: 'token-count', ...usage('2025-08-25T09:30:00.000Z', 2_000, 0, 2_000) }]);
			const second = tracker.snapshot(new Date('2025-08-25T10:00:00.000Z'));
			expect(second).toMatchObject({ status: 'available', start, events: 2 });
			expect(second.status === 'available' ? second.costUSD : undefined).toBeCloseTo(0.004, 10);

			const expired = tracker.snapshot(new Date('2025-08-25T13:00:01.000Z'));
			expect(expired).toEqual({
				status: 'unavailable',
				reason: 'expired',
				now: '2025-08-25T13:00:01.000Z',
			});
		});

		it('ingests a whole log in one batch', () => {
			const startMs = Date.parse('2025-08-25T08:00:00.000Z');
			const records = Array.from({ length: 300_000 }, (_, index): LogRecord => ({
				kind: 'token-count',
				...usage(new Date(startMs + index * 50).toISOString(), 1, 1, 2),
			}));
			const tracker = new LiveSessionTracker();
			expect(() => tracker.ingest(records)).not.toThrow();
			expect(tracker.snapshot(new Date('2025-08-25T12:00:00.000Z'))).toMatchObject({
				status: 'available',
				start: '2025-08-25T08:00:00.000Z',
				events: 300_000,
				totalTokens: 600_000,
			});
		});

		it('drops events and activity older than the window length', () => {
			const tracker = new LiveSessionTracker();
			tracker.ingest([
				{ kind: 'token-count', ...usage('2025-08-25T01:00:00.000Z', 1, 1, 2) },
				{ kind: 'token-count', ...usage('2025-08-25T08:00:00.000Z', 1, 1, 2) },
			]);
			tracker.snapshot(new Date('2025-08-25T09:00:00.000Z'));
			expect(tracker.retainedEvents).toBe(1);

			tracker.ingest([{ kind: 'token-count', ...usage('2025-08-25T15:00:00.000Z', 5, 5, 10) }]);
			expect(tracker.snapshot(new Date('2025-08-25T15:30:00.000Z'))).toMatchObject({
				status: 'available',
				start: '2025-08-25T15:00:00.000Z',
				trigger: 'inactivity-gap',
				events: 1,
				totalTokens: 10,
			});
			expect(tracker.retainedEvents).toBe(1);
		});

		it('opens a new window when activity resumes after a gap', () => {
			const tracker = new LiveSessionTracker();
			tracker.ingest([{ kind: 'task-started', timestamp: '2025-08-25T02:00:00.000Z' }]);
			tracker.snapshot(new Date('2025-08-25T03:00:00.000Z'));
			tracker.ingest([{ kind: 'exec-command-begin', timestamp: '2025-08-25T08:00:00.000Z' }]);
			expect(tracker.snapshot(new Date('2025-08-25T08:30:00.000Z'))).toMatchObject({
				status: 'available',
				start: '2025-08-25T08:00:00.000Z',
				trigger: 'inactivity-gap',
				events: 0,
			});
			expect(tracker.sessionLatch.window?.end).toBe('2025-08-25T13:00:00.000Z');
		});
	});
}
