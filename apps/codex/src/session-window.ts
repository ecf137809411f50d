import type {
	ActivitySignal,
	SessionInput,
	SessionLatch,
	SessionState,
	SessionTrigger,
	SessionTriggerType,
	SessionWindow,
} from './_types.ts';
import { HOUR_MS, SESSION_WINDOW_HOURS } from './_consts.ts';
import { addHours, toEpochMs } from './date-utils.ts';

export type SessionWindowOptions = {
	/** Minimum silence between two activity signals that starts a new window. */
	gapHours?: number;
};

export type SessionStep = {
	latch: SessionLatch;
	trigger: SessionTrigger;
};

export type SessionEvaluation = {
	latch: SessionLatch;
	state: SessionState;
};

export function createSessionLatch(): SessionLatch {
	return { startupArmed: true };
}

function latchWindow(latch: SessionLatch, start: string, trigger: SessionTriggerType): SessionLatch {
	const window: SessionWindow = {
		start,
		end: addHours(start, SESSION_WINDOW_HOURS),
		trigger,
	};
	return { ...latch, window, startupArmed: false };
}

/**
 * Decides which trigger, if any, the activity signal fires. Usage-limit wins
 * over an inactivity gap; the startup trigger is never decided here.
 */
export function evaluateTrigger(
	latch: SessionLatch,
	signal: ActivitySignal,
	options: SessionWindowOptions = {},
): SessionTrigger {
	if (latch.pendingUsageLimit != null) {
		return {
			type: 'usage-limit',
			start: signal.timestamp,
			limitObservedAt: latch.pendingUsageLimit,
		};
	}

	if (latch.lastActivity != null) {
		const gapMs = toEpochMs(signal.timestamp) - toEpochMs(latch.lastActivity);
		const thresholdMs = (options.gapHours ?? SESSION_WINDOW_HOURS) * HOUR_MS;
		if (gapMs > 0 && gapMs >= thresholdMs) {
			return {
				type: 'inactivity-gap',
				start: signal.timestamp,
				previousActivity: latch.lastActivity,
			};
		}
	}

	return { type: 'none' };
}

/**
 * Folds one input into the latch. A usage-limit only marks itself pending;
 * the activity that follows it is what latches the new window.
 */
export function advanceSession(
	latch: SessionLatch,
	input: SessionInput,
	options: SessionWindowOptions = {},
): SessionStep {
	if (input.kind === 'usage-limit') {
		return {
			latch: { ...latch, pendingUsageLimit: input.timestamp },
			trigger: { type: 'none' },
		};
	}

	const trigger = evaluateTrigger(latch, input, options);
	const lastActivity =
		latch.lastActivity == null || toEpochMs(input.timestamp) > toEpochMs(latch.lastActivity)
			? input.timestamp
			: latch.lastActivity;

	if (trigger.type === 'none') {
		return { latch: { ...latch, lastActivity }, trigger };
	}

	const next: SessionLatch = { ...latch, lastActivity };
	if (trigger.type === 'usage-limit') {
		delete next.pendingUsageLimit;
	}
	return { latch: latchWindow(next, trigger.start, trigger.type), trigger };
}

/**
 * Applies the startup trigger: when nothing has latched a window yet in this
 * run and no usage-limit is pending, the oldest activity within the last
 * window length before `now` becomes a provisional start.
 */
export function settleSession(
	latch: SessionLatch,
	activity: Iterable<string>,
	now: Date,
): SessionStep {
	if (!latch.startupArmed || latch.window != null || latch.pendingUsageLimit != null) {
		return { latch, trigger: { type: 'none' } };
	}

	const nowMs = now.getTime();
	const horizonMs = nowMs - SESSION_WINDOW_HOURS * HOUR_MS;
	let oldest: string | undefined;
	let oldestMs = Number.POSITIVE_INFINITY;
	for (const timestamp of activity) {
		const ms = toEpochMs(timestamp);
		if (ms >= horizonMs && ms <= nowMs && ms < oldestMs) {
			oldest = timestamp;
			oldestMs = ms;
		}
	}

	if (oldest == null) {
		return { latch, trigger: { type: 'none' } };
	}
	return {
		latch: latchWindow(latch, oldest, 'startup'),
		trigger: { type: 'startup', start: oldest },
	};
}

export function resolveSessionState(latch: SessionLatch, now: Date): SessionState {
	const window = latch.window;
	if (window == null) {
		return { status: 'unset' };
	}
	const status = now.getTime() < toEpochMs(window.end) ? 'active' : 'expired';
	return { status, start: window.start, end: window.end };
}

function sortInputs(inputs: Iterable<SessionInput>): SessionInput[] {
	return Array.from(inputs).sort((a, b) => toEpochMs(a.timestamp) - toEpochMs(b.timestamp));
}

export type ComputeSessionOptions = SessionWindowOptions & {
	/** Latch carried over from a previous evaluation of earlier inputs. */
	latch?: SessionLatch;
	/** Activity timestamps folded into the carried latch, used by the startup scan. */
	history?: Iterable<string>;
};

/**
 * Runs the state machine over the inputs in timestamp order and settles it at
 * `now`. Given the same inputs and carried latch the result is the same, so
 * live refreshes may call this on every tick.
 */
export function computeSessionWindow(
	inputs: Iterable<SessionInput>,
	now: Date,
	options: ComputeSessionOptions = {},
): SessionEvaluation {
	const sorted = sortInputs(inputs);
	let latch = options.latch ?? createSessionLatch();
	for (const input of sorted) {
		latch = advanceSession(latch, input, options).latch;
	}

	const activity = [...(options.history ?? [])];
	for (const input of sorted) {
		if (input.kind !== 'usage-limit') {
			activity.push(input.timestamp);
		}
	}
	latch = settleSession(latch, activity, now).latch;

	return { latch, state: resolveSessionState(latch, now) };
}

if (import.meta.vitest != null) {
	const activity = (timestamp: string): ActivitySignal => ({ kind: 'task-started', timestamp });
	const limit = (timestamp: string): SessionInput => ({ kind: 'usage-limit', timestamp });

	describe('computeSessionWindow', () => {
		it('starts a new window after an inactivity gap', () => {
			const { latch, state } = computeSessionWindow(
				[
					activity('2025-08-25T01:10:00.000Z'),
					activity('2025-08-25T07:45:00.000Z'),
					activity('2025-08-25T09:13:00.000Z'),
				],
				new Date('2025-08-25T11:00:00.000Z'),
			);
			expect(state).toEqual({
				status: 'active',
				start: '2025-08-25T07:45:00.000Z',
				end: '2025-08-25T12:45:00.000Z',
			});
			expect(latch.window?.trigger).toBe('inactivity-gap');
		});

		it('starts at the first activity after a usage limit and expires five hours later', () => {
			const { latch, state } = computeSessionWindow(
				[
					{ kind: 'token-count', timestamp: '2025-08-25T05:10:00.000Z' },
					limit('2025-08-25T05:15:00.000Z'),
					{ kind: 'exec-command-begin', timestamp: '2025-08-25T05:20:00.000Z' },
					activity('2025-08-25T06:00:00.000Z'),
				],
				new Date('2025-08-25T10:30:00.000Z'),
			);
			expect(state).toEqual({
				status: 'expired',
				start: '2025-08-25T05:20:00.000Z',
				end: '2025-08-25T10:20:00.000Z',
			});
			expect(latch.window?.trigger).toBe('usage-limit');
			expect(latch.pendingUsageLimit).toBeUndefined();
		});

		it('sorts inputs before folding them', () => {
			const { state } = computeSessionWindow(
				[
					activity('2025-08-25T05:10:00.000Z'),
					limit('2025-08-25T05:05:00.000Z'),
					activity('2025-08-25T05:00:00.000Z'),
				],
				new Date('2025-08-25T06:00:00.000Z'),
			);
			expect(state).toMatchObject({ status: 'active', start: '2025-08-25T05:10:00.000Z' });
		});

		it('latches a provisional start at the oldest recent activity', () => {
			const { latch, state } = computeSessionWindow(
				[activity('2025-08-25T08:00:00.000Z'), activity('2025-08-25T08:30:00.000Z')],
				new Date('2025-08-25T09:00:00.000Z'),
			);
			expect(state).toEqual({
				status: 'active',
				start: '2025-08-25T08:00:00.000Z',
				end: '2025-08-25T13:00:00.000Z',
			});
			expect(latch.window?.trigger).toBe('startup');
			expect(latch.startupArmed).toBe(false);
		});

		it('expires a carried window and yields unavailable until a new trigger fires', () => {
			const first = computeSessionWindow(
				[activity('2025-08-25T08:00:00.000Z')],
				new Date('2025-08-25T09:00:00.000Z'),
			);
			expect(first.state.status).toBe('active');

			const later = computeSessionWindow([], new Date('2025-08-25T13:00:01.000Z'), {
				latch: first.latch,
				history: ['2025-08-25T08:00:00.000Z'],
			});
			expect(later.state).toEqual({
				status: 'expired',
				start: '2025-08-25T08:00:00.000Z',
				end: '2025-08-25T13:00:00.000Z',
			});
		});

		it('does not restart an expired window through the startup scan', () => {
			const first = computeSessionWindow(
				[activity('2025-08-25T08:00:00.000Z')],
				new Date('2025-08-25T08:30:00.000Z'),
			);
			const later = computeSessionWindow(
				[activity('2025-08-25T12:00:00.000Z'), activity('2025-08-25T13:30:00.000Z')],
				new Date('2025-08-25T14:00:00.000Z'),
				{ latch: first.latch, history: ['2025-08-25T08:00:00.000Z'] },
			);
			expect(later.state).toMatchObject({ status: 'expired', start: '2025-08-25T08:00:00.000Z' });
		});

		it('re-arms a new window after a gap, ignoring pre-gap activity', () => {
			const first = computeSessionWindow(
				[activity('2025-08-25T02:00:00.000Z')],
				new Date('2025-08-25T03:00:00.000Z'),
			);
			const later = computeSessionWindow(
				[activity('2025-08-25T08:00:00.000Z')],
				new Date('2025-08-25T08:30:00.000Z'),
				{ latch: first.latch, history: ['2025-08-25T02:00:00.000Z'] },
			);
			expect(later.state).toEqual({
				status: 'active',
				start: '2025-08-25T08:00:00.000Z',
				end: '2025-08-25T13:00:00.000Z',
			});
			expect(later.latch.window?.trigger).toBe('inactivity-gap');
		});

		it('stays unset when a usage limit has no later activity', () => {
			const { state, latch } = computeSessionWindow(
				[activity('2025-08-25T08:00:00.000Z'), limit('2025-08-25T09:00:00.000Z')],
				new Date('2025-08-25T10:00:00.000Z'),
			);
			expect(state).toEqual({ status: 'unset' });
			expect(latch.pendingUsageLimit).toBe('2025-08-25T09:00:00.000Z');
		});

		it('never starts from activity older than the scan horizon', () => {
			const { state } = computeSessionWindow(
				[activity('2025-08-25T03:59:59.000Z')],
				new Date('2025-08-25T09:00:00.000Z'),
			);
			expect(state).toEqual({ status: 'unset' });
		});
	});

	describe('evaluateTrigger', () => {
		it('prefers a pending usage limit over a qualifying gap', () => {
			const trigger = evaluateTrigger(
				{
					startupArmed: false,
					lastActivity: '2025-08-25T00:00:00.000Z',
					pendingUsageLimit: '2025-08-25T01:00:00.000Z',
				},
				{ kind: 'token-count', timestamp: '2025-08-25T07:00:00.000Z' },
			);
			expect(trigger).toEqual({
				type: 'usage-limit',
				start: '2025-08-25T07:00:00.000Z',
				limitObservedAt: '2025-08-25T01:00:00.000Z',
			});
		});

		it('does not treat identical timestamps as a gap', () => {
			const latch = { startupArmed: true, lastActivity: '2025-08-25T07:00:00.000Z' };
			expect(
				evaluateTrigger(latch, activity('2025-08-25T07:00:00.000Z'), { gapHours: 0 }),
			).toEqual({ type: 'none' });
			expect(
				evaluateTrigger(latch, { kind: 'task-started', timestamp: '2025-08-25T07:00:00.001Z' }, { gapHours: 0 }),
			).toMatchObject({ type: 'inactivity-gap', previousActivity: '2025-08-25T07:00:00.000Z' });
		});

		it('fires a gap at exactly the threshold', () => {
			const latch = { startupArmed: false, lastActivity: '2025-08-25T02:00:00.000Z' };
			expect(evaluateTrigger(latch, { kind: 'task-started', timestamp: '2025-08-25T07:00:00.000Z' }).type).toBe(
				'inactivity-gap',
			);
			expect(evaluateTrigger(latch, { kind: 'task-started', timestamp: '2025-08-25T06:59:59.999Z' }).type).toBe(
				'none',
			);
		});
	});

	describe('advanceSession', () => {
		it('latches a usage limit once', () => {
			let latch = createSessionLatch();
			latch = advanceSession(latch, limit('2025-08-25T05:00:00.000Z')).latch;
			const fired = advanceSession(latch, activity('2025-08-25T05:01:00.000Z'));
			expect(fired.trigger.type).toBe('usage-limit');
			const next = advanceSession(fired.latch, activity('2025-08-25T05:02:00.000Z'));
			expect(next.trigger.type).toBe('none');
			expect(next.latch.window?.start).toBe('2025-08-25T05:01:00.000Z');
			expect(next.latch.lastActivity).toBe('2025-08-25T05:02:00.000Z');
		});
	});
}
