import type { LiveSnapshot, LogRecord } from '../_types.ts';
import type { RollingEventsRecord, RollingEventsSnapshot } from '../events-report.ts';
import type { LiveRecord } from '../live-report.ts';
import process from 'node:process';
import { setTimeout as sleep } from 'node:timers/promises';
import { Result } from '@praha/byethrow';
import { define } from 'gunshi';
import pc from 'picocolors';
import { DEFAULT_LIVE_INTERVAL_SECONDS, SESSION_WINDOW_HOURS } from '../_consts.ts';
import { sharedArgs } from '../_shared-args.ts';
import { resolvePricingFromArgs } from '../command-utils.ts';
import { LogFollower, resolveLogPath } from '../data-loader.ts';
import { formatDuration, toEpochMs } from '../date-utils.ts';
import { RollingEventWindow, toRollingEventsRecord } from '../events-report.ts';
import { LiveSessionTracker, toLiveRecord } from '../live-report.ts';
import { log, logger } from '../logger.ts';
import {
	formatCurrency,
	formatNumber,
	formatProgressBar,
	formatTokens,
	ResponsiveTable,
} from '../table.ts';
import { renderEventsTable } from './events.ts';

const CLEAR_SCREEN = '\u001B[2J\u001B[H';
const PROGRESS_BAR_WIDTH = 40;

const TRIGGER_LABELS = {
	'usage-limit': 'after usage limit',
	'inactivity-gap': 'after inactivity',
	startup: 'from recent activity',
} as const;

export function renderLiveSnapshot(snapshot: LiveSnapshot, forceCompact = false): string {
	if (snapshot.status === 'unavailable') {
		const reason = snapshot.reason === 'expired'
			? 'The last session window has ended. Waiting for new activity...'
			: 'No activity in the last 5 hours. Waiting for a session to start...';
		return `${pc.bold('Session unavailable')}\n${pc.dim(reason)}\n${pc.dim(`Now ${snapshot.now}`)}`;
	}

	const windowSec = SESSION_WINDOW_HOURS * 3600;
	const remainingMs = toEpochMs(snapshot.end) - toEpochMs(snapshot.now);
	const remainingSec = Math.max(0, Math.floor(remainingMs / 1000));
	const progress = formatProgressBar(snapshot.durationSec / windowSec, PROGRESS_BAR_WIDTH);
	const elapsed = formatDuration(snapshot.durationSec);
	const lines = [
		`${pc.bold('Session')} ${pc.dim(`(${TRIGGER_LABELS[snapshot.trigger]})`)}`,
		`${snapshot.start} → ${snapshot.end}`,
		`${progress} elapsed ${elapsed}, remaining ${formatDuration(remainingSec)}`,
	];

	const table = new ResponsiveTable({
		head: ['Events', 'Input', 'Cached Input', 'Output', 'Reasoning', 'Total Tokens', 'Cost (USD)'],
		colAligns: ['right', 'right', 'right', 'right', 'right', 'right', 'right'],
		compactHead: ['Input', 'Output', 'Total Tokens', 'Cost (USD)'],
		compactColAligns: ['right', 'right', 'right', 'right'],
		forceCompact,
		style: { head: ['cyan'] },
	});
	table.push([
		formatNumber(snapshot.events),
		formatTokens(snapshot.inputTokens),
		formatTokens(snapshot.cachedInputTokens),
		formatTokens(snapshot.outputTokens),
		formatTokens(snapshot.reasoningOutputTokens),
		formatTokens(snapshot.totalTokens),
		formatCurrency(snapshot.costUSD),
	]);
	lines.push(table.toString());
	return lines.join('\n');
}

export function renderEventsSnapshot(snapshot: RollingEventsSnapshot, forceCompact = false): string {
	const lines = [`${pc.bold(`Events (last ${snapshot.hours}h)`)} ${pc.dim(`Now ${snapshot.now}`)}`];
	if (snapshot.totals.events === 0) {
		lines.push(pc.dim(`No usage since ${snapshot.since}. Waiting for new events...`));
		return lines.join('\n');
	}
	if (snapshot.omitted > 0) {
		const shown = snapshot.events.length;
		lines.push(pc.dim(`Showing the last ${shown} of ${snapshot.totals.events} events`));
	}
	lines.push(renderEventsTable(snapshot.events, snapshot.totals, forceCompact));
	return lines.join('\n');
}

type LiveView = {
	ingest: (records: Iterable<LogRecord>) => void;
	render: (now: Date) => string;
	toRecord: (now: Date) => LiveRecord | RollingEventsRecord;
};

function createSessionView(tracker: LiveSessionTracker, compact: boolean): LiveView {
	return {
		ingest: (records) => tracker.ingest(records),
		render: (now) => renderLiveSnapshot(tracker.snapshot(now), compact),
		toRecord: (now) => toLiveRecord(tracker.snapshot(now)),
	};
}

function createEventsView(rolling: RollingEventWindow, compact: boolean): LiveView {
	return {
		ingest: (records) => rolling.ingest(records),
		render: (now) => renderEventsSnapshot(rolling.snapshot(now), compact),
		toRecord: (now) => toRollingEventsRecord(rolling.snapshot(now)),
	};
}

export const liveCommand = define({
	name: 'live',
	description: 'Follow the log and show usage in the current 5-hour session window',
	toKebab: true,
	args: {
		...sharedArgs,
		interval: {
			type: 'number',
			short: 'i',
			description: 'Seconds between refreshes',
			default: DEFAULT_LIVE_INTERVAL_SECONDS,
		},
		once: {
			type: 'boolean',
			description: 'Print one snapshot and exit',
			default: false,
		},
		gapHours: {
			type: 'number',
			description: 'Hours of silence that start a new session window',
			default: SESSION_WINDOW_HOURS,
		},
		events: {
			type: 'boolean',
			short: 'e',
			description: 'Show the events of the last hours instead of the session window',
			default: false,
		},
		sinceHours: {
			type: 'number',
			description: 'Hours of events to show with --events',
			default: SESSION_WINDOW_HOURS,
		},
	},
	async run(ctx) {
		const jsonOutput = Boolean(ctx.values.json);
		if (jsonOutput) {
			logger.level = 0;
		}
		if (!(ctx.values.interval > 0)) {
			logger.error('--interval must be a positive number of seconds');
			process.exit(1);
		}
		if (!(ctx.values.sinceHours > 0)) {
			logger.error('--since-hours must be a positive number of hours');
			process.exit(1);
		}

		const pricing = await resolvePricingFromArgs(ctx.values);
		if (Result.isFailure(pricing)) {
			logger.error(pricing.error.message);
			process.exit(1);
		}

		const follower = new LogFollower(resolveLogPath(ctx.values.log));
		const { compact, gapHours, sinceHours } = ctx.values;
		let view: LiveView;
		if (ctx.values.events) {
			const rolling = new RollingEventWindow({ sinceHours, pricing: pricing.value });
			view = createEventsView(rolling, compact);
		} else {
			const tracker = new LiveSessionTracker({ gapHours, pricing: pricing.value });
			view = createSessionView(tracker, compact);
		}

		const read = async (): Promise<void> => {
			const polled = await follower.poll();
			if (Result.isFailure(polled)) {
				logger.warn(polled.error.message);
				return;
			}
			view.ingest(polled.value);
		};

		if (jsonOutput || ctx.values.once) {
			await read();
			if (follower.isMissing) {
				logger.warn(`Codex log not found: ${follower.filePath}`);
			}
			view.ingest(follower.finish());
			const now = new Date();
			if (jsonOutput) {
				log(JSON.stringify(view.toRecord(now), null, 2));
			} else {
				log(view.render(now));
			}
			return;
		}

		const controller = new AbortController();
		const stop = (): void => controller.abort();
		process.once('SIGINT', stop);
		try {
			while (!controller.signal.aborted) {
				await read();
				const frame = view.render(new Date());
				process.stdout.write(CLEAR_SCREEN);
				log(frame);
				if (follower.isMissing) {
					log(pc.yellow(`Waiting for ${follower.filePath}`));
				}
				log(pc.dim('Press Ctrl+C to stop'));

				try {
					await sleep(ctx.values.interval * 1000, undefined, { signal: controller.signal });
				} catch (error) {
					if (!controller.signal.aborted) {
						throw error;
					}
				}
			}
		} finally {
			process.off('SIGINT', stop);
		}
	},
});

if (import.meta.vitest != null) {
	describe('renderLiveSnapshot', () => {
		it('explains an unavailable window', () => {
			const output = renderLiveSnapshot({
				status: 'unavailable',
				reason: 'expired',
				now: '2025-08-25T13:00:00.000Z',
			});
			expect(output).toContain('The last session window has ended.');
			expect(output).toContain('Now 2025-08-25T13:00:00.000Z');
		});

		it('shows elapsed and remaining time with the window totals', () => {
			const output = renderLiveSnapshot(
				{
					status: 'available',
					start: '2025-08-25T08:00:00.000Z',
					end: '2025-08-25T13:00:00.000Z',
					now: '2025-08-25T10:30:00.000Z',
					durationSec: 9_000,
					trigger: 'startup',
					events: 3,
					inputTokens: 12_500,
					cachedInputTokens: 0,
					outputTokens: 800,
					reasoningOutputTokens: 0,
					totalTokens: 13_300,
				},
				true,
			);
			expect(output).toContain('2025-08-25T08:00:00.000Z → 2025-08-25T13:00:00.000Z');
			expect(output).toContain(`${'█'.repeat(20)}${'░'.repeat(20)} elapsed 2:30, remaining 2:30`);
			expect(output).toContain('12.5k');
			expect(output).toContain('13.3k');
		});
	});

	describe('renderEventsSnapshot', () => {
		const snapshot: RollingEventsSnapshot = {
			since: '2025-08-25T07:00:00.000Z',
			now: '2025-08-25T12:00:00.000Z',
			hours: 5,
			events: [
				{
					timestamp: '2025-08-25T11:00:00.000Z',
					model: 'gpt-5',
					input_tokens: 4_000,
					cached_input_tokens: 0,
					output_tokens: 0,
					reasoning_output_tokens: 0,
					total_tokens: 4_000,
				},
			],
			omitted: 1,
			totals: {
				events: 2,
				inputTokens: 6_000,
				cachedInputTokens: 0,
				outputTokens: 0,
				reasoningOutputTokens: 0,
				totalTokens: 6_000,
			},
		};

		it('lists the recent events and notes the rows left out', () => {
			const output = renderEventsSnapshot(snapshot, true);
			expect(output).toContain('Events (last 5h)');
			expect(output).toContain('Showing the last 1 of 2 events');
			expect(output).toContain('2025-08-25 11:00:00Z');
			expect(output).toContain('Total (2)');
		});

		it('waits when the window is empty', () => {
			const output = renderEventsSnapshot({
				...snapshot,
				events: [],
				omitted: 0,
				totals: { ...snapshot.totals, events: 0 },
			});
			expect(output).toContain('No usage since 2025-08-25T07:00:00.000Z. Waiting for new events...');
		});
	});
}
