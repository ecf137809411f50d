import process from 'node:process';
import { Result } from '@praha/byethrow';
import { define } from 'gunshi';
import pc from 'picocolors';
import { DEFAULT_SESSION_GAP_MINUTES } from '../_consts.ts';
import { dateRangeArgs, sharedArgs } from '../_shared-args.ts';
import { loadUsageFromLog, resolvePricingFromArgs } from '../command-utils.ts';
import { formatDuration, normalizeFilterDate } from '../date-utils.ts';
import { log, logger } from '../logger.ts';
import { buildSessionReport, toSessionRecord } from '../session-report.ts';
import {
	addEmptySeparatorRow,
	formatCurrency,
	formatModelsList,
	formatNumber,
	pushBreakdownRows,
	ResponsiveTable,
} from '../table.ts';
import { addCost, addUsage, createCostTally, createEmptyUsage, settleCost } from '../token-utils.ts';

const TABLE_COLUMN_COUNT = 10;

function formatStamp(timestamp: string): string {
	return timestamp.slice(0, 16).replace('T', ' ');
}

export const sessionsCommand = define({
	name: 'sessions',
	description: 'Show usage split into sessions by periods of inactivity',
	toKebab: true,
	args: {
		...sharedArgs,
		...dateRangeArgs,
		gapMinutes: {
			type: 'number',
			short: 'g',
			description: 'Minutes of silence that end a session',
			default: DEFAULT_SESSION_GAP_MINUTES,
		},
		breakdown: {
			type: 'boolean',
			short: 'b',
			description: 'Show per-model token and cost breakdown',
			default: false,
		},
	},
	async run(ctx) {
		const jsonOutput = Boolean(ctx.values.json);
		if (jsonOutput) {
			logger.level = 0;
		}

		let since: string | undefined;
		let until: string | undefined;

		try {
			since = normalizeFilterDate(ctx.values.since);
			until = normalizeFilterDate(ctx.values.until);
		} catch (error) {
			logger.error(String(error));
			process.exit(1);
		}
		if (!(ctx.values.gapMinutes > 0)) {
			logger.error('--gap-minutes must be a positive number');
			process.exit(1);
		}

		const usage = await loadUsageFromLog(ctx.values.log);
		if (Result.isFailure(usage)) {
			logger.error(usage.error.message);
			process.exit(1);
		}

		const pricing = await resolvePricingFromArgs(ctx.values);
		if (Result.isFailure(pricing)) {
			logger.error(pricing.error.message);
			process.exit(1);
		}

		const rows = buildSessionReport(usage.value.events, {
			gapMinutes: ctx.values.gapMinutes,
			since,
			until,
			pricing: pricing.value,
		});

		if (jsonOutput) {
			const breakdown = ctx.values.breakdown;
			log(JSON.stringify(rows.map((row) => toSessionRecord(row, { breakdown })), null, 2));
			return;
		}

		if (rows.length === 0) {
			log('No Codex usage data found for provided filters.');
			return;
		}

		logger.box(`Codex Token Usage Report - Sessions (gap > ${ctx.values.gapMinutes} min, UTC)`);

		const table = new ResponsiveTable({
			head: [
				'Start',
				'End',
				'Duration',
				'Gap After',
				'Models',
				'Input',
				'Output',
				'Reasoning',
				'Total Tokens',
				'Cost (USD)',
			],
			colAligns: ['left', 'left', 'right', 'right', 'left', 'right', 'right', 'right', 'right', 'right'],
			compactHead: ['Start', 'Duration', 'Total Tokens', 'Cost (USD)'],
			compactColAligns: ['left', 'right', 'right', 'right'],
			compactThreshold: 100,
			forceCompact: ctx.values.compact,
			style: { head: ['cyan'] },
		});

		const totals = createEmptyUsage();
		const cost = createCostTally(pricing.value != null);
		for (const row of rows) {
			addUsage(totals, row);
			addCost(cost, row.costUSD);
			table.push([
				formatStamp(row.start),
				formatStamp(row.end),
				formatDuration(row.durationSec),
				row.gapToNextSec == null ? '-' : formatDuration(row.gapToNextSec),
				formatModelsList(row.models),
				formatNumber(row.inputTokens),
				formatNumber(row.outputTokens),
				formatNumber(row.reasoningOutputTokens),
				formatNumber(row.totalTokens),
				formatCurrency(row.costUSD),
			]);
			if (ctx.values.breakdown) {
				pushBreakdownRows(table, row.byModel, (label, model) => [
					label,
					'',
					'',
					'',
					'',
					formatNumber(model.inputTokens),
					formatNumber(model.outputTokens),
					formatNumber(model.reasoningOutputTokens),
					formatNumber(model.totalTokens),
					formatCurrency(model.costUSD),
				]);
			}
		}

		addEmptySeparatorRow(table, TABLE_COLUMN_COUNT);
		table.push([
			pc.yellow(`Total (${rows.length})`),
			'',
			'',
			'',
			'',
			pc.yellow(formatNumber(totals.inputTokens)),
			pc.yellow(formatNumber(totals.outputTokens)),
			pc.yellow(formatNumber(totals.reasoningOutputTokens)),
			pc.yellow(formatNumber(totals.totalTokens)),
			pc.yellow(formatCurrency(settleCost(cost))),
		]);

		log(table.toString());

		if (table.isCompactMode()) {
			logger.info('\nRunning in Compact Mode');
			logger.info('Expand terminal width to see gaps, models and token breakdown');
		}
	},
});
