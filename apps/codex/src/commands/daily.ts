import process from 'node:process';
import { Result } from '@praha/byethrow';
import { define } from 'gunshi';
import pc from 'picocolors';
import { DEFAULT_REPORT_DAYS } from '../_consts.ts';
import { dateRangeArgs, sharedArgs } from '../_shared-args.ts';
import { loadUsageFromLog, resolvePricingFromArgs } from '../command-utils.ts';
import { buildDailyReport, summarizeDailyRows, toDailyRecord } from '../daily-report.ts';
import { dateKeyDaysBefore, normalizeFilterDate, toDateKey } from '../date-utils.ts';
import { log, logger } from '../logger.ts';
import {
	addEmptySeparatorRow,
	formatCurrency,
	formatModelsList,
	formatNumber,
	pushBreakdownRows,
	ResponsiveTable,
} from '../table.ts';

const TABLE_COLUMN_COUNT = 9;

export const dailyCommand = define({
	name: 'daily',
	description: 'Show token usage grouped by UTC day',
	toKebab: true,
	args: {
		...sharedArgs,
		...dateRangeArgs,
		days: {
			type: 'number',
			short: 'd',
			description: 'Days to report when --since is not given',
			default: DEFAULT_REPORT_DAYS,
		},
		last: {
			type: 'number',
			description: 'Only count the last N usage events',
		},
		fill: {
			type: 'boolean',
			description: 'Show days without usage as zero rows (disable with --no-fill)',
			default: true,
			negatable: true,
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

		const now = new Date();
		let since: string | undefined;
		let until: string | undefined;

		try {
			since = normalizeFilterDate(ctx.values.since) ?? dateKeyDaysBefore(now, ctx.values.days);
			until = normalizeFilterDate(ctx.values.until);
		} catch (error) {
			logger.error(String(error));
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

		const rows = buildDailyReport(usage.value.events, {
			since,
			until,
			last: ctx.values.last,
			fillGaps: ctx.values.fill,
			today: toDateKey(now.toISOString()),
			pricing: pricing.value,
		});

		if (jsonOutput) {
			const breakdown = ctx.values.breakdown;
			log(JSON.stringify(rows.map((row) => toDailyRecord(row, { breakdown })), null, 2));
			return;
		}

		if (rows.length === 0) {
			log('No Codex usage data found for provided filters.');
			return;
		}

		const firstDate = rows[0]?.date ?? since;
		const lastDate = rows.at(-1)?.date ?? '';
		logger.box(`Codex Token Usage Report - Daily (UTC, ${firstDate} to ${lastDate})`);

		const table = new ResponsiveTable({
			head: [
				'Date',
				'Models',
				'Events',
				'Input',
				'Cached Input',
				'Output',
				'Reasoning',
				'Total Tokens',
				'Cost (USD)',
			],
			colAligns: ['left', 'left', 'right', 'right', 'right', 'right', 'right', 'right', 'right'],
			compactHead: ['Date', 'Input', 'Output', 'Total Tokens', 'Cost (USD)'],
			compactColAligns: ['left', 'right', 'right', 'right', 'right'],
			compactThreshold: 100,
			forceCompact: ctx.values.compact,
			style: { head: ['cyan'] },
		});

		for (const row of rows) {
			table.push([
				row.date,
				formatModelsList(row.models),
				formatNumber(row.events),
				formatNumber(row.inputTokens),
				formatNumber(row.cachedInputTokens),
				formatNumber(row.outputTokens),
				formatNumber(row.reasoningOutputTokens),
				formatNumber(row.totalTokens),
				formatCurrency(row.costUSD),
			]);
			if (ctx.values.breakdown) {
				pushBreakdownRows(table, row.byModel, (label, model) => [
					label,
					'',
					formatNumber(model.events),
					formatNumber(model.inputTokens),
					formatNumber(model.cachedInputTokens),
					formatNumber(model.outputTokens),
					formatNumber(model.reasoningOutputTokens),
					formatNumber(model.totalTokens),
					formatCurrency(model.costUSD),
				]);
			}
		}

		const totals = summarizeDailyRows(rows);
		addEmptySeparatorRow(table, TABLE_COLUMN_COUNT);
		table.push([
			pc.yellow('Total'),
			'',
			pc.yellow(formatNumber(totals.events)),
			pc.yellow(formatNumber(totals.inputTokens)),
			pc.yellow(formatNumber(totals.cachedInputTokens)),
			pc.yellow(formatNumber(totals.outputTokens)),
			pc.yellow(formatNumber(totals.reasoningOutputTokens)),
			pc.yellow(formatNumber(totals.totalTokens)),
			pc.yellow(formatCurrency(totals.costUSD)),
		]);

		log(table.toString());

		if (pricing.value == null) {
			logger.info('No prices available; pass --prices or --usd-per-1k-* to show costs');
		}
		if (table.isCompactMode()) {
			logger.info('\nRunning in Compact Mode');
			logger.info('Expand terminal width to see cached input, reasoning and models');
		}
	},
});
