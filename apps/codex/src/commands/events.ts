import type { EventRecord, EventTotals } from '../events-report.ts';
import process from 'node:process';
import { Result } from '@praha/byethrow';
import { define } from 'gunshi';
import pc from 'picocolors';
import { sharedArgs } from '../_shared-args.ts';
import { loadUsageFromLog, resolvePricingFromArgs } from '../command-utils.ts';
import { selectEvents, summarizeEvents, toEventRecord } from '../events-report.ts';
import { log, logger } from '../logger.ts';
import { addEmptySeparatorRow, formatCurrency, formatNumber, ResponsiveTable } from '../table.ts';

const TABLE_COLUMN_COUNT = 8;

function formatEventTime(timestamp: string): string {
	return timestamp.replace('T', ' ').replace(/\.\d+Z$/, 'Z');
}

export function renderEventsTable(
	records: readonly EventRecord[],
	totals: EventTotals,
	forceCompact = false,
): string {
	const table = new ResponsiveTable({
		head: ['Time', 'Model', 'Input', 'Cached Input', 'Output', 'Reasoning', 'Total Tokens', 'Cost (USD)'],
		colAligns: ['left', 'left', 'right', 'right', 'right', 'right', 'right', 'right'],
		compactHead: ['Time', 'Input', 'Output', 'Cost (USD)'],
		compactColAligns: ['left', 'right', 'right', 'right'],
		compactThreshold: 100,
		forceCompact,
		style: { head: ['cyan'] },
	});

	for (const record of records) {
		table.push([
			formatEventTime(record.timestamp),
			record.model ?? '-',
			formatNumber(record.input_tokens),
			formatNumber(record.cached_input_tokens),
			formatNumber(record.output_tokens),
			formatNumber(record.reasoning_output_tokens),
			formatNumber(record.total_tokens),
			formatCurrency(record.cost_usd),
		]);
	}

	addEmptySeparatorRow(table, TABLE_COLUMN_COUNT);
	table.push([
		pc.yellow(`Total (${totals.events})`),
		'',
		pc.yellow(formatNumber(totals.inputTokens)),
		pc.yellow(formatNumber(totals.cachedInputTokens)),
		pc.yellow(formatNumber(totals.outputTokens)),
		pc.yellow(formatNumber(totals.reasoningOutputTokens)),
		pc.yellow(formatNumber(totals.totalTokens)),
		pc.yellow(formatCurrency(totals.costUSD)),
	]);
	return table.toString();
}

export const eventsCommand = define({
	name: 'events',
	description: 'List individual token usage events',
	toKebab: true,
	args: {
		...sharedArgs,
		last: {
			type: 'number',
			short: 'n',
			description: 'Only show the last N events',
		},
		sinceHours: {
			type: 'number',
			description: 'Only show events from the last N hours',
		},
	},
	async run(ctx) {
		const jsonOutput = Boolean(ctx.values.json);
		if (jsonOutput) {
			logger.level = 0;
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

		const records = selectEvents(usage.value.events, {
			last: ctx.values.last,
			sinceHours: ctx.values.sinceHours,
		}).map((event) => toEventRecord(event, pricing.value));

		if (jsonOutput) {
			log(JSON.stringify(records, null, 2));
			return;
		}

		if (records.length === 0) {
			log('No Codex usage events found for provided filters.');
			return;
		}

		logger.box('Codex Token Usage Report - Events (UTC)');
		const totals = summarizeEvents(records, pricing.value != null);
		log(renderEventsTable(records, totals, ctx.values.compact));
	},
});

if (import.meta.vitest != null) {
	describe('renderEventsTable', () => {
		it('lists each event with a total row', () => {
			const record: EventRecord = {
				timestamp: '2025-09-11T09:00:00.000Z',
				model: 'gpt-5',
				input_tokens: 1_234,
				cached_input_tokens: 0,
				output_tokens: 56,
				reasoning_output_tokens: 0,
				total_tokens: 1_290,
				cost_usd: 0.5,
			};
			const output = renderEventsTable([record], summarizeEvents([record], true), true);
			expect(output).toContain('2025-09-11 09:00:00Z');
			expect(output).toContain('Total (1)');
			expect(output).toContain('1,234');
			expect(output).toContain('$0.50');
		});
	});
}
