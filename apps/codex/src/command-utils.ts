import type { PartialRates, PricingOptions } from './_types.ts';
import type { UsageStream } from './log-parser.ts';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { Result } from '@praha/byethrow';
import { z } from 'zod';
import { loadLogRecords, resolveLogPath } from './data-loader.ts';
import { splitUsageStream } from './log-parser.ts';
import { isEmptyPriceTable } from './price-table.ts';
import { HeliconePricingSource, resolvePriceTable } from './pricing.ts';

export type PricingArgs = {
	prices?: string;
	autoPrices?: boolean;
	offline?: boolean;
	refreshPrices?: boolean;
	priceCacheTtlHours?: number;
	priceProvider?: string;
	fallbackModel?: string;
	cachedPricing?: boolean;
	'usd-per-1k-input'?: number;
	'usd-per-1k-cached-input'?: number;
	'usd-per-1k-output'?: number;
	'usd-per-1k-reasoning'?: number;
};

const rateFlagSchema = z.number().finite().nonnegative().optional();
const rateOverridesSchema = z.object({
	input: rateFlagSchema,
	cachedInput: rateFlagSchema,
	output: rateFlagSchema,
	reasoning: rateFlagSchema,
});

const RATE_KEYS = ['input', 'cachedInput', 'output', 'reasoning'] as const;

export function rateOverridesFromArgs(args: PricingArgs): Result.Result<PartialRates, Error> {
	const parsed = rateOverridesSchema.safeParse({
		input: args['usd-per-1k-input'],
		cachedInput: args['usd-per-1k-cached-input'],
		output: args['usd-per-1k-output'],
		reasoning: args['usd-per-1k-reasoning'],
	});
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		const field = issue?.path.join('.') ?? '';
		return Result.fail(new Error(`Invalid rate override ${field}: ${issue?.message ?? 'invalid value'}`));
	}

	const overrides: PartialRates = {};
	for (const key of RATE_KEYS) {
		const value = parsed.data[key];
		if (value != null) {
			overrides[key] = value;
		}
	}
	return Result.succeed(overrides);
}

export type ResolvePricingOptions = {
	/** Replaces the provider source built from the arguments. */
	pricingSource?: HeliconePricingSource;
};

/**
 * Resolves pricing for a report. `undefined` means no rates are known, so
 * reports leave cost out entirely.
 */
export async function resolvePricingFromArgs(
	args: PricingArgs,
	options: ResolvePricingOptions = {},
): Promise<Result.Result<PricingOptions | undefined, Error>> {
	const overrides = rateOverridesFromArgs(args);
	if (Result.isFailure(overrides)) {
		return overrides;
	}

	let remote: HeliconePricingSource | undefined;
	if (args.autoPrices !== false) {
		remote = options.pricingSource ?? new HeliconePricingSource({
			provider: args.priceProvider,
			ttlHours: args.priceCacheTtlHours,
			refresh: args.refreshPrices,
			offline: args.offline,
		});
	}

	const table = await resolvePriceTable({
		remote,
		pricesFile: args.prices,
		overrides: overrides.value,
	});
	if (Result.isFailure(table)) {
		return table;
	}
	if (isEmptyPriceTable(table.value)) {
		return Result.succeed(undefined);
	}

	const fallbackModel = args.fallbackModel?.trim();
	return Result.succeed({
		priceTable: table.value,
		billingMode: args.cachedPricing === true ? 'cached' : 'input-only',
		...(fallbackModel == null || fallbackModel === '' ? {} : { fallbackModel }),
	});
}

export type LoadedUsage = UsageStream & {
	logPath: string;
	missingLogFile: boolean;
};

export async function loadUsageFromLog(explicitPath?: string): Promise<Result.Result<LoadedUsage, Error>> {
	const logPath = resolveLogPath(explicitPath);
	const loaded = await loadLogRecords(logPath);
	if (Result.isFailure(loaded)) {
		return loaded;
	}
	return Result.succeed({
		...splitUsageStream(loaded.value.records),
		logPath,
		missingLogFile: loaded.value.missingLogFile,
	});
}

if (import.meta.vitest != null) {
	describe('rateOverridesFromArgs', () => {
		it('keeps only the rates given on the command line', () => {
			const overrides = rateOverridesFromArgs({
				'usd-per-1k-output': 0.01,
				'usd-per-1k-cached-input': 0,
			});
			const value = Result.isSuccess(overrides) ? overrides.value : undefined;
			expect(value).toEqual({ cachedInput: 0, output: 0.01 });
		});

		it('rejects negative rates', () => {
			const overrides = rateOverridesFromArgs({ 'usd-per-1k-input': -1 });
			expect(Result.isFailure(overrides)).toBe(true);
		});
	});

	describe('resolvePricingFromArgs', () => {
		it('returns no pricing when nothing supplies a rate', async () => {
			const pricing = await resolvePricingFromArgs({ autoPrices: false });
			expect(Result.isSuccess(pricing) ? pricing.value : 'failed').toBeUndefined();
		});

		it('layers flag overrides over the prices file', async () => {
			const dir = await mkdtemp(path.join(os.tmpdir(), 'codex-args-'));
			try {
				const pricesFile = path.join(dir, 'prices.json');
				const prices = { models: { 'gpt-5': { input: 0.001, output: 0.01 } } };
				await writeFile(pricesFile, JSON.stringify(prices));
				const pricing = await resolvePricingFromArgs({
					autoPrices: false,
					prices: pricesFile,
					cachedPricing: true,
					fallbackModel: 'gpt-5',
					'usd-per-1k-output': 0.02,
				});
				const value = Result.isSuccess(pricing) ? pricing.value : undefined;
				expect(value?.billingMode).toBe('cached');
				expect(value?.fallbackModel).toBe('gpt-5');
				expect(value?.priceTable.models.get('gpt-5')).toEqual({ input: 0.001, output: 0.02 });
			} finally {
				await rm(dir, { recursive: true, force: true });
			}
		});

		it('fails when the prices file cannot be read', async () => {
			const pricing = await resolvePricingFromArgs({
				autoPrices: false,
				prices: path.join(os.tmpdir(), 'codex-missing-prices.json'),
			});
			expect(Result.isFailure(pricing)).toBe(true);
		});
	});

	describe('loadUsageFromLog', () => {
		it('splits the log into events and session inputs', async () => {
			const dir = await mkdtemp(path.join(os.tmpdir(), 'codex-load-'));
			try {
				const logPath = path.join(dir, 'codex-tui.log');
				await writeFile(
					logPath,
					[
						'2025-09-11T10:00:00.000Z INFO handle_codex_event: TaskStarted',
						'2025-09-11T10:00:05.000Z INFO handle_codex_event: TokenCount(TokenUsage { ' +
						'input_tokens: 10, cached_input_tokens: None, output_tokens: 2, ' +
						'reasoning_output_tokens: None, total_tokens: 12 })',
						'',
					].join('\n'),
				);
				const loaded = await loadUsageFromLog(logPath);
				const value = Result.isSuccess(loaded) ? loaded.value : undefined;
				expect(value?.missingLogFile).toBe(false);
				expect(value?.events.map((event) => event.totalTokens)).toEqual([12]);
				expect(value?.inputs.map((input) => input.kind)).toEqual(['task-started', 'token-count']);
			} finally {
				await rm(dir, { recursive: true, force: true });
			}
		});
	});
}
