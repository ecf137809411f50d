import type { PartialRates, PriceTable, PriceTableSource, Rates } from './_types.ts';
import { Result } from '@praha/byethrow';
import { z } from 'zod';
import { THOUSAND } from './_consts.ts';

type RateField = keyof Rates;

const RATE_FIELDS = ['input', 'cachedInput', 'output', 'reasoning'] as const satisfies readonly RateField[];

const PER_THOUSAND_KEYS: Record<RateField, readonly string[]> = {
	input: [
		'input',
		'input_per_1k',
		'input_per_1k_tokens',
		'input_cost_per_1k_tokens',
		'input_1k',
		'prompt',
		'prompt_per_1k',
		'prompt_cost_per_1k_tokens',
		'prompt_input_cost_per_1k_tokens',
	],
	cachedInput: [
		'cached_input',
		'cached_input_per_1k',
		'cached_input_cost_per_1k_tokens',
		'cache',
	],
	output: [
		'output',
		'output_per_1k',
		'output_cost_per_1k_tokens',
		'completion',
		'completion_per_1k',
		'completion_cost_per_1k_tokens',
		'prompt_output_cost_per_1k_tokens',
	],
	reasoning: ['reasoning', 'reasoning_per_1k', 'reasoning_cost_per_1k_tokens'],
};

const PER_MILLION_KEYS: Record<RateField, readonly string[]> = {
	input: [
		'input_per_1m',
		'input_cost_per_1m',
		'input_per_million',
		'input_cost_per_million_tokens',
		'prompt_per_1m',
		'prompt_input_cost_per_1m',
	],
	cachedInput: [
		'cached_input_per_1m',
		'cache_read_per_1m',
		'prompt_cache_read_per_1m',
		'prompt_cache_read_per_million',
	],
	output: [
		'output_per_1m',
		'output_cost_per_1m',
		'output_per_million',
		'output_cost_per_million_tokens',
		'completion_per_1m',
		'completion_cost_per_1m',
	],
	reasoning: [
		'reasoning_per_1m',
		'reasoning_cost_per_1m',
		'reasoning_per_million',
		'reasoning_cost_per_million_tokens',
	],
};

const STRUCTURE_KEYS = new Set(['default', 'models', 'aliases']);

const rateRecordSchema = z.record(z.unknown());

const structuredSourceSchema = z.object({
	default: rateRecordSchema.optional(),
	models: z.record(rateRecordSchema).optional(),
	aliases: z.record(z.string()).optional(),
});

function readRate(record: Record<string, unknown>, keys: readonly string[]): number | undefined {
	for (const key of keys) {
		const value = record[key];
		if (typeof value === 'number' && Number.isFinite(value) && value >= 0) {
			return value;
		}
	}
	return undefined;
}

/**
 * Reads the four rates from a raw price record. Per-1k keys win; a rate only
 * present under a per-1M key is divided by 1000.
 */
export function normalizeRates(record: Record<string, unknown>): PartialRates {
	const rates: PartialRates = {};
	for (const field of RATE_FIELDS) {
		const perThousand = readRate(record, PER_THOUSAND_KEYS[field]);
		if (perThousand != null) {
			rates[field] = perThousand;
			continue;
		}
		const perMillion = readRate(record, PER_MILLION_KEYS[field]);
		if (perMillion != null) {
			rates[field] = perMillion / THOUSAND;
		}
	}
	return rates;
}

export function hasAnyRate(rates: PartialRates): boolean {
	return RATE_FIELDS.some((field) => rates[field] != null);
}

/**
 * Accepts either a flat rates object (applied as `default`) or
 * `{ default, models, aliases }`.
 */
export function parsePriceTableSource(raw: unknown): Result.Result<PriceTableSource, Error> {
	const record = rateRecordSchema.safeParse(raw);
	if (!record.success) {
		return Result.fail(new Error('Price data must be a JSON object'));
	}

	const isStructured = Object.keys(record.data).some((key) => STRUCTURE_KEYS.has(key));
	if (!isStructured) {
		const flat = normalizeRates(record.data);
		return Result.succeed(hasAnyRate(flat) ? { default: flat } : {});
	}

	const structured = structuredSourceSchema.safeParse(raw);
	if (!structured.success) {
		const issue = structured.error.issues[0];
		const where = issue == null ? '' : ` at ${issue.path.join('.')}`;
		return Result.fail(new Error(`Invalid price table${where}: ${issue?.message ?? 'unknown error'}`));
	}

	const source: PriceTableSource = {};
	if (structured.data.default != null) {
		source.default = normalizeRates(structured.data.default);
	}
	if (structured.data.models != null) {
		source.models = Object.fromEntries(
			Object.entries(structured.data.models).map(([name, rates]) => [name, normalizeRates(rates)]),
		);
	}
	if (structured.data.aliases != null) {
		source.aliases = { ...structured.data.aliases };
	}
	return Result.succeed(source);
}

export function createPriceTable(): PriceTable {
	return { models: new Map(), aliases: new Map() };
}

function mergeRates(base: Readonly<PartialRates> | undefined, override: PartialRates): PartialRates {
	const merged: PartialRates = { ...base };
	for (const field of RATE_FIELDS) {
		const value = override[field];
		if (value != null) {
			merged[field] = value;
		}
	}
	return merged;
}

/**
 * Layers a source over a table field by field: a source that only sets
 * `output` for a model keeps the model's other rates.
 */
export function mergePriceTable(table: PriceTable, source: PriceTableSource): PriceTable {
	const models = new Map(table.models);
	for (const [name, rates] of Object.entries(source.models ?? {})) {
		models.set(name, mergeRates(models.get(name), rates));
	}

	const aliases = new Map(table.aliases);
	for (const [alias, canonical] of Object.entries(source.aliases ?? {})) {
		aliases.set(alias, canonical);
	}

	const defaultRates =
		source.default == null ? table.default : mergeRates(table.default, source.default);

	return defaultRates == null ? { models, aliases } : { default: defaultRates, models, aliases };
}

/**
 * Explicit per-rate overrides apply to the default and to every model record.
 */
export function applyRateOverrides(table: PriceTable, overrides: PartialRates): PriceTable {
	if (!hasAnyRate(overrides)) {
		return table;
	}
	const models = new Map<string, PartialRates>();
	for (const [name, rates] of table.models) {
		models.set(name, mergeRates(rates, overrides));
	}
	return {
		default: mergeRates(table.default, overrides),
		models,
		aliases: new Map(table.aliases),
	};
}

export function isEmptyPriceTable(table: PriceTable): boolean {
	return table.default == null && table.models.size === 0;
}

function fillRates(rates: Readonly<PartialRates>, fallback?: Readonly<PartialRates>): Rates {
	return {
		input: rates.input ?? fallback?.input ?? 0,
		cachedInput: rates.cachedInput ?? fallback?.cachedInput ?? 0,
		output: rates.output ?? fallback?.output ?? 0,
		reasoning: rates.reasoning ?? fallback?.reasoning ?? 0,
	};
}

/**
 * Resolves aliases, then the model record with missing fields taken from the
 * default. Unknown models use the default; with no default the rates are
 * undefined.
 */
export function resolveRates(table: PriceTable, model?: string): Rates | undefined {
	const canonical = model == null ? undefined : (table.aliases.get(model) ?? model);
	const entry = canonical == null ? undefined : table.models.get(canonical);
	if (entry != null) {
		return fillRates(entry, table.default);
	}
	if (table.default == null) {
		return undefined;
	}
	return fillRates(table.default);
}

if (import.meta.vitest != null) {
	describe('normalizeRates', () => {
		it('converts per-million rates to per-thousand', () => {
			const rates = normalizeRates({ input_cost_per_1m: 5.0, output_cost_per_1m: 15 });
			expect(rates.input).toBeCloseTo(0.005, 12);
			expect(rates.output).toBeCloseTo(0.015, 12);
			expect(rates.cachedInput).toBeUndefined();
		});

		it('prefers per-thousand keys over per-million keys', () => {
			const rates = normalizeRates({ input: 0.002, input_per_1m: 5, prompt_cache_read_per_1m: 0.5 });
			expect(rates.input).toBe(0.002);
			expect(rates.cachedInput).toBeCloseTo(0.0005, 12);
		});

		it('ignores negative and non-numeric values', () => {
			expect(normalizeRates({ input: -1, output: '0.01' })).toEqual({});
		});
	});

	describe('parsePriceTableSource', () => {
		it('treats a flat object as the default rates', () => {
			const result = parsePriceTableSource({ input: 0.005, output: 0.015 });
			expect(Result.isSuccess(result)).toBe(true);
			if (Result.isSuccess(result)) {
				expect(result.value).toEqual({ default: { input: 0.005, output: 0.015 } });
			}
		});

		it('reads structured tables with aliases', () => {
			const result = parsePriceTableSource({
				default: { input: 0.001 },
				models: { 'gpt-5': { input_cost_per_1m: 1.25, output_cost_per_1m: 10 } },
				aliases: { 'gpt-5-codex': 'gpt-5' },
			});
			expect(Result.isSuccess(result)).toBe(true);
			if (Result.isSuccess(result)) {
				expect(result.value.models?.['gpt-5']?.input).toBeCloseTo(0.00125, 12);
				expect(result.value.aliases).toEqual({ 'gpt-5-codex': 'gpt-5' });
			}
		});

		it('fails on non-object input and malformed sections', () => {
			expect(Result.isFailure(parsePriceTableSource([1, 2]))).toBe(true);
			expect(Result.isFailure(parsePriceTableSource({ models: 'gpt-5' }))).toBe(true);
		});
	});

	describe('mergePriceTable', () => {
		it('overrides rates field by field', () => {
			const base = mergePriceTable(createPriceTable(), {
				default: { input: 0.005, cachedInput: 0.001, output: 0.015, reasoning: 0.015 },
				models: { 'gpt-5': { input: 0.00125, output: 0.01 } },
			});
			const merged = mergePriceTable(base, {
				default: { output: 0.02 },
				models: { 'gpt-5': { output: 0.012 } },
			});
			expect(merged.default).toEqual({ input: 0.005, cachedInput: 0.001, output: 0.02, reasoning: 0.015 });
			expect(merged.models.get('gpt-5')).toEqual({ input: 0.00125, output: 0.012 });
			expect(base.default?.output).toBe(0.015);
		});
	});

	describe('applyRateOverrides', () => {
		it('changes only the named rate on every record', () => {
			const table = mergePriceTable(createPriceTable(), {
				default: { input: 0.005, output: 0.015 },
				models: { 'gpt-5': { input: 0.00125, output: 0.01, reasoning: 0.01 } },
			});
			const overridden = applyRateOverrides(table, { output: 0.03 });
			expect(overridden.default).toEqual({ input: 0.005, output: 0.03 });
			expect(overridden.models.get('gpt-5')).toEqual({ input: 0.00125, output: 0.03, reasoning: 0.01 });
		});

		it('creates a default record when the table is empty', () => {
			const overridden = applyRateOverrides(createPriceTable(), { input: 0.004 });
			expect(resolveRates(overridden, 'anything')).toEqual({
				input: 0.004,
				cachedInput: 0,
				output: 0,
				reasoning: 0,
			});
		});
	});

	describe('resolveRates', () => {
		const table = mergePriceTable(createPriceTable(), {
			default: { input: 0.005, cachedInput: 0.001, output: 0.015, reasoning: 0.015 },
			models: { 'gpt-5': { input: 0.00125, output: 0.01 } },
			aliases: { 'gpt-5-codex': 'gpt-5' },
		});

		it('fills missing model fields from the default', () => {
			expect(resolveRates(table, 'gpt-5-codex')).toEqual({
				input: 0.00125,
				cachedInput: 0.001,
				output: 0.01,
				reasoning: 0.015,
			});
		});

		it('falls back to the default for unknown models', () => {
			expect(resolveRates(table, 'o4-mini')?.input).toBe(0.005);
			expect(resolveRates(table)?.output).toBe(0.015);
		});

		it('treats missing fields as zero when there is no default', () => {
			const noDefault = mergePriceTable(createPriceTable(), { models: { 'gpt-5': { input: 0.001 } } });
			expect(resolveRates(noDefault, 'gpt-5')).toEqual({
				input: 0.001,
				cachedInput: 0,
				output: 0,
				reasoning: 0,
			});
			expect(resolveRates(noDefault, 'o3')).toBeUndefined();
		});
	});
}
