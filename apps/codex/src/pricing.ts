import type { PartialRates, PriceTable, PriceTableSource } from './_types.ts';
import { mkdir, mkdtemp, readFile, rm, stat, utimes, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import process from 'node:process';
import { Result } from '@praha/byethrow';
import { z } from 'zod';
import {
	CACHE_DIR_NAME,
	DEFAULT_PRICE_CACHE_TTL_HOURS,
	DEFAULT_PRICE_PROVIDER,
	HELICONE_COSTS_URL,
	HOUR_MS,
	XDG_CACHE_HOME_ENV,
} from './_consts.ts';
import { logger } from './logger.ts';
import {
	applyRateOverrides,
	createPriceTable,
	hasAnyRate,
	mergePriceTable,
	normalizeRates,
	parsePriceTableSource,
} from './price-table.ts';

const FETCH_TIMEOUT_MS = 5_000;
const USER_AGENT = 'codex-log-usage';

export type PriceTableLoader = {
	load: () => Promise<Result.Result<PriceTableSource, Error>>;
};

const entrySchema = z.record(z.unknown());
const listSchema = z.array(z.unknown());
const objectSchema = z
	.object({
		models: z.record(z.unknown()).optional(),
		data: z.array(z.unknown()).optional(),
	})
	.passthrough();

function entryName(entry: Record<string, unknown>): string | undefined {
	for (const key of ['model', 'name', 'id']) {
		const value = entry[key];
		if (typeof value === 'string' && value.trim() !== '') {
			return value.trim();
		}
	}
	return undefined;
}

/**
 * Cached input falls back to the input rate and reasoning to the output rate,
 * matching how the provider bills models that do not list them separately.
 */
function providerRates(entry: Record<string, unknown>): PartialRates | undefined {
	const rates = normalizeRates(entry);
	if (!hasAnyRate(rates)) {
		return undefined;
	}
	return {
		...rates,
		cachedInput: rates.cachedInput ?? rates.input,
		reasoning: rates.reasoning ?? rates.output,
	};
}

function collectEntries(items: readonly unknown[], models: Record<string, PartialRates>): void {
	for (const item of items) {
		const entry = entrySchema.safeParse(item);
		if (!entry.success) {
			continue;
		}
		const name = entryName(entry.data);
		const rates = providerRates(entry.data);
		if (name != null && rates != null) {
			models[name] = rates;
		}
	}
}

/**
 * Normalizes a Helicone cost listing (`{ data: [...] }`, `{ models: {...} }`
 * or a bare list) into a price table source. Every model also gets a
 * `<name>-latest` alias unless that name is listed itself.
 */
export function normalizeHeliconePrices(raw: unknown): Result.Result<PriceTableSource, Error> {
	const models: Record<string, PartialRates> = {};
	let defaultRates: PartialRates | undefined;

	const list = listSchema.safeParse(raw);
	const object = objectSchema.safeParse(raw);
	if (list.success) {
		collectEntries(list.data, models);
	} else if (object.success) {
		for (const [name, info] of Object.entries(object.data.models ?? {})) {
			const entry = entrySchema.safeParse(info);
			const rates = entry.success ? providerRates(entry.data) : undefined;
			if (rates != null) {
				models[name] = rates;
			}
		}
		collectEntries(object.data.data ?? [], models);
		defaultRates = providerRates(object.data);
	} else {
		return Result.fail(new Error('Unrecognized price listing'));
	}

	const aliases: Record<string, string> = {};
	for (const name of Object.keys(models)) {
		const latest = `${name}-latest`;
		if (models[latest] == null) {
			aliases[latest] = name;
		}
	}

	if (Object.keys(models).length === 0 && defaultRates == null) {
		return Result.fail(new Error('Price listing contains no usable rates'));
	}
	return Result.succeed(defaultRates == null ? { models, aliases } : { default: defaultRates, models, aliases });
}

export function resolveCacheDir(): string {
	const xdgCacheHome = process.env[XDG_CACHE_HOME_ENV]?.trim();
	const base = xdgCacheHome == null || xdgCacheHome === '' ? path.join(os.homedir(), '.cache') : xdgCacheHome;
	return path.join(base, CACHE_DIR_NAME);
}

export type HeliconePricingSourceOptions = {
	provider?: string;
	cacheDir?: string;
	ttlHours?: number;
	/** Ignore a fresh cache and fetch again. */
	refresh?: boolean;
	/** Never touch the network; any cached listing is used regardless of age. */
	offline?: boolean;
	fetch?: typeof fetch;
	now?: () => Date;
};

type CachedListing = {
	raw: unknown;
	ageHours: number;
};

export class HeliconePricingSource implements PriceTableLoader {
	private readonly provider: string;
	private readonly cachePath: string;
	private readonly ttlHours: number;
	private readonly refresh: boolean;
	private readonly offline: boolean;
	private readonly fetchImpl: typeof fetch;
	private readonly now: () => Date;

	constructor(options: HeliconePricingSourceOptions = {}) {
		this.provider = options.provider ?? DEFAULT_PRICE_PROVIDER;
		this.cachePath = path.join(
			options.cacheDir ?? resolveCacheDir(),
			`prices.helicone.${this.provider}.json`,
		);
		this.ttlHours = options.ttlHours ?? DEFAULT_PRICE_CACHE_TTL_HOURS;
		this.refresh = options.refresh ?? false;
		this.offline = options.offline ?? false;
		this.fetchImpl = options.fetch ?? fetch;
		this.now = options.now ?? (() => new Date());
	}

	get cacheFile(): string {
		return this.cachePath;
	}

	private async readCache(): Promise<CachedListing | undefined> {
		try {
			const info = await stat(this.cachePath);
			const raw: unknown = JSON.parse(await readFile(this.cachePath, 'utf8'));
			return { raw, ageHours: (this.now().getTime() - info.mtimeMs) / HOUR_MS };
		} catch (error) {
			logger.debug(`No usable price cache at ${this.cachePath}`, error);
			return undefined;
		}
	}

	private async writeCache(raw: unknown): Promise<void> {
		try {
			await mkdir(path.dirname(this.cachePath), { recursive: true });
			await writeFile(this.cachePath, JSON.stringify(raw));
		} catch (error) {
			logger.warn(`Failed to write price cache ${this.cachePath}`, error);
		}
	}

	private async fetchListing(): Promise<Result.Result<unknown, Error>> {
		const url = `${HELICONE_COSTS_URL}?provider=${encodeURIComponent(this.provider)}`;
		try {
			const response = await this.fetchImpl(url, {
				headers: { 'User-Agent': USER_AGENT },
				signal: AbortSignal.timeout(FETCH_TIMEOUT_MS),
			});
			if (!response.ok) {
				return Result.fail(new Error(`Price request failed with status ${response.status}`));
			}
			const raw: unknown = await response.json();
			return Result.succeed(raw);
		} catch (error) {
			return Result.fail(new Error('Failed to fetch prices', { cause: error }));
		}
	}

	async load(): Promise<Result.Result<PriceTableSource, Error>> {
		const cached = await this.readCache();
		if (cached != null && (this.offline || (!this.refresh && cached.ageHours <= this.ttlHours))) {
			return normalizeHeliconePrices(cached.raw);
		}
		if (this.offline) {
			return Result.fail(new Error(`No cached prices for provider ${this.provider} while offline`));
		}

		const fetched = await this.fetchListing();
		if (Result.isFailure(fetched)) {
			if (cached != null) {
				logger.warn(`${fetched.error.message}; using cached prices from ${this.cachePath}`);
				return normalizeHeliconePrices(cached.raw);
			}
			return fetched;
		}

		const normalized = normalizeHeliconePrices(fetched.value);
		if (Result.isSuccess(normalized)) {
			await this.writeCache(fetched.value);
		}
		return normalized;
	}
}

function expandHome(filePath: string): string {
	if (filePath === '~') {
		return os.homedir();
	}
	if (filePath.startsWith('~/')) {
		return path.join(os.homedir(), filePath.slice(2));
	}
	return filePath;
}

export async function loadPriceFile(filePath: string): Promise<Result.Result<PriceTableSource, Error>> {
	const resolved = path.resolve(expandHome(filePath));
	let raw: unknown;
	try {
		raw = JSON.parse(await readFile(resolved, 'utf8'));
	} catch (error) {
		return Result.fail(new Error(`Failed to read prices file ${resolved}`, { cause: error }));
	}
	const parsed = parsePriceTableSource(raw);
	if (Result.isFailure(parsed)) {
		return Result.fail(new Error(`${parsed.error.message} in ${resolved}`));
	}
	return parsed;
}

export type ResolvePriceTableOptions = {
	remote?: PriceTableLoader;
	pricesFile?: string;
	overrides?: PartialRates;
};

/**
 * Builds the price table from the remote listing, then the prices file, then
 * explicit rate flags, each layered over the previous one field by field. A
 * remote failure only warns; an unreadable prices file fails.
 */
export async function resolvePriceTable(
	options: ResolvePriceTableOptions,
): Promise<Result.Result<PriceTable, Error>> {
	let table = createPriceTable();

	if (options.remote != null) {
		const remote = await options.remote.load();
		if (Result.isFailure(remote)) {
			logger.warn(`Remote prices unavailable: ${remote.error.message}`);
		} else {
			table = mergePriceTable(table, remote.value);
		}
	}

	if (options.pricesFile != null) {
		const file = await loadPriceFile(options.pricesFile);
		if (Result.isFailure(file)) {
			return file;
		}
		table = mergePriceTable(table, file.value);
	}

	return Result.succeed(applyRateOverrides(table, options.overrides ?? {}));
}

if (import.meta.vitest != null) {
	const listing = {
		metadata: { total_models: 2 },
		data: [
			{
				provider: 'OPENAI',
				model: 'gpt-5',
				input_cost_per_1m: 1.25,
				output_cost_per_1m: 10,
				prompt_cache_read_per_1m: 0.125,
			},
			{ provider: 'OPENAI', model: 'gpt-4o-mini', input_cost_per_1m: 0.15, output_cost_per_1m: 0.6 },
			{ provider: 'OPENAI', model: 'no-rates' },
		],
	};
	const jsonResponse = (body: unknown): Response =>
		new Response(JSON.stringify(body), { status: 200, headers: { 'Content-Type': 'application/json' } });

	describe('normalizeHeliconePrices', () => {
		it('converts per-million listings and fills cached and reasoning rates', () => {
			const result = normalizeHeliconePrices(listing);
			expect(Result.isSuccess(result)).toBe(true);
			if (Result.isSuccess(result)) {
				const mini = result.value.models?.['gpt-4o-mini'];
				expect(mini?.input).toBeCloseTo(0.00015, 12);
				expect(mini?.cachedInput).toBeCloseTo(0.00015, 12);
				expect(mini?.reasoning).toBeCloseTo(0.0006, 12);
				expect(result.value.models?.['gpt-5']?.cachedInput).toBeCloseTo(0.000125, 12);
				expect(result.value.models).not.toHaveProperty('no-rates');
				expect(result.value.aliases).toEqual({
					'gpt-5-latest': 'gpt-5',
					'gpt-4o-mini-latest': 'gpt-4o-mini',
				});
				expect(result.value.default).toBeUndefined();
			}
		});

		it('rejects listings without usable rates', () => {
			expect(Result.isFailure(normalizeHeliconePrices({ data: [{ model: 'x' }] }))).toBe(true);
			expect(Result.isFailure(normalizeHeliconePrices('not a listing'))).toBe(true);
		});
	});

	describe('HeliconePricingSource', () => {
		let cacheDir: string;

		beforeEach(async () => {
			cacheDir = await mkdtemp(path.join(os.tmpdir(), 'codex-log-usage-prices-'));
		});

		afterEach(async () => {
			await rm(cacheDir, { recursive: true, force: true });
		});

		it('fetches once and reuses the cache within its TTL', async () => {
			const fetchStub = vi.fn(async () => jsonResponse(listing));
			const first = await new HeliconePricingSource({ cacheDir, fetch: fetchStub }).load();
			const second = await new HeliconePricingSource({ cacheDir, fetch: fetchStub }).load();

			expect(Result.isSuccess(first)).toBe(true);
			expect(Result.isSuccess(second)).toBe(true);
			expect(fetchStub).toHaveBeenCalledTimes(1);
		});

		it('fetches again when the cache is older than the TTL or a refresh is forced', async () => {
			const fetchStub = vi.fn(async () => jsonResponse(listing));
			const source = new HeliconePricingSource({ cacheDir, fetch: fetchStub, ttlHours: 24 });
			await source.load();

			const stale = new Date(Date.now() - 48 * HOUR_MS);
			await utimes(source.cacheFile, stale, stale);
			await new HeliconePricingSource({ cacheDir, fetch: fetchStub, ttlHours: 24 }).load();
			await new HeliconePricingSource({ cacheDir, fetch: fetchStub, refresh: true }).load();

			expect(fetchStub).toHaveBeenCalledTimes(3);
		});

		it('falls back to a stale cache when the request fails', async () => {
			const okFetch = vi.fn(async () => jsonResponse(listing));
			const source = new HeliconePricingSource({ cacheDir, fetch: okFetch });
			await source.load();
			const stale = new Date(Date.now() - 48 * HOUR_MS);
			await utimes(source.cacheFile, stale, stale);

			const failingFetch = vi.fn(async () => new Response('unavailable', { status: 503 }));
			const result = await new HeliconePricingSource({ cacheDir, fetch: failingFetch }).load();
			expect(failingFetch).toHaveBeenCalledTimes(1);
			expect(Result.isSuccess(result) ? Object.keys(result.value.models ?? {}) : []).toEqual([
				'gpt-5',
				'gpt-4o-mini',
			]);
		});

		it('fails offline without a cache and never fetches', async () => {
			const fetchStub = vi.fn(async () => jsonResponse(listing));
			const result = await new HeliconePricingSource({ cacheDir, fetch: fetchStub, offline: true }).load();
			expect(Result.isFailure(result)).toBe(true);
			expect(fetchStub).not.toHaveBeenCalled();
		});
	});

	describe('resolvePriceTable', () => {
		let dir: string;

		beforeEach(async () => {
			dir = await mkdtemp(path.join(os.tmpdir(), 'codex-log-usage-table-'));
		});

		afterEach(async () => {
			await rm(dir, { recursive: true, force: true });
		});

		it('layers the remote listing, the prices file and rate flags', async () => {
			const pricesFile = path.join(dir, 'prices.json');
			await writeFile(pricesFile, JSON.stringify({ models: { 'gpt-5': { input: 0.002 } } }));
			const remote: PriceTableLoader = {
				load: async () => normalizeHeliconePrices(listing),
			};

			const result = await resolvePriceTable({ remote, pricesFile, overrides: { output: 0.02 } });
			expect(Result.isSuccess(result)).toBe(true);
			if (Result.isSuccess(result)) {
				const gpt5 = result.value.models.get('gpt-5');
				expect(gpt5?.input).toBe(0.002);
				expect(gpt5?.output).toBe(0.02);
				expect(gpt5?.cachedInput).toBeCloseTo(0.000125, 12);
				expect(result.value.default).toEqual({ output: 0.02 });
			}
		});

		it('continues without remote prices and fails on an unreadable prices file', async () => {
			const remote: PriceTableLoader = {
				load: async () => Result.fail(new Error('offline')),
			};
			const withoutFile = await resolvePriceTable({ remote });
			expect(Result.isSuccess(withoutFile) ? withoutFile.value.models.size : -1).toBe(0);

			const missing = await resolvePriceTable({ pricesFile: path.join(dir, 'missing.json') });
			expect(Result.isFailure(missing)).toBe(true);
		});
	});
}
