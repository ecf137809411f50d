import type { Args } from 'gunshi';
import {
	DEFAULT_FALLBACK_MODEL,
	DEFAULT_PRICE_CACHE_TTL_HOURS,
	DEFAULT_PRICE_PROVIDER,
} from './_consts.ts';

export const sharedArgs = {
	json: {
		type: 'boolean',
		short: 'j',
		description: 'Output report as JSON',
		default: false,
	},
	log: {
		type: 'string',
		description: 'Path to codex-tui.log (default: $CODEX_HOME/log/codex-tui.log)',
	},
	prices: {
		type: 'string',
		short: 'p',
		description: 'JSON price table: flat rates or { default, models, aliases }',
	},
	autoPrices: {
		type: 'boolean',
		description: 'Fetch and cache provider prices from Helicone (disable with --no-auto-prices)',
		default: true,
		negatable: true,
	},
	offline: {
		type: 'boolean',
		short: 'O',
		description: 'Use cached provider prices only, never fetch',
		default: false,
	},
	refreshPrices: {
		type: 'boolean',
		description: 'Fetch provider prices even when the cache is fresh',
		default: false,
	},
	priceCacheTtlHours: {
		type: 'number',
		description: 'Hours before cached provider prices are fetched again',
		default: DEFAULT_PRICE_CACHE_TTL_HOURS,
	},
	priceProvider: {
		type: 'string',
		description: 'Provider whose prices are fetched',
		default: DEFAULT_PRICE_PROVIDER,
	},
	fallbackModel: {
		type: 'string',
		description: 'Model used to price events that carry no model name',
		default: DEFAULT_FALLBACK_MODEL,
	},
	'usd-per-1k-input': {
		type: 'number',
		description: 'Override the input rate (USD per 1K tokens)',
	},
	'usd-per-1k-cached-input': {
		type: 'number',
		description: 'Override the cached input rate (USD per 1K tokens)',
	},
	'usd-per-1k-output': {
		type: 'number',
		description: 'Override the output rate (USD per 1K tokens)',
	},
	'usd-per-1k-reasoning': {
		type: 'number',
		description: 'Override the reasoning rate (USD per 1K tokens)',
	},
	cachedPricing: {
		type: 'boolean',
		description: 'Bill cached input tokens at the cached rate instead of the input rate',
		default: false,
	},
	compact: {
		type: 'boolean',
		description: 'Force compact table layout for narrow terminals',
		default: false,
	},
	color: {
		// --color and FORCE_COLOR=1 is handled by picocolors
		type: 'boolean',
		description: 'Enable colored output (default: auto). FORCE_COLOR=1 has the same effect.',
	},
	noColor: {
		// --no-color and NO_COLOR=1 is handled by picocolors
		type: 'boolean',
		description: 'Disable colored output (default: auto). NO_COLOR=1 has the same effect.',
	},
} as const satisfies Args;

export const dateRangeArgs = {
	since: {
		type: 'string',
		short: 's',
		description: 'Filter from date (YYYY-MM-DD or YYYYMMDD)',
	},
	until: {
		type: 'string',
		short: 'u',
		description: 'Filter until date (inclusive)',
	},
} as const satisfies Args;
