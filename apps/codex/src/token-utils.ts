import type { BillingMode, PricingOptions, Rates, TokenUsageDelta } from './_types.ts';
import { THOUSAND } from './_consts.ts';
import { resolveRates } from './price-table.ts';

export function createEmptyUsage(): TokenUsageDelta {
	return {
		inputTokens: 0,
		cachedInputTokens: 0,
		outputTokens: 0,
		reasoningOutputTokens: 0,
		totalTokens: 0,
	};
}

export function addUsage(target: TokenUsageDelta, delta: TokenUsageDelta): void {
	target.inputTokens += delta.inputTokens;
	target.cachedInputTokens += delta.cachedInputTokens;
	target.outputTokens += delta.outputTokens;
	target.reasoningOutputTokens += delta.reasoningOutputTokens;
	target.totalTokens += delta.totalTokens;
}

/**
 * Input-only billing charges every input token at the input rate and ignores
 * cached tokens. Cached billing splits input into a non-cached part (clamped
 * at zero) and a cached part charged at the cached rate. Reasoning tokens are
 * charged on top of output in both modes.
 */
export function calculateCostUSD(usage: TokenUsageDelta, rates: Rates, mode: BillingMode): number {
	let cost = 0;
	if (mode === 'cached') {
		const billableInput = Math.max(usage.inputTokens - usage.cachedInputTokens, 0);
		cost += (billableInput / THOUSAND) * rates.input;
		cost += (usage.cachedInputTokens / THOUSAND) * rates.cachedInput;
	} else {
		cost += (usage.inputTokens / THOUSAND) * rates.input;
	}
	cost += (usage.outputTokens / THOUSAND) * rates.output;
	cost += (usage.reasoningOutputTokens / THOUSAND) * rates.reasoning;
	return cost;
}

/**
 * Returns undefined when no rates resolve for the model (or the fallback
 * model when the usage carries none).
 */
export function costForUsage(
	usage: TokenUsageDelta,
	model: string | undefined,
	pricing: PricingOptions,
): number | undefined {
	const modelName = model?.trim();
	const effectiveModel = modelName == null || modelName === '' ? pricing.fallbackModel : modelName;
	const rates = resolveRates(pricing.priceTable, effectiveModel);
	if (rates == null) {
		return undefined;
	}
	return calculateCostUSD(usage, rates, pricing.billingMode);
}

export type CostTally = {
	usd: number;
	unpriced: number;
	priced: boolean;
};

export function createCostTally(priced: boolean): CostTally {
	return { usd: 0, unpriced: 0, priced };
}

export function addCost(tally: CostTally, cost: number | undefined): void {
	if (cost == null) {
		tally.unpriced += 1;
		return;
	}
	tally.usd += cost;
}

export function settleCost(tally: CostTally): number | undefined {
	if (!tally.priced || tally.unpriced > 0) {
		return undefined;
	}
	return tally.usd;
}

if (import.meta.vitest != null) {
	const usage = {
		inputTokens: 1_230_000,
		cachedInputTokens: 450_000,
		outputTokens: 210_000,
		reasoningOutputTokens: 0,
		totalTokens: 1_440_000,
	};
	const rates = { input: 0.005, cachedInput: 0.001, output: 0.015, reasoning: 0.015 };

	describe('calculateCostUSD', () => {
		it('ignores cached tokens in input-only mode', () => {
			// 1230 * 0.005 + 210 * 0.015 = 6.15 + 3.15
			expect(calculateCostUSD(usage, rates, 'input-only')).toBeCloseTo(9.3, 10);
		});

		it('bills cached tokens at the cached rate in cached mode', () => {
			// 780 * 0.005 + 450 * 0.001 + 210 * 0.015 = 3.90 + 0.45 + 3.15
			expect(calculateCostUSD(usage, rates, 'cached')).toBeCloseTo(7.5, 10);
		});

		it('charges reasoning tokens on top of output', () => {
			const withReasoning = { ...usage, reasoningOutputTokens: 100_000 };
			expect(calculateCostUSD(withReasoning, rates, 'input-only')).toBeCloseTo(10.8, 10);
		});

		it('clamps the non-cached input at zero when cached exceeds input', () => {
			const broken = {
				inputTokens: 1_000,
				cachedInputTokens: 3_000,
				outputTokens: 0,
				reasoningOutputTokens: 0,
				totalTokens: 1_000,
			};
			expect(calculateCostUSD(broken, rates, 'cached')).toBeCloseTo(0.003, 10);
		});
	});

	describe('costForUsage', () => {
		const priceTable = {
			default: { input: 0.001, output: 0.002 },
			models: new Map([['gpt-5', { input: 0.005, output: 0.015 }]]),
			aliases: new Map([['gpt-5-latest', 'gpt-5']]),
		};
		const small = {
			inputTokens: 2_000,
			cachedInputTokens: 0,
			outputTokens: 1_000,
			reasoningOutputTokens: 0,
			totalTokens: 3_000,
		};

		it('prices events without a model through the fallback model', () => {
			const cost = costForUsage(small, undefined, {
				priceTable,
				billingMode: 'input-only',
				fallbackModel: 'gpt-5-latest',
			});
			expect(cost).toBeCloseTo(0.025, 10);
		});

		it('returns undefined when neither the model nor a default resolves', () => {
			const cost = costForUsage(small, 'o3', {
				priceTable: { models: new Map(), aliases: new Map() },
				billingMode: 'input-only',
			});
			expect(cost).toBeUndefined();
		});
	});

	describe('CostTally', () => {
		it('keeps a known zero cost distinct from an unknown cost', () => {
			const known = createCostTally(true);
			addCost(known, 0);
			expect(settleCost(known)).toBe(0);

			const unknown = createCostTally(true);
			addCost(unknown, 1.5);
			addCost(unknown, undefined);
			expect(settleCost(unknown)).toBeUndefined();

			expect(settleCost(createCostTally(false))).toBeUndefined();
		});
	});
}
