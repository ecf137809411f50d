import type { ModelUsage, PricingOptions, TokenUsageEvent } from './_types.ts';
import type { CostTally } from './token-utils.ts';
import {
	addCost,
	addUsage,
	costForUsage,
	createCostTally,
	createEmptyUsage,
	settleCost,
} from './token-utils.ts';

export const UNKNOWN_MODEL = '(unknown)';

type ModelAccumulator = {
	usage: ModelUsage;
	cost: CostTally;
};

/**
 * Per-model token and cost sums. Events without a model are kept under
 * `(unknown)` so the breakdown always adds up to the row it belongs to.
 */
export class ModelUsageBreakdown {
	private readonly models = new Map<string, ModelAccumulator>();

	constructor(private readonly pricing?: PricingOptions) {}

	add(event: TokenUsageEvent): void {
		const name = event.model?.trim();
		const key = name == null || name === '' ? UNKNOWN_MODEL : name;
		let accumulator = this.models.get(key);
		if (accumulator == null) {
			accumulator = {
				usage: { events: 0, ...createEmptyUsage() },
				cost: createCostTally(this.pricing != null),
			};
			this.models.set(key, accumulator);
		}
		addUsage(accumulator.usage, event);
		accumulator.usage.events += 1;
		if (this.pricing != null) {
			addCost(accumulator.cost, costForUsage(event, event.model, this.pricing));
		}
	}

	/** Named models, sorted, without the `(unknown)` bucket. */
	names(): string[] {
		return Array.from(this.models.keys())
			.filter((name) => name !== UNKNOWN_MODEL)
			.sort();
	}

	toRecord(): Record<string, ModelUsage> {
		const result: Record<string, ModelUsage> = {};
		for (const name of Array.from(this.models.keys()).sort()) {
			const accumulator = this.models.get(name);
			if (accumulator == null) {
				continue;
			}
			const costUSD = settleCost(accumulator.cost);
			result[name] = costUSD == null ? { ...accumulator.usage } : { ...accumulator.usage, costUSD };
		}
		return result;
	}
}

export type ModelUsageRecord = {
	events: number;
	input_tokens: number;
	cached_input_tokens: number;
	output_tokens: number;
	reasoning_output_tokens: number;
	total_tokens: number;
	cost_usd?: number;
};

export function toModelUsageRecords(
	byModel: Readonly<Record<string, ModelUsage>>,
): Record<string, ModelUsageRecord> {
	const result: Record<string, ModelUsageRecord> = {};
	for (const [name, usage] of Object.entries(byModel)) {
		result[name] = {
			events: usage.events,
			input_tokens: usage.inputTokens,
			cached_input_tokens: usage.cachedInputTokens,
			output_tokens: usage.outputTokens,
			reasoning_output_tokens: usage.reasoningOutputTokens,
			total_tokens: usage.totalTokens,
			...(usage.costUSD == null ? {} : { cost_usd: usage.costUSD }),
		};
	}
	return result;
}

if (import.meta.vitest != null) {
	const event = (input: number, model?: string): TokenUsageEvent => ({
		timestamp: '2025-09-11T10:00:00.000Z',
		inputTokens: input,
		cachedInputTokens: 0,
		outputTokens: 0,
		reasoningOutputTokens: 0,
		totalTokens: input,
		...(model == null ? {} : { model }),
	});

	describe('ModelUsageBreakdown', () => {
		it('sums tokens and cost per model and keeps unnamed events apart', () => {
			const breakdown = new ModelUsageBreakdown({
				priceTable: { models: new Map([['gpt-5', { input: 0.5 }]]), aliases: new Map() },
				billingMode: 'input-only',
			});
			breakdown.add(event(2_000, 'gpt-5'));
			breakdown.add(event(4_000, 'gpt-5'));
			breakdown.add(event(10));

			expect(breakdown.names()).toEqual(['gpt-5']);
			expect(breakdown.toRecord()).toEqual({
				'(unknown)': {
					events: 1,
					inputTokens: 10,
					cachedInputTokens: 0,
					outputTokens: 0,
					reasoningOutputTokens: 0,
					totalTokens: 10,
				},
				'gpt-5': {
					events: 2,
					inputTokens: 6_000,
					cachedInputTokens: 0,
					outputTokens: 0,
					reasoningOutputTokens: 0,
					totalTokens: 6_000,
					costUSD: 3,
				},
			});
		});

		it('converts to snake_case records', () => {
			const breakdown = new ModelUsageBreakdown();
			breakdown.add(event(5, 'o3'));
			expect(toModelUsageRecords(breakdown.toRecord())).toEqual({
				o3: {
					events: 1,
					input_tokens: 5,
					cached_input_tokens: 0,
					output_tokens: 0,
					reasoning_output_tokens: 0,
					total_tokens: 5,
				},
			});
		});
	});
}
