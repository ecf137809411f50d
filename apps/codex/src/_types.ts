export type TokenUsageDelta = {
	inputTokens: number;
	cachedInputTokens: number;
	outputTokens: number;
	reasoningOutputTokens: number;
	totalTokens: number;
};

export type TokenUsageEvent = TokenUsageDelta & {
	timestamp: string;
	model?: string;
};

export type ActivityKind = 'token-count' | 'task-started' | 'exec-command-begin';

export type ActivitySignal = {
	kind: ActivityKind;
	timestamp: string;
};

export type UsageLimitSignal = {
	kind: 'usage-limit';
	timestamp: string;
};

export type SessionInput = ActivitySignal | UsageLimitSignal;

export type LogRecord =
	| ({ kind: 'token-count' } & TokenUsageEvent)
	| { kind: 'task-started'; timestamp: string }
	| { kind: 'exec-command-begin'; timestamp: string }
	| { kind: 'usage-limit'; timestamp: string }
	| { kind: 'session-configured'; timestamp: string; model: string };

/**
 * USD per 1000 tokens.
 */
export type Rates = {
	input: number;
	cachedInput: number;
	output: number;
	reasoning: number;
};

export type PartialRates = Partial<Rates>;

export type PriceTable = {
	readonly default?: Readonly<PartialRates>;
	readonly models: ReadonlyMap<string, Readonly<PartialRates>>;
	readonly aliases: ReadonlyMap<string, string>;
};

export type PriceTableSource = {
	default?: PartialRates;
	models?: Record<string, PartialRates>;
	aliases?: Record<string, string>;
};

export type BillingMode = 'input-only' | 'cached';

export type PricingOptions = {
	priceTable: PriceTable;
	billingMode: BillingMode;
	fallbackModel?: string;
};

export type SessionTriggerType = 'usage-limit' | 'inactivity-gap' | 'startup';

export type SessionTrigger =
	| { type: 'usage-limit'; start: string; limitObservedAt: string }
	| { type: 'inactivity-gap'; start: string; previousActivity: string }
	| { type: 'startup'; start: string }
	| { type: 'none' };

export type SessionWindow = {
	start: string;
	end: string;
	trigger: SessionTriggerType;
};

export type SessionLatch = {
	window?: SessionWindow;
	lastActivity?: string;
	pendingUsageLimit?: string;
	startupArmed: boolean;
};

export type SessionState =
	| { status: 'unset' }
	| { status: 'active' | 'expired'; start: string; end: string };

export type ModelUsage = TokenUsageDelta & {
	events: number;
	costUSD?: number;
};

export type DailyBucket = TokenUsageDelta & {
	date: string;
	events: number;
};

export type DailyReportRow = TokenUsageDelta & {
	date: string;
	events: number;
	costUSD?: number;
	models: string[];
	byModel: Record<string, ModelUsage>;
};

export type DailyTotals = TokenUsageDelta & {
	events: number;
	costUSD?: number;
};

export type SessionReportRow = TokenUsageDelta & {
	start: string;
	end: string;
	durationSec: number;
	gapToNextSec?: number;
	events: number;
	costUSD?: number;
	models: string[];
	byModel: Record<string, ModelUsage>;
};

export type LiveSnapshot =
	| (TokenUsageDelta & {
			status: 'available';
			start: string;
			end: string;
			now: string;
			durationSec: number;
			events: number;
			trigger: SessionTriggerType;
			costUSD?: number;
	  })
	| {
			status: 'unavailable';
			reason: 'unset' | 'expired';
			now: string;
	  };
