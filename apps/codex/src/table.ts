import type { ModelUsage } from './_types.ts';
import process from 'node:process';
import Table from 'cli-table3';
import pc from 'picocolors';

export type ColumnAlignment = 'left' | 'center' | 'right';

export type ResponsiveTableOptions = {
	head: string[];
	colAligns?: ColumnAlignment[];
	/** Subset of `head` shown when the terminal is narrower than `compactThreshold`. */
	compactHead?: string[];
	compactColAligns?: ColumnAlignment[];
	compactThreshold?: number;
	forceCompact?: boolean;
	style?: { head?: string[] };
};

const DEFAULT_COMPACT_THRESHOLD = 100;
const DEFAULT_TERMINAL_WIDTH = 120;

function terminalWidth(): number {
	const fromEnv = Number.parseInt(process.env.COLUMNS ?? '', 10);
	if (Number.isFinite(fromEnv) && fromEnv > 0) {
		return fromEnv;
	}
	return process.stdout.columns ?? DEFAULT_TERMINAL_WIDTH;
}

/**
 * A cli-table3 table that drops to a narrower column set on small terminals.
 * Rows are always pushed with every column of `head`.
 */
export class ResponsiveTable {
	private readonly rows: string[][] = [];

	constructor(private readonly options: ResponsiveTableOptions) {}

	push(row: string[]): void {
		this.rows.push(row);
	}

	isCompactMode(): boolean {
		if (this.options.compactHead == null) {
			return false;
		}
		if (this.options.forceCompact === true) {
			return true;
		}
		return terminalWidth() < (this.options.compactThreshold ?? DEFAULT_COMPACT_THRESHOLD);
	}

	toString(): string {
		const compact = this.isCompactMode();
		const head = compact ? (this.options.compactHead ?? this.options.head) : this.options.head;
		const columns = head.map((name) => this.options.head.indexOf(name));
		const colAligns = compact ? this.options.compactColAligns : this.options.colAligns;

		const table = new Table({
			head,
			colAligns: colAligns ?? head.map((): ColumnAlignment => 'left'),
			style: { head: this.options.style?.head ?? ['cyan'] },
			wordWrap: true,
		});
		for (const row of this.rows) {
			table.push(columns.map((index) => (index < 0 ? '' : (row[index] ?? ''))));
		}
		return table.toString();
	}
}

export function addEmptySeparatorRow(table: ResponsiveTable, columnCount: number): void {
	table.push(Array.from({ length: columnCount }, () => ''));
}

/**
 * Pushes one dimmed row per model under the row it breaks down. `render`
 * lays the model's sums out in the table's full column order.
 */
export function pushBreakdownRows(
	table: ResponsiveTable,
	byModel: Readonly<Record<string, ModelUsage>>,
	render: (label: string, usage: ModelUsage) => string[],
): void {
	for (const [name, usage] of Object.entries(byModel)) {
		table.push(render(`  └─ ${name}`, usage).map((cell) => (cell === '' ? '' : pc.gray(cell))));
	}
}

export function formatNumber(value: number): string {
	return value.toLocaleString('en-US');
}

/**
 * Short token counts for the live view: `950`, `12.3k`, `4.5M`.
 */
export function formatTokens(value: number): string {
	if (value < 1_000) {
		return String(value);
	}
	if (value < 1_000_000) {
		return `${(value / 1_000).toFixed(1)}k`;
	}
	return `${(value / 1_000_000).toFixed(1)}M`;
}

export function formatCurrency(value: number | undefined): string {
	return value == null ? '—' : `$${value.toFixed(2)}`;
}

export function formatModelsList(models: readonly string[]): string {
	return models.length === 0 ? '-' : models.join('\n');
}

export function formatProgressBar(ratio: number, width: number): string {
	const clamped = Math.min(Math.max(ratio, 0), 1);
	const filled = Math.round(clamped * width);
	return `${'█'.repeat(filled)}${'░'.repeat(width - filled)}`;
}

if (import.meta.vitest != null) {
	const options: ResponsiveTableOptions = {
		head: ['Date', 'Input', 'Reasoning', 'Cost (USD)'],
		colAligns: ['left', 'right', 'right', 'right'],
		compactHead: ['Date', 'Cost (USD)'],
		compactColAligns: ['left', 'right'],
		style: { head: [] },
	};

	describe('ResponsiveTable', () => {
		it('renders every column in full mode', () => {
			const table = new ResponsiveTable({ ...options, compactThreshold: 0 });
			table.push(['2025-09-11', '1,000', '250', '$0.10']);
			const output = table.toString();
			expect(table.isCompactMode()).toBe(false);
			expect(output).toContain('Reasoning');
			expect(output).toContain('250');
		});

		it('keeps only the compact columns when forced', () => {
			const table = new ResponsiveTable({ ...options, forceCompact: true });
			table.push(['2025-09-11', '1,000', '250', '$0.10']);
			const output = table.toString();
			expect(table.isCompactMode()).toBe(true);
			expect(output).not.toContain('Reasoning');
			expect(output).toContain('$0.10');
		});
	});

	describe('pushBreakdownRows', () => {
		it('adds a row for each model below the parent row', () => {
			const table = new ResponsiveTable({ ...options, compactThreshold: 0 });
			table.push(['2025-09-11', '3,000', '0', '$1.50']);
			pushBreakdownRows(
				table,
				{
					'gpt-5': {
						events: 2,
						inputTokens: 2_000,
						cachedInputTokens: 0,
						outputTokens: 0,
						reasoningOutputTokens: 0,
						totalTokens: 2_000,
						costUSD: 1,
					},
					'o3': {
						events: 1,
						inputTokens: 1_000,
						cachedInputTokens: 0,
						outputTokens: 0,
						reasoningOutputTokens: 0,
						totalTokens: 1_000,
					},
				},
				(label, usage) => [
					label,
					formatNumber(usage.inputTokens),
					formatNumber(usage.reasoningOutputTokens),
					formatCurrency(usage.costUSD),
				],
			);
			const output = table.toString();
			expect(output).toContain('└─ gpt-5');
			expect(output).toContain('└─ o3');
			expect(output).toContain('2,000');
			expect(output).toContain('$1.00');
		});
	});

	describe('formatters', () => {
		it('formats numbers, tokens and currency', () => {
			expect(formatNumber(1_234_567)).toBe('1,234,567');
			expect(formatTokens(950)).toBe('950');
			expect(formatTokens(1_500)).toBe('1.5k');
			expect(formatTokens(2_500_000)).toBe('2.5M');
			expect(formatCurrency(12.5)).toBe('$12.50');
			expect(formatCurrency(undefined)).toBe('—');
		});

		it('draws a clamped progress bar', () => {
			expect(formatProgressBar(0.5, 10)).toBe('█████░░░░░');
			expect(formatProgressBar(2, 4)).toBe('████');
			expect(formatProgressBar(-1, 3)).toBe('░░░');
		});
	});
}
