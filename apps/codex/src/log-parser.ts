import type {
	LogRecord,
	SessionInput,
	TokenUsageDelta,
	TokenUsageEvent,
} from './_types.ts';
import { parseTimestamp } from './date-utils.ts';

// eslint-disable-next-line no-control-regex
const ANSI_REGEX = /\u001B\[[0-9;]*[a-zA-Z]/g;
const RECORD_START_REGEX = /^\d{4}-\d{2}-\d{2}T\S+\s/;
const EVENT_HEADER_REGEX = /^(\d{4}-\d{2}-\d{2}T\S+)\s+\w+\s+handle_codex_event:\s+/;

const TOKEN_COUNT_OPENING_REGEX = /^TokenCount\(TokenUsage\s*\{/;
const TASK_STARTED_REGEX = /^TaskStarted\b/;
const EXEC_COMMAND_BEGIN_REGEX = /^ExecCommandBegin\b/;
const SESSION_CONFIGURED_REGEX = /^SessionConfigured\(SessionConfiguredEvent\b/;
const SESSION_MODEL_REGEX = /\bmodel:\s*"([^"]+)"/;
const USAGE_LIMIT_REGEX = /^Error\(ErrorEvent\b[\s\S]*?usage\s+limit/i;

const FIELD_NAME_REGEX = /^([A-Za-z_]\w*)\s*:\s*([\s\S]*)$/;
const COUNT_VALUE_REGEX = /^(?:Some\((\d+)\)|(\d+)|None)$/;
const STRING_VALUE_REGEX = /^(?:Some\(\s*"((?:[^"\\]|\\.)*)"\s*\)|"((?:[^"\\]|\\.)*)")$/;

const FIELD_ALIASES: Record<keyof TokenUsageDelta, readonly string[]> = {
	inputTokens: ['input_tokens', 'prompt_tokens', 'prompt_input_tokens', 'tokens_in'],
	cachedInputTokens: [
		'cached_input_tokens',
		'prompt_cached',
		'cache_read_tokens',
		'cache_read',
		'cached_tokens',
		'cached_prompt_tokens',
	],
	outputTokens: ['output_tokens', 'completion_tokens', 'tokens_out'],
	reasoningOutputTokens: ['reasoning_output_tokens', 'reasoning_tokens'],
	totalTokens: ['total_tokens', 'total'],
};

export function stripAnsi(text: string): string {
	return text.replace(ANSI_REGEX, '');
}

export function isRecordStart(line: string): boolean {
	return RECORD_START_REGEX.test(stripAnsi(line));
}

type BraceBody = {
	body: string;
	rest: string;
};

/**
 * Returns the text up to the brace that closes the one opened just before
 * `offset`, skipping over quoted strings.
 */
function readBraceBody(text: string, offset: number): BraceBody | undefined {
	let depth = 1;
	let inString = false;
	for (let index = offset; index < text.length; index++) {
		const char = text[index];
		if (inString) {
			if (char === '\\') {
				index++;
			} else if (char === '"') {
				inString = false;
			}
			continue;
		}
		if (char === '"') {
			inString = true;
		} else if (char === '{' || char === '(' || char === '[') {
			depth++;
		} else if (char === '}' || char === ')' || char === ']') {
			depth--;
			if (depth === 0) {
				return char === '}'
					? { body: text.slice(offset, index), rest: text.slice(index + 1) }
					: undefined;
			}
		}
	}
	return undefined;
}

function splitTopLevel(body: string): string[] {
	const parts: string[] = [];
	let depth = 0;
	let inString = false;
	let current = '';
	for (let index = 0; index < body.length; index++) {
		const char = body[index] ?? '';
		if (inString) {
			current += char;
			if (char === '\\') {
				current += body[index + 1] ?? '';
				index++;
			} else if (char === '"') {
				inString = false;
			}
			continue;
		}
		if (char === '"') {
			inString = true;
		} else if (char === '{' || char === '(' || char === '[') {
			depth++;
		} else if (char === '}' || char === ')' || char === ']') {
			depth--;
		} else if (char === ',' && depth === 0) {
			parts.push(current);
			current = '';
			continue;
		}
		current += char;
	}
	parts.push(current);
	return parts.map((part) => part.trim()).filter((part) => part !== '');
}

function parseFields(body: string): Map<string, string> | undefined {
	const fields = new Map<string, string>();
	for (const part of splitTopLevel(body)) {
		const match = FIELD_NAME_REGEX.exec(part);
		const name = match?.[1];
		const value = match?.[2];
		if (name == null || value == null) {
			return undefined;
		}
		fields.set(name, value.trim());
	}
	return fields;
}

/**
 * `null` marks a value that is present but not a count; the caller rejects
 * the whole record for it.
 */
function parseCount(value: string): number | null {
	const match = COUNT_VALUE_REGEX.exec(value);
	if (match == null) {
		return null;
	}
	const digits = match[1] ?? match[2];
	if (digits == null) {
		return 0;
	}
	const count = Number.parseInt(digits, 10);
	return Number.isSafeInteger(count) ? count : null;
}

function readCount(
	fields: Map<string, string>,
	aliases: readonly string[],
): number | null | undefined {
	for (const alias of aliases) {
		const value = fields.get(alias);
		if (value != null) {
			return parseCount(value);
		}
	}
	return undefined;
}

function readModel(fields: Map<string, string>): string | undefined {
	const value = fields.get('model');
	if (value == null) {
		return undefined;
	}
	const match = STRING_VALUE_REGEX.exec(value);
	const model = (match?.[1] ?? match?.[2])?.trim();
	return model == null || model === '' ? undefined : model;
}

function parseTokenCount(payload: string, timestamp: string): LogRecord | undefined {
	const opening = TOKEN_COUNT_OPENING_REGEX.exec(payload);
	if (opening == null) {
		return undefined;
	}
	const braces = readBraceBody(payload, opening[0].length);
	if (braces == null || !/^\s*\)/.test(braces.rest)) {
		return undefined;
	}
	const fields = parseFields(braces.body);
	if (fields == null) {
		return undefined;
	}

	const inputTokens = readCount(fields, FIELD_ALIASES.inputTokens);
	const cachedInputTokens = readCount(fields, FIELD_ALIASES.cachedInputTokens);
	const outputTokens = readCount(fields, FIELD_ALIASES.outputTokens);
	const reasoningOutputTokens = readCount(fields, FIELD_ALIASES.reasoningOutputTokens);
	const totalTokens = readCount(fields, FIELD_ALIASES.totalTokens);
	if (
		inputTokens == null ||
		outputTokens == null ||
		cachedInputTokens === null ||
		reasoningOutputTokens === null ||
		totalTokens === null
	) {
		return undefined;
	}

	const model = readModel(fields);
	return {
		kind: 'token-count',
		timestamp,
		inputTokens,
		cachedInputTokens: cachedInputTokens ?? 0,
		outputTokens,
		reasoningOutputTokens: reasoningOutputTokens ?? 0,
		totalTokens: totalTokens ?? inputTokens + outputTokens,
		...(model == null ? {} : { model }),
	};
}

/**
 * Turns one logical log record into a typed record. Only records whose event
 * marker directly follows the `handle_codex_event:` header are recognized, so
 * marker names quoted in commands or diff bodies never produce events.
 */
export function parseLogRecord(record: string): LogRecord | undefined {
	const text = stripAnsi(record).trimEnd();
	const header = EVENT_HEADER_REGEX.exec(text);
	const rawTimestamp = header?.[1];
	if (header == null || rawTimestamp == null) {
		return undefined;
	}
	const timestamp = parseTimestamp(rawTimestamp);
	if (timestamp == null) {
		return undefined;
	}

	const payload = text.slice(header[0].length);
	if (payload.startsWith('TokenCount(')) {
		return parseTokenCount(payload, timestamp);
	}
	if (TASK_STARTED_REGEX.test(payload)) {
		return { kind: 'task-started', timestamp };
	}
	if (EXEC_COMMAND_BEGIN_REGEX.test(payload)) {
		return { kind: 'exec-command-begin', timestamp };
	}
	if (SESSION_CONFIGURED_REGEX.test(payload)) {
		const model = SESSION_MODEL_REGEX.exec(payload)?.[1];
		return model == null ? undefined : { kind: 'session-configured', timestamp, model };
	}
	if (USAGE_LIMIT_REGEX.test(payload)) {
		return { kind: 'usage-limit', timestamp };
	}
	return undefined;
}

/**
 * Joins physical lines into logical records: a line that does not start with
 * a timestamp continues the record before it.
 */
export class LogRecordAssembler {
	private pending: string[] = [];

	push(line: string): string | undefined {
		const clean = line.endsWith('\r') ? line.slice(0, -1) : line;
		if (!isRecordStart(clean)) {
			if (this.pending.length > 0) {
				this.pending.push(clean);
			}
			return undefined;
		}
		const completed = this.flush();
		this.pending = [clean];
		return completed;
	}

	peek(): string | undefined {
		return this.pending.length === 0 ? undefined : this.pending.join('\n');
	}

	flush(): string | undefined {
		const completed = this.peek();
		this.pending = [];
		return completed;
	}
}

export function extractLogRecords(lines: Iterable<string>): LogRecord[] {
	const assembler = new LogRecordAssembler();
	const records: LogRecord[] = [];
	const accept = (text: string | undefined): void => {
		if (text == null) {
			return;
		}
		const record = parseLogRecord(text);
		if (record != null) {
			records.push(record);
		}
	};
	for (const line of lines) {
		accept(assembler.push(line));
	}
	accept(assembler.flush());
	return records;
}

export type UsageStream = {
	events: TokenUsageEvent[];
	inputs: SessionInput[];
	/** Model of the latest SessionConfigured record, to carry into the next batch. */
	currentModel?: string;
};

/**
 * Splits records into usage events and session inputs. Token counts without
 * their own model inherit the model of the latest SessionConfigured record.
 */
export function splitUsageStream(records: Iterable<LogRecord>, initialModel?: string): UsageStream {
	const events: TokenUsageEvent[] = [];
	const inputs: SessionInput[] = [];
	let currentModel = initialModel;

	for (const record of records) {
		switch (record.kind) {
			case 'session-configured':
				currentModel = record.model;
				break;
			case 'token-count': {
				const { kind, ...event } = record;
				const model = event.model ?? currentModel;
				events.push(model == null ? event : { ...event, model });
				inputs.push({ kind, timestamp: record.timestamp });
				break;
			}
			case 'task-started':
			case 'exec-command-begin':
			case 'usage-limit':
				inputs.push({ kind: record.kind, timestamp: record.timestamp });
				break;
		}
	}
	return currentModel == null ? { events, inputs } : { events, inputs, currentModel };
}

if (import.meta.vitest != null) {
	const line = (timestamp: string, payload: string): string =>
		`${timestamp} INFO handle_codex_event: ${payload}`;
	const TOKEN_LINE =
		'2025-08-25T10:00:05.000000Z  INFO handle_codex_event: TokenCount(TokenUsage { ' +
		'input_tokens: 1000, cached_input_tokens: Some(200), output_tokens: 300, ' +
		'reasoning_output_tokens: Some(0), total_tokens: 1300 })';

	describe('parseLogRecord', () => {
		it('extracts the five counts and the timestamp of a token-count record', () => {
			expect(parseLogRecord(TOKEN_LINE)).toEqual({
				kind: 'token-count',
				timestamp: '2025-08-25T10:00:05.000Z',
				inputTokens: 1000,
				cachedInputTokens: 200,
				outputTokens: 300,
				reasoningOutputTokens: 0,
				totalTokens: 1300,
			});
		});

		it('reads the model only when the payload carries one', () => {
			const withModel = parseLogRecord(
				line(
					'2025-08-25T10:00:05Z',
					'TokenCount(TokenUsage { input_tokens: 5, cached_input_tokens: None, output_tokens: 1, ' +
					'reasoning_output_tokens: None, total_tokens: 6, model: Some("gpt-5-codex") })',
				),
			);
			expect(withModel).toMatchObject({
				kind: 'token-count',
				model: 'gpt-5-codex',
				cachedInputTokens: 0,
			});
			expect(parseLogRecord(TOKEN_LINE)).not.toHaveProperty('model');
		});

		it('derives the total from input and output when total_tokens is absent', () => {
			const record = parseLogRecord(
				line('2025-08-25T10:00:05Z', 'TokenCount(TokenUsage { prompt_tokens: 40, completion_tokens: 2 })'),
			);
			expect(record).toMatchObject({ inputTokens: 40, outputTokens: 2, totalTokens: 42 });
		});

		it('strips ANSI colour codes before matching', () => {
			const coloured =
				'\u001B[2m2025-08-25T10:00:05.000000Z\u001B[0m ' +
				'\u001B[32m INFO\u001B[0m handle_codex_event: TaskStarted';
			expect(parseLogRecord(coloured)).toEqual({
				kind: 'task-started',
				timestamp: '2025-08-25T10:00:05.000Z',
			});
		});

		it('ignores the marker inside quoted commands and diff bodies', () => {
			const quoted =
				line(
					'2025-08-25T10:00:06Z',
					'ExecCommandBegin(ExecCommandBeginEvent { call_id: "c1", command: ' +
					'["rg", "TokenCount(TokenUsage { input_tokens: 9, output_tokens: 9 })"] })',
				);
			expect(parseLogRecord(quoted)).toEqual({
				kind: 'exec-command-begin',
				timestamp: '2025-08-25T10:00:06.000Z',
			});

			const diff =
				'2025-08-25T10:00:07Z INFO codex_core::turn_diff: ' +
				'+    "handle_codex_event: TokenCount(TokenUsage { input_tokens: 1, output_tokens: 1 })"';
			expect(parseLogRecord(diff)).toBeUndefined();
		});

		it('skips truncated or malformed payloads', () => {
			expect(
				parseLogRecord(
					line('2025-08-25T10:00:05Z', 'TokenCount(TokenUsage { input_tokens: 1000, output_tok'),
				),
			).toBeUndefined();
			expect(
				parseLogRecord(
					line('2025-08-25T10:00:05Z', 'TokenCount(TokenUsage { input_tokens: 12x, output_tokens: 1 })'),
				),
			).toBeUndefined();
			expect(
				parseLogRecord(line('2025-08-25T10:00:05Z', 'TokenCount(TokenUsage { output_tokens: 1 })')),
			).toBeUndefined();
			expect(
				parseLogRecord(
					line('2025-13-45T10:00:05Z', 'TokenCount(TokenUsage { input_tokens: 1, output_tokens: 1 })'),
				),
			).toBeUndefined();
		});

		it('recognizes usage-limit errors and session configuration', () => {
			expect(
				parseLogRecord(
					line(
						'2025-08-25T05:10:00Z',
						'Error(ErrorEvent { message: "You\'ve hit your usage limit. Try again later." })',
					),
				),
			).toEqual({ kind: 'usage-limit', timestamp: '2025-08-25T05:10:00.000Z' });
			expect(
				parseLogRecord(
					line(
						'2025-08-25T10:00:00Z',
						'SessionConfigured(SessionConfiguredEvent { session_id: abc, model: "gpt-5", history_log_id: 1 })',
					),
				),
			).toEqual({
				kind: 'session-configured',
				timestamp: '2025-08-25T10:00:00.000Z',
				model: 'gpt-5',
			});
			expect(
				parseLogRecord(line('2025-08-25T05:10:00Z', 'Error(ErrorEvent { message: "stream closed" })')),
			).toBeUndefined();
		});
	});

	describe('LogRecordAssembler', () => {
		it('joins continuation lines into the preceding record', () => {
			const records = extractLogRecords([
				line('2025-08-25T10:00:05Z', 'TokenCount(TokenUsage {'),
				'    input_tokens: 10,',
				'    output_tokens: 4,',
				'})',
				'orphan continuation without a record',
				line('2025-08-25T10:00:06Z', 'TaskStarted'),
			]);
			expect(records).toEqual([
				{
					kind: 'token-count',
					timestamp: '2025-08-25T10:00:05.000Z',
					inputTokens: 10,
					cachedInputTokens: 0,
					outputTokens: 4,
					reasoningOutputTokens: 0,
					totalTokens: 14,
				},
				{ kind: 'task-started', timestamp: '2025-08-25T10:00:06.000Z' },
			]);
		});

		it('keeps the last record pending until flushed', () => {
			const assembler = new LogRecordAssembler();
			expect(assembler.push('2025-08-25T10:00:05Z INFO first')).toBeUndefined();
			expect(assembler.push('  more')).toBeUndefined();
			expect(assembler.push('2025-08-25T10:00:06Z INFO second')).toBe(
				'2025-08-25T10:00:05Z INFO first\n  more',
			);
			expect(assembler.flush()).toBe('2025-08-25T10:00:06Z INFO second');
			expect(assembler.peek()).toBeUndefined();
		});
	});

	describe('splitUsageStream', () => {
		it('attaches the configured model and collects session inputs', () => {
			const stream = splitUsageStream(
				extractLogRecords([
					line('2025-08-25T10:00:00Z', 'SessionConfigured(SessionConfiguredEvent { model: "gpt-5" })'),
					TOKEN_LINE,
					line('2025-08-25T10:01:00Z', 'Error(ErrorEvent { message: "usage limit reached" })'),
					line('2025-08-25T10:02:00Z', 'ExecCommandBegin(ExecCommandBeginEvent { call_id: "x" })'),
				]),
			);
			expect(stream.events).toHaveLength(1);
			expect(stream.events[0]?.model).toBe('gpt-5');
			expect(stream.events[0]).not.toHaveProperty('kind');
			expect(stream.inputs).toEqual([
				{ kind: 'token-count', timestamp: '2025-08-25T10:00:05.000Z' },
				{ kind: 'usage-limit', timestamp: '2025-08-25T10:01:00.000Z' },
				{ kind: 'exec-command-begin', timestamp: '2025-08-25T10:02:00.000Z' },
			]);
		});

		it('carries the configured model into the next batch', () => {
			const first = splitUsageStream(
				extractLogRecords([
					line('2025-08-25T10:00:00Z', 'SessionConfigured(SessionConfiguredEvent { model: "gpt-5-codex" })'),
				]),
			);
			expect(first.currentModel).toBe('gpt-5-codex');
			const second = splitUsageStream(extractLogRecords([TOKEN_LINE]), first.currentModel);
			expect(second.events[0]?.model).toBe('gpt-5-codex');
		});
	});
}
