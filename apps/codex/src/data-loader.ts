import type { LogRecord } from './_types.ts';
import { appendFile, mkdtemp, open, rm, stat, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import process from 'node:process';
import { StringDecoder } from 'node:string_decoder';
import { Result } from '@praha/byethrow';
import { CODEX_HOME_ENV, DEFAULT_CODEX_DIR, LOG_FILE_RELATIVE_PATH } from './_consts.ts';
import { LogRecordAssembler, parseLogRecord } from './log-parser.ts';
import { logger } from './logger.ts';

const READ_BLOCK_BYTES = 1024 * 1024;

export function resolveLogPath(explicitPath?: string): string {
	if (explicitPath != null && explicitPath.trim() !== '') {
		return path.resolve(explicitPath);
	}
	const codexHome = process.env[CODEX_HOME_ENV]?.trim();
	const baseDir = codexHome == null || codexHome === '' ? DEFAULT_CODEX_DIR : path.resolve(codexHome);
	return path.join(baseDir, LOG_FILE_RELATIVE_PATH);
}

function isMissingFileError(error: unknown): boolean {
	return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Reads a log file incrementally. Each poll decodes only the bytes appended
 * since the previous one; a file that shrank is read again from the start.
 */
export type LogFollowerOptions = {
	/** Bytes decoded per read; a large log never becomes one string. */
	blockSize?: number;
};

export class LogFollower {
	private readonly blockSize: number;
	private offset = 0;
	private decoder = new StringDecoder('utf8');
	private assembler = new LogRecordAssembler();
	private partialLine = '';
	private missing = false;

	constructor(readonly filePath: string, options: LogFollowerOptions = {}) {
		this.blockSize = options.blockSize ?? READ_BLOCK_BYTES;
	}

	get isMissing(): boolean {
		return this.missing;
	}

	private reset(): void {
		this.offset = 0;
		this.decoder = new StringDecoder('utf8');
		this.assembler = new LogRecordAssembler();
		this.partialLine = '';
	}

	private consume(text: string): LogRecord[] {
		const lines = `${this.partialLine}${text}`.split('\n');
		this.partialLine = lines.pop() ?? '';

		const records: LogRecord[] = [];
		const accept = (recordText: string | undefined): void => {
			const record = recordText == null ? undefined : parseLogRecord(recordText);
			if (record != null) {
				records.push(record);
			}
		};
		for (const line of lines) {
			accept(this.assembler.push(line));
		}

		// A record with no continuation yet is emitted as soon as it parses.
		const pending = this.assembler.peek();
		if (pending != null && parseLogRecord(pending) != null) {
			accept(this.assembler.flush());
		}
		return records;
	}

	async poll(): Promise<Result.Result<LogRecord[], Error>> {
		let size: number;
		try {
			size = (await stat(this.filePath)).size;
		} catch (error) {
			if (isMissingFileError(error)) {
				this.missing = true;
				this.reset();
				return Result.succeed([]);
			}
			return Result.fail(new Error(`Failed to read ${this.filePath}`, { cause: error }));
		}
		this.missing = false;

		if (size < this.offset) {
			logger.debug(`Log file shrank, reading ${this.filePath} from the start`);
			this.reset();
		}
		if (size === this.offset) {
			return Result.succeed([]);
		}

		try {
			return Result.succeed(await this.readAppended(size));
		} catch (error) {
			return Result.fail(new Error(`Failed to read ${this.filePath}`, { cause: error }));
		}
	}

	private async readAppended(size: number): Promise<LogRecord[]> {
		const records: LogRecord[] = [];
		const handle = await open(this.filePath, 'r');
		try {
			const buffer = Buffer.alloc(Math.min(this.blockSize, size - this.offset));
			while (this.offset < size) {
				const length = Math.min(buffer.length, size - this.offset);
				const { bytesRead } = await handle.read(buffer, 0, length, this.offset);
				if (bytesRead === 0) {
					break;
				}
				this.offset += bytesRead;
				for (const record of this.consume(this.decoder.write(buffer.subarray(0, bytesRead)))) {
					records.push(record);
				}
			}
		} finally {
			await handle.close();
		}
		return records;
	}

	/**
	 * Emits whatever is still buffered: a last line without a newline and the
	 * record it belongs to.
	 */
	finish(): LogRecord[] {
		const records = this.consume(`${this.decoder.end()}\n`);
		const rest = this.assembler.flush();
		const record = rest == null ? undefined : parseLogRecord(rest);
		if (record != null) {
			records.push(record);
		}
		return records;
	}
}

export type LoadedLog = {
	records: LogRecord[];
	missingLogFile: boolean;
};

export async function loadLogRecords(logPath: string): Promise<Result.Result<LoadedLog, Error>> {
	const follower = new LogFollower(logPath);
	const polled = await follower.poll();
	if (Result.isFailure(polled)) {
		return polled;
	}
	if (follower.isMissing) {
		logger.warn(`Codex log not found: ${logPath}`);
		return Result.succeed({ records: [], missingLogFile: true });
	}
	return Result.succeed({
		records: [...polled.value, ...follower.finish()],
		missingLogFile: false,
	});
}

if (import.meta.vitest != null) {
	const tokenLine = (timestamp: string, input: number): string =>
		`${timestamp} INFO handle_codex_event: TokenCount(TokenUsage { input_tokens: ${input}, ` +
		'cached_input_tokens: None, output_tokens: 1, reasoning_output_tokens: None, ' +
		`total_tokens: ${input + 1} })`;
	const markerLine = (timestamp: string, marker: string): string =>
		`${timestamp} INFO handle_codex_event: ${marker}`;

	describe('resolveLogPath', () => {
		it('prefers an explicit path and otherwise uses CODEX_HOME', () => {
			const previous = process.env[CODEX_HOME_ENV];
			process.env[CODEX_HOME_ENV] = '/tmp/codex-home';
			try {
				expect(resolveLogPath()).toBe(path.join('/tmp/codex-home', 'log', 'codex-tui.log'));
				expect(resolveLogPath('/var/log/tui.log')).toBe('/var/log/tui.log');
			} finally {
				if (previous == null) {
					delete process.env[CODEX_HOME_ENV];
				} else {
					process.env[CODEX_HOME_ENV] = previous;
				}
			}
		});
	});

	describe('LogFollower', () => {
		let dir: string;
		let logPath: string;

		beforeEach(async () => {
			dir = await mkdtemp(path.join(os.tmpdir(), 'codex-log-usage-'));
			logPath = path.join(dir, 'codex-tui.log');
		});

		afterEach(async () => {
			await rm(dir, { recursive: true, force: true });
		});

		it('reads appended records and starts over after truncation', async () => {
			await writeFile(
				logPath,
				`${tokenLine('2025-08-25T10:00:00Z', 10)}\n${markerLine('2025-08-25T10:00:01Z', 'TaskStarted')}\n`,
			);
			const follower = new LogFollower(logPath);

			const first = await follower.poll();
			expect(Result.isSuccess(first) ? first.value.map((record) => record.kind) : []).toEqual([
				'token-count',
				'task-started',
			]);

			await appendFile(logPath, `${markerLine('2025-08-25T10:00:02Z', 'ExecCommandBegin')}\n`);
			const second = await follower.poll();
			expect(Result.isSuccess(second) ? second.value : []).toEqual([
				{ kind: 'exec-command-begin', timestamp: '2025-08-25T10:00:02.000Z' },
			]);

			const unchanged = await follower.poll();
			expect(Result.isSuccess(unchanged) ? unchanged.value : undefined).toEqual([]);

			await writeFile(logPath, `${markerLine('2025-08-25T11:00:00Z', 'TaskStarted')}\n`);
			const third = await follower.poll();
			expect(Result.isSuccess(third) ? third.value : []).toEqual([
				{ kind: 'task-started', timestamp: '2025-08-25T11:00:00.000Z' },
			]);
		});

		it('waits for a multi-line record to complete across writes', async () => {
			await writeFile(
				logPath,
				'2025-08-25T10:00:00Z INFO handle_codex_event: TokenCount(TokenUsage {\n    input_tokens: 3,\n',
			);
			const follower = new LogFollower(logPath);
			const first = await follower.poll();
			expect(Result.isSuccess(first) ? first.value : undefined).toEqual([]);

			await appendFile(logPath, '    output_tokens: 1,\n})\n');
			const second = await follower.poll();
			expect(Result.isSuccess(second) ? second.value : []).toEqual([
				{
					kind: 'token-count',
					timestamp: '2025-08-25T10:00:00.000Z',
					inputTokens: 3,
					cachedInputTokens: 0,
					outputTokens: 1,
					reasoningOutputTokens: 0,
					totalTokens: 4,
				},
			]);
		});

		it('reads a large log in small blocks without splitting characters or records', async () => {
			await writeFile(
				logPath,
				[
					tokenLine('2025-08-25T10:00:00Z', 10),
					markerLine(
						'2025-08-25T10:00:01Z',
						'SessionConfigured(SessionConfiguredEvent { model: "gpt-5-café" })',
					),
					'2025-08-25T10:00:02Z INFO handle_codex_event: TokenCount(TokenUsage {',
					'    input_tokens: 7, output_tokens: 2, total_tokens: 9 })',
					'',
				].join('\n'),
			);
			const blocks = await new LogFollower(logPath, { blockSize: 7 }).poll();
			const whole = await new LogFollower(logPath).poll();

			const records = Result.isSuccess(blocks) ? blocks.value : [];
			expect(records.map((record) => record.kind)).toEqual([
				'token-count',
				'session-configured',
				'token-count',
			]);
			expect(records[1]).toEqual({
				kind: 'session-configured',
				timestamp: '2025-08-25T10:00:01.000Z',
				model: 'gpt-5-café',
			});
			expect(records).toEqual(Result.isSuccess(whole) ? whole.value : undefined);
		});

		it('holds a line without a newline until finished', async () => {
			await writeFile(logPath, tokenLine('2025-08-25T10:00:00Z', 20));
			const follower = new LogFollower(logPath);
			const polled = await follower.poll();
			expect(Result.isSuccess(polled) ? polled.value : undefined).toEqual([]);
			expect(follower.finish()).toHaveLength(1);
		});
	});

	describe('loadLogRecords', () => {
		it('reports a missing log file without failing', async () => {
			const dir = await mkdtemp(path.join(os.tmpdir(), 'codex-log-usage-'));
			try {
				const result = await loadLogRecords(path.join(dir, 'missing.log'));
				expect(Result.isSuccess(result) ? result.value : undefined).toEqual({
					records: [],
					missingLogFile: true,
				});
			} finally {
				await rm(dir, { recursive: true, force: true });
			}
		});

		it('includes a trailing record without a newline', async () => {
			const dir = await mkdtemp(path.join(os.tmpdir(), 'codex-log-usage-'));
			try {
				const logPath = path.join(dir, 'codex-tui.log');
				await writeFile(
					logPath,
					`${tokenLine('2025-08-25T10:00:00Z', 10)}\n${tokenLine('2025-08-25T10:05:00Z', 30)}`,
				);
				const result = await loadLogRecords(logPath);
				expect(Result.isSuccess(result) ? result.value.records.length : 0).toBe(2);
			} finally {
				await rm(dir, { recursive: true, force: true });
			}
		});
	});
}
