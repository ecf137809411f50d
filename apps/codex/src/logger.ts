import type { ConsolaInstance } from 'consola';
import process from 'node:process';
import { consola } from 'consola';

export const logger: ConsolaInstance = consola.withTag('codex-log-usage');

const envLevel = process.env.LOG_LEVEL;
if (envLevel != null) {
	const level = Number.parseInt(envLevel, 10);
	if (!Number.isNaN(level)) {
		logger.level = level;
	}
}

// eslint-disable-next-line no-console
export const log = console.log;
