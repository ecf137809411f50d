import os from 'node:os';
import path from 'node:path';

export const CODEX_HOME_ENV = 'CODEX_HOME';
export const DEFAULT_CODEX_DIR = path.join(os.homedir(), '.codex');
export const LOG_FILE_RELATIVE_PATH = path.join('log', 'codex-tui.log');

export const XDG_CACHE_HOME_ENV = 'XDG_CACHE_HOME';
export const CACHE_DIR_NAME = 'codex-log-usage';

export const THOUSAND = 1_000;
export const HOUR_MS = 3_600_000;
export const DAY_MS = 86_400_000;

export const SESSION_WINDOW_HOURS = 5;
export const DEFAULT_SESSION_GAP_MINUTES = 10;
export const DEFAULT_REPORT_DAYS = 30;
export const DEFAULT_LIVE_INTERVAL_SECONDS = 2;
export const LIVE_EVENT_ROWS = 200;

export const DEFAULT_FALLBACK_MODEL = 'gpt-5';
export const DEFAULT_PRICE_PROVIDER = 'openai';
export const DEFAULT_PRICE_CACHE_TTL_HOURS = 24;
export const HELICONE_COSTS_URL = 'https://www.helicone.ai/api/llm-costs';
