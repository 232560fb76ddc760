import * as fs from 'node:fs/promises';
import path from 'node:path';

const DEFAULT_LOG_DIR = 'memory/logs';
const REDACTED = '[REDACTED]';
const MIN_SECRET_LENGTH = 8;

/** Environment keys whose values must never reach a log line or an API response. */
const SENSITIVE_ENV_KEYS = [
    'OPENROUTER_API_KEY',
    'EMBEDDING_API_KEY',
    'OPENAI_API_KEY',
    'REDIS_URL',
    'API_SECRET',
];

const KEY_VALUE_SECRET_PATTERN =
    /\b(api[_-]?key|token|secret|password|authorization)(\s*[:=]\s*)(?:bearer\s+)?([^\s,;'"]+)/gi;
const BEARER_PATTERN = /\bBearer\s+[A-Za-z0-9._~+/=-]{8,}/g;

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Redact secrets from free text: raw values of known sensitive env vars,
 * `key=value` style credentials and bearer tokens.
 */
export function scrubSensitiveText(text: string): string {
    let scrubbed = text;

    for (const key of SENSITIVE_ENV_KEYS) {
        const value = process.env[key];
        if (value && value.length >= MIN_SECRET_LENGTH) {
            scrubbed = scrubbed.replace(new RegExp(escapeRegExp(value), 'g'), REDACTED);
        }
    }

    scrubbed = scrubbed.replace(KEY_VALUE_SECRET_PATTERN, (_match, key: string, separator: string) => {
        return `${key}${separator}${REDACTED}`;
    });
    return scrubbed.replace(BEARER_PATTERN, `Bearer ${REDACTED}`);
}

function isFileLoggingEnabled(): boolean {
    return (process.env.WAYPOINT_FILE_LOGGING ?? '').trim().toLowerCase() !== 'false';
}

function resolveLogDir(): string {
    return path.resolve(process.env.WAYPOINT_LOG_DIR?.trim() || DEFAULT_LOG_DIR);
}

/**
 * Append a timestamped line to the daily thought log (`<logDir>/<YYYY-MM-DD>.md`).
 * Logging failures are reported on stderr and never propagate.
 */
export async function logThought(message: string): Promise<void> {
    if (!isFileLoggingEnabled()) {
        return;
    }

    const now = new Date();
    const day = now.toISOString().slice(0, 10);
    const line = `- ${now.toISOString()} ${scrubSensitiveText(message)}\n`;
    const logDir = resolveLogDir();

    try {
        await fs.mkdir(logDir, { recursive: true });
        await fs.appendFile(path.join(logDir, `${day}.md`), line, 'utf8');
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        console.error(`[Logger] Failed to write thought log: ${reason}`);
    }
}
