import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';
import { getConfigValue } from '../config/backup-config.js';

const SENSITIVE_KEY_PATTERN = /(secret|token|password|passphrase|mnemonic|api[_-]?key|auth)/i;
const KEY_VALUE_PATTERN =
  /\b([A-Za-z0-9_.-]*(?:secret|token|password|passphrase|mnemonic|api[_-]?key|auth)[A-Za-z0-9_.-]*)(\s*[=:]\s*)("[^"]*"|'[^']*'|[^\s,;&]+)/gi;
const MIN_ENV_SECRET_LENGTH = 8;
const REDACTED = '[REDACTED]';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function sensitiveEnvValues(): string[] {
  const values: string[] = [];
  for (const [key, value] of Object.entries(process.env)) {
    if (!value || value.length < MIN_ENV_SECRET_LENGTH) continue;
    if (SENSITIVE_KEY_PATTERN.test(key)) {
      values.push(value);
    }
  }
  // Longest first so overlapping values are fully masked.
  return values.sort((a, b) => b.length - a.length);
}

/**
 * Redact secret-looking material before it reaches a log line:
 * `key=value` pairs whose key looks sensitive, and the raw values of
 * sensitive environment variables wherever they appear.
 */
export function scrubSensitiveText(text: string): string {
  let scrubbed = text.replace(KEY_VALUE_PATTERN, (_match, key: string, separator: string) => {
    return `${key}${separator}${REDACTED}`;
  });

  for (const value of sensitiveEnvValues()) {
    scrubbed = scrubbed.replace(new RegExp(escapeRegExp(value), 'g'), REDACTED);
  }

  return scrubbed;
}

export function getLogDir(): string {
  return path.resolve(getConfigValue('BACKUP_LOG_DIR'));
}

/**
 * Append a line to today's markdown log (`<logDir>/<YYYY-MM-DD>.md`).
 * Never throws: a failed write is reported on stderr and dropped.
 */
export async function logThought(message: string): Promise<void> {
  const now = new Date();
  const dateIso = now.toISOString().slice(0, 10);
  const time = now.toISOString().slice(11, 19);
  const logDir = getLogDir();
  const line = `- ${time} ${scrubSensitiveText(message)}\n`;

  try {
    await mkdir(logDir, { recursive: true });
    await appendFile(path.join(logDir, `${dateIso}.md`), line, 'utf8');
  } catch (err) {
    console.error('[Logger] Failed to write log entry:', err instanceof Error ? err.message : String(err));
  }
}
