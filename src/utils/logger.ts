import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';

const REDACTED = '[REDACTED]';
const SENSITIVE_ENV_PATTERN = /(KEY|TOKEN|SECRET|PASSWORD|AUTH)/i;
const MIN_SECRET_LENGTH = 8;

const INLINE_SECRET_PATTERNS: RegExp[] = [
    /\bBearer\s+[A-Za-z0-9._~+/=-]+/gi,
    /\b(api[_-]?key|token|secret|password|authorization)\s*[:=]\s*["']?[^\s"',}]+/gi,
];

function getLogDir(): string {
    return path.resolve(process.env.GATEWAY_LOG_DIR || 'logs');
}

function collectSensitiveEnvValues(): string[] {
    return Object.entries(process.env)
        .filter(([name, value]) => SENSITIVE_ENV_PATTERN.test(name) && typeof value === 'string')
        .map(([, value]) => value ?? '')
        .filter((value) => value.length >= MIN_SECRET_LENGTH);
}

/**
 * Redact credentials from free text before it reaches a log file or a client.
 *
 * Covers `Bearer` tokens, `key=value` style secrets and the raw values of any
 * environment variable whose name looks sensitive.
 */
export function scrubSensitiveText(text: string): string {
    let scrubbed = text;
    for (const pattern of INLINE_SECRET_PATTERNS) {
        scrubbed = scrubbed.replace(pattern, (match) => {
            const separator = match.match(/^(Bearer\s+|[^:=]+[:=]\s*["']?)/i);
            return separator ? `${separator[0]}${REDACTED}` : REDACTED;
        });
    }

    for (const value of collectSensitiveEnvValues()) {
        scrubbed = scrubbed.split(value).join(REDACTED);
    }
    return scrubbed;
}

/** Append an operator-facing entry to today's markdown log. */
export async function logThought(message: string): Promise<void> {
    const now = new Date();
    const logPath = path.join(getLogDir(), `${now.toISOString().slice(0, 10)}.md`);
    const entry = `\n## Thought @ ${now.toISOString()}\n${scrubSensitiveText(message)}\n`;

    try {
        await mkdir(path.dirname(logPath), { recursive: true });
        await appendFile(logPath, entry, 'utf8');
    } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        console.error(`[Gateway] Failed to write log entry to ${logPath}: ${detail}`);
    }
}
