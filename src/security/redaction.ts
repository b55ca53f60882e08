const MAX_RECURSION_DEPTH = 6;
const REDACTED = '[REDACTED]';
const VISIBLE_PHONE_DIGITS = 3;

const SENSITIVE_KEY_PATTERN = /(token|secret|password|pass|apikey|api_key|cookie|authorization|session|bearer|hash)/i;

const JWT_PATTERN = /\b[A-Za-z0-9_-]{20,}\.[A-Za-z0-9_-]{20,}\.[A-Za-z0-9_-]{20,}\b/g;
const TELEGRAM_BOT_TOKEN_PATTERN = /\b\d{8,}:[A-Za-z0-9_-]{20,}\b/g;
const PHONE_NUMBER_PATTERN = /(?<![\w+])\+?\d{8,15}(?![\w])/g;

/**
 * Maschera un numero di telefono lasciando visibili solo le ultime cifre:
 * `+393331234567` → `+*********567`.
 */
export function maskPhoneNumber(value: string): string {
    const trimmed = value.trim();
    const prefix = trimmed.startsWith('+') ? '+' : '';
    const digits = trimmed.replace(/\D/g, '');
    if (digits.length <= VISIBLE_PHONE_DIGITS) {
        return `${prefix}${digits}`;
    }
    const hidden = digits.length - VISIBLE_PHONE_DIGITS;
    return `${prefix}${'*'.repeat(hidden)}${digits.slice(hidden)}`;
}

function sanitizeString(input: string): string {
    return input
        .replace(JWT_PATTERN, REDACTED)
        .replace(TELEGRAM_BOT_TOKEN_PATTERN, REDACTED)
        .replace(PHONE_NUMBER_PATTERN, (match) => maskPhoneNumber(match));
}

function sanitizeArray(input: unknown[], depth: number): unknown[] {
    if (depth > MAX_RECURSION_DEPTH) {
        return ['[MAX_DEPTH_REACHED]'];
    }
    return input.map((item) => sanitizeValue(item, depth + 1));
}

function sanitizeObject(input: object, depth: number): Record<string, unknown> {
    if (depth > MAX_RECURSION_DEPTH) {
        return { note: '[MAX_DEPTH_REACHED]' };
    }

    const output: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(input)) {
        if (SENSITIVE_KEY_PATTERN.test(key)) {
            output[key] = REDACTED;
            continue;
        }
        output[key] = sanitizeValue(value, depth + 1);
    }
    return output;
}

function sanitizeValue(value: unknown, depth: number): unknown {
    if (value === null || value === undefined) {
        return value;
    }
    if (typeof value === 'string') {
        return sanitizeString(value);
    }
    if (typeof value === 'number' || typeof value === 'boolean') {
        return value;
    }
    if (value instanceof Date) {
        return value.toISOString();
    }
    if (value instanceof Error) {
        return sanitizeString(value.message);
    }
    if (Array.isArray(value)) {
        return sanitizeArray(value, depth);
    }
    if (typeof value === 'object') {
        return sanitizeObject(value, depth);
    }
    return String(value);
}

export function sanitizeForLogs(payload: Record<string, unknown>): Record<string, unknown> {
    return sanitizeObject(payload, 0);
}
