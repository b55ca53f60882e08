import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';

interface RunContext {
    correlationId: string;
    runId: string | null;
}

const contextStore = new AsyncLocalStorage<RunContext>();

function sanitizeCorrelationId(value: string): string {
    const trimmed = value.trim();
    if (!trimmed) return randomUUID();
    return trimmed.replace(/[^a-zA-Z0-9._-]/g, '').slice(0, 80) || randomUUID();
}

export function resolveCorrelationId(value?: string | null): string {
    if (!value) return randomUUID();
    return sanitizeCorrelationId(value);
}

export function runWithCorrelationId<T>(correlationId: string, callback: () => T): T {
    return contextStore.run({ correlationId, runId: null }, callback);
}

/** Tutto ciò che gira dentro `callback` (log compresi) viene attribuito alla run. */
export function runWithRunContext<T>(runId: string, callback: () => T): T {
    return contextStore.run({ correlationId: runId, runId }, callback);
}

export function getCorrelationId(): string | null {
    return contextStore.getStore()?.correlationId ?? null;
}

export function getRunContextId(): string | null {
    return contextStore.getStore()?.runId ?? null;
}
