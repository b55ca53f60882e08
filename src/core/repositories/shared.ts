import { DatabaseManager } from '../../db';

export function parsePayload(raw: string | null | undefined): Record<string, unknown> {
    if (!raw) return {};
    try {
        const parsed: unknown = JSON.parse(raw);
        if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
            return { ...parsed };
        }
        return {};
    } catch {
        return {};
    }
}

/** Postgres restituisce COUNT(*) come stringa (int8), SQLite come number. */
export function toCount(value: string | number | null | undefined): number {
    const parsed = Number(value ?? 0);
    return Number.isFinite(parsed) ? parsed : 0;
}

export function placeholders(count: number): string {
    return new Array(count).fill('?').join(', ');
}
