/**
 * cliParser.ts — Utility di parsing degli argomenti CLI
 *
 * Tutte le funzioni pure per leggere, validare e normalizzare i parametri
 * passati da riga di comando. Nessuna dipendenza da DB o config.
 */

import { RolePreference, WorkerRole } from '../types/domain';

// ─── Lettura argomenti ────────────────────────────────────────────────────────

export function getOptionValue(args: string[], optionName: string): string | undefined {
    const index = args.findIndex((value) => value === optionName);
    if (index === -1 || index + 1 >= args.length) {
        return undefined;
    }
    return args[index + 1];
}

export function hasOption(args: string[], optionName: string): boolean {
    return args.includes(optionName);
}

export function getPositionalArgs(args: string[]): string[] {
    const positional: string[] = [];
    for (let index = 0; index < args.length; index++) {
        const value = args[index];
        if (value.startsWith('--')) {
            // salta il valore dell'opzione, se presente
            if (index + 1 < args.length && !args[index + 1].startsWith('--')) {
                index++;
            }
            continue;
        }
        positional.push(value);
    }
    return positional;
}

// ─── Parsing valori ───────────────────────────────────────────────────────────

export function parseIntStrict(raw: string, optionName: string): number {
    const trimmed = raw.trim();
    if (!/^-?\d+$/.test(trimmed)) {
        throw new Error(`Valore non valido per ${optionName}: ${raw}`);
    }
    return Number.parseInt(trimmed, 10);
}

export function parseNullableLimit(raw: string, optionName: string): number | null {
    const normalized = raw.trim().toLowerCase();
    if (normalized === 'none' || normalized === 'null' || normalized === 'default') {
        return null;
    }
    const parsed = parseIntStrict(raw, optionName);
    if (parsed < 1) {
        throw new Error(`${optionName} deve essere >= 1 oppure none / default.`);
    }
    return parsed;
}

export function parseBoolStrict(raw: string, optionName: string): boolean {
    const normalized = raw.trim().toLowerCase();
    if (normalized === 'true' || normalized === '1' || normalized === 'yes') return true;
    if (normalized === 'false' || normalized === '0' || normalized === 'no') return false;
    throw new Error(`Valore non valido per ${optionName}: ${raw} (usa true / false).`);
}

export function parseWorkerRole(raw: string | undefined): WorkerRole {
    const normalized = (raw ?? 'user').trim().toUpperCase();
    if (normalized === 'ADMIN' || normalized === 'USER') {
        return normalized;
    }
    throw new Error(`Ruolo worker non valido: ${raw} (usa admin / user).`);
}

export function parseRolePreference(raw: string | undefined): RolePreference {
    const normalized = (raw ?? 'none').trim().toUpperCase().replace(/-/g, '_');
    if (normalized === 'NONE' || normalized === 'USER_FIRST' || normalized === 'ADMIN_FIRST') {
        return normalized;
    }
    throw new Error(`Preferenza ruolo non valida: ${raw} (usa none / user-first / admin-first).`);
}
