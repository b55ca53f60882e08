import path from 'path';
import fs from 'fs';
import dotenv from 'dotenv';

export type EnvSource = Readonly<Record<string, string | undefined>>;

/** Carica `.env` dalla cartella di lavoro; le variabili già presenti nel processo hanno la precedenza. */
export function loadDotEnv(cwd: string = process.cwd()): void {
    const envPath = path.resolve(cwd, '.env');
    if (fs.existsSync(envPath)) {
        dotenv.config({ path: envPath });
    }
}

const TRUE_VALUES = new Set(['true', '1', 'yes', 'on']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off']);

export interface EnvReader {
    string(name: string, fallback?: string): string;
    int(name: string, fallback: number): number;
    bool(name: string, fallback: boolean): boolean;
    csv(name: string): string[];
    path(name: string, fallbackRelativePath: string): string;
    oneOf<T extends string>(name: string, allowed: readonly T[], fallback: T): T;
}

/**
 * Lettura tipizzata delle variabili. Valori non interpretabili ricadono sul default:
 * è `validateConfigSchema` a segnalare le combinazioni incoerenti.
 */
export function createEnvReader(env: EnvSource = process.env, cwd: string = process.cwd()): EnvReader {
    const raw = (name: string): string | undefined => {
        const value = env[name]?.trim();
        return value ? value : undefined;
    };

    return {
        string: (name, fallback = '') => raw(name) ?? fallback,
        int: (name, fallback) => {
            const value = raw(name);
            if (value === undefined || !/^-?\d+$/.test(value)) return fallback;
            return Number.parseInt(value, 10);
        },
        bool: (name, fallback) => {
            const value = raw(name)?.toLowerCase();
            if (value === undefined) return fallback;
            if (TRUE_VALUES.has(value)) return true;
            if (FALSE_VALUES.has(value)) return false;
            return fallback;
        },
        csv: (name) => (raw(name) ?? '')
            .split(',')
            .map((item) => item.trim())
            .filter((item) => item.length > 0),
        path: (name, fallbackRelativePath) => path.resolve(cwd, raw(name) ?? fallbackRelativePath),
        oneOf: <T extends string>(name: string, allowed: readonly T[], fallback: T): T => {
            const value = raw(name)?.toLowerCase();
            return allowed.find((candidate) => candidate === value) ?? fallback;
        },
    };
}

export function isValidTimezone(timezone: string): boolean {
    try {
        new Intl.DateTimeFormat('en-CA', { timeZone: timezone });
        return true;
    } catch {
        return false;
    }
}
