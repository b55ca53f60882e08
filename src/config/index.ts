import { buildDashboardDomainConfig, buildRuntimeDomainConfig, buildSupervisorDomainConfig } from './domains';
import { createEnvReader, EnvSource, loadDotEnv } from './env';
import { AppConfig, LogLevelSetting } from './types';
import { validateConfigSchema } from './validation';

export function buildAppConfig(env: EnvSource = process.env): AppConfig {
    const reader = createEnvReader(env);
    return {
        ...buildRuntimeDomainConfig(reader),
        ...buildSupervisorDomainConfig(reader),
        ...buildDashboardDomainConfig(reader),
    };
}

loadDotEnv();

export const config: AppConfig = buildAppConfig();

export function getLocalDateString(now: Date = new Date(), timezone: string = config.timezone): string {
    const formatter = new Intl.DateTimeFormat('en-CA', {
        timeZone: timezone,
        year: 'numeric',
        month: '2-digit',
        day: '2-digit',
    });
    return formatter.format(now);
}

/**
 * Primo istante (UTC) in cui la data locale nel fuso indicato è diversa da quella di `now`.
 * Ricerca binaria sui millisecondi: regge anche i giorni da 23/25 ore dei cambi d'ora.
 */
export function getNextLocalMidnight(now: Date, timezone: string = config.timezone): Date {
    const today = getLocalDateString(now, timezone);
    let low = now.getTime();
    let high = low + 26 * 60 * 60 * 1000;
    while (high - low > 1) {
        const mid = Math.floor((low + high) / 2);
        if (getLocalDateString(new Date(mid), timezone) === today) {
            low = mid;
        } else {
            high = mid;
        }
    }
    return new Date(high);
}

function getLocalMinutesOfDay(now: Date, timezone: string): number {
    const parts = new Intl.DateTimeFormat('en-GB', {
        timeZone: timezone,
        hour: '2-digit',
        minute: '2-digit',
        hourCycle: 'h23',
    }).formatToParts(now);
    const read = (type: 'hour' | 'minute'): number =>
        Number.parseInt(parts.find((part) => part.type === type)?.value ?? '0', 10);
    return read('hour') * 60 + read('minute');
}

/**
 * Istante (UTC) in cui oggi, nel fuso indicato, scatta l'orario `startMinutes`.
 * Null se quell'orario è già passato: la finestra giornaliera è aperta fino a mezzanotte.
 */
export function getLocalWindowOpening(now: Date, startMinutes: number, timezone: string = config.timezone): Date | null {
    if (getLocalMinutesOfDay(now, timezone) >= startMinutes) {
        return null;
    }
    let low = now.getTime();
    let high = getNextLocalMidnight(now, timezone).getTime();
    while (high - low > 1) {
        const mid = Math.floor((low + high) / 2);
        if (getLocalMinutesOfDay(new Date(mid), timezone) >= startMinutes) {
            high = mid;
        } else {
            low = mid;
        }
    }
    return new Date(high);
}

export function validateCriticalConfig(): string[] {
    return validateConfigSchema(config);
}

export type { AppConfig, LogLevelSetting };
