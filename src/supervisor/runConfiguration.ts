import { config } from '../config';
import { RolePreference, RunConfiguration, WorkerRole } from '../types/domain';

const MAX_INVITE_MESSAGE_LENGTH = 4096;

export interface SupervisorSettings {
    minDelaySeconds: number;
    maxDelaySeconds: number;
    defaultDelaySeconds: number;
    defaultBatchSize: number;
    defaultDailyLimit: number;
    retryLimit: number;
    idlePollSeconds: number;
    allowAdminAsWorker: boolean;
    allowUserWorkers: boolean;
    defaultInviteMessage: string;
    timezone: string;
}

export function supervisorSettingsFromConfig(): SupervisorSettings {
    return {
        minDelaySeconds: config.minDelaySeconds,
        maxDelaySeconds: config.maxDelaySeconds,
        defaultDelaySeconds: config.defaultDelaySeconds,
        defaultBatchSize: config.defaultBatchSize,
        defaultDailyLimit: config.defaultDailyLimit,
        retryLimit: config.retryLimit,
        idlePollSeconds: config.idlePollSeconds,
        allowAdminAsWorker: config.allowAdminAsWorker,
        allowUserWorkers: config.allowUserWorkers,
        defaultInviteMessage: config.defaultInviteMessage,
        timezone: config.timezone,
    };
}

/** Quello che arriva da CLI/API: solo la destinazione è obbligatoria. */
export interface RunConfigurationInput {
    destinationId: string;
    delaySeconds?: number;
    batchSize?: number;
    dailyLimitDefault?: number;
    inviteMessage?: string;
    allowAdminAsWorker?: boolean;
    allowUserWorkers?: boolean;
    rolePreference?: RolePreference;
    retryLimit?: number;
    dailyStartTime?: string;
}

const DAILY_START_TIME_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

/** Minuti dalla mezzanotte per un orario "HH:MM", null se il formato non è valido. */
export function parseDailyStartTime(raw: string): number | null {
    const match = DAILY_START_TIME_PATTERN.exec(raw);
    if (!match) return null;
    return Number.parseInt(match[1], 10) * 60 + Number.parseInt(match[2], 10);
}

export function buildRunConfiguration(input: RunConfigurationInput, settings: SupervisorSettings): RunConfiguration {
    const inviteMessage = (input.inviteMessage ?? settings.defaultInviteMessage).trim();
    return {
        destinationId: input.destinationId.trim(),
        delaySeconds: input.delaySeconds ?? settings.defaultDelaySeconds,
        batchSize: input.batchSize ?? settings.defaultBatchSize,
        dailyLimitDefault: input.dailyLimitDefault ?? settings.defaultDailyLimit,
        inviteMessage: inviteMessage || undefined,
        allowAdminAsWorker: input.allowAdminAsWorker ?? settings.allowAdminAsWorker,
        allowUserWorkers: input.allowUserWorkers ?? settings.allowUserWorkers,
        rolePreference: input.rolePreference ?? 'NONE',
        retryLimit: input.retryLimit ?? settings.retryLimit,
        dailyStartTime: input.dailyStartTime?.trim() || undefined,
    };
}

export function validateRunConfiguration(runConfig: RunConfiguration, settings: SupervisorSettings): string[] {
    const errors: string[] = [];
    if (!runConfig.destinationId) {
        errors.push('destinationId obbligatorio');
    }
    if (!Number.isFinite(runConfig.delaySeconds)
        || runConfig.delaySeconds < settings.minDelaySeconds
        || runConfig.delaySeconds > settings.maxDelaySeconds) {
        errors.push(`delaySeconds deve essere compreso tra ${settings.minDelaySeconds} e ${settings.maxDelaySeconds}`);
    }
    if (!Number.isInteger(runConfig.batchSize) || runConfig.batchSize < 1) {
        errors.push('batchSize deve essere un intero >= 1');
    }
    if (!Number.isInteger(runConfig.dailyLimitDefault) || runConfig.dailyLimitDefault < 1) {
        errors.push('dailyLimitDefault deve essere un intero >= 1');
    }
    if (!Number.isInteger(runConfig.retryLimit) || runConfig.retryLimit < 1) {
        errors.push('retryLimit deve essere un intero >= 1');
    }
    if (!runConfig.allowAdminAsWorker && !runConfig.allowUserWorkers) {
        errors.push('nessun ruolo worker abilitato (allowAdminAsWorker / allowUserWorkers)');
    }
    if (runConfig.inviteMessage && runConfig.inviteMessage.length > MAX_INVITE_MESSAGE_LENGTH) {
        errors.push(`inviteMessage supera ${MAX_INVITE_MESSAGE_LENGTH} caratteri`);
    }
    if (runConfig.dailyStartTime !== undefined && parseDailyStartTime(runConfig.dailyStartTime) === null) {
        errors.push('dailyStartTime deve essere nel formato HH:MM (00:00-23:59)');
    }
    return errors;
}

export function allowedRoles(runConfig: RunConfiguration): WorkerRole[] {
    const roles: WorkerRole[] = [];
    if (runConfig.allowAdminAsWorker) roles.push('ADMIN');
    if (runConfig.allowUserWorkers) roles.push('USER');
    return roles;
}

function isRolePreference(value: unknown): value is RolePreference {
    return value === 'NONE' || value === 'USER_FIRST' || value === 'ADMIN_FIRST';
}

function optionalNumber(value: unknown): number | undefined {
    return typeof value === 'number' ? value : undefined;
}

function optionalBoolean(value: unknown): boolean | undefined {
    return typeof value === 'boolean' ? value : undefined;
}

/**
 * Legge una configurazione da input non tipizzato (body HTTP, config_json persistito).
 * I campi di tipo sbagliato vengono ignorati e ripiegano sui default; la validazione vera resta a `startRun`.
 */
export function parseRunConfigurationInput(raw: unknown): RunConfigurationInput | null {
    if (!raw || typeof raw !== 'object') return null;
    const source: Record<string, unknown> = { ...raw };
    if (typeof source.destinationId !== 'string') return null;
    return {
        destinationId: source.destinationId,
        delaySeconds: optionalNumber(source.delaySeconds),
        batchSize: optionalNumber(source.batchSize),
        dailyLimitDefault: optionalNumber(source.dailyLimitDefault),
        inviteMessage: typeof source.inviteMessage === 'string' ? source.inviteMessage : undefined,
        allowAdminAsWorker: optionalBoolean(source.allowAdminAsWorker),
        allowUserWorkers: optionalBoolean(source.allowUserWorkers),
        rolePreference: isRolePreference(source.rolePreference) ? source.rolePreference : undefined,
        retryLimit: optionalNumber(source.retryLimit),
        dailyStartTime: typeof source.dailyStartTime === 'string' ? source.dailyStartTime : undefined,
    };
}
