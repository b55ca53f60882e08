export type IdentifierStatus =
    | 'PENDING'
    | 'ADDED'
    | 'FAILED'
    | 'BLACKLISTED';

export type WorkerRole = 'ADMIN' | 'USER';

export type WorkerHealth = 'ACTIVE' | 'COOLING' | 'DISCONNECTED';

export type RunStatus = 'RUNNING' | 'PAUSED' | 'STOPPED' | 'COMPLETED';

export type RolePreference = 'NONE' | 'USER_FIRST' | 'ADMIN_FIRST';

export interface IdentifierRecord {
    id: number;
    value: string;
    status: IdentifierStatus;
    attempt_count: number;
    last_attempt_at: string | null;
    last_error: string | null;
    created_at: string;
    updated_at: string | null;
}

export interface WorkerRecord {
    id: number;
    name: string;
    role: WorkerRole;
    health: WorkerHealth;
    daily_count: number;
    daily_limit: number | null;
    cooldown_until: string | null;
    last_reset_date: string | null;
    last_used_at: string | null;
}

export interface RunConfiguration {
    destinationId: string;
    delaySeconds: number;
    batchSize: number;
    dailyLimitDefault: number;
    inviteMessage?: string;
    allowAdminAsWorker: boolean;
    allowUserWorkers: boolean;
    rolePreference: RolePreference;
    retryLimit: number;
    /** "HH:MM" nel fuso TIMEZONE: prima di quest'ora del giorno non parte nessun tentativo. */
    dailyStartTime?: string;
}

export interface RunRecord {
    id: string;
    destination_id: string;
    status: RunStatus;
    config_json: string;
    started_at: string;
    finished_at: string | null;
    processed_count: number;
    success_count: number;
    failure_count: number;
    last_error: string | null;
}

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface RunLogRecord {
    id: number;
    run_id: string | null;
    level: LogLevel;
    event: string;
    payload_json: string;
    created_at: string;
}

export interface IdentifierStatusCounts {
    PENDING: number;
    ADDED: number;
    FAILED: number;
    BLACKLISTED: number;
}
