/**
 * repositories.types.ts — Tipi e interfacce del layer di persistenza
 *
 * Il supervisor dipende solo da `SupervisorStore`: l'implementazione SQL
 * (SQLite/Postgres) e quella in memoria per test e dry-run la implementano entrambe.
 */

import {
    IdentifierRecord,
    IdentifierStatus,
    IdentifierStatusCounts,
    LogLevel,
    RunLogRecord,
    RunRecord,
    RunStatus,
    WorkerRecord,
    WorkerRole,
} from '../types/domain';

// ─── Identificativi ───────────────────────────────────────────────────────────

export interface InsertIdentifiersResult {
    inserted: number;
    skipped: number;
}

// ─── Worker ───────────────────────────────────────────────────────────────────

export interface CreateWorkerInput {
    name: string;
    role: WorkerRole;
    dailyLimit?: number | null;
}

// ─── Log run ──────────────────────────────────────────────────────────────────

export interface AppendRunLogInput {
    runId: string | null;
    level: LogLevel;
    event: string;
    payload: Record<string, unknown>;
    createdAt: string;
}

// ─── Store ────────────────────────────────────────────────────────────────────

export interface SupervisorStore {
    /** Ordinati per id crescente (ordine di inserimento). */
    listIdentifiersByStatus(status: IdentifierStatus, limit?: number): Promise<IdentifierRecord[]>;
    getIdentifier(id: number): Promise<IdentifierRecord | null>;
    saveIdentifier(record: IdentifierRecord): Promise<void>;
    countIdentifiersByStatus(): Promise<IdentifierStatusCounts>;
    insertIdentifiers(values: string[], nowIso: string): Promise<InsertIdentifiersResult>;
    /** FAILED → PENDING con attempt_count azzerato. Ritorna quante righe sono state riaccodate. */
    requeueFailedIdentifiers(nowIso: string): Promise<number>;
    /** Pagina della coda in ordine di inserimento, qualunque stato. */
    listIdentifiers(offset: number, limit: number): Promise<IdentifierRecord[]>;
    deleteIdentifierByValue(value: string): Promise<boolean>;
    deleteAllIdentifiers(): Promise<number>;

    listWorkers(): Promise<WorkerRecord[]>;
    getWorker(id: number): Promise<WorkerRecord | null>;
    saveWorker(record: WorkerRecord): Promise<void>;
    createWorker(input: CreateWorkerInput, nowIso: string): Promise<WorkerRecord>;

    saveRun(record: RunRecord): Promise<void>;
    getRun(id: string): Promise<RunRecord | null>;
    listRunsByStatus(statuses: RunStatus[]): Promise<RunRecord[]>;

    appendRunLog(input: AppendRunLogInput): Promise<void>;
    listRunLogs(runId: string, limit?: number): Promise<RunLogRecord[]>;
}

export function emptyStatusCounts(): IdentifierStatusCounts {
    return { PENDING: 0, ADDED: 0, FAILED: 0, BLACKLISTED: 0 };
}
