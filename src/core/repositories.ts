import { DatabaseManager } from '../db';
import {
    IdentifierRecord,
    IdentifierStatus,
    IdentifierStatusCounts,
    RunLogRecord,
    RunRecord,
    RunStatus,
    WorkerRecord,
} from '../types/domain';
import {
    type AppendRunLogInput,
    type CreateWorkerInput,
    type InsertIdentifiersResult,
    type SupervisorStore,
} from './repositories.types';
import * as identifiers from './repositories/identifiers';
import * as runs from './repositories/runs';
import * as workers from './repositories/workers';

export * from './repositories.types';
export { parsePayload } from './repositories/shared';

/** `SupervisorStore` su SQLite o Postgres, attraverso `DatabaseManager`. */
export class SqlSupervisorStore implements SupervisorStore {
    constructor(private readonly db: DatabaseManager) {}

    listIdentifiersByStatus(status: IdentifierStatus, limit?: number): Promise<IdentifierRecord[]> {
        return identifiers.listIdentifiersByStatus(this.db, status, limit);
    }

    getIdentifier(id: number): Promise<IdentifierRecord | null> {
        return identifiers.getIdentifierById(this.db, id);
    }

    saveIdentifier(record: IdentifierRecord): Promise<void> {
        return identifiers.saveIdentifier(this.db, record);
    }

    countIdentifiersByStatus(): Promise<IdentifierStatusCounts> {
        return identifiers.countIdentifiersByStatus(this.db);
    }

    insertIdentifiers(values: string[], nowIso: string): Promise<InsertIdentifiersResult> {
        return identifiers.insertIdentifiers(this.db, values, nowIso);
    }

    requeueFailedIdentifiers(nowIso: string): Promise<number> {
        return identifiers.requeueFailedIdentifiers(this.db, nowIso);
    }

    listIdentifiers(offset: number, limit: number): Promise<IdentifierRecord[]> {
        return identifiers.listIdentifiers(this.db, offset, limit);
    }

    deleteIdentifierByValue(value: string): Promise<boolean> {
        return identifiers.deleteIdentifierByValue(this.db, value);
    }

    deleteAllIdentifiers(): Promise<number> {
        return identifiers.deleteAllIdentifiers(this.db);
    }

    listWorkers(): Promise<WorkerRecord[]> {
        return workers.listWorkers(this.db);
    }

    getWorker(id: number): Promise<WorkerRecord | null> {
        return workers.getWorkerById(this.db, id);
    }

    saveWorker(record: WorkerRecord): Promise<void> {
        return workers.saveWorker(this.db, record);
    }

    createWorker(input: CreateWorkerInput, nowIso: string): Promise<WorkerRecord> {
        return workers.createWorker(this.db, input, nowIso);
    }

    saveRun(record: RunRecord): Promise<void> {
        return runs.saveRun(this.db, record);
    }

    getRun(id: string): Promise<RunRecord | null> {
        return runs.getRunById(this.db, id);
    }

    listRunsByStatus(statuses: RunStatus[]): Promise<RunRecord[]> {
        return runs.listRunsByStatus(this.db, statuses);
    }

    appendRunLog(input: AppendRunLogInput): Promise<void> {
        return runs.appendRunLog(this.db, input);
    }

    listRunLogs(runId: string, limit?: number): Promise<RunLogRecord[]> {
        return runs.listRunLogs(this.db, runId, limit);
    }
}
