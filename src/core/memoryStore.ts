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
    emptyStatusCounts,
    type AppendRunLogInput,
    type CreateWorkerInput,
    type InsertIdentifiersResult,
    type SupervisorStore,
} from './repositories.types';

/**
 * Store in processo, usato dai test e dal `run --dry-run`.
 * Ogni lettura e scrittura copia i record: chi chiama non può mutare lo stato interno per riferimento.
 */
export class MemoryStore implements SupervisorStore {
    private readonly identifiers = new Map<number, IdentifierRecord>();
    private readonly workers = new Map<number, WorkerRecord>();
    private readonly runs = new Map<string, RunRecord>();
    private readonly logs: RunLogRecord[] = [];
    private nextIdentifierId = 1;
    private nextWorkerId = 1;
    private nextLogId = 1;

    async listIdentifiersByStatus(status: IdentifierStatus, limit?: number): Promise<IdentifierRecord[]> {
        const rows = [...this.identifiers.values()]
            .filter((row) => row.status === status)
            .sort((a, b) => a.id - b.id)
            .map((row) => ({ ...row }));
        return limit === undefined ? rows : rows.slice(0, Math.max(0, Math.floor(limit)));
    }

    async getIdentifier(id: number): Promise<IdentifierRecord | null> {
        const row = this.identifiers.get(id);
        return row ? { ...row } : null;
    }

    async saveIdentifier(record: IdentifierRecord): Promise<void> {
        if (!this.identifiers.has(record.id)) {
            throw new Error(`Identificativo inesistente: ${record.id}`);
        }
        this.identifiers.set(record.id, { ...record });
    }

    async countIdentifiersByStatus(): Promise<IdentifierStatusCounts> {
        const counts = emptyStatusCounts();
        for (const row of this.identifiers.values()) {
            counts[row.status] += 1;
        }
        return counts;
    }

    async insertIdentifiers(values: string[], nowIso: string): Promise<InsertIdentifiersResult> {
        const known = new Set([...this.identifiers.values()].map((row) => row.value));
        let inserted = 0;
        let skipped = 0;
        for (const value of values) {
            if (known.has(value)) {
                skipped++;
                continue;
            }
            known.add(value);
            const id = this.nextIdentifierId++;
            this.identifiers.set(id, {
                id,
                value,
                status: 'PENDING',
                attempt_count: 0,
                last_attempt_at: null,
                last_error: null,
                created_at: nowIso,
                updated_at: null,
            });
            inserted++;
        }
        return { inserted, skipped };
    }

    async requeueFailedIdentifiers(nowIso: string): Promise<number> {
        let changed = 0;
        for (const row of this.identifiers.values()) {
            if (row.status !== 'FAILED') continue;
            this.identifiers.set(row.id, { ...row, status: 'PENDING', attempt_count: 0, updated_at: nowIso });
            changed++;
        }
        return changed;
    }

    async listIdentifiers(offset: number, limit: number): Promise<IdentifierRecord[]> {
        return [...this.identifiers.values()]
            .sort((a, b) => a.id - b.id)
            .slice(Math.max(0, Math.floor(offset)), Math.max(0, Math.floor(offset)) + Math.max(1, Math.floor(limit)))
            .map((row) => ({ ...row }));
    }

    async deleteIdentifierByValue(value: string): Promise<boolean> {
        for (const row of this.identifiers.values()) {
            if (row.value === value) {
                this.identifiers.delete(row.id);
                return true;
            }
        }
        return false;
    }

    async deleteAllIdentifiers(): Promise<number> {
        const total = this.identifiers.size;
        this.identifiers.clear();
        return total;
    }

    async listWorkers(): Promise<WorkerRecord[]> {
        return [...this.workers.values()].sort((a, b) => a.id - b.id).map((row) => ({ ...row }));
    }

    async getWorker(id: number): Promise<WorkerRecord | null> {
        const row = this.workers.get(id);
        return row ? { ...row } : null;
    }

    async saveWorker(record: WorkerRecord): Promise<void> {
        if (!this.workers.has(record.id)) {
            throw new Error(`Worker inesistente: ${record.id}`);
        }
        this.workers.set(record.id, { ...record });
    }

    async createWorker(input: CreateWorkerInput, _nowIso: string): Promise<WorkerRecord> {
        const name = input.name.trim();
        if (!name) {
            throw new Error('Nome worker obbligatorio.');
        }
        if ([...this.workers.values()].some((row) => row.name === name)) {
            throw new Error(`Worker già registrato: ${name}`);
        }
        const record: WorkerRecord = {
            id: this.nextWorkerId++,
            name,
            role: input.role,
            health: 'ACTIVE',
            daily_count: 0,
            daily_limit: input.dailyLimit ?? null,
            cooldown_until: null,
            last_reset_date: null,
            last_used_at: null,
        };
        this.workers.set(record.id, record);
        return { ...record };
    }

    async saveRun(record: RunRecord): Promise<void> {
        this.runs.set(record.id, { ...record });
    }

    async getRun(id: string): Promise<RunRecord | null> {
        const row = this.runs.get(id);
        return row ? { ...row } : null;
    }

    async listRunsByStatus(statuses: RunStatus[]): Promise<RunRecord[]> {
        return [...this.runs.values()]
            .filter((row) => statuses.includes(row.status))
            .sort((a, b) => a.started_at.localeCompare(b.started_at) || a.id.localeCompare(b.id))
            .map((row) => ({ ...row }));
    }

    async appendRunLog(input: AppendRunLogInput): Promise<void> {
        this.logs.push({
            id: this.nextLogId++,
            run_id: input.runId,
            level: input.level,
            event: input.event,
            payload_json: JSON.stringify(input.payload),
            created_at: input.createdAt,
        });
    }

    async listRunLogs(runId: string, limit: number = 200): Promise<RunLogRecord[]> {
        return this.logs.filter((row) => row.run_id === runId).slice(0, limit).map((row) => ({ ...row }));
    }
}
