import { config, validateCriticalConfig } from '../config';
import { DatabaseManager } from '../db';
import { PlatformCapability } from '../platform/capability';
import { errorMessage } from '../supervisor/errors';
import { IdentifierStatusCounts, WorkerHealth } from '../types/domain';
import { SupervisorStore } from './repositories.types';

export interface DoctorWorkerSessionReport {
    workerId: number;
    workerName: string;
    storedHealth: WorkerHealth;
    probe: 'ACTIVE' | 'DISCONNECTED' | 'ERROR' | 'SKIPPED';
    error: string | null;
}

export interface DoctorReport {
    dbPath: string;
    dialect: DatabaseManager['dialect'];
    dbIntegrityOk: boolean;
    configOk: boolean;
    configErrors: string[];
    timezone: string;
    identifiers: IdentifierStatusCounts;
    workers: {
        total: number;
        byHealth: Record<WorkerHealth, number>;
        sessions: DoctorWorkerSessionReport[];
    };
    capability: {
        configured: boolean;
        modulePath: string | null;
        integrityPinned: boolean;
    };
    activeRuns: Array<{ id: string; status: string; destinationId: string; startedAt: string }>;
}

async function runDbIntegrityCheck(db: DatabaseManager): Promise<boolean> {
    if (db.dialect === 'postgres') {
        const row = await db.get<{ ok: number | string }>(`SELECT 1 as ok`);
        return Number(row?.ok ?? 0) === 1;
    }
    const integrityRow = await db.get<{ integrity_check?: string; integrity?: string }>(`PRAGMA integrity_check`);
    const status = (integrityRow?.integrity_check ?? integrityRow?.integrity ?? '').toLowerCase();
    return status === 'ok';
}

/**
 * Diagnostica di avvio. Con una capability disponibile interroga anche lo stato di ogni sessione worker,
 * senza modificare i record.
 */
export async function runDoctor(
    db: DatabaseManager,
    store: SupervisorStore,
    capability: PlatformCapability | null
): Promise<DoctorReport> {
    const dbIntegrityOk = await runDbIntegrityCheck(db);
    const configErrors = validateCriticalConfig();
    const identifiers = await store.countIdentifiersByStatus();
    const workers = await store.listWorkers();
    const activeRuns = await store.listRunsByStatus(['RUNNING', 'PAUSED']);

    const byHealth: Record<WorkerHealth, number> = { ACTIVE: 0, COOLING: 0, DISCONNECTED: 0 };
    const sessions: DoctorWorkerSessionReport[] = [];
    for (const worker of workers) {
        byHealth[worker.health] += 1;
        if (!capability) {
            sessions.push({ workerId: worker.id, workerName: worker.name, storedHealth: worker.health, probe: 'SKIPPED', error: null });
            continue;
        }
        try {
            const probe = await capability.getWorkerHealth({ ...worker });
            sessions.push({ workerId: worker.id, workerName: worker.name, storedHealth: worker.health, probe, error: null });
        } catch (error) {
            sessions.push({
                workerId: worker.id,
                workerName: worker.name,
                storedHealth: worker.health,
                probe: 'ERROR',
                error: errorMessage(error),
            });
        }
    }

    return {
        dbPath: db.dialect === 'postgres' ? '(postgres)' : config.dbPath,
        dialect: db.dialect,
        dbIntegrityOk,
        configOk: configErrors.length === 0,
        configErrors,
        timezone: config.timezone,
        identifiers,
        workers: {
            total: workers.length,
            byHealth,
            sessions,
        },
        capability: {
            configured: !!config.platformCapabilityModule,
            modulePath: config.platformCapabilityModule || null,
            integrityPinned: !!config.platformCapabilitySha256,
        },
        activeRuns: activeRuns.map((run) => ({
            id: run.id,
            status: run.status,
            destinationId: run.destination_id,
            startedAt: run.started_at,
        })),
    };
}
