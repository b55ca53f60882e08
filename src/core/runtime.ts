import { initDatabase, DatabaseManager } from '../db';
import { PlatformCapability } from '../platform/capability';
import { loadConfiguredCapability } from '../platform/capabilityLoader';
import { DryRunCapability } from '../platform/dryRunCapability';
import { Supervisor } from '../supervisor/supervisor';
import { setRunLogSink } from '../telemetry/logger';
import { SqlSupervisorStore } from './repositories';
import { MemoryStore } from './memoryStore';
import { SupervisorStore } from './repositories.types';

export interface Runtime {
    db: DatabaseManager;
    store: SqlSupervisorStore;
}

/** DB migrato + store SQL, con i log di run persistiti in `run_logs`. */
export async function openRuntime(): Promise<Runtime> {
    const db = await initDatabase();
    const store = new SqlSupervisorStore(db);
    setRunLogSink((entry) => store.appendRunLog({ ...entry, createdAt: new Date().toISOString() }));
    return { db, store };
}

/**
 * In dry-run la run gira su una copia in memoria di worker e coda: niente scritture sul DB
 * e nessuna chiamata alla piattaforma.
 */
export async function createDryRunStore(source: SupervisorStore): Promise<MemoryStore> {
    const memory = new MemoryStore();
    const nowIso = new Date().toISOString();
    for (const worker of await source.listWorkers()) {
        const created = await memory.createWorker({ name: worker.name, role: worker.role, dailyLimit: worker.daily_limit }, nowIso);
        await memory.saveWorker({ ...worker, id: created.id });
    }
    const pending = await source.listIdentifiersByStatus('PENDING');
    await memory.insertIdentifiers(pending.map((row) => row.value), nowIso);
    return memory;
}

export async function createSupervisor(store: SupervisorStore, dryRun: boolean): Promise<Supervisor> {
    const capability: PlatformCapability = dryRun ? new DryRunCapability() : await loadConfiguredCapability();
    return new Supervisor({ store, capability });
}
