import assert from 'assert';
import { beforeEach, describe, it } from 'node:test';
import { MemoryStore } from '../core/memoryStore';
import { DryRunCapability } from '../platform/dryRunCapability';
import { WorkerHealthProbe } from '../platform/capability';
import { CooldownRegistry } from '../supervisor/cooldownRegistry';
import { QuotaTracker } from '../supervisor/quotaTracker';
import { WorkerPool, WorkerSelectionFilter, compareWorkersForSelection } from '../supervisor/workerPool';
import { setLogLevel } from '../telemetry/logger';
import { WorkerRecord } from '../types/domain';

const T0 = new Date('2026-03-10T10:00:00.000Z');

function filter(overrides: Partial<WorkerSelectionFilter> = {}): WorkerSelectionFilter {
    return {
        allowedRoles: ['USER'],
        preference: 'NONE',
        inFlight: new Set<number>(),
        restingUntil: new Map<number, Date>(),
        excluded: new Set<number>(),
        ...overrides,
    };
}

function worker(overrides: Partial<WorkerRecord>): WorkerRecord {
    return {
        id: 1,
        name: 'w',
        role: 'USER',
        health: 'ACTIVE',
        daily_count: 0,
        daily_limit: null,
        cooldown_until: null,
        last_reset_date: null,
        last_used_at: null,
        ...overrides,
    };
}

class ScriptedHealthCapability extends DryRunCapability {
    constructor(private readonly probes: Map<number, WorkerHealthProbe | Error>) {
        super();
    }

    async getWorkerHealth(target: WorkerRecord): Promise<WorkerHealthProbe> {
        const probe = this.probes.get(target.id) ?? 'ACTIVE';
        if (probe instanceof Error) throw probe;
        return probe;
    }
}

describe('compareWorkersForSelection', () => {
    it('ordina per preferenza di ruolo, poi ultimo uso, poi id', () => {
        const neverUsed = worker({ id: 3 });
        const usedEarly = worker({ id: 2, last_used_at: '2026-03-10T09:00:00.000Z' });
        const usedLate = worker({ id: 1, last_used_at: '2026-03-10T09:30:00.000Z' });
        const admin = worker({ id: 4, role: 'ADMIN', last_used_at: '2026-03-10T09:45:00.000Z' });
        const all = [usedLate, admin, usedEarly, neverUsed];

        assert.deepEqual([...all].sort((a, b) => compareWorkersForSelection(a, b, 'NONE')).map((w) => w.id), [3, 2, 1, 4]);
        assert.deepEqual([...all].sort((a, b) => compareWorkersForSelection(a, b, 'ADMIN_FIRST')).map((w) => w.id), [4, 3, 2, 1]);
        assert.deepEqual(
            [worker({ id: 2 }), worker({ id: 1 })].sort((a, b) => compareWorkersForSelection(a, b, 'USER_FIRST')).map((w) => w.id),
            [1, 2]
        );
    });
});

describe('WorkerPool', () => {
    let store: MemoryStore;
    let pool: WorkerPool;

    beforeEach(async () => {
        setLogLevel('silent');
        store = new MemoryStore();
        await store.createWorker({ name: 'w1', role: 'USER' }, T0.toISOString());
        await store.createWorker({ name: 'w2', role: 'USER', dailyLimit: 1 }, T0.toISOString());
        await store.createWorker({ name: 'admin', role: 'ADMIN' }, T0.toISOString());
        const quota = new QuotaTracker(store, 10, 'UTC');
        pool = new WorkerPool(store, quota, new CooldownRegistry(store));
        await pool.load();
    });

    it('esclude ruoli non abilitati, worker in volo, a riposo ed esclusi', async () => {
        assert.equal((await pool.selectWorker(filter(), T0))?.id, 1);
        assert.equal((await pool.selectWorker(filter({ inFlight: new Set([1]) }), T0))?.id, 2);
        assert.equal((await pool.selectWorker(filter({ excluded: new Set([1]) }), T0))?.id, 2);
        assert.equal(
            (await pool.selectWorker(filter({ restingUntil: new Map([[1, new Date('2026-03-10T10:00:30.000Z')]]) }), T0))?.id,
            2
        );
        assert.equal(await pool.selectWorker(filter({ inFlight: new Set([1, 2]) }), T0), null);
        assert.equal(
            (await pool.selectWorker(filter({ allowedRoles: ['USER', 'ADMIN'], preference: 'ADMIN_FIRST' }), T0))?.id,
            3
        );
    });

    it('non seleziona un worker in cooldown prima della scadenza', async () => {
        const w1 = pool.get(1);
        assert.ok(w1);
        await pool.markCooling(w1, new Date('2026-03-10T10:01:00.000Z'));
        assert.equal((await store.getWorker(1))?.health, 'COOLING');

        const onlyW1 = filter({ excluded: new Set([2]) });
        assert.equal(await pool.selectWorker(onlyW1, T0), null);
        assert.equal((await pool.nextWakeInstant(onlyW1, T0))?.toISOString(), '2026-03-10T10:01:00.000Z');

        const later = new Date('2026-03-10T10:01:00.000Z');
        assert.equal((await pool.selectWorker(onlyW1, later))?.id, 1);
        const restored = await store.getWorker(1);
        assert.equal(restored?.health, 'ACTIVE');
        assert.equal(restored?.cooldown_until, null);
    });

    it('calcola il risveglio come il più tardi dei blocchi di ogni worker', async () => {
        const w2 = pool.get(2);
        assert.ok(w2);
        const quota = new QuotaTracker(store, 10, 'UTC');
        assert.equal(await quota.reserve(w2, T0), true);

        const onlyW2 = filter({
            excluded: new Set([1]),
            restingUntil: new Map([[2, new Date('2026-03-10T10:00:30.000Z')]]),
        });
        // quota esaurita: il riposo non basta, si aspetta la mezzanotte
        assert.equal((await pool.nextWakeInstant(onlyW2, T0))?.toISOString(), '2026-03-11T00:00:00.000Z');

        const both = filter({ restingUntil: new Map([[1, new Date('2026-03-10T10:00:45.000Z')]]) });
        assert.equal((await pool.nextWakeInstant(both, T0))?.toISOString(), '2026-03-10T10:00:45.000Z');
    });

    it('non ha un istante di risveglio se nessun worker può sbloccarsi da solo', async () => {
        const w1 = pool.get(1);
        const w2 = pool.get(2);
        assert.ok(w1);
        assert.ok(w2);
        await pool.markDisconnected(w1);
        await pool.markDisconnected(w2);
        assert.equal(await pool.nextWakeInstant(filter(), T0), null);
        assert.equal((await store.getWorker(2))?.health, 'DISCONNECTED');
    });

    it('aggiorna la salute dalle sonde della piattaforma', async () => {
        const w2 = pool.get(2);
        assert.ok(w2);
        await pool.markDisconnected(w2);

        const capability = new ScriptedHealthCapability(new Map<number, WorkerHealthProbe | Error>([
            [1, 'DISCONNECTED'],
            [2, 'ACTIVE'],
            [3, new Error('probe timeout')],
        ]));
        await pool.refreshHealth(capability);

        assert.deepEqual((await store.listWorkers()).map((w) => w.health), ['DISCONNECTED', 'ACTIVE', 'ACTIVE']);
    });

    it('registra l\'ultimo uso', async () => {
        const w1 = pool.get(1);
        assert.ok(w1);
        await pool.markUsed(w1, T0);
        assert.equal((await store.getWorker(1))?.last_used_at, T0.toISOString());
        assert.deepEqual(pool.list().map((w) => w.id), [1, 2, 3]);
    });
});
