import assert from 'assert';
import { beforeEach, describe, it } from 'node:test';
import { MemoryStore } from '../core/memoryStore';
import { QuotaTracker } from '../supervisor/quotaTracker';
import { WorkerRecord } from '../types/domain';

const T0 = new Date('2026-03-10T10:00:00.000Z');

describe('QuotaTracker', () => {
    let store: MemoryStore;
    let worker: WorkerRecord;

    beforeEach(async () => {
        store = new MemoryStore();
        worker = await store.createWorker({ name: 'w1', role: 'USER' }, T0.toISOString());
    });

    it('usa il limite del worker se presente, altrimenti il default della run', () => {
        const quota = new QuotaTracker(store, 2, 'UTC');
        assert.equal(quota.effectiveLimit(worker), 2);
        assert.equal(quota.effectiveLimit({ ...worker, daily_limit: 5 }), 5);
    });

    it('non supera mai il limite e persiste ogni prenotazione', async () => {
        const quota = new QuotaTracker(store, 2, 'UTC');
        assert.equal(await quota.reserve(worker, T0), true);
        assert.equal(await quota.reserve(worker, T0), true);
        assert.equal(await quota.reserve(worker, T0), false);
        assert.equal(await quota.remaining(worker, T0), 0);
        assert.equal((await store.getWorker(worker.id))?.daily_count, 2);

        await quota.release(worker);
        assert.equal(worker.daily_count, 1);
        assert.equal((await store.getWorker(worker.id))?.daily_count, 1);
    });

    it('azzera il contatore al cambio di data locale', async () => {
        const quota = new QuotaTracker(store, 2, 'UTC');
        await quota.reserve(worker, T0);
        await quota.reserve(worker, T0);
        assert.equal(await quota.resetIfNewDay(worker, T0), false);

        const nextDay = new Date('2026-03-11T00:00:00.000Z');
        assert.equal(await quota.resetIfNewDay(worker, nextDay), true);
        assert.equal(worker.daily_count, 0);
        assert.equal(worker.last_reset_date, '2026-03-11');
        assert.equal((await store.getWorker(worker.id))?.last_reset_date, '2026-03-11');
    });

    it('ragiona sulla data del fuso configurato', async () => {
        const quota = new QuotaTracker(store, 2, 'Europe/Rome');
        await quota.reserve(worker, T0);
        assert.equal(worker.last_reset_date, '2026-03-10');

        // 23:30 UTC è già l'11 marzo a Roma
        const lateEvening = new Date('2026-03-10T23:30:00.000Z');
        assert.equal(await quota.remaining(worker, lateEvening), 2);
        assert.equal(worker.last_reset_date, '2026-03-11');
        assert.equal(quota.nextResetInstant(T0).toISOString(), '2026-03-10T23:00:00.000Z');
    });

    it('calcola la prossima mezzanotte in UTC', () => {
        const quota = new QuotaTracker(store, 2, 'UTC');
        assert.equal(quota.nextResetInstant(T0).toISOString(), '2026-03-11T00:00:00.000Z');
    });
});
