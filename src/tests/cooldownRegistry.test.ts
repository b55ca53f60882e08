import assert from 'assert';
import { describe, it } from 'node:test';
import { MemoryStore } from '../core/memoryStore';
import { CooldownRegistry } from '../supervisor/cooldownRegistry';

const T0 = new Date('2026-03-10T10:00:00.000Z');

describe('CooldownRegistry', () => {
    it('mantiene la sospensione più lunga', async () => {
        const store = new MemoryStore();
        const worker = await store.createWorker({ name: 'w1', role: 'USER' }, T0.toISOString());
        const cooldowns = new CooldownRegistry(store);

        const first = await cooldowns.suspend(worker, new Date('2026-03-10T10:05:00.000Z'));
        assert.equal(first.toISOString(), '2026-03-10T10:05:00.000Z');
        const shorter = await cooldowns.suspend(worker, new Date('2026-03-10T10:01:00.000Z'));
        assert.equal(shorter.toISOString(), '2026-03-10T10:05:00.000Z');
        assert.equal((await store.getWorker(worker.id))?.cooldown_until, '2026-03-10T10:05:00.000Z');

        const longer = await cooldowns.suspend(worker, new Date('2026-03-10T11:00:00.000Z'));
        assert.equal(longer.toISOString(), '2026-03-10T11:00:00.000Z');
    });

    it('considera disponibile il worker dall\'istante di scadenza', async () => {
        const store = new MemoryStore();
        const worker = await store.createWorker({ name: 'w1', role: 'USER' }, T0.toISOString());
        const cooldowns = new CooldownRegistry(store);
        assert.equal(cooldowns.isAvailable(worker, T0), true);
        assert.equal(cooldowns.cooldownUntil(worker), null);

        await cooldowns.suspend(worker, new Date('2026-03-10T10:01:00.000Z'));
        assert.equal(cooldowns.isAvailable(worker, new Date('2026-03-10T10:00:59.999Z')), false);
        assert.equal(cooldowns.isAvailable(worker, new Date('2026-03-10T10:01:00.000Z')), true);
    });
});
