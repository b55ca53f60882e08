import assert from 'assert';
import { describe, it } from 'node:test';
import { MemoryStore } from '../core/memoryStore';
import { IdentifierTransitionError } from '../supervisor/errors';
import { StatusLedger, isValidIdentifierTransition } from '../supervisor/statusLedger';
import { IdentifierRecord } from '../types/domain';

const T0 = new Date('2026-03-10T10:00:00.000Z');

async function seed(values: string[]): Promise<MemoryStore> {
    const store = new MemoryStore();
    await store.insertIdentifiers(values, T0.toISOString());
    return store;
}

async function requireIdentifier(store: MemoryStore, id: number): Promise<IdentifierRecord> {
    const record = await store.getIdentifier(id);
    assert.ok(record, `identificativo ${id} mancante`);
    return record;
}

describe('isValidIdentifierTransition', () => {
    it('ammette solo le transizioni previste', () => {
        assert.equal(isValidIdentifierTransition('PENDING', 'ADDED'), true);
        assert.equal(isValidIdentifierTransition('PENDING', 'BLACKLISTED'), true);
        assert.equal(isValidIdentifierTransition('PENDING', 'FAILED'), true);
        assert.equal(isValidIdentifierTransition('FAILED', 'PENDING'), true);
        assert.equal(isValidIdentifierTransition('ADDED', 'PENDING'), false);
        assert.equal(isValidIdentifierTransition('BLACKLISTED', 'PENDING'), false);
        assert.equal(isValidIdentifierTransition('FAILED', 'ADDED'), false);
    });
});

describe('StatusLedger', () => {
    it('serve la coda in ordine saltando gli identificativi già presi', async () => {
        const store = await seed(['+391', '+392']);
        const ledger = new StatusLedger(store, 3);

        assert.equal((await ledger.nextPending())?.value, '+391');
        assert.equal(ledger.claim(1), true);
        assert.equal(ledger.claim(1), false);
        assert.equal(ledger.isClaimed(1), true);
        assert.equal((await ledger.nextPending())?.value, '+392');
        assert.equal(ledger.claim(2), true);
        assert.equal(await ledger.nextPending(), null);

        ledger.release(1);
        assert.equal((await ledger.nextPending())?.value, '+391');
    });

    it('registra gli esiti terminali e rilascia il claim', async () => {
        const store = await seed(['+391', '+392']);
        const ledger = new StatusLedger(store, 3);
        ledger.claim(1);

        const added = await ledger.recordOutcome(await requireIdentifier(store, 1), { kind: 'OK' }, T0);
        assert.deepEqual([added.identifier.status, added.identifier.attempt_count, added.processed, added.success], ['ADDED', 1, true, true]);
        assert.equal(added.identifier.last_attempt_at, T0.toISOString());
        assert.equal(ledger.isClaimed(1), false);

        const blacklisted = await ledger.recordOutcome(await requireIdentifier(store, 2), { kind: 'PRIVACY_RESTRICTED' }, T0);
        assert.deepEqual([blacklisted.identifier.status, blacklisted.processed, blacklisted.success], ['BLACKLISTED', true, false]);

        const counts = await ledger.counts();
        assert.deepEqual(counts, { PENDING: 0, ADDED: 1, FAILED: 0, BLACKLISTED: 1 });
    });

    it('rifiuta un esito su un identificativo già chiuso', async () => {
        const store = await seed(['+391']);
        const ledger = new StatusLedger(store, 3);
        await ledger.recordOutcome(await requireIdentifier(store, 1), { kind: 'OK' }, T0);

        await assert.rejects(
            ledger.recordOutcome(await requireIdentifier(store, 1), { kind: 'OK' }, T0),
            IdentifierTransitionError
        );
    });

    it('rimette in coda gli errori sconosciuti fino al limite di tentativi', async () => {
        const store = await seed(['+391']);
        const ledger = new StatusLedger(store, 2);

        const first = await ledger.recordOutcome(await requireIdentifier(store, 1), { kind: 'UNKNOWN', detail: 'timeout' }, T0);
        assert.deepEqual([first.identifier.status, first.identifier.attempt_count, first.identifier.last_error], ['PENDING', 1, 'timeout']);
        assert.deepEqual([first.processed, first.success], [true, false]);

        const second = await ledger.recordOutcome(await requireIdentifier(store, 1), { kind: 'UNKNOWN', detail: 'timeout' }, T0);
        assert.deepEqual([second.identifier.status, second.identifier.attempt_count], ['FAILED', 2]);

        assert.equal(await ledger.requeueFailed(T0), 1);
        const requeued = await requireIdentifier(store, 1);
        assert.deepEqual([requeued.status, requeued.attempt_count], ['PENDING', 0]);
    });

    it('lascia PENDING gli esiti attribuibili al worker', async () => {
        const store = await seed(['+391']);
        const ledger = new StatusLedger(store, 3);

        const limited = await ledger.recordOutcome(await requireIdentifier(store, 1), { kind: 'RATE_LIMITED', waitSeconds: 30 }, T0);
        assert.deepEqual([limited.identifier.status, limited.identifier.attempt_count, limited.processed], ['PENDING', 0, false]);
        assert.equal(limited.identifier.last_error, 'RATE_LIMITED(30s)');

        const invalid = await ledger.recordOutcome(await requireIdentifier(store, 1), { kind: 'INVALID_SESSION' }, T0);
        assert.deepEqual([invalid.identifier.status, invalid.processed], ['PENDING', false]);
        assert.equal(invalid.identifier.last_error, 'INVALID_SESSION');
    });
});
