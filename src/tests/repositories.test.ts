import assert from 'assert';
import { after, before, describe, it } from 'node:test';
import { applyMigrations, DatabaseManager, openSqliteDatabase, toPostgresSql } from '../db';
import { SqlSupervisorStore } from '../core/repositories';
import { RunRecord } from '../types/domain';

const NOW = '2026-03-10T10:00:00.000Z';

function runRecord(overrides: Partial<RunRecord>): RunRecord {
    return {
        id: 'run-1',
        destination_id: 'group-1',
        status: 'RUNNING',
        config_json: JSON.stringify({ destinationId: 'group-1' }),
        started_at: NOW,
        finished_at: null,
        processed_count: 0,
        success_count: 0,
        failure_count: 0,
        last_error: null,
        ...overrides,
    };
}

describe('SqlSupervisorStore (sqlite in memoria)', () => {
    let db: DatabaseManager;
    let store: SqlSupervisorStore;

    before(async () => {
        db = await openSqliteDatabase(':memory:');
        await applyMigrations(db);
        store = new SqlSupervisorStore(db);
    });

    after(async () => {
        await db.close();
    });

    it('importa gli identificativi in modo idempotente', async () => {
        assert.deepEqual(await store.insertIdentifiers(['+391', '+392', '+391'], NOW), { inserted: 2, skipped: 1 });
        assert.deepEqual(await store.insertIdentifiers(['+392', '+393'], NOW), { inserted: 1, skipped: 1 });

        const firstTwo = await store.listIdentifiersByStatus('PENDING', 2);
        assert.deepEqual(firstTwo.map((row) => row.value), ['+391', '+392']);
        assert.equal(firstTwo[0].attempt_count, 0);
        assert.equal(firstTwo[0].created_at, NOW);
        assert.deepEqual((await store.listIdentifiers(1, 1)).map((row) => row.value), ['+392']);
    });

    it('persiste le transizioni e conta per stato', async () => {
        const first = await store.getIdentifier(1);
        assert.ok(first);
        await store.saveIdentifier({ ...first, status: 'ADDED', attempt_count: 1, last_attempt_at: NOW, updated_at: NOW });
        const second = await store.getIdentifier(2);
        assert.ok(second);
        await store.saveIdentifier({ ...second, status: 'FAILED', attempt_count: 3, last_error: 'boom', updated_at: NOW });

        assert.deepEqual(await store.countIdentifiersByStatus(), { PENDING: 1, ADDED: 1, FAILED: 1, BLACKLISTED: 0 });
        assert.deepEqual((await store.listIdentifiersByStatus('PENDING')).map((row) => row.value), ['+393']);

        assert.equal(await store.requeueFailedIdentifiers(NOW), 1);
        const requeued = await store.getIdentifier(2);
        assert.equal(requeued?.status, 'PENDING');
        assert.equal(requeued?.attempt_count, 0);
        assert.equal(requeued?.last_error, 'boom');
    });

    it('cancella identificativi per valore e in blocco', async () => {
        assert.equal(await store.deleteIdentifierByValue('+393'), true);
        assert.equal(await store.deleteIdentifierByValue('+393'), false);
        assert.equal(await store.deleteAllIdentifiers(), 2);
        assert.deepEqual(await store.countIdentifiersByStatus(), { PENDING: 0, ADDED: 0, FAILED: 0, BLACKLISTED: 0 });
    });

    it('registra i worker con nome univoco e ne salva lo stato', async () => {
        const created = await store.createWorker({ name: ' sessione-1 ', role: 'ADMIN', dailyLimit: 40 }, NOW);
        assert.deepEqual(created, {
            id: 1,
            name: 'sessione-1',
            role: 'ADMIN',
            health: 'ACTIVE',
            daily_count: 0,
            daily_limit: 40,
            cooldown_until: null,
            last_reset_date: null,
            last_used_at: null,
        });
        await assert.rejects(store.createWorker({ name: 'sessione-1', role: 'USER' }, NOW), /Worker già registrato: sessione-1/);
        await assert.rejects(store.createWorker({ name: '  ', role: 'USER' }, NOW), /Nome worker obbligatorio/);

        await store.saveWorker({ ...created, health: 'COOLING', daily_count: 3, cooldown_until: NOW, last_reset_date: '2026-03-10' });
        const saved = await store.getWorker(1);
        assert.equal(saved?.health, 'COOLING');
        assert.equal(saved?.daily_count, 3);
        assert.equal(saved?.cooldown_until, NOW);
        assert.equal(saved?.last_reset_date, '2026-03-10');
        assert.equal(await store.getWorker(99), null);
    });

    it('crea e aggiorna le run, filtrando per stato', async () => {
        await store.saveRun(runRecord({ id: 'run-1', started_at: '2026-03-10T09:00:00.000Z' }));
        await store.saveRun(runRecord({ id: 'run-2', status: 'PAUSED', started_at: '2026-03-10T08:00:00.000Z' }));
        await store.saveRun(runRecord({ id: 'run-1', status: 'COMPLETED', finished_at: NOW, processed_count: 5, success_count: 4, failure_count: 1 }));

        const completed = await store.getRun('run-1');
        assert.equal(completed?.status, 'COMPLETED');
        assert.equal(completed?.processed_count, 5);
        assert.equal(completed?.started_at, '2026-03-10T09:00:00.000Z');
        assert.deepEqual((await store.listRunsByStatus(['RUNNING', 'PAUSED'])).map((run) => run.id), ['run-2']);
        assert.deepEqual((await store.listRunsByStatus(['COMPLETED', 'PAUSED'])).map((run) => run.id), ['run-2', 'run-1']);
        assert.deepEqual(await store.listRunsByStatus([]), []);
    });

    it('conserva i log di run in ordine di inserimento', async () => {
        await store.appendRunLog({ runId: 'run-1', level: 'INFO', event: 'run.started', payload: { batchSize: 2 }, createdAt: NOW });
        await store.appendRunLog({ runId: 'run-2', level: 'WARN', event: 'run.stalled', payload: {}, createdAt: NOW });
        await store.appendRunLog({ runId: 'run-1', level: 'INFO', event: 'run.completed', payload: {}, createdAt: NOW });

        const logs = await store.listRunLogs('run-1');
        assert.deepEqual(logs.map((row) => row.event), ['run.started', 'run.completed']);
        assert.equal(logs[0].payload_json, '{"batchSize":2}');
        assert.deepEqual((await store.listRunLogs('run-1', 1)).map((row) => row.event), ['run.started']);
    });
});

describe('database', () => {
    it('applica le migrazioni una sola volta', async () => {
        const db = await openSqliteDatabase(':memory:');
        try {
            assert.deepEqual(await applyMigrations(db), ['001_init.sql']);
            assert.deepEqual(await applyMigrations(db), []);
        } finally {
            await db.close();
        }
    });

    it('annulla la transazione se la callback lancia', async () => {
        const db = await openSqliteDatabase(':memory:');
        try {
            await applyMigrations(db);
            await assert.rejects(
                db.transaction(async (tx) => {
                    await tx.run(
                        `INSERT INTO identifiers (value, status, attempt_count, created_at) VALUES (?, 'PENDING', 0, ?)`,
                        ['+391', NOW],
                    );
                    throw new Error('interrotta');
                }),
                /interrotta/,
            );
            const row = await db.get<{ total: number }>(`SELECT COUNT(*) AS total FROM identifiers`);
            assert.equal(row?.total, 0);
        } finally {
            await db.close();
        }
    });

    it('traduce placeholder e INSERT OR IGNORE per Postgres', () => {
        assert.equal(
            toPostgresSql('INSERT OR IGNORE INTO workers (name, role) VALUES (?, ?);'),
            'INSERT INTO workers (name, role) VALUES ($1, $2) ON CONFLICT DO NOTHING',
        );
        assert.equal(toPostgresSql('SELECT * FROM runs WHERE id = ?'), 'SELECT * FROM runs WHERE id = $1');
    });
});
