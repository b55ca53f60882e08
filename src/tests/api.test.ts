import assert from 'assert';
import type { Server } from 'http';
import { after, before, describe, it } from 'node:test';
import { createApiServer } from '../api/server';
import { ManualClock } from '../core/clock';
import { MemoryStore } from '../core/memoryStore';
import { DryRunCapability } from '../platform/dryRunCapability';
import { Supervisor } from '../supervisor/supervisor';
import { setLogLevel } from '../telemetry/logger';

const API_KEY = 'test-secret';

describe('API HTTP', () => {
    let server: Server;
    let baseUrl = '';
    const store = new MemoryStore();
    const supervisor = new Supervisor({
        store,
        capability: new DryRunCapability(),
        clock: new ManualClock(new Date('2026-03-10T10:00:00.000Z')),
        settings: { minDelaySeconds: 5, maxDelaySeconds: 3600, timezone: 'UTC', allowUserWorkers: true },
    });

    async function call(method: string, path: string, body?: unknown): Promise<{ status: number; json: unknown }> {
        const response = await fetch(`${baseUrl}${path}`, {
            method,
            headers: { 'content-type': 'application/json', 'x-api-key': API_KEY },
            body: body === undefined ? undefined : JSON.stringify(body),
        });
        return { status: response.status, json: await response.json() };
    }

    before(async () => {
        setLogLevel('silent');
        const app = createApiServer({ store, supervisor, authEnabled: true, apiKey: API_KEY, trustedIps: [] });
        server = await new Promise<Server>((resolve) => {
            const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
        });
        const address = server.address();
        assert.ok(address && typeof address === 'object');
        baseUrl = `http://127.0.0.1:${address.port}`;
    });

    after(async () => {
        await new Promise<void>((resolve, reject) => {
            server.close((error) => (error ? reject(error) : resolve()));
        });
    });

    it('espone /api/health senza autenticazione', async () => {
        const response = await fetch(`${baseUrl}/api/health`);
        assert.equal(response.status, 200);
        const body: unknown = await response.json();
        assert.ok(body && typeof body === 'object');
        assert.equal('status' in body ? body.status : null, 'ok');
        assert.equal('activeRunId' in body ? body.activeRunId : undefined, null);
    });

    it('richiede la chiave API sugli altri endpoint', async () => {
        const anonymous = await fetch(`${baseUrl}/api/workers`);
        assert.equal(anonymous.status, 401);
        assert.deepEqual(await anonymous.json(), { error: 'Unauthorized' });

        const wrongKey = await fetch(`${baseUrl}/api/workers`, { headers: { 'x-api-key': 'wrong' } });
        assert.equal(wrongKey.status, 401);

        const bearer = await fetch(`${baseUrl}/api/workers`, { headers: { authorization: `Bearer ${API_KEY}` } });
        assert.equal(bearer.status, 200);
        assert.deepEqual(await bearer.json(), []);
    });

    it('importa numeri da testo e li elenca con paginazione', async () => {
        assert.deepEqual(await call('POST', '/api/identifiers/import', { text: '+391\n+392\nfoo\n+391' }), {
            status: 200,
            json: { found: 2, inserted: 2, skipped: 0 },
        });
        assert.equal((await call('POST', '/api/identifiers/import', { text: 'nessun numero' })).status, 400);
        assert.equal((await call('POST', '/api/identifiers/import', {})).status, 400);

        assert.deepEqual((await call('GET', '/api/identifiers/stats')).json, { PENDING: 2, ADDED: 0, FAILED: 0, BLACKLISTED: 0 });
        const page = await call('GET', '/api/identifiers?offset=1&limit=1');
        assert.equal(page.status, 200);
        const pageBody = page.json;
        assert.ok(pageBody && typeof pageBody === 'object' && 'identifiers' in pageBody && Array.isArray(pageBody.identifiers));
        assert.equal(pageBody.identifiers.length, 1);
        assert.equal('total' in pageBody ? pageBody.total : null, 2);
    });

    it('valida la configurazione della run', async () => {
        const missing = await call('POST', '/api/runs', {});
        assert.equal(missing.status, 400);
        assert.deepEqual(missing.json, { error: 'destinationId obbligatorio.', errors: ['destinationId obbligatorio'] });

        const invalid = await call('POST', '/api/runs', { destinationId: 'group-1', delaySeconds: 1 });
        assert.equal(invalid.status, 400);
        assert.ok(invalid.json && typeof invalid.json === 'object' && 'errors' in invalid.json);
        assert.deepEqual(invalid.json.errors, ['delaySeconds deve essere compreso tra 5 e 3600']);
    });

    it('avvia, mette in pausa e ferma una run, bloccando le cancellazioni mentre è attiva', async () => {
        // nessun worker registrato: la run resta attiva finché non viene fermata
        const started = await call('POST', '/api/runs', { destinationId: 'group-1' });
        assert.equal(started.status, 201);
        assert.ok(started.json && typeof started.json === 'object' && 'runId' in started.json && typeof started.json.runId === 'string');
        const runId = started.json.runId;

        const progress = await call('GET', `/api/runs/${runId}`);
        assert.equal(progress.status, 200);
        assert.ok(progress.json && typeof progress.json === 'object' && 'status' in progress.json);
        assert.equal(progress.json.status, 'RUNNING');

        const conflict = await call('POST', '/api/runs', { destinationId: 'group-2' });
        assert.equal(conflict.status, 409);
        assert.ok(conflict.json && typeof conflict.json === 'object' && 'activeRunId' in conflict.json);
        assert.equal(conflict.json.activeRunId, runId);

        const blockedDelete = await call('DELETE', '/api/identifiers');
        assert.equal(blockedDelete.status, 409);

        const paused = await call('POST', `/api/runs/${runId}/pause`);
        assert.ok(paused.json && typeof paused.json === 'object' && 'status' in paused.json);
        assert.equal(paused.json.status, 'PAUSED');

        const stopped = await call('POST', `/api/runs/${runId}/stop`);
        assert.equal(stopped.status, 200);
        assert.ok(stopped.json && typeof stopped.json === 'object' && 'status' in stopped.json);
        assert.equal(stopped.json.status, 'STOPPED');

        assert.deepEqual(await call('DELETE', '/api/identifiers/%2B391'), { status: 200, json: { deleted: true } });
        assert.deepEqual(await call('DELETE', '/api/identifiers'), { status: 200, json: { deleted: 1 } });
    });

    it('restituisce i log della run con il payload decodificato', async () => {
        await store.appendRunLog({
            runId: 'run-logs',
            level: 'WARN',
            event: 'run.stalled',
            payload: { pending: 3 },
            createdAt: '2026-03-10T10:00:00.000Z',
        });
        assert.deepEqual(await call('GET', '/api/runs/run-logs/logs'), {
            status: 200,
            json: [{
                id: 1,
                runId: 'run-logs',
                level: 'WARN',
                event: 'run.stalled',
                payload: { pending: 3 },
                createdAt: '2026-03-10T10:00:00.000Z',
            }],
        });
    });

    it('risponde 404 su run e endpoint inesistenti', async () => {
        assert.equal((await call('GET', '/api/runs/missing')).status, 404);
        assert.deepEqual(await call('GET', '/api/unknown'), { status: 404, json: { error: 'Endpoint non trovato.' } });
    });
});
