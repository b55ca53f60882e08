import express from 'express';
import cors from 'cors';
import { timingSafeEqual } from 'crypto';
import type { Server } from 'http';
import rateLimit from 'express-rate-limit';
import type { Express, NextFunction, Request, Response } from 'express';
import { config } from '../config';
import { parsePayload, SupervisorStore } from '../core/repositories';
import { extractIdentifiersFromText, importIdentifierValues } from '../csvImporter';
import {
    RunConfigurationError,
    RunConflictError,
    RunNotFoundError,
    PlatformUnavailableError,
} from '../supervisor/errors';
import { parseRunConfigurationInput } from '../supervisor/runConfiguration';
import { Supervisor } from '../supervisor/supervisor';
import { logError, logInfo } from '../telemetry/logger';
import {
    getLiveEventsSince,
    getLiveEventSubscribersCount,
    subscribeLiveEvents,
    type LiveEventFilter,
    type LiveEventMessage,
} from '../telemetry/liveEvents';
import { resolveCorrelationId, runWithCorrelationId } from '../telemetry/correlation';

export interface ApiServerOptions {
    store: SupervisorStore;
    supervisor: Supervisor;
    authEnabled?: boolean;
    apiKey?: string;
    trustedIps?: string[];
}

const MAX_IDENTIFIER_PAGE = 500;
const SSE_HEARTBEAT_MS = 20_000;

// ── Utility Auth ─────────────────────────────────────────────────────────────
function secureEquals(a: string, b: string): boolean {
    const aBuffer = Buffer.from(a);
    const bBuffer = Buffer.from(b);
    if (aBuffer.length !== bBuffer.length) return false;
    return timingSafeEqual(aBuffer, bBuffer);
}

function normalizeIp(rawIp: string): string {
    const trimmed = rawIp.trim();
    if (!trimmed) return '';
    if (trimmed === '::1') return '127.0.0.1';
    if (trimmed.startsWith('::ffff:')) return trimmed.slice('::ffff:'.length);
    return trimmed;
}

function resolveRequestIp(req: Request): string {
    // Non usare manualmente x-forwarded-for: è header spoofabile lato client.
    const fromExpress = normalizeIp(req.ip ?? '');
    if (fromExpress) return fromExpress;
    return normalizeIp(req.socket?.remoteAddress ?? '');
}

function isApiKeyAuthValid(req: Request, apiKey: string): boolean {
    if (!apiKey) return false;
    const fromHeader = req.header('x-api-key');
    if (fromHeader && secureEquals(fromHeader.trim(), apiKey)) return true;
    const authorization = req.header('authorization') ?? '';
    if (!authorization.toLowerCase().startsWith('bearer ')) return false;
    const token = authorization.slice('bearer '.length).trim();
    return token.length > 0 && secureEquals(token, apiKey);
}

// ── Helper centralizzato per errori API ──────────────────────────────────────
function handleApiError(res: Response, err: unknown, context: string): void {
    if (err instanceof RunConfigurationError) {
        res.status(400).json({ error: err.message, errors: err.errors });
        return;
    }
    if (err instanceof RunConflictError) {
        res.status(409).json({ error: err.message, activeRunId: err.activeRunId });
        return;
    }
    if (err instanceof RunNotFoundError) {
        res.status(404).json({ error: err.message });
        return;
    }
    const message = err instanceof Error ? err.message : String(err);
    void logError(context, { error: message });
    if (err instanceof PlatformUnavailableError) {
        res.status(503).json({ error: 'Piattaforma non raggiungibile.' });
        return;
    }
    // Non espone stack trace né dettagli interni
    res.status(500).json({ error: 'Errore interno del server.' });
}

function writeSseEvent(res: Response, eventType: string, data: unknown, id?: number): void {
    if (id !== undefined) {
        res.write(`id: ${id}\n`);
    }
    res.write(`event: ${eventType}\n`);
    res.write(`data: ${JSON.stringify(data)}\n\n`);
}

function parsePagination(req: Request): { offset: number; limit: number } {
    const rawOffset = Number.parseInt(String(req.query.offset ?? '0'), 10);
    const rawLimit = Number.parseInt(String(req.query.limit ?? '25'), 10);
    return {
        offset: Number.isFinite(rawOffset) ? Math.max(0, rawOffset) : 0,
        limit: Number.isFinite(rawLimit) ? Math.min(MAX_IDENTIFIER_PAGE, Math.max(1, rawLimit)) : 25,
    };
}

export function createApiServer(options: ApiServerOptions): Express {
    const { store, supervisor } = options;
    const authEnabled = options.authEnabled ?? config.dashboardAuthEnabled;
    const apiKey = options.apiKey ?? config.dashboardApiKey;
    const trustedIps = new Set((options.trustedIps ?? config.dashboardTrustedIps).map(normalizeIp));

    const app = express();
    app.set('trust proxy', false);

    // ── CORS ristretto ──────────────────────────────────────────────────────
    app.use(cors({
        origin: (origin, callback) => {
            // Nessun origin = same-origin o tool come curl → ok
            if (!origin) return callback(null, true);
            const allowedOrigins = [
                'http://localhost',
                `http://localhost:${config.dashboardPort}`,
                'http://127.0.0.1',
                `http://127.0.0.1:${config.dashboardPort}`,
                ...[...trustedIps].map((ip) => `http://${ip}`),
                ...[...trustedIps].map((ip) => `http://${ip}:${config.dashboardPort}`),
            ];
            return callback(null, allowedOrigins.includes(origin));
        },
        methods: ['GET', 'POST', 'DELETE'],
        allowedHeaders: ['Content-Type', 'Authorization', 'x-api-key'],
        credentials: false,
    }));

    app.use(express.json({ limit: '256kb' }));

    app.use((req, res, next) => {
        const incomingCorrelation = req.header('x-correlation-id') ?? req.header('x-request-id');
        const correlationId = resolveCorrelationId(incomingCorrelation);
        res.setHeader('x-correlation-id', correlationId);
        runWithCorrelationId(correlationId, () => {
            res.locals.correlationId = correlationId;
            next();
        });
    });

    // ── Rate Limiting ────────────────────────────────────────────────────────
    // Limite globale: 120 req/min per IP su tutti gli endpoint /api/ (SSE escluso)
    app.use('/api/', rateLimit({
        windowMs: 60_000,
        max: 120,
        standardHeaders: true,
        legacyHeaders: false,
        skip: (req) => req.originalUrl.startsWith('/api/events'),
        message: { error: 'Troppe richieste. Attendi prima di riprovare.' },
    }));

    // Limite più stretto per i controlli run: 10 req/min
    app.use('/api/runs', rateLimit({
        windowMs: 60_000,
        max: 10,
        standardHeaders: true,
        legacyHeaders: false,
        skip: (req) => req.method === 'GET',
        message: { error: 'Troppe operazioni di controllo. Attendi prima di riprovare.' },
    }));

    // ── Sicurezza Header HTTP ────────────────────────────────────────────────
    app.use((_req, res, next) => {
        res.setHeader('X-Content-Type-Options', 'nosniff');
        res.setHeader('X-Frame-Options', 'DENY');
        res.setHeader('Referrer-Policy', 'strict-origin-when-cross-origin');
        res.setHeader('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none'");
        next();
    });

    // ── Health (pubblico) ────────────────────────────────────────────────────
    app.get('/api/health', (_req, res) => {
        res.json({ status: 'ok', activeRunId: supervisor.getActiveRunId(), timestamp: new Date().toISOString() });
    });

    app.use('/api', (req: Request, res: Response, next: NextFunction) => {
        if (!authEnabled) {
            next();
            return;
        }
        const requestIp = resolveRequestIp(req);
        if (trustedIps.has(requestIp) || isApiKeyAuthValid(req, apiKey)) {
            next();
            return;
        }
        res.status(401).json({ error: 'Unauthorized' });
    });

    // ── Run ──────────────────────────────────────────────────────────────────
    app.post('/api/runs', async (req, res) => {
        try {
            const input = parseRunConfigurationInput(req.body);
            if (!input) {
                res.status(400).json({ error: 'destinationId obbligatorio.', errors: ['destinationId obbligatorio'] });
                return;
            }
            const runId = await supervisor.startRun(input);
            await logInfo('api.run_started', { runId, actor: resolveRequestIp(req) });
            res.status(201).json({ runId });
        } catch (err: unknown) {
            handleApiError(res, err, 'api.runs.start');
        }
    });

    app.get('/api/runs/:id', async (req, res) => {
        try {
            res.json(await supervisor.getProgress(req.params.id));
        } catch (err: unknown) {
            handleApiError(res, err, 'api.runs.progress');
        }
    });

    app.post('/api/runs/:id/stop', async (req, res) => {
        try {
            await supervisor.stopRun(req.params.id);
            res.json(await supervisor.getProgress(req.params.id));
        } catch (err: unknown) {
            handleApiError(res, err, 'api.runs.stop');
        }
    });

    app.post('/api/runs/:id/pause', async (req, res) => {
        try {
            await supervisor.pauseRun(req.params.id);
            res.json(await supervisor.getProgress(req.params.id));
        } catch (err: unknown) {
            handleApiError(res, err, 'api.runs.pause');
        }
    });

    app.post('/api/runs/:id/resume', async (req, res) => {
        try {
            await supervisor.resumeRun(req.params.id);
            res.json(await supervisor.getProgress(req.params.id));
        } catch (err: unknown) {
            handleApiError(res, err, 'api.runs.resume');
        }
    });

    app.get('/api/runs/:id/logs', async (req, res) => {
        try {
            const logs = await store.listRunLogs(req.params.id, parsePagination(req).limit);
            res.json(logs.map((row) => ({
                id: row.id,
                runId: row.run_id,
                level: row.level,
                event: row.event,
                payload: parsePayload(row.payload_json),
                createdAt: row.created_at,
            })));
        } catch (err: unknown) {
            handleApiError(res, err, 'api.runs.logs');
        }
    });

    // ── Identificativi ───────────────────────────────────────────────────────
    app.get('/api/identifiers', async (req, res) => {
        try {
            const { offset, limit } = parsePagination(req);
            const counts = await store.countIdentifiersByStatus();
            const total = counts.PENDING + counts.ADDED + counts.FAILED + counts.BLACKLISTED;
            const identifiers = await store.listIdentifiers(offset, limit);
            res.json({ identifiers, total, offset, limit });
        } catch (err: unknown) {
            handleApiError(res, err, 'api.identifiers.list');
        }
    });

    app.get('/api/identifiers/stats', async (_req, res) => {
        try {
            res.json(await store.countIdentifiersByStatus());
        } catch (err: unknown) {
            handleApiError(res, err, 'api.identifiers.stats');
        }
    });

    app.post('/api/identifiers/import', async (req, res) => {
        try {
            const text: unknown = req.body?.text;
            if (typeof text !== 'string') {
                res.status(400).json({ error: 'Campo text obbligatorio (un numero per riga).' });
                return;
            }
            const values = extractIdentifiersFromText(text);
            if (values.length === 0) {
                res.status(400).json({ error: 'Nessun numero valido trovato.' });
                return;
            }
            res.json(await importIdentifierValues(store, values));
        } catch (err: unknown) {
            handleApiError(res, err, 'api.identifiers.import');
        }
    });

    app.post('/api/identifiers/requeue-failed', async (_req, res) => {
        try {
            const requeued = await store.requeueFailedIdentifiers(new Date().toISOString());
            if (requeued > 0) supervisor.wake();
            res.json({ requeued });
        } catch (err: unknown) {
            handleApiError(res, err, 'api.identifiers.requeue');
        }
    });

    app.delete('/api/identifiers/:value', async (req, res) => {
        try {
            const activeRunId = supervisor.getActiveRunId();
            if (activeRunId) {
                res.status(409).json({ error: 'Run attiva: cancellazione non consentita.', activeRunId });
                return;
            }
            const deleted = await store.deleteIdentifierByValue(req.params.value);
            res.status(deleted ? 200 : 404).json({ deleted });
        } catch (err: unknown) {
            handleApiError(res, err, 'api.identifiers.delete');
        }
    });

    app.delete('/api/identifiers', async (_req, res) => {
        try {
            const activeRunId = supervisor.getActiveRunId();
            if (activeRunId) {
                res.status(409).json({ error: 'Run attiva: cancellazione non consentita.', activeRunId });
                return;
            }
            res.json({ deleted: await store.deleteAllIdentifiers() });
        } catch (err: unknown) {
            handleApiError(res, err, 'api.identifiers.delete_all');
        }
    });

    // ── Worker ───────────────────────────────────────────────────────────────
    app.get('/api/workers', async (_req, res) => {
        try {
            res.json(await store.listWorkers());
        } catch (err: unknown) {
            handleApiError(res, err, 'api.workers');
        }
    });

    app.post('/api/workers/wake', (_req, res) => {
        supervisor.wake();
        res.json({ success: true });
    });

    // ── SSE stream ───────────────────────────────────────────────────────────
    app.get('/api/events', (req, res) => {
        const filter: LiveEventFilter = {
            runId: typeof req.query.runId === 'string' && req.query.runId ? req.query.runId : null,
        };
        const lastEventId = Number.parseInt(req.get('last-event-id') ?? '', 10);

        res.setHeader('Content-Type', 'text/event-stream');
        res.setHeader('Cache-Control', 'no-cache, no-transform');
        res.setHeader('Connection', 'keep-alive');
        res.setHeader('X-Accel-Buffering', 'no');
        res.flushHeaders?.();

        const onEvent = (event: LiveEventMessage): void => {
            writeSseEvent(res, event.type, event, event.id);
        };
        const unsubscribe = subscribeLiveEvents(onEvent, filter);

        writeSseEvent(res, 'connected', {
            timestamp: new Date().toISOString(),
            subscribers: getLiveEventSubscribersCount(),
        });
        if (Number.isFinite(lastEventId)) {
            for (const missed of getLiveEventsSince(lastEventId, filter)) {
                onEvent(missed);
            }
        }

        const heartbeat = setInterval(() => {
            writeSseEvent(res, 'heartbeat', { timestamp: new Date().toISOString() });
        }, SSE_HEARTBEAT_MS);

        res.on('close', () => {
            clearInterval(heartbeat);
            unsubscribe();
        });
    });

    // ── 404 catch-all ────────────────────────────────────────────────────────
    app.use('/api/', (_req, res) => {
        res.status(404).json({ error: 'Endpoint non trovato.' });
    });

    return app;
}

export function startServer(app: Express, port: number = config.dashboardPort): Server {
    const server = app.listen(port, () => {
        const address = server.address();
        const effectivePort = typeof address === 'object' && address ? address.port : port;
        console.log(`\n🚀 Supervisor API in ascolto su http://localhost:${effectivePort}\n`);
    });
    return server;
}
