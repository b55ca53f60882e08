/**
 * runCommands.ts — Esecuzione del supervisor da CLI
 *
 * run (foreground, anche --dry-run), serve (API + ripresa run persistite), runs, stop-run, run-logs
 */

import { createApiServer, startServer } from '../../api/server';
import { createDryRunStore, createSupervisor, Runtime } from '../../core/runtime';
import { Supervisor } from '../../supervisor/supervisor';
import { RunConfigurationInput } from '../../supervisor/runConfiguration';
import { subscribeLiveEvents } from '../../telemetry/liveEvents';
import { setRunLogSink } from '../../telemetry/logger';
import {
    getOptionValue,
    getPositionalArgs,
    hasOption,
    parseBoolStrict,
    parseIntStrict,
    parseRolePreference,
} from '../cliParser';

export function parseRunArgs(args: string[]): RunConfigurationInput {
    const destinationId = getOptionValue(args, '--destination');
    if (!destinationId) {
        throw new Error('Uso: run --destination <id_gruppo> [--delay <s>] [--batch <n>] [--daily-limit <n>] [--message <testo>] [--dry-run]');
    }
    const delayRaw = getOptionValue(args, '--delay');
    const batchRaw = getOptionValue(args, '--batch');
    const dailyRaw = getOptionValue(args, '--daily-limit');
    const retryRaw = getOptionValue(args, '--retry-limit');
    const adminRaw = getOptionValue(args, '--allow-admin');
    const usersRaw = getOptionValue(args, '--allow-users');
    const preferenceRaw = getOptionValue(args, '--prefer');
    return {
        dailyStartTime: getOptionValue(args, '--start-time'),
        destinationId,
        delaySeconds: delayRaw ? parseIntStrict(delayRaw, '--delay') : undefined,
        batchSize: batchRaw ? parseIntStrict(batchRaw, '--batch') : undefined,
        dailyLimitDefault: dailyRaw ? parseIntStrict(dailyRaw, '--daily-limit') : undefined,
        retryLimit: retryRaw ? parseIntStrict(retryRaw, '--retry-limit') : undefined,
        inviteMessage: getOptionValue(args, '--message'),
        allowAdminAsWorker: adminRaw ? parseBoolStrict(adminRaw, '--allow-admin') : undefined,
        allowUserWorkers: usersRaw ? parseBoolStrict(usersRaw, '--allow-users') : undefined,
        rolePreference: preferenceRaw ? parseRolePreference(preferenceRaw) : undefined,
    };
}

function printProgressLines(): () => void {
    return subscribeLiveEvents((event) => {
        const payload = event.payload;
        console.log(
            `[PROGRESS] ${String(payload.percentComplete)}% processed=${String(payload.processedCount)} ` +
            `ok=${String(payload.successCount)} ko=${String(payload.failureCount)} last=${String(payload.lastOutcome)}`
        );
    }, { types: ['run.progress'] });
}

function stopOnSignal(supervisor: Supervisor, runId: string): () => void {
    let stopping = false;
    const handler = (): void => {
        if (stopping) return;
        stopping = true;
        console.warn('[SIGNAL] stop richiesto: attendo la chiusura dei tentativi in corso...');
        supervisor.stopRun(runId).catch((error: unknown) => {
            console.error('[ERROR] stop fallito', error instanceof Error ? error.message : String(error));
            process.exitCode = 1;
        });
    };
    process.on('SIGINT', handler);
    process.on('SIGTERM', handler);
    return () => {
        process.off('SIGINT', handler);
        process.off('SIGTERM', handler);
    };
}

export async function runRunCommand(runtime: Runtime, args: string[]): Promise<void> {
    const input = parseRunArgs(args);
    const dryRun = hasOption(args, '--dry-run');
    let supervisor: Supervisor;
    if (dryRun) {
        setRunLogSink(null);
        supervisor = await createSupervisor(await createDryRunStore(runtime.store), true);
        console.log('[DRY-RUN] nessuna chiamata alla piattaforma, stato su copia in memoria.');
    } else {
        supervisor = await createSupervisor(runtime.store, false);
    }

    const unsubscribe = printProgressLines();
    try {
        // Una run interrotta (crash, kill) sulla stessa destinazione viene ripresa, non duplicata.
        if (!dryRun) {
            const open = await runtime.store.listRunsByStatus(['RUNNING', 'PAUSED']);
            const latest = open[open.length - 1];
            if (latest && latest.destination_id !== input.destinationId) {
                throw new Error(
                    `Run ${latest.id} ancora aperta su ${latest.destination_id}: riprendila o fermala prima di avviarne un'altra.`
                );
            }
        }
        const resumed = dryRun ? [] : await supervisor.resumeRuns();
        let runId: string;
        if (resumed.length > 0) {
            runId = resumed[0];
            console.log(`[RESUME] Riprendo la run ${runId}`);
        } else {
            runId = await supervisor.startRun(input);
        }

        const detachSignals = stopOnSignal(supervisor, runId);
        try {
            const finalRecord = await supervisor.waitForRun(runId);
            console.log(JSON.stringify(finalRecord, null, 2));
        } finally {
            detachSignals();
        }
    } finally {
        unsubscribe();
    }
}

export async function runServeCommand(runtime: Runtime, args: string[]): Promise<void> {
    const supervisor = await createSupervisor(runtime.store, hasOption(args, '--dry-run'));
    const resumed = await supervisor.resumeRuns();
    if (resumed.length > 0) {
        console.log(`[BOOT] Run riprese: ${resumed.join(', ')}`);
    }
    const portRaw = getOptionValue(args, '--port');
    const app = createApiServer({ store: runtime.store, supervisor });
    const server = portRaw ? startServer(app, parseIntStrict(portRaw, '--port')) : startServer(app);

    await new Promise<void>((resolve) => {
        const shutdown = (): void => {
            const activeRunId = supervisor.getActiveRunId();
            const stopActive = activeRunId ? supervisor.stopRun(activeRunId) : Promise.resolve();
            stopActive
                .catch((error: unknown) => {
                    console.error('[ERROR] stop run in chiusura fallito', error instanceof Error ? error.message : String(error));
                    process.exitCode = 1;
                })
                .finally(() => server.close(() => resolve()));
        };
        process.once('SIGINT', shutdown);
        process.once('SIGTERM', shutdown);
    });
}

export async function runRunsCommand(runtime: Runtime): Promise<void> {
    const open = await runtime.store.listRunsByStatus(['RUNNING', 'PAUSED']);
    if (open.length === 0) {
        console.log('Nessuna run aperta.');
        return;
    }
    console.table(open.map((run) => ({
        id: run.id,
        destination: run.destination_id,
        status: run.status,
        startedAt: run.started_at,
        processed: run.processed_count,
        ok: run.success_count,
        ko: run.failure_count,
    })));
}

/** Chiude una run rimasta aperta nel DB senza riprenderla. */
export async function runStopRunCommand(runtime: Runtime, args: string[]): Promise<void> {
    const runId = getOptionValue(args, '--run') ?? getPositionalArgs(args)[0];
    if (!runId) {
        throw new Error('Uso: stop-run <runId>');
    }
    const supervisor = await createSupervisor(runtime.store, true);
    await supervisor.stopRun(runId);
    console.log(JSON.stringify(await supervisor.waitForRun(runId), null, 2));
}

export async function runRunLogsCommand(runtime: Runtime, args: string[]): Promise<void> {
    const runId = getOptionValue(args, '--run') ?? getPositionalArgs(args)[0];
    if (!runId) {
        throw new Error('Uso: run-logs <runId> [--limit <n>]');
    }
    const limitRaw = getOptionValue(args, '--limit');
    const logs = await runtime.store.listRunLogs(runId, limitRaw ? parseIntStrict(limitRaw, '--limit') : undefined);
    for (const entry of logs) {
        console.log(`${entry.created_at} [${entry.level}] ${entry.event} ${entry.payload_json}`);
    }
}
