/**
 * supervisor.ts — Dispatch loop delle aggiunte automatiche
 *
 * Una run alla volta. Per ogni ciclo:
 * - sotto SerialGate: identificativo successivo, worker LRU idoneo, claim + riserva quota
 * - fuori dal gate, nel contesto del worker: join (primo uso) + addMember
 * - sotto SerialGate: applicazione dell'esito (ledger, cooldown, quota, salute) e contatori run
 * Dopo `batchSize` dispatch il ciclo attende la chiusura dei tentativi in volo.
 * Le attese passano da `Clock.sleep` con un `WakeSignal`: stop, pausa, fine di un tentativo e
 * `wake()` interrompono il sonno.
 */

import { randomUUID } from 'crypto';
import { getLocalWindowOpening } from '../config';
import { Clock, WakeSignal, systemClock } from '../core/clock';
import { SerialGate } from '../core/serialGate';
import { SupervisorStore } from '../core/repositories.types';
import { AddMemberResult, JoinResult, PlatformCapability, describeAddMemberResult } from '../platform/capability';
import { runWithRunContext } from '../telemetry/correlation';
import { publishLiveEvent } from '../telemetry/liveEvents';
import { logError, logInfo, logWarn } from '../telemetry/logger';
import {
    IdentifierRecord,
    IdentifierStatusCounts,
    RunConfiguration,
    RunRecord,
    RunStatus,
    WorkerHealth,
    WorkerRecord,
    WorkerRole,
} from '../types/domain';
import { CooldownRegistry } from './cooldownRegistry';
import {
    PlatformUnavailableError,
    RunConfigurationError,
    RunConflictError,
    RunNotFoundError,
    errorMessage,
} from './errors';
import { QuotaTracker } from './quotaTracker';
import {
    RunConfigurationInput,
    SupervisorSettings,
    allowedRoles,
    buildRunConfiguration,
    parseDailyStartTime,
    parseRunConfigurationInput,
    supervisorSettingsFromConfig,
    validateRunConfiguration,
} from './runConfiguration';
import { StatusLedger } from './statusLedger';
import { WorkerPool, WorkerSelectionFilter } from './workerPool';

/** Errori fatali conservati per `waitForRun`: in `serve` le run si accumulano, i più vecchi escono. */
const MAX_REMEMBERED_FAILURES = 100;

export function rememberBounded<K, V>(map: Map<K, V>, key: K, value: V, max: number): void {
    map.delete(key);
    map.set(key, value);
    while (map.size > max) {
        const oldest = map.keys().next();
        if (oldest.done) break;
        map.delete(oldest.value);
    }
}

/** Attesa RATE_LIMITED utilizzabile: un valore non finito ripiega su `fallbackSeconds`. */
export function normalizeWaitSeconds(waitSeconds: number, fallbackSeconds: number): number {
    return Number.isFinite(waitSeconds) ? Math.max(0, waitSeconds) : fallbackSeconds;
}

export interface WorkerProgress {
    id: number;
    name: string;
    role: WorkerRole;
    health: WorkerHealth;
    dailyCount: number;
    dailyLimit: number;
    cooldownUntil: string | null;
    attempts: number;
    added: number;
    failed: number;
}

export interface RunProgress {
    runId: string;
    destinationId: string;
    status: RunStatus;
    startedAt: string;
    finishedAt: string | null;
    processedCount: number;
    successCount: number;
    failureCount: number;
    lastError: string | null;
    percentComplete: number;
    counts: IdentifierStatusCounts;
    lastOutcome: string | null;
    workers: WorkerProgress[];
}

export interface SupervisorDependencies {
    store: SupervisorStore;
    capability: PlatformCapability;
    clock?: Clock;
    settings?: Partial<SupervisorSettings>;
}

interface WorkerCounters {
    attempts: number;
    added: number;
    failed: number;
}

type DispatchStep =
    | { kind: 'dispatched' }
    | { kind: 'completed' }
    | { kind: 'skip' }
    | { kind: 'idle'; wakeAt: Date | null };

type RunEnding = 'COMPLETED' | 'STOPPED';

export function computePercentComplete(counts: IdentifierStatusCounts): number {
    const total = counts.PENDING + counts.ADDED + counts.FAILED + counts.BLACKLISTED;
    if (total === 0) return 100;
    const done = counts.ADDED + counts.BLACKLISTED + counts.FAILED;
    return Math.round((done / total) * 1000) / 10;
}

class ActiveRun {
    readonly ledger: StatusLedger;
    readonly quota: QuotaTracker;
    readonly cooldowns: CooldownRegistry;
    readonly pool: WorkerPool;
    readonly wake = new WakeSignal();
    readonly inFlight = new Map<number, Promise<void>>();
    readonly restingUntil = new Map<number, Date>();
    readonly joined = new Set<number>();
    readonly excluded = new Set<number>();
    readonly workerCounters = new Map<number, WorkerCounters>();
    /** Worker scartati nel passaggio corrente perché la riserva quota è fallita. */
    readonly skippedThisPass = new Set<number>();
    stopRequested = false;
    reloadRequested = false;
    stalled = false;
    fatalError: Error | null = null;
    lastOutcome: string | null = null;
    completion: Promise<void> = Promise.resolve();

    constructor(
        readonly record: RunRecord,
        readonly config: RunConfiguration,
        store: SupervisorStore,
        settings: SupervisorSettings
    ) {
        this.ledger = new StatusLedger(store, config.retryLimit);
        this.quota = new QuotaTracker(store, config.dailyLimitDefault, settings.timezone);
        this.cooldowns = new CooldownRegistry(store);
        this.pool = new WorkerPool(store, this.quota, this.cooldowns);
    }

    get id(): string {
        return this.record.id;
    }

    selectionFilter(): WorkerSelectionFilter {
        const excluded = new Set<number>([...this.excluded, ...this.skippedThisPass]);
        return {
            allowedRoles: allowedRoles(this.config),
            preference: this.config.rolePreference,
            inFlight: new Set(this.inFlight.keys()),
            restingUntil: this.restingUntil,
            excluded,
        };
    }

    counters(workerId: number): WorkerCounters {
        let counters = this.workerCounters.get(workerId);
        if (!counters) {
            counters = { attempts: 0, added: 0, failed: 0 };
            this.workerCounters.set(workerId, counters);
        }
        return counters;
    }

    fail(error: unknown): void {
        if (!this.fatalError) {
            this.fatalError = error instanceof Error ? error : new Error(String(error));
        }
        this.wake.notify();
    }
}

export class Supervisor {
    private readonly store: SupervisorStore;
    private readonly capability: PlatformCapability;
    private readonly clock: Clock;
    private readonly settings: SupervisorSettings;
    private readonly gate = new SerialGate();
    /** Run attive per destinazione; al più una alla volta. */
    private readonly activeRuns = new Map<string, ActiveRun>();
    private readonly failures = new Map<string, Error>();

    constructor(deps: SupervisorDependencies) {
        this.store = deps.store;
        this.capability = deps.capability;
        this.clock = deps.clock ?? systemClock;
        this.settings = { ...supervisorSettingsFromConfig(), ...deps.settings };
    }

    // ─── API pubblica ─────────────────────────────────────────────────────────

    async startRun(input: RunConfigurationInput): Promise<string> {
        const runConfig = buildRunConfiguration(input, this.settings);
        const errors = validateRunConfiguration(runConfig, this.settings);
        if (errors.length > 0) {
            throw new RunConfigurationError(errors);
        }

        const run = await this.gate.runExclusive(async () => {
            const active = this.findAnyActiveRun();
            if (active) {
                throw new RunConflictError(active.id);
            }
            const record: RunRecord = {
                id: randomUUID(),
                destination_id: runConfig.destinationId,
                status: 'RUNNING',
                config_json: JSON.stringify(runConfig),
                started_at: this.clock.now().toISOString(),
                finished_at: null,
                processed_count: 0,
                success_count: 0,
                failure_count: 0,
                last_error: null,
            };
            await this.store.saveRun(record);
            const created = new ActiveRun(record, runConfig, this.store, this.settings);
            this.activeRuns.set(runConfig.destinationId, created);
            return created;
        });

        this.launch(run);
        publishLiveEvent('run.started', { runId: run.id, destinationId: run.config.destinationId });
        await runWithRunContext(run.id, () => logInfo('run.started', {
            runId: run.id,
            destinationId: run.config.destinationId,
            delaySeconds: run.config.delaySeconds,
            batchSize: run.config.batchSize,
            dailyLimitDefault: run.config.dailyLimitDefault,
            rolePreference: run.config.rolePreference,
        }));
        return run.id;
    }

    /** Blocca i prossimi dispatch e risolve quando i tentativi in volo sono chiusi. */
    async stopRun(runId: string): Promise<void> {
        const run = this.findActiveRun(runId);
        if (run) {
            run.stopRequested = true;
            run.wake.notify();
            await run.completion;
            return;
        }
        const stored = await this.store.getRun(runId);
        if (!stored) {
            throw new RunNotFoundError(runId);
        }
        if (stored.status === 'RUNNING' || stored.status === 'PAUSED') {
            // run rimasta attiva nel DB da un processo precedente e mai ripresa
            await this.store.saveRun({ ...stored, status: 'STOPPED', finished_at: this.clock.now().toISOString() });
            publishLiveEvent('run.stopped', { runId, destinationId: stored.destination_id });
        }
    }

    async pauseRun(runId: string): Promise<void> {
        const run = this.requireActiveRun(runId);
        await this.gate.runExclusive(async () => {
            if (run.record.status !== 'RUNNING') return;
            run.record.status = 'PAUSED';
            await this.store.saveRun(run.record);
        });
        run.wake.notify();
        publishLiveEvent('run.paused', { runId, destinationId: run.config.destinationId });
        await runWithRunContext(runId, () => logInfo('run.paused', { runId }));
    }

    async resumeRun(runId: string): Promise<void> {
        const run = this.requireActiveRun(runId);
        await this.gate.runExclusive(async () => {
            if (run.record.status !== 'PAUSED') return;
            run.record.status = 'RUNNING';
            await this.store.saveRun(run.record);
        });
        run.wake.notify();
        publishLiveEvent('run.resumed', { runId, destinationId: run.config.destinationId });
        await runWithRunContext(runId, () => logInfo('run.resumed', { runId }));
    }

    async getProgress(runId: string): Promise<RunProgress> {
        const run = this.findActiveRun(runId);
        if (run) {
            return this.buildProgress(run);
        }
        const stored = await this.store.getRun(runId);
        if (!stored) {
            throw new RunNotFoundError(runId);
        }
        const counts = await this.store.countIdentifiersByStatus();
        const workers = await this.store.listWorkers();
        const runConfig = this.parseStoredConfiguration(stored);
        return this.toProgress(stored, counts, null, workers, runConfig?.dailyLimitDefault ?? this.settings.defaultDailyLimit, new Map());
    }

    /**
     * Riprende le run rimaste RUNNING/PAUSED nel DB (crash o riavvio). Gli identificativi già
     * ADDED/BLACKLISTED restano fuori dalla coda; si riparte dai PENDING.
     * Se ne risultano più di una, si riprende la più recente e le altre vengono chiuse.
     */
    async resumeRuns(): Promise<string[]> {
        const candidates = await this.store.listRunsByStatus(['RUNNING', 'PAUSED']);
        const resumed: string[] = [];
        for (let index = 0; index < candidates.length; index++) {
            const stored = candidates[index];
            const isLatest = index === candidates.length - 1;
            const runConfig = this.parseStoredConfiguration(stored);
            const errors = runConfig ? validateRunConfiguration(runConfig, this.settings) : ['config_json illeggibile'];
            if (!runConfig || errors.length > 0 || !isLatest || this.findAnyActiveRun() || this.findActiveRun(stored.id)) {
                const reason = !isLatest ? 'superata da una run più recente' : errors.join('; ') || 'run già attiva';
                await this.store.saveRun({
                    ...stored,
                    status: 'STOPPED',
                    finished_at: this.clock.now().toISOString(),
                    last_error: `Ripresa non possibile: ${reason}`,
                });
                await logWarn('run.resume_skipped', { runId: stored.id, reason });
                continue;
            }
            const run = new ActiveRun({ ...stored }, runConfig, this.store, this.settings);
            this.activeRuns.set(runConfig.destinationId, run);
            this.launch(run);
            resumed.push(run.id);
            publishLiveEvent('run.resumed', { runId: run.id, destinationId: runConfig.destinationId });
            await runWithRunContext(run.id, () => logInfo('run.resumed_after_restart', {
                runId: run.id,
                status: run.record.status,
                processedCount: run.record.processed_count,
            }));
        }
        return resumed;
    }

    /** Rivaluta subito le run attive (es. worker ri-autenticato, nuovi worker registrati). */
    wake(): void {
        for (const run of this.activeRuns.values()) {
            run.reloadRequested = true;
            run.wake.notify();
        }
    }

    /** Risolve alla chiusura della run; rigetta se la run è terminata per errore fatale. */
    async waitForRun(runId: string): Promise<RunRecord> {
        const run = this.findActiveRun(runId);
        if (run) {
            await run.completion;
        }
        const failure = this.failures.get(runId);
        if (failure) {
            throw failure;
        }
        const stored = await this.store.getRun(runId);
        if (!stored) {
            throw new RunNotFoundError(runId);
        }
        return stored;
    }

    getActiveRunId(): string | null {
        return this.findAnyActiveRun()?.id ?? null;
    }

    // ─── Registro run ─────────────────────────────────────────────────────────

    private findAnyActiveRun(): ActiveRun | null {
        for (const run of this.activeRuns.values()) {
            return run;
        }
        return null;
    }

    private findActiveRun(runId: string): ActiveRun | null {
        for (const run of this.activeRuns.values()) {
            if (run.id === runId) return run;
        }
        return null;
    }

    private requireActiveRun(runId: string): ActiveRun {
        const run = this.findActiveRun(runId);
        if (!run) {
            throw new RunNotFoundError(runId);
        }
        return run;
    }

    private parseStoredConfiguration(stored: RunRecord): RunConfiguration | null {
        let raw: unknown;
        try {
            raw = JSON.parse(stored.config_json);
        } catch {
            return null;
        }
        const input = parseRunConfigurationInput(raw);
        return input ? buildRunConfiguration(input, this.settings) : null;
    }

    private launch(run: ActiveRun): void {
        run.completion = runWithRunContext(run.id, () => this.execute(run));
    }

    // ─── Esecuzione ───────────────────────────────────────────────────────────

    /** Non rigetta mai: un errore fatale chiude la run come STOPPED e finisce in `failures`. */
    private async execute(run: ActiveRun): Promise<void> {
        try {
            const ending = await this.loop(run);
            await this.finish(run, ending);
        } catch (error) {
            await this.abort(run, error);
        } finally {
            if (this.activeRuns.get(run.config.destinationId) === run) {
                this.activeRuns.delete(run.config.destinationId);
            }
        }
    }

    private async loop(run: ActiveRun): Promise<RunEnding> {
        await this.gate.runExclusive(() => run.pool.load());
        await run.pool.refreshHealth(this.capability);

        while (true) {
            const signal = run.wake.signal;
            if (run.fatalError) throw run.fatalError;
            if (run.stopRequested) return 'STOPPED';

            if (run.reloadRequested) {
                run.reloadRequested = false;
                await this.gate.runExclusive(() => run.pool.load());
            }

            if (run.record.status === 'PAUSED') {
                await this.clock.sleep(this.settings.idlePollSeconds * 1000, signal);
                continue;
            }

            const opening = this.dailyWindowOpening(run);
            if (opening) {
                await this.waitForWindow(run, opening, signal);
                continue;
            }

            let dispatched = 0;
            let idleStep: DispatchStep | null = null;
            run.skippedThisPass.clear();
            while (dispatched < run.config.batchSize) {
                if (run.stopRequested || run.fatalError || run.record.status !== 'RUNNING') break;
                const step = await this.gate.runExclusive(() => this.tryDispatch(run));
                if (step.kind === 'completed') {
                    return 'COMPLETED';
                }
                if (step.kind === 'dispatched') {
                    dispatched++;
                    continue;
                }
                if (step.kind === 'idle') {
                    idleStep = step;
                    break;
                }
            }

            if (dispatched > 0) {
                run.stalled = false;
                await Promise.all(run.inFlight.values());
                continue;
            }
            if (!idleStep || idleStep.kind !== 'idle') {
                continue;
            }

            const now = this.clock.now();
            if (idleStep.wakeAt) {
                await this.clock.sleep(idleStep.wakeAt.getTime() - now.getTime(), signal);
                continue;
            }
            if (run.inFlight.size === 0) {
                await this.reportStall(run);
                run.reloadRequested = true;
            }
            await this.clock.sleep(this.settings.idlePollSeconds * 1000, signal);
        }
    }

    /** Prossima apertura della finestra giornaliera, null se si può già lavorare. */
    private dailyWindowOpening(run: ActiveRun): Date | null {
        if (!run.config.dailyStartTime) return null;
        const startMinutes = parseDailyStartTime(run.config.dailyStartTime);
        if (startMinutes === null) return null;
        return getLocalWindowOpening(this.clock.now(), startMinutes, this.settings.timezone);
    }

    private async waitForWindow(run: ActiveRun, opening: Date, signal: AbortSignal): Promise<void> {
        await logInfo('run.waiting_window', {
            runId: run.id,
            dailyStartTime: run.config.dailyStartTime ?? null,
            opensAt: opening.toISOString(),
        });
        await this.clock.sleep(opening.getTime() - this.clock.now().getTime(), signal);
    }

    private async reportStall(run: ActiveRun): Promise<void> {
        if (run.stalled) return;
        run.stalled = true;
        const counts = await run.ledger.counts();
        publishLiveEvent('run.stalled', {
            runId: run.id,
            destinationId: run.config.destinationId,
            pending: counts.PENDING,
            idlePollSeconds: this.settings.idlePollSeconds,
        });
        await logWarn('run.stalled', {
            runId: run.id,
            pending: counts.PENDING,
            reason: 'nessun worker può tornare disponibile da solo',
        });
    }

    /** Gira dentro il SerialGate. */
    private async tryDispatch(run: ActiveRun): Promise<DispatchStep> {
        const now = this.clock.now();
        const identifier = await run.ledger.nextPending();
        if (!identifier) {
            if (run.inFlight.size === 0) return { kind: 'completed' };
            return { kind: 'idle', wakeAt: null };
        }

        const filter = run.selectionFilter();
        const worker = await run.pool.selectWorker(filter, now);
        if (!worker) {
            return { kind: 'idle', wakeAt: await run.pool.nextWakeInstant(filter, now) };
        }

        if (!run.ledger.claim(identifier.id)) {
            return { kind: 'skip' };
        }
        if (!(await run.quota.reserve(worker, now))) {
            run.ledger.release(identifier.id);
            run.skippedThisPass.add(worker.id);
            return { kind: 'skip' };
        }

        const attempt = this.attempt(run, worker.id, identifier).finally(() => {
            run.inFlight.delete(worker.id);
            run.wake.notify();
        });
        run.inFlight.set(worker.id, attempt);
        return { kind: 'dispatched' };
    }

    /** Contesto del singolo worker. Non rigetta: gli errori fatali vengono consegnati alla run. */
    private async attempt(run: ActiveRun, workerId: number, identifier: IdentifierRecord): Promise<void> {
        try {
            const worker = run.pool.get(workerId);
            if (!worker) {
                throw new Error(`Worker ${workerId} non più presente nel pool`);
            }
            if (!run.joined.has(workerId)) {
                const joined = await this.joinDestination(run, worker, identifier);
                if (!joined) return;
            }

            let result: AddMemberResult;
            try {
                result = await this.capability.addMember(
                    { ...worker },
                    run.config.destinationId,
                    identifier.value,
                    run.config.inviteMessage
                );
            } catch (error) {
                if (error instanceof PlatformUnavailableError) throw error;
                result = { kind: 'UNKNOWN', detail: errorMessage(error) };
            }

            await this.gate.runExclusive(() => this.applyOutcome(run, workerId, identifier, result));
        } catch (error) {
            run.ledger.release(identifier.id);
            run.fail(error);
        }
    }

    private async joinDestination(run: ActiveRun, worker: WorkerRecord, identifier: IdentifierRecord): Promise<boolean> {
        let join: JoinResult;
        try {
            join = await this.capability.joinDestination({ ...worker }, run.config.destinationId);
        } catch (error) {
            if (error instanceof PlatformUnavailableError) throw error;
            // guasto del singolo worker: torna in coda dopo un idle poll, la run prosegue con gli altri
            const until = await this.gate.runExclusive(async () => {
                const current = run.pool.get(worker.id) ?? worker;
                run.ledger.release(identifier.id);
                await run.quota.release(current);
                return run.pool.markCooling(
                    current,
                    new Date(this.clock.now().getTime() + this.settings.idlePollSeconds * 1000)
                );
            });
            await logWarn('worker.join_failed', {
                runId: run.id,
                workerId: worker.id,
                workerName: worker.name,
                error: errorMessage(error),
                cooldownUntil: until.toISOString(),
            });
            return false;
        }
        switch (join.kind) {
            case 'JOINED':
            case 'ALREADY_MEMBER':
                run.joined.add(worker.id);
                return true;
            case 'NOT_FOUND':
                throw new PlatformUnavailableError(`Destinazione non trovata: ${run.config.destinationId}`);
            case 'FORBIDDEN':
                await this.gate.runExclusive(async () => {
                    run.excluded.add(worker.id);
                    run.ledger.release(identifier.id);
                    await run.quota.release(run.pool.get(worker.id) ?? worker);
                });
                await logWarn('worker.join_forbidden', {
                    runId: run.id,
                    workerId: worker.id,
                    workerName: worker.name,
                    detail: join.detail ?? null,
                });
                return false;
        }
    }

    /** Gira dentro il SerialGate. */
    private async applyOutcome(
        run: ActiveRun,
        workerId: number,
        identifier: IdentifierRecord,
        result: AddMemberResult
    ): Promise<void> {
        const now = this.clock.now();
        const worker = run.pool.get(workerId);
        if (!worker) {
            throw new Error(`Worker ${workerId} non più presente nel pool`);
        }
        const outcome = await run.ledger.recordOutcome(identifier, result, now);
        const counters = run.counters(workerId);

        switch (result.kind) {
            case 'OK':
                counters.attempts++;
                counters.added++;
                await run.pool.markUsed(worker, now);
                break;
            case 'PRIVACY_RESTRICTED':
            case 'UNKNOWN':
                counters.attempts++;
                counters.failed++;
                await run.pool.markUsed(worker, now);
                break;
            case 'RATE_LIMITED': {
                counters.attempts++;
                await run.quota.release(worker);
                const waitSeconds = normalizeWaitSeconds(result.waitSeconds, this.settings.idlePollSeconds);
                const until = await run.pool.markCooling(worker, new Date(now.getTime() + waitSeconds * 1000));
                await run.pool.markUsed(worker, now);
                await logWarn('worker.rate_limited', {
                    runId: run.id,
                    workerId,
                    workerName: worker.name,
                    waitSeconds,
                    cooldownUntil: until.toISOString(),
                });
                break;
            }
            case 'INVALID_SESSION':
                await run.quota.release(worker);
                await run.pool.markDisconnected(worker);
                break;
        }

        run.restingUntil.set(workerId, new Date(now.getTime() + run.config.delaySeconds * 1000));

        if (outcome.processed) {
            run.record.processed_count += 1;
            if (outcome.success) {
                run.record.success_count += 1;
            } else {
                run.record.failure_count += 1;
            }
        }
        await this.store.saveRun(run.record);

        run.lastOutcome = describeAddMemberResult(result);
        const progress = await this.buildProgress(run);
        publishLiveEvent('run.progress', {
            runId: progress.runId,
            destinationId: progress.destinationId,
            status: progress.status,
            processedCount: progress.processedCount,
            successCount: progress.successCount,
            failureCount: progress.failureCount,
            percentComplete: progress.percentComplete,
            counts: progress.counts,
            lastOutcome: progress.lastOutcome,
            workers: progress.workers,
        });
        await logInfo('identifier.outcome', {
            runId: run.id,
            workerId,
            identifierId: identifier.id,
            identifier: identifier.value,
            outcome: run.lastOutcome,
            status: outcome.identifier.status,
            attemptCount: outcome.identifier.attempt_count,
        });
    }

    private async finish(run: ActiveRun, ending: RunEnding): Promise<void> {
        await Promise.all(run.inFlight.values());
        if (run.fatalError) throw run.fatalError;
        await this.gate.runExclusive(async () => {
            run.record.status = ending;
            run.record.finished_at = this.clock.now().toISOString();
            await this.store.saveRun(run.record);
        });
        if (ending === 'COMPLETED') {
            const counts = await run.ledger.counts();
            publishLiveEvent('run.completed', { runId: run.id, destinationId: run.config.destinationId, counts });
            await logInfo('run.completed', {
                runId: run.id,
                processedCount: run.record.processed_count,
                successCount: run.record.success_count,
                failureCount: run.record.failure_count,
            });
        } else {
            publishLiveEvent('run.stopped', { runId: run.id, destinationId: run.config.destinationId });
            await logInfo('run.stopped', { runId: run.id, processedCount: run.record.processed_count });
        }
    }

    private async abort(run: ActiveRun, error: unknown): Promise<void> {
        const failure = error instanceof Error ? error : new Error(String(error));
        rememberBounded(this.failures, run.id, failure, MAX_REMEMBERED_FAILURES);
        run.stopRequested = true;
        await Promise.all(run.inFlight.values());
        run.record.status = 'STOPPED';
        run.record.finished_at = this.clock.now().toISOString();
        run.record.last_error = failure.message;
        try {
            await this.store.saveRun(run.record);
        } catch (saveError) {
            await logError('run.state_persist_failed', { runId: run.id, error: errorMessage(saveError) });
        }
        publishLiveEvent('run.failed', { runId: run.id, destinationId: run.config.destinationId, error: failure.message });
        await logError('run.failed', { runId: run.id, error: failure.message });
    }

    // ─── Progress ─────────────────────────────────────────────────────────────

    private async buildProgress(run: ActiveRun): Promise<RunProgress> {
        const counts = await run.ledger.counts();
        return this.toProgress(run.record, counts, run.lastOutcome, run.pool.list(), run.config.dailyLimitDefault, run.workerCounters);
    }

    private toProgress(
        record: RunRecord,
        counts: IdentifierStatusCounts,
        lastOutcome: string | null,
        workers: WorkerRecord[],
        dailyLimitDefault: number,
        workerCounters: ReadonlyMap<number, WorkerCounters>
    ): RunProgress {
        return {
            runId: record.id,
            destinationId: record.destination_id,
            status: record.status,
            startedAt: record.started_at,
            finishedAt: record.finished_at,
            processedCount: record.processed_count,
            successCount: record.success_count,
            failureCount: record.failure_count,
            lastError: record.last_error,
            percentComplete: computePercentComplete(counts),
            counts,
            lastOutcome,
            workers: workers.map((worker) => {
                const counters = workerCounters.get(worker.id);
                return {
                    id: worker.id,
                    name: worker.name,
                    role: worker.role,
                    health: worker.health,
                    dailyCount: worker.daily_count,
                    dailyLimit: worker.daily_limit ?? dailyLimitDefault,
                    cooldownUntil: worker.cooldown_until,
                    attempts: counters?.attempts ?? 0,
                    added: counters?.added ?? 0,
                    failed: counters?.failed ?? 0,
                };
            }),
        };
    }
}
