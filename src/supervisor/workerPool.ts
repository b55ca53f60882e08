import { SupervisorStore } from '../core/repositories.types';
import { PlatformCapability } from '../platform/capability';
import { logInfo, logWarn } from '../telemetry/logger';
import { RolePreference, WorkerRecord, WorkerRole } from '../types/domain';
import { CooldownRegistry } from './cooldownRegistry';
import { PlatformUnavailableError, errorMessage } from './errors';
import { QuotaTracker } from './quotaTracker';

export interface WorkerSelectionFilter {
    allowedRoles: WorkerRole[];
    preference: RolePreference;
    /** Worker con un tentativo in volo nella run corrente. */
    inFlight: ReadonlySet<number>;
    /** Fine del riposo post-tentativo (delay_seconds) per worker. */
    restingUntil: ReadonlyMap<number, Date>;
    /** Worker esclusi dalla run (es. join rifiutato). */
    excluded: ReadonlySet<number>;
}

function roleRank(role: WorkerRole, preference: RolePreference): number {
    if (preference === 'USER_FIRST') return role === 'USER' ? 0 : 1;
    if (preference === 'ADMIN_FIRST') return role === 'ADMIN' ? 0 : 1;
    return 0;
}

function lastUsedMs(worker: WorkerRecord): number {
    if (!worker.last_used_at) return Number.NEGATIVE_INFINITY;
    const parsed = Date.parse(worker.last_used_at);
    return Number.isFinite(parsed) ? parsed : Number.NEGATIVE_INFINITY;
}

export function compareWorkersForSelection(a: WorkerRecord, b: WorkerRecord, preference: RolePreference): number {
    const rankDelta = roleRank(a.role, preference) - roleRank(b.role, preference);
    if (rankDelta !== 0) return rankDelta;
    const usedA = lastUsedMs(a);
    const usedB = lastUsedMs(b);
    if (usedA !== usedB) return usedA < usedB ? -1 : 1;
    return a.id - b.id;
}

/**
 * Vista della run sui worker: cache dei record (ogni modifica è persistita subito),
 * salute, idoneità e selezione least-recently-used.
 */
export class WorkerPool {
    private readonly workers = new Map<number, WorkerRecord>();

    constructor(
        private readonly store: SupervisorStore,
        private readonly quota: QuotaTracker,
        private readonly cooldowns: CooldownRegistry
    ) {}

    async load(): Promise<void> {
        const rows = await this.store.listWorkers();
        this.workers.clear();
        for (const row of rows) {
            this.workers.set(row.id, row);
        }
    }

    get(workerId: number): WorkerRecord | null {
        return this.workers.get(workerId) ?? null;
    }

    list(): WorkerRecord[] {
        return [...this.workers.values()].sort((a, b) => a.id - b.id).map((worker) => ({ ...worker }));
    }

    /**
     * Interroga la piattaforma sullo stato delle sessioni. Un worker DISCONNECTED che risponde
     * ACTIVE è stato ri-autenticato fuori dal supervisor e torna disponibile.
     */
    async refreshHealth(capability: PlatformCapability): Promise<void> {
        for (const worker of this.workers.values()) {
            let probe: 'ACTIVE' | 'DISCONNECTED';
            try {
                probe = await capability.getWorkerHealth(worker);
            } catch (error) {
                if (error instanceof PlatformUnavailableError) throw error;
                await logWarn('worker.health_probe_failed', {
                    workerId: worker.id,
                    workerName: worker.name,
                    error: errorMessage(error),
                });
                continue;
            }
            if (probe === 'DISCONNECTED' && worker.health !== 'DISCONNECTED') {
                await this.markDisconnected(worker);
            } else if (probe === 'ACTIVE' && worker.health === 'DISCONNECTED') {
                worker.health = this.cooldowns.cooldownUntil(worker) ? 'COOLING' : 'ACTIVE';
                await this.store.saveWorker(worker);
                await logInfo('worker.reconnected', { workerId: worker.id, workerName: worker.name });
            }
        }
    }

    /** COOLING → ACTIVE appena il cooldown è scaduto. */
    private async normalizeHealth(worker: WorkerRecord, now: Date): Promise<void> {
        if (worker.health !== 'COOLING' || !this.cooldowns.isAvailable(worker, now)) return;
        worker.health = 'ACTIVE';
        worker.cooldown_until = null;
        await this.store.saveWorker(worker);
    }

    private isCandidate(worker: WorkerRecord, filter: WorkerSelectionFilter): boolean {
        return filter.allowedRoles.includes(worker.role)
            && !filter.excluded.has(worker.id)
            && worker.health !== 'DISCONNECTED';
    }

    private isResting(worker: WorkerRecord, filter: WorkerSelectionFilter, now: Date): boolean {
        const restingUntil = filter.restingUntil.get(worker.id);
        return !!restingUntil && restingUntil.getTime() > now.getTime();
    }

    async isEligible(worker: WorkerRecord, filter: WorkerSelectionFilter, now: Date): Promise<boolean> {
        if (!this.isCandidate(worker, filter)) return false;
        if (filter.inFlight.has(worker.id) || this.isResting(worker, filter, now)) return false;
        await this.normalizeHealth(worker, now);
        if (!this.cooldowns.isAvailable(worker, now)) return false;
        return (await this.quota.remaining(worker, now)) > 0;
    }

    async selectWorker(filter: WorkerSelectionFilter, now: Date): Promise<WorkerRecord | null> {
        const ordered = [...this.workers.values()].sort((a, b) => compareWorkersForSelection(a, b, filter.preference));
        for (const worker of ordered) {
            if (await this.isEligible(worker, filter, now)) {
                return worker;
            }
        }
        return null;
    }

    /**
     * Primo istante in cui qualche worker può tornare idoneo: per ogni worker il più tardi
     * tra fine riposo, fine cooldown e reset quota; poi il minimo tra i worker.
     * `null` se nessun worker può sbloccarsi da solo (tutti disconnessi, esclusi o in volo).
     */
    async nextWakeInstant(filter: WorkerSelectionFilter, now: Date): Promise<Date | null> {
        let earliest: Date | null = null;
        for (const worker of this.workers.values()) {
            if (!this.isCandidate(worker, filter) || filter.inFlight.has(worker.id)) continue;
            const blockers: Date[] = [];
            const restingUntil = filter.restingUntil.get(worker.id);
            if (restingUntil && restingUntil.getTime() > now.getTime()) blockers.push(restingUntil);
            const cooldownUntil = this.cooldowns.cooldownUntil(worker);
            if (cooldownUntil && cooldownUntil.getTime() > now.getTime()) blockers.push(cooldownUntil);
            if ((await this.quota.remaining(worker, now)) <= 0) blockers.push(this.quota.nextResetInstant(now));

            const wakeAt = blockers.length === 0
                ? now
                : blockers.reduce((latest, candidate) => (candidate.getTime() > latest.getTime() ? candidate : latest));
            if (!earliest || wakeAt.getTime() < earliest.getTime()) {
                earliest = wakeAt;
            }
        }
        return earliest;
    }

    async markCooling(worker: WorkerRecord, until: Date): Promise<Date> {
        const effective = await this.cooldowns.suspend(worker, until);
        if (worker.health !== 'DISCONNECTED') {
            worker.health = 'COOLING';
            await this.store.saveWorker(worker);
        }
        return effective;
    }

    async markDisconnected(worker: WorkerRecord): Promise<void> {
        worker.health = 'DISCONNECTED';
        await this.store.saveWorker(worker);
        await logWarn('worker.disconnected', { workerId: worker.id, workerName: worker.name });
    }

    async markUsed(worker: WorkerRecord, now: Date): Promise<void> {
        worker.last_used_at = now.toISOString();
        await this.store.saveWorker(worker);
    }
}
