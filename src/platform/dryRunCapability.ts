import { Clock, systemClock } from '../core/clock';
import { WorkerRecord } from '../types/domain';
import { AddMemberResult, JoinResult, PlatformCapability, WorkerHealthProbe } from './capability';

export interface DryRunCall {
    workerId: number;
    destinationId: string;
    identifier: string;
    message: string | null;
}

export interface DryRunOptions {
    clock?: Clock;
    /** Latenza simulata di ogni chiamata remota. */
    latencyMs?: number;
    /** Esito per identificativo; default `OK`. */
    decide?: (identifier: string, worker: WorkerRecord) => AddMemberResult;
}

/**
 * Capability che non parla con nessuna piattaforma: registra le chiamate
 * e risponde con esiti simulati. Usata da `run --dry-run`.
 */
export class DryRunCapability implements PlatformCapability {
    readonly calls: DryRunCall[] = [];
    private readonly clock: Clock;
    private readonly latencyMs: number;
    private readonly decide: (identifier: string, worker: WorkerRecord) => AddMemberResult;

    constructor(options: DryRunOptions = {}) {
        this.clock = options.clock ?? systemClock;
        this.latencyMs = Math.max(0, options.latencyMs ?? 0);
        this.decide = options.decide ?? (() => ({ kind: 'OK' }));
    }

    async joinDestination(_worker: WorkerRecord, _destinationId: string): Promise<JoinResult> {
        return { kind: 'ALREADY_MEMBER' };
    }

    async addMember(worker: WorkerRecord, destinationId: string, identifier: string, message?: string): Promise<AddMemberResult> {
        this.calls.push({ workerId: worker.id, destinationId, identifier, message: message ?? null });
        if (this.latencyMs > 0) {
            await this.clock.sleep(this.latencyMs);
        }
        return this.decide(identifier, worker);
    }

    async getWorkerHealth(_worker: WorkerRecord): Promise<WorkerHealthProbe> {
        return 'ACTIVE';
    }
}
