import { SupervisorStore } from '../core/repositories.types';
import { WorkerRecord } from '../types/domain';

function parseInstant(raw: string | null): Date | null {
    if (!raw) return null;
    const parsed = Date.parse(raw);
    return Number.isFinite(parsed) ? new Date(parsed) : null;
}

/** Finestre di sospensione imposte dalla piattaforma. La scadenza si verifica in lettura. */
export class CooldownRegistry {
    constructor(private readonly store: SupervisorStore) {}

    cooldownUntil(worker: WorkerRecord): Date | null {
        return parseInstant(worker.cooldown_until);
    }

    isAvailable(worker: WorkerRecord, now: Date): boolean {
        const until = this.cooldownUntil(worker);
        return until === null || until.getTime() <= now.getTime();
    }

    /** Se è già in corso una sospensione più lunga, resta quella. */
    async suspend(worker: WorkerRecord, until: Date): Promise<Date> {
        const current = this.cooldownUntil(worker);
        const effective = current && current.getTime() > until.getTime() ? current : until;
        worker.cooldown_until = effective.toISOString();
        await this.store.saveWorker(worker);
        return effective;
    }
}
