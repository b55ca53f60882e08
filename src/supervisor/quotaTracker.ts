import { getLocalDateString, getNextLocalMidnight } from '../config';
import { SupervisorStore } from '../core/repositories.types';
import { WorkerRecord } from '../types/domain';

/**
 * Contatori giornalieri per worker. Il reset è pigro: ad ogni accesso si confronta
 * `last_reset_date` con la data locale corrente, quindi regge anche un processo
 * rimasto spento a cavallo della mezzanotte.
 */
export class QuotaTracker {
    constructor(
        private readonly store: SupervisorStore,
        private readonly dailyLimitDefault: number,
        private readonly timezone: string
    ) {}

    effectiveLimit(worker: WorkerRecord): number {
        return worker.daily_limit ?? this.dailyLimitDefault;
    }

    /** Ritorna true se il contatore è stato azzerato (e persistito). */
    async resetIfNewDay(worker: WorkerRecord, now: Date): Promise<boolean> {
        const today = getLocalDateString(now, this.timezone);
        if (worker.last_reset_date === today) return false;
        worker.daily_count = 0;
        worker.last_reset_date = today;
        await this.store.saveWorker(worker);
        return true;
    }

    async remaining(worker: WorkerRecord, now: Date): Promise<number> {
        await this.resetIfNewDay(worker, now);
        return Math.max(0, this.effectiveLimit(worker) - worker.daily_count);
    }

    /** Consuma un'unità di quota. Va chiamato dentro il SerialGate. */
    async reserve(worker: WorkerRecord, now: Date): Promise<boolean> {
        if ((await this.remaining(worker, now)) <= 0) {
            return false;
        }
        worker.daily_count += 1;
        await this.store.saveWorker(worker);
        return true;
    }

    /** Restituisce una prenotazione che la piattaforma non ha consumato (rate limit, sessione invalida). */
    async release(worker: WorkerRecord): Promise<void> {
        if (worker.daily_count <= 0) return;
        worker.daily_count -= 1;
        await this.store.saveWorker(worker);
    }

    nextResetInstant(now: Date): Date {
        return getNextLocalMidnight(now, this.timezone);
    }
}
