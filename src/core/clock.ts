/**
 * Sorgente del tempo per il supervisor.
 *
 * Tutte le attese passano da `sleep(ms, signal)`: nessun polling attivo, e un
 * `AbortSignal` permette di svegliare l'attesa (stop, completamento di un tentativo).
 * L'attesa interrotta si risolve, non rigetta.
 */
export interface Clock {
    now(): Date;
    sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

// setTimeout accetta al massimo un int32 firmato: oltre, Node lo tratta come 1ms.
const MAX_TIMER_MS = 2_147_483_647;

export const systemClock: Clock = {
    now: () => new Date(),
    sleep: (ms: number, signal?: AbortSignal) => new Promise<void>((resolve) => {
        if (signal?.aborted) {
            resolve();
            return;
        }
        const timer = setTimeout(finish, Math.min(MAX_TIMER_MS, Math.max(0, ms)));
        function finish(): void {
            clearTimeout(timer);
            signal?.removeEventListener('abort', finish);
            resolve();
        }
        signal?.addEventListener('abort', finish, { once: true });
    }),
};

interface PendingTimer {
    wakeAtMs: number;
    seq: number;
    resolve: () => void;
}

/**
 * Orologio manuale: il tempo avanza solo con `advanceBy` / `advanceTo`.
 * Tra un timer e il successivo lascia esaurire le microtask, così ogni
 * contesto asincrono raggiunge il proprio punto di attesa prima che l'orologio si muova.
 */
export class ManualClock implements Clock {
    private currentMs: number;
    private timers: PendingTimer[] = [];
    private seq = 0;

    constructor(start: Date) {
        this.currentMs = start.getTime();
    }

    now(): Date {
        return new Date(this.currentMs);
    }

    sleep(ms: number, signal?: AbortSignal): Promise<void> {
        return new Promise<void>((resolve) => {
            if (signal?.aborted) {
                resolve();
                return;
            }
            const timer: PendingTimer = {
                wakeAtMs: this.currentMs + Math.max(0, ms),
                seq: this.seq++,
                resolve: () => {
                    signal?.removeEventListener('abort', onAbort);
                    resolve();
                },
            };
            const onAbort = (): void => {
                this.timers = this.timers.filter((candidate) => candidate !== timer);
                resolve();
            };
            signal?.addEventListener('abort', onAbort, { once: true });
            this.timers.push(timer);
        });
    }

    pendingTimers(): number {
        return this.timers.length;
    }

    async advanceBy(ms: number): Promise<void> {
        await this.advanceTo(new Date(this.currentMs + ms));
    }

    async advanceTo(target: Date): Promise<void> {
        const targetMs = target.getTime();
        await settle();
        while (true) {
            const next = this.earliestTimer();
            if (!next || next.wakeAtMs > targetMs) break;
            this.timers = this.timers.filter((candidate) => candidate !== next);
            this.currentMs = Math.max(this.currentMs, next.wakeAtMs);
            next.resolve();
            await settle();
        }
        this.currentMs = Math.max(this.currentMs, targetMs);
        await settle();
    }

    private earliestTimer(): PendingTimer | null {
        let earliest: PendingTimer | null = null;
        for (const timer of this.timers) {
            if (!earliest || timer.wakeAtMs < earliest.wakeAtMs || (timer.wakeAtMs === earliest.wakeAtMs && timer.seq < earliest.seq)) {
                earliest = timer;
            }
        }
        return earliest;
    }
}

/** Lascia girare l'event loop finché le catene di promise in corso non si fermano. */
export async function settle(rounds: number = 5): Promise<void> {
    for (let i = 0; i < rounds; i++) {
        await new Promise<void>((resolve) => setImmediate(resolve));
    }
}

/**
 * Segnale di risveglio riarmabile: `notify()` interrompe le attese in corso sul segnale
 * corrente e ne arma uno nuovo. Chi attende deve leggere `signal` prima di valutare lo stato,
 * così una notifica arrivata nel frattempo non va persa.
 */
export class WakeSignal {
    private controller = new AbortController();

    get signal(): AbortSignal {
        return this.controller.signal;
    }

    notify(): void {
        const previous = this.controller;
        this.controller = new AbortController();
        previous.abort();
    }
}
