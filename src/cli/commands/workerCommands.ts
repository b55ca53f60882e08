/**
 * workerCommands.ts — Registrazione e stato dei worker
 *
 * add-worker, workers
 */

import { SupervisorStore } from '../../core/repositories.types';
import { getOptionValue, getPositionalArgs, parseNullableLimit, parseWorkerRole } from '../cliParser';

export async function runAddWorkerCommand(store: SupervisorStore, args: string[]): Promise<void> {
    const name = getOptionValue(args, '--name') ?? getPositionalArgs(args)[0];
    if (!name) {
        throw new Error('Uso: add-worker --name <nome_sessione> [--role admin|user] [--daily-limit <n>|none]');
    }
    const role = parseWorkerRole(getOptionValue(args, '--role'));
    const limitRaw = getOptionValue(args, '--daily-limit');
    const dailyLimit = limitRaw ? parseNullableLimit(limitRaw, '--daily-limit') : null;
    const worker = await store.createWorker({ name, role, dailyLimit }, new Date().toISOString());
    console.log(JSON.stringify(worker, null, 2));
}

export async function runWorkersCommand(store: SupervisorStore): Promise<void> {
    const workers = await store.listWorkers();
    if (workers.length === 0) {
        console.log('Nessun worker registrato. Usa: add-worker --name <nome_sessione>');
        return;
    }
    console.table(workers.map((worker) => ({
        id: worker.id,
        name: worker.name,
        role: worker.role,
        health: worker.health,
        today: `${worker.daily_count}/${worker.daily_limit ?? 'default'}`,
        cooldownUntil: worker.cooldown_until ?? '-',
        lastUsedAt: worker.last_used_at ?? '-',
    })));
}
