/**
 * repositories/workers.ts
 * Domain queries: sessioni worker, contatori giornalieri, cooldown.
 */

import { DatabaseManager } from '../../db';
import { WorkerRecord } from '../../types/domain';
import { type CreateWorkerInput } from '../repositories.types';
import { WORKER_SELECT_COLUMNS } from './sqlColumns';

export async function listWorkers(db: DatabaseManager): Promise<WorkerRecord[]> {
    return db.query<WorkerRecord>(`SELECT ${WORKER_SELECT_COLUMNS} FROM workers ORDER BY id ASC`);
}

export async function getWorkerById(db: DatabaseManager, id: number): Promise<WorkerRecord | null> {
    const row = await db.get<WorkerRecord>(`SELECT ${WORKER_SELECT_COLUMNS} FROM workers WHERE id = ?`, [id]);
    return row ?? null;
}

export async function getWorkerByName(db: DatabaseManager, name: string): Promise<WorkerRecord | null> {
    const row = await db.get<WorkerRecord>(`SELECT ${WORKER_SELECT_COLUMNS} FROM workers WHERE name = ?`, [name]);
    return row ?? null;
}

export async function saveWorker(db: DatabaseManager, record: WorkerRecord): Promise<void> {
    await db.run(
        `
        UPDATE workers
        SET role = ?, health = ?, daily_count = ?, daily_limit = ?, cooldown_until = ?,
            last_reset_date = ?, last_used_at = ?
        WHERE id = ?
    `,
        [
            record.role,
            record.health,
            record.daily_count,
            record.daily_limit,
            record.cooldown_until,
            record.last_reset_date,
            record.last_used_at,
            record.id,
        ]
    );
}

export async function createWorker(
    db: DatabaseManager,
    input: CreateWorkerInput,
    nowIso: string
): Promise<WorkerRecord> {
    const name = input.name.trim();
    if (!name) {
        throw new Error('Nome worker obbligatorio.');
    }
    const existing = await getWorkerByName(db, name);
    if (existing) {
        throw new Error(`Worker già registrato: ${name}`);
    }
    await db.run(
        `
        INSERT INTO workers (name, role, health, daily_count, daily_limit, created_at)
        VALUES (?, ?, 'ACTIVE', 0, ?, ?)
    `,
        [name, input.role, input.dailyLimit ?? null, nowIso]
    );
    // l'id generato si rilegge dal nome univoco, uguale su SQLite e Postgres
    const created = await getWorkerByName(db, name);
    if (!created) {
        throw new Error(`Inserimento worker fallito: ${name}`);
    }
    return created;
}
