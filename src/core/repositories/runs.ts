/**
 * repositories/runs.ts
 * Domain queries: stato persistito delle run e log di run.
 */

import { DatabaseManager } from '../../db';
import { RunLogRecord, RunRecord, RunStatus } from '../../types/domain';
import { type AppendRunLogInput } from '../repositories.types';
import { RUN_LOG_SELECT_COLUMNS, RUN_SELECT_COLUMNS } from './sqlColumns';
import { placeholders } from './shared';

export async function saveRun(db: DatabaseManager, record: RunRecord): Promise<void> {
    const updated = await db.run(
        `
        UPDATE runs
        SET status = ?, config_json = ?, finished_at = ?, processed_count = ?, success_count = ?,
            failure_count = ?, last_error = ?
        WHERE id = ?
    `,
        [
            record.status,
            record.config_json,
            record.finished_at,
            record.processed_count,
            record.success_count,
            record.failure_count,
            record.last_error,
            record.id,
        ]
    );
    if (updated.changes > 0) return;

    await db.run(
        `
        INSERT INTO runs (id, destination_id, status, config_json, started_at, finished_at,
            processed_count, success_count, failure_count, last_error)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `,
        [
            record.id,
            record.destination_id,
            record.status,
            record.config_json,
            record.started_at,
            record.finished_at,
            record.processed_count,
            record.success_count,
            record.failure_count,
            record.last_error,
        ]
    );
}

export async function getRunById(db: DatabaseManager, id: string): Promise<RunRecord | null> {
    const row = await db.get<RunRecord>(`SELECT ${RUN_SELECT_COLUMNS} FROM runs WHERE id = ?`, [id]);
    return row ?? null;
}

export async function listRunsByStatus(db: DatabaseManager, statuses: RunStatus[]): Promise<RunRecord[]> {
    if (statuses.length === 0) return [];
    return db.query<RunRecord>(
        `SELECT ${RUN_SELECT_COLUMNS} FROM runs WHERE status IN (${placeholders(statuses.length)}) ORDER BY started_at ASC, id ASC`,
        statuses
    );
}

export async function appendRunLog(db: DatabaseManager, input: AppendRunLogInput): Promise<void> {
    await db.run(
        `INSERT INTO run_logs (run_id, level, event, payload_json, created_at) VALUES (?, ?, ?, ?, ?)`,
        [input.runId, input.level, input.event, JSON.stringify(input.payload), input.createdAt]
    );
}

export async function listRunLogs(db: DatabaseManager, runId: string, limit: number = 200): Promise<RunLogRecord[]> {
    return db.query<RunLogRecord>(
        `SELECT ${RUN_LOG_SELECT_COLUMNS} FROM run_logs WHERE run_id = ? ORDER BY id ASC LIMIT ?`,
        [runId, Math.max(1, Math.floor(limit))]
    );
}
