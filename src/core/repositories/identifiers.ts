/**
 * repositories/identifiers.ts
 * Domain queries: coda identificativi, conteggi per stato, import idempotente, riaccodamento.
 */

import { DatabaseManager } from '../../db';
import { IdentifierRecord, IdentifierStatus, IdentifierStatusCounts } from '../../types/domain';
import { emptyStatusCounts, type InsertIdentifiersResult } from '../repositories.types';
import { IDENTIFIER_SELECT_COLUMNS } from './sqlColumns';
import { toCount } from './shared';

export async function listIdentifiersByStatus(
    db: DatabaseManager,
    status: IdentifierStatus,
    limit?: number
): Promise<IdentifierRecord[]> {
    if (limit !== undefined) {
        return db.query<IdentifierRecord>(
            `SELECT ${IDENTIFIER_SELECT_COLUMNS} FROM identifiers WHERE status = ? ORDER BY id ASC LIMIT ?`,
            [status, Math.max(0, Math.floor(limit))]
        );
    }
    return db.query<IdentifierRecord>(
        `SELECT ${IDENTIFIER_SELECT_COLUMNS} FROM identifiers WHERE status = ? ORDER BY id ASC`,
        [status]
    );
}

export async function getIdentifierById(db: DatabaseManager, id: number): Promise<IdentifierRecord | null> {
    const row = await db.get<IdentifierRecord>(
        `SELECT ${IDENTIFIER_SELECT_COLUMNS} FROM identifiers WHERE id = ?`,
        [id]
    );
    return row ?? null;
}

export async function saveIdentifier(db: DatabaseManager, record: IdentifierRecord): Promise<void> {
    await db.run(
        `
        UPDATE identifiers
        SET status = ?, attempt_count = ?, last_attempt_at = ?, last_error = ?, updated_at = ?
        WHERE id = ?
    `,
        [record.status, record.attempt_count, record.last_attempt_at, record.last_error, record.updated_at, record.id]
    );
}

export async function countIdentifiersByStatus(db: DatabaseManager): Promise<IdentifierStatusCounts> {
    const rows = await db.query<{ status: string; total: string | number }>(
        `SELECT status, COUNT(*) as total FROM identifiers GROUP BY status`
    );
    const counts = emptyStatusCounts();
    for (const row of rows) {
        if (row.status === 'PENDING' || row.status === 'ADDED' || row.status === 'FAILED' || row.status === 'BLACKLISTED') {
            counts[row.status] = toCount(row.total);
        }
    }
    return counts;
}

export async function insertIdentifiers(
    db: DatabaseManager,
    values: string[],
    nowIso: string
): Promise<InsertIdentifiersResult> {
    return db.transaction(async (tx) => {
        let inserted = 0;
        let skipped = 0;
        for (const value of values) {
            const result = await tx.run(
                `INSERT OR IGNORE INTO identifiers (value, status, attempt_count, created_at) VALUES (?, 'PENDING', 0, ?)`,
                [value, nowIso]
            );
            if (result.changes > 0) {
                inserted++;
            } else {
                skipped++;
            }
        }
        return { inserted, skipped };
    });
}

export async function requeueFailedIdentifiers(db: DatabaseManager, nowIso: string): Promise<number> {
    const result = await db.run(
        `
        UPDATE identifiers
        SET status = 'PENDING', attempt_count = 0, updated_at = ?
        WHERE status = 'FAILED'
    `,
        [nowIso]
    );
    return result.changes;
}

export async function listIdentifiers(db: DatabaseManager, offset: number, limit: number): Promise<IdentifierRecord[]> {
    return db.query<IdentifierRecord>(
        `SELECT ${IDENTIFIER_SELECT_COLUMNS} FROM identifiers ORDER BY id ASC LIMIT ? OFFSET ?`,
        [Math.max(1, Math.floor(limit)), Math.max(0, Math.floor(offset))]
    );
}

export async function deleteIdentifierByValue(db: DatabaseManager, value: string): Promise<boolean> {
    const result = await db.run(`DELETE FROM identifiers WHERE value = ?`, [value]);
    return result.changes > 0;
}

export async function deleteAllIdentifiers(db: DatabaseManager): Promise<number> {
    const result = await db.run(`DELETE FROM identifiers`);
    return result.changes;
}
