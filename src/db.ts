import { Pool, QueryResult } from 'pg';
import sqlite3 from 'sqlite3';
import { open, Database as SQLiteDatabase } from 'sqlite';
import path from 'path';
import fs from 'fs';
import { config } from './config';
import { SerialGate } from './core/serialGate';
import { ensureDatabaseDirectory, restrictDatabaseFile } from './security/filesystem';

export interface DBRunResult {
    changes: number;
}

export type DatabaseDialect = 'sqlite' | 'postgres';

// ------------------------------------------------------------------
// INTERFACE ASTRAZIONE DB
// ------------------------------------------------------------------
export interface DatabaseManager {
    readonly dialect: DatabaseDialect;
    query<T = unknown>(sql: string, params?: unknown[]): Promise<T[]>;
    get<T = unknown>(sql: string, params?: unknown[]): Promise<T | undefined>;
    exec(sql: string, params?: unknown[]): Promise<void>;
    run(sql: string, params?: unknown[]): Promise<DBRunResult>;
    /**
     * Esegue `callback` dentro BEGIN/COMMIT (ROLLBACK se lancia).
     * Le query della transazione vanno fatte sul manager `tx` ricevuto, non su `this`:
     * su Postgres è legato a una singola connessione del pool.
     */
    transaction<T>(callback: (tx: DatabaseManager) => Promise<T>): Promise<T>;
    close(): Promise<void>;
}

async function runInTransaction<T>(tx: DatabaseManager, callback: (tx: DatabaseManager) => Promise<T>): Promise<T> {
    await tx.exec('BEGIN');
    try {
        const result = await callback(tx);
        await tx.exec('COMMIT');
        return result;
    } catch (error) {
        await tx.exec('ROLLBACK');
        throw error;
    }
}

// ------------------------------------------------------------------
// WRAPPER SQLITE
// ------------------------------------------------------------------
class SQLiteManager implements DatabaseManager {
    readonly dialect = 'sqlite' as const;
    // una sola connessione: le transazioni non possono annidarsi
    private readonly transactionGate = new SerialGate();

    constructor(private readonly db: SQLiteDatabase) {}

    async query<T = unknown>(sql: string, params?: unknown[]): Promise<T[]> {
        return this.db.all<T[]>(sql, params ?? []);
    }

    async get<T = unknown>(sql: string, params?: unknown[]): Promise<T | undefined> {
        return this.db.get<T>(sql, params ?? []);
    }

    async exec(sql: string, params?: unknown[]): Promise<void> {
        // più statement senza parametri via exec, statement singolo con parametri via run
        if (params && params.length > 0) {
            await this.db.run(sql, params);
        } else {
            await this.db.exec(sql);
        }
    }

    async run(sql: string, params?: unknown[]): Promise<DBRunResult> {
        const result = await this.db.run(sql, params ?? []);
        return { changes: result.changes ?? 0 };
    }

    transaction<T>(callback: (tx: DatabaseManager) => Promise<T>): Promise<T> {
        return this.transactionGate.runExclusive(() => runInTransaction(this, callback));
    }

    async close(): Promise<void> {
        await this.db.close();
    }
}

// ------------------------------------------------------------------
// WRAPPER POSTGRES
// ------------------------------------------------------------------

// Adattatore sintassi: `?` diventa `$1`, `$2`…; INSERT OR IGNORE diventa ON CONFLICT DO NOTHING
export function toPostgresSql(sql: string): string {
    let count = 1;
    let normalized = sql.replace(/\?/g, () => `$${count++}`);

    const hadInsertOrIgnore = /\bINSERT\s+OR\s+IGNORE\s+INTO\b/i.test(normalized);
    normalized = normalized.replace(/\bINSERT\s+OR\s+IGNORE\s+INTO\b/gi, 'INSERT INTO');
    if (hadInsertOrIgnore && !/\bON\s+CONFLICT\b/i.test(normalized)) {
        normalized = `${normalized.replace(/;\s*$/, '')} ON CONFLICT DO NOTHING`;
    }
    return normalized;
}

/** Pool o client dedicato: per le query serve solo `query`. */
interface PgQueryable {
    query(text: string, values?: unknown[]): Promise<QueryResult>;
}

/** Query su un client già acquisito: usato per le transazioni. */
class PostgresClientManager implements DatabaseManager {
    readonly dialect = 'postgres' as const;

    constructor(protected readonly target: PgQueryable) {}

    async query<T = unknown>(sql: string, params?: unknown[]): Promise<T[]> {
        const result = await this.target.query(toPostgresSql(sql), params);
        return result.rows;
    }

    async get<T = unknown>(sql: string, params?: unknown[]): Promise<T | undefined> {
        const rows = await this.query<T>(sql, params);
        return rows[0];
    }

    async exec(sql: string, params?: unknown[]): Promise<void> {
        await this.target.query(toPostgresSql(sql), params);
    }

    async run(sql: string, params?: unknown[]): Promise<DBRunResult> {
        const result = await this.target.query(toPostgresSql(sql), params);
        return { changes: result.rowCount ?? 0 };
    }

    transaction<T>(callback: (tx: DatabaseManager) => Promise<T>): Promise<T> {
        // già dentro una connessione dedicata: niente transazioni annidate
        return callback(this);
    }

    async close(): Promise<void> {
        // il client appartiene al pool, lo rilascia `PostgresManager.transaction`
    }
}

class PostgresManager extends PostgresClientManager {
    constructor(private readonly pool: Pool) {
        super(pool);
    }

    async transaction<T>(callback: (tx: DatabaseManager) => Promise<T>): Promise<T> {
        const client = await this.pool.connect();
        try {
            return await runInTransaction(new PostgresClientManager(client), callback);
        } finally {
            client.release();
        }
    }

    async close(): Promise<void> {
        await this.pool.end();
    }
}

// ------------------------------------------------------------------
// MIGRAZIONI
// ------------------------------------------------------------------
function resolveMigrationDirectory(): string {
    const candidates = [
        path.resolve(process.cwd(), 'src', 'db', 'migrations'),
        path.resolve(__dirname, 'db', 'migrations'),
    ];
    const found = candidates.find((candidate) => fs.existsSync(candidate));
    if (!found) {
        throw new Error(`Cartella migrazioni non trovata (cercata in: ${candidates.join(', ')}).`);
    }
    return found;
}

function migrationsTableSql(dialect: DatabaseDialect): string {
    const idColumn = dialect === 'postgres' ? 'id SERIAL PRIMARY KEY' : 'id INTEGER PRIMARY KEY AUTOINCREMENT';
    return `CREATE TABLE IF NOT EXISTS _migrations (
        ${idColumn},
        name TEXT NOT NULL UNIQUE,
        applied_at TEXT NOT NULL
    );`;
}

function readMigration(directory: string, fileName: string, dialect: DatabaseDialect): string {
    const sql = fs.readFileSync(path.join(directory, fileName), 'utf8');
    return dialect === 'postgres'
        ? sql.replace(/INTEGER PRIMARY KEY AUTOINCREMENT/gi, 'SERIAL PRIMARY KEY')
        : sql;
}

/** Applica in ordine i file `.sql` non ancora registrati in `_migrations`. Restituisce i nomi applicati. */
export async function applyMigrations(database: DatabaseManager): Promise<string[]> {
    await database.exec(migrationsTableSql(database.dialect));

    const directory = resolveMigrationDirectory();
    const applied = new Set(
        (await database.query<{ name: string }>(`SELECT name FROM _migrations`)).map((row) => row.name),
    );
    const pending = fs
        .readdirSync(directory)
        .filter((file) => file.endsWith('.sql') && !applied.has(file))
        .sort((a, b) => a.localeCompare(b));

    for (const fileName of pending) {
        const sql = readMigration(directory, fileName, database.dialect);
        try {
            await database.transaction(async (tx) => {
                await tx.exec(sql);
                await tx.run(`INSERT OR IGNORE INTO _migrations (name, applied_at) VALUES (?, ?)`, [
                    fileName,
                    new Date().toISOString(),
                ]);
            });
        } catch (error) {
            console.error(`[ERROR] db.migration_failed file=${fileName}`);
            throw error;
        }
    }
    return pending;
}

// ------------------------------------------------------------------
// ISTANZA E INIZIALIZZAZIONE
// ------------------------------------------------------------------
let dbInstance: DatabaseManager | null = null;

/** Apre un database SQLite senza toccare il singleton (`:memory:` nei test). */
export async function openSqliteDatabase(filename: string): Promise<DatabaseManager> {
    const sqliteDb = await open({
        filename,
        driver: sqlite3.Database,
    });
    if (filename !== ':memory:') {
        await sqliteDb.exec(`PRAGMA journal_mode = WAL;`);
    }
    await sqliteDb.exec(`PRAGMA busy_timeout = 5000;`);
    await sqliteDb.exec(`PRAGMA synchronous = NORMAL;`);
    return new SQLiteManager(sqliteDb);
}

async function openPostgresDatabase(connectionString: string): Promise<DatabaseManager> {
    const postgres = new PostgresManager(new Pool({ connectionString }));
    try {
        await postgres.query('SELECT 1');
    } catch (error) {
        await postgres.close();
        throw error;
    }
    return postgres;
}

export async function getDatabase(): Promise<DatabaseManager> {
    if (dbInstance) return dbInstance;

    if (config.databaseUrl.startsWith('postgres')) {
        console.log('[INFO] db.connecting dialect=postgres');
        dbInstance = await openPostgresDatabase(config.databaseUrl);
        return dbInstance;
    }

    if (process.env.NODE_ENV === 'production' && !config.allowSqliteInProduction) {
        throw new Error(
            'SQLite in produzione bloccato. Fornisci un DATABASE_URL (PostgreSQL) oppure imposta ALLOW_SQLITE_IN_PRODUCTION=true esplicitamente.'
        );
    }

    ensureDatabaseDirectory(config.dbPath);
    dbInstance = await openSqliteDatabase(config.dbPath);
    restrictDatabaseFile(config.dbPath);
    return dbInstance;
}

export async function initDatabase(): Promise<DatabaseManager> {
    const database = await getDatabase();
    await applyMigrations(database);
    return database;
}

export async function closeDatabase(): Promise<void> {
    if (dbInstance) {
        await dbInstance.close();
        dbInstance = null;
    }
}
