import Database, { Database as DatabaseType } from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { StoreError } from './errors';
import { createLogger, type Logger } from './logger';
import { runAllMigrations } from './migrations';

export type { DatabaseType };

export const IN_MEMORY = ':memory:';

/**
 * Open (and create if needed) the catalog database, apply pragmas and run
 * pending migrations. Any failure is a StoreError: without a store there is
 * no audit trail, so callers abort.
 */
export function openDatabase(file: string, logger: Logger = createLogger('DB')): DatabaseType {
    try {
        if (file !== IN_MEMORY) {
            fs.mkdirSync(path.dirname(path.resolve(file)), { recursive: true });
        }

        const db: DatabaseType = new Database(file);

        if (file !== IN_MEMORY) {
            // Optimize for performance
            db.pragma('journal_mode = WAL');
            db.pragma('synchronous = NORMAL');
        }
        db.pragma('foreign_keys = ON');
        db.pragma('busy_timeout = 5000');

        runAllMigrations(db, logger.child('Migrations'));
        return db;
    } catch (error) {
        throw StoreError.from(error, `Cannot open database ${file}`);
    }
}

/**
 * Execute a function within a transaction with automatic rollback on error
 */
export function withTransaction<T>(db: DatabaseType, fn: () => T): T {
    const transaction = db.transaction(fn);
    return transaction();
}

export function closeDatabase(db: DatabaseType, logger: Logger = createLogger('DB')): void {
    if (!db.open) return;
    try {
        db.close();
        logger.info('Database connection closed.');
    } catch (error) {
        throw StoreError.from(error, 'Error closing database connection');
    }
}
