/**
 * Database Migrations Runner
 *
 * Runs all pending migrations when a database is opened.
 * Tracks which migrations have been run to avoid re-running.
 */

import type { Database as DatabaseType } from 'better-sqlite3';
import { createLogger, type Logger } from './logger';

interface Migration {
    name: string;
    up: (db: DatabaseType) => void;
}

// Timestamps are ISO-8601 UTC with milliseconds
const NOW = `(strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))`;

const MIGRATIONS: Migration[] = [
    {
        name: 'v1-catalog-schema',
        up: (db) => {
            db.exec(`
                CREATE TABLE IF NOT EXISTS artists (
                    id INTEGER PRIMARY KEY,
                    name TEXT NOT NULL,
                    link TEXT,
                    picture TEXT,
                    picture_small TEXT,
                    picture_medium TEXT,
                    picture_big TEXT,
                    picture_xl TEXT,
                    nb_album INTEGER NOT NULL DEFAULT 0,
                    nb_fan INTEGER NOT NULL DEFAULT 0,
                    radio INTEGER NOT NULL DEFAULT 0,
                    tracklist TEXT,
                    type TEXT NOT NULL DEFAULT 'artist'
                )
            `);

            db.exec(`
                CREATE TABLE IF NOT EXISTS albums (
                    id INTEGER PRIMARY KEY,
                    title TEXT NOT NULL,
                    link TEXT,
                    cover TEXT,
                    cover_small TEXT,
                    cover_medium TEXT,
                    cover_big TEXT,
                    cover_xl TEXT,
                    genre_id INTEGER,
                    fans INTEGER NOT NULL DEFAULT 0,
                    release_date TEXT,
                    record_type TEXT NOT NULL DEFAULT 'album',
                    explicit_lyrics INTEGER NOT NULL DEFAULT 0,
                    artist_id INTEGER NOT NULL,
                    FOREIGN KEY (artist_id) REFERENCES artists(id)
                )
            `);

            db.exec(`
                CREATE INDEX IF NOT EXISTS idx_albums_artist_release ON albums(artist_id, release_date);
                CREATE INDEX IF NOT EXISTS idx_artists_name ON artists(name);
            `);
        },
    },
    {
        name: 'v1-scan-results',
        up: (db) => {
            db.exec(`
                CREATE TABLE IF NOT EXISTS scan_results (
                    id INTEGER PRIMARY KEY AUTOINCREMENT,
                    folder_path TEXT NOT NULL,
                    scan_dump TEXT NOT NULL,
                    scan_date TEXT NOT NULL DEFAULT ${NOW}
                )
            `);
            db.exec(`CREATE INDEX IF NOT EXISTS idx_scan_results_folder ON scan_results(folder_path, id)`);
        },
    },
    {
        // Which normalized folder name resolved to which artist
        name: 'v2-artist-keys',
        up: (db) => {
            db.exec(`
                CREATE TABLE IF NOT EXISTS artist_keys (
                    key TEXT PRIMARY KEY,
                    artist_id INTEGER NOT NULL,
                    normalizer_version INTEGER NOT NULL,
                    created_at TEXT NOT NULL DEFAULT ${NOW},
                    FOREIGN KEY (artist_id) REFERENCES artists(id) ON DELETE CASCADE
                )
            `);
            db.exec(`CREATE INDEX IF NOT EXISTS idx_artist_keys_artist ON artist_keys(artist_id)`);
        },
    },
    {
        name: 'v3-artist-refreshed-at',
        up: (db) => addColumn(db, 'artists', 'refreshed_at', 'TEXT'),
    },
];

// Migration helper
function addColumn(db: DatabaseType, table: string, column: string, type: string): void {
    const columns = db.prepare<[], { name: string }>(`PRAGMA table_info(${table})`).all();
    if (columns.some((c) => c.name === column)) return;
    db.prepare(`ALTER TABLE ${table} ADD COLUMN ${column} ${type}`).run();
}

function ensureMigrationsTable(db: DatabaseType): void {
    db.exec(`
        CREATE TABLE IF NOT EXISTS migrations (
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            name TEXT UNIQUE NOT NULL,
            executed_at TEXT DEFAULT ${NOW}
        )
    `);
}

/**
 * Check if a migration has already been run
 */
function isMigrationRun(db: DatabaseType, name: string): boolean {
    const result = db.prepare('SELECT 1 FROM migrations WHERE name = ?').get(name);
    return !!result;
}

/**
 * Run all pending migrations, each in its own transaction.
 * Returns the names of the migrations applied by this call.
 */
export function runAllMigrations(db: DatabaseType, logger: Logger = createLogger('Migrations')): string[] {
    ensureMigrationsTable(db);

    const applied: string[] = [];
    for (const migration of MIGRATIONS) {
        if (isMigrationRun(db, migration.name)) continue;

        logger.info(`Running ${migration.name}...`);
        db.transaction(() => {
            migration.up(db);
            db.prepare('INSERT INTO migrations (name) VALUES (?)').run(migration.name);
        })();
        applied.push(migration.name);
    }

    if (applied.length > 0) {
        logger.info(`Applied ${applied.length} migration(s)`);
    }
    return applied;
}

export default { runAllMigrations };
