/**
 * Metadata Repository
 *
 * Owns every read and write on the catalog tables (artists, albums,
 * artist_keys) and the append-only scan_results audit table.
 *
 * better-sqlite3 is synchronous: a statement or transaction runs to
 * completion before any other JavaScript does, so multi-row writes wrapped
 * in a transaction can never interleave with another worker's writes.
 */

import type { AlbumRecord, ArtistRecord, Resolution, ScanResultRecord, ScanSummary } from '../types';
import { withTransaction, type DatabaseType } from './db';
import { StoreError } from './errors';
import { createLogger, type Logger } from './logger';
import { NORMALIZER_VERSION } from './normalization';

// Rows as SQLite returns them: booleans are 0/1
interface ArtistRow {
    id: number;
    name: string;
    link: string | null;
    picture: string | null;
    picture_small: string | null;
    picture_medium: string | null;
    picture_big: string | null;
    picture_xl: string | null;
    nb_album: number;
    nb_fan: number;
    radio: number;
    tracklist: string | null;
    type: string;
    refreshed_at: string | null;
}

interface AlbumRow {
    id: number;
    title: string;
    link: string | null;
    cover: string | null;
    cover_small: string | null;
    cover_medium: string | null;
    cover_big: string | null;
    cover_xl: string | null;
    genre_id: number | null;
    fans: number;
    release_date: string | null;
    record_type: string;
    explicit_lyrics: number;
    artist_id: number;
}

type ArtistParams = Omit<ArtistRow, 'refreshed_at'> & { refreshed_at: string | null };

function toArtistRecord(row: ArtistRow): ArtistRecord {
    return { ...row, radio: row.radio === 1 };
}

function toAlbumRecord(row: AlbumRow): AlbumRecord {
    return { ...row, explicit_lyrics: row.explicit_lyrics === 1 };
}

function toArtistParams(record: ArtistRecord): ArtistParams {
    return {
        id: record.id,
        name: record.name,
        link: record.link,
        picture: record.picture,
        picture_small: record.picture_small,
        picture_medium: record.picture_medium,
        picture_big: record.picture_big,
        picture_xl: record.picture_xl,
        nb_album: record.nb_album,
        nb_fan: record.nb_fan,
        radio: record.radio ? 1 : 0,
        tracklist: record.tracklist,
        type: record.type,
        refreshed_at: record.refreshed_at ?? null,
    };
}

function toAlbumParams(record: AlbumRecord): AlbumRow {
    return { ...record, explicit_lyrics: record.explicit_lyrics ? 1 : 0 };
}

export interface ListScansOptions {
    folderPath?: string;
    limit?: number;
}

export class MetadataRepository {
    constructor(
        private readonly db: DatabaseType,
        private readonly logger: Logger = createLogger('Repository')
    ) {}

    /**
     * Test the database connection.
     */
    ping(): boolean {
        return this.run('ping', () => {
            const row = this.db.prepare<[], { ok: number }>('SELECT 1 AS ok').get();
            return row?.ok === 1;
        });
    }

    findArtistByKey(key: string): ArtistRecord | null {
        if (!key) return null;
        return this.run(`findArtistByKey(${key})`, () => {
            const row = this.db.prepare<[string], ArtistRow>(`
                SELECT a.* FROM artist_keys k
                JOIN artists a ON a.id = k.artist_id
                WHERE k.key = ?
            `).get(key);
            return row ? toArtistRecord(row) : null;
        });
    }

    getArtist(id: number): ArtistRecord | null {
        return this.run(`getArtist(${id})`, () => {
            const row = this.db.prepare<[number], ArtistRow>('SELECT * FROM artists WHERE id = ?').get(id);
            return row ? toArtistRecord(row) : null;
        });
    }

    /**
     * Insert or update an artist. Mutable fields take the incoming values;
     * refreshed_at is only overwritten when the record carries one.
     */
    upsertArtist(record: ArtistRecord): ArtistRecord {
        return this.run(`upsertArtist(${record.id})`, () => {
            this.db.prepare<ArtistParams>(`
                INSERT INTO artists (id, name, link, picture, picture_small, picture_medium,
                    picture_big, picture_xl, nb_album, nb_fan, radio, tracklist, type, refreshed_at)
                VALUES (@id, @name, @link, @picture, @picture_small, @picture_medium,
                    @picture_big, @picture_xl, @nb_album, @nb_fan, @radio, @tracklist, @type, @refreshed_at)
                ON CONFLICT(id) DO UPDATE SET
                    name = excluded.name,
                    link = excluded.link,
                    picture = excluded.picture,
                    picture_small = excluded.picture_small,
                    picture_medium = excluded.picture_medium,
                    picture_big = excluded.picture_big,
                    picture_xl = excluded.picture_xl,
                    nb_album = excluded.nb_album,
                    nb_fan = excluded.nb_fan,
                    radio = excluded.radio,
                    tracklist = excluded.tracklist,
                    type = excluded.type,
                    refreshed_at = COALESCE(excluded.refreshed_at, artists.refreshed_at)
            `).run(toArtistParams(record));

            const stored = this.getArtist(record.id);
            if (!stored) throw new StoreError(`Artist ${record.id} vanished after upsert`);
            return stored;
        });
    }

    upsertAlbum(record: AlbumRecord): void {
        this.run(`upsertAlbum(${record.id})`, () => {
            this.db.prepare<AlbumRow>(`
                INSERT INTO albums (id, title, link, cover, cover_small, cover_medium, cover_big,
                    cover_xl, genre_id, fans, release_date, record_type, explicit_lyrics, artist_id)
                VALUES (@id, @title, @link, @cover, @cover_small, @cover_medium, @cover_big,
                    @cover_xl, @genre_id, @fans, @release_date, @record_type, @explicit_lyrics, @artist_id)
                ON CONFLICT(id) DO UPDATE SET
                    title = excluded.title,
                    link = excluded.link,
                    cover = excluded.cover,
                    cover_small = excluded.cover_small,
                    cover_medium = excluded.cover_medium,
                    cover_big = excluded.cover_big,
                    cover_xl = excluded.cover_xl,
                    genre_id = excluded.genre_id,
                    fans = excluded.fans,
                    release_date = excluded.release_date,
                    record_type = excluded.record_type,
                    explicit_lyrics = excluded.explicit_lyrics,
                    artist_id = excluded.artist_id
            `).run(toAlbumParams(record));
        });
    }

    /**
     * Known albums of an artist, oldest first (unknown release dates lead),
     * ties broken by id so the order is stable across runs.
     */
    listAlbumsForArtist(artistId: number, recordTypes: readonly string[] = []): AlbumRecord[] {
        return this.run(`listAlbumsForArtist(${artistId})`, () => {
            const typeFilter = recordTypes.length > 0
                ? `AND record_type IN (${recordTypes.map(() => '?').join(', ')})`
                : '';
            const rows = this.db.prepare<unknown[], AlbumRow>(`
                SELECT * FROM albums
                WHERE artist_id = ? ${typeFilter}
                ORDER BY release_date IS NOT NULL, release_date ASC, id ASC
            `).all(artistId, ...recordTypes);
            return rows.map(toAlbumRecord);
        });
    }

    /**
     * Bind a normalized folder key to an artist. The first binding wins:
     * a later attempt to point the key elsewhere is logged and ignored.
     * Returns the artist id the key is bound to.
     */
    linkArtistKey(key: string, artistId: number): number {
        return this.run(`linkArtistKey(${key})`, () => {
            this.db.prepare<[string, number, number]>(`
                INSERT OR IGNORE INTO artist_keys (key, artist_id, normalizer_version) VALUES (?, ?, ?)
            `).run(key, artistId, NORMALIZER_VERSION);

            const bound = this.db.prepare<[string], { artist_id: number }>(
                'SELECT artist_id FROM artist_keys WHERE key = ?'
            ).get(key);
            if (!bound) throw new StoreError(`Key "${key}" missing after insert`);

            if (bound.artist_id !== artistId) {
                this.logger.warn(`Key "${key}" is already bound to artist ${bound.artist_id}; ignoring candidate ${artistId}`);
            }
            return bound.artist_id;
        });
    }

    /**
     * Store a freshly resolved artist with its albums and bind the key, all or
     * nothing. Returns the artist the key ends up bound to.
     */
    saveResolvedArtist(artist: ArtistRecord, albums: AlbumRecord[], key: string | null): ArtistRecord {
        return this.run(`saveResolvedArtist(${artist.id})`, () =>
            withTransaction(this.db, () => {
                const stored = this.upsertArtist(artist);
                for (const album of albums) {
                    this.upsertAlbum({ ...album, artist_id: stored.id });
                }
                if (!key) return stored;

                const boundId = this.linkArtistKey(key, stored.id);
                if (boundId === stored.id) return stored;

                const bound = this.getArtist(boundId);
                if (!bound) throw new StoreError(`Artist ${boundId} bound to "${key}" does not exist`);
                return bound;
            })
        );
    }

    /**
     * Write the refetched fields and album set of a stored artist and stamp
     * the refresh time, in one transaction.
     */
    saveRefreshedArtist(artist: ArtistRecord, albums: AlbumRecord[], refreshedAt: string): ArtistRecord {
        return this.run(`saveRefreshedArtist(${artist.id})`, () =>
            withTransaction(this.db, () => {
                const stored = this.upsertArtist({ ...artist, refreshed_at: refreshedAt });
                for (const album of albums) {
                    this.upsertAlbum({ ...album, artist_id: stored.id });
                }
                return stored;
            })
        );
    }

    // ========== Scan Results (append-only) ==========

    recordScan(folderPath: string, scanDump: string): number {
        return this.run(`recordScan(${folderPath})`, () => {
            const result = this.db.prepare<[string, string]>(
                'INSERT INTO scan_results (folder_path, scan_dump) VALUES (?, ?)'
            ).run(folderPath, scanDump);
            return Number(result.lastInsertRowid);
        });
    }

    getScan(id: number): ScanResultRecord | null {
        return this.run(`getScan(${id})`, () =>
            this.db.prepare<[number], ScanResultRecord>('SELECT * FROM scan_results WHERE id = ?').get(id) ?? null
        );
    }

    getLatestScan(folderPath: string): ScanResultRecord | null {
        return this.run(`getLatestScan(${folderPath})`, () =>
            this.db.prepare<[string], ScanResultRecord>(`
                SELECT * FROM scan_results
                WHERE folder_path = ?
                ORDER BY id DESC
                LIMIT 1
            `).get(folderPath) ?? null
        );
    }

    listScans(options: ListScansOptions = {}): ScanSummary[] {
        const limit = Math.max(1, Math.min(options.limit ?? 50, 500));
        return this.run('listScans', () => {
            if (options.folderPath) {
                return this.db.prepare<[string, number], ScanSummary>(`
                    SELECT id, folder_path, scan_date FROM scan_results
                    WHERE folder_path = ?
                    ORDER BY id DESC LIMIT ?
                `).all(options.folderPath, limit);
            }
            return this.db.prepare<[number], ScanSummary>(`
                SELECT id, folder_path, scan_date FROM scan_results
                ORDER BY id DESC LIMIT ?
            `).all(limit);
        });
    }

    private run<T>(context: string, fn: () => T): T {
        try {
            return fn();
        } catch (error) {
            throw StoreError.from(error, context);
        }
    }
}

/**
 * Per-run resolution cache. Holds the pending or settled resolution of each
 * normalized artist key, so however many folders share a key, and however
 * many workers ask at once, the key is resolved once. Create one per run.
 */
export class ResolutionCache {
    private readonly entries = new Map<string, Promise<Resolution>>();

    getOrCreate(key: string, factory: () => Promise<Resolution>): Promise<Resolution> {
        const existing = this.entries.get(key);
        if (existing) return existing;

        const pending = factory();
        this.entries.set(key, pending);
        // A rejected lookup is not cached; the next caller retries
        pending.catch(() => this.entries.delete(key));
        return pending;
    }
}
