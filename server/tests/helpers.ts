/**
 * Shared fixtures for the test suite: catalog records, a scripted metadata
 * provider, an in-memory store and throwaway library folders.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { AlbumRecord, ArtistRecord, LocalObservation } from '../../types';
import type { EngineDependencies } from '../reconcile';
import type { MetadataProvider } from '../deezer';
import { IN_MEMORY, openDatabase, type DatabaseType } from '../db';
import { silentLogger, type Logger } from '../logger';
import { MetadataRepository } from '../repository';
import { scan, type ScanOptions } from '../scanner';

export function artist(id: number, name: string, overrides: Partial<ArtistRecord> = {}): ArtistRecord {
    return {
        id,
        name,
        link: `https://www.deezer.com/artist/${id}`,
        picture: null,
        picture_small: null,
        picture_medium: null,
        picture_big: null,
        picture_xl: `https://images.example.test/artist/${id}/1000x1000.jpg`,
        nb_album: 10,
        nb_fan: 1000,
        radio: true,
        tracklist: null,
        type: 'artist',
        ...overrides,
    };
}

export function album(id: number, title: string, artistId: number, overrides: Partial<AlbumRecord> = {}): AlbumRecord {
    return {
        id,
        title,
        link: `https://www.deezer.com/album/${id}`,
        cover: null,
        cover_small: null,
        cover_medium: null,
        cover_big: null,
        cover_xl: null,
        genre_id: 152,
        fans: 0,
        release_date: null,
        record_type: 'album',
        explicit_lyrics: false,
        artist_id: artistId,
        ...overrides,
    };
}

/**
 * Provider answering from fixed tables. Counts calls per query and can be
 * told to fail the next N calls of a kind. `fetchArtist` answers from
 * `artistsById`, then from the search tables.
 */
export class FakeProvider implements MetadataProvider {
    readonly searches: string[] = [];
    readonly artistFetches: number[] = [];
    readonly albumFetches: number[] = [];
    readonly artistsById = new Map<number, ArtistRecord>();
    searchFailures: Error[] = [];
    albumFailures: Error[] = [];
    /** Queries that fail on every attempt. */
    readonly failingQueries = new Map<string, Error>();
    searchDelayMs = 0;

    constructor(
        private readonly artistsByQuery: Record<string, ArtistRecord[]> = {},
        private readonly albumsByArtist: Record<number, AlbumRecord[]> = {}
    ) {}

    async searchArtists(name: string): Promise<ArtistRecord[]> {
        this.searches.push(name);
        if (this.searchDelayMs > 0) {
            await new Promise((resolve) => setTimeout(resolve, this.searchDelayMs));
        }
        const failure = this.failingQueries.get(name) ?? this.searchFailures.shift();
        if (failure) throw failure;
        return this.artistsByQuery[name] ?? [];
    }

    async fetchArtist(artistId: number): Promise<ArtistRecord | null> {
        this.artistFetches.push(artistId);
        const listed = Object.values(this.artistsByQuery).flat().find((candidate) => candidate.id === artistId);
        return this.artistsById.get(artistId) ?? listed ?? null;
    }

    async fetchAlbums(artistId: number): Promise<AlbumRecord[]> {
        this.albumFetches.push(artistId);
        const failure = this.albumFailures.shift();
        if (failure) throw failure;
        return this.albumsByArtist[artistId] ?? [];
    }

    searchCount(name: string): number {
        return this.searches.filter((query) => query === name).length;
    }
}

/**
 * Logger that appends `<level> [Scope] message` lines to `lines`.
 */
export function recordingLogger(lines: string[], verbose: boolean = false, scope: string = 'Test'): Logger {
    const write = (level: string) => (message: string) => {
        lines.push(`${level} [${scope}] ${message}`);
    };
    return {
        verbose,
        debug: (message) => {
            if (verbose) write('debug')(message);
        },
        info: write('info'),
        warn: write('warn'),
        error: write('error'),
        child: (childScope) => recordingLogger(lines, verbose, childScope),
        withVerbose: (enabled) => recordingLogger(lines, enabled, scope),
    };
}

export function openTestStore(): { db: DatabaseType; repository: MetadataRepository } {
    const db = openDatabase(IN_MEMORY, silentLogger);
    return { db, repository: new MetadataRepository(db, silentLogger) };
}

export function testConfig(overrides: Partial<EngineDependencies['config']['scan']> = {}): EngineDependencies['config'] {
    return {
        provider: { baseUrl: 'http://127.0.0.1:1', timeoutMs: 1000, minIntervalMs: 0 },
        retry: { attempts: 2, delayMs: 0 },
        scan: {
            concurrency: 4,
            blacklist: ['@eaDir'],
            recordTypes: ['album'],
            refreshAfterHours: 168,
            imageFileName: 'artist.jpg',
            ...overrides,
        },
    };
}

export function makeTempDir(prefix: string = 'crategap-test-'): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/**
 * Create `root/<artist>/<album>` folders. An empty album list makes a bare
 * artist folder.
 */
export function makeLibrary(layout: Record<string, string[]>, root: string = makeTempDir()): string {
    for (const [artistName, albums] of Object.entries(layout)) {
        const artistDir = path.join(root, artistName);
        fs.mkdirSync(artistDir, { recursive: true });
        for (const albumName of albums) {
            fs.mkdirSync(path.join(artistDir, albumName), { recursive: true });
        }
    }
    return root;
}

export async function scanAll(rootPath: string, options: ScanOptions = {}): Promise<LocalObservation[]> {
    const observations: LocalObservation[] = [];
    for await (const observation of scan(rootPath, options)) {
        observations.push(observation);
    }
    return observations;
}

export function removeDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}
