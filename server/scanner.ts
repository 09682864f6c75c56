/**
 * Library scanner
 *
 * Walks `root/<artist>/<album>` two levels deep and yields one observation per
 * album folder, or one with an empty album name for an artist folder without
 * album folders. Nothing is read below the album level.
 *
 * Entries are visited in code-point order of their names. Paths that cannot be
 * used are passed to `onIssue` and skipped; only an unusable root throws.
 */

import type { Dirent } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { LocalObservation, ScanIssue, ScanIssueReason } from '../types';
import { errorCode, errorMessage, FileSystemError } from './errors';

export interface ScanOptions {
    /** Folder names skipped at every level (NAS recycle bins, thumbnails...). */
    blacklist?: readonly string[];
    onIssue?: (issue: ScanIssue) => void;
    signal?: AbortSignal;
}

type EntryKind = 'directory' | 'file' | 'skipped';

// UTF-8 byte order is code-point order
function byName(a: Dirent, b: Dirent): number {
    return Buffer.compare(Buffer.from(a.name), Buffer.from(b.name));
}

class Walk {
    // Real paths of the root and of every artist folder
    private readonly visited = new Set<string>();
    private readonly blacklist: Set<string>;

    constructor(private readonly options: ScanOptions) {
        this.blacklist = new Set(options.blacklist ?? []);
    }

    isIgnored(name: string): boolean {
        return name.startsWith('.') || this.blacklist.has(name);
    }

    report(entryPath: string, reason: ScanIssueReason, message: string): void {
        this.options.onIssue?.({ path: entryPath, reason, message });
    }

    async readDir(dirPath: string): Promise<Dirent[] | null> {
        try {
            const entries = await fs.readdir(dirPath, { withFileTypes: true });
            return entries.sort(byName);
        } catch (error) {
            this.report(dirPath, 'unreadable', errorMessage(error));
            return null;
        }
    }

    async markVisited(dirPath: string): Promise<boolean> {
        try {
            this.visited.add(await fs.realpath(dirPath));
            return true;
        } catch (error) {
            this.report(dirPath, 'unreadable', errorMessage(error));
            return false;
        }
    }

    /**
     * Decide what an entry is, following symlinks. A symlink to a folder that
     * was already visited (root, an artist folder) is a cycle.
     */
    async classify(entryPath: string, entry: Dirent): Promise<EntryKind> {
        if (entry.isDirectory()) return 'directory';
        if (!entry.isSymbolicLink()) return 'file';

        let real: string;
        try {
            real = await fs.realpath(entryPath);
            const stats = await fs.stat(real);
            if (!stats.isDirectory()) return 'file';
        } catch (error) {
            const code = errorCode(error);
            if (code === 'ENOENT' || code === 'ELOOP') {
                this.report(entryPath, 'broken_symlink', `Symlink target does not resolve (${code})`);
            } else {
                this.report(entryPath, 'unreadable', errorMessage(error));
            }
            return 'skipped';
        }

        if (this.visited.has(real)) {
            this.report(entryPath, 'symlink_cycle', `Symlink points back to ${real}`);
            return 'skipped';
        }
        return 'directory';
    }

    async *walk(root: string, rootEntries: Dirent[]): AsyncGenerator<LocalObservation> {
        // Real artist folders first, so a symlink to any of them is a duplicate
        for (const entry of rootEntries) {
            if (entry.isDirectory() && !this.isIgnored(entry.name)) {
                await this.markVisited(path.join(root, entry.name));
            }
        }

        for (const entry of rootEntries) {
            this.options.signal?.throwIfAborted();

            const artistDirPath = path.join(root, entry.name);
            if (this.isIgnored(entry.name)) {
                this.report(artistDirPath, 'ignored', 'Hidden or blacklisted name');
                continue;
            }

            const kind = await this.classify(artistDirPath, entry);
            if (kind === 'skipped') continue;
            if (kind === 'file') {
                this.report(artistDirPath, 'not_a_directory', 'Not an artist folder');
                continue;
            }
            if (entry.isSymbolicLink() && !(await this.markVisited(artistDirPath))) continue;

            const albumEntries = await this.readDir(artistDirPath);
            if (!albumEntries) continue;

            const albums: Dirent[] = [];
            for (const albumEntry of albumEntries) {
                const albumDirPath = path.join(artistDirPath, albumEntry.name);
                // Loose files (covers, playlists, artist.jpg) are expected here
                if ((await this.classify(albumDirPath, albumEntry)) !== 'directory') continue;
                if (this.isIgnored(albumEntry.name)) {
                    this.report(albumDirPath, 'ignored', 'Hidden or blacklisted name');
                    continue;
                }
                albums.push(albumEntry);
            }

            if (albums.length === 0) {
                yield { artistNameRaw: entry.name, albumNameRaw: '', artistDirPath, albumDirPath: null };
                continue;
            }
            for (const album of albums) {
                yield {
                    artistNameRaw: entry.name,
                    albumNameRaw: album.name,
                    artistDirPath,
                    albumDirPath: path.join(artistDirPath, album.name),
                };
            }
        }
    }
}

/**
 * Lazily scan a library root. Each call starts a fresh walk.
 * Throws FileSystemError when the root itself cannot be listed.
 */
export async function* scan(rootPath: string, options: ScanOptions = {}): AsyncGenerator<LocalObservation> {
    const root = path.resolve(rootPath);
    const walk = new Walk(options);

    let rootEntries: Dirent[];
    try {
        const stats = await fs.stat(root);
        if (!stats.isDirectory()) {
            throw new FileSystemError(`${root} is not a directory`, root, 'ENOTDIR');
        }
        rootEntries = (await fs.readdir(root, { withFileTypes: true })).sort(byName);
    } catch (error) {
        throw FileSystemError.from(error, root);
    }

    if (!(await walk.markVisited(root))) {
        throw new FileSystemError(`Cannot resolve ${root}`, root);
    }
    yield* walk.walk(root, rootEntries);
}
