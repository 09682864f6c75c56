/**
 * Reconciliation Engine
 *
 * One run: scan the library, group folders by artist key, resolve each artist
 * against the catalog, diff local album folders against the known albums,
 * persist the report as a scan record, then make sure every resolved artist
 * folder has an image.
 */

import * as path from 'path';
import type {
    AlbumRecord,
    AlbumSummary,
    ArtistRecord,
    ArtistReport,
    ImageOutcome,
    Report,
    Resolution,
    ScanIssue,
    UnresolvedArtistReport,
} from '../types';
import type { ProviderConfig, RetryPolicy, ScanConfig } from './config';
import type { MetadataProvider } from './deezer';
import { errorMessage, isFatal } from './errors';
import { ImageFetcher, type ImageDownloader } from './images';
import { createLogger, type Logger } from './logger';
import { normalize, NORMALIZER_VERSION } from './normalization';
import { serializeScanDump } from './report';
import { MetadataRepository, ResolutionCache } from './repository';
import { CatalogResolver } from './resolver';
import { scan } from './scanner';

export interface ReconcileOptions {
    /** Log per-artist events. Never changes the report. */
    verbose?: boolean;
    fetchImages?: boolean;
    concurrency?: number;
    signal?: AbortSignal;
}

export interface ReconcileOutcome {
    report: Report;
    scanId: number;
    images: ImageOutcome[];
}

export interface EngineDependencies {
    repository: MetadataRepository;
    provider: MetadataProvider;
    config: {
        provider: ProviderConfig;
        retry: RetryPolicy;
        scan: ScanConfig;
    };
    downloader?: ImageDownloader;
    logger?: Logger;
    now?: () => Date;
}

// All folders of a library that normalize to the same artist key
interface ArtistGroup {
    key: string;
    rawNames: string[];
    dirPaths: string[];
    albums: { raw: string; key: string }[];
}

type GroupResult =
    | { kind: 'resolved'; artist: ArtistRecord; entry: ArtistReport }
    | { kind: 'unresolved'; entry: UnresolvedArtistReport };

function compareText(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

function uniqueSorted(values: string[]): string[] {
    return [...new Set(values)].sort(compareText);
}

function toSummary(album: AlbumRecord): AlbumSummary {
    return {
        id: album.id,
        title: album.title,
        releaseDate: album.release_date,
        recordType: album.record_type,
        link: album.link,
    };
}

/**
 * Run `fn` over `items` with at most `concurrency` calls in flight. Workers
 * pull the next index from a shared counter. The first failure stops every
 * worker from taking more work; it is rethrown once the calls already in
 * flight have settled.
 */
export async function runPool<T, R>(
    items: readonly T[],
    concurrency: number,
    fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
    const results = new Array<R>(items.length);
    let nextIndex = 0;
    let failed = false;
    let firstError: unknown;

    async function processNext(): Promise<void> {
        while (!failed && nextIndex < items.length) {
            const currentIndex = nextIndex++;
            try {
                results[currentIndex] = await fn(items[currentIndex], currentIndex);
            } catch (error) {
                if (!failed) {
                    failed = true;
                    firstError = error;
                }
            }
        }
    }

    const workerCount = Math.max(1, Math.min(concurrency, items.length));
    const workers = Array(workerCount).fill(null).map(() => processNext());
    await Promise.all(workers);
    if (failed) throw firstError;
    return results;
}

/**
 * Split known albums into present and missing by normalized title, and list
 * local folders matching no known album.
 */
export function diffAlbums(
    known: AlbumRecord[],
    local: { raw: string; key: string }[]
): { present: AlbumSummary[]; missing: AlbumSummary[]; extraLocal: string[] } {
    const localKeys = new Set(local.map((album) => album.key).filter((key) => key !== ''));
    const knownKeys = new Set(known.map((album) => normalize(album.title)));

    const present: AlbumSummary[] = [];
    const missing: AlbumSummary[] = [];
    for (const album of known) {
        (localKeys.has(normalize(album.title)) ? present : missing).push(toSummary(album));
    }
    const extraLocal = uniqueSorted(
        local.filter((album) => album.key === '' || !knownKeys.has(album.key)).map((album) => album.raw)
    );
    return { present, missing, extraLocal };
}

export class ReconciliationEngine {
    private readonly logger: Logger;
    private readonly now: () => Date;

    constructor(private readonly deps: EngineDependencies) {
        this.logger = deps.logger ?? createLogger('Reconcile');
        this.now = deps.now ?? (() => new Date());
    }

    async reconcile(rootPath: string, options: ReconcileOptions = {}): Promise<ReconcileOutcome> {
        const { config, repository } = this.deps;
        const { signal } = options;
        const root = path.resolve(rootPath);
        const logger = options.verbose === undefined ? this.logger : this.logger.withVerbose(options.verbose);
        const concurrency = options.concurrency ?? config.scan.concurrency;

        const resolver = new CatalogResolver(repository, this.deps.provider, {
            retry: config.retry,
            refreshAfterHours: config.scan.refreshAfterHours,
            logger: logger.child('Resolver'),
            now: this.now,
        });
        const cache = new ResolutionCache();

        logger.info(`Scanning ${root}...`);

        // ========== 1. Scan and group ==========
        const skipped: ScanIssue[] = [];
        const groups = new Map<string, ArtistGroup>();
        let localAlbums = 0;

        const observations = scan(root, {
            blacklist: config.scan.blacklist,
            signal,
            onIssue: (issue) => {
                logger.debug(`Skipped ${issue.path} (${issue.reason}): ${issue.message}`);
                skipped.push(issue);
            },
        });

        for await (const observation of observations) {
            const key = normalize(observation.artistNameRaw);
            // Folders with no usable characters never share a group
            const groupId = key === '' ? `\u0000${observation.artistDirPath}` : key;

            let group = groups.get(groupId);
            if (!group) {
                group = { key, rawNames: [], dirPaths: [], albums: [] };
                groups.set(groupId, group);
            }
            group.rawNames.push(observation.artistNameRaw);
            group.dirPaths.push(observation.artistDirPath);
            if (observation.albumDirPath !== null) {
                group.albums.push({ raw: observation.albumNameRaw, key: normalize(observation.albumNameRaw) });
                localAlbums++;
            }
        }

        const ordered = [...groups.entries()]
            .sort(([a], [b]) => compareText(a, b))
            .map(([, group]) => group);
        logger.info(`Found ${ordered.length} artists, ${localAlbums} album folders`);

        // ========== 2. Resolve and diff ==========
        const results = await runPool(ordered, concurrency, async (group) => {
            signal?.throwIfAborted();
            return this.processGroup(group, resolver, cache, logger);
        });

        // ========== 3. Assemble report ==========
        const artists: ArtistReport[] = [];
        const unresolved: UnresolvedArtistReport[] = [];
        const resolvedGroups: { artist: ArtistRecord; dirPaths: string[] }[] = [];
        for (const result of results) {
            if (result.kind === 'resolved') {
                artists.push(result.entry);
                resolvedGroups.push({ artist: result.artist, dirPaths: result.entry.dirPaths });
            } else {
                unresolved.push(result.entry);
            }
        }

        const report: Report = {
            rootPath: root,
            generatedAt: this.now().toISOString(),
            normalizerVersion: NORMALIZER_VERSION,
            totals: {
                artists: ordered.length,
                resolved: artists.length,
                unresolved: unresolved.length,
                localAlbums,
                missingAlbums: artists.reduce((sum, entry) => sum + entry.missing.length, 0),
                extraLocalAlbums: artists.reduce((sum, entry) => sum + entry.extraLocal.length, 0),
                skipped: skipped.length,
            },
            artists,
            unresolved,
            skipped,
        };

        // ========== 4. Persist ==========
        signal?.throwIfAborted();
        const scanId = repository.recordScan(root, serializeScanDump(report));
        logger.info(
            `Scan ${scanId}: ${report.totals.resolved} resolved, ${report.totals.unresolved} unresolved, ` +
                `${report.totals.missingAlbums} missing albums`
        );

        // ========== 5. Images ==========
        let images: ImageOutcome[] = [];
        if (options.fetchImages !== false) {
            images = await this.fetchImages(resolvedGroups, concurrency, logger);
        }

        return { report, scanId, images };
    }

    private async processGroup(
        group: ArtistGroup,
        resolver: CatalogResolver,
        cache: ResolutionCache,
        logger: Logger
    ): Promise<GroupResult> {
        const rawNames = uniqueSorted(group.rawNames);
        const dirPaths = uniqueSorted(group.dirPaths);
        const rawName = rawNames[0] ?? '';

        let resolution: Resolution;
        try {
            resolution = await resolver.resolve(group.key, rawName, cache);
        } catch (error) {
            if (isFatal(error)) throw error;
            logger.error(`Failed to resolve "${rawName}": ${errorMessage(error)}`);
            resolution = { status: 'unresolved', reason: 'transient_error', message: errorMessage(error) };
        }

        if (resolution.status === 'unresolved') {
            return {
                kind: 'unresolved',
                entry: { key: group.key, rawName, dirPaths, reason: resolution.reason, message: resolution.message },
            };
        }

        const { artist } = resolution;
        const known = this.deps.repository.listAlbumsForArtist(artist.id, this.deps.config.scan.recordTypes);
        const { present, missing, extraLocal } = diffAlbums(known, group.albums);
        logger.debug(`${artist.name}: ${present.length}/${known.length} present, ${missing.length} missing`);

        return {
            kind: 'resolved',
            artist,
            entry: {
                key: group.key,
                artistId: artist.id,
                name: artist.name,
                localNames: uniqueSorted(group.albums.map((album) => album.raw)),
                dirPaths,
                knownCount: known.length,
                matchedCount: present.length,
                present,
                missing,
                extraLocal,
            },
        };
    }

    private async fetchImages(
        groups: { artist: ArtistRecord; dirPaths: string[] }[],
        concurrency: number,
        logger: Logger
    ): Promise<ImageOutcome[]> {
        const fetcher = new ImageFetcher({
            fileName: this.deps.config.scan.imageFileName,
            timeoutMs: this.deps.config.provider.timeoutMs,
            downloader: this.deps.downloader,
            logger: logger.child('Images'),
        });

        const jobs = groups.flatMap(({ artist, dirPaths }) => dirPaths.map((dirPath) => ({ artist, dirPath })));
        const outcomes = await runPool(jobs, concurrency, ({ artist, dirPath }) =>
            fetcher.ensureArtistImage(artist, dirPath)
        );

        const downloaded = outcomes.filter((outcome) => outcome.status === 'downloaded').length;
        const failed = outcomes.filter((outcome) => outcome.status === 'failed').length;
        logger.info(`Images: ${downloaded} downloaded, ${failed} failed, ${outcomes.length - downloaded - failed} already present`);
        return outcomes;
    }
}
