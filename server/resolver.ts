/**
 * Catalog Resolver
 *
 * Turns a normalized artist key into a stored ArtistRecord: store first,
 * then the metadata provider. Each key is looked up at most once per run
 * through the run's ResolutionCache.
 */

import type { AlbumRecord, ArtistRecord, Resolution, ResolutionSource } from '../types';
import type { RetryPolicy } from './config';
import type { MetadataProvider } from './deezer';
import { ProviderError } from './errors';
import { createLogger, type Logger } from './logger';
import { normalize } from './normalization';
import type { MetadataRepository, ResolutionCache } from './repository';

export interface ResolverOptions {
    retry: RetryPolicy;
    /** Artists and album sets older than this are refetched. 0 disables refreshing. */
    refreshAfterHours: number;
    logger?: Logger;
    now?: () => Date;
}

const HOUR_MS = 60 * 60 * 1000;

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

function resolved(artist: ArtistRecord, source: ResolutionSource): Resolution {
    return { status: 'resolved', artist, source };
}

/**
 * Order candidates best first: exact normalized-name match, then most fans,
 * then most albums, then provider order.
 */
export function rankCandidates(key: string, candidates: ArtistRecord[]): ArtistRecord[] {
    return candidates
        .map((artist, index) => ({ artist, index, exact: normalize(artist.name) === key }))
        .sort((a, b) => {
            if (a.exact !== b.exact) return a.exact ? -1 : 1;
            if (a.artist.nb_fan !== b.artist.nb_fan) return b.artist.nb_fan - a.artist.nb_fan;
            if (a.artist.nb_album !== b.artist.nb_album) return b.artist.nb_album - a.artist.nb_album;
            return a.index - b.index;
        })
        .map((entry) => entry.artist);
}

export class CatalogResolver {
    private readonly logger: Logger;
    private readonly now: () => Date;

    constructor(
        private readonly repository: MetadataRepository,
        private readonly provider: MetadataProvider,
        private readonly options: ResolverOptions
    ) {
        this.logger = options.logger ?? createLogger('Resolver');
        this.now = options.now ?? (() => new Date());
    }

    /**
     * Resolve one artist key. Never throws for provider trouble: that becomes
     * an `unresolved` outcome. Store failures propagate.
     */
    resolve(key: string, rawName: string, cache: ResolutionCache): Promise<Resolution> {
        if (!key) {
            return Promise.resolve({
                status: 'unresolved',
                reason: 'not_found',
                message: `"${rawName}" has no usable characters`,
            });
        }
        return cache.getOrCreate(key, () => this.lookup(key, rawName));
    }

    private async lookup(key: string, rawName: string): Promise<Resolution> {
        const stored = this.repository.findArtistByKey(key);
        if (stored) {
            this.logger.debug(`"${rawName}" -> ${stored.name} (${stored.id}) from store`);
            return resolved(await this.refreshIfStale(stored), 'store');
        }

        let candidates: ArtistRecord[];
        try {
            candidates = await this.withRetry(() => this.provider.searchArtists(rawName), `search "${rawName}"`);
        } catch (error) {
            return this.transient(error, rawName);
        }

        const [winner, ...discarded] = rankCandidates(key, candidates);
        if (!winner) {
            this.logger.debug(`"${rawName}": no candidates`);
            return { status: 'unresolved', reason: 'not_found', message: null };
        }
        for (const other of discarded) {
            this.logger.debug(`"${rawName}": discarded ${other.name} (${other.id}, ${other.nb_fan} fans, ${other.nb_album} albums)`);
        }
        this.logger.debug(`"${rawName}" -> ${winner.name} (${winner.id}) from provider`);

        const existing = this.repository.getArtist(winner.id);
        if (existing) {
            // Take the searched fields; refreshed_at stays with the stored album set
            const bound = this.repository.saveResolvedArtist({ ...winner, refreshed_at: existing.refreshed_at }, [], key);
            return resolved(await this.refreshIfStale(bound, bound.id === winner.id), 'provider');
        }

        let albums: AlbumRecord[];
        try {
            albums = await this.withRetry(() => this.provider.fetchAlbums(winner.id), `albums of ${winner.name}`);
        } catch (error) {
            return this.transient(error, rawName);
        }

        const saved = this.repository.saveResolvedArtist(
            { ...winner, refreshed_at: this.now().toISOString() },
            albums,
            key
        );
        return resolved(saved, 'provider');
    }

    /**
     * Refetch a stale artist and its albums. `fieldsAreFresh` skips the artist
     * fetch when the fields just came from a search. A failed refresh keeps
     * the stored record and albums; an artist the provider no longer knows
     * keeps its stored fields.
     */
    private async refreshIfStale(artist: ArtistRecord, fieldsAreFresh: boolean = false): Promise<ArtistRecord> {
        if (!this.isStale(artist)) return artist;

        try {
            const latest = fieldsAreFresh
                ? artist
                : await this.withRetry(() => this.provider.fetchArtist(artist.id), `refresh ${artist.name}`);
            const albums = await this.withRetry(() => this.provider.fetchAlbums(artist.id), `refresh ${artist.name}`);
            const refreshed = this.repository.saveRefreshedArtist(
                { ...(latest ?? artist), id: artist.id },
                albums,
                this.now().toISOString()
            );
            this.logger.debug(`Refreshed ${refreshed.name} and ${albums.length} release(s)`);
            return refreshed;
        } catch (error) {
            if (!(error instanceof ProviderError)) throw error;
            this.logger.warn(`Keeping stored record of ${artist.name}: ${error.message}`);
            return artist;
        }
    }

    private isStale(artist: ArtistRecord): boolean {
        if (this.options.refreshAfterHours <= 0) return false;
        if (!artist.refreshed_at) return true;

        const refreshedAt = Date.parse(artist.refreshed_at);
        if (Number.isNaN(refreshedAt)) return true;
        return this.now().getTime() - refreshedAt >= this.options.refreshAfterHours * HOUR_MS;
    }

    private transient(error: unknown, rawName: string): Resolution {
        if (!(error instanceof ProviderError)) throw error;
        this.logger.warn(`Could not resolve "${rawName}": ${error.message}`);
        return { status: 'unresolved', reason: 'transient_error', message: error.message };
    }

    private async withRetry<T>(fn: () => Promise<T>, context: string): Promise<T> {
        const { attempts, delayMs } = this.options.retry;
        for (let attempt = 1; ; attempt++) {
            try {
                return await fn();
            } catch (error) {
                const providerError = ProviderError.from(error, context);
                if (!providerError.retryable || attempt >= attempts) throw providerError;

                this.logger.debug(`${context}: attempt ${attempt}/${attempts} failed (${providerError.errorType}), retrying in ${delayMs}ms`);
                await sleep(delayMs);
            }
        }
    }
}
