/**
 * Deezer metadata provider
 *
 * Public, keyless API:
 *   GET /search/artist?q=<name>      candidate artists
 *   GET /artist/<id>                 one artist
 *   GET /artist/<id>/albums          discography, paginated through `next`
 *
 * Deezer reports most failures as HTTP 200 with an `{ error: { code } }` body,
 * so every payload is checked for that shape before it is validated.
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { AlbumRecord, ArtistRecord } from '../types';
import type { ProviderConfig } from './config';
import { ProviderError } from './errors';
import { createLogger, type Logger } from './logger';

export interface MetadataProvider {
    /** Candidate artists in provider relevance order; [] when nothing matches. */
    searchArtists(name: string): Promise<ArtistRecord[]>;
    /** Current fields of one artist; null when the provider no longer knows it. */
    fetchArtist(artistId: number): Promise<ArtistRecord | null>;
    /** Every release the provider lists for the artist. */
    fetchAlbums(artistId: number): Promise<AlbumRecord[]>;
}

// ============================================
// Payload validation
// ============================================

const text = z
    .string()
    .nullish()
    .transform((value) => (value ? value : null));

const artistSchema = z.object({
    id: z.number().int().positive(),
    name: z.string().min(1),
    link: text,
    picture: text,
    picture_small: text,
    picture_medium: text,
    picture_big: text,
    picture_xl: text,
    nb_album: z.number().int().nonnegative().catch(0),
    nb_fan: z.number().int().nonnegative().catch(0),
    radio: z.boolean().catch(false),
    tracklist: text,
    type: z.string().catch('artist'),
});

const albumSchema = z.object({
    id: z.number().int().positive(),
    title: z.string(),
    link: text,
    cover: text,
    cover_small: text,
    cover_medium: text,
    cover_big: text,
    cover_xl: text,
    genre_id: z
        .number()
        .int()
        .nullish()
        .transform((value) => (value !== null && value !== undefined && value > 0 ? value : null)),
    fans: z.number().int().nonnegative().catch(0),
    // Unknown dates come back as 0000-00-00
    release_date: z
        .string()
        .nullish()
        .transform((value) => (value && /^\d{4}-\d{2}-\d{2}$/.test(value) && !value.startsWith('0000') ? value : null)),
    record_type: z.string().catch('album'),
    explicit_lyrics: z.boolean().catch(false),
});

function pageSchema<T extends z.ZodTypeAny>(item: T) {
    return z.object({
        data: z.array(item).default([]),
        total: z.number().optional(),
        next: z.string().url().optional(),
    });
}

const artistPageSchema = pageSchema(artistSchema);
const albumPageSchema = pageSchema(albumSchema);

const errorBodySchema = z.object({
    error: z.object({
        type: z.string().optional(),
        message: z.string().optional(),
        code: z.number().optional(),
    }),
});

// Deezer error codes
const QUOTA_EXCEEDED = 4;
const SERVICE_BUSY = 700;
const DATA_NOT_FOUND = 800;

const SEARCH_LIMIT = 25;
const ALBUM_PAGE_SIZE = 100;
const MAX_ALBUM_PAGES = 50;

// ============================================
// Rate limiting
// ============================================

/**
 * Spaces requests at least `minIntervalMs` apart. Callers queue in arrival
 * order, so concurrent workers share one budget.
 */
export class RequestThrottle {
    private lastRequestTime = 0;
    private tail: Promise<void> = Promise.resolve();

    constructor(private readonly minIntervalMs: number) {}

    async schedule<T>(fn: () => Promise<T>): Promise<T> {
        const turn = this.tail.then(() => this.waitForSlot());
        this.tail = turn;
        await turn;
        return fn();
    }

    private async waitForSlot(): Promise<void> {
        const timeSinceLastRequest = Date.now() - this.lastRequestTime;
        if (timeSinceLastRequest < this.minIntervalMs) {
            await new Promise((resolve) => setTimeout(resolve, this.minIntervalMs - timeSinceLastRequest));
        }
        this.lastRequestTime = Date.now();
    }
}

// ============================================
// Client
// ============================================

export class DeezerProvider implements MetadataProvider {
    private readonly http: AxiosInstance;
    private readonly throttle: RequestThrottle;

    constructor(
        config: ProviderConfig,
        private readonly logger: Logger = createLogger('Deezer')
    ) {
        this.http = axios.create({
            baseURL: config.baseUrl,
            timeout: config.timeoutMs,
            headers: { Accept: 'application/json' },
        });
        this.throttle = new RequestThrottle(config.minIntervalMs);
    }

    async searchArtists(name: string): Promise<ArtistRecord[]> {
        const context = `search artist "${name}"`;
        const page = await this.get('/search/artist', { q: name, limit: SEARCH_LIMIT }, artistPageSchema, context);
        if (!page) return [];

        this.logger.debug(`${context}: ${page.data.length} candidate(s)`);
        return page.data.map((artist) => ({ ...artist }));
    }

    async fetchArtist(artistId: number): Promise<ArtistRecord | null> {
        const artist = await this.get(`/artist/${artistId}`, undefined, artistSchema, `artist ${artistId}`);
        return artist ? { ...artist } : null;
    }

    async fetchAlbums(artistId: number): Promise<AlbumRecord[]> {
        const context = `albums of artist ${artistId}`;
        const albums = new Map<number, AlbumRecord>();

        let url: string | undefined = `/artist/${artistId}/albums`;
        let params: Record<string, string | number> | undefined = { limit: ALBUM_PAGE_SIZE };
        let pages = 0;

        while (url && pages < MAX_ALBUM_PAGES) {
            const page: z.infer<typeof albumPageSchema> | null = await this.get(url, params, albumPageSchema, context);
            if (!page) break;

            for (const album of page.data) {
                albums.set(album.id, { ...album, artist_id: artistId });
            }
            pages++;
            // `next` is absolute and already carries the query
            url = page.next;
            params = undefined;
        }

        if (url) {
            this.logger.warn(`${context}: stopped after ${MAX_ALBUM_PAGES} pages`);
        }
        this.logger.debug(`${context}: ${albums.size} release(s) over ${pages} page(s)`);
        return [...albums.values()];
    }

    /**
     * One throttled GET. Returns null when Deezer answers "no data".
     */
    private async get<T>(
        url: string,
        params: Record<string, string | number> | undefined,
        schema: z.ZodType<T, z.ZodTypeDef, unknown>,
        context: string
    ): Promise<T | null> {
        try {
            const res = await this.throttle.schedule(() => this.http.get<unknown>(url, { params }));

            const errorBody = errorBodySchema.safeParse(res.data);
            if (errorBody.success) {
                const { code, message } = errorBody.data.error;
                if (code === DATA_NOT_FOUND) return null;
                throw deezerError(code, message, context);
            }

            const parsed = schema.safeParse(res.data);
            if (!parsed.success) {
                const issue = parsed.error.errors[0];
                const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid payload';
                throw new ProviderError(`${context}: malformed response (${where})`, 'malformed_response', false);
            }
            return parsed.data;
        } catch (error) {
            throw ProviderError.from(error, context);
        }
    }
}

function deezerError(code: number | undefined, message: string | undefined, context: string): ProviderError {
    const detail = `${context}: Deezer error ${code ?? '?'}${message ? ` (${message})` : ''}`;
    if (code === QUOTA_EXCEEDED) return new ProviderError(detail, 'rate_limited', true);
    if (code === SERVICE_BUSY) return new ProviderError(detail, 'service_unavailable', true);
    return new ProviderError(detail, 'http_error', false);
}

export function createDeezerProvider(config: ProviderConfig, logger?: Logger): MetadataProvider {
    return new DeezerProvider(config, logger);
}
