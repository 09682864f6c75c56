/**
 * Artist image fetcher
 *
 * Makes sure each resolved artist folder holds an image. An existing file is
 * never touched and costs no request. Downloads land in a temp file beside
 * the target and are renamed into place, so a reader never sees a partial
 * image.
 */

import axios from 'axios';
import crypto from 'crypto';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { ArtistRecord, ImageOutcome } from '../types';
import { errorCode, errorMessage } from './errors';
import { createLogger, type Logger } from './logger';

export type ImageDownloader = (url: string) => Promise<Buffer>;

export interface ImageFetcherOptions {
    fileName: string;
    timeoutMs: number;
    downloader?: ImageDownloader;
    logger?: Logger;
}

// Largest first
const PICTURE_FIELDS = ['picture_xl', 'picture_big', 'picture_medium', 'picture', 'picture_small'] as const;

/**
 * Deezer serves a generic silhouette for artists without a picture; its URL
 * has an empty image hash.
 */
export function isPlaceholderImage(url: string): boolean {
    return url.includes('/artist//');
}

export function candidateImageUrls(artist: ArtistRecord): string[] {
    const urls: string[] = [];
    for (const field of PICTURE_FIELDS) {
        const url = artist[field]?.trim();
        if (!url || isPlaceholderImage(url) || urls.includes(url)) continue;
        urls.push(url);
    }
    return urls;
}

export function httpImageDownloader(timeoutMs: number): ImageDownloader {
    return async (url) => {
        const res = await axios.get<ArrayBuffer>(url, { responseType: 'arraybuffer', timeout: timeoutMs });
        const data = Buffer.from(res.data);
        if (data.length === 0) throw new Error('empty response body');
        return data;
    };
}

async function fileExists(filePath: string): Promise<boolean> {
    try {
        await fs.access(filePath);
        return true;
    } catch (error) {
        if (errorCode(error) === 'ENOENT') return false;
        throw error;
    }
}

export class ImageFetcher {
    private readonly download: ImageDownloader;
    private readonly logger: Logger;

    constructor(private readonly options: ImageFetcherOptions) {
        this.download = options.downloader ?? httpImageDownloader(options.timeoutMs);
        this.logger = options.logger ?? createLogger('Images');
    }

    async ensureArtistImage(artist: ArtistRecord, artistDirPath: string): Promise<ImageOutcome> {
        const target = path.join(artistDirPath, this.options.fileName);
        const failed = (reason: string): ImageOutcome => ({ status: 'failed', artistId: artist.id, path: target, reason });

        try {
            if (await fileExists(target)) {
                return { status: 'exists', artistId: artist.id, path: target };
            }
        } catch (error) {
            return failed(errorMessage(error));
        }

        const urls = candidateImageUrls(artist);
        if (urls.length === 0) return failed('no image URL');

        const reasons: string[] = [];
        for (const url of urls) {
            try {
                await this.writeAtomically(target, await this.download(url));
                this.logger.debug(`Saved ${target}`);
                return { status: 'downloaded', artistId: artist.id, path: target, url };
            } catch (error) {
                this.logger.debug(`${artist.name}: ${url} failed: ${errorMessage(error)}`);
                reasons.push(errorMessage(error));
            }
        }

        this.logger.warn(`No image saved for ${artist.name}`);
        return failed(reasons.join('; '));
    }

    private async writeAtomically(target: string, data: Buffer): Promise<void> {
        const temp = `${target}.${crypto.randomBytes(6).toString('hex')}.tmp`;
        try {
            await fs.writeFile(temp, data, { flag: 'wx' });
            await fs.rename(temp, target);
        } catch (error) {
            await fs.rm(temp, { force: true });
            throw error;
        }
    }
}
