import assert from 'assert';
import * as fs from 'fs';
import * as path from 'path';
import { after, describe, it } from 'node:test';
import { candidateImageUrls, ImageFetcher, isPlaceholderImage, type ImageDownloader } from '../images';
import { silentLogger } from '../logger';
import { artist, makeTempDir, removeDir } from './helpers';

const XL = 'https://cdn.example.test/images/artist/abc/1000x1000-000000-80-0-0.jpg';
const BIG = 'https://cdn.example.test/images/artist/abc/500x500-000000-80-0-0.jpg';
const PLACEHOLDER = 'https://cdn.example.test/images/artist//1000x1000-000000-80-0-0.jpg';

function recordingDownloader(responses: Record<string, Buffer | Error>): { calls: string[]; download: ImageDownloader } {
    const calls: string[] = [];
    return {
        calls,
        download: async (url) => {
            calls.push(url);
            const response = responses[url];
            if (response === undefined) throw new Error(`unexpected url ${url}`);
            if (response instanceof Error) throw response;
            return response;
        },
    };
}

describe('candidateImageUrls', () => {
    it('lists sizes largest first without blanks, placeholders or repeats', () => {
        const urls = candidateImageUrls(
            artist(1, 'Air', { picture_xl: PLACEHOLDER, picture_big: BIG, picture_medium: '', picture: BIG, picture_small: XL })
        );
        assert.deepStrictEqual(urls, [BIG, XL]);
    });

    it('recognises the empty-hash placeholder', () => {
        assert.strictEqual(isPlaceholderImage(PLACEHOLDER), true);
        assert.strictEqual(isPlaceholderImage(XL), false);
    });
});

describe('ImageFetcher', () => {
    const dirs: string[] = [];
    after(() => dirs.forEach(removeDir));

    function artistDir(): string {
        const dir = makeTempDir();
        dirs.push(dir);
        return dir;
    }

    function fetcher(download: ImageDownloader): ImageFetcher {
        return new ImageFetcher({ fileName: 'artist.jpg', timeoutMs: 1000, downloader: download, logger: silentLogger });
    }

    it('downloads the largest picture once and then leaves it alone', async () => {
        const dir = artistDir();
        const { calls, download } = recordingDownloader({ [XL]: Buffer.from('jpeg-bytes') });
        const subject = fetcher(download);

        const first = await subject.ensureArtistImage(artist(7, 'Air', { picture_xl: XL }), dir);
        assert.deepStrictEqual(first, { status: 'downloaded', artistId: 7, path: path.join(dir, 'artist.jpg'), url: XL });
        assert.strictEqual(fs.readFileSync(path.join(dir, 'artist.jpg'), 'utf-8'), 'jpeg-bytes');

        const second = await subject.ensureArtistImage(artist(7, 'Air', { picture_xl: XL }), dir);
        assert.deepStrictEqual(second, { status: 'exists', artistId: 7, path: path.join(dir, 'artist.jpg') });
        assert.deepStrictEqual(calls, [XL]);
    });

    it('never overwrites an existing image', async () => {
        const dir = artistDir();
        fs.writeFileSync(path.join(dir, 'artist.jpg'), 'mine');
        const { calls, download } = recordingDownloader({});

        const outcome = await fetcher(download).ensureArtistImage(artist(7, 'Air', { picture_xl: XL }), dir);
        assert.strictEqual(outcome.status, 'exists');
        assert.strictEqual(fs.readFileSync(path.join(dir, 'artist.jpg'), 'utf-8'), 'mine');
        assert.deepStrictEqual(calls, []);
    });

    it('falls through to the next size when one fails', async () => {
        const dir = artistDir();
        const { calls, download } = recordingDownloader({ [XL]: new Error('HTTP 404'), [BIG]: Buffer.from('big') });

        const outcome = await fetcher(download).ensureArtistImage(artist(7, 'Air', { picture_xl: XL, picture_big: BIG }), dir);
        assert.strictEqual(outcome.status, 'downloaded');
        assert.deepStrictEqual(calls, [XL, BIG]);
        assert.strictEqual(fs.readFileSync(path.join(dir, 'artist.jpg'), 'utf-8'), 'big');
    });

    it('fails without leaving partial files when every size fails', async () => {
        const dir = artistDir();
        const { download } = recordingDownloader({ [XL]: new Error('timeout'), [BIG]: new Error('HTTP 500') });

        const outcome = await fetcher(download).ensureArtistImage(artist(7, 'Air', { picture_xl: XL, picture_big: BIG }), dir);
        assert.deepStrictEqual(outcome, {
            status: 'failed',
            artistId: 7,
            path: path.join(dir, 'artist.jpg'),
            reason: 'timeout; HTTP 500',
        });
        assert.deepStrictEqual(fs.readdirSync(dir), []);
    });

    it('fails when the artist has no usable picture', async () => {
        const dir = artistDir();
        const { calls, download } = recordingDownloader({});

        const outcome = await fetcher(download).ensureArtistImage(artist(7, 'Air', { picture_xl: PLACEHOLDER }), dir);
        assert.ok(outcome.status === 'failed');
        assert.strictEqual(outcome.reason, 'no image URL');
        assert.deepStrictEqual(calls, []);
    });

    it('reports a folder it cannot write to as failed', async () => {
        const dir = path.join(artistDir(), 'gone');
        const { download } = recordingDownloader({ [XL]: Buffer.from('x') });

        const outcome = await fetcher(download).ensureArtistImage(artist(7, 'Air', { picture_xl: XL }), dir);
        assert.strictEqual(outcome.status, 'failed');
    });
});
