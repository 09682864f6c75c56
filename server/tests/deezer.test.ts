/**
 * Deezer client against an in-process stand-in of the API.
 */

import assert from 'assert';
import express from 'express';
import type { Server } from 'http';
import { after, before, describe, it } from 'node:test';
import { DeezerProvider, RequestThrottle } from '../deezer';
import { ProviderError } from '../errors';
import { silentLogger } from '../logger';

function deezerArtist(id: number, name: string, nbFan: number) {
    return {
        id,
        name,
        link: `https://www.deezer.com/artist/${id}`,
        picture: `https://api.deezer.com/artist/${id}/image`,
        picture_small: `https://cdn.example.test/images/artist/h${id}/56x56-000000-80-0-0.jpg`,
        picture_medium: `https://cdn.example.test/images/artist/h${id}/250x250-000000-80-0-0.jpg`,
        picture_big: `https://cdn.example.test/images/artist/h${id}/500x500-000000-80-0-0.jpg`,
        picture_xl: `https://cdn.example.test/images/artist/h${id}/1000x1000-000000-80-0-0.jpg`,
        nb_album: 12,
        nb_fan: nbFan,
        radio: true,
        tracklist: `https://api.deezer.com/artist/${id}/top?limit=50`,
        type: 'artist',
    };
}

function deezerAlbum(id: number, title: string, releaseDate: string, genreId: number) {
    return {
        id,
        title,
        link: `https://www.deezer.com/album/${id}`,
        cover: `https://api.deezer.com/album/${id}/image`,
        cover_small: null,
        cover_medium: null,
        cover_big: null,
        cover_xl: null,
        md5_image: 'abc',
        genre_id: genreId,
        fans: 42,
        release_date: releaseDate,
        record_type: 'album',
        tracklist: `https://api.deezer.com/album/${id}/tracks`,
        explicit_lyrics: false,
        type: 'album',
    };
}

describe('DeezerProvider', () => {
    const queries: string[] = [];
    let server: Server;
    let baseUrl = '';

    before(async () => {
        const app = express();

        app.get('/search/artist', (req, res) => {
            const q = String(req.query.q);
            queries.push(q);
            switch (q) {
                case 'The Beatles':
                    return res.json({
                        data: [deezerArtist(1, 'The Beatles', 5000), deezerArtist(2, 'The Beatles Tribute', 20)],
                        total: 2,
                    });
                case 'Quota':
                    return res.json({ error: { type: 'Exception', message: 'Quota limit exceeded', code: 4 } });
                case 'Missing':
                    return res.json({ error: { type: 'DataException', message: 'no data', code: 800 } });
                case 'Broken':
                    return res.json({ data: [{ id: 'not-a-number', name: 'Broken' }] });
                case 'Down':
                    return res.status(503).send('maintenance');
                case 'Gone':
                    return res.status(404).json({});
                case 'Slow':
                    return setTimeout(() => res.json({ data: [] }), 300);
                default:
                    return res.json({ data: [], total: 0 });
            }
        });

        app.get('/artist/:id', (req, res) => {
            if (req.params.id !== '1') {
                return res.json({ error: { type: 'DataException', message: 'no data', code: 800 } });
            }
            res.json(deezerArtist(1, 'The Beatles', 6000));
        });

        app.get('/artist/:id/albums', (req, res) => {
            if (req.params.id !== '1') return res.json({ data: [], total: 0 });
            if (req.query.index === '2') {
                return res.json({
                    data: [deezerAlbum(102, 'Let It Be', '1970-05-08', 152), deezerAlbum(101, 'Abbey Road', '1969-09-26', 152)],
                    total: 3,
                });
            }
            res.json({
                data: [deezerAlbum(100, 'Anthology', '0000-00-00', -1), deezerAlbum(101, 'Abbey Road', '1969-09-26', 152)],
                total: 3,
                next: `http://${req.get('host')}/artist/1/albums?index=2&limit=2`,
            });
        });

        server = await new Promise<Server>((resolve) => {
            const instance = app.listen(0, () => resolve(instance));
        });
        const address = server.address();
        if (!address || typeof address === 'string') {
            throw new Error('Failed to bind test server');
        }
        baseUrl = `http://127.0.0.1:${address.port}`;
    });

    after(() => {
        server.closeAllConnections();
        server.close();
    });

    function provider(timeoutMs: number = 2000): DeezerProvider {
        return new DeezerProvider({ baseUrl, timeoutMs, minIntervalMs: 0 }, silentLogger);
    }

    async function providerError(promise: Promise<unknown>): Promise<ProviderError> {
        try {
            await promise;
        } catch (error) {
            if (error instanceof ProviderError) return error;
            throw error;
        }
        throw new Error('expected a ProviderError');
    }

    it('returns validated candidates in provider order', async () => {
        const candidates = await provider().searchArtists('The Beatles');

        assert.deepStrictEqual(candidates.map((a) => [a.id, a.name, a.nb_fan]), [
            [1, 'The Beatles', 5000],
            [2, 'The Beatles Tribute', 20],
        ]);
        assert.strictEqual(candidates[0].picture_xl, 'https://cdn.example.test/images/artist/h1/1000x1000-000000-80-0-0.jpg');
        assert.strictEqual(candidates[0].radio, true);
        assert.strictEqual(queries.includes('The Beatles'), true);
    });

    it('sends the raw name as the query', async () => {
        await provider().searchArtists('AC/DC & Friends');
        assert.strictEqual(queries[queries.length - 1], 'AC/DC & Friends');
    });

    it('treats an empty result and "no data" as no candidates', async () => {
        assert.deepStrictEqual(await provider().searchArtists('Nobody'), []);
        assert.deepStrictEqual(await provider().searchArtists('Missing'), []);
    });

    it('classifies a quota error as retryable', async () => {
        const error = await providerError(provider().searchArtists('Quota'));
        assert.strictEqual(error.errorType, 'rate_limited');
        assert.strictEqual(error.retryable, true);
        assert.strictEqual(error.kind, 'transient_error');
    });

    it('rejects a malformed payload without retry', async () => {
        const error = await providerError(provider().searchArtists('Broken'));
        assert.strictEqual(error.errorType, 'malformed_response');
        assert.strictEqual(error.retryable, false);
    });

    it('classifies HTTP failures', async () => {
        const down = await providerError(provider().searchArtists('Down'));
        assert.strictEqual(down.errorType, 'service_unavailable');
        assert.strictEqual(down.retryable, true);

        const gone = await providerError(provider().searchArtists('Gone'));
        assert.strictEqual(gone.errorType, 'http_error');
        assert.strictEqual(gone.retryable, false);
    });

    it('times out slow responses', async () => {
        const error = await providerError(provider(50).searchArtists('Slow'));
        assert.strictEqual(error.errorType, 'timeout');
        assert.strictEqual(error.retryable, true);
    });

    it('fetches one artist by id', async () => {
        const beatles = await provider().fetchArtist(1);
        assert.strictEqual(beatles?.name, 'The Beatles');
        assert.strictEqual(beatles?.nb_fan, 6000);
        assert.strictEqual(await provider().fetchArtist(99), null);
    });

    it('follows album pages and cleans placeholder values', async () => {
        const albums = await provider().fetchAlbums(1);

        assert.deepStrictEqual(albums.map((a) => a.id), [100, 101, 102]);
        const anthology = albums[0];
        assert.strictEqual(anthology.release_date, null);
        assert.strictEqual(anthology.genre_id, null);
        assert.strictEqual(anthology.artist_id, 1);
        assert.strictEqual(albums[1].release_date, '1969-09-26');
        assert.strictEqual(albums[1].genre_id, 152);
    });

    it('reports an artist without albums as an empty list', async () => {
        assert.deepStrictEqual(await provider().fetchAlbums(99), []);
    });
});

describe('RequestThrottle', () => {
    it('spaces concurrent requests by the minimum interval', async () => {
        const throttle = new RequestThrottle(50);
        const started: number[] = [];
        const begin = Date.now();

        await Promise.all([1, 2, 3].map(() => throttle.schedule(async () => started.push(Date.now()))));

        assert.strictEqual(started.length, 3);
        assert.ok(started[2] - begin >= 95, `third request started after ${started[2] - begin}ms`);
    });
});
