import assert from 'assert';
import type { Server } from 'http';
import { after, before, describe, it } from 'node:test';
import { z } from 'zod';
import { createApp } from '../app';
import type { DatabaseType } from '../db';
import { silentLogger } from '../logger';
import { ReconciliationEngine } from '../reconcile';
import type { MetadataRepository } from '../repository';
import { ScanRunner } from '../scanRunner';
import { album, artist, FakeProvider, makeLibrary, openTestStore, removeDir, testConfig } from './helpers';

const statusSchema = z.object({
    isScanning: z.boolean(),
    lastError: z.string().nullable(),
    lastScan: z.object({
        scanId: z.number(),
        path: z.string(),
        totals: z.object({ missingAlbums: z.number() }),
        images: z.object({ downloaded: z.number(), failed: z.number() }),
    }),
});

const scanListSchema = z.array(z.object({ id: z.number(), folder_path: z.string(), scan_date: z.string() }));

const scanDetailSchema = z.object({
    report: z.object({
        artists: z.array(z.object({ missing: z.array(z.object({ title: z.string() })) })),
    }),
});

const albumsSchema = z.object({
    artist: z.object({ name: z.string() }),
    albums: z.array(z.object({ id: z.number() })),
});

async function readJson<T>(res: Response, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    return schema.parse(await res.json());
}

describe('HTTP API', () => {
    let db: DatabaseType;
    let repository: MetadataRepository;
    let provider: FakeProvider;
    let runner: ScanRunner;
    let server: Server;
    let baseUrl: string;
    let root: string;

    before(async () => {
        ({ db, repository } = openTestStore());
        provider = new FakeProvider(
            { 'The Beatles': [artist(1, 'The Beatles')] },
            {
                1: [
                    album(10, 'Abbey Road', 1, { release_date: '1969-09-26' }),
                    album(11, 'Let It Be', 1, { release_date: '1970-05-08' }),
                    album(12, 'Help!', 1, { release_date: '1965-08-06' }),
                    album(13, 'Revolver', 1, { release_date: '1966-08-05' }),
                    album(14, 'Hey Jude', 1, { release_date: '1968-08-26', record_type: 'single' }),
                ],
            }
        );
        root = makeLibrary({ 'The Beatles': ['Abbey Road', 'Let It Be'] });

        const engine = new ReconciliationEngine({ repository, provider, config: testConfig(), logger: silentLogger });
        runner = new ScanRunner(engine, silentLogger);
        const app = createApp({ repository, runner, defaultPath: null, logger: silentLogger });

        server = await new Promise<Server>((resolve) => {
            const instance = app.listen(0, () => resolve(instance));
        });
        const address = server.address();
        if (!address || typeof address === 'string') {
            throw new Error('Server did not bind to a port');
        }
        baseUrl = `http://127.0.0.1:${address.port}`;
    });

    after(async () => {
        await runner.idle();
        await new Promise<void>((resolve) => server.close(() => resolve()));
        if (db.open) db.close();
        removeDir(root);
    });

    function post(path: string, body: string): Promise<Response> {
        return fetch(`${baseUrl}${path}`, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body,
        });
    }

    it('reports a healthy store', async () => {
        const res = await fetch(`${baseUrl}/api/health`);
        assert.strictEqual(res.status, 200);
        assert.deepStrictEqual(await res.json(), { status: 'ok', database: true });
    });

    it('rejects scans without a usable path', async () => {
        const missing = await post('/api/scan', '{}');
        assert.strictEqual(missing.status, 400);
        assert.deepStrictEqual(await missing.json(), { error: 'Missing path - set MUSIC_LIBRARY_PATH or provide path' });

        const invalid = await post('/api/scan', JSON.stringify({ path: 42 }));
        assert.strictEqual(invalid.status, 400);

        const malformed = await post('/api/scan', '{');
        assert.strictEqual(malformed.status, 400);
        assert.deepStrictEqual(await malformed.json(), { error: 'Malformed JSON body' });
    });

    it('refuses to cancel when nothing runs', async () => {
        const res = await post('/api/scan/cancel', '{}');
        assert.strictEqual(res.status, 409);
    });

    it('runs one scan at a time and records it', async () => {
        provider.searchDelayMs = 100;
        const started = await post('/api/scan', JSON.stringify({ path: root, fetchImages: false }));
        assert.strictEqual(started.status, 202);
        assert.deepStrictEqual(await started.json(), { message: 'Scan started', path: root });

        const second = await post('/api/scan', JSON.stringify({ path: root }));
        assert.strictEqual(second.status, 409);

        await runner.idle();

        const status = await readJson(await fetch(`${baseUrl}/api/status`), statusSchema);
        assert.strictEqual(status.isScanning, false);
        assert.strictEqual(status.lastError, null);
        assert.strictEqual(status.lastScan.path, root);
        assert.strictEqual(status.lastScan.totals.missingAlbums, 2);
        assert.deepStrictEqual(status.lastScan.images, { downloaded: 0, failed: 0 });

        const scans = await readJson(await fetch(`${baseUrl}/api/scans`), scanListSchema);
        assert.strictEqual(scans.length, 1);
        assert.strictEqual(scans[0].id, status.lastScan.scanId);
        assert.strictEqual(scans[0].folder_path, root);

        const detail = await readJson(await fetch(`${baseUrl}/api/scans/${scans[0].id}`), scanDetailSchema);
        assert.deepStrictEqual(
            detail.report.artists[0].missing.map((entry) => entry.title),
            ['Help!', 'Revolver']
        );

        const markdown = await fetch(`${baseUrl}/api/scans/${scans[0].id}/markdown`);
        assert.match(markdown.headers.get('content-type') ?? '', /^text\/markdown/);
        const lines = (await markdown.text()).split('\n');
        assert.strictEqual(lines[0], '# Missing Albums');
        assert.ok(lines.includes('- 1965 - Help!'));
        assert.ok(lines.includes('- 1966 - Revolver'));

        const full = (await (await fetch(`${baseUrl}/api/scans/${scans[0].id}/markdown?all=true`)).text()).split('\n');
        const heading = full.indexOf('## The Beatles');
        assert.deepStrictEqual(full.slice(heading, heading + 6), [
            '## The Beatles',
            '',
            '- 1965 - Help! (not in library)',
            '- 1966 - Revolver (not in library)',
            '- 1969 - Abbey Road',
            '- 1970 - Let It Be',
        ]);
        assert.strictEqual((await fetch(`${baseUrl}/api/scans/${scans[0].id}/markdown?all=maybe`)).status, 400);
    });

    it('validates scan ids and queries', async () => {
        assert.strictEqual((await fetch(`${baseUrl}/api/scans/abc`)).status, 400);
        assert.strictEqual((await fetch(`${baseUrl}/api/scans/999`)).status, 404);
        assert.strictEqual((await fetch(`${baseUrl}/api/scans?limit=abc`)).status, 400);
        assert.deepStrictEqual(await (await fetch(`${baseUrl}/api/scans?folder=/elsewhere`)).json(), []);
    });

    it('serves the stored catalog', async () => {
        const res = await fetch(`${baseUrl}/api/artists/1/albums?types=album,single`);
        assert.strictEqual(res.status, 200);
        const body = await readJson(res, albumsSchema);
        assert.strictEqual(body.artist.name, 'The Beatles');
        assert.deepStrictEqual(
            body.albums.map((entry) => entry.id),
            [12, 13, 14, 10, 11]
        );

        const albumsOnly = await readJson(await fetch(`${baseUrl}/api/artists/1/albums?types=album`), albumsSchema);
        assert.strictEqual(albumsOnly.albums.length, 4);

        assert.strictEqual((await fetch(`${baseUrl}/api/artists/1/albums?types=mixtape`)).status, 400);
        assert.strictEqual((await fetch(`${baseUrl}/api/artists/2`)).status, 404);
        assert.deepStrictEqual(await (await fetch(`${baseUrl}/api/nothing-here`)).json(), { error: 'Not found' });
    });

    it('reports a degraded store', async () => {
        db.close();
        const res = await fetch(`${baseUrl}/api/health`);
        assert.strictEqual(res.status, 503);
        assert.deepStrictEqual(await res.json(), { status: 'degraded', database: false });
    });
});
