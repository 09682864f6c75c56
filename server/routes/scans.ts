/**
 * Scan Routes
 * Start a reconcile run, follow it, and read the scan history
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { parseScanDump, renderReportMarkdown } from '../report';
import type { MetadataRepository } from '../repository';
import type { ScanRunner } from '../scanRunner';

export interface ScanRouteDeps {
    repository: MetadataRepository;
    runner: ScanRunner;
    defaultPath: string | null;
}

const startScanSchema = z.object({
    path: z.string().trim().min(1).optional(),
    verbose: z.boolean().optional(),
    fetchImages: z.boolean().optional(),
});

const listScansSchema = z.object({
    folder: z.string().min(1).optional(),
    limit: z.coerce.number().int().min(1).max(500).optional(),
});

const scanIdSchema = z.coerce.number().int().positive();

const markdownQuerySchema = z.object({
    // ?all=true lists every known album, not only the missing ones
    all: z.enum(['true', 'false']).optional(),
});

export function createScanRoutes({ repository, runner, defaultPath }: ScanRouteDeps): Router {
    const router = Router();

    // Start a background scan
    router.post('/scan', (req: Request, res: Response) => {
        const parsedBody = startScanSchema.safeParse(req.body ?? {});
        if (!parsedBody.success) {
            return res.status(400).json({ error: 'Invalid request', details: parsedBody.error.errors });
        }

        const { path, verbose, fetchImages } = parsedBody.data;
        const scanPath = path ?? defaultPath;
        if (!scanPath) {
            return res.status(400).json({ error: 'Missing path - set MUSIC_LIBRARY_PATH or provide path' });
        }

        if (!runner.start(scanPath, { verbose, fetchImages })) {
            return res.status(409).json({ error: 'Scan already in progress' });
        }
        res.status(202).json({ message: 'Scan started', path: scanPath });
    });

    router.post('/scan/cancel', (req: Request, res: Response) => {
        if (!runner.cancel()) {
            return res.status(409).json({ error: 'No scan in progress' });
        }
        res.json({ message: 'Cancelling scan' });
    });

    router.get('/status', (req: Request, res: Response) => {
        res.json(runner.status);
    });

    // History, newest first, without payloads
    router.get('/scans', (req: Request, res: Response) => {
        const parsedQuery = listScansSchema.safeParse(req.query);
        if (!parsedQuery.success) {
            return res.status(400).json({ error: 'Invalid query', details: parsedQuery.error.errors });
        }
        res.json(repository.listScans({ folderPath: parsedQuery.data.folder, limit: parsedQuery.data.limit }));
    });

    router.get('/scans/:id', (req: Request, res: Response) => {
        const id = scanIdSchema.safeParse(req.params.id);
        if (!id.success) return res.status(400).json({ error: 'Invalid scan id' });

        const record = repository.getScan(id.data);
        if (!record) return res.status(404).json({ error: 'Scan not found' });

        try {
            const report = parseScanDump(record.scan_dump);
            res.json({ id: record.id, folder_path: record.folder_path, scan_date: record.scan_date, report });
        } catch (error) {
            res.status(422).json({ error: error instanceof Error ? error.message : 'Unreadable scan dump' });
        }
    });

    router.get('/scans/:id/markdown', (req: Request, res: Response) => {
        const id = scanIdSchema.safeParse(req.params.id);
        if (!id.success) return res.status(400).json({ error: 'Invalid scan id' });

        const query = markdownQuerySchema.safeParse(req.query);
        if (!query.success) {
            return res.status(400).json({ error: 'Invalid query', details: query.error.errors });
        }

        const record = repository.getScan(id.data);
        if (!record) return res.status(404).json({ error: 'Scan not found' });

        try {
            const markdown = renderReportMarkdown(parseScanDump(record.scan_dump), { allAlbums: query.data.all === 'true' });
            res.type('text/markdown').send(markdown);
        } catch (error) {
            res.status(422).json({ error: error instanceof Error ? error.message : 'Unreadable scan dump' });
        }
    });

    return router;
}

export default createScanRoutes;
