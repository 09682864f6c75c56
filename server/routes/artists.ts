/**
 * Artist Routes
 * Read-only view of the stored catalog
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { RECORD_TYPES } from '../config';
import type { MetadataRepository } from '../repository';

const albumsQuerySchema = z.object({
    // Comma separated, e.g. ?types=album,ep
    types: z
        .string()
        .optional()
        .transform((value) => (value ? value.split(',').map((type) => type.trim()).filter(Boolean) : []))
        .pipe(z.array(z.enum(RECORD_TYPES))),
});

export function createArtistRoutes(repository: MetadataRepository): Router {
    const router = Router();

    router.get('/artists/:id', (req: Request, res: Response) => {
        const id = z.coerce.number().int().positive().safeParse(req.params.id);
        if (!id.success) return res.status(400).json({ error: 'Invalid artist id' });

        const artist = repository.getArtist(id.data);
        if (!artist) return res.status(404).json({ error: 'Artist not found' });
        res.json(artist);
    });

    // Known albums, oldest first
    router.get('/artists/:id/albums', (req: Request, res: Response) => {
        const id = z.coerce.number().int().positive().safeParse(req.params.id);
        if (!id.success) return res.status(400).json({ error: 'Invalid artist id' });

        const query = albumsQuerySchema.safeParse(req.query);
        if (!query.success) {
            return res.status(400).json({ error: 'Invalid query', details: query.error.errors });
        }

        const artist = repository.getArtist(id.data);
        if (!artist) return res.status(404).json({ error: 'Artist not found' });

        res.json({ artist, albums: repository.listAlbumsForArtist(artist.id, query.data.types) });
    });

    return router;
}

export default createArtistRoutes;
