import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { StoreError, errorMessage } from './errors';
import { createLogger, type Logger } from './logger';
import type { MetadataRepository } from './repository';
import { createArtistRoutes, createScanRoutes } from './routes';
import type { ScanRunner } from './scanRunner';

export interface AppDeps {
    repository: MetadataRepository;
    runner: ScanRunner;
    defaultPath: string | null;
    logger?: Logger;
}

/**
 * Build the Express app. Listening is left to the caller.
 */
export function createApp({ repository, runner, defaultPath, logger = createLogger('API') }: AppDeps): express.Express {
    const app = express();

    app.use(cors({
        origin: true,
        credentials: true
    }));
    app.use(express.json());

    // API health check endpoint
    app.get('/api/health', (req: Request, res: Response) => {
        let database = false;
        try {
            database = repository.ping();
        } catch (error) {
            logger.error(`Health check failed: ${errorMessage(error)}`);
        }
        res.status(database ? 200 : 503).json({ status: database ? 'ok' : 'degraded', database });
    });

    app.use('/api', createScanRoutes({ repository, runner, defaultPath }));
    app.use('/api', createArtistRoutes(repository));

    app.use('/api', (req: Request, res: Response) => {
        res.status(404).json({ error: 'Not found' });
    });

    // Express recognises error handlers by their four parameters
    app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
        if (err instanceof SyntaxError) {
            return res.status(400).json({ error: 'Malformed JSON body' });
        }
        logger.error(`${req.method} ${req.path} failed:`, err);
        const message = err instanceof StoreError ? 'Database error' : 'Internal server error';
        res.status(500).json({ error: message });
    });

    return app;
}

export default createApp;
