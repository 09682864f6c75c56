import 'dotenv/config';
import { createApp } from './app';
import { loadConfig } from './config';
import { closeDatabase, openDatabase } from './db';
import { createDeezerProvider } from './deezer';
import { createLogger } from './logger';
import { ReconciliationEngine } from './reconcile';
import { MetadataRepository } from './repository';
import { ScanRunner } from './scanRunner';

const logger = createLogger('Server');

const config = loadConfig();
const db = openDatabase(config.databasePath, logger.child('DB'));
const repository = new MetadataRepository(db, logger.child('Repository'));

const engine = new ReconciliationEngine({
    repository,
    provider: createDeezerProvider(config.provider, logger.child('Deezer')),
    config,
    logger: logger.child('Reconcile'),
});
const runner = new ScanRunner(engine, logger.child('Scan'));

const app = createApp({ repository, runner, defaultPath: config.musicLibraryPath, logger: logger.child('API') });

const server = app.listen(config.port, () => {
    console.log(`Server running on http://localhost:${config.port}`);
    if (config.musicLibraryPath) {
        console.log(`Music library: ${config.musicLibraryPath}`);
    }
});

function shutdown(signal: string): void {
    logger.info(`${signal} received, shutting down...`);
    runner.cancel();
    server.close(() => {
        runner
            .idle()
            .then(() => closeDatabase(db, logger.child('DB')))
            .catch((error) => logger.error('Shutdown failed:', error));
    });
}

process.once('SIGINT', () => shutdown('SIGINT'));
process.once('SIGTERM', () => shutdown('SIGTERM'));
