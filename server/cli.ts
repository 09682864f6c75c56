#!/usr/bin/env node
/**
 * crategap command line
 *
 *   crategap [root] [--verbose] [--json <file>] [--markdown <file>]
 *            [--all-albums] [--diff <file>] [--no-images] [--concurrency <n>]
 *
 * Exits 1 when the store, the configuration or the library root is unusable.
 */

import 'dotenv/config';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { Report } from '../types';
import { loadConfig } from './config';
import { closeDatabase, openDatabase, type DatabaseType } from './db';
import { createDeezerProvider } from './deezer';
import { ConfigError, errorMessage, FileSystemError, isAbortError, StoreError } from './errors';
import { createLogger, type Logger } from './logger';
import { ReconciliationEngine } from './reconcile';
import { diffReports, parseScanDump, renderDiffMarkdown, renderReportMarkdown } from './report';
import { MetadataRepository } from './repository';

export const USAGE = `Usage: crategap [root] [options]

Compare a music library (root/artist/album folders) with Deezer's catalog
and list the albums that are missing locally.

Options:
  --verbose            log every resolution and skipped path
  --json <file>        write the report as JSON
  --markdown <file>    write the missing albums as markdown
  --all-albums         list every known album in the markdown, marking the missing ones
  --diff <file>        write albums missing since the previous scan as markdown
  --no-images          do not download artist images
  --concurrency <n>    artists resolved in parallel
  -h, --help           show this help
`;

export interface CliArgs {
    root: string | null;
    verbose: boolean;
    json: string | null;
    markdown: string | null;
    allAlbums: boolean;
    diff: string | null;
    images: boolean;
    concurrency: number | null;
    help: boolean;
}

const VALUE_FLAGS = ['--json', '--markdown', '--diff', '--concurrency'] as const;
type ValueFlag = (typeof VALUE_FLAGS)[number];

function isValueFlag(flag: string): flag is ValueFlag {
    return VALUE_FLAGS.some((candidate) => candidate === flag);
}

/**
 * Parse argv (without node and script). Accepts `--flag value` and
 * `--flag=value`. Throws ConfigError on unknown or incomplete flags.
 */
export function parseCliArgs(argv: string[]): CliArgs {
    const args: CliArgs = {
        root: null,
        verbose: false,
        json: null,
        markdown: null,
        allAlbums: false,
        diff: null,
        images: true,
        concurrency: null,
        help: false,
    };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];

        if (arg === '--verbose' || arg === '-v') {
            args.verbose = true;
        } else if (arg === '--all-albums') {
            args.allAlbums = true;
        } else if (arg === '--no-images') {
            args.images = false;
        } else if (arg === '--help' || arg === '-h') {
            args.help = true;
        } else if (arg.startsWith('--')) {
            const eq = arg.indexOf('=');
            const flag = eq === -1 ? arg : arg.slice(0, eq);
            if (!isValueFlag(flag)) {
                throw new ConfigError(`Unknown option ${flag}`, [`unknown option ${flag}`]);
            }

            let value: string | undefined;
            if (eq !== -1) {
                value = arg.slice(eq + 1);
            } else {
                value = argv[i + 1];
                i++;
            }
            if (value === undefined || value === '') {
                throw new ConfigError(`${flag} needs a value`, [`${flag} needs a value`]);
            }

            if (flag === '--concurrency') {
                const n = Number(value);
                if (!Number.isInteger(n) || n < 1) {
                    throw new ConfigError(`--concurrency must be a positive integer, got "${value}"`, [`invalid --concurrency`]);
                }
                args.concurrency = n;
            } else {
                args[flag === '--json' ? 'json' : flag === '--markdown' ? 'markdown' : 'diff'] = value;
            }
        } else if (args.root === null) {
            args.root = arg;
        } else {
            throw new ConfigError(`Unexpected argument "${arg}"`, [`unexpected argument ${arg}`]);
        }
    }

    return args;
}

async function writeOutput(file: string, content: string, logger: Logger): Promise<void> {
    const target = path.resolve(file);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content, 'utf-8');
    logger.info(`Wrote ${target}`);
}

function previousReport(dump: string | undefined, logger: Logger): Report | null {
    if (dump === undefined) return null;
    try {
        return parseScanDump(dump);
    } catch (error) {
        logger.warn(`Ignoring previous scan: ${errorMessage(error)}`);
        return null;
    }
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
    let logger = createLogger('crategap');

    let args: CliArgs;
    try {
        args = parseCliArgs(argv);
    } catch (error) {
        logger.error(errorMessage(error));
        console.error(USAGE);
        return 1;
    }
    if (args.help) {
        console.log(USAGE);
        return 0;
    }
    logger = createLogger('crategap', args.verbose);

    let db: DatabaseType | undefined;
    const controller = new AbortController();
    const onSigint = () => {
        logger.warn('Interrupted, stopping after the current artists...');
        controller.abort();
    };
    process.once('SIGINT', onSigint);

    try {
        const config = loadConfig();
        const root = path.resolve(args.root ?? config.musicLibraryPath ?? process.cwd());

        db = openDatabase(config.databasePath, logger.child('DB'));
        const repository = new MetadataRepository(db, logger.child('Repository'));
        const engine = new ReconciliationEngine({
            repository,
            provider: createDeezerProvider(config.provider, logger.child('Deezer')),
            config,
            logger: logger.child('Reconcile'),
        });

        const previous = repository.getLatestScan(root);
        const { report, images } = await engine.reconcile(root, {
            verbose: args.verbose,
            fetchImages: args.images,
            concurrency: args.concurrency ?? undefined,
            signal: controller.signal,
        });

        if (args.json) {
            await writeOutput(args.json, JSON.stringify(report, null, 2) + '\n', logger);
        }
        if (args.markdown) {
            await writeOutput(args.markdown, renderReportMarkdown(report, { allAlbums: args.allAlbums }), logger);
        }
        if (args.diff) {
            const diff = diffReports(previousReport(previous?.scan_dump, logger), report);
            await writeOutput(args.diff, renderDiffMarkdown(diff), logger);
        }

        const failedImages = images.filter((image) => image.status === 'failed').length;
        console.log(
            `\n${report.totals.artists} artists (${report.totals.resolved} resolved, ${report.totals.unresolved} unresolved), ` +
                `${report.totals.missingAlbums} missing albums, ${report.totals.skipped} skipped paths` +
                (failedImages > 0 ? `, ${failedImages} images failed` : '')
        );
        return 0;
    } catch (error) {
        if (error instanceof ConfigError || error instanceof StoreError || error instanceof FileSystemError) {
            logger.error(error.message);
        } else if (isAbortError(error)) {
            logger.error('Scan cancelled, nothing recorded');
        } else {
            logger.error('Scan failed:', error);
        }
        return 1;
    } finally {
        process.removeListener('SIGINT', onSigint);
        if (db) closeDatabase(db, logger.child('DB'));
    }
}

if (require.main === module) {
    main()
        .then((code) => {
            process.exitCode = code;
        })
        .catch((error) => {
            console.error('[crategap]', error);
            process.exitCode = 1;
        });
}
