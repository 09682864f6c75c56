/**
 * Background scan state for the HTTP API. One reconcile run at a time.
 */

import type { ReportTotals } from '../types';
import { errorMessage } from './errors';
import { createLogger, type Logger } from './logger';
import type { ReconcileOptions, ReconciliationEngine } from './reconcile';

export interface LastScan {
    scanId: number;
    path: string;
    totals: ReportTotals;
    images: { downloaded: number; failed: number };
    finishedAt: string;
}

export interface ScanStatus {
    isScanning: boolean;
    path: string | null;
    startTime: number | null;
    lastScan: LastScan | null;
    lastError: string | null;
}

export class ScanRunner {
    private running: Promise<void> | null = null;
    private controller: AbortController | null = null;
    private state: ScanStatus = {
        isScanning: false,
        path: null,
        startTime: null,
        lastScan: null,
        lastError: null,
    };

    constructor(
        private readonly engine: ReconciliationEngine,
        private readonly logger: Logger = createLogger('Scan')
    ) {}

    get status(): ScanStatus {
        return { ...this.state };
    }

    /**
     * Start a run in the background. Returns false if one is already running.
     */
    start(rootPath: string, options: Omit<ReconcileOptions, 'signal'> = {}): boolean {
        if (this.running) return false;

        const controller = new AbortController();
        this.controller = controller;
        this.state = { ...this.state, isScanning: true, path: rootPath, startTime: Date.now(), lastError: null };

        this.running = this.engine
            .reconcile(rootPath, { ...options, signal: controller.signal })
            .then(
                ({ report, scanId, images }) => {
                    this.state.lastScan = {
                        scanId,
                        path: report.rootPath,
                        totals: report.totals,
                        images: {
                            downloaded: images.filter((image) => image.status === 'downloaded').length,
                            failed: images.filter((image) => image.status === 'failed').length,
                        },
                        finishedAt: new Date().toISOString(),
                    };
                },
                (error: unknown) => {
                    this.logger.error(`Scan of ${rootPath} failed: ${errorMessage(error)}`);
                    this.state.lastError = errorMessage(error);
                }
            )
            .finally(() => {
                this.state.isScanning = false;
                this.running = null;
                this.controller = null;
            });
        return true;
    }

    /** Ask the current run to stop between artists. */
    cancel(): boolean {
        if (!this.controller) return false;
        this.controller.abort();
        return true;
    }

    /** Resolves once no run is in progress. */
    async idle(): Promise<void> {
        await this.running;
    }
}
