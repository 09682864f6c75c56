/**
 * Routes barrel export
 */

export { default as createScanRoutes } from './scans';
export { default as createArtistRoutes } from './artists';
export type { ScanRouteDeps } from './scans';
