/**
 * Scan dump codec, markdown rendering and scan-to-scan diffs.
 */

import { z } from 'zod';
import type { AlbumSummary, ArtistReport, MissingAlbum, Report } from '../types';

export const SCAN_DUMP_FORMAT = 'crategap.scan-dump';
export const SCAN_DUMP_VERSION = 1;

// ============================================
// Scan dump
// ============================================

const albumSummarySchema = z.object({
    id: z.number().int(),
    title: z.string(),
    releaseDate: z.string().nullable(),
    recordType: z.string(),
    link: z.string().nullable(),
});

const reportSchema: z.ZodType<Report, z.ZodTypeDef, unknown> = z.object({
    rootPath: z.string(),
    generatedAt: z.string(),
    normalizerVersion: z.number().int(),
    totals: z.object({
        artists: z.number().int(),
        resolved: z.number().int(),
        unresolved: z.number().int(),
        localAlbums: z.number().int(),
        missingAlbums: z.number().int(),
        extraLocalAlbums: z.number().int(),
        skipped: z.number().int(),
    }),
    artists: z.array(
        z.object({
            key: z.string(),
            artistId: z.number().int(),
            name: z.string(),
            localNames: z.array(z.string()),
            dirPaths: z.array(z.string()),
            knownCount: z.number().int(),
            matchedCount: z.number().int(),
            // Absent from dumps written before the full listing existed
            present: z.array(albumSummarySchema).default([]),
            missing: z.array(albumSummarySchema),
            extraLocal: z.array(z.string()),
        })
    ),
    unresolved: z.array(
        z.object({
            key: z.string(),
            rawName: z.string(),
            dirPaths: z.array(z.string()),
            reason: z.enum(['not_found', 'transient_error']),
            message: z.string().nullable(),
        })
    ),
    skipped: z.array(
        z.object({
            path: z.string(),
            reason: z.enum(['not_a_directory', 'ignored', 'unreadable', 'symlink_cycle', 'broken_symlink']),
            message: z.string(),
        })
    ),
});

const scanDumpSchema = z.object({
    format: z.literal(SCAN_DUMP_FORMAT),
    version: z.literal(SCAN_DUMP_VERSION),
    normalizerVersion: z.number().int(),
    report: reportSchema,
});

export function serializeScanDump(report: Report): string {
    return JSON.stringify({
        format: SCAN_DUMP_FORMAT,
        version: SCAN_DUMP_VERSION,
        normalizerVersion: report.normalizerVersion,
        report,
    });
}

/**
 * Decode a stored scan_dump. Throws on anything but a known format version.
 */
export function parseScanDump(dump: string): Report {
    let raw: unknown;
    try {
        raw = JSON.parse(dump);
    } catch (error) {
        throw new Error('Scan dump is not valid JSON', { cause: error });
    }

    const parsed = scanDumpSchema.safeParse(raw);
    if (!parsed.success) {
        const issue = parsed.error.errors[0];
        throw new Error(`Unsupported scan dump: ${issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'invalid'}`);
    }
    return parsed.data.report;
}

// ============================================
// Markdown
// ============================================

export function formatAlbumLine(album: AlbumSummary): string {
    const year = album.releaseDate ? album.releaseDate.slice(0, 4) : '????';
    return `${year} - ${album.title}`;
}

export interface MarkdownOptions {
    /** List every known album of each resolved artist, marking the missing ones. */
    allAlbums?: boolean;
}

// Same order as the stored catalog: unknown dates first, then by date and id
function byRelease(a: AlbumSummary, b: AlbumSummary): number {
    if (a.releaseDate !== b.releaseDate) {
        if (a.releaseDate === null) return -1;
        if (b.releaseDate === null) return 1;
        return a.releaseDate < b.releaseDate ? -1 : 1;
    }
    return a.id - b.id;
}

function knownAlbumLines(artist: ArtistReport): string[] {
    const missingIds = new Set(artist.missing.map((album) => album.id));
    return [...artist.present, ...artist.missing]
        .sort(byRelease)
        .map((album) => `- ${formatAlbumLine(album)}${missingIds.has(album.id) ? ' (not in library)' : ''}`);
}

export function renderReportMarkdown(report: Report, options: MarkdownOptions = {}): string {
    const { totals } = report;
    const lines: string[] = [
        '# Missing Albums',
        '',
        `Library: ${report.rootPath}`,
        `Generated: ${report.generatedAt}`,
        '',
        `${totals.artists} artists, ${totals.resolved} resolved, ${totals.unresolved} unresolved, ` +
            `${totals.missingAlbums} missing albums.`,
        'Results are based entirely on the metadata available from Deezer.',
    ];

    if (options.allAlbums) {
        for (const artist of report.artists) {
            lines.push('', `## ${artist.name}`, '', ...knownAlbumLines(artist));
        }
    } else {
        const withGaps = report.artists.filter((artist) => artist.missing.length > 0);
        if (withGaps.length === 0) {
            lines.push('', 'No missing albums.');
        }
        for (const artist of withGaps) {
            lines.push('', `## ${artist.name}`, '');
            for (const album of artist.missing) {
                lines.push(`- ${formatAlbumLine(album)}`);
            }
        }
    }

    if (report.unresolved.length > 0) {
        lines.push('', '## Unresolved artists', '');
        for (const entry of report.unresolved) {
            const detail = entry.message ? `${entry.reason}: ${entry.message}` : entry.reason;
            lines.push(`- ${entry.rawName} (${detail})`);
        }
    }

    if (report.skipped.length > 0) {
        lines.push('', '## Skipped paths', '');
        for (const issue of report.skipped) {
            lines.push(`- ${issue.path} (${issue.reason})`);
        }
    }

    return lines.join('\n') + '\n';
}

// ============================================
// Diff
// ============================================

export interface ArtistDiff {
    artistId: number;
    name: string;
    albums: MissingAlbum[];
}

export interface ReportDiff {
    /** Missing now, not missing in the previous scan. */
    newlyMissing: ArtistDiff[];
    /** Missing in the previous scan, not anymore. */
    resolvedSince: ArtistDiff[];
}

function missingIds(report: Report): Set<string> {
    const ids = new Set<string>();
    for (const artist of report.artists) {
        for (const album of artist.missing) ids.add(`${artist.artistId}:${album.id}`);
    }
    return ids;
}

function subtract(from: Report, other: Set<string>): ArtistDiff[] {
    const result: ArtistDiff[] = [];
    for (const artist of from.artists) {
        const albums = artist.missing.filter((album) => !other.has(`${artist.artistId}:${album.id}`));
        if (albums.length > 0) result.push({ artistId: artist.artistId, name: artist.name, albums });
    }
    return result;
}

/**
 * Compare a report against the previous one of the same folder. With no
 * previous report everything missing is new.
 */
export function diffReports(previous: Report | null, current: Report): ReportDiff {
    if (!previous) {
        return { newlyMissing: subtract(current, new Set()), resolvedSince: [] };
    }
    return {
        newlyMissing: subtract(current, missingIds(previous)),
        resolvedSince: subtract(previous, missingIds(current)),
    };
}

export function renderDiffMarkdown(diff: ReportDiff): string {
    const lines: string[] = [
        '# New Since Last Scan',
        '',
        'Albums missing from the library that were not missing in the previous scan.',
    ];

    if (diff.newlyMissing.length === 0) {
        lines.push('', 'No changes detected.');
    }
    for (const artist of diff.newlyMissing) {
        lines.push('', `## ${artist.name}`, '');
        for (const album of artist.albums) {
            lines.push(`- ${formatAlbumLine(album)}`);
        }
    }

    if (diff.resolvedSince.length > 0) {
        lines.push('', '## No longer missing', '');
        for (const artist of diff.resolvedSince) {
            for (const album of artist.albums) {
                lines.push(`- ${artist.name}: ${formatAlbumLine(album)}`);
            }
        }
    }

    return lines.join('\n') + '\n';
}
