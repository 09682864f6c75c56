// crategap shared types
// Used by the engine, the CLI and the HTTP API

// ============================================
// Catalog Entities
// ============================================

export interface ArtistRecord {
    id: number;
    name: string;
    link: string | null;
    picture: string | null;
    picture_small: string | null;
    picture_medium: string | null;
    picture_big: string | null;
    picture_xl: string | null;
    nb_album: number;
    nb_fan: number;
    radio: boolean;
    tracklist: string | null;
    type: string;
    refreshed_at?: string | null;
}

export interface AlbumRecord {
    id: number;
    title: string;
    link: string | null;
    cover: string | null;
    cover_small: string | null;
    cover_medium: string | null;
    cover_big: string | null;
    cover_xl: string | null;
    genre_id: number | null;
    fans: number;
    release_date: string | null; // YYYY-MM-DD
    record_type: string;
    explicit_lyrics: boolean;
    artist_id: number;
}

export interface ScanResultRecord {
    id: number;
    folder_path: string;
    scan_dump: string;
    scan_date: string;
}

export type ScanSummary = Omit<ScanResultRecord, 'scan_dump'>;

// ============================================
// Local Library
// ============================================

export interface LocalObservation {
    artistNameRaw: string;
    albumNameRaw: string; // '' when the artist folder has no album folders
    artistDirPath: string;
    albumDirPath: string | null;
}

export type ScanIssueReason =
    | 'not_a_directory'
    | 'ignored'
    | 'unreadable'
    | 'symlink_cycle'
    | 'broken_symlink';

export interface ScanIssue {
    path: string;
    reason: ScanIssueReason;
    message: string;
}

// ============================================
// Reconciliation Report
// ============================================

export type UnresolvedReason = 'not_found' | 'transient_error';

export interface AlbumSummary {
    id: number;
    title: string;
    releaseDate: string | null;
    recordType: string;
    link: string | null;
}

export type MissingAlbum = AlbumSummary;

export interface ArtistReport {
    key: string;
    artistId: number;
    name: string;
    localNames: string[];
    dirPaths: string[];
    knownCount: number;
    matchedCount: number;
    /** Known albums with a local folder. */
    present: AlbumSummary[];
    missing: MissingAlbum[];
    extraLocal: string[];
}

export interface UnresolvedArtistReport {
    key: string;
    rawName: string;
    dirPaths: string[];
    reason: UnresolvedReason;
    message: string | null;
}

export interface ReportTotals {
    artists: number;
    resolved: number;
    unresolved: number;
    localAlbums: number;
    missingAlbums: number;
    extraLocalAlbums: number;
    skipped: number;
}

export interface Report {
    rootPath: string;
    generatedAt: string;
    normalizerVersion: number;
    totals: ReportTotals;
    artists: ArtistReport[];
    unresolved: UnresolvedArtistReport[];
    skipped: ScanIssue[];
}

// ============================================
// Resolution
// ============================================

export type ResolutionSource = 'store' | 'provider';

export type Resolution =
    | { status: 'resolved'; artist: ArtistRecord; source: ResolutionSource }
    | { status: 'unresolved'; reason: UnresolvedReason; message: string | null };

// ============================================
// Artist Images
// ============================================

export type ImageOutcome =
    | { status: 'exists'; artistId: number; path: string }
    | { status: 'downloaded'; artistId: number; path: string; url: string }
    | { status: 'failed'; artistId: number; path: string; reason: string };
