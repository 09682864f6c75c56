/**
 * Name Normalization Module
 *
 * Turns a raw folder name or catalog title into a comparison key. Keys are
 * only ever compared for equality; they are never shown to the user.
 *
 * The rule set is versioned. Scan dumps record the version they were built
 * with, so bump NORMALIZER_VERSION whenever a rule below changes: historical
 * scans may otherwise appear to disagree with current ones.
 *
 * Rules (version 1), applied in order:
 *   1. Trim surrounding whitespace.
 *   2. Unicode NFKD decomposition, combining marks removed (é -> e, ＡＢＣ -> ABC).
 *   3. Lower-case, then fold letters without a decomposition (ø -> o, æ -> ae,
 *      œ -> oe, ß -> ss, đ/ð -> d, ł -> l, þ -> th).
 *   4. Typographic quotes become ASCII quotes, dashes become '-', '&' and '+'
 *      become the word 'and'; whitespace is collapsed.
 *   5. Noise tokens are stripped until none is left, unless stripping would
 *      leave nothing:
 *        - a bracketed suffix: "(Remastered)", "[Disc 1]", "{Live}"
 *        - a trailing disc marker: "CD1", "cd 2", "Disc 2", "- Disk 3"
 *        - a leading release year: "1969 - ", "(1969) ", "[1969] "
 *        - a leading "the "
 *        - a trailing ", the"
 *   6. Apostrophes and periods are deleted (R.E.M. -> rem, Don't -> dont).
 *   7. Every other character that is not a letter or digit becomes a space,
 *      whitespace is collapsed and trimmed.
 *
 * Input that reduces to nothing yields the empty key, which matches nothing.
 */

export const NORMALIZER_VERSION = 1;

// =============================================================================
// RULE TABLES
// =============================================================================

const FOLDED_LETTERS: Record<string, string> = {
    'ø': 'o',
    'æ': 'ae',
    'œ': 'oe',
    'ß': 'ss',
    'đ': 'd',
    'ð': 'd',
    'ł': 'l',
    'þ': 'th',
    'ı': 'i',
};

const NOISE_PATTERNS: RegExp[] = [
    // Bracketed disambiguation suffix
    /\s*[([{][^()[\]{}]*[)\]}]$/,
    // Disc markers
    /[\s\-_,]*\b(?:cd|dis[ck])\s*\d+$/,
    // Release year prefixes
    /^(?:19|20)\d{2}\s*-\s*/,
    /^[([](?:19|20)\d{2}[)\]]\s*/,
    // Articles
    /^the\s+/,
    /\s*,\s*the$/,
];

// =============================================================================
// EXPORTED FUNCTIONS
// =============================================================================

/**
 * Normalize a raw artist or album name to its comparison key.
 * Pure and total: anything it cannot make sense of becomes ''.
 */
export function normalize(raw: string): string {
    if (!raw || typeof raw !== 'string') return '';

    let value = raw.trim();

    value = stripDiacritics(value).toLowerCase();
    value = value.replace(/[øæœßđðłþı]/g, (letter) => FOLDED_LETTERS[letter] ?? letter);

    value = value
        .replace(/[‘’ʼʻ`´]/g, "'")
        .replace(/[“”„]/g, '"')
        .replace(/[‐-―−]/g, '-')
        .replace(/\s*[&+]\s*/g, ' and ')
        .replace(/\s+/g, ' ')
        .trim();

    value = stripNoise(value);

    return value
        .replace(/['.]/g, '')
        .replace(/[^\p{L}\p{N}]+/gu, ' ')
        .replace(/\s+/g, ' ')
        .trim();
}

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

function stripDiacritics(value: string): string {
    return value.normalize('NFKD').replace(/\p{M}/gu, '');
}

function stripNoise(value: string): string {
    let current = value;
    let changed = true;

    while (changed) {
        changed = false;
        for (const pattern of NOISE_PATTERNS) {
            const stripped = current.replace(pattern, '').trim();
            if (stripped !== current && stripped !== '') {
                current = stripped;
                changed = true;
            }
        }
    }

    return current;
}

export default { normalize, NORMALIZER_VERSION };
