import languages from "../data/languages.json";

const ALPHA2: Record<string, string> = languages.alpha2;
const NAMES: Record<string, string> = languages.names;

/**
 * Canonicalizes a language for the TLAN frame (ISO 639-2, bibliographic form).
 *
 * `en`, `EN` and `English` all become `eng`; three-letter codes are
 * lower-cased; anything unrecognized is returned trimmed.
 */
export function normalizeLanguageCode(language: string | undefined): string {
    const trimmed = (language ?? '').trim();
    if (trimmed === '') return '';

    const lower = trimmed.toLowerCase();
    if (Object.hasOwn(ALPHA2, lower)) return ALPHA2[lower];
    if (Object.hasOwn(NAMES, lower)) return NAMES[lower];
    if (/^[a-z]{3}$/.test(lower)) return lower;
    return trimmed;
}
