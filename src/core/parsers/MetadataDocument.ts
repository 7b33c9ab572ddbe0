import YAML from "yaml";
import { z } from "zod";
import { type Metadata, createMetadata } from "../models/Metadata";
import { FormatError } from "../utils/Errors";
import { Logger } from "../utils/Logger";
import { ChapterCodec, sortChapters } from "./ChapterCodec";
import { NumberInSetCodec } from "./NumberInSetCodec";
import { TimestampCodec } from "./TimestampCodec";

// YAML reads `5`, `2024` or `true` as non-strings; all of them are taken as text.
const Scalar = z.union([z.string(), z.number(), z.boolean()]).transform(value => String(value));
const OptionalScalar = Scalar.nullish();

const DocumentSchema = z.object({
    title: OptionalScalar,
    subtitle: OptionalScalar,
    artist: OptionalScalar,
    album: OptionalScalar,
    albumArtist: OptionalScalar,
    grouping: OptionalScalar,
    date: OptionalScalar,
    track: OptionalScalar,
    disc: OptionalScalar,
    genre: OptionalScalar,
    comment: OptionalScalar,
    composer: OptionalScalar,
    publisher: OptionalScalar,
    copyright: OptionalScalar,
    language: OptionalScalar,
    bpm: OptionalScalar,
    chapters: z.array(Scalar).nullish(),
    artwork: OptionalScalar,
    lyrics: OptionalScalar,
}).passthrough();

const KNOWN_KEYS = new Set<string>(Object.keys(DocumentSchema.shape));

const STRING_KEYS = [
    'title', 'subtitle', 'artist', 'album', 'albumArtist', 'grouping', 'genre',
    'comment', 'composer', 'publisher', 'copyright', 'language', 'artwork', 'lyrics',
] as const satisfies readonly (keyof Metadata)[];

/**
 * The YAML document a user edits.
 *
 * `serialize` produces the canonical form: fixed key order, absent values
 * omitted. Two records are equal exactly when their canonical forms are.
 */
export class MetadataDocument {
    private timestamps = new TimestampCodec();
    private numbers = new NumberInSetCodec();
    private chapters = new ChapterCodec();

    public serialize(metadata: Metadata): string {
        const doc: Record<string, unknown> = {};
        const put = (key: string, value: unknown) => {
            if (value !== undefined && value !== '') doc[key] = value;
        };

        put('title', metadata.title);
        put('subtitle', metadata.subtitle);
        put('artist', metadata.artist);
        put('album', metadata.album);
        put('albumArtist', metadata.albumArtist);
        put('grouping', metadata.grouping);
        put('date', plain(this.timestamps.format(metadata.date)));
        if (this.numbers.isPresent(metadata.track)) put('track', plain(this.numbers.format(metadata.track)));
        if (this.numbers.isPresent(metadata.disc)) put('disc', plain(this.numbers.format(metadata.disc)));
        put('genre', metadata.genre);
        put('comment', metadata.comment);
        put('composer', metadata.composer);
        put('publisher', metadata.publisher);
        put('copyright', metadata.copyright);
        put('language', metadata.language);
        if (metadata.bpm) put('bpm', metadata.bpm);
        if (metadata.chapters.length > 0) {
            put('chapters', metadata.chapters.map(chapter => this.chapters.format(chapter)));
        }
        put('artwork', metadata.artwork);
        put('lyrics', metadata.lyrics);

        return YAML.stringify(doc, { lineWidth: 0 });
    }

    /**
     * @throws FormatError for invalid YAML, a malformed date, chapter or bpm.
     */
    public parse(text: string): Metadata {
        let raw: unknown;
        try {
            raw = YAML.parse(text);
        } catch (error) {
            throw new FormatError('failed to decode YAML', error instanceof Error ? error.message : String(error));
        }

        const metadata = createMetadata();
        if (raw === null || raw === undefined) return metadata;

        const parsed = DocumentSchema.safeParse(raw);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            throw new FormatError(`invalid metadata document (${issue.message})`, issue.path.join('.') || '<root>');
        }
        const doc = parsed.data;

        for (const key of Object.keys(doc)) {
            if (!KNOWN_KEYS.has(key)) {
                Logger.warn(`[Document] Ignoring unknown key "${key}"`);
            }
        }

        for (const key of STRING_KEYS) {
            const value = doc[key];
            if (value) metadata[key] = value;
        }

        const date = this.timestamps.parse(doc.date ?? '');
        if (date) metadata.date = date;

        const track = this.numbers.parse(doc.track ?? '');
        if (this.numbers.isPresent(track)) metadata.track = track;

        const disc = this.numbers.parse(doc.disc ?? '');
        if (this.numbers.isPresent(disc)) metadata.disc = disc;

        const bpm = parseBpm(doc.bpm);
        if (bpm) metadata.bpm = bpm;

        metadata.chapters = sortChapters((doc.chapters ?? []).map(line => this.chapters.parse(line)));

        return metadata;
    }
}

/**
 * Integers are emitted as YAML integers so they are not quoted ("5", "2024").
 * Anything a number would not reproduce verbatim stays a string.
 */
function plain(text: string): string | number {
    return /^(0|[1-9]\d{0,14})$/.test(text) ? parseInt(text, 10) : text;
}

function parseBpm(value: string | null | undefined): number | undefined {
    if (value === null || value === undefined || value.trim() === '') return undefined;
    const trimmed = value.trim();
    if (!/^\d+$/.test(trimmed)) {
        throw new FormatError('invalid bpm', value);
    }
    return parseInt(trimmed, 10);
}
