import type { TagStore } from "../interfaces/TagStore";
import type { Metadata, TextField } from "../models/Metadata";
import { NumberInSetCodec } from "../parsers/NumberInSetCodec";
import { normalizeLanguageCode } from "../utils/LanguageCode";

/**
 * Binds a free-text field to a frame by plain assignment.
 */
export interface GenericMapping {
    kind: 'generic';
    frameId: string;
    field: TextField;
}

/**
 * Binds a field to a frame through explicit converters.
 * `toText` returns "" when nothing should be written.
 */
export interface CustomMapping {
    kind: 'custom';
    frameId: string;
    toText: (metadata: Metadata) => string;
    fromText: (metadata: Metadata, text: string) => void;
}

export type FrameMapping = GenericMapping | CustomMapping;

export interface FrameAccessors {
    toText: (metadata: Metadata) => string;
    fromText: (metadata: Metadata, text: string) => void;
}

const numberInSet = new NumberInSetCodec();

const generic = (frameId: string, field: TextField): GenericMapping => ({ kind: 'generic', frameId, field });

/**
 * Every scalar field stored in a single text frame.
 * Date, comment, lyrics, artwork and chapters have dedicated handling.
 */
const mappings: FrameMapping[] = [
    generic('TIT2', 'title'),
    generic('TIT3', 'subtitle'),
    generic('TPE1', 'artist'),
    generic('TALB', 'album'),
    generic('TPE2', 'albumArtist'),
    generic('TIT1', 'grouping'),
    generic('TCON', 'genre'),
    generic('TCOM', 'composer'),
    generic('TPUB', 'publisher'),
    generic('TCOP', 'copyright'),
    {
        kind: 'custom',
        frameId: 'TLAN',
        toText: m => normalizeLanguageCode(m.language),
        fromText: (m, text) => { m.language = text; },
    },
    {
        kind: 'custom',
        frameId: 'TBPM',
        toText: m => (m.bpm ? String(m.bpm) : ''),
        fromText: (m, text) => {
            const trimmed = text.trim();
            if (/^\d+$/.test(trimmed) && parseInt(trimmed, 10) > 0) {
                m.bpm = parseInt(trimmed, 10);
            }
        },
    },
    {
        kind: 'custom',
        frameId: 'TRCK',
        toText: m => (numberInSet.isPresent(m.track) ? numberInSet.format(m.track) : ''),
        fromText: (m, text) => {
            const track = numberInSet.parse(text);
            if (numberInSet.isPresent(track)) m.track = track;
        },
    },
    {
        kind: 'custom',
        frameId: 'TPOS',
        toText: m => (numberInSet.isPresent(m.disc) ? numberInSet.format(m.disc) : ''),
        fromText: (m, text) => {
            const disc = numberInSet.parse(text);
            if (numberInSet.isPresent(disc)) m.disc = disc;
        },
    },
];

export const FRAME_MAPPINGS: readonly FrameMapping[] = Object.freeze(mappings);

/**
 * The converter pair both pipelines use, whatever the mapping kind.
 */
export function accessorsFor(mapping: FrameMapping): FrameAccessors {
    if (mapping.kind === 'custom') {
        return { toText: mapping.toText, fromText: mapping.fromText };
    }
    const { field } = mapping;
    return {
        toText: m => m[field] ?? '',
        fromText: (m, text) => { m[field] = text; },
    };
}

/**
 * Replaces each mapped frame: existing frames are deleted and a new one is
 * added only for a non-empty value.
 */
export function applyTextFrames(store: TagStore, metadata: Metadata): void {
    for (const mapping of FRAME_MAPPINGS) {
        store.deleteFrames(mapping.frameId);

        const text = accessorsFor(mapping).toText(metadata);
        if (text !== '') {
            store.addTextFrame(mapping.frameId, text);
        }
    }
}

/**
 * Sets each mapped field from the last frame with its id, when non-empty.
 */
export function readTextFrames(store: TagStore, metadata: Metadata): void {
    for (const mapping of FRAME_MAPPINGS) {
        const text = store.getTextFrame(mapping.frameId);
        if (text !== undefined && text !== '') {
            accessorsFor(mapping).fromText(metadata, text);
        }
    }
}
