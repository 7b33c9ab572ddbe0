/**
 * Granularity at which a Timestamp was written, coarsest first.
 */
export enum Precision {
    Year,
    Month,
    Day,
    Hour,
    Minute,
    Second
}

/**
 * A point in time (always UTC) together with the precision it was given in.
 */
export interface Timestamp {
    time: Date;
    precision: Precision;
}

/**
 * A current/total pair such as a track or disc number.
 * `total` is 0 when unknown.
 */
export interface NumberInSet {
    current: number;
    total: number;
}

/**
 * A chapter marker.
 */
export interface Chapter {
    /** Start offset in ms */
    start: number;

    title: string;
}

/**
 * Everything chaptag reads from and writes to one audio file.
 */
export interface Metadata {
    title?: string;
    subtitle?: string;
    artist?: string;
    album?: string;
    albumArtist?: string;
    grouping?: string;
    date?: Timestamp;
    track?: NumberInSet;
    disc?: NumberInSet;
    genre?: string;
    comment?: string;
    composer?: string;
    publisher?: string;
    copyright?: string;
    language?: string;

    /** Beats per minute; absent rather than 0 */
    bpm?: number;

    /** Ordered by start when read from a file */
    chapters: Chapter[];

    /**
     * File path, http(s) URL or `data:` URI.
     */
    artwork?: string;

    lyrics?: string;
}

/**
 * Free-text fields that can be bound directly to a text frame.
 */
export type TextField =
    | 'title'
    | 'subtitle'
    | 'artist'
    | 'album'
    | 'albumArtist'
    | 'grouping'
    | 'genre'
    | 'composer'
    | 'publisher'
    | 'copyright'
    | 'language';

export function createMetadata(): Metadata {
    return { chapters: [] };
}
