import type { TagStore } from "../interfaces/TagStore";
import type { PictureFrame } from "../models/Frame";
import { type Metadata, Precision, type Timestamp, createMetadata } from "../models/Metadata";
import { sortChapters } from "../parsers/ChapterCodec";
import { TimestampCodec } from "../parsers/TimestampCodec";
import { describeError } from "../utils/Errors";
import { Logger } from "../utils/Logger";
import { ARTWORK_SOURCE_DESCRIPTION, toDataUri } from "./ArtworkResolver";
import { readTextFrames } from "./FrameMappings";

export interface ExtractorOptions {
    /**
     * Artwork path or URL reported instead of whatever the file holds.
     */
    artworkOverride?: string;
}

/**
 * Reads a Metadata record out of an opened tag.
 * Missing frames simply leave their field absent.
 */
export class MetadataExtractor {
    private timestamps = new TimestampCodec();

    constructor(private readonly options: ExtractorOptions = {}) { }

    public extract(store: TagStore): Metadata {
        const metadata = createMetadata();

        readTextFrames(store, metadata);

        const date = this.readDate(store);
        if (date) metadata.date = date;

        const comment = store.getFrames('COMM', 'comment')[0]?.text;
        if (comment) metadata.comment = comment;

        const lyrics = store.getFrames('USLT', 'lyrics')[0]?.text;
        if (lyrics) metadata.lyrics = lyrics;

        const artwork = this.readArtwork(store);
        if (artwork) metadata.artwork = artwork;

        metadata.chapters = sortChapters(
            store.getFrames('CHAP', 'chapter').map(frame => ({ start: frame.startTime, title: frame.title }))
        );

        return metadata;
    }

    /**
     * First embedded picture that carries data.
     */
    public embeddedPicture(store: TagStore): PictureFrame | undefined {
        return store.getFrames('APIC', 'picture').find(frame => frame.data.length > 0);
    }

    /**
     * TDRC when present and non-empty, else the year-only TYER.
     */
    private readDate(store: TagStore): Timestamp | undefined {
        const recordingTime = store.getTextFrame('TDRC')?.trim();
        if (recordingTime) {
            try {
                return this.timestamps.parse(recordingTime);
            } catch (error) {
                Logger.warn(`[Extractor] Ignoring unparsable TDRC frame`, describeError(error));
            }
        }

        const year = store.getTextFrame('TYER')?.trim().slice(0, 4);
        if (year) {
            try {
                const timestamp = this.timestamps.parse(year);
                if (timestamp?.precision === Precision.Year) return timestamp;
            } catch (error) {
                Logger.warn(`[Extractor] Ignoring unparsable TYER frame`, describeError(error));
            }
        }
        return undefined;
    }

    /**
     * Override > recorded source of the embedded picture > the picture as a data URI.
     */
    private readArtwork(store: TagStore): string | undefined {
        if (this.options.artworkOverride) {
            return this.options.artworkOverride;
        }

        const picture = this.embeddedPicture(store);
        if (!picture) return undefined;

        const source = store.getFrames('TXXX', 'userText')
            .find(frame => frame.description === ARTWORK_SOURCE_DESCRIPTION)?.value;
        if (source) {
            return source;
        }
        return toDataUri(picture.mimeType, picture.data);
    }
}
