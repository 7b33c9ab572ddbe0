import type { TagStore } from "../interfaces/TagStore";
import { IGNORED_OFFSET } from "../models/Frame";
import type { Metadata } from "../models/Metadata";
import { withEndTimes } from "../parsers/ChapterCodec";
import { TimestampCodec } from "../parsers/TimestampCodec";
import { ARTWORK_SOURCE_DESCRIPTION, type ResolvedArtwork } from "./ArtworkResolver";
import { applyTextFrames } from "./FrameMappings";

const DEFAULT_LANGUAGE = 'eng';

/**
 * Inputs resolved before the tag is touched, so that a failing download or
 * duration scan cannot leave a half-written tag.
 */
export interface InjectionContext {
    /** Total audio duration in ms, the end of the last chapter */
    duration: number;

    /** Image bytes for `metadata.artwork`, when set */
    artwork?: ResolvedArtwork;
}

/**
 * Writes a Metadata record into an opened tag. Only mutates the in-memory
 * frames; the caller saves.
 */
export class MetadataInjector {
    private timestamps = new TimestampCodec();

    public inject(store: TagStore, metadata: Metadata, context: InjectionContext): void {
        applyTextFrames(store, metadata);
        this.writeDate(store, metadata);

        store.deleteFrames('COMM');
        if (metadata.comment) {
            store.addCommentFrame(DEFAULT_LANGUAGE, metadata.comment);
        }

        store.deleteFrames('USLT');
        if (metadata.lyrics) {
            store.addLyricsFrame(DEFAULT_LANGUAGE, metadata.lyrics);
        }

        if (context.artwork) {
            this.writeArtwork(store, context.artwork);
        }

        store.deleteFrames('CHAP');
        withEndTimes(metadata.chapters, context.duration).forEach((chapter, i) => {
            store.addChapterFrame({
                elementId: `chp${i}`,
                startTime: chapter.start,
                endTime: chapter.end,
                startOffset: IGNORED_OFFSET,
                endOffset: IGNORED_OFFSET,
                title: chapter.title,
            });
        });
    }

    /**
     * TDRC with full precision plus TYER for ID3v2.3 readers.
     */
    private writeDate(store: TagStore, metadata: Metadata): void {
        store.deleteFrames('TDRC');
        store.deleteFrames('TYER');
        if (!metadata.date) return;

        store.addTextFrame('TYER', this.timestamps.yearOf(metadata.date));
        store.addTextFrame('TDRC', this.timestamps.format(metadata.date));
    }

    /**
     * Replaces the picture and records its source in exactly one TXXX frame.
     * A data URI is its own source, so it leaves no such frame behind.
     * Other TXXX frames keep their order.
     */
    private writeArtwork(store: TagStore, artwork: ResolvedArtwork): void {
        store.deleteFrames('APIC');
        store.addPictureFrame(artwork.mimeType, artwork.data);

        const preserved = store.getFrames('TXXX', 'userText')
            .filter(frame => frame.description !== ARTWORK_SOURCE_DESCRIPTION);
        store.deleteFrames('TXXX');
        for (const frame of preserved) {
            store.addUserTextFrame(frame.description, frame.value);
        }
        if (artwork.kind !== 'dataUri') {
            store.addUserTextFrame(ARTWORK_SOURCE_DESCRIPTION, artwork.source);
        }
    }
}
