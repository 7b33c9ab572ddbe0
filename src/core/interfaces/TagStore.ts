import type { ChapterFrame, FrameKind, FrameOfKind } from "../models/Frame";

/**
 * An opened ID3v2 tag. Mutations stay in memory until `save()`.
 */
export interface TagStore {
    /**
     * All frames with the given id and kind, in tag order.
     */
    getFrames<K extends FrameKind>(id: string, kind: K): FrameOfKind<K>[];

    /**
     * Text of the last text frame with the given id.
     */
    getTextFrame(id: string): string | undefined;

    addTextFrame(id: string, text: string): void;
    addUserTextFrame(description: string, value: string): void;
    addPictureFrame(mimeType: string, data: Uint8Array): void;
    addCommentFrame(language: string, text: string): void;
    addLyricsFrame(language: string, text: string): void;
    addChapterFrame(frame: Omit<ChapterFrame, 'kind' | 'id'>): void;

    /**
     * Removes every frame with the given id.
     */
    deleteFrames(id: string): void;

    save(): Promise<void>;
    close(): void;
}

/**
 * Opens the tag of an audio file.
 */
export interface TagStoreFactory {
    /**
     * @throws IOError when the file cannot be opened or its tag cannot be parsed.
     */
    open(path: string): Promise<TagStore>;
}
