/**
 * The ID3v2 frames chaptag reads and writes, as an in-memory model.
 * Times are in milliseconds.
 */

/** Picture type "Cover (front)" */
export const FRONT_COVER = 3;

/** Offset value meaning "ignore the byte offset, use the time" */
export const IGNORED_OFFSET = 0xffffffff;

export interface TextFrame {
    kind: 'text';
    id: string;
    text: string;
}

export interface UserTextFrame {
    kind: 'userText';
    id: 'TXXX';
    description: string;
    value: string;
}

export interface PictureFrame {
    kind: 'picture';
    id: 'APIC';
    mimeType: string;
    pictureType: number;
    description: string;
    data: Uint8Array;
}

export interface CommentFrame {
    kind: 'comment';
    id: 'COMM';
    language: string;
    description: string;
    text: string;
}

export interface LyricsFrame {
    kind: 'lyrics';
    id: 'USLT';
    language: string;
    description: string;
    text: string;
}

export interface ChapterFrame {
    kind: 'chapter';
    id: 'CHAP';
    elementId: string;
    startTime: number;
    endTime: number;
    startOffset: number;
    endOffset: number;
    title: string;
}

export type Frame = TextFrame | UserTextFrame | PictureFrame | CommentFrame | LyricsFrame | ChapterFrame;

export type FrameKind = Frame['kind'];

export type FrameOfKind<K extends FrameKind> = Extract<Frame, { kind: K }>;
