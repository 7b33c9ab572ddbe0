import type { TagStore } from "../interfaces/TagStore";
import { type ChapterFrame, FRONT_COVER, type Frame, type FrameKind, type FrameOfKind } from "../models/Frame";

/**
 * TagStore over an ordered in-memory frame list.
 * Subclasses decide where the list comes from and where `save()` puts it.
 */
export abstract class FrameListTagStore implements TagStore {
    protected frames: Frame[];

    protected constructor(frames: Frame[] = []) {
        this.frames = [...frames];
    }

    public getFrames<K extends FrameKind>(id: string, kind: K): FrameOfKind<K>[] {
        return this.frames.filter((frame): frame is FrameOfKind<K> => frame.id === id && frame.kind === kind);
    }

    public getTextFrame(id: string): string | undefined {
        const frames = this.getFrames(id, 'text');
        return frames.length > 0 ? frames[frames.length - 1].text : undefined;
    }

    /**
     * Snapshot of every frame in tag order.
     */
    public allFrames(): readonly Frame[] {
        return [...this.frames];
    }

    public addTextFrame(id: string, text: string): void {
        this.frames.push({ kind: 'text', id, text });
    }

    public addUserTextFrame(description: string, value: string): void {
        this.frames.push({ kind: 'userText', id: 'TXXX', description, value });
    }

    public addPictureFrame(mimeType: string, data: Uint8Array): void {
        this.frames.push({ kind: 'picture', id: 'APIC', mimeType, pictureType: FRONT_COVER, description: '', data });
    }

    public addCommentFrame(language: string, text: string): void {
        this.frames.push({ kind: 'comment', id: 'COMM', language, description: '', text });
    }

    public addLyricsFrame(language: string, text: string): void {
        this.frames.push({ kind: 'lyrics', id: 'USLT', language, description: '', text });
    }

    public addChapterFrame(frame: Omit<ChapterFrame, 'kind' | 'id'>): void {
        this.frames.push({ kind: 'chapter', id: 'CHAP', ...frame });
    }

    public deleteFrames(id: string): void {
        this.frames = this.frames.filter(frame => frame.id !== id);
    }

    public abstract save(): Promise<void>;

    public close(): void {
        // nothing is held open between calls
    }
}
