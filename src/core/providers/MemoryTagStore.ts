import type { TagStore, TagStoreFactory } from "../interfaces/TagStore";
import type { Frame } from "../models/Frame";
import { IOError } from "../utils/Errors";
import { FrameListTagStore } from "./FrameListTagStore";

/**
 * A tag store whose "file" is a frame list held by its factory.
 */
export class MemoryTagStore extends FrameListTagStore {
    constructor(frames: Frame[], private readonly onSave: (frames: Frame[]) => void) {
        super(frames);
    }

    public async save(): Promise<void> {
        this.onSave([...this.frames]);
    }
}

/**
 * In-process stand-in for tagged audio files, keyed by path.
 * Counts opens and saves so callers can check that nothing was written.
 */
export class MemoryTagStoreFactory implements TagStoreFactory {
    private files = new Map<string, Frame[]>();
    public opens = 0;
    public saves = 0;

    /**
     * Creates (or replaces) a file holding the given frames.
     */
    public setFrames(path: string, frames: Frame[]): void {
        this.files.set(path, [...frames]);
    }

    public getFrames(path: string): Frame[] {
        return [...(this.files.get(path) ?? [])];
    }

    public async open(path: string): Promise<TagStore> {
        const frames = this.files.get(path);
        if (!frames) {
            throw new IOError('failed to open file', path);
        }
        this.opens++;
        return new MemoryTagStore(frames, saved => {
            this.saves++;
            this.files.set(path, saved);
        });
    }
}
