import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { IGNORED_OFFSET } from '../models/Frame';
import { ARTWORK_SOURCE_DESCRIPTION } from '../services/ArtworkResolver';
import { IOError } from '../utils/Errors';
import { Logger } from '../utils/Logger';
import { NodeId3TagStore, NodeId3TagStoreFactory } from './NodeId3TagStore';

const { read, write } = vi.hoisted(() => ({ read: vi.fn(), write: vi.fn() }));

vi.mock('node-id3', () => ({
    default: { Promise: { read, write } }
}));

function sampleTags() {
    return {
        title: 'Song',
        year: '2024',
        recordingTime: '2024-05-01',
        encodedBy: 'Encoder',
        userDefinedText: [
            { description: ARTWORK_SOURCE_DESCRIPTION, value: 'cover.jpg' },
            { description: 'OTHER', value: 'x' },
        ],
        image: {
            mime: 'image/jpeg',
            type: { id: 3, name: 'front cover' },
            description: '',
            imageBuffer: Buffer.from([1, 2, 3]),
        },
        comment: { language: 'eng', text: 'note' },
        chapter: [
            { elementID: 'ch1', startTimeMs: 0, endTimeMs: 1000, tags: { title: 'Intro' } },
        ],
        raw: { TIT2: 'Song' },
    };
}

describe('NodeId3TagStore', () => {
    let dir: string;
    let file: string;

    beforeEach(async () => {
        read.mockReset();
        write.mockReset();
        vi.spyOn(Logger, 'warn').mockImplementation(() => {});
        dir = await mkdtemp(path.join(os.tmpdir(), 'chaptag-id3-'));
        file = path.join(dir, 'song.mp3');
        await writeFile(file, new Uint8Array([0]));
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await rm(dir, { recursive: true, force: true });
    });

    it('should map node-id3 aliases to frames', async () => {
        read.mockResolvedValue(sampleTags());
        const store = await NodeId3TagStore.open(file);

        expect(store.getTextFrame('TIT2')).toBe('Song');
        expect(store.getTextFrame('TYER')).toBe('2024');
        expect(store.getTextFrame('TDRC')).toBe('2024-05-01');
        expect(store.getFrames('TXXX', 'userText').map(f => f.description)).toEqual([ARTWORK_SOURCE_DESCRIPTION, 'OTHER']);
        expect(store.getFrames('APIC', 'picture')).toEqual([
            { kind: 'picture', id: 'APIC', mimeType: 'image/jpeg', pictureType: 3, description: '', data: new Uint8Array([1, 2, 3]) }
        ]);
        expect(store.getFrames('COMM', 'comment')).toEqual([
            { kind: 'comment', id: 'COMM', language: 'eng', description: '', text: 'note' }
        ]);
        expect(store.getFrames('CHAP', 'chapter')).toEqual([{
            kind: 'chapter', id: 'CHAP', elementId: 'ch1', startTime: 0, endTime: 1000,
            startOffset: IGNORED_OFFSET, endOffset: IGNORED_OFFSET, title: 'Intro'
        }]);
    });

    it('should accept a single user text frame and numeric text', async () => {
        read.mockResolvedValue({ bpm: 120, userDefinedText: { description: 'ONE', value: '1' } });
        const store = await NodeId3TagStore.open(file);

        expect(store.getTextFrame('TBPM')).toBe('120');
        expect(store.getFrames('TXXX', 'userText')).toEqual([
            { kind: 'userText', id: 'TXXX', description: 'ONE', value: '1' }
        ]);
    });

    it('should write modeled frames and carry unmodeled ones over', async () => {
        read.mockResolvedValue(sampleTags());
        write.mockResolvedValue(true);
        const store = await NodeId3TagStore.open(file);

        store.deleteFrames('TIT2');
        store.addTextFrame('TIT2', 'New');
        await store.save();

        expect(write).toHaveBeenCalledTimes(1);
        const [payload, target] = write.mock.calls[0];
        expect(target).toBe(file);
        expect(payload.title).toBe('New');
        expect(payload.year).toBe('2024');
        expect(payload.encodedBy).toBe('Encoder');
        expect(payload.raw).toBeUndefined();
        expect(payload.userDefinedText).toEqual([
            { description: ARTWORK_SOURCE_DESCRIPTION, value: 'cover.jpg' },
            { description: 'OTHER', value: 'x' },
        ]);
        expect(payload.image.mime).toBe('image/jpeg');
        expect(payload.comment).toEqual({ language: 'eng', text: 'note' });
        expect(payload.chapter).toEqual([{
            elementID: 'ch1', startTimeMs: 0, endTimeMs: 1000,
            startOffsetBytes: IGNORED_OFFSET, endOffsetBytes: IGNORED_OFFSET, tags: { title: 'Intro' }
        }]);
        expect(payload.tableOfContents).toEqual([{ elementID: 'toc', isOrdered: true, elements: ['ch1'] }]);
    });

    it('should rebuild the table of contents from the rewritten chapters', async () => {
        read.mockResolvedValue({
            ...sampleTags(),
            tableOfContents: [
                { elementID: 'toc1', isOrdered: false, elements: ['ch1', 'gone'], tags: { title: 'Contents' } },
                { elementID: 'nested', elements: ['gone'] },
            ],
        });
        write.mockResolvedValue(true);
        const store = await NodeId3TagStore.open(file);

        store.deleteFrames('CHAP');
        for (const elementId of ['chp0', 'chp1']) {
            store.addChapterFrame({
                elementId, startTime: 0, endTime: 1000, startOffset: IGNORED_OFFSET, endOffset: IGNORED_OFFSET, title: elementId
            });
        }
        await store.save();

        expect(write.mock.calls[0][0].tableOfContents).toEqual([
            { elementID: 'toc1', isOrdered: true, elements: ['chp0', 'chp1'], tags: { title: 'Contents' } }
        ]);
    });

    it('should drop the table of contents when no chapters remain', async () => {
        read.mockResolvedValue({
            ...sampleTags(),
            tableOfContents: [{ elementID: 'toc1', isOrdered: true, elements: ['ch1'] }],
        });
        write.mockResolvedValue(true);
        const store = await NodeId3TagStore.open(file);

        store.deleteFrames('CHAP');
        await store.save();

        const payload = write.mock.calls[0][0];
        expect(payload.chapter).toBeUndefined();
        expect(payload.tableOfContents).toBeUndefined();
        expect(payload.encodedBy).toBe('Encoder');
    });

    it('should drop text frames node-id3 cannot write', async () => {
        read.mockResolvedValue({});
        write.mockResolvedValue(true);
        const store = await NodeId3TagStore.open(file);

        store.addTextFrame('TXYZ', 'value');
        await store.save();

        expect(write.mock.calls[0][0]).toEqual({});
        expect(Logger.warn).toHaveBeenCalledWith('[ID3] Dropping unsupported text frame TXYZ');
    });

    it('should fail to open a missing file without reading', async () => {
        await expect(new NodeId3TagStoreFactory().open(path.join(dir, 'missing.mp3'))).rejects.toThrow(IOError);
        expect(read).not.toHaveBeenCalled();
    });

    it('should report unreadable tags', async () => {
        read.mockRejectedValue(new Error('boom'));
        await expect(NodeId3TagStore.open(file)).rejects.toThrow(`failed to parse ID3 tag of ${file}`);
    });

    it('should report write failures', async () => {
        read.mockResolvedValue({});
        write.mockRejectedValue(new Error('read-only'));
        const store = await NodeId3TagStore.open(file);

        await expect(store.save()).rejects.toThrow(`failed to save metadata to ${file}`);
    });
});
