import { describe, it, expect, vi, afterEach } from 'vitest';
import type { Frame } from '../models/Frame';
import { Precision } from '../models/Metadata';
import { TimestampCodec } from '../parsers/TimestampCodec';
import { MemoryTagStore } from '../providers/MemoryTagStore';
import { Logger } from '../utils/Logger';
import { ARTWORK_SOURCE_DESCRIPTION } from './ArtworkResolver';
import { MetadataExtractor } from './MetadataExtractor';

const picture: Frame = {
    kind: 'picture', id: 'APIC', mimeType: 'image/png', pictureType: 3, description: '', data: new Uint8Array([1, 2, 3])
};

function store(frames: Frame[]): MemoryTagStore {
    return new MemoryTagStore(frames, () => {});
}

function text(id: string, value: string): Frame {
    return { kind: 'text', id, text: value };
}

function chapter(start: number, title: string): Frame {
    return {
        kind: 'chapter', id: 'CHAP', elementId: `c${start}`, startTime: start, endTime: start + 1000,
        startOffset: 0, endOffset: 0, title
    };
}

describe('MetadataExtractor', () => {
    const timestamps = new TimestampCodec();

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should return empty metadata for an empty tag', () => {
        expect(new MetadataExtractor().extract(store([]))).toEqual({ chapters: [] });
    });

    describe('date', () => {
        it('should prefer TDRC', () => {
            const metadata = new MetadataExtractor().extract(store([
                text('TYER', '1999'), text('TDRC', '2024-05-01T10:20')
            ]));

            expect(metadata.date?.precision).toBe(Precision.Minute);
            expect(timestamps.format(metadata.date)).toBe('2024-05-01T10:20');
        });

        it('should fall back to TYER as a year', () => {
            const metadata = new MetadataExtractor().extract(store([text('TYER', '2024')]));

            expect(metadata.date?.precision).toBe(Precision.Year);
            expect(timestamps.format(metadata.date)).toBe('2024');
        });

        it('should fall back to TYER when TDRC is empty or unparsable', () => {
            vi.spyOn(Logger, 'warn').mockImplementation(() => {});

            const empty = new MetadataExtractor().extract(store([text('TDRC', ' '), text('TYER', '2001')]));
            const garbage = new MetadataExtractor().extract(store([text('TDRC', 'garbage'), text('TYER', '2002')]));

            expect(timestamps.format(empty.date)).toBe('2001');
            expect(timestamps.format(garbage.date)).toBe('2002');
        });

        it('should leave the date absent when neither frame parses', () => {
            const warn = vi.spyOn(Logger, 'warn').mockImplementation(() => {});

            const metadata = new MetadataExtractor().extract(store([text('TYER', 'soon')]));

            expect(metadata.date).toBeUndefined();
            expect(warn).toHaveBeenCalledWith('[Extractor] Ignoring unparsable TYER frame', 'invalid timestamp: soon');
        });
    });

    it('should read the first comment and lyrics frames', () => {
        const metadata = new MetadataExtractor().extract(store([
            { kind: 'comment', id: 'COMM', language: 'eng', description: '', text: 'first' },
            { kind: 'comment', id: 'COMM', language: 'ger', description: '', text: 'second' },
            { kind: 'lyrics', id: 'USLT', language: 'eng', description: '', text: 'la la' },
        ]));

        expect(metadata.comment).toBe('first');
        expect(metadata.lyrics).toBe('la la');
    });

    it('should sort chapters stably by start', () => {
        const metadata = new MetadataExtractor().extract(store([
            chapter(5000, 'b'), chapter(0, 'a'), chapter(5000, 'c')
        ]));

        expect(metadata.chapters).toEqual([
            { start: 0, title: 'a' },
            { start: 5000, title: 'b' },
            { start: 5000, title: 'c' },
        ]);
    });

    describe('artwork', () => {
        const source: Frame = { kind: 'userText', id: 'TXXX', description: ARTWORK_SOURCE_DESCRIPTION, value: 'cover.png' };

        it('should report the recorded source of the picture', () => {
            expect(new MetadataExtractor().extract(store([picture, source])).artwork).toBe('cover.png');
        });

        it('should report an untracked picture as a data URI', () => {
            expect(new MetadataExtractor().extract(store([picture])).artwork).toBe('data:image/png;base64,AQID');
        });

        it('should report nothing without a picture', () => {
            expect(new MetadataExtractor().extract(store([source])).artwork).toBeUndefined();
        });

        it('should let the override win', () => {
            const extractor = new MetadataExtractor({ artworkOverride: 'https://example.com/art.jpg' });

            expect(extractor.extract(store([picture, source])).artwork).toBe('https://example.com/art.jpg');
            expect(extractor.extract(store([])).artwork).toBe('https://example.com/art.jpg');
        });

        it('should skip pictures without data', () => {
            const empty: Frame = { ...picture, data: new Uint8Array() };
            const extractor = new MetadataExtractor();

            expect(extractor.embeddedPicture(store([empty]))).toBeUndefined();
            expect(extractor.embeddedPicture(store([empty, picture]))).toBe(picture);
        });
    });
});
