import { describe, it, expect } from 'vitest';
import { createDiff } from './TextDiff';

describe('createDiff', () => {
    it('should label both sides and mark changed lines', () => {
        const diff = createDiff('title: Old\nartist: A\n', 'title: New\nartist: A\n', 'song.mp3');
        const lines = diff.split('\n');

        expect(lines).toContain('--- song.mp3 (current)');
        expect(lines).toContain('+++ song.mp3 (edited)');
        expect(lines).toContain('-title: Old');
        expect(lines).toContain('+title: New');
        expect(lines).toContain(' artist: A');
    });
});
