import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EventEmitter } from 'events';
import { externalEditor, quoteForShell } from './ExternalEditor';

const { spawn } = vi.hoisted(() => ({ spawn: vi.fn() }));

vi.mock('child_process', () => ({ spawn }));

describe('externalEditor', () => {
    let child: EventEmitter;

    beforeEach(() => {
        child = new EventEmitter();
        spawn.mockReset();
        spawn.mockReturnValue(child);
    });

    it('should run a bare command directly', async () => {
        const done = externalEditor('vim', 'linux')('/tmp/metadata.yaml');
        child.emit('exit', 0);
        await done;

        expect(spawn).toHaveBeenCalledWith('vim', ['/tmp/metadata.yaml'], { stdio: 'inherit' });
    });

    it('should run a command with arguments through the shell', async () => {
        const done = externalEditor('code --wait', 'linux')('/tmp/metadata.yaml');
        child.emit('exit', 0);
        await done;

        expect(spawn).toHaveBeenCalledWith("code --wait '/tmp/metadata.yaml'", { shell: true, stdio: 'inherit' });
    });

    it('should fail on a non-zero exit code', async () => {
        const done = externalEditor('vim', 'linux')('/tmp/metadata.yaml');
        child.emit('exit', 2);

        await expect(done).rejects.toThrow('editor command failed with exit code 2: vim');
    });

    it('should fail when the editor cannot be started', async () => {
        const done = externalEditor('nope', 'linux')('/tmp/metadata.yaml');
        child.emit('error', new Error('spawn nope ENOENT'));

        await expect(done).rejects.toThrow('editor command failed: nope');
    });
});

describe('quoteForShell', () => {
    it('should single-quote on POSIX', () => {
        expect(quoteForShell('/tmp/a b.yaml', 'linux')).toBe("'/tmp/a b.yaml'");
    });

    it('should escape embedded single quotes', () => {
        expect(quoteForShell("/tmp/it's.yaml", 'linux')).toBe("'/tmp/it'\\''s.yaml'");
    });

    it('should double-quote on Windows', () => {
        expect(quoteForShell('C:\\Temp\\a b.yaml', 'win32')).toBe('"C:\\Temp\\a b.yaml"');
    });
});
