import { describe, it, expect } from 'vitest';
import { ChaptagError } from '../utils/Errors';
import { DEFAULT_FETCH_TIMEOUT_MS, loadConfig } from './AppConfig';

describe('loadConfig', () => {
    it('should fall back to defaults', () => {
        expect(loadConfig({}, 'linux')).toEqual({
            editor: 'vi',
            fetchTimeoutMs: DEFAULT_FETCH_TIMEOUT_MS,
            logLevel: 'info',
        });
        expect(loadConfig({}, 'win32').editor).toBe('notepad');
    });

    it('should pick the editor by precedence, skipping empty values', () => {
        expect(loadConfig({ CHAPTAG_EDITOR: 'code --wait', EDITOR: 'nano', VISUAL: 'vim' }, 'linux').editor).toBe('code --wait');
        expect(loadConfig({ EDITOR: 'nano', VISUAL: 'vim' }, 'linux').editor).toBe('nano');
        expect(loadConfig({ CHAPTAG_EDITOR: '', EDITOR: ' ', VISUAL: 'vim' }, 'linux').editor).toBe('vim');
    });

    it('should read the timeout and log level', () => {
        const config = loadConfig({ CHAPTAG_FETCH_TIMEOUT_MS: '5000', CHAPTAG_LOG_LEVEL: 'debug' }, 'linux');

        expect(config.fetchTimeoutMs).toBe(5000);
        expect(config.logLevel).toBe('debug');
    });

    it('should name the invalid variable', () => {
        expect(() => loadConfig({ CHAPTAG_FETCH_TIMEOUT_MS: 'soon' }, 'linux')).toThrow(/^invalid environment variable CHAPTAG_FETCH_TIMEOUT_MS/);
        expect(() => loadConfig({ CHAPTAG_FETCH_TIMEOUT_MS: '-1' }, 'linux')).toThrow(ChaptagError);
        expect(() => loadConfig({ CHAPTAG_LOG_LEVEL: 'loud' }, 'linux')).toThrow(/CHAPTAG_LOG_LEVEL/);
    });
});
