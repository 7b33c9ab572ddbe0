import { parseFile } from 'music-metadata';
import type { DurationProvider } from '../interfaces/DurationProvider';
import { IOError } from '../utils/Errors';
import { Logger } from '../utils/Logger';

/**
 * Duration from a full scan of the MPEG frames (not the header estimate),
 * so the last chapter ends exactly where the audio does.
 */
export class MusicMetadataDurationProvider implements DurationProvider {

    public async duration(path: string): Promise<number> {
        let seconds: number | undefined;
        try {
            const metadata = await parseFile(path, { duration: true, skipCovers: true });
            seconds = metadata.format.duration;
        } catch (error) {
            throw new IOError('failed to get audio duration of', path, { cause: error });
        }

        if (seconds === undefined) {
            throw new IOError('unable to determine audio duration of', path);
        }
        const ms = Math.round(seconds * 1000);
        Logger.debug(`[Duration] ${path}: ${ms}ms`);
        return ms;
    }
}
