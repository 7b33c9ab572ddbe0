import { z } from "zod";
import { ChaptagError } from "../utils/Errors";
import type { LogLevel } from "../utils/Logger";

export const DEFAULT_FETCH_TIMEOUT_MS = 30_000;

export interface AppConfig {
    /** Editor command for `chaptag <file>.mp3` */
    editor: string;

    /** Artwork download timeout */
    fetchTimeoutMs: number;

    logLevel: LogLevel;
}

// Unset and empty variables are treated alike
const OptionalString = z.string().optional().transform(value => (value === undefined || value.trim() === '' ? undefined : value));

const EnvSchema = z.object({
    CHAPTAG_EDITOR: OptionalString,
    EDITOR: OptionalString,
    VISUAL: OptionalString,
    CHAPTAG_FETCH_TIMEOUT_MS: OptionalString.pipe(z.coerce.number().int().positive().optional()),
    CHAPTAG_LOG_LEVEL: OptionalString.pipe(z.enum(['debug', 'info', 'warn', 'error']).optional()),
});

/**
 * Reads the configuration from environment variables.
 * @throws ChaptagError naming the offending variable.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env, platform: string = process.platform): AppConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new ChaptagError(`invalid environment variable ${issue.path.join('.')}: ${issue.message}`);
    }
    const vars = parsed.data;

    return {
        editor: vars.CHAPTAG_EDITOR ?? vars.EDITOR ?? vars.VISUAL ?? (platform === 'win32' ? 'notepad' : 'vi'),
        fetchTimeoutMs: vars.CHAPTAG_FETCH_TIMEOUT_MS ?? DEFAULT_FETCH_TIMEOUT_MS,
        logLevel: vars.CHAPTAG_LOG_LEVEL ?? 'info',
    };
}
