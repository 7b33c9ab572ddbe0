import type { ValueCodec } from "../interfaces/ValueCodec";
import type { Chapter } from "../models/Metadata";
import { FormatError } from "../utils/Errors";
import { unquote } from "./Unquote";

const MS_PER_HOUR = 3_600_000;
const MS_PER_MINUTE = 60_000;
const MS_PER_SECOND = 1_000;

/**
 * A chapter with its synthesized end, ready to become a CHAP frame.
 */
export interface TimedChapter extends Chapter {
    end: number;
}

/**
 * Parses and formats chapter lines `[H:]MM:SS[.mmm] Title`.
 *
 * Examples:
 *   `0:00 Intro`, `1:30.500 Body`, `1:02:30.123 Long Chapter`
 */
export class ChapterCodec implements ValueCodec<Chapter> {

    public format(chapter: Chapter): string {
        const ms = chapter.start;
        const hours = Math.floor(ms / MS_PER_HOUR);
        const minutes = Math.floor((ms % MS_PER_HOUR) / MS_PER_MINUTE);
        const seconds = Math.floor((ms % MS_PER_MINUTE) / MS_PER_SECOND);
        const millis = ms % MS_PER_SECOND;

        let time = hours > 0
            ? `${hours}:${pad2(minutes)}:${pad2(seconds)}`
            : `${minutes}:${pad2(seconds)}`;
        if (millis !== 0) {
            time += '.' + String(millis).padStart(3, '0');
        }
        return `${time} ${chapter.title}`;
    }

    /**
     * @throws FormatError naming the token that did not parse.
     */
    public parse(text: string): Chapter {
        const value = unquote(text.trim());

        const space = value.indexOf(' ');
        if (space === -1) {
            throw new FormatError('invalid chapter format', value);
        }
        const timeToken = value.slice(0, space);
        const title = value.slice(space + 1);

        const colonParts = timeToken.split(':');
        if (colonParts.length < 2 || colonParts.length > 3) {
            throw new FormatError('invalid time format', timeToken);
        }

        let hours = 0;
        if (colonParts.length === 3) {
            hours = parseComponent(colonParts[0], 'hours');
        }
        const minutes = parseComponent(colonParts[colonParts.length - 2], 'minutes');
        const { seconds, millis } = parseSeconds(colonParts[colonParts.length - 1]);

        return {
            start: hours * MS_PER_HOUR + minutes * MS_PER_MINUTE + seconds * MS_PER_SECOND + millis,
            title
        };
    }
}

/**
 * Stable ascending sort by start; equal starts keep their input order.
 */
export function sortChapters(chapters: readonly Chapter[]): Chapter[] {
    return [...chapters].sort((a, b) => a.start - b.start);
}

/**
 * Each chapter ends where the next one starts, the last one at `totalDuration`.
 */
export function withEndTimes(chapters: readonly Chapter[], totalDuration: number): TimedChapter[] {
    return chapters.map((chapter, i) => ({
        ...chapter,
        end: i + 1 < chapters.length ? chapters[i + 1].start : totalDuration
    }));
}

function pad2(value: number): string {
    return String(value).padStart(2, '0');
}

function parseComponent(token: string, name: string): number {
    if (!/^\d+$/.test(token)) {
        throw new FormatError(`invalid ${name}`, token);
    }
    return parseInt(token, 10);
}

/**
 * `SS` or `SS.fff`; the fraction is padded or truncated to milliseconds, never rounded.
 */
function parseSeconds(token: string): { seconds: number; millis: number } {
    const dot = token.indexOf('.');
    if (dot === -1) {
        return { seconds: parseComponent(token, 'seconds'), millis: 0 };
    }

    const seconds = parseComponent(token.slice(0, dot), 'seconds');
    const fraction = token.slice(dot + 1);
    if (fraction.length === 0) {
        return { seconds, millis: 0 };
    }
    if (!/^\d+$/.test(fraction)) {
        throw new FormatError('invalid milliseconds', fraction);
    }
    const millis = parseInt(fraction.padEnd(3, '0').slice(0, 3), 10);
    return { seconds, millis };
}
