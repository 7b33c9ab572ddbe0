import type { ValueCodec } from "../interfaces/ValueCodec";
import { Precision, type Timestamp } from "../models/Metadata";
import { FormatError } from "../utils/Errors";
import { unquote } from "./Unquote";

interface Layout {
    precision: Precision;
    pattern: RegExp;
}

// Finest first: the first layout that matches fixes the precision.
const LAYOUTS: Layout[] = [
    { precision: Precision.Second, pattern: /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})$/ },
    { precision: Precision.Minute, pattern: /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})$/ },
    { precision: Precision.Hour, pattern: /^(\d{4})-(\d{2})-(\d{2})T(\d{2})$/ },
    { precision: Precision.Day, pattern: /^(\d{4})-(\d{2})-(\d{2})$/ },
    { precision: Precision.Month, pattern: /^(\d{4})-(\d{2})$/ },
    { precision: Precision.Year, pattern: /^(\d{4})$/ },
];

/**
 * Parses and formats `YYYY[-MM[-DD[THH[:MM[:SS]]]]]` timestamps.
 * All values are UTC wall-clock; offsets are neither read nor written.
 */
export class TimestampCodec implements ValueCodec<Timestamp | undefined> {

    /**
     * @returns `undefined` for empty input.
     * @throws FormatError when no layout matches.
     */
    public parse(text: string): Timestamp | undefined {
        const value = unquote(text.trim());
        if (value === '') return undefined;

        for (const layout of LAYOUTS) {
            const match = layout.pattern.exec(value);
            if (!match) continue;

            const time = buildUtcDate(match.slice(1).map(part => parseInt(part, 10)));
            if (time) {
                return { time, precision: layout.precision };
            }
        }
        throw new FormatError('invalid timestamp', value);
    }

    public format(timestamp: Timestamp | undefined): string {
        if (!timestamp) return '';

        const t = timestamp.time;
        const components = [
            pad(t.getUTCFullYear(), 4),
            '-' + pad(t.getUTCMonth() + 1, 2),
            '-' + pad(t.getUTCDate(), 2),
            'T' + pad(t.getUTCHours(), 2),
            ':' + pad(t.getUTCMinutes(), 2),
            ':' + pad(t.getUTCSeconds(), 2),
        ];
        return components.slice(0, timestamp.precision + 1).join('');
    }

    /**
     * Four-digit year, as stored in the legacy year frame.
     */
    public yearOf(timestamp: Timestamp): string {
        return pad(timestamp.time.getUTCFullYear(), 4);
    }
}

function pad(value: number, width: number): string {
    return String(value).padStart(width, '0');
}

/**
 * Builds a UTC date from [year, month, day, hour, minute, second], missing
 * trailing parts defaulting to the start of the period. Returns null for
 * calendar-invalid values such as month 13 or February 30.
 */
function buildUtcDate(parts: number[]): Date | null {
    const [year, month = 1, day = 1, hour = 0, minute = 0, second = 0] = parts;

    if (month < 1 || month > 12) return null;
    if (day < 1 || day > daysInMonth(year, month)) return null;
    if (hour > 23 || minute > 59 || second > 59) return null;

    // Date.UTC maps years 0-99 onto 1900-1999, setUTCFullYear does not
    const date = new Date(0);
    date.setUTCFullYear(year, month - 1, day);
    date.setUTCHours(hour, minute, second, 0);
    return date;
}

function daysInMonth(year: number, month: number): number {
    const probe = new Date(0);
    probe.setUTCFullYear(year, month, 0);
    return probe.getUTCDate();
}
