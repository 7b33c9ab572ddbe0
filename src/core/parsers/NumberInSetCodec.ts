import type { ValueCodec } from "../interfaces/ValueCodec";
import type { NumberInSet } from "../models/Metadata";
import { unquote } from "./Unquote";

/**
 * Parses `current[/total]` pairs (TRCK, TPOS).
 * Lenient: hand-edited values that do not parse become 0 instead of failing.
 */
export class NumberInSetCodec implements ValueCodec<NumberInSet> {

    public parse(text: string): NumberInSet {
        const value = unquote(text.trim());
        const slash = value.indexOf('/');

        const left = slash === -1 ? value : value.slice(0, slash);
        const right = slash === -1 ? '' : value.slice(slash + 1);

        return {
            current: parseInteger(left),
            total: parseInteger(right)
        };
    }

    public format(value: NumberInSet): string {
        if (value.total === 0) return String(value.current);
        return `${value.current}/${value.total}`;
    }

    public isPresent(value: NumberInSet | undefined): value is NumberInSet {
        return value !== undefined && value.current > 0;
    }
}

function parseInteger(text: string): number {
    const trimmed = text.trim();
    return /^[+-]?\d+$/.test(trimmed) ? parseInt(trimmed, 10) : 0;
}
