import { createTwoFilesPatch } from "diff";

/**
 * Unified diff between the current and the edited canonical document.
 */
export function createDiff(current: string, edited: string, label: string): string {
    return createTwoFilesPatch(`${label} (current)`, `${label} (edited)`, current, edited, undefined, undefined, { context: 3 });
}
