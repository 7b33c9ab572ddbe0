/**
 * Two-way conversion between a metadata value and its text form.
 * Design Pattern: Strategy Pattern (one codec per micro-format).
 */
export interface ValueCodec<T> {
    /**
     * Parses the text form. Surrounding quotes are removed first.
     * @param text Value as written by a user or read from a frame.
     */
    parse(text: string): T;

    /**
     * Renders the canonical text form.
     */
    format(value: T): string;
}
