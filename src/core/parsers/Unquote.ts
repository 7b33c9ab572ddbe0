/**
 * Removes one level of quoting: `'x'` loses its quotes as-is, `"x"` is
 * unescaped like a JSON string. Anything else comes back untouched.
 */
export function unquote(value: string): string {
    if (value.length <= 1) return value;

    if (value.startsWith("'") && value.endsWith("'")) {
        return value.slice(1, -1);
    }
    if (value.startsWith('"')) {
        try {
            const parsed: unknown = JSON.parse(value);
            return typeof parsed === 'string' ? parsed : value;
        } catch {
            return value;
        }
    }
    return value;
}
