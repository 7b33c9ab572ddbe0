/**
 * Computes the playing time of an audio file.
 */
export interface DurationProvider {
    /**
     * @returns Duration in ms.
     */
    duration(path: string): Promise<number>;
}
