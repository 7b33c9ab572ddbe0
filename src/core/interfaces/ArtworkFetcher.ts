export interface FetchedArtwork {
    data: Uint8Array;

    /** Raw Content-Type header, when the server sent one */
    contentType?: string;
}

/**
 * Downloads artwork referenced by an http(s) URL.
 */
export interface ArtworkFetcher {
    /**
     * Name of the fetcher (for logs).
     */
    name: string;

    /**
     * @throws NetworkError on timeout, transport failure or a non-2xx status.
     */
    get(url: string): Promise<FetchedArtwork>;
}
