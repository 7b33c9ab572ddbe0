import type { ArtworkFetcher, FetchedArtwork } from "../interfaces/ArtworkFetcher";
import { DEFAULT_FETCH_TIMEOUT_MS } from "../config/AppConfig";
import { USER_AGENT } from "../config/Version";
import { NetworkError } from "../utils/Errors";
import { Logger } from "../utils/Logger";

export class HttpArtworkFetcher implements ArtworkFetcher {
    public name = "HTTP";

    constructor(
        private readonly timeoutMs: number = DEFAULT_FETCH_TIMEOUT_MS,
        private readonly userAgent: string = USER_AGENT
    ) { }

    public async get(url: string): Promise<FetchedArtwork> {
        Logger.info(`[${this.name}] Downloading artwork: ${url}`);

        let response: Response;
        try {
            response = await fetch(url, {
                headers: { 'User-Agent': this.userAgent },
                signal: AbortSignal.timeout(this.timeoutMs),
            });
        } catch (error) {
            throw new NetworkError('failed to download image from', url, { cause: error });
        }

        if (!response.ok) {
            throw new NetworkError(`HTTP ${response.status} downloading image from`, url);
        }

        let data: Uint8Array;
        try {
            data = new Uint8Array(await response.arrayBuffer());
        } catch (error) {
            throw new NetworkError('failed to read image data from', url, { cause: error });
        }

        const contentType = response.headers.get('content-type') ?? undefined;
        Logger.debug(`[${this.name}] Received ${data.length} bytes (${contentType ?? 'no content type'})`);
        return { data, contentType };
    }
}
