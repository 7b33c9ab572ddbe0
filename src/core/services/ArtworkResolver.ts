import { access, readFile, writeFile } from "fs/promises";
import mime from "mime-types";
import path from "path";
import type { ArtworkFetcher } from "../interfaces/ArtworkFetcher";
import type { PictureFrame } from "../models/Frame";
import { FormatError, IOError, UnsupportedFormatError } from "../utils/Errors";
import { Logger } from "../utils/Logger";

/**
 * TXXX description of the frame remembering where embedded artwork came from.
 */
export const ARTWORK_SOURCE_DESCRIPTION = 'CHAPTAG_SOURCE';

/**
 * Image types accepted as artwork.
 */
const SUPPORTED_IMAGE_TYPES = new Set(['image/jpeg', 'image/png', 'image/gif', 'image/bmp', 'image/webp']);

export type ArtworkSourceKind = 'dataUri' | 'url' | 'file';

export interface ResolvedArtwork {
    data: Uint8Array;
    mimeType: string;

    /** The artwork value the bytes were resolved from */
    source: string;
    kind: ArtworkSourceKind;
}

export function classifyArtwork(artwork: string): ArtworkSourceKind {
    if (artwork.startsWith('data:')) return 'dataUri';
    if (artwork.startsWith('http://') || artwork.startsWith('https://')) return 'url';
    return 'file';
}

/**
 * Case-insensitive; undefined outside the supported image types.
 */
export function mimeTypeFromExtension(extension: string): string | undefined {
    const mimeType = mime.lookup(extension);
    return mimeType && SUPPORTED_IMAGE_TYPES.has(mimeType) ? mimeType : undefined;
}

export function extensionFromMimeType(mimeType: string): string | undefined {
    if (!SUPPORTED_IMAGE_TYPES.has(mimeType)) return undefined;
    const extension = mime.extension(mimeType);
    return extension ? `.${extension}` : undefined;
}

export function toDataUri(mimeType: string, data: Uint8Array): string {
    return `data:${mimeType};base64,${Buffer.from(data).toString('base64')}`;
}

/**
 * Decodes `data:<mime>;base64,<payload>`. Other encodings are rejected.
 */
export function parseDataUri(dataUri: string): { data: Uint8Array; mimeType: string } {
    const comma = dataUri.indexOf(',');
    if (comma === -1 || !dataUri.startsWith('data:')) {
        throw new FormatError('invalid data URI format', truncate(dataUri));
    }

    const header = dataUri.slice('data:'.length, comma);
    const [mimeType, encoding] = header.split(';');
    if (encoding !== 'base64') {
        throw new FormatError('only base64 data URIs are supported', truncate(dataUri));
    }

    const payload = dataUri.slice(comma + 1);
    if (!/^[A-Za-z0-9+/]*={0,2}$/.test(payload) || payload.length % 4 !== 0) {
        throw new FormatError('invalid base64 data in data URI', truncate(dataUri));
    }
    return { data: new Uint8Array(Buffer.from(payload, 'base64')), mimeType };
}

function truncate(value: string): string {
    return value.length > 64 ? `${value.slice(0, 64)}...` : value;
}

/**
 * Turns an artwork value (data URI, URL or file path) into image bytes.
 */
export class ArtworkResolver {
    constructor(private readonly fetcher: ArtworkFetcher) { }

    public async resolve(artwork: string): Promise<ResolvedArtwork> {
        const kind = classifyArtwork(artwork);
        switch (kind) {
            case 'dataUri':
                return { ...parseDataUri(artwork), source: artwork, kind };
            case 'url':
                return { ...(await this.fromUrl(artwork)), source: artwork, kind };
            case 'file':
                return { ...(await this.fromFile(artwork)), source: artwork, kind };
        }
    }

    private async fromUrl(url: string): Promise<{ data: Uint8Array; mimeType: string }> {
        const { data, contentType } = await this.fetcher.get(url);

        // "image/png; charset=binary" -> "image/png"
        const headerMime = contentType?.split(';')[0].trim();
        const mimeType = headerMime || mimeTypeFromExtension(path.extname(new URL(url).pathname));
        if (!mimeType) {
            throw new UnsupportedFormatError('unable to determine MIME type', url);
        }
        return { data, mimeType };
    }

    private async fromFile(filePath: string): Promise<{ data: Uint8Array; mimeType: string }> {
        const mimeType = mimeTypeFromExtension(path.extname(filePath));
        if (!mimeType) {
            throw new UnsupportedFormatError('unsupported image format', filePath);
        }

        try {
            return { data: new Uint8Array(await readFile(filePath)), mimeType };
        } catch (error) {
            throw new IOError('failed to read file', filePath, { cause: error });
        }
    }
}

/**
 * Recreates a missing side-car artwork file from the embedded picture.
 * Only local paths are considered; a path without an extension gets one
 * from the picture's MIME type. Does nothing when the file already exists.
 *
 * @returns The path written, or null when nothing was written.
 */
export async function restoreArtworkFile(artwork: string | undefined, picture: PictureFrame | undefined): Promise<string | null> {
    if (!artwork || classifyArtwork(artwork) !== 'file' || !picture || picture.data.length === 0) {
        return null;
    }
    if (await exists(artwork)) {
        return null;
    }

    let target = artwork;
    if (path.extname(target) === '') {
        target += extensionFromMimeType(picture.mimeType) ?? '';
    }

    try {
        await writeFile(target, picture.data);
    } catch (error) {
        throw new IOError('failed to extract artwork to', target, { cause: error });
    }
    Logger.info(`[Artwork] Restored missing artwork file ${target} from embedded picture`);
    return target;
}

async function exists(filePath: string): Promise<boolean> {
    try {
        await access(filePath);
        return true;
    } catch {
        return false;
    }
}
