import { access } from "fs/promises";
import NodeID3 from "node-id3";
import { z } from "zod";
import type { TagStore, TagStoreFactory } from "../interfaces/TagStore";
import { FRONT_COVER, type Frame, IGNORED_OFFSET } from "../models/Frame";
import { IOError } from "../utils/Errors";
import { Logger } from "../utils/Logger";
import { FrameListTagStore } from "./FrameListTagStore";

/**
 * Text frame ids and the node-id3 alias they are read from and written to.
 */
const TEXT_ALIASES = {
    TIT2: 'title',
    TIT3: 'subtitle',
    TPE1: 'artist',
    TALB: 'album',
    TPE2: 'performerInfo',
    TIT1: 'contentGroup',
    TCON: 'genre',
    TCOM: 'composer',
    TPUB: 'publisher',
    TCOP: 'copyright',
    TLAN: 'language',
    TBPM: 'bpm',
    TRCK: 'trackNumber',
    TPOS: 'partOfSet',
    TYER: 'year',
    TDRC: 'recordingTime',
} as const;

type TextFrameId = keyof typeof TEXT_ALIASES;

type Id3Tags = NodeID3.Tags;

/** node-id3 reads and writes the CHAP byte offsets but does not declare them */
type Id3Chapter = NonNullable<Id3Tags['chapter']>[number] & {
    startOffsetBytes?: number;
    endOffsetBytes?: number;
};

type Id3TableOfContents = NonNullable<Id3Tags['tableOfContents']>[number];

const DEFAULT_TOC_ID = 'toc';

/**
 * Keys rebuilt from the frame list on save; everything else read from the
 * file is written back as it was.
 */
const MODELED_KEYS: readonly (keyof Id3Tags)[] = [
    ...Object.values(TEXT_ALIASES),
    'comment', 'unsynchronisedLyrics', 'image', 'userDefinedText', 'chapter', 'tableOfContents', 'raw',
];

const TextValue = z.union([z.string(), z.number()]).transform(value => String(value));

const LanguageTextSchema = z.object({
    language: z.string().optional(),
    shortText: z.string().optional(),
    text: z.string(),
});

const UserTextSchema = z.object({
    description: z.string(),
    value: z.string(),
});

const ImageSchema = z.object({
    mime: z.string(),
    type: z.object({ id: z.number() }).passthrough().optional(),
    description: z.string().optional(),
    imageBuffer: z.instanceof(Uint8Array),
});

const ChapterSchema = z.object({
    elementID: z.string(),
    startTimeMs: z.number(),
    endTimeMs: z.number(),
    startOffsetBytes: z.number().optional(),
    endOffsetBytes: z.number().optional(),
    tags: z.object({ title: z.string().optional() }).passthrough().optional(),
});

/**
 * The parts of a node-id3 read result the frame model understands.
 */
const Id3TagsSchema = z.object({
    comment: LanguageTextSchema.optional(),
    unsynchronisedLyrics: LanguageTextSchema.optional(),
    image: z.union([ImageSchema, z.string()]).optional(),
    userDefinedText: z.union([UserTextSchema, z.array(UserTextSchema)]).optional(),
    chapter: z.array(ChapterSchema).optional(),
}).passthrough();

function isTextFrameId(id: string): id is TextFrameId {
    return Object.hasOwn(TEXT_ALIASES, id);
}

/**
 * TagStore backed by the node-id3 library.
 *
 * The whole tag is read on open and rewritten on save. Frames node-id3
 * understands but chaptag does not model are carried over untouched.
 */
export class NodeId3TagStore extends FrameListTagStore {
    private constructor(
        private readonly path: string,
        frames: Frame[],
        private readonly original: Id3Tags
    ) {
        super(frames);
    }

    public static async open(path: string): Promise<NodeId3TagStore> {
        try {
            await access(path);
        } catch (error) {
            throw new IOError('failed to open file', path, { cause: error });
        }

        let tags: Id3Tags;
        try {
            tags = await NodeID3.Promise.read(path);
        } catch (error) {
            throw new IOError('failed to parse ID3 tag of', path, { cause: error });
        }

        const parsed = Id3TagsSchema.safeParse(tags);
        if (!parsed.success) {
            throw new IOError('unexpected ID3 tag layout in', path, { cause: parsed.error });
        }
        const frames = toFrames(parsed.data);
        Logger.debug(`[ID3] Read ${frames.length} frames from ${path}`);
        return new NodeId3TagStore(path, frames, tags);
    }

    public async save(): Promise<void> {
        const unmodeled: Id3Tags = { ...this.original };
        for (const key of MODELED_KEYS) {
            delete unmodeled[key];
        }
        const payload: Id3Tags = { ...unmodeled, ...this.toTags() };
        try {
            await NodeID3.Promise.write(payload, this.path);
        } catch (error) {
            throw new IOError('failed to save metadata to', this.path, { cause: error });
        }
        Logger.debug(`[ID3] Wrote ${this.frames.length} frames to ${this.path}`);
    }

    /**
     * Frame list to node-id3 aliases. node-id3 holds a single picture,
     * comment and lyrics frame; the first of each wins.
     */
    private toTags(): Id3Tags {
        const tags: Id3Tags = {};
        const userDefinedText: { description: string; value: string }[] = [];
        const chapter: Id3Chapter[] = [];

        for (const frame of this.frames) {
            switch (frame.kind) {
                case 'text':
                    if (isTextFrameId(frame.id)) {
                        tags[TEXT_ALIASES[frame.id]] = frame.text;
                    } else {
                        Logger.warn(`[ID3] Dropping unsupported text frame ${frame.id}`);
                    }
                    break;
                case 'userText':
                    userDefinedText.push({ description: frame.description, value: frame.value });
                    break;
                case 'picture':
                    tags.image ??= {
                        mime: frame.mimeType,
                        type: { id: frame.pictureType, name: 'front cover' },
                        description: frame.description,
                        imageBuffer: Buffer.from(frame.data),
                    };
                    break;
                case 'comment':
                    tags.comment ??= { language: frame.language, text: frame.text };
                    break;
                case 'lyrics':
                    tags.unsynchronisedLyrics ??= { language: frame.language, text: frame.text };
                    break;
                case 'chapter':
                    chapter.push({
                        elementID: frame.elementId,
                        startTimeMs: frame.startTime,
                        endTimeMs: frame.endTime,
                        startOffsetBytes: frame.startOffset,
                        endOffsetBytes: frame.endOffset,
                        tags: { title: frame.title },
                    });
                    break;
            }
        }

        if (userDefinedText.length > 0) tags.userDefinedText = userDefinedText;
        if (chapter.length > 0) {
            tags.chapter = chapter;
            tags.tableOfContents = [this.tableOfContents(chapter.map(c => c.elementID))];
        }
        return tags;
    }

    /**
     * A single ordered CTOC listing the chapters, reusing the id and
     * sub-frames of the tag's first CTOC when there was one.
     */
    private tableOfContents(elements: string[]): Id3TableOfContents {
        const previous = this.original.tableOfContents?.[0];
        const toc: Id3TableOfContents = {
            elementID: previous?.elementID ?? DEFAULT_TOC_ID,
            isOrdered: true,
            elements,
        };
        if (previous?.tags) toc.tags = previous.tags;
        return toc;
    }
}

function toFrames(tags: z.infer<typeof Id3TagsSchema>): Frame[] {
    const frames: Frame[] = [];

    for (const [id, alias] of Object.entries(TEXT_ALIASES)) {
        const value = TextValue.safeParse(tags[alias]);
        if (value.success) {
            frames.push({ kind: 'text', id, text: value.data });
        }
    }

    const userTexts = tags.userDefinedText === undefined
        ? []
        : Array.isArray(tags.userDefinedText) ? tags.userDefinedText : [tags.userDefinedText];
    for (const userText of userTexts) {
        frames.push({ kind: 'userText', id: 'TXXX', description: userText.description, value: userText.value });
    }

    if (tags.image !== undefined && typeof tags.image !== 'string') {
        frames.push({
            kind: 'picture',
            id: 'APIC',
            mimeType: tags.image.mime,
            pictureType: tags.image.type?.id ?? FRONT_COVER,
            description: tags.image.description ?? '',
            data: new Uint8Array(tags.image.imageBuffer),
        });
    }

    if (tags.comment) {
        frames.push({
            kind: 'comment',
            id: 'COMM',
            language: tags.comment.language ?? 'eng',
            description: tags.comment.shortText ?? '',
            text: tags.comment.text,
        });
    }

    if (tags.unsynchronisedLyrics) {
        frames.push({
            kind: 'lyrics',
            id: 'USLT',
            language: tags.unsynchronisedLyrics.language ?? 'eng',
            description: tags.unsynchronisedLyrics.shortText ?? '',
            text: tags.unsynchronisedLyrics.text,
        });
    }

    for (const chapter of tags.chapter ?? []) {
        frames.push({
            kind: 'chapter',
            id: 'CHAP',
            elementId: chapter.elementID,
            startTime: chapter.startTimeMs,
            endTime: chapter.endTimeMs,
            startOffset: chapter.startOffsetBytes ?? IGNORED_OFFSET,
            endOffset: chapter.endOffsetBytes ?? IGNORED_OFFSET,
            title: chapter.tags?.title ?? '',
        });
    }

    return frames;
}

export class NodeId3TagStoreFactory implements TagStoreFactory {
    public async open(path: string): Promise<TagStore> {
        return NodeId3TagStore.open(path);
    }
}
