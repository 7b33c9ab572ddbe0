import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import type { ArtworkFetcher } from "../interfaces/ArtworkFetcher";
import type { ConfirmationProvider, EditorLauncher } from "../interfaces/Confirmation";
import type { DurationProvider } from "../interfaces/DurationProvider";
import type { TagStoreFactory } from "../interfaces/TagStore";
import type { PictureFrame } from "../models/Frame";
import type { Metadata } from "../models/Metadata";
import { MetadataDocument } from "../parsers/MetadataDocument";
import { ChaptagError, IOError } from "../utils/Errors";
import { Logger } from "../utils/Logger";
import { createDiff } from "../utils/TextDiff";
import { ArtworkResolver, restoreArtworkFile } from "./ArtworkResolver";
import { MetadataExtractor } from "./MetadataExtractor";
import { MetadataInjector } from "./MetadataInjector";

export interface EditorDependencies {
    tagStores: TagStoreFactory;
    durations: DurationProvider;
    fetcher: ArtworkFetcher;

    /** Asked before writing unless `yes` is set */
    confirm?: ConfirmationProvider;
}

export interface EditorOptions {
    /** Artwork path or URL that wins over the file's own artwork */
    artwork?: string;
}

export interface ApplyOptions {
    /** Skip the confirmation prompt */
    yes?: boolean;
}

export type ApplyOutcome = 'unchanged' | 'declined' | 'written';

export interface ApplyResult {
    outcome: ApplyOutcome;

    /** Empty when unchanged */
    diff: string;
}

/**
 * Main facade: dump, apply and interactive edit for one audio file.
 *
 * Reads and writes never interleave: the tag is opened, read and closed, and
 * reopened for the single write.
 */
export class MetadataEditor {
    private document = new MetadataDocument();
    private extractor: MetadataExtractor;
    private injector = new MetadataInjector();
    private artworkResolver: ArtworkResolver;

    constructor(
        private readonly audioPath: string,
        private readonly deps: EditorDependencies,
        options: EditorOptions = {}
    ) {
        this.extractor = new MetadataExtractor({ artworkOverride: options.artwork });
        this.artworkResolver = new ArtworkResolver(deps.fetcher);
    }

    /**
     * Extracts the current metadata, then recreates a missing side-car
     * artwork file from the embedded picture, whether the path came from the
     * tag or from an artwork override.
     */
    public async readMetadata(): Promise<Metadata> {
        const store = await this.deps.tagStores.open(this.audioPath);
        let metadata: Metadata;
        let picture: PictureFrame | undefined;
        try {
            metadata = this.extractor.extract(store);
            picture = this.extractor.embeddedPicture(store);
        } finally {
            store.close();
        }

        await restoreArtworkFile(metadata.artwork, picture);
        return metadata;
    }

    public async dump(): Promise<string> {
        return this.document.serialize(await this.readMetadata());
    }

    public async apply(documentText: string, options: ApplyOptions = {}): Promise<ApplyResult> {
        const edited = this.document.parse(documentText);
        const current = await this.readMetadata();

        const currentYaml = this.document.serialize(current);
        const editedYaml = this.document.serialize(edited);
        if (currentYaml === editedYaml) {
            Logger.info('No changes to apply.');
            return { outcome: 'unchanged', diff: '' };
        }

        const diff = createDiff(currentYaml, editedYaml, path.basename(this.audioPath));
        if (!options.yes) {
            if (!this.deps.confirm) {
                throw new ChaptagError('confirmation required but no prompt is available; use --yes');
            }
            if (!(await this.deps.confirm(diff))) {
                Logger.info('Changes not applied.');
                return { outcome: 'declined', diff };
            }
        }

        await this.write(edited);
        Logger.info('Metadata updated successfully.');
        return { outcome: 'written', diff };
    }

    /**
     * Dumps to a temporary file, lets the user edit it and applies the result.
     */
    public async edit(launchEditor: EditorLauncher, options: ApplyOptions = {}): Promise<ApplyResult> {
        const dir = await mkdtemp(path.join(tmpdir(), 'chaptag-'));
        const file = path.join(dir, 'metadata.yaml');
        try {
            await writeFile(file, await this.dump());
            await launchEditor(file);

            let edited: string;
            try {
                edited = await readFile(file, 'utf8');
            } catch (error) {
                throw new IOError('failed to read edited file', file, { cause: error });
            }
            return await this.apply(edited, options);
        } finally {
            await rm(dir, { recursive: true, force: true });
        }
    }

    /**
     * Everything that can fail outside the tag (duration scan, artwork
     * download) happens before the tag is opened for writing.
     */
    private async write(metadata: Metadata): Promise<void> {
        const duration = await this.deps.durations.duration(this.audioPath);
        const artwork = metadata.artwork
            ? await this.artworkResolver.resolve(metadata.artwork)
            : undefined;

        const store = await this.deps.tagStores.open(this.audioPath);
        try {
            this.injector.inject(store, metadata, { duration, artwork });
            await store.save();
        } finally {
            store.close();
        }
    }
}
