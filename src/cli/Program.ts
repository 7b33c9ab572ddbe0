import { Command } from "commander";
import { VERSION } from "@/core/config/Version";
import type { ArtworkFetcher } from "@/core/interfaces/ArtworkFetcher";
import type { ConfirmationProvider, EditorLauncher } from "@/core/interfaces/Confirmation";
import type { DurationProvider } from "@/core/interfaces/DurationProvider";
import type { TagStoreFactory } from "@/core/interfaces/TagStore";
import { MetadataEditor } from "@/core/services/MetadataEditor";
import { ChaptagError } from "@/core/utils/Errors";

export interface CliDependencies {
    tagStores: TagStoreFactory;
    durations: DurationProvider;
    fetcher: ArtworkFetcher;
    confirm: ConfirmationProvider;
    editor: EditorLauncher;
    readInput: () => Promise<string>;
    writeOutput: (text: string) => void;
}

interface RootOptions {
    yes?: boolean;
    artwork?: string;
}

function requireMp3(file: string): string {
    if (!file.toLowerCase().endsWith('.mp3')) {
        throw new ChaptagError(`unknown file type "${file}"`);
    }
    return file;
}

/**
 * chaptag <file.mp3> | dump <file.mp3> | apply <file.mp3>
 */
export function createProgram(deps: CliDependencies): Command {
    const program = new Command();

    const editorFor = (file: string, options: RootOptions) => new MetadataEditor(requireMp3(file), {
        tagStores: deps.tagStores,
        durations: deps.durations,
        fetcher: deps.fetcher,
        confirm: deps.confirm,
    }, { artwork: options.artwork });

    program
        .name('chaptag')
        .description('Edit MP3 tags, chapters and artwork as YAML')
        .version(VERSION)
        .argument('[file]', 'MP3 file to edit in $EDITOR')
        .option('-y, --yes', 'skip confirmation prompts')
        .option('--artwork <pathOrUrl>', "path or URL for artwork (extracted from the MP3 if the file doesn't exist)")
        .action(async (file: string | undefined, options: RootOptions) => {
            if (!file) {
                program.help({ error: true });
                return;
            }
            await editorFor(file, options).edit(deps.editor, { yes: options.yes });
        });

    program
        .command('dump')
        .description('print the metadata of an MP3 file as YAML')
        .argument('<file>', 'MP3 file')
        .action(async (file: string) => {
            deps.writeOutput(await editorFor(file, program.opts<RootOptions>()).dump());
        });

    program
        .command('apply')
        .description('apply YAML read from stdin to an MP3 file')
        .argument('<file>', 'MP3 file')
        .option('-y, --yes', 'skip confirmation prompts')
        .action(async (file: string, options: RootOptions) => {
            const root = program.opts<RootOptions>();
            const editor = editorFor(file, root);
            await editor.apply(await deps.readInput(), { yes: options.yes || root.yes });
        });

    return program;
}
