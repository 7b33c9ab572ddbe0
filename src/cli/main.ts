import { text } from "stream/consumers";
import { loadConfig } from "@/core/config/AppConfig";
import { HttpArtworkFetcher } from "@/core/providers/HttpArtworkFetcher";
import { MusicMetadataDurationProvider } from "@/core/providers/MusicMetadataDurationProvider";
import { NodeId3TagStoreFactory } from "@/core/providers/NodeId3TagStore";
import { describeError } from "@/core/utils/Errors";
import { Logger } from "@/core/utils/Logger";
import { externalEditor } from "./ExternalEditor";
import { createProgram } from "./Program";
import { terminalPrompt } from "./TerminalPrompt";

async function main(argv: string[]): Promise<void> {
    const config = loadConfig();
    Logger.setLevel(config.logLevel);

    const program = createProgram({
        tagStores: new NodeId3TagStoreFactory(),
        durations: new MusicMetadataDurationProvider(),
        fetcher: new HttpArtworkFetcher(config.fetchTimeoutMs),
        confirm: terminalPrompt(),
        editor: externalEditor(config.editor),
        readInput: () => text(process.stdin),
        writeOutput: output => process.stdout.write(output),
    });
    await program.parseAsync(argv);
}

try {
    await main(process.argv);
} catch (error) {
    Logger.error(describeError(error));
    process.exitCode = 1;
}
