import { openSync } from "fs";
import { createInterface } from "readline/promises";
import { ReadStream } from "tty";
import { Readable } from "stream";
import type { ConfirmationProvider } from "@/core/interfaces/Confirmation";
import { IOError } from "@/core/utils/Errors";

/**
 * Y/n answer; an empty answer takes the default.
 */
export function parseAnswer(answer: string, defaultYes = true): boolean {
    const normalized = answer.trim().toLowerCase();
    if (normalized === '') return defaultYes;
    return normalized === 'y' || normalized === 'yes';
}

/**
 * Shows the diff on stderr and asks on the terminal. When stdin carries the
 * document (`chaptag apply < file.yaml`) the console device is opened instead.
 */
export function terminalPrompt(): ConfirmationProvider {
    return async (diff) => {
        process.stderr.write(`The following changes will be applied:\n${diff}\n`);

        const input = process.stdin.isTTY ? process.stdin : openConsole();
        const rl = createInterface({ input, output: process.stderr });
        try {
            return parseAnswer(await rl.question('Apply these changes? (Y/n) '));
        } finally {
            rl.close();
            if (input !== process.stdin) input.destroy();
        }
    };
}

function openConsole(): Readable {
    const device = process.platform === 'win32' ? 'CON' : '/dev/tty';
    try {
        return new ReadStream(openSync(device, 'r'));
    } catch (error) {
        throw new IOError('failed to open', device, { cause: error });
    }
}
