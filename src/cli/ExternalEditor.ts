import { spawn } from "child_process";
import type { EditorLauncher } from "@/core/interfaces/Confirmation";
import { ChaptagError } from "@/core/utils/Errors";

/**
 * Runs `editor` on a file and waits for it to exit.
 * Commands with arguments (`code --wait`) go through the shell.
 */
export function externalEditor(editor: string, platform: string = process.platform): EditorLauncher {
    return (file) => new Promise<void>((resolve, reject) => {
        const child = /\s/.test(editor)
            ? spawn(`${editor} ${quoteForShell(file, platform)}`, { shell: true, stdio: 'inherit' })
            : spawn(editor, [file], { stdio: 'inherit' });

        child.on('error', error => reject(new ChaptagError(`editor command failed: ${editor}`, { cause: error })));
        child.on('exit', code => {
            if (code === 0) {
                resolve();
            } else {
                reject(new ChaptagError(`editor command failed with exit code ${code}: ${editor}`));
            }
        });
    });
}

/**
 * cmd.exe takes double quotes as-is; POSIX shells get single quotes with
 * embedded quotes closed, escaped and reopened.
 */
export function quoteForShell(file: string, platform: string): string {
    if (platform === 'win32') {
        return `"${file}"`;
    }
    return `'${file.replace(/'/g, `'\\''`)}'`;
}
