/**
 * Asks the user whether the shown diff should be written.
 * Resolves to true to proceed.
 */
export type ConfirmationProvider = (diff: string) => Promise<boolean>;

/**
 * Lets the user edit the file at `path` and resolves once they are done.
 */
export type EditorLauncher = (path: string) => Promise<void>;
