/**
 * Copy text to the system clipboard using whichever clipboard tool is
 * installed (pbcopy on macOS, xclip or xsel on X11).
 */

import { spawn } from 'child_process';
import { isCommandAvailable } from '@devflow/core';

export interface ClipboardCommand {
    command: string;
    args: readonly string[];
}

/** Tried in order; the first one on the PATH wins */
export const CLIPBOARD_COMMANDS: readonly ClipboardCommand[] = [
    { command: 'pbcopy', args: [] },
    { command: 'xclip', args: ['-selection', 'clipboard'] },
    { command: 'xsel', args: ['--clipboard', '--input'] },
];

export async function findClipboardCommand(): Promise<ClipboardCommand | null> {
    for (const candidate of CLIPBOARD_COMMANDS) {
        if (await isCommandAvailable(candidate.command)) {
            return candidate;
        }
    }
    return null;
}

/**
 * Pipe `text` into the clipboard command's stdin.
 */
export function writeToClipboard(clipboard: ClipboardCommand, text: string): Promise<void> {
    return new Promise((resolve, reject) => {
        const child = spawn(clipboard.command, [...clipboard.args], {
            stdio: ['pipe', 'ignore', 'ignore'],
        });
        child.on('error', reject);
        // EPIPE when the tool exits before reading, e.g. xclip without a DISPLAY
        child.stdin.on('error', reject);
        child.on('close', (code) => {
            if (code === 0) {
                resolve();
            } else {
                reject(new Error(`${clipboard.command} exited with code ${code}`));
            }
        });
        child.stdin.end(text);
    });
}

/**
 * Copy text to the clipboard.
 *
 * @returns The command used, or null when no clipboard tool is installed
 */
export async function copyToClipboard(text: string): Promise<string | null> {
    const clipboard = await findClipboardCommand();
    if (!clipboard) {
        return null;
    }
    await writeToClipboard(clipboard, text);
    return clipboard.command;
}
