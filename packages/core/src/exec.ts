/**
 * Process execution helpers shared by the git, gh and terraform wrappers.
 *
 * Commands are passed as complete shell strings. Callers are responsible for
 * quoting user-provided values with shellEscape() from shell-utils.
 */

import { exec, spawn } from 'child_process';
import { promisify } from 'util';
import { CommandError, GitError } from './types.js';
import type { CommandOptions, CommandOutput } from './types.js';
import { shellEscape } from './shell-utils.js';

const execAsync = promisify(exec);

/**
 * Error type from child_process.exec with additional properties
 */
interface ExecError extends Error {
    code?: number | string;
    stderr?: string;
    stdout?: string;
}

/** Large enough for `gh repo list --limit 5000` output */
const MAX_BUFFER = 64 * 1024 * 1024;

/**
 * Execute a command and capture its output.
 * Throws CommandError (GitError for git commands) with full context on failure.
 */
export async function execCommand(
    command: string,
    options: CommandOptions = {}
): Promise<CommandOutput> {
    const cwd = options.cwd || process.cwd();
    try {
        const { stdout, stderr } = await execAsync(command, { cwd, maxBuffer: MAX_BUFFER });
        return { stdout, stderr };
    } catch (error) {
        const execError = error as ExecError;
        const details = {
            message: execError.message || 'Command failed',
            command,
            stderr: execError.stderr || '',
            exitCode: typeof execError.code === 'number' ? execError.code : null,
            cwd,
        };
        throw command.startsWith('git ') ? new GitError(details) : new CommandError(details);
    }
}

/**
 * Run a command attached to the user's terminal (stdin/stdout/stderr inherited),
 * so interactive tools like `terraform apply` can prompt.
 *
 * @returns The process exit code (null when killed by a signal)
 * @throws Error if the process could not be started
 */
export function runInteractive(
    command: string,
    args: readonly string[],
    options: CommandOptions = {}
): Promise<number | null> {
    return new Promise((resolve, reject) => {
        const child = spawn(command, [...args], {
            cwd: options.cwd || process.cwd(),
            stdio: 'inherit',
        });

        child.on('error', reject);
        child.on('exit', (code) => resolve(code));
    });
}

/**
 * Check whether an executable can be found on the PATH.
 */
export async function isCommandAvailable(name: string): Promise<boolean> {
    try {
        await execCommand(`command -v ${shellEscape(name)}`);
        return true;
    } catch (error) {
        // bash exits 1 and dash exits 127 when nothing is found
        if (error instanceof CommandError && (error.exitCode === 1 || error.exitCode === 127)) {
            return false;
        }
        throw error;
    }
}
