/**
 * Shared types and error classes for @devflow/core.
 */

// =============================================================================
// Command Execution
// =============================================================================

/**
 * Options accepted by every helper that runs an external tool.
 */
export interface GitOptions {
    /** Working directory for the command (default: process.cwd()) */
    cwd?: string;
}

export type CommandOptions = GitOptions;

export interface CommandOutput {
    stdout: string;
    stderr: string;
}

interface CommandErrorDetails {
    message: string;
    command: string;
    stderr: string;
    exitCode: number | null;
    cwd: string;
}

/**
 * An external command exited unsuccessfully (or could not be started).
 * Carries enough context to explain the failure to the user.
 */
export class CommandError extends Error {
    readonly command: string;
    readonly stderr: string;
    /** Process exit code, or null if the process was killed by a signal */
    readonly exitCode: number | null;
    readonly cwd: string;

    constructor(details: CommandErrorDetails) {
        super(details.message);
        this.name = 'CommandError';
        this.command = details.command;
        this.stderr = details.stderr;
        this.exitCode = details.exitCode;
        this.cwd = details.cwd;
    }

    toDetailedString(): string {
        const lines = [
            `${this.name}: ${this.message}`,
            `  Command: ${this.command}`,
            `  CWD: ${this.cwd}`,
            `  Exit code: ${this.exitCode ?? 'none (killed)'}`,
        ];
        if (this.stderr) {
            lines.push(`  Stderr: ${this.stderr.trim()}`);
        }
        return lines.join('\n');
    }
}

/**
 * A git command failed.
 */
export class GitError extends CommandError {
    constructor(details: CommandErrorDetails) {
        super(details);
        this.name = 'GitError';
    }
}

/**
 * Best available one-line description of a failure, preferring the tool's
 * own stderr over the generic "Command failed" message.
 */
export function describeError(error: unknown): string {
    if (error instanceof CommandError && error.stderr.trim()) {
        return error.stderr.trim().split('\n').pop() ?? error.message;
    }
    return error instanceof Error ? error.message : String(error);
}
