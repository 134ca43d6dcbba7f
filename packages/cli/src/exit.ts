/**
 * Centralized exit handling.
 *
 * Commands call `exit()` to stop at the call site. The entry point catches
 * the resulting ExitPendingError and sets `process.exitCode`, so stdout and
 * stderr are flushed and child processes are awaited before Node exits.
 */

/** Valid exit codes for CLI (0 = success, 1 = error) */
export type ExitCode = 0 | 1;

/**
 * Error thrown by exit() to stop execution at the call site.
 */
export class ExitPendingError extends Error {
    public readonly exitCode: ExitCode;

    constructor(code: ExitCode) {
        super('Process exit pending');
        this.name = 'ExitPendingError';
        this.exitCode = code;
    }
}

/**
 * Stop the current command with the given exit code.
 *
 * @throws ExitPendingError - Always throws to stop execution at call site
 */
export function exit(code: ExitCode): never {
    throw new ExitPendingError(code);
}

/**
 * Translate an error that escaped a command into an exit code.
 * Anything other than ExitPendingError is rethrown.
 */
export function exitCodeFor(error: unknown): ExitCode {
    if (error instanceof ExitPendingError) {
        return error.exitCode;
    }
    throw error;
}
