/**
 * Git utility functions for working with local repositories.
 *
 * All functions accept an optional `options.cwd` parameter to specify
 * the working directory (default: process.cwd()).
 */

import { execCommand } from './exec.js';
import { shellEscape } from './shell-utils.js';
import type { GitOptions } from './types.js';
import { GitError } from './types.js';

export { GitError };

/**
 * Validate that a string can be used as a git branch name.
 * Throws an error describing the first problem found.
 */
export function validateBranchName(branch: string): void {
    if (!branch || branch.trim().length === 0) {
        throw new Error('Branch name cannot be empty');
    }

    // Git branch restrictions: no spaces, no control chars, no ~^:?*[\
    const gitInvalidChars = /[\s~^:?*[\\\x00-\x1f\x7f]/;
    if (gitInvalidChars.test(branch)) {
        throw new Error(`Branch name contains invalid git characters: ${branch}`);
    }

    if (branch.includes('..') || branch.includes('@{')) {
        throw new Error(`Branch name cannot contain '..' or '@{': ${branch}`);
    }

    if (/^[-./]|[./]$|\.lock$/.test(branch)) {
        throw new Error(`Branch name cannot start with '-', '.' or '/', or end with '/', '.' or '.lock': ${branch}`);
    }
}

/**
 * Get the current git branch.
 * Tries `git symbolic-ref` first, then `git branch --show-current`.
 * Returns null when detached or outside a git repository.
 */
export async function getCurrentBranch(options: GitOptions = {}): Promise<string | null> {
    try {
        const { stdout } = await execCommand('git symbolic-ref --short HEAD', options);
        const branch = stdout.trim();
        if (branch) return branch;
    } catch (error) {
        if (!(error instanceof GitError)) throw error;
        // Fall through to the second strategy
    }

    try {
        const { stdout } = await execCommand('git branch --show-current', options);
        return stdout.trim() || null;
    } catch (error) {
        // Exit code 128 means not a git repository
        if (error instanceof GitError && error.exitCode === 128) {
            return null;
        }
        throw error;
    }
}

/**
 * Create and checkout a new branch.
 * @throws {GitError} If the branch cannot be created (e.g., already exists)
 */
export async function createBranch(branchName: string, options: GitOptions = {}): Promise<void> {
    validateBranchName(branchName);
    await execCommand(`git checkout -b ${shellEscape(branchName)}`, options);
}

/**
 * Checkout an existing branch.
 * @throws {GitError} If the branch cannot be checked out (e.g., doesn't exist, uncommitted changes)
 */
export async function checkoutBranch(branchName: string, options: GitOptions = {}): Promise<void> {
    validateBranchName(branchName);
    await execCommand(`git checkout ${shellEscape(branchName)}`, options);
}

/**
 * Pull latest from the upstream of the current branch.
 * @throws {GitError} If the pull fails (e.g., merge conflicts, no remote, network issues)
 */
export async function pullLatest(options: GitOptions = {}): Promise<void> {
    await execCommand('git pull', options);
}

/**
 * Pull with rebase: replay local commits on top of the fetched upstream
 * instead of creating a merge commit.
 * @throws {GitError} If the pull fails (conflicts are left for the user to resolve)
 */
export async function pullRebase(options: GitOptions = {}): Promise<void> {
    await execCommand('git pull --rebase', options);
}

/**
 * Rebase the current branch onto another branch.
 * @throws {GitError} If the rebase stops (usually on conflicts)
 */
export async function rebaseCurrentBranch(onto: string, options: GitOptions = {}): Promise<void> {
    validateBranchName(onto);
    await execCommand(`git rebase ${shellEscape(onto)}`, options);
}

/**
 * Stage all tracked, modified files and commit them.
 * Hooks run unless `noVerify` is set.
 * @throws {GitError} If the commit fails (nothing to commit, hook rejected, etc.)
 */
export async function commitAll(
    message: string,
    options: GitOptions & { noVerify?: boolean } = {}
): Promise<void> {
    if (!message.trim()) {
        throw new Error('Commit message cannot be empty');
    }
    const verifyFlag = options.noVerify ? ' --no-verify' : '';
    await execCommand(`git commit -am ${shellEscape(message)}${verifyFlag}`, { cwd: options.cwd });
}
