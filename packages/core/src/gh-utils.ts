/**
 * GitHub CLI (`gh`) wrappers.
 *
 * Authentication is owned by `gh` itself; these helpers only query it.
 */

import { z } from 'zod';
import { execCommand } from './exec.js';
import { shellEscape, validatePositiveInteger } from './shell-utils.js';
import { CommandError } from './types.js';
import type { CommandOptions } from './types.js';

/** Default ceiling on repositories fetched per organization */
export const DEFAULT_REPO_LIMIT = 5000;

const repoListSchema = z.array(
    z.object({
        nameWithOwner: z.string(),
    })
);

/**
 * Parse the JSON printed by `gh repo list --json nameWithOwner` into
 * qualified names (`owner/repo`), preserving order. Blank names are dropped.
 *
 * @throws Error if the output is not the expected JSON shape
 */
export function parseRepositoryList(stdout: string): string[] {
    let raw: unknown;
    try {
        raw = JSON.parse(stdout.trim() || '[]');
    } catch {
        throw new Error('Unexpected output from gh repo list: not valid JSON');
    }

    const parsed = repoListSchema.safeParse(raw);
    if (!parsed.success) {
        throw new Error(`Unexpected output from gh repo list: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`);
    }

    return parsed.data
        .map(repo => repo.nameWithOwner.trim())
        .filter(name => name.length > 0);
}

/**
 * Check whether `gh` has a logged-in account.
 * `gh auth status` exits non-zero when it does not.
 */
export async function isGhAuthenticated(options: CommandOptions = {}): Promise<boolean> {
    try {
        await execCommand('gh auth status', options);
        return true;
    } catch (error) {
        if (error instanceof CommandError) {
            return false;
        }
        throw error;
    }
}

/**
 * List the non-archived repositories of an organization (or user).
 *
 * @param org - Organization login
 * @param limit - Maximum number of repositories to request (default: 5000)
 * @returns Qualified names (`owner/repo`) in the order gh returns them
 * @throws {CommandError} If gh fails (unknown org, no permission, network)
 */
export async function listOrgRepositories(
    org: string,
    limit: number = DEFAULT_REPO_LIMIT,
    options: CommandOptions = {}
): Promise<string[]> {
    const safeLimit = validatePositiveInteger(limit, 'limit');
    const { stdout } = await execCommand(
        `gh repo list ${shellEscape(org)} --limit ${safeLimit} --no-archived --json nameWithOwner`,
        options
    );
    return parseRepositoryList(stdout);
}

/**
 * Clone `owner/repo` into the given directory using gh (which picks the
 * user's preferred protocol and sets up the upstream remote for forks).
 * @throws {CommandError} If the clone fails
 */
export async function cloneRepository(
    nameWithOwner: string,
    targetPath: string,
    options: CommandOptions = {}
): Promise<void> {
    await execCommand(`gh repo clone ${shellEscape(nameWithOwner)} ${shellEscape(targetPath)}`, options);
}
