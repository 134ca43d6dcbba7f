/**
 * Organization Sync Workflow
 *
 * Clones or updates every non-archived repository of a GitHub organization
 * into a local directory:
 *
 * 1. Checks preconditions (organization given, gh and git installed, gh logged in)
 * 2. Fetches the repository inventory once
 * 3. For each repository, classifies `<targetDir>/<name>` and then
 *    - updates it with `git pull --rebase` if it is a git working copy,
 *    - skips it if the path is taken by anything else,
 *    - clones it with `gh repo clone` if nothing is there.
 *
 * One repository failing never stops the run; the summary reports it and the
 * exit code becomes 1.
 *
 * @example
 * ```typescript
 * const result = await syncOrganization(
 *   { org: 'my-org', targetDir: join(homedir(), 'src', 'my-org') },
 *   createDefaultOrgSyncDependencies(),
 *   event => console.log(event.type),
 * );
 * process.exitCode = result.exitCode;
 * ```
 */

import { lstat, mkdir, stat } from 'fs/promises';
import { join } from 'path';
import { isCommandAvailable } from '../exec.js';
import { DEFAULT_REPO_LIMIT, cloneRepository, isGhAuthenticated, listOrgRepositories } from '../gh-utils.js';
import { pullRebase } from '../git-utils.js';
import { describeError } from '../types.js';
import type {
    LocalRepoState,
    OrgSyncDependencies,
    OrgSyncErrorReason,
    OrgSyncOptions,
    OrgSyncReporter,
    OrgSyncSummary,
    RepoSyncAction,
    RepoSyncOutcome,
    RepoSyncStatus,
} from './types.js';

/** Tools that must be on the PATH before a sync starts */
export const REQUIRED_TOOLS = ['gh', 'git'] as const;

export const DEFAULT_TARGET_DIR_SUFFIX = '_repos';

/**
 * A precondition or setup step failed and the run was aborted.
 */
export class OrgSyncError extends Error {
    readonly reason: OrgSyncErrorReason;

    constructor(reason: OrgSyncErrorReason, message: string) {
        super(message);
        this.name = 'OrgSyncError';
        this.reason = reason;
    }
}

export type OrgSyncResult =
    | {
        ok: true;
        org: string;
        targetDir: string;
        summary: OrgSyncSummary;
        outcomes: RepoSyncOutcome[];
        exitCode: 0 | 1;
    }
    | {
        ok: false;
        error: OrgSyncError;
        exitCode: 1;
    };

// =============================================================================
// Pure Helpers
// =============================================================================

export function emptySummary(): OrgSyncSummary {
    return { total: 0, cloned: 0, updated: 0, skipped: 0, failed: 0 };
}

/**
 * Return a new summary with one more repository counted under `status`.
 */
export function recordOutcome(summary: OrgSyncSummary, status: RepoSyncStatus): OrgSyncSummary {
    return {
        ...summary,
        total: summary.total + 1,
        [status]: summary[status] + 1,
    };
}

/**
 * `my-org` → `./my-org_repos`
 */
export function defaultTargetDir(org: string, suffix: string = DEFAULT_TARGET_DIR_SUFFIX): string {
    return `./${org}${suffix}`;
}

/**
 * Local directory name for `owner/repo`: the segment after the last `/`.
 */
export function localRepoName(nameWithOwner: string): string {
    const trimmed = nameWithOwner.trim().replace(/\/+$/, '');
    return trimmed.slice(trimmed.lastIndexOf('/') + 1);
}

export function actionForState(state: LocalRepoState): RepoSyncAction {
    switch (state) {
        case 'version-controlled':
            return 'update';
        case 'occupied':
            return 'skip';
        case 'absent':
            return 'clone';
    }
}

// =============================================================================
// Default Dependencies
// =============================================================================

function isMissingPathError(error: unknown): boolean {
    return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

/**
 * Classify a path: a `.git` directory inside means a working copy; anything
 * else at the path (file, directory, even a dangling symlink) is occupied.
 */
export async function classifyLocalPath(path: string): Promise<LocalRepoState> {
    try {
        const gitDir = await stat(join(path, '.git'));
        if (gitDir.isDirectory()) {
            return 'version-controlled';
        }
    } catch (error) {
        if (!isMissingPathError(error)) throw error;
    }

    try {
        await lstat(path);
        return 'occupied';
    } catch (error) {
        if (isMissingPathError(error)) return 'absent';
        throw error;
    }
}

/**
 * Dependencies backed by the real `gh`, `git` and filesystem.
 */
export function createDefaultOrgSyncDependencies(): OrgSyncDependencies {
    return {
        hosting: {
            isAuthenticated: () => isGhAuthenticated(),
            listRepositories: (org, limit) => listOrgRepositories(org, limit),
            cloneRepository: (nameWithOwner, targetPath) => cloneRepository(nameWithOwner, targetPath),
        },
        vcs: {
            pullRebase: (repoPath) => pullRebase({ cwd: repoPath }),
        },
        fs: {
            classify: classifyLocalPath,
            ensureDirectory: async (path) => {
                await mkdir(path, { recursive: true });
            },
        },
        tools: {
            isAvailable: isCommandAvailable,
        },
    };
}

// =============================================================================
// Workflow
// =============================================================================

async function checkPreconditions(
    options: OrgSyncOptions,
    deps: OrgSyncDependencies
): Promise<OrgSyncError | null> {
    // Checked first so a missing argument never reaches the network
    if (!options.org.trim()) {
        return new OrgSyncError('usage', 'Organization name is required');
    }

    for (const tool of REQUIRED_TOOLS) {
        if (!(await deps.tools.isAvailable(tool))) {
            return new OrgSyncError('missing-tool', `Required tool '${tool}' not found on PATH`);
        }
    }

    if (!(await deps.hosting.isAuthenticated())) {
        return new OrgSyncError('not-authenticated', "Not logged into GitHub CLI. Run 'gh auth login'.");
    }

    return null;
}

async function syncRepository(
    nameWithOwner: string,
    targetDir: string,
    deps: OrgSyncDependencies,
    report: OrgSyncReporter
): Promise<RepoSyncOutcome> {
    const name = localRepoName(nameWithOwner);
    const path = join(targetDir, name);
    const base = { nameWithOwner, name, path };

    let state: LocalRepoState;
    try {
        state = await deps.fs.classify(path);
    } catch (error) {
        // Unreadable path: count it as a failure rather than guess
        return { ...base, status: 'failed', error: describeError(error) };
    }

    const action = actionForState(state);
    report({ type: 'repository-start', ...base, state, action });

    switch (action) {
        case 'skip':
            return { ...base, state, status: 'skipped' };
        case 'update':
            try {
                await deps.vcs.pullRebase(path);
                return { ...base, state, status: 'updated' };
            } catch (error) {
                return { ...base, state, status: 'failed', error: describeError(error) };
            }
        case 'clone':
            try {
                await deps.hosting.cloneRepository(nameWithOwner, path);
                return { ...base, state, status: 'cloned' };
            } catch (error) {
                return { ...base, state, status: 'failed', error: describeError(error) };
            }
    }
}

/**
 * Clone or update all non-archived repositories of an organization.
 *
 * Never throws for expected failures: aborted runs come back as
 * `{ ok: false, error }`, per-repository failures are counted in the summary.
 */
export async function syncOrganization(
    options: OrgSyncOptions,
    deps: OrgSyncDependencies,
    reporter?: OrgSyncReporter
): Promise<OrgSyncResult> {
    const report: OrgSyncReporter = reporter ?? (() => {});
    const org = options.org.trim();
    const limit = options.limit ?? DEFAULT_REPO_LIMIT;

    const preconditionError = await checkPreconditions(options, deps);
    if (preconditionError) {
        return { ok: false, error: preconditionError, exitCode: 1 };
    }

    const targetDir = options.targetDir?.trim() || defaultTargetDir(org);

    report({ type: 'inventory-fetching', org, limit });
    let inventory: string[];
    try {
        const listed = await deps.hosting.listRepositories(org, limit);
        inventory = listed.map(entry => entry.trim()).filter(entry => entry.length > 0);
    } catch (error) {
        return {
            ok: false,
            error: new OrgSyncError(
                'inventory-fetch',
                `Failed to fetch repository list for '${org}'. Check the organization name and your permissions. (${describeError(error)})`
            ),
            exitCode: 1,
        };
    }

    report({ type: 'inventory-fetched', org, count: inventory.length, targetDir });

    if (inventory.length === 0) {
        const summary = emptySummary();
        report({ type: 'summary', summary });
        return { ok: true, org, targetDir, summary, outcomes: [], exitCode: 0 };
    }

    try {
        await deps.fs.ensureDirectory(targetDir);
    } catch (error) {
        return {
            ok: false,
            error: new OrgSyncError(
                'target-directory',
                `Failed to create target directory '${targetDir}': ${describeError(error)}`
            ),
            exitCode: 1,
        };
    }

    let summary = emptySummary();
    const outcomes: RepoSyncOutcome[] = [];

    // Strictly sequential: one clone/pull at a time, in inventory order
    for (const nameWithOwner of inventory) {
        const outcome = await syncRepository(nameWithOwner, targetDir, deps, report);
        outcomes.push(outcome);
        summary = recordOutcome(summary, outcome.status);
        report({ type: 'repository-done', outcome });
    }

    report({ type: 'summary', summary });

    return {
        ok: true,
        org,
        targetDir,
        summary,
        outcomes,
        exitCode: summary.failed > 0 ? 1 : 0,
    };
}
