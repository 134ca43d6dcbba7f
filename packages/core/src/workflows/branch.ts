/**
 * Branch Workflows
 *
 * Multi-step git sequences behind `devflow rebase`, `devflow main` and
 * `devflow commit`. Each step reports progress through `onProgress` and the
 * first failing step is named in the result.
 */

import {
    checkoutBranch,
    commitAll,
    getCurrentBranch,
    pullLatest,
    rebaseCurrentBranch,
} from '../git-utils.js';
import { formatTerraform, isTerraformProject } from '../terraform.js';
import { describeError } from '../types.js';
import type {
    CommitOptions,
    CommitResult,
    RebaseOptions,
    RebaseResult,
    RebaseStep,
    SyncMainResult,
    WorkflowOptions,
} from './types.js';

// =============================================================================
// Rebase Onto
// =============================================================================

/**
 * Bring `target` up to date and rebase the current branch onto it.
 *
 * This workflow:
 * 1. Detects the current branch (fails outside a repo or when detached)
 * 2. If already on `target`, just pulls it
 * 3. Otherwise checks out `target`, pulls, returns to the original branch
 *    and runs `git rebase <target>`
 *
 * When checking out or pulling `target` fails, the original branch is checked
 * out again before returning. A failed rebase is left in progress for the
 * user to `--continue` or `--abort`.
 *
 * @example
 * ```typescript
 * const result = await rebaseOntoWorkflow('main');
 * if (!result.success) {
 *   console.error(`${result.failedStep}: ${result.error}`);
 * }
 * ```
 */
export async function rebaseOntoWorkflow(
    target: string,
    options: RebaseOptions = {}
): Promise<RebaseResult> {
    const gitOptions = { cwd: options.cwd };
    const progress = options.onProgress ?? (() => {});

    const branch = await getCurrentBranch(gitOptions);
    if (!branch) {
        return {
            success: false,
            error: 'Could not determine current branch. Not in a git repository?',
            branch: null,
            target,
            alreadyOnTarget: false,
            failedStep: 'detect-branch',
        };
    }

    if (branch === target) {
        progress('pull', `Already on '${target}'. Pulling...`);
        try {
            await pullLatest(gitOptions);
            return { success: true, branch, target, alreadyOnTarget: true };
        } catch (error) {
            return {
                success: false,
                error: `Failed to pull '${target}': ${describeError(error)}`,
                branch,
                target,
                alreadyOnTarget: true,
                failedStep: 'pull',
            };
        }
    }

    // Fail a step on `target`, going back to the original branch first
    const failOnTarget = async (step: RebaseStep, error: unknown, verb: string): Promise<RebaseResult> => {
        let restored = false;
        try {
            await checkoutBranch(branch, gitOptions);
            restored = true;
        } catch (restoreError) {
            progress('checkout-original', `Could not return to '${branch}': ${describeError(restoreError)}`);
        }
        return {
            success: false,
            error: `Failed to ${verb} '${target}': ${describeError(error)}`,
            branch,
            target,
            alreadyOnTarget: false,
            failedStep: step,
            restored,
        };
    };

    progress('checkout-target', `Checking out '${target}'...`);
    try {
        await checkoutBranch(target, gitOptions);
    } catch (error) {
        return failOnTarget('checkout-target', error, 'checkout');
    }

    progress('pull-target', `Pulling latest changes for '${target}'...`);
    try {
        await pullLatest(gitOptions);
    } catch (error) {
        return failOnTarget('pull-target', error, 'pull');
    }

    progress('checkout-original', `Checking out '${branch}'...`);
    try {
        await checkoutBranch(branch, gitOptions);
    } catch (error) {
        return {
            success: false,
            error: `Failed to checkout back to '${branch}': ${describeError(error)}`,
            branch,
            target,
            alreadyOnTarget: false,
            failedStep: 'checkout-original',
        };
    }

    progress('rebase', `Rebasing '${branch}' onto '${target}'...`);
    try {
        await rebaseCurrentBranch(target, gitOptions);
    } catch {
        return {
            success: false,
            error: "Rebase failed. Please resolve conflicts and run 'git rebase --continue' or 'git rebase --abort'.",
            branch,
            target,
            alreadyOnTarget: false,
            failedStep: 'rebase',
        };
    }

    return { success: true, branch, target, alreadyOnTarget: false };
}

// =============================================================================
// Sync Main
// =============================================================================

/**
 * Checkout the main branch and pull it.
 */
export async function syncMainBranchWorkflow(
    mainBranch: string,
    options: WorkflowOptions = {}
): Promise<SyncMainResult> {
    const gitOptions = { cwd: options.cwd };

    try {
        await checkoutBranch(mainBranch, gitOptions);
    } catch (error) {
        return {
            success: false,
            error: `Failed to checkout ${mainBranch}: ${describeError(error)}`,
            branch: mainBranch,
            failedStep: 'checkout',
        };
    }

    try {
        await pullLatest(gitOptions);
    } catch (error) {
        return {
            success: false,
            error: `Failed to pull ${mainBranch}: ${describeError(error)}`,
            branch: mainBranch,
            failedStep: 'pull',
        };
    }

    return { success: true, branch: mainBranch };
}

// =============================================================================
// Commit
// =============================================================================

/**
 * Commit all tracked changes, formatting Terraform files first when the
 * working directory is a Terraform project. A formatting failure is reported
 * as a warning and the commit still runs.
 */
export async function commitChangesWorkflow(
    message: string,
    options: CommitOptions = {}
): Promise<CommitResult> {
    const progress = options.onProgress ?? (() => {});
    const cwd = options.cwd ?? process.cwd();

    if (!message.trim()) {
        return { success: false, error: 'Commit message is required.', formatted: false };
    }

    let formatted = false;
    let formatWarning: string | undefined;
    if (isTerraformProject(cwd)) {
        progress('format', 'Running terraform fmt recursively...');
        try {
            await formatTerraform({ cwd });
            formatted = true;
        } catch (error) {
            formatWarning = `terraform fmt failed: ${describeError(error)}`;
        }
    }

    progress('commit', `Committing with message: '${message}'`);
    try {
        await commitAll(message, { cwd, noVerify: options.noVerify });
    } catch (error) {
        return {
            success: false,
            error: `Git commit failed: ${describeError(error)}`,
            formatted,
            formatWarning,
        };
    }

    return { success: true, formatted, formatWarning };
}
