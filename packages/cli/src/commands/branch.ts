import chalk from 'chalk';
import {
    commitChangesWorkflow,
    createBranch,
    describeError,
    getCurrentBranch,
    rebaseOntoWorkflow,
    runInteractive,
    syncMainBranchWorkflow,
    validateBranchName,
} from '@devflow/core';
import { copyToClipboard } from '../clipboard.js';
import { loadConfig } from '../config.js';
import { exit } from '../exit.js';
import { requireArgument } from '../validation.js';

interface CommitCommandOptions {
    /** False when --no-verify is given */
    verify?: boolean;
}

const printProgress = (_step: string, message: string) => console.log(chalk.dim(message));

/**
 * Print the current branch and copy it to the clipboard.
 */
export async function branchCommand(): Promise<void> {
    const branch = await getCurrentBranch();
    if (!branch) {
        console.error(chalk.red('Error:'), 'Not on a branch or not in a git repository.');
        exit(1);
    }

    console.log(branch);

    try {
        const copiedWith = await copyToClipboard(branch);
        if (copiedWith) {
            console.log(chalk.dim('(copied to clipboard)'));
        } else {
            console.log(chalk.dim('(clipboard command not found)'));
        }
    } catch (error) {
        console.warn(chalk.yellow('Warning:'), `Could not copy to clipboard: ${describeError(error)}`);
    }
}

/**
 * Update the target branch and rebase the current branch onto it.
 */
export async function rebaseCommand(target?: string): Promise<void> {
    const targetBranch = target?.trim() || loadConfig().mainBranch;

    const result = await rebaseOntoWorkflow(targetBranch, { onProgress: printProgress });

    if (!result.success) {
        console.error(chalk.red('Error:'), result.error);
        if (result.restored) {
            console.log(chalk.dim(`Returned to '${result.branch}'.`));
        }
        exit(1);
    }

    if (result.alreadyOnTarget) {
        console.log(chalk.green('✓'), `Already on '${targetBranch}'. Pulled.`);
    } else {
        console.log(chalk.green('✓'), `Rebased '${result.branch}' onto '${targetBranch}'.`);
    }
}

/**
 * Checkout the main branch and pull.
 */
export async function mainCommand(): Promise<void> {
    const mainBranch = loadConfig().mainBranch;
    console.log(chalk.dim(`Switching to ${mainBranch} and pulling latest...`));

    const result = await syncMainBranchWorkflow(mainBranch);
    if (!result.success) {
        console.error(chalk.red('Error:'), result.error);
        exit(1);
    }

    console.log(chalk.green('✓'), `On ${mainBranch} and up to date.`);
}

export async function newBranchCommand(name: string | undefined): Promise<void> {
    requireArgument(name, 'Branch name');
    const branchName = name.trim();

    try {
        validateBranchName(branchName);
    } catch (error) {
        console.error(chalk.red('Error:'), describeError(error));
        exit(1);
    }

    try {
        await createBranch(branchName);
    } catch (error) {
        console.error(chalk.red('Error:'), `Failed to create branch '${branchName}'. It may already exist.`);
        console.error(chalk.dim(describeError(error)));
        exit(1);
    }

    console.log(chalk.green('✓'), `Created and switched to '${branchName}'.`);
}

export async function commitCommand(message: string | undefined, options: CommitCommandOptions = {}): Promise<void> {
    requireArgument(message, 'Commit message');
    const noVerify = options.verify === false;

    if (noVerify) {
        console.warn(chalk.yellow('Warning:'), 'Skipping git hooks (--no-verify).');
    }

    const result = await commitChangesWorkflow(message, { noVerify, onProgress: printProgress });

    if (result.formatWarning) {
        console.warn(chalk.yellow('Warning:'), result.formatWarning);
    }

    if (!result.success) {
        console.error(chalk.red('Error:'), result.error);
        exit(1);
    }

    console.log(chalk.green('✓'), 'Committed.');
}

// =============================================================================
// Pass-through Commands
// =============================================================================

/**
 * Run a tool attached to the terminal; a non-zero exit becomes exit 1.
 */
export async function runPassthrough(command: string, args: readonly string[]): Promise<void> {
    let code: number | null;
    try {
        code = await runInteractive(command, args);
    } catch (error) {
        console.error(chalk.red('Error:'), `Could not run ${command}: ${describeError(error)}`);
        exit(1);
    }

    if (code !== 0) {
        exit(1);
    }
}

export async function statusCommand(): Promise<void> {
    await runPassthrough('git', ['status']);
}

export async function pullCommand(): Promise<void> {
    await runPassthrough('git', ['pull']);
}

export async function pushCommand(): Promise<void> {
    await runPassthrough('git', ['push']);
}

export async function checkCommand(): Promise<void> {
    await runPassthrough('pre-commit', ['run', '-a']);
}
