import chalk from 'chalk';
import {
    buildTerraformArgs,
    describeError,
    isProtectedEnvironment,
    runTerraform,
    type TerraformAction,
    type TerraformCommand,
} from '@devflow/core';
import { loadConfig } from '../config.js';
import { exit } from '../exit.js';

export interface TerraformBanner {
    text: string;
    /** Printed in red instead of blue */
    danger: boolean;
}

const BANNER_VERBS: Partial<Record<TerraformAction, string>> = {
    init: 'Initializing',
    plan: 'Planning',
    apply: 'Applying',
};

/**
 * Banner announcing which environment a command targets. Commands without
 * an environment get none.
 *
 * @example
 * ```typescript
 * terraformBanner('apply', 'prod', ['prod'])
 * // { text: '*** Applying PROD Environment *** CAUTION! ***', danger: true }
 * ```
 */
export function terraformBanner(
    action: TerraformAction,
    environment: string | undefined,
    protectedEnvironments: readonly string[]
): TerraformBanner | null {
    if (!environment) return null;
    const env = environment.toUpperCase();

    if (action === 'destroy') {
        return { text: `*** DESTROYING ${env} ENVIRONMENT *** ARE YOU SURE? ***`, danger: true };
    }

    const verb = BANNER_VERBS[action];
    if (!verb) return null;

    const isProtected = isProtectedEnvironment(environment, protectedEnvironments);
    if (isProtected && action === 'apply') {
        return { text: `*** Applying ${env} Environment *** CAUTION! ***`, danger: true };
    }
    return { text: `--- ${verb} ${env} Environment ---`, danger: isProtected };
}

function environmentOf(command: TerraformCommand): string | undefined {
    return 'environment' in command ? command.environment : undefined;
}

/**
 * Build, announce and run one terraform command. Terraform's own non-zero
 * exit becomes exit 1.
 */
export async function runTerraformCommand(command: TerraformCommand): Promise<void> {
    const { terraform } = loadConfig();

    let args: string[];
    try {
        args = buildTerraformArgs(command, { environmentsDir: terraform.environmentsDir });
    } catch (error) {
        console.error(chalk.red('Error:'), describeError(error));
        exit(1);
    }

    const banner = terraformBanner(command.action, environmentOf(command), terraform.protectedEnvironments);
    if (banner) {
        const paint = command.action === 'destroy' ? chalk.bold.red : banner.danger ? chalk.red : chalk.blue;
        console.log();
        console.log(paint(banner.text));
        console.log();
    }

    let code: number | null;
    try {
        code = await runTerraform(args);
    } catch (error) {
        console.error(chalk.red('Error:'), `Could not run terraform: ${describeError(error)}`);
        exit(1);
    }

    if (code !== 0) {
        exit(1);
    }
}

// =============================================================================
// Subcommands
// =============================================================================

export async function tfInitCommand(environment: string): Promise<void> {
    await runTerraformCommand({ action: 'init', environment });
}

export async function tfPlanCommand(environment?: string): Promise<void> {
    await runTerraformCommand({ action: 'plan', environment });
}

export async function tfApplyCommand(environment?: string): Promise<void> {
    await runTerraformCommand({ action: 'apply', environment });
}

export async function tfDestroyCommand(environment: string): Promise<void> {
    await runTerraformCommand({ action: 'destroy', environment });
}

export async function tfFmtCommand(): Promise<void> {
    await runTerraformCommand({ action: 'fmt' });
}

export async function tfUnlockCommand(lockId: string | undefined): Promise<void> {
    if (!lockId?.trim()) {
        console.error(chalk.red('Error:'), 'Lock ID is required.');
        console.log('Usage: devflow tf unlock <lockId>');
        console.log(chalk.dim("Hint: Run 'devflow tf plan' or 'devflow tf apply' to see the Lock ID if locked."));
        exit(1);
    }

    console.log(chalk.yellow(`Attempting to force-unlock Lock ID: ${lockId}`));
    await runTerraformCommand({ action: 'unlock', lockId });
}
