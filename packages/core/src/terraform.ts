/**
 * Terraform helpers.
 *
 * Environments follow the layout `<environmentsDir>/<env>.tfbackend` (backend
 * config for init) and `<environmentsDir>/<env>.tfvars` (variables for
 * plan/apply/destroy). `--auto-approve` is never passed.
 */

import { existsSync, readdirSync, statSync } from 'fs';
import { join } from 'path';
import { execCommand, runInteractive } from './exec.js';
import { validateSafeString } from './shell-utils.js';
import type { CommandOptions } from './types.js';

export const DEFAULT_ENVIRONMENTS_DIR = 'environments';
export const DEFAULT_PROTECTED_ENVIRONMENTS: readonly string[] = ['prod', 'production'];

export type TerraformCommand =
    | { action: 'init'; environment: string }
    | { action: 'plan' | 'apply'; environment?: string }
    | { action: 'destroy'; environment: string }
    | { action: 'fmt' }
    | { action: 'unlock'; lockId: string };

export type TerraformAction = TerraformCommand['action'];

export interface TerraformSettings {
    /** Directory holding `<env>.tfvars` / `<env>.tfbackend` files */
    environmentsDir: string;
}

function environmentFile(settings: TerraformSettings, environment: string, extension: string): string {
    validateSafeString(environment, 'environment');
    return join(settings.environmentsDir, `${environment}.${extension}`);
}

/**
 * Build the argument list passed to the `terraform` binary.
 *
 * @example
 * ```typescript
 * buildTerraformArgs({ action: 'plan', environment: 'dev' }, { environmentsDir: 'environments' })
 * // ['plan', '-var-file=environments/dev.tfvars']
 * ```
 */
export function buildTerraformArgs(command: TerraformCommand, settings: TerraformSettings): string[] {
    switch (command.action) {
        case 'init':
            return ['init', `-backend-config=${environmentFile(settings, command.environment, 'tfbackend')}`];
        case 'plan':
        case 'apply':
            return command.environment
                ? [command.action, `-var-file=${environmentFile(settings, command.environment, 'tfvars')}`]
                : [command.action];
        case 'destroy':
            return ['destroy', `-var-file=${environmentFile(settings, command.environment, 'tfvars')}`];
        case 'fmt':
            return ['fmt', '--recursive'];
        case 'unlock':
            if (!command.lockId.trim()) {
                throw new Error('Lock ID cannot be empty');
            }
            return ['force-unlock', '-force', command.lockId];
    }
}

/**
 * Whether an environment should get the loud production banner.
 */
export function isProtectedEnvironment(
    environment: string | undefined,
    protectedEnvironments: readonly string[] = DEFAULT_PROTECTED_ENVIRONMENTS
): boolean {
    if (!environment) return false;
    const name = environment.toLowerCase();
    return protectedEnvironments.some(candidate => candidate.toLowerCase() === name);
}

/**
 * A directory is a Terraform project if it holds any `*.tf` file or an
 * initialized `.terraform` directory.
 */
export function isTerraformProject(dir: string = process.cwd()): boolean {
    const dotTerraform = join(dir, '.terraform');
    if (existsSync(dotTerraform) && statSync(dotTerraform).isDirectory()) {
        return true;
    }
    return readdirSync(dir, { withFileTypes: true })
        .some(entry => entry.isFile() && entry.name.endsWith('.tf'));
}

/**
 * Run terraform attached to the terminal so it can prompt for approval.
 * Pass the output of buildTerraformArgs().
 * @returns Terraform's exit code (null if it was killed by a signal)
 */
export async function runTerraform(
    args: readonly string[],
    options: CommandOptions = {}
): Promise<number | null> {
    return runInteractive('terraform', args, options);
}

/**
 * Format all Terraform files below the working directory, capturing output.
 * @throws {CommandError} If terraform fmt fails
 */
export async function formatTerraform(options: CommandOptions = {}): Promise<void> {
    await execCommand('terraform fmt --recursive', options);
}
