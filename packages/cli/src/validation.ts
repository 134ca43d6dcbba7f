/**
 * Argument checks shared by the commands. Each one prints the problem and
 * calls `exit(1)` when the input is unusable.
 */

import chalk from 'chalk';
import { exit } from './exit.js';

function fail(message: string): never {
    console.error(chalk.red('Error:'), message);
    exit(1);
}

/**
 * `devflow new <branch>` and `devflow commit <message>`: a blank argument
 * counts as missing.
 */
export function requireArgument(value: string | undefined, label: string): asserts value is string {
    if (value === undefined || !value.trim()) {
        fail(`${label} is required`);
    }
}

/**
 * `devflow text <mode>`: the mode must be one of `choices`.
 */
export function requireChoice<T extends string>(
    value: string,
    choices: readonly T[],
    label: string
): asserts value is T {
    if (!choices.some(choice => choice === value)) {
        console.error(chalk.red('Error:'), `Invalid value for ${label}: "${value}"`);
        console.log('Valid values:', choices.join(', '));
        exit(1);
    }
}

/**
 * `devflow config -w -u`: at most one of the given flags may be set.
 */
export function rejectCombinedFlags(flags: Record<string, boolean | undefined>): void {
    const set = Object.keys(flags).filter(flag => flags[flag]);
    if (set.length > 1) {
        fail(`Flags ${set.join(' and ')} cannot be used together`);
    }
}

/**
 * `devflow sync-org --limit <n>`: a whole number of at least 1. Returns
 * undefined when the flag was not given.
 */
export function parseCountFlag(value: string | undefined, flag: string): number | undefined {
    if (value === undefined) return undefined;

    const trimmed = value.trim();
    if (!/^\d+$/.test(trimmed)) {
        fail(`${flag} must be a whole number`);
    }

    const count = Number(trimmed);
    if (count < 1) {
        fail(`${flag} must be at least 1`);
    }
    return count;
}
