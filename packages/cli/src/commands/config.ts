import chalk from 'chalk';
import {
    CONFIG_KEYS,
    getConfigByPath,
    getConfigPath,
    isKnownConfigPath,
    listConfigWithSources,
    parseValue,
    resolveConfigPaths,
    setConfigByPath,
    type ConfigScope,
    type ConfigSource,
} from '../config.js';
import { exit } from '../exit.js';
import { rejectCombinedFlags } from '../validation.js';

interface ConfigCommandOptions {
    show?: boolean;
    workspace?: boolean;
    user?: boolean;
}

const SOURCE_LABELS: Record<ConfigSource, string> = {
    'default': chalk.dim('(default)'),
    'workspace': chalk.cyan('(workspace)'),
    'user': chalk.green('(user)'),
};

/** Keys whose value is always a list, even when a single item is given */
const LIST_KEYS: readonly string[] = ['terraform.protectedEnvironments'];

function resolveScope(options: ConfigCommandOptions): ConfigScope | undefined {
    if (options.workspace) return 'workspace';
    if (options.user) return 'user';
    return undefined;
}

export function formatConfigValue(value: unknown): string {
    if (value === undefined) return chalk.dim('(not set)');
    if (Array.isArray(value)) return value.length > 0 ? value.join(', ') : chalk.dim('(empty)');
    if (typeof value === 'object' && value !== null) return JSON.stringify(value);
    return String(value);
}

/**
 * Parse a value typed on the command line for `key`.
 */
export function parseConfigInput(key: string, raw: string): unknown {
    const parsed = parseValue(raw);
    if (LIST_KEYS.includes(key) && !Array.isArray(parsed)) {
        return raw.trim() ? [raw.trim()] : [];
    }
    return parsed;
}

function showConfig(scope: ConfigScope | undefined): void {
    const paths = resolveConfigPaths();

    if (scope) {
        console.log(`\n${chalk.bold('Config')} ${SOURCE_LABELS[scope]}`);
        console.log('─'.repeat(60));
        for (const key of CONFIG_KEYS) {
            console.log(`  ${key}: ${formatConfigValue(getConfigByPath(key, scope, paths))}`);
        }
        console.log(`\nFile: ${getConfigPath(scope, paths) ?? '(not in a git repository)'}`);
        return;
    }

    console.log('\n' + chalk.bold('Settings:'));
    console.log('─'.repeat(60));
    for (const [key, { value, source }] of Object.entries(listConfigWithSources(paths))) {
        console.log(`  ${key}: ${formatConfigValue(value)} ${SOURCE_LABELS[source]}`);
    }

    console.log('\n' + chalk.bold('Config files:'));
    console.log('─'.repeat(60));
    console.log(`  User:      ${paths.user}`);
    console.log(`  Workspace: ${paths.workspace ?? '(not in a git repository)'}`);
}

/**
 * `devflow config [key] [value]`
 *
 * - no key: list every setting and where it comes from
 * - key (or key with --show): print its value, from one scope with -w/-u
 * - key and value: write it to the user config (or workspace with -w)
 */
export async function configCommand(
    key?: string,
    value?: string,
    options: ConfigCommandOptions = {}
): Promise<void> {
    rejectCombinedFlags({ '--workspace': options.workspace, '--user': options.user });
    const scope = resolveScope(options);

    if (!key) {
        showConfig(scope);
        return;
    }

    if (!isKnownConfigPath(key)) {
        console.error(chalk.red('Error:'), `Unknown config key: ${key}`);
        console.log('Valid keys:', CONFIG_KEYS.join(', '));
        exit(1);
    }

    if (value === undefined || options.show) {
        console.log(formatConfigValue(getConfigByPath(key, scope)));
        return;
    }

    const targetScope = scope ?? 'user';
    try {
        setConfigByPath(key, parseConfigInput(key, value), targetScope);
    } catch (error) {
        console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
        exit(1);
    }

    console.log(chalk.green('✓'), `Set ${key} in ${targetScope} config`);
}
