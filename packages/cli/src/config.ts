import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { homedir } from 'os';
import { dirname, join } from 'path';
import { execSync } from 'child_process';
import chalk from 'chalk';
import { z } from 'zod';
import {
    DEFAULT_ENVIRONMENTS_DIR,
    DEFAULT_PROTECTED_ENVIRONMENTS,
    DEFAULT_REPO_LIMIT,
    DEFAULT_TARGET_DIR_SUFFIX,
} from '@devflow/core';

// User config (personal overrides)
const USER_CONFIG_DIR = join(homedir(), '.config', 'devflow');
const USER_CONFIG_FILE = join(USER_CONFIG_DIR, 'config.json');

// Workspace config filename (in repo root)
const WORKSPACE_CONFIG_DIR = '.devflow';
const WORKSPACE_CONFIG_FILE = 'config.json';

// =============================================================================
// Schema
// =============================================================================

const OrgSyncConfigSchema = z.object({
    /** Maximum repositories requested from `gh repo list` */
    repoLimit: z.number().int().positive(),
    /** Appended to the org name for the default target directory */
    targetDirSuffix: z.string(),
});

const TerraformConfigSchema = z.object({
    /** Directory holding `<env>.tfbackend` and `<env>.tfvars` files */
    environmentsDir: z.string().min(1),
    /** Environments that get the red production banner */
    protectedEnvironments: z.array(z.string()),
});

const ConfigSchema = z.object({
    mainBranch: z.string().min(1),
    orgSync: OrgSyncConfigSchema,
    terraform: TerraformConfigSchema,
});

/** Shape of a single config file: every key optional */
const ConfigFileSchema = z.object({
    mainBranch: z.string().min(1).optional(),
    orgSync: OrgSyncConfigSchema.partial().optional(),
    terraform: TerraformConfigSchema.partial().optional(),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export type ConfigScope = 'user' | 'workspace';

export type ConfigSource = 'default' | 'workspace' | 'user';

export interface ConfigPaths {
    user: string;
    /** Null outside a git repository */
    workspace: string | null;
}

const DEFAULT_CONFIG: Config = {
    mainBranch: 'main',
    orgSync: {
        repoLimit: DEFAULT_REPO_LIMIT,
        targetDirSuffix: DEFAULT_TARGET_DIR_SUFFIX,
    },
    terraform: {
        environmentsDir: DEFAULT_ENVIRONMENTS_DIR,
        protectedEnvironments: [...DEFAULT_PROTECTED_ENVIRONMENTS],
    },
};

/** Leaf keys shown by `devflow config --show` */
export const CONFIG_KEYS = [
    'mainBranch',
    'orgSync.repoLimit',
    'orgSync.targetDirSuffix',
    'terraform.environmentsDir',
    'terraform.protectedEnvironments',
] as const;

/**
 * A known leaf key, or a section containing one (`orgSync`)
 */
export function isKnownConfigPath(path: string): boolean {
    return CONFIG_KEYS.some(key => key === path || key.startsWith(`${path}.`));
}

// =============================================================================
// Object Helpers
// =============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two plain objects (right overwrites left, nested objects are
 * merged recursively, arrays and primitives are replaced).
 */
export function deepMergeObjects(
    base: Record<string, unknown>,
    override: Record<string, unknown>
): Record<string, unknown> {
    const result: Record<string, unknown> = { ...base };
    for (const [key, overrideValue] of Object.entries(override)) {
        if (overrideValue === undefined) continue;

        const baseValue = result[key];
        if (isPlainObject(overrideValue) && isPlainObject(baseValue)) {
            result[key] = deepMergeObjects(baseValue, overrideValue);
        } else {
            result[key] = overrideValue;
        }
    }
    return result;
}

function describeKind(value: unknown): string {
    if (Array.isArray(value)) return 'an array';
    const kind = typeof value;
    return kind === 'object' ? 'an object' : `a ${kind}`;
}

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}

// =============================================================================
// Dotted Path Helpers
// =============================================================================

/**
 * Get a value from an object using a dotted path (e.g., "orgSync.repoLimit")
 */
export function getByPath(obj: Record<string, unknown>, path: string): unknown {
    let current: unknown = obj;

    for (const part of path.split('.')) {
        if (!isPlainObject(current)) return undefined;
        current = current[part];
    }

    return current;
}

/**
 * Set a value in an object using a dotted path (e.g., "terraform.environmentsDir").
 * Creates intermediate objects as needed; refuses to descend through a
 * primitive or an array.
 */
export function setByPath(obj: Record<string, unknown>, path: string, value: unknown): void {
    const parts = path.split('.');
    let current = obj;

    for (let i = 0; i < parts.length - 1; i++) {
        const part = parts[i];
        const next = current[part];
        if (next === undefined || next === null) {
            const created: Record<string, unknown> = {};
            current[part] = created;
            current = created;
        } else if (isPlainObject(next)) {
            current = next;
        } else {
            const traversed = parts.slice(0, i + 1).join('.');
            throw new Error(`Cannot set "${path}": "${traversed}" is ${describeKind(next)}, not an object`);
        }
    }

    current[parts[parts.length - 1]] = value;
}

/**
 * Parse a value string into the appropriate type
 */
export function parseValue(value: string): unknown {
    // Boolean
    if (value === 'true') return true;
    if (value === 'false') return false;

    // Number
    const num = Number(value);
    if (!isNaN(num) && value.trim() !== '') return num;

    // Array (comma-separated)
    if (value.includes(',')) {
        return value.split(',').map(v => v.trim()).filter(v => v.length > 0);
    }

    // String
    return value;
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Get the git repository root directory
 */
function getRepoRoot(): string | null {
    try {
        return execSync('git rev-parse --show-toplevel', {
            encoding: 'utf-8',
            stdio: ['ignore', 'pipe', 'ignore'],
        }).trim();
    } catch {
        return null;
    }
}

/**
 * Locations of the user and workspace config files
 */
export function resolveConfigPaths(): ConfigPaths {
    const repoRoot = getRepoRoot();
    return {
        user: USER_CONFIG_FILE,
        workspace: repoRoot ? join(repoRoot, WORKSPACE_CONFIG_DIR, WORKSPACE_CONFIG_FILE) : null,
    };
}

/**
 * Read a config file as raw JSON. Missing files read as `{}`.
 *
 * @throws Error if the file exists but is not a JSON object
 */
function readRawConfig(path: string | null): Record<string, unknown> {
    if (!path || !existsSync(path)) return {};

    const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    if (!isPlainObject(parsed)) {
        throw new Error('expected a JSON object');
    }
    return parsed;
}

/**
 * Load and validate one config file. Unreadable or invalid files are
 * reported and treated as empty.
 */
export function loadConfigFile(path: string | null): ConfigFile {
    let raw: Record<string, unknown>;
    try {
        raw = readRawConfig(path);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.warn(chalk.yellow('Warning:'), `Ignoring config file ${path}: ${message}`);
        return {};
    }

    const result = ConfigFileSchema.safeParse(raw);
    if (!result.success) {
        console.warn(chalk.yellow('Warning:'), `Ignoring invalid config file ${path}: ${formatIssues(result.error)}`);
        return {};
    }
    return result.data;
}

/**
 * Load merged config: defaults → workspace → user
 * User settings override workspace, workspace overrides defaults
 */
export function loadConfig(paths: ConfigPaths = resolveConfigPaths()): Config {
    const workspaceConfig = loadConfigFile(paths.workspace);
    const userConfig = loadConfigFile(paths.user);

    const merged = deepMergeObjects(deepMergeObjects(DEFAULT_CONFIG, workspaceConfig), userConfig);
    return ConfigSchema.parse(merged);
}

/**
 * Get a config value (or section) using a dotted path. Without a scope the
 * merged config is read.
 */
export function getConfigByPath(path: string, scope?: ConfigScope, paths: ConfigPaths = resolveConfigPaths()): unknown {
    if (scope === 'workspace') {
        return getByPath(loadConfigFile(paths.workspace), path);
    }
    if (scope === 'user') {
        return getByPath(loadConfigFile(paths.user), path);
    }
    return getByPath(loadConfig(paths), path);
}

export function getConfigPath(scope: ConfigScope, paths: ConfigPaths = resolveConfigPaths()): string | null {
    return scope === 'workspace' ? paths.workspace : paths.user;
}

/**
 * Set a config value using a dotted path. The resulting file is validated
 * before it is written.
 *
 * @throws Error for an unknown key, an invalid value, or a workspace scope outside a git repository
 */
export function setConfigByPath(
    path: string,
    value: unknown,
    scope: ConfigScope = 'user',
    paths: ConfigPaths = resolveConfigPaths()
): void {
    if (!isKnownConfigPath(path)) {
        throw new Error(`Unknown config key: ${path}`);
    }

    const configPath = getConfigPath(scope, paths);
    if (!configPath) {
        throw new Error('Not in a git repository');
    }

    const scopeConfig = readRawConfig(configPath);
    setByPath(scopeConfig, path, value);

    const result = ConfigFileSchema.safeParse(scopeConfig);
    if (!result.success) {
        throw new Error(`Invalid value for ${path}: ${formatIssues(result.error)}`);
    }

    const configDir = dirname(configPath);
    if (!existsSync(configDir)) {
        mkdirSync(configDir, { recursive: true });
    }
    writeFileSync(configPath, JSON.stringify(scopeConfig, null, 2) + '\n');
}

// =============================================================================
// Listing
// =============================================================================

export interface ConfigValueWithSource {
    value: unknown;
    source: ConfigSource;
}

/**
 * Every known key with its effective value and the layer it came from
 */
export function listConfigWithSources(
    paths: ConfigPaths = resolveConfigPaths()
): Record<typeof CONFIG_KEYS[number], ConfigValueWithSource> {
    const workspaceConfig = loadConfigFile(paths.workspace);
    const userConfig = loadConfigFile(paths.user);
    const merged = loadConfig(paths);

    const sourceOf = (key: string): ConfigSource => {
        if (getByPath(userConfig, key) !== undefined) return 'user';
        if (getByPath(workspaceConfig, key) !== undefined) return 'workspace';
        return 'default';
    };

    const entry = (key: typeof CONFIG_KEYS[number]): ConfigValueWithSource => ({
        value: getByPath(merged, key),
        source: sourceOf(key),
    });

    return {
        'mainBranch': entry('mainBranch'),
        'orgSync.repoLimit': entry('orgSync.repoLimit'),
        'orgSync.targetDirSuffix': entry('orgSync.targetDirSuffix'),
        'terraform.environmentsDir': entry('terraform.environmentsDir'),
        'terraform.protectedEnvironments': entry('terraform.protectedEnvironments'),
    };
}
