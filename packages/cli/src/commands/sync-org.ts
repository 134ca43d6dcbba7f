import chalk from 'chalk';
import {
    createDefaultOrgSyncDependencies,
    defaultTargetDir,
    syncOrganization,
    type OrgSyncEvent,
    type OrgSyncReporter,
    type OrgSyncSummary,
    type RepoSyncOutcome,
} from '@devflow/core';
import { loadConfig } from '../config.js';
import { exit } from '../exit.js';
import { parseCountFlag } from '../validation.js';

interface SyncOrgOptions {
    /** Maximum repositories to request (overrides orgSync.repoLimit) */
    limit?: string;
    /** Emit one JSON record per event instead of colored text */
    json?: boolean;
}

const SUMMARY_LABEL_WIDTH = 28;

/**
 * Lines of the end-of-run summary table.
 */
export function formatSummary(summary: OrgSyncSummary): string[] {
    const row = (label: string, value: number) => `${label.padEnd(SUMMARY_LABEL_WIDTH)}${value}`;
    return [
        '----- Clone/Update Summary -----',
        row('Total repositories found:', summary.total),
        row('Successfully cloned:', summary.cloned),
        row('Successfully updated:', summary.updated),
        row('Skipped (path exists):', summary.skipped),
        row('Failed operations:', summary.failed),
        '--------------------------------',
    ];
}

function failureVerb(outcome: RepoSyncOutcome): string {
    switch (outcome.state) {
        case 'version-controlled':
            return 'update';
        case 'absent':
            return 'clone';
        default:
            return 'inspect';
    }
}

function renderEvent(event: OrgSyncEvent): void {
    switch (event.type) {
        case 'inventory-fetching':
            console.log(chalk.dim(`Fetching repositories for '${event.org}' (limit ${event.limit})...`));
            break;
        case 'inventory-fetched':
            if (event.count === 0) {
                console.log(chalk.yellow(`No repositories found for '${event.org}'.`));
            } else {
                console.log(`Found ${event.count} repositories. Syncing into ${chalk.cyan(event.targetDir)}`);
                console.log();
            }
            break;
        case 'repository-start':
            if (event.action === 'clone') {
                console.log(chalk.dim(`Cloning ${event.nameWithOwner} into ${event.path}...`));
            } else if (event.action === 'update') {
                console.log(chalk.dim(`Updating ${event.name}...`));
            } else {
                console.log(chalk.yellow('Warning:'), `${event.path} exists but is not a git repository. Skipping.`);
            }
            break;
        case 'repository-done': {
            const { outcome } = event;
            if (outcome.status === 'cloned') {
                console.log(chalk.green('✓'), `Cloned ${outcome.name}`);
            } else if (outcome.status === 'updated') {
                console.log(chalk.green('✓'), `Updated ${outcome.name}`);
            } else if (outcome.status === 'failed') {
                console.error(chalk.red('✗'), `Failed to ${failureVerb(outcome)} ${outcome.name}: ${outcome.error ?? 'unknown error'}`);
            }
            break;
        }
        case 'summary':
            console.log();
            for (const line of formatSummary(event.summary)) {
                console.log(line);
            }
            break;
    }
}

/**
 * Reporter that prints colored progress lines.
 */
export function createConsoleReporter(): OrgSyncReporter {
    return renderEvent;
}

/**
 * Reporter that prints one JSON record per event.
 */
export function createJsonReporter(): OrgSyncReporter {
    return (event) => {
        console.log(JSON.stringify(event));
    };
}

export async function syncOrgCommand(
    org: string | undefined,
    targetDir: string | undefined,
    options: SyncOrgOptions = {}
): Promise<void> {
    const config = loadConfig();
    const limit = parseCountFlag(options.limit, '--limit') ?? config.orgSync.repoLimit;
    const orgName = org?.trim() ?? '';
    const resolvedTargetDir = targetDir?.trim()
        || (orgName ? defaultTargetDir(orgName, config.orgSync.targetDirSuffix) : undefined);

    const reporter = options.json ? createJsonReporter() : createConsoleReporter();
    const result = await syncOrganization(
        { org: orgName, targetDir: resolvedTargetDir, limit },
        createDefaultOrgSyncDependencies(),
        reporter
    );

    if (!result.ok) {
        if (options.json) {
            console.log(JSON.stringify({ type: 'error', reason: result.error.reason, message: result.error.message }));
        } else {
            console.error(chalk.red('Error:'), result.error.message);
            if (result.error.reason === 'usage') {
                console.log(chalk.dim('Usage: devflow sync-org <org> [target-dir]'));
            }
        }
        exit(1);
    }

    if (result.exitCode !== 0) {
        if (!options.json) {
            console.error(chalk.red(`${result.summary.failed} operation(s) failed.`));
        }
        exit(1);
    }
}
