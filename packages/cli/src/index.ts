#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { createRequire } from 'module';
const require = createRequire(import.meta.url);
const pkg: { version: string } = require('../package.json');
import { syncOrgCommand } from './commands/sync-org.js';
import {
    branchCommand,
    rebaseCommand,
    mainCommand,
    newBranchCommand,
    commitCommand,
    statusCommand,
    pullCommand,
    pushCommand,
    checkCommand,
} from './commands/branch.js';
import {
    tfInitCommand,
    tfPlanCommand,
    tfApplyCommand,
    tfDestroyCommand,
    tfFmtCommand,
    tfUnlockCommand,
} from './commands/terraform.js';
import { textCommand, uuidCommand } from './commands/text.js';
import { configCommand } from './commands/config.js';
import { exitCodeFor } from './exit.js';

const program = new Command();

program
    .name('devflow')
    .description('git, GitHub and Terraform shortcuts for your terminal')
    .version(pkg.version);

// Configuration
program
    .command('config')
    .description('View or set configuration (supports dotted paths like orgSync.repoLimit)')
    .argument('[key]', 'Config key or dotted path to get/set (e.g., terraform.environmentsDir)')
    .argument('[value]', 'Value to set')
    .option('-s, --show', 'Show config (use with -w/-u to filter by scope)')
    .option('-w, --workspace', 'Target workspace config (.devflow/config.json)')
    .option('-u, --user', 'Target user config (~/.config/devflow/config.json)')
    .action(configCommand);

// Organization sync
program
    .command('sync-org [org] [target-dir]')
    .alias('clone-org')
    .description('Clone or update every non-archived repository of a GitHub organization')
    .option('-l, --limit <n>', 'Maximum number of repositories to fetch (default: orgSync.repoLimit)')
    .option('--json', 'Print one JSON record per event')
    .action(syncOrgCommand);

// Branch helpers
program
    .command('branch')
    .alias('b')
    .description('Print the current branch and copy it to the clipboard')
    .action(branchCommand);

program
    .command('rebase [target]')
    .description('Update the target branch (default: mainBranch) and rebase the current branch onto it')
    .action(rebaseCommand);

program
    .command('main')
    .description('Checkout the main branch and pull')
    .action(mainCommand);

program
    .command('new [branch]')
    .description('Create a new branch and switch to it')
    .action(newBranchCommand);

program
    .command('commit [message]')
    .alias('c')
    .description('Commit all tracked changes (runs terraform fmt first in Terraform projects)')
    .option('--no-verify', 'Skip pre-commit and commit-msg hooks')
    .action(commitCommand);

program
    .command('status')
    .alias('st')
    .description('Run git status')
    .action(statusCommand);

program
    .command('pull')
    .description('Run git pull')
    .action(pullCommand);

program
    .command('push')
    .description('Run git push')
    .action(pushCommand);

program
    .command('check')
    .description('Run all pre-commit hooks on all files')
    .action(checkCommand);

// Terraform
const tf = program
    .command('tf')
    .description('Terraform commands for environments under terraform.environmentsDir');

tf.command('init <env>')
    .description('terraform init with <env>.tfbackend')
    .action(tfInitCommand);

tf.command('plan [env]')
    .description('terraform plan, with <env>.tfvars when an environment is given')
    .action(tfPlanCommand);

tf.command('apply [env]')
    .description('terraform apply, with <env>.tfvars when an environment is given')
    .action(tfApplyCommand);

tf.command('destroy <env>')
    .description('terraform destroy with <env>.tfvars')
    .action(tfDestroyCommand);

tf.command('fmt')
    .description('terraform fmt --recursive')
    .action(tfFmtCommand);

tf.command('unlock [lockId]')
    .description('terraform force-unlock -force <lockId>')
    .action(tfUnlockCommand);

// Text utilities
program
    .command('text <mode>')
    .description('Convert stdin line by line (lower, upper, sentence, title)')
    .action((mode: string) => textCommand(mode));

program
    .command('uuid')
    .description('Print a random lowercase UUID')
    .action(uuidCommand);

program.parseAsync(process.argv).catch((error: unknown) => {
    try {
        process.exitCode = exitCodeFor(error);
    } catch (unexpected) {
        console.error(chalk.red('Error:'), unexpected instanceof Error ? unexpected.message : String(unexpected));
        process.exitCode = 1;
    }
});
