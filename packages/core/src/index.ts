/**
 * @devflow/core
 *
 * Helpers and workflows around the git, gh and terraform command-line tools.
 * Nothing in this package prints; the CLI owns all console output.
 *
 * @example Basic usage:
 * ```typescript
 * import { getCurrentBranch, rebaseOntoWorkflow } from '@devflow/core';
 *
 * const branch = await getCurrentBranch();
 * const result = await rebaseOntoWorkflow('main');
 * ```
 */

// =============================================================================
// Types & Errors
// =============================================================================

export { CommandError, GitError, describeError } from './types.js';
export type { GitOptions, CommandOptions, CommandOutput } from './types.js';

// =============================================================================
// Process Execution
// =============================================================================

export { execCommand, runInteractive, isCommandAvailable } from './exec.js';

export { shellEscape, validatePositiveInteger, validateSafeString } from './shell-utils.js';

// =============================================================================
// Git Utilities
// =============================================================================

export {
    validateBranchName,
    getCurrentBranch,
    createBranch,
    checkoutBranch,
    pullLatest,
    pullRebase,
    rebaseCurrentBranch,
    commitAll,
} from './git-utils.js';

// =============================================================================
// GitHub CLI Utilities
// =============================================================================

export {
    DEFAULT_REPO_LIMIT,
    parseRepositoryList,
    isGhAuthenticated,
    listOrgRepositories,
    cloneRepository,
} from './gh-utils.js';

// =============================================================================
// Terraform
// =============================================================================

export {
    DEFAULT_ENVIRONMENTS_DIR,
    DEFAULT_PROTECTED_ENVIRONMENTS,
    buildTerraformArgs,
    isProtectedEnvironment,
    isTerraformProject,
    runTerraform,
    formatTerraform,
} from './terraform.js';
export type { TerraformCommand, TerraformAction, TerraformSettings } from './terraform.js';

// =============================================================================
// Text Utilities
// =============================================================================

export { TEXT_CASES, toSentenceCase, toTitleCase, convertCase, isTextCase } from './text-case.js';
export type { TextCase } from './text-case.js';

// =============================================================================
// Workflows
// =============================================================================

export * from './workflows/index.js';
