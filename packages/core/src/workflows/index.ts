/**
 * Workflows - multi-step operations over git, gh and terraform
 *
 * @example
 * ```typescript
 * import { syncOrganization, createDefaultOrgSyncDependencies } from '@devflow/core';
 *
 * const result = await syncOrganization({ org: 'my-org' }, createDefaultOrgSyncDependencies());
 * if (result.ok) {
 *   console.log(`${result.summary.cloned} cloned, ${result.summary.updated} updated`);
 * }
 * ```
 */

// =============================================================================
// Workflow Functions
// =============================================================================

export {
    syncOrganization,
    createDefaultOrgSyncDependencies,
    classifyLocalPath,
    actionForState,
    localRepoName,
    defaultTargetDir,
    emptySummary,
    recordOutcome,
    OrgSyncError,
    REQUIRED_TOOLS,
    DEFAULT_TARGET_DIR_SUFFIX,
} from './org-sync.js';
export type { OrgSyncResult } from './org-sync.js';

export { rebaseOntoWorkflow, syncMainBranchWorkflow, commitChangesWorkflow } from './branch.js';

// =============================================================================
// Types
// =============================================================================

export type {
    // Common types
    WorkflowResult,
    WorkflowOptions,

    // Organization sync types
    LocalRepoState,
    RepoSyncAction,
    RepoSyncStatus,
    HostingService,
    VersionControl,
    LocalFileSystem,
    ToolProbe,
    OrgSyncDependencies,
    OrgSyncOptions,
    OrgSyncSummary,
    RepoSyncOutcome,
    OrgSyncErrorReason,
    OrgSyncEvent,
    OrgSyncReporter,

    // Branch workflow types
    RebaseStep,
    RebaseOptions,
    RebaseResult,
    SyncMainStep,
    SyncMainResult,
    CommitOptions,
    CommitResult,
} from './types.js';
