/**
 * Workflow Types
 *
 * Types for the workflow layer that sequences git / gh / terraform calls.
 * Workflows never print; they report progress through callbacks and return
 * structured results that the CLI renders.
 */

// =============================================================================
// Common Types
// =============================================================================

/**
 * Base result for branch workflows
 */
export interface WorkflowResult {
    /** Whether the workflow completed successfully */
    success: boolean;
    /** Error message if success is false */
    error?: string;
}

export interface WorkflowOptions {
    /** Working directory (default: process.cwd()) */
    cwd?: string;
}

// =============================================================================
// Organization Sync
// =============================================================================

/**
 * What occupies `<targetDir>/<repoName>` before reconciliation.
 */
export type LocalRepoState = 'absent' | 'version-controlled' | 'occupied';

export type RepoSyncAction = 'clone' | 'update' | 'skip';

export type RepoSyncStatus = 'cloned' | 'updated' | 'skipped' | 'failed';

/**
 * Remote hosting service: inventory, authentication state and cloning.
 */
export interface HostingService {
    isAuthenticated(): Promise<boolean>;
    /** Qualified names (`owner/repo`) of non-archived repositories, at most `limit` */
    listRepositories(org: string, limit: number): Promise<string[]>;
    cloneRepository(nameWithOwner: string, targetPath: string): Promise<void>;
}

export interface VersionControl {
    /** Pull with rebase in the working copy at `repoPath` */
    pullRebase(repoPath: string): Promise<void>;
}

export interface LocalFileSystem {
    classify(path: string): Promise<LocalRepoState>;
    /** Create the directory and any missing parents */
    ensureDirectory(path: string): Promise<void>;
}

export interface ToolProbe {
    isAvailable(command: string): Promise<boolean>;
}

export interface OrgSyncDependencies {
    hosting: HostingService;
    vcs: VersionControl;
    fs: LocalFileSystem;
    tools: ToolProbe;
}

export interface OrgSyncOptions {
    /** Organization (or user) login */
    org: string;
    /** Where repositories are cloned (default: `./<org>_repos`) */
    targetDir?: string;
    /** Maximum repositories to request (default: 5000) */
    limit?: number;
}

export interface OrgSyncSummary {
    total: number;
    cloned: number;
    updated: number;
    skipped: number;
    failed: number;
}

export interface RepoSyncOutcome {
    nameWithOwner: string;
    /** Local directory name (segment after the last `/`) */
    name: string;
    path: string;
    /** Undefined when the path could not be inspected */
    state?: LocalRepoState;
    status: RepoSyncStatus;
    /** Failure detail when status is 'failed' */
    error?: string;
}

export type OrgSyncErrorReason =
    | 'usage'
    | 'missing-tool'
    | 'not-authenticated'
    | 'inventory-fetch'
    | 'target-directory';

export type OrgSyncEvent =
    | { type: 'inventory-fetching'; org: string; limit: number }
    | { type: 'inventory-fetched'; org: string; count: number; targetDir: string }
    | {
        type: 'repository-start';
        nameWithOwner: string;
        name: string;
        path: string;
        state: LocalRepoState;
        action: RepoSyncAction;
    }
    | { type: 'repository-done'; outcome: RepoSyncOutcome }
    | { type: 'summary'; summary: OrgSyncSummary };

export type OrgSyncReporter = (event: OrgSyncEvent) => void;

// =============================================================================
// Branch Workflows
// =============================================================================

export type RebaseStep =
    | 'detect-branch'
    | 'pull'
    | 'checkout-target'
    | 'pull-target'
    | 'checkout-original'
    | 'rebase';

export interface RebaseOptions extends WorkflowOptions {
    /** Called before each git step runs */
    onProgress?: (step: RebaseStep, message: string) => void;
}

export interface RebaseResult extends WorkflowResult {
    /** Branch that was rebased (null if it could not be determined) */
    branch: string | null;
    target: string;
    /** True when already on the target, in which case it was only pulled */
    alreadyOnTarget: boolean;
    /** Step that failed */
    failedStep?: RebaseStep;
    /** Whether the original branch was checked out again after a failure */
    restored?: boolean;
}

export type SyncMainStep = 'checkout' | 'pull';

export interface SyncMainResult extends WorkflowResult {
    branch: string;
    failedStep?: SyncMainStep;
}

export interface CommitOptions extends WorkflowOptions {
    /** Skip pre-commit and commit-msg hooks */
    noVerify?: boolean;
    onProgress?: (step: 'format' | 'commit', message: string) => void;
}

export interface CommitResult extends WorkflowResult {
    /** Whether `terraform fmt` ran before committing */
    formatted: boolean;
    /** Set when formatting failed; the commit still proceeds */
    formatWarning?: string;
}
