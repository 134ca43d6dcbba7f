/**
 * Tests for the branch helper commands
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('@devflow/core', async (importOriginal) => {
    const actual = await importOriginal<typeof import('@devflow/core')>();
    return {
        ...actual,
        getCurrentBranch: vi.fn(),
        createBranch: vi.fn(),
        runInteractive: vi.fn(),
        rebaseOntoWorkflow: vi.fn(),
        syncMainBranchWorkflow: vi.fn(),
        commitChangesWorkflow: vi.fn(),
    };
});

vi.mock('../clipboard.js', () => ({
    copyToClipboard: vi.fn(),
}));

vi.mock('../config.js', () => ({
    loadConfig: vi.fn(() => ({
        mainBranch: 'develop',
        orgSync: { repoLimit: 5000, targetDirSuffix: '_repos' },
        terraform: { environmentsDir: 'environments', protectedEnvironments: ['prod', 'production'] },
    })),
}));

vi.mock('../exit.js', () => ({
    exit: vi.fn((code: number) => {
        throw new Error(`exit(${code})`);
    }),
}));

import {
    GitError,
    commitChangesWorkflow,
    createBranch,
    getCurrentBranch,
    rebaseOntoWorkflow,
    runInteractive,
    syncMainBranchWorkflow,
} from '@devflow/core';
import { copyToClipboard } from '../clipboard.js';
import {
    branchCommand,
    checkCommand,
    commitCommand,
    mainCommand,
    newBranchCommand,
    rebaseCommand,
    statusCommand,
} from './branch.js';

const mockGetCurrentBranch = vi.mocked(getCurrentBranch);
const mockCreateBranch = vi.mocked(createBranch);
const mockRunInteractive = vi.mocked(runInteractive);
const mockRebase = vi.mocked(rebaseOntoWorkflow);
const mockSyncMain = vi.mocked(syncMainBranchWorkflow);
const mockCommit = vi.mocked(commitChangesWorkflow);
const mockCopy = vi.mocked(copyToClipboard);

const ANSI_PATTERN = new RegExp(String.fromCharCode(27) + '\\[[0-9;]*m', 'g');
const stripAnsi = (text: string) => text.replace(ANSI_PATTERN, '');

let output: string[];

beforeEach(() => {
    vi.clearAllMocks();
    output = [];
    const capture = (...args: unknown[]) => {
        output.push(stripAnsi(args.join(' ')));
    };
    vi.spyOn(console, 'log').mockImplementation(capture);
    vi.spyOn(console, 'error').mockImplementation(capture);
    vi.spyOn(console, 'warn').mockImplementation(capture);
});

afterEach(() => {
    vi.restoreAllMocks();
});

describe('branchCommand', () => {
    it('prints and copies the current branch', async () => {
        mockGetCurrentBranch.mockResolvedValue('feature/login');
        mockCopy.mockResolvedValue('pbcopy');

        await branchCommand();

        expect(mockCopy).toHaveBeenCalledWith('feature/login');
        expect(output).toEqual(['feature/login', '(copied to clipboard)']);
    });

    it('still prints the branch without a clipboard tool', async () => {
        mockGetCurrentBranch.mockResolvedValue('main');
        mockCopy.mockResolvedValue(null);

        await branchCommand();

        expect(output).toEqual(['main', '(clipboard command not found)']);
    });

    it('warns when copying fails', async () => {
        mockGetCurrentBranch.mockResolvedValue('main');
        mockCopy.mockRejectedValue(new Error('xclip exited with code 1'));

        await branchCommand();

        expect(output).toEqual(['main', 'Warning: Could not copy to clipboard: xclip exited with code 1']);
    });

    it('fails outside a repository', async () => {
        mockGetCurrentBranch.mockResolvedValue(null);

        await expect(branchCommand()).rejects.toThrow('exit(1)');
        expect(output).toEqual(['Error: Not on a branch or not in a git repository.']);
    });
});

describe('rebaseCommand', () => {
    it('defaults the target to the configured main branch', async () => {
        mockRebase.mockResolvedValue({ success: true, branch: 'feature/x', target: 'develop', alreadyOnTarget: false });

        await rebaseCommand();

        expect(mockRebase).toHaveBeenCalledWith('develop', expect.objectContaining({ onProgress: expect.any(Function) }));
        expect(output).toContain("✓ Rebased 'feature/x' onto 'develop'.");
    });

    it('reports a plain pull when already on the target', async () => {
        mockRebase.mockResolvedValue({ success: true, branch: 'main', target: 'main', alreadyOnTarget: true });

        await rebaseCommand('main');

        expect(output).toContain("✓ Already on 'main'. Pulled.");
    });

    it('exits 1 and mentions the restored branch on failure', async () => {
        mockRebase.mockResolvedValue({
            success: false,
            error: "Failed to pull 'main': network down",
            branch: 'feature/x',
            target: 'main',
            alreadyOnTarget: false,
            failedStep: 'pull-target',
            restored: true,
        });

        await expect(rebaseCommand('main')).rejects.toThrow('exit(1)');
        expect(output).toEqual(["Error: Failed to pull 'main': network down", "Returned to 'feature/x'."]);
    });
});

describe('mainCommand', () => {
    it('syncs the configured main branch', async () => {
        mockSyncMain.mockResolvedValue({ success: true, branch: 'develop' });

        await mainCommand();

        expect(mockSyncMain).toHaveBeenCalledWith('develop');
        expect(output).toEqual(['Switching to develop and pulling latest...', '✓ On develop and up to date.']);
    });

    it('exits 1 on failure', async () => {
        mockSyncMain.mockResolvedValue({
            success: false,
            error: 'Failed to checkout develop: local changes',
            branch: 'develop',
            failedStep: 'checkout',
        });

        await expect(mainCommand()).rejects.toThrow('exit(1)');
        expect(output).toContain('Error: Failed to checkout develop: local changes');
    });
});

describe('newBranchCommand', () => {
    it('creates and switches to the branch', async () => {
        mockCreateBranch.mockResolvedValue(undefined);

        await newBranchCommand('feature/search');

        expect(mockCreateBranch).toHaveBeenCalledWith('feature/search');
        expect(output).toEqual(["✓ Created and switched to 'feature/search'."]);
    });

    it('requires a name', async () => {
        await expect(newBranchCommand(undefined)).rejects.toThrow('exit(1)');
        expect(output).toEqual(['Error: Branch name is required']);
        expect(mockCreateBranch).not.toHaveBeenCalled();
    });

    it('rejects names git would refuse', async () => {
        await expect(newBranchCommand('bad..name')).rejects.toThrow('exit(1)');
        expect(mockCreateBranch).not.toHaveBeenCalled();
    });

    it('hints that the branch may already exist', async () => {
        mockCreateBranch.mockRejectedValue(new GitError({
            message: 'Command failed',
            command: "git checkout -b 'main'",
            stderr: "fatal: a branch named 'main' already exists\n",
            exitCode: 128,
            cwd: '/repo',
        }));

        await expect(newBranchCommand('main')).rejects.toThrow('exit(1)');
        expect(output).toEqual([
            "Error: Failed to create branch 'main'. It may already exist.",
            "fatal: a branch named 'main' already exists",
        ]);
    });
});

describe('commitCommand', () => {
    it('commits with hooks by default', async () => {
        mockCommit.mockResolvedValue({ success: true, formatted: false });

        await commitCommand('fix typo', {});

        expect(mockCommit).toHaveBeenCalledWith('fix typo', expect.objectContaining({ noVerify: false }));
        expect(output).toEqual(['✓ Committed.']);
    });

    it('warns when hooks are skipped', async () => {
        mockCommit.mockResolvedValue({ success: true, formatted: true });

        await commitCommand('wip', { verify: false });

        expect(mockCommit).toHaveBeenCalledWith('wip', expect.objectContaining({ noVerify: true }));
        expect(output[0]).toBe('Warning: Skipping git hooks (--no-verify).');
    });

    it('shows a formatting warning and the commit error', async () => {
        mockCommit.mockResolvedValue({
            success: false,
            error: 'Git commit failed: nothing to commit',
            formatted: false,
            formatWarning: 'terraform fmt failed: terraform not found',
        });

        await expect(commitCommand('wip', {})).rejects.toThrow('exit(1)');
        expect(output).toEqual([
            'Warning: terraform fmt failed: terraform not found',
            'Error: Git commit failed: nothing to commit',
        ]);
    });

    it('requires a message', async () => {
        await expect(commitCommand('  ', {})).rejects.toThrow('exit(1)');
        expect(mockCommit).not.toHaveBeenCalled();
    });
});

describe('pass-through commands', () => {
    it('runs git status attached to the terminal', async () => {
        mockRunInteractive.mockResolvedValue(0);

        await statusCommand();

        expect(mockRunInteractive).toHaveBeenCalledWith('git', ['status']);
    });

    it('runs pre-commit on all files and propagates failure', async () => {
        mockRunInteractive.mockResolvedValue(1);

        await expect(checkCommand()).rejects.toThrow('exit(1)');
        expect(mockRunInteractive).toHaveBeenCalledWith('pre-commit', ['run', '-a']);
    });

    it('reports a tool that cannot be started', async () => {
        mockRunInteractive.mockRejectedValue(new Error('spawn pre-commit ENOENT'));

        await expect(checkCommand()).rejects.toThrow('exit(1)');
        expect(output).toEqual(['Error: Could not run pre-commit: spawn pre-commit ENOENT']);
    });
});
