/**
 * Tests for git utilities (git itself is never run)
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('./exec.js', () => ({
    execCommand: vi.fn(),
}));

import { execCommand } from './exec.js';
import {
    commitAll,
    createBranch,
    getCurrentBranch,
    pullRebase,
    rebaseCurrentBranch,
    validateBranchName,
} from './git-utils.js';
import { GitError } from './types.js';

function gitError(exitCode: number, command = 'git'): GitError {
    return new GitError({ message: 'Command failed', command, stderr: '', exitCode, cwd: '/repo' });
}

describe('validateBranchName', () => {
    it('accepts ordinary branch names', () => {
        expect(() => validateBranchName('main')).not.toThrow();
        expect(() => validateBranchName('feature/add-login')).not.toThrow();
        expect(() => validateBranchName('release-1.2')).not.toThrow();
    });

    it('rejects empty names', () => {
        expect(() => validateBranchName('')).toThrow('Branch name cannot be empty');
        expect(() => validateBranchName('   ')).toThrow('Branch name cannot be empty');
    });

    it('rejects characters git does not allow', () => {
        expect(() => validateBranchName('my branch')).toThrow('invalid git characters');
        expect(() => validateBranchName('fix~1')).toThrow('invalid git characters');
        expect(() => validateBranchName('a:b')).toThrow('invalid git characters');
    });

    it('rejects ranges and reflog syntax', () => {
        expect(() => validateBranchName('a..b')).toThrow("cannot contain '..' or '@{'");
        expect(() => validateBranchName('main@{1}')).toThrow("cannot contain '..' or '@{'");
    });

    it('rejects names that look like options or end badly', () => {
        expect(() => validateBranchName('-f')).toThrow('cannot start with');
        expect(() => validateBranchName('feature/')).toThrow('cannot start with');
        expect(() => validateBranchName('topic.lock')).toThrow('cannot start with');
    });
});

describe('getCurrentBranch', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    it('uses symbolic-ref when it succeeds', async () => {
        vi.mocked(execCommand).mockResolvedValueOnce({ stdout: 'feature/x\n', stderr: '' });

        await expect(getCurrentBranch({ cwd: '/repo' })).resolves.toBe('feature/x');
        expect(execCommand).toHaveBeenCalledTimes(1);
        expect(execCommand).toHaveBeenCalledWith('git symbolic-ref --short HEAD', { cwd: '/repo' });
    });

    it('falls back to branch --show-current', async () => {
        vi.mocked(execCommand)
            .mockRejectedValueOnce(gitError(128))
            .mockResolvedValueOnce({ stdout: 'main\n', stderr: '' });

        await expect(getCurrentBranch()).resolves.toBe('main');
        expect(execCommand).toHaveBeenLastCalledWith('git branch --show-current', {});
    });

    it('returns null when detached', async () => {
        vi.mocked(execCommand)
            .mockRejectedValueOnce(gitError(128))
            .mockResolvedValueOnce({ stdout: '\n', stderr: '' });

        await expect(getCurrentBranch()).resolves.toBeNull();
    });

    it('returns null outside a git repository', async () => {
        vi.mocked(execCommand)
            .mockRejectedValueOnce(gitError(128))
            .mockRejectedValueOnce(gitError(128));

        await expect(getCurrentBranch()).resolves.toBeNull();
    });

    it('propagates unexpected errors', async () => {
        vi.mocked(execCommand).mockRejectedValueOnce(new Error('spawn failed'));

        await expect(getCurrentBranch()).rejects.toThrow('spawn failed');
    });
});

describe('git commands', () => {
    beforeEach(() => {
        vi.clearAllMocks();
        vi.mocked(execCommand).mockResolvedValue({ stdout: '', stderr: '' });
    });

    it('creates branches with a quoted name', async () => {
        await createBranch('feature/login');
        expect(execCommand).toHaveBeenCalledWith("git checkout -b 'feature/login'", {});
    });

    it('does not run git for an invalid branch name', async () => {
        await expect(createBranch('')).rejects.toThrow('Branch name cannot be empty');
        expect(execCommand).not.toHaveBeenCalled();
    });

    it('pulls with rebase in the given directory', async () => {
        await pullRebase({ cwd: '/work/org_repos/api' });
        expect(execCommand).toHaveBeenCalledWith('git pull --rebase', { cwd: '/work/org_repos/api' });
    });

    it('rebases onto the target branch', async () => {
        await rebaseCurrentBranch('main');
        expect(execCommand).toHaveBeenCalledWith("git rebase 'main'", {});
    });

    it('commits all tracked changes', async () => {
        await commitAll("Fix the user's login");
        expect(execCommand).toHaveBeenCalledWith("git commit -am 'Fix the user'\\''s login'", { cwd: undefined });
    });

    it('adds --no-verify when requested', async () => {
        await commitAll('wip', { noVerify: true, cwd: '/repo' });
        expect(execCommand).toHaveBeenCalledWith("git commit -am 'wip' --no-verify", { cwd: '/repo' });
    });

    it('rejects empty commit messages', async () => {
        await expect(commitAll('  ')).rejects.toThrow('Commit message cannot be empty');
        expect(execCommand).not.toHaveBeenCalled();
    });
});
