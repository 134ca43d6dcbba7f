import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { TEXT_CASES } from '@devflow/core';
import { parseCountFlag, rejectCombinedFlags, requireArgument, requireChoice } from './validation.js';

vi.mock('./exit.js', () => ({
    exit: vi.fn((code: number) => {
        throw new Error(`exit(${code})`);
    }),
}));

let output: string[];

beforeEach(() => {
    output = [];
    const capture = (...args: unknown[]) => {
        output.push(args.join(' ').replace(new RegExp(String.fromCharCode(27) + '\\[[0-9;]*m', 'g'), ''));
    };
    vi.spyOn(console, 'error').mockImplementation(capture);
    vi.spyOn(console, 'log').mockImplementation(capture);
});

afterEach(() => {
    vi.restoreAllMocks();
});

describe('requireArgument', () => {
    it('passes a commit message through', () => {
        expect(() => requireArgument('fix: typo in readme', 'Commit message')).not.toThrow();
        expect(output).toEqual([]);
    });

    it('treats a whitespace-only branch name as missing', () => {
        expect(() => requireArgument('  \t', 'Branch name')).toThrow('exit(1)');
        expect(output).toEqual(['Error: Branch name is required']);
    });

    it('rejects an omitted commit message', () => {
        expect(() => requireArgument(undefined, 'Commit message')).toThrow('exit(1)');
        expect(output).toEqual(['Error: Commit message is required']);
    });
});

describe('requireChoice', () => {
    it('accepts every text mode', () => {
        for (const mode of TEXT_CASES) {
            expect(() => requireChoice(mode, TEXT_CASES, 'mode')).not.toThrow();
        }
    });

    it('is case-sensitive and lists the modes', () => {
        expect(() => requireChoice('Title', TEXT_CASES, 'mode')).toThrow('exit(1)');
        expect(output).toEqual([
            'Error: Invalid value for mode: "Title"',
            'Valid values: lower, upper, sentence, title',
        ]);
    });
});

describe('rejectCombinedFlags', () => {
    it('allows a single config scope', () => {
        expect(() => rejectCombinedFlags({ '--workspace': true, '--user': undefined })).not.toThrow();
        expect(() => rejectCombinedFlags({ '--workspace': undefined, '--user': undefined })).not.toThrow();
    });

    it('refuses --workspace with --user', () => {
        expect(() => rejectCombinedFlags({ '--workspace': true, '--user': true })).toThrow('exit(1)');
        expect(output).toEqual(['Error: Flags --workspace and --user cannot be used together']);
    });
});

describe('parseCountFlag', () => {
    it('returns undefined when --limit is absent', () => {
        expect(parseCountFlag(undefined, '--limit')).toBeUndefined();
    });

    it('parses a repository limit', () => {
        expect(parseCountFlag('250', '--limit')).toBe(250);
        expect(parseCountFlag(' 40 ', '--limit')).toBe(40);
    });

    it('rejects a limit with trailing text', () => {
        expect(() => parseCountFlag('100repos', '--limit')).toThrow('exit(1)');
        expect(output).toEqual(['Error: --limit must be a whole number']);
    });

    it('rejects negative and fractional limits as not whole numbers', () => {
        expect(() => parseCountFlag('-5', '--limit')).toThrow('exit(1)');
        expect(() => parseCountFlag('2.5', '--limit')).toThrow('exit(1)');
        expect(output).toEqual(['Error: --limit must be a whole number', 'Error: --limit must be a whole number']);
    });

    it('rejects a zero limit', () => {
        expect(() => parseCountFlag('0', '--limit')).toThrow('exit(1)');
        expect(output).toEqual(['Error: --limit must be at least 1']);
    });
});
