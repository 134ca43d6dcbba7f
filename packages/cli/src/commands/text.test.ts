/**
 * Tests for the text and uuid commands
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Readable } from 'stream';

vi.mock('../exit.js', () => ({
    exit: vi.fn((code: number) => {
        throw new Error(`exit(${code})`);
    }),
}));

import { convertLines, textCommand, uuidCommand } from './text.js';

let output: string[];

beforeEach(() => {
    output = [];
    const capture = (...args: unknown[]) => {
        output.push(args.join(' '));
    };
    vi.spyOn(console, 'log').mockImplementation(capture);
    vi.spyOn(console, 'error').mockImplementation(capture);
});

afterEach(() => {
    vi.restoreAllMocks();
});

async function collect(lines: AsyncIterable<string>): Promise<string[]> {
    const result: string[] = [];
    for await (const line of lines) {
        result.push(line);
    }
    return result;
}

describe('convertLines', () => {
    it('converts each line independently', async () => {
        const input = Readable.from(['hello WORLD\n', '  the QUICK fox  \n', '\n']);

        await expect(collect(convertLines(input, 'sentence'))).resolves.toEqual([
            'Hello world',
            'The quick fox',
            '',
        ]);
    });

    it('handles a final line without a newline', async () => {
        const input = Readable.from(['first line\nsecond-line']);

        await expect(collect(convertLines(input, 'title'))).resolves.toEqual(['First Line', 'Second-Line']);
    });
});

describe('textCommand', () => {
    it('writes converted lines to stdout', async () => {
        await textCommand('upper', Readable.from(['abc\n', 'déjà vu\n']));

        expect(output).toEqual(['ABC', 'DÉJÀ VU']);
    });

    it('lower-cases', async () => {
        await textCommand('lower', Readable.from(['MiXeD Case\n']));

        expect(output).toEqual(['mixed case']);
    });

    it('rejects an unknown mode', async () => {
        await expect(textCommand('snake', Readable.from(['x\n']))).rejects.toThrow('exit(1)');

        expect(output[output.length - 1]).toBe('Valid values: lower, upper, sentence, title');
    });
});

describe('uuidCommand', () => {
    it('prints a lowercase v4 uuid', () => {
        uuidCommand();

        expect(output).toHaveLength(1);
        expect(output[0]).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    });
});
