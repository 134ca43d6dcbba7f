import { createInterface } from 'readline';
import { randomUUID } from 'crypto';
import type { Readable } from 'stream';
import { TEXT_CASES, convertCase, type TextCase } from '@devflow/core';
import { requireChoice } from '../validation.js';

/**
 * Convert each line read from `input`, yielding the results in order.
 */
export async function* convertLines(input: Readable, textCase: TextCase): AsyncGenerator<string> {
    const rl = createInterface({ input, crlfDelay: Infinity });
    for await (const line of rl) {
        yield convertCase(line, textCase);
    }
}

/**
 * `devflow text <mode>`: convert stdin line by line to stdout.
 */
export async function textCommand(mode: string, input: Readable = process.stdin): Promise<void> {
    requireChoice(mode, TEXT_CASES, 'mode');

    for await (const line of convertLines(input, mode)) {
        console.log(line);
    }
}

/**
 * `devflow uuid`: print a random lowercase v4 UUID.
 */
export function uuidCommand(): void {
    console.log(randomUUID().toLowerCase());
}
