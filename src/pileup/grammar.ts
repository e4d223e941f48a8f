/**
 * Tokenizer for the read-base column of samtools-style pileup text.
 *
 * A column is a run of per-read calls:
 *   - `A C G T N` forward-strand base, `a c g t n` reverse-strand base
 *   - `.` / `,` match to the reference on the forward / reverse strand
 *   - `*` deletion placeholder, `#` reverse-strand deletion placeholder
 *   - `+<N><seq>` insertion of N bases after the preceding call
 *   - `-<N><seq>` deletion of the N following reference bases
 *   - `^<q>` start of a read (q is its mapping quality), `$` end of a read
 */

import { PileupGrammarError } from '../utils/errors.js';

export type PileupToken =
    | { kind: 'base'; call: string }
    | { kind: 'insertion'; sequence: string; followsDeletion: boolean }
    | { kind: 'deletion'; sequence: string }
    | { kind: 'readStart'; mappingQuality: string }
    | { kind: 'readEnd' };

/**
 * One read's contribution to a column: its base call and any insertion
 * that follows it.
 */
export interface ReadCall {
    call: string;
    insertion?: string;
}

const BASE_CALLS = new Set(['A', 'C', 'G', 'T', 'N', 'a', 'c', 'g', 't', 'n', '.', ',', '*', '#']);

// `#` never appears inside a run; `*` pads inserted sequences.
const RUN_SEQUENCE = /^[A-Za-z*]*$/;

function isDigit(char: string): boolean {
    return char >= '0' && char <= '9';
}

export function tokenizePileupColumn(column: string): PileupToken[] {
    const tokens: PileupToken[] = [];
    let lastCall: string | null = null;
    let i = 0;

    while (i < column.length) {
        const char = column[i];

        if (char === '^') {
            if (i + 1 >= column.length) {
                throw new PileupGrammarError('Read start marker without mapping quality', column, i);
            }
            tokens.push({ kind: 'readStart', mappingQuality: column[i + 1] });
            i += 2;
        } else if (char === '$') {
            tokens.push({ kind: 'readEnd' });
            i++;
        } else if (char === '+' || char === '-') {
            let digitsEnd = i + 1;
            while (digitsEnd < column.length && isDigit(column[digitsEnd])) {
                digitsEnd++;
            }
            if (digitsEnd === i + 1) {
                throw new PileupGrammarError(`'${char}' is not followed by a run length`, column, i);
            }

            const runLength = parseInt(column.slice(i + 1, digitsEnd), 10);
            if (runLength === 0) {
                throw new PileupGrammarError('Zero-length indel run', column, i);
            }
            if (digitsEnd + runLength > column.length) {
                throw new PileupGrammarError(
                    `Run of ${runLength} bases runs past the end of the column`, column, i
                );
            }

            const sequence = column.slice(digitsEnd, digitsEnd + runLength);
            if (!RUN_SEQUENCE.test(sequence)) {
                throw new PileupGrammarError(`Invalid run sequence '${sequence}'`, column, digitsEnd);
            }

            if (char === '+') {
                tokens.push({ kind: 'insertion', sequence, followsDeletion: lastCall === '*' });
            } else {
                tokens.push({ kind: 'deletion', sequence });
            }
            i = digitsEnd + runLength;
        } else if (BASE_CALLS.has(char)) {
            tokens.push({ kind: 'base', call: char });
            lastCall = char;
            i++;
        } else {
            throw new PileupGrammarError(`Unexpected character '${char}'`, column, i);
        }
    }

    return tokens;
}

/**
 * Inserted sequences in order of occurrence, and for each whether the call it
 * is anchored to is a `*` deletion placeholder.
 */
export function findInsertions(column: string): [string[], boolean[]] {
    const insertions: string[] = [];
    const followsDeletion: boolean[] = [];

    for (const token of tokenizePileupColumn(column)) {
        if (token.kind === 'insertion') {
            insertions.push(token.sequence);
            followsDeletion.push(token.followsDeletion);
        }
    }

    return [insertions, followsDeletion];
}

export function formatPileupColumn(tokens: readonly PileupToken[]): string {
    return tokens.map(token => {
        switch (token.kind) {
            case 'base':
                return token.call;
            case 'insertion':
                return `+${token.sequence.length}${token.sequence}`;
            case 'deletion':
                return `-${token.sequence.length}${token.sequence}`;
            case 'readStart':
                return `^${token.mappingQuality}`;
            case 'readEnd':
                return '$';
        }
    }).join('');
}

/**
 * Attaches each insertion to the base call before it. Deletion runs and read
 * boundary markers carry no per-read count and are dropped.
 */
export function groupReadCalls(tokens: readonly PileupToken[], column: string): ReadCall[] {
    const reads: ReadCall[] = [];

    for (const token of tokens) {
        if (token.kind === 'base') {
            reads.push({ call: token.call });
        } else if (token.kind === 'insertion') {
            const anchor = reads[reads.length - 1];
            if (!anchor) {
                throw new PileupGrammarError('Insertion without a preceding base call', column, 0);
            }
            if (anchor.insertion !== undefined) {
                throw new PileupGrammarError('Two insertions follow one base call', column, 0);
            }
            anchor.insertion = token.sequence;
        }
    }

    return reads;
}
