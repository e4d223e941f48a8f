import { createReadStream, existsSync } from 'fs';
import { createGunzip } from 'zlib';
import { createInterface } from 'readline';
import { Readable } from 'stream';
import { ConfigurationError, InvariantViolationError } from '../utils/errors.js';
import { MAX_POSITION } from '../types/schemas.js';

export interface PileupLine {
    contig: string;
    /** 0-based; the file's 1-based column minus one. */
    position: number;
    refBase: string;
    /** Read-base column of every sample on the line. */
    columns: string[];
}

/**
 * Anything that can yield pileup lines in file order.
 */
export interface PileupSource {
    lines(): AsyncIterable<PileupLine>;
}

/**
 * Parses one `samtools mpileup` line:
 * contig, 1-based position, reference base, then (depth, bases, qualities)
 * for each sample.
 */
export function parsePileupLine(text: string, lineNumber: number): PileupLine {
    const fields = text.split('\t');

    if (fields.length < 5) {
        throw new InvariantViolationError(
            `Invalid pileup line ${lineNumber}: expected contig, position, reference and per-sample columns`,
            text
        );
    }

    const filePosition = Number(fields[1]);
    if (!Number.isInteger(filePosition) || filePosition < 1) {
        throw new InvariantViolationError(
            `Invalid pileup line ${lineNumber}: position '${fields[1]}' is not a positive integer`, text
        );
    }
    if (filePosition - 1 > MAX_POSITION) {
        throw new InvariantViolationError(
            `Invalid pileup line ${lineNumber}: position ${filePosition} exceeds the largest supported position ${MAX_POSITION + 1}`,
            text
        );
    }

    const columns: string[] = [];
    for (let i = 3; i + 1 < fields.length; i += 3) {
        const sampleDepth = Number(fields[i]);
        if (!Number.isInteger(sampleDepth) || sampleDepth < 0) {
            throw new InvariantViolationError(
                `Invalid pileup line ${lineNumber}: depth '${fields[i]}' is not a count`, text
            );
        }
        // samtools prints `*` for the bases of an uncovered sample
        columns.push(sampleDepth === 0 ? '' : fields[i + 1]);
    }

    return {
        contig: fields[0],
        position: filePosition - 1,
        refBase: fields[2],
        columns
    };
}

/**
 * Streams a plain or gzip-compressed pileup file. Every call to `lines()`
 * opens its own handle, and stopping iteration early closes it.
 */
export class PileupFileReader implements PileupSource {
    constructor(private readonly filePath: string) {}

    async *lines(): AsyncGenerator<PileupLine> {
        if (!existsSync(this.filePath)) {
            throw new ConfigurationError(`Pileup file not found: ${this.filePath}`);
        }

        const fileStream = createReadStream(this.filePath);
        let input: Readable = fileStream;
        if (this.filePath.endsWith('.gz')) {
            const gunzip = createGunzip();
            fileStream.on('error', error => gunzip.destroy(error));
            input = fileStream.pipe(gunzip);
        }

        const reader = createInterface({ input, crlfDelay: Infinity });
        let lineNumber = 0;

        try {
            for await (const text of reader) {
                lineNumber++;
                if (!text.trim() || text.startsWith('#')) continue;
                yield parsePileupLine(text, lineNumber);
            }
        } finally {
            reader.close();
            fileStream.destroy();
            if (input !== fileStream) {
                input.destroy();
            }
        }
    }
}
