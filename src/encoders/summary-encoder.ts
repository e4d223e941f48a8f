import { FileRegion } from '../types/variant.js';
import { FileRegionSchema, ParsedFileRegion, describeIssues } from '../types/schemas.js';
import { ConfigurationError, InvariantViolationError } from '../utils/errors.js';
import { config } from '../config/index.js';
import { groupReadCalls, ReadCall, tokenizePileupColumn } from '../pileup/grammar.js';
import { PileupFileReader, PileupLine, PileupSource } from '../pileup/pileup-reader.js';
import { CountMatrix, PositionIndex } from './matrix.js';

/**
 * Count channels: forward bases, reverse bases, forward and reverse gaps.
 */
export const SUMMARY_CHANNELS = ['A', 'C', 'G', 'T', 'a', 'c', 'g', 't', '*', '#'] as const;

export type SummaryChannel = typeof SUMMARY_CHANNELS[number];

const CHANNEL_INDEX = new Map<string, number>(SUMMARY_CHANNELS.map((symbol, i) => [symbol, i]));

export interface SummaryEncoderOptions {
    excludeNoCoveragePositions?: boolean;
    normalizeCounts?: boolean;
    /**
     * Opens the pileup behind a region's file path. The default reader
     * streams the file from its start up to the region end; an indexed
     * source can seek to the region instead.
     */
    openSource?: (filePath: string) => PileupSource;
}

export interface EncodeOptions {
    signal?: AbortSignal;
}

export interface SummaryEncoding {
    counts: CountMatrix;
    positions: PositionIndex;
}

type Strand = 'forward' | 'reverse';

function readStrand(read: ReadCall): Strand {
    switch (read.call) {
        case '.':
            return 'forward';
        case ',':
        case '#':
            return 'reverse';
        case '*': {
            // A deleted base carries no case; the insertion after it does.
            const first = read.insertion?.[0];
            return first !== undefined && first !== first.toUpperCase() ? 'reverse' : 'forward';
        }
        default:
            return read.call === read.call.toUpperCase() ? 'forward' : 'reverse';
    }
}

function gapSymbol(strand: Strand): SummaryChannel {
    return strand === 'forward' ? '*' : '#';
}

/**
 * Per-position base counts over a pileup region. A position whose reads
 * carry insertions is expanded into one row for the aligned calls plus one
 * row per inserted base, so the position index pairs each row with its
 * genomic position and a sub-index.
 */
export class SummaryEncoder {
    readonly excludeNoCoveragePositions: boolean;
    readonly normalizeCounts: boolean;
    private readonly openSource: (filePath: string) => PileupSource;

    constructor(options: SummaryEncoderOptions = {}) {
        this.excludeNoCoveragePositions = options.excludeNoCoveragePositions ?? config.encoder.excludeNoCoveragePositions;
        this.normalizeCounts = options.normalizeCounts ?? config.encoder.normalizeCounts;
        this.openSource = options.openSource ?? (filePath => new PileupFileReader(filePath));
    }

    get channelCount(): number {
        return SUMMARY_CHANNELS.length;
    }

    async encode(region: FileRegion, options: EncodeOptions = {}): Promise<SummaryEncoding> {
        const parsed = this.validateRegion(region);
        const rows: Float64Array[] = [];
        const positions: Array<[number, number]> = [];

        const emit = (position: number, positionRows: Float64Array[]): void => {
            positionRows.forEach((row, subIndex) => {
                if (this.excludeNoCoveragePositions && !row.some(count => count > 0)) return;
                rows.push(row);
                positions.push([position, subIndex]);
            });
        };

        let contig = parsed.contig;
        let first: number | null = null;
        let next = parsed.startPos;
        let previous = -1;

        // Positions inside the data span without a line have no reads.
        const fillUncovered = (end: number): void => {
            if (this.excludeNoCoveragePositions) {
                next = Math.max(next, end);
                return;
            }
            for (; next < end; next++) {
                options.signal?.throwIfAborted();
                emit(next, [new Float64Array(SUMMARY_CHANNELS.length)]);
            }
        };

        for await (const line of this.openSource(parsed.filePath).lines()) {
            contig ??= line.contig;
            if (line.contig !== contig) {
                if (first !== null) break;
                continue;
            }
            if (line.position <= previous) {
                throw new InvariantViolationError(
                    `Pileup positions are not ascending at ${line.contig}:${line.position + 1}`
                );
            }
            previous = line.position;

            if (first === null) {
                first = line.position;
                next = Math.max(parsed.startPos, first);
            }

            if (line.position >= parsed.endPos) {
                fillUncovered(parsed.endPos);
                break;
            }
            if (line.position < parsed.startPos) continue;

            fillUncovered(line.position);
            options.signal?.throwIfAborted();
            emit(line.position, this.countPosition(line));
            next = line.position + 1;
        }

        return this.pack(rows, positions);
    }

    private validateRegion(region: FileRegion): ParsedFileRegion {
        const parsed = FileRegionSchema.safeParse(region);
        if (!parsed.success) {
            throw new ConfigurationError(`Invalid pileup region: ${describeIssues(parsed.error)}`);
        }
        return parsed.data;
    }

    private countPosition(line: PileupLine): Float64Array[] {
        const reads = line.columns.flatMap(column => groupReadCalls(tokenizePileupColumn(column), column));
        const longestInsertion = reads.reduce((max, read) => Math.max(max, read.insertion?.length ?? 0), 0);

        const aligned = new Float64Array(SUMMARY_CHANNELS.length);
        for (const read of reads) {
            this.tally(aligned, this.resolveCall(read.call, line.refBase));
        }

        const rows = [aligned];
        for (let offset = 0; offset < longestInsertion; offset++) {
            const inserted = new Float64Array(SUMMARY_CHANNELS.length);
            for (const read of reads) {
                const base = read.insertion?.[offset];
                if (base === undefined || base === '*') {
                    this.tally(inserted, gapSymbol(readStrand(read)));
                } else {
                    this.tally(inserted, base);
                }
            }
            rows.push(inserted);
        }

        return rows;
    }

    private resolveCall(call: string, refBase: string): string {
        if (call === '.') return refBase.toUpperCase();
        if (call === ',') return refBase.toLowerCase();
        return call;
    }

    // N and other ambiguity codes have no channel and are not counted.
    private tally(row: Float64Array, symbol: string): void {
        const channel = CHANNEL_INDEX.get(symbol);
        if (channel !== undefined) {
            row[channel]++;
        }
    }

    private pack(rows: Float64Array[], positions: Array<[number, number]>): SummaryEncoding {
        const width = SUMMARY_CHANNELS.length;
        const counts = new Float32Array(rows.length * width);
        const index = new Int32Array(rows.length * 2);

        rows.forEach((row, out) => {
            const total = row.reduce((sum, count) => sum + count, 0);
            const divisor = this.normalizeCounts && total > 0 ? total : 1;
            for (let channel = 0; channel < width; channel++) {
                counts[out * width + channel] = row[channel] / divisor;
            }
            index[out * 2] = positions[out][0];
            index[out * 2 + 1] = positions[out][1];
        });

        return {
            counts: { shape: [rows.length, width], data: counts },
            positions: { shape: [rows.length, 2], data: index }
        };
    }
}
