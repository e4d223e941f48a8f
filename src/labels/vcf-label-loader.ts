import chalk from 'chalk';
import { VCFHeader, VCFParser, VCFRecord } from '../parser/vcf-parser.js';
import { countGenotypes } from '../parser/genotype.js';
import { LabelSource, Variant } from '../types/variant.js';
import { LabelSourceSchema, ParsedLabelSource, describeIssues } from '../types/schemas.js';
import { ConfigurationError } from '../utils/errors.js';
import { config } from '../config/index.js';
import {
    classifyVariantType,
    classifyZygosity,
    describeRecord,
    flattenInfo,
    formatFilter,
    formatSampleCall,
    isSnpRecord,
} from './variant-classifier.js';

export type SkipReason = 'not_snp' | 'uncalled' | 'multiallelic';

export interface SkippedRecord {
    vcf: string;
    chrom: string;
    pos: number;
    reason: SkipReason;
    message: string;
}

export interface LabelLoadProgressEvent {
    source: LabelSource;
    sourceIndex: number;
    recordsRead: number;
    done: boolean;
}

export interface LabelLoadOptions {
    /** Emit one label per ALT allele instead of skipping multi-allelic records. */
    splitMultiAllelic?: boolean;
    logSkippedRecords?: boolean;
    onProgress?: (event: LabelLoadProgressEvent) => void;
}

/**
 * Forward-only cursor over a loader. Each call to `VCFLabelLoader.iterator()`
 * starts a new one at index 0.
 */
export class LabelLoaderIterator implements IterableIterator<Variant> {
    private index = 0;

    constructor(private readonly loader: VCFLabelLoader) {}

    next(): IteratorResult<Variant> {
        if (this.index < this.loader.length) {
            return { done: false, value: this.loader.get(this.index++) };
        }
        return { done: true, value: undefined };
    }

    [Symbol.iterator](): LabelLoaderIterator {
        return this;
    }
}

/**
 * Ground-truth labels read from single-sample, bgzipped VCFs. True-positive
 * sources keep the zygosity of their genotype calls; false-positive sources
 * label every site NO_VARIANT.
 */
export class VCFLabelLoader implements Iterable<Variant> {
    private constructor(
        private readonly labels: readonly Variant[],
        readonly skipped: readonly SkippedRecord[]
    ) {
        Object.freeze(this);
    }

    static async load(sources: LabelSource[], options: LabelLoadOptions = {}): Promise<VCFLabelLoader> {
        const validated = validateSources(sources);
        const splitMultiAllelic = options.splitMultiAllelic ?? config.labels.splitMultiAllelic;
        const logSkipped = options.logSkippedRecords ?? config.labels.logSkippedRecords;

        const labels: Variant[] = [];
        const skipped: SkippedRecord[] = [];

        for (let i = 0; i < validated.length; i++) {
            const source = validated[i];
            const parser = new VCFParser({ progressInterval: config.analysis.progressUpdateInterval });
            let headerSeen = false;

            parser.on('header', (header: VCFHeader) => {
                headerSeen = true;
                if (header.samples.length !== 1) {
                    throw new ConfigurationError(
                        `Input vcf file ${source.vcf} must only contain a single sample`,
                        `found ${header.samples.length} samples`
                    );
                }
            });

            parser.on('record', (record: VCFRecord) => {
                const reason = filterRecord(record, splitMultiAllelic);
                if (reason) {
                    const skip: SkippedRecord = {
                        vcf: source.vcf,
                        chrom: record.chrom,
                        pos: record.pos,
                        reason,
                        message: `${describeRecord(record)} is filtered - ${SKIP_MESSAGES[reason]}`
                    };
                    skipped.push(Object.freeze(skip));
                    if (logSkipped) {
                        console.warn(chalk.yellow(skip.message));
                    }
                    return;
                }
                labels.push(...createVariants(record, source));
            });

            parser.on('progress', (progress: { processed: number }) => {
                options.onProgress?.({ source: sources[i], sourceIndex: i, recordsRead: progress.processed, done: false });
            });

            await parser.parseFile(source.vcf);
            if (!headerSeen) {
                throw new ConfigurationError(`Input vcf file ${source.vcf} has no #CHROM header line`);
            }
            options.onProgress?.({ source: sources[i], sourceIndex: i, recordsRead: parser.getRecordCount(), done: true });
        }

        return new VCFLabelLoader(Object.freeze(labels), Object.freeze(skipped));
    }

    get length(): number {
        return this.labels.length;
    }

    get(index: number): Variant {
        if (!Number.isInteger(index) || index < 0 || index >= this.labels.length) {
            throw new RangeError(`Label index ${index} out of range [0, ${this.labels.length})`);
        }
        return this.labels[index];
    }

    at(index: number): Variant | undefined {
        const resolved = index < 0 ? this.labels.length + index : index;
        return Number.isInteger(resolved) && resolved >= 0 && resolved < this.labels.length
            ? this.labels[resolved]
            : undefined;
    }

    iterator(): LabelLoaderIterator {
        return new LabelLoaderIterator(this);
    }

    [Symbol.iterator](): LabelLoaderIterator {
        return this.iterator();
    }

    toArray(): Variant[] {
        return [...this.labels];
    }
}

const SKIP_MESSAGES: Record<SkipReason, string> = {
    not_snp: 'not an SNP record',
    uncalled: 'no samples in this record are called',
    multiallelic: 'multiallele records are not supported'
};

function validateSources(sources: LabelSource[]): ParsedLabelSource[] {
    return sources.map((source, i) => {
        const parsed = LabelSourceSchema.safeParse(source);
        if (!parsed.success) {
            throw new ConfigurationError(`Invalid label source #${i}: ${describeIssues(parsed.error)}`);
        }
        if (!parsed.data.vcf.endsWith('.gz')) {
            throw new ConfigurationError(
                'VCF file needs to be compressed and indexed',
                `${parsed.data.vcf} does not have a .gz extension`
            );
        }
        return parsed.data;
    });
}

function filterRecord(record: VCFRecord, splitMultiAllelic: boolean): SkipReason | null {
    if (!isSnpRecord(record)) {
        return 'not_snp';
    }
    if (countGenotypes(record).called < record.samples.length) {
        return 'uncalled';
    }
    if (!splitMultiAllelic && record.alt.length > 1) {
        return 'multiallelic';
    }
    return null;
}

function createVariants(record: VCFRecord, source: ParsedLabelSource): Variant[] {
    const zygosity = classifyZygosity(record, source.isFalsePositive);
    const type = classifyVariantType(record);
    const info = flattenInfo(record.info);
    const samples = Object.freeze(record.samples.map(formatSampleCall));
    const format = record.format.length > 0 ? record.format.join(':') : undefined;

    return record.alt.map(allele => Object.freeze({
        chrom: record.chrom,
        pos: record.pos,
        id: record.id,
        ref: record.ref,
        allele,
        quality: record.qual,
        filter: formatFilter(record.filter),
        info,
        format,
        samples,
        zygosity,
        type,
        vcf: source.vcf,
        bam: source.bam
    }));
}
