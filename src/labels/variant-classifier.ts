import { VCFInfoValue, VCFRecord, VCFSampleCall } from '../parser/vcf-parser.js';
import { countGenotypes } from '../parser/genotype.js';
import { VariantType, VariantZygosity } from '../types/variant.js';
import { InvariantViolationError } from '../utils/errors.js';

const SNP_ALLELES = new Set(['A', 'C', 'G', 'T', 'N', '*']);

export function describeRecord(record: VCFRecord): string {
    return `${record.chrom}:${record.pos} ${record.ref}>${record.alt.join(',') || '.'}`;
}

function isSymbolicAllele(allele: string): boolean {
    return allele.startsWith('<') || allele.includes('[') || allele.includes(']');
}

export function isSnpRecord(record: VCFRecord): boolean {
    if (record.ref.length !== 1 || record.alt.length === 0) return false;
    return record.alt.every(allele => SNP_ALLELES.has(allele.toUpperCase()));
}

/**
 * Symbolic and breakend alleles are structural variants, not indels, and
 * equal-length substitutions of several bases are neither. A record without
 * any ALT is treated as a deletion of REF.
 */
export function isIndelRecord(record: VCFRecord): boolean {
    if (record.alt.some(isSymbolicAllele)) return false;
    if (record.alt.length === 0) return true;
    return record.alt.some(allele => allele.length !== record.ref.length);
}

export function isDeletionRecord(record: VCFRecord): boolean {
    if (record.alt.length > 1 || !isIndelRecord(record)) return false;
    return record.alt.length === 0 || record.ref.length > record.alt[0].length;
}

export function classifyZygosity(record: VCFRecord, isFalsePositive: boolean): VariantZygosity {
    if (isFalsePositive) {
        return VariantZygosity.NO_VARIANT;
    }

    const counts = countGenotypes(record);
    if (counts.het > 0) {
        return VariantZygosity.HETEROZYGOUS;
    }
    if (counts.homAlt > 0) {
        return VariantZygosity.HOMOZYGOUS;
    }
    throw new InvariantViolationError(`Unexpected variant zygosity - ${describeRecord(record)}`);
}

export function classifyVariantType(record: VCFRecord): VariantType {
    if (isSnpRecord(record)) {
        return VariantType.SNP;
    }
    if (isIndelRecord(record)) {
        return isDeletionRecord(record) ? VariantType.DELETION : VariantType.INSERTION;
    }
    throw new InvariantViolationError(`Unexpected variant type - ${describeRecord(record)}`);
}

/**
 * `DP=10;AF=0.5,0.25;DB` style rendering, keys in file order.
 */
export function flattenInfo(info: Map<string, VCFInfoValue>): string {
    const entries: string[] = [];
    for (const [key, value] of info) {
        if (Array.isArray(value)) {
            entries.push(`${key}=${value.join(',')}`);
        } else if (typeof value === 'boolean') {
            entries.push(key);
        } else {
            entries.push(`${key}=${value}`);
        }
    }
    return entries.join(';');
}

export function formatSampleCall(call: VCFSampleCall): string {
    return call.values.map(value => value ?? '.').join(':');
}

export function formatFilter(filter: string[]): string {
    return filter.length > 0 ? filter.join(';') : '.';
}
