/**
 * Variant label domain model
 */

export enum VariantZygosity {
    NO_VARIANT = 'no_variant',
    HETEROZYGOUS = 'heterozygous',
    HOMOZYGOUS = 'homozygous',
}

export enum VariantType {
    SNP = 'snp',
    INSERTION = 'insertion',
    DELETION = 'deletion',
}

/**
 * One alternate allele at one site for one sample, together with the
 * VCF/BAM pair it was read from.
 */
export interface Variant {
    readonly chrom: string;
    /** 1-based, as written in the VCF. */
    readonly pos: number;
    readonly id?: string;
    readonly ref: string;
    readonly allele: string;
    readonly quality?: number;
    readonly filter: string;
    readonly info: string;
    readonly format?: string;
    readonly samples: readonly string[];
    readonly zygosity: VariantZygosity;
    readonly type: VariantType;
    readonly vcf: string;
    readonly bam: string;
}

export interface LabelSource {
    vcf: string;
    bam: string;
    isFalsePositive?: boolean;
}

/**
 * Half-open [startPos, endPos) query over a pileup file, 0-based.
 */
export interface FileRegion {
    filePath: string;
    startPos: number;
    endPos: number;
    contig?: string;
}
