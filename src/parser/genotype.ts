import { VCFRecord } from './vcf-parser.js';

export type GenotypeClass = 'hom_ref' | 'het' | 'hom_alt';

export interface Genotype {
    alleles: string[];
    phased: boolean;
}

/**
 * Splits a GT value such as `0/1` or `1|1`. Returns null for an absent or
 * fully missing genotype (`.`, `./.`, `.|.`).
 */
export function parseGenotype(gt: string | null | undefined): Genotype | null {
    if (!gt) return null;

    const alleles = gt.split(/[/|]/);
    if (alleles.every(allele => allele === '.')) return null;

    return { alleles, phased: gt.includes('|') };
}

/**
 * Same alleles everywhere is homozygous (reference when that allele is 0),
 * anything else heterozygous. A half-missing `./1` counts as heterozygous.
 */
export function classifyGenotype(genotype: Genotype): GenotypeClass {
    const [first, ...rest] = genotype.alleles;
    if (rest.every(allele => allele === first)) {
        return first === '0' ? 'hom_ref' : 'hom_alt';
    }
    return 'het';
}

export interface GenotypeCounts {
    called: number;
    het: number;
    homRef: number;
    homAlt: number;
}

export function countGenotypes(record: VCFRecord): GenotypeCounts {
    const counts: GenotypeCounts = { called: 0, het: 0, homRef: 0, homAlt: 0 };
    const gtIndex = record.format.indexOf('GT');
    if (gtIndex === -1) return counts;

    for (const call of record.samples) {
        const genotype = parseGenotype(call.values[gtIndex]);
        if (!genotype) continue;

        counts.called++;
        switch (classifyGenotype(genotype)) {
            case 'het':
                counts.het++;
                break;
            case 'hom_ref':
                counts.homRef++;
                break;
            case 'hom_alt':
                counts.homAlt++;
                break;
        }
    }

    return counts;
}
