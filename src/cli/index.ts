#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { VCFLabelLoader } from '../labels/vcf-label-loader.js';
import { SummaryEncoder, SUMMARY_CHANNELS } from '../encoders/summary-encoder.js';
import { matrixRow } from '../encoders/matrix.js';
import { LabelLoadProgress } from '../utils/progress.js';
import { ConfigurationError } from '../utils/errors.js';
import { LabelSource } from '../types/variant.js';
import { config } from '../config/index.js';

/**
 * Parses `vcf:bam` or `vcf:bam:fp` label source arguments.
 */
export function parseLabelSource(arg: string): LabelSource {
    const parts = arg.split(':');
    if (parts.length < 2 || parts.length > 3) {
        throw new ConfigurationError(`Label source must be VCF:BAM or VCF:BAM:fp, got '${arg}'`);
    }
    const [vcf, bam, flag] = parts;
    if (flag !== undefined && flag !== 'fp' && flag !== 'tp') {
        throw new ConfigurationError(`Unknown label source flag '${flag}' (expected fp or tp)`);
    }
    return { vcf, bam, isFalsePositive: flag === 'fp' };
}

function parseCoordinate(value: string, name: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
        throw new ConfigurationError(`${name} must be an integer, got '${value}'`);
    }
    return parsed;
}

function fail(error: unknown): never {
    console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
    process.exit(1);
}

const program = new Command();

program
    .name('varcall-ingest')
    .description('Variant label and pileup summary ingestion for variant-calling models')
    .version('1.0.0');

program
    .command('labels')
    .description('Load ground-truth variant labels from bgzipped single-sample VCFs')
    .argument('<sources...>', 'Label sources as VCF:BAM, or VCF:BAM:fp for false-positive examples')
    .option('--split-multiallelic', 'Emit one label per ALT allele instead of skipping multi-allelic records',
        config.labels.splitMultiAllelic)
    .option('--json', 'Print labels as JSON lines')
    .option('-q, --quiet', 'Do not show progress or skipped records')
    .action(async (args: string[], options: { splitMultiallelic: boolean; json?: boolean; quiet?: boolean }) => {
        const sources = args.map(parseLabelSource);
        const progress = options.quiet ? null : new LabelLoadProgress(sources.length);

        try {
            const loader = await VCFLabelLoader.load(sources, {
                splitMultiAllelic: options.splitMultiallelic,
                logSkippedRecords: !options.quiet && config.labels.logSkippedRecords,
                onProgress: event => progress?.update(event)
            });
            progress?.complete(loader.length);

            for (const variant of loader) {
                if (options.json) {
                    console.log(JSON.stringify(variant));
                } else {
                    console.log([
                        variant.chrom, variant.pos, variant.id ?? '.', variant.ref, variant.allele,
                        variant.quality ?? '.', variant.filter, variant.info || '.', variant.format ?? '.',
                        variant.samples.join('\t'), variant.zygosity, variant.type, variant.bam
                    ].join('\t'));
                }
            }

            if (!options.quiet) {
                console.error(chalk.gray(`${loader.length} labels, ${loader.skipped.length} records skipped`));
            }
        } catch (error) {
            progress?.fail(error instanceof Error ? error.message : String(error));
            fail(error);
        }
    });

program
    .command('encode')
    .description('Summarize pileup base counts over a 0-based half-open region')
    .argument('<pileup>', 'samtools mpileup text file (.pileup or .pileup.gz)')
    .requiredOption('-s, --start <position>', 'Region start (0-based, inclusive)')
    .requiredOption('-e, --end <position>', 'Region end (0-based, exclusive)')
    .option('-c, --contig <name>', 'Reference sequence to read (defaults to the first in the file)')
    .option('--keep-no-coverage', 'Emit all-zero rows for positions without reads')
    .option('--raw-counts', 'Do not normalize rows to frequencies')
    .action(async (pileup: string, options: {
        start: string; end: string; contig?: string; keepNoCoverage?: boolean; rawCounts?: boolean;
    }) => {
        try {
            const encoder = new SummaryEncoder({
                excludeNoCoveragePositions: options.keepNoCoverage ? false : config.encoder.excludeNoCoveragePositions,
                normalizeCounts: options.rawCounts ? false : config.encoder.normalizeCounts
            });
            const { counts, positions } = await encoder.encode({
                filePath: pileup,
                startPos: parseCoordinate(options.start, 'start'),
                endPos: parseCoordinate(options.end, 'end'),
                contig: options.contig
            });

            console.log(['position', 'sub_index', ...SUMMARY_CHANNELS].join('\t'));
            for (let row = 0; row < counts.shape[0]; row++) {
                const values = matrixRow(counts, row).map(value => Number(value.toFixed(4)));
                console.log([...matrixRow(positions, row), ...values].join('\t'));
            }
        } catch (error) {
            fail(error);
        }
    });

if (require.main === module) {
    program.parseAsync(process.argv).catch(fail);
}
