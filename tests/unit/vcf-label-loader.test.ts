/**
 * Unit tests for the VCF label loader
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, jest } from '@jest/globals';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { gzipSync } from 'zlib';
import os from 'os';
import path from 'path';
import { VCFLabelLoader } from '../../src/labels/vcf-label-loader.js';
import { VariantType, VariantZygosity } from '../../src/types/variant.js';
import { ConfigurationError, InvariantViolationError } from '../../src/utils/errors.js';

const HEADER = [
  '##fileformat=VCFv4.2',
  '##INFO=<ID=DP,Number=1,Type=Integer,Description="Total Depth">',
  '##INFO=<ID=AF,Number=A,Type=Float,Description="Allele Frequency">',
  '##INFO=<ID=DB,Number=0,Type=Flag,Description="dbSNP membership">',
  '##FORMAT=<ID=GT,Number=1,Type=String,Description="Genotype">',
  '##FORMAT=<ID=GQ,Number=1,Type=Integer,Description="Genotype Quality">',
  '##FORMAT=<ID=AD,Number=R,Type=Integer,Description="Allelic depths">'
];

const columns = (samples: string[]) =>
  ['#CHROM', 'POS', 'ID', 'REF', 'ALT', 'QUAL', 'FILTER', 'INFO', 'FORMAT', ...samples].join('\t');

const TRUTH_RECORDS = [
  'chr1\t100\trs1\tA\tG\t50\tPASS\tDP=30;AF=0.5;DB\tGT:GQ:AD\t0/1:99:15,15',
  'chr1\t200\t.\tC\tT\t40.5\t.\tDP=20\tGT:GQ\t1/1:60',
  'chr1\t300\t.\tAT\tA\t30\tPASS\tDP=10\tGT\t0/1',
  'chr1\t400\t.\tG\tA\t30\tPASS\tDP=12\tGT:GQ\t./.:.',
  'chr1\t500\t.\tT\tC,G\t30\tPASS\tDP=14;AF=0.3,0.2\tGT\t1/2',
  'chr1\t600\t.\tG\tC\t.\tq10;lowDP\t.\tGT:GQ:AD\t1|0:.',
  'chr1\t700\t.\tA\t<DEL>\t30\tPASS\tDP=9\tGT\t0/1'
];

const vcfText = (samples: string[], records: string[]) =>
  [...HEADER, columns(samples), ...records].join('\n') + '\n';

describe('VCFLabelLoader', () => {
  let dir: string;
  let truthVcf: string;
  let multiSampleVcf: string;
  let noSampleVcf: string;
  let homRefVcf: string;
  let noColumnsVcf: string;
  let metaOnlyVcf: string;

  const writeVcf = (name: string, text: string): string => {
    const filePath = path.join(dir, name);
    writeFileSync(filePath, gzipSync(text));
    return filePath;
  };

  beforeAll(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'labels-'));
    truthVcf = writeVcf('truth.vcf.gz', vcfText(['HG_TEST'], TRUTH_RECORDS));
    multiSampleVcf = writeVcf('trio.vcf.gz', vcfText(['S1', 'S2'], ['chr1\t100\t.\tA\tG\t50\tPASS\t.\tGT\t0/1\t0/0']));
    noSampleVcf = writeVcf('sites.vcf.gz', [...HEADER, columns([]).replace('\tFORMAT', ''), 'chr1\t100\t.\tA\tG\t50\tPASS\t.'].join('\n'));
    noColumnsVcf = writeVcf('nocolumns.vcf.gz', '##fileformat=VCFv4.2\nchr1\t100\t.\tA\tG\t50\tPASS\t.\tGT\t0/1\n');
    metaOnlyVcf = writeVcf('metaonly.vcf.gz', '##fileformat=VCFv4.2\n');
    homRefVcf = writeVcf('homref.vcf.gz', vcfText(['HG_TEST'], ['chr1\t800\t.\tT\tA\t20\tPASS\tDP=5\tGT\t0/0']));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('Label Parsing', () => {
    it('should echo the fields of records that pass all filters', async () => {
      const loader = await VCFLabelLoader.load([{ vcf: truthVcf, bam: 'reads.bam' }]);

      expect(loader.length).toBe(3);
      expect(loader.get(0)).toEqual({
        chrom: 'chr1',
        pos: 100,
        id: 'rs1',
        ref: 'A',
        allele: 'G',
        quality: 50,
        filter: 'PASS',
        info: 'DP=30;AF=0.5;DB',
        format: 'GT:GQ:AD',
        samples: ['0/1:99:15,15'],
        zygosity: VariantZygosity.HETEROZYGOUS,
        type: VariantType.SNP,
        vcf: truthVcf,
        bam: 'reads.bam'
      });
    });

    it('should classify homozygous calls and keep missing values', async () => {
      const loader = await VCFLabelLoader.load([{ vcf: truthVcf, bam: 'reads.bam' }]);

      expect(loader.get(1)).toMatchObject({
        pos: 200,
        id: undefined,
        quality: 40.5,
        filter: '.',
        info: 'DP=20',
        samples: ['1/1:60'],
        zygosity: VariantZygosity.HOMOZYGOUS
      });
      expect(loader.get(2)).toMatchObject({
        pos: 600,
        quality: undefined,
        filter: 'q10;lowDP',
        info: '',
        samples: ['1|0:.:.'],
        zygosity: VariantZygosity.HETEROZYGOUS
      });
    });

    it('should skip and report filtered records', async () => {
      const loader = await VCFLabelLoader.load([{ vcf: truthVcf, bam: 'reads.bam' }]);

      expect(loader.skipped.map(skip => [skip.pos, skip.reason])).toEqual([
        [300, 'not_snp'],
        [400, 'uncalled'],
        [500, 'multiallelic'],
        [700, 'not_snp']
      ]);
      expect(loader.skipped[2].message).toBe('chr1:500 T>C,G is filtered - multiallele records are not supported');
      expect(console.warn).toHaveBeenCalledTimes(4);
      expect(console.warn).toHaveBeenCalledWith(
        expect.stringContaining('chr1:300 AT>A is filtered - not an SNP record')
      );
    });

    it('should not log skipped records when disabled', async () => {
      await VCFLabelLoader.load([{ vcf: truthVcf, bam: 'reads.bam' }], { logSkippedRecords: false });
      expect(console.warn).not.toHaveBeenCalled();
    });

    it('should label every site of a false-positive source NO_VARIANT', async () => {
      const loader = await VCFLabelLoader.load([{ vcf: truthVcf, bam: 'fp.bam', isFalsePositive: true }]);

      expect(loader.length).toBe(3);
      for (const variant of loader) {
        expect(variant.zygosity).toBe(VariantZygosity.NO_VARIANT);
        expect(variant.bam).toBe('fp.bam');
      }
    });

    it('should split multi-allelic records when enabled', async () => {
      const loader = await VCFLabelLoader.load([{ vcf: truthVcf, bam: 'reads.bam' }], { splitMultiAllelic: true });

      expect(loader.toArray().map(variant => `${variant.pos}${variant.allele}`))
        .toEqual(['100G', '200T', '500C', '500G', '600C']);
      expect(loader.get(2)).toMatchObject({ info: 'DP=14;AF=0.3,0.2', samples: ['1/2'] });
      expect(loader.get(3).zygosity).toBe(VariantZygosity.HETEROZYGOUS);
      expect(loader.skipped.map(skip => skip.reason)).toEqual(['not_snp', 'uncalled', 'not_snp']);
    });

    it('should concatenate sources in order', async () => {
      const loader = await VCFLabelLoader.load([
        { vcf: truthVcf, bam: 'tp.bam' },
        { vcf: truthVcf, bam: 'fp.bam', isFalsePositive: true }
      ]);

      expect(loader.length).toBe(6);
      expect(loader.toArray().map(variant => variant.bam)).toEqual(['tp.bam', 'tp.bam', 'tp.bam', 'fp.bam', 'fp.bam', 'fp.bam']);
    });

    it('should report progress once per completed source', async () => {
      const onProgress = jest.fn();
      const source = { vcf: truthVcf, bam: 'reads.bam' };
      await VCFLabelLoader.load([source], { onProgress });

      expect(onProgress).toHaveBeenCalledTimes(1);
      expect(onProgress).toHaveBeenCalledWith({ source, sourceIndex: 0, recordsRead: 7, done: true });
    });
  });

  describe('Sequence Access', () => {
    let loader: VCFLabelLoader;

    beforeAll(async () => {
      loader = await VCFLabelLoader.load([{ vcf: truthVcf, bam: 'reads.bam' }]);
    });

    it('should index labels', () => {
      expect(loader.get(2).pos).toBe(600);
      expect(loader.at(-1)?.pos).toBe(600);
      expect(loader.at(-3)?.pos).toBe(100);
      expect(loader.at(3)).toBeUndefined();
      expect(() => loader.get(3)).toThrow(RangeError);
      expect(() => loader.get(-1)).toThrow(RangeError);
    });

    it('should iterate until exhausted', () => {
      const iterator = loader.iterator();
      expect(iterator.next().value?.pos).toBe(100);
      expect(iterator.next().value?.pos).toBe(200);
      expect(iterator.next().value?.pos).toBe(600);
      expect(iterator.next().done).toBe(true);
      expect(iterator.next().done).toBe(true);
    });

    it('should start each iterator from the beginning', () => {
      const first = loader.iterator();
      first.next();
      first.next();

      expect([...loader].map(variant => variant.pos)).toEqual([100, 200, 600]);
      expect(loader.iterator().next().value?.pos).toBe(100);
    });

    it('should not allow labels to change', () => {
      expect(Object.isFrozen(loader)).toBe(true);
      expect(Object.isFrozen(loader.get(0))).toBe(true);
      expect(Object.isFrozen(loader.get(0).samples)).toBe(true);

      const copy = loader.toArray();
      copy.pop();
      expect(loader.length).toBe(3);
    });
  });

  describe('Error Handling', () => {
    it('should require compressed VCFs before reading any file', async () => {
      const onProgress = jest.fn();
      await expect(VCFLabelLoader.load([
        { vcf: truthVcf, bam: 'reads.bam' },
        { vcf: path.join(dir, 'calls.vcf'), bam: 'reads.bam' }
      ], { onProgress })).rejects.toThrow('VCF file needs to be compressed and indexed');
      expect(onProgress).not.toHaveBeenCalled();
    });

    it.each([
      [{ vcf: '', bam: 'reads.bam' }],
      [{ vcf: 'calls.vcf.gz', bam: '' }]
    ])('should reject source %j', async source => {
      await expect(VCFLabelLoader.load([source])).rejects.toBeInstanceOf(ConfigurationError);
    });

    it('should reject VCFs with more than one sample', async () => {
      await expect(VCFLabelLoader.load([{ vcf: multiSampleVcf, bam: 'reads.bam' }]))
        .rejects.toThrow(`Input vcf file ${multiSampleVcf} must only contain a single sample`);
    });

    it('should reject VCFs without samples', async () => {
      await expect(VCFLabelLoader.load([{ vcf: noSampleVcf, bam: 'reads.bam' }]))
        .rejects.toBeInstanceOf(ConfigurationError);
    });

    it('should reject records that precede the #CHROM line', async () => {
      const result = VCFLabelLoader.load([{ vcf: noColumnsVcf, bam: 'fp.bam', isFalsePositive: true }]);
      await expect(result).rejects.toBeInstanceOf(InvariantViolationError);
      await expect(result).rejects.toThrow('VCF data at line 2 precedes the #CHROM header');
    });

    it('should reject VCFs without a #CHROM line', async () => {
      await expect(VCFLabelLoader.load([{ vcf: metaOnlyVcf, bam: 'reads.bam' }]))
        .rejects.toMatchObject({
          name: 'ConfigurationError',
          message: `Input vcf file ${metaOnlyVcf} has no #CHROM header line`
        });
    });

    it('should stop the batch at the first fatal source', async () => {
      const onProgress = jest.fn();
      await expect(VCFLabelLoader.load([
        { vcf: multiSampleVcf, bam: 'reads.bam' },
        { vcf: truthVcf, bam: 'reads.bam' }
      ], { onProgress })).rejects.toBeInstanceOf(ConfigurationError);
      expect(onProgress).not.toHaveBeenCalled();
    });

    it('should fail on records with no variant genotype', async () => {
      await expect(VCFLabelLoader.load([{ vcf: homRefVcf, bam: 'reads.bam' }]))
        .rejects.toBeInstanceOf(InvariantViolationError);
    });
  });
});
