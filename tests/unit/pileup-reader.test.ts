/**
 * Unit tests for pileup line parsing and file streaming
 */

import { describe, it, expect } from '@jest/globals';
import path from 'path';
import { parsePileupLine, PileupFileReader, PileupLine } from '../../src/pileup/pileup-reader.js';
import { InvariantViolationError } from '../../src/utils/errors.js';

const PILEUP = path.join(__dirname, '..', 'fixtures', 'two-contigs.pileup');

describe('parsePileupLine', () => {
  it('should convert the position to 0-based', () => {
    expect(parsePileupLine('chr2\t1500\tG\t3\t.,A\tIII', 1)).toEqual({
      contig: 'chr2',
      position: 1499,
      refBase: 'G',
      columns: ['.,A']
    });
  });

  it('should collect the bases of every sample', () => {
    const line = parsePileupLine('chr1\t5\tA\t2\t.,\tII\t1\tT\tI', 1);
    expect(line.columns).toEqual(['.,', 'T']);
  });

  it('should treat an uncovered sample as an empty column', () => {
    const line = parsePileupLine('chr1\t9\tT\t0\t*\t*', 1);
    expect(line.columns).toEqual(['']);
  });

  it('should accept lines without a quality column', () => {
    expect(parsePileupLine('chr1\t3\tC\t1\t,', 1).columns).toEqual([',']);
  });

  it.each([
    ['chr1\t5\tA\t2'],
    ['chr1\tfive\tA\t2\t..\tII'],
    ['chr1\t0\tA\t2\t..\tII'],
    ['chr1\t5\tA\t-2\t..\tII']
  ])('should reject %j', text => {
    expect(() => parsePileupLine(text, 7)).toThrow(InvariantViolationError);
  });

  it('should accept positions up to the largest supported coordinate', () => {
    expect(parsePileupLine('chr1\t2147483648\tA\t1\t.\tI', 1).position).toBe(2_147_483_647);
  });

  it('should reject positions beyond the largest supported coordinate', () => {
    expect(() => parsePileupLine('chr1\t3000000001\tA\t1\t.\tI', 4))
      .toThrow('Invalid pileup line 4: position 3000000001 exceeds the largest supported position 2147483648');
  });

  it('should name the line number', () => {
    expect(() => parsePileupLine('chr1\tfive\tA\t2\t..\tII', 7))
      .toThrow("Invalid pileup line 7: position 'five' is not a positive integer");
  });
});

describe('PileupFileReader', () => {
  it('should stream every line in file order', async () => {
    const reader = new PileupFileReader(PILEUP);
    const lines: PileupLine[] = [];
    for await (const line of reader.lines()) {
      lines.push(line);
    }

    expect(lines).toHaveLength(11);
    expect(lines.map(line => `${line.contig}:${line.position}`)).toEqual([
      'ctg1:0', 'ctg1:1', 'ctg1:2', 'ctg1:3', 'ctg1:4', 'ctg1:5', 'ctg1:7', 'ctg1:8', 'ctg1:9',
      'ctg2:0', 'ctg2:1'
    ]);
    expect(lines[3].columns).toEqual(['T+2AC,t']);
  });

  it('should allow independent and early-terminated iterations', async () => {
    const reader = new PileupFileReader(PILEUP);

    const firstTwo: number[] = [];
    for await (const line of reader.lines()) {
      firstTwo.push(line.position);
      if (firstTwo.length === 2) break;
    }

    let count = 0;
    for await (const _line of reader.lines()) {
      count++;
    }

    expect(firstTwo).toEqual([0, 1]);
    expect(count).toBe(11);
  });
});
