export { VCFParser, VCFRecord, VCFHeader, VCFInfoValue, VCFSampleCall } from './parser/vcf-parser.js';
export { parseGenotype, classifyGenotype, countGenotypes, Genotype, GenotypeClass } from './parser/genotype.js';
export { VCFLabelLoader, LabelLoaderIterator, LabelLoadOptions, LabelLoadProgressEvent, SkippedRecord, SkipReason } from './labels/vcf-label-loader.js';
export { tokenizePileupColumn, findInsertions, formatPileupColumn, groupReadCalls, PileupToken, ReadCall } from './pileup/grammar.js';
export { PileupFileReader, PileupSource, PileupLine, parsePileupLine } from './pileup/pileup-reader.js';
export { SummaryEncoder, SummaryEncoderOptions, SummaryEncoding, SUMMARY_CHANNELS } from './encoders/summary-encoder.js';
export { CountMatrix, PositionIndex, Matrix, matrixRow, toNestedArray } from './encoders/matrix.js';
export { VariantZygosity, VariantType, Variant, LabelSource, FileRegion } from './types/index.js';
export { IngestError, ConfigurationError, InvariantViolationError, PileupGrammarError } from './utils/errors.js';
export { LabelLoadProgress } from './utils/progress.js';
export { config } from './config/index.js';
