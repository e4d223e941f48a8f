export { VariantZygosity, VariantType } from './variant.js';
export type { Variant, LabelSource, FileRegion } from './variant.js';
export { LabelSourceSchema, FileRegionSchema, describeIssues } from './schemas.js';
export type { ParsedLabelSource, ParsedFileRegion } from './schemas.js';
