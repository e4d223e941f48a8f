import { z } from 'zod';

export const LabelSourceSchema = z.object({
    vcf: z.string().min(1, 'VCF path must not be empty'),
    bam: z.string().min(1, 'BAM path must not be empty'),
    isFalsePositive: z.boolean().default(false),
});

/** Largest 0-based position a position index can hold (Int32). */
export const MAX_POSITION = 2 ** 31 - 1;

export const FileRegionSchema = z.object({
    filePath: z.string().min(1, 'pileup path must not be empty'),
    startPos: z.number().int().nonnegative().max(MAX_POSITION),
    endPos: z.number().int().nonnegative().max(MAX_POSITION),
    contig: z.string().min(1).optional(),
}).refine(region => region.startPos <= region.endPos, {
    message: 'startPos must not exceed endPos',
    path: ['endPos'],
});

export type ParsedLabelSource = z.infer<typeof LabelSourceSchema>;
export type ParsedFileRegion = z.infer<typeof FileRegionSchema>;

/**
 * Flattens zod issues into a single line for error messages.
 */
export function describeIssues(error: z.ZodError): string {
    return error.issues
        .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}
