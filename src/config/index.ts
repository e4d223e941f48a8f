import * as dotenv from 'dotenv';

dotenv.config();

interface Config {
    labels: {
        splitMultiAllelic: boolean;
        logSkippedRecords: boolean;
    };
    encoder: {
        excludeNoCoveragePositions: boolean;
        normalizeCounts: boolean;
    };
    analysis: {
        progressUpdateInterval: number;
    };
}

function parseFlag(value: string | undefined, fallback: boolean): boolean {
    if (value === undefined || value.trim() === '') return fallback;
    return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

export const config: Config = {
    labels: {
        splitMultiAllelic: parseFlag(process.env.SPLIT_MULTIALLELIC, false),
        logSkippedRecords: parseFlag(process.env.LOG_SKIPPED_RECORDS, true),
    },
    encoder: {
        excludeNoCoveragePositions: parseFlag(process.env.EXCLUDE_NO_COVERAGE_POSITIONS, true),
        normalizeCounts: parseFlag(process.env.NORMALIZE_COUNTS, true),
    },
    analysis: {
        progressUpdateInterval: Math.max(1, parseInt(process.env.PROGRESS_UPDATE_INTERVAL || '1000') || 1000),
    },
};
