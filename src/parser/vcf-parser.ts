import { createReadStream } from 'fs';
import { createGunzip } from 'zlib';
import { Transform, Writable } from 'stream';
import { pipeline } from 'stream/promises';
import { EventEmitter } from 'events';
import { InvariantViolationError } from '../utils/errors.js';

export interface VCFHeader {
    version: string;
    info: Map<string, VCFFieldDefinition>;
    format: Map<string, VCFFieldDefinition>;
    samples: string[];
    meta: string[];
}

export interface VCFFieldDefinition {
    id: string;
    number: string;
    type: string;
    description: string;
}

/**
 * Flags parse to `true`, single-valued fields to their raw text and
 * everything else to the comma-separated list of raw values.
 */
export type VCFInfoValue = string | string[] | boolean;

export interface VCFSampleCall {
    /** Aligned with `VCFRecord.format`; `null` where the value is `.` or absent. */
    values: Array<string | null>;
}

export interface VCFRecord {
    chrom: string;
    pos: number;
    id?: string;
    ref: string;
    alt: string[];
    qual?: number;
    filter: string[];
    info: Map<string, VCFInfoValue>;
    format: string[];
    samples: VCFSampleCall[];
}

export interface VCFParserOptions {
    progressInterval?: number;
}

function emptyHeader(): VCFHeader {
    return {
        version: '',
        info: new Map(),
        format: new Map(),
        samples: [],
        meta: []
    };
}

export class VCFParser extends EventEmitter {
    private header: VCFHeader | null = null;
    private columnsSeen = false;
    private lineNumber = 0;
    private recordCount = 0;
    private readonly progressInterval: number;

    constructor(options: VCFParserOptions = {}) {
        super();
        this.progressInterval = options.progressInterval ?? 1000;
    }

    /**
     * Streams a plain or gzip-compressed VCF file. Resolves once every line
     * has been processed; rejects with the first error thrown by the parser
     * or by a listener.
     */
    async parseFile(filePath: string): Promise<void> {
        let lineBuffer = '';
        const lineTransform = new Transform({
            readableObjectMode: true,
            transform(chunk: Buffer, _encoding, callback) {
                lineBuffer += chunk.toString();
                const lines = lineBuffer.split('\n');

                // Keep the last partial line in the buffer
                lineBuffer = lines.pop() ?? '';

                for (const line of lines) {
                    this.push(line);
                }
                callback();
            },
            flush(callback) {
                if (lineBuffer.length > 0) {
                    this.push(lineBuffer);
                }
                callback();
            }
        });

        const parseSink = new Writable({
            objectMode: true,
            write: (line: string, _encoding, callback) => {
                try {
                    this.processLine(line);
                    callback();
                } catch (error) {
                    callback(error instanceof Error ? error : new Error(String(error)));
                }
            }
        });

        this.emit('start');

        if (filePath.endsWith('.gz')) {
            await pipeline(createReadStream(filePath), createGunzip(), lineTransform, parseSink);
        } else {
            await pipeline(createReadStream(filePath), lineTransform, parseSink);
        }

        this.emit('complete', { totalRecords: this.recordCount });
    }

    /**
     * Parses VCF text already held in memory.
     */
    parseString(text: string): void {
        this.emit('start');
        for (const line of text.split('\n')) {
            this.processLine(line);
        }
        this.emit('complete', { totalRecords: this.recordCount });
    }

    private processLine(rawLine: string): void {
        this.lineNumber++;
        const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;

        if (!line.trim()) {
            return;
        }

        if (line.startsWith('##')) {
            this.parseMetaLine(line);
        } else if (line.startsWith('#CHROM')) {
            this.parseHeaderLine(line);
        } else {
            if (!this.columnsSeen) {
                throw new InvariantViolationError(
                    `VCF data at line ${this.lineNumber} precedes the #CHROM header`, line
                );
            }
            const record = this.parseDataLine(line);
            this.recordCount++;
            this.emit('record', record);

            if (this.recordCount % this.progressInterval === 0) {
                this.emit('progress', {
                    processed: this.recordCount,
                    line: this.lineNumber
                });
            }
        }
    }

    private parseMetaLine(line: string): void {
        if (!this.header) {
            this.header = emptyHeader();
        }

        if (line.startsWith('##fileformat=')) {
            this.header.version = line.substring('##fileformat='.length);
        } else if (line.startsWith('##INFO=')) {
            const info = this.parseFieldDefinition(line);
            if (info) {
                this.header.info.set(info.id, info);
            }
        } else if (line.startsWith('##FORMAT=')) {
            const format = this.parseFieldDefinition(line);
            if (format) {
                this.header.format.set(format.id, format);
            }
        } else {
            this.header.meta.push(line);
        }
    }

    private parseFieldDefinition(line: string): VCFFieldDefinition | null {
        const fields = this.parseStructuredField(line);
        if (!fields?.ID) return null;

        return {
            id: fields.ID,
            number: fields.Number ?? '.',
            type: fields.Type ?? 'String',
            description: fields.Description ?? ''
        };
    }

    private parseStructuredField(line: string): Record<string, string> | null {
        const match = line.match(/<(.+)>/);
        if (!match) return null;

        const content = match[1];
        const fields: Record<string, string> = {};

        let current = '';
        let inQuotes = false;
        let key = '';

        for (const char of content) {
            if (char === '"') {
                inQuotes = !inQuotes;
            } else if (char === '=' && !inQuotes && !key) {
                key = current.trim();
                current = '';
            } else if (char === ',' && !inQuotes) {
                if (key) {
                    fields[key] = current.trim();
                    key = '';
                    current = '';
                }
            } else {
                current += char;
            }
        }

        if (key) {
            fields[key] = current.trim();
        }

        return fields;
    }

    private parseHeaderLine(line: string): void {
        const columns = line.substring(1).split('\t');

        if (!this.header) {
            this.header = emptyHeader();
        }

        this.header.samples = columns.slice(9);
        this.columnsSeen = true;
        this.emit('header', this.header);
    }

    private parseDataLine(line: string): VCFRecord {
        const columns = line.split('\t');

        if (columns.length < 8) {
            throw new InvariantViolationError(
                `Invalid VCF record at line ${this.lineNumber}: insufficient columns`, line
            );
        }

        const pos = Number(columns[1]);
        if (!Number.isInteger(pos)) {
            throw new InvariantViolationError(
                `Invalid VCF record at line ${this.lineNumber}: POS '${columns[1]}' is not an integer`, line
            );
        }

        const record: VCFRecord = {
            chrom: columns[0],
            pos,
            id: columns[2] === '.' ? undefined : columns[2],
            ref: columns[3],
            alt: columns[4] === '.' ? [] : columns[4].split(','),
            qual: columns[5] === '.' ? undefined : parseFloat(columns[5]),
            filter: columns[6] === '.' ? [] : columns[6].split(';'),
            info: this.parseInfo(columns[7]),
            format: columns.length > 8 && columns[8] !== '.' ? columns[8].split(':') : [],
            samples: []
        };

        const sampleCount = this.header?.samples.length ?? 0;
        for (let i = 0; i < sampleCount; i++) {
            record.samples.push({ values: this.parseSampleData(record.format, columns[9 + i]) });
        }

        return record;
    }

    private parseInfo(infoStr: string): Map<string, VCFInfoValue> {
        const info = new Map<string, VCFInfoValue>();
        if (infoStr === '.' || infoStr === '') return info;

        for (const pair of infoStr.split(';')) {
            const eq = pair.indexOf('=');
            if (eq === -1) {
                info.set(pair, true);
            } else {
                const key = pair.substring(0, eq);
                info.set(key, this.parseInfoValue(key, pair.substring(eq + 1)));
            }
        }

        return info;
    }

    private parseInfoValue(key: string, value: string): VCFInfoValue {
        const infoField = this.header?.info.get(key);

        if (infoField && (infoField.number === '0' || infoField.type === 'Flag')) return true;
        if (infoField?.number === '1') return value;

        return value.split(',');
    }

    private parseSampleData(format: string[], sampleData: string | undefined): Array<string | null> {
        const values = sampleData === undefined || sampleData === '.' ? [] : sampleData.split(':');

        return format.map((_field, i) => {
            const value = values[i];
            return value === undefined || value === '.' ? null : value;
        });
    }

    getHeader(): VCFHeader | null {
        return this.header;
    }

    getRecordCount(): number {
        return this.recordCount;
    }
}
