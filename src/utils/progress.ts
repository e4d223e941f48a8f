import { MultiBar, Presets, SingleBar } from 'cli-progress';
import chalk from 'chalk';
import path from 'path';
import { LabelLoadProgressEvent } from '../labels/vcf-label-loader.js';

interface BarStats {
    startTime: number;
    records: number;
}

/**
 * Terminal progress for a label load: one bar over the VCF sources, with the
 * record count of the file being read.
 */
export class LabelLoadProgress {
    private readonly multiBar: MultiBar;
    private readonly bar: SingleBar;
    private readonly stats: BarStats = { startTime: Date.now(), records: 0 };

    constructor(totalSources: number) {
        this.multiBar = new MultiBar({
            clearOnComplete: false,
            hideCursor: true,
            format: ` ${chalk.cyan('{status}')} {bar} | {value}/{total} files | {records} records | Rate: {rate}`,
            barCompleteChar: '█',
            barIncompleteChar: '░',
        }, Presets.shades_grey);

        this.bar = this.multiBar.create(totalSources, 0, {
            status: 'Loading labels',
            records: 0,
            rate: '0/s'
        });
    }

    update(event: LabelLoadProgressEvent): void {
        const elapsed = (Date.now() - this.stats.startTime) / 1000;
        const records = this.stats.records + event.recordsRead;
        if (event.done) {
            this.stats.records = records;
        }

        this.bar.update(event.sourceIndex + (event.done ? 1 : 0), {
            status: path.basename(event.source.vcf),
            records,
            rate: elapsed > 0 ? `${Math.round(records / elapsed)}/s` : '0/s'
        });
    }

    complete(labelCount: number): void {
        this.bar.update(this.bar.getTotal(), {
            status: chalk.green(`Loaded ${labelCount} labels`)
        });
        this.multiBar.stop();
    }

    fail(message: string): void {
        this.bar.update({ status: chalk.red(`Failed: ${message}`) });
        this.multiBar.stop();
    }
}
