/**
 * Single-line scan status for the terminal, throttled to one redraw per interval.
 */

import type { ScanProgress } from './discover.js';

const SPINNER = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

export interface StatusStream {
    write(chunk: string): boolean;
}

export class ScanProgressReporter {
    private readonly startedAt: number;
    private lastDrawAt: number;
    private latest: ScanProgress = { scanned: 0, matched: 0 };
    private frame = 0;

    constructor(
        private readonly stream: StatusStream,
        private readonly intervalMs: number = 250,
        private readonly now: () => number = Date.now,
    ) {
        this.startedAt = now();
        this.lastDrawAt = this.startedAt;
    }

    update(progress: ScanProgress): void {
        this.latest = progress;
        const t = this.now();
        if (t - this.lastDrawAt < this.intervalMs) return;

        this.lastDrawAt = t;
        const spinner = SPINNER[this.frame++ % SPINNER.length];
        this.stream.write(
            `\r\x1b[2K${spinner} Scanning files: ${progress.scanned} scanned, ${progress.matched} matched (${this.rate(t).toFixed(1)} files/sec)`,
        );
    }

    /** Clear the status line and print the summary. Returns the summary text. */
    finish(): string {
        const t = this.now();
        const elapsed = (t - this.startedAt) / 1000;
        const summary = `✓ Scan complete: ${this.latest.scanned} files scanned, ${this.latest.matched} files matched in ${elapsed.toFixed(1)}s (${this.rate(t).toFixed(1)} files/sec)`;
        this.stream.write(`\r\x1b[2K${summary}\n`);
        return summary;
    }

    private rate(t: number): number {
        const elapsed = (t - this.startedAt) / 1000;
        return elapsed > 0 ? this.latest.scanned / elapsed : 0;
    }
}
