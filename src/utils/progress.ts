/**
 * Progress display for the terminal
 */

import chalk from 'chalk';
import type { OutputStream, ProgressSink } from '../core/types.js';

function writeLine(line: string, stream: OutputStream): void {
  if (stream === 'stderr') {
    console.error(line);
  } else {
    console.log(line);
  }
}

export interface SilentProgressOptions {
  /** Print lines to the console (default true) */
  echo?: boolean;
  /** Keep every printed line in `lines` (default false) */
  record?: boolean;
}

/**
 * Prints result lines only; used with --no-progress-bar, when stderr is not
 * a terminal, and in tests
 */
export class SilentProgress implements ProgressSink {
  readonly lines: string[] = [];
  private readonly echo: boolean;
  private readonly record: boolean;

  constructor(options: SilentProgressOptions = {}) {
    this.echo = options.echo ?? true;
    this.record = options.record ?? false;
  }

  start(): void {}

  advance(): void {}

  setThroughput(): void {}

  println(line: string, stream: OutputStream = 'stdout'): void {
    if (this.record) {
      this.lines.push(line);
    }
    if (this.echo) {
      writeLine(line, stream);
    }
  }

  finish(): void {}
}

export interface ConsoleProgressOptions {
  /** Redraw every `drawDelta` completed probes */
  drawDelta?: number;
  stream?: NodeJS.WriteStream;
}

/**
 * Single status line on stderr, redrawn in place. Result lines go to stdout
 * after the status line has been cleared.
 */
export class ConsoleProgress implements ProgressSink {
  private readonly drawDelta: number;
  private readonly stream: NodeJS.WriteStream;
  private total = 0;
  private current = 0;
  private throughput = 'warming up...';
  private startedAt = Date.now();
  private drawn = false;

  constructor(options: ConsoleProgressOptions = {}) {
    this.drawDelta = options.drawDelta ?? 100;
    this.stream = options.stream ?? process.stderr;
  }

  start(total: number): void {
    this.total = total;
    this.current = 0;
    this.startedAt = Date.now();
    this.draw();
  }

  advance(): void {
    this.current++;
    if (this.current % this.drawDelta === 0 || this.current === this.total) {
      this.draw();
    }
  }

  setThroughput(label: string): void {
    this.throughput = label;
  }

  println(line: string, stream: OutputStream = 'stdout'): void {
    this.clear();
    writeLine(line, stream);
    this.draw();
  }

  finish(): void {
    this.draw();
    if (this.drawn) {
      this.stream.write('\n');
      this.drawn = false;
    }
  }

  private clear(): void {
    if (this.drawn && this.stream.isTTY) {
      this.stream.clearLine(0);
      this.stream.cursorTo(0);
    }
  }

  private draw(): void {
    if (!this.stream.isTTY) return;

    const width = 40;
    const ratio = this.total > 0 ? Math.min(this.current / this.total, 1) : 0;
    const filled = Math.round(ratio * width);
    const bar = chalk.red('#'.repeat(filled)) + chalk.gray('-'.repeat(width - filled));
    const elapsed = formatElapsed(Date.now() - this.startedAt);

    this.clear();
    this.stream.write(
      `${chalk.cyan('⠿')} [${elapsed}] ${bar} ${String(this.current).padStart(7)}/${String(this.total).padEnd(7)} req/s: ${this.throughput}`
    );
    this.drawn = true;
  }
}

/**
 * hh:mm:ss
 */
export function formatElapsed(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return [hours, minutes, seconds].map((n) => String(n).padStart(2, '0')).join(':');
}
