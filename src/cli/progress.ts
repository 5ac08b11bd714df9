/**
 * @fileoverview Progress indicators and terminal formatting for CLI commands
 *
 * Spinners and progress bars draw on stderr so that stdout carries only the
 * command's output.
 */

import cliProgress from 'cli-progress';

const SPINNER_FRAMES = ['|', '/', '-', '\\'];
const SPINNER_INTERVAL_MS = 100;

export interface SpinnerHandle {
  update(message: string): void;
  succeed(message?: string): void;
  fail(message?: string): void;
  stop(): void;
}

/**
 * A no-op handle when stderr is not a terminal.
 */
export function createSpinner(initialMessage: string, stream: NodeJS.WriteStream = process.stderr): SpinnerHandle {
  if (!stream.isTTY) {
    return { update() {}, succeed() {}, fail() {}, stop() {} };
  }

  let frameIndex = 0;
  let message = initialMessage;
  let running = true;

  const render = (): void => {
    if (!running) return;
    const frame = SPINNER_FRAMES[frameIndex % SPINNER_FRAMES.length] ?? '-';
    stream.write(`\r${frame} ${message}`);
    frameIndex++;
  };

  const clearLine = (): void => {
    stream.write('\r' + ' '.repeat(message.length + 4) + '\r');
  };

  const intervalId = setInterval(render, SPINNER_INTERVAL_MS);
  render();

  const finish = (label: string | null, finalMessage?: string): void => {
    running = false;
    clearInterval(intervalId);
    clearLine();
    if (label) stream.write(`[${label}] ${finalMessage || message}\n`);
  };

  return {
    update(newMessage: string): void {
      clearLine();
      message = newMessage;
      render();
    },
    succeed(finalMessage?: string): void {
      finish('OK', finalMessage);
    },
    fail(finalMessage?: string): void {
      finish('FAIL', finalMessage);
    },
    stop(): void {
      finish(null);
    },
  };
}

export interface ProgressBarHandle {
  increment(delta?: number, payload?: Record<string, unknown>): void;
  stop(): void;
}

export interface ProgressBarOptions {
  total: number;
  format?: string;
  etaBuffer?: number;
}

export function createProgressBar(options: ProgressBarOptions): ProgressBarHandle {
  const { total, etaBuffer = 10 } = options;
  const format = options.format || '{bar} {percentage}% | {value}/{total} | {task} | ETA: {eta_formatted}';

  const bar = new cliProgress.SingleBar(
    {
      format,
      barCompleteChar: '=',
      barIncompleteChar: '-',
      hideCursor: true,
      clearOnComplete: false,
      stopOnComplete: true,
      etaBuffer,
      stream: process.stderr,
    },
    cliProgress.Presets.shades_classic,
  );

  bar.start(total, 0, { task: 'Starting...' });

  return {
    increment(delta = 1, payload?: Record<string, unknown>): void {
      bar.increment(delta, payload);
    },
    stop(): void {
      bar.stop();
    },
  };
}

/**
 * Format a timestamp for display
 */
export function formatTimestamp(date: Date | string | null): string {
  if (!date) return 'Never';
  const d = typeof date === 'string' ? new Date(date) : date;
  if (Number.isNaN(d.getTime())) return String(date);
  return d.toLocaleString();
}

/**
 * Display a simple table in the terminal
 */
export function printTable(headers: string[], rows: string[][]): void {
  const widths = headers.map((h, i) => {
    const maxRowWidth = Math.max(0, ...rows.map((row) => (row[i] ?? '').length));
    return Math.max(h.length, maxRowWidth);
  });

  const headerLine = headers.map((h, i) => h.padEnd(widths[i] ?? 0)).join(' | ');
  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');

  console.log(headerLine);
  console.log(separator);

  for (const row of rows) {
    const line = row.map((cell, i) => (cell ?? '').padEnd(widths[i] ?? 0)).join(' | ');
    console.log(line);
  }
}

/**
 * Print a key-value list
 */
export function printKeyValue(items: Array<{ key: string; value: string | number | boolean | null }>): void {
  const maxKeyLength = Math.max(...items.map((item) => item.key.length));

  for (const item of items) {
    const value = item.value === null ? 'N/A' : String(item.value);
    console.log(`  ${item.key.padEnd(maxKeyLength)}: ${value}`);
  }
}
