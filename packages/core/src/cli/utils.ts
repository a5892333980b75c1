/**
 * CLI Utilities — Flag parsing, formatting, color output.
 */

import type { ThreatLevel } from '@detonate/shared';

// ─── ANSI Color Support ──────────────────────────────────────────────────────

const ANSI_RESET = '\x1b[0m';
const ANSI_BOLD = '\x1b[1m';
const ANSI_DIM = '\x1b[2m';
const ANSI_RED = '\x1b[31m';
const ANSI_GREEN = '\x1b[32m';
const ANSI_YELLOW = '\x1b[33m';
const ANSI_CYAN = '\x1b[36m';

/** Returns true when the stream supports ANSI colors and NO_COLOR is unset. */
function isTTYStream(stream: NodeJS.WritableStream): boolean {
  return !process.env.NO_COLOR && 'isTTY' in stream && stream.isTTY === true;
}

/**
 * Returns color helper functions bound to the given output stream.
 * All helpers return plain text when the stream is not a TTY or when the
 * `NO_COLOR` environment variable is set.
 */
export function colorContext(stream: NodeJS.WritableStream) {
  const enabled = isTTYStream(stream);
  const wrap = (code: string) => (text: string) => (enabled ? `${code}${text}${ANSI_RESET}` : text);
  return {
    green: wrap(ANSI_GREEN),
    red: wrap(ANSI_RED),
    yellow: wrap(ANSI_YELLOW),
    dim: wrap(ANSI_DIM),
    bold: wrap(ANSI_BOLD),
    cyan: wrap(ANSI_CYAN),
  };
}

export type Colors = ReturnType<typeof colorContext>;

/** Color for a threat level: green when clean, yellow for low/medium, red above. */
export function threatColor(colors: Colors, level: ThreatLevel): (text: string) => string {
  switch (level) {
    case 'none':
      return colors.green;
    case 'low':
    case 'medium':
      return colors.yellow;
    case 'high':
    case 'critical':
      return colors.red;
  }
}

// ─── Progress Spinner ────────────────────────────────────────────────────────

const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

/**
 * Minimal TTY spinner for long-running CLI operations.
 *
 * On non-TTY streams `start()` and `update()` are silent and `stop()` prints
 * a single summary line, so pipes and CI logs never receive control characters.
 */
export class Spinner {
  private frame = 0;
  private message = '';
  private timer: ReturnType<typeof setInterval> | undefined;
  private readonly stream: NodeJS.WritableStream;
  private readonly tty: boolean;
  private running = false;

  constructor(stream: NodeJS.WritableStream) {
    this.stream = stream;
    this.tty = isTTYStream(stream);
  }

  start(message: string): void {
    if (!this.tty) return;
    this.running = true;
    this.frame = 0;
    this.message = message;
    this.render();
    this.timer = setInterval(() => {
      this.frame = (this.frame + 1) % SPINNER_FRAMES.length;
      this.render();
    }, 80);
  }

  /** Replace the message shown next to the spinner. */
  update(message: string): void {
    if (!this.running) return;
    this.message = message;
    this.render();
  }

  stop(finalMessage: string, success = true): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    const mark = success ? '✓' : '✗';
    if (this.tty && this.running) {
      const color = success ? ANSI_GREEN : ANSI_RED;
      this.stream.write(`\r\x1b[K  ${color}${mark}${ANSI_RESET} ${finalMessage}\n`);
    } else {
      this.stream.write(`  ${mark} ${finalMessage}\n`);
    }
    this.running = false;
  }

  private render(): void {
    this.stream.write(`\r\x1b[K  ${SPINNER_FRAMES[this.frame] ?? ''} ${this.message}`);
  }
}

// ─── Flags ───────────────────────────────────────────────────────────────────

/** Extract a --flag value pair from argv, returning value and remaining args. */
export function extractFlag(
  argv: string[],
  flag: string,
  alias?: string
): { value: string | undefined; rest: string[] } {
  const rest: string[] = [];
  let value: string | undefined;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if ((arg === `--${flag}` || (alias && arg === `-${alias}`)) && i + 1 < argv.length) {
      value = argv[++i];
    } else if (arg !== undefined) {
      rest.push(arg);
    }
  }
  return { value, rest };
}

/** Extract a boolean --flag from argv. */
export function extractBoolFlag(
  argv: string[],
  flag: string,
  alias?: string
): { value: boolean; rest: string[] } {
  const rest: string[] = [];
  let value = false;
  for (const arg of argv) {
    if (arg === `--${flag}` || (alias && arg === `-${alias}`)) {
      value = true;
    } else {
      rest.push(arg);
    }
  }
  return { value, rest };
}

// ─── Formatting ──────────────────────────────────────────────────────────────

/** Format milliseconds as a short duration: `850ms`, `12.4s`, `2m 15s`. */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${String(Math.round(ms))}ms`;
  const seconds = ms / 1000;
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  const whole = Math.floor(seconds);
  return `${String(Math.floor(whole / 60))}m ${String(whole % 60)}s`;
}

const BYTE_UNITS = ['B', 'KB', 'MB', 'GB'];

/** Format a byte count with binary units. */
export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  const digits = unit === 0 || value >= 10 ? 0 : 1;
  return `${value.toFixed(digits)} ${BYTE_UNITS[unit] ?? 'B'}`;
}

/** Format rows as aligned columns. */
export function formatTable(rows: Record<string, string>[], columns?: string[]): string {
  const first = rows[0];
  if (!first) return '(no results)';

  const cols = columns ?? Object.keys(first);
  const widths = cols.map((col) => Math.max(col.length, ...rows.map((r) => (r[col] ?? '').length)));
  const pad = (text: string, i: number) => text.padEnd(widths[i] ?? 0);

  const header = cols.map((col, i) => pad(col.toUpperCase(), i)).join('  ');
  const separator = cols.map((_, i) => '─'.repeat(widths[i] ?? 0)).join('  ');
  const body = rows.map((row) => cols.map((col, i) => pad(row[col] ?? '', i)).join('  '));

  return [header, separator, ...body].join('\n');
}
