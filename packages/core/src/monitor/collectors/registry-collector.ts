/**
 * Registry Collector (win32)
 *
 * Snapshots the autorun keys with `reg query` when monitoring starts and on
 * every poll, reporting values created, changed or deleted as RegistryOp events.
 */

import { CommandError, runCommand, type CommandRunner } from '../../utils/command.js';
import type { CollectedEvent, EventCollector } from '../types.js';

export const AUTORUN_KEYS: readonly string[] = [
  'HKCU\\Software\\Microsoft\\Windows\\CurrentVersion\\Run',
  'HKCU\\Software\\Microsoft\\Windows\\CurrentVersion\\RunOnce',
  'HKLM\\Software\\Microsoft\\Windows\\CurrentVersion\\Run',
  'HKLM\\Software\\Microsoft\\Windows\\CurrentVersion\\RunOnce',
];

export interface RegistryValue {
  key: string;
  name: string;
  type: string;
  data: string;
}

/** Parse the values listed by `reg query <key>`. Subkeys are ignored. */
export function parseRegQuery(stdout: string): RegistryValue[] {
  const values: RegistryValue[] = [];
  let key = '';
  for (const raw of stdout.split('\n')) {
    const line = raw.replace(/\r$/, '');
    if (/^HKEY_/.test(line)) {
      key = line.trim();
      continue;
    }
    const match = /^ {4}(.+?) {4}(REG_[A-Z_]+)(?: {4}(.*))?$/.exec(line);
    if (!match?.[1] || !match[2]) continue;
    values.push({ key, name: match[1], type: match[2], data: match[3] ?? '' });
  }
  return values;
}

export class RegistryCollector implements EventCollector {
  readonly name = 'registry';
  private baseline = new Map<string, RegistryValue>();

  constructor(
    private readonly keys: readonly string[] = AUTORUN_KEYS,
    private readonly run: CommandRunner = runCommand,
    private readonly now: () => number = Date.now
  ) {}

  async start(): Promise<void> {
    this.baseline = await this.snapshot();
  }

  async poll(): Promise<CollectedEvent[]> {
    const current = await this.snapshot();
    const timestamp = this.now();
    const events: CollectedEvent[] = [];

    for (const [id, value] of current) {
      const before = this.baseline.get(id);
      if (!before) {
        events.push(this.toEvent('create', value, timestamp));
      } else if (before.data !== value.data || before.type !== value.type) {
        events.push(this.toEvent('set', value, timestamp));
      }
    }
    for (const [id, value] of this.baseline) {
      if (!current.has(id)) events.push(this.toEvent('delete', value, timestamp));
    }

    this.baseline = current;
    return events;
  }

  private toEvent(action: string, value: RegistryValue, timestamp: number): CollectedEvent {
    return {
      timestamp,
      category: 'RegistryOp',
      attributes: {
        action,
        key: value.key,
        valueName: value.name,
        valueType: value.type,
        data: value.data,
      },
    };
  }

  private async snapshot(): Promise<Map<string, RegistryValue>> {
    const results = await Promise.all(this.keys.map((key) => this.query(key)));
    const values = new Map<string, RegistryValue>();
    for (const value of results.flat()) values.set(`${value.key}\\${value.name}`, value);
    return values;
  }

  private async query(key: string): Promise<RegistryValue[]> {
    try {
      const { stdout } = await this.run('reg', ['query', key]);
      return parseRegQuery(stdout);
    } catch (err) {
      // Key does not exist
      if (err instanceof CommandError && err.exitCode === 1) return [];
      throw err;
    }
  }
}
