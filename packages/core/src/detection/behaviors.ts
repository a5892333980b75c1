/**
 * Behaviour rules: each kind recognises the events that exhibit it.
 * A rule only looks at one event; counting once per session is the
 * detector's job.
 */

import type { BehaviorKind, EventAttributeValue, MonitoredEvent } from '@detonate/shared';

export type BehaviorRule = (event: MonitoredEvent) => boolean;

/** Extensions ransomware families append to encrypted files. */
const RANSOM_EXTENSIONS = [
  '.encrypted',
  '.enc',
  '.locked',
  '.crypt',
  '.crypted',
  '.crypto',
  '.locky',
  '.cerber',
  '.wncry',
  '.wcry',
  '.zepto',
  '.ryk',
  '.conti',
];

export const ENCRYPTION_ENTROPY = 7.5;
export const SCAN_PORT_THRESHOLD = 10;
export const SCAN_HOST_THRESHOLD = 20;
export const HIGH_USAGE_RATIO = 0.9;

const AUTOSTART_LOCATIONS = [
  '/etc/cron',
  '/var/spool/cron/',
  '/etc/init.d/',
  '/etc/rc.local',
  '/etc/systemd/system/',
  '/.config/autostart/',
  '/.config/systemd/user/',
  '/library/launchagents/',
  '/library/launchdaemons/',
  '/start menu/programs/startup/',
  '/.bashrc',
  '/.profile',
];

const AUTORUN_KEY = '\\currentversion\\run';

const INJECTOR_COMMAND =
  /\b(?:gdb|strace|ltrace)\b.*\s(?:-p|--pid)\s*\d+|\bmavinject(?:\.exe)?\b.*\/injectrunning|\binject(?:or)?\b.*\s(?:-p|--pid)\s*\d+/i;

function text(value: EventAttributeValue | undefined): string {
  return typeof value === 'string' ? value.toLowerCase() : '';
}

function number(value: EventAttributeValue | undefined): number {
  return typeof value === 'number' ? value : 0;
}

/** Lower-cased path with Windows separators turned into slashes. */
function normalizedPath(value: EventAttributeValue | undefined): string {
  return text(value).replaceAll('\\', '/');
}

export const BEHAVIOR_RULES: Readonly<Record<BehaviorKind, BehaviorRule>> = {
  registry_modification: (e) =>
    e.category === 'RegistryOp' && ['set', 'create', 'delete'].includes(text(e.attributes['action'])),

  file_encryption: (e) => {
    if (e.category !== 'FileOp') return false;
    const path = normalizedPath(e.attributes['path']);
    return (
      RANSOM_EXTENSIONS.some((ext) => path.endsWith(ext)) ||
      number(e.attributes['entropy']) >= ENCRYPTION_ENTROPY
    );
  },

  process_injection: (e) =>
    e.category === 'ProcessOp' &&
    (text(e.attributes['action']) === 'inject' || INJECTOR_COMMAND.test(text(e.attributes['command']))),

  persistence_mechanism: (e) => {
    if (e.category === 'FileOp') {
      const path = normalizedPath(e.attributes['path']);
      return AUTOSTART_LOCATIONS.some((location) => path.includes(location));
    }
    return e.category === 'RegistryOp' && text(e.attributes['key']).includes(AUTORUN_KEY);
  },

  network_scanning: (e) =>
    e.category === 'NetworkOp' &&
    (number(e.attributes['distinctRemotePorts']) >= SCAN_PORT_THRESHOLD ||
      number(e.attributes['distinctRemoteHosts']) >= SCAN_HOST_THRESHOLD),

  high_resource_usage: (e) =>
    e.category === 'ResourceUsage' &&
    (number(e.attributes['memoryRatio']) >= HIGH_USAGE_RATIO ||
      number(e.attributes['cpuRatio']) >= HIGH_USAGE_RATIO),
};
