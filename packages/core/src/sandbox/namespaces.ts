/**
 * Linux Namespace Isolation
 *
 * Network (and optionally PID/mount) namespace isolation for process-mode
 * sandboxes. Uses the `unshare` command, which works without root on kernels
 * with unprivileged user namespaces enabled.
 *
 * Reports no support when:
 * - Not on Linux
 * - Kernel doesn't support user namespaces
 * - `unshare` command not available
 */

import { readFileSync } from 'node:fs';
import { isCommandAvailable } from '../utils/command.js';

export interface NamespaceCapabilities {
  userNamespaces: boolean;
  networkNamespaces: boolean;
  unshareAvailable: boolean;
}

export interface NamespaceProbe {
  platform: NodeJS.Platform;
  commandAvailable(cmd: string): boolean;
  readSysctl(file: string): string | null;
}

const defaultProbe: NamespaceProbe = {
  platform: process.platform,
  commandAvailable: isCommandAvailable,
  readSysctl: (file) => {
    try {
      return readFileSync(file, 'utf-8').trim();
    } catch {
      return null;
    }
  },
};

const NO_NAMESPACES: NamespaceCapabilities = {
  userNamespaces: false,
  networkNamespaces: false,
  unshareAvailable: false,
};

/**
 * Detect namespace support on the current system
 */
export function detectNamespaceSupport(probe: NamespaceProbe = defaultProbe): NamespaceCapabilities {
  if (probe.platform !== 'linux') return NO_NAMESPACES;

  const unshareAvailable = probe.commandAvailable('unshare');

  const maxUserNs = probe.readSysctl('/proc/sys/user/max_user_namespaces');
  const userNamespaces = maxUserNs !== null && Number(maxUserNs) > 0;

  // Only some distros have this knob; absent means unprivileged use follows max_user_namespaces
  const clone = probe.readSysctl('/proc/sys/kernel/unprivileged_userns_clone');
  const unprivilegedUserns = clone === null ? userNamespaces : clone === '1';

  const available = unshareAvailable && userNamespaces && unprivilegedUserns;

  return {
    userNamespaces: available,
    networkNamespaces: available,
    unshareAvailable,
  };
}

/**
 * Argument vector that runs `command` in a fresh network namespace with only
 * loopback. A user namespace is created alongside so no privileges are needed.
 */
export function buildUnshareArgs(command: string[]): string[] {
  return ['unshare', '--user', '--net', '--', ...command];
}
