import type { SocketInfo } from '../socket-table.js';
import type { CollectedEvent, EventCollector } from '../types.js';

const UNSPECIFIED = new Set(['', '0.0.0.0', '::', '*']);

function socketAction(s: SocketInfo): 'listen' | 'connect' | 'bind' {
  if (s.state === 'LISTEN') return 'listen';
  if (!UNSPECIFIED.has(s.remoteAddress) && s.remotePort !== 0) return 'connect';
  return 'bind';
}

/**
 * Reports each socket the sandbox opens once, as a NetworkOp. Connections carry
 * the running count of distinct remote hosts and ports so a scan shows up as
 * those counts grow.
 */
export class NetworkCollector implements EventCollector {
  readonly name = 'network';
  private readonly seen = new Set<string>();
  private readonly remoteHosts = new Set<string>();
  private readonly remotePorts = new Set<number>();

  constructor(
    private readonly snapshot: () => Promise<SocketInfo[]>,
    private readonly now: () => number = Date.now
  ) {}

  async poll(): Promise<CollectedEvent[]> {
    const sockets = await this.snapshot();
    const timestamp = this.now();
    const events: CollectedEvent[] = [];

    for (const s of sockets) {
      const action = socketAction(s);
      const key = [
        action,
        s.protocol,
        `${s.localAddress}:${String(s.localPort)}`,
        `${s.remoteAddress}:${String(s.remotePort)}`,
      ].join('|');
      if (this.seen.has(key)) continue;
      this.seen.add(key);

      if (action === 'connect') {
        this.remoteHosts.add(s.remoteAddress);
        this.remotePorts.add(s.remotePort);
      }

      const endpoint =
        action === 'connect'
          ? `${s.remoteAddress}:${String(s.remotePort)}`
          : `${s.localAddress}:${String(s.localPort)}`;

      events.push({
        timestamp,
        category: 'NetworkOp',
        attributes: {
          action,
          protocol: s.protocol,
          localAddress: s.localAddress,
          localPort: s.localPort,
          remoteAddress: s.remoteAddress,
          remotePort: s.remotePort,
          state: s.state,
          endpoint,
          pid: s.pid ?? null,
          distinctRemoteHosts: this.remoteHosts.size,
          distinctRemotePorts: this.remotePorts.size,
        },
      });
    }

    return events;
  }
}
