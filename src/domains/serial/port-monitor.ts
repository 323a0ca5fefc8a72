import { sleep } from '../../core/timers';
import type { Broadcaster } from '../broadcast/broadcaster';
import type { ClientRegistry } from '../broadcast/client-registry';
import { StatusMessages, errorText } from '../broadcast/messages';
import type { Logger } from '../observability/types';
import type { ConnectionManager } from './connection-manager';
import { isConfigured, type SerialDriver } from './drivers/types';

export interface PortMonitorOptions {
  // 0 disables polling; port lists are then only sent when clients join
  intervalMs?: number;
}

function equalPortLists(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((port, i) => port === b[i]);
}

/**
 * Watches the host's serial ports and tells clients when the list changes.
 * When the configured port disappears, the relay's settings are reset.
 */
export class PortMonitor {
  private lastPorts: string[] = [];
  private abort?: AbortController;
  private loop?: Promise<void>;
  private unsubscribe?: () => void;

  constructor(
    private driver: SerialDriver,
    private connection: ConnectionManager,
    private broadcaster: Broadcaster,
    private clients: ClientRegistry,
    private logger: Logger,
    private options: PortMonitorOptions = {}
  ) {}

  async start() {
    this.logger.info('Starting monitoring...');
    this.lastPorts = await this.listPorts();

    // Every new client gets the current list
    const onJoined = () => {
      this.announce().catch((e) => {
        this.logger.error('Failed to announce ports', e);
      });
    };
    this.clients.events.on('client:joined', onJoined);
    this.unsubscribe = () => this.clients.events.off('client:joined', onJoined);

    const intervalMs = this.options.intervalMs ?? 2000;
    if (intervalMs > 0) {
      this.abort = new AbortController();
      this.loop = this.poll(intervalMs, this.abort.signal);
    }
  }

  async stop() {
    this.logger.info('Stopping monitoring...');
    this.unsubscribe?.();
    this.abort?.abort();
    await this.loop;
    this.loop = undefined;
  }

  get ports(): readonly string[] {
    return this.lastPorts;
  }

  /** Broadcasts the current port list as a summary line and a JSON array. */
  async announce(): Promise<void> {
    const ports = await this.listPorts();
    this.broadcaster.publish(StatusMessages.portList(ports));
    this.broadcaster.publish(JSON.stringify(ports));
  }

  /** Compares the host's ports with the last scan and reacts to changes. */
  async scan(): Promise<void> {
    const ports = await this.listPorts();
    const previous = this.lastPorts;
    if (equalPortLists(ports, previous)) return;

    this.lastPorts = ports;
    this.logger.info(`Port list changed: [${ports.join(', ')}]`);
    this.broadcaster.publish(StatusMessages.portList(ports));
    this.broadcaster.publish(JSON.stringify(ports));

    const settings = this.connection.getSettings();
    if (!isConfigured(settings)) return;

    const current = settings.portIdentifier;
    // Only a port we saw and then lost counts as unplugged; paths that were
    // never enumerated (pseudo terminals, sockets) are left alone.
    if (previous.includes(current) && !ports.includes(current)) {
      await this.connection.resetSettings(current, StatusMessages.portUnavailable);
    }
  }

  private async poll(intervalMs: number, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await sleep(intervalMs, signal);
      if (signal.aborted) break;
      try {
        await this.scan();
      } catch (e) {
        this.logger.error('Port scan failed', e);
      }
    }
  }

  // Falls back to the last known list when listing fails
  private async listPorts(): Promise<string[]> {
    try {
      return await this.driver.list();
    } catch (e) {
      this.logger.warn(`Failed to list serial ports: ${errorText(e)}`);
      return this.lastPorts;
    }
  }
}
