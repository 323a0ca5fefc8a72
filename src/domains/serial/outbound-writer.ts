import { AsyncQueue } from '../../core/async-queue';
import type { Broadcaster } from '../broadcast/broadcaster';
import { StatusMessages, errorText } from '../broadcast/messages';
import type { Logger } from '../observability/types';
import type { ConnectionManager } from './connection-manager';

export interface OutboundRequest {
  // Exactly the bytes to put on the wire, delimiter included
  payload: string;
}

/**
 * Writes queued commands to the device one at a time, in submission order.
 * Requests that arrive while no port is open are reported and dropped.
 */
export class OutboundWriter {
  private queue = new AsyncQueue<OutboundRequest>();
  private loop?: Promise<void>;

  constructor(
    private connection: ConnectionManager,
    private broadcaster: Broadcaster,
    private logger: Logger
  ) {}

  submit(request: OutboundRequest): boolean {
    const accepted = this.queue.push(request);
    if (!accepted) {
      this.logger.warn('Writer is stopped, dropping request');
    }
    return accepted;
  }

  start() {
    if (this.loop) return;
    this.loop = this.run();
  }

  async stop() {
    this.queue.close();
    await this.loop;
  }

  private async run(): Promise<void> {
    for (;;) {
      const request = await this.queue.next();
      if (request === null) return;
      try {
        await this.process(request);
      } catch (e) {
        this.logger.error('Unexpected failure while writing', e);
      }
    }
  }

  private async process(request: OutboundRequest): Promise<void> {
    const shown = request.payload.replace(/\r?\n$/, '');

    await this.connection.useConnection(async (port) => {
      if (!port) {
        this.logger.warn(`Dropping "${shown}": no open port`);
        this.broadcaster.publish(StatusMessages.notConnected);
        return;
      }

      try {
        await port.write(request.payload);
        this.logger.debug(`Wrote "${shown}" to ${port.settings.portIdentifier}`);
        this.broadcaster.publish(StatusMessages.written(shown));
      } catch (e) {
        this.logger.warn(`Write to ${port.settings.portIdentifier} failed: ${errorText(e)}`);
        this.broadcaster.publish(StatusMessages.writeFailed(errorText(e)));
      }
    });
  }
}
