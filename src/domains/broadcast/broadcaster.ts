import { AsyncQueue } from '../../core/async-queue';
import type { Logger } from '../observability/types';
import type { ClientRegistry } from './client-registry';

export type MessageSource = 'device' | 'status';

export interface BroadcastMessage {
  source: MessageSource;
  text: string;
}

/**
 * Fans every published message out to all registered clients, in
 * publication order. A client whose delivery fails is closed and dropped;
 * the remaining clients still get the message.
 */
export class Broadcaster {
  private queue = new AsyncQueue<BroadcastMessage>();
  private loop?: Promise<void>;

  constructor(private clients: ClientRegistry, private logger: Logger) {}

  publish(text: string, source: MessageSource = 'status'): boolean {
    if (source === 'status') {
      this.logger.debug(`Status: ${text}`);
    }
    return this.queue.push({ source, text });
  }

  start() {
    if (this.loop) return;
    this.loop = this.run();
  }

  /** Stops accepting messages and waits for the ones already queued to go out. */
  async stop() {
    this.queue.close();
    await this.loop;
  }

  private async run(): Promise<void> {
    for (;;) {
      const message = await this.queue.next();
      if (message === null) return;
      this.deliver(message);
    }
  }

  private deliver(message: BroadcastMessage) {
    for (const client of this.clients.snapshot()) {
      // Removed by an earlier failure in this same pass
      if (!this.clients.has(client.id)) continue;

      try {
        client.send(message.text);
      } catch (e) {
        this.logger.warn(`Failed to deliver ${message.source} message to client ${client.id}`, {
          error: e instanceof Error ? e.message : String(e),
        });
        this.clients.remove(client.id, 'delivery failed');
        try {
          client.close();
        } catch (closeErr) {
          this.logger.debug(`Closing client ${client.id} after failed delivery also failed`, {
            error: closeErr instanceof Error ? closeErr.message : String(closeErr),
          });
        }
      }
    }
  }
}
