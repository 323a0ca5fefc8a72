import { sleep } from '../../core/timers';
import type { Broadcaster } from '../broadcast/broadcaster';
import { StatusMessages, errorText } from '../broadcast/messages';
import type { Logger } from '../observability/types';
import type { SerialConnection } from './drivers/types';
import { LineFramer } from './framer';

// failed: the device stopped answering reads; the supervisor should reconnect.
// superseded: the connection was replaced or closed on purpose.
export type ReaderOutcome = 'failed' | 'superseded';

export interface InboundReaderOptions {
  readDelayMs?: number;
}

/**
 * Drains one connection into the broadcaster until that connection fails
 * or stops being the current one.
 */
export class InboundReader {
  private framer: LineFramer;

  constructor(
    private connection: SerialConnection,
    private isCurrent: (connection: SerialConnection) => boolean,
    private broadcaster: Broadcaster,
    private logger: Logger,
    private options: InboundReaderOptions = {}
  ) {
    this.framer = new LineFramer(logger);
  }

  async run(): Promise<ReaderOutcome> {
    const port = this.connection.settings.portIdentifier;

    for (;;) {
      if (!this.isCurrent(this.connection)) return 'superseded';

      let chunk: Uint8Array | null;
      try {
        chunk = await this.connection.read();
      } catch (e) {
        if (!this.isCurrent(this.connection)) return 'superseded';
        this.logger.warn(`Read from ${port} failed: ${errorText(e)}`);
        this.broadcaster.publish(StatusMessages.readFailed(errorText(e)));
        return 'failed';
      }

      if (!this.isCurrent(this.connection)) return 'superseded';

      if (chunk === null) {
        this.logger.warn(`Port ${port} stopped producing data`);
        this.broadcaster.publish(StatusMessages.readFailed('port closed'));
        return 'failed';
      }

      for (const message of this.framer.push(chunk)) {
        this.broadcaster.publish(message, 'device');
      }

      const delay = this.options.readDelayMs ?? 0;
      if (delay > 0) await sleep(delay);
    }
  }
}
