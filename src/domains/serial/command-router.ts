import type { Broadcaster } from '../broadcast/broadcaster';
import { StatusMessages } from '../broadcast/messages';
import type { Logger } from '../observability/types';
import type { ConfigureResult, ConnectionManager } from './connection-manager';
import type { OutboundWriter } from './outbound-writer';
import { decodePayload, parseFrame, type PayloadError } from './payload';

const ERROR_MESSAGES: Record<PayloadError, string> = {
  'invalid-port-type': StatusMessages.invalidPortType,
  'invalid-baud-rate-type': StatusMessages.invalidBaudRateType,
  'baud-rate-conversion': StatusMessages.baudRateConversion,
  'invalid-command-type': StatusMessages.invalidCommandType,
};

export type RouteResult =
  | { kind: 'dropped'; reason: string }
  | { kind: 'rejected'; errors: PayloadError[] }
  | { kind: 'reconfigured'; result: ConfigureResult }
  | { kind: 'queued' }
  | { kind: 'ignored' };

/**
 * Turns one client frame into a settings change or a device command.
 * Nothing here closes the client connection.
 */
export class CommandRouter {
  constructor(
    private connection: ConnectionManager,
    private writer: OutboundWriter,
    private broadcaster: Broadcaster,
    private logger: Logger
  ) {}

  async handle(raw: string, clientId?: string): Promise<RouteResult> {
    const frame = parseFrame(raw);
    if (!frame.ok) {
      this.logger.warn(`Dropping malformed payload: ${frame.reason}`, { clientId });
      return { kind: 'dropped', reason: frame.reason };
    }

    const decoded = decodePayload(frame.payload);
    switch (decoded.kind) {
      case 'invalid':
        for (const error of decoded.errors) {
          this.broadcaster.publish(ERROR_MESSAGES[error]);
        }
        this.logger.warn(`Rejected payload: ${decoded.errors.join(', ')}`, { clientId });
        return { kind: 'rejected', errors: decoded.errors };

      case 'reconfigure': {
        const result = await this.connection.configure(decoded.settings);
        return { kind: 'reconfigured', result };
      }

      case 'command':
        this.writer.submit({ payload: `${decoded.command}\n` });
        return { kind: 'queued' };

      case 'unrecognized':
        this.logger.warn('Ignoring payload with neither port/baudRate nor command', {
          clientId,
          fields: decoded.fields,
        });
        return { kind: 'ignored' };
    }
  }
}
