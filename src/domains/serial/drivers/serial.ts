import { SerialPort } from 'serialport';
import { AsyncQueue } from '../../../core/async-queue';
import type { Logger } from '../../observability/types';
import type { ConnectionSettings, OpenOptions, SerialConnection, SerialDriver } from './types';

const DEFAULT_READ_BUFFER_SIZE = 128;

class NativeSerialConnection implements SerialConnection {
  private chunks = new AsyncQueue<Uint8Array>();
  private closing = false;

  constructor(
    public readonly settings: ConnectionSettings,
    private port: SerialPort,
    private logger: Logger
  ) {
    // Forward data events
    this.port.on('data', (chunk: Buffer) => {
      this.chunks.push(chunk);
    });

    this.port.on('error', (err: Error) => {
      this.logger.warn(`Port ${settings.portIdentifier} error: ${err.message}`);
      this.chunks.close(err);
    });

    // serialport passes a DisconnectedError when the device goes away
    this.port.on('close', (err?: Error | null) => {
      if (this.closing) {
        this.chunks.close();
      } else {
        this.chunks.close(err ?? new Error(`Port ${settings.portIdentifier} closed unexpectedly`));
      }
    });
  }

  get isOpen(): boolean {
    return this.port.isOpen && !this.closing;
  }

  read(): Promise<Uint8Array | null> {
    return this.chunks.next();
  }

  async write(data: string | Uint8Array): Promise<void> {
    if (!this.isOpen) throw new Error('Port not open');

    return new Promise((resolve, reject) => {
      this.port.write(data, (err) => {
        if (err) {
          reject(err);
          return;
        }
        this.port.drain((drainErr) => {
          if (drainErr) reject(drainErr);
          else resolve();
        });
      });
    });
  }

  async close(): Promise<void> {
    if (this.closing) return;
    this.closing = true;

    if (!this.port.isOpen) {
      this.chunks.close();
      return;
    }

    return new Promise((resolve, reject) => {
      this.port.close((err) => {
        this.chunks.close();
        if (err) reject(err);
        else resolve();
      });
    });
  }
}

/**
 * Opens real ports through the `serialport` package.
 */
export class NativeSerialDriver implements SerialDriver {
  public readonly type = 'serial';

  constructor(private logger: Logger) {}

  async open(settings: ConnectionSettings, options: OpenOptions = {}): Promise<SerialConnection> {
    const port = new SerialPort({
      path: settings.portIdentifier,
      baudRate: settings.baudRate,
      autoOpen: false,
      highWaterMark: options.readBufferSize ?? DEFAULT_READ_BUFFER_SIZE,
    });

    await new Promise<void>((resolve, reject) => {
      port.open((err) => {
        if (err) reject(err);
        else resolve();
      });
    });

    this.logger.debug(`Opened ${settings.portIdentifier} at ${settings.baudRate} baud`);
    return new NativeSerialConnection(settings, port, this.logger);
  }

  async list(): Promise<string[]> {
    const ports = await SerialPort.list();
    return ports.map(p => p.path).sort();
  }
}
