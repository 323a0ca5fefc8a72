import { AsyncQueue } from '../../../core/async-queue';
import type { Logger } from '../../observability/types';
import type { ConnectionSettings, OpenOptions, SerialConnection, SerialDriver } from './types';

function toBuffer(data: string | Uint8Array): Buffer {
  return typeof data === 'string' ? Buffer.from(data, 'utf-8') : Buffer.from(data);
}

export interface MockScenarioStep {
  match: string | RegExp;
  reply: string | Buffer;
  delay?: number;
}

export interface MockSerialDriverOptions {
  ports?: string[];
  scenario?: MockScenarioStep[];
  logger?: Logger;
}

/**
 * In-memory stand-in for a serial port. Tests drive it with
 * {@link MockSerialConnection.simulateIncoming} and {@link MockSerialConnection.failRead}.
 */
export class MockSerialConnection implements SerialConnection {
  public readonly written: string[] = [];
  private chunks = new AsyncQueue<Uint8Array>();
  private open = true;
  private writeFailure: Error | null = null;

  constructor(
    public readonly settings: ConnectionSettings,
    private scenario: MockScenarioStep[] = [],
    private logger?: Logger
  ) {}

  get isOpen(): boolean {
    return this.open;
  }

  read(): Promise<Uint8Array | null> {
    return this.chunks.next();
  }

  async write(data: string | Uint8Array): Promise<void> {
    if (!this.open) {
      throw new Error(`Port ${this.settings.portIdentifier} is not open`);
    }
    if (this.writeFailure) {
      const failure = this.writeFailure;
      this.writeFailure = null;
      throw failure;
    }

    const input = toBuffer(data).toString('utf-8');
    this.written.push(input);
    this.logger?.debug(`Written: "${input.trim()}"`);

    // Check scenario for auto-reply; first match wins
    for (const step of this.scenario) {
      if ((typeof step.match === 'string' && input.includes(step.match)) ||
          (step.match instanceof RegExp && step.match.test(input))) {
        setTimeout(() => this.simulateIncoming(step.reply), step.delay ?? 100);
        break;
      }
    }
  }

  async close(): Promise<void> {
    this.open = false;
    this.chunks.close();
  }

  // Simulate bytes arriving from the device
  simulateIncoming(data: string | Uint8Array): void {
    if (this.open) {
      this.chunks.push(toBuffer(data));
    }
  }

  // Simulate the device vanishing mid-session
  failRead(error: Error): void {
    this.chunks.close(error);
  }

  failNextWrite(error: Error): void {
    this.writeFailure = error;
  }
}

export class MockSerialDriver implements SerialDriver {
  public readonly type = 'mock-serial';
  public readonly connections: MockSerialConnection[] = [];
  public readonly openCalls: ConnectionSettings[] = [];
  private ports: string[];
  private scenario: MockScenarioStep[];
  private logger?: Logger;

  constructor(options: MockSerialDriverOptions = {}) {
    this.ports = options.ports ?? [];
    this.scenario = options.scenario ?? [];
    this.logger = options.logger;
  }

  async open(settings: ConnectionSettings, _options?: OpenOptions): Promise<SerialConnection> {
    this.openCalls.push(settings);
    if (!this.ports.includes(settings.portIdentifier)) {
      throw new Error(`Opening ${settings.portIdentifier}: No such file or directory`);
    }

    const connection = new MockSerialConnection(settings, this.scenario, this.logger);
    this.connections.push(connection);
    this.logger?.info(`Connected ${settings.portIdentifier} at ${settings.baudRate} baud`);
    return connection;
  }

  async list(): Promise<string[]> {
    return [...this.ports];
  }

  // Simulate a device being plugged in or pulled out
  setPorts(ports: string[]): void {
    this.ports = [...ports];
  }

  get latest(): MockSerialConnection | undefined {
    return this.connections[this.connections.length - 1];
  }

  openConnections(): MockSerialConnection[] {
    return this.connections.filter(c => c.isOpen);
  }
}
