import mitt, { type Emitter } from 'mitt';
import { sleep, whenAborted } from '../../core/timers';
import type { Broadcaster } from '../broadcast/broadcaster';
import { StatusMessages, errorText } from '../broadcast/messages';
import type { Logger } from '../observability/types';
import { AsyncMutex } from './async-mutex';
import {
  UNCONFIGURED,
  createSettings,
  isConfigured,
  sameSettings,
  type ConnectionSettings,
  type SerialConnection,
  type SerialDriver,
} from './drivers/types';
import { InboundReader, type ReaderOutcome } from './inbound-reader';

// disconnected: settings are present but no connection is open
export type ConnectionState = 'unconfigured' | 'opening' | 'open' | 'closing' | 'disconnected';

export type ConfigureResult = 'changed' | 'unchanged';

type ConnectionEvents = {
  state: ConnectionState;
};

export interface ConnectionManagerOptions {
  /** Supervisor backoff between automatic open attempts. */
  retryIntervalMs?: number;
  /** Pause between closing the old port and opening the new one. */
  reconnectDelayMs?: number;
  readDelayMs?: number;
  readBufferSize?: number;
  initialSettings?: ConnectionSettings;
}

export interface ConnectionSnapshot {
  state: ConnectionState;
  port: string | null;
  baudRate: number | null;
}

interface ActiveReader {
  connection: SerialConnection;
  done: Promise<ReaderOutcome>;
}

/**
 * Owns the one physical serial connection.
 *
 * Every replacement of the connection, and every change to the settings it
 * was opened with, happens while holding `guard`. Writers borrow the
 * connection through {@link useConnection} under the same guard, so a write
 * never lands on a port that is halfway through being swapped.
 */
export class ConnectionManager {
  public readonly events: Emitter<ConnectionEvents> = mitt<ConnectionEvents>();

  private settings: ConnectionSettings;
  private connection: SerialConnection | null = null;
  private reader: ActiveReader | null = null;
  private state: ConnectionState = 'unconfigured';
  private guard = new AsyncMutex();
  private abort?: AbortController;
  private supervisor?: Promise<void>;
  private stopped = false;

  private retryIntervalMs: number;
  private reconnectDelayMs: number;
  private readDelayMs: number;
  private readBufferSize: number;

  constructor(
    private driver: SerialDriver,
    private broadcaster: Broadcaster,
    private logger: Logger,
    options: ConnectionManagerOptions = {}
  ) {
    this.retryIntervalMs = options.retryIntervalMs ?? 5000;
    this.reconnectDelayMs = options.reconnectDelayMs ?? 1000;
    this.readDelayMs = options.readDelayMs ?? 0;
    this.readBufferSize = options.readBufferSize ?? 128;
    this.settings = options.initialSettings ?? UNCONFIGURED;
    if (isConfigured(this.settings)) this.state = 'disconnected';
  }

  getSettings(): ConnectionSettings {
    return this.settings;
  }

  getState(): ConnectionState {
    return this.state;
  }

  isOpen(): boolean {
    return this.connection !== null && this.connection.isOpen;
  }

  snapshot(): ConnectionSnapshot {
    const configured = isConfigured(this.settings);
    return {
      state: this.state,
      port: configured ? this.settings.portIdentifier : null,
      baudRate: configured ? this.settings.baudRate : null,
    };
  }

  /**
   * Adopts new settings and reconnects, unless they equal the current ones.
   */
  async configure(next: ConnectionSettings): Promise<ConfigureResult> {
    return this.guard.runExclusive(async (): Promise<ConfigureResult> => {
      if (sameSettings(this.settings, next)) {
        this.broadcaster.publish(StatusMessages.settingsUnchanged);
        return 'unchanged';
      }

      this.settings = createSettings(next.portIdentifier, next.baudRate);
      this.logger.info(`Settings changed: ${next.portIdentifier} @ ${next.baudRate}`);
      this.broadcaster.publish(StatusMessages.settingsChanged(next.portIdentifier, next.baudRate));
      await this.reconnectLocked();
      return 'changed';
    });
  }

  async reconnect(): Promise<void> {
    await this.guard.runExclusive(() => this.reconnectLocked());
  }

  /**
   * Forgets the current settings (e.g. the port was unplugged) and drops the
   * connection. Does nothing unless `expectedPort` is still the configured
   * port once the guard is held; returns whether the reset happened.
   */
  async resetSettings(expectedPort: string, reason: string): Promise<boolean> {
    return this.guard.runExclusive(async () => {
      if (!isConfigured(this.settings) || this.settings.portIdentifier !== expectedPort) {
        this.logger.debug(`Skipping reset for ${expectedPort}: settings are now ${this.settings.portIdentifier || 'unset'}`);
        return false;
      }
      this.settings = UNCONFIGURED;
      this.logger.warn(`Settings reset: ${reason}`);
      this.broadcaster.publish(reason);
      await this.reconnectLocked();
      return true;
    });
  }

  /**
   * Runs `fn` with the open connection (or null) while no one can replace it.
   */
  async useConnection<T>(fn: (connection: SerialConnection | null) => Promise<T>): Promise<T> {
    return this.guard.runExclusive(() => {
      const connection = this.connection && this.connection.isOpen ? this.connection : null;
      return fn(connection);
    });
  }

  start() {
    if (this.supervisor) return;
    this.stopped = false;
    this.abort = new AbortController();
    const signal = this.abort.signal;
    this.supervisor = this.supervise(signal).catch((e) => {
      this.logger.error('Connection supervisor crashed', e);
    });
    this.logger.info('Connection supervisor started');
  }

  async stop() {
    this.stopped = true;
    this.abort?.abort();
    await this.supervisor;
    this.supervisor = undefined;
    await this.guard.runExclusive(() => this.closeLocked());
    this.logger.info('Connection supervisor stopped');
  }

  private async supervise(signal: AbortSignal): Promise<void> {
    const aborted = whenAborted(signal).then((): ReaderOutcome => 'superseded');
    let immediate = true;

    while (!signal.aborted) {
      const active = this.reader;

      if (!active) {
        if (!immediate) await sleep(this.retryIntervalMs, signal);
        immediate = false;
        if (signal.aborted) break;

        await this.guard.runExclusive(async () => {
          if (this.connection) return;
          this.logger.debug(`Retrying ${this.settings.portIdentifier || 'without a port'}`);
          await this.openLocked();
        });
        continue;
      }

      immediate = false;
      const outcome = await Promise.race([active.done, aborted]);
      if (outcome === 'superseded' || signal.aborted) continue;

      this.logger.warn(
        `Lost ${active.connection.settings.portIdentifier}, reconnecting in ${this.retryIntervalMs}ms`
      );
      await sleep(this.retryIntervalMs, signal);
      if (signal.aborted) break;

      await this.guard.runExclusive(async () => {
        // A reconfigure may already have replaced the failed connection
        if (this.connection === active.connection) {
          await this.reconnectLocked();
        }
      });
    }
  }

  private async reconnectLocked(): Promise<void> {
    await this.closeLocked();
    // Give the OS a moment to release the device
    await sleep(this.reconnectDelayMs, this.abort?.signal);
    await this.openLocked();
  }

  private async closeLocked(): Promise<void> {
    const connection = this.connection;
    if (!connection) return;

    this.connection = null;
    this.reader = null;
    this.setState('closing');

    try {
      await connection.close();
    } catch (e) {
      this.logger.warn(`Error closing ${connection.settings.portIdentifier}: ${errorText(e)}`);
    }

    this.setState(isConfigured(this.settings) ? 'disconnected' : 'unconfigured');
  }

  private async openLocked(): Promise<void> {
    if (this.stopped) return;

    const settings = this.settings;
    if (!isConfigured(settings)) {
      this.setState('unconfigured');
      this.broadcaster.publish(StatusMessages.noPortSelected);
      return;
    }

    this.setState('opening');
    let connection: SerialConnection;
    try {
      connection = await this.driver.open(settings, { readBufferSize: this.readBufferSize });
    } catch (e) {
      this.logger.warn(`Unable to open ${settings.portIdentifier} @ ${settings.baudRate}: ${errorText(e)}`);
      this.setState('disconnected');
      this.broadcaster.publish(StatusMessages.openFailed);
      return;
    }

    this.connection = connection;
    const reader = new InboundReader(
      connection,
      (candidate) => this.connection === candidate,
      this.broadcaster,
      this.logger.child({ component: 'InboundReader' }),
      { readDelayMs: this.readDelayMs }
    );
    this.reader = {
      connection,
      done: reader.run().catch((e): ReaderOutcome => {
        this.logger.error(`Reader for ${settings.portIdentifier} crashed`, e);
        return 'failed';
      }),
    };

    this.setState('open');
    this.logger.info(`Connected to ${settings.portIdentifier} @ ${settings.baudRate}`);
    this.broadcaster.publish(StatusMessages.connected(settings.portIdentifier, settings.baudRate));
  }

  private setState(state: ConnectionState) {
    if (this.state === state) return;
    this.state = state;
    this.events.emit('state', state);
  }
}
