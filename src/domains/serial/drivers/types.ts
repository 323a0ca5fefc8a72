export interface ConnectionSettings {
  readonly portIdentifier: string;
  readonly baudRate: number;
}

export const UNCONFIGURED: ConnectionSettings = Object.freeze({ portIdentifier: '', baudRate: 0 });

export function createSettings(portIdentifier: string, baudRate: number): ConnectionSettings {
  return Object.freeze({ portIdentifier, baudRate });
}

export function isConfigured(settings: ConnectionSettings): boolean {
  return settings.portIdentifier !== '';
}

export function sameSettings(a: ConnectionSettings, b: ConnectionSettings): boolean {
  return a.portIdentifier === b.portIdentifier && a.baudRate === b.baudRate;
}

/**
 * An open link to the serial device.
 */
export interface SerialConnection {
  readonly settings: ConnectionSettings;
  readonly isOpen: boolean;

  // Next chunk from the device; null once the port has been closed.
  // Rejects when the device fails (unplugged, I/O error).
  read(): Promise<Uint8Array | null>;

  write(data: string | Uint8Array): Promise<void>;

  close(): Promise<void>;
}

export interface OpenOptions {
  // Upper bound on the bytes handed out per read()
  readBufferSize?: number;
}

export interface SerialDriver {
  readonly type: string;

  open(settings: ConnectionSettings, options?: OpenOptions): Promise<SerialConnection>;

  // Identifiers of the ports currently present on the host
  list(): Promise<string[]>;
}
