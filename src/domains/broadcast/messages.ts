// Plain-text status lines sent to every client.

export const StatusMessages = {
  settingsChanged: (port: string, baudRate: number) =>
    `Settings changed: port ${port}, baud rate ${baudRate}`,
  settingsUnchanged: 'Port and baud rate settings are unchanged.',
  invalidPortType: 'Error: invalid data type for port.',
  invalidBaudRateType: 'Error: invalid data type for baud rate.',
  baudRateConversion: 'Error: unable to convert baud rate.',
  invalidCommandType: 'Error: invalid data type for command.',

  noPortSelected: 'No port selected.',
  openFailed: 'Error: unable to open the serial port. Check the settings and reconnect to the port.',
  connected: (port: string, baudRate: number) =>
    `Connected to serial port ${port} at ${baudRate} baud.`,
  readFailed: (reason: string) => `Error reading from serial port: ${reason}`,

  notConnected: 'Error: port is not open. Message not sent.',
  writeFailed: (reason: string) => `Error writing to serial port: ${reason}`,
  written: (payload: string) => `Sent to serial port: ${payload}`,

  portList: (ports: readonly string[]) => `Available ports: [${ports.join(' ')}]`,
  portUnavailable: 'Current port is no longer available. Settings reset.',
} as const;

export function errorText(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
