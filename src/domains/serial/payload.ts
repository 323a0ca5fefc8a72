import { z } from 'zod';
import { createSettings, type ConnectionSettings } from './drivers/types';

export const payloadObjectSchema = z.record(z.unknown());

export const portSchema = z.string();

// Wire format carries the baud rate as a string of digits
export const baudRateSchema = z
  .string()
  .regex(/^\+?\d+$/)
  .transform(Number)
  .pipe(z.number().int().positive().safe());

export const commandSchema = z.string();

export type PayloadError =
  | 'invalid-port-type'
  | 'invalid-baud-rate-type'
  | 'baud-rate-conversion'
  | 'invalid-command-type';

export type DecodedPayload =
  | { kind: 'reconfigure'; settings: ConnectionSettings }
  | { kind: 'command'; command: string }
  | { kind: 'invalid'; errors: PayloadError[] }
  | { kind: 'unrecognized'; fields: string[] };

export type ParsedFrame =
  | { ok: true; payload: Record<string, unknown> }
  | { ok: false; reason: string };

/**
 * Parses a client text frame into a JSON object.
 */
export function parseFrame(raw: string): ParsedFrame {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (e) {
    return { ok: false, reason: e instanceof Error ? e.message : String(e) };
  }

  const result = payloadObjectSchema.safeParse(value);
  if (!result.success) {
    return { ok: false, reason: 'payload is not a JSON object' };
  }
  return { ok: true, payload: result.data };
}

/**
 * Classifies a payload by which fields it carries. The reconfigure shape
 * (`port` + `baudRate`) wins over `command` when both are present.
 */
export function decodePayload(payload: Record<string, unknown>): DecodedPayload {
  const has = (field: string) => Object.prototype.hasOwnProperty.call(payload, field);

  if (has('port') && has('baudRate')) {
    const port = portSchema.safeParse(payload.port);
    const baudIsString = typeof payload.baudRate === 'string';

    if (!port.success || !baudIsString) {
      const errors: PayloadError[] = [];
      if (!port.success) errors.push('invalid-port-type');
      if (!baudIsString) errors.push('invalid-baud-rate-type');
      return { kind: 'invalid', errors };
    }

    const baudRate = baudRateSchema.safeParse(payload.baudRate);
    if (!baudRate.success) {
      return { kind: 'invalid', errors: ['baud-rate-conversion'] };
    }
    return { kind: 'reconfigure', settings: createSettings(port.data, baudRate.data) };
  }

  if (has('command')) {
    const command = commandSchema.safeParse(payload.command);
    if (!command.success) {
      return { kind: 'invalid', errors: ['invalid-command-type'] };
    }
    return { kind: 'command', command: command.data };
  }

  return { kind: 'unrecognized', fields: Object.keys(payload) };
}
