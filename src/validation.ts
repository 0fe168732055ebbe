/**
 * Connection option validation using TypeBox.
 */

import { Type } from 'typebox';
import { Compile } from 'typebox/compile';
import { ValidationError } from './errors.ts';
import type { SerialConnectionOptions, SerialOpenOptions } from './types.ts';

export const SerialConnectionOptionsSchema = Type.Object({
  baudRate: Type.Integer({ minimum: 1 }),
  rtscts: Type.Optional(Type.Boolean()),
  xonxoff: Type.Optional(Type.Boolean()),
  parity: Type.Optional(
    Type.Union([
      Type.Literal('none'),
      Type.Literal('even'),
      Type.Literal('odd'),
      Type.Literal('mark'),
      Type.Literal('space'),
    ])
  ),
  stopBits: Type.Optional(Type.Union([Type.Literal(1), Type.Literal(1.5), Type.Literal(2)])),
  url: Type.Optional(Type.String()),
});

const compiledOptions = Compile(SerialConnectionOptionsSchema);

/**
 * TypeBox localized validation error type.
 */
interface LocalizedValidationError {
  instancePath: string;
  message: string;
}

/**
 * Format validation errors for display.
 */
function formatErrors(errors: LocalizedValidationError[]): string {
  if (errors.length === 0) {
    return 'Unknown validation error';
  }
  return errors.map((e) => `${e.instancePath || '/'}: ${e.message}`).join('; ');
}

/**
 * Validate connection options, throwing `ValidationError` on mismatch.
 */
export function validateConnectionOptions(value: unknown): SerialConnectionOptions {
  if (!compiledOptions.Check(value)) {
    throw new ValidationError(formatErrors(compiledOptions.Errors(value)));
  }
  return value;
}

/**
 * Map connection options to the arguments of `SerialDevice.open`.
 * Hardware flow control is the only option besides baud rate the device sees.
 */
export function toOpenOptions(options: SerialConnectionOptions): SerialOpenOptions {
  return options.rtscts
    ? { baudRate: options.baudRate, flowControl: 'hardware' }
    : { baudRate: options.baudRate };
}
