import { ANALOG } from '../utils/constants';
import { InvalidInputError } from '../utils/errors';
import type { AnalogParams } from './sine';

/**
 * Parse "freq=1;amp=1;duration=1;samples=50".
 * Missing keys take defaults, unknown keys and bare words are ignored.
 */
export function parseAnalogParams(input: string): AnalogParams {
  const params: AnalogParams = { ...ANALOG.DEFAULT_PARAMS };

  for (const part of input.split(';')) {
    const eq = part.indexOf('=');
    if (eq < 0) continue;
    const key = part.slice(0, eq).trim();
    const raw = part.slice(eq + 1).trim();
    if (key !== 'freq' && key !== 'amp' && key !== 'duration' && key !== 'samples') continue;

    const value = Number(raw);
    if (raw === '' || !Number.isFinite(value)) {
      throw new InvalidInputError(
        `Invalid value for ${key}: "${raw}". Use format: freq=1;amp=1;duration=1;samples=50`
      );
    }
    if (key === 'samples' && !Number.isInteger(value)) {
      throw new InvalidInputError(`samples must be an integer, got ${raw}`);
    }
    params[key] = value;
  }

  return params;
}
