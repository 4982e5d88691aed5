/**
 * Delta modulation of a sine source
 *
 * One bit per sample: 1 when the source is at or above the running
 * estimate (estimate steps up), 0 otherwise (estimate steps down).
 * The estimate is clamped to [-amp, amp].
 */
import { ANALOG } from '../utils/constants';
import { InvalidInputError } from '../utils/errors';
import { sampleTimes, sineAt, validateAnalogParams, type AnalogParams } from './sine';

export function deltaModFromAnalog(params: AnalogParams, step?: number): string {
  validateAnalogParams(params);
  const delta = step ?? params.amp / ANALOG.DM_STEP_DIVISOR;
  if (!(delta > 0)) {
    throw new InvalidInputError('Delta mod step must be > 0');
  }

  let estimate = 0;
  let out = '';
  for (const t of sampleTimes(params)) {
    if (sineAt(params, t) >= estimate) {
      out += '1';
      estimate += delta;
    } else {
      out += '0';
      estimate -= delta;
    }
    estimate = Math.max(-params.amp, Math.min(params.amp, estimate));
  }
  return out;
}
