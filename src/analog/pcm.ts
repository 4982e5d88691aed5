/**
 * Pulse-code modulation of a sine source
 *
 * Each sample is quantized to one of 2^nBits levels spread evenly over
 * [-amp, amp] and written MSB first.
 */
import { ANALOG } from '../utils/constants';
import { InvalidInputError } from '../utils/errors';
import { sampleTimes, sineAt, validateAnalogParams, type AnalogParams, type AnalogPoint } from './sine';

function validateBits(nBits: number): void {
  if (!Number.isInteger(nBits) || nBits <= 0 || nBits > ANALOG.PCM_MAX_BITS) {
    throw new InvalidInputError(
      `Invalid PCM resolution: nBits must be an integer in 1..${ANALOG.PCM_MAX_BITS}`
    );
  }
}

/**
 * Quantizer index of a value, clamped to [0, levels - 1]
 */
export function quantize(v: number, amp: number, nBits: number): number {
  const levels = 2 ** nBits;
  const stepSize = (2 * amp) / (levels - 1);
  const idx = Math.round((v + amp) / stepSize);
  return Math.max(0, Math.min(idx, levels - 1));
}

export function pcmFromAnalog(params: AnalogParams, nBits: number = ANALOG.PCM_BITS): string {
  validateAnalogParams(params);
  validateBits(nBits);

  let out = '';
  for (const t of sampleTimes(params)) {
    const idx = quantize(sineAt(params, t), params.amp, nBits);
    out += idx.toString(2).padStart(nBits, '0');
  }
  return out;
}

/**
 * Quantized levels as a step plot: each sample holds until the next one
 */
export function pcmSampledWave(params: AnalogParams, nBits: number = ANALOG.PCM_BITS): AnalogPoint[] {
  validateAnalogParams(params);
  validateBits(nBits);

  const timePerSample = params.duration / params.samples;
  const levels = 2 ** nBits;
  const stepSize = (2 * params.amp) / (levels - 1);
  const out: AnalogPoint[] = [];
  for (const t of sampleTimes(params)) {
    const level = -params.amp + quantize(sineAt(params, t), params.amp, nBits) * stepSize;
    out.push({ t, v: level });
    out.push({ t: t + timePerSample, v: level });
  }
  return out;
}
