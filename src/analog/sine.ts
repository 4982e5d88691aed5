/**
 * Sine source shared by the PCM and delta-modulation front-ends
 */
import { InvalidInputError } from '../utils/errors';

export interface AnalogParams {
  freq: number;      // Hz
  amp: number;       // peak amplitude
  duration: number;  // seconds
  samples: number;   // sample count over the duration
}

export interface AnalogPoint {
  t: number;
  v: number;
}

export function validateAnalogParams(params: AnalogParams): void {
  const { amp, duration, samples } = params;
  if (!Number.isInteger(samples) || samples <= 0 || !(duration > 0) || !(amp > 0)) {
    throw new InvalidInputError(
      'Invalid analog parameters: samples, duration and amp must be > 0'
    );
  }
  if (!Number.isFinite(params.freq)) {
    throw new InvalidInputError('Invalid analog parameters: freq must be a number');
  }
}

export function sineAt(params: AnalogParams, t: number): number {
  return params.amp * Math.sin(2 * Math.PI * params.freq * t);
}

/**
 * Sample times i / fs for i in [0, samples), fs = samples / duration
 */
export function sampleTimes(params: AnalogParams): number[] {
  const fs = params.samples / params.duration;
  return Array.from({ length: params.samples }, (_, i) => i / fs);
}

/**
 * Continuous source for plotting, numPoints evenly spaced over the duration
 */
export function analogSineWave(params: Omit<AnalogParams, 'samples'>, numPoints: number): AnalogPoint[] {
  const n = Math.max(2, Math.floor(numPoints));
  const step = params.duration / (n - 1);
  const out: AnalogPoint[] = [];
  for (let i = 0; i < n; i++) {
    const t = i * step;
    out.push({ t, v: params.amp * Math.sin(2 * Math.PI * params.freq * t) });
  }
  return out;
}
