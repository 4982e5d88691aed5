/**
 * Level detection on sampled cells
 *
 * Every decision is made on averages (whole cell or half cell) compared
 * against a threshold scaled to the strongest sample, so scaled or
 * slightly noisy input decodes the same as ideal +1/0/-1 levels.
 */
import { CONVENTION, DETECTION } from '../utils/constants';

export type Sign = -1 | 0 | 1;

/**
 * Magnitude threshold for a waveform: max(0.05, maxAbs * 0.25)
 */
export function computeThreshold(waveform: readonly number[]): number {
  let maxAbs = 0;
  for (const v of waveform) {
    const a = Math.abs(v);
    if (a > maxAbs) maxAbs = a;
  }
  return Math.max(DETECTION.MIN_THRESHOLD, maxAbs * DETECTION.THRESHOLD_RATIO);
}

/**
 * Number of complete cells; a trailing partial cell is ignored
 */
export function cellCount(waveform: readonly number[], spb: number): number {
  return Math.floor(waveform.length / spb);
}

/**
 * Mean of samples [start, end), clipped to the waveform. 0 when empty.
 */
export function averageRange(waveform: readonly number[], start: number, end: number): number {
  const s = Math.max(0, start);
  const e = Math.min(waveform.length, end);
  if (e <= s) return 0;
  let sum = 0;
  for (let i = s; i < e; i++) sum += waveform[i];
  return sum / (e - s);
}

export function cellAverage(waveform: readonly number[], cell: number, spb: number): number {
  const start = cell * spb;
  return averageRange(waveform, start, start + spb);
}

/**
 * First-half and second-half averages of a cell
 */
export function halfAverages(
  waveform: readonly number[],
  cell: number,
  spb: number
): { first: number; second: number } {
  const start = cell * spb;
  const half = Math.max(1, Math.floor(spb / 2));
  return {
    first: averageRange(waveform, start, start + half),
    second: averageRange(waveform, start + half, start + spb),
  };
}

/**
 * Sign with a dead zone: values within the threshold count as 0
 */
export function signOf(value: number, threshold: number): Sign {
  if (value > threshold) return 1;
  if (value < -threshold) return -1;
  return 0;
}

export function isPulse(value: number, threshold: number): boolean {
  return Math.abs(value) > threshold;
}

/**
 * Polarity of the most recent pulse before a cell.
 * Falls back to the encoder's assumed pulse before the stream.
 */
export function lookBackPolarity(
  cellAverages: readonly number[],
  beforeCell: number,
  threshold: number
): -1 | 1 {
  for (let i = beforeCell - 1; i >= 0; i--) {
    const sign = signOf(cellAverages[i], threshold);
    if (sign !== 0) return sign;
  }
  return CONVENTION.SUBSTITUTION_PRIOR_PULSE;
}

/**
 * Averages of every complete cell
 */
export function cellAverages(waveform: readonly number[], spb: number): number[] {
  const n = cellCount(waveform, spb);
  const out: number[] = new Array<number>(n);
  for (let i = 0; i < n; i++) out[i] = cellAverage(waveform, i, spb);
  return out;
}
