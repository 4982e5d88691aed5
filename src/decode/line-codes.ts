/**
 * Decoders for the unscrambled line codes
 *
 * Each walks the complete cells once. NRZ-I and Differential Manchester
 * carry information in transitions, so their first bit has no reference
 * and is emitted as CONVENTION.AMBIGUOUS_BIT.
 */
import { CONVENTION } from '../utils/constants';
import { cellAverage, cellCount, halfAverages, isPulse, signOf } from './detect';

export function decodeNRZL(waveform: readonly number[], spb: number, threshold: number): string {
  const n = cellCount(waveform, spb);
  let out = '';
  for (let i = 0; i < n; i++) {
    out += signOf(cellAverage(waveform, i, spb), threshold) > 0 ? '1' : '0';
  }
  return out;
}

export function decodeNRZI(waveform: readonly number[], spb: number, threshold: number): string {
  const n = cellCount(waveform, spb);
  if (n === 0) return '';

  let reference = signOf(cellAverage(waveform, 0, spb), threshold);
  let out: string = CONVENTION.AMBIGUOUS_BIT;

  for (let i = 1; i < n; i++) {
    const current = signOf(cellAverage(waveform, i, spb), threshold);
    out += current !== 0 && reference !== 0 && current !== reference ? '1' : '0';
    if (current !== 0) reference = current;
  }
  return out;
}

export function decodeManchester(waveform: readonly number[], spb: number, threshold: number): string {
  const n = cellCount(waveform, spb);
  let out = '';
  for (let i = 0; i < n; i++) {
    const { first, second } = halfAverages(waveform, i, spb);
    if (Math.abs(second - first) <= threshold) {
      // No usable mid-cell transition
      out += signOf(cellAverage(waveform, i, spb), threshold) > 0 ? '1' : '0';
    } else {
      out += first < second ? '1' : '0';
    }
  }
  return out;
}

export function decodeDifferentialManchester(
  waveform: readonly number[],
  spb: number,
  threshold: number
): string {
  const n = cellCount(waveform, spb);
  if (n === 0) return '';

  let previousEnd = halfAverages(waveform, 0, spb).second;
  let out: string = CONVENTION.AMBIGUOUS_BIT;

  for (let i = 1; i < n; i++) {
    const { first, second } = halfAverages(waveform, i, spb);
    const noTransition = signOf(first, threshold) === signOf(previousEnd, threshold);
    out += noTransition ? '1' : '0';
    previousEnd = second;
  }
  return out;
}

/**
 * Plain AMI: any pulse is a 1, polarity is ignored
 */
export function decodeAMI(waveform: readonly number[], spb: number, threshold: number): string {
  const n = cellCount(waveform, spb);
  let out = '';
  for (let i = 0; i < n; i++) {
    out += isPulse(cellAverage(waveform, i, spb), threshold) ? '1' : '0';
  }
  return out;
}
