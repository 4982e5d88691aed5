/**
 * Unscramblers for AMI-B8ZS and AMI-HDB3
 *
 * A plain AMI decode turns every substitution block into spurious 1s.
 * The bits alone cannot tell a block from data, so each candidate window
 * is checked against the waveform for the polarity-violation signature
 * and, on a match, its bits are reset to zero.
 *
 * Matching is greedy: the first matching window wins and the scan resumes
 * after it, without backtracking.
 */
import { SUBSTITUTION } from '../utils/constants';
import { cellAverages, isPulse, lookBackPolarity, signOf } from './detect';

function replaceWithZeros(bits: string[], start: number, length: number): void {
  for (let k = 0; k < length; k++) bits[start + k] = '0';
}

/**
 * Revert B8ZS blocks (000VB0VB) in a preliminary AMI decode
 */
export function unscrambleB8ZS(
  prelimBits: string,
  waveform: readonly number[],
  spb: number,
  threshold: number
): string {
  const run = SUBSTITUTION.B8ZS_RUN;
  if (prelimBits.length < run) return prelimBits;

  const averages = cellAverages(waveform, spb);
  const out = prelimBits.split('');
  const n = Math.min(prelimBits.length, averages.length);
  const pulsePositions = [
    SUBSTITUTION.B8ZS_V1,
    SUBSTITUTION.B8ZS_B1,
    SUBSTITUTION.B8ZS_V2,
    SUBSTITUTION.B8ZS_B2,
  ];

  for (let b = 0; b + run <= n; b++) {
    const quiet = SUBSTITUTION.B8ZS_QUIET.every(k => !isPulse(averages[b + k], threshold));
    const pulses = pulsePositions.every(k => isPulse(averages[b + k], threshold));
    if (!quiet || !pulses) continue;

    const expected = lookBackPolarity(averages, b, threshold);
    const polarityOk =
      signOf(averages[b + SUBSTITUTION.B8ZS_V1], threshold) === expected &&
      signOf(averages[b + SUBSTITUTION.B8ZS_B1], threshold) === -expected &&
      signOf(averages[b + SUBSTITUTION.B8ZS_V2], threshold) === expected &&
      signOf(averages[b + SUBSTITUTION.B8ZS_B2], threshold) === -expected;
    if (!polarityOk) continue;

    console.log('[Descramble] B8ZS block at bit', b);
    replaceWithZeros(out, b, run);
    b += run - 1;
  }

  return out.join('');
}

/**
 * Revert HDB3 blocks (000V or B00V) in a preliminary AMI decode
 */
export function unscrambleHDB3(
  prelimBits: string,
  waveform: readonly number[],
  spb: number,
  threshold: number
): string {
  const run = SUBSTITUTION.HDB3_RUN;
  if (prelimBits.length < run) return prelimBits;

  const averages = cellAverages(waveform, spb);
  const out = prelimBits.split('');
  const n = Math.min(prelimBits.length, averages.length);

  for (let b = 0; b + run <= n; b++) {
    const s0 = signOf(averages[b], threshold);
    const s1 = signOf(averages[b + 1], threshold);
    const s2 = signOf(averages[b + 2], threshold);
    const s3 = signOf(averages[b + 3], threshold);
    if (s1 !== 0 || s2 !== 0 || s3 === 0) continue;

    const expected = lookBackPolarity(averages, b, threshold);

    // 000V: V repeats the previous pulse
    const zeroZeroZeroV = s0 === 0 && s3 === expected;
    // B00V: B alternates from the previous pulse, V repeats B
    const bZeroZeroV = s0 !== 0 && s0 === -expected && s3 === s0;
    if (!zeroZeroZeroV && !bZeroZeroV) continue;

    console.log('[Descramble] HDB3', zeroZeroZeroV ? '000V' : 'B00V', 'block at bit', b);
    replaceWithZeros(out, b, run);
    b += run - 1;
  }

  return out.join('');
}
