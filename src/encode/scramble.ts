/**
 * Zero-run substitution scramblers over AMI
 *
 * Purpose: Guarantee transitions on long runs of zeros so the receiver
 * keeps clock. Runs are replaced by blocks containing polarity violations
 * (V) that the decoder can detect and revert.
 *
 * B8ZS: every 8th consecutive zero rewrites the run as 000VB0VB
 * HDB3: every 4th consecutive zero rewrites the run as B00V (even pulse
 *       count since the last substitution) or 000V (odd)
 *
 * Both take the pulse before the stream as -1, so the first mark is +1
 * and a leading run substitutes against -1.
 */
import { CONVENTION, LEVEL, SUBSTITUTION, type Polarity } from '../utils/constants';
import { WaveformBuffer, invert } from './waveform';

/**
 * AMI with B8ZS substitution
 *
 * Within the 8-cell block, with L the polarity of the last pulse before it:
 * V at 3 = L, B at 4 = -L, V at 6 = L, B at 7 = -L.
 */
export function encodeAMIB8ZS(bits: string, spb: number): number[] {
  const w = new WaveformBuffer(spb);
  let lastPolarity: Polarity = CONVENTION.SUBSTITUTION_PRIOR_PULSE;
  let zeroCount = 0;

  for (const c of bits) {
    if (c === '1') {
      zeroCount = 0;
      lastPolarity = invert(lastPolarity);
      w.pushCell(lastPolarity);
      continue;
    }

    zeroCount++;
    w.pushCell(LEVEL.ZERO);
    if (zeroCount < SUBSTITUTION.B8ZS_RUN) continue;

    const start = w.cellCount - SUBSTITUTION.B8ZS_RUN;
    const v: Polarity = lastPolarity;
    const b = invert(v);

    w.setCell(start + SUBSTITUTION.B8ZS_V1, v);
    w.setCell(start + SUBSTITUTION.B8ZS_B1, b);
    w.setCell(start + SUBSTITUTION.B8ZS_V2, v);
    w.setCell(start + SUBSTITUTION.B8ZS_B2, b);

    lastPolarity = b;
    zeroCount = 0;
  }

  return w.toArray();
}

/**
 * AMI with HDB3 substitution
 */
export function encodeAMIHDB3(bits: string, spb: number): number[] {
  const w = new WaveformBuffer(spb);
  let lastPolarity: Polarity = CONVENTION.SUBSTITUTION_PRIOR_PULSE;
  let zeroCount = 0;
  let pulsesSinceSubstitution = 0;

  for (const c of bits) {
    if (c === '1') {
      zeroCount = 0;
      lastPolarity = invert(lastPolarity);
      w.pushCell(lastPolarity);
      pulsesSinceSubstitution++;
      continue;
    }

    zeroCount++;
    w.pushCell(LEVEL.ZERO);
    if (zeroCount < SUBSTITUTION.HDB3_RUN) continue;

    const start = w.cellCount - SUBSTITUTION.HDB3_RUN;
    if (pulsesSinceSubstitution % 2 === 0) {
      // B00V: B restores alternation, V repeats B
      const b = invert(lastPolarity);
      w.setCell(start, b);
      w.setCell(start + 3, b);
      lastPolarity = b;
    } else {
      // 000V: V repeats the last pulse
      w.setCell(start + 3, lastPolarity);
    }

    zeroCount = 0;
    pulsesSinceSubstitution = 0;
  }

  return w.toArray();
}
