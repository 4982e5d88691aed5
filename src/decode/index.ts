/**
 * Main decoding entry point
 *
 * Flow: Waveform → Threshold → Per-cell decisions → (Unscramble) → Bits
 *
 * Decoding is best effort: input may come from a file or an imprecise
 * source, so bad input yields a descriptive sentinel string instead of
 * an exception.
 */
import { isScheme, type Scheme } from '../utils/constants';
import { computeThreshold } from './detect';
import {
  decodeAMI,
  decodeDifferentialManchester,
  decodeManchester,
  decodeNRZI,
  decodeNRZL,
} from './line-codes';
import { unscrambleB8ZS, unscrambleHDB3 } from './descramble';

export const DECODE_SENTINEL = {
  EMPTY: '(Empty waveform)',
  INVALID_SPB: '(Invalid samplesPerBit)',
  UNSUPPORTED: '(Unsupported decoding)',
} as const;

export type DecodeSentinel = (typeof DECODE_SENTINEL)[keyof typeof DECODE_SENTINEL];

export function isDecodeSentinel(result: string): result is DecodeSentinel {
  return (
    result === DECODE_SENTINEL.EMPTY ||
    result === DECODE_SENTINEL.INVALID_SPB ||
    result === DECODE_SENTINEL.UNSUPPORTED
  );
}

/**
 * Decode a waveform back to a bitstream, or return a sentinel
 */
export function decode(waveform: readonly number[], scheme: string, spb: number): string {
  if (waveform.length === 0) return DECODE_SENTINEL.EMPTY;
  if (!Number.isInteger(spb) || spb <= 0) return DECODE_SENTINEL.INVALID_SPB;
  if (!isScheme(scheme)) return DECODE_SENTINEL.UNSUPPORTED;

  const threshold = computeThreshold(waveform);
  return decodeWithScheme(waveform, scheme, spb, threshold);
}

function decodeWithScheme(
  waveform: readonly number[],
  scheme: Scheme,
  spb: number,
  threshold: number
): string {
  switch (scheme) {
    case 'NRZ-L':
      return decodeNRZL(waveform, spb, threshold);
    case 'NRZ-I':
      return decodeNRZI(waveform, spb, threshold);
    case 'Manchester':
      return decodeManchester(waveform, spb, threshold);
    case 'Differential Manchester':
      return decodeDifferentialManchester(waveform, spb, threshold);
    case 'AMI':
      return decodeAMI(waveform, spb, threshold);
    case 'AMI-B8ZS':
      return unscrambleB8ZS(decodeAMI(waveform, spb, threshold), waveform, spb, threshold);
    case 'AMI-HDB3':
      return unscrambleHDB3(decodeAMI(waveform, spb, threshold), waveform, spb, threshold);
    default: {
      const unreachable: never = scheme;
      return unreachable;
    }
  }
}

export {
  decodeAMI,
  decodeDifferentialManchester,
  decodeManchester,
  decodeNRZI,
  decodeNRZL,
} from './line-codes';
export { unscrambleB8ZS, unscrambleHDB3 } from './descramble';
export { computeThreshold } from './detect';
