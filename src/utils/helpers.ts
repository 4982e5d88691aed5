import { InvalidInputError } from './errors';

/**
 * Strip whitespace and commas so "1100 1010" and "1,1,0" are accepted
 */
export function normalizeBits(input: string): string {
  return input.replace(/[\s,]+/g, '');
}

export function isBitstream(bits: string): boolean {
  return /^[01]*$/.test(bits);
}

/**
 * Throw InvalidInputError on the first non-binary symbol
 */
export function assertBitstream(bits: string): void {
  for (let i = 0; i < bits.length; i++) {
    const c = bits[i];
    if (c !== '0' && c !== '1') {
      throw new InvalidInputError(
        `Bitstream may only contain 0 and 1 (found "${c}" at index ${i})`
      );
    }
  }
}

export interface BitComparison {
  equal: boolean;
  mismatches: number[];
  lengthDelta: number;
}

/**
 * Compare two bitstreams position by position.
 * Positions past the shorter stream are not counted as mismatches.
 */
export function compareBits(expected: string, actual: string): BitComparison {
  const mismatches: number[] = [];
  const n = Math.min(expected.length, actual.length);
  for (let i = 0; i < n; i++) {
    if (expected[i] !== actual[i]) {
      mismatches.push(i);
    }
  }
  const lengthDelta = actual.length - expected.length;
  return {
    equal: mismatches.length === 0 && lengthDelta === 0,
    mismatches,
    lengthDelta,
  };
}

/**
 * Group bits for display, e.g. formatBits('10110011', 4) === '1011 0011'
 */
export function formatBits(bits: string, group = 8): string {
  if (group <= 0) return bits;
  const parts: string[] = [];
  for (let i = 0; i < bits.length; i += group) {
    parts.push(bits.slice(i, i + group));
  }
  return parts.join(' ');
}
