/**
 * End-to-end: encode → decode for every scheme, on fixed and
 * pseudo-random bitstreams
 */
import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import {
  encode,
  decode,
  compareBits,
  longestZeroRun,
  SCHEMES,
  DECODE_SENTINEL,
  type Scheme,
} from '../../src';
import { randomBits } from '../helpers/bits';

// First bit carries no information in these schemes
const TRANSITION_CODED: readonly Scheme[] = ['NRZ-I', 'Differential Manchester'];

function expectRoundtrip(bits: string, scheme: Scheme, spb: number): void {
  const decoded = decode(encode(bits, scheme, { samplesPerBit: spb }), scheme, spb);
  if (TRANSITION_CODED.includes(scheme) && bits.length > 0) {
    expect(decoded.slice(1)).toBe(bits.slice(1));
    expect(decoded[0]).toBe('0');
  } else {
    expect(decoded).toBe(bits);
  }
}

beforeAll(() => {
  // Unscramblers log every reverted block
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterAll(() => {
  vi.restoreAllMocks();
});

describe('E2E Roundtrip', () => {
  it('should decode what it encodes for every scheme', () => {
    const samples = ['0', '1', '10', '0110100111', '1000000001', '0000000000000000', '1111111111'];
    for (const scheme of SCHEMES) {
      for (const bits of samples) {
        expectRoundtrip(bits, scheme, 4);
      }
    }
  });

  it('should round-trip random streams at several cell sizes', () => {
    for (const scheme of SCHEMES) {
      for (const spb of [2, 4, 8]) {
        for (let seed = 1; seed <= 5; seed++) {
          expectRoundtrip(randomBits(200, seed * 31 + spb), scheme, spb);
        }
      }
    }
  });

  it('should round-trip zero-heavy streams through the scramblers', () => {
    for (const scheme of ['AMI-B8ZS', 'AMI-HDB3'] as const) {
      for (let seed = 1; seed <= 25; seed++) {
        const bits = randomBits(300, seed, 0.85);
        const waveform = encode(bits, scheme, { samplesPerBit: 2 });
        expect(compareBits(bits, decode(waveform, scheme, 2)).mismatches).toEqual([]);
      }
    }
  });

  it('should bound zero runs only for the scrambled schemes', () => {
    const bits = '1' + '0'.repeat(40) + '1';
    expect(longestZeroRun(encode(bits, 'AMI', { samplesPerBit: 4 }), 4)).toBe(40);
    expect(longestZeroRun(encode(bits, 'AMI-B8ZS', { samplesPerBit: 4 }), 4)).toBeLessThanOrEqual(7);
    expect(longestZeroRun(encode(bits, 'AMI-HDB3', { samplesPerBit: 4 }), 4)).toBeLessThanOrEqual(3);
  });

  it('should handle empty input in both directions', () => {
    for (const scheme of SCHEMES) {
      const waveform = encode('', scheme);
      expect(waveform).toEqual([]);
      expect(decode(waveform, scheme, 4)).toBe(DECODE_SENTINEL.EMPTY);
    }
  });

  describe('Scenarios', () => {
    it('AMI "101" at 4 samples per bit', () => {
      const waveform = encode('101', 'AMI', { samplesPerBit: 4 });
      expect(waveform).toEqual([-1, -1, -1, -1, 0, 0, 0, 0, 1, 1, 1, 1]);
      expect(decode(waveform, 'AMI', 4)).toBe('101');
    });

    it('B8ZS on eight zeros', () => {
      const waveform = encode('00000000', 'AMI-B8ZS', { samplesPerBit: 2 });
      expect(waveform.filter((_, i) => i % 2 === 0)).toEqual([0, 0, 0, -1, 1, 0, -1, 1]);
      expect(decode(waveform, 'AMI', 2)).toBe('00011011');
      expect(decode(waveform, 'AMI-B8ZS', 2)).toBe('00000000');
    });

    it('HDB3 on "10000"', () => {
      const waveform = encode('10000', 'AMI-HDB3', { samplesPerBit: 2 });
      expect(waveform).toEqual([1, 1, 0, 0, 0, 0, 0, 0, 1, 1]);
      expect(decode(waveform, 'AMI-HDB3', 2)).toBe('10000');
    });

    it('NRZ-I "1101" loses only the first bit', () => {
      const waveform = encode('1101', 'NRZ-I', { samplesPerBit: 2 });
      const decoded = decode(waveform, 'NRZ-I', 2);
      expect(decoded).toBe('0101');
      expect(compareBits('1101', decoded).mismatches).toEqual([0]);
    });

    it('Manchester "10" with noise on every sample', () => {
      const waveform = encode('10', 'Manchester', { samplesPerBit: 4 }).map(
        (v, i) => v * 0.9 + (i % 3 === 0 ? 0.08 : -0.04)
      );
      expect(decode(waveform, 'Manchester', 4)).toBe('10');
    });
  });
});
