import { describe, it, expect, afterEach } from 'vitest';
import {
  encode,
  checkStreamSize,
  validateSamplesPerBit,
  encodeNRZL,
  encodeNRZI,
  encodeManchester,
  encodeDifferentialManchester,
  encodeAMI,
} from '../src/encode';
import { SCHEMES, LIMITS, setSamplesPerBit, getSamplesPerBit } from '../src/utils/constants';
import { ConfigurationError, InvalidInputError, UnsupportedSchemeError } from '../src/utils/errors';
import { WaveformBuffer, invert } from '../src/encode/waveform';
import { randomBits } from './helpers/bits';

afterEach(() => {
  setSamplesPerBit(4);
});

describe('Encode Pipeline', () => {
  describe('checkStreamSize', () => {
    it('should accept small streams', () => {
      const result = checkStreamSize(1000, 4);
      expect(result.valid).toBe(true);
      expect(result.warning).toBe(false);
      expect(result.samples).toBe(4000);
    });

    it('should warn for large streams', () => {
      const result = checkStreamSize(5001, 4);
      expect(result.valid).toBe(true);
      expect(result.warning).toBe(true);
      expect(result.message).toBe('Large stream - 20004 samples may be slow to plot');
    });

    it('should reject oversized streams', () => {
      const result = checkStreamSize(LIMITS.MAX_SAMPLES / 4 + 1, 4);
      expect(result.valid).toBe(false);
      expect(result.message).toBe('Stream exceeds maximum size (5000000 samples)');
    });

    it('should default to the configured samples per bit', () => {
      setSamplesPerBit(8);
      expect(checkStreamSize(10).samples).toBe(80);
    });
  });

  describe('validateSamplesPerBit', () => {
    it('should accept even values >= 2', () => {
      expect(() => validateSamplesPerBit(2)).not.toThrow();
      expect(() => validateSamplesPerBit(16)).not.toThrow();
    });

    it('should reject odd, small and fractional values', () => {
      for (const spb of [0, 1, 3, -2, 2.5, Number.NaN]) {
        expect(() => validateSamplesPerBit(spb)).toThrow(ConfigurationError);
      }
    });

    it('should report the current value', () => {
      expect(() => validateSamplesPerBit(3)).toThrow('SAMPLES_PER_BIT must be even and >=2. Current: 3');
    });
  });

  describe('encode', () => {
    it('should encode with every scheme', () => {
      for (const scheme of SCHEMES) {
        expect(encode('10110', scheme)).toHaveLength(20);
      }
    });

    it('should return an empty waveform for empty input', () => {
      for (const scheme of SCHEMES) {
        expect(encode('', scheme)).toEqual([]);
      }
    });

    it('should produce bits * spb samples', () => {
      const bits = randomBits(97, 11, 0.7);
      for (const spb of [2, 4, 6, 10]) {
        for (const scheme of SCHEMES) {
          expect(encode(bits, scheme, { samplesPerBit: spb })).toHaveLength(97 * spb);
        }
      }
    });

    it('should use the configured samples per bit', () => {
      setSamplesPerBit(6);
      expect(getSamplesPerBit()).toBe(6);
      expect(encode('101', 'AMI')).toHaveLength(18);
    });

    it('should prefer the per-call samples per bit', () => {
      setSamplesPerBit(6);
      expect(encode('101', 'AMI', { samplesPerBit: 2 })).toEqual([-1, -1, 0, 0, 1, 1]);
    });

    it('should fail on first use of a bad configured value', () => {
      setSamplesPerBit(5);
      expect(() => encode('1', 'NRZ-L')).toThrow(ConfigurationError);
    });

    it('should reject unknown schemes', () => {
      try {
        encode('101', 'RZ');
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(UnsupportedSchemeError);
        if (err instanceof UnsupportedSchemeError) {
          expect(err.scheme).toBe('RZ');
          expect(err.message).toBe('Unknown encoding scheme: RZ');
        }
      }
    });

    it('should reject non-binary bitstreams', () => {
      expect(() => encode('1021', 'AMI')).toThrow(InvalidInputError);
      expect(() => encode('1021', 'AMI')).toThrow('Bitstream may only contain 0 and 1 (found "2" at index 2)');
    });

    it('should check samples per bit before scheme and bits', () => {
      expect(() => encode('xyz', 'RZ', { samplesPerBit: 3 })).toThrow(ConfigurationError);
      expect(() => encode('xyz', 'RZ')).toThrow(UnsupportedSchemeError);
    });
  });
});

describe('Line codes', () => {
  it('NRZ-L should map 1 to HIGH and 0 to LOW', () => {
    expect(encodeNRZL('10', 2)).toEqual([1, 1, -1, -1]);
  });

  it('NRZ-I should toggle on 1 starting from LOW', () => {
    expect(encodeNRZI('1101', 2)).toEqual([1, 1, -1, -1, -1, -1, 1, 1]);
    expect(encodeNRZI('000', 2)).toEqual([-1, -1, -1, -1, -1, -1]);
  });

  it('Manchester should use LOW-HIGH for 1 and HIGH-LOW for 0', () => {
    expect(encodeManchester('10', 4)).toEqual([-1, -1, 1, 1, 1, 1, -1, -1]);
  });

  it('Manchester should have a transition at the middle of every cell', () => {
    const w = encodeManchester(randomBits(40, 3), 4);
    for (let cell = 0; cell < 40; cell++) {
      expect(w[cell * 4 + 1]).toBe(-w[cell * 4 + 2]);
    }
  });

  it('Differential Manchester should transition at cell start for 0', () => {
    expect(encodeDifferentialManchester('0110', 2)).toEqual([1, -1, -1, 1, 1, -1, 1, -1]);
  });

  it('AMI should alternate marks starting with -1', () => {
    expect(encodeAMI('101', 4)).toEqual([-1, -1, -1, -1, 0, 0, 0, 0, 1, 1, 1, 1]);
    expect(encodeAMI('1111', 2)).toEqual([-1, -1, 1, 1, -1, -1, 1, 1]);
  });

  it('AMI should leave zeros at level 0', () => {
    expect(encodeAMI('000', 2)).toEqual([0, 0, 0, 0, 0, 0]);
  });
});

describe('WaveformBuffer', () => {
  it('should write whole cells and half cells', () => {
    const w = new WaveformBuffer(4);
    w.pushCell(1);
    w.pushHalves(-1, 1);
    expect(w.cellCount).toBe(2);
    expect(w.toArray()).toEqual([1, 1, 1, 1, -1, -1, 1, 1]);
  });

  it('should overwrite an earlier cell', () => {
    const w = new WaveformBuffer(2);
    w.pushCell(0);
    w.pushCell(0);
    w.setCell(0, -1);
    expect(w.toArray()).toEqual([-1, -1, 0, 0]);
  });

  it('should reject cells that were never written', () => {
    const w = new WaveformBuffer(2);
    w.pushCell(0);
    expect(() => w.setCell(1, 1)).toThrow(RangeError);
    expect(() => w.setCell(-1, 1)).toThrow(RangeError);
  });

  it('should return a copy', () => {
    const w = new WaveformBuffer(2);
    w.pushCell(1);
    const out = w.toArray();
    out[0] = 0;
    expect(w.toArray()).toEqual([1, 1]);
  });

  it('invert should swap polarity', () => {
    expect(invert(1)).toBe(-1);
    expect(invert(-1)).toBe(1);
  });
});
