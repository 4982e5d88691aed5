/**
 * Main encoding entry point
 *
 * Flow: Bits → Validate → Scheme encoder → Waveform (spb samples per bit)
 */
import { LIMITS, LINE, isScheme, type Scheme } from '../utils/constants';
import { ConfigurationError, UnsupportedSchemeError } from '../utils/errors';
import { assertBitstream } from '../utils/helpers';
import {
  encodeAMI,
  encodeDifferentialManchester,
  encodeManchester,
  encodeNRZI,
  encodeNRZL,
} from './line-codes';
import { encodeAMIB8ZS, encodeAMIHDB3 } from './scramble';

export interface EncodeOptions {
  samplesPerBit?: number;  // Overrides LINE.SAMPLES_PER_BIT for this call
}

/**
 * Throw ConfigurationError unless spb is an even integer >= 2
 */
export function validateSamplesPerBit(spb: number): void {
  if (!Number.isInteger(spb) || spb < 2 || spb % 2 !== 0) {
    throw new ConfigurationError(
      `SAMPLES_PER_BIT must be even and >=2. Current: ${spb}`
    );
  }
}

/**
 * Check if a stream is within limits before encoding it
 */
export function checkStreamSize(
  bitCount: number,
  spb: number = LINE.SAMPLES_PER_BIT
): {
  valid: boolean;
  warning: boolean;
  samples: number;
  message?: string;
} {
  const samples = bitCount * spb;

  if (samples > LIMITS.MAX_SAMPLES) {
    return {
      valid: false,
      warning: false,
      samples,
      message: `Stream exceeds maximum size (${LIMITS.MAX_SAMPLES} samples)`,
    };
  }

  if (samples > LIMITS.SOFT_LIMIT_SAMPLES) {
    return {
      valid: true,
      warning: true,
      samples,
      message: `Large stream - ${samples} samples may be slow to plot`,
    };
  }

  return { valid: true, warning: false, samples };
}

/**
 * Encode a bitstream into a waveform
 *
 * @throws ConfigurationError for a malformed samples-per-bit setting
 * @throws UnsupportedSchemeError for an unknown scheme
 * @throws InvalidInputError for a non-binary bitstream
 */
export function encode(bits: string, scheme: string, options?: EncodeOptions): number[] {
  const spb = options?.samplesPerBit ?? LINE.SAMPLES_PER_BIT;
  validateSamplesPerBit(spb);

  if (!isScheme(scheme)) {
    throw new UnsupportedSchemeError(scheme);
  }
  assertBitstream(bits);

  return encodeWithScheme(bits, scheme, spb);
}

function encodeWithScheme(bits: string, scheme: Scheme, spb: number): number[] {
  switch (scheme) {
    case 'NRZ-L':
      return encodeNRZL(bits, spb);
    case 'NRZ-I':
      return encodeNRZI(bits, spb);
    case 'Manchester':
      return encodeManchester(bits, spb);
    case 'Differential Manchester':
      return encodeDifferentialManchester(bits, spb);
    case 'AMI':
      return encodeAMI(bits, spb);
    case 'AMI-B8ZS':
      return encodeAMIB8ZS(bits, spb);
    case 'AMI-HDB3':
      return encodeAMIHDB3(bits, spb);
    default: {
      const unreachable: never = scheme;
      throw new UnsupportedSchemeError(String(unreachable));
    }
  }
}

export {
  encodeAMI,
  encodeDifferentialManchester,
  encodeManchester,
  encodeNRZI,
  encodeNRZL,
} from './line-codes';
export { encodeAMIB8ZS, encodeAMIHDB3 } from './scramble';
