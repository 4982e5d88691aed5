/**
 * linecode - line coding and zero-run scrambling codec
 */
export {
  encode,
  validateSamplesPerBit,
  checkStreamSize,
  encodeNRZL,
  encodeNRZI,
  encodeManchester,
  encodeDifferentialManchester,
  encodeAMI,
  encodeAMIB8ZS,
  encodeAMIHDB3,
  type EncodeOptions,
} from './encode';
export {
  decode,
  DECODE_SENTINEL,
  isDecodeSentinel,
  unscrambleB8ZS,
  unscrambleHDB3,
  computeThreshold,
  type DecodeSentinel,
} from './decode';
export {
  SCHEMES,
  LEVEL,
  LINE,
  CONVENTION,
  LIMITS,
  isScheme,
  setSamplesPerBit,
  getSamplesPerBit,
  type Scheme,
  type Polarity,
} from './utils/constants';
export { ConfigurationError, InvalidInputError, UnsupportedSchemeError } from './utils/errors';
export { normalizeBits, isBitstream, assertBitstream, compareBits, formatBits } from './utils/helpers';
export { toPoints, toStepPoints, renderAscii, longestZeroRun } from './lib/plot';
export type { WaveformPoint, StepPoint } from './lib/plot';
export {
  analogSineWave,
  pcmFromAnalog,
  pcmSampledWave,
  deltaModFromAnalog,
  parseAnalogParams,
  type AnalogParams,
  type AnalogPoint,
} from './analog';
export { BUILD_VERSION } from './utils/version';
