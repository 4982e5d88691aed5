// Line coding schemes, in the order they are presented to users
export const SCHEMES = [
  'NRZ-L',
  'NRZ-I',
  'Manchester',
  'Differential Manchester',
  'AMI',
  'AMI-B8ZS',
  'AMI-HDB3',
] as const;

export type Scheme = (typeof SCHEMES)[number];

export function isScheme(value: string): value is Scheme {
  return SCHEMES.some(scheme => scheme === value);
}

// Discrete signal levels
export const LEVEL = {
  HIGH: 1,
  LOW: -1,
  ZERO: 0,
} as const;

export type Polarity = typeof LEVEL.HIGH | typeof LEVEL.LOW;

// Line settings - mutable object, read by every encode call
export const LINE = {
  SAMPLES_PER_BIT: 4,         // MUST be even and >= 2
};

export function setSamplesPerBit(spb: number): void {
  // Validated lazily by the encoder so a bad value fails on first use
  LINE.SAMPLES_PER_BIT = spb;
}

export function getSamplesPerBit(): number {
  return LINE.SAMPLES_PER_BIT;
}

// Fixed assumptions shared by encoder and decoder. Nothing on the line
// tells the decoder what the initial state was.
export const CONVENTION = {
  INITIAL_LEVEL: LEVEL.LOW,              // NRZ-I, Differential Manchester
  AMI_PRIOR_PULSE: LEVEL.HIGH,           // plain AMI: first mark is -1
  SUBSTITUTION_PRIOR_PULSE: LEVEL.LOW,   // B8ZS/HDB3: pulse assumed before the stream
  AMBIGUOUS_BIT: '0',                   // first bit of NRZ-I / Differential Manchester
} as const;

// Amplitude classification: threshold = max(MIN_THRESHOLD, maxAbs * THRESHOLD_RATIO)
export const DETECTION = {
  MIN_THRESHOLD: 0.05,
  THRESHOLD_RATIO: 0.25,
} as const;

// Zero-run substitution
export const SUBSTITUTION = {
  B8ZS_RUN: 8,
  B8ZS_V1: 3,
  B8ZS_B1: 4,
  B8ZS_V2: 6,
  B8ZS_B2: 7,
  B8ZS_QUIET: [0, 1, 2, 5],
  HDB3_RUN: 4,
} as const;

// Limits
export const LIMITS = {
  SOFT_LIMIT_SAMPLES: 20000,      // warn, rendering gets slow past this
  MAX_SAMPLES: 5_000_000,         // hard limit for CLI input
} as const;

// Analog front-end defaults
export const ANALOG = {
  PCM_BITS: 8,
  PCM_MAX_BITS: 16,
  DM_STEP_DIVISOR: 16,            // default delta step = amp / 16
  DEFAULT_PARAMS: {
    freq: 1,
    amp: 1,
    duration: 1,
    samples: 50,
  },
} as const;

// WAV export: one bit lasts 1ms regardless of spb
export const WAV = {
  CELL_RATE: 1000,
} as const;
