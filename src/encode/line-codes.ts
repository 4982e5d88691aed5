/**
 * Unscrambled line codes
 *
 * Conventions:
 *  - Manchester (IEEE 802.3): '1' = LOW then HIGH, '0' = HIGH then LOW
 *  - Differential Manchester: start-of-cell transition => '0', none => '1';
 *    every cell toggles at mid-bit
 *  - NRZ-I and Differential Manchester start from LOW
 *  - AMI marks alternate, starting with -1
 *
 * Inputs are assumed validated by encode().
 */
import { CONVENTION, LEVEL, type Polarity } from '../utils/constants';
import { WaveformBuffer, invert } from './waveform';

export function encodeNRZL(bits: string, spb: number): number[] {
  const w = new WaveformBuffer(spb);
  for (const c of bits) {
    w.pushCell(c === '1' ? LEVEL.HIGH : LEVEL.LOW);
  }
  return w.toArray();
}

export function encodeNRZI(bits: string, spb: number): number[] {
  const w = new WaveformBuffer(spb);
  let level: Polarity = CONVENTION.INITIAL_LEVEL;
  for (const c of bits) {
    if (c === '1') level = invert(level);
    w.pushCell(level);
  }
  return w.toArray();
}

export function encodeManchester(bits: string, spb: number): number[] {
  const w = new WaveformBuffer(spb);
  for (const c of bits) {
    if (c === '1') {
      w.pushHalves(LEVEL.LOW, LEVEL.HIGH);
    } else {
      w.pushHalves(LEVEL.HIGH, LEVEL.LOW);
    }
  }
  return w.toArray();
}

export function encodeDifferentialManchester(bits: string, spb: number): number[] {
  const w = new WaveformBuffer(spb);
  let level: Polarity = CONVENTION.INITIAL_LEVEL;
  for (const c of bits) {
    if (c === '0') level = invert(level); // start-of-cell transition encodes 0
    const first = level;
    level = invert(level);                // mandatory mid-cell transition
    w.pushHalves(first, level);
  }
  return w.toArray();
}

export function encodeAMI(bits: string, spb: number): number[] {
  const w = new WaveformBuffer(spb);
  let lastPolarity: Polarity = CONVENTION.AMI_PRIOR_PULSE;
  for (const c of bits) {
    if (c === '0') {
      w.pushCell(LEVEL.ZERO);
    } else {
      lastPolarity = invert(lastPolarity);
      w.pushCell(lastPolarity);
    }
  }
  return w.toArray();
}
