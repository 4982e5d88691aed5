/**
 * Presentation adapters for waveforms
 */
import { cellAverages, computeThreshold, isPulse, signOf } from '../decode/detect';

export interface WaveformPoint {
  index: number;
  level: number;
}

export interface StepPoint {
  x: number;  // time in bits
  y: number;
}

/**
 * Every sample as an (index, level) pair, in order
 */
export function toPoints(waveform: readonly number[]): WaveformPoint[] {
  return waveform.map((level, index) => ({ index, level }));
}

/**
 * Step plot with one point per corner instead of one per sample.
 * Horizontal runs are extended in place; a level change adds a vertical
 * edge at the sample boundary.
 */
export function toStepPoints(waveform: readonly number[], spb: number): StepPoint[] {
  if (waveform.length === 0 || spb <= 0) return [];

  const points: StepPoint[] = [{ x: 0, y: waveform[0] }];
  let last: StepPoint = { x: 1 / spb, y: waveform[0] };
  points.push(last);

  for (let si = 1; si < waveform.length; si++) {
    const level = waveform[si];
    const sampleStart = si / spb;
    const sampleEnd = (si + 1) / spb;

    if (level === waveform[si - 1]) {
      last.x = sampleEnd;
      continue;
    }
    points.push({ x: sampleStart, y: level });
    last = { x: sampleEnd, y: level };
    points.push(last);
  }

  return points;
}

/**
 * Three-row text plot (+1, 0, -1), one column per sample, cells split by '|'
 */
export function renderAscii(waveform: readonly number[], spb: number): string {
  if (waveform.length === 0 || spb <= 0) return '';

  const threshold = computeThreshold(waveform);
  let top = '+1 ';
  let middle = ' 0 ';
  let bottom = '-1 ';

  for (let i = 0; i < waveform.length; i++) {
    if (i > 0 && i % spb === 0) {
      top += '|';
      middle += '|';
      bottom += '|';
    }
    const sign = signOf(waveform[i], threshold);
    top += sign === 1 ? '#' : ' ';
    middle += sign === 0 ? '#' : ' ';
    bottom += sign === -1 ? '#' : ' ';
  }

  return [top, middle, bottom].join('\n');
}

/**
 * Longest run of consecutive cells without a pulse
 */
export function longestZeroRun(waveform: readonly number[], spb: number): number {
  if (waveform.length === 0 || spb <= 0) return 0;

  const threshold = computeThreshold(waveform);
  let longest = 0;
  let current = 0;
  for (const avg of cellAverages(waveform, spb)) {
    if (isPulse(avg, threshold)) {
      current = 0;
    } else {
      current++;
      if (current > longest) longest = current;
    }
  }
  return longest;
}
