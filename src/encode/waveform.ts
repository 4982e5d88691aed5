/**
 * Cell-addressed waveform buffer
 *
 * Encoders append one cell (samplesPerBit samples) per bit. Zero-run
 * substitution needs to go back and rewrite cells that were already
 * emitted, so cells stay addressable until toArray() is called.
 */
import { LEVEL, type Polarity } from '../utils/constants';

export function invert(polarity: Polarity): Polarity {
  return polarity === LEVEL.HIGH ? LEVEL.LOW : LEVEL.HIGH;
}

export class WaveformBuffer {
  private readonly samples: number[];
  private readonly spb: number;
  private readonly half: number;

  constructor(spb: number) {
    this.spb = spb;
    this.half = spb / 2;
    this.samples = [];
  }

  get cellCount(): number {
    return this.samples.length / this.spb;
  }

  /**
   * Append a cell held at one level
   */
  pushCell(level: number): void {
    for (let i = 0; i < this.spb; i++) this.samples.push(level);
  }

  /**
   * Append a cell whose first and second halves differ (Manchester family)
   */
  pushHalves(first: number, second: number): void {
    for (let i = 0; i < this.half; i++) this.samples.push(first);
    for (let i = this.half; i < this.spb; i++) this.samples.push(second);
  }

  /**
   * Overwrite an already emitted cell
   */
  setCell(cellIndex: number, level: number): void {
    if (!Number.isInteger(cellIndex) || cellIndex < 0 || cellIndex >= this.cellCount) {
      throw new RangeError(
        `setCell out of range: cell=${cellIndex} cells=${this.cellCount}`
      );
    }
    const start = cellIndex * this.spb;
    for (let i = 0; i < this.spb; i++) this.samples[start + i] = level;
  }

  toArray(): number[] {
    return this.samples.slice();
  }
}
