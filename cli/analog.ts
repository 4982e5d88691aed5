/**
 * CLI Analog Command - sine source to PCM or delta-modulated bits
 */

import { ANALOG } from '../src/utils/constants.js';
import { parseAnalogParams, pcmFromAnalog, deltaModFromAnalog } from '../src/analog/index.js';

export interface AnalogCliOptions {
  mode: string;
  params: string;
  bits?: string;
  step?: string;
  quiet?: boolean;
}

export async function analogCommand(options: AnalogCliOptions): Promise<void> {
  const log = options.quiet ? () => {} : console.error.bind(console);

  try {
    const mode = options.mode.toLowerCase();
    if (mode !== 'pcm' && mode !== 'dm') {
      throw new Error('Invalid mode. Use "pcm" or "dm".');
    }

    const params = parseAnalogParams(options.params);
    log(`Source: freq=${params.freq} amp=${params.amp} duration=${params.duration} samples=${params.samples}`);

    let bits: string;
    if (mode === 'pcm') {
      const nBits = options.bits !== undefined ? Number(options.bits) : ANALOG.PCM_BITS;
      log(`PCM: ${nBits} bits per sample`);
      bits = pcmFromAnalog(params, nBits);
    } else {
      const step = options.step !== undefined ? Number(options.step) : undefined;
      log(`DM: step ${step ?? params.amp / ANALOG.DM_STEP_DIVISOR}`);
      bits = deltaModFromAnalog(params, step);
    }

    console.log(bits);
    log(`Bits: ${bits.length}`);

  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exitCode = 1;
  }
}
