/**
 * CLI Encode Command
 */

import { readFileSync } from 'fs';
import { LINE, setSamplesPerBit } from '../src/utils/constants.js';
import { normalizeBits, formatBits } from '../src/utils/helpers.js';
import { encode, checkStreamSize } from '../src/encode/index.js';
import { longestZeroRun, renderAscii } from '../src/lib/plot.js';
import { writeWaveformFile } from './waveform-io.js';

export interface EncodeCliOptions {
  file?: string;
  output?: string;
  scheme: string;
  spb?: string;
  plot?: boolean;
  quiet?: boolean;
  json?: boolean;
}

/**
 * Bits from the argument, a file, or piped stdin
 */
export function readBitsInput(
  text: string | undefined,
  file: string | undefined,
  log: (...args: unknown[]) => void
): string {
  if (file) {
    log(`Reading from ${file}...`);
    return normalizeBits(readFileSync(file, 'utf-8'));
  }
  if (text !== undefined) {
    return normalizeBits(text);
  }
  if (!process.stdin.isTTY) {
    log('Reading from stdin...');
    return normalizeBits(readFileSync(0, 'utf-8'));
  }
  throw new Error('No input provided. Use bits argument, -f flag, or pipe input.');
}

export function applySamplesPerBit(spb: string | undefined): number {
  if (spb !== undefined) {
    setSamplesPerBit(Number(spb));
  }
  return LINE.SAMPLES_PER_BIT;
}

export async function encodeCommand(
  text: string | undefined,
  options: EncodeCliOptions
): Promise<void> {
  const log = options.quiet || options.json ? () => {} : console.error.bind(console);

  try {
    const bits = readBitsInput(text, options.file, log);
    const samplesPerBit = applySamplesPerBit(options.spb);

    const sizeCheck = checkStreamSize(bits.length, samplesPerBit);
    if (!sizeCheck.valid) {
      throw new Error(sizeCheck.message);
    }
    if (sizeCheck.warning) {
      log(`Warning: ${sizeCheck.message}`);
    }

    log(`Scheme: ${options.scheme}`);
    log(`Samples per bit: ${samplesPerBit}`);
    const waveform = encode(bits, options.scheme);

    if (options.output) {
      writeWaveformFile(options.output, {
        scheme: options.scheme,
        samplesPerBit,
        bits,
        waveform,
      });
    }

    if (options.json) {
      console.log(JSON.stringify({
        scheme: options.scheme,
        samplesPerBit,
        bits,
        samples: waveform.length,
        longestZeroRun: longestZeroRun(waveform, samplesPerBit),
        output: options.output,
        waveform,
      }, null, 2));
      return;
    }

    if (!options.output) {
      console.log(waveform.join(' '));
    }
    if (options.plot) {
      console.log(renderAscii(waveform, samplesPerBit));
    }

    // Final summary to stderr
    log('');
    log(`Bits:    ${formatBits(bits)}`);
    log(`Samples: ${waveform.length}`);
    if (options.scheme.startsWith('AMI')) {
      log(`Longest zero run: ${longestZeroRun(waveform, samplesPerBit)} cells`);
    }
    if (options.output) {
      log(`Output:  ${options.output}`);
    }

  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exitCode = 1;
  }
}
