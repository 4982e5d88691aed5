/**
 * CLI Decode Command
 */

import { writeFileSync } from 'fs';
import { LINE } from '../src/utils/constants.js';
import { compareBits, formatBits } from '../src/utils/helpers.js';
import { decode, isDecodeSentinel } from '../src/decode/index.js';
import { readWaveformFile } from './waveform-io.js';

export interface DecodeCliOptions {
  scheme?: string;
  spb?: string;
  output?: string;
  quiet?: boolean;
  json?: boolean;
}

interface DecodeReport {
  success: boolean;
  scheme: string;
  samplesPerBit: number;
  bits?: string;
  message?: string;
  matchesOriginal?: boolean;
  output?: string;
}

export async function decodeCommand(
  filePath: string,
  options: DecodeCliOptions
): Promise<void> {
  const log = options.quiet || options.json ? () => {} : console.error.bind(console);

  // Suppress descrambler logs in quiet mode or json mode
  const originalLog = console.log;
  if (options.quiet || options.json) {
    console.log = (...args: unknown[]) => {
      const msg = args[0];
      if (typeof msg === 'string' && msg.startsWith('[Descramble]')) {
        return;
      }
      originalLog.apply(console, args);
    };
  }

  try {
    log(`Reading ${filePath}...`);
    const doc = readWaveformFile(filePath);

    // Command line wins over what the file says about itself
    const scheme = options.scheme ?? doc.scheme ?? 'NRZ-L';
    const samplesPerBit = options.spb !== undefined
      ? Number(options.spb)
      : doc.samplesPerBit ?? LINE.SAMPLES_PER_BIT;
    log(`Scheme: ${scheme}, samples per bit: ${samplesPerBit}, samples: ${doc.waveform.length}`);

    const result = decode(doc.waveform, scheme, samplesPerBit);
    const failed = isDecodeSentinel(result);
    const comparison = !failed && doc.bits !== undefined ? compareBits(doc.bits, result) : undefined;

    if (options.output && !failed) {
      writeFileSync(options.output, result + '\n');
    }

    if (options.json) {
      const report: DecodeReport = { success: !failed, scheme, samplesPerBit };
      if (failed) {
        report.message = result;
      } else {
        report.bits = result;
      }
      if (comparison) report.matchesOriginal = comparison.equal;
      if (options.output && !failed) report.output = options.output;
      console.log(JSON.stringify(report, null, 2));
      return;
    }

    if (failed) {
      log(`Could not decode: ${result}`);
      console.log(result);
      return;
    }

    if (!options.output) {
      console.log(result);
    }

    log('');
    log(`Decoded:  ${formatBits(result)}`);
    if (comparison) {
      log(`Original: ${formatBits(doc.bits ?? '')}`);
      log(comparison.equal
        ? 'Matches original: yes'
        : `Matches original: no (differs at ${comparison.mismatches.join(', ') || 'length'})`);
    }
    if (options.output) {
      log(`Output:   ${options.output}`);
    }

  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exitCode = 1;
  } finally {
    console.log = originalLog;
  }
}
