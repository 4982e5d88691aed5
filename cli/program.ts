/**
 * linecode CLI - encode bits as line-coded waveforms and decode them back
 */

import { Command } from 'commander';
import { SCHEMES, LINE, ANALOG } from '../src/utils/constants.js';
import { BUILD_VERSION } from '../src/utils/version.js';
import { encodeCommand } from './encode.js';
import { decodeCommand } from './decode.js';
import { roundtripCommand } from './roundtrip.js';
import { analogCommand } from './analog.js';

const SCHEME_LIST = SCHEMES.map(s => `"${s}"`).join(', ');
const DEFAULT_ANALOG = Object.entries(ANALOG.DEFAULT_PARAMS)
  .map(([key, value]) => `${key}=${value}`)
  .join(';');

export function createProgram(): Command {
  const program = new Command();

  program
    .name('linecode')
    .description('Encode bitstreams with line codes (NRZ, Manchester, AMI, B8ZS, HDB3) and decode them back.')
    .version(BUILD_VERSION)
    .addHelpText('after', `
Examples:
  $ linecode encode 1011000000001 -s AMI-B8ZS --plot
  $ linecode encode 10110 -s Manchester -o wave.json
  $ linecode decode wave.json
  $ linecode roundtrip 0000110000 -s AMI-HDB3
  $ linecode analog --mode pcm | linecode encode -s NRZ-I -o pcm.wav`);

  // Encode command
  program
    .command('encode')
    .description('Encode a bitstream into a waveform')
    .argument('[bits]', 'Bits to encode (or use -f for file input, or pipe from stdin)')
    .option('-f, --file <path>', 'Read bits from a file')
    .option('-s, --scheme <scheme>', 'Line coding scheme', 'NRZ-L')
    .option('--spb <n>', `Samples per bit, even and >= 2 (default: ${LINE.SAMPLES_PER_BIT})`)
    .option('-o, --output <path>', 'Write the waveform to a .json, .csv or .wav file')
    .option('--plot', 'Print a text plot of the waveform')
    .option('-q, --quiet', 'Suppress progress output (only show result)')
    .option('--json', 'Output result as JSON')
    .addHelpText('after', `
Schemes:
  ${SCHEME_LIST}

Spaces and commas in the bits are ignored.`)
    .action(encodeCommand);

  // Decode command
  program
    .command('decode')
    .description('Decode a waveform file back to bits')
    .argument('<file>', 'Waveform file (.json, .csv or .wav)')
    .option('-s, --scheme <scheme>', 'Line coding scheme (default: from file, else NRZ-L)')
    .option('--spb <n>', 'Samples per bit (default: from file, else the configured value)')
    .option('-o, --output <path>', 'Write decoded bits to file instead of stdout')
    .option('-q, --quiet', 'Suppress progress output (only show result)')
    .option('--json', 'Output result as JSON')
    .addHelpText('after', `
Decoding is best effort. Input that cannot be decoded prints a
placeholder such as "(Empty waveform)" instead of bits.`)
    .action(decodeCommand);

  // Roundtrip command
  program
    .command('roundtrip')
    .description('Encode then decode a bitstream and compare')
    .argument('[bits]', 'Bits to encode (or use -f for file input, or pipe from stdin)')
    .option('-f, --file <path>', 'Read bits from a file')
    .option('-s, --scheme <scheme>', 'Line coding scheme', 'NRZ-L')
    .option('--spb <n>', 'Samples per bit')
    .option('-q, --quiet', 'Suppress progress output (only show result)')
    .option('--json', 'Output result as JSON')
    .action(roundtripCommand);

  // Schemes command
  program
    .command('schemes')
    .description('List supported line coding schemes')
    .action(() => {
      for (const scheme of SCHEMES) console.log(scheme);
    });

  // Analog command
  program
    .command('analog')
    .description('Generate a bitstream from a sine wave by PCM or delta modulation')
    .option('-m, --mode <mode>', '"pcm" or "dm"', 'pcm')
    .option('--params <params>', 'Sine parameters', DEFAULT_ANALOG)
    .option('--bits <n>', `PCM bits per sample (default: ${ANALOG.PCM_BITS})`)
    .option('--step <x>', `Delta modulation step (default: amp/${ANALOG.DM_STEP_DIVISOR})`)
    .option('-q, --quiet', 'Suppress progress output (only show result)')
    .action(analogCommand);

  return program;
}
