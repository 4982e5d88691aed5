/**
 * WAV file I/O for waveforms
 *
 * Levels are stored as mono 16-bit PCM. The sample rate carries the
 * cell size: sampleRate = samplesPerBit * WAV.CELL_RATE.
 */

import { readFileSync, writeFileSync } from 'fs';
import { WAV } from '../src/utils/constants.js';

export interface WavData {
  samples: number[];
  sampleRate: number;
  numChannels: number;
  bitsPerSample: number;
}

/**
 * Parse a WAV file and return its samples
 */
export function parseWavFile(filePath: string): WavData {
  return parseWavBuffer(readFileSync(filePath));
}

/**
 * Parse WAV data from a Buffer (PCM 8/16/32-bit or IEEE float 32-bit)
 */
export function parseWavBuffer(buffer: Buffer): WavData {
  const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);

  if (buffer.length < 12 || buffer.toString('ascii', 0, 4) !== 'RIFF') {
    throw new Error('Not a valid WAV file: missing RIFF header');
  }
  if (buffer.toString('ascii', 8, 12) !== 'WAVE') {
    throw new Error('Not a valid WAV file: missing WAVE format');
  }

  let offset = 12;
  let fmt: { audioFormat: number; numChannels: number; sampleRate: number; bitsPerSample: number } | null = null;

  while (offset + 8 <= buffer.length) {
    const chunkId = buffer.toString('ascii', offset, offset + 4);
    const chunkSize = view.getUint32(offset + 4, true);

    if (chunkId === 'fmt ') {
      fmt = {
        audioFormat: view.getUint16(offset + 8, true),
        numChannels: view.getUint16(offset + 10, true),
        sampleRate: view.getUint32(offset + 12, true),
        bitsPerSample: view.getUint16(offset + 22, true),
      };
    }

    if (chunkId === 'data') {
      if (!fmt) {
        throw new Error('WAV file missing fmt chunk before data');
      }
      const { audioFormat, numChannels, sampleRate, bitsPerSample } = fmt;
      if (numChannels === 0) {
        throw new Error('Unsupported WAV format: 0 channels');
      }
      const isFloat = audioFormat === 3 && bitsPerSample === 32;
      const isPcm = audioFormat === 1 && (bitsPerSample === 8 || bitsPerSample === 16 || bitsPerSample === 32);
      if (!isFloat && !isPcm) {
        throw new Error(`Unsupported WAV format: ${audioFormat}/${bitsPerSample}-bit`);
      }

      const dataOffset = offset + 8;
      const bytesPerSample = bitsPerSample / 8;
      const available = Math.min(chunkSize, buffer.length - dataOffset);
      const numSamples = Math.floor(available / bytesPerSample / numChannels);
      const samples: number[] = [];

      for (let i = 0; i < numSamples; i++) {
        let sum = 0;
        // Mix all channels to mono
        for (let ch = 0; ch < numChannels; ch++) {
          const at = dataOffset + (i * numChannels + ch) * bytesPerSample;
          if (isFloat) {
            sum += view.getFloat32(at, true);
          } else if (bitsPerSample === 8) {
            sum += (buffer[at] - 128) / 128;
          } else if (bitsPerSample === 16) {
            sum += view.getInt16(at, true) / 32768;
          } else {
            sum += view.getInt32(at, true) / 2147483648;
          }
        }
        samples.push(sum / numChannels);
      }

      return { samples, sampleRate, numChannels, bitsPerSample };
    }

    offset += 8 + chunkSize;
    // Chunks are word-aligned
    if (chunkSize % 2 !== 0) offset++;
  }

  throw new Error('WAV file missing data chunk');
}

/**
 * Create a mono 16-bit PCM WAV buffer
 */
export function createWavBuffer(samples: readonly number[], sampleRate: number): Buffer {
  const dataSize = samples.length * 2;
  const buffer = Buffer.alloc(44 + dataSize);
  const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);

  // RIFF header
  buffer.write('RIFF', 0, 'ascii');
  view.setUint32(4, 36 + dataSize, true);
  buffer.write('WAVE', 8, 'ascii');

  // fmt chunk
  buffer.write('fmt ', 12, 'ascii');
  view.setUint32(16, 16, true);
  view.setUint16(20, 1, true);  // PCM
  view.setUint16(22, 1, true);  // mono
  view.setUint32(24, sampleRate, true);
  view.setUint32(28, sampleRate * 2, true);
  view.setUint16(32, 2, true);
  view.setUint16(34, 16, true);

  // data chunk
  buffer.write('data', 36, 'ascii');
  view.setUint32(40, dataSize, true);

  for (let i = 0; i < samples.length; i++) {
    const sample = Math.max(-1, Math.min(1, samples[i]));
    const int16 = sample < 0 ? sample * 0x8000 : sample * 0x7FFF;
    view.setInt16(44 + i * 2, Math.round(int16), true);
  }

  return buffer;
}

/**
 * Write a waveform, encoding samplesPerBit in the sample rate
 */
export function writeWaveformWav(filePath: string, waveform: readonly number[], samplesPerBit: number): void {
  writeFileSync(filePath, createWavBuffer(waveform, samplesPerBit * WAV.CELL_RATE));
}

/**
 * Read a waveform written by writeWaveformWav.
 * samplesPerBit is undefined when the sample rate is not a multiple of CELL_RATE.
 */
export function readWaveformWav(filePath: string): { waveform: number[]; samplesPerBit?: number } {
  const { samples, sampleRate } = parseWavFile(filePath);
  const spb = sampleRate / WAV.CELL_RATE;
  return {
    waveform: samples,
    samplesPerBit: Number.isInteger(spb) && spb > 0 ? spb : undefined,
  };
}
