/**
 * Waveform files for the CLI: JSON, CSV or WAV, chosen by extension
 *
 * JSON: { scheme?, samplesPerBit?, bits?, waveform: number[] } or a bare number array
 * CSV:  "index,level" header, then one row per sample
 */

import { readFileSync, writeFileSync } from 'fs';
import { extname } from 'path';
import { readWaveformWav, writeWaveformWav } from './wav-io.js';

export type WaveformFormat = 'json' | 'csv' | 'wav';

export interface WaveformDocument {
  scheme?: string;
  samplesPerBit?: number;
  bits?: string;
  waveform: number[];
}

export function formatFromPath(filePath: string): WaveformFormat {
  const ext = extname(filePath).toLowerCase();
  if (ext === '.csv') return 'csv';
  if (ext === '.wav') return 'wav';
  if (ext === '.json' || ext === '') return 'json';
  throw new Error(`Unsupported waveform file type "${ext}" (use .json, .csv or .wav)`);
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every(v => typeof v === 'number' && Number.isFinite(v));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseWaveformJson(text: string): WaveformDocument {
  const parsed: unknown = JSON.parse(text);

  if (isNumberArray(parsed)) {
    return { waveform: parsed };
  }
  if (!isRecord(parsed) || !isNumberArray(parsed.waveform)) {
    throw new Error('Waveform JSON must be a number array or an object with a "waveform" number array');
  }

  const doc: WaveformDocument = { waveform: parsed.waveform };
  if (typeof parsed.scheme === 'string') doc.scheme = parsed.scheme;
  if (typeof parsed.samplesPerBit === 'number') doc.samplesPerBit = parsed.samplesPerBit;
  if (typeof parsed.bits === 'string') doc.bits = parsed.bits;
  return doc;
}

export function parseWaveformCsv(text: string): WaveformDocument {
  const waveform: number[] = [];
  const lines = text.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (line === '' || (i === 0 && /^index\s*,/i.test(line))) continue;

    const cols = line.split(',');
    const level = Number(cols[cols.length - 1]);
    if (!Number.isFinite(level)) {
      throw new Error(`Invalid level on CSV line ${i + 1}: "${line}"`);
    }
    waveform.push(level);
  }

  return { waveform };
}

export function formatWaveformCsv(waveform: readonly number[]): string {
  const rows = ['index,level'];
  waveform.forEach((level, index) => rows.push(`${index},${level}`));
  return rows.join('\n') + '\n';
}

export function readWaveformFile(filePath: string): WaveformDocument {
  const format = formatFromPath(filePath);
  if (format === 'wav') {
    return readWaveformWav(filePath);
  }
  const text = readFileSync(filePath, 'utf-8');
  return format === 'csv' ? parseWaveformCsv(text) : parseWaveformJson(text);
}

export function writeWaveformFile(filePath: string, doc: WaveformDocument): void {
  const format = formatFromPath(filePath);
  if (format === 'wav') {
    if (doc.samplesPerBit === undefined) {
      throw new Error('samplesPerBit is required to write a WAV waveform');
    }
    writeWaveformWav(filePath, doc.waveform, doc.samplesPerBit);
  } else if (format === 'csv') {
    writeFileSync(filePath, formatWaveformCsv(doc.waveform));
  } else {
    writeFileSync(filePath, JSON.stringify(doc, null, 2) + '\n');
  }
}
