import csvjson from 'csvjson';
import fs from 'fs';
import path from 'path';
import debug from 'debug';
import type { Table, TwdOutput } from './model';

const info = debug('twist-js:info');

export function parseTable(text: string): Table {
  // Drop blank lines so a trailing newline doesn't become an empty row
  let cleaned = text
    .split(/\r?\n/)
    .filter(line => line.trim() !== '')
    .join('\n');
  return csvjson.toColumnArray(cleaned, {delimiter: ','});
}

export function readTable(filepath: string): Table {
  if (!fs.existsSync(filepath)) throw new Error(`Input file not found: ${filepath}`);
  info(`Reading input table ${filepath}`);
  return parseTable(fs.readFileSync(filepath, 'utf8'));
}

export function outputToCsv(rows: TwdOutput[]): string {
  return csvjson.toCSV(rows, {delimiter: ',', wrap: false, headers: 'key'});
}

// JSON has no NaN or Infinity; keep them distinguishable as strings instead of null.
export function nonFiniteAsString(_key: string, value: unknown): unknown {
  return typeof value === 'number' && !Number.isFinite(value) ? String(value) : value;
}

export function writeOutputs(rows: TwdOutput[], dir: string, name: string): {csv: string, json: string} {
  fs.mkdirSync(dir, {recursive: true});
  let csv = path.join(dir, `${name}.csv`);
  let json = path.join(dir, `${name}.json`);
  fs.writeFileSync(csv, outputToCsv(rows));
  fs.writeFileSync(json, JSON.stringify(rows, nonFiniteAsString));
  info(`Wrote outputs: ${csv}, ${json}`);
  return {csv, json};
}
