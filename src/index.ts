import moment from 'moment';
import debug from 'debug';
import config, { columnsFromConfig, poolParamsFromConfig, twdParamsFromConfig } from './config';
import { readTable, writeOutputs } from './io';
import { attachWaterPool, requireColumns, runTwdTimeseries } from './model';
import type { Cell, ColumnNames, PoolParams, Table, TwdOutput, TwdParams } from './model';

const info = debug('twist-js:info');
const warn = debug('twist-js:warn');

export * from './model';
export { MissingFieldError } from './errors';
export { parseTable, readTable, outputToCsv, writeOutputs } from './io';

export interface RunOptions {
  input: string;
  output?: string;
  outputDir?: string;
  initialTwd?: number;
  params?: TwdParams;
  poolParams?: PoolParams;
  columns?: ColumnNames;
}

/*
Timestamps are expected to be ISO 8601 and increasing. Neither is enforced:
rows are never reordered or dropped, offending ones are only reported.
Returns the number of problems found.
*/
export function checkTimestamps(times: ReadonlyArray<Cell>): number {
  let problems = 0;
  let previous: moment.Moment | undefined;
  times.forEach((time, i) => {
    let t = moment(String(time), moment.ISO_8601, true);
    if (!t.isValid()) {
      warn(`Row ${i}: timestamp '${time}' is not ISO 8601`);
      problems++;
      return;
    }
    if (previous && !t.isAfter(previous)) {
      warn(`Row ${i}: timestamp ${time} does not follow ${previous.format()}`);
      problems++;
    }
    previous = t;
  })
  return problems;
}

/*
Adds the pool column from wood mass unless the input already carries one.
Every role the run needs is checked together first, so a table lacking both
wood mass and soil moisture names both.
*/
export function prepareTable(table: Table, poolParams: PoolParams, columns: ColumnNames): Table {
  let hasPool = table[columns.W] !== undefined;
  requireColumns(table, [columns.time, columns.E, columns.theta, hasPool ? columns.W : columns.mWood]);
  if (hasPool) {
    info(`Using water pool column '${columns.W}' from the input`);
    return table;
  }
  return attachWaterPool(table, poolParams, columns);
}

export async function main(options: RunOptions): Promise<{rows: TwdOutput[], files: {csv: string, json: string}}> {
  let columns = options.columns || columnsFromConfig();
  let params = options.params || twdParamsFromConfig();
  let poolParams = options.poolParams || poolParamsFromConfig();
  let initialTwd = options.initialTwd ?? config.get('model.initialTwd');

  let table = prepareTable(readTable(options.input), poolParams, columns);
  let times = table[columns.time];
  if (times) checkTimestamps(times);

  let rows = runTwdTimeseries(table, params, initialTwd, columns);

  let name = options.output || `output-twd-${moment().format('YYYYMMDD-HHmmss')}`;
  let files = writeOutputs(rows, options.outputDir || config.get('io.output'), name);
  info(`Run complete. ${rows.length} timesteps written to ${files.csv}`);
  return {rows, files};
}

if (require.main === module) {
  let input = process.argv[2];
  if (!input) {
    console.error('Usage: index <input.csv>');
    process.exitCode = 1;
  } else {
    main({input}).catch(err => {
      console.error(err);
      process.exitCode = 1;
    });
  }
} else {
  info('Just importing');
}
