import _ from 'lodash';
import debug from 'debug';
import { MissingFieldError } from './errors';

const info = debug('twist-js:model:info');
const trace = debug('twist-js:model:trace');
const warn = debug('twist-js:model:warn');

export interface TwdParams {
  readonly fE: number; // fraction of transpiration directly supplied by uptake
  readonly fTwd: number; // fraction of current TWD refillable per timestep
  readonly fTheta: number; // soil moisture threshold scaling uptake downregulation
}

export interface PoolParams {
  readonly rhoSat: number; // fully saturated wood density (kg/dm3)
  readonly rhoDry: number; // oven-dry wood density (kg/dm3)
}

export interface ColumnNames {
  readonly time: string;
  readonly E: string;
  readonly theta: string;
  readonly mWood: string;
  readonly W: string;
}

export const defaultColumns: ColumnNames = Object.freeze({
  time: 'datetime',
  E: 'transpiration',
  theta: 'theta_rel',
  mWood: 'm_wood_dry',
  W: 'W',
});

export type Cell = string | number;
export type Table = Record<string, ReadonlyArray<Cell>>;

export interface TwdRecord {
  datetime: Cell;
  E: number;
  thetaRel: number;
  W: number;
}

export interface TwdOutput {
  datetime: Cell;
  TWD: number;
  RWC: number;
}

/*
Parameter records are never clamped or rejected. Values outside their
physical range are reported and then allowed to propagate through the
arithmetic (e.g. fTheta = 0 yields non-finite limitation factors).
*/
export function createTwdParams({fE, fTwd, fTheta}: TwdParams): TwdParams {
  if (!(fE >= 0 && fE <= 1)) warn(`F_E=${fE} is outside [0, 1]`);
  if (!(fTwd >= 0 && fTwd <= 1)) warn(`F_TWD=${fTwd} is outside [0, 1]`);
  if (!(fTheta > 0)) warn(`F_theta=${fTheta} is not positive; soil limitation divides by it`);
  return Object.freeze({fE, fTwd, fTheta});
}

export function createPoolParams({rhoSat, rhoDry}: PoolParams): PoolParams {
  if (!(rhoDry > 0)) warn(`rho_dry=${rhoDry} is not positive`);
  if (!(rhoSat > rhoDry)) warn(`rho_sat=${rhoSat} <= rho_dry=${rhoDry}; pool size will be non-positive`);
  return Object.freeze({rhoSat, rhoDry});
}

// Soil limitation factor. 1 above the threshold, linear below it, not floored.
export function soilLimitation(thetaRel: number, fTheta: number): number {
  return Math.min(thetaRel / fTheta, 1);
}

/*
Inputs
  E: transpirational water loss this timestep (same unit as TWD)
  twdOld: tree water deficit at the previous timestep
  thetaRel: relative soil water content (1 field capacity, 0 wilting point)

Output
  uptake: water taken up this timestep. The soil factor scales both the
  transpiration-driven and the deficit-driven share.
*/
export function uptake(E: number, twdOld: number, thetaRel: number, params: TwdParams): number {
  let fSoil = soilLimitation(thetaRel, params.fTheta);
  return (params.fE * E + params.fTwd * twdOld) * fSoil;
}

export function updateTwd(E: number, twdOld: number, thetaRel: number, params: TwdParams): number {
  let U = uptake(E, twdOld, thetaRel, params);
  return twdOld + E - U;
}

// Tree water pool from oven-dry wood mass; same unit as E when mWoodDry is in kg.
export function waterPool(mWoodDry: number, {rhoSat, rhoDry}: PoolParams): number {
  return (rhoSat / rhoDry - 1) * mWoodDry;
}

// Floored at 0 only. A negative deficit (over-recharge) gives RWC > 1.
export function relativeWaterContent(W: number, TWD: number): number {
  return Math.max(0, (W - TWD) / W);
}

export function stepTwd(
  {E, thetaRel, W}: Pick<TwdRecord, 'E' | 'thetaRel' | 'W'>,
  params: TwdParams,
  twdOld = 0
): {TWD: number, RWC: number} {
  let TWD = updateTwd(E, twdOld, thetaRel, params);
  let RWC = relativeWaterContent(W, TWD);
  return {TWD, RWC};
}

// Strictly sequential: every step starts from the deficit emitted by the one before it.
export function runTwdSeries(
  records: ReadonlyArray<TwdRecord>,
  params: TwdParams,
  twdInitial = 0
): TwdOutput[] {
  let {rows} = records.reduce<{rows: TwdOutput[], twd: number}>(
    (acc, record) => {
      let {TWD, RWC} = stepTwd(record, params, acc.twd);
      trace(`${record.datetime}: E=${record.E} theta=${record.thetaRel} W=${record.W} -> TWD=${TWD} RWC=${RWC}`);
      acc.rows.push({datetime: record.datetime, TWD, RWC});
      return {rows: acc.rows, twd: TWD};
    },
    {rows: [], twd: twdInitial}
  );
  return rows;
}

export function missingColumns(table: Table, required: ReadonlyArray<string>): string[] {
  return _.difference(_.uniq(required), Object.keys(table));
}

export function requireColumns(table: Table, required: ReadonlyArray<string>) {
  let missing = missingColumns(table, required);
  if (missing.length > 0) throw new MissingFieldError(missing);
}

// Empty strings would become 0 under Number(); treat them as missing values instead.
export function toNumber(value: Cell | undefined): number {
  if (typeof value === 'number') return value;
  if (value === undefined || value.trim() === '') return NaN;
  return Number(value);
}

function columnOf(table: Table, name: string): ReadonlyArray<Cell> {
  return table[name] ?? [];
}

/*
Run the model over a column-oriented table. All required columns are checked
before any step is computed, and every missing one is reported together.
*/
export function runTwdTimeseries(
  table: Table,
  params: TwdParams,
  twdInitial = 0,
  columns: ColumnNames = defaultColumns
): TwdOutput[] {
  requireColumns(table, [columns.time, columns.E, columns.theta, columns.W]);

  let times = columnOf(table, columns.time);
  let E = columnOf(table, columns.E);
  let theta = columnOf(table, columns.theta);
  let W = columnOf(table, columns.W);
  let n = times.length;
  if (E.length !== n || theta.length !== n || W.length !== n) {
    throw new Error(`Input table is not rectangular: column lengths ${[times, E, theta, W].map(c => c.length).join(', ')}`);
  }

  info(`Running TWD model over ${n} timesteps, starting from TWD=${twdInitial}`);
  let records: TwdRecord[] = times.map((datetime, i) => ({
    datetime,
    E: toNumber(E[i]),
    thetaRel: toNumber(theta[i]),
    W: toNumber(W[i]),
  }));
  return runTwdSeries(records, params, twdInitial);
}

// Returns a copy of the table with the pool column computed from wood mass.
export function attachWaterPool(
  table: Table,
  poolParams: PoolParams,
  columns: ColumnNames = defaultColumns
): Table {
  requireColumns(table, [columns.mWood]);
  let W = columnOf(table, columns.mWood).map(m => waterPool(toNumber(m), poolParams));
  info(`Computed water pool column '${columns.W}' from '${columns.mWood}'`);
  return {...table, [columns.W]: W};
}

/* Glossary
TWD - tree water deficit: accumulated internal water shortfall (unit of E)
RWC - relative water content of the tree water pool (-); 1 fully hydrated,
      0 depleted, above 1 when over-recharged
E - transpirational water loss per timestep (volume or mass of H2O, per tree
    or per m2 ground)
theta_rel - relative soil water content; 0 wilting point, 1 field capacity
W - tree water pool size (unit of E)
F_E - fraction of transpiration directly supplied by uptake
F_TWD - fraction of the current TWD refillable per timestep
F_theta - soil moisture threshold below which uptake is downregulated
rho_sat, rho_dry - saturated and oven-dry wood density
*/
