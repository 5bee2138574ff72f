import { expect } from 'chai';
import {
  MissingFieldError,
  attachWaterPool,
  checkTimestamps,
  createPoolParams,
  createTwdParams,
  defaultColumns,
  missingColumns,
  prepareTable,
  runTwdSeries,
  runTwdTimeseries,
} from '../src/index';
import type { Table } from '../src/index';

const params = createTwdParams({fE: 0.6, fTwd: 0.3, fTheta: 0.7});
const pool = createPoolParams({rhoSat: 1.07, rhoDry: 0.58});

describe('TWD timeseries runner', function() {

  it(`Seeds from a fully hydrated tree`, () => {
    let out = runTwdSeries([{datetime: 't0', E: 0, thetaRel: 1, W: 100}], params, 0);
    expect(out).to.deep.equal([{datetime: 't0', TWD: 0, RWC: 1}]);
  });

  it(`Threads the deficit from one step into the next`, () => {
    let table: Table = {
      datetime: ['2022-07-01T10:00:00Z', '2022-07-01T11:00:00Z'],
      transpiration: ['10', '0'],
      theta_rel: ['1', '0.35'],
      W: ['100', '100'],
    };
    let out = runTwdTimeseries(table, params, 0);
    expect(out).to.have.length(2);
    expect(out.map(r => r.datetime)).to.deep.equal(['2022-07-01T10:00:00Z', '2022-07-01T11:00:00Z']);
    expect(out[0].TWD).to.be.closeTo(4, 1e-12);
    expect(out[0].RWC).to.be.closeTo(0.96, 1e-12);
    expect(out[1].TWD).to.be.closeTo(3.4, 1e-12);
    expect(out[1].RWC).to.be.closeTo(0.966, 1e-12);
  });

  it(`Starts from the supplied initial deficit`, () => {
    let out = runTwdSeries([{datetime: 't0', E: 0, thetaRel: 1, W: 100}], params, 10);
    expect(out[0].TWD).to.be.closeTo(7, 1e-12);
    expect(out[0].RWC).to.be.closeTo(0.93, 1e-12);
  });

  it(`Keeps input order and length`, () => {
    let records = ['c', 'a', 'b'].map(datetime => ({datetime, E: 1, thetaRel: 0.5, W: 20}));
    let out = runTwdSeries(records, params);
    expect(out.map(r => r.datetime)).to.deep.equal(['c', 'a', 'b']);
    expect(runTwdSeries([], params)).to.deep.equal([]);
  });

  it(`Reports a missing theta column before computing anything`, () => {
    let table: Table = {
      datetime: ['t0'],
      transpiration: [1],
      W: [100],
    };
    expect(() => runTwdTimeseries(table, params)).to.throw(MissingFieldError, 'theta_rel');
  });

  it(`Collects every missing column, in configured order`, () => {
    let columns = {...defaultColumns, E: 'E_l_m2', theta: 'swc', W: 'pool'};
    let table: Table = {datetime: ['t0'], transpiration: [1]};
    try {
      runTwdTimeseries(table, params, 0, columns);
      expect.fail('expected a MissingFieldError');
    } catch (err) {
      expect(err).to.be.instanceOf(MissingFieldError);
      if (!(err instanceof MissingFieldError)) return;
      expect(err.missing).to.deep.equal(['E_l_m2', 'swc', 'pool']);
      expect(err.message).to.equal('The following required columns are missing: E_l_m2, swc, pool');
    }
    expect(missingColumns(table, ['datetime', 'datetime', 'x'])).to.deep.equal(['x']);
  });

  it(`Runs against renamed columns`, () => {
    let columns = {...defaultColumns, time: 'ts', E: 'E_l_m2'};
    let table: Table = {ts: ['t0'], E_l_m2: [10], theta_rel: [1], W: [100]};
    let out = runTwdTimeseries(table, params, 0, columns);
    expect(out[0].datetime).to.equal('t0');
    expect(out[0].TWD).to.be.closeTo(4, 1e-12);
  });

  it(`Rejects a ragged table`, () => {
    let table: Table = {
      datetime: ['t0', 't1'],
      transpiration: [1],
      theta_rel: [1, 1],
      W: [100, 100],
    };
    expect(() => runTwdTimeseries(table, params)).to.throw(Error, 'not rectangular');
  });

  it(`Propagates empty cells as NaN`, () => {
    let table: Table = {
      datetime: ['t0', 't1'],
      transpiration: ['', '1'],
      theta_rel: ['1', '1'],
      W: ['100', '100'],
    };
    let out = runTwdTimeseries(table, params);
    expect(out[0].TWD).to.be.NaN;
    expect(out[1].TWD).to.be.NaN;
    expect(out[1].RWC).to.be.NaN;
  });

  it(`Attaches the water pool from wood mass without touching the input`, () => {
    let table: Table = {datetime: ['t0', 't1'], m_wood_dry: ['50', 0]};
    let withPool = attachWaterPool(table, pool);
    expect(table).to.not.have.property('W');
    expect(withPool.W).to.have.length(2);
    expect(withPool.W[0]).to.be.closeTo(42.24, 0.01);
    expect(withPool.W[1]).to.equal(0);
    expect(() => attachWaterPool({datetime: ['t0']}, pool)).to.throw(MissingFieldError, 'm_wood_dry');
  });

  it(`Keeps a pool column the input already carries`, () => {
    let table: Table = {datetime: ['t0'], W: [80]};
    expect(prepareTable(table, pool, defaultColumns)).to.equal(table);
    let computed = prepareTable({datetime: ['t0'], m_wood_dry: [50]}, pool, defaultColumns);
    expect(computed.W[0]).to.be.closeTo(42.24, 0.01);
  });

  it(`Reports unparsable and out-of-order timestamps`, () => {
    expect(checkTimestamps(['2022-07-01T00:00:00Z', '2022-07-01T01:00:00Z'])).to.equal(0);
    expect(checkTimestamps(['2022-07-01T01:00:00Z', '2022-07-01T00:00:00Z'])).to.equal(1);
    expect(checkTimestamps(['2022-07-01T00:00:00Z', '2022-07-01T00:00:00Z'])).to.equal(1);
    expect(checkTimestamps(['yesterday', '2022-07-01T00:00:00Z'])).to.equal(1);
  });
});
