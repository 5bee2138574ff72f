/* Copyright 2021 Qlever LLC
 *
 * Licensed under the Apache License, Version 2.0 (the 'License');
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *     http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an 'AS IS' BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

import convict from 'convict';
import { config as load } from 'dotenv';
import { createPoolParams, createTwdParams } from './model';
import type { ColumnNames, PoolParams, TwdParams } from './model';

load();

const schema = {
  model: {
    twd: {
      fE: {
        doc: 'Fraction of transpiration directly supplied by uptake (F_E), expected in [0, 1]',
        format: Number,
        default: 0.6,
        env: 'TWD_F_E',
        arg: 'f_e'
      },
      fTwd: {
        doc: 'Fraction of the current tree water deficit refillable per timestep (F_TWD), expected in [0, 1]',
        format: Number,
        default: 0.3,
        env: 'TWD_F_TWD',
        arg: 'f_twd'
      },
      fTheta: {
        doc: 'Relative soil moisture threshold below which uptake is downregulated (F_theta), must be > 0',
        format: Number,
        default: 0.7,
        env: 'TWD_F_THETA',
        arg: 'f_theta'
      }
    },
    pool: {
      rhoSat: {
        doc: 'Fully saturated wood density in kg/dm3',
        format: Number,
        default: 1.07,
        env: 'POOL_RHO_SAT',
        arg: 'rho_sat'
      },
      rhoDry: {
        doc: 'Oven-dry wood density in kg/dm3',
        format: Number,
        default: 0.58,
        env: 'POOL_RHO_DRY',
        arg: 'rho_dry'
      }
    },
    initialTwd: {
      doc: 'Tree water deficit at the start of the run; 0 means fully hydrated',
      format: Number,
      default: 0,
      env: 'INITIAL_TWD',
      arg: 'initial_twd'
    }
  },
  columns: {
    time: {
      doc: 'Input column holding the timestamp',
      format: String,
      default: 'datetime',
      env: 'COL_TIME'
    },
    E: {
      doc: 'Input column holding transpiration (same unit as the water pool)',
      format: String,
      default: 'transpiration',
      env: 'COL_E'
    },
    theta: {
      doc: 'Input column holding relative soil water content',
      format: String,
      default: 'theta_rel',
      env: 'COL_THETA'
    },
    mWood: {
      doc: 'Input column holding oven-dry wood mass contributing to water storage',
      format: String,
      default: 'm_wood_dry',
      env: 'COL_M_WOOD'
    },
    W: {
      doc: 'Column holding the water pool size; computed from wood mass when absent',
      format: String,
      default: 'W',
      env: 'COL_W'
    }
  },
  io: {
    output: {
      doc: 'Directory the csv and json outputs are written to',
      format: String,
      default: './outputs',
      env: 'OUTPUT_DIR',
      arg: 'output_dir'
    }
  }
};

// Model settings are also read from the command line (e.g. --f_e 0.5) and the environment.
export function createConfig(options?: {args?: string[], env?: NodeJS.ProcessEnv}) {
  return convict(schema, options);
}

const config = createConfig();

config.validate({ allowed: 'warn' });

export type Config = ReturnType<typeof createConfig>;

export function twdParamsFromConfig(conf: Config = config): TwdParams {
  return createTwdParams(conf.get('model.twd'));
}

export function poolParamsFromConfig(conf: Config = config): PoolParams {
  return createPoolParams(conf.get('model.pool'));
}

export function columnsFromConfig(conf: Config = config): ColumnNames {
  return Object.freeze({...conf.get('columns')});
}

export default config;
