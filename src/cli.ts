import chalk from 'chalk';
import fs from 'fs';
import path from 'path';
import figlet from 'figlet';
import arg from 'arg';
import Listr from 'listr';
import inquirer from 'inquirer';
import config from './config';
import { main } from './index';
import type { TwdOutput } from './model';

export const demoInput = path.join(__dirname, '..', 'data', 'demo-input.csv');

export interface CliOptions {
  demo: boolean;
  input?: string;
  output?: string;
  initialTwd?: number;
  config?: string;
}

function handleConfigFile(input: string): string {
  if (!/\.json$/.test(input) || !fs.existsSync(input)) {
    throw new Error(`'--config' argument was invalid: ${input}`);
  }
  return input;
}

export function parseArgumentsIntoOptions(rawArgs: string[]): CliOptions {
  const args = arg(
    {
      '--demo': Boolean,
      '--input': String,
      '--output': String,
      '--initial-twd': Number,
      '--config': handleConfigFile,

      //Aliases
      '-i': '--input',
      '-o': '--output',
      '-c': '--config',
    },
    {
      argv: rawArgs.slice(2),
      // model settings such as --f_e are left for the configuration to read
      permissive: true,
    }
  );
  return {
    demo: args['--demo'] || false,
    input: args['--input'],
    output: args['--output'],
    initialTwd: args['--initial-twd'],
    config: args['--config'],
  };
}

async function promptForMissingOptions(options: CliOptions): Promise<CliOptions> {
  if (options.demo) return {...options, input: demoInput, output: options.output || 'demo-output'};
  if (options.input) return options;

  const answers = await inquirer.prompt<{mode: string, input?: string}>([
    {
      type: 'list',
      name: 'mode',
      message: 'Which model would you like to run?',
      choices: ['Demo', 'New Model Run'],
      default: 'Demo',
    },
    {
      type: 'input',
      name: 'input',
      message: 'Path to the input timeseries csv',
      when: (answers) => answers.mode !== 'Demo',
      validate: (input: string) => fs.existsSync(input) || `File not found: ${input}`,
    },
  ]);

  if (answers.mode === 'Demo') return {...options, demo: true, input: demoInput, output: options.output || 'demo-output'};
  return {...options, input: answers.input};
}

interface RunContext {
  rows?: TwdOutput[];
  csv?: string;
}

async function run(options: CliOptions): Promise<RunContext> {
  const input = options.input;
  if (!input) throw new Error('No input file given');

  const tasks = new Listr<RunContext>([
    {
      title: 'Load configuration',
      task: () => {
        if (options.config) config.loadFile(options.config);
        config.validate({ allowed: 'warn' });
      },
    },
    {
      title: `Run the model on ${input}`,
      task: async (ctx) => {
        let {rows, files} = await main({
          input,
          output: options.output,
          initialTwd: options.initialTwd,
        });
        ctx.rows = rows;
        ctx.csv = files.csv;
      },
    },
  ]);

  return tasks.run({});
}

export async function cli(args: string[]): Promise<void> {
  console.log(
    chalk.green(
      figlet.textSync('twist-js', {
        font: 'Doom'
      })
    )
  )
  let options = parseArgumentsIntoOptions(args);
  options = await promptForMissingOptions(options);
  let ctx = await run(options);
  console.log(chalk.blue(`${ctx.rows?.length ?? 0} timesteps written to ${ctx.csv}`));
}
