/**
 * Command-line program definition
 */

import chalk from 'chalk'
import { Command } from 'commander'

import {
  calibrateCommand,
  calibratePh4Command,
  calibratePh7Command,
  readCommand,
  resetCommand,
  setCommand,
  showCommand,
} from './commands'
import { ConfigManager } from './config'
import { initialize } from '@boot/init'

import type { ReadOptions } from './commands'
import type { EnvSource } from './config'
import type { BootConsole, PhSensorRuntime } from '@boot/types'
import type { FileSystemAPI } from '@storage/calibration-store'

interface GlobalOptions {
  file?: string
  quiet?: boolean
}

export interface ProgramDependencies {
  env?: EnvSource
  fs?: FileSystemAPI
  console?: BootConsole
}

export function createProgram(dependencies: ProgramDependencies = {}): Command {
  const out = dependencies.console ?? console
  const program = new Command()

  /**
   * Build the runtime and run one command against it
   */
  function run(command: (runtime: PhSensorRuntime) => string[]): void {
    const globals = program.opts<GlobalOptions>()

    try {
      const overrides = new ConfigManager(dependencies.env ?? process.env).get()
      if (globals.file) overrides.CALIBRATION_FILE_PATH = globals.file
      if (globals.quiet) overrides.CONSOLE_LOG_LEVEL = 2

      const runtime = initialize(overrides, { fs: dependencies.fs, console: out })
      if (runtime === null) {
        process.exitCode = 1
        return
      }

      for (const line of command(runtime)) {
        out.log(chalk.green(line))
      }
    } catch (error) {
      out.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`))
      process.exitCode = 1
    }
  }

  program
    .name('ph-sensor')
    .description('Read and calibrate an analog pH probe')
    .option('-f, --file <path>', 'Calibration file (overrides PH_CALIBRATION_FILE)')
    .option('-q, --quiet', 'Only print warnings and results')

  program
    .command('read <mv>')
    .description('Convert a millivolt reading to pH')
    .option('-t, --temperature <c>', 'Sample temperature in °C')
    .option('-c, --coefficient <k>', 'Temperature coefficient per °C')
    .option('-d, --decimals <n>', 'Decimal places')
    .action((mv: string, options: ReadOptions) => run((runtime) => readCommand(runtime, mv, options)))

  program
    .command('calibrate <mv>')
    .description('Calibrate whichever buffer the reading falls into')
    .action((mv: string) => run((runtime) => calibrateCommand(runtime, mv)))

  program
    .command('calibrate-ph7 <mv>')
    .description('Calibrate the neutral (pH 7) buffer point')
    .action((mv: string) => run((runtime) => calibratePh7Command(runtime, mv)))

  program
    .command('calibrate-ph4 <mv>')
    .description('Calibrate the acid (pH 4) buffer point')
    .action((mv: string) => run((runtime) => calibratePh4Command(runtime, mv)))

  program
    .command('set <neutralMv> <acidMv>')
    .description('Set both buffer voltages')
    .action((neutralMv: string, acidMv: string) => run((runtime) => setCommand(runtime, neutralMv, acidMv)))

  program
    .command('reset')
    .description('Restore the default calibration')
    .action(() => run(resetCommand))

  program
    .command('show')
    .description('Show the active calibration')
    .action(() => run(showCommand))

  return program
}
