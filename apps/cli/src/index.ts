#!/usr/bin/env node

import { Command } from 'commander';
import { registerCatalogCommands } from './commands/catalog';
import { registerForecastsCommand } from './commands/forecasts';
import { registerObservationsCommand } from './commands/observations';
import { registerStationsCommand } from './commands/stations';
import { defaultDependencies, type CliDependencies } from './lib/context';

export function createProgram(overrides: Partial<CliDependencies> = {}): Command {
  const deps: CliDependencies = { ...defaultDependencies(), ...overrides };
  const program = new Command();

  program
    .name('dwdbulk')
    .description('Bulk download of DWD open data observations and forecasts')
    .version('0.1.0');

  registerCatalogCommands(program, deps);
  registerStationsCommand(program, deps);
  registerObservationsCommand(program, deps);
  registerForecastsCommand(program, deps);

  return program;
}

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(message);
    process.exitCode = 1;
  }
}

if (require.main === module) {
  void main();
}
