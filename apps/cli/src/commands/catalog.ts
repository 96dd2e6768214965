import { Command } from 'commander';
import { listParameters, listResolutions } from '@dwdbulk/pipeline';
import type { CliDependencies } from '../lib/context';

export function registerCatalogCommands(program: Command, deps: CliDependencies): void {
  program
    .command('resolutions')
    .description('List the resolutions published below the climate root')
    .action(async () => {
      const { client, config } = deps.createContext();
      for (const resolution of await listResolutions(client, config.climateRootUrl)) {
        deps.output(resolution);
      }
    });

  program
    .command('parameters')
    .description('List the parameters published for a resolution')
    .argument('<resolution>', 'resolution directory, e.g. 10_minutes')
    .action(async (resolution: string) => {
      const { client, config } = deps.createContext();
      for (const parameter of await listParameters(client, config.climateRootUrl, resolution)) {
        deps.output(parameter);
      }
    });
}
