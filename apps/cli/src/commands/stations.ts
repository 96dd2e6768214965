import { Command } from 'commander';
import { runStationsFlow } from '@dwdbulk/pipeline';
import { reportFailures, type CliDependencies } from '../lib/context';

export function registerStationsCommand(program: Command, deps: CliDependencies): void {
  program
    .command('stations')
    .description('Download the station descriptions of a resolution/parameter')
    .argument('<resolution>')
    .argument('<parameter>')
    .action(async (resolution: string, parameter: string) => {
      const result = await runStationsFlow(deps.createContext(), { resolution, parameter });
      deps.output(`Wrote ${result.stations.length} stations to ${result.files.length} file(s).`);
      reportFailures(deps.output, result.failed);
    });
}
