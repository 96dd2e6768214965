import { Command } from 'commander';
import { runObservationsFlow } from '@dwdbulk/pipeline';
import { reportFailures, type CliDependencies } from '../lib/context';

type ObservationOptions = {
  station?: string[];
  start?: string;
  end?: string;
  failFast?: boolean;
};

export function registerObservationsCommand(program: Command, deps: CliDependencies): void {
  program
    .command('observations')
    .description('Download, deduplicate and store measurements')
    .argument('<resolution>')
    .argument('<parameter>')
    .option('--station <id...>', 'restrict to these station ids')
    .option('--start <date>', 'first timestamp to keep (inclusive)')
    .option('--end <date>', 'timestamp to stop at (exclusive)')
    .option('--fail-fast', 'abort on the first failed archive')
    .action(async (resolution: string, parameter: string, options: ObservationOptions) => {
      const result = await runObservationsFlow(deps.createContext(), {
        resolution,
        parameter,
        stationIds: options.station,
        dateStart: options.start,
        dateEnd: options.end,
        failFast: options.failFast ?? false
      });
      deps.output(
        `Wrote ${result.rowCount} rows from ${result.archives} archive(s) to ${result.files.length} file(s).`
      );
      reportFailures(deps.output, result.failed);
    });
}
