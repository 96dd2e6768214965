import { Command } from 'commander';
import { runForecastsFlow } from '@dwdbulk/pipeline';
import { reportFailures, type CliDependencies } from '../lib/context';

type ForecastOptions = {
  station?: string[];
  parameter?: string[];
  allStations?: boolean;
  stationData: boolean;
};

export function registerForecastsCommand(program: Command, deps: CliDependencies): void {
  program
    .command('forecasts')
    .description('Download the MOSMIX_S forecast runs')
    .option('--station <id...>', 'forecast station ids; defaults to the lookup table')
    .option('--parameter <name...>', 'MOSMIX element names to keep')
    .option('--all-stations', 'keep every station instead of the lookup table')
    .option('--no-station-data', 'skip the forecast_stations dataset')
    .action(async (options: ForecastOptions) => {
      const result = await runForecastsFlow(deps.createContext(), {
        stationIds: options.station,
        parameters: options.parameter,
        allStations: options.allStations ?? false,
        includeStations: options.stationData
      });
      deps.output(
        `Wrote ${result.rowCount} forecast rows and ${result.stationCount} stations from ${result.documents} document(s).`
      );
      reportFailures(deps.output, result.failed);
    });
}
