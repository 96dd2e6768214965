import { createLogger, type Logger } from '@dwdbulk/shared';
import { OpenDataClient } from '../client';
import { loadPipelineConfig, type PipelineConfig } from '../config';

export interface FlowContext {
  config: PipelineConfig;
  client: OpenDataClient;
  logger: Logger;
}

export function createFlowContext(
  config: PipelineConfig = loadPipelineConfig(),
  logger: Logger = createLogger({ name: 'dwdbulk', level: config.logLevel })
): FlowContext {
  return { config, client: OpenDataClient.fromConfig(config, logger.child({ component: 'client' })), logger };
}

export interface FlowFailure {
  uri: string;
  message: string;
}
