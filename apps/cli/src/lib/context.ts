import { createFlowContext, type FlowContext, type FlowFailure } from '@dwdbulk/pipeline';

export type Output = (line: string) => void;

export interface CliDependencies {
  createContext: () => FlowContext;
  output: Output;
}

export function defaultDependencies(): CliDependencies {
  return {
    createContext: () => createFlowContext(),
    output: (line) => console.log(line)
  };
}

export function reportFailures(output: Output, failed: FlowFailure[]): void {
  if (failed.length === 0) {
    return;
  }
  output(`${failed.length} resource(s) failed:`);
  for (const failure of failed) {
    output(`  ${failure.uri}: ${failure.message}`);
  }
}
