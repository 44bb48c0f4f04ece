import { parseChain } from '../chain/ChainParser';
import { DependencyGraph } from '../chain/DependencyGraph';
import type { TextGenerator } from '../chain/types';
import { ExecutionTrace } from '../utils/ExecutionTrace';
import { logger } from '../utils/logger';
import { describePlan } from '../utils/visualize';
import { ChainResolver } from './ChainResolver';

export type RunChainOptions = {
  chainText: string;
  input: string;
  generator: TextGenerator;
  concurrency?: number;
  parallel?: boolean;
  trace?: ExecutionTrace;
};

export type ChainRunResult = {
  output: string;
  trace: ExecutionTrace;
  graph: DependencyGraph;
};

/**
 * Parses and validates the chain, then resolves it. Parse and validation errors are
 * thrown before the generator is touched.
 */
export async function runChain({
  chainText,
  input,
  generator,
  concurrency,
  parallel,
  trace = new ExecutionTrace()
}: RunChainOptions): Promise<ChainRunResult> {
  logger.info('Parsing prompt chain and resolving dependencies');
  const definition = parseChain(chainText);
  const graph = DependencyGraph.build(definition);

  logger.debug(describePlan(graph));

  const resolver = new ChainResolver({ generator, concurrency, parallel });
  logger.info(
    `Executing ${graph.levels.flat().length} node(s) in ${graph.levels.length} level(s), concurrency ${resolver.concurrency}`
  );

  const output = await resolver.resolve(graph, input, trace);
  return { output, trace, graph };
}
