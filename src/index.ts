export { parseChain, tokenizeTemplate, renderTemplate } from './chain/ChainParser';
export { DependencyGraph, buildDependencyGraph, classifyNode } from './chain/DependencyGraph';
export { INPUT_NODE_NAME, OUTPUT_NODE_NAME } from './chain/types';
export type {
  ChainDefinition,
  ChainNode,
  NodeClassification,
  NodeRecord,
  NodeState,
  TemplateSegment,
  TextGenerator
} from './chain/types';

export { ChainResolver } from './workflows/ChainResolver';
export type { ChainResolverOptions } from './workflows/ChainResolver';
export { runChain } from './workflows/ChainRunner';
export type { ChainRunResult, RunChainOptions } from './workflows/ChainRunner';

export { WorkerPool, defaultConcurrency } from './utils/WorkerPool';
export { ExecutionTrace } from './utils/ExecutionTrace';
export type { TraceEvents } from './utils/ExecutionTrace';
export { formatTrace } from './utils/formatTrace';
export { describePlan } from './utils/visualize';
export { logger, configureLogger } from './utils/logger';

export { OpenAIGenerator } from './activities/OpenAIGenerator';
export { loadConfig } from './config';
export type { ChainweaveConfig } from './config';

export * from './errors';
