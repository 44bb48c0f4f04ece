import { performance } from 'perf_hooks';
import { renderTemplate } from '../chain/ChainParser';
import { DependencyGraph } from '../chain/DependencyGraph';
import { INPUT_NODE_NAME, NodeRecord, NodeState, OUTPUT_NODE_NAME, TextGenerator } from '../chain/types';
import { ChainExecutionError, GenerationError, NodeFailure } from '../errors';
import { ExecutionTrace } from '../utils/ExecutionTrace';
import { logger } from '../utils/logger';
import { WorkerPool, defaultConcurrency } from '../utils/WorkerPool';

export type ChainResolverOptions = {
  generator: TextGenerator;
  concurrency?: number;
  // false dispatches one node at a time; results are the same.
  parallel?: boolean;
};

type RunState = {
  graph: DependencyGraph;
  initialInput: string;
  trace: ExecutionTrace;
  values: Map<string, string>;
  states: Map<string, NodeState>;
};

const TRANSITIONS: Record<NodeState, NodeState[]> = {
  pending: ['substituting'],
  substituting: ['resolved', 'generating', 'failed'],
  generating: ['resolved', 'failed'],
  resolved: [],
  failed: []
};

/**
 * Resolves a validated chain level by level. Every node of a level is dispatched to the
 * pool at once and the next level starts only after all of them settled. Each value is
 * written once, by the unit resolving that node, and read only by later levels.
 * Run state lives in the `resolve` call; a resolver can be reused for any number of runs.
 */
export class ChainResolver {
  public readonly pool: WorkerPool;

  private readonly generator: TextGenerator;

  constructor({ generator, concurrency, parallel = true }: ChainResolverOptions) {
    this.generator = generator;
    this.pool = new WorkerPool(parallel ? (concurrency ?? defaultConcurrency()) : 1);
  }

  get concurrency(): number {
    return this.pool.limit;
  }

  async resolve(
    graph: DependencyGraph,
    initialInput: string,
    trace: ExecutionTrace = new ExecutionTrace()
  ): Promise<string> {
    const run: RunState = { graph, initialInput, trace, values: new Map(), states: new Map() };

    for (const level of graph.levels) {
      for (const nodeId of level) this.setState(run, nodeId, 'pending');
    }

    for (let index = 0; index < graph.levels.length; index++) {
      const level = [...graph.levels[index]];
      logger.info(`Resolving level ${index} with ${level.length} node(s): ${level.join(', ')}`);
      trace.beginLevel(index, level);

      const results = await this.pool.runAll(level.map((nodeId) => () => this.resolveNode(run, nodeId, index)));

      const failures: NodeFailure[] = [];
      results.forEach((result, position) => {
        if (result.status === 'rejected') {
          const nodeId = level[position];
          const error =
            result.reason instanceof GenerationError
              ? result.reason.forNode(nodeId)
              : new GenerationError(result.reason, nodeId);
          failures.push({ nodeId, level: index, error });
        }
      });

      if (failures.length > 0) {
        const skipped = graph.levels.slice(index + 1).flat();
        for (const failure of failures) {
          logger.error(failure.error.message);
        }
        logger.error(`Aborting after level ${index}; ${skipped.length} node(s) were not started`);

        trace.fail(failures);
        const error = new ChainExecutionError(failures, skipped);
        error.trace = trace;
        throw error;
      }
    }

    const output = run.values.get(OUTPUT_NODE_NAME);
    if (output === undefined) {
      throw new Error(`[[${OUTPUT_NODE_NAME}]] was not resolved`);
    }
    return output;
  }

  private setState(run: RunState, nodeId: string, state: NodeState): void {
    const previous = run.states.get(nodeId);
    if (previous !== undefined && !TRANSITIONS[previous].includes(state)) {
      throw new Error(`Illegal state change for [[${nodeId}]]: ${previous} -> ${state}`);
    }
    run.states.set(nodeId, state);
    run.trace.transition(nodeId, state);
  }

  private memoize(run: RunState, nodeId: string, value: string): void {
    if (run.values.has(nodeId)) {
      throw new Error(`Node [[${nodeId}]] was resolved more than once`);
    }
    run.values.set(nodeId, value);
  }

  private async resolveNode(run: RunState, nodeId: string, level: number): Promise<string> {
    const node = run.graph.node(nodeId);
    const classification = run.graph.classify(nodeId);
    const startedAt = Date.now();
    const started = performance.now();

    const record = (fields: Pick<NodeRecord, 'prompt' | 'value' | 'error'>) =>
      run.trace.append({
        nodeId,
        classification,
        level,
        startedAt,
        durationMs: performance.now() - started,
        ...fields
      });

    this.setState(run, nodeId, 'substituting');

    if (classification === 'static') {
      const value = node.id === INPUT_NODE_NAME ? run.initialInput : node.text;
      this.memoize(run, nodeId, value);
      this.setState(run, nodeId, 'resolved');
      record({ value });
      logger.debug(`[[${nodeId}]] is static; using its content directly`);
      return value;
    }

    let prompt: string | undefined;
    let value: string;
    try {
      prompt = renderTemplate(node, run.values);
      this.setState(run, nodeId, 'generating');
      logger.debug(`Sending prompt for [[${nodeId}]] (${prompt.length} chars)`);

      value = await this.generator.generate(prompt);
    } catch (cause) {
      const error = cause instanceof GenerationError ? cause.forNode(nodeId) : new GenerationError(cause, nodeId);
      this.setState(run, nodeId, 'failed');
      record({ prompt, error });
      throw error;
    }

    this.memoize(run, nodeId, value);
    this.setState(run, nodeId, 'resolved');
    record({ prompt, value });
    logger.debug(`[[${nodeId}]] resolved in ${Math.round(performance.now() - started)}ms`);
    return value;
  }
}
