import type { ExecutionTrace } from './utils/ExecutionTrace';

export class ChainError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Raised while reading chain-file text. Nothing has been dispatched when this is thrown.
 */
export class ParseError extends ChainError {
  constructor(
    message: string,
    public readonly line?: number
  ) {
    super(line === undefined ? message : `${message} (line ${line})`);
  }
}

export class MissingTerminalError extends ParseError {
  constructor(public readonly terminal: string) {
    super(`The chain must declare an [[${terminal}]] node`);
  }
}

export class GraphValidationError extends ChainError {}

export class UnknownReferenceError extends GraphValidationError {
  constructor(
    public readonly nodeId: string,
    public readonly reference: string
  ) {
    super(`Node [[${nodeId}]] references unknown node [[${reference}]]`);
  }
}

export class CycleError extends GraphValidationError {
  constructor(public readonly path: string[]) {
    super(`Circular dependency detected: ${path.map((id) => `[[${id}]]`).join(' -> ')}`);
  }
}

/**
 * A generation call failed. Backends throw it without a node id; the resolver binds
 * the failing node with `forNode`.
 */
export class GenerationError extends ChainError {
  constructor(
    cause: unknown,
    public readonly nodeId?: string
  ) {
    super(
      nodeId === undefined
        ? `Generation failed: ${describeCause(cause)}`
        : `Generation failed for [[${nodeId}]]: ${describeCause(cause)}`,
      { cause }
    );
  }

  forNode(nodeId: string): GenerationError {
    return this.nodeId === nodeId ? this : new GenerationError(this.cause, nodeId);
  }
}

export type NodeFailure = {
  nodeId: string;
  level: number;
  error: GenerationError;
};

/**
 * Thrown by the resolver once a level finished with at least one failed node.
 * `skipped` lists the reachable nodes that were never started.
 */
export class ChainExecutionError extends ChainError {
  public trace?: ExecutionTrace;

  constructor(
    public readonly failures: NodeFailure[],
    public readonly skipped: string[]
  ) {
    super(
      `${failures.length} node(s) failed: ${failures.map((failure) => `[[${failure.nodeId}]]`).join(', ')}` +
        (skipped.length > 0 ? `; never started: ${skipped.map((id) => `[[${id}]]`).join(', ')}` : '')
    );
  }
}

export class ConfigError extends ChainError {}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (typeof cause === 'string') return cause;
  return String(cause);
}
