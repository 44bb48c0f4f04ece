// Name bound to the externally supplied initial text. Users may reference it but never declare it.
export const INPUT_NODE_NAME = 'input text';

// Name of the node whose resolved value is the chain's final output.
export const OUTPUT_NODE_NAME = 'output';

export type TemplateSegment = { kind: 'text'; value: string } | { kind: 'reference'; name: string; raw: string };

export type ChainNode = {
  id: string;
  text: string;
  segments: TemplateSegment[];
  references: string[];
  isReserved: boolean;
  line?: number;
};

export type ChainDefinition = ReadonlyMap<string, ChainNode>;

export type NodeClassification = 'static' | 'dynamic';

export type NodeState = 'pending' | 'substituting' | 'generating' | 'resolved' | 'failed';

export type NodeRecord = {
  nodeId: string;
  classification: NodeClassification;
  level: number;
  prompt?: string;
  value?: string;
  error?: Error;
  startedAt: number;
  durationMs: number;
};

/**
 * The external text-generation capability a dynamic node is resolved with.
 * Implementations should reject with a GenerationError; anything else is wrapped.
 */
export interface TextGenerator {
  generate(prompt: string): Promise<string>;
}
