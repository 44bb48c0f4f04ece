import { DirectedGraph } from 'graphology';
import { topologicalGenerations } from 'graphology-dag';
import { createInputNode } from './ChainParser';
import { CycleError, MissingTerminalError, UnknownReferenceError } from '../errors';
import { ChainDefinition, ChainNode, INPUT_NODE_NAME, NodeClassification, OUTPUT_NODE_NAME } from './types';

type NodeAttributes = {
  classification: NodeClassification;
  order: number;
};

type Mark = 'in-progress' | 'done';

/**
 * Validated, leveled view of a chain. An edge `a -> b` means `b` references `a`,
 * so `a` has to be resolved first. Built once and read-only afterwards.
 */
export class DependencyGraph {
  private readonly graph: DirectedGraph<NodeAttributes>;
  private readonly depths = new Map<string, number>();
  private readonly reachable: ReadonlySet<string>;

  public readonly levels: ReadonlyArray<ReadonlyArray<string>>;

  private constructor(
    public readonly definition: ChainDefinition,
    graph: DirectedGraph<NodeAttributes>
  ) {
    this.graph = graph;

    const generations = topologicalGenerations(graph);
    generations.forEach((generation, depth) => {
      for (const id of generation) this.depths.set(id, depth);
    });

    this.reachable = collectReachable(graph, OUTPUT_NODE_NAME);
    this.levels = generations
      .map((generation) =>
        generation.filter((id) => this.reachable.has(id)).sort((a, b) => this.orderOf(a) - this.orderOf(b))
      )
      .filter((level) => level.length > 0);
  }

  static build(parsed: ChainDefinition): DependencyGraph {
    if (!parsed.has(OUTPUT_NODE_NAME)) {
      throw new MissingTerminalError(OUTPUT_NODE_NAME);
    }
    const definition: ChainDefinition = parsed.has(INPUT_NODE_NAME)
      ? parsed
      : new Map<string, ChainNode>([[INPUT_NODE_NAME, createInputNode()], ...parsed]);

    const graph = new DirectedGraph<NodeAttributes>();
    graph.mergeNode(INPUT_NODE_NAME, { classification: 'static', order: -1 });

    let order = 0;
    for (const node of definition.values()) {
      if (node.isReserved) continue;
      graph.mergeNode(node.id, { classification: classifyNode(node), order: order++ });
    }

    for (const node of definition.values()) {
      for (const reference of node.references) {
        if (!graph.hasNode(reference)) {
          throw new UnknownReferenceError(node.id, reference);
        }
        if (reference === node.id) {
          throw new CycleError([node.id, node.id]);
        }
        graph.mergeDirectedEdge(reference, node.id);
      }
    }

    const cycle = findCycle(graph, [OUTPUT_NODE_NAME, ...graph.nodes()]);
    if (cycle) {
      throw new CycleError(cycle);
    }

    return new DependencyGraph(definition, graph);
  }

  get nodes(): string[] {
    return this.graph.nodes();
  }

  node(id: string): ChainNode {
    const node = this.definition.get(id);
    if (!node) {
      throw new Error(`Unknown node [[${id}]]`);
    }
    return node;
  }

  depthOf(id: string): number {
    const depth = this.depths.get(id);
    if (depth === undefined) {
      throw new Error(`Unknown node [[${id}]]`);
    }
    return depth;
  }

  classify(id: string): NodeClassification {
    return this.graph.getNodeAttribute(id, 'classification');
  }

  dependenciesOf(id: string): string[] {
    return this.graph.inNeighbors(id);
  }

  dependentsOf(id: string): string[] {
    return this.graph.outNeighbors(id);
  }

  isReachable(id: string): boolean {
    return this.reachable.has(id);
  }

  private orderOf(id: string): number {
    return this.graph.getNodeAttribute(id, 'order');
  }
}

export function buildDependencyGraph(definition: ChainDefinition): DependencyGraph {
  return DependencyGraph.build(definition);
}

export function classifyNode(node: ChainNode): NodeClassification {
  return node.isReserved || node.references.length === 0 ? 'static' : 'dynamic';
}

/**
 * Follows references with an explicit stack and three-color marking. Returns the
 * first cycle found as a closed path (`a, b, a`), or undefined when the graph is acyclic.
 */
function findCycle(graph: DirectedGraph<NodeAttributes>, roots: string[]): string[] | undefined {
  const marks = new Map<string, Mark>();

  for (const root of roots) {
    if (marks.has(root)) continue;

    const path: string[] = [root];
    const pending: string[][] = [graph.inNeighbors(root)];
    marks.set(root, 'in-progress');

    while (path.length > 0) {
      const next = pending[pending.length - 1].shift();

      if (next === undefined) {
        const done = path.pop();
        pending.pop();
        if (done !== undefined) marks.set(done, 'done');
        continue;
      }

      const mark = marks.get(next);
      if (mark === 'in-progress') {
        return [...path.slice(path.indexOf(next)), next];
      }
      if (mark === 'done') continue;

      marks.set(next, 'in-progress');
      path.push(next);
      pending.push(graph.inNeighbors(next));
    }
  }

  return undefined;
}

function collectReachable(graph: DirectedGraph<NodeAttributes>, from: string): Set<string> {
  const seen = new Set<string>([from]);
  const queue = [from];

  while (queue.length > 0) {
    const id = queue.shift();
    if (id === undefined) break;
    for (const dependency of graph.inNeighbors(id)) {
      if (!seen.has(dependency)) {
        seen.add(dependency);
        queue.push(dependency);
      }
    }
  }

  return seen;
}
