import { parseChain, tokenizeTemplate } from '../chain/ChainParser';
import { DependencyGraph, buildDependencyGraph } from '../chain/DependencyGraph';
import { ChainNode, INPUT_NODE_NAME } from '../chain/types';
import { CycleError, GraphValidationError, MissingTerminalError, UnknownReferenceError } from '../errors';
import { describePlan } from '../utils/visualize';
import { SCENARIO_CHAIN } from './helpers';

const build = (chain: string) => buildDependencyGraph(parseChain(chain));

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected an error to be thrown');
}

describe('DependencyGraph', () => {
  it('should group independent nodes into ascending levels', () => {
    const graph = build(SCENARIO_CHAIN);

    expect(graph.levels).toEqual([[INPUT_NODE_NAME], ['summary', 'keywords'], ['output']]);
    expect(graph.depthOf(INPUT_NODE_NAME)).toBe(0);
    expect(graph.depthOf('summary')).toBe(1);
    expect(graph.depthOf('keywords')).toBe(1);
    expect(graph.depthOf('output')).toBe(2);
  });

  it('should expose dependencies and dependents', () => {
    const graph = build(SCENARIO_CHAIN);

    expect(graph.dependenciesOf('output').sort()).toEqual(['keywords', 'summary']);
    expect(graph.dependentsOf(INPUT_NODE_NAME).sort()).toEqual(['keywords', 'summary']);
    expect(graph.dependenciesOf(INPUT_NODE_NAME)).toEqual([]);
  });

  it('should classify nodes without references as static', () => {
    const graph = build(
      '[[style_guide]] = Use short sentences.\n[[output]] = Rewrite [[input text]] following [[style_guide]]'
    );

    expect(graph.classify('style_guide')).toBe('static');
    expect(graph.classify(INPUT_NODE_NAME)).toBe('static');
    expect(graph.classify('output')).toBe('dynamic');
    expect(graph.levels).toEqual([[INPUT_NODE_NAME, 'style_guide'], ['output']]);
  });

  it('should give every node a depth greater than each of its dependencies', () => {
    const graph = build(`
[[a]] = [[input text]]
[[b]] = [[a]] and [[input text]]
[[c]] = static text
[[d]] = [[b]] [[c]]
[[e]] = [[a]] [[d]]
[[output]] = [[e]] [[c]]
`);

    for (const nodeId of graph.nodes) {
      for (const dependency of graph.dependenciesOf(nodeId)) {
        expect(graph.depthOf(nodeId)).toBeGreaterThan(graph.depthOf(dependency));
      }
    }
    expect(graph.depthOf('e')).toBe(4);
    expect(graph.depthOf('output')).toBe(5);
  });

  it('should validate unreferenced nodes but leave them out of the levels', () => {
    const graph = build('[[unused]] = Expand [[input text]]\n[[output]] = Final words');

    expect(graph.isReachable('unused')).toBe(false);
    expect(graph.isReachable(INPUT_NODE_NAME)).toBe(false);
    expect(graph.depthOf('unused')).toBe(1);
    expect(graph.levels).toEqual([['output']]);
  });

  it('should reject references to unknown nodes', () => {
    const error = captureError(() => build('[[output]] = Use [[missing]]'));

    expect(error).toBeInstanceOf(UnknownReferenceError);
    expect(error).toBeInstanceOf(GraphValidationError);
    expect(error).toMatchObject({ nodeId: 'output', reference: 'missing' });
  });

  it('should report a two-node cycle with its path', () => {
    const error = captureError(() => build('[[a]] = [[b]]\n[[b]] = [[a]]\n[[output]] = [[a]]'));

    expect(error).toBeInstanceOf(CycleError);
    expect(error).toMatchObject({ path: ['a', 'b', 'a'] });
    expect(error).toHaveProperty('message', 'Circular dependency detected: [[a]] -> [[b]] -> [[a]]');
  });

  it('should detect cycles among unreferenced nodes', () => {
    const error = captureError(() => build('[[output]] = done\n[[x]] = [[y]]\n[[y]] = [[z]]\n[[z]] = [[x]]'));

    expect(error).toMatchObject({ path: ['x', 'y', 'z', 'x'] });
  });

  it('should treat self references as cycles', () => {
    expect(() => build('[[output]] = again [[output]]')).toThrow(new CycleError(['output', 'output']));
  });

  it('should require an output node in hand-built definitions', () => {
    const node: ChainNode = {
      id: 'a',
      text: 'hi',
      segments: tokenizeTemplate('hi'),
      references: [],
      isReserved: false
    };

    expect(() => DependencyGraph.build(new Map([['a', node]]))).toThrow(MissingTerminalError);
  });

  it('should add the reserved input to definitions that lack it', () => {
    const output: ChainNode = {
      id: 'output',
      text: '[[input text]]!',
      segments: tokenizeTemplate('[[input text]]!'),
      references: [INPUT_NODE_NAME],
      isReserved: false
    };

    const graph = DependencyGraph.build(new Map([['output', output]]));

    expect(graph.levels).toEqual([[INPUT_NODE_NAME], ['output']]);
    expect(graph.node(INPUT_NODE_NAME).isReserved).toBe(true);
  });

  it('should describe the execution plan', () => {
    const plan = describePlan(build('[[unused]] = x\n[[summary]] = [[input text]]\n[[output]] = [[summary]]'), {
      color: false
    });

    expect(plan).toBe(
      'Chain Execution Plan:\n' +
        '\nLevel 0:\n  • input text [static]\n' +
        '\nLevel 1:\n  • summary [dynamic] (depends on: input text)\n' +
        '\nLevel 2:\n  • output [dynamic] (depends on: summary)\n' +
        '\nUnreferenced (not dispatched): unused\n'
    );
  });
});
