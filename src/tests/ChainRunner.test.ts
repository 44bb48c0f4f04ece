import { ChainExecutionError, CycleError, MissingTerminalError, UnknownReferenceError } from '../errors';
import { runChain } from '../workflows/ChainRunner';
import { SCENARIO_CHAIN, createFakeGenerator } from './helpers';

describe('runChain', () => {
  it('should return the output together with the trace and graph', async () => {
    const generator = createFakeGenerator();

    const result = await runChain({ chainText: SCENARIO_CHAIN, input: 'X', generator, concurrency: 2 });

    expect(result.output).toBe('gen(Summary: gen(Summarize: X)\nKeywords: gen(Keywords for: X))');
    expect(result.graph.levels).toEqual([['input text'], ['summary', 'keywords'], ['output']]);
    expect(result.trace.records).toHaveLength(4);
  });

  it.each([
    ['a cycle', '[[a]] = [[b]]\n[[b]] = [[a]]\n[[output]] = [[a]]', CycleError],
    ['a missing output', '[[summary]] = [[input text]]', MissingTerminalError],
    ['an unknown reference', '[[output]] = [[nowhere]]', UnknownReferenceError]
  ])('should reject %s before any generation call', async (_label, chainText, expected) => {
    const generator = createFakeGenerator();

    await expect(runChain({ chainText, input: 'X', generator })).rejects.toBeInstanceOf(expected);
    expect(generator.generate).not.toHaveBeenCalled();
  });

  it('should attach the partial trace to execution failures', async () => {
    const generator = createFakeGenerator({ fail: () => new Error('offline') });

    const error = await runChain({ chainText: SCENARIO_CHAIN, input: 'X', generator }).catch(
      (reason: unknown) => reason
    );

    expect(error).toBeInstanceOf(ChainExecutionError);
    if (!(error instanceof ChainExecutionError)) return;
    expect(error.trace?.recordFor('input text')?.value).toBe('X');
    expect(error.trace?.failures().map((record) => record.nodeId)).toEqual(['summary', 'keywords']);
  });
});
