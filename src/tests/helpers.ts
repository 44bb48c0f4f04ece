export const sleep = async (duration = 5) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, duration);
  });

export const SCENARIO_CHAIN = `
[[summary]] = Summarize: [[input text]]

[[keywords]] = Keywords for: [[input text]]

[[output]] =
Summary: [[summary]]
Keywords: [[keywords]]
`;

export type FakeGeneratorOptions = {
  delay?: number;
  fail?: (prompt: string) => unknown;
};

/**
 * Answers `gen(<prompt>)`, optionally after a delay. `fail` returning anything but
 * undefined makes the call reject with that value.
 */
export function createFakeGenerator({ delay = 0, fail }: FakeGeneratorOptions = {}) {
  const stats = { inFlight: 0, peak: 0 };

  const generate = jest.fn(async (prompt: string): Promise<string> => {
    stats.inFlight++;
    stats.peak = Math.max(stats.peak, stats.inFlight);
    try {
      if (delay > 0) await sleep(delay);
      const failure = fail?.(prompt);
      if (failure !== undefined) throw failure;
      return `gen(${prompt})`;
    } finally {
      stats.inFlight--;
    }
  });

  return { generate, stats };
}
