#!/usr/bin/env node
/**
 * chainweave CLI
 *
 *   chainweave <prompt_file> <input_file> [options]
 *
 * Resolves the chain in <prompt_file> against the text of <input_file> and writes
 * `<timestamp>_<input>_output.txt` plus `<timestamp>_<input>_promptchain.log`.
 * Failed runs write only the log.
 */

import { Command, InvalidArgumentError } from 'commander';
import { readFile } from 'fs/promises';
import { OpenAIGenerator } from './activities/OpenAIGenerator';
import type { TextGenerator } from './chain/types';
import { ChainweaveConfig, loadConfig } from './config';
import { ChainError, ChainExecutionError, ConfigError, describeCause } from './errors';
import { writeRunArtifacts } from './utils/artifacts';
import { ExecutionTrace } from './utils/ExecutionTrace';
import { formatTrace } from './utils/formatTrace';
import { LogLevel, configureLogger, isLogLevel, logger } from './utils/logger';
import { runChain } from './workflows/ChainRunner';

export type CliOptions = {
  debug?: boolean;
  concurrency?: number;
  // Left undefined unless --no-parallel was given, so CHAINWEAVE_PARALLEL applies.
  parallel?: boolean;
  model?: string;
  timeout?: number;
  outDir?: string;
  logFile?: string;
  jsonLogs?: boolean;
  logLevel?: LogLevel;
};

export type ProgramDependencies = {
  createGenerator?: (config: ChainweaveConfig) => TextGenerator;
  env?: NodeJS.ProcessEnv;
};

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError(`Unknown log level "${value}".`);
  }
  return value;
}

function defaultGenerator(config: ChainweaveConfig): TextGenerator {
  if (!config.apiKey) {
    throw new ConfigError('The OPENAI_API_KEY environment variable is not set.');
  }
  return new OpenAIGenerator({
    apiKey: config.apiKey,
    model: config.model,
    systemPrompt: config.systemPrompt,
    timeoutMs: config.timeoutMs
  });
}

async function readText(filePath: string, label: string): Promise<string> {
  try {
    return await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Could not read ${label} ${filePath}: ${describeCause(error)}`);
  }
}

export async function runCli(
  promptFile: string,
  inputFile: string,
  options: CliOptions,
  { createGenerator = defaultGenerator, env = process.env }: ProgramDependencies = {}
): Promise<number> {
  const config = loadConfig(env, {
    concurrency: options.concurrency,
    parallel: options.parallel,
    model: options.model,
    timeoutMs: options.timeout,
    outDir: options.outDir,
    logFile: options.logFile,
    jsonLogs: options.jsonLogs,
    logLevel: options.debug ? 'debug' : options.logLevel
  });
  configureLogger({ level: config.logLevel, file: config.logFile, json: config.jsonLogs });

  const generator = createGenerator(config);
  const chainText = await readText(promptFile, 'prompt file');
  const input = await readText(inputFile, 'input file');

  const trace = new ExecutionTrace();
  trace.on('record', (record) => {
    const outcome = record.error ? `failed: ${record.error.message}` : 'resolved';
    logger.info(`[[${record.nodeId}]] (${record.classification}, level ${record.level}) ${outcome}`);
  });

  try {
    const { output } = await runChain({
      chainText,
      input,
      generator,
      concurrency: config.concurrency,
      parallel: config.parallel,
      trace
    });

    const { logPath, outputPath } = await writeRunArtifacts({
      outDir: config.outDir,
      inputPath: inputFile,
      log: formatTrace(trace),
      output
    });

    console.log('\n===================================');
    console.log('        PROCESSING COMPLETE');
    console.log('===================================\n');
    console.log(`Full log written to:    ${logPath}`);
    console.log(`Final output written to: ${outputPath}`);
    return 0;
  } catch (error) {
    if (error instanceof ChainExecutionError) {
      const { logPath } = await writeRunArtifacts({
        outDir: config.outDir,
        inputPath: inputFile,
        log: formatTrace(trace)
      });
      logger.error(`Processing failed. No output file was written; trace saved to ${logPath}`);
      return 1;
    }
    throw error;
  }
}

export function createProgram(dependencies: ProgramDependencies = {}): Command {
  const program = new Command();

  program
    .name('chainweave')
    .description('Process a prompt chain file against an input text file.')
    .version('0.1.0')
    .argument('<prompt_file>', 'Path to the prompt chain file.')
    .argument('<input_file>', 'Path to the input text file.')
    .option('--debug', 'Enable debug output.')
    .option('-c, --concurrency <n>', 'Maximum generation calls in flight.', parsePositiveInt)
    .option('--no-parallel', 'Dispatch nodes one at a time.')
    .option('-m, --model <name>', 'Model used for generation.')
    .option('--timeout <ms>', 'Per-call generation timeout in milliseconds.', parsePositiveInt)
    .option('-o, --out-dir <dir>', 'Directory for the output and log files.')
    .option('--log-file <path>', 'Also write application logs to this file.')
    .option('--json-logs', 'Write the log file as JSON lines.')
    .option('--log-level <level>', 'Minimum log level.', parseLogLevel)
    .action(async (promptFile: string, inputFile: string, options: CliOptions) => {
      try {
        const parallel = program.getOptionValueSource('parallel') === 'cli' ? options.parallel : undefined;
        process.exitCode = await runCli(promptFile, inputFile, { ...options, parallel }, dependencies);
      } catch (error) {
        if (error instanceof ChainError) {
          logger.error(error.message);
          process.exitCode = 1;
          return;
        }
        throw error;
      }
    });

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(error);
      process.exit(1);
    });
}
