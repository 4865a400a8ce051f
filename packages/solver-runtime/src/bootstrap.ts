/**
 * @module @bbo-plugin/runtime/bootstrap
 *
 * Entry point for a solver plugin process: wires stdin/stdout to a
 * SolverRunner and maps the outcome onto the exit code.
 *
 * @example
 * ```typescript
 * import { runSolverPlugin } from '@bbo-plugin/runtime';
 *
 * await runSolverPlugin(new RandomSearchFactory());
 * ```
 */

import { wrapError, type SolverFactory, type SolverPluginError } from '@bbo-plugin/contracts';
import { stringifyJson } from '@bbo-plugin/protocol';
import { loadRunnerConfig } from './config/runner-config.js';
import { createRuntimeLogger, type RuntimeLogger } from './logging.js';
import { SolverRunner, type RunResult } from './runner.js';
import { StreamLineTransport, type LineTransport } from './transport/index.js';

export interface RunSolverPluginOptions {
  /** Environment to read configuration from (default: process.env) */
  env?: Record<string, string | undefined>;
  /** Transport (default: stdin/stdout) */
  transport?: LineTransport;
  /** Logger (default: stderr logger configured from env) */
  logger?: RuntimeLogger;
  /** Failure report sink (default: process.stderr) */
  stderr?: (line: string) => void;
  /** Exit code setter (default: assigns process.exitCode) */
  setExitCode?: (code: number) => void;
}

/**
 * One-line failure summary for the host's log
 */
export function formatFailure(error: SolverPluginError): string {
  const parts = [`solver plugin failed: [${error.code}] ${error.message}`];

  if (error.details && Object.keys(error.details).length > 0) {
    parts.push(stringifyJson(error.details));
  }

  if (error.cause instanceof Error && error.cause.message !== error.message) {
    parts.push(`(caused by ${error.cause.name}: ${error.cause.message})`);
  }

  return parts.join(' ');
}

/**
 * Run a solver plugin until its input closes.
 *
 * Clean end-of-stream sets exit code 0; any failure prints a summary to
 * stderr and sets exit code 1. Never calls `process.exit`.
 *
 * @returns the run summary, or null when the run failed
 */
export async function runSolverPlugin(
  factory: SolverFactory,
  options: RunSolverPluginOptions = {}
): Promise<RunResult | null> {
  const setExitCode =
    options.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });
  const stderr = options.stderr ?? ((line: string) => process.stderr.write(`${line}\n`));

  let transport: LineTransport | undefined;
  try {
    const config = loadRunnerConfig(options.env ?? process.env);
    const logger =
      options.logger ?? createRuntimeLogger('runner', { level: config.logLevel, format: config.logFormat });
    transport = options.transport ?? new StreamLineTransport();

    const runner = new SolverRunner(factory, { transport, logger });
    const result = await runner.run();
    setExitCode(0);
    return result;
  } catch (error) {
    stderr(formatFailure(wrapError(error)));
    setExitCode(1);
    return null;
  } finally {
    transport?.close();
  }
}
