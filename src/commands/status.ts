import { basename } from 'path';
import { CommandContext, createClassifier } from '../lib/context.js';
import { StatusReporter, StatusReport, watchStatus } from '../lib/status-reporter.js';
import { formatStatusReport } from '../lib/status-format.js';
import { Result, WorktreeError, describeError, unwrap } from '../lib/errors.js';

export interface StatusOptions {
  watch?: boolean;
  // Seconds; overrides watchInterval
  interval?: string;
  // Stop watching after this many refreshes
  iterations?: number;
}

export function parseInterval(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds < 1) {
    throw new WorktreeError('PreconditionFailed', `Invalid interval: "${value}". Use a number of seconds, at least 1.`);
  }
  return seconds;
}

export async function statusCommand(options: StatusOptions, context: CommandContext): Promise<void> {
  const { logger } = context;
  const project = basename(context.repoRoot);
  const classifier = await createClassifier(context);
  const reporter = new StatusReporter(context.registry, classifier);

  if (!options.watch) {
    const report = unwrap(await reporter.report());
    for (const line of formatStatusReport(report, project)) {
      logger.log(line);
    }
    return;
  }

  const seconds = parseInterval(options.interval, context.config.watchInterval);
  const render = (result: Result<StatusReport>) => {
    console.clear();
    // A failed refresh is shown and the next one still runs
    const lines = result.ok ? formatStatusReport(result.value, project) : describeError(result.error);
    for (const line of lines) {
      logger.log(line);
    }
    logger.log('');
    logger.log(`Refreshing every ${seconds}s. Press Ctrl+C to exit.`);
  };

  await watchStatus(reporter, render, { intervalMs: seconds * 1000, iterations: options.iterations });
}
