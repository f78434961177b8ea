import type { PipelineReport } from '../types';
import { OperationCancelledError, StageFailedError } from '../errors';
import { Logger, logger as rootLogger } from '../logger';
import type { Pipeline, StageContext } from './types';

export interface RunStagesOptions {
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Run the stages of one pipeline strictly in order.
 *
 * An unmet precondition stops the pipeline and is reported as skipped; it is
 * not an error. A stage that throws stops the pipeline with a
 * StageFailedError carrying the original error as its cause, except for
 * OperationCancelledError, which propagates as it is.
 */
export async function runStages(pipeline: Pipeline, options: RunStagesOptions = {}): Promise<PipelineReport> {
  const log = (options.logger ?? rootLogger).child({ pipeline: pipeline.name });
  const report: PipelineReport = { pipeline: pipeline.name, completed: [] };

  for (const stage of pipeline.stages) {
    if (options.signal?.aborted) {
      throw new OperationCancelledError(`Pipeline ${pipeline.name}`, options.signal.reason);
    }

    const context: StageContext = {
      pipeline: pipeline.name,
      stage: stage.name,
      log: log.child({ stage: stage.name }),
      signal: options.signal
    };

    try {
      if (stage.precondition) {
        const precondition = await stage.precondition(context);
        if (!precondition.met) {
          context.log.info('Precondition not met, stopping pipeline', { reason: precondition.reason });
          report.skipped = { stage: stage.name, reason: precondition.reason };
          return report;
        }
      }

      context.log.debug('Running stage');
      await stage.run(context);
    } catch (error) {
      if (error instanceof OperationCancelledError) {
        context.log.info('Stage cancelled');
        throw error;
      }
      context.log.error('Stage failed', { error: error instanceof Error ? error.message : String(error) });
      throw new StageFailedError(pipeline.name, stage.name, error);
    }

    report.completed.push(stage.name);
  }

  log.info('Pipeline complete', { stages: report.completed.length });
  return report;
}
