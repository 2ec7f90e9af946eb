/**
 * Pipeline Executor
 *
 * Runs stages with per-stage timing and lifecycle callbacks.
 *
 * @module pipeline/executor
 */

import type {
  PipelineCallbacks,
  StageContext,
  StageResult,
  Timing,
  TypedStage,
} from './types.js';

/**
 * Timing information for a whole pipeline execution
 */
export interface PipelineTiming extends Timing {
  /** Duration per stage id in milliseconds */
  perStage: Record<string, number>;
}

/**
 * Run a synchronous computation and record its timing.
 */
export function timed<T>(compute: () => T): StageResult<T> {
  const startedAt = new Date().toISOString();
  const startTime = Date.now();

  const data = compute();

  return {
    data,
    timing: {
      startedAt,
      completedAt: new Date().toISOString(),
      durationMs: Date.now() - startTime,
    },
  };
}

/**
 * Sequential stage runner that accumulates per-stage timing.
 *
 * @example
 * ```typescript
 * const executor = new PipelineExecutor(context, callbacks);
 * const normalized = executor.run(normalizeStage, listings);
 * const candidates = executor.run(candidatesStage, normalized);
 * const timing = executor.finish();
 * ```
 */
export class PipelineExecutor {
  private readonly startedAt = new Date().toISOString();
  private readonly startTime = Date.now();
  private readonly perStage: Record<string, number> = {};

  constructor(
    private readonly context: StageContext,
    private readonly callbacks: PipelineCallbacks = {}
  ) {}

  /**
   * Execute one stage and return its output data.
   */
  run<TInput, TOutput>(stage: TypedStage<TInput, TOutput>, input: TInput): TOutput {
    this.callbacks.onStageStart?.(stage.id, stage.number);
    this.context.logger?.debug(`[pipeline] Starting ${stage.id}`);

    const result = stage.execute(this.context, input);

    this.perStage[stage.id] = result.timing.durationMs;
    this.context.logger?.debug(`[pipeline] Completed ${stage.id} in ${result.timing.durationMs}ms`);
    this.callbacks.onStageComplete?.(stage.id, stage.number, result.timing);

    return result.data;
  }

  /**
   * Close the run and return the overall timing.
   */
  finish(): PipelineTiming {
    return {
      startedAt: this.startedAt,
      completedAt: new Date().toISOString(),
      durationMs: Date.now() - this.startTime,
      perStage: { ...this.perStage },
    };
  }
}
