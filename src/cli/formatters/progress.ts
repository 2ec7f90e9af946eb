/**
 * Progress Formatters
 *
 * CLI progress display utilities:
 * - Spinner for long-running operations
 * - Stage progress display with checkmarks
 *
 * Uses the ora library for terminal spinners.
 *
 * @module cli/formatters/progress
 */

import ora from 'ora';
import chalk from 'chalk';
import { STAGE_NAMES, type StageNumber } from '../../pipeline/types.js';

// ============================================================================
// Types
// ============================================================================

type Spinner = ReturnType<typeof ora>;

export type StageStatus = 'pending' | 'running' | 'completed' | 'failed';

/**
 * Stage display information.
 */
export interface StageDisplay {
  number: StageNumber;
  name: string;
  status: StageStatus;
  /** Duration in milliseconds (if completed) */
  durationMs?: number;
  /** Error message (if failed) */
  error?: string;
}

export interface SpinnerOptions {
  /** Spinner color */
  color?: 'cyan' | 'green' | 'yellow' | 'red' | 'blue' | 'magenta' | 'white';
}

// ============================================================================
// Stage Labels
// ============================================================================

/**
 * Human-readable labels for each stage.
 */
export const STAGE_LABELS: Record<StageNumber, string> = {
  1: 'Validate',
  2: 'Normalize',
  3: 'Candidate pairs',
  4: 'Score',
  5: 'Cluster',
  6: 'Evidence',
};

const STAGE_NUMBERS: readonly StageNumber[] = [1, 2, 3, 4, 5, 6];

const STATUS_ICONS: Record<StageStatus, string> = {
  pending: '○',
  running: '●',
  completed: '✔',
  failed: '✘',
};

/**
 * Plain text icons for non-TTY output.
 */
const STATUS_ICONS_PLAIN: Record<StageStatus, string> = {
  pending: '[ ]',
  running: '[*]',
  completed: '[+]',
  failed: '[X]',
};

function colorIcon(status: StageStatus): string {
  const icon = STATUS_ICONS[status];
  switch (status) {
    case 'pending':
      return chalk.dim(icon);
    case 'running':
      return chalk.cyan(icon);
    case 'completed':
      return chalk.green(icon);
    case 'failed':
      return chalk.red(icon);
  }
}

// ============================================================================
// Spinner Class
// ============================================================================

/**
 * Progress spinner wrapper with consistent styling.
 *
 * @example
 * ```typescript
 * const spinner = new ProgressSpinner('Loading feed...').start();
 * const listings = await loadListingsFile(input);
 * spinner.succeed(`Loaded ${listings.length} listings`);
 * ```
 */
export class ProgressSpinner {
  private spinner: Spinner;
  private startTime = 0;

  constructor(text: string, options: SpinnerOptions = {}) {
    this.spinner = ora({
      text,
      color: options.color ?? 'cyan',
      isEnabled: process.stdout.isTTY === true,
      stream: process.stdout,
    });
  }

  start(text?: string): this {
    this.startTime = Date.now();
    if (text) {
      this.spinner.text = text;
    }
    this.spinner.start();
    return this;
  }

  update(text: string): this {
    this.spinner.text = text;
    return this;
  }

  /**
   * Stop spinner with success state, appending the elapsed time.
   */
  succeed(text?: string): this {
    const duration = Date.now() - this.startTime;
    const durationStr = duration > 0 ? chalk.dim(` (${formatDuration(duration)})`) : '';
    this.spinner.succeed((text ?? this.spinner.text) + durationStr);
    return this;
  }

  fail(text?: string): this {
    this.spinner.fail(text);
    return this;
  }

  stop(): this {
    this.spinner.stop();
    return this;
  }

  isSpinning(): boolean {
    return this.spinner.isSpinning;
  }
}

// ============================================================================
// Stage Progress Display
// ============================================================================

/**
 * Display detection stage progress with checkmarks.
 *
 * @example
 * ```typescript
 * const progress = new StageProgressDisplay();
 * detectDuplicates(listings, config, {
 *   onStageStart: (_id, n) => progress.startStage(n),
 *   onStageComplete: (_id, n, timing) => progress.completeStage(n, timing.durationMs),
 * });
 * ```
 */
export class StageProgressDisplay {
  private stages: Map<StageNumber, StageDisplay> = new Map();
  private readonly isTTY: boolean;
  private currentSpinner: ProgressSpinner | null = null;

  constructor() {
    this.isTTY = process.stdout.isTTY === true;

    for (const num of STAGE_NUMBERS) {
      this.stages.set(num, { number: num, name: STAGE_NAMES[num], status: 'pending' });
    }
  }

  startStage(stageNumber: StageNumber): void {
    const stage = this.stages.get(stageNumber);
    if (!stage) return;
    stage.status = 'running';

    if (this.isTTY) {
      this.currentSpinner = new ProgressSpinner(`${STAGE_LABELS[stageNumber]}...`).start();
    } else {
      console.log(`[*] Stage ${stageNumber}: ${STAGE_LABELS[stageNumber]}...`);
    }
  }

  completeStage(stageNumber: StageNumber, durationMs: number): void {
    const stage = this.stages.get(stageNumber);
    if (!stage) return;
    stage.status = 'completed';
    stage.durationMs = durationMs;

    if (this.currentSpinner) {
      this.currentSpinner.succeed(`${STAGE_LABELS[stageNumber]} complete`);
      this.currentSpinner = null;
    } else {
      console.log(
        `[+] Stage ${stageNumber}: ${STAGE_LABELS[stageNumber]} (${formatDuration(durationMs)})`
      );
    }
  }

  /**
   * Mark the running stage, if any, as failed.
   */
  failRunning(error: string): void {
    for (const stage of this.stages.values()) {
      if (stage.status !== 'running') continue;
      stage.status = 'failed';
      stage.error = error;

      if (this.currentSpinner) {
        this.currentSpinner.fail(`${STAGE_LABELS[stage.number]} failed`);
        this.currentSpinner = null;
      } else {
        console.log(`[X] Stage ${stage.number}: ${STAGE_LABELS[stage.number]} - ${error}`);
      }
    }
  }

  getStageDisplay(stageNumber: StageNumber): StageDisplay | undefined {
    return this.stages.get(stageNumber);
  }

  getAllStages(): StageDisplay[] {
    return Array.from(this.stages.values());
  }

  formatStageLine(stage: StageDisplay): string {
    const icon = this.isTTY ? colorIcon(stage.status) : STATUS_ICONS_PLAIN[stage.status];
    const num = stage.number.toString().padStart(2, '0');

    let line = `${icon} ${num} ${STAGE_LABELS[stage.number]}`;
    if (stage.durationMs !== undefined) {
      line += chalk.dim(` (${formatDuration(stage.durationMs)})`);
    }
    if (stage.error) {
      line += chalk.red(` - ${stage.error}`);
    }
    return line;
  }

  getCounts(): Record<StageStatus, number> {
    const counts: Record<StageStatus, number> = {
      pending: 0,
      running: 0,
      completed: 0,
      failed: 0,
    };
    for (const stage of this.stages.values()) {
      counts[stage.status]++;
    }
    return counts;
  }

  getTotalDuration(): number {
    let total = 0;
    for (const stage of this.stages.values()) {
      total += stage.durationMs ?? 0;
    }
    return total;
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Format a duration in milliseconds to human-readable string.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);
  return `${minutes}m ${remainingSeconds}s`;
}
