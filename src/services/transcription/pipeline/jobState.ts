/**
 * Transcription job lifecycle
 *
 * planned → splitting → dispatching → merging → cleanup → done
 * Any non-terminal state may move to failed. The direct (unchunked) path
 * skips splitting and cleanup.
 */

import { type JobState } from '@/types/transcription';
import { PipelineInvariantError } from '@/services/utils/errors';
import { logger } from '@/services/utils/logger';
import { t } from '@/i18n';

const TRANSITIONS: Record<JobState, readonly JobState[]> = {
  planned: ['splitting', 'dispatching', 'failed'],
  splitting: ['dispatching', 'cleanup', 'failed'],
  dispatching: ['merging', 'cleanup', 'failed'],
  merging: ['cleanup', 'done', 'failed'],
  cleanup: ['done', 'failed'],
  done: [],
  failed: [],
};

export const isTerminalState = (state: JobState): boolean => TRANSITIONS[state].length === 0;

export class JobStateMachine {
  private current: JobState = 'planned';
  private readonly history: JobState[] = ['planned'];

  constructor(
    private readonly jobId: string,
    private readonly onChange?: (state: JobState, previous: JobState) => void
  ) {}

  get state(): JobState {
    return this.current;
  }

  /** Every state visited, in order */
  get visited(): readonly JobState[] {
    return this.history;
  }

  canTransition(to: JobState): boolean {
    return TRANSITIONS[this.current].includes(to);
  }

  transition(to: JobState): void {
    if (!this.canTransition(to)) {
      throw new PipelineInvariantError(
        t('errors.state.illegalTransition', { from: this.current, to })
      );
    }
    const previous = this.current;
    this.current = to;
    this.history.push(to);
    logger.debug(`[Job ${this.jobId}] ${previous} -> ${to}`);
    this.onChange?.(to, previous);
  }

  /** Move to failed unless the job already finished */
  fail(): void {
    if (!isTerminalState(this.current)) {
      this.transition('failed');
    }
  }
}
