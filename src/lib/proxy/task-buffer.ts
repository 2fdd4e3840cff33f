import type { AgentContextUpdate, TaskBufferState } from './types';

export const DEFAULT_DISPATCH_DELAY_MS = 10_000;

export const createTaskBufferState = (
  overrides: Partial<TaskBufferState> = {},
): TaskBufferState => ({
  scratchpadTask: '',
  queuedTask: '',
  agentStatus: 'idle',
  agentCurrentTask: '',
  agentTurns: [],
  compressedContext: '',
  dispatchDelayMs: DEFAULT_DISPATCH_DELAY_MS,
  lastInputAt: 0,
  pendingCompletionBrief: '',
  mustBriefBeforeDispatch: false,
  ...overrides,
});

export type QueueOutcome = { ok: true; task: string } | { ok: false; reason: 'empty_scratchpad' };

const joinLines = (head: string, tail: string) => (head && tail ? `${head}\n${tail}` : head || tail);

/**
 * Sequential, non-overlapping replacement of at most `count` occurrences
 * (`count <= 0` replaces every occurrence).
 */
export const replaceOccurrences = (
  source: string,
  find: string,
  replace: string,
  count: number,
): { text: string; replaced: number } => {
  if (!find || !source) return { text: source, replaced: 0 };
  const limit = count > 0 ? count : Number.POSITIVE_INFINITY;
  let cursor = 0;
  let replaced = 0;
  let output = '';
  while (replaced < limit) {
    const index = source.indexOf(find, cursor);
    if (index < 0) break;
    output += source.slice(cursor, index) + replace;
    cursor = index + find.length;
    replaced += 1;
  }
  output += source.slice(cursor);
  return { text: output, replaced };
};

export class TaskBuffer {
  readonly state: TaskBufferState;

  constructor(initial: Partial<TaskBufferState> = {}) {
    this.state = createTaskBufferState(initial);
  }

  /**
   * Marks user activity. A queued task goes back to the scratchpad so the
   * user can keep refining it; anything already drafted stays after it.
   */
  touch(now: number): boolean {
    this.state.lastInputAt = now;
    const queued = this.state.queuedTask;
    if (!queued) return false;
    this.state.scratchpadTask = joinLines(queued, this.state.scratchpadTask);
    this.state.queuedTask = '';
    return true;
  }

  setScratchpad(task: string) {
    this.state.scratchpadTask = task;
  }

  appendScratchpad(text: string) {
    this.state.scratchpadTask = this.state.scratchpadTask
      ? `${this.state.scratchpadTask}\n${text}`
      : text;
  }

  patchScratchpad(find: string, replace: string, count: number): number {
    const { text, replaced } = replaceOccurrences(this.state.scratchpadTask, find, replace, count);
    this.state.scratchpadTask = text;
    return replaced;
  }

  clearScratchpad() {
    this.state.scratchpadTask = '';
  }

  queueScratchpad(): QueueOutcome {
    const task = this.state.scratchpadTask;
    if (!task) return { ok: false, reason: 'empty_scratchpad' };
    this.state.queuedTask = task;
    this.state.scratchpadTask = '';
    return { ok: true, task };
  }

  clearQueue() {
    this.state.queuedTask = '';
  }

  isDispatchReady(now: number): boolean {
    const state = this.state;
    if (!state.queuedTask) return false;
    if (state.agentStatus !== 'idle') return false;
    if (state.mustBriefBeforeDispatch) return false;
    return now - state.lastInputAt >= state.dispatchDelayMs;
  }

  takeQueued(): string {
    const task = this.state.queuedTask;
    this.state.queuedTask = '';
    return task;
  }

  /** Puts a task whose send failed back at the front of the queue. */
  restoreQueued(task: string) {
    if (!task) return;
    this.state.queuedTask = joinLines(task, this.state.queuedTask);
  }

  /** Returns true when the update moved the agent from busy to idle. */
  applyAgentContext(update: AgentContextUpdate): boolean {
    const state = this.state;
    const wasBusy = state.agentStatus === 'busy';
    state.agentStatus = update.status;
    state.agentCurrentTask = update.currentTask ?? '';
    if (update.turns) {
      state.agentTurns = update.turns.map((turn) => ({ ...turn }));
    }
    if (update.compressedContext) {
      state.compressedContext = update.compressedContext;
    }

    const finished = update.status === 'idle' && (update.justFinished === true || wasBusy);
    if (finished) {
      state.pendingCompletionBrief = update.completionBrief ?? '';
      state.mustBriefBeforeDispatch = true;
    }
    return finished;
  }

  popCompletionBrief(): string {
    if (!this.state.mustBriefBeforeDispatch) return '';
    const brief = this.state.pendingCompletionBrief;
    this.state.pendingCompletionBrief = '';
    this.state.mustBriefBeforeDispatch = false;
    return brief;
  }

  reset() {
    Object.assign(
      this.state,
      createTaskBufferState({
        dispatchDelayMs: this.state.dispatchDelayMs,
        compressedContext: '',
      }),
    );
  }

  snapshot(): TaskBufferState {
    return {
      ...this.state,
      agentTurns: this.state.agentTurns.map((turn) => ({ ...turn })),
    };
  }
}
