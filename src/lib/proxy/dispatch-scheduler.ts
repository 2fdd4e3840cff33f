import { createLogger, describeError, type Logger } from '../logging';
import { selectTargetSession } from '../gateway/session-target';
import type { AgentGateway } from '../gateway/types';
import { DispatchError } from './errors';
import type { SerialExecutor } from './serial-executor';

export const DEFAULT_DISPATCH_TICK_MS = 1000;

/** The slice of the controller the scheduler drives. */
export interface DispatchSource {
  checkDispatch(): string | null;
  takePendingTask(): string | null;
  restoreQueuedTask(task: string): void;
}

/** A dispatch requested by hand; `task` is only used when the buffer is empty. */
export type ManualDispatch = {
  sessionKey?: string;
  task?: string;
};

export type DispatchOutcome =
  | { status: 'skipped' }
  | { status: 'idle' }
  | { status: 'dispatched'; task: string; sessionKey: string }
  | { status: 'failed'; task: string; error: DispatchError };

export type DispatchSchedulerOptions = {
  source: DispatchSource;
  executor: SerialExecutor;
  getGateway: () => AgentGateway | null;
  intervalMs?: number;
  onDispatched?: (task: string, sessionKey: string) => void;
  onError?: (error: DispatchError, task: string) => void;
  logger?: Logger;
};

export class DispatchScheduler {
  private timer: ReturnType<typeof setInterval> | null = null;
  private ticking = false;
  private readonly intervalMs: number;
  private readonly logger: Logger;

  constructor(private readonly options: DispatchSchedulerOptions) {
    this.intervalMs = Math.max(10, options.intervalMs ?? DEFAULT_DISPATCH_TICK_MS);
    this.logger = options.logger ?? createLogger('proxy:dispatch');
  }

  get running() {
    return this.timer !== null;
  }

  start() {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.tick().catch((error: unknown) => {
        this.logger.error('dispatch tick failed', describeError(error));
      });
    }, this.intervalMs);
    this.timer.unref?.();
  }

  stop() {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  /** One scheduler pass. Overlapping calls return `skipped`. */
  async tick(): Promise<DispatchOutcome> {
    if (this.ticking) return { status: 'skipped' };
    this.ticking = true;
    try {
      const { source, executor } = this.options;
      const task = await executor.run(() => source.checkDispatch());
      if (!task) return { status: 'idle' };
      return await this.deliver(task, true);
    } finally {
      this.ticking = false;
    }
  }

  /** Sends whatever is buffered now, bypassing the delay and agent gates. */
  async dispatchNow(request: ManualDispatch = {}): Promise<DispatchOutcome> {
    const { source, executor } = this.options;
    const pending = await executor.run(() => source.takePendingTask());
    const task = pending ?? request.task?.trim() ?? '';
    if (!task) return { status: 'idle' };
    return this.deliver(task, pending !== null, request.sessionKey);
  }

  private async deliver(task: string, restore: boolean, sessionKey?: string): Promise<DispatchOutcome> {
    const { source, executor } = this.options;
    try {
      const target = await this.send(task, sessionKey);
      this.logger.info('dispatched queued task', { sessionKey: target, chars: task.length });
      this.options.onDispatched?.(task, target);
      return { status: 'dispatched', task, sessionKey: target };
    } catch (error) {
      const failure =
        error instanceof DispatchError
          ? error
          : new DispatchError('send_failed', describeError(error), { cause: error });
      if (restore) await executor.run(() => source.restoreQueuedTask(task));
      this.logger.warn('dispatch failed', { code: failure.code, error: failure.message, restored: restore });
      this.options.onError?.(failure, task);
      return { status: 'failed', task, error: failure };
    }
  }

  private async send(task: string, requestedKey?: string): Promise<string> {
    const gateway = this.options.getGateway();
    if (!gateway || !gateway.connected) {
      throw new DispatchError('gateway_unavailable', 'Gateway not connected');
    }
    const sessionKey = requestedKey || selectTargetSession(await gateway.listSessions());
    if (!sessionKey) {
      throw new DispatchError('no_session', 'No active session');
    }
    await gateway.sendMessage(sessionKey, task);
    return sessionKey;
  }
}
