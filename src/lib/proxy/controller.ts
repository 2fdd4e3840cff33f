import { nanoid } from 'nanoid';
import { createLogger, describeError, type Logger } from '../logging';
import { buildSystemPrompt } from './system-prompt';
import { TaskBuffer } from './task-buffer';
import { parseToolCall } from './tool-arguments';
import { applyToolCall, PROXY_TOOLS, type ToolResultPayload } from './tools';
import { TurnHistory } from './turn-history';
import type {
  AgentContextUpdate,
  ChatMessage,
  CompletionEngine,
  ContextStats,
  ProcessedToolCall,
  ProcessResult,
  ProxyAction,
  ProxyEventSink,
  ProxyStreamEvent,
  TaskBufferState,
  ToolCallRecord,
} from './types';

export type ProxyControllerOptions = {
  engine: CompletionEngine;
  sink?: ProxyEventSink;
  now?: () => number;
  maxHistoryPairs?: number;
  dispatchDelayMs?: number;
  createId?: () => string;
  logger?: Logger;
};

type AppliedCall = {
  record: ToolCallRecord;
  result: ToolResultPayload;
};

export class ProxyController {
  private readonly engine: CompletionEngine;
  private readonly sink: ProxyEventSink;
  private readonly now: () => number;
  private readonly createId: () => string;
  private readonly logger: Logger;
  private readonly buffer: TaskBuffer;
  private readonly history: TurnHistory;

  constructor(options: ProxyControllerOptions) {
    this.engine = options.engine;
    this.sink = options.sink ?? {};
    this.now = options.now ?? (() => performance.now());
    this.createId = options.createId ?? (() => `call_${nanoid(12)}`);
    this.logger = options.logger ?? createLogger('proxy:controller');
    this.history = new TurnHistory(options.maxHistoryPairs ?? 15);
    this.buffer = new TaskBuffer(
      options.dispatchDelayMs !== undefined ? { dispatchDelayMs: options.dispatchDelayMs } : {},
    );
  }

  get state(): Readonly<TaskBufferState> {
    return this.buffer.state;
  }

  get conversation(): readonly ChatMessage[] {
    return this.history.list();
  }

  private beginTurn(userMessage: string): ChatMessage[] {
    if (this.buffer.touch(this.now())) {
      this.logger.debug('queued task returned to scratchpad');
      this.sink.onTaskUpdated?.(this.buffer.state.scratchpadTask);
    }
    this.history.append({ role: 'user', content: userMessage });
    this.history.trim();
    return [
      { role: 'system', content: buildSystemPrompt(this.buffer.state) },
      ...this.history.list(),
    ];
  }

  private applyCall(
    id: string,
    name: string,
    rawArguments: string,
  ): AppliedCall & { application: ReturnType<typeof applyToolCall> } {
    const parsed = parseToolCall(name, rawArguments);
    if (parsed.name === 'unknown') {
      this.logger.warn('model called an unknown tool', { tool: parsed.toolName });
    }
    const application = applyToolCall(parsed, this.buffer, this.sink);
    return {
      record: { id: id || this.createId(), name, arguments: rawArguments },
      result: application.result,
      application,
    };
  }

  private persistAssistantTurn(content: string, applied: AppliedCall[]) {
    this.history.append({
      role: 'assistant',
      content,
      ...(applied.length > 0 ? { toolCalls: applied.map((call) => call.record) } : {}),
    });
    for (const call of applied) {
      this.history.append({
        role: 'tool',
        toolCallId: call.record.id,
        content: JSON.stringify(call.result),
      });
    }
    this.history.trim();
  }

  /** Runs one non-streaming turn. Completion errors propagate to the caller. */
  async processMessage(userMessage: string): Promise<ProcessResult> {
    const startedAt = this.now();
    const messages = this.beginTurn(userMessage);

    const apiStartedAt = this.now();
    const completion = await this.engine.chat(messages, PROXY_TOOLS);
    const apiMs = this.now() - apiStartedAt;

    let action: ProxyAction = 'chat';
    const applied: AppliedCall[] = [];
    const toolCalls: ProcessedToolCall[] = [];
    for (const call of completion.toolCalls) {
      const outcome = this.applyCall(call.id, call.name, call.arguments);
      if (outcome.application.action && outcome.application.action !== 'queue_failed') {
        action = outcome.application.action;
      }
      applied.push(outcome);
      toolCalls.push({ name: call.name, args: call.arguments });
    }

    this.persistAssistantTurn(completion.content, applied);

    return {
      action,
      reply: completion.content,
      taskDraft: this.buffer.state.scratchpadTask,
      queuedTask: this.buffer.state.queuedTask,
      toolCalls,
      timings: {
        totalMs: this.now() - startedAt,
        apiMs,
      },
    };
  }

  /**
   * Streams one turn. Text deltas are re-emitted as they arrive, tool calls
   * are applied immediately and reported as `action` events. Only a `done`
   * turn reaches history; a cancelled or failed one leaves just the user entry.
   */
  async *processMessageStream(
    userMessage: string,
    signal?: AbortSignal,
  ): AsyncGenerator<ProxyStreamEvent> {
    if (signal?.aborted) {
      yield { type: 'cancelled' };
      return;
    }
    const messages = this.beginTurn(userMessage);

    let reply = '';
    const applied: AppliedCall[] = [];
    let terminal: ProxyStreamEvent | null = null;

    try {
      for await (const delta of this.engine.chatStream(messages, PROXY_TOOLS, signal)) {
        if (signal?.aborted) {
          terminal = { type: 'cancelled' };
          break;
        }
        if (delta.type === 'content') {
          reply += delta.text;
          yield { type: 'content', text: delta.text };
        } else if (delta.type === 'reasoning') {
          yield { type: 'reasoning', text: delta.text };
        } else if (delta.type === 'tool_call') {
          const outcome = this.applyCall(delta.id, delta.name, delta.arguments);
          applied.push(outcome);
          if (outcome.application.event) yield outcome.application.event;
        } else if (delta.type === 'done') {
          terminal = { type: 'done', reply };
          break;
        } else if (delta.type === 'cancelled') {
          terminal = { type: 'cancelled' };
          break;
        } else {
          terminal = { type: 'error', message: delta.message };
          break;
        }
      }
    } catch (error) {
      terminal = signal?.aborted
        ? { type: 'cancelled' }
        : { type: 'error', message: describeError(error) };
      if (terminal.type === 'error') {
        this.logger.error('completion stream failed', { error: terminal.message });
      }
    }

    if (!terminal) {
      terminal = signal?.aborted ? { type: 'cancelled' } : { type: 'done', reply };
    }

    if (terminal.type === 'done') {
      this.persistAssistantTurn(reply, applied);
    }
    yield terminal;
  }

  /** Releases the queued task when every dispatch condition holds. */
  checkDispatch(): string | null {
    if (!this.buffer.isDispatchReady(this.now())) return null;
    const task = this.buffer.takeQueued();
    this.sink.onDispatch?.(task);
    return task;
  }

  /** Hands over the queued task, or the scratchpad draft when nothing is queued. */
  takePendingTask(): string | null {
    const state = this.buffer.state;
    let task = '';
    if (state.queuedTask) {
      task = this.buffer.takeQueued();
    } else if (state.scratchpadTask) {
      task = state.scratchpadTask;
      this.buffer.clearScratchpad();
    }
    if (!task) return null;
    this.sink.onDispatch?.(task);
    return task;
  }

  restoreQueuedTask(task: string) {
    this.buffer.restoreQueued(task);
  }

  updateAgentContext(update: AgentContextUpdate): boolean {
    const finished = this.buffer.applyAgentContext(update);
    if (finished) {
      this.logger.info('main agent finished; completion brief pending');
    }
    return finished;
  }

  popPendingCompletionBrief(): string {
    return this.buffer.popCompletionBrief();
  }

  reset() {
    this.history.clear();
    this.buffer.reset();
  }

  getSnapshot(): TaskBufferState {
    return this.buffer.snapshot();
  }

  getContextStats(): ContextStats {
    const state = this.buffer.state;
    const promptChars = buildSystemPrompt(state).length;
    const conversationChars = this.history.chars();
    return {
      totalChars: promptChars + conversationChars,
      promptChars,
      conversationChars,
      compressedChars: state.compressedContext.length,
      liveTurnChars: state.agentTurns.reduce((sum, turn) => sum + turn.content.length, 0),
      scratchpadChars: state.scratchpadTask.length,
      queuedChars: state.queuedTask.length,
    };
  }

  setMaxHistoryPairs(maxPairs: number) {
    this.history.setMaxPairs(maxPairs);
  }

  setDispatchDelay(delayMs: number) {
    this.buffer.state.dispatchDelayMs = Math.max(0, delayMs);
  }

  setCompressedContext(context: string) {
    this.buffer.state.compressedContext = context;
  }
}
