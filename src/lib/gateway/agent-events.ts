import { z } from 'zod';
import { createLogger } from '../logging';
import type { AgentContextUpdate, AgentTurn } from '../proxy/types';
import type { GatewayEvent } from './types';

const logger = createLogger('gateway:events');

const TURN_TAIL_CHARS = 1200;
const BRIEF_CHARS = 500;
const TOOL_ARGUMENT_CHARS = 2000;
const TOOL_RESULT_CHARS = 8000;
const TOOL_RESULT_EVENT_CHARS = 4000;

export type GatewayAgentStatus = 'idle' | 'busy' | 'error';

export type TrackedToolCall = {
  toolId: string;
  name: string;
  arguments: string;
  result: string;
  status: 'running' | 'completed';
};

export type TrackedRun = {
  runId: string;
  status: 'running' | 'completed' | 'error';
  toolCalls: TrackedToolCall[];
  assistantChunks: string[];
  thinkingChunks: string[];
  finalText: string;
  error: string;
};

export type TrackedSession = {
  sessionKey: string;
  agentStatus: GatewayAgentStatus;
  currentRun: TrackedRun | null;
  lastRun: TrackedRun | null;
  lastEventAt: number;
};

export type SessionSummary = {
  status: GatewayAgentStatus | 'unknown';
  lastEventAt: number | null;
  currentRun: {
    runId: string;
    status: TrackedRun['status'];
    toolCount: number;
    assistantChars: number;
    thinkingChars: number;
  } | null;
};

export type AgentActivity =
  | { type: 'agent_status'; sessionKey: string; runId: string; status: GatewayAgentStatus; error?: string }
  | { type: 'tool_call'; sessionKey: string; runId: string; toolId: string; name: string; arguments: string }
  | { type: 'tool_result'; sessionKey: string; runId: string; toolId: string; name: string; content: string }
  | { type: 'assistant_delta'; sessionKey: string; runId: string; delta: string }
  | { type: 'thinking_delta'; sessionKey: string; runId: string; delta: string }
  | { type: 'agent_error'; sessionKey: string; runId: string; error: string };

const optionalText = z
  .union([z.string(), z.number()])
  .transform((value) => String(value))
  .optional()
  .catch(undefined);

const lifecycleSchema = z.object({
  phase: optionalText,
  error: optionalText,
});

const toolSchema = z.object({
  event: optionalText,
  kind: optionalText,
  toolCallId: optionalText,
  id: optionalText,
  name: optionalText,
  toolName: optionalText,
  arguments: z.unknown(),
  input: z.unknown(),
  content: z.unknown(),
  output: z.unknown(),
});

const assistantSchema = z.object({
  delta: optionalText,
  text: optionalText,
  content: optionalText,
  thinking: z.boolean().optional().catch(undefined),
});

const errorSchema = z.object({
  message: optionalText,
  error: optionalText,
});

const stringify = (value: unknown): string => {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') return value;
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
};

/** Tool results arrive as a string or as a list of text parts. */
export const flattenToolContent = (value: unknown): string => {
  if (!Array.isArray(value)) return stringify(value);
  const parts: string[] = [];
  for (const item of value) {
    if (typeof item === 'string') {
      parts.push(item);
    } else if (item && typeof item === 'object') {
      const part = z
        .object({ text: optionalText, content: optionalText })
        .safeParse(item);
      if (part.success) parts.push(part.data.text ?? part.data.content ?? '');
    }
  }
  return parts.join('\n');
};

const createRun = (runId: string): TrackedRun => ({
  runId,
  status: 'running',
  toolCalls: [],
  assistantChunks: [],
  thinkingChunks: [],
  finalText: '',
  error: '',
});

export type AgentEventTrackerOptions = {
  now?: () => number;
  onActivity?: (activity: AgentActivity) => void;
};

/**
 * Folds raw gateway events into per-session run state and derives what the
 * proxy controller should mirror into its prompt.
 */
export class AgentEventTracker {
  private readonly sessions = new Map<string, TrackedSession>();
  private readonly now: () => number;
  private readonly onActivity?: (activity: AgentActivity) => void;

  constructor(options: AgentEventTrackerOptions = {}) {
    this.now = options.now ?? (() => Date.now());
    this.onActivity = options.onActivity;
  }

  getSession(sessionKey: string): TrackedSession {
    let session = this.sessions.get(sessionKey);
    if (!session) {
      session = { sessionKey, agentStatus: 'idle', currentRun: null, lastRun: null, lastEventAt: 0 };
      this.sessions.set(sessionKey, session);
    }
    return session;
  }

  /** Returns the controller update for the event's session, or null when it has none. */
  handle(event: GatewayEvent): AgentContextUpdate | null {
    if (!event.sessionKey) return null;
    const session = this.getSession(event.sessionKey);
    session.lastEventAt = this.now();

    if (event.eventType === 'agent') {
      this.handleAgentEvent(session, event);
    }

    return this.deriveContext(session, event);
  }

  getThinkingText(sessionKey: string): string {
    const session = this.sessions.get(sessionKey);
    const run = session?.currentRun ?? session?.lastRun;
    return run ? run.thinkingChunks.join('') : '';
  }

  getToolCalls(sessionKey: string): TrackedToolCall[] {
    const session = this.sessions.get(sessionKey);
    const run = session?.currentRun ?? session?.lastRun;
    return run ? run.toolCalls.map((call) => ({ ...call })) : [];
  }

  describeSession(sessionKey: string): SessionSummary {
    const session = this.sessions.get(sessionKey);
    if (!session) return { status: 'unknown', lastEventAt: null, currentRun: null };
    const run = session.currentRun;
    return {
      status: session.agentStatus,
      lastEventAt: session.lastEventAt,
      currentRun: run
        ? {
            runId: run.runId,
            status: run.status,
            toolCount: run.toolCalls.length,
            assistantChars: run.assistantChunks.join('').length,
            thinkingChars: run.thinkingChunks.join('').length,
          }
        : null,
    };
  }

  private emit(activity: AgentActivity) {
    try {
      this.onActivity?.(activity);
    } catch (error) {
      logger.error('activity listener failed', error);
    }
  }

  private handleAgentEvent(session: TrackedSession, event: GatewayEvent) {
    const base = { sessionKey: session.sessionKey, runId: event.runId };

    switch (event.stream) {
      case 'lifecycle': {
        const { phase, error } = lifecycleSchema.parse(event.data);
        if (phase === 'run_start') {
          session.agentStatus = 'busy';
          session.currentRun = createRun(event.runId);
          this.emit({ type: 'agent_status', ...base, status: 'busy' });
        } else if (phase === 'run_end' || phase === 'run_complete') {
          session.agentStatus = 'idle';
          const run = session.currentRun;
          if (run) {
            run.status = 'completed';
            if (run.assistantChunks.length > 0) run.finalText = run.assistantChunks.join('');
            session.lastRun = run;
            session.currentRun = null;
          }
          this.emit({ type: 'agent_status', ...base, status: 'idle' });
        } else if (phase === 'run_error') {
          session.agentStatus = 'error';
          const run = session.currentRun;
          if (run) {
            run.status = 'error';
            run.error = error ?? 'unknown error';
            session.lastRun = run;
            session.currentRun = null;
          }
          this.emit({ type: 'agent_status', ...base, status: 'error', error: error ?? '' });
        }
        return;
      }
      case 'tool': {
        const run = session.currentRun;
        if (!run) return;
        const data = toolSchema.parse(event.data);
        const kind = data.event ?? data.kind ?? '';
        if (kind === 'tool_call' || kind === 'call') {
          const call: TrackedToolCall = {
            toolId: data.toolCallId ?? data.id ?? String(event.seq),
            name: data.name ?? data.toolName ?? '?',
            arguments: stringify(data.arguments ?? data.input),
            result: '',
            status: 'running',
          };
          run.toolCalls.push(call);
          this.emit({
            type: 'tool_call',
            ...base,
            toolId: call.toolId,
            name: call.name,
            arguments: call.arguments.slice(0, TOOL_ARGUMENT_CHARS),
          });
        } else if (kind === 'tool_result' || kind === 'result') {
          const toolId = data.toolCallId ?? data.id ?? '';
          const content = flattenToolContent(data.content ?? data.output);
          const match = [...run.toolCalls]
            .reverse()
            .find((call) => call.toolId === toolId || call.status === 'running');
          if (match) {
            match.result = content.slice(0, TOOL_RESULT_CHARS);
            match.status = 'completed';
          }
          this.emit({
            type: 'tool_result',
            ...base,
            toolId,
            name: data.name ?? data.toolName ?? '',
            content: content.slice(0, TOOL_RESULT_EVENT_CHARS),
          });
        }
        return;
      }
      case 'assistant': {
        const run = session.currentRun;
        if (!run) return;
        const data = assistantSchema.parse(event.data);
        const delta = data.delta ?? data.text ?? data.content ?? '';
        if (data.thinking) {
          run.thinkingChunks.push(delta);
          this.emit({ type: 'thinking_delta', ...base, delta });
        } else if (delta) {
          run.assistantChunks.push(delta);
          this.emit({ type: 'assistant_delta', ...base, delta });
        }
        return;
      }
      case 'error': {
        const data = errorSchema.parse(event.data);
        const message = data.message ?? data.error ?? stringify(event.data);
        logger.warn('agent reported an error', { sessionKey: session.sessionKey, error: message });
        this.emit({ type: 'agent_error', ...base, error: message });
        return;
      }
      default:
        logger.debug('ignoring agent stream', { stream: event.stream });
    }
  }

  private deriveContext(session: TrackedSession, event: GatewayEvent): AgentContextUpdate {
    const current = session.currentRun;
    const running = current
      ? [...current.toolCalls].reverse().find((call) => call.status === 'running')
      : undefined;

    const turns: AgentTurn[] = [];
    if (current && current.assistantChunks.length > 0) {
      turns.push({ role: 'assistant', content: current.assistantChunks.join('').slice(-TURN_TAIL_CHARS) });
    }
    const finalText = session.lastRun?.finalText ?? '';
    if (finalText) {
      turns.push({ role: 'assistant', content: finalText.slice(-TURN_TAIL_CHARS) });
    }

    let justFinished = false;
    if (event.eventType === 'agent' && event.stream === 'lifecycle') {
      const { phase } = lifecycleSchema.parse(event.data);
      justFinished = phase === 'run_end' || phase === 'run_complete';
    }

    return {
      // A failed run keeps the agent out of the idle state until it reports idle again.
      status: session.agentStatus === 'idle' ? 'idle' : 'busy',
      currentTask: running?.name ?? '',
      turns,
      justFinished,
      completionBrief: finalText.slice(0, BRIEF_CHARS),
    };
  }
}
