export type AgentStatus = 'idle' | 'busy';

export type AgentTurn = {
  role: string;
  content: string;
};

export type TaskBufferState = {
  scratchpadTask: string;
  queuedTask: string;
  agentStatus: AgentStatus;
  agentCurrentTask: string;
  agentTurns: AgentTurn[];
  compressedContext: string;
  dispatchDelayMs: number;
  lastInputAt: number;
  pendingCompletionBrief: string;
  mustBriefBeforeDispatch: boolean;
};

export type ToolCallRecord = {
  id: string;
  name: string;
  arguments: string;
};

export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string; toolCalls?: ToolCallRecord[] }
  | { role: 'tool'; toolCallId: string; content: string };

/** Messages kept in the rolling history; system prompts are rebuilt per turn. */
export type HistoryMessage = Exclude<ChatMessage, { role: 'system' }>;

export type ToolDefinition = {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
};

export type ProxyAction = 'chat' | 'stop' | 'buffer' | 'buffer_cleared' | 'queued';

export type CompletionResult = {
  content: string;
  toolCalls: ToolCallRecord[];
  reasoning?: string;
  latencyMs: number;
};

export type CompletionDelta =
  | { type: 'content'; text: string }
  | { type: 'reasoning'; text: string }
  | { type: 'tool_call'; id: string; index: number; name: string; arguments: string }
  | { type: 'done'; finishReason: string }
  | { type: 'cancelled' }
  | { type: 'error'; message: string };

export interface CompletionEngine {
  chat(messages: ChatMessage[], tools: ToolDefinition[]): Promise<CompletionResult>;
  chatStream(
    messages: ChatMessage[],
    tools: ToolDefinition[],
    signal?: AbortSignal,
  ): AsyncIterable<CompletionDelta>;
}

export type ProxyActionEvent = {
  type: 'action';
  action: Exclude<ProxyAction, 'chat'> | 'queue_failed';
  task?: string;
};

export type ProxyStreamEvent =
  | { type: 'content'; text: string }
  | { type: 'reasoning'; text: string }
  | ProxyActionEvent
  | { type: 'done'; reply: string }
  | { type: 'cancelled' }
  | { type: 'error'; message: string };

export type ProcessedToolCall = {
  name: string;
  args: string;
};

export type ProcessResult = {
  action: ProxyAction;
  reply: string;
  taskDraft: string;
  queuedTask: string;
  toolCalls: ProcessedToolCall[];
  timings: {
    totalMs: number;
    apiMs: number;
  };
};

/** Side effects the controller reports to its host. */
export interface ProxyEventSink {
  onStop?(): void;
  onDispatch?(task: string): void;
  onTaskUpdated?(scratchpad: string): void;
  onTaskQueued?(task: string): void;
}

export type AgentContextUpdate = {
  status: AgentStatus;
  currentTask?: string;
  turns?: AgentTurn[];
  compressedContext?: string;
  justFinished?: boolean;
  completionBrief?: string;
};

export type ContextStats = {
  totalChars: number;
  promptChars: number;
  conversationChars: number;
  compressedChars: number;
  liveTurnChars: number;
  scratchpadChars: number;
  queuedChars: number;
};
