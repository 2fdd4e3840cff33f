import type { TaskBuffer } from './task-buffer';
import type { ParsedToolCall } from './tool-arguments';
import type { ProxyActionEvent, ProxyEventSink, ToolDefinition } from './types';

const emptyParameters = { type: 'object', properties: {}, required: [] };

export const PROXY_TOOLS: ToolDefinition[] = [
  {
    name: 'interrupt_agent',
    description:
      'Stop/cancel/abort the main agent. ONLY call when the user explicitly asks to stop, cancel or abort it. Also clears any queued task.',
    parameters: emptyParameters,
  },
  {
    name: 'set_task_buffer',
    description:
      'Overwrite the task scratchpad with a complete, standalone task instruction for the main agent. Call whenever the user describes work they want done.',
    parameters: {
      type: 'object',
      properties: {
        task: { type: 'string', description: 'Complete, standalone task instruction.' },
      },
      required: ['task'],
    },
  },
  {
    name: 'clear_task_buffer',
    description: 'Empty the task scratchpad when the user abandons the draft.',
    parameters: emptyParameters,
  },
  {
    name: 'append_task_buffer',
    description: 'Append a line of detail to the task scratchpad without rewriting it.',
    parameters: {
      type: 'object',
      properties: {
        text: { type: 'string', description: 'Text to append on a new line.' },
      },
      required: ['text'],
    },
  },
  {
    name: 'patch_task_buffer',
    description:
      'Replace text inside the task scratchpad. count limits how many occurrences change; 0 replaces all of them.',
    parameters: {
      type: 'object',
      properties: {
        find: { type: 'string', description: 'Exact text to find.' },
        replace: { type: 'string', description: 'Replacement text.' },
        count: { type: 'integer', minimum: 0, description: 'Occurrences to replace, 0 for all.' },
      },
      required: ['find', 'replace'],
    },
  },
  {
    name: 'queue_buffered_task',
    description:
      'Commit the scratchpad for dispatch. ONLY call when the user deliberately asks to send, queue or submit the task. It is sent once the agent is idle and the user has been quiet for a while.',
    parameters: emptyParameters,
  },
];

export type ToolResultPayload =
  | { status: string; scratchpad: string; queued: boolean }
  | { status: 'error'; error: string };

export type ToolApplication = {
  /** Action tag for the turn result, absent when the call changed nothing. */
  action?: ProxyActionEvent['action'];
  event: ProxyActionEvent | null;
  result: ToolResultPayload;
};

const summarize = (buffer: TaskBuffer, status: string): ToolResultPayload => ({
  status,
  scratchpad: buffer.state.scratchpadTask.slice(0, 100),
  queued: Boolean(buffer.state.queuedTask),
});

/** Applies one parsed tool call to the buffer and reports what happened. */
export const applyToolCall = (
  call: ParsedToolCall,
  buffer: TaskBuffer,
  sink: ProxyEventSink,
): ToolApplication => {
  switch (call.name) {
    case 'interrupt_agent': {
      buffer.clearQueue();
      sink.onStop?.();
      return {
        action: 'stop',
        event: { type: 'action', action: 'stop' },
        result: summarize(buffer, 'stopped'),
      };
    }
    case 'set_task_buffer': {
      buffer.setScratchpad(call.task);
      sink.onTaskUpdated?.(buffer.state.scratchpadTask);
      return {
        action: 'buffer',
        event: { type: 'action', action: 'buffer', task: buffer.state.scratchpadTask },
        result: summarize(buffer, 'buffer_set'),
      };
    }
    case 'clear_task_buffer': {
      buffer.clearScratchpad();
      sink.onTaskUpdated?.('');
      return {
        action: 'buffer_cleared',
        event: { type: 'action', action: 'buffer_cleared' },
        result: summarize(buffer, 'buffer_cleared'),
      };
    }
    case 'append_task_buffer': {
      if (call.text) {
        buffer.appendScratchpad(call.text);
        sink.onTaskUpdated?.(buffer.state.scratchpadTask);
      }
      return {
        action: 'buffer',
        event: { type: 'action', action: 'buffer', task: buffer.state.scratchpadTask },
        result: summarize(buffer, call.text ? 'buffer_appended' : 'noop'),
      };
    }
    case 'patch_task_buffer': {
      const replaced = buffer.patchScratchpad(call.find, call.replace, call.count);
      if (replaced > 0) sink.onTaskUpdated?.(buffer.state.scratchpadTask);
      return {
        action: 'buffer',
        event: { type: 'action', action: 'buffer', task: buffer.state.scratchpadTask },
        result: summarize(buffer, replaced > 0 ? 'buffer_patched' : 'noop'),
      };
    }
    case 'queue_buffered_task': {
      const outcome = buffer.queueScratchpad();
      if (!outcome.ok) {
        return {
          event: { type: 'action', action: 'queue_failed' },
          result: { status: 'error', error: 'Scratchpad is empty; nothing to queue.' },
        };
      }
      sink.onTaskQueued?.(outcome.task);
      return {
        action: 'queued',
        event: { type: 'action', action: 'queued', task: outcome.task },
        result: summarize(buffer, 'queued'),
      };
    }
    case 'unknown':
      return {
        event: null,
        result: { status: 'error', error: `Unknown tool: ${call.toolName}` },
      };
  }
};
