import type { TaskBufferState } from './types';

export const LIVE_TURN_LIMIT = 4;
export const LIVE_TURN_CHARS = 300;

const PERSONA_LINES = [
  'You are a lightweight conversational voice proxy between the user and a slower main agent.',
  '',
  '## Rules',
  '- Keep replies to 1-2 short sentences; everything you say is spoken aloud.',
  '- When the user describes work, draft it with set_task_buffer, then refine with append_task_buffer or patch_task_buffer.',
  '- Only call queue_buffered_task when the user clearly asks to send, queue or submit the task.',
  '- Call clear_task_buffer when the user abandons the draft.',
  '- Call interrupt_agent only when the user asks to stop, cancel or abort the main agent.',
  '- Greetings, questions and status checks get a plain conversational reply.',
  '- After a stop, treat the next message on its own merits.',
];

const describeGate = (state: TaskBufferState): string => {
  if (!state.queuedTask) return 'Nothing queued.';
  if (state.mustBriefBeforeDispatch) {
    return 'Queued task is held until the user has been told the previous task finished.';
  }
  if (state.agentStatus !== 'idle') {
    return 'Queued task will be sent once the main agent is idle.';
  }
  const seconds = Math.round(state.dispatchDelayMs / 1000);
  return `Queued task will be sent after ${seconds}s without new user input.`;
};

/** Renders the per-turn system prompt from the current buffer and agent mirror. */
export const buildSystemPrompt = (state: TaskBufferState): string => {
  const parts = [...PERSONA_LINES, ''];

  if (state.compressedContext) {
    parts.push('## Background Context', state.compressedContext, '');
  }

  parts.push('## Agent Status', `- Status: ${state.agentStatus.toUpperCase()}`);
  if (state.agentCurrentTask) {
    parts.push(`- Current task: ${state.agentCurrentTask}`);
  }
  parts.push('');

  if (state.agentTurns.length > 0) {
    parts.push('## Live Agent Activity');
    for (const turn of state.agentTurns.slice(-LIVE_TURN_LIMIT)) {
      parts.push(`[${turn.role}]: ${turn.content.slice(0, LIVE_TURN_CHARS)}`);
    }
    parts.push('');
  }

  parts.push(
    '## Task Buffer State',
    `- Scratchpad: ${state.scratchpadTask ? `"${state.scratchpadTask}"` : '(empty)'}`,
    `- Queued: ${state.queuedTask ? `"${state.queuedTask}"` : '(none)'}`,
    `- Dispatch: ${describeGate(state)}`,
    '',
  );

  if (state.mustBriefBeforeDispatch) {
    parts.push('## Pending Completion Brief');
    parts.push(
      'The main agent just finished its previous task. Tell the user that first, in one sentence.',
    );
    if (state.pendingCompletionBrief) {
      parts.push(`Result: ${state.pendingCompletionBrief}`);
    }
    parts.push('');
  }

  return parts.join('\n');
};
