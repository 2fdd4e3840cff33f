import { AgentEventTracker, flattenToolContent, type AgentActivity } from '../agent-events';
import type { GatewayEvent } from '../types';

const agentEvent = (
  stream: string,
  data: Record<string, unknown>,
  overrides: Partial<GatewayEvent> = {},
): GatewayEvent => ({
  eventType: 'agent',
  stream,
  runId: 'run-1',
  seq: 1,
  sessionKey: 'main',
  data,
  ...overrides,
});

describe('AgentEventTracker', () => {
  it('follows a run from start to completion', () => {
    const onActivity = jest.fn<void, [AgentActivity]>();
    const tracker = new AgentEventTracker({ now: () => 42, onActivity });

    expect(tracker.handle(agentEvent('lifecycle', { phase: 'run_start' }))).toEqual({
      status: 'busy',
      currentTask: '',
      turns: [],
      justFinished: false,
      completionBrief: '',
    });

    const duringTool = tracker.handle(
      agentEvent('tool', {
        event: 'tool_call',
        toolCallId: 't1',
        name: 'read_file',
        arguments: { path: 'a.ts' },
      }),
    );
    expect(duringTool?.currentTask).toBe('read_file');

    tracker.handle(agentEvent('assistant', { delta: 'Reading ' }));
    const streaming = tracker.handle(agentEvent('assistant', { delta: 'files.' }));
    expect(streaming?.turns).toEqual([{ role: 'assistant', content: 'Reading files.' }]);
    expect(streaming?.currentTask).toBe('read_file');

    const afterResult = tracker.handle(
      agentEvent('tool', {
        event: 'tool_result',
        toolCallId: 't1',
        content: [{ type: 'text', text: 'ok' }],
      }),
    );
    expect(afterResult?.currentTask).toBe('');

    expect(tracker.handle(agentEvent('lifecycle', { phase: 'run_end' }))).toEqual({
      status: 'idle',
      currentTask: '',
      turns: [{ role: 'assistant', content: 'Reading files.' }],
      justFinished: true,
      completionBrief: 'Reading files.',
    });

    expect(tracker.getToolCalls('main')).toEqual([
      { toolId: 't1', name: 'read_file', arguments: '{"path":"a.ts"}', result: 'ok', status: 'completed' },
    ]);
    expect(tracker.getSession('main').lastEventAt).toBe(42);
    expect(onActivity.mock.calls.map(([activity]) => activity.type)).toEqual([
      'agent_status',
      'tool_call',
      'assistant_delta',
      'assistant_delta',
      'tool_result',
      'agent_status',
    ]);
  });

  it('keeps a failed run out of idle', () => {
    const tracker = new AgentEventTracker();
    tracker.handle(agentEvent('lifecycle', { phase: 'run_start' }));

    const update = tracker.handle(agentEvent('lifecycle', { phase: 'run_error', error: 'boom' }));

    expect(update?.status).toBe('busy');
    expect(update?.justFinished).toBe(false);
    expect(tracker.getSession('main').agentStatus).toBe('error');
    expect(tracker.getSession('main').lastRun?.error).toBe('boom');
  });

  it('collects thinking separately from assistant text', () => {
    const tracker = new AgentEventTracker();
    tracker.handle(agentEvent('lifecycle', { phase: 'run_start' }));

    const update = tracker.handle(agentEvent('assistant', { delta: 'hmm', thinking: true }));

    expect(update?.turns).toEqual([]);
    expect(tracker.getThinkingText('main')).toBe('hmm');
  });

  it('summarises the live run of a session', () => {
    const tracker = new AgentEventTracker({ now: () => 7 });
    tracker.handle(agentEvent('lifecycle', { phase: 'run_start' }));
    tracker.handle(agentEvent('tool', { event: 'tool_call', toolCallId: 't1', name: 'ls' }));
    tracker.handle(agentEvent('assistant', { delta: 'abc' }));
    tracker.handle(agentEvent('assistant', { delta: 'xy', thinking: true }));

    expect(tracker.describeSession('main')).toEqual({
      status: 'busy',
      lastEventAt: 7,
      currentRun: { runId: 'run-1', status: 'running', toolCount: 1, assistantChars: 3, thinkingChars: 2 },
    });
    expect(tracker.describeSession('other')).toEqual({ status: 'unknown', lastEventAt: null, currentRun: null });
  });

  it('ignores run streams that arrive outside a run', () => {
    const tracker = new AgentEventTracker();

    const update = tracker.handle(
      agentEvent('tool', { event: 'tool_call', toolCallId: 't1', name: 'grep' }),
    );

    expect(update?.currentTask).toBe('');
    expect(tracker.getToolCalls('main')).toEqual([]);
  });

  it('returns null for events without a session', () => {
    const tracker = new AgentEventTracker();

    expect(tracker.handle(agentEvent('lifecycle', { phase: 'run_start' }, { sessionKey: '' }))).toBeNull();
  });

  it('keeps only the tail of long live text and the head of the brief', () => {
    const tracker = new AgentEventTracker();
    tracker.handle(agentEvent('lifecycle', { phase: 'run_start' }));
    tracker.handle(agentEvent('assistant', { delta: `${'a'.repeat(1000)}${'b'.repeat(1000)}` }));

    const update = tracker.handle(agentEvent('lifecycle', { phase: 'run_complete' }));

    expect(update?.turns?.[0].content).toBe(`${'a'.repeat(200)}${'b'.repeat(1000)}`);
    expect(update?.completionBrief).toBe('a'.repeat(500));
  });
});

describe('flattenToolContent', () => {
  it('joins text parts and stringifies other values', () => {
    expect(flattenToolContent(['one', { text: 'two' }, { content: 'three' }])).toBe('one\ntwo\nthree');
    expect(flattenToolContent({ ok: true })).toBe('{"ok":true}');
    expect(flattenToolContent(undefined)).toBe('');
  });
});
