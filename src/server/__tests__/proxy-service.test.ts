import type { AgentGateway, GatewayEvent, GatewaySession } from '../../lib/gateway/types';
import type {
  ChatMessage,
  CompletionDelta,
  CompletionEngine,
  CompletionResult,
  ToolDefinition,
} from '../../lib/proxy/types';
import type { OutboundMessage } from '../messages';
import { ProxyService, type ClientChannel } from '../proxy-service';

async function* streamOf(deltas: CompletionDelta[]): AsyncGenerator<CompletionDelta> {
  for (const delta of deltas) {
    yield delta;
  }
}

const makeEngine = () => {
  const chat = jest.fn<Promise<CompletionResult>, [ChatMessage[], ToolDefinition[]]>();
  const chatStream = jest.fn<
    AsyncIterable<CompletionDelta>,
    [ChatMessage[], ToolDefinition[], AbortSignal?]
  >();
  const engine: CompletionEngine = { chat, chatStream };
  return { engine, chat, chatStream };
};

const makeGateway = (
  sessions: GatewaySession[] = [
    { key: 'cron:nightly', kind: 'cron' },
    { key: 'agent:main', kind: 'main' },
  ],
  connected = true,
) => {
  const listSessions = jest.fn<Promise<GatewaySession[]>, []>().mockResolvedValue(sessions);
  const sendMessage = jest.fn<Promise<void>, [string, string]>().mockResolvedValue(undefined);
  const abortRun = jest.fn<Promise<void>, [string]>().mockResolvedValue(undefined);
  const gateway: AgentGateway = { connected, listSessions, sendMessage, abortRun };
  return { gateway, listSessions, sendMessage, abortRun };
};

const makeClient = () => {
  const send = jest.fn<void, [OutboundMessage]>();
  const client: ClientChannel = { send };
  return { client, send };
};

const agentEvent = (stream: string, data: Record<string, unknown>): GatewayEvent => ({
  eventType: 'agent',
  stream,
  runId: 'run-1',
  seq: 1,
  sessionKey: 'agent:main',
  data,
});

const finishAgentRun = async (service: ProxyService, finalText: string) => {
  await service.handleGatewayEvent(agentEvent('lifecycle', { phase: 'run_start' }));
  await service.handleGatewayEvent(agentEvent('assistant', { delta: finalText }));
  await service.handleGatewayEvent(agentEvent('lifecycle', { phase: 'run_end' }));
};

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

const draftAndQueue = (task: string): CompletionDelta[] => [
  { type: 'content', text: 'Got it.' },
  { type: 'tool_call', id: 'c1', index: 0, name: 'set_task_buffer', arguments: JSON.stringify({ task }) },
  { type: 'tool_call', id: 'c2', index: 1, name: 'queue_buffered_task', arguments: '{}' },
  { type: 'done', finishReason: 'tool_calls' },
];

describe('ProxyService', () => {
  let clock = 0;
  const now = () => clock;

  beforeEach(() => {
    clock = 0;
  });

  it('streams a turn and dispatches the queued task once the gate opens', async () => {
    const { engine, chatStream } = makeEngine();
    chatStream.mockReturnValueOnce(streamOf(draftAndQueue('Build a login page')));
    const { gateway, sendMessage } = makeGateway();
    const service = new ProxyService({ engine, gateway, now, dispatchDelayMs: 10_000 });
    const emitted: OutboundMessage[] = [];

    const reply = await service.runTurn('Build me a login page', new AbortController().signal, (message) =>
      emitted.push(message),
    );

    expect(reply).toBe('Got it.');
    expect(emitted).toEqual([
      { type: 'text', delta: 'Got it.' },
      {
        type: 'action',
        action: 'buffer',
        task: 'Build a login page',
        scratchpad: 'Build a login page',
        queued: '',
      },
      {
        type: 'action',
        action: 'queued',
        task: 'Build a login page',
        scratchpad: '',
        queued: 'Build a login page',
      },
      { type: 'done', message: 'Got it.', scratchpad: '', queued: 'Build a login page' },
    ]);

    const { client, send } = makeClient();
    service.addClient(client);

    clock = 5000;
    await expect(service.scheduler.tick()).resolves.toEqual({ status: 'idle' });
    expect(sendMessage).not.toHaveBeenCalled();

    clock = 10_000;
    await expect(service.scheduler.tick()).resolves.toMatchObject({
      status: 'dispatched',
      sessionKey: 'agent:main',
    });
    expect(sendMessage).toHaveBeenCalledWith('agent:main', 'Build a login page');
    expect(send).toHaveBeenCalledWith({ type: 'dispatched', task: 'Build a login page' });
  });

  it('reports a failed dispatch and keeps the task queued', async () => {
    const { engine, chat } = makeEngine();
    chat.mockResolvedValueOnce({
      content: 'Queued.',
      toolCalls: [
        { id: 'c1', name: 'set_task_buffer', arguments: '{"task": "Add search"}' },
        { id: 'c2', name: 'queue_buffered_task', arguments: '{}' },
      ],
      latencyMs: 1,
    });
    const { gateway } = makeGateway(undefined, false);
    const service = new ProxyService({ engine, gateway, now, dispatchDelayMs: 0 });
    const { client, send } = makeClient();
    service.addClient(client);

    await service.processMessage('add search');
    const outcome = await service.scheduler.tick();

    expect(outcome.status).toBe('failed');
    expect(send).toHaveBeenCalledWith({ type: 'dispatch_error', error: 'Gateway not connected' });
    expect(service.controller.state.queuedTask).toBe('Add search');
  });

  it('restores a failed send ahead of a task queued while it was in flight', async () => {
    const { engine, chatStream } = makeEngine();
    chatStream
      .mockReturnValueOnce(streamOf(draftAndQueue('Add search')))
      .mockReturnValueOnce(streamOf(draftAndQueue('Add filters')));
    const { gateway, sendMessage } = makeGateway();
    let failSend: (error: Error) => void = () => undefined;
    sendMessage.mockImplementationOnce(
      () =>
        new Promise<void>((_resolve, reject) => {
          failSend = reject;
        }),
    );
    const service = new ProxyService({ engine, gateway, now, dispatchDelayMs: 0 });
    const signal = new AbortController().signal;

    await service.runTurn('add search', signal, () => undefined);
    const sending = service.scheduler.tick();
    await service.runTurn('also add filters', signal, () => undefined);
    await flush();

    expect(sendMessage).toHaveBeenCalledWith('agent:main', 'Add search');
    expect(service.bufferView()).toEqual({ scratchpad: '', queued: 'Add filters' });

    failSend(new Error('socket closed'));

    await expect(sending).resolves.toMatchObject({ status: 'failed', task: 'Add search' });
    expect(service.bufferView()).toEqual({ scratchpad: '', queued: 'Add search\nAdd filters' });
  });

  it('never pulls a sent task back when the user speaks during the send', async () => {
    const { engine, chatStream } = makeEngine();
    chatStream.mockReturnValueOnce(streamOf(draftAndQueue('Add search'))).mockReturnValueOnce(
      streamOf([
        { type: 'content', text: 'Sure.' },
        { type: 'done', finishReason: 'stop' },
      ]),
    );
    const { gateway, sendMessage } = makeGateway();
    let finishSend: () => void = () => undefined;
    sendMessage.mockImplementationOnce(
      () =>
        new Promise<void>((resolve) => {
          finishSend = resolve;
        }),
    );
    const service = new ProxyService({ engine, gateway, now, dispatchDelayMs: 0 });
    const signal = new AbortController().signal;

    await service.runTurn('add search', signal, () => undefined);
    const sending = service.scheduler.tick();
    await service.runTurn('actually, one more thing', signal, () => undefined);
    await flush();
    finishSend();

    await expect(sending).resolves.toMatchObject({ status: 'dispatched', task: 'Add search' });
    expect(service.bufferView()).toEqual({ scratchpad: '', queued: '' });
  });

  it('forwards agent activity and the context size to clients', async () => {
    const { engine, chatStream } = makeEngine();
    chatStream.mockReturnValueOnce(streamOf([{ type: 'done', finishReason: 'stop' }]));
    const service = new ProxyService({ engine, now });
    const { client, send } = makeClient();
    service.addClient(client);

    await service.handleGatewayEvent(agentEvent('lifecycle', { phase: 'run_start' }));
    await service.runTurn('status?', new AbortController().signal, () => undefined);

    expect(send.mock.calls.map(([message]) => message.type)).toEqual(['agent_activity', 'context_size']);
    expect(send.mock.calls[0][0]).toEqual({
      type: 'agent_activity',
      activity: { type: 'agent_status', sessionKey: 'agent:main', runId: 'run-1', status: 'busy' },
    });
    expect(send.mock.calls[1][0]).toMatchObject({
      type: 'context_size',
      conversationChars: 0,
      liveTurnChars: 0,
      scratchpadChars: 0,
      queuedChars: 0,
    });
  });

  it('dispatches by hand to the target session', async () => {
    const { engine, chat } = makeEngine();
    chat.mockResolvedValueOnce({
      content: 'Drafted.',
      toolCalls: [{ id: 'c1', name: 'set_task_buffer', arguments: '{"task": "Add search"}' }],
      latencyMs: 1,
    });
    const { gateway, sendMessage } = makeGateway();
    const service = new ProxyService({ engine, gateway, now });
    const { client, send } = makeClient();
    service.addClient(client);

    await service.processMessage('add search');
    const outcome = await service.dispatchNow();

    expect(outcome).toEqual({ status: 'dispatched', task: 'Add search', sessionKey: 'agent:main' });
    expect(sendMessage).toHaveBeenCalledWith('agent:main', 'Add search');
    expect(send).toHaveBeenCalledWith({ type: 'dispatched', task: 'Add search' });
  });

  it('reports when there is no session to abort', async () => {
    const { engine } = makeEngine();
    const { gateway, abortRun } = makeGateway([]);
    const service = new ProxyService({ engine, gateway, now });

    await expect(service.abortMainAgent()).rejects.toMatchObject({
      code: 'no_session',
      message: 'No active session',
    });
    expect(abortRun).not.toHaveBeenCalled();
  });

  it('aborts the main agent run when the model interrupts', async () => {
    const { engine, chat } = makeEngine();
    chat.mockResolvedValueOnce({
      content: 'Stopping it.',
      toolCalls: [{ id: 'c1', name: 'interrupt_agent', arguments: '{}' }],
      latencyMs: 1,
    });
    const { gateway, abortRun } = makeGateway();
    const service = new ProxyService({ engine, gateway, now });

    const result = await service.processMessage('stop what you are doing');
    await flush();

    expect(result.action).toBe('stop');
    expect(abortRun).toHaveBeenCalledWith('agent:main');
  });

  it('broadcasts the completion brief when a client is listening', async () => {
    const { engine } = makeEngine();
    const service = new ProxyService({ engine, now });
    const { client, send } = makeClient();
    service.addClient(client);

    await finishAgentRun(service, 'Login page is done.');

    expect(send).toHaveBeenCalledWith({ type: 'brief', text: 'Login page is done.' });
    expect(service.controller.state.mustBriefBeforeDispatch).toBe(false);
  });

  it('holds the brief until a client connects', async () => {
    const { engine } = makeEngine();
    const service = new ProxyService({ engine, now });

    await finishAgentRun(service, 'Search shipped.');
    expect(service.getStatus().proxy.briefPending).toBe(true);

    const { client, send } = makeClient();
    service.addClient(client);
    await flush();

    expect(send).toHaveBeenCalledWith({ type: 'brief', text: 'Search shipped.' });
    expect(service.getStatus().proxy.briefPending).toBe(false);
  });

  it('clears the brief after a streamed reply that carried it', async () => {
    const { engine, chatStream } = makeEngine();
    chatStream.mockReturnValueOnce(
      streamOf([
        { type: 'content', text: 'The search task finished.' },
        { type: 'done', finishReason: 'stop' },
      ]),
    );
    const service = new ProxyService({ engine, now });
    await finishAgentRun(service, 'Search shipped.');

    await service.runTurn('any news?', new AbortController().signal, () => undefined);

    const prompt = chatStream.mock.calls[0][0][0];
    expect(prompt.role).toBe('system');
    expect(prompt.content).toContain('## Pending Completion Brief');
    expect(service.controller.state.mustBriefBeforeDispatch).toBe(false);
  });

  it('applies runtime settings and forwards voice changes to clients', async () => {
    const { engine } = makeEngine();
    const service = new ProxyService({ engine, now });
    const applyVoiceSettings = jest.fn();
    service.addClient({ send: jest.fn(), applyVoiceSettings });

    const voice = await service.applySettings({
      historyLength: 2,
      dispatchDelayMs: 500,
      compressedContext: 'Repo is a Next.js app.',
      vadThreshold: 0.05,
      ttsEnabled: false,
    });

    expect(voice).toEqual({ vad: { energyThreshold: 0.05 }, tts: false });
    expect(applyVoiceSettings).toHaveBeenCalledWith(voice);
    expect(service.controller.state.dispatchDelayMs).toBe(500);
    expect(service.controller.state.compressedContext).toBe('Repo is a Next.js app.');
    expect(service.voice.vad.energyThreshold).toBe(0.05);
    expect(service.voice.ttsEnabled).toBe(false);
  });

  it('drops a client whose send throws', () => {
    const { engine } = makeEngine();
    const service = new ProxyService({ engine, now });
    service.addClient({
      send: () => {
        throw new Error('socket closed');
      },
    });
    const { client, send } = makeClient();
    service.addClient(client);

    service.broadcast({ type: 'dispatched', task: 'x' });

    expect(service.clientCount).toBe(1);
    expect(send).toHaveBeenCalledTimes(1);
  });

  it('stops receiving broadcasts after detaching', () => {
    const { engine } = makeEngine();
    const service = new ProxyService({ engine, now });
    const { client, send } = makeClient();
    const detach = service.addClient(client);

    detach();
    service.broadcast({ type: 'dispatched', task: 'x' });

    expect(send).not.toHaveBeenCalled();
    expect(service.getStatus()).toMatchObject({
      ok: true,
      gateway: { connected: false },
      voice: { stt: false, tts: false, ttsEnabled: true, wakeword: false },
      clients: 0,
    });
  });
});
