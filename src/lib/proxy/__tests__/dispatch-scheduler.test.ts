import type { AgentGateway, GatewaySession } from '../../gateway/types';
import { DispatchScheduler, type DispatchSource } from '../dispatch-scheduler';
import { SerialExecutor } from '../serial-executor';

const makeSource = (task: string | null, pending: string | null = null) => {
  const checkDispatch = jest.fn<string | null, []>().mockReturnValueOnce(task).mockReturnValue(null);
  const takePendingTask = jest.fn<string | null, []>().mockReturnValueOnce(pending).mockReturnValue(null);
  const restoreQueuedTask = jest.fn<void, [string]>();
  const source: DispatchSource = { checkDispatch, takePendingTask, restoreQueuedTask };
  return { source, checkDispatch, takePendingTask, restoreQueuedTask };
};

const makeGateway = (sessions: GatewaySession[], connected = true) => {
  const sendMessage = jest.fn<Promise<void>, [string, string]>().mockResolvedValue(undefined);
  const gateway: AgentGateway = {
    connected,
    listSessions: jest.fn<Promise<GatewaySession[]>, []>().mockResolvedValue(sessions),
    sendMessage,
    abortRun: jest.fn<Promise<void>, [string]>().mockResolvedValue(undefined),
  };
  return { gateway, sendMessage };
};

describe('DispatchScheduler', () => {
  it('sends to the first main or channel session', async () => {
    const { source } = makeSource('Ship it');
    const { gateway, sendMessage } = makeGateway([
      { key: 'sub-1', kind: 'subagent' },
      { key: 'chan-1', kind: 'channel' },
    ]);
    const onDispatched = jest.fn();
    const scheduler = new DispatchScheduler({
      source,
      executor: new SerialExecutor(),
      getGateway: () => gateway,
      onDispatched,
    });

    await expect(scheduler.tick()).resolves.toEqual({ status: 'dispatched', task: 'Ship it', sessionKey: 'chan-1' });
    expect(sendMessage).toHaveBeenCalledWith('chan-1', 'Ship it');
    expect(onDispatched).toHaveBeenCalledWith('Ship it', 'chan-1');
  });

  it('falls back to the first session', async () => {
    const { source } = makeSource('Ship it');
    const { gateway, sendMessage } = makeGateway([{ key: 'only', kind: 'subagent' }]);
    const scheduler = new DispatchScheduler({ source, executor: new SerialExecutor(), getGateway: () => gateway });

    await scheduler.tick();

    expect(sendMessage).toHaveBeenCalledWith('only', 'Ship it');
  });

  it('is idle when nothing is ready', async () => {
    const { source } = makeSource(null);
    const getGateway = jest.fn(() => null);
    const scheduler = new DispatchScheduler({ source, executor: new SerialExecutor(), getGateway });

    await expect(scheduler.tick()).resolves.toEqual({ status: 'idle' });
    expect(getGateway).not.toHaveBeenCalled();
  });

  it.each([
    ['no gateway', () => null, 'Gateway not connected'],
    ['a disconnected gateway', () => makeGateway([{ key: 'm', kind: 'main' }], false).gateway, 'Gateway not connected'],
    ['no sessions', () => makeGateway([]).gateway, 'No active session'],
  ])('restores the task and reports once with %s', async (_label, getGateway, message) => {
    const { source, restoreQueuedTask } = makeSource('Ship it');
    const onError = jest.fn();
    const scheduler = new DispatchScheduler({ source, executor: new SerialExecutor(), getGateway, onError });

    const outcome = await scheduler.tick();

    expect(outcome.status).toBe('failed');
    expect(restoreQueuedTask).toHaveBeenCalledWith('Ship it');
    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0][0].message).toBe(message);
  });

  it('wraps send failures', async () => {
    const { source, restoreQueuedTask } = makeSource('Ship it');
    const { gateway, sendMessage } = makeGateway([{ key: 'm', kind: 'main' }]);
    sendMessage.mockRejectedValueOnce(new Error('socket closed'));
    const onError = jest.fn();
    const scheduler = new DispatchScheduler({ source, executor: new SerialExecutor(), getGateway: () => gateway, onError });

    const outcome = await scheduler.tick();

    expect(outcome).toMatchObject({ status: 'failed', task: 'Ship it' });
    expect(onError.mock.calls[0][0]).toMatchObject({ code: 'send_failed', message: 'socket closed' });
    expect(restoreQueuedTask).toHaveBeenCalledWith('Ship it');
  });

  it('skips a tick while the previous one is still sending', async () => {
    const { source } = makeSource('Ship it');
    const { gateway, sendMessage } = makeGateway([{ key: 'm', kind: 'main' }]);
    let finishSend: () => void = () => {};
    sendMessage.mockImplementationOnce(
      () =>
        new Promise<void>((resolve) => {
          finishSend = resolve;
        }),
    );
    const scheduler = new DispatchScheduler({ source, executor: new SerialExecutor(), getGateway: () => gateway });

    const first = scheduler.tick();
    await expect(scheduler.tick()).resolves.toEqual({ status: 'skipped' });
    await new Promise((resolve) => setImmediate(resolve));
    finishSend();

    await expect(first).resolves.toMatchObject({ status: 'dispatched' });
  });

  it('ticks on an interval until stopped', async () => {
    jest.useFakeTimers();
    try {
      const { source, checkDispatch } = makeSource(null);
      const scheduler = new DispatchScheduler({
        source,
        executor: new SerialExecutor(),
        getGateway: () => null,
        intervalMs: 1000,
      });

      scheduler.start();
      expect(scheduler.running).toBe(true);
      await jest.advanceTimersByTimeAsync(3000);
      scheduler.stop();
      await jest.advanceTimersByTimeAsync(3000);

      expect(checkDispatch).toHaveBeenCalledTimes(3);
      expect(scheduler.running).toBe(false);
    } finally {
      jest.useRealTimers();
    }
  });

  describe('dispatchNow', () => {
    it('sends the buffered task to the requested session', async () => {
      const { source, checkDispatch } = makeSource(null, 'Draft only');
      const { gateway, sendMessage } = makeGateway([{ key: 'm', kind: 'main' }]);
      const scheduler = new DispatchScheduler({ source, executor: new SerialExecutor(), getGateway: () => gateway });

      await expect(scheduler.dispatchNow({ sessionKey: 'chan-7' })).resolves.toEqual({
        status: 'dispatched',
        task: 'Draft only',
        sessionKey: 'chan-7',
      });
      expect(sendMessage).toHaveBeenCalledWith('chan-7', 'Draft only');
      expect(gateway.listSessions).not.toHaveBeenCalled();
      expect(checkDispatch).not.toHaveBeenCalled();
    });

    it('falls back to the given text when nothing is buffered', async () => {
      const { source, restoreQueuedTask } = makeSource(null);
      const { gateway, sendMessage } = makeGateway([{ key: 'm', kind: 'main' }]);
      sendMessage.mockRejectedValueOnce(new Error('socket closed'));
      const scheduler = new DispatchScheduler({ source, executor: new SerialExecutor(), getGateway: () => gateway });

      const outcome = await scheduler.dispatchNow({ task: '  Run the tests  ' });

      expect(outcome).toMatchObject({ status: 'failed', task: 'Run the tests' });
      expect(sendMessage).toHaveBeenCalledWith('m', 'Run the tests');
      expect(restoreQueuedTask).not.toHaveBeenCalled();
    });

    it('is idle with nothing to send', async () => {
      const { source } = makeSource(null);
      const scheduler = new DispatchScheduler({ source, executor: new SerialExecutor(), getGateway: () => null });

      await expect(scheduler.dispatchNow()).resolves.toEqual({ status: 'idle' });
    });
  });
});
