import { createLogger, describeError, type Logger } from '../lib/logging';
import { AgentEventTracker, type SessionSummary, type TrackedToolCall } from '../lib/gateway/agent-events';
import { selectTargetSession } from '../lib/gateway/session-target';
import type { AgentGateway, GatewayEvent, GatewaySession } from '../lib/gateway/types';
import { ProxyController } from '../lib/proxy/controller';
import {
  DispatchScheduler,
  type DispatchOutcome,
  type ManualDispatch,
} from '../lib/proxy/dispatch-scheduler';
import { ProxyError } from '../lib/proxy/errors';
import { SerialExecutor } from '../lib/proxy/serial-executor';
import type { CompletionEngine, ProcessResult, ProxyEventSink } from '../lib/proxy/types';
import { DEFAULT_VAD_CONFIG, DEFAULT_WAKEWORD_WINDOW_MS, type VadConfig } from '../lib/voice/pipeline';
import type { SpeechToText } from '../lib/voice/stt';
import type { TextToSpeech } from '../lib/voice/tts';
import { DEFAULT_WAKEWORD_CONFIG, type WakewordBackend, type WakewordConfig } from '../lib/voice/wakeword';
import {
  toVoiceSettings,
  type BufferView,
  type OutboundMessage,
  type SettingsBody,
  type VoiceSettingsUpdate,
} from './messages';

/** A connected client; `send` failures drop the client. */
export interface ClientChannel {
  send(message: OutboundMessage): void;
  applyVoiceSettings?(update: VoiceSettingsUpdate): void;
}

export type VoiceDefaults = {
  vad: VadConfig;
  wakeword: WakewordConfig & { activeWindowMs: number };
  ttsEnabled: boolean;
};

export type ProxyServiceOptions = {
  engine: CompletionEngine;
  gateway?: AgentGateway | null;
  stt?: SpeechToText | null;
  tts?: TextToSpeech | null;
  wakewordBackend?: WakewordBackend | null;
  voice?: Partial<VoiceDefaults>;
  maxHistoryPairs?: number;
  dispatchDelayMs?: number;
  dispatchTickMs?: number;
  compressedContext?: string;
  now?: () => number;
  logger?: Logger;
};

export type ServiceStatus = {
  ok: true;
  gateway: { connected: boolean };
  voice: { stt: boolean; tts: boolean; ttsEnabled: boolean; wakeword: boolean };
  clients: number;
  proxy: {
    agentStatus: string;
    agentCurrentTask: string;
    briefPending: boolean;
    dispatchDelayMs: number;
    dispatchRunning: boolean;
  } & BufferView;
  context: ReturnType<ProxyController['getContextStats']>;
};

/**
 * Hosts one proxy conversation: the controller, the executor that serialises
 * every state change, the dispatch loop and the set of connected clients.
 */
export class ProxyService {
  readonly controller: ProxyController;
  readonly executor = new SerialExecutor();
  readonly scheduler: DispatchScheduler;
  readonly tracker: AgentEventTracker;
  readonly stt: SpeechToText | null;
  readonly tts: TextToSpeech | null;
  readonly wakewordBackend: WakewordBackend | null;
  private gateway: AgentGateway | null;
  private readonly clients = new Set<ClientChannel>();
  private readonly logger: Logger;
  private voiceDefaults: VoiceDefaults;

  constructor(options: ProxyServiceOptions) {
    this.logger = options.logger ?? createLogger('server:proxy');
    this.gateway = options.gateway ?? null;
    this.stt = options.stt ?? null;
    this.tts = options.tts ?? null;
    this.wakewordBackend = options.wakewordBackend ?? null;
    this.voiceDefaults = {
      vad: { ...DEFAULT_VAD_CONFIG, ...options.voice?.vad },
      wakeword: {
        ...DEFAULT_WAKEWORD_CONFIG,
        activeWindowMs: DEFAULT_WAKEWORD_WINDOW_MS,
        ...options.voice?.wakeword,
      },
      ttsEnabled: options.voice?.ttsEnabled ?? true,
    };

    const sink: ProxyEventSink = {
      onStop: () => this.interruptMainAgent(),
      onTaskQueued: (task) => this.logger.info('task queued for dispatch', { chars: task.length }),
      onDispatch: (task) => this.logger.debug('dispatch gate opened', { chars: task.length }),
    };
    this.controller = new ProxyController({
      engine: options.engine,
      sink,
      ...(options.now ? { now: options.now } : {}),
      ...(options.maxHistoryPairs !== undefined ? { maxHistoryPairs: options.maxHistoryPairs } : {}),
      ...(options.dispatchDelayMs !== undefined ? { dispatchDelayMs: options.dispatchDelayMs } : {}),
    });
    if (options.compressedContext) {
      this.controller.setCompressedContext(options.compressedContext);
    }

    this.tracker = new AgentEventTracker({
      onActivity: (activity) => this.broadcast({ type: 'agent_activity', activity }),
    });
    this.scheduler = new DispatchScheduler({
      source: this.controller,
      executor: this.executor,
      getGateway: () => this.gateway,
      ...(options.dispatchTickMs !== undefined ? { intervalMs: options.dispatchTickMs } : {}),
      onDispatched: (task) => this.broadcast({ type: 'dispatched', task }),
      onError: (error) => this.broadcast({ type: 'dispatch_error', error: error.message }),
    });
  }

  get clientCount() {
    return this.clients.size;
  }

  get voice(): Readonly<VoiceDefaults> {
    return this.voiceDefaults;
  }

  get gatewayConnected() {
    return this.gateway?.connected ?? false;
  }

  start() {
    this.scheduler.start();
  }

  async stop() {
    this.scheduler.stop();
    await this.executor.idle();
  }

  setGateway(gateway: AgentGateway | null) {
    this.gateway = gateway;
  }

  bufferView(): BufferView {
    const state = this.controller.state;
    return { scratchpad: state.scratchpadTask, queued: state.queuedTask };
  }

  /** Registers a client; a brief that waited for someone to hear it goes out now. */
  addClient(client: ClientChannel): () => void {
    this.clients.add(client);
    if (this.controller.state.mustBriefBeforeDispatch) {
      this.deliverBrief().catch((error: unknown) => {
        this.logger.error('brief delivery failed', describeError(error));
      });
    }
    return () => {
      this.clients.delete(client);
    };
  }

  broadcast(message: OutboundMessage) {
    for (const client of [...this.clients]) {
      try {
        client.send(message);
      } catch (error) {
        this.logger.warn('dropping client after failed send', describeError(error));
        this.clients.delete(client);
      }
    }
  }

  /**
   * Runs one streamed turn inside the executor and forwards its events.
   * Resolves with the reply, or null when the turn was cancelled or failed.
   */
  runTurn(
    text: string,
    signal: AbortSignal,
    emit: (message: OutboundMessage) => void,
  ): Promise<string | null> {
    return this.executor.run(async () => {
      this.broadcastContextSize();
      const briefing = this.controller.state.mustBriefBeforeDispatch;
      let reply: string | null = null;
      for await (const event of this.controller.processMessageStream(text, signal)) {
        switch (event.type) {
          case 'content':
            emit({ type: 'text', delta: event.text });
            break;
          case 'reasoning':
            emit({ type: 'reasoning', delta: event.text });
            break;
          case 'action':
            emit({
              type: 'action',
              action: event.action,
              ...(event.task !== undefined ? { task: event.task } : {}),
              ...this.bufferView(),
            });
            break;
          case 'done':
            reply = event.reply;
            emit({ type: 'done', message: event.reply, ...this.bufferView() });
            break;
          case 'cancelled':
            emit({ type: 'cancelled' });
            break;
          case 'error':
            emit({ type: 'error', message: event.message });
            break;
        }
      }
      // The prompt carried the brief, so the reply has told the user.
      if (briefing && reply !== null) {
        this.controller.popPendingCompletionBrief();
      }
      return reply;
    });
  }

  processMessage(text: string): Promise<ProcessResult> {
    return this.executor.run(async () => {
      this.broadcastContextSize();
      const briefing = this.controller.state.mustBriefBeforeDispatch;
      const result = await this.controller.processMessage(text);
      if (briefing) this.controller.popPendingCompletionBrief();
      return result;
    });
  }

  /** Mirrors one gateway event into the controller. */
  async handleGatewayEvent(event: GatewayEvent): Promise<void> {
    const update = this.tracker.handle(event);
    if (!update) return;
    const finished = await this.executor.run(() => this.controller.updateAgentContext(update));
    if (finished) await this.deliverBrief();
  }

  /** Broadcasts and clears the pending brief; with nobody listening it stays pending. */
  async deliverBrief(): Promise<string | null> {
    if (this.clients.size === 0) return null;
    const brief = await this.executor.run(() =>
      this.controller.state.mustBriefBeforeDispatch ? this.controller.popPendingCompletionBrief() : null,
    );
    if (brief === null) return null;
    this.broadcast({ type: 'brief', text: brief });
    return brief;
  }

  async applySettings(body: SettingsBody): Promise<VoiceSettingsUpdate> {
    await this.executor.run(() => {
      if (body.historyLength !== undefined) this.controller.setMaxHistoryPairs(body.historyLength);
      if (body.dispatchDelayMs !== undefined) this.controller.setDispatchDelay(body.dispatchDelayMs);
      if (body.compressedContext !== undefined) this.controller.setCompressedContext(body.compressedContext);
    });

    const voice = toVoiceSettings(body);
    this.voiceDefaults = {
      vad: { ...this.voiceDefaults.vad, ...voice.vad },
      wakeword: { ...this.voiceDefaults.wakeword, ...voice.wakeword },
      ttsEnabled: voice.tts ?? this.voiceDefaults.ttsEnabled,
    };
    for (const client of this.clients) {
      client.applyVoiceSettings?.(voice);
    }
    return voice;
  }

  /** Sends the buffered task now; the gateway must be up before anything is taken. */
  async dispatchNow(request: ManualDispatch = {}): Promise<DispatchOutcome> {
    this.requireGateway();
    return this.scheduler.dispatchNow(request);
  }

  /** Aborts the run on `sessionKey`, or on the session dispatches go to. */
  async abortMainAgent(sessionKey?: string): Promise<string> {
    const gateway = this.requireGateway();
    const target = sessionKey || selectTargetSession(await gateway.listSessions());
    if (!target) throw new ProxyError('no_session', 'No active session');
    await gateway.abortRun(target);
    this.logger.info('interrupted the main agent', { sessionKey: target });
    return target;
  }

  listSessions(): Promise<GatewaySession[]> {
    return this.requireGateway().listSessions();
  }

  agentReasoning(sessionKey: string): { cot: string; toolCalls: TrackedToolCall[] } {
    return {
      cot: this.tracker.getThinkingText(sessionKey),
      toolCalls: this.tracker.getToolCalls(sessionKey),
    };
  }

  agentSessionState(sessionKey: string): SessionSummary {
    return this.tracker.describeSession(sessionKey);
  }

  /** Drops the conversation, both buffers and the agent mirror; the dispatch delay survives. */
  async resetPlan(): Promise<BufferView> {
    await this.executor.run(() => this.controller.reset());
    this.logger.info('planning state reset');
    return this.bufferView();
  }

  getStatus(): ServiceStatus {
    const state = this.controller.getSnapshot();
    return {
      ok: true,
      gateway: { connected: this.gatewayConnected },
      voice: {
        stt: this.stt !== null,
        tts: this.tts !== null,
        ttsEnabled: this.voiceDefaults.ttsEnabled,
        wakeword: this.voiceDefaults.wakeword.enabled,
      },
      clients: this.clients.size,
      proxy: {
        ...this.bufferView(),
        agentStatus: state.agentStatus,
        agentCurrentTask: state.agentCurrentTask,
        briefPending: state.mustBriefBeforeDispatch,
        dispatchDelayMs: state.dispatchDelayMs,
        dispatchRunning: this.scheduler.running,
      },
      context: this.controller.getContextStats(),
    };
  }

  private broadcastContextSize() {
    this.broadcast({ type: 'context_size', ...this.controller.getContextStats() });
  }

  private requireGateway(): AgentGateway {
    const gateway = this.gateway;
    if (!gateway?.connected) {
      throw new ProxyError('gateway_unavailable', 'Gateway not connected');
    }
    return gateway;
  }

  private interruptMainAgent() {
    this.abortMainAgent().catch((error: unknown) => {
      this.logger.warn('failed to interrupt the main agent', describeError(error));
    });
  }
}
