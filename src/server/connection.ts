import { nanoid } from 'nanoid';
import { createLogger, describeError, type Logger } from '../lib/logging';
import { decodePcm16Base64 } from '../lib/voice/audio';
import { VoicePipeline } from '../lib/voice/pipeline';
import { WakewordDetector } from '../lib/voice/wakeword';
import {
  parseInboundMessage,
  type InboundMessage,
  type OutboundMessage,
  type VoiceSettingsUpdate,
} from './messages';
import type { ClientChannel, ProxyService } from './proxy-service';

export type ConnectionSessionOptions = {
  service: ProxyService;
  transport: (message: OutboundMessage) => void;
  id?: string;
  now?: () => number;
  logger?: Logger;
};

/**
 * One live client. Owns its voice pipeline and turns the inbound message
 * stream into proxy turns on the shared service.
 */
export class ConnectionSession implements ClientChannel {
  readonly id: string;
  readonly pipeline: VoicePipeline;
  private ttsEnabled: boolean;
  private turnSeq = 0;
  private closed = false;
  private detach: (() => void) | null = null;
  private readonly inflight = new Set<Promise<void>>();
  private readonly service: ProxyService;
  private readonly transport: (message: OutboundMessage) => void;
  private readonly logger: Logger;

  constructor(options: ConnectionSessionOptions) {
    this.id = options.id ?? nanoid(10);
    this.service = options.service;
    this.transport = options.transport;
    this.logger = (options.logger ?? createLogger('server:connection')).child({ connection: this.id });

    const voice = options.service.voice;
    const { activeWindowMs, ...wakeword } = voice.wakeword;
    this.ttsEnabled = voice.ttsEnabled;
    this.pipeline = new VoicePipeline({
      vad: voice.vad,
      wakeword: new WakewordDetector(wakeword, options.service.wakewordBackend),
      wakewordActiveWindowMs: activeWindowMs,
      stt: options.service.stt,
      tts: options.service.tts,
      ...(options.now ? { now: options.now } : {}),
      onStateChange: (state) => this.send({ type: 'state', state }),
      logger: this.logger,
    });
  }

  open() {
    this.send({
      type: 'init',
      connectionId: this.id,
      gatewayConnected: this.service.gatewayConnected,
      tts: this.ttsEnabled && this.pipeline.hasTts,
      ...this.service.bufferView(),
    });
    this.detach = this.service.addClient(this);
    this.logger.info('client connected');
  }

  close() {
    if (this.closed) return;
    this.closed = true;
    this.turnSeq += 1;
    this.pipeline.reset();
    this.detach?.();
    this.detach = null;
    this.logger.info('client disconnected');
  }

  send(message: OutboundMessage) {
    if (this.closed) return;
    this.transport(message);
  }

  /** Resolves once every turn started so far has finished. */
  async settled(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all([...this.inflight]);
    }
  }

  handleRaw(raw: string) {
    const message = parseInboundMessage(raw);
    if (!message) {
      this.logger.debug('ignoring malformed message');
      return;
    }
    this.handle(message);
  }

  handle(message: InboundMessage) {
    if (this.closed) return;
    switch (message.type) {
      case 'audio_chunk':
        this.handleAudio(message.data);
        return;
      case 'text': {
        const text = message.message.trim();
        if (text) this.startTypedTurn(text);
        return;
      }
      case 'cancel':
        this.cancel();
        return;
      case 'config':
        this.applyVoiceSettings(message);
        return;
    }
  }

  applyVoiceSettings(update: VoiceSettingsUpdate) {
    if (update.vad) this.pipeline.setVadConfig(update.vad);
    if (update.wakeword) {
      const { activeWindowMs, ...wakeword } = update.wakeword;
      this.pipeline.wakeword.setConfig(wakeword);
      if (activeWindowMs !== undefined) this.pipeline.wakewordActiveWindowMs = activeWindowMs;
    }
    if (update.tts !== undefined) this.ttsEnabled = update.tts;
  }

  cancel() {
    this.turnSeq += 1;
    this.pipeline.cancelOutput();
    if (this.pipeline.isCancellable) this.pipeline.finishResponse();
  }

  private handleAudio(data: string) {
    if (!data) return;
    const frame = decodePcm16Base64(data);
    if (frame.length === 0) return;
    const event = this.pipeline.processAudioChunk(frame);
    if (!event) return;
    this.send({ type: 'vad', event });
    if (event === 'speech_end') {
      this.track(this.transcribeAndRespond());
    }
  }

  private startTypedTurn(text: string) {
    // A new message supersedes whatever is still streaming or speaking.
    this.pipeline.cancelOutput();
    this.track(this.respond(text));
  }

  private async transcribeAndRespond() {
    const turn = this.turnSeq;
    const text = await this.pipeline.transcribeBuffer();
    if (turn !== this.turnSeq) return;
    if (!text) {
      this.pipeline.finishResponse();
      return;
    }
    this.send({ type: 'transcription', text, final: true });
    await this.respond(text);
  }

  private async respond(text: string) {
    this.turnSeq += 1;
    const turn = this.turnSeq;
    const signal = this.pipeline.startResponse();
    this.pipeline.beginProcessing();

    const reply = await this.service.runTurn(text, signal, (message) => this.send(message));
    if (turn !== this.turnSeq) return;

    if (reply && this.ttsEnabled && this.pipeline.hasTts && !signal.aborted) {
      this.pipeline.beginSpeaking();
      for await (const chunk of this.pipeline.synthesizeStreaming(reply)) {
        this.send({ type: 'audio', ...chunk });
      }
      if (turn !== this.turnSeq) return;
    }
    // After a barge-in the pipeline is already listening to the next utterance.
    if (this.pipeline.isCancellable) this.pipeline.finishResponse();
  }

  private track(work: Promise<void>) {
    const tracked: Promise<void> = work
      .catch((error: unknown) => {
        this.logger.error('turn failed', describeError(error));
        this.send({ type: 'error', message: describeError(error) });
      })
      .finally(() => {
        this.inflight.delete(tracked);
      });
    this.inflight.add(tracked);
  }
}
