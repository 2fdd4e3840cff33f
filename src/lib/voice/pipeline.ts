import { createLogger, describeError, type Logger } from '../logging';
import { concatFrames, encodePcm16Base64, rms } from './audio';
import type { SpeechToText } from './stt';
import type { TextToSpeech } from './tts';
import { WakewordDetector } from './wakeword';

export type PipelineState = 'idle' | 'listening' | 'processing' | 'speaking';

export type VadEvent = 'speech_start' | 'speech_end' | 'barge_in' | 'wakeword';

export type VadConfig = {
  energyThreshold: number;
  silenceDurationMs: number;
  minSpeechMs: number;
  sampleRate: number;
};

export const DEFAULT_VAD_CONFIG: VadConfig = {
  energyThreshold: 0.015,
  silenceDurationMs: 800,
  minSpeechMs: 250,
  sampleRate: 16_000,
};

export const DEFAULT_WAKEWORD_WINDOW_MS = 10_000;

export type SpeechChunk = {
  /** Base64 little-endian PCM16. */
  data: string;
  sampleRate: number;
  first: boolean;
};

export type VoicePipelineOptions = {
  vad?: Partial<VadConfig>;
  wakeword?: WakewordDetector;
  wakewordActiveWindowMs?: number;
  stt?: SpeechToText | null;
  tts?: TextToSpeech | null;
  now?: () => number;
  onStateChange?: (state: PipelineState) => void;
  onVadEvent?: (event: VadEvent) => void;
  logger?: Logger;
};

/**
 * Per-connection turn-taking state machine over mono float frames.
 *
 * idle -> listening -> processing -> speaking -> idle, with barge-in taking
 * speaking straight back to listening.
 */
export class VoicePipeline {
  private currentState: PipelineState = 'idle';
  private vadConfig: VadConfig;
  private frames: Float32Array[] = [];
  private silenceStartedAt: number | null = null;
  private speechStartedAt = 0;
  private wakewordActiveUntil = 0;
  private responseAbort = new AbortController();
  private ttsAbort = new AbortController();
  private readonly now: () => number;
  private readonly logger: Logger;
  readonly wakeword: WakewordDetector;
  wakewordActiveWindowMs: number;

  constructor(private readonly options: VoicePipelineOptions = {}) {
    this.vadConfig = { ...DEFAULT_VAD_CONFIG, ...options.vad };
    this.wakeword = options.wakeword ?? new WakewordDetector();
    this.wakewordActiveWindowMs = options.wakewordActiveWindowMs ?? DEFAULT_WAKEWORD_WINDOW_MS;
    this.now = options.now ?? (() => performance.now());
    this.logger = options.logger ?? createLogger('voice:pipeline');
  }

  get state(): PipelineState {
    return this.currentState;
  }

  get vad(): Readonly<VadConfig> {
    return this.vadConfig;
  }

  get isCancellable() {
    return this.currentState === 'processing' || this.currentState === 'speaking';
  }

  get hasTts() {
    return Boolean(this.options.tts);
  }

  setVadConfig(update: Partial<VadConfig>) {
    this.vadConfig = { ...this.vadConfig, ...update };
  }

  private setState(next: PipelineState) {
    const previous = this.currentState;
    this.currentState = next;
    if (previous !== next) {
      this.logger.debug(`${previous} -> ${next}`);
      this.options.onStateChange?.(next);
    }
  }

  private emit(event: VadEvent): VadEvent {
    this.options.onVadEvent?.(event);
    return event;
  }

  private startUtterance(frame: Float32Array, at: number) {
    this.frames = [frame];
    this.speechStartedAt = at;
    this.silenceStartedAt = null;
    this.setState('listening');
  }

  processAudioChunk(frame: Float32Array): VadEvent | null {
    const at = this.now();
    const isSpeech = rms(frame) > this.vadConfig.energyThreshold;

    if (this.currentState === 'speaking' && isSpeech) {
      this.cancelOutput();
      this.startUtterance(frame, at);
      return this.emit('barge_in');
    }

    let wakewordFired = false;
    if (this.currentState === 'idle' && this.wakeword.enabled) {
      let armed = at < this.wakewordActiveUntil;
      if (!armed && this.wakeword.detect(frame)) {
        this.wakewordActiveUntil = at + this.wakewordActiveWindowMs;
        this.emit('wakeword');
        wakewordFired = true;
        armed = true;
      }
      if (!armed) return null;
    }

    if (this.currentState === 'idle' && isSpeech) {
      this.startUtterance(frame, at);
      return this.emit('speech_start');
    }

    if (this.currentState === 'listening') {
      this.frames.push(frame);
      if (isSpeech) {
        this.silenceStartedAt = null;
        return null;
      }
      if (this.silenceStartedAt === null) this.silenceStartedAt = at;
      const silenceMs = at - this.silenceStartedAt;
      if (silenceMs < this.vadConfig.silenceDurationMs) return null;

      const speechMs = at - this.speechStartedAt;
      if (speechMs >= this.vadConfig.minSpeechMs) {
        this.setState('processing');
        this.wakewordActiveUntil = at + this.wakewordActiveWindowMs;
        return this.emit('speech_end');
      }
      this.frames = [];
      this.setState('idle');
      return null;
    }

    return wakewordFired ? 'wakeword' : null;
  }

  getAudioBuffer(): Float32Array {
    return concatFrames(this.frames);
  }

  /** Drains the utterance buffer through STT. Backend failures yield ''. */
  async transcribeBuffer(): Promise<string> {
    const audio = this.getAudioBuffer();
    this.frames = [];
    const stt = this.options.stt;
    if (audio.length === 0 || !stt) return '';
    try {
      const result = await stt.transcribe(audio, this.vadConfig.sampleRate);
      return result.text.trim();
    } catch (error) {
      this.logger.error('transcription failed', describeError(error));
      return '';
    }
  }

  /** Fresh cancellation for a new turn; returns the response signal. */
  startResponse(): AbortSignal {
    this.responseAbort = new AbortController();
    this.ttsAbort = new AbortController();
    return this.responseAbort.signal;
  }

  get responseSignal(): AbortSignal {
    return this.responseAbort.signal;
  }

  get ttsSignal(): AbortSignal {
    return this.ttsAbort.signal;
  }

  /** Typed turns skip the VAD path but still hold the pipeline busy. */
  beginProcessing() {
    this.frames = [];
    this.setState('processing');
  }

  beginSpeaking() {
    this.setState('speaking');
  }

  finishResponse() {
    this.frames = [];
    this.setState('idle');
  }

  cancelOutput() {
    this.responseAbort.abort();
    this.ttsAbort.abort();
  }

  reset() {
    this.cancelOutput();
    this.frames = [];
    this.silenceStartedAt = null;
    this.speechStartedAt = 0;
    this.wakewordActiveUntil = 0;
    this.setState('idle');
  }

  /** Streams TTS audio, stopping at the first chunk after cancellation. */
  async *synthesizeStreaming(text: string): AsyncGenerator<SpeechChunk> {
    const tts = this.options.tts;
    if (!text || !tts) return;
    const signal = this.ttsAbort.signal;
    let first = true;
    for await (const samples of tts.synthesizeStreaming(text, signal)) {
      if (signal.aborted) return;
      if (samples.length === 0) continue;
      yield { data: encodePcm16Base64(samples), sampleRate: tts.sampleRate, first };
      first = false;
    }
  }
}
