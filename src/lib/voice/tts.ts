import OpenAI from 'openai';
import { createLogger, describeError } from '../logging';
import { pcm16BytesToFloat } from './audio';
import { splitSentences, stripMarkdown } from './speech-text';

const logger = createLogger('voice:tts');

export interface TextToSpeech {
  readonly sampleRate: number;
  synthesizeStreaming(text: string, signal?: AbortSignal): AsyncIterable<Float32Array>;
}

export const TTS_VOICES = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'] as const;
export type TtsVoice = (typeof TTS_VOICES)[number];

export type SpeechRequest = {
  input: string;
  model: string;
  voice: TtsVoice;
  signal?: AbortSignal;
};

/** Returns raw 16-bit little-endian PCM for one piece of text. */
export type SpeechCall = (request: SpeechRequest) => Promise<ArrayBuffer>;

export const createOpenAiSpeechCall =
  (client: OpenAI): SpeechCall =>
  async ({ input, model, voice, signal }) => {
    const response = await client.audio.speech.create(
      { input, model, voice, response_format: 'pcm' },
      { signal },
    );
    return response.arrayBuffer();
  };

export type OpenAiTextToSpeechOptions = {
  model?: string;
  voice?: TtsVoice;
  apiKey?: string;
  baseURL?: string;
  call?: SpeechCall;
};

// The `pcm` response format is fixed at 24 kHz mono.
const OPENAI_PCM_SAMPLE_RATE = 24_000;

export class OpenAiTextToSpeech implements TextToSpeech {
  readonly sampleRate = OPENAI_PCM_SAMPLE_RATE;
  private readonly call: SpeechCall;
  private readonly model: string;
  private readonly voice: TtsVoice;

  constructor(options: OpenAiTextToSpeechOptions = {}) {
    this.model = options.model ?? 'tts-1';
    this.voice = options.voice ?? 'alloy';
    this.call =
      options.call ?? createOpenAiSpeechCall(new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL }));
  }

  /** One request per sentence; a failed sentence is logged and skipped. */
  async *synthesizeStreaming(text: string, signal?: AbortSignal): AsyncGenerator<Float32Array> {
    for (const sentence of splitSentences(stripMarkdown(text))) {
      if (signal?.aborted) return;
      let bytes: ArrayBuffer;
      try {
        bytes = await this.call({
          input: sentence,
          model: this.model,
          voice: this.voice,
          ...(signal ? { signal } : {}),
        });
      } catch (error) {
        if (signal?.aborted) return;
        logger.warn('sentence synthesis failed', { error: describeError(error) });
        continue;
      }
      const samples = pcm16BytesToFloat(new Uint8Array(bytes));
      if (samples.length > 0) yield samples;
    }
  }
}
