import OpenAI, { toFile } from 'openai';
import { encodeWav } from './audio';

export type TranscriptionResult = {
  text: string;
};

export interface SpeechToText {
  transcribe(pcm: Float32Array, sampleRate: number): Promise<TranscriptionResult>;
}

export type TranscribeRequest = {
  wav: Buffer;
  model: string;
  language?: string;
};

export type TranscribeCall = (request: TranscribeRequest) => Promise<string>;

export const createOpenAiTranscribeCall =
  (client: OpenAI): TranscribeCall =>
  async ({ wav, model, language }) => {
    const file = await toFile(wav, 'speech.wav', { type: 'audio/wav' });
    const result = await client.audio.transcriptions.create({
      file,
      model,
      ...(language ? { language } : {}),
    });
    return result.text;
  };

export type OpenAiSpeechToTextOptions = {
  model?: string;
  language?: string;
  apiKey?: string;
  baseURL?: string;
  call?: TranscribeCall;
};

/** Wraps utterances as WAV and sends them to an OpenAI-compatible transcription endpoint. */
export class OpenAiSpeechToText implements SpeechToText {
  private readonly call: TranscribeCall;
  private readonly model: string;
  private readonly language?: string;

  constructor(options: OpenAiSpeechToTextOptions = {}) {
    this.model = options.model ?? 'whisper-1';
    this.language = options.language;
    this.call =
      options.call ??
      createOpenAiTranscribeCall(new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL }));
  }

  async transcribe(pcm: Float32Array, sampleRate: number): Promise<TranscriptionResult> {
    if (pcm.length === 0) return { text: '' };
    const text = await this.call({
      wav: encodeWav(pcm, sampleRate),
      model: this.model,
      ...(this.language ? { language: this.language } : {}),
    });
    return { text: text.trim() };
  }
}
