import { config as loadDotenv } from 'dotenv';
import { join } from 'node:path';
import { DEFAULT_OPENROUTER_BASE_URL, DEFAULT_OPENROUTER_MODEL } from '../lib/llm/openrouter-engine';
import { DEFAULT_DISPATCH_DELAY_MS } from '../lib/proxy/task-buffer';
import { DEFAULT_DISPATCH_TICK_MS } from '../lib/proxy/dispatch-scheduler';
import { DEFAULT_VAD_CONFIG, DEFAULT_WAKEWORD_WINDOW_MS, type VadConfig } from '../lib/voice/pipeline';
import { TTS_VOICES, type TtsVoice } from '../lib/voice/tts';
import { DEFAULT_WAKEWORD_CONFIG, type WakewordConfig } from '../lib/voice/wakeword';

type Env = Record<string, string | undefined>;

export type AppConfig = {
  host: string;
  port: number;
  llm: {
    apiKey: string;
    model: string;
    baseURL: string;
    temperature: number;
    maxTokens: number;
    reasoning: boolean;
  };
  proxy: {
    historyPairs: number;
    dispatchDelayMs: number;
    dispatchTickMs: number;
    compressedContext: string;
  };
  vad: VadConfig;
  wakeword: WakewordConfig & { activeWindowMs: number };
  speech: {
    openaiApiKey: string;
    openaiBaseURL?: string;
    sttModel: string;
    sttLanguage?: string;
    ttsModel: string;
    ttsVoice: TtsVoice;
    ttsEnabled: boolean;
  };
};

export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_PORT = 8765;

export const parseBoolean = (value?: string | null): boolean | undefined => {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  if (!normalized) return undefined;
  if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
  if (['false', '0', 'no', 'off'].includes(normalized)) return false;
  return undefined;
};

export const parsePositiveInt = (
  value: unknown,
  fallback: number,
  min = 1,
  max = Number.MAX_SAFE_INTEGER,
): number => {
  const parsed =
    typeof value === 'string' ? Number(value) : typeof value === 'number' ? value : Number.NaN;
  if (!Number.isFinite(parsed) || parsed <= 0) return fallback;
  const next = Math.floor(parsed);
  if (next < min) return min;
  if (next > max) return max;
  return next;
};

export const parseOptionalFloat = (value: unknown): number | undefined => {
  const parsed =
    typeof value === 'string' && value.trim()
      ? Number(value)
      : typeof value === 'number'
        ? value
        : Number.NaN;
  if (!Number.isFinite(parsed)) return undefined;
  return parsed;
};

const clamp = (value: number, min: number, max: number) => Math.min(max, Math.max(min, value));

const parseList = (value?: string): string[] =>
  (value ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);

const optionalText = (value?: string): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

const isTtsVoice = (value: string): value is TtsVoice =>
  TTS_VOICES.some((voice) => voice === value);

const parseVoice = (value?: string): TtsVoice => {
  const normalized = (value ?? '').trim().toLowerCase();
  return isTtsVoice(normalized) ? normalized : 'alloy';
};

/** Loads `.env.local` then `.env` from the working directory; real env vars win. */
export const loadEnvFiles = (cwd = process.cwd()) => {
  loadDotenv({ path: join(cwd, '.env.local') });
  loadDotenv({ path: join(cwd, '.env') });
};

export const resolveAppConfig = (env: Env = process.env): AppConfig => {
  const temperature = parseOptionalFloat(env.LLM_TEMPERATURE);
  const energyThreshold = parseOptionalFloat(env.VAD_ENERGY_THRESHOLD);
  const wakewordThreshold = parseOptionalFloat(env.WAKEWORD_THRESHOLD);
  const wakewordModels = parseList(env.WAKEWORD_MODELS);
  const dispatchDelayMs = parseOptionalFloat(env.DISPATCH_DELAY_MS);

  return {
    host: optionalText(env.HOST) ?? DEFAULT_HOST,
    port: parsePositiveInt(env.PORT, DEFAULT_PORT, 1, 65_535),
    llm: {
      apiKey: env.OPENROUTER_API_KEY?.trim() ?? '',
      model: optionalText(env.OPENROUTER_MODEL) ?? DEFAULT_OPENROUTER_MODEL,
      baseURL: optionalText(env.OPENROUTER_BASE_URL) ?? DEFAULT_OPENROUTER_BASE_URL,
      temperature: temperature === undefined ? 0.3 : clamp(temperature, 0, 2),
      maxTokens: parsePositiveInt(env.LLM_MAX_TOKENS, 200, 16, 4096),
      reasoning: parseBoolean(env.LLM_REASONING) ?? true,
    },
    proxy: {
      historyPairs: parsePositiveInt(env.PROXY_HISTORY_PAIRS, 15, 1, 200),
      // 0 is a valid delay: dispatch as soon as the agent is idle.
      dispatchDelayMs:
        dispatchDelayMs === undefined ? DEFAULT_DISPATCH_DELAY_MS : Math.max(0, Math.floor(dispatchDelayMs)),
      dispatchTickMs: parsePositiveInt(env.DISPATCH_TICK_MS, DEFAULT_DISPATCH_TICK_MS, 50, 60_000),
      compressedContext: env.PROXY_COMPRESSED_CONTEXT ?? '',
    },
    vad: {
      energyThreshold:
        energyThreshold === undefined ? DEFAULT_VAD_CONFIG.energyThreshold : clamp(energyThreshold, 0, 1),
      silenceDurationMs: parsePositiveInt(env.VAD_SILENCE_MS, DEFAULT_VAD_CONFIG.silenceDurationMs, 100, 10_000),
      minSpeechMs: parsePositiveInt(env.VAD_MIN_SPEECH_MS, DEFAULT_VAD_CONFIG.minSpeechMs, 50, 10_000),
      sampleRate: parsePositiveInt(env.AUDIO_SAMPLE_RATE, DEFAULT_VAD_CONFIG.sampleRate, 8_000, 48_000),
    },
    wakeword: {
      enabled: parseBoolean(env.WAKEWORD_ENABLED) ?? DEFAULT_WAKEWORD_CONFIG.enabled,
      threshold:
        wakewordThreshold === undefined ? DEFAULT_WAKEWORD_CONFIG.threshold : clamp(wakewordThreshold, 0, 1),
      models: wakewordModels.length > 0 ? wakewordModels : [...DEFAULT_WAKEWORD_CONFIG.models],
      activeWindowMs: parsePositiveInt(env.WAKEWORD_WINDOW_MS, DEFAULT_WAKEWORD_WINDOW_MS, 1000, 600_000),
    },
    speech: {
      openaiApiKey: env.OPENAI_API_KEY?.trim() ?? '',
      openaiBaseURL: optionalText(env.OPENAI_BASE_URL),
      sttModel: optionalText(env.STT_MODEL) ?? 'whisper-1',
      sttLanguage: optionalText(env.STT_LANGUAGE),
      ttsModel: optionalText(env.TTS_MODEL) ?? 'tts-1',
      ttsVoice: parseVoice(env.TTS_VOICE),
      ttsEnabled: parseBoolean(env.TTS_ENABLED) ?? true,
    },
  };
};
