import { z } from 'zod';
import type { AgentActivity } from '../lib/gateway/agent-events';
import type { ContextStats, ProxyActionEvent } from '../lib/proxy/types';
import type { PipelineState, VadEvent } from '../lib/voice/pipeline';

const vadUpdateSchema = z
  .object({
    energyThreshold: z.number().min(0).max(1),
    silenceDurationMs: z.number().int().min(100).max(10_000),
    minSpeechMs: z.number().int().min(0).max(10_000),
  })
  .partial();

const wakewordUpdateSchema = z
  .object({
    enabled: z.boolean(),
    threshold: z.number().min(0).max(1),
    activeWindowMs: z.number().int().min(1000).max(600_000),
  })
  .partial();

export const inboundMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('audio_chunk'), data: z.string() }),
  z.object({ type: z.literal('text'), message: z.string() }),
  z.object({ type: z.literal('cancel') }),
  z.object({
    type: z.literal('config'),
    vad: vadUpdateSchema.optional(),
    wakeword: wakewordUpdateSchema.optional(),
    tts: z.boolean().optional(),
  }),
]);

export type InboundMessage = z.infer<typeof inboundMessageSchema>;

export type VoiceSettingsUpdate = {
  vad?: z.infer<typeof vadUpdateSchema>;
  wakeword?: z.infer<typeof wakewordUpdateSchema>;
  tts?: boolean;
};

export const settingsBodySchema = z
  .object({
    historyLength: z.number().int().min(1).max(200),
    dispatchDelayMs: z.number().min(0).max(600_000),
    compressedContext: z.string(),
    vadThreshold: z.number().min(0).max(1),
    silenceDurationMs: z.number().int().min(100).max(10_000),
    minSpeechMs: z.number().int().min(0).max(10_000),
    wakewordEnabled: z.boolean(),
    wakewordThreshold: z.number().min(0).max(1),
    wakewordActiveWindowMs: z.number().int().min(1000).max(600_000),
    ttsEnabled: z.boolean(),
  })
  .partial()
  .strict();

export type SettingsBody = z.infer<typeof settingsBodySchema>;

export const planMessageBodySchema = z.object({
  message: z.string().trim().min(1, 'message required'),
});

export const dispatchBodySchema = z.object({
  sessionKey: z.string().trim().optional(),
  task: z.string().optional(),
});

export const abortBodySchema = z.object({
  sessionKey: z.string().trim().optional(),
});

export type BufferView = {
  scratchpad: string;
  queued: string;
};

export type OutboundMessage =
  | ({ type: 'init'; connectionId: string; gatewayConnected: boolean; tts: boolean } & BufferView)
  | { type: 'state'; state: PipelineState }
  | { type: 'vad'; event: VadEvent }
  | { type: 'transcription'; text: string; final: boolean }
  | { type: 'text'; delta: string }
  | { type: 'reasoning'; delta: string }
  | ({ type: 'action'; action: ProxyActionEvent['action']; task?: string } & BufferView)
  | { type: 'audio'; data: string; sampleRate: number; first: boolean }
  | ({ type: 'done'; message: string } & BufferView)
  | { type: 'cancelled' }
  | { type: 'error'; message: string }
  | { type: 'dispatched'; task: string }
  | { type: 'dispatch_error'; error: string }
  | { type: 'brief'; text: string }
  | ({ type: 'context_size' } & ContextStats)
  | { type: 'agent_activity'; activity: AgentActivity };

/** Returns null for anything that is not a well-formed inbound message. */
export const parseInboundMessage = (raw: string): InboundMessage | null => {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = inboundMessageSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
};

/** Translates the HTTP settings body into the per-connection voice update. */
export const toVoiceSettings = (body: SettingsBody): VoiceSettingsUpdate => {
  const update: VoiceSettingsUpdate = {};
  const vad = {
    ...(body.vadThreshold !== undefined ? { energyThreshold: body.vadThreshold } : {}),
    ...(body.silenceDurationMs !== undefined ? { silenceDurationMs: body.silenceDurationMs } : {}),
    ...(body.minSpeechMs !== undefined ? { minSpeechMs: body.minSpeechMs } : {}),
  };
  const wakeword = {
    ...(body.wakewordEnabled !== undefined ? { enabled: body.wakewordEnabled } : {}),
    ...(body.wakewordThreshold !== undefined ? { threshold: body.wakewordThreshold } : {}),
    ...(body.wakewordActiveWindowMs !== undefined ? { activeWindowMs: body.wakewordActiveWindowMs } : {}),
  };
  if (Object.keys(vad).length > 0) update.vad = vad;
  if (Object.keys(wakeword).length > 0) update.wakeword = wakeword;
  if (body.ttsEnabled !== undefined) update.tts = body.ttsEnabled;
  return update;
};
