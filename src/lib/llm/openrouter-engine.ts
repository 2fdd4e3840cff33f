import OpenAI from 'openai';
import { z } from 'zod';
import { createLogger, describeError } from '../logging';
import { CompletionError } from '../proxy/errors';
import type {
  ChatMessage,
  CompletionDelta,
  CompletionEngine,
  CompletionResult,
  ToolCallRecord,
  ToolDefinition,
} from '../proxy/types';
import { toOpenAiMessages, toOpenAiTools } from './openai-format';
import { collectStatusCodes, withProviderRetry } from './provider-retry';

const logger = createLogger('llm:openrouter');

export const DEFAULT_OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';
export const DEFAULT_OPENROUTER_MODEL = 'openai/gpt-oss-120b';

type ReasoningFlag = { reasoning?: { enabled: boolean } };
export type CompletionRequest = OpenAI.Chat.ChatCompletionCreateParamsNonStreaming & ReasoningFlag;
export type StreamingCompletionRequest = OpenAI.Chat.ChatCompletionCreateParamsStreaming & ReasoningFlag;

/** The two calls the engine makes; wraps the SDK so tests can stand in for it. */
export interface CompletionsApi {
  create(body: CompletionRequest, signal?: AbortSignal): Promise<OpenAI.Chat.ChatCompletion>;
  stream(
    body: StreamingCompletionRequest,
    signal?: AbortSignal,
  ): Promise<AsyncIterable<OpenAI.Chat.ChatCompletionChunk>>;
}

export const createOpenAiCompletionsApi = (client: OpenAI): CompletionsApi => ({
  create: (body, signal) => client.chat.completions.create(body, { signal }),
  stream: (body, signal) => client.chat.completions.create(body, { signal }),
});

// Reasoning text is a provider extension the SDK types leave out.
const reasoningFieldsSchema = z
  .object({
    reasoning: z.string().nullish().catch(null),
    reasoning_content: z.string().nullish().catch(null),
  })
  .passthrough();

const readReasoning = (value: unknown): string => {
  const parsed = reasoningFieldsSchema.safeParse(value);
  if (!parsed.success) return '';
  return parsed.data.reasoning_content || parsed.data.reasoning || '';
};

/** Some providers drop the opening brace of streamed tool arguments. */
export const repairStreamedArguments = (raw: string): string => {
  const trimmed = raw.trim();
  return trimmed && !trimmed.startsWith('{') ? `{${trimmed}` : trimmed;
};

type PendingToolCall = { id: string; name: string; arguments: string };

/**
 * Folds SDK chunks into completion deltas. Tool-call fragments are assembled
 * by index and released in index order when the stream finishes.
 */
export async function* assembleCompletionStream(
  chunks: AsyncIterable<OpenAI.Chat.ChatCompletionChunk>,
  signal?: AbortSignal,
): AsyncGenerator<CompletionDelta> {
  const pending = new Map<number, PendingToolCall>();

  function* releaseToolCalls(): Generator<CompletionDelta> {
    const indexes = [...pending.keys()].sort((a, b) => a - b);
    for (const index of indexes) {
      const call = pending.get(index);
      if (!call) continue;
      yield {
        type: 'tool_call',
        id: call.id,
        index,
        name: call.name,
        arguments: repairStreamedArguments(call.arguments),
      };
    }
    pending.clear();
  }

  try {
    for await (const chunk of chunks) {
      if (signal?.aborted) {
        yield { type: 'cancelled' };
        return;
      }
      const choice = chunk.choices[0];
      if (!choice) continue;
      const delta = choice.delta;

      if (delta.content) {
        yield { type: 'content', text: delta.content };
      }
      const reasoning = readReasoning(delta);
      if (reasoning) {
        yield { type: 'reasoning', text: reasoning };
      }
      for (const fragment of delta.tool_calls ?? []) {
        const entry = pending.get(fragment.index) ?? { id: '', name: '', arguments: '' };
        if (fragment.id) entry.id = fragment.id;
        if (fragment.function?.name) entry.name = fragment.function.name;
        if (fragment.function?.arguments) entry.arguments += fragment.function.arguments;
        pending.set(fragment.index, entry);
      }

      if (choice.finish_reason) {
        yield* releaseToolCalls();
        yield { type: 'done', finishReason: choice.finish_reason };
        return;
      }
    }
  } catch (error) {
    if (signal?.aborted) {
      yield { type: 'cancelled' };
      return;
    }
    yield { type: 'error', message: describeError(error) };
    return;
  }

  if (signal?.aborted) {
    yield { type: 'cancelled' };
    return;
  }
  yield* releaseToolCalls();
  yield { type: 'done', finishReason: 'stop' };
}

export type OpenRouterEngineOptions = {
  apiKey?: string;
  model?: string;
  baseURL?: string;
  temperature?: number;
  maxTokens?: number;
  reasoning?: boolean;
  api?: CompletionsApi;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
};

export class OpenRouterEngine implements CompletionEngine {
  readonly model: string;
  private readonly api: CompletionsApi;
  private readonly temperature: number;
  private readonly maxTokens: number;
  private readonly reasoning: boolean;
  private readonly sleep?: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(options: OpenRouterEngineOptions = {}) {
    this.model = options.model ?? DEFAULT_OPENROUTER_MODEL;
    this.temperature = options.temperature ?? 0.3;
    this.maxTokens = options.maxTokens ?? 200;
    this.reasoning = options.reasoning ?? true;
    this.sleep = options.sleep;
    this.now = options.now ?? (() => performance.now());
    if (options.api) {
      this.api = options.api;
    } else {
      if (!options.apiKey) {
        throw new CompletionError('OPENROUTER_API_KEY is not set');
      }
      this.api = createOpenAiCompletionsApi(
        new OpenAI({
          apiKey: options.apiKey,
          baseURL: options.baseURL ?? DEFAULT_OPENROUTER_BASE_URL,
          maxRetries: 0,
          timeout: 30_000,
        }),
      );
    }
  }

  private baseRequest(messages: ChatMessage[], tools: ToolDefinition[]) {
    return {
      model: this.model,
      messages: toOpenAiMessages(messages),
      temperature: this.temperature,
      max_tokens: this.maxTokens,
      ...(tools.length > 0 ? { tools: toOpenAiTools(tools), tool_choice: 'auto' as const } : {}),
      ...(this.reasoning ? { reasoning: { enabled: true } } : {}),
    };
  }

  async chat(messages: ChatMessage[], tools: ToolDefinition[]): Promise<CompletionResult> {
    const body: CompletionRequest = { ...this.baseRequest(messages, tools), stream: false };
    const startedAt = this.now();
    let response: OpenAI.Chat.ChatCompletion;
    try {
      response = await withProviderRetry(() => this.api.create(body), {
        sleep: this.sleep,
        onRetry: ({ delayMs }) => logger.warn('rate limited; retrying once', { delayMs }),
      });
    } catch (error) {
      const status = collectStatusCodes(error)[0] ?? null;
      throw new CompletionError(`OpenRouter error: ${describeError(error)}`, status, { cause: error });
    }
    const latencyMs = this.now() - startedAt;

    const message = response.choices[0]?.message;
    if (!message) {
      throw new CompletionError('OpenRouter returned no choices');
    }
    const toolCalls: ToolCallRecord[] = (message.tool_calls ?? []).map((call) => ({
      id: call.id,
      name: call.function.name,
      arguments: call.function.arguments,
    }));
    const reasoning = readReasoning(message);
    return {
      content: message.content ?? '',
      toolCalls,
      ...(reasoning ? { reasoning } : {}),
      latencyMs,
    };
  }

  async *chatStream(
    messages: ChatMessage[],
    tools: ToolDefinition[],
    signal?: AbortSignal,
  ): AsyncGenerator<CompletionDelta> {
    const body: StreamingCompletionRequest = { ...this.baseRequest(messages, tools), stream: true };
    let chunks: AsyncIterable<OpenAI.Chat.ChatCompletionChunk>;
    try {
      chunks = await this.api.stream(body, signal);
    } catch (error) {
      if (signal?.aborted) {
        yield { type: 'cancelled' };
        return;
      }
      logger.error('stream request failed', describeError(error));
      yield { type: 'error', message: describeError(error) };
      return;
    }
    yield* assembleCompletionStream(chunks, signal);
  }
}
