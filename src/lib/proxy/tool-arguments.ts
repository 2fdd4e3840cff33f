import { z } from 'zod';

export const PROXY_TOOL_NAMES = [
  'interrupt_agent',
  'set_task_buffer',
  'clear_task_buffer',
  'append_task_buffer',
  'patch_task_buffer',
  'queue_buffered_task',
] as const;

export type ProxyToolName = (typeof PROXY_TOOL_NAMES)[number];

export type ParsedToolCall =
  | { name: 'interrupt_agent' }
  | { name: 'set_task_buffer'; task: string }
  | { name: 'clear_task_buffer' }
  | { name: 'append_task_buffer'; text: string }
  | { name: 'patch_task_buffer'; find: string; replace: string; count: number }
  | { name: 'queue_buffered_task' }
  | { name: 'unknown'; toolName: string };

const isProxyToolName = (value: string): value is ProxyToolName =>
  (PROXY_TOOL_NAMES as readonly string[]).includes(value);

const looseText = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value))
  .catch('');

const looseCount = z.coerce.number().int().min(0).catch(0);

const taskArgsSchema = z.object({ task: looseText.default('') });
const textArgsSchema = z.object({ text: looseText.default('') });
const patchArgsSchema = z.object({
  find: looseText.default(''),
  replace: looseText.default(''),
  count: looseCount.default(0),
});

// Special-token wrappers some chat templates leak into tool arguments.
const DECORATION_TOKEN_RE = /<\|[^|>]*\|>/g;

/**
 * Best-effort cleanup of model-produced argument text: drops special tokens,
 * restores a missing opening brace and cuts trailing garbage after the last
 * closing brace.
 */
export const cleanArgumentText = (raw: string): string => {
  let text = raw.replace(DECORATION_TOKEN_RE, '').trim();
  if (!text) return '';
  if (!text.startsWith('{') && !text.startsWith('[') && text.includes('}')) {
    text = `{${text}`;
  }
  const lastBrace = text.lastIndexOf('}');
  if (text.startsWith('{') && lastBrace >= 0) {
    text = text.slice(0, lastBrace + 1);
  }
  return text;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  Boolean(value) && typeof value === 'object' && !Array.isArray(value);

export type LooseArguments =
  | { kind: 'object'; value: Record<string, unknown> }
  | { kind: 'text'; value: string };

export const parseLooseArguments = (raw: string): LooseArguments => {
  const cleaned = cleanArgumentText(raw);
  if (!cleaned) return { kind: 'object', value: {} };
  try {
    const parsed: unknown = JSON.parse(cleaned);
    if (isRecord(parsed)) return { kind: 'object', value: parsed };
    if (typeof parsed === 'string') return { kind: 'text', value: parsed };
  } catch {
    // fall through to literal text
  }
  return { kind: 'text', value: raw.replace(DECORATION_TOKEN_RE, '').trim() };
};

/**
 * Task strings sometimes arrive as JSON themselves (`{"task": "..."}` or a
 * quoted string). Unwraps those; anything else is returned trimmed.
 */
export const normalizeTaskText = (value: string): string => {
  const trimmed = value.trim();
  if (!trimmed) return '';
  const looksJson =
    (trimmed.startsWith('{') && trimmed.endsWith('}')) ||
    (trimmed.startsWith('"') && trimmed.endsWith('"'));
  if (!looksJson) return trimmed;
  try {
    const parsed: unknown = JSON.parse(trimmed);
    if (typeof parsed === 'string') return normalizeTaskText(parsed);
    if (isRecord(parsed)) {
      for (const key of ['task', 'text', 'content']) {
        const inner = parsed[key];
        if (typeof inner === 'string') return normalizeTaskText(inner);
      }
    }
  } catch {
    // not JSON after all
  }
  return trimmed;
};

/** Turns a raw tool call into its typed variant; never throws. */
export const parseToolCall = (name: string, rawArguments: string): ParsedToolCall => {
  const toolName = name.trim();
  if (!isProxyToolName(toolName)) return { name: 'unknown', toolName };

  const loose = parseLooseArguments(rawArguments);
  const objectArgs = loose.kind === 'object' ? loose.value : {};

  switch (toolName) {
    case 'interrupt_agent':
    case 'clear_task_buffer':
    case 'queue_buffered_task':
      return { name: toolName };
    case 'set_task_buffer': {
      const task =
        loose.kind === 'text' ? loose.value : taskArgsSchema.parse(objectArgs).task;
      return { name: toolName, task: normalizeTaskText(task) };
    }
    case 'append_task_buffer': {
      const text =
        loose.kind === 'text' ? loose.value : textArgsSchema.parse(objectArgs).text;
      return { name: toolName, text: normalizeTaskText(text) };
    }
    case 'patch_task_buffer': {
      const args = patchArgsSchema.parse(objectArgs);
      return { name: toolName, find: args.find, replace: args.replace, count: args.count };
    }
  }
};
