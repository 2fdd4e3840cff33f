import type OpenAI from 'openai';
import type { ChatMessage, ToolDefinition } from '../proxy/types';

export const toOpenAiMessages = (
  messages: readonly ChatMessage[],
): OpenAI.Chat.ChatCompletionMessageParam[] =>
  messages.map((message): OpenAI.Chat.ChatCompletionMessageParam => {
    switch (message.role) {
      case 'system':
        return { role: 'system', content: message.content };
      case 'user':
        return { role: 'user', content: message.content };
      case 'assistant':
        if (message.toolCalls && message.toolCalls.length > 0) {
          return {
            role: 'assistant',
            content: message.content || null,
            tool_calls: message.toolCalls.map((call) => ({
              id: call.id,
              type: 'function' as const,
              function: { name: call.name, arguments: call.arguments },
            })),
          };
        }
        return { role: 'assistant', content: message.content };
      case 'tool':
        return { role: 'tool', tool_call_id: message.toolCallId, content: message.content };
    }
  });

export const toOpenAiTools = (tools: readonly ToolDefinition[]): OpenAI.Chat.ChatCompletionTool[] =>
  tools.map((tool) => ({
    type: 'function' as const,
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    },
  }));
