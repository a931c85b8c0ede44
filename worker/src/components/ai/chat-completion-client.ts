import { z } from 'zod';
import { ValidationError, fromHttpResponse, type HttpClient } from '@flowgraph/component-sdk';

import { UsageSchema, parseJsonBody, type ChatMessage, type Usage } from './chat-messages';

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  max_tokens: number;
}

const ChatCompletionResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullable().default(''),
      }),
    }),
  ),
  usage: UsageSchema.optional(),
});

export interface ChatCompletion {
  content: string;
  usage?: Usage;
}

/**
 * OpenAI-compatible chat completion. `apiUrl` is the full endpoint, the body
 * is sent as is with bearer auth.
 */
export async function requestChatCompletion(
  http: HttpClient,
  apiUrl: string,
  apiKey: string,
  body: ChatCompletionRequest,
): Promise<ChatCompletion> {
  const response = await http.fetchText(apiUrl, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      Authorization: `Bearer ${apiKey}`,
    },
    body: JSON.stringify(body),
  });

  const text = response.body;
  if (!response.ok) {
    throw fromHttpResponse(response, text, 'Chat completion');
  }

  const parsed = ChatCompletionResponseSchema.safeParse(parseJsonBody(text));
  const choice = parsed.success ? parsed.data.choices[0] : undefined;
  if (!parsed.success || !choice) {
    throw new ValidationError('Chat completion response contained no message', { details: { body: text } });
  }

  return {
    content: choice.message.content ?? '',
    usage: parsed.data.usage,
  };
}
