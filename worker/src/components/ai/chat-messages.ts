import { z } from 'zod';
import { ValidationError } from '@flowgraph/component-sdk';

export const ChatMessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant', 'tool']),
  content: z.string(),
});

export type ChatMessage = z.infer<typeof ChatMessageSchema>;

const ChatHistorySchema = z.array(ChatMessageSchema);

export const UsageSchema = z.record(z.string(), z.unknown());

export type Usage = z.infer<typeof UsageSchema>;

export function parseHistory(value: unknown): ChatMessage[] {
  if (value === undefined || value === null) {
    return [];
  }
  const parsed = ChatHistorySchema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError('History must be a list of {role, content} messages', {
      fieldErrors: {
        history: parsed.error.issues.map((issue) => `${issue.path.join('.') || 'history'}: ${issue.message}`),
      },
    });
  }
  return parsed.data;
}

export function toMessageText(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') return value;
  return JSON.stringify(value);
}

export function parseJsonBody(text: string): unknown {
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
