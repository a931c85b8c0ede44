import { z } from 'zod';
import { ValidationError, fromHttpResponse, type HttpClient } from '@flowgraph/component-sdk';

import { UsageSchema, parseJsonBody, type ChatMessage } from './chat-messages';

export interface AgentServiceRequest {
  message: string;
  history: ChatMessage[];
  agent_id?: string;
}

const AgentServiceResponseSchema = z.object({
  message: z.string().default(''),
  usage: UsageSchema.optional(),
});

export type AgentServiceResponse = z.infer<typeof AgentServiceResponseSchema>;

export function agentServiceChatUrl(baseUrl: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/chat`;
}

/** `POST {baseUrl}/chat` on the agent service. */
export async function callAgentService(
  http: HttpClient,
  baseUrl: string,
  request: AgentServiceRequest,
): Promise<AgentServiceResponse> {
  const response = await http.fetchText(agentServiceChatUrl(baseUrl), {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(request),
  });

  const text = response.body;
  if (!response.ok) {
    throw fromHttpResponse(response, text, 'Agent service');
  }

  const parsed = AgentServiceResponseSchema.safeParse(parseJsonBody(text));
  if (!parsed.success) {
    throw new ValidationError('Agent service returned an unexpected response', { details: { body: text } });
  }
  return parsed.data;
}
