import { ConfigurationError, type ComponentExecutor } from '@flowgraph/component-sdk';
import type { AgentComponent } from '@flowgraph/shared';

import { callAgentService } from './agent-service-client';
import { requestChatCompletion } from './chat-completion-client';
import { parseHistory, toMessageText, type ChatMessage } from './chat-messages';

export const DEFAULT_AGENT_SERVICE_URL = 'http://localhost:5000';
export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_MAX_TOKENS = 1500;

export interface AgentSettings {
  agentId?: string;
  apiUrl?: string;
  apiKey?: string;
  model?: string;
  systemPrompt?: string;
  temperature: number;
  maxTokens: number;
}

export interface AgentExecutorOptions {
  /** Used when the run context carries no `agent_service_url`. */
  agentServiceUrl?: string;
}

function configString(component: AgentComponent, key: string): string | undefined {
  const value = component.config[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function configNumber(component: AgentComponent, key: string): number | undefined {
  const value = component.config[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/** Agent settings may live on the component or inside its `config`; the component wins. */
export function resolveAgentSettings(component: AgentComponent): AgentSettings {
  return {
    agentId: component.agent_id ?? configString(component, 'agent_id'),
    apiUrl: component.api_url ?? configString(component, 'api_url'),
    apiKey: component.api_key ?? configString(component, 'api_key'),
    model: component.model ?? configString(component, 'model'),
    systemPrompt: component.system_prompt ?? configString(component, 'system_prompt'),
    temperature: component.temperature ?? configNumber(component, 'temperature') ?? DEFAULT_TEMPERATURE,
    maxTokens: component.max_tokens ?? configNumber(component, 'max_tokens') ?? DEFAULT_MAX_TOKENS,
  };
}

export function buildChatMessages(
  systemPrompt: string | undefined,
  history: ChatMessage[],
  message: string,
): ChatMessage[] {
  const messages: ChatMessage[] = [];
  if (systemPrompt) {
    messages.push({ role: 'system', content: systemPrompt });
  }
  messages.push(...history);
  messages.push({ role: 'user', content: message });
  return messages;
}

/**
 * Agent components either delegate to a named agent of the agent service or
 * call an OpenAI-compatible endpoint directly.
 */
export function createAgentExecutor(options: AgentExecutorOptions = {}): ComponentExecutor<AgentComponent> {
  const fallbackServiceUrl = options.agentServiceUrl ?? DEFAULT_AGENT_SERVICE_URL;

  return {
    async execute(component, inputs, context) {
      const message = toMessageText(inputs.message);
      const history = parseHistory(inputs.history);
      const settings = resolveAgentSettings(component);

      if (settings.agentId) {
        const serviceUrl =
          typeof context.values.agent_service_url === 'string' && context.values.agent_service_url
            ? context.values.agent_service_url
            : fallbackServiceUrl;

        context.logger.info(`[Agent] Calling agent ${settings.agentId} via ${serviceUrl}`);
        const reply = await callAgentService(context.http, serviceUrl, {
          message,
          history,
          agent_id: settings.agentId,
        });

        return reply.usage
          ? { message: reply.message, agent_id: settings.agentId, usage: reply.usage }
          : { message: reply.message, agent_id: settings.agentId };
      }

      if (settings.apiUrl && settings.apiKey && settings.model) {
        context.logger.info(`[Agent] Requesting chat completion from model ${settings.model}`);
        const completion = await requestChatCompletion(context.http, settings.apiUrl, settings.apiKey, {
          model: settings.model,
          messages: buildChatMessages(settings.systemPrompt, history, message),
          temperature: settings.temperature,
          max_tokens: settings.maxTokens,
        });

        const output: Record<string, unknown> = {
          message: completion.content,
          role: 'assistant',
          model: settings.model,
        };
        if (completion.usage) {
          output.usage = completion.usage;
        }
        return output;
      }

      throw new ConfigurationError('No agent configuration provided', {
        details: { expected: ['agent_id', 'api_url + api_key + model'] },
      });
    },
  };
}
