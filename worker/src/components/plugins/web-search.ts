import { ValidationError, type ComponentHandler } from '@flowgraph/component-sdk';
import type { PluginComponent } from '@flowgraph/shared';

export interface WebSearchResult {
  title: string;
  url: string;
  snippet: string;
}

/**
 * Offline web search: answers every query with two canned results so
 * workflows can be wired and exercised without a search provider.
 */
export const webSearchPlugin: ComponentHandler<PluginComponent> = async (_component, inputs, context) => {
  const query = typeof inputs.query === 'string' ? inputs.query.trim() : '';
  if (!query) {
    throw new ValidationError('No query provided', {
      fieldErrors: { query: ['A non-empty query string is required'] },
    });
  }

  context.emitProgress(`Searching for "${query}"`);

  const results: WebSearchResult[] = [
    { title: `Result for ${query} 1`, url: 'https://example.com/1', snippet: `This is a result for ${query}` },
    { title: `Result for ${query} 2`, url: 'https://example.com/2', snippet: `Another result for ${query}` },
  ];

  return { results };
};
