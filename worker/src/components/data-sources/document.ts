import { ValidationError, type ComponentHandler } from '@flowgraph/component-sdk';
import type { DataSourceComponent } from '@flowgraph/shared';

export interface DocumentRecord {
  title: string;
  content: string;
}

/** Stand-in document corpus returning two documents about the query. */
export const documentDataSource: ComponentHandler<DataSourceComponent> = async (_component, inputs, context) => {
  const query = typeof inputs.query === 'string' ? inputs.query.trim() : '';
  if (!query) {
    throw new ValidationError('No query provided', {
      fieldErrors: { query: ['A non-empty query string is required'] },
    });
  }

  context.emitProgress(`Retrieving documents for "${query}"`);

  const documents: DocumentRecord[] = [
    { title: 'Document 1', content: `This document contains information about ${query}` },
    { title: 'Document 2', content: `More information about ${query} in this document` },
  ];

  return { documents };
};
