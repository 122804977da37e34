import { Document } from '@langchain/core/documents';

function isDocumentLike(value: unknown): value is { pageContent: string; metadata?: unknown } {
  return typeof value === 'object' && value !== null
    && 'pageContent' in value && typeof value.pageContent === 'string';
}

function toMetadata(value: unknown): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return {};
  return { ...value };
}

/**
 * Accept a list of documents produced upstream (or supplied as plain
 * `{ pageContent, metadata }` objects). Returns null for anything else.
 */
export function toDocuments(value: unknown): Document[] | null {
  if (!Array.isArray(value) || !value.every(isDocumentLike)) return null;
  return value.map((item) =>
    item instanceof Document
      ? item
      : new Document({ pageContent: item.pageContent, metadata: toMetadata(item.metadata) }),
  );
}

/**
 * 0-based page number recorded by the PDF loader, if any
 */
export function pageOf(document: Document): number | undefined {
  const page: unknown = document.metadata.page;
  return typeof page === 'number' && Number.isInteger(page) ? page : undefined;
}
