/**
 * Node Catalog
 *
 * Role, ports and description of every node type the editor can place.
 */

import type { NodeRole, PortName } from '../types/index.js';

export const NODE_TYPES = [
  'pdf_loader',
  'text_splitter',
  'embeddings',
  'vector_store',
  'qa_chain',
  'web_search',
] as const;

export type NodeType = typeof NODE_TYPES[number];

export interface NodeTypeDescriptor {
  nodeType: NodeType;
  role: NodeRole;
  label: string;
  description: string;
  inputs: readonly PortName[];
  outputs: readonly PortName[];
}

export const NODE_CATALOG: Record<NodeType, NodeTypeDescriptor> = {
  pdf_loader: {
    nodeType: 'pdf_loader',
    role: 'ingestion',
    label: 'PDF Loader',
    description: 'Extracts one document per page from an uploaded PDF',
    inputs: ['file_content'],
    outputs: ['documents'],
  },
  text_splitter: {
    nodeType: 'text_splitter',
    role: 'chunking',
    label: 'Text Splitter',
    description: 'Splits documents into overlapping chunks',
    inputs: ['documents'],
    outputs: ['chunks'],
  },
  embeddings: {
    nodeType: 'embeddings',
    role: 'embedding',
    label: 'Embeddings',
    description: 'Embeds a single text',
    inputs: ['text'],
    outputs: ['embeddings'],
  },
  vector_store: {
    nodeType: 'vector_store',
    role: 'indexing',
    label: 'Vector Store',
    description: 'Indexes documents in an in-memory vector store',
    inputs: ['documents', 'embeddings'],
    outputs: ['vector_store', 'retriever'],
  },
  qa_chain: {
    nodeType: 'qa_chain',
    role: 'retrieval-answering',
    label: 'QA Chain',
    description: 'Answers a question from retrieved context',
    inputs: ['retriever', 'question', 'custom_prompt'],
    outputs: ['answer', 'sources'],
  },
  web_search: {
    nodeType: 'web_search',
    role: 'search',
    label: 'Web Search',
    description: 'Searches the web through SerpAPI or Brave',
    inputs: ['query'],
    outputs: ['search_results'],
  },
};

export function isNodeType(value: string): value is NodeType {
  return NODE_TYPES.some((nodeType) => nodeType === value);
}
