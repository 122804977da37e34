import { describe, expect, it } from 'vitest';
import {
  ConcurrencyLimitError,
  InvalidNodeConfigError,
  isWorkflowError,
  MissingCredentialError,
  NodeNotFoundError,
  UnknownNodeError,
  UnknownNodeTypeError,
  WorkflowNotFoundError,
} from '../../../runtime/server/src/engine/errors.js';

describe('workflow errors', () => {
  it('map categories to HTTP status codes', () => {
    expect(new UnknownNodeError('n1', 'target').statusCode).toBe(400);
    expect(new UnknownNodeTypeError('csv_loader').statusCode).toBe(400);
    expect(new InvalidNodeConfigError('qa_chain', 'bad').statusCode).toBe(400);
    expect(new MissingCredentialError('OPENAI_API_KEY', 'qa_chain').statusCode).toBe(400);
    expect(new WorkflowNotFoundError('wf').statusCode).toBe(404);
    expect(new NodeNotFoundError('n').statusCode).toBe(404);
    expect(new ConcurrencyLimitError(3).statusCode).toBe(429);
  });

  it('serialize to a response body', () => {
    expect(new UnknownNodeError('n1', 'target').toResponse()).toEqual({
      error: 'Connection references unknown target node: n1',
      code: 'UNKNOWN_NODE',
      category: 'graph_structure',
    });
  });

  it('name the missing environment variable', () => {
    const error = new MissingCredentialError('SERPAPI_KEY', 'web_search');
    expect(error.envVar).toBe('SERPAPI_KEY');
    expect(error.message).toBe('SERPAPI_KEY not configured; cannot create web_search node');
  });

  it('are recognised by isWorkflowError', () => {
    expect(isWorkflowError(new ConcurrencyLimitError(1))).toBe(true);
    expect(isWorkflowError(new Error('plain'))).toBe(false);
  });
});
