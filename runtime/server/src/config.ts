import dotenv from 'dotenv';
dotenv.config();

const DEFAULT_OPENAI_TIMEOUT_SECONDS = 60;

/**
 * OPENAI_TIMEOUT is in seconds and may be fractional; unusable values fall back to 60.
 */
export function parseTimeoutMs(raw: string | undefined): number {
  const seconds = Number.parseFloat(raw ?? '');
  return (Number.isFinite(seconds) && seconds > 0 ? seconds : DEFAULT_OPENAI_TIMEOUT_SECONDS) * 1000;
}

export const config = {
  port: parseInt(process.env.RUNTIME_PORT || process.env.PORT || '8000', 10),
  host: process.env.HOST || '0.0.0.0',
  serviceId: process.env.SERVICE_ID || 'runtime',
  serviceName: process.env.SERVICE_NAME || 'RAG Stack Runtime',
  corsOrigins: (process.env.CORS_ALLOWED_ORIGINS || process.env.CORS_ORIGINS || 'http://localhost:3000')
    .split(',')
    .map((origin) => origin.trim().replace(/\/$/, ''))
    .filter(Boolean),
  jsonBodyLimit: process.env.JSON_BODY_LIMIT || '25mb',

  // Provider credentials; node types that need a missing one cannot be created
  providers: {
    openaiApiKey: process.env.OPENAI_API_KEY || '',
    openaiTimeoutMs: parseTimeoutMs(process.env.OPENAI_TIMEOUT),
    serpApiKey: process.env.SERPAPI_KEY || '',
    braveApiKey: process.env.BRAVE_API_KEY || '',
  },

  runtime: {
    // Executions running at once across all workflows
    maxConcurrentExecutions: parseInt(process.env.MAX_CONCURRENT_EXECUTIONS || '100', 10),
    // Completed executions kept in memory for /api/executions
    executionHistoryLimit: parseInt(process.env.EXECUTION_HISTORY_LIMIT || '50', 10),
  },
};
