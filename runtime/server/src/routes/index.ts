export { createWorkflowRoutes } from './workflows.js';
export { createNodeTypeRoutes } from './node-types.js';
export { createExecutionRoutes } from './executions.js';
