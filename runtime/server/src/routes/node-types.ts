/**
 * Node Type Routes
 *
 * Catalog of placeable node types and the config fields the editor renders.
 */

import { Router } from 'express';
import { CONFIG_FIELDS, defaultConfig, isNodeType, NODE_CATALOG, NODE_TYPES } from '../nodes/index.js';
import { getParamId } from './helpers.js';

export function createNodeTypeRoutes(): Router {
  const router = Router();

  /**
   * GET /api/node-types
   */
  router.get('/', (_req, res) => {
    res.json({
      nodeTypes: NODE_TYPES.map((nodeType) => ({
        ...NODE_CATALOG[nodeType],
        defaultConfig: defaultConfig(nodeType),
      })),
    });
  });

  /**
   * Config field descriptors; unknown types get an empty list
   * GET /api/node-types/:type/schema
   */
  router.get('/:type/schema', (req, res) => {
    const nodeType = getParamId(req.params, 'type');
    res.json({
      nodeType,
      fields: isNodeType(nodeType) ? CONFIG_FIELDS[nodeType] : [],
    });
  });

  return router;
}
