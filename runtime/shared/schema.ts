/**
 * Runtime Service Schema
 *
 * Persisted workflows ("stacks"), their nodes and connections.
 */

import { pgTable, text, varchar, timestamp, jsonb, serial } from 'drizzle-orm/pg-core';
import { createInsertSchema } from 'drizzle-zod';
import { z } from 'zod';

export const workflows = pgTable('workflows', {
  id: varchar('id').primaryKey(),
  name: text('name').notNull(),
  description: text('description').notNull().default(''),
  customPrompt: text('custom_prompt').notNull().default(''),
  createdAt: timestamp('created_at').notNull().defaultNow(),
  updatedAt: timestamp('updated_at').notNull().defaultNow(),
});

export const nodes = pgTable('nodes', {
  id: varchar('id').primaryKey(),
  seq: serial('seq').notNull(),
  workflowId: varchar('workflow_id').notNull().references(() => workflows.id, { onDelete: 'cascade' }),
  nodeType: varchar('node_type', { length: 50 }).notNull(),
  config: jsonb('config').$type<Record<string, unknown>>().notNull(),
  // Stored as text; parsed leniently on load
  positionX: text('position_x').notNull().default('0'),
  positionY: text('position_y').notNull().default('0'),
  createdAt: timestamp('created_at').notNull().defaultNow(),
});

export const connections = pgTable('connections', {
  id: varchar('id').primaryKey(),
  seq: serial('seq').notNull(),
  workflowId: varchar('workflow_id').notNull().references(() => workflows.id, { onDelete: 'cascade' }),
  sourceNodeId: varchar('source_node_id').notNull().references(() => nodes.id, { onDelete: 'cascade' }),
  sourceOutput: varchar('source_output', { length: 100 }).notNull(),
  targetNodeId: varchar('target_node_id').notNull().references(() => nodes.id, { onDelete: 'cascade' }),
  targetInput: varchar('target_input', { length: 100 }).notNull(),
  createdAt: timestamp('created_at').notNull().defaultNow(),
});

export const insertWorkflowSchema = createInsertSchema(workflows).omit({
  createdAt: true,
  updatedAt: true,
});

export const insertNodeSchema = createInsertSchema(nodes, {
  config: z.record(z.unknown()),
}).omit({
  seq: true,
  createdAt: true,
});

export const insertConnectionSchema = createInsertSchema(connections).omit({
  seq: true,
  createdAt: true,
});

export type WorkflowRecord = typeof workflows.$inferSelect;
export type InsertWorkflow = z.infer<typeof insertWorkflowSchema>;
export type NodeRecord = typeof nodes.$inferSelect;
export type InsertNode = z.infer<typeof insertNodeSchema>;
export type ConnectionRecord = typeof connections.$inferSelect;
export type InsertConnection = z.infer<typeof insertConnectionSchema>;
