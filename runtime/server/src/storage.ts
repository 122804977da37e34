import { asc, desc, eq } from 'drizzle-orm';
import {
  connections,
  nodes,
  workflows,
  type ConnectionRecord,
  type InsertConnection,
  type InsertNode,
  type InsertWorkflow,
  type NodeRecord,
  type WorkflowRecord,
} from '../../shared/schema.js';
import type { RuntimeDatabase } from './db.js';

export type WorkflowUpdate = Partial<Pick<InsertWorkflow, 'name' | 'description' | 'customPrompt'>>;

export interface StoredWorkflow {
  workflow: WorkflowRecord;
  nodes: NodeRecord[];
  connections: ConnectionRecord[];
}

export interface IStorage {
  // Workflows
  listWorkflows(): Promise<WorkflowRecord[]>;
  getWorkflow(id: string): Promise<WorkflowRecord | undefined>;
  createWorkflow(workflow: InsertWorkflow): Promise<WorkflowRecord>;
  updateWorkflow(id: string, update: WorkflowUpdate): Promise<WorkflowRecord | undefined>;
  deleteWorkflow(id: string): Promise<boolean>;
  loadWorkflow(id: string): Promise<StoredWorkflow | undefined>;

  // Nodes
  getNodes(workflowId: string): Promise<NodeRecord[]>;
  createNode(node: InsertNode): Promise<NodeRecord>;
  updateNodeConfig(id: string, config: Record<string, unknown>): Promise<NodeRecord | undefined>;
  updateNodePosition(id: string, x: number, y: number): Promise<NodeRecord | undefined>;
  deleteNode(id: string): Promise<boolean>;

  // Connections
  getConnections(workflowId: string): Promise<ConnectionRecord[]>;
  createConnection(connection: InsertConnection): Promise<ConnectionRecord>;
  deleteConnection(id: string): Promise<boolean>;
}

export class DatabaseStorage implements IStorage {
  constructor(private readonly db: RuntimeDatabase) {}

  // Workflows
  async listWorkflows(): Promise<WorkflowRecord[]> {
    return this.db.select().from(workflows).orderBy(desc(workflows.createdAt));
  }

  async getWorkflow(id: string): Promise<WorkflowRecord | undefined> {
    const [workflow] = await this.db.select().from(workflows).where(eq(workflows.id, id));
    return workflow;
  }

  async createWorkflow(workflow: InsertWorkflow): Promise<WorkflowRecord> {
    const now = new Date();
    const [created] = await this.db.insert(workflows).values({
      id: workflow.id,
      name: workflow.name,
      description: workflow.description ?? '',
      customPrompt: workflow.customPrompt ?? '',
      createdAt: now,
      updatedAt: now,
    }).returning();
    return created;
  }

  async updateWorkflow(id: string, update: WorkflowUpdate): Promise<WorkflowRecord | undefined> {
    const [updated] = await this.db
      .update(workflows)
      .set({ ...update, updatedAt: new Date() })
      .where(eq(workflows.id, id))
      .returning();
    return updated;
  }

  async deleteWorkflow(id: string): Promise<boolean> {
    await this.db.delete(connections).where(eq(connections.workflowId, id));
    await this.db.delete(nodes).where(eq(nodes.workflowId, id));
    const deleted = await this.db.delete(workflows).where(eq(workflows.id, id)).returning();
    return deleted.length > 0;
  }

  async loadWorkflow(id: string): Promise<StoredWorkflow | undefined> {
    const workflow = await this.getWorkflow(id);
    if (!workflow) return undefined;
    return {
      workflow,
      nodes: await this.getNodes(id),
      connections: await this.getConnections(id),
    };
  }

  // Nodes
  async getNodes(workflowId: string): Promise<NodeRecord[]> {
    return this.db.select().from(nodes).where(eq(nodes.workflowId, workflowId)).orderBy(asc(nodes.seq));
  }

  async createNode(node: InsertNode): Promise<NodeRecord> {
    const [created] = await this.db.insert(nodes).values({
      id: node.id,
      workflowId: node.workflowId,
      nodeType: node.nodeType,
      config: node.config,
      positionX: node.positionX ?? '0',
      positionY: node.positionY ?? '0',
      createdAt: new Date(),
    }).returning();
    return created;
  }

  async updateNodeConfig(id: string, config: Record<string, unknown>): Promise<NodeRecord | undefined> {
    const [updated] = await this.db.update(nodes).set({ config }).where(eq(nodes.id, id)).returning();
    return updated;
  }

  async updateNodePosition(id: string, x: number, y: number): Promise<NodeRecord | undefined> {
    const [updated] = await this.db
      .update(nodes)
      .set({ positionX: String(x), positionY: String(y) })
      .where(eq(nodes.id, id))
      .returning();
    return updated;
  }

  async deleteNode(id: string): Promise<boolean> {
    await this.db.delete(connections).where(eq(connections.sourceNodeId, id));
    await this.db.delete(connections).where(eq(connections.targetNodeId, id));
    const deleted = await this.db.delete(nodes).where(eq(nodes.id, id)).returning();
    return deleted.length > 0;
  }

  // Connections
  async getConnections(workflowId: string): Promise<ConnectionRecord[]> {
    return this.db
      .select()
      .from(connections)
      .where(eq(connections.workflowId, workflowId))
      .orderBy(asc(connections.seq));
  }

  async createConnection(connection: InsertConnection): Promise<ConnectionRecord> {
    const [created] = await this.db.insert(connections).values({
      ...connection,
      createdAt: new Date(),
    }).returning();
    return created;
  }

  async deleteConnection(id: string): Promise<boolean> {
    const deleted = await this.db.delete(connections).where(eq(connections.id, id)).returning();
    return deleted.length > 0;
  }
}
