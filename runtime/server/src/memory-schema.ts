export const MEMORY_SCHEMA_SQL = `
CREATE TABLE "workflows" (
  "id" varchar PRIMARY KEY NOT NULL,
  "name" text NOT NULL,
  "description" text NOT NULL DEFAULT '',
  "custom_prompt" text NOT NULL DEFAULT '',
  "created_at" timestamp DEFAULT now() NOT NULL,
  "updated_at" timestamp DEFAULT now() NOT NULL
);

CREATE TABLE "nodes" (
  "id" varchar PRIMARY KEY NOT NULL,
  "seq" serial NOT NULL,
  "workflow_id" varchar NOT NULL REFERENCES "workflows"("id") ON DELETE CASCADE,
  "node_type" varchar(50) NOT NULL,
  "config" jsonb NOT NULL,
  "position_x" text NOT NULL DEFAULT '0',
  "position_y" text NOT NULL DEFAULT '0',
  "created_at" timestamp DEFAULT now() NOT NULL
);

CREATE TABLE "connections" (
  "id" varchar PRIMARY KEY NOT NULL,
  "seq" serial NOT NULL,
  "workflow_id" varchar NOT NULL REFERENCES "workflows"("id") ON DELETE CASCADE,
  "source_node_id" varchar NOT NULL REFERENCES "nodes"("id") ON DELETE CASCADE,
  "source_output" varchar(100) NOT NULL,
  "target_node_id" varchar NOT NULL REFERENCES "nodes"("id") ON DELETE CASCADE,
  "target_input" varchar(100) NOT NULL,
  "created_at" timestamp DEFAULT now() NOT NULL
);

CREATE INDEX "idx_nodes_workflow" ON "nodes" ("workflow_id");
CREATE INDEX "idx_connections_workflow" ON "connections" ("workflow_id");
`;
