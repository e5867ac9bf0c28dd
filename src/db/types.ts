import type { ColumnType, Generated } from 'kysely';

type Timestamp = ColumnType<Date, Date | string | undefined, Date | string>;
// jsonb goes in as serialized text; pg hands it back already parsed.
type Json = ColumnType<unknown, string, string>;

export interface TasksTable {
  email: string;
  task_id: string;
  round: number;
  nonce: string;
  template_id: string;
  brief: string;
  checks: Json;
  attachments: Json;
  evaluation_url: string;
  endpoint: string;
  secret: string;
  dispatch_status: number | null;
  dispatch_error: string | null;
  created_at: Timestamp;
}

export interface SubmissionsTable {
  email: string;
  task_id: string;
  round: number;
  nonce: string;
  repo_url: string;
  commit_sha: string;
  pages_url: string;
  received_at: Timestamp;
}

export interface ResultsTable {
  id: Generated<string>;
  email: string;
  task_id: string;
  round: number;
  repo_url: string;
  commit_sha: string;
  pages_url: string;
  check_name: string;
  score: number;
  reason: string;
  logs: string;
  created_at: Timestamp;
}

export interface DeploymentsTable {
  task_id: string;
  round: number;
  repo_url: string;
  commit_sha: string;
  pages_url: string;
  files: Json;
  updated_at: Timestamp;
}

export interface SchemaMigrationsTable {
  filename: string;
  applied_at: Timestamp;
}

export interface DB {
  tasks: TasksTable;
  submissions: SubmissionsTable;
  results: ResultsTable;
  deployments: DeploymentsTable;
  schema_migrations: SchemaMigrationsTable;
}
