export interface Attachment {
  name: string;
  type?: string;
  url?: string;
  content?: string;
}

export interface AssignmentKey {
  email: string;
  taskId: string;
  round: number;
}

export interface Task extends AssignmentKey {
  nonce: string;
  templateId: string;
  brief: string;
  // Descriptors as the template wrote them; parseChecks turns them into runnable checks.
  checks: unknown[];
  attachments: Attachment[];
  evaluationUrl: string;
  endpoint: string;
  secret: string;
  dispatchStatus: number | null;
  dispatchError: string | null;
  createdAt: number;
}

export type NewTask = Omit<Task, 'createdAt'> & { createdAt?: number };

export interface Submission extends AssignmentKey {
  nonce: string;
  repoUrl: string;
  commitSha: string;
  pagesUrl: string;
  receivedAt: number;
}

export type NewSubmission = Omit<Submission, 'receivedAt'> & { receivedAt?: number };

export interface Result extends AssignmentKey {
  repoUrl: string;
  commitSha: string;
  pagesUrl: string;
  checkName: string;
  score: number;
  reason: string;
  logs: string;
  createdAt: number;
}

export type NewResult = Omit<Result, 'createdAt'> & { createdAt?: number };

export interface Deployment {
  taskId: string;
  round: number;
  repoUrl: string;
  commitSha: string;
  pagesUrl: string;
  files: Record<string, string>;
  updatedAt: number;
}

export interface BatchSummary {
  processed: number;
  skipped: number;
  failed: number;
  total: number;
}
