// src/types.ts

// Pull request webhook delivery, already authenticated by the intake route
export interface ReviewEvent {
  deliveryId: string;
  repositoryId: string; // "owner/name"
  pullRequestNumber: number;
  headCommitSha: string;
  baseCommitSha?: string;
  installationId?: number;
  action: string;
  receivedAt: string;
}

export type JobStatus =
  | 'queued'
  | 'running'
  | 'summarizing'
  | 'reviewing'
  | 'posting'
  | 'completed'
  | 'failed'
  | 'superseded'
  | 'cancelled';

export type TerminalJobStatus = Extract<JobStatus, 'completed' | 'failed' | 'superseded' | 'cancelled'>;
export type ActiveJobStatus = Exclude<JobStatus, TerminalJobStatus>;

export const JOB_STATUSES: readonly JobStatus[] = [
  'queued',
  'running',
  'summarizing',
  'reviewing',
  'posting',
  'completed',
  'failed',
  'superseded',
  'cancelled',
];

const TERMINAL_STATUSES: ReadonlySet<JobStatus> = new Set<JobStatus>([
  'completed',
  'failed',
  'superseded',
  'cancelled',
]);

export function isTerminalStatus(status: JobStatus): status is TerminalJobStatus {
  return TERMINAL_STATUSES.has(status);
}

export function isJobStatus(value: string): value is JobStatus {
  return JOB_STATUSES.some((status) => status === value);
}

export interface ReviewJob {
  jobId: string;
  deliveryId: string;
  repositoryId: string;
  pullRequestNumber: number;
  headCommitSha: string;
  baseCommitSha?: string;
  installationId?: number;
  status: JobStatus;
  createdAt: string;
  attemptCount: number;
  error?: string;
}

export interface PullRequestKey {
  repositoryId: string;
  pullRequestNumber: number;
}

export function pullRequestKey(key: PullRequestKey): string {
  return `${key.repositoryId}#${key.pullRequestNumber}`;
}

export interface HunkRange {
  first: number;
  last: number;
}

export type ChunkKind = 'summary' | 'file';

// Persisted view of a chunk; the content itself is rebuilt from the diff
export interface DiffChunkRecord {
  chunkId: string;
  jobId: string;
  ordinal: number;
  filePath: string | null;
  hunkRange: HunkRange | null;
  tokenEstimate: number;
}

export interface DiffChunk extends DiffChunkRecord {
  kind: ChunkKind;
  /** File header for file chunks; a title line for the summary chunk. */
  header: string;
  /** Hunk texts for file chunks, per-file texts for the summary chunk. */
  sections: string[];
  /** New-side line number → diff position, for the lines this chunk covers. */
  positions: ReadonlyMap<number, number>;
}

export type Severity = 'critical' | 'warning' | 'info';

export type LineAnchor = { kind: 'line'; line: number } | { kind: 'file' };

export interface Finding {
  filePath: string;
  anchor: LineAnchor;
  severity: Severity;
  message: string;
  suggestion?: string;
}

export type PostStatus = 'pending' | 'posted' | 'failed';

export interface ReviewComment {
  jobId: string;
  findingRef: string;
  externalCommentId: string | null;
  postStatus: PostStatus;
  error?: string;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
}

export interface ModelRequest {
  provider: string;
  modelName: string;
  promptTokensEstimate: number;
  maxOutputTokens: number;
  system: string;
  content: string;
  signal?: AbortSignal;
}

export interface ModelResponse {
  findings: Finding[];
  rawText: string;
  tokenUsage: TokenUsage;
}

export type CallOutcome = 'ok' | 'degraded' | 'failed';

export interface GlobalContext {
  text: string;
  outcome: CallOutcome;
  error?: string;
}

export interface ChunkReview {
  chunkId: string;
  ordinal: number;
  filePath: string;
  outcome: CallOutcome;
  findings: Finding[];
  positions: ReadonlyMap<number, number>;
  error?: string;
}

export type SkipReason = 'binary' | 'excluded' | 'no-changes' | 'deleted' | 'oversized-hunk';

export interface SkippedFile {
  filePath: string;
  reason: SkipReason;
  detail?: string;
}
