/**
 * Typed record model for agent session logs.
 *
 * Every JSONL line the agent writes becomes at most one SessionRecord.
 * Records are a tagged union on `type`; nested message content is parsed
 * into ordered content blocks so consumers never touch raw JSON.
 *
 * @module types/sessionRecord
 */

export type SessionRecordType = 'assistant' | 'user' | 'system' | 'summary' | 'file-history-snapshot';

// ── Content blocks ──

export interface ToolUseBlock {
  type: 'tool_use';
  /** Null when the log omitted it; such a call is never correlated. */
  id: string | null;
  /** `unknown` when the log omitted it. */
  name: string;
  /** Tool input exactly as logged; not validated. */
  input: unknown;
}

export interface TextBlock {
  type: 'text';
  text: string;
}

export interface ThinkingBlock {
  type: 'thinking';
  text: string;
}

export interface ToolResultBlock {
  type: 'tool_result';
  /** Null when the log omitted it; the result then counts as an orphan. */
  toolUseId: string | null;
  /** String output, or the raw block array for structured results. */
  content: unknown;
  isError: boolean;
}

export type AssistantContentBlock = ToolUseBlock | TextBlock | ThinkingBlock;
export type UserContentBlock = ToolResultBlock | TextBlock;

// ── Usage ──

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  cacheReadTokens: number;
  cacheCreationTokens: number;
  webSearchRequests: number;
  webFetchRequests: number;
}

export function createEmptyTokenUsage(): TokenUsage {
  return {
    inputTokens: 0,
    outputTokens: 0,
    cacheReadTokens: 0,
    cacheCreationTokens: 0,
    webSearchRequests: 0,
    webFetchRequests: 0,
  };
}

/** Input plus output tokens. */
export function getTotalTokens(usage: TokenUsage): number {
  return usage.inputTokens + usage.outputTokens;
}

/** Tokens the model actually saw as input, cached or not. */
export function getTotalInputContext(usage: TokenUsage): number {
  return usage.inputTokens + usage.cacheReadTokens;
}

/** Share of input context served from cache, 0 when there is no input. */
export function getCacheHitRate(usage: TokenUsage): number {
  const total = usage.inputTokens + usage.cacheReadTokens;
  return total > 0 ? usage.cacheReadTokens / total : 0;
}

// ── Records ──

interface RecordBase {
  timestamp: string;
  sessionId: string | null;
  uuid: string | null;
  parentUuid: string | null;
  /** Only set for records written by a sub-agent. */
  agentId?: string;
  isSubAgent: boolean;
  /** Absolute path of the log file the line was read from. */
  sourceFile?: string;
}

export interface AssistantRecord extends RecordBase {
  type: 'assistant';
  messageId: string | null;
  requestId: string | null;
  model: string | null;
  content: AssistantContentBlock[];
  usage: TokenUsage | null;
  stopReason: string | null;
  /** The response was cut short by a length or context limit. */
  truncated?: boolean;
}

export interface TodoItem {
  content: string;
  status: string;
  activeForm?: string;
}

export interface ToolExecutionMetadata {
  hasStdout: boolean;
  hasStderr: boolean;
  interrupted: boolean;
  isImage: boolean;
}

export interface UserRecord extends RecordBase {
  type: 'user';
  content: string | UserContentBlock[];
  todos?: TodoItem[];
  toolExecution?: ToolExecutionMetadata;
}

export interface SystemRecord extends RecordBase {
  type: 'system';
  subtype: string | null;
  level: string | null;
  content: string | null;
  durationMs: number | null;
}

export interface SummaryRecord extends RecordBase {
  type: 'summary';
  summary: string;
  leafUuid: string | null;
}

export interface FileBackup {
  filePath: string;
  backupFileName: string | null;
  version: number | null;
  backupTime: string | null;
}

export interface FileHistorySnapshotRecord extends RecordBase {
  type: 'file-history-snapshot';
  messageId: string | null;
  isSnapshotUpdate: boolean;
  backups: FileBackup[];
}

export type SessionRecord =
  | AssistantRecord
  | UserRecord
  | SystemRecord
  | SummaryRecord
  | FileHistorySnapshotRecord;

/** Narrows a record to one variant. */
export function isRecordOfType<T extends SessionRecordType>(
  record: SessionRecord,
  type: T,
): record is Extract<SessionRecord, { type: T }> {
  return record.type === type;
}
