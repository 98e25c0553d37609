/**
 * Aggregated statistics output types for SessionAggregator.
 *
 * @module aggregation/types
 */

import type {
  FileBackup,
  SessionRecordType,
  SummaryRecord,
  SystemRecord,
  TodoItem,
  TokenUsage,
} from '../types/sessionRecord';

/** A tool call and, once it arrives, its result. */
export interface ToolCorrelation {
  toolUseId: string;
  toolName: string;
  callTimestamp: string;
  resultTimestamp: string | null;
  /** Result minus call, never negative; null until completed. */
  durationMs: number | null;
  /** `!isError` of the result; null until completed. */
  success: boolean | null;
  agentId?: string;
}

/** A tool call still waiting for its result. */
export interface PendingToolCall {
  toolUseId: string;
  toolName: string;
  callTimestamp: string;
  agentId?: string;
}

export interface ToolUsageStats {
  calls: number;
  successes: number;
  failures: number;
  /** Sum of completed-call durations. */
  totalDurationMs: number;
}

export interface ModelUsageStats {
  /** Assistant records that named this model. */
  calls: number;
  tokens: TokenUsage;
}

/** Activity of one sub-agent, keyed by its agent id. */
export interface SubAgentGroup {
  agentId: string;
  recordCount: number;
  toolCalls: number;
  tokens: TokenUsage;
  firstTimestamp: string | null;
  lastTimestamp: string | null;
}

export type SystemEntry = Pick<SystemRecord, 'timestamp' | 'subtype' | 'level' | 'content' | 'durationMs'>;

export type SummaryEntry = Pick<SummaryRecord, 'timestamp' | 'summary' | 'leafUuid'>;

export interface SessionStats {
  sessionId: string | null;
  currentModel: string | null;
  firstTimestamp: string | null;
  lastTimestamp: string | null;
  recordCounts: Record<SessionRecordType, number>;
  toolCallCount: number;
  toolResultCount: number;
  /** Results whose tool-use id matched no pending call. */
  orphanResultCount: number;
  /** Assistant responses cut short by a length or context limit. */
  truncatedResponseCount: number;
  tokens: TokenUsage;
  toolUsage: Record<string, ToolUsageStats>;
  modelUsage: Record<string, ModelUsageStats>;
  correlations: ToolCorrelation[];
  pendingToolCalls: PendingToolCall[];
  backups: FileBackup[];
  modifiedFiles: string[];
  latestTodos: TodoItem[] | null;
  summaries: SummaryEntry[];
  systemEvents: SystemEntry[];
  errors: SystemEntry[];
  subAgents: SubAgentGroup[];
}
