/**
 * Public API for agent-tail-core.
 *
 * @module index
 */

// Record model
export type {
  SessionRecordType,
  SessionRecord,
  AssistantRecord,
  UserRecord,
  SystemRecord,
  SummaryRecord,
  FileHistorySnapshotRecord,
  AssistantContentBlock,
  UserContentBlock,
  ToolUseBlock,
  ToolResultBlock,
  TextBlock,
  ThinkingBlock,
  TokenUsage,
  TodoItem,
  ToolExecutionMetadata,
  FileBackup,
} from './types/sessionRecord';
export {
  createEmptyTokenUsage,
  getTotalTokens,
  getTotalInputContext,
  getCacheHitRate,
  isRecordOfType,
} from './types/sessionRecord';

// Parsers
export { LineFramer } from './parsers/lineFramer';
export { parseSessionRecord } from './parsers/recordParser';
export type { RecordContext } from './parsers/recordParser';
export { JsonlParser } from './parsers/jsonl';
export type { JsonlParserCallbacks } from './parsers/jsonl';

// Monitoring
export { SessionMonitor } from './watchers/sessionMonitor';
export { FileDiscovery } from './watchers/fileDiscovery';
export type { DiscoveredFile, FileDiscoveryCallbacks, FileDiscoveryOptions, KnownFile } from './watchers/fileDiscovery';
export { EventBus } from './watchers/eventBus';
export type { Unsubscribe } from './watchers/eventBus';
export { Deduplicator, getSeenKey, DEFAULT_DEDUP_CAPACITY } from './watchers/deduplicator';
export { toActivities } from './watchers/activityBridge';
export type { MonitorState, TrackedFileInfo, Activity, ActivityType } from './watchers/types';

// Aggregation
export { SessionAggregator } from './aggregation/SessionAggregator';
export type { RecordSource } from './aggregation/SessionAggregator';
export type {
  SessionStats,
  ToolCorrelation,
  PendingToolCall,
  ToolUsageStats,
  ModelUsageStats,
  SubAgentGroup,
  SystemEntry,
  SummaryEntry,
} from './aggregation/types';

// Configuration
export {
  MonitorOptionsSchema,
  resolveMonitorOptions,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_CREATION_TOLERANCE_SECONDS,
  DEFAULT_MAX_READ_BYTES,
} from './config/options';
export type { MonitorOptions, MonitorOptionsInput, ResolvedMonitorOptions } from './config/options';

// Logging
export { createLogger } from './logger';
export type { Logger, LogLevel } from './logger';

// Errors
export {
  AgentTailError,
  FileReadError,
  RecordParseError,
  WatchSetupError,
  SubscriberError,
  InvalidOptionsError,
  isTransientIoError,
} from './errors';
export type { AgentTailErrorKind } from './errors';

// Paths
export {
  getLogRoot,
  sanitizeProjectPath,
  getProjectDirectory,
  findSessionFile,
  isSubagentFile,
  getAgentIdFromFile,
} from './paths';
