/**
 * Session statistics engine.
 *
 * Pure computation class (no I/O) that folds SessionRecords into running
 * totals: token and tool usage, tool-call ↔ tool-result correlation,
 * file-history ledgers and per-sub-agent groups. Attach it to a
 * SessionMonitor, or feed it records directly.
 *
 * @module aggregation/SessionAggregator
 */

import type { Unsubscribe } from '../watchers/eventBus';
import { createEmptyTokenUsage } from '../types/sessionRecord';
import type {
  AssistantRecord,
  FileBackup,
  FileHistorySnapshotRecord,
  SessionRecord,
  SessionRecordType,
  SystemRecord,
  TodoItem,
  TokenUsage,
  UserRecord,
} from '../types/sessionRecord';
import type {
  ModelUsageStats,
  PendingToolCall,
  SessionStats,
  SubAgentGroup,
  SummaryEntry,
  SystemEntry,
  ToolCorrelation,
  ToolUsageStats,
} from './types';

/** Anything records can be subscribed from: a SessionMonitor or an EventBus. */
export interface RecordSource {
  subscribe(handler: (record: SessionRecord) => void): Unsubscribe;
}

function createRecordCounts(): Record<SessionRecordType, number> {
  return { assistant: 0, user: 0, system: 0, summary: 0, 'file-history-snapshot': 0 };
}

function addUsage(target: TokenUsage, usage: TokenUsage): void {
  target.inputTokens += usage.inputTokens;
  target.outputTokens += usage.outputTokens;
  target.cacheReadTokens += usage.cacheReadTokens;
  target.cacheCreationTokens += usage.cacheCreationTokens;
  target.webSearchRequests += usage.webSearchRequests;
  target.webFetchRequests += usage.webFetchRequests;
}

/** Milliseconds from call to result; 0 when either timestamp is unparseable. */
function computeDurationMs(callTimestamp: string, resultTimestamp: string): number {
  const start = Date.parse(callTimestamp);
  const end = Date.parse(resultTimestamp);
  if (Number.isNaN(start) || Number.isNaN(end)) return 0;
  return Math.max(0, end - start);
}

function isErrorSystemRecord(record: SystemRecord): boolean {
  return record.level === 'error' || (record.subtype?.toLowerCase().includes('error') ?? false);
}

export class SessionAggregator {
  private sessionId: string | null = null;
  private currentModel: string | null = null;
  private firstTimestamp: string | null = null;
  private lastTimestamp: string | null = null;
  private recordCounts = createRecordCounts();

  // Tools
  private toolCallCount = 0;
  private toolResultCount = 0;
  private orphanResultCount = 0;
  private toolUsage = new Map<string, ToolUsageStats>();
  private correlations = new Map<string, ToolCorrelation>();
  private pendingToolCalls = new Map<string, PendingToolCall>();

  // Tokens
  private tokens = createEmptyTokenUsage();
  private modelUsage = new Map<string, ModelUsageStats>();
  private truncatedResponseCount = 0;

  // Ledgers
  private backups: FileBackup[] = [];
  private modifiedFiles = new Set<string>();
  private latestTodos: TodoItem[] | null = null;
  private summaries: SummaryEntry[] = [];
  private systemEvents: SystemEntry[] = [];
  private errors: SystemEntry[] = [];

  private subAgents = new Map<string, SubAgentGroup>();

  processRecord(record: SessionRecord): void {
    this.recordCounts[record.type]++;
    if (record.timestamp) {
      if (!this.firstTimestamp) this.firstTimestamp = record.timestamp;
      this.lastTimestamp = record.timestamp;
    }
    if (!this.sessionId && record.sessionId && !record.isSubAgent) {
      this.sessionId = record.sessionId;
    }

    const group = record.agentId ? this.getSubAgentGroup(record.agentId) : null;
    if (group) {
      group.recordCount++;
      if (record.timestamp) {
        if (!group.firstTimestamp) group.firstTimestamp = record.timestamp;
        group.lastTimestamp = record.timestamp;
      }
    }

    switch (record.type) {
      case 'assistant':
        this.processAssistant(record, group);
        break;
      case 'user':
        this.processUser(record);
        break;
      case 'system':
        this.processSystem(record);
        break;
      case 'summary':
        this.summaries.push({ timestamp: record.timestamp, summary: record.summary, leafUuid: record.leafUuid });
        break;
      case 'file-history-snapshot':
        this.processSnapshot(record);
        break;
    }
  }

  /** Subscribes to a record source. Returns the unsubscribe. */
  attach(source: RecordSource): Unsubscribe {
    return source.subscribe(record => this.processRecord(record));
  }

  /** Returns a copy; later records do not change it. */
  getStats(): SessionStats {
    return {
      sessionId: this.sessionId,
      currentModel: this.currentModel,
      firstTimestamp: this.firstTimestamp,
      lastTimestamp: this.lastTimestamp,
      recordCounts: { ...this.recordCounts },
      toolCallCount: this.toolCallCount,
      toolResultCount: this.toolResultCount,
      orphanResultCount: this.orphanResultCount,
      truncatedResponseCount: this.truncatedResponseCount,
      tokens: { ...this.tokens },
      toolUsage: Object.fromEntries([...this.toolUsage].map(([name, stats]) => [name, { ...stats }])),
      modelUsage: Object.fromEntries(
        [...this.modelUsage].map(([model, stats]) => [model, { calls: stats.calls, tokens: { ...stats.tokens } }]),
      ),
      correlations: [...this.correlations.values()].map(c => ({ ...c })),
      pendingToolCalls: [...this.pendingToolCalls.values()].map(p => ({ ...p })),
      backups: this.backups.map(b => ({ ...b })),
      modifiedFiles: [...this.modifiedFiles],
      latestTodos: this.latestTodos ? this.latestTodos.map(t => ({ ...t })) : null,
      summaries: this.summaries.map(s => ({ ...s })),
      systemEvents: this.systemEvents.map(e => ({ ...e })),
      errors: this.errors.map(e => ({ ...e })),
      subAgents: [...this.subAgents.values()].map(g => ({ ...g, tokens: { ...g.tokens } })),
    };
  }

  reset(): void {
    this.sessionId = null;
    this.currentModel = null;
    this.firstTimestamp = null;
    this.lastTimestamp = null;
    this.recordCounts = createRecordCounts();
    this.toolCallCount = 0;
    this.toolResultCount = 0;
    this.orphanResultCount = 0;
    this.toolUsage.clear();
    this.correlations.clear();
    this.pendingToolCalls.clear();
    this.tokens = createEmptyTokenUsage();
    this.modelUsage.clear();
    this.truncatedResponseCount = 0;
    this.backups = [];
    this.modifiedFiles.clear();
    this.latestTodos = null;
    this.summaries = [];
    this.systemEvents = [];
    this.errors = [];
    this.subAgents.clear();
  }

  // ── Per-type processing ──

  private processAssistant(record: AssistantRecord, group: SubAgentGroup | null): void {
    if (record.model) {
      this.currentModel = record.model;
      const stats = this.modelUsage.get(record.model) ?? { calls: 0, tokens: createEmptyTokenUsage() };
      stats.calls++;
      if (record.usage) addUsage(stats.tokens, record.usage);
      this.modelUsage.set(record.model, stats);
    }
    if (record.usage) {
      addUsage(this.tokens, record.usage);
      if (group) addUsage(group.tokens, record.usage);
    }
    if (record.truncated) this.truncatedResponseCount++;

    for (const block of record.content) {
      if (block.type !== 'tool_use') continue;
      this.toolCallCount++;
      if (group) group.toolCalls++;
      this.getToolUsage(block.name).calls++;

      // First call wins while a result is outstanding
      if (!block.id || this.pendingToolCalls.has(block.id)) continue;
      const pending: PendingToolCall = {
        toolUseId: block.id,
        toolName: block.name,
        callTimestamp: record.timestamp,
        ...(record.agentId ? { agentId: record.agentId } : {}),
      };
      this.pendingToolCalls.set(block.id, pending);
      this.correlations.set(block.id, {
        ...pending,
        resultTimestamp: null,
        durationMs: null,
        success: null,
      });
    }
  }

  private processUser(record: UserRecord): void {
    if (record.todos) {
      this.latestTodos = record.todos.map(t => ({ ...t }));
    }
    if (typeof record.content === 'string') return;

    for (const block of record.content) {
      if (block.type !== 'tool_result') continue;
      this.toolResultCount++;

      const pending = block.toolUseId ? this.pendingToolCalls.get(block.toolUseId) : undefined;
      const correlation = block.toolUseId ? this.correlations.get(block.toolUseId) : undefined;
      if (!block.toolUseId || !pending || !correlation) {
        this.orphanResultCount++;
        continue;
      }
      this.pendingToolCalls.delete(block.toolUseId);

      const durationMs = computeDurationMs(pending.callTimestamp, record.timestamp);
      correlation.resultTimestamp = record.timestamp;
      correlation.durationMs = durationMs;
      correlation.success = !block.isError;

      const usage = this.getToolUsage(pending.toolName);
      if (block.isError) usage.failures++;
      else usage.successes++;
      usage.totalDurationMs += durationMs;
    }
  }

  private processSystem(record: SystemRecord): void {
    const entry: SystemEntry = {
      timestamp: record.timestamp,
      subtype: record.subtype,
      level: record.level,
      content: record.content,
      durationMs: record.durationMs,
    };
    this.systemEvents.push(entry);
    if (isErrorSystemRecord(record)) {
      this.errors.push({ ...entry });
    }
  }

  private processSnapshot(record: FileHistorySnapshotRecord): void {
    for (const backup of record.backups) {
      this.backups.push({ ...backup });
      this.modifiedFiles.add(backup.filePath);
    }
  }

  // ── Helpers ──

  private getToolUsage(toolName: string): ToolUsageStats {
    let stats = this.toolUsage.get(toolName);
    if (!stats) {
      stats = { calls: 0, successes: 0, failures: 0, totalDurationMs: 0 };
      this.toolUsage.set(toolName, stats);
    }
    return stats;
  }

  private getSubAgentGroup(agentId: string): SubAgentGroup {
    let group = this.subAgents.get(agentId);
    if (!group) {
      group = {
        agentId,
        recordCount: 0,
        toolCalls: 0,
        tokens: createEmptyTokenUsage(),
        firstTimestamp: null,
        lastTimestamp: null,
      };
      this.subAgents.set(agentId, group);
    }
    return group;
  }
}
