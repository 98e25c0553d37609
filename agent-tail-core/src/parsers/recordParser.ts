/**
 * JSON line → typed SessionRecord.
 *
 * The raw log schema is loose and grows over time, so every schema here
 * passes unknown keys through and treats most fields as optional. Only
 * the fields a variant cannot do without are required; a line missing
 * them is reported as malformed.
 *
 * @module parsers/recordParser
 */

import { z } from 'zod';
import { RecordParseError } from '../errors';
import type {
  AssistantContentBlock,
  AssistantRecord,
  FileBackup,
  FileHistorySnapshotRecord,
  SessionRecord,
  SummaryRecord,
  SystemRecord,
  TodoItem,
  TokenUsage,
  ToolExecutionMetadata,
  UserContentBlock,
  UserRecord,
} from '../types/sessionRecord';

// ── Raw schemas ──

const envelopeSchema = z.object({ type: z.string() }).passthrough();

const baseSchema = z.object({
  timestamp: z.string().nullish(),
  sessionId: z.string().nullish(),
  uuid: z.string().nullish(),
  parentUuid: z.string().nullish(),
  agentId: z.string().nullish(),
  isSidechain: z.boolean().nullish(),
}).passthrough();

const usageSchema = z.object({
  input_tokens: z.number().nullish(),
  output_tokens: z.number().nullish(),
  cache_read_input_tokens: z.number().nullish(),
  cache_creation_input_tokens: z.number().nullish(),
  server_tool_use: z.object({
    web_search_requests: z.number().nullish(),
    web_fetch_requests: z.number().nullish(),
  }).passthrough().nullish(),
}).passthrough();

const assistantSchema = baseSchema.extend({
  requestId: z.string().nullish(),
  message: z.object({
    id: z.string().nullish(),
    model: z.string().nullish(),
    content: z.unknown(),
    usage: usageSchema.nullish(),
    stop_reason: z.string().nullish(),
  }).passthrough(),
});

const userSchema = baseSchema.extend({
  message: z.object({ content: z.unknown() }).passthrough(),
  todos: z.unknown(),
  toolUseResult: z.unknown(),
});

const systemSchema = baseSchema.extend({
  subtype: z.string().nullish(),
  level: z.string().nullish(),
  content: z.string().nullish(),
  durationMs: z.number().nullish(),
});

const summarySchema = baseSchema.extend({
  summary: z.string(),
  leafUuid: z.string().nullish(),
});

const fileHistorySnapshotSchema = baseSchema.extend({
  messageId: z.string().nullish(),
  isSnapshotUpdate: z.boolean().nullish(),
  snapshot: z.object({
    timestamp: z.string().nullish(),
    trackedFileBackups: z.record(z.unknown()).nullish(),
  }).passthrough().nullish(),
});

const toolUseBlockSchema = z.object({
  type: z.literal('tool_use'),
  id: z.string().nullish(),
  name: z.string().nullish(),
  input: z.unknown(),
});

const textBlockSchema = z.object({ type: z.literal('text'), text: z.string() });
const thinkingBlockSchema = z.object({ type: z.literal('thinking'), thinking: z.string() });

const toolResultBlockSchema = z.object({
  type: z.literal('tool_result'),
  tool_use_id: z.string().nullish(),
  content: z.unknown(),
  is_error: z.boolean().nullish(),
});

const todoSchema = z.object({
  content: z.string(),
  status: z.string(),
  activeForm: z.string().optional(),
});

const toolExecutionSchema = z.object({
  stdout: z.string().nullish(),
  stderr: z.string().nullish(),
  interrupted: z.boolean().nullish(),
  isImage: z.boolean().nullish(),
});

const backupSchema = z.object({
  backupFileName: z.string().nullish(),
  version: z.number().nullish(),
  backupTime: z.string().nullish(),
});

type RawBase = z.infer<typeof baseSchema>;

/** Stop reasons meaning the response did not finish on its own. */
const TRUNCATING_STOP_REASONS = new Set(['max_tokens', 'model_context_window_exceeded']);

// ── Public API ──

/** Where a line came from; used to tag sub-agent records. */
export interface RecordContext {
  sourceFile?: string;
  /** False for sidecar files. Defaults to true. */
  isPrimary?: boolean;
  /** Agent id derived from the sidecar file name. */
  agentId?: string;
}

/**
 * Parses one JSONL line.
 *
 * @returns the record, or null when the line's `type` is not a record type
 * @throws RecordParseError when the line is not JSON or a known type is malformed
 */
export function parseSessionRecord(line: string, context: RecordContext = {}): SessionRecord | null {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch (error) {
    throw new RecordParseError(line, error, context.sourceFile);
  }

  const envelope = envelopeSchema.safeParse(json);
  if (!envelope.success) return null;

  switch (envelope.data.type) {
    case 'assistant':
      return parseAssistant(validate(assistantSchema, json, line, context), context);
    case 'user':
      return parseUser(validate(userSchema, json, line, context), context);
    case 'system':
      return parseSystem(validate(systemSchema, json, line, context), context);
    case 'summary':
      return parseSummary(validate(summarySchema, json, line, context), context);
    case 'file-history-snapshot':
      return parseFileHistorySnapshot(validate(fileHistorySnapshotSchema, json, line, context), context);
    default:
      return null;
  }
}

// ── Per-type parsers ──

function parseAssistant(raw: z.infer<typeof assistantSchema>, context: RecordContext): AssistantRecord {
  const { message } = raw;
  const stopReason = message.stop_reason ?? null;
  const record: AssistantRecord = {
    type: 'assistant',
    ...parseBase(raw, context),
    messageId: message.id ?? null,
    requestId: raw.requestId ?? null,
    model: message.model ?? null,
    content: parseAssistantContent(message.content),
    usage: message.usage ? parseUsage(message.usage) : null,
    stopReason,
  };
  if (stopReason && TRUNCATING_STOP_REASONS.has(stopReason)) {
    record.truncated = true;
  }
  return record;
}

function parseUser(raw: z.infer<typeof userSchema>, context: RecordContext): UserRecord {
  const content = raw.message.content;
  const record: UserRecord = {
    type: 'user',
    ...parseBase(raw, context),
    content: typeof content === 'string' ? content : parseUserContent(content),
  };

  const todos = z.array(todoSchema).safeParse(raw.todos);
  if (todos.success) {
    record.todos = todos.data.map((t): TodoItem => (t.activeForm !== undefined
      ? { content: t.content, status: t.status, activeForm: t.activeForm }
      : { content: t.content, status: t.status }));
  }

  const toolExecution = parseToolExecution(raw.toolUseResult);
  if (toolExecution) {
    record.toolExecution = toolExecution;
  }
  return record;
}

function parseSystem(raw: z.infer<typeof systemSchema>, context: RecordContext): SystemRecord {
  return {
    type: 'system',
    ...parseBase(raw, context),
    subtype: raw.subtype ?? null,
    level: raw.level ?? null,
    content: raw.content ?? null,
    durationMs: raw.durationMs ?? null,
  };
}

function parseSummary(raw: z.infer<typeof summarySchema>, context: RecordContext): SummaryRecord {
  return {
    type: 'summary',
    ...parseBase(raw, context),
    summary: raw.summary,
    leafUuid: raw.leafUuid ?? null,
  };
}

function parseFileHistorySnapshot(
  raw: z.infer<typeof fileHistorySnapshotSchema>,
  context: RecordContext,
): FileHistorySnapshotRecord {
  const base = parseBase(raw, context);
  if (!base.timestamp && raw.snapshot?.timestamp) {
    base.timestamp = raw.snapshot.timestamp;
  }

  const backups: FileBackup[] = [];
  for (const [filePath, value] of Object.entries(raw.snapshot?.trackedFileBackups ?? {})) {
    const parsed = backupSchema.safeParse(value);
    backups.push({
      filePath,
      backupFileName: parsed.success ? parsed.data.backupFileName ?? null : null,
      version: parsed.success ? parsed.data.version ?? null : null,
      backupTime: parsed.success ? parsed.data.backupTime ?? null : null,
    });
  }

  return {
    type: 'file-history-snapshot',
    ...base,
    messageId: raw.messageId ?? null,
    isSnapshotUpdate: raw.isSnapshotUpdate ?? false,
    backups,
  };
}

// ── Helpers ──

function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, json: unknown, line: string, context: RecordContext): T {
  const result = schema.safeParse(json);
  if (!result.success) {
    const detail = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new RecordParseError(line, new Error(detail), context.sourceFile);
  }
  return result.data;
}

function parseBase(raw: RawBase, context: RecordContext) {
  const agentId = raw.agentId || context.agentId;
  const isSubAgent = context.isPrimary === false || Boolean(raw.agentId) || raw.isSidechain === true;
  return {
    timestamp: raw.timestamp ?? '',
    sessionId: raw.sessionId ?? null,
    uuid: raw.uuid ?? null,
    parentUuid: raw.parentUuid ?? null,
    ...(isSubAgent && agentId ? { agentId } : {}),
    isSubAgent,
    ...(context.sourceFile ? { sourceFile: context.sourceFile } : {}),
  };
}

function parseUsage(raw: z.infer<typeof usageSchema>): TokenUsage {
  return {
    inputTokens: raw.input_tokens ?? 0,
    outputTokens: raw.output_tokens ?? 0,
    cacheReadTokens: raw.cache_read_input_tokens ?? 0,
    cacheCreationTokens: raw.cache_creation_input_tokens ?? 0,
    webSearchRequests: raw.server_tool_use?.web_search_requests ?? 0,
    webFetchRequests: raw.server_tool_use?.web_fetch_requests ?? 0,
  };
}

function parseAssistantContent(content: unknown): AssistantContentBlock[] {
  if (typeof content === 'string') {
    return content ? [{ type: 'text', text: content }] : [];
  }
  if (!Array.isArray(content)) return [];

  const blocks: AssistantContentBlock[] = [];
  for (const block of content) {
    const toolUse = toolUseBlockSchema.safeParse(block);
    if (toolUse.success) {
      blocks.push({
        type: 'tool_use',
        id: toolUse.data.id ?? null,
        name: toolUse.data.name ?? 'unknown',
        input: toolUse.data.input,
      });
      continue;
    }
    const text = textBlockSchema.safeParse(block);
    if (text.success) {
      blocks.push({ type: 'text', text: text.data.text });
      continue;
    }
    const thinking = thinkingBlockSchema.safeParse(block);
    if (thinking.success) {
      blocks.push({ type: 'thinking', text: thinking.data.thinking });
    }
  }
  return blocks;
}

function parseUserContent(content: unknown): UserContentBlock[] {
  if (!Array.isArray(content)) return [];

  const blocks: UserContentBlock[] = [];
  for (const block of content) {
    const result = toolResultBlockSchema.safeParse(block);
    if (result.success) {
      blocks.push({
        type: 'tool_result',
        toolUseId: result.data.tool_use_id ?? null,
        content: result.data.content,
        isError: result.data.is_error === true,
      });
      continue;
    }
    const text = textBlockSchema.safeParse(block);
    if (text.success) {
      blocks.push({ type: 'text', text: text.data.text });
    }
  }
  return blocks;
}

function parseToolExecution(raw: unknown): ToolExecutionMetadata | undefined {
  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) return undefined;
  const parsed = toolExecutionSchema.safeParse(raw);
  if (!parsed.success) return undefined;

  const { stdout, stderr, interrupted, isImage } = parsed.data;
  if (stdout == null && stderr == null && interrupted == null && isImage == null) {
    return undefined;
  }
  return {
    hasStdout: Boolean(stdout),
    hasStderr: Boolean(stderr),
    interrupted: interrupted === true,
    isImage: isImage === true,
  };
}
