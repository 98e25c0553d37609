/**
 * Types for live session monitoring.
 *
 * @module watchers/types
 */

export type MonitorState = 'stopped' | 'starting' | 'watching';

/** Read-only view of a file the monitor is tailing. */
export interface TrackedFileInfo {
  path: string;
  /** Bytes consumed so far. */
  offset: number;
  /** Bytes held back because they do not yet end in a newline. */
  pendingBytes: number;
  isPrimary: boolean;
  agentId?: string;
}

export type ActivityType = 'tool_call' | 'tool_result' | 'thought';

/** Flat, one-line view of what the agent is doing. */
export interface Activity {
  type: ActivityType;
  timestamp: string;
  sessionId: string | null;
  agentId?: string;
  isSubAgent: boolean;
  toolUseId?: string;
  toolName?: string;
  /** Tool input serialized as JSON. */
  toolInput?: string;
  /** Result text (tool_result) or thought text (thought). */
  content?: string;
  success?: boolean;
  /** `Tool: input`, `OK` / `Error: message`, or the thought itself; past 100 characters, cut there and suffixed `...`. */
  summary: string;
}
