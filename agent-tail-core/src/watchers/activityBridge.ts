/**
 * Converts SessionRecord (typed, full fidelity) to Activity (flat summary).
 *
 * A single record may produce several activities: an assistant message
 * with two tool_use blocks and a text block yields three.
 *
 * @module watchers/activityBridge
 */

import type { SessionRecord } from '../types/sessionRecord';
import type { Activity } from './types';

const SUMMARY_MAX_LENGTH = 100;

export function toActivities(record: SessionRecord): Activity[] {
  const base = {
    timestamp: record.timestamp,
    sessionId: record.sessionId,
    isSubAgent: record.isSubAgent,
    ...(record.agentId ? { agentId: record.agentId } : {}),
  };
  const activities: Activity[] = [];

  switch (record.type) {
    case 'assistant': {
      for (const block of record.content) {
        if (block.type === 'tool_use') {
          const toolInput = stringifyInput(block.input);
          activities.push({
            ...base, type: 'tool_call',
            ...(block.id ? { toolUseId: block.id } : {}),
            toolName: block.name, toolInput,
            summary: truncate(`${block.name}: ${toolInput}`, SUMMARY_MAX_LENGTH),
          });
        } else if (block.type === 'text' && block.text.trim()) {
          activities.push({
            ...base, type: 'thought',
            content: block.text,
            summary: truncate(block.text, SUMMARY_MAX_LENGTH),
          });
        }
      }
      break;
    }

    case 'user': {
      if (typeof record.content === 'string') break;
      for (const block of record.content) {
        if (block.type !== 'tool_result') continue;
        const content = extractResultText(block.content);
        activities.push({
          ...base, type: 'tool_result',
          ...(block.toolUseId ? { toolUseId: block.toolUseId } : {}),
          content, success: !block.isError,
          summary: block.isError ? truncate(`Error: ${content}`, SUMMARY_MAX_LENGTH) : 'OK',
        });
      }
      break;
    }

    default:
      break;
  }

  return activities;
}

// ── Helpers ──

function stringifyInput(input: unknown): string {
  if (input === undefined) return '';
  return JSON.stringify(input) ?? '';
}

/** Tool results are either plain text or a list of content blocks. */
function extractResultText(content: unknown): string {
  if (content === null || content === undefined) return '';
  if (typeof content === 'string') return content;
  if (Array.isArray(content)) {
    const parts: string[] = [];
    for (const block of content) {
      if (block && typeof block === 'object' && 'text' in block && typeof block.text === 'string') {
        parts.push(block.text);
      }
    }
    return parts.join('\n');
  }
  return JSON.stringify(content) ?? '';
}

function truncate(text: string, maxLen: number): string {
  const clean = text.replace(/\s+/g, ' ').trim();
  return clean.length > maxLen ? clean.substring(0, maxLen) + '...' : clean;
}
