/**
 * Log root resolution and project directory naming.
 *
 * The agent keeps one directory per working directory under its log root,
 * named by flattening the working directory path:
 * /home/user/my.project -> -home-user-my-project
 *
 * @module paths
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

export const LOG_FILE_EXTENSION = '.jsonl';

/** File name prefix the agent uses for sub-agent sidecar logs. */
export const SUBAGENT_FILE_PREFIX = 'agent-';

/**
 * Gets the directory holding all project log directories.
 * Override > AGENT_TAIL_LOG_ROOT > ~/.claude/projects.
 */
export function getLogRoot(override?: string): string {
  if (override) return path.resolve(override);
  const env = process.env.AGENT_TAIL_LOG_ROOT;
  if (env) return path.resolve(env);
  return path.join(os.homedir(), '.claude', 'projects');
}

/**
 * Flattens a working directory path into a project directory name.
 * Replaces path separators and dots with hyphens.
 */
export function sanitizeProjectPath(workingDirectory: string): string {
  return workingDirectory.replace(/[/\\.]/g, '-');
}

/** Gets the (possibly not yet existing) project directory for a working directory. */
export function getProjectDirectory(workingDirectory: string, logRoot?: string): string {
  return path.join(getLogRoot(logRoot), sanitizeProjectPath(workingDirectory));
}

export function isLogFile(fileName: string): boolean {
  return fileName.endsWith(LOG_FILE_EXTENSION);
}

export function isSubagentFile(fileName: string): boolean {
  return path.basename(fileName).startsWith(SUBAGENT_FILE_PREFIX);
}

/** Session id (or agent file stem) from a log file path. */
export function getFileStem(filePath: string): string {
  return path.basename(filePath, LOG_FILE_EXTENSION);
}

/** Agent id from a sidecar file name: agent-a1b2c3.jsonl -> a1b2c3. */
export function getAgentIdFromFile(filePath: string): string | undefined {
  const stem = getFileStem(filePath);
  if (!stem.startsWith(SUBAGENT_FILE_PREFIX)) return undefined;
  const id = stem.slice(SUBAGENT_FILE_PREFIX.length);
  return id || undefined;
}

/**
 * Finds `<sessionId>.jsonl` anywhere under the log root.
 * Returns null when the root or the file does not exist.
 */
export async function findSessionFile(logRoot: string, sessionId: string): Promise<string | null> {
  const target = sessionId + LOG_FILE_EXTENSION;
  const pending = [logRoot];

  while (pending.length > 0) {
    const dir = pending.shift();
    if (dir === undefined) break;

    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(dir, { withFileTypes: true });
    } catch {
      continue;
    }

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isFile() && entry.name === target) return fullPath;
      if (entry.isDirectory()) pending.push(fullPath);
    }
  }
  return null;
}
