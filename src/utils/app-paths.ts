import path from 'path';
import os from 'os';

/**
 * Base directory for replyforge state on disk (config, stored conversations).
 *
 * Override with `REPLYFORGE_HOME` (useful for sandboxes/tests/portable installs).
 * Default: `~/.replyforge`
 */
export function getReplyforgeHomeDir(): string {
  const override = process.env.REPLYFORGE_HOME?.trim();
  if (override) return override;
  return path.join(os.homedir(), '.replyforge');
}

export function getConversationsDir(): string {
  return path.join(getReplyforgeHomeDir(), 'conversations');
}
