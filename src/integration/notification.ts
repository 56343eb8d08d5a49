import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { UpdaterError, ErrorCode } from '../lib/errors.js';
import type { NotificationSettings } from '../config/types.js';
import type { RunStatistics } from '../orchestrator/statistics.js';

const execFileAsync = promisify(execFile);

export const NOTIFICATION_TITLE = 'macOS Maintenance Complete';

/** Delivers a desktop notification; rejects with UpdaterError(NOTIFICATION_FAILED) */
export type NotificationSender = (title: string, body: string) => Promise<void>;

/** Quote a string as an AppleScript string literal */
export function appleScriptString(text: string): string {
  return `"${text.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/** Show a macOS notification through osascript */
export const sendNotification: NotificationSender = async (title, body) => {
  const script = `display notification ${appleScriptString(body)} with title ${appleScriptString(title)}`;
  try {
    await execFileAsync('osascript', ['-e', script], { timeout: 5000 });
  } catch (err) {
    throw new UpdaterError(
      ErrorCode.NOTIFICATION_FAILED,
      `notification failed: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
};

/**
 * Title and body for the end-of-run notification,
 * or null when the settings say not to send one.
 */
export function buildNotification(
  stats: RunStatistics,
  settings: NotificationSettings,
): { title: string; body: string } | null {
  if (!settings.enabled) return null;
  if (settings.success_only && stats.failed > 0) return null;

  let body = stats.failed > 0
    ? `Maintenance finished with ${stats.failed} failed step${stats.failed === 1 ? '' : 's'}.`
    : 'Your system has been updated and cleaned successfully.';

  if (settings.include_stats) {
    body += ` ${stats.completed} completed, ${stats.skipped} skipped, ${stats.failed} failed.`;
  }

  return { title: NOTIFICATION_TITLE, body };
}
