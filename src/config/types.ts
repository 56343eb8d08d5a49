import { z } from 'zod';

// ── Custom commands ──

export const customCommandSchema = z.object({
  name: z.string().min(1),
  commands: z.array(z.string().min(1)).default([]),
  enabled: z.boolean().default(true),
});

// ── Settings ──

export const cleanupSettingsSchema = z.object({
  downloads_days_old: z.number().int().min(0).default(30),
  screenshots_days_old: z.number().int().min(0).default(14),
  dmg_files_days_old: z.number().int().min(0).default(7),
  clear_browser_caches: z.boolean().default(true),
  clear_system_logs: z.boolean().default(true),
});

export const notificationSettingsSchema = z.object({
  enabled: z.boolean().default(true),
  success_only: z.boolean().default(false),
  include_stats: z.boolean().default(true),
});

// ── Config schema ──

export const DEFAULT_CUSTOM_COMMANDS = [
  { name: 'Update Homebrew Casks', commands: ['brew upgrade --cask'], enabled: false },
];

export const configSchema = z.object({
  skip_steps: z.array(z.string()).default([]),
  custom_commands: z.array(customCommandSchema).default(DEFAULT_CUSTOM_COMMANDS),
  cleanup_settings: cleanupSettingsSchema.default({}),
  notification_settings: notificationSettingsSchema.default({}),
});

// ── Derived TypeScript types ──

export type CustomCommand = z.infer<typeof customCommandSchema>;
export type CleanupSettings = z.infer<typeof cleanupSettingsSchema>;
export type NotificationSettings = z.infer<typeof notificationSettingsSchema>;
export type Config = z.infer<typeof configSchema>;

/** Cleanup settings substituted into catalog commands */
export type CleanupThreshold = {
  [K in keyof CleanupSettings]: CleanupSettings[K] extends number ? K : never;
}[keyof CleanupSettings];

export function defaultConfig(): Config {
  return configSchema.parse({});
}
