import { UpdaterError, ErrorCode } from '../lib/errors.js';
import type { CleanupSettings, CleanupThreshold, Config } from '../config/types.js';
import type { CommandExecutor } from '../executor/index.js';
import { CommandStep } from '../steps/index.js';
import type { Catalog, CatalogCommand } from './types.js';

const THRESHOLDS: readonly CleanupThreshold[] = ['downloads_days_old', 'screenshots_days_old', 'dmg_files_days_old'];

const PLACEHOLDER_PATTERN = /\{\{\s*([a-z_]+)\s*\}\}/g;

function isThreshold(name: string): name is CleanupThreshold {
  return THRESHOLDS.some((t) => t === name);
}

/** Substitute {{threshold}} placeholders with cleanup settings */
export function renderCommand(template: string, settings: CleanupSettings): string {
  return template.replace(PLACEHOLDER_PATTERN, (_match, name: string) => {
    if (!isThreshold(name)) {
      throw new UpdaterError(
        ErrorCode.CATALOG_INVALID,
        `unknown placeholder {{${name}}} in command: ${template}`,
        `Known placeholders: ${THRESHOLDS.join(', ')}`,
      );
    }
    return String(settings[name]);
  });
}

/** Resolve one catalog command, or null when its cleanup toggle is off */
export function resolveCommand(command: CatalogCommand, settings: CleanupSettings): string | null {
  if (typeof command === 'string') return renderCommand(command, settings);
  if (command.when && !settings[command.when]) return null;
  return renderCommand(command.cmd, settings);
}

/** Step names are matched against skip_steps ignoring case and surrounding space */
function normalizeName(name: string): string {
  return name.trim().toLowerCase();
}

export interface BuildStepsOptions {
  executor?: CommandExecutor;
}

/**
 * Build the ordered step list: catalog entries first, then enabled
 * custom commands. Anything named in skip_steps is left out.
 */
export function buildSteps(catalog: Catalog, config: Config, options: BuildStepsOptions = {}): CommandStep[] {
  const skipped = new Set(config.skip_steps.map(normalizeName));
  const steps: CommandStep[] = [];

  for (const entry of catalog.steps) {
    if (skipped.has(normalizeName(entry.name))) continue;
    const commands = entry.commands
      .map((c) => resolveCommand(c, config.cleanup_settings))
      .filter((c): c is string => c !== null);
    steps.push(new CommandStep(entry.name, commands, options.executor));
  }

  for (const custom of config.custom_commands) {
    if (!custom.enabled || skipped.has(normalizeName(custom.name))) continue;
    steps.push(new CommandStep(custom.name, custom.commands, options.executor));
  }

  return steps;
}
