import chalk from 'chalk';

/**
 * Namespaces enabled by MAC_UPDATER_DEBUG: a comma-separated list of
 * names or `prefix*` patterns, `*` for all. Empty, `0` and `false` disable.
 */
export function parseDebugNamespaces(value: string | undefined): string[] {
  const raw = (value ?? '').trim();
  if (raw === '' || raw === '0' || raw.toLowerCase() === 'false') return [];
  return raw
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

export function isDebugEnabled(namespace: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) =>
    pattern.endsWith('*') ? namespace.startsWith(pattern.slice(0, -1)) : namespace === pattern,
  );
}

const PATTERNS = parseDebugNamespaces(process.env.MAC_UPDATER_DEBUG);

/** Debug logger gated by MAC_UPDATER_DEBUG */
export function debug(namespace: string, ...args: unknown[]): void {
  if (PATTERNS.length === 0 || !isDebugEnabled(namespace, PATTERNS)) return;
  console.error(chalk.dim(`[DEBUG] [${namespace}]`), ...args);
}
