/**
 * Graceful Ctrl+C handling.
 *
 * - First Ctrl+C: abort the controller, the current step finishes and
 *   the remaining steps are skipped
 * - Second Ctrl+C: exit immediately
 */
export function installShutdownHandlers(
  controller: AbortController,
  exit: (code: number) => void = (code) => process.exit(code),
): () => void {
  let sigintCount = 0;

  const onSigint = (): void => {
    sigintCount++;

    if (sigintCount === 1) {
      console.log('\n⏸ Stopping after the current step completes...');
      console.log('  Press Ctrl+C again to force quit.\n');
      controller.abort();
    } else {
      console.log('\n⚡ Force quit.');
      exit(130);
    }
  };

  process.on('SIGINT', onSigint);
  return () => {
    process.off('SIGINT', onSigint);
  };
}
