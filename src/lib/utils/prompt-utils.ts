/** Whether both stdin and stdout are a terminal, so a prompt can be answered */
export function isInteractive(): boolean {
  return Boolean(process.stdin.isTTY && process.stdout.isTTY);
}
