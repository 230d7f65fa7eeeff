import type Logger from "bunyan";
import { Printer } from "./replay";

export { replayLog } from "./replay";
export type { Printer } from "./replay";
export { exportLog } from "./export";

/**
 * Run a visualizer after solving. Its failure is reported as a notice and
 * never reaches the caller.
 */
export async function runVisualizer(
  name: string,
  task: () => void | Promise<unknown>,
  log: Logger,
  out: Printer,
): Promise<boolean> {
  try {
    await task();
    return true;
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    log.warn({ visualizer: name, err: message }, "Visualizer failed");
    out(`Note: ${name} of the assignment log failed (${message}). The result above is unaffected.`);
    return false;
  }
}
