import { TradingRun } from './trading-orchestrator.service';

/**
 * Waits for `run` to finish, calling `onElapsed` if it is still going after `seconds`.
 * No deadline when `seconds` is 0; the timer is cleared however the run ends.
 */
export async function awaitRunWithDeadline(run: TradingRun, seconds: number, onElapsed: () => void): Promise<void> {
  const deadline = seconds > 0 ? setTimeout(onElapsed, seconds * 1000) : undefined;
  try {
    await run.done;
  } finally {
    clearTimeout(deadline);
  }
}
