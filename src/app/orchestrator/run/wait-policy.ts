/*
Attempt budget for the task-state waiter.
The timeout is only enforced through the attempt count; the delay between polls is constant.
*/

import type { RunContext } from "../run-context.js";
import type { WaitPolicy } from "../ports.js";

export function computeWaitAttempts(timeoutMs: number, delayMs: number): number {
  const attempts = Math.floor(timeoutMs / delayMs) + 1;
  return timeoutMs % delayMs > 0 ? attempts + 1 : attempts;
}

export function buildWaitPolicy(
  context: Pick<RunContext, "timeoutMs" | "timings" | "signal">,
): WaitPolicy {
  const delayMs = context.timings.waitDelayMs;
  return {
    delayMs,
    maxAttempts: computeWaitAttempts(context.timeoutMs, delayMs),
    signal: context.signal,
  };
}
