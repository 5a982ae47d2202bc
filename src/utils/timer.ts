/**
 * Timer limits — setTimeout stores its delay as a signed 32-bit millisecond count.
 *
 * Dependency direction: timer.ts → nothing
 * Used by: config schema, run config, CLI options, workflow engine, approval gate
 */

/** Longest delay, in whole seconds, a timer can wait. */
export const MAX_TIMER_SECONDS = 2_147_483;

/** Milliseconds for a `seconds` delay, capped at the timer limit. */
export function timerDelayMs(seconds: number): number {
    return Math.min(seconds, MAX_TIMER_SECONDS) * 1000;
}
