/**
 * Timer limits
 */

/** Largest delay setTimeout and AbortSignal.timeout honour; longer ones fire after 1ms */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

export const MS_PER_MINUTE = 60 * 1000;

/** Longest cadence the scheduler can sleep in one timer: 35791 minutes */
export const MAX_CADENCE_MINUTES = Math.floor(MAX_TIMER_DELAY_MS / MS_PER_MINUTE);
