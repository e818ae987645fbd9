/**
 * Cadence parsing.
 *
 * Only the step form of the minute field is understood: "*\/15 * * * *" means
 * a cycle every 15 minutes. Anything that does not start with "*\/" falls back
 * to DEFAULT_CADENCE_MINUTES.
 */

import { logger } from "../utils/logger";
import { MAX_CADENCE_MINUTES } from "../utils/time";
import { ConfigError } from "./validator";

export const DEFAULT_CADENCE_MINUTES = 60;

const STEP_PATTERN = /^\*\/(\d+)(?=\s|$)/;

export function parseCadence(expression: string): number {
  const trimmed = expression.trim();

  if (!trimmed.startsWith("*/")) {
    logger.warn(
      `cooldownDuration "${expression}" is not of the form */<minutes>; using ${DEFAULT_CADENCE_MINUTES} minutes`,
    );
    return DEFAULT_CADENCE_MINUTES;
  }

  const digits = STEP_PATTERN.exec(trimmed)?.[1];
  const minutes = digits === undefined ? Number.NaN : Number.parseInt(digits, 10);

  if (!Number.isSafeInteger(minutes) || minutes < 1) {
    throw new ConfigError(
      `cooldownDuration "${expression}" must start with */<minutes> where minutes is a positive integer`,
    );
  }

  if (minutes > MAX_CADENCE_MINUTES) {
    throw new ConfigError(
      `cooldownDuration "${expression}" exceeds the longest supported cadence of ${MAX_CADENCE_MINUTES} minutes`,
    );
  }

  return minutes;
}
