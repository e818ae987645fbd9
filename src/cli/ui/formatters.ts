/**
 * Summary formatters
 */

import color from "picocolors";
import type { CycleOutcome } from "../../types";

export interface SummaryItem {
  label: string;
  value: string | number | null | undefined;
}

export function formatSummary(items: SummaryItem[]): string {
  const visible = items.filter((i) => i.value !== null && i.value !== undefined);
  const maxLabelLen = Math.max(0, ...visible.map((i) => i.label.length));
  return visible.map((i) => `${color.dim(i.label.padEnd(maxLabelLen))}  ${i.value}`).join("\n");
}

const OUTCOME_LABELS: Record<CycleOutcome, string> = {
  success: "relayed",
  already_in_progress: "skipped (another backup is running)",
  archive_failed: "archive failed",
  transfer_failed: "relay failed",
};

export function formatOutcome(outcome: CycleOutcome): string {
  const label = OUTCOME_LABELS[outcome];
  return outcome === "success" ? color.green(label) : color.red(label);
}
