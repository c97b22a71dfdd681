import type { BmiRecord } from "#types";

export const CSV_COLUMNS = ["weight", "height", "bmi", "category", "recorded_at"] as const;

function escapeField(value: string): string {
  if (/[",\n\r]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Flatten a history into CSV, keeping the order it is given in
 */
export function toCsv(history: readonly BmiRecord[]): string {
  const lines = [CSV_COLUMNS.join(",")];
  for (const r of history) {
    lines.push(
      [String(r.weight), String(r.height), String(r.bmi), r.category, r.recordedAt]
        .map(escapeField)
        .join(",")
    );
  }
  return lines.join("\n") + "\n";
}
