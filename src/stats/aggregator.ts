import type {
  BmiCategory,
  BmiRecord,
  BmiStatistics,
  BmiTrend,
  CategoryCount,
  TrendSeries,
} from "#types";
import { BmiCategorySchema } from "#types";
import { BMI_THRESHOLDS } from "../bmi/engine.js";

/**
 * Summarize a newest-first history. Returns null for an empty history.
 */
export function summarize(history: readonly BmiRecord[]): BmiStatistics | null {
  const newest = history[0];
  const oldest = history[history.length - 1];
  if (!newest || !oldest) {
    return null;
  }

  let total = 0;
  let minBmi = newest.bmi;
  let maxBmi = newest.bmi;
  for (const { bmi } of history) {
    total += bmi;
    if (bmi < minBmi) minBmi = bmi;
    if (bmi > maxBmi) maxBmi = bmi;
  }

  return {
    totalRecords: history.length,
    currentBmi: newest.bmi,
    averageBmi: total / history.length,
    minBmi,
    maxBmi,
    weightChange: history.length > 1 ? newest.weight - oldest.weight : 0,
    bmiTrend: trendOf(history.length, newest.bmi, oldest.bmi),
  };
}

// An unchanged BMI counts as Decreasing
function trendOf(count: number, newestBmi: number, oldestBmi: number): BmiTrend {
  if (count < 2) return "No trend";
  return newestBmi > oldestBmi ? "Increasing" : "Decreasing";
}

/**
 * Count records per category, most frequent first
 */
export function categoryDistribution(history: readonly BmiRecord[]): CategoryCount[] {
  const counts = new Map<BmiCategory, number>();
  for (const record of history) {
    counts.set(record.category, (counts.get(record.category) ?? 0) + 1);
  }

  const order = BmiCategorySchema.options;
  return [...counts.entries()]
    .map(([category, count]) => ({ category, count }))
    .sort(
      (a, b) =>
        b.count - a.count || order.indexOf(a.category) - order.indexOf(b.category)
    );
}

/**
 * Chart-ready series: points oldest first plus the category reference lines
 */
export function trendSeries(history: readonly BmiRecord[]): TrendSeries {
  return {
    points: [...history].reverse().map((r) => ({
      recordedAt: r.recordedAt,
      bmi: r.bmi,
      weight: r.weight,
    })),
    referenceLines: BMI_THRESHOLDS.map((line) => ({ ...line })),
  };
}

export function recentRecords(history: readonly BmiRecord[], limit = 5): BmiRecord[] {
  return history.slice(0, Math.max(0, limit));
}
