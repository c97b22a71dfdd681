import type { BmiCategory, BmiResult, ReferenceLine } from "#types";
import { InvalidInputError } from "../errors.js";

/**
 * Category boundaries. Each band is left-closed, right-open; anything at or
 * above the last boundary is Obese.
 */
export const BMI_THRESHOLDS: readonly ReferenceLine[] = [
  { value: 18.5, label: "Underweight" },
  { value: 25, label: "Normal" },
  { value: 30, label: "Overweight" },
];

/**
 * Round half away from zero to the given number of decimals
 */
export function roundTo(value: number, decimals = 2): number {
  const factor = 10 ** decimals;
  const rounded = Math.round((Math.abs(value) + Number.EPSILON) * factor) / factor;
  return value < 0 ? -rounded : rounded;
}

/**
 * Map a BMI value onto its category
 */
export function categorize(bmi: number): BmiCategory {
  if (bmi < 18.5) return "Underweight";
  if (bmi < 25) return "Normal weight";
  if (bmi < 30) return "Overweight";
  return "Obese";
}

/**
 * Compute BMI from weight in kilograms and height in meters.
 *
 * The category is decided on the unrounded value, so 24.996 is still
 * "Normal weight" even though it is reported as 25.
 */
export function computeBmi(weightKg: number, heightM: number): BmiResult {
  if (!Number.isFinite(heightM) || heightM <= 0) {
    throw new InvalidInputError("Height must be greater than zero");
  }
  if (!Number.isFinite(weightKg) || weightKg <= 0) {
    throw new InvalidInputError("Weight must be greater than zero");
  }

  const bmi = weightKg / (heightM * heightM);
  return { bmi: roundTo(bmi), category: categorize(bmi) };
}
