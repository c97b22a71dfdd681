import { InvalidInputError } from "../errors.js";

/** Accepted form input, in kilograms and meters */
export const WEIGHT_RANGE = { min: 1, max: 300 } as const;
export const HEIGHT_RANGE = { min: 0.5, max: 3 } as const;

/**
 * Check a measurement entered through a front end against the accepted ranges
 */
export function checkMeasurement(weight: number, height: number): void {
  if (!(weight >= WEIGHT_RANGE.min && weight <= WEIGHT_RANGE.max)) {
    throw new InvalidInputError(
      `Weight must be between ${WEIGHT_RANGE.min} and ${WEIGHT_RANGE.max} kg`
    );
  }
  if (!(height >= HEIGHT_RANGE.min && height <= HEIGHT_RANGE.max)) {
    throw new InvalidInputError(
      `Height must be between ${HEIGHT_RANGE.min} and ${HEIGHT_RANGE.max} m`
    );
  }
}
