import { z } from "zod/v4";

// BMI categories, in band order
export const BmiCategorySchema = z.enum([
  "Underweight",
  "Normal weight",
  "Overweight",
  "Obese",
]);

export const BmiTrendSchema = z.enum(["Increasing", "Decreasing", "No trend"]);

export const UserSchema = z.object({
  id: z.number().int().positive(),
  username: z.string().min(1),
  passwordHash: z.string(),
  createdAt: z.string(),
});

export const BmiRecordSchema = z.object({
  id: z.number().int().positive(),
  userId: z.number().int().positive(),
  weight: z.number().positive(),
  height: z.number().positive(),
  bmi: z.number(),
  category: BmiCategorySchema,
  recordedAt: z.string(),
});

// Raw rows as sql.js returns them
export const UserRowSchema = z.object({
  id: z.number(),
  username: z.string(),
  password_hash: z.string(),
  created_at: z.string(),
});

export const BmiRecordRowSchema = z.object({
  id: z.number(),
  user_id: z.number(),
  weight: z.number(),
  height: z.number(),
  bmi: z.number(),
  category: BmiCategorySchema,
  recorded_at: z.string(),
});

export type BmiCategory = z.infer<typeof BmiCategorySchema>;
export type BmiTrend = z.infer<typeof BmiTrendSchema>;
export type User = z.infer<typeof UserSchema>;
export type BmiRecord = z.infer<typeof BmiRecordSchema>;
export type UserRow = z.infer<typeof UserRowSchema>;
export type BmiRecordRow = z.infer<typeof BmiRecordRowSchema>;

export type UserId = number;
export type RecordId = number;

/** Output of the BMI engine */
export interface BmiResult {
  /** weight / height², rounded to 2 decimals */
  bmi: number;
  /** Band of the unrounded value */
  category: BmiCategory;
}

/** Summary over a user's history */
export interface BmiStatistics {
  totalRecords: number;
  /** BMI of the newest record */
  currentBmi: number;
  /** Unrounded mean */
  averageBmi: number;
  minBmi: number;
  maxBmi: number;
  /** newest.weight - oldest.weight, 0 with a single record */
  weightChange: number;
  bmiTrend: BmiTrend;
}

/** A horizontal line drawn on BMI charts at a category boundary */
export interface ReferenceLine {
  value: number;
  label: string;
}

export interface TrendPoint {
  recordedAt: string;
  bmi: number;
  weight: number;
}

export interface TrendSeries {
  /** Oldest first */
  points: TrendPoint[];
  referenceLines: ReferenceLine[];
}

export interface CategoryCount {
  category: BmiCategory;
  count: number;
}
