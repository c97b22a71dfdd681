import {
  BmiRecordRowSchema,
  type BmiRecord,
  type BmiRecordRow,
  type RecordId,
  type UserId,
} from "#types";
import { computeBmi } from "../bmi/engine.js";
import { NotFoundError } from "../errors.js";
import type { Db } from "./database.js";

function toRecord(row: BmiRecordRow): BmiRecord {
  return {
    id: row.id,
    userId: row.user_id,
    weight: row.weight,
    height: row.height,
    bmi: row.bmi,
    category: row.category,
    recordedAt: row.recorded_at,
  };
}

/**
 * Append-only log of BMI records, one history per user
 */
export class RecordStore {
  private db: Db;
  private now: () => Date;

  constructor(db: Db, now: () => Date = () => new Date()) {
    this.db = db;
    this.now = now;
  }

  /**
   * Compute and persist a BMI for a user. The stored bmi and category always
   * come from computeBmi, so invalid measurements throw InvalidInputError
   * before anything is written. `recordedAt` defaults to the time of the call.
   */
  append(userId: UserId, weight: number, height: number, recordedAt?: Date): RecordId {
    const result = computeBmi(weight, height);

    if (this.db.get("SELECT 1 AS found FROM users WHERE id = ?", [userId]) === undefined) {
      throw new NotFoundError(`User ${userId} not found`);
    }

    const info = this.db.run(
      `INSERT INTO bmi_records (user_id, weight, height, bmi, category, recorded_at)
       VALUES (?, ?, ?, ?, ?, ?)`,
      [
        userId,
        weight,
        height,
        result.bmi,
        result.category,
        (recordedAt ?? this.now()).toISOString(),
      ]
    );
    return info.lastInsertRowid;
  }

  /**
   * All records of a user, newest first. Records sharing a timestamp come
   * back in reverse insertion order.
   */
  history(userId: UserId): BmiRecord[] {
    const rows = this.db.all(
      `SELECT id, user_id, weight, height, bmi, category, recorded_at
       FROM bmi_records
       WHERE user_id = ?
       ORDER BY recorded_at DESC, id DESC`,
      [userId]
    );
    return rows.map((row) => toRecord(BmiRecordRowSchema.parse(row)));
  }
}
