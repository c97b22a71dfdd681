import { describe, it, expect } from "vitest";
import { toCsv } from "../../src/export/csv.js";
import type { BmiRecord } from "../../src/types/index.js";

const records: BmiRecord[] = [
  {
    id: 2,
    userId: 1,
    weight: 68.5,
    height: 1.75,
    bmi: 22.37,
    category: "Normal weight",
    recordedAt: "2024-03-02T08:00:00.000Z",
  },
  {
    id: 1,
    userId: 1,
    weight: 80,
    height: 1.7,
    bmi: 27.68,
    category: "Overweight",
    recordedAt: "2024-03-01T08:00:00.000Z",
  },
];

describe("toCsv", () => {
  it("writes only the header for an empty history", () => {
    expect(toCsv([])).toBe("weight,height,bmi,category,recorded_at\n");
  });

  it("writes one line per record in the given order", () => {
    expect(toCsv(records)).toBe(
      [
        "weight,height,bmi,category,recorded_at",
        "68.5,1.75,22.37,Normal weight,2024-03-02T08:00:00.000Z",
        "80,1.7,27.68,Overweight,2024-03-01T08:00:00.000Z",
        "",
      ].join("\n")
    );
  });

  it("leaves out ids and user ids", () => {
    const [, firstRow] = toCsv(records).split("\n");
    expect(firstRow?.split(",")).toHaveLength(5);
  });
});
