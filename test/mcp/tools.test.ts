import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { openDatabase, type Db } from "../../src/store/database.js";
import { CredentialStore } from "../../src/store/credentials.js";
import { RecordStore } from "../../src/store/records.js";
import { Session } from "../../src/session/session.js";
import {
  calculateBmi,
  exportCsv,
  getHistory,
  getStatistics,
  getTrend,
  login,
  logout,
  register,
  type ToolContext,
  type ToolResult,
} from "../../src/mcp/tools.js";
import { steppingClock } from "../helpers/clock.js";

function textOf(result: ToolResult): string {
  return result.content[0]?.text ?? "";
}

function jsonOf(result: ToolResult): unknown {
  return JSON.parse(textOf(result));
}

/**
 * The tools driven directly against an in-memory database,
 * without the MCP transport.
 */
describe("MCP tools", () => {
  let db: Db;
  let ctx: ToolContext;

  beforeEach(async () => {
    db = await openDatabase(":memory:");
    ctx = {
      credentials: new CredentialStore(db),
      records: new RecordStore(db, steppingClock()),
      session: new Session(),
      recentLimit: 2,
    };
  });

  afterEach(() => {
    db.close();
  });

  describe("register", () => {
    it("creates an account", () => {
      const result = register(ctx, "alice", "pw");

      expect(result.isError).toBeUndefined();
      expect(jsonOf(result)).toMatchObject({ id: 1, username: "alice" });
    });

    it("reports a duplicate username as an error result", () => {
      register(ctx, "alice", "pw");
      const result = register(ctx, "alice", "other");

      expect(result.isError).toBe(true);
      expect(textOf(result)).toBe("Username 'alice' already exists");
    });
  });

  describe("login / logout", () => {
    beforeEach(() => {
      register(ctx, "alice", "pw");
    });

    it("sets the session user", () => {
      const result = login(ctx, "alice", "pw");

      expect(textOf(result)).toBe("Logged in as alice");
      expect(ctx.session.userId).toBe(1);
    });

    it("leaves the session empty on bad credentials", () => {
      const result = login(ctx, "alice", "wrong");

      expect(result.isError).toBe(true);
      expect(textOf(result)).toBe("Invalid username or password");
      expect(ctx.session.userId).toBeNull();
    });

    it("clears the session", () => {
      login(ctx, "alice", "pw");

      expect(textOf(logout(ctx))).toBe("Logged out alice");
      expect(ctx.session.userId).toBeNull();
      expect(textOf(logout(ctx))).toBe("No user was logged in");
    });
  });

  describe("authenticated tools", () => {
    it("refuse to run without a login", () => {
      for (const result of [
        calculateBmi(ctx, 70, 1.75),
        getHistory(ctx),
        getStatistics(ctx),
        getTrend(ctx),
        exportCsv(ctx),
      ]) {
        expect(result.isError).toBe(true);
        expect(textOf(result)).toBe("Not logged in. Call the login tool first.");
      }
    });
  });

  describe("with a logged-in user", () => {
    beforeEach(() => {
      register(ctx, "alice", "pw");
      login(ctx, "alice", "pw");
    });

    it("calculates and saves a BMI", () => {
      const result = calculateBmi(ctx, 70, 1.75);

      expect(jsonOf(result)).toEqual({ id: 1, bmi: 22.86, category: "Normal weight" });
      expect(ctx.records.history(1)).toHaveLength(1);
    });

    it("reports invalid height without saving", () => {
      const result = calculateBmi(ctx, 70, 0);

      expect(result.isError).toBe(true);
      expect(textOf(result)).toBe("Height must be between 0.5 and 3 m");
      expect(ctx.records.history(1)).toEqual([]);
    });

    it("reports a weight outside the accepted range without saving", () => {
      const result = calculateBmi(ctx, 1e9, 1.75);

      expect(result.isError).toBe(true);
      expect(textOf(result)).toBe("Weight must be between 1 and 300 kg");
      expect(ctx.records.history(1)).toEqual([]);
    });

    it("returns the history newest first, optionally limited", () => {
      calculateBmi(ctx, 25, 1);
      calculateBmi(ctx, 22, 1);
      calculateBmi(ctx, 20, 1);

      const all = jsonOf(getHistory(ctx));
      expect(Array.isArray(all) && all.map((r: { bmi: number }) => r.bmi)).toEqual([20, 22, 25]);

      const limited = jsonOf(getHistory(ctx, 1));
      expect(Array.isArray(limited) && limited.length).toBe(1);
    });

    it("explains when there are no statistics yet", () => {
      expect(textOf(getStatistics(ctx))).toBe("No statistics available. Record a BMI first.");
    });

    it("returns rounded statistics with the recent records", () => {
      calculateBmi(ctx, 25, 1);
      calculateBmi(ctx, 22, 1);
      calculateBmi(ctx, 20, 1);

      expect(jsonOf(getStatistics(ctx))).toMatchObject({
        totalRecords: 3,
        currentBmi: 20,
        averageBmi: 22.33,
        minBmi: 20,
        maxBmi: 25,
        weightChange: -5,
        bmiTrend: "Decreasing",
      });
      const stats = jsonOf(getStatistics(ctx));
      expect(
        typeof stats === "object" && stats !== null && "recent" in stats && Array.isArray(stats.recent)
          ? stats.recent.length
          : -1
      ).toBe(2);
    });

    it("returns the trend series and distribution", () => {
      calculateBmi(ctx, 25, 1);
      calculateBmi(ctx, 20, 1);

      expect(jsonOf(getTrend(ctx))).toEqual({
        points: [
          { recordedAt: "2024-03-01T08:00:00.000Z", bmi: 25, weight: 25 },
          { recordedAt: "2024-03-01T08:01:00.000Z", bmi: 20, weight: 20 },
        ],
        referenceLines: [
          { value: 18.5, label: "Underweight" },
          { value: 25, label: "Normal" },
          { value: 30, label: "Overweight" },
        ],
        distribution: [
          { category: "Normal weight", count: 1 },
          { category: "Overweight", count: 1 },
        ],
      });
    });

    it("exports the history as CSV", () => {
      calculateBmi(ctx, 70, 1.75);

      expect(textOf(exportCsv(ctx))).toBe(
        "weight,height,bmi,category,recorded_at\n70,1.75,22.86,Normal weight,2024-03-01T08:00:00.000Z\n"
      );
    });

    it("only shows the logged-in user's records", () => {
      calculateBmi(ctx, 70, 1.75);
      register(ctx, "bob", "pw");
      login(ctx, "bob", "pw");

      expect(jsonOf(getHistory(ctx))).toEqual([]);
    });
  });
});
