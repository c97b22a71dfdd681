/**
 * Tool implementations for the MCP server.
 *
 * Kept apart from the server so they can be tested without the protocol.
 */

import type { UserId } from "#types";
import { computeBmi, roundTo } from "../bmi/engine.js";
import { checkMeasurement } from "../bmi/measurement.js";
import { isBmiTrackerError } from "../errors.js";
import { toCsv } from "../export/csv.js";
import type { Session } from "../session/session.js";
import {
  categoryDistribution,
  recentRecords,
  summarize,
  trendSeries,
} from "../stats/aggregator.js";
import type { CredentialStore } from "../store/credentials.js";
import type { RecordStore } from "../store/records.js";

export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

export interface ToolContext {
  credentials: CredentialStore;
  records: RecordStore;
  session: Session;
  recentLimit: number;
}

function text(value: unknown): ToolResult {
  return {
    content: [
      {
        type: "text",
        text: typeof value === "string" ? value : JSON.stringify(value, null, 2),
      },
    ],
  };
}

function failure(message: string): ToolResult {
  return { content: [{ type: "text", text: message }], isError: true };
}

/**
 * Run a tool body, turning domain errors into error results.
 * Anything else is a bug and propagates.
 */
function guarded(body: () => ToolResult): ToolResult {
  try {
    return body();
  } catch (err) {
    if (isBmiTrackerError(err)) {
      return failure(err.message);
    }
    throw err;
  }
}

function requireUser(ctx: ToolContext, body: (userId: UserId) => ToolResult): ToolResult {
  const userId = ctx.session.userId;
  if (userId === null) {
    return failure("Not logged in. Call the login tool first.");
  }
  return guarded(() => body(userId));
}

export function register(ctx: ToolContext, username: string, password: string): ToolResult {
  return guarded(() => {
    const user = ctx.credentials.register(username, password);
    return text({ id: user.id, username: user.username, createdAt: user.createdAt });
  });
}

export function login(ctx: ToolContext, username: string, password: string): ToolResult {
  return guarded(() => {
    const userId = ctx.credentials.authenticate(username, password);
    ctx.session.login(userId, username);
    return text(`Logged in as ${username}`);
  });
}

export function logout(ctx: ToolContext): ToolResult {
  const username = ctx.session.username;
  ctx.session.logout();
  return text(username ? `Logged out ${username}` : "No user was logged in");
}

/**
 * Compute a BMI and save it to the logged-in user's history
 */
export function calculateBmi(ctx: ToolContext, weight: number, height: number): ToolResult {
  return requireUser(ctx, (userId) => {
    checkMeasurement(weight, height);
    const result = computeBmi(weight, height);
    const id = ctx.records.append(userId, weight, height);
    return text({ id, bmi: result.bmi, category: result.category });
  });
}

export function getHistory(ctx: ToolContext, limit?: number): ToolResult {
  return requireUser(ctx, (userId) => {
    const history = ctx.records.history(userId);
    return text(limit === undefined ? history : recentRecords(history, limit));
  });
}

export function getStatistics(ctx: ToolContext): ToolResult {
  return requireUser(ctx, (userId) => {
    const history = ctx.records.history(userId);
    const stats = summarize(history);
    if (!stats) {
      return text("No statistics available. Record a BMI first.");
    }
    return text({
      ...stats,
      averageBmi: roundTo(stats.averageBmi),
      weightChange: roundTo(stats.weightChange, 1),
      recent: recentRecords(history, ctx.recentLimit),
    });
  });
}

export function getTrend(ctx: ToolContext): ToolResult {
  return requireUser(ctx, (userId) => {
    const history = ctx.records.history(userId);
    return text({
      ...trendSeries(history),
      distribution: categoryDistribution(history),
    });
  });
}

export function exportCsv(ctx: ToolContext): ToolResult {
  return requireUser(ctx, (userId) => text(toCsv(ctx.records.history(userId))));
}
