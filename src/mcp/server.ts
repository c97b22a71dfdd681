import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { HEIGHT_RANGE, WEIGHT_RANGE } from "../bmi/measurement.js";
import { Session } from "../session/session.js";
import { openDatabase, type Db } from "../store/database.js";
import { CredentialStore } from "../store/credentials.js";
import { RecordStore } from "../store/records.js";
import * as tools from "./tools.js";

export interface ServerOptions {
  databasePath: string;
  recentLimit: number;
}

export function createServer(db: Db, recentLimit: number) {
  const server = new McpServer({
    name: "bmi-tracker",
    version: "0.1.0",
  });

  // One server process serves one user session
  const ctx: tools.ToolContext = {
    credentials: new CredentialStore(db),
    records: new RecordStore(db),
    session: new Session(),
    recentLimit,
  };

  server.tool(
    "register",
    "Create a new account",
    {
      username: z.string().min(1).describe("Username (case-sensitive)"),
      password: z.string().min(1).describe("Password"),
    },
    async ({ username, password }) => tools.register(ctx, username, password)
  );

  server.tool(
    "login",
    "Log in; later tools act on behalf of this user",
    {
      username: z.string().describe("Username"),
      password: z.string().describe("Password"),
    },
    async ({ username, password }) => tools.login(ctx, username, password)
  );

  server.tool("logout", "Log out the current user", {}, async () => tools.logout(ctx));

  server.tool(
    "calculate_bmi",
    "Calculate BMI from weight and height and save it to the user's history",
    {
      weight: z
        .number()
        .min(WEIGHT_RANGE.min)
        .max(WEIGHT_RANGE.max)
        .describe("Weight in kilograms"),
      height: z
        .number()
        .min(HEIGHT_RANGE.min)
        .max(HEIGHT_RANGE.max)
        .describe("Height in meters, e.g. 1.75"),
    },
    async ({ weight, height }) => tools.calculateBmi(ctx, weight, height)
  );

  server.tool(
    "get_history",
    "List the user's BMI records, newest first",
    { limit: z.number().int().positive().optional().describe("Return only the newest N records") },
    async ({ limit }) => tools.getHistory(ctx, limit)
  );

  server.tool(
    "get_statistics",
    "Summary statistics and trend over the user's BMI history",
    {},
    async () => tools.getStatistics(ctx)
  );

  server.tool(
    "get_trend",
    "Chart-ready BMI and weight series with category reference lines and distribution",
    {},
    async () => tools.getTrend(ctx)
  );

  server.tool(
    "export_csv",
    "Export the user's history as CSV",
    {},
    async () => tools.exportCsv(ctx)
  );

  return server;
}

export async function startServer(options: ServerOptions) {
  const db = await openDatabase(options.databasePath);
  const server = createServer(db, options.recentLimit);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`bmi-tracker MCP server ready (database: ${options.databasePath})`);
}
