#!/usr/bin/env node

import { existsSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { BmiRecord, UserId } from "#types";
import { BMI_THRESHOLDS, computeBmi, roundTo } from "../bmi/engine.js";
import { checkMeasurement } from "../bmi/measurement.js";
import { CONFIG_FILE, loadConfig, type Config } from "../config/loader.js";
import { isBmiTrackerError } from "../errors.js";
import { toCsv } from "../export/csv.js";
import { startServer } from "../mcp/server.js";
import {
  categoryDistribution,
  recentRecords,
  summarize,
  trendSeries,
} from "../stats/aggregator.js";
import { CredentialStore } from "../store/credentials.js";
import { openDatabase, type Db } from "../store/database.js";
import { RecordStore } from "../store/records.js";

// ANSI colors (disabled if not TTY)
const isTTY = process.stdout.isTTY && !process.env.NO_COLOR;
const c = {
  green: (s: string) => (isTTY ? `\x1b[32m${s}\x1b[0m` : s),
  red: (s: string) => (isTTY ? `\x1b[31m${s}\x1b[0m` : s),
  yellow: (s: string) => (isTTY ? `\x1b[33m${s}\x1b[0m` : s),
  cyan: (s: string) => (isTTY ? `\x1b[36m${s}\x1b[0m` : s),
  dim: (s: string) => (isTTY ? `\x1b[2m${s}\x1b[0m` : s),
  bold: (s: string) => (isTTY ? `\x1b[1m${s}\x1b[0m` : s),
};

interface Credentials {
  username: string;
  password: string;
}

function fail(message: string, hint?: string): never {
  console.error(c.red(`✗ ${message}`));
  if (hint) {
    console.error(c.dim(`\n  ${hint}`));
  }
  process.exit(1);
}

/** Read --key=value from the argument list */
function flag(args: string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  const arg = args.find((a) => a.startsWith(prefix));
  return arg?.slice(prefix.length);
}

function numberFlag(args: string[], name: string): number {
  const raw = flag(args, name);
  if (raw === undefined) {
    fail(`Missing --${name}=<number>`);
  }
  const value = Number(raw);
  if (raw.trim() === "" || Number.isNaN(value)) {
    fail(`--${name} must be a number, got '${raw}'`);
  }
  return value;
}

function credentialsFrom(args: string[]): Credentials {
  const username = flag(args, "user");
  const password = flag(args, "password") ?? process.env.BMI_TRACKER_PASSWORD;
  if (!username || !password) {
    fail(
      "Please enter both username and password",
      "Pass --user=<name> and --password=<password> (or set BMI_TRACKER_PASSWORD)"
    );
  }
  return { username, password };
}

async function withDatabase<T>(fn: (db: Db, config: Config) => T | Promise<T>): Promise<T> {
  const config = await loadConfig(process.cwd());
  const db = await openDatabase(config.database);
  try {
    return await fn(db, config);
  } finally {
    db.close();
  }
}

function authenticate(db: Db, args: string[]): UserId {
  const { username, password } = credentialsFrom(args);
  return new CredentialStore(db).authenticate(username, password);
}

function formatRecord(r: BmiRecord): string {
  return [
    r.recordedAt.padEnd(26),
    `${r.weight.toFixed(1)} kg`.padEnd(10),
    `${r.height.toFixed(2)} m`.padEnd(8),
    r.bmi.toFixed(2).padEnd(7),
    r.category,
  ].join("  ");
}

function printRecords(records: BmiRecord[]): void {
  console.log(
    c.dim(
      ["recorded_at".padEnd(26), "weight".padEnd(10), "height".padEnd(8), "bmi".padEnd(7), "category"].join("  ")
    )
  );
  for (const record of records) {
    console.log(formatRecord(record));
  }
}

async function init() {
  const configPath = join(process.cwd(), CONFIG_FILE);

  if (existsSync(configPath)) {
    fail(`${CONFIG_FILE} already exists`);
  }

  await writeFile(
    configPath,
    `# BMI tracker configuration\ndatabase: bmi_data.db\nrecentLimit: 5\n`
  );
  await withDatabase(() => undefined);

  console.log(c.green(`✓ Created ${CONFIG_FILE}`));
  console.log(c.bold(`\nNext steps:`));
  console.log(`  1. Run: ${c.cyan("bmi-tracker register --user=<name> --password=<password>")}`);
  console.log(`  2. Run: ${c.cyan("bmi-tracker calculate --user=<name> --weight=70 --height=1.75")}`);
}

async function register(args: string[]) {
  const { username, password } = credentialsFrom(args);
  const confirm = flag(args, "confirm");
  if (confirm !== undefined && confirm !== password) {
    fail("Passwords do not match");
  }

  await withDatabase((db) => new CredentialStore(db).register(username, password));
  console.log(c.green(`✓ Account created successfully for ${username}`));
}

async function calculate(args: string[]) {
  const weight = numberFlag(args, "weight");
  const height = numberFlag(args, "height");
  checkMeasurement(weight, height);

  await withDatabase((db) => {
    const userId = authenticate(db, args);
    const result = computeBmi(weight, height);
    new RecordStore(db).append(userId, weight, height);

    console.log(c.green(`✓ Your BMI is: ${c.bold(result.bmi.toFixed(2))}`));
    console.log(`  Category: ${c.cyan(result.category)}`);
    console.log(c.dim(`  BMI record saved`));
  });
}

async function history(args: string[]) {
  const limit = flag(args, "limit") === undefined ? undefined : numberFlag(args, "limit");

  await withDatabase((db) => {
    const userId = authenticate(db, args);
    const records = new RecordStore(db).history(userId);

    if (records.length === 0) {
      console.log(c.yellow(`No BMI records found. Start by calculating your BMI!`));
      return;
    }

    printRecords(limit === undefined ? records : recentRecords(records, limit));
  });
}

async function stats(args: string[]) {
  await withDatabase((db, config) => {
    const userId = authenticate(db, args);
    const records = new RecordStore(db).history(userId);
    const summary = summarize(records);

    if (!summary) {
      console.log(c.yellow(`No statistics available. Start tracking your BMI!`));
      return;
    }

    console.log(c.bold("BMI Statistics"));
    console.log(`  Total records:  ${c.cyan(String(summary.totalRecords))}`);
    console.log(`  Current BMI:    ${c.cyan(summary.currentBmi.toFixed(2))}`);
    console.log(`  Average BMI:    ${c.cyan(roundTo(summary.averageBmi).toFixed(2))}`);
    console.log(
      `  BMI range:      ${c.cyan(`${summary.minBmi.toFixed(2)} - ${summary.maxBmi.toFixed(2)}`)}`
    );
    console.log(`  Weight change:  ${c.cyan(`${roundTo(summary.weightChange, 1).toFixed(1)} kg`)}`);
    console.log(`  Trend:          ${c.cyan(summary.bmiTrend)}`);

    console.log(c.bold("\nRecent Records"));
    printRecords(recentRecords(records, config.recentLimit));
  });
}

async function trend(args: string[]) {
  await withDatabase((db) => {
    const userId = authenticate(db, args);
    const records = new RecordStore(db).history(userId);

    if (records.length === 0) {
      console.log(c.yellow(`No data available for trend analysis. Add some BMI records first!`));
      return;
    }

    if (args.includes("--json")) {
      console.log(
        JSON.stringify(
          { ...trendSeries(records), distribution: categoryDistribution(records) },
          null,
          2
        )
      );
      return;
    }

    console.log(c.bold("BMI Trend Over Time"));
    for (const point of trendSeries(records).points) {
      console.log(`  ${point.recordedAt}  ${point.bmi.toFixed(2)}  ${point.weight.toFixed(1)} kg`);
    }
    console.log(c.dim(`  Reference lines: ${BMI_THRESHOLDS.map((t) => `${t.value} (${t.label})`).join(", ")}`));

    console.log(c.bold("\nBMI Category Distribution"));
    for (const { category, count } of categoryDistribution(records)) {
      console.log(`  ${category.padEnd(14)} ${count}`);
    }
  });
}

async function exportHistory(args: string[]) {
  const output = flag(args, "output");

  const { csv, username } = await withDatabase((db) => {
    const { username } = credentialsFrom(args);
    const userId = authenticate(db, args);
    return { csv: toCsv(new RecordStore(db).history(userId)), username };
  });

  if (!output) {
    process.stdout.write(csv);
    return;
  }

  const target = output === "-" ? `bmi_history_${username}.csv` : output;
  await writeFile(target, csv);
  console.log(c.green(`✓ Wrote ${target}`));
}

async function serve() {
  const config = await loadConfig(process.cwd());
  await startServer({ databasePath: config.database, recentLimit: config.recentLimit });
}

function help() {
  console.log(`${c.bold("BMI Tracker")} - Record BMI measurements and follow the trend

${c.bold("Usage:")} bmi-tracker <command> [options]

${c.bold("Commands:")}
  ${c.cyan("init")}              Create ${CONFIG_FILE} and the database in the current directory
  ${c.cyan("register")}          Create an account
  ${c.cyan("calculate")}         Calculate your BMI and save it
  ${c.cyan("history")}           List your BMI records, newest first
  ${c.cyan("stats")}             Show summary statistics and trend
  ${c.cyan("trend")} [--json]    Show BMI/weight series and category distribution
  ${c.cyan("export")}            Export your history as CSV
  ${c.cyan("serve")}             Start MCP server for AI assistants

${c.bold("Options:")}
  ${c.cyan("--user")}            Username
  ${c.cyan("--password")}        Password (or set BMI_TRACKER_PASSWORD)
  ${c.cyan("--confirm")}         Repeat the password when registering
  ${c.cyan("--weight")}          Weight in kilograms, 1-300 (calculate)
  ${c.cyan("--height")}          Height in meters, 0.5-3.0 (calculate)
  ${c.cyan("--limit")}           Show only the newest N records (history)
  ${c.cyan("--output")}          Write CSV to a file; "-" picks bmi_history_<user>.csv (export)

${c.bold("Examples:")}
  ${c.dim("$")} bmi-tracker init
  ${c.dim("$")} bmi-tracker register --user=alice --password=secret
  ${c.dim("$")} bmi-tracker calculate --user=alice --password=secret --weight=70 --height=1.75
  ${c.dim("$")} bmi-tracker stats --user=alice --password=secret
  ${c.dim("$")} bmi-tracker export --user=alice --password=secret --output=-
`);
}

async function main(args: string[]) {
  const command = args[0];
  const rest = args.slice(1);

  switch (command) {
    case "init":
      return init();
    case "register":
      return register(rest);
    case "calculate":
      return calculate(rest);
    case "history":
      return history(rest);
    case "stats":
      return stats(rest);
    case "trend":
      return trend(rest);
    case "export":
      return exportHistory(rest);
    case "serve":
      return serve();
    case "--help":
    case "-h":
    case undefined:
      return help();
    default:
      console.log(c.red(`Unknown command: ${command}`));
      console.log(c.dim(`\nRun ${c.cyan("bmi-tracker --help")} for usage\n`));
      process.exit(1);
  }
}

main(process.argv.slice(2)).catch((err: unknown) => {
  if (isBmiTrackerError(err)) {
    fail(err.message);
  }
  console.error(c.red(`✗ ${err instanceof Error ? err.stack ?? err.message : String(err)}`));
  process.exit(1);
});
