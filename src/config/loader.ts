import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { isAbsolute, join } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod/v4";
import { ConfigError } from "../errors.js";

export const CONFIG_FILE = "bmi-tracker.yaml";

export const ConfigSchema = z.object({
  database: z.string().min(1).default("bmi_data.db"),
  recentLimit: z.number().int().positive().default(5),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse and validate a config from a YAML string
 */
export function parseConfig(yamlContent: string): Config {
  const data: unknown = parseYaml(yamlContent);
  return ConfigSchema.parse(data ?? {});
}

/**
 * Load the config from `dir`, falling back to defaults when there is no
 * config file. BMI_TRACKER_DB overrides the database path. A relative
 * database path is resolved against `dir`.
 */
export async function loadConfig(
  dir: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<Config> {
  const configPath = join(dir, CONFIG_FILE);

  let config: Config;
  if (existsSync(configPath)) {
    try {
      config = parseConfig(await readFile(configPath, "utf-8"));
    } catch (err) {
      throw new ConfigError(`Invalid config in ${configPath}`, { cause: err });
    }
  } else {
    config = ConfigSchema.parse({});
  }

  const database = env.BMI_TRACKER_DB || config.database;
  return {
    ...config,
    database:
      database === ":memory:" || isAbsolute(database) ? database : join(dir, database),
  };
}
