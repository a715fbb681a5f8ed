import { readFileSync } from "node:fs";
import { parse } from "yaml";
import { appConfigSchema } from "./schema";
import type { AppConfig, FormatConfig, MonitorConfig } from "./schema";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Env = Readonly<Record<string, string | undefined>>;
type RawSection = Record<string, unknown>;

function asRecord(value: unknown): RawSection {
  return typeof value === "object" && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : {};
}

function readConfigFile(configPath: string): RawSection {
  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return {};
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(
      `failed to read config file at ${configPath}: ${message}`,
    );
  }

  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`failed to parse YAML in ${configPath}: ${message}`);
  }

  if (parsed !== null && parsed !== undefined && typeof parsed !== "object") {
    throw new ConfigError(`expected a mapping at the top of ${configPath}`);
  }
  return asRecord(parsed);
}

/**
 * Copies the non-empty environment values named in `mapping` onto `section`.
 * Keys of `mapping` are config keys, values are variable names.
 */
function overlay(
  section: unknown,
  env: Env,
  mapping: Readonly<Record<string, string>>,
): RawSection {
  const result = asRecord(section);
  for (const [key, variable] of Object.entries(mapping)) {
    const value = env[variable]?.trim();
    if (value) result[key] = value;
  }
  return result;
}

/**
 * Loads the application configuration.
 *
 * The YAML file at `configPath` is optional; when it is absent every setting
 * comes from the environment or its default. Environment variables win over
 * the file. Throws a ConfigError listing every invalid setting.
 */
export function loadConfig(
  configPath: string,
  env: Env = process.env,
): AppConfig {
  const file = readConfigFile(configPath);

  const merged = {
    ...file,
    telegram: overlay(file["telegram"], env, {
      botToken: "TELEGRAM_BOT_TOKEN",
      chatId: "TELEGRAM_CHAT_ID",
      topicId: "TELEGRAM_TOPIC_ID",
      muted: "DISABLE_NOTIFICATION",
    }),
    monitor: overlay(file["monitor"], env, {
      checkIntervalSeconds: "CHECK_INTERVAL",
      feedListReload: "FEED_LIST_RELOAD",
    }),
    history: overlay(file["history"], env, {
      maxItems: "MAX_HISTORY_ITEMS",
    }),
    format: overlay(file["format"], env, {
      includeDescription: "INCLUDE_DESCRIPTION",
    }),
    paths: overlay(file["paths"], env, {
      feedsFile: "FEEDS_FILE",
      historyFile: "HISTORY_FILE",
    }),
  };

  const result = appConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new ConfigError(`invalid configuration:\n${issues}`);
  }

  return result.data;
}

export type { AppConfig, FormatConfig, MonitorConfig };
