import { z } from "zod";

const booleanish = z.union([
  z.boolean(),
  z
    .string()
    .transform((value) => value.trim().toLowerCase())
    .pipe(z.enum(["true", "false", "1", "0", "yes", "no"]))
    .transform((value) => value === "true" || value === "1" || value === "yes"),
]);

const telegramConfigSchema = z.object({
  botToken: z.string().min(1),
  chatId: z
    .union([z.string().min(1), z.number().int()])
    .transform((value) => String(value)),
  topicId: z.coerce.number().int().positive().optional(),
  muted: booleanish.default(false),
});

const monitorConfigSchema = z.object({
  checkIntervalSeconds: z.coerce.number().int().positive().default(3600),
  deliveryDelayMs: z.coerce.number().int().nonnegative().default(2000),
  feedListReload: z.enum(["cycle", "startup"]).default("cycle"),
});

export const appConfigSchema = z.object({
  telegram: telegramConfigSchema,
  monitor: monitorConfigSchema.default({}),
  history: z
    .object({
      maxItems: z.coerce.number().int().positive().default(200),
    })
    .default({}),
  format: z
    .object({
      includeDescription: booleanish.default(false),
      maxDescriptionLength: z.coerce.number().int().min(4).default(800),
    })
    .default({}),
  paths: z
    .object({
      feedsFile: z.string().min(1).default("data/feeds.txt"),
      historyFile: z.string().min(1).default("data/sent_items.json"),
    })
    .default({}),
  network: z
    .object({
      fetchTimeoutMs: z.coerce.number().int().positive().default(20000),
      deliveryTimeoutMs: z.coerce.number().int().positive().default(20000),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type FormatConfig = AppConfig["format"];
export type MonitorConfig = AppConfig["monitor"];
