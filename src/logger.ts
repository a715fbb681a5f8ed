import pino from "pino";

/**
 * Creates the relay's logger: JSON lines with string level labels and ISO
 * timestamps. The bot token is censored wherever it shows up in a log
 * object, since it grants full control of the bot.
 *
 * @param level - Overrides `LOG_LEVEL` (default `info`)
 * @param destination - Defaults to stdout
 */
export function createLogger(
  level?: string,
  destination?: pino.DestinationStream,
): pino.Logger {
  const options: pino.LoggerOptions = {
    name: "feed-relay",
    level: level ?? process.env["LOG_LEVEL"] ?? "info",
    redact: {
      paths: ["botToken", "*.botToken"],
      censor: "[redacted]",
    },
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  return destination ? pino(options, destination) : pino(options);
}
