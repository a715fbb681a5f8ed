// pattern: Imperative Shell
import type { Logger } from "pino";
import type { DeliveryMessage } from "./formatter";
import type {
  DeliveryClient,
  Destination,
  SendOptions,
  SendResult,
} from "./telegram";

export const STARTUP_ANNOUNCEMENT =
  "🤖 <b>RSS monitoring started</b>\nActive feed monitoring. Configuration loaded.";

/**
 * Sends one formatted entry. An image message is tried first; if it fails the
 * same text goes out as a plain message so a broken image never holds back
 * the article.
 */
export async function deliverMessage(
  client: DeliveryClient,
  destination: Destination,
  message: DeliveryMessage,
  options: SendOptions,
  logger: Logger,
): Promise<SendResult> {
  if (message.imageUrl) {
    const imageResult = await client.sendImage(
      destination,
      message.imageUrl,
      message.text,
      options,
    );
    if (imageResult.success) return imageResult;

    logger.warn(
      { imageUrl: message.imageUrl, error: imageResult.error },
      "image send failed, falling back to text",
    );
  }

  const textResult = await client.sendText(destination, message.text, options);
  if (!textResult.success) {
    logger.error({ error: textResult.error }, "text send failed");
  }
  return textResult;
}

/**
 * Announces that monitoring has started. Failure is logged and otherwise
 * ignored.
 */
export async function sendStartupAnnouncement(
  client: DeliveryClient,
  destination: Destination,
  options: SendOptions,
  logger: Logger,
): Promise<boolean> {
  const result = await client.sendText(destination, STARTUP_ANNOUNCEMENT, options);
  if (result.success) {
    logger.info({ messageId: result.messageId }, "startup announcement sent");
  } else {
    logger.error({ error: result.error }, "startup announcement failed");
  }
  return result.success;
}
