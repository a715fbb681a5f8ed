// pattern: Imperative Shell
import { z } from "zod";

export type Destination = {
  readonly chatId: string;
  readonly threadId: number | null;
};

export type SendOptions = {
  readonly muted: boolean;
};

/**
 * Discriminated union result type for a single Telegram send.
 */
export type SendResult =
  | { readonly success: true; readonly messageId: number }
  | { readonly success: false; readonly error: string };

/**
 * Outbound side of the relay. Implementations never throw; failures are
 * returned in the result.
 */
export type DeliveryClient = {
  readonly sendText: (
    destination: Destination,
    text: string,
    options: SendOptions,
  ) => Promise<SendResult>;
  readonly sendImage: (
    destination: Destination,
    imageUrl: string,
    caption: string,
    options: SendOptions,
  ) => Promise<SendResult>;
};

export type TelegramClientOptions = {
  readonly botToken: string;
  readonly timeoutMs: number;
  readonly apiBaseUrl?: string;
};

const telegramResponseSchema = z.object({
  ok: z.boolean(),
  result: z.object({ message_id: z.number() }).optional(),
  error_code: z.number().optional(),
  description: z.string().optional(),
  parameters: z.object({ retry_after: z.number().optional() }).optional(),
});

function baseFields(
  destination: Destination,
  options: SendOptions,
): Record<string, unknown> {
  const fields: Record<string, unknown> = {
    chat_id: destination.chatId,
    parse_mode: "HTML",
    disable_notification: options.muted,
  };
  if (destination.threadId !== null) {
    fields["message_thread_id"] = destination.threadId;
  }
  return fields;
}

/**
 * Creates a Telegram Bot API client bound to one bot token. Every request is
 * aborted after `timeoutMs`.
 */
export function createTelegramClient(
  options: TelegramClientOptions,
): DeliveryClient {
  const apiBaseUrl = options.apiBaseUrl ?? "https://api.telegram.org";

  async function call(
    method: string,
    body: Record<string, unknown>,
  ): Promise<SendResult> {
    try {
      const response = await fetch(
        `${apiBaseUrl}/bot${options.botToken}/${method}`,
        {
          method: "POST",
          signal: AbortSignal.timeout(options.timeoutMs),
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify(body),
        },
      );

      let payload: unknown;
      try {
        payload = await response.json();
      } catch {
        return {
          success: false,
          error: `HTTP ${response.status}: ${response.statusText}`,
        };
      }

      const parsed = telegramResponseSchema.safeParse(payload);
      if (!parsed.success) {
        return {
          success: false,
          error: `HTTP ${response.status}: unexpected response body`,
        };
      }

      const data = parsed.data;
      if (!data.ok || !data.result) {
        const code = data.error_code ?? response.status;
        const retryAfter = data.parameters?.retry_after;
        return {
          success: false,
          error:
            `telegram error ${code}: ${data.description ?? "unknown error"}` +
            (retryAfter !== undefined ? ` (retry after ${retryAfter}s)` : ""),
        };
      }

      return { success: true, messageId: data.result.message_id };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return { success: false, error: message };
    }
  }

  return {
    sendText: (destination, text, sendOptions) =>
      call("sendMessage", {
        ...baseFields(destination, sendOptions),
        text,
      }),
    sendImage: (destination, imageUrl, caption, sendOptions) =>
      call("sendPhoto", {
        ...baseFields(destination, sendOptions),
        photo: imageUrl,
        caption,
      }),
  };
}
