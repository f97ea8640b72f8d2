// =============================================================================
// @postwatch/shared — Postmark email notifier
// =============================================================================
// Sends one email per digest to every configured recipient. Delivery is
// confirmed only when Postmark answers with ErrorCode 0.
// =============================================================================

import { ServerClient } from "postmark";
import { DeliveryError } from "../errors.js";
import { logExternalCall, type Logger } from "../logger.js";
import type { Digest, Notifier } from "../types.js";

/** The slice of the Postmark SDK this client calls */
export type EmailClient = Pick<ServerClient, "sendEmail">;

export interface PostmarkNotifierOptions {
  serverToken: string;
  sender: string;
  subject: string;
  messageStream?: string;
  timeoutMs: number;
  logger: Logger;
  /** Injected SDK client; built from serverToken/timeoutMs when omitted */
  client?: EmailClient;
}

/**
 * Render a digest as HTML paragraphs: every newline in
 * `Summary of <url>:\n\n<summary>` closes one paragraph and opens the next.
 */
export function formatDigestHtml(digest: Digest): string {
  const body = `Summary of ${digest.sourceId}:\n\n${digest.summary.text}`;
  return `<p>${body.split("\n").join("</p><p>")}</p>`;
}

export function createPostmarkNotifier(
  options: PostmarkNotifierOptions,
): Notifier {
  const { sender, subject, messageStream, logger } = options;
  const client =
    options.client ??
    new ServerClient(options.serverToken, {
      // Postmark takes its timeout in seconds
      timeout: Math.max(1, Math.ceil(options.timeoutMs / 1000)),
    });

  return {
    async send(digest: Digest, recipients: readonly string[]): Promise<void> {
      if (recipients.length === 0) {
        throw new DeliveryError("No recipients configured");
      }

      const start = performance.now();
      try {
        const response = await client.sendEmail({
          From: sender,
          To: recipients.join(","),
          Subject: subject,
          HtmlBody: formatDigestHtml(digest),
          MessageStream: messageStream,
        });

        if (response.ErrorCode !== 0) {
          throw new DeliveryError(
            `Postmark rejected the message (ErrorCode ${response.ErrorCode}): ${response.Message}`,
          );
        }

        logExternalCall(
          logger,
          "postmark",
          "send_email",
          Math.round(performance.now() - start),
        );
        logger.info("Digest delivered", {
          sourceId: digest.sourceId,
          messageId: response.MessageID,
          recipients: recipients.length,
        });
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logExternalCall(
          logger,
          "postmark",
          "send_email",
          Math.round(performance.now() - start),
          message,
        );
        if (err instanceof DeliveryError) throw err;
        throw new DeliveryError(`Postmark request failed: ${message}`, {
          cause: err,
        });
      }
    },
  };
}
