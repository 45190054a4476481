import type { WebhookSendInput, WebhookSendResult, WebhookSenderPort } from "../../ports/webhook-sender.js";

const TRANSIENT_FAILURE = "transient_webhook_error";

/**
 * Local stand-in for tenant receivers. URL keywords script the outcome:
 * `always-fail` never succeeds, `flaky` fails every odd attempt per URL.
 */
export class InMemoryWebhookSender implements WebhookSenderPort {
  private readonly attemptsByUrl = new Map<string, number>();
  private readonly sent: WebhookSendInput[] = [];

  async send(input: WebhookSendInput): Promise<WebhookSendResult> {
    const currentAttempts = (this.attemptsByUrl.get(input.url) ?? 0) + 1;
    this.attemptsByUrl.set(input.url, currentAttempts);
    this.sent.push(input);

    if (input.url.includes("always-fail")) {
      return { ok: false, statusCode: 503, errorCode: TRANSIENT_FAILURE };
    }

    if (input.url.includes("flaky") && currentAttempts % 2 === 1) {
      return { ok: false, statusCode: 500, errorCode: TRANSIENT_FAILURE };
    }

    return { ok: true, statusCode: 200 };
  }

  getSentRequests(): WebhookSendInput[] {
    return [...this.sent];
  }
}
