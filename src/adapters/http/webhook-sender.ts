import axios, { type AxiosInstance, isAxiosError } from "axios";
import type { WebhookSendInput, WebhookSendResult, WebhookSenderPort } from "../../ports/webhook-sender.js";

const TIMEOUT_CODES = new Set(["ECONNABORTED", "ETIMEDOUT", "ERR_CANCELED"]);

export class HttpWebhookSender implements WebhookSenderPort {
  constructor(private readonly client: AxiosInstance = axios.create()) {}

  async send(input: WebhookSendInput): Promise<WebhookSendResult> {
    try {
      const response = await this.client.request({
        method: "POST",
        url: input.url,
        headers: input.headers,
        data: input.body,
        timeout: input.timeoutMs,
        signal: AbortSignal.timeout(input.timeoutMs),
        // Body is already serialized; it must go out byte-identical to what was signed.
        transformRequest: [(data: unknown) => data],
        responseType: "text",
        maxRedirects: 0,
        validateStatus: () => true,
      });
      const ok = response.status >= 200 && response.status < 300;
      return {
        ok,
        statusCode: response.status,
        ...(ok ? {} : { errorCode: `http_${response.status}` }),
      };
    } catch (error) {
      if (isAxiosError(error) && error.code && TIMEOUT_CODES.has(error.code)) {
        return { ok: false, errorCode: "webhook_timeout" };
      }
      return { ok: false, errorCode: "webhook_transport_error" };
    }
  }
}
