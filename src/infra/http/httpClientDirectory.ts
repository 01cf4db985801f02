import { z } from "zod";
import { UpstreamServiceError } from "../../common/errors";
import type { Logger } from "../../common/logger";
import type { ClientDirectory, ClientSummary } from "../../modules/clients/directory";

const clientResponseSchema = z.object({
  clientId: z.number().int(),
  name: z.string()
});

type FetchLike = typeof fetch;

/** Client directory backed by the clients API (`GET /clients/:id`). */
export class HttpClientDirectory implements ClientDirectory {
  private readonly baseUrl: string;

  constructor(
    baseUrl: string,
    private readonly timeoutMs: number,
    private readonly logger?: Logger,
    private readonly fetchImpl: FetchLike = fetch
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
  }

  async getClientById(clientId: number): Promise<ClientSummary | null> {
    const url = `${this.baseUrl}/clients/${clientId}`;

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: { accept: "application/json" },
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (error) {
      this.logger?.error({ err: error, clientId }, "Clients API request failed");
      throw new UpstreamServiceError("Clients API is unreachable");
    }

    if (response.status === 404) {
      return null;
    }
    if (!response.ok) {
      this.logger?.error({ clientId, status: response.status }, "Clients API returned an error");
      throw new UpstreamServiceError(`Clients API responded with ${response.status}`);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      this.logger?.error({ err: error, clientId }, "Clients API body could not be read");
      throw new UpstreamServiceError("Clients API returned an unreadable body");
    }

    const parsed = clientResponseSchema.safeParse(payload);
    if (!parsed.success) {
      this.logger?.error({ clientId, issues: parsed.error.issues }, "Unexpected clients API payload");
      throw new UpstreamServiceError("Clients API returned an unexpected payload");
    }
    return { clientId: parsed.data.clientId, name: parsed.data.name };
  }
}
