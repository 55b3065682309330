import { z } from "zod";
import { ConfigurationError } from "../errors";
import type { WritableStatus } from "../status/types";
import { Transport, TransportError, TRANSPORT_ERROR_CODES, createTransport } from "./transport";

export interface RemoteApiConfig {
  serverAddress: string | null | undefined;
  apiToken: string | null | undefined;
  timeoutMs?: number;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

const unreadCountSchema = z.object({ total: z.number().int().nonnegative() });

export const feedCountersSchema = z.object({
  reads: z.record(z.string(), z.number()).default({}),
  unreads: z.record(z.string(), z.number()).default({}),
});

export type FeedCounters = z.infer<typeof feedCountersSchema>;

export const categorySchema = z.object({
  id: z.number().int().positive(),
  title: z.string(),
  total_unread: z.number().int().nonnegative().optional(),
  feed_count: z.number().int().nonnegative().optional(),
});

export type Category = z.infer<typeof categorySchema>;

/**
 * Operations of the remote feed reader server that the sync engine needs.
 */
export interface RemoteApi {
  updateEntries(ids: number[], status: WritableStatus, options?: RequestOptions): Promise<void>;
  markFeedAsRead(feedId: number, options?: RequestOptions): Promise<void>;
  markCategoryAsRead(categoryId: number, options?: RequestOptions): Promise<void>;
  getUnreadCount(options?: RequestOptions): Promise<number>;
  getFeedCounters(options?: RequestOptions): Promise<FeedCounters>;
  getCategories(withCounts?: boolean, options?: RequestOptions): Promise<Category[]>;
}

const parseBody = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, status: number): T => {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new TransportError(
      "Unexpected response from server",
      status,
      TRANSPORT_ERROR_CODES.INVALID_RESPONSE,
      parsed.error.issues
    );
  }
  return parsed.data;
};

export class HttpRemoteApi implements RemoteApi {
  constructor(private transport: Transport) {}

  async updateEntries(
    ids: number[],
    status: WritableStatus,
    options: RequestOptions = {}
  ): Promise<void> {
    if (ids.length === 0) return;
    await this.transport.request({
      method: "PUT",
      path: "/entries",
      body: { entry_ids: ids, status },
      signal: options.signal,
    });
  }

  async markFeedAsRead(feedId: number, options: RequestOptions = {}): Promise<void> {
    await this.transport.request({
      method: "PUT",
      path: `/feeds/${feedId}/mark-all-as-read`,
      signal: options.signal,
    });
  }

  async markCategoryAsRead(categoryId: number, options: RequestOptions = {}): Promise<void> {
    await this.transport.request({
      method: "PUT",
      path: `/categories/${categoryId}/mark-all-as-read`,
      signal: options.signal,
    });
  }

  async getUnreadCount(options: RequestOptions = {}): Promise<number> {
    const response = await this.transport.request({
      method: "GET",
      path: "/entries",
      params: { status: "unread", limit: 1 },
      signal: options.signal,
    });
    return parseBody(unreadCountSchema, response.data, response.status).total;
  }

  async getFeedCounters(options: RequestOptions = {}): Promise<FeedCounters> {
    const response = await this.transport.request({
      method: "GET",
      path: "/feeds/counters",
      signal: options.signal,
    });
    return parseBody(feedCountersSchema, response.data, response.status);
  }

  async getCategories(withCounts = false, options: RequestOptions = {}): Promise<Category[]> {
    const response = await this.transport.request({
      method: "GET",
      path: "/categories",
      params: withCounts ? { counts: "true" } : undefined,
      signal: options.signal,
    });
    return parseBody(z.array(categorySchema), response.data, response.status);
  }
}

export const createRemoteApi = (config: RemoteApiConfig): RemoteApi => {
  const serverAddress = config.serverAddress?.trim();
  const apiToken = config.apiToken?.trim();

  if (!serverAddress) {
    throw new ConfigurationError("Server address is not configured");
  }
  if (!apiToken) {
    throw new ConfigurationError("API token is not configured");
  }

  return new HttpRemoteApi(
    createTransport({
      baseUrl: `${serverAddress.replace(/\/+$/, "")}/v1`,
      headers: { "X-Auth-Token": apiToken },
      timeout: config.timeoutMs,
    })
  );
};
