import type { BaseLogger } from "pino";
import { z } from "zod";

export class MattermostError extends Error {
  statusCode?: number;

  constructor(message: string, args: { statusCode?: number; cause?: unknown } = {}) {
    super(message, { cause: args.cause });
    this.name = "MattermostError";
    this.statusCode = args.statusCode;
  }
}

export type DirectMessageResult = {
  userId: string;
  channelId: string;
  postId: string;
};

export interface MattermostClient {
  sendDirectMessage(username: string, message: string): Promise<DirectMessageResult>;
}

const UserResponse = z.object({ id: z.string().min(1), username: z.string().optional() });
const ChannelResponse = z.object({ id: z.string().min(1) });
const PostResponse = z.object({ id: z.string().min(1) });

/** Mattermost REST v4 with a bot token; direct messages go bot → user. */
export class HttpMattermostClient implements MattermostClient {
  private readonly fetchImpl: typeof fetch;
  private readonly baseUrl: string;
  private botUserId?: Promise<string>;

  constructor(
    private readonly options: {
      url: string;
      botToken: string;
      fetchImpl?: typeof fetch;
      log?: BaseLogger;
    }
  ) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.baseUrl = `${options.url.replace(/\/+$/, "")}/api/v4`;
  }

  private async request<T>(
    method: "GET" | "POST",
    path: string,
    schema: z.ZodType<T>,
    body?: unknown
  ): Promise<T> {
    let res: Response;
    try {
      res = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method,
        headers: {
          authorization: `Bearer ${this.options.botToken}`,
          ...(body !== undefined ? { "content-type": "application/json" } : {}),
        },
        ...(body !== undefined ? { body: JSON.stringify(body) } : {}),
      });
    } catch (err) {
      throw new MattermostError(`Mattermost request ${method} ${path} failed`, { cause: err });
    }

    if (!res.ok) {
      const text = await res.text();
      this.options.log?.warn(
        { statusCode: res.status, path, bodySnippet: text.slice(0, 300) },
        "mattermost.request_failed"
      );
      throw new MattermostError(`Mattermost ${method} ${path} returned ${res.status}`, {
        statusCode: res.status,
      });
    }

    const parsed = schema.safeParse(await res.json());
    if (!parsed.success) {
      throw new MattermostError(`Mattermost ${method} ${path} returned an unexpected shape`, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  private getBotUserId(): Promise<string> {
    if (!this.botUserId) {
      this.botUserId = this.request("GET", "/users/me", UserResponse).then(
        (user) => user.id,
        (err: unknown) => {
          // retry on the next call instead of caching a rejection
          this.botUserId = undefined;
          throw err;
        }
      );
    }
    return this.botUserId;
  }

  async findUserId(username: string): Promise<string> {
    const user = await this.request(
      "GET",
      `/users/username/${encodeURIComponent(username)}`,
      UserResponse
    );
    return user.id;
  }

  async sendDirectMessage(username: string, message: string): Promise<DirectMessageResult> {
    const botId = await this.getBotUserId();
    const userId = await this.findUserId(username);
    const channel = await this.request("POST", "/channels/direct", ChannelResponse, [botId, userId]);
    const post = await this.request("POST", "/posts", PostResponse, {
      channel_id: channel.id,
      message,
    });

    this.options.log?.info({ channelId: channel.id, postId: post.id }, "mattermost.dm_sent");
    return { userId, channelId: channel.id, postId: post.id };
  }
}
