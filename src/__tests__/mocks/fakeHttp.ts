import { HttpGetter, HttpRequestOptions } from "../../services/positioning";

interface RecordedRequest {
  url: string;
  params?: Record<string, string>;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

type Reply = { data: unknown } | { error: Error };

/** Answers GET requests from a queue of canned replies */
export class FakeHttp implements HttpGetter {
  readonly requests: RecordedRequest[] = [];
  private readonly replies: Reply[] = [];

  reply(data: unknown): this {
    this.replies.push({ data });
    return this;
  }

  fail(error: Error): this {
    this.replies.push({ error });
    return this;
  }

  async get<T>(url: string, options?: HttpRequestOptions): Promise<{ data: T }> {
    this.requests.push({ url, params: options?.params, headers: options?.headers, signal: options?.signal });
    // answer on a later turn so a caller can still cancel
    await Promise.resolve();
    if (options?.signal?.aborted) throw new Error("canceled");
    const next = this.replies.shift();
    if (!next) throw new Error(`Unexpected request to ${url}`);
    if ("error" in next) throw next.error;
    return { data: this.cast<T>(next.data) };
  }

  // canned replies are written by the test in the shape the caller expects
  private cast<T>(data: unknown): T {
    const value: T = JSON.parse(JSON.stringify(data));
    return value;
  }
}
