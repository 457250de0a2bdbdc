import { delay } from "../utils/time";

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36";

export interface HttpClientOptions {
  userAgent?: string;
  /** Minimum gap between two requests. */
  delayMs?: number;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

/**
 * Shared GET client for pages and images. Requests go out one at a time and are spaced by
 * `delayMs`, so the source site never sees two requests closer together than that.
 */
export class HttpClient {
  private readonly userAgent: string;
  private readonly delayMs: number;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private lastRequestAt: number | null = null;

  constructor(options: HttpClientOptions = {}) {
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.delayMs = options.delayMs ?? 1000;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  private async pace(): Promise<void> {
    if (this.lastRequestAt === null || this.delayMs <= 0) return;
    const wait = this.lastRequestAt + this.delayMs - Date.now();
    if (wait > 0) {
      await delay(wait);
    }
  }

  /** GET `url` and read its body with `read`; `timeoutMs` covers the headers and the body read. */
  async request<T>(
    url: string,
    accept: string,
    read: (response: Response, signal: AbortSignal) => Promise<T>
  ): Promise<T> {
    await this.pace();
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await this.fetchImpl(url, {
        headers: { "User-Agent": this.userAgent, Accept: accept },
        signal: controller.signal
      });
      return await read(response, controller.signal);
    } finally {
      clearTimeout(timeout);
      this.lastRequestAt = Date.now();
    }
  }
}
