import { FetchError, errorMessage } from "../errors";
import { HttpClient } from "./httpClient";

export interface PageFetcher {
  fetchPage(url: string): Promise<string>;
}

export class HttpPageFetcher implements PageFetcher {
  constructor(private readonly client: HttpClient) {}

  async fetchPage(url: string): Promise<string> {
    let page: { status: number; body: string | null };
    try {
      page = await this.client.request(url, "text/html,application/xhtml+xml", async (response) => ({
        status: response.status,
        body: response.ok ? await response.text() : null
      }));
    } catch (error) {
      throw new FetchError(url, `Request failed for ${url}: ${errorMessage(error)}`, null, error);
    }
    if (page.body === null) {
      throw new FetchError(url, `Page fetch failed (${page.status}) for ${url}`, page.status);
    }
    return page.body;
  }
}
