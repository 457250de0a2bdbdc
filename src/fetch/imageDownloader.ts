import path from "path";
import { ImageDownloadError, errorMessage } from "../errors";
import { writeBinary } from "../utils/fs";
import { HttpClient } from "./httpClient";

export interface ImageDownloader {
  /** Saves the image as `imageDir/filename` and returns the bare filename. */
  download(imageUrl: string, filename: string, imageDir: string): Promise<string>;
}

export class HttpImageDownloader implements ImageDownloader {
  constructor(private readonly client: HttpClient) {}

  async download(imageUrl: string, filename: string, imageDir: string): Promise<string> {
    try {
      const data = await this.client.request(imageUrl, "image/*", async (response) => {
        if (!response.ok) {
          throw new Error(`HTTP ${response.status}`);
        }
        return Buffer.from(await response.arrayBuffer());
      });
      await writeBinary(path.join(imageDir, filename), data);
    } catch (error) {
      throw new ImageDownloadError(imageUrl, `Image download failed for ${imageUrl}: ${errorMessage(error)}`, error);
    }
    return filename;
  }
}
