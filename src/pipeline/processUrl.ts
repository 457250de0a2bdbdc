import { classify } from "../classify/cardType";
import { parseMarkup } from "../dom/markupDocument";
import { CardScraperError, ClassificationError, errorMessage } from "../errors";
import { extractCard } from "../extract";
import { ImageDownloader } from "../fetch/imageDownloader";
import { PageFetcher } from "../fetch/pageFetcher";
import { locateImageUrl } from "../image/imageReference";
import { writeRecord } from "../serialize/recordSerializer";
import { CardType } from "../types/card";

export type UrlState =
  | "fetching"
  | "parsing"
  | "classifying"
  | "extracting"
  | "resolving-image"
  | "serializing"
  | "downloading-image"
  | "done"
  | "failed";

export type Logger = Pick<Console, "log" | "error">;

export interface PipelineContext {
  fetcher: PageFetcher;
  downloader: ImageDownloader;
  outputDir: string;
  imageDir: string;
  logger: Logger;
}

export type UrlOutcome =
  | { status: "done"; url: string; cardType: CardType; outputPath: string; image: string }
  | {
      status: "failed";
      url: string;
      failedIn: UrlState;
      message: string;
      cardType: CardType | null;
      outputPath: string | null;
    }
  | { status: "aborted"; url: string; error: ClassificationError };

/**
 * Runs one URL through fetch, parse, classify, extract, image lookup, write and image download.
 * An unclassifiable page comes back as "aborted" so the batch can stop; any other failure is
 * reported as "failed" with the state it happened in.
 */
export async function processUrl(url: string, context: PipelineContext): Promise<UrlOutcome> {
  const { logger } = context;
  let state: UrlState = "fetching";
  let cardType: CardType | null = null;
  let outputPath: string | null = null;

  logger.log(`Processing: ${url}`);
  try {
    const html = await context.fetcher.fetchPage(url);

    state = "parsing";
    const doc = parseMarkup(html, url);

    state = "classifying";
    const classification = classify(doc);
    if (!classification.ok) {
      const error = new ClassificationError(classification.url);
      logger.error(error.message);
      return { status: "aborted", url, error };
    }
    cardType = classification.type;
    logger.log(`Card type: ${cardType}`);

    state = "extracting";
    const record = extractCard(cardType, doc);

    state = "resolving-image";
    const imageUrl = locateImageUrl(doc);

    state = "serializing";
    outputPath = await writeRecord(record, url, context.outputDir);
    logger.log(`Saved: ${outputPath}`);

    state = "downloading-image";
    const image = await context.downloader.download(imageUrl, record.image, context.imageDir);
    logger.log(`Downloaded: ${image}`);

    return { status: "done", url, cardType, outputPath, image };
  } catch (error) {
    const message = error instanceof CardScraperError ? error.message : `${url}: ${errorMessage(error)}`;
    logger.error(`Failed while ${state}: ${message}`);
    return { status: "failed", url, failedIn: state, message, cardType, outputPath };
  }
}
