import path from "path";
import { MarkupDocument } from "../dom/markupDocument";
import { ExtractionError } from "../errors";
import { ImageReference } from "../types/card";

export const CARD_IMAGE_SELECTOR = "img#detail_def_img";

/** Absolute URL of the card image; relative sources resolve against the page URL. */
export function locateImageUrl(doc: MarkupDocument): string {
  const src = doc.attr(CARD_IMAGE_SELECTOR, "src");
  if (!src) {
    throw new ExtractionError(doc.url, "image");
  }
  try {
    return new URL(src, doc.url).toString();
  } catch {
    throw new ExtractionError(doc.url, "image");
  }
}

export function imageFilename(imageUrl: string): string | null {
  const segment = path.posix.basename(new URL(imageUrl).pathname);
  return segment.length > 0 ? segment : null;
}

export function resolveImageReference(doc: MarkupDocument): ImageReference {
  const filename = imageFilename(locateImageUrl(doc));
  if (!filename) {
    throw new ExtractionError(doc.url, "image");
  }
  return { filename };
}
