import { inject, injectable } from "tsyringe";
import { TYPES } from "../../di/types";
import type { ILogger } from "../logging/ILogger";
import type { IPassageSource } from "../../domain/scripture/ITextSource";
import { Translation, versionCode } from "../../domain/scripture/Translation";
import type { IHtmlFetcher } from "./HtmlFetcher";
import { extractPassageText } from "./pageParsers";

const BASE_URL = "https://www.biblegateway.com/passage/";

export function passageUrl(citation: string, translation: Translation): string {
  const url = new URL(BASE_URL);
  url.searchParams.set("search", citation);
  url.searchParams.set("version", versionCode(translation));
  return url.toString();
}

/**
 * Passage text from Bible Gateway. The site answers unknown citations with
 * a normal page that has no passage, which maps to null.
 */
@injectable()
export class BibleGatewayPassageSource implements IPassageSource {
  private readonly logger: ILogger;

  constructor(
    @inject(TYPES.HtmlFetcher) private readonly fetcher: IHtmlFetcher,
    @inject(TYPES.Logger) logger: ILogger,
  ) {
    this.logger = logger.child({ component: "BibleGatewayPassageSource" });
  }

  async fetchPassage(
    citation: string,
    translation: Translation,
  ): Promise<string | null> {
    const html = await this.fetcher.fetchHtml(passageUrl(citation, translation));
    const text = extractPassageText(html);

    if (text === null) {
      this.logger.info("No passage text on page", { citation, translation });
    }
    return text;
  }
}
