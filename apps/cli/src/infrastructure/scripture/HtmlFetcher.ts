import { request } from "undici";
import { inject, injectable } from "tsyringe";
import { TYPES } from "../../di/types";
import type { IConfig } from "../../shared/config/IConfig";
import type { ILogger } from "../logging/ILogger";

export interface IHtmlFetcher {
  /** GET a page as text. Rejects on transport failure or an HTTP error status. */
  fetchHtml(url: string): Promise<string>;
}

export class HttpStatusError extends Error {
  constructor(
    public readonly url: string,
    public readonly statusCode: number,
  ) {
    super(`HTTP ${statusCode} from ${new URL(url).hostname}`);
    this.name = "HttpStatusError";
  }
}

const MAX_RESPONSE_SIZE = 5 * 1024 * 1024;

@injectable()
export class UndiciHtmlFetcher implements IHtmlFetcher {
  private readonly logger: ILogger;

  constructor(
    @inject(TYPES.Config) private readonly config: IConfig,
    @inject(TYPES.Logger) logger: ILogger,
  ) {
    this.logger = logger.child({ component: "HtmlFetcher" });
  }

  async fetchHtml(url: string): Promise<string> {
    this.logger.debug("Fetching page", { url });

    const { statusCode, body } = await request(url, {
      method: "GET",
      headers: {
        "User-Agent":
          "Mozilla/5.0 (compatible; lectionary-cli/1.0; +scripture-study)",
        Accept: "text/html, application/xhtml+xml",
        "Accept-Language": "en-US,en;q=0.9",
      },
      maxRedirections: 5,
      bodyTimeout: this.config.fetchTimeoutMs,
      headersTimeout: this.config.fetchTimeoutMs,
    });

    if (statusCode >= 400) {
      await body.dump();
      this.logger.warn("HTTP error", { url, statusCode });
      throw new HttpStatusError(url, statusCode);
    }

    const chunks: Buffer[] = [];
    let bytesRead = 0;

    for await (const chunk of body) {
      const buffer = Buffer.from(chunk);
      bytesRead += buffer.length;
      if (bytesRead > MAX_RESPONSE_SIZE) {
        throw new Error(`Response from ${url} exceeds ${MAX_RESPONSE_SIZE} bytes`);
      }
      chunks.push(buffer);
    }

    const html = Buffer.concat(chunks).toString("utf-8");
    this.logger.debug("Page received", { url, size: bytesRead });
    return html;
  }
}
