import { inject, injectable } from "tsyringe";
import { TYPES } from "../../di/types";
import type { ILogger } from "../logging/ILogger";
import type {
  CalendarReading,
  ICalendarSource,
  LectionaryCalendar,
} from "../../domain/scripture/ITextSource";
import type { IHtmlFetcher } from "./HtmlFetcher";
import { parseMoravianPage, parseRclPage } from "./pageParsers";

export const CALENDAR_URLS: Record<LectionaryCalendar, string> = {
  moravian: "https://www.moravian.org/daily_texts/",
  rcl: "https://lectionary.library.vanderbilt.edu/daily-readings/",
};

const PARSERS: Record<
  LectionaryCalendar,
  (html: string, date: Date) => CalendarReading[]
> = {
  moravian: parseMoravianPage,
  rcl: parseRclPage,
};

@injectable()
export class LectionaryCalendarSource implements ICalendarSource {
  private readonly logger: ILogger;

  constructor(
    @inject(TYPES.HtmlFetcher) private readonly fetcher: IHtmlFetcher,
    @inject(TYPES.Logger) logger: ILogger,
  ) {
    this.logger = logger.child({ component: "LectionaryCalendarSource" });
  }

  async readingsFor(
    calendar: LectionaryCalendar,
    date: Date,
  ): Promise<CalendarReading[]> {
    const html = await this.fetcher.fetchHtml(CALENDAR_URLS[calendar]);
    const readings = PARSERS[calendar](html, date);

    this.logger.debug("Parsed calendar page", {
      calendar,
      readings: readings.map((reading) => `${reading.label}: ${reading.citation}`),
    });
    return readings;
  }
}
