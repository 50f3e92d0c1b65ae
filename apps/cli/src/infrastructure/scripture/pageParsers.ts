import * as cheerio from "cheerio";
import type { CalendarReading } from "../../domain/scripture/ITextSource";

/**
 * Pure HTML parsers for the scripture and calendar pages. Kept apart from
 * the fetching so they can be tested against fixture markup.
 */

const WEEKDAYS = [
  "Sunday",
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
];

const BIBLE_GATEWAY_PASSAGE = 'a[href*="biblegateway.com/passage"]';
const BIBLE_GATEWAY_ANY = 'a[href*="biblegateway.com"]';

function collapseWhitespace(text: string): string {
  return text
    .replace(/\r/g, "")
    .replace(/[ \t\u00a0]+/g, " ")
    .replace(/ *\n */g, "\n")
    .replace(/\n{2,}/g, "\n")
    .trim();
}

/** Citation carried in a Bible Gateway link's `search` parameter */
export function citationFromLink(href: string): string | null {
  try {
    const search = new URL(href, "https://www.biblegateway.com").searchParams.get(
      "search",
    );
    return search?.trim() || null;
  } catch {
    return null;
  }
}

/**
 * Passage text from a Bible Gateway page, without chapter and verse numbers,
 * footnote markers or cross references. Null when the page has no passage.
 */
export function extractPassageText(html: string): string | null {
  const $ = cheerio.load(html);
  const passages = $(".passage-text");
  if (passages.length === 0) {
    return null;
  }

  passages
    .find(
      "span.chapternum, sup.versenum, span.versenum, sup.footnote, sup.crossreference, div.footnotes, div.crossrefs",
    )
    .remove();

  const text = collapseWhitespace(
    passages
      .map((_i, el) => $(el).text())
      .get()
      .join("\n"),
  );

  return text === "" ? null : text;
}

/**
 * Moravian Daily Texts: the day's readings paragraph ("Tuesday, October
 * 19 — Psalm 5; Genesis 6:1-7:10; Matthew 3"), then the Watchword and the
 * Doctrinal Text, which are the first two Bible Gateway links outside it.
 */
export function parseMoravianPage(html: string, date: Date): CalendarReading[] {
  const $ = cheerio.load(html);
  const dayName = WEEKDAYS[date.getDay()];
  const readings: CalendarReading[] = [];

  const readingsParagraph = $("p")
    .filter((_i, el) => {
      const text = $(el).text();
      return text.includes(dayName) && text.includes("—");
    })
    .first();

  if (readingsParagraph.length > 0) {
    const afterDash = readingsParagraph.text().split("—").slice(1).join("—");
    for (const part of afterDash.split(";")) {
      const citation = part.replace(/\s+/g, " ").trim();
      if (citation !== "" && /\d/.test(citation)) {
        readings.push({ label: "Daily Reading", citation });
      }
    }
  }

  const citations = $(BIBLE_GATEWAY_PASSAGE)
    .filter((_i, el) => readingsParagraph.find(el).length === 0)
    .map((_i, el) => citationFromLink($(el).attr("href") ?? ""))
    .get()
    .filter((citation): citation is string => typeof citation === "string");

  const [watchword, dailyText] = citations;
  if (watchword) {
    readings.push({ label: "Watchword", citation: watchword });
  }
  if (dailyText) {
    readings.push({ label: "Daily Text", citation: dailyText });
  }

  return readings;
}

/** Element id the Vanderbilt page gives each day: MMDDYYYY */
export function rclDateId(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, "0");
  return `${pad(date.getMonth() + 1)}${pad(date.getDate())}${date.getFullYear()}`;
}

/**
 * Revised Common Lectionary daily readings: every Bible Gateway link in the
 * day's section, labelled with the text that precedes it ("Gospel:").
 */
export function parseRclPage(html: string, date: Date): CalendarReading[] {
  const $ = cheerio.load(html);
  const section = $(`[id="${rclDateId(date)}"]`);
  if (section.length === 0) {
    return [];
  }

  const readings: CalendarReading[] = [];

  section.find(BIBLE_GATEWAY_ANY).each((_i, el) => {
    const citation = $(el).text().replace(/\s+/g, " ").trim();
    if (citation === "") {
      return;
    }

    let label = "";
    let node = el.prev;
    while (node && !$(node).is("a")) {
      label = $(node).text() + label;
      node = node.prev;
    }

    readings.push({
      label: label.replace(/\s+/g, " ").trim().replace(/[:\-–—]+$/, "").trim(),
      citation,
    });
  });

  return readings;
}
