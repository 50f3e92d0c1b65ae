import { Translation } from "./Translation";

/**
 * Text source collaborators
 *
 * The resolver only cares that these return UTF-8 text keyed to a
 * citation; whether it comes from a web page, an API or stdin is up to the
 * implementation.
 */

export interface IPassageSource {
  /**
   * Fetch the text of a passage. Resolves to null when the source has no
   * text for the citation; rejects when the source cannot be reached.
   */
  fetchPassage(citation: string, translation: Translation): Promise<string | null>;
}

export type LectionaryCalendar = "moravian" | "rcl";

export interface CalendarReading {
  /** How the calendar labels the reading, e.g. "Watchword" or "Gospel" */
  label: string;
  citation: string;
}

export interface ICalendarSource {
  /**
   * The readings a calendar appoints for a date, in page order. Resolves to
   * an empty list when the calendar has nothing for the date; rejects when
   * the calendar cannot be reached.
   */
  readingsFor(calendar: LectionaryCalendar, date: Date): Promise<CalendarReading[]>;
}
