import { CalendarRenderError, type ContestRecord, contestDurationMs } from "@contestcal/shared";
import { createEvents, type EventAttributes } from "ics";

import { humanizeDuration } from "./duration";

export const DEFAULT_CALENDAR_NAME = "CLIST Contests";
export const DEFAULT_PRODUCT_ID = "-//CLIST Import//EN";

export interface RenderOptions {
  calendarName: string;
  productId: string;
  /**
   * DTSTAMP for every event. Defaults to each contest's start so output
   * depends only on the input list.
   */
  stamp?: Date;
  uidDomain?: string;
}

export function eventSummary(contest: ContestRecord): string {
  return `${contest.platform}: ${contest.title}`;
}

export function eventDescription(contest: ContestRecord): string {
  const lines = [
    `Title: ${contest.title}`,
    `Platform: ${contest.platform}`,
    `Duration: ${humanizeDuration(contestDurationMs(contest))}`,
  ];
  if (contest.url) lines.push(`URL: ${contest.url}`);
  return lines.join("\n");
}

export function toEventAttributes(contest: ContestRecord, options: RenderOptions): EventAttributes {
  const event: EventAttributes = {
    uid: `${contest.id}@${options.uidDomain ?? "clist.by"}`,
    start: contest.start.getTime(),
    startInputType: "utc",
    startOutputType: "utc",
    end: contest.end.getTime(),
    endInputType: "utc",
    endOutputType: "utc",
    timestamp: (options.stamp ?? contest.start).getTime(),
    title: eventSummary(contest),
    description: eventDescription(contest),
    categories: [contest.platform],
    productId: options.productId,
  };
  if (contest.url) event.url = contest.url;
  if (options.calendarName) event.calName = options.calendarName;
  return event;
}

/**
 * Serialize contests (in the given order) into a VCALENDAR document.
 * Escaping, line folding and CRLF endings come from `ics`.
 */
export function renderCalendar(contests: readonly ContestRecord[], options: RenderOptions): string {
  const events = contests.map((contest) => toEventAttributes(contest, options));
  const { error, value } = createEvents(events, {
    productId: options.productId,
    ...(options.calendarName ? { calName: options.calendarName } : {}),
  });
  if (error || typeof value !== "string") {
    throw new CalendarRenderError("Failed to render calendar", { cause: error });
  }
  return value;
}
