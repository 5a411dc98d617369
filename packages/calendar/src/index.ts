export { humanizeDuration } from "./duration";
export {
  DEFAULT_CALENDAR_NAME,
  DEFAULT_PRODUCT_ID,
  eventDescription,
  eventSummary,
  renderCalendar,
  toEventAttributes,
} from "./render";
export type { RenderOptions } from "./render";
