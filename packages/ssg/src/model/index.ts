export { buildSite, compareDocuments, DEFAULT_SITE_METADATA, type BuildSiteOptions } from "./builder.js";
export {
  calendarDate,
  compareCalendarDates,
  formatCalendarDate,
  parseCalendarDate,
  DATE_FORMATS,
  type CalendarDate,
} from "./date.js";
export { excerpt, truncateAtWord, DEFAULT_EXCERPT_LENGTH } from "./excerpt.js";
export { pageSegment, slugify, slugSegment } from "./slug.js";
export type { Document, Site, SiteMetadata } from "./types.js";
