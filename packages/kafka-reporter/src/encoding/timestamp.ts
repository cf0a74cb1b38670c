/**
 * ISO-8601 UTC with millisecond precision and an explicit offset,
 * e.g. 2015-10-22T11:50:34.762+00:00
 */
export function formatReportTimestamp(date: Date): string {
  return date.toISOString().replace(/Z$/, '+00:00');
}
