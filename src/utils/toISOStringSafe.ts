import { tags } from "typia";

/**
 * Convert a date, or a date string read back from the store, to an ISO 8601
 * date-time string.
 */
export function toISOStringSafe(
  value: Date | string,
): string & tags.Format<"date-time"> {
  if (value instanceof Date) return value.toISOString();
  return new Date(value).toISOString();
}
