/**
 * Uses hyphen-only queue names because BullMQ uses colon as an internal Redis key separator.
 */
export const queueNames = {
  run: "assessment-run",
} as const;
