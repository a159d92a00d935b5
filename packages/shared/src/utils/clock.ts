export function isoNow(): string {
  return new Date().toISOString();
}

/** Milliseconds since the epoch for an ISO-8601 timestamp. */
export function toEpochMs(iso: string): number {
  return Date.parse(iso);
}
