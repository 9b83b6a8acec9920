import { DateTime, type Duration } from "luxon";
import { parseUtcTimestamp } from "../time/timeHelper";
import type { MeetingOccurrence } from "../types/attendance";
import type { MeetingSource } from "../types/meetingSource";

export function isWithinWindow(
  occurrence: Pick<MeetingOccurrence, "startTimeUtc">,
  window: Duration,
  now: DateTime = DateTime.utc()
): boolean {
  const start = parseUtcTimestamp(occurrence.startTimeUtc);
  if (!start) return false;
  return start >= now.minus(window);
}

/**
 * Insert-or-replace by occurrence id. When the same occurrence shows up in
 * more than one source, the copy from the later source overwrites the earlier
 * one; the entry keeps the position where it was first seen.
 */
export function mergeOccurrences(...sources: readonly MeetingOccurrence[][]): MeetingOccurrence[] {
  const byId = new Map<string, MeetingOccurrence>();
  for (const source of sources) {
    for (const occurrence of source) {
      if (!occurrence.occurrenceId) continue;
      byId.set(occurrence.occurrenceId, occurrence);
    }
  }
  return Array.from(byId.values());
}

export interface ResolveOptions {
  meetingId?: string | null;
  window: Duration;
  now?: DateTime;
}

export async function resolveOccurrences(
  source: MeetingSource,
  options: ResolveOptions
): Promise<MeetingOccurrence[]> {
  const now = options.now ?? DateTime.utc();
  const inWindow = (o: MeetingOccurrence) => isWithinWindow(o, options.window, now);

  if (!options.meetingId) {
    const recent = await source.listRecentMeetings(options.window);
    return recent.filter(inWindow);
  }

  const meetingId = options.meetingId;
  const instances = await source.listMeetingInstances(meetingId, options.window);
  const recent = await source.listRecentMeetings(options.window);
  const matching = recent.filter((o) => o.meetingId === meetingId);

  return mergeOccurrences(instances.filter(inWindow), matching.filter(inWindow));
}
