import { normalizeEmail, normalizeText } from "../ingestion/normalize";
import type { AttendanceRecord, RawSession } from "../types/attendance";

export const MERGED_EMAIL_FALLBACK = "N/A";

export type SessionGroup = [RawSession, ...RawSession[]];

export interface DeduplicateOptions {
  /** Called for every participant whose record was built from more than one session. */
  onCombined?: (record: AttendanceRecord) => void;
}

/**
 * Email when present, otherwise the lower-cased display name.
 *
 * Known limitation: attendees without an email who share a display name
 * (two people both called "Unknown", say) end up under the same key and are
 * reported as one person.
 */
export function identityKey(session: Pick<RawSession, "name" | "email">): string {
  return normalizeEmail(session.email) ?? normalizeText(session.name);
}

export function groupSessions(sessions: readonly RawSession[]): Map<string, SessionGroup> {
  const groups = new Map<string, SessionGroup>();
  for (const session of sessions) {
    const key = identityKey(session);
    const group = groups.get(key);
    if (group) {
      group.push(session);
    } else {
      groups.set(key, [session]);
    }
  }
  return groups;
}

function compareJoinTime(a: RawSession, b: RawSession): number {
  if (a.joinTime < b.joinTime) return -1;
  if (a.joinTime > b.joinTime) return 1;
  return 0;
}

function promote(key: string, session: RawSession): AttendanceRecord {
  return {
    identityKey: key,
    name: session.name,
    email: session.email,
    joinTime: session.joinTime,
    leaveTime: session.leaveTime,
    totalDurationSeconds: session.durationSeconds,
    status: session.status,
    sessionCount: 1,
  };
}

export function mergeSessions(key: string, group: Readonly<SessionGroup>): AttendanceRecord {
  if (group.length === 1) return promote(key, group[0]);

  const sorted = [...group].sort(compareJoinTime);
  const first = sorted[0];
  const last = sorted[sorted.length - 1];

  // Encounter order, not join order.
  const bestEmail = group.map((s) => normalizeEmail(s.email)).find((email) => email !== null);

  return {
    identityKey: key,
    name: first.name,
    email: bestEmail ?? MERGED_EMAIL_FALLBACK,
    joinTime: first.joinTime,
    leaveTime: last.leaveTime,
    totalDurationSeconds: group.reduce((sum, s) => sum + s.durationSeconds, 0),
    status: first.status,
    sessionCount: group.length,
  };
}

export function deduplicateSessions(
  sessions: readonly RawSession[],
  options: DeduplicateOptions = {}
): AttendanceRecord[] {
  const records: AttendanceRecord[] = [];
  for (const [key, group] of groupSessions(sessions)) {
    const record = mergeSessions(key, group);
    if (record.sessionCount > 1) options.onCombined?.(record);
    records.push(record);
  }
  return records;
}
