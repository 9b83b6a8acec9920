import { deduplicateSessions } from "../merge/sessionMerger";
import type { TimeHelper } from "../time/timeHelper";
import {
  NO_ATTENDEES,
  type AttendanceRecord,
  type AttendanceReport,
  type MeetingOccurrence,
  type OccurrenceAttendance,
  type RawSession,
} from "../types/attendance";

export type FetchSessions = (occurrence: MeetingOccurrence) => Promise<RawSession[]>;

export type ReportTime = Pick<TimeHelper, "toLocalDate" | "toLocalTimeOnly">;

export interface CollectOptions {
  onOccurrence?: (occurrence: MeetingOccurrence, index: number, total: number) => void;
  onCombined?: (record: AttendanceRecord, occurrence: MeetingOccurrence) => void;
}

/**
 * Fetches and merges participants one occurrence at a time, in input order.
 */
export async function collectAttendance(
  occurrences: readonly MeetingOccurrence[],
  fetchSessions: FetchSessions,
  options: CollectOptions = {}
): Promise<OccurrenceAttendance[]> {
  const attendance: OccurrenceAttendance[] = [];

  for (const [i, occurrence] of occurrences.entries()) {
    options.onOccurrence?.(occurrence, i + 1, occurrences.length);

    const sessions = await fetchSessions(occurrence);
    const onCombined = options.onCombined;
    const records = deduplicateSessions(sessions, {
      onCombined: onCombined ? (record) => onCombined(record, occurrence) : undefined,
    });

    attendance.push({ occurrence, records });
  }

  return attendance;
}

export function toReport(attendance: readonly OccurrenceAttendance[], time: ReportTime): AttendanceReport {
  const report: AttendanceReport = { rows: [], allNames: [] };

  for (const { occurrence, records } of attendance) {
    const date = time.toLocalDate(occurrence.startTimeUtc);
    const clock = time.toLocalTimeOnly(occurrence.startTimeUtc);

    if (records.length === 0) {
      report.rows.push({ date, time: clock, name: NO_ATTENDEES });
      report.allNames.push(NO_ATTENDEES);
      continue;
    }

    for (const record of records) {
      report.rows.push({ date, time: clock, name: record.name });
      report.allNames.push(record.name);
    }
  }

  return report;
}

export async function buildReport(
  occurrences: readonly MeetingOccurrence[],
  fetchSessions: FetchSessions,
  time: ReportTime,
  options: CollectOptions = {}
): Promise<AttendanceReport> {
  return toReport(await collectAttendance(occurrences, fetchSessions, options), time);
}
