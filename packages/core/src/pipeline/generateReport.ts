import { DateTime, type Duration } from "luxon";
import { collectAttendance, toReport } from "../report/assembler";
import { resolveOccurrences } from "../report/occurrences";
import { describeLookback, type TimeHelper } from "../time/timeHelper";
import type { AttendanceReport, MeetingOccurrence, OccurrenceAttendance } from "../types/attendance";
import type { MeetingSource } from "../types/meetingSource";

export interface GenerateReportOptions {
  /** Limit to occurrences of one meeting; null reports on every recent meeting. */
  meetingId: string | null;
  window: Duration;
  time: TimeHelper;
  now?: DateTime;
}

export interface GeneratedReport {
  occurrences: MeetingOccurrence[];
  attendance: OccurrenceAttendance[];
  report: AttendanceReport;
}

export function describeCutoff(window: Duration, time: TimeHelper, now: DateTime = DateTime.utc()): string {
  const cutoff = now.toUTC().minus(window).toFormat("yyyy-MM-dd'T'HH:mm:ss");
  return `Looking for meetings from last ${describeLookback(window)} hours (after ${time.toLocalDateTime(cutoff)})`;
}

export async function generateAttendanceReport(
  source: MeetingSource,
  options: GenerateReportOptions
): Promise<GeneratedReport> {
  const { meetingId, window, time } = options;

  const occurrences = await resolveOccurrences(source, { meetingId, window, now: options.now });
  if (meetingId) {
    console.log(`Found ${occurrences.length} instances of meeting ${meetingId}`);
  } else {
    console.log(`Found ${occurrences.length} meetings`);
  }

  if (occurrences.length === 0) {
    console.warn("No meetings found");
    return { occurrences, attendance: [], report: { rows: [], allNames: [] } };
  }

  const attendance = await collectAttendance(
    occurrences,
    (occurrence) => source.listParticipantSessions(occurrence.occurrenceId),
    {
      onOccurrence: (occurrence, index, total) => console.log(`Processing ${index}/${total}: ${occurrence.topic}`),
      onCombined: (record) => console.log(`  Combined ${record.sessionCount} sessions for ${record.name}`),
    }
  );

  const report = toReport(attendance, time);
  console.log(`Generated ${report.rows.length} attendance records`);

  return { occurrences, attendance, report };
}
