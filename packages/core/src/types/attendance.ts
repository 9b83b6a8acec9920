export interface RawSession {
  readonly name: string;
  readonly email: string | null;
  readonly joinTime: string;
  readonly leaveTime: string;
  readonly durationSeconds: number;
  readonly status: string;
}

export interface AttendanceRecord {
  identityKey: string;
  name: string;
  /** Best-known email. "N/A" when several sessions were merged and none carried one. */
  email: string | null;
  joinTime: string;
  leaveTime: string;
  totalDurationSeconds: number;
  status: string;
  sessionCount: number;
}

export interface MeetingOccurrence {
  /** Stable meeting number shared by every occurrence of a recurring meeting. */
  meetingId: string;
  /** Per-occurrence identifier used to fetch participants (Zoom's uuid). */
  occurrenceId: string;
  topic: string;
  startTimeUtc: string;
}

export interface OccurrenceAttendance {
  occurrence: MeetingOccurrence;
  records: AttendanceRecord[];
}

export interface ReportRow {
  date: string;
  time: string;
  name: string;
}

export interface AttendanceReport {
  rows: ReportRow[];
  allNames: string[];
}

export const NO_ATTENDEES = "No attendees";
export const UNKNOWN = "Unknown";
export const UNKNOWN_MEETING = "Unknown Meeting";
