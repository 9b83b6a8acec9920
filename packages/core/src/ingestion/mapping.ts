import type { ZoomMeeting, ZoomParticipant } from "./zoomPayload";
import { normalizeEmail } from "./normalize";
import { UNKNOWN, UNKNOWN_MEETING, type MeetingOccurrence, type RawSession } from "../types/attendance";

function toDurationSeconds(value: unknown): number {
  if (typeof value === "number") {
    return Number.isFinite(value) && value > 0 ? Math.trunc(value) : 0;
  }
  if (typeof value === "string" && /^\s*\d+\s*$/.test(value)) {
    return parseInt(value, 10);
  }
  return 0;
}

export function mapZoomParticipant(participant: ZoomParticipant): RawSession {
  const name = participant.name?.trim() ? participant.name : UNKNOWN;

  return {
    name,
    email: normalizeEmail(participant.user_email),
    joinTime: participant.join_time ?? "",
    leaveTime: participant.leave_time ?? "",
    durationSeconds: toDurationSeconds(participant.duration),
    status: participant.status || UNKNOWN,
  };
}

/**
 * Instance listings carry only uuid and start_time, so the caller passes the
 * meeting id it asked for. Returns null when there is nothing to fetch
 * participants by.
 */
export function mapZoomMeeting(meeting: ZoomMeeting, knownMeetingId?: string): MeetingOccurrence | null {
  const meetingId = meeting.id != null ? String(meeting.id) : knownMeetingId ?? "";
  const occurrenceId = meeting.uuid || meetingId;
  if (!occurrenceId) return null;

  return {
    meetingId,
    occurrenceId,
    topic: meeting.topic || UNKNOWN_MEETING,
    startTimeUtc: meeting.start_time ?? "",
  };
}
