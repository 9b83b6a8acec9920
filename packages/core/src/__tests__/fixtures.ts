import type { MeetingOccurrence, RawSession } from "../types/attendance";
import type { MeetingSource } from "../types/meetingSource";

export function session(overrides: Partial<RawSession> = {}): RawSession {
  return {
    name: "Alice",
    email: null,
    joinTime: "",
    leaveTime: "",
    durationSeconds: 0,
    status: "in_meeting",
    ...overrides,
  };
}

export function occurrence(overrides: Partial<MeetingOccurrence> = {}): MeetingOccurrence {
  return {
    meetingId: "789",
    occurrenceId: "uuid-1",
    topic: "Weekly Sync",
    startTimeUtc: "2024-01-15T18:30:00Z",
    ...overrides,
  };
}

export function fakeSource(overrides: Partial<MeetingSource> = {}): MeetingSource {
  return {
    listRecentMeetings: async () => [],
    listMeetingInstances: async () => [],
    listParticipantSessions: async () => [],
    ...overrides,
  };
}
