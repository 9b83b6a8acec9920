import type { Duration } from "luxon";
import type { MeetingOccurrence, RawSession } from "./attendance";

/**
 * Supplier of raw meeting data. Implementations resolve provider failures to
 * empty lists; only credential problems are allowed to throw. Listings may
 * include occurrences outside `window`; callers apply the window themselves.
 */
export interface MeetingSource {
  listRecentMeetings(window: Duration): Promise<MeetingOccurrence[]>;
  listMeetingInstances(meetingId: string, window: Duration): Promise<MeetingOccurrence[]>;
  listParticipantSessions(occurrenceId: string): Promise<RawSession[]>;
}
