import type { SupabaseClient } from "@supabase/supabase-js";
import type { OccurrenceAttendance } from "../types/attendance";

const BATCH_SIZE = 500;

export function toAttendanceRows(attendance: readonly OccurrenceAttendance[]) {
  return attendance.flatMap(({ occurrence, records }) =>
    records.map((r) => ({
      meeting_id: occurrence.meetingId,
      occurrence_id: occurrence.occurrenceId,
      topic: occurrence.topic,
      start_time: occurrence.startTimeUtc || null,
      identity_key: r.identityKey,
      name: r.name,
      email: r.email,
      join_time: r.joinTime || null,
      leave_time: r.leaveTime || null,
      duration_seconds: r.totalDurationSeconds,
      status: r.status,
      session_count: r.sessionCount,
    }))
  );
}

/**
 * Upserts merged attendance, one row per (occurrence, participant). Re-running
 * a report over the same window overwrites rows instead of duplicating them.
 */
export async function persistAttendance(
  db: SupabaseClient,
  attendance: readonly OccurrenceAttendance[]
): Promise<number> {
  const rows = toAttendanceRows(attendance);

  for (let i = 0; i < rows.length; i += BATCH_SIZE) {
    const batch = rows.slice(i, i + BATCH_SIZE);
    const { error } = await db
      .from("attendance_records")
      .upsert(batch, { onConflict: "occurrence_id,identity_key" });
    if (error) throw error;
  }

  return rows.length;
}
