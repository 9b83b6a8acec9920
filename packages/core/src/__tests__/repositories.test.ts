import { describe, expect, it, vi } from "vitest";
import { getServiceClient } from "../storage/db";
import { persistAttendance, toAttendanceRows } from "../storage/repositories";
import type { OccurrenceAttendance } from "../types/attendance";
import { occurrence } from "./fixtures";

const attendance: OccurrenceAttendance[] = [
  {
    occurrence: occurrence(),
    records: [
      {
        identityKey: "ann@example.com",
        name: "Ann",
        email: "ann@example.com",
        joinTime: "2024-01-15T18:30:00Z",
        leaveTime: "2024-01-15T19:00:00Z",
        totalDurationSeconds: 1800,
        status: "in_meeting",
        sessionCount: 2,
      },
    ],
  },
  { occurrence: occurrence({ occurrenceId: "uuid-2", startTimeUtc: "" }), records: [] },
];

function clientWith(response: () => Response) {
  const fetchMock = vi.fn(async (..._args: Parameters<typeof fetch>) => response());
  const db = getServiceClient({ url: "http://localhost:54321", serviceRoleKey: "test-key" }, { fetch: fetchMock });
  return { db, fetchMock };
}

describe("toAttendanceRows", () => {
  it("flattens records into one row per occurrence and participant", () => {
    expect(toAttendanceRows(attendance)).toEqual([
      {
        meeting_id: "789",
        occurrence_id: "uuid-1",
        topic: "Weekly Sync",
        start_time: "2024-01-15T18:30:00Z",
        identity_key: "ann@example.com",
        name: "Ann",
        email: "ann@example.com",
        join_time: "2024-01-15T18:30:00Z",
        leave_time: "2024-01-15T19:00:00Z",
        duration_seconds: 1800,
        status: "in_meeting",
        session_count: 2,
      },
    ]);
  });
});

describe("persistAttendance", () => {
  it("upserts rows keyed by occurrence and identity", async () => {
    const { db, fetchMock } = clientWith(() => new Response(null, { status: 201 }));

    await expect(persistAttendance(db, attendance)).resolves.toBe(1);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [input, init] = fetchMock.mock.calls[0];
    const url = new URL(String(input));
    expect(url.pathname).toBe("/rest/v1/attendance_records");
    expect(url.searchParams.get("on_conflict")).toBe("occurrence_id,identity_key");
    expect(init?.method).toBe("POST");
    expect(JSON.parse(String(init?.body))).toEqual(toAttendanceRows(attendance));
  });

  it("makes no request when there is nothing to store", async () => {
    const { db, fetchMock } = clientWith(() => new Response(null, { status: 201 }));

    await expect(persistAttendance(db, [])).resolves.toBe(0);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("throws the database error", async () => {
    const { db } = clientWith(
      () =>
        new Response(JSON.stringify({ code: "42P01", message: 'relation "attendance_records" does not exist' }), {
          status: 404,
          headers: { "Content-Type": "application/json" },
        })
    );

    await expect(persistAttendance(db, attendance)).rejects.toMatchObject({
      message: 'relation "attendance_records" does not exist',
    });
  });
});
