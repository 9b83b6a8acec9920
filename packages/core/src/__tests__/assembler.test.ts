import { describe, expect, it, vi } from "vitest";
import { buildReport, collectAttendance, toReport, type ReportTime } from "../report/assembler";
import { createTimeHelper } from "../time/timeHelper";
import type { MeetingOccurrence, RawSession } from "../types/attendance";
import { occurrence, session } from "./fixtures";

const labelTime: ReportTime = {
  toLocalDate: (utc) => `date:${utc}`,
  toLocalTimeOnly: (utc) => `time:${utc}`,
};

function sessionsById(map: Record<string, RawSession[]>) {
  return vi.fn(async (o: MeetingOccurrence) => map[o.occurrenceId] ?? []);
}

describe("buildReport", () => {
  it("returns an empty report for no occurrences", async () => {
    const fetchSessions = sessionsById({});

    const report = await buildReport([], fetchSessions, labelTime);

    expect(report).toEqual({ rows: [], allNames: [] });
    expect(fetchSessions).not.toHaveBeenCalled();
  });

  it("emits a single placeholder row for an occurrence without sessions", async () => {
    const report = await buildReport([occurrence({ startTimeUtc: "S1" })], sessionsById({}), labelTime);

    expect(report.rows).toEqual([{ date: "date:S1", time: "time:S1", name: "No attendees" }]);
    expect(report.allNames).toEqual(["No attendees"]);
  });

  it("orders rows by occurrence, then by first-seen participant", async () => {
    const first = occurrence({ occurrenceId: "A", startTimeUtc: "S1" });
    const second = occurrence({ occurrenceId: "B", startTimeUtc: "S2" });
    const fetchSessions = sessionsById({
      A: [session({ name: "Zoe" }), session({ name: "Ben" }), session({ name: "zoe" })],
      B: [session({ name: "Cat", email: "cat@co.com" })],
    });

    const report = await buildReport([first, second], fetchSessions, labelTime);

    expect(report.rows).toEqual([
      { date: "date:S1", time: "time:S1", name: "Zoe" },
      { date: "date:S1", time: "time:S1", name: "Ben" },
      { date: "date:S2", time: "time:S2", name: "Cat" },
    ]);
    expect(report.allNames).toEqual(["Zoe", "Ben", "Cat"]);
    expect(fetchSessions.mock.calls.map(([o]) => o.occurrenceId)).toEqual(["A", "B"]);
  });

  it("converts the occurrence start into the report timezone", async () => {
    const time = createTimeHelper({ zone: "America/Los_Angeles", label: "PST" });
    const fetchSessions = sessionsById({ "uuid-1": [session({ name: "Alice" })] });

    const report = await buildReport([occurrence({ startTimeUtc: "2024-01-15T18:30:00Z" })], fetchSessions, time);

    expect(report.rows).toEqual([{ date: "2024-01-15", time: "10:30", name: "Alice" }]);
  });

  it("uses Unknown date and time for an occurrence without a start time", async () => {
    const time = createTimeHelper();

    const report = await buildReport([occurrence({ startTimeUtc: "" })], sessionsById({}), time);

    expect(report.rows).toEqual([{ date: "Unknown", time: "Unknown", name: "No attendees" }]);
  });
});

describe("collectAttendance", () => {
  it("reports progress and combined participants per occurrence", async () => {
    const onOccurrence = vi.fn();
    const onCombined = vi.fn();
    const target = occurrence({ occurrenceId: "A", topic: "Standup" });
    const fetchSessions = sessionsById({ A: [session({ name: "Bob" }), session({ name: "BOB" })] });

    const attendance = await collectAttendance([target], fetchSessions, { onOccurrence, onCombined });

    expect(onOccurrence).toHaveBeenCalledWith(target, 1, 1);
    expect(onCombined).toHaveBeenCalledTimes(1);
    expect(onCombined.mock.calls[0][1]).toBe(target);
    expect(attendance).toHaveLength(1);
    expect(attendance[0].records.map((r) => r.name)).toEqual(["Bob"]);
  });
});

describe("toReport", () => {
  it("adds repeated names to allNames once per occurrence", () => {
    const report = toReport(
      [
        { occurrence: occurrence({ occurrenceId: "A", startTimeUtc: "S1" }), records: [] },
        {
          occurrence: occurrence({ occurrenceId: "B", startTimeUtc: "S2" }),
          records: [
            {
              identityKey: "bob",
              name: "Bob",
              email: null,
              joinTime: "",
              leaveTime: "",
              totalDurationSeconds: 0,
              status: "Unknown",
              sessionCount: 1,
            },
          ],
        },
        { occurrence: occurrence({ occurrenceId: "C", startTimeUtc: "S3" }), records: [] },
      ],
      labelTime
    );

    expect(report.allNames).toEqual(["No attendees", "Bob", "No attendees"]);
    expect(report.rows).toHaveLength(3);
  });
});
