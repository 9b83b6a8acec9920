import fs from "fs/promises";
import os from "os";
import path from "path";
import { Workbook } from "exceljs";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { SHEET_NAME, buildReportWorkbook, reportFileName, writeReportWorkbook } from "../output/spreadsheet";
import type { AttendanceReport } from "../types/attendance";

const LONG_NAME = "A".repeat(60);

const report: AttendanceReport = {
  rows: [
    { date: "2024-01-15", time: "10:30", name: "Alice" },
    { date: "2024-01-15", time: "10:30", name: LONG_NAME },
  ],
  allNames: ["Alice", LONG_NAME],
};

describe("buildReportWorkbook", () => {
  it("writes headers with the timezone label and one row per report row", () => {
    const sheet = buildReportWorkbook(report, "PST").getWorksheet(SHEET_NAME);

    expect(sheet?.getCell("A1").value).toBe("Meeting Date (PST)");
    expect(sheet?.getCell("B1").value).toBe("Meeting Time (PST)");
    expect(sheet?.getCell("C1").value).toBe("Participant Name");
    expect(sheet?.getCell("A2").value).toBe("2024-01-15");
    expect(sheet?.getCell("B2").value).toBe("10:30");
    expect(sheet?.getCell("C2").value).toBe("Alice");
    expect(sheet?.rowCount).toBe(3);
  });

  it("sizes columns to the longest cell plus two, capped at 50", () => {
    const sheet = buildReportWorkbook(report, "PST").getWorksheet(SHEET_NAME);

    expect(sheet?.getColumn(1).width).toBe(20);
    expect(sheet?.getColumn(2).width).toBe(20);
    expect(sheet?.getColumn(3).width).toBe(50);
  });

  it("writes a single message column for an empty report", () => {
    const sheet = buildReportWorkbook({ rows: [], allNames: [] }, "PST").getWorksheet(SHEET_NAME);

    expect(sheet?.getCell("A1").value).toBe("Message");
    expect(sheet?.getCell("A2").value).toBe("No data found");
    expect(sheet?.getColumn(1).width).toBe(15);
  });
});

describe("writeReportWorkbook", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "attendance-report-"));
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("saves a readable workbook named after the timestamp", async () => {
    const filePath = await writeReportWorkbook(report, { outputDir: dir, label: "EST", timestamp: "20240115_103000" });

    expect(filePath).toBe(path.join(dir, "zoom_attendance_report_20240115_103000.xlsx"));
    expect(reportFileName("20240115_103000")).toBe(path.basename(filePath));

    const workbook = new Workbook();
    await workbook.xlsx.readFile(filePath);
    const sheet = workbook.getWorksheet(SHEET_NAME);
    expect(sheet?.getCell("A1").value).toBe("Meeting Date (EST)");
    expect(sheet?.getCell("C3").value).toBe(LONG_NAME);
  });
});
