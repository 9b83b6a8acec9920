import { Workbook, type Worksheet } from "exceljs";
import path from "path";
import type { AttendanceReport } from "../types/attendance";

export const SHEET_NAME = "Attendance Report";
const MAX_COLUMN_WIDTH = 50;

export function reportHeaders(label: string): [string, string, string] {
  return [`Meeting Date (${label})`, `Meeting Time (${label})`, "Participant Name"];
}

export function reportFileName(timestamp: string): string {
  return `zoom_attendance_report_${timestamp}.xlsx`;
}

function fitColumnWidths(sheet: Worksheet): void {
  sheet.columns.forEach((column) => {
    let longest = 0;
    column.eachCell?.({ includeEmpty: false }, (cell) => {
      longest = Math.max(longest, String(cell.value ?? "").length);
    });
    column.width = Math.min(longest + 2, MAX_COLUMN_WIDTH);
  });
}

export function buildReportWorkbook(report: AttendanceReport, label: string): Workbook {
  const workbook = new Workbook();
  const sheet = workbook.addWorksheet(SHEET_NAME);

  if (report.rows.length === 0) {
    sheet.columns = [{ header: "Message", key: "message" }];
    sheet.addRow({ message: "No data found" });
  } else {
    const [dateHeader, timeHeader, nameHeader] = reportHeaders(label);
    sheet.columns = [
      { header: dateHeader, key: "date" },
      { header: timeHeader, key: "time" },
      { header: nameHeader, key: "name" },
    ];
    for (const row of report.rows) {
      sheet.addRow({ date: row.date, time: row.time, name: row.name });
    }
  }

  fitColumnWidths(sheet);
  return workbook;
}

/** Writes the workbook into `outputDir` and returns the full path. */
export async function writeReportWorkbook(
  report: AttendanceReport,
  options: { outputDir: string; label: string; timestamp: string }
): Promise<string> {
  const filePath = path.join(options.outputDir, reportFileName(options.timestamp));
  await buildReportWorkbook(report, options.label).xlsx.writeFile(filePath);
  console.log(`Report saved: ${filePath}`);
  return filePath;
}
