import fs from "fs/promises";
import { DateTime } from "luxon";
import type { SupabaseClient } from "@supabase/supabase-js";
import { type AppConfig, requireEmailSettings, requireZoomCredentials } from "@zoom-attendance/core/src/config/config";
import { formatReportEmail } from "@zoom-attendance/core/src/formatting/reportEmail";
import { ReportMailer, type ReportSender } from "@zoom-attendance/core/src/output/mailer";
import { writeReportWorkbook } from "@zoom-attendance/core/src/output/spreadsheet";
import { describeCutoff, generateAttendanceReport } from "@zoom-attendance/core/src/pipeline/generateReport";
import { getServiceClient } from "@zoom-attendance/core/src/storage/db";
import { persistAttendance } from "@zoom-attendance/core/src/storage/repositories";
import { createTimeHelper, parseLookback } from "@zoom-attendance/core/src/time/timeHelper";
import type { OccurrenceAttendance } from "@zoom-attendance/core/src/types/attendance";
import type { MeetingSource } from "@zoom-attendance/core/src/types/meetingSource";
import { ZoomClient } from "@zoom-attendance/core/src/zoom/client";

export interface ScheduledReportDeps {
  source?: MeetingSource;
  mailer?: ReportSender;
  db?: SupabaseClient | null;
  now?: DateTime;
}

export interface ScheduledReportResult {
  rows: number;
  participants: number;
  persisted: number;
  emailed: boolean;
}

function validate(config: AppConfig) {
  const credentials = requireZoomCredentials(config);

  if (config.report.sendEmail) {
    requireEmailSettings(config);
    if (config.recipients.length === 0) {
      throw new Error("Email is enabled but no recipients are configured. Set EMAIL_RECIPIENTS");
    }
  }

  return credentials;
}

/** Storage is optional; a failure is logged and the report still goes out. */
async function storeAttendance(
  config: AppConfig,
  injected: SupabaseClient | null | undefined,
  attendance: OccurrenceAttendance[]
): Promise<number> {
  try {
    const db = injected !== undefined ? injected : config.supabase ? getServiceClient(config.supabase) : null;
    if (!db) return 0;

    const persisted = await persistAttendance(db, attendance);
    console.log(`  Stored ${persisted} attendance records`);
    return persisted;
  } catch (err) {
    console.error(`Storing attendance failed: ${describeError(err)}`);
    return 0;
  }
}

// Supabase errors are plain objects with a message, not Error instances.
function describeError(err: unknown): string {
  if (typeof err === "object" && err !== null && "message" in err && typeof err.message === "string") {
    return err.message;
  }
  return String(err);
}

/**
 * Generates the configured report, writes the workbook, optionally stores and
 * emails it, then deletes the workbook. Throws when the run should count as
 * failed.
 */
export async function runScheduledReport(
  config: AppConfig,
  deps: ScheduledReportDeps = {}
): Promise<ScheduledReportResult> {
  const credentials = validate(config);
  const { report: settings } = config;
  const now = deps.now ?? DateTime.now();

  const window = parseLookback(settings.timeRange);
  const time = createTimeHelper({ zone: settings.timezone, label: settings.timezoneLabel });
  console.log(describeCutoff(window, time, now));

  const source = deps.source ?? new ZoomClient(credentials);
  const generated = await generateAttendanceReport(source, {
    meetingId: settings.meetingId,
    window,
    time,
    now,
  });

  const filePath = await writeReportWorkbook(generated.report, {
    outputDir: settings.outputDir,
    label: settings.timezoneLabel,
    timestamp: time.formatNow("yyyyMMdd_HHmmss", now),
  });

  try {
    const result: ScheduledReportResult = {
      rows: generated.report.rows.length,
      participants: generated.report.allNames.length,
      persisted: 0,
      emailed: false,
    };

    result.persisted = await storeAttendance(config, deps.db, generated.attendance);

    if (!settings.sendEmail) {
      console.log("Report generated successfully (email disabled)");
      return result;
    }

    const mailer = deps.mailer ?? ReportMailer.fromSettings(requireEmailSettings(config));
    const email = formatReportEmail(generated.report.allNames, {
      date: time.formatNow("yyyy-MM-dd", now),
      generatedAt: `${time.formatNow("yyyy-MM-dd 'at' HH:mm", now)} ${settings.timezoneLabel}`,
      meetingId: settings.meetingId,
      timeRange: settings.timeRange,
    });

    const sent = await mailer.sendReport(filePath, [...config.recipients], email);
    if (!sent) throw new Error("Report generated but email failed");

    console.log("Report generated and emailed successfully");
    result.emailed = true;
    return result;
  } finally {
    await fs.rm(filePath, { force: true });
  }
}
