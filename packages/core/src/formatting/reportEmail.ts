export const SERVICE_SIGNATURE = "Zoom Attendance Service";

export interface ReportEmailContext {
  /** Local date for the subject line, yyyy-MM-dd. */
  date: string;
  /** e.g. "2024-01-15 at 09:30 PST" */
  generatedAt: string;
  meetingId?: string | null;
  timeRange?: string | null;
}

export interface ReportEmail {
  subject: string;
  text: string;
}

/** Unique names, sorted, one per line. */
export function formatParticipantList(names: readonly string[]): string {
  const unique = Array.from(new Set(names)).sort();
  return unique.length > 0 ? unique.join("\n") : "No participants found";
}

export function formatReportEmail(names: readonly string[], ctx: ReportEmailContext): ReportEmail {
  const details = [`Generated: ${ctx.generatedAt}`];
  if (ctx.meetingId) details.push(`Meeting ID: ${ctx.meetingId}`);
  if (ctx.timeRange) details.push(`Time Range: ${ctx.timeRange}`);

  const text = [
    "Hello,",
    "",
    "Please find attached the Zoom attendance report.",
    "",
    ...details,
    "",
    "Participants:",
    formatParticipantList(names),
    "",
    "Best regards,",
    SERVICE_SIGNATURE,
  ].join("\n");

  return { subject: `Zoom Attendance Report - ${ctx.date}`, text };
}
