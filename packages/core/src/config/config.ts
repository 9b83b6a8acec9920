import dotenv from "dotenv";
import os from "os";
import path from "path";
import { z } from "zod";
import { DEFAULT_TIMEZONE, DEFAULT_TIMEZONE_LABEL } from "../time/timeHelper";

export const DEFAULT_SMTP_SERVER = "smtp.gmail.com";
export const DEFAULT_SMTP_PORT = 587;
export const DEFAULT_TIME_RANGE = "24h";
export const DEFAULT_INTERVAL_MINUTES = 24 * 60;
// setTimeout fires immediately for delays above 2^31 - 1 ms.
export const MAX_INTERVAL_MINUTES = Math.floor(2_147_483_647 / 60_000);

/** Loads the repository-root .env into process.env. Existing variables win. */
export function loadEnv(): void {
  dotenv.config({ path: path.resolve(__dirname, "../../../../.env"), quiet: true });
}

function unquote(value: string): string {
  return value.trim().replace(/^["']|["']$/g, "").trim();
}

function safeInt(fallback: number) {
  return (value: string | undefined): number => {
    const text = unquote(value ?? "");
    return /^[+-]?\d+$/.test(text) ? parseInt(text, 10) : fallback;
  };
}

function flag(fallback: boolean) {
  return (value: string | undefined): boolean => {
    const text = unquote(value ?? "").toLowerCase();
    if (!text) return fallback;
    return ["1", "true", "yes", "y", "on"].includes(text);
  };
}

const blankToNull = (value: string | undefined): string | null => {
  const text = unquote(value ?? "");
  return text || null;
};

const envSchema = z.object({
  ZOOM_ACCOUNT_ID: z.string().optional().transform(blankToNull),
  ZOOM_CLIENT_ID: z.string().optional().transform(blankToNull),
  ZOOM_CLIENT_SECRET: z.string().optional().transform(blankToNull),

  SENDER_EMAIL: z.string().optional().transform(blankToNull),
  SENDER_PASSWORD: z.string().optional().transform(blankToNull),
  SMTP_SERVER: z.string().optional().transform((v) => blankToNull(v) ?? DEFAULT_SMTP_SERVER),
  SMTP_PORT: z.string().optional().transform(safeInt(DEFAULT_SMTP_PORT)),
  EMAIL_RECIPIENTS: z
    .string()
    .optional()
    .transform((v) =>
      (v ?? "")
        .split(",")
        .map((x) => x.trim())
        .filter(Boolean)
    ),

  REPORT_MEETING_ID: z.string().optional().transform(blankToNull),
  REPORT_TIME_RANGE: z.string().optional().transform((v) => blankToNull(v) ?? DEFAULT_TIME_RANGE),
  REPORT_SEND_EMAIL: z.string().optional().transform(flag(true)),
  REPORT_TIMEZONE: z.string().optional().transform((v) => blankToNull(v) ?? DEFAULT_TIMEZONE),
  REPORT_TIMEZONE_LABEL: z.string().optional().transform((v) => blankToNull(v) ?? DEFAULT_TIMEZONE_LABEL),
  REPORT_OUTPUT_DIR: z.string().optional().transform(blankToNull),
  REPORT_INTERVAL_MINUTES: z
    .string()
    .optional()
    .transform(safeInt(DEFAULT_INTERVAL_MINUTES))
    .transform((minutes) => Math.min(Math.max(minutes, 1), MAX_INTERVAL_MINUTES)),

  SUPABASE_URL: z.string().optional().transform(blankToNull),
  SUPABASE_SERVICE_ROLE_KEY: z.string().optional().transform(blankToNull),
});

export interface AppConfig {
  readonly zoom: {
    readonly accountId: string | null;
    readonly clientId: string | null;
    readonly clientSecret: string | null;
  };
  readonly smtp: {
    readonly server: string;
    readonly port: number;
    readonly senderEmail: string | null;
    readonly senderPassword: string | null;
  };
  readonly recipients: readonly string[];
  readonly report: {
    readonly meetingId: string | null;
    readonly timeRange: string;
    readonly sendEmail: boolean;
    readonly timezone: string;
    readonly timezoneLabel: string;
    readonly outputDir: string;
    readonly intervalMinutes: number;
  };
  readonly supabase: { readonly url: string; readonly serviceRoleKey: string } | null;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  if (Boolean(parsed.SUPABASE_URL) !== Boolean(parsed.SUPABASE_SERVICE_ROLE_KEY)) {
    throw new Error("Set both SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY, or neither");
  }

  return {
    zoom: {
      accountId: parsed.ZOOM_ACCOUNT_ID,
      clientId: parsed.ZOOM_CLIENT_ID,
      clientSecret: parsed.ZOOM_CLIENT_SECRET,
    },
    smtp: {
      server: parsed.SMTP_SERVER,
      port: parsed.SMTP_PORT,
      senderEmail: parsed.SENDER_EMAIL,
      senderPassword: parsed.SENDER_PASSWORD,
    },
    recipients: parsed.EMAIL_RECIPIENTS,
    report: {
      meetingId: parsed.REPORT_MEETING_ID,
      timeRange: parsed.REPORT_TIME_RANGE,
      sendEmail: parsed.REPORT_SEND_EMAIL,
      timezone: parsed.REPORT_TIMEZONE,
      timezoneLabel: parsed.REPORT_TIMEZONE_LABEL,
      outputDir: parsed.REPORT_OUTPUT_DIR ?? os.tmpdir(),
      intervalMinutes: parsed.REPORT_INTERVAL_MINUTES,
    },
    supabase:
      parsed.SUPABASE_URL && parsed.SUPABASE_SERVICE_ROLE_KEY
        ? { url: parsed.SUPABASE_URL, serviceRoleKey: parsed.SUPABASE_SERVICE_ROLE_KEY }
        : null,
  };
}

export function requireZoomCredentials(config: AppConfig) {
  const { accountId, clientId, clientSecret } = config.zoom;
  if (!accountId || !clientId || !clientSecret) {
    throw new Error("Missing Zoom credentials. Set ZOOM_ACCOUNT_ID, ZOOM_CLIENT_ID, ZOOM_CLIENT_SECRET");
  }
  return { accountId, clientId, clientSecret };
}

export function requireEmailSettings(config: AppConfig) {
  const { server, port, senderEmail, senderPassword } = config.smtp;
  if (!senderEmail || !senderPassword) {
    throw new Error("Missing email credentials. Set SENDER_EMAIL, SENDER_PASSWORD");
  }
  return { server, port, senderEmail, senderPassword };
}

const check = (ok: boolean) => (ok ? "✓" : "✗");

export function formatConfigStatus(config: AppConfig): string {
  const { zoom, smtp, report } = config;
  return [
    "Configuration Status:",
    `Zoom Account ID: ${check(Boolean(zoom.accountId))}`,
    `Zoom Client ID: ${check(Boolean(zoom.clientId))}`,
    `Zoom Client Secret: ${check(Boolean(zoom.clientSecret))}`,
    `Sender Email: ${smtp.senderEmail ?? "✗ Not set"}`,
    `Email Config: ${check(Boolean(smtp.senderEmail && smtp.senderPassword))}`,
    `Recipients: ${config.recipients.length} configured`,
    `Meeting ID: ${report.meetingId ?? "all meetings"}`,
    `Time Range: ${report.timeRange}`,
    `Send Email: ${report.sendEmail ? "yes" : "no"}`,
    `Timezone: ${report.timezone} (${report.timezoneLabel})`,
    `Supabase: ${check(config.supabase !== null)}`,
  ].join("\n");
}
