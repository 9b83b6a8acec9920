import { createInterface } from "readline/promises";
import { DateTime } from "luxon";
import {
  type AppConfig,
  ReportMailer,
  ZoomClient,
  createTimeHelper,
  describeCutoff,
  formatConfigStatus,
  formatReportEmail,
  generateAttendanceReport,
  loadConfig,
  loadEnv,
  parseLookback,
  requireZoomCredentials,
  writeEnvTemplate,
  writeReportWorkbook,
} from "@zoom-attendance/core";

loadEnv();

const rl = createInterface({ input: process.stdin, output: process.stdout });

async function ask(question: string): Promise<string> {
  return (await rl.question(question)).trim();
}

function splitRecipients(input: string): string[] {
  return input
    .split(",")
    .map((x) => x.trim())
    .filter(Boolean);
}

async function manualReport(config: AppConfig) {
  const credentials = requireZoomCredentials(config);

  const meetingId = (await ask("Enter meeting ID (or press Enter for all meetings): ")) || null;
  console.log("\nTime range examples: 2h, 30m, 1d");
  const timeInput = (await ask("Time to look back (default 1d): ")) || "1d";

  const window = parseLookback(timeInput);
  const time = createTimeHelper({ zone: config.report.timezone, label: config.report.timezoneLabel });
  const now = DateTime.now();
  console.log(`\n${describeCutoff(window, time, now)}`);

  const { report } = await generateAttendanceReport(new ZoomClient(credentials), {
    meetingId,
    window,
    time,
    now,
  });

  const filePath = await writeReportWorkbook(report, {
    outputDir: process.cwd(),
    label: config.report.timezoneLabel,
    timestamp: time.formatNow("yyyyMMdd_HHmmss", now),
  });

  if ((await ask("\nSend via email? (y/n): ")).toLowerCase() === "y") {
    const { senderEmail, senderPassword } = config.smtp;
    if (!senderEmail || !senderPassword) {
      console.log("Missing email credentials. Set SENDER_EMAIL, SENDER_PASSWORD");
      return;
    }

    const recipients =
      config.recipients.length > 0
        ? [...config.recipients]
        : splitRecipients(await ask("Enter recipient emails (comma-separated): "));

    if (recipients.length > 0) {
      const mailer = ReportMailer.fromSettings({ ...config.smtp, senderEmail, senderPassword });
      const email = formatReportEmail(report.allNames, {
        date: time.formatNow("yyyy-MM-dd", now),
        generatedAt: `${time.formatNow("yyyy-MM-dd 'at' HH:mm", now)} ${config.report.timezoneLabel}`,
      });
      await mailer.sendReport(filePath, recipients, email);
    }
  }

  console.log("Done!");
}

async function testEmail(config: AppConfig) {
  const senderEmail = config.smtp.senderEmail ?? (await ask("Email: "));
  const senderPassword = config.smtp.senderPassword ?? (await ask("Password: "));
  const recipient = await ask("Test recipient: ");

  const settings = { server: config.smtp.server, port: config.smtp.port, senderEmail, senderPassword };
  await ReportMailer.fromSettings(settings).sendTestEmail(recipient);
}

async function main() {
  const config = loadConfig();

  console.log("Zoom Attendance Report Generator");
  console.log("\n1. Generate report");
  console.log("2. Test email");
  console.log("3. Create .env template");
  console.log("4. Show configuration");

  const choice = await ask("\nSelect (1-4): ");

  switch (choice) {
    case "1":
      await manualReport(config);
      break;
    case "2":
      await testEmail(config);
      break;
    case "3": {
      const filePath = await writeEnvTemplate();
      console.log(`Created ${filePath} - copy to .env and fill in your values`);
      break;
    }
    case "4":
      console.log(formatConfigStatus(config));
      break;
    default:
      console.log("Invalid choice");
  }
}

main()
  .catch((err) => {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Error: ${message}`);
    process.exitCode = 1;
  })
  .finally(() => rl.close());
