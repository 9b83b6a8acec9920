import fs from "fs/promises";

export const ENV_TEMPLATE = `# Zoom API Configuration (Server-to-Server OAuth app)
ZOOM_ACCOUNT_ID=your_account_id
ZOOM_CLIENT_ID=your_client_id
ZOOM_CLIENT_SECRET=your_client_secret

# Email Configuration
SENDER_EMAIL=your_email@gmail.com
SENDER_PASSWORD=your_app_password
SMTP_SERVER=smtp.gmail.com
SMTP_PORT=587

# Recipients (comma-separated)
EMAIL_RECIPIENTS=manager@company.com,hr@company.com

# Scheduled report
REPORT_MEETING_ID=
REPORT_TIME_RANGE=24h
REPORT_SEND_EMAIL=true
REPORT_TIMEZONE=America/Los_Angeles
REPORT_TIMEZONE_LABEL=PST
REPORT_INTERVAL_MINUTES=1440

# Optional: store merged attendance in Supabase
SUPABASE_URL=
SUPABASE_SERVICE_ROLE_KEY=
`;

export async function writeEnvTemplate(filePath = ".env.template"): Promise<string> {
  await fs.writeFile(filePath, ENV_TEMPLATE, "utf-8");
  return filePath;
}
