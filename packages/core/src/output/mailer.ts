import nodemailer, { type SendMailOptions, type Transporter } from "nodemailer";
import path from "path";
import type { ReportEmail } from "../formatting/reportEmail";

export interface SmtpSettings {
  server: string;
  port: number;
  senderEmail: string;
  senderPassword: string;
}

export interface ReportSender {
  sendReport(filePath: string, recipients: string[], email: ReportEmail): Promise<boolean>;
}

export function createSmtpTransport(settings: SmtpSettings): Transporter {
  return nodemailer.createTransport({
    host: settings.server,
    port: settings.port,
    // 465 is implicit TLS; anything else upgrades with STARTTLS.
    secure: settings.port === 465,
    requireTLS: settings.port !== 465,
    auth: { user: settings.senderEmail, pass: settings.senderPassword },
  });
}

export class ReportMailer implements ReportSender {
  constructor(
    private readonly sender: string,
    private readonly transporter: Transporter
  ) {}

  static fromSettings(settings: SmtpSettings): ReportMailer {
    return new ReportMailer(settings.senderEmail, createSmtpTransport(settings));
  }

  /**
   * Sends the report with the workbook attached. Failures are logged and
   * reported as false.
   */
  async sendReport(filePath: string, recipients: string[], email: ReportEmail): Promise<boolean> {
    const options: SendMailOptions = {
      from: this.sender,
      to: recipients.join(", "),
      subject: email.subject,
      text: email.text,
      attachments: [{ filename: path.basename(filePath), path: filePath }],
    };

    try {
      await this.transporter.sendMail(options);
      console.log(`Email sent to: ${recipients.join(", ")}`);
      return true;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`Email failed: ${message}`);
      return false;
    }
  }

  async sendTestEmail(recipient: string): Promise<boolean> {
    try {
      await this.transporter.sendMail({
        from: this.sender,
        to: recipient,
        subject: "Test Email - Zoom Attendance System",
        text: "Test email successful!",
      });
      console.log("Test email sent successfully!");
      return true;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`Test failed: ${message}`);
      return false;
    }
  }
}
