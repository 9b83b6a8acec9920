import type { AppConfig } from "@zoom-attendance/core/src/config/config";
import { runScheduledReport, type ScheduledReportDeps } from "./processor";

export async function runOnce(config: AppConfig, deps: ScheduledReportDeps = {}): Promise<boolean> {
  console.log("Starting automated Zoom attendance report generation");

  try {
    const result = await runScheduledReport(config, deps);
    console.log(`Run succeeded: ${result.rows} rows${result.emailed ? ", emailed" : ""}.`);
    return true;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Error generating report: ${message}`);
    return false;
  }
}
