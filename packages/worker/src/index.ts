import { formatConfigStatus, loadConfig, loadEnv } from "@zoom-attendance/core/src/config/config";
import { runOnce } from "./runOnce";

loadEnv();

async function main() {
  const config = loadConfig();
  const args = process.argv.slice(2);

  if (args.includes("--check")) {
    console.log(formatConfigStatus(config));
    return;
  }

  if (args.includes("--once")) {
    const ok = await runOnce(config);
    if (!ok) process.exit(1);
    return;
  }

  const intervalMs = config.report.intervalMinutes * 60_000;
  console.log(`Worker starting (every ${config.report.intervalMinutes} minutes)...`);

  while (true) {
    await runOnce(config);
    await sleep(intervalMs);
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

main().catch((err) => {
  console.error("Worker crashed:", err);
  process.exit(1);
});
