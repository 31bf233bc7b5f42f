import fs from "fs";
import { runScrapePipeline } from "../lib/pipeline";
import { getAllSiteIds } from "../lib/sites/registry";
import { saveImage } from "../lib/images";
import { setImagePath, closeDb } from "../lib/db";
import { serializeRecord } from "../lib/export";

async function main() {
  const args = process.argv.slice(2);
  const sites: string[] = [];
  const urls: string[] = [];
  let concurrency: number | undefined;
  let downloadImages = false;
  let outFile: string | null = null;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--site" && args[i + 1]) {
      sites.push(args[++i]);
    } else if (args[i] === "--url" && args[i + 1]) {
      urls.push(args[++i]);
    } else if (args[i] === "--concurrency" && args[i + 1]) {
      concurrency = parseInt(args[++i], 10);
    } else if (args[i] === "--out" && args[i + 1]) {
      outFile = args[++i];
    } else if (args[i] === "--images") {
      downloadImages = true;
    }
  }

  if (sites.length === 0 && urls.length === 0) {
    console.error(`Usage: scrape-paddles --site <id> | --url <product url> [--concurrency n] [--images] [--out file.json]`);
    console.error(`Available sites: ${getAllSiteIds().join(", ")}`);
    process.exit(1);
  }

  const controller = new AbortController();
  process.on("SIGINT", () => {
    console.warn("\nStopping after in-flight pages...");
    controller.abort();
  });

  const jobs: { site?: string; urls?: string[] }[] =
    urls.length > 0 ? [{ site: sites[0], urls }] : sites.map((site) => ({ site }));
  const lines: string[] = [];

  for (const job of jobs) {
    console.log(`\n=== ${job.site ?? "by URL"} ===`);
    const result = await runScrapePipeline({
      site: job.site,
      urls: job.urls,
      concurrency,
      signal: controller.signal,
      persist: true,
    });

    for (const record of result.records) {
      const missing = (result.diagnostics[record.id] ?? []).map((d) => `${d.field}:${d.reason}`);
      console.log(`  ${record.id}${missing.length > 0 ? `  [${missing.join(", ")}]` : ""}`);
      lines.push(serializeRecord(record));

      const imageUrl = result.imageUrls[record.id];
      if (downloadImages && imageUrl) {
        const saved = await saveImage(imageUrl, record.metadata.brand, record.metadata.model);
        if (saved) setImagePath(record.id, saved);
      }
    }

    console.log(`Records: ${result.run.recordCount}`);
    console.log(`Rejected: ${result.run.rejectedCount}`);
    console.log(`Errors: ${result.run.errorCount}`);
    if (controller.signal.aborted) break;
  }

  if (outFile) {
    fs.writeFileSync(outFile, `[\n${lines.join(",\n")}\n]\n`);
    console.log(`Wrote ${lines.length} records to ${outFile}`);
  }

  closeDb();
  process.exit(0);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  closeDb();
  process.exit(1);
});
