import { getPendingUploads, setUploadStatus, closeDb } from "../lib/db";
import { toCatalogPayload } from "../lib/export";
import { uploadRecords } from "../lib/catalog-client";
import { config } from "../lib/config";

async function main() {
  const args = process.argv.slice(2);
  const dryRun = args.includes("--dry-run");

  const pending = getPendingUploads();
  if (pending.length === 0) {
    console.log("Nothing to upload");
    closeDb();
    return;
  }

  const payloads = pending.map((p) => toCatalogPayload(p.record));
  console.log(`${pending.length} products pending upload to ${config.catalogApiUrl}`);

  if (dryRun) {
    for (const payload of payloads) {
      console.log(JSON.stringify(payload, null, 2));
    }
    closeDb();
    return;
  }

  const ids = new Map(payloads.map((payload, i) => [payload, pending[i].record.id]));
  const summary = await uploadRecords(payloads, {
    onResult: (payload, result) => {
      const id = ids.get(payload);
      if (id) setUploadStatus(id, result.status);
      console.log(`  ${id}: ${result.status}${result.httpStatus ? ` (HTTP ${result.httpStatus})` : ""}`);
    },
  });

  console.log(`\n=== Summary ===`);
  console.log(`Created: ${summary.created}`);
  console.log(`Duplicate: ${summary.duplicate}`);
  console.log(`Failed: ${summary.error}`);

  closeDb();
  process.exit(summary.error > 0 ? 1 : 0);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  closeDb();
  process.exit(1);
});
