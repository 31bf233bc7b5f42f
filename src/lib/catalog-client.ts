import { fetch as undiciFetch } from "undici";
import { config } from "./config";
import type { CatalogPayload } from "./export";
import type { UploadStatus } from "./db";

export interface UploadResult {
  status: UploadStatus;
  httpStatus: number | null;
  message?: string;
}

export interface UploadSummary {
  created: number;
  duplicate: number;
  error: number;
  results: UploadResult[];
}

export function catalogEndpoint(baseUrl: string = config.catalogApiUrl): string {
  return `${baseUrl.replace(/\/+$/, "")}/api/paddles`;
}

/**
 * POST one payload to the catalog. 201 is created, 409 duplicate; any other
 * status, or a network failure, is an error.
 */
export async function uploadRecord(
  payload: CatalogPayload,
  options: { baseUrl?: string; timeoutMs?: number } = {}
): Promise<UploadResult> {
  const { timeoutMs = 30000 } = options;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await undiciFetch(catalogEndpoint(options.baseUrl), {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(payload),
      signal: controller.signal,
    });

    if (response.status === 201) return { status: "created", httpStatus: 201 };
    if (response.status === 409) return { status: "duplicate", httpStatus: 409 };

    const message = (await response.text()).slice(0, 500);
    console.error(`[catalog] HTTP ${response.status} uploading ${payload.metadata.brand} ${payload.metadata.model}: ${message}`);
    return { status: "error", httpStatus: response.status, message };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[catalog] Upload failed for ${payload.metadata.brand} ${payload.metadata.model}: ${message}`);
    return { status: "error", httpStatus: null, message };
  } finally {
    clearTimeout(timeout);
  }
}

/** Upload payloads one at a time and tally the outcomes */
export async function uploadRecords(
  payloads: readonly CatalogPayload[],
  options: { baseUrl?: string; onResult?: (payload: CatalogPayload, result: UploadResult) => void } = {}
): Promise<UploadSummary> {
  const summary: UploadSummary = { created: 0, duplicate: 0, error: 0, results: [] };

  for (const payload of payloads) {
    const result = await uploadRecord(payload, { baseUrl: options.baseUrl });
    summary[result.status]++;
    summary.results.push(result);
    options.onResult?.(payload, result);
  }

  console.log(
    `[catalog] ${summary.created} created, ${summary.duplicate} duplicate, ${summary.error} failed`
  );
  return summary;
}
