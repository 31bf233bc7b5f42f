import Database from "better-sqlite3";
import fs from "fs";
import path from "path";
import { config } from "./config";
import type { ProductRecord, ScrapeRun } from "./types";

let db: Database.Database | null = null;

export type UploadStatus = "created" | "duplicate" | "error";

export interface StoredProduct {
  record: ProductRecord;
  sourceUrl: string;
  imageUrl: string | null;
  imagePath: string | null;
  runId: string;
  uploadStatus: UploadStatus | null;
  createdAt: string;
  updatedAt: string;
}

export function getDb(): Database.Database {
  if (db) return db;
  return initDb(config.dbPath);
}

/**
 * Open (or reopen) the database at dbPath. ":memory:" gives a throwaway
 * database, which is what the tests use.
 */
export function initDb(dbPath: string): Database.Database {
  closeDb();

  if (dbPath === ":memory:") {
    db = new Database(dbPath);
  } else {
    const resolved = path.resolve(process.cwd(), dbPath);
    const dir = path.dirname(resolved);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    db = new Database(resolved);
    db.pragma("journal_mode = WAL");
  }

  initSchema(db);
  return db;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS http_cache (
      url_hash     TEXT PRIMARY KEY,
      url          TEXT NOT NULL,
      body         TEXT NOT NULL,
      fetched_at   INTEGER NOT NULL,
      ttl_ms       INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS scrape_runs (
      id             TEXT PRIMARY KEY,
      site           TEXT NOT NULL,
      timestamp      TEXT NOT NULL,
      record_count   INTEGER NOT NULL DEFAULT 0,
      rejected_count INTEGER NOT NULL DEFAULT 0,
      error_count    INTEGER NOT NULL DEFAULT 0,
      duration_ms    INTEGER NOT NULL DEFAULT 0
    );

    CREATE TABLE IF NOT EXISTS products (
      id            TEXT PRIMARY KEY,
      brand         TEXT NOT NULL,
      model         TEXT NOT NULL,
      source        TEXT NOT NULL,
      source_url    TEXT NOT NULL,
      record_json   TEXT NOT NULL,
      image_url     TEXT,
      image_path    TEXT,
      run_id        TEXT NOT NULL,
      upload_status TEXT,
      created_at    TEXT NOT NULL,
      updated_at    TEXT NOT NULL
    );
  `);
}

// ===== Scrape Run CRUD =====

export function insertScrapeRun(run: ScrapeRun): void {
  const db = getDb();
  db.prepare(`
    INSERT INTO scrape_runs (id, site, timestamp, record_count, rejected_count, error_count, duration_ms)
    VALUES (?, ?, ?, ?, ?, ?, ?)
  `).run(
    run.id,
    run.site,
    run.timestamp,
    run.recordCount,
    run.rejectedCount,
    run.errorCount,
    run.durationMs
  );
}

export function getLatestRun(): ScrapeRun | null {
  const db = getDb();
  const row = db
    .prepare("SELECT * FROM scrape_runs ORDER BY timestamp DESC LIMIT 1")
    .get() as Record<string, unknown> | undefined;
  return row ? mapRowToScrapeRun(row) : null;
}

export function getAllRuns(): ScrapeRun[] {
  const db = getDb();
  const rows = db
    .prepare("SELECT * FROM scrape_runs ORDER BY timestamp DESC")
    .all() as Record<string, unknown>[];
  return rows.map(mapRowToScrapeRun);
}

function mapRowToScrapeRun(row: Record<string, unknown>): ScrapeRun {
  return {
    id: row.id as string,
    site: row.site as string,
    timestamp: row.timestamp as string,
    recordCount: row.record_count as number,
    rejectedCount: row.rejected_count as number,
    errorCount: row.error_count as number,
    durationMs: row.duration_ms as number,
  };
}

// ===== Product CRUD =====

export interface ProductContext {
  sourceUrl: string;
  imageUrl: string | null;
  runId: string;
}

/**
 * Insert or refresh a product by id. A re-scraped product keeps its
 * created_at, image path and upload status; its record is replaced.
 * Returns true when the id was new.
 */
export function upsertProduct(record: ProductRecord, ctx: ProductContext): boolean {
  const db = getDb();
  const now = new Date().toISOString();
  const existed = db.prepare("SELECT 1 FROM products WHERE id = ?").get(record.id) !== undefined;

  db.prepare(`
    INSERT INTO products (
      id, brand, model, source, source_url, record_json, image_url, image_path,
      run_id, upload_status, created_at, updated_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?, NULL, ?, NULL, ?, ?)
    ON CONFLICT(id) DO UPDATE SET
      brand = excluded.brand,
      model = excluded.model,
      source = excluded.source,
      source_url = excluded.source_url,
      record_json = excluded.record_json,
      image_url = COALESCE(excluded.image_url, products.image_url),
      run_id = excluded.run_id,
      updated_at = excluded.updated_at
  `).run(
    record.id,
    record.metadata.brand,
    record.metadata.model,
    record.metadata.source,
    ctx.sourceUrl,
    JSON.stringify(record),
    ctx.imageUrl,
    ctx.runId,
    now,
    now
  );

  return !existed;
}

export function upsertProducts(
  items: { record: ProductRecord; ctx: ProductContext }[]
): { inserted: number; updated: number } {
  let inserted = 0;
  let updated = 0;
  if (items.length === 0) return { inserted, updated };
  const db = getDb();
  db.transaction(() => {
    for (const { record, ctx } of items) {
      if (upsertProduct(record, ctx)) inserted++;
      else updated++;
    }
  })();
  return { inserted, updated };
}

export function getProduct(id: string): StoredProduct | null {
  const db = getDb();
  const row = db.prepare("SELECT * FROM products WHERE id = ?").get(id) as
    | Record<string, unknown>
    | undefined;
  return row ? mapRowToProduct(row) : null;
}

export function getAllProducts(): StoredProduct[] {
  const db = getDb();
  const rows = db
    .prepare("SELECT * FROM products ORDER BY brand, model")
    .all() as Record<string, unknown>[];
  return rows.map(mapRowToProduct);
}

/** Products never uploaded, or whose last upload failed */
export function getPendingUploads(): StoredProduct[] {
  const db = getDb();
  const rows = db
    .prepare(
      "SELECT * FROM products WHERE upload_status IS NULL OR upload_status = 'error' ORDER BY brand, model"
    )
    .all() as Record<string, unknown>[];
  return rows.map(mapRowToProduct);
}

export function setImagePath(id: string, imagePath: string): void {
  const db = getDb();
  db.prepare("UPDATE products SET image_path = ? WHERE id = ?").run(imagePath, id);
}

export function setUploadStatus(id: string, status: UploadStatus): void {
  const db = getDb();
  db.prepare("UPDATE products SET upload_status = ?, updated_at = ? WHERE id = ?").run(
    status,
    new Date().toISOString(),
    id
  );
}

function mapRowToProduct(row: Record<string, unknown>): StoredProduct {
  return {
    record: JSON.parse(row.record_json as string) as ProductRecord,
    sourceUrl: row.source_url as string,
    imageUrl: (row.image_url as string | null) ?? null,
    imagePath: (row.image_path as string | null) ?? null,
    runId: row.run_id as string,
    uploadStatus: (row.upload_status as UploadStatus | null) ?? null,
    createdAt: row.created_at as string,
    updatedAt: row.updated_at as string,
  };
}
