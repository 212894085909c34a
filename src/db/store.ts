import { asc, eq, sql } from "drizzle-orm";
import { z } from "zod";
import { isIsoDate } from "@/lib/dates";
import { CheckpointCorruption } from "@/lib/errors";
import { log } from "@/lib/logger";
import { recordKey } from "@/lib/normalize";
import { EMPTY_CHECKPOINT } from "@/lib/types";
import type { CollectionCheckpoint, DailyRecord, IsoDate } from "@/lib/types";
import type { Database } from "./client";
import { collectionCheckpoint, collectionDates, dailyRecords } from "./schema";
import type { DailyRecordRow, NewDailyRecordRow } from "./schema";

/** `inserted` counts new rows only; rows already stored for the date are not rewritten. */
export type AppendResult = { inserted: number; duplicates: number };

/** Persistence the orchestrator needs; one transaction per date. */
export interface RecordStore {
  has(date: IsoDate): Promise<boolean>;
  append(
    date: IsoDate,
    records: readonly DailyRecord[],
    checkpoint: CollectionCheckpoint,
    attempts?: number,
  ): Promise<AppendResult>;
  markSkipped(
    date: IsoDate,
    reason: string,
    checkpoint: CollectionCheckpoint,
    attempts?: number,
  ): Promise<void>;
  readCheckpoint(): Promise<CollectionCheckpoint>;
  writeCheckpoint(checkpoint: CollectionCheckpoint): Promise<void>;
  listRecords(): Promise<DailyRecord[]>;
  listSkippedDates(): Promise<IsoDate[]>;
}

// ─── Pure helpers ─────────────────────────────────────────────────────────────

/** Drop repeated keys within one batch; the first occurrence (page order) wins. */
export function dedupeBatch(records: readonly DailyRecord[]): {
  unique: DailyRecord[];
  duplicates: Array<{ key: string; title: string }>;
} {
  const seen = new Set<string>();
  const unique: DailyRecord[] = [];
  const duplicates: Array<{ key: string; title: string }> = [];
  for (const record of records) {
    const key = recordKey(record);
    if (seen.has(key)) {
      duplicates.push({ key, title: record.sourceTitle });
      continue;
    }
    seen.add(key);
    unique.push(record);
  }
  return { unique, duplicates };
}

export function recordToRow(record: DailyRecord): NewDailyRecordRow {
  return {
    reportDate: record.date,
    recordKey: recordKey(record),
    sourceTitle: record.sourceTitle,
    sourceUrl: record.sourceUrl,
    rank: record.rank,
    dailyGross: record.dailyGross,
    ydChangePct: record.ydChangePct,
    lwChangePct: record.lwChangePct,
    theaterCount: record.theaterCount,
    perTheaterAvg: record.perTheaterAvg,
    cumulativeGross: record.cumulativeGross,
    daysInRelease: record.daysInRelease,
    distributor: record.distributor,
  };
}

export function rowToRecord(row: DailyRecordRow): DailyRecord {
  return {
    date: row.reportDate,
    sourceTitle: row.sourceTitle,
    sourceUrl: row.sourceUrl,
    rank: row.rank,
    dailyGross: row.dailyGross,
    ydChangePct: row.ydChangePct,
    lwChangePct: row.lwChangePct,
    theaterCount: row.theaterCount,
    perTheaterAvg: row.perTheaterAvg,
    cumulativeGross: row.cumulativeGross,
    daysInRelease: row.daysInRelease,
    distributor: row.distributor,
  };
}

const checkpointSchema = z.object({
  lastCompletedDate: z
    .string()
    .refine(isIsoDate, "not a YYYY-MM-DD date")
    .nullable(),
  consecutiveFailureCount: z.number().int().nonnegative(),
});

/** Validate a stored checkpoint; anything unreadable is `CheckpointCorruption`. */
export function parseCheckpoint(raw: unknown): CollectionCheckpoint {
  const parsed = checkpointSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new CheckpointCorruption(detail);
  }
  return parsed.data;
}

// ─── Postgres implementation ──────────────────────────────────────────────────

export class PgRecordStore implements RecordStore {
  constructor(
    private readonly db: Database,
    private readonly checkpointId: string = "default",
  ) {}

  async has(date: IsoDate): Promise<boolean> {
    const rows = await this.db
      .select({ status: collectionDates.status })
      .from(collectionDates)
      .where(eq(collectionDates.reportDate, date))
      .limit(1);
    return rows[0]?.status === "stored";
  }

  async append(
    date: IsoDate,
    records: readonly DailyRecord[],
    checkpoint: CollectionCheckpoint,
    attempts = 1,
  ): Promise<AppendResult> {
    const foreign = records.find((r) => r.date !== date);
    if (foreign) {
      throw new Error(`Record dated ${foreign.date} appended under ${date}`);
    }

    const { unique, duplicates } = dedupeBatch(records);
    for (const dup of duplicates) {
      log.warn("record_duplicate", { date, key: dup.key, title: dup.title });
    }
    const rows = unique.map(recordToRow);

    const inserted = await this.db.transaction(async (tx) => {
      // Stored rows are immutable: a replayed date never rewrites them
      const written =
        rows.length > 0
          ? await tx
              .insert(dailyRecords)
              .values(rows)
              .onConflictDoNothing()
              .returning({ key: dailyRecords.recordKey })
          : [];
      await tx
        .insert(collectionDates)
        .values({ reportDate: date, status: "stored", recordCount: rows.length, attempts, reason: null })
        .onConflictDoUpdate({
          target: collectionDates.reportDate,
          set: { status: "stored", recordCount: rows.length, attempts, reason: null, updatedAt: new Date() },
        });
      await this.advanceCheckpoint(tx, checkpoint);
      return written.length;
    });

    log.info("date_stored", { date, inserted, duplicates: duplicates.length });
    return { inserted, duplicates: duplicates.length };
  }

  async markSkipped(
    date: IsoDate,
    reason: string,
    checkpoint: CollectionCheckpoint,
    attempts = 1,
  ): Promise<void> {
    await this.db.transaction(async (tx) => {
      await tx
        .insert(collectionDates)
        .values({ reportDate: date, status: "skipped", recordCount: 0, attempts, reason })
        .onConflictDoUpdate({
          target: collectionDates.reportDate,
          // A date stored earlier stays stored
          set: { attempts, reason, updatedAt: new Date() },
          setWhere: sql`${collectionDates.status} = 'skipped'`,
        });
      await this.advanceCheckpoint(tx, checkpoint);
    });
    log.info("date_skipped", { date, reason });
  }

  async readCheckpoint(): Promise<CollectionCheckpoint> {
    const rows = await this.db
      .select({
        lastCompletedDate: collectionCheckpoint.lastCompletedDate,
        consecutiveFailureCount: collectionCheckpoint.consecutiveFailureCount,
      })
      .from(collectionCheckpoint)
      .where(eq(collectionCheckpoint.id, this.checkpointId))
      .limit(1);
    const row = rows[0];
    return row ? parseCheckpoint(row) : { ...EMPTY_CHECKPOINT };
  }

  /** Operator override: replaces the checkpoint, even backwards. */
  async writeCheckpoint(checkpoint: CollectionCheckpoint): Promise<void> {
    const valid = parseCheckpoint(checkpoint);
    await this.db
      .insert(collectionCheckpoint)
      .values({ id: this.checkpointId, ...valid })
      .onConflictDoUpdate({
        target: collectionCheckpoint.id,
        set: { ...valid, updatedAt: new Date() },
      });
    log.info("checkpoint_written", { ...valid });
  }

  async listRecords(): Promise<DailyRecord[]> {
    const rows = await this.db
      .select()
      .from(dailyRecords)
      .orderBy(asc(dailyRecords.reportDate), asc(dailyRecords.recordKey));
    return rows.map(rowToRecord);
  }

  async listSkippedDates(): Promise<IsoDate[]> {
    const rows = await this.db
      .select({ date: collectionDates.reportDate })
      .from(collectionDates)
      .where(eq(collectionDates.status, "skipped"))
      .orderBy(asc(collectionDates.reportDate));
    return rows.map((r) => r.date);
  }

  /** Upsert that never moves `last_completed_date` backwards. */
  private async advanceCheckpoint(db: Database, checkpoint: CollectionCheckpoint): Promise<void> {
    const valid = parseCheckpoint(checkpoint);
    await db
      .insert(collectionCheckpoint)
      .values({ id: this.checkpointId, ...valid })
      .onConflictDoUpdate({
        target: collectionCheckpoint.id,
        set: {
          lastCompletedDate: sql`greatest(${collectionCheckpoint.lastCompletedDate}, excluded.last_completed_date)`,
          consecutiveFailureCount: valid.consecutiveFailureCount,
          updatedAt: new Date(),
        },
      });
  }
}
