/**
 * Database operations for cached price series
 */

import type { Database } from "./database";
import type { SeriesId } from "../config/sources";
import type { PricePoint } from "../services/types";

/**
 * Upsert price points for a series. A refetched timestamp replaces the stored price.
 */
export function savePricePoints(db: Database.Database, series: SeriesId, points: readonly PricePoint[]): void {
  if (points.length === 0) {
    return;
  }

  const stmt = db.prepare(`
    INSERT INTO price_points (series, time, price) VALUES (?, ?, ?)
    ON CONFLICT(series, time) DO UPDATE SET price = excluded.price
  `);

  db.transaction(() => {
    for (const point of points) {
      stmt.run(series, point.time, point.price);
    }
  })();
}

/**
 * Load a series ordered by time, optionally from a start timestamp (inclusive)
 */
export function loadPricePoints(db: Database.Database, series: SeriesId, from?: Date): PricePoint[] {
  let sql = "SELECT time, price FROM price_points WHERE series = ?";
  const params: string[] = [series];

  if (from !== undefined) {
    sql += " AND time >= ?";
    params.push(from.toISOString());
  }

  sql += " ORDER BY time";

  return db.prepare<string[], PricePoint>(sql).all(...params);
}

/**
 * Get the timestamp of the newest synced point for a series
 */
export function getLastPriceSyncedAt(db: Database.Database, series: SeriesId): Date | null {
  const row = db
    .prepare<[string], { last_synced_at: string }>("SELECT last_synced_at FROM price_sync_state WHERE series = ?")
    .get(series);
  return row ? new Date(row.last_synced_at) : null;
}

/**
 * Advance the sync cursor for a series; it never moves backwards
 */
export function updateLastPriceSyncedAt(db: Database.Database, series: SeriesId, syncedAt: Date): void {
  db.prepare(`
    INSERT INTO price_sync_state (series, last_synced_at) VALUES (?, ?)
    ON CONFLICT(series) DO UPDATE SET last_synced_at = MAX(price_sync_state.last_synced_at, excluded.last_synced_at)
  `).run(series, syncedAt.toISOString());
}
