/**
 * src/lib/bbox-store.ts
 *
 * Bounding-box prefilter shared by the zone and street indexes. Boxes live in
 * an in-memory SQLite table with a composite index, the same layout the rules
 * database uses on disk. Queries return opaque integer handles (row ids);
 * `slotOf` maps a handle back to the position of its feature in the caller's
 * arrays, so callers never look at what the query primitive returned.
 *
 * Every answer is a superset: callers must follow up with an exact test.
 */

import Database from 'better-sqlite3';
import type { BBox } from 'geojson';

export type CandidateHandle = number;

export interface NearestCandidate {
  handle: CandidateHandle;
  /** Distance from the query point to the box; a lower bound for the geometry. */
  lowerBound: number;
}

interface NearestRow {
  id: number;
  dist_sq: number;
}

export class BBoxStore {
  private readonly db: Database.Database;
  private readonly stmtAt: Database.Statement<[number, number, number, number], { id: number }>;
  private readonly stmtNearest: Database.Statement<[number, number, number, number], NearestRow>;
  private readonly slotByHandle = new Map<CandidateHandle, number>();

  constructor(boxes: BBox[]) {
    this.db = new Database(':memory:');
    this.db.exec(`
      CREATE TABLE boxes (
        id INTEGER PRIMARY KEY,
        min_x REAL NOT NULL,
        min_y REAL NOT NULL,
        max_x REAL NOT NULL,
        max_y REAL NOT NULL
      );
      CREATE INDEX idx_bbox ON boxes(min_x, max_x, min_y, max_y);
    `);

    const insert = this.db.prepare<[number, number, number, number]>(
      'INSERT INTO boxes (min_x, min_y, max_x, max_y) VALUES (?, ?, ?, ?)'
    );
    const insertAll = this.db.transaction((rows: BBox[]) => {
      rows.forEach((box, slot) => {
        const info = insert.run(box[0], box[1], box[2], box[3]);
        this.slotByHandle.set(Number(info.lastInsertRowid), slot);
      });
    });
    insertAll(boxes);

    this.stmtAt = this.db.prepare<[number, number, number, number], { id: number }>(`
      SELECT id FROM boxes
      WHERE min_x <= ? AND max_x >= ? AND min_y <= ? AND max_y >= ?
      ORDER BY id
    `);

    this.stmtNearest = this.db.prepare<[number, number, number, number], NearestRow>(`
      SELECT id, dx * dx + dy * dy AS dist_sq FROM (
        SELECT
          id,
          max(min_x - ?, 0.0, ? - max_x) AS dx,
          max(min_y - ?, 0.0, ? - max_y) AS dy
        FROM boxes
      )
      ORDER BY dist_sq, id
    `);
  }

  get size(): number {
    return this.slotByHandle.size;
  }

  /**
   * Handles of every box covering (x, y), in insertion order.
   */
  candidatesAt(x: number, y: number): CandidateHandle[] {
    return this.stmtAt.all(x, x, y, y).map(row => row.id);
  }

  /**
   * Lazily walks all boxes by increasing distance to (x, y). Stop iterating
   * as soon as `lowerBound` exceeds the best exact distance found.
   */
  *nearestCandidates(x: number, y: number): Generator<NearestCandidate> {
    for (const row of this.stmtNearest.iterate(x, x, y, y)) {
      yield { handle: row.id, lowerBound: Math.sqrt(row.dist_sq) };
    }
  }

  slotOf(handle: CandidateHandle): number | undefined {
    return this.slotByHandle.get(handle);
  }

  close(): void {
    if (this.db.open) this.db.close();
  }
}
