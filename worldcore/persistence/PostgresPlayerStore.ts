// worldcore/persistence/PostgresPlayerStore.ts

import fs from "node:fs";
import path from "node:path";
import type { Pool } from "pg";

import { StorageUnavailable } from "../shared/errors";
import type {
  LeaderboardPeriod,
  ModerationFlags,
  PeriodScore,
  PlayerId,
  PlayerRecord,
} from "../shared/PlayerTypes";
import { Logger } from "../utils/logger";
import type { PlayerStore } from "./PlayerStore";

const log = Logger.scope("PERSIST");

const MIGRATIONS_DIR = path.join(__dirname, "..", "db", "migrations");
const NAMESPACE_RE = /^[a-z_][a-z0-9_]*$/;

interface PlayerRow {
  player_id: string;
  display_name: string;
  best_score: string | number;
  moderation_flags: unknown;
  last_seen_at: Date;
}

interface ScoreRow {
  period: LeaderboardPeriod;
  player_id: string;
  display_name: string;
  score: string | number;
  expires_at: Date | null;
}

async function getDb(): Promise<Pool> {
  const { db } = await import("../db/Database");
  return db;
}

function parseModeration(raw: unknown): ModerationFlags {
  if (typeof raw !== "object" || raw === null) return {};
  const out: ModerationFlags = {};
  if ("muted" in raw && typeof raw.muted === "boolean") out.muted = raw.muted;
  if ("chatStrikes" in raw && typeof raw.chatStrikes === "number") out.chatStrikes = raw.chatStrikes;
  return out;
}

function rowToRecord(row: PlayerRow): PlayerRecord {
  return {
    playerId: row.player_id,
    displayName: row.display_name,
    bestScore: Number(row.best_score),
    moderation: parseModeration(row.moderation_flags),
    lastSeenAt: row.last_seen_at.getTime(),
  };
}

function rowToScore(row: ScoreRow): PeriodScore {
  return {
    period: row.period,
    playerId: row.player_id,
    displayName: row.display_name,
    score: Number(row.score),
    expiresAt: row.expires_at ? row.expires_at.getTime() : null,
  };
}

/**
 * Postgres-backed player store. Tables are `<namespace>_players` and
 * `<namespace>_scores`; see db/migrations.
 */
export class PostgresPlayerStore implements PlayerStore {
  readonly kind = "postgres";

  private readonly players: string;
  private readonly scores: string;

  constructor(private readonly namespace: string) {
    if (!NAMESPACE_RE.test(namespace)) {
      throw new Error(`invalid store namespace: ${namespace}`);
    }
    this.players = `${namespace}_players`;
    this.scores = `${namespace}_scores`;
  }

  /** Apply every migration in db/migrations with the namespace filled in. */
  async ensureSchema(): Promise<void> {
    const files = fs
      .readdirSync(MIGRATIONS_DIR)
      .filter((f) => f.endsWith(".sql"))
      .sort();

    for (const f of files) {
      const sql = fs.readFileSync(path.join(MIGRATIONS_DIR, f), "utf8").replace(/\{\{ns\}\}/g, this.namespace);
      await this.run(`migration ${f}`, (db) => db.query(sql));
      log.info("Migration applied", { file: f, namespace: this.namespace });
    }
  }

  async getPlayer(playerId: PlayerId): Promise<PlayerRecord | null> {
    const res = await this.run("getPlayer", (db) =>
      db.query<PlayerRow>(
        `SELECT player_id, display_name, best_score, moderation_flags, last_seen_at
           FROM ${this.players}
          WHERE player_id = $1`,
        [playerId],
      ),
    );
    const row = res.rows[0];
    return row ? rowToRecord(row) : null;
  }

  async upsertPlayer(record: PlayerRecord): Promise<PlayerRecord> {
    const res = await this.run("upsertPlayer", (db) =>
      db.query<PlayerRow>(
        `INSERT INTO ${this.players} AS t
                (player_id, display_name, best_score, moderation_flags, last_seen_at)
         VALUES ($1, $2, $3, $4::jsonb, to_timestamp($5 / 1000.0))
         ON CONFLICT (player_id) DO UPDATE SET
           display_name = COALESCE(NULLIF(EXCLUDED.display_name, ''), t.display_name),
           best_score = GREATEST(t.best_score, EXCLUDED.best_score),
           moderation_flags = jsonb_build_object(
             'muted',
               CASE
                 WHEN EXCLUDED.moderation_flags ? 'muted' AND EXCLUDED.last_seen_at >= t.last_seen_at
                   THEN COALESCE((EXCLUDED.moderation_flags->>'muted')::boolean, false)
                 ELSE COALESCE((t.moderation_flags->>'muted')::boolean, false)
               END,
             'chatStrikes',
               GREATEST(
                 COALESCE((t.moderation_flags->>'chatStrikes')::int, 0),
                 COALESCE((EXCLUDED.moderation_flags->>'chatStrikes')::int, 0)
               )
           ),
           last_seen_at = GREATEST(t.last_seen_at, EXCLUDED.last_seen_at)
         RETURNING player_id, display_name, best_score, moderation_flags, last_seen_at`,
        [
          record.playerId,
          record.displayName,
          Math.floor(record.bestScore),
          JSON.stringify(record.moderation),
          record.lastSeenAt,
        ],
      ),
    );

    const row = res.rows[0];
    if (!row) throw new StorageUnavailable("upsertPlayer returned no row");
    return rowToRecord(row);
  }

  async upsertPeriodScore(row: PeriodScore, now: number): Promise<boolean> {
    const res = await this.run("upsertPeriodScore", (db) =>
      db.query(
        `INSERT INTO ${this.scores} AS t (period, player_id, display_name, score, expires_at)
         VALUES ($1, $2, $3, $4, CASE WHEN $5::bigint IS NULL THEN NULL ELSE to_timestamp($5 / 1000.0) END)
         ON CONFLICT (period, player_id) DO UPDATE SET
           display_name = EXCLUDED.display_name,
           score = EXCLUDED.score,
           expires_at = EXCLUDED.expires_at
         WHERE t.score < EXCLUDED.score
            OR (t.expires_at IS NOT NULL AND t.expires_at <= to_timestamp($6 / 1000.0))`,
        [row.period, row.playerId, row.displayName, Math.floor(row.score), row.expiresAt, now],
      ),
    );
    return (res.rowCount ?? 0) > 0;
  }

  async topScores(period: LeaderboardPeriod, limit: number, now: number): Promise<PeriodScore[]> {
    const res = await this.run("topScores", (db) =>
      db.query<ScoreRow>(
        `SELECT period, player_id, display_name, score, expires_at
           FROM ${this.scores}
          WHERE period = $1
            AND (expires_at IS NULL OR expires_at > to_timestamp($3 / 1000.0))
          ORDER BY score DESC, player_id ASC
          LIMIT $2`,
        [period, limit, now],
      ),
    );
    return res.rows.map(rowToScore);
  }

  async close(): Promise<void> {
    const db = await getDb();
    await db.end();
  }

  private async run<T>(op: string, fn: (db: Pool) => Promise<T>): Promise<T> {
    try {
      return await fn(await getDb());
    } catch (err) {
      log.warn("Postgres operation failed", { op, err });
      throw new StorageUnavailable(`${op} failed`, err);
    }
  }
}
