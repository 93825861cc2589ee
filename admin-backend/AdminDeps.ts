// admin-backend/AdminDeps.ts

import type { MetricsSummary } from "../worldcore/core/ArenaMetrics";
import type { HealthReport, SetMutedResult } from "../worldcore/core/ArenaRuntime";
import type { ReadLeaderboardResult } from "../worldcore/persistence/PersistenceGateway";
import type { LeaderboardEntry, LeaderboardPeriod } from "../worldcore/shared/PlayerTypes";

/** What the admin API may see of a running arena. */
export interface AdminDeps {
  adminToken: string | undefined;
  health(): HealthReport;
  liveLeaderboard(): readonly LeaderboardEntry[];
  readLeaderboard(period: LeaderboardPeriod, limit: number): Promise<ReadLeaderboardResult>;
  broadcastChat(text: string, from: string): number;
  setMuted(playerId: string, muted: boolean): Promise<SetMutedResult>;
  metrics(): MetricsSummary;
}

export interface HandlerResult {
  status: number;
  body: Record<string, unknown>;
}
