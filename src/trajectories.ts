import { PipelineError } from "./errors";
import type { QueryExecutor } from "./executor/executor";
import type { QueryValidator } from "./sql/validator";

export type Position = [number, number];

export interface TrajectoryListing {
  /** Platform id → [latitude, longitude] positions in time order. */
  trajectories: Record<string, Position[]>;
  truncated: boolean;
}

export interface TrajectoryOptions {
  platformId?: number;
  /** Row cap written into the query; the validator still clamps it to its maximum. */
  limit?: number;
  timeoutMs: number;
  signal?: AbortSignal;
}

export function trajectoryQuery(platformId?: number, limit?: number): string {
  const filter = platformId === undefined ? "" : ` WHERE platform_id = ${Math.trunc(platformId)}`;
  const bound = limit === undefined ? "" : ` LIMIT ${Math.max(1, Math.trunc(limit))}`;
  return `SELECT platform_id, latitude, longitude FROM argo_profiles${filter} ORDER BY platform_id, timestamp ASC${bound}`;
}

/**
 * Ordered float positions grouped by platform. The query goes through the
 * same validator and executor as generated queries, so it is bounded the same way.
 */
export async function listTrajectories(
  validator: QueryValidator,
  executor: QueryExecutor,
  { platformId, limit, timeoutMs, signal }: TrajectoryOptions
): Promise<TrajectoryListing> {
  const verdict = validator.validate(trajectoryQuery(platformId, limit));
  if (!verdict.accepted) {
    const [violation] = verdict.violations;
    throw new PipelineError(violation.code, violation.message);
  }

  const result = await executor.execute(verdict.normalizedQuery, { timeoutMs, rowLimit: verdict.rowLimit, signal });
  if (!result.ok) {
    throw new PipelineError(result.failure.kind, result.failure.message);
  }

  const trajectories: Record<string, Position[]> = {};
  for (const row of result.rows) {
    const { platform_id: platform, latitude, longitude } = row;
    if (platform === null || typeof latitude !== "number" || typeof longitude !== "number") {
      continue;
    }
    const key = String(platform);
    (trajectories[key] ??= []).push([latitude, longitude]);
  }
  return { trajectories, truncated: result.truncated || result.rowCount >= verdict.rowLimit };
}
