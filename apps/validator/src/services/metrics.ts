import type { RoundRecord, TerminationReason } from '../types/domain.js';

type RouteMetric = {
  count: number;
  totalMs: number;
  errors: number;
};

type RoundSnapshot = {
  round: number;
  status: RoundRecord['status'];
  participants: number;
  responded: number;
  durationMs: number;
  finishedAt: string;
};

export function createMetrics(recentLimit = 100) {
  const routeStats = new Map<string, RouteMetric>();
  const terminations = new Map<TerminationReason | 'no_response', number>();
  const recentRounds: RoundSnapshot[] = [];

  let totalRequests = 0;
  let totalErrors = 0;
  let publishedRounds = 0;
  let abandonedRounds = 0;
  let totalRoundMs = 0;

  return {
    observeRequest(params: { route: string; method: string; statusCode: number; durationMs: number }) {
      totalRequests += 1;
      const isError = params.statusCode >= 400;
      if (isError) totalErrors += 1;

      const key = `${params.method.toUpperCase()} ${params.route}`;
      const prev = routeStats.get(key) || { count: 0, totalMs: 0, errors: 0 };
      prev.count += 1;
      prev.totalMs += params.durationMs;
      if (isError) prev.errors += 1;
      routeStats.set(key, prev);
    },

    observeRound(record: RoundRecord, durationMs: number) {
      if (record.status === 'published') publishedRounds += 1;
      else abandonedRounds += 1;
      totalRoundMs += durationMs;

      for (const outcome of record.outcomes) {
        const key = outcome.terminationReason ?? 'no_response';
        terminations.set(key, (terminations.get(key) ?? 0) + 1);
      }

      recentRounds.push({
        round: record.round,
        status: record.status,
        participants: record.outcomes.length,
        responded: record.outcomes.filter((outcome) => outcome.responded).length,
        durationMs,
        finishedAt: record.finishedAt
      });
      while (recentRounds.length > recentLimit) recentRounds.shift();
    },

    snapshot() {
      const routes = [...routeStats.entries()].map(([route, value]) => ({
        route,
        count: value.count,
        errors: value.errors,
        avgMs: value.count ? Number((value.totalMs / value.count).toFixed(2)) : 0
      })).sort((a, b) => b.count - a.count);

      const rounds = publishedRounds + abandonedRounds;

      return {
        totalRequests,
        totalErrors,
        errorRate: totalRequests ? Number(((totalErrors / totalRequests) * 100).toFixed(2)) : 0,
        routes,
        rounds: {
          total: rounds,
          published: publishedRounds,
          abandoned: abandonedRounds,
          avgDurationMs: rounds ? Number((totalRoundMs / rounds).toFixed(2)) : 0,
          terminations: Object.fromEntries(terminations),
          recent: [...recentRounds]
        }
      };
    }
  };
}

export type ValidatorMetrics = ReturnType<typeof createMetrics>;
