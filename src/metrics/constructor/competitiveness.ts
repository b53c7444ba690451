/**
 * Constructor competitiveness and dominance metrics
 *
 * Composite indices over per-race points and final standings. Weights and
 * bands are fixed; changing them needs a CACHE_SCHEMA_VERSION bump.
 */

import { ConstructorPointsByRace } from '../../types/views';
import { countWhere, linearSlope, max, mean, min, percentage, quantile, round, sampleStd, sum } from '../../views/aggregate';
import { MetricDefinition, raceSetFilter, requireParam, viewFilter } from '../definition';
import { emptyResult, metricResult } from '../result';

const POINTS_TABLES: MetricDefinition['requiredTables'] = ['races', 'results', 'constructors'];

/** Most points one constructor can score in a race: 25 + 18 + 1 for the fastest lap */
const MAX_POINTS_PER_RACE = 44;

/** Races needed before a season trend is reported */
const MIN_RACES_FOR_TREND = 5;

function byRound(rows: readonly ConstructorPointsByRace[]): ConstructorPointsByRace[] {
  return [...rows].sort((a, b) => a.year - b.year || a.round - b.round);
}

function dominanceLevel(index: number): string {
  if (index >= 80) return 'Dominant';
  if (index >= 60) return 'Very Strong';
  if (index >= 40) return 'Competitive';
  if (index >= 20) return 'Moderate';
  return 'Weak';
}

function consistencyLevel(index: number): string {
  if (index >= 80) return 'Very Consistent';
  if (index >= 60) return 'Consistent';
  if (index >= 40) return 'Moderately Consistent';
  if (index >= 20) return 'Inconsistent';
  return 'Very Inconsistent';
}

function competitivenessCategory(rating: number): string {
  if (rating >= 85) return 'Dominant';
  if (rating >= 70) return 'Very Competitive';
  if (rating >= 55) return 'Competitive';
  if (rating >= 40) return 'Midfield';
  if (rating >= 25) return 'Back of Grid';
  return 'Struggling';
}

function trendCategory(slope: number): string {
  if (slope > 1) return 'Strong Improvement';
  if (slope > 0.2) return 'Moderate Improvement';
  if (slope > -0.2) return 'Stable';
  if (slope > -1) return 'Slight Decline';
  return 'Significant Decline';
}

export const constructorSeasonDominance: MetricDefinition = {
  name: 'constructor_season_dominance',
  description: 'Season dominance index based on wins, points lead, and consistency',
  unit: 'index',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: ['races', 'results', 'constructor_standings', 'constructors'],
  async calculate(views, params) {
    if (params.season === undefined || params.season === null) {
      return emptyResult(this.name, params, 'Season parameter required for dominance calculation');
    }

    const constructorId = requireParam(params, 'constructor_id');
    const standings = await views.getConstructorStandingsBySeason(raceSetFilter(params));
    const byRace = await views.getConstructorPointsByRace(viewFilter(params));
    if (standings.length === 0 || byRace.length === 0) {
      return emptyResult(this.name, params, 'No championship or points data found');
    }

    const own = standings.find(s => s.constructorId === constructorId);
    if (!own) {
      return emptyResult(this.name, params, 'Constructor not found in standings');
    }

    const champion = standings.find(s => s.position === 1);
    const runnerUp = standings.find(s => s.position === 2);

    const totalRaces = byRace.length;
    const wins = countWhere(byRace, r => r.bestFinish === 1);
    const winRate = percentage(wins, totalRaces);
    const pointsDominance = percentage(own.points, totalRaces * MAX_POINTS_PER_RACE);

    let margin: number;
    if (own.position === 1) {
      margin = runnerUp ? own.points - runnerUp.points : own.points;
    } else {
      margin = champion ? own.points - champion.points : 0;
    }

    const positionScore = own.position === null ? 0 : Math.max(0, 100 - (own.position - 1) * 20);
    // weights: wins 40%, points efficiency 35%, final position 25%
    const index = winRate * 0.4 + pointsDominance * 0.35 + positionScore * 0.25;

    return metricResult(this.name, round(index, 1), params, {
      season: own.year,
      final_position: own.position,
      total_points: own.points,
      wins,
      win_rate: round(winRate, 1),
      championship_margin: margin,
      dominance_level: dominanceLevel(index),
    });
  },
};

export const constructorConsistencyIndex: MetricDefinition = {
  name: 'constructor_consistency_index',
  description: 'Consistency index based on points variation (higher is better)',
  unit: 'index',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: POINTS_TABLES,
  async calculate(views, params) {
    const byRace = await views.getConstructorPointsByRace(viewFilter(params));
    if (byRace.length === 0) {
      return emptyResult(this.name, params, 'No points data found');
    }

    const points = byRace.map(r => r.totalPoints);
    const average = mean(points);
    const std = sampleStd(points);
    if (points.length < 3 || average === null || std === null) {
      return emptyResult(this.name, params, 'Insufficient races for consistency calculation');
    }

    const index = average > 0 ? Math.max(0, 100 - (std / average) * 100) : 0;
    const zero = countWhere(points, p => p === 0);

    return metricResult(this.name, round(index, 1), params, {
      total_races: points.length,
      mean_points: round(average, 2),
      std_points: round(std, 2),
      points_scoring_rate: round(percentage(points.length - zero, points.length), 1),
      consistency_level: consistencyLevel(index),
    });
  },
};

export const constructorCompetitivenessRating: MetricDefinition = {
  name: 'constructor_competitiveness_rating',
  description: 'Overall competitiveness rating (0-100)',
  unit: 'rating',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: POINTS_TABLES,
  async calculate(views, params) {
    const results = await views.getConstructorResults(viewFilter(params));
    const byRace = await views.getConstructorPointsByRace(viewFilter(params));
    if (results.length === 0 || byRace.length === 0) {
      return emptyResult(this.name, params, 'No race or points data found');
    }

    const totalRaces = byRace.length;
    const avgPoints = mean(byRace.map(r => r.totalPoints)) ?? 0;
    const bestFinish = min(results.flatMap(r => (r.position === null ? [] : [r.position])));
    // per car: two podium cars in one race count twice
    const podiums = countWhere(results, r => r.position !== null && r.position <= 3);
    const wins = countWhere(results, r => r.position === 1);

    const pointsRating = Math.min(100, (avgPoints / 25) * 100);
    const positionRating = bestFinish === null ? 0 : Math.max(0, 100 - (bestFinish - 1) * 5);
    const podiumRating = percentage(podiums, totalRaces);
    const winRating = percentage(wins, totalRaces);

    const rating = pointsRating * 0.35 + positionRating * 0.25 + podiumRating * 0.25 + winRating * 0.15;

    return metricResult(this.name, round(rating, 1), params, {
      total_races: totalRaces,
      avg_points_per_race: round(avgPoints, 2),
      best_finish: bestFinish,
      podiums,
      wins,
      category: competitivenessCategory(rating),
    });
  },
};

export const constructorPerformanceConsistency: MetricDefinition = {
  name: 'constructor_performance_consistency',
  description: 'Performance consistency across different race types and conditions',
  unit: 'index',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: POINTS_TABLES,
  async calculate(views, params) {
    const byRace = await views.getConstructorPointsByRace(viewFilter(params));
    if (byRace.length === 0) {
      return emptyResult(this.name, params, 'No points data found');
    }

    const points = byRace.map(r => r.totalPoints);
    const q1 = quantile(points, 0.25) ?? 0;
    const q2 = quantile(points, 0.5) ?? 0;
    const q3 = quantile(points, 0.75) ?? 0;
    const iqr = q3 - q1;
    const range = (max(points) ?? 0) - (min(points) ?? 0);
    const average = mean(points) ?? 0;

    let score = 100;
    if (range > 0) {
      score = average > 0 ? Math.max(0, 100 - (iqr / average) * 50) : 0;
    }

    return metricResult(this.name, round(score, 1), params, {
      total_races: points.length,
      performance_median: q2,
      performance_iqr: iqr,
      performance_range: range,
      high_performance_races: countWhere(points, p => p >= q3),
      consistent_races: countWhere(points, p => p >= q1 && p <= q3),
      low_performance_races: countWhere(points, p => p <= q1),
    });
  },
};

export const constructorRaceWinStreak: MetricDefinition = {
  name: 'constructor_race_win_streak',
  description: 'Longest consecutive race win streak',
  unit: 'races',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: POINTS_TABLES,
  async calculate(views, params) {
    const aggregates = await views.getConstructorRaceAggregates(viewFilter(params));
    if (aggregates.length === 0) {
      return emptyResult(this.name, params, 'No race results found');
    }

    const ordered = [...aggregates].sort((a, b) => a.year - b.year || a.round - b.round);
    const streaks: number[] = [];
    let current = 0;

    for (const race of ordered) {
      if (race.bestPosition === 1) {
        current++;
        continue;
      }
      if (current > 0) {
        streaks.push(current);
      }
      current = 0;
    }
    if (current > 0) {
      streaks.push(current);
    }

    return metricResult(this.name, max(streaks) ?? 0, params, {
      total_races: ordered.length,
      total_wins: sum(streaks),
      win_streaks: streaks,
      number_of_streaks: streaks.length,
    });
  },
};

export const constructorSeasonalImprovement: MetricDefinition = {
  name: 'constructor_seasonal_improvement',
  description: 'Performance trend throughout the season (positive = improving)',
  unit: 'trend',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: POINTS_TABLES,
  async calculate(views, params) {
    if (params.season === undefined || params.season === null) {
      return emptyResult(this.name, params, 'Season parameter required for seasonal trend analysis');
    }

    const byRace = byRound(await views.getConstructorPointsByRace(viewFilter(params)));
    const points = byRace.map(r => r.totalPoints);
    const slope = linearSlope(points);
    if (points.length < MIN_RACES_FOR_TREND || slope === null) {
      return emptyResult(this.name, params, 'Insufficient data for trend analysis');
    }

    const midpoint = Math.floor(points.length / 2);
    const firstHalf = mean(points.slice(0, midpoint)) ?? 0;
    const secondHalf = mean(points.slice(midpoint)) ?? 0;
    const improvement = firstHalf > 0 ? ((secondHalf - firstHalf) / firstHalf) * 100 : 0;

    return metricResult(this.name, round(slope, 3), params, {
      season: params.season,
      total_races: points.length,
      trend_category: trendCategory(slope),
      first_half_avg: round(firstHalf, 2),
      second_half_avg: round(secondHalf, 2),
      improvement_percentage: round(improvement, 1),
    });
  },
};

export const CONSTRUCTOR_COMPETITIVENESS_METRICS: MetricDefinition[] = [
  constructorSeasonDominance,
  constructorConsistencyIndex,
  constructorCompetitivenessRating,
  constructorPerformanceConsistency,
  constructorRaceWinStreak,
  constructorSeasonalImprovement,
];
