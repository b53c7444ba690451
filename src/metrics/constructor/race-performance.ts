/**
 * Constructor race performance metrics
 *
 * "Per race" metrics look at the constructor's best classified car in each
 * race it entered.
 */

import { ConstructorResultView } from '../../types/views';
import { countWhere, groupBy, mean, min, percentage, present, round, unique } from '../../views/aggregate';
import { MetricDefinition, viewFilter } from '../definition';
import { emptyResult, metricResult } from '../result';

const RESULT_TABLES: MetricDefinition['requiredTables'] = ['races', 'results', 'constructors'];

/** Best classified position per race; null when no car was classified */
function bestPerRace(results: readonly ConstructorResultView[]): Array<number | null> {
  return [...groupBy(results, r => r.raceId).values()].map(group => min(present(group, r => r.position)));
}

export const constructorWinRate: MetricDefinition = {
  name: 'constructor_win_rate',
  description: 'Percentage of races won (at least one driver finishing 1st)',
  unit: 'percentage',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: RESULT_TABLES,
  async calculate(views, params) {
    const results = await views.getConstructorResults(viewFilter(params));
    if (results.length === 0) {
      return emptyResult(this.name, params, 'No race results found');
    }

    const best = bestPerRace(results);
    const wins = countWhere(best, p => p === 1);
    const rate = round(percentage(wins, best.length), 1);

    return metricResult(this.name, rate, params, {
      total_races: best.length,
      wins,
      win_percentage: rate,
    });
  },
};

export const constructorPodiumRate: MetricDefinition = {
  name: 'constructor_podium_rate',
  description: 'Percentage of races with at least one driver on podium',
  unit: 'percentage',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: RESULT_TABLES,
  async calculate(views, params) {
    const results = await views.getConstructorResults(viewFilter(params));
    if (results.length === 0) {
      return emptyResult(this.name, params, 'No race results found');
    }

    const best = bestPerRace(results);
    const podiums = countWhere(best, p => p !== null && p <= 3);

    return metricResult(this.name, round(percentage(podiums, best.length), 1), params, {
      total_races: best.length,
      podiums,
      position_breakdown: {
        P1: countWhere(best, p => p === 1),
        P2: countWhere(best, p => p === 2),
        P3: countWhere(best, p => p === 3),
      },
    });
  },
};

export const constructorRaceWins: MetricDefinition = {
  name: 'constructor_race_wins',
  description: 'Number of races with 1-2 finish (both cars 1st and 2nd)',
  unit: 'races',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: RESULT_TABLES,
  async calculate(views, params) {
    const oneTwos = await views.getConstructorRaceWins(viewFilter(params));
    if (oneTwos.length === 0) {
      return metricResult(this.name, 0, params, { note: 'No 1-2 finishes achieved' });
    }

    return metricResult(this.name, oneTwos.length, params, {
      race_wins: oneTwos.length,
      seasons_with_wins: unique(oneTwos.map(r => r.year)),
    });
  },
};

export const constructorPodiumLockouts: MetricDefinition = {
  name: 'constructor_podium_lockouts',
  description: 'Number of races with 1-2 finish lockouts',
  unit: 'races',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: RESULT_TABLES,
  async calculate(views, params) {
    const lockouts = await views.getConstructorPodiumLockouts(viewFilter(params));
    if (lockouts.length === 0) {
      return metricResult(this.name, 0, params, { note: 'No podium lockouts achieved' });
    }

    return metricResult(this.name, lockouts.length, params, {
      podium_lockouts: lockouts.length,
      full_podium_lockouts: countWhere(lockouts, l => l.podiumCars >= 3),
      seasons_with_lockouts: unique(lockouts.map(l => l.year)),
    });
  },
};

export const constructorAverageFinishPosition: MetricDefinition = {
  name: 'constructor_average_finish_position',
  description: "Average finish position of constructor's best performing car per race",
  unit: 'position',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: RESULT_TABLES,
  async calculate(views, params) {
    const results = await views.getConstructorResults(viewFilter(params));
    if (results.length === 0) {
      return emptyResult(this.name, params, 'No race results found');
    }

    const finished = results.filter(r => r.position !== null);
    if (finished.length === 0) {
      return emptyResult(this.name, params, 'No finished races found');
    }

    const best = present(bestPerRace(finished), p => p);

    return metricResult(this.name, round(mean(best) ?? 0, 2), params, {
      total_races: best.length,
      best_finish: min(best),
      races_finished: finished.length,
    });
  },
};

export const constructorPointsScoringRate: MetricDefinition = {
  name: 'constructor_points_scoring_rate',
  description: 'Percentage of races where constructor scores at least one point',
  unit: 'percentage',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: RESULT_TABLES,
  async calculate(views, params) {
    const byRace = await views.getConstructorPointsByRace(viewFilter(params));
    if (byRace.length === 0) {
      return emptyResult(this.name, params, 'No points data found');
    }

    const points = byRace.map(r => r.totalPoints);
    const scoring = countWhere(points, p => p > 0);

    return metricResult(this.name, round(percentage(scoring, points.length), 1), params, {
      total_races: points.length,
      points_scoring_races: scoring,
      points_distribution: {
        zero_points: countWhere(points, p => p === 0),
        '1_to_10_points': countWhere(points, p => p > 0 && p <= 10),
        '11_to_25_points': countWhere(points, p => p > 10 && p <= 25),
        over_25_points: countWhere(points, p => p > 25),
      },
      average_points_per_race: round(mean(points) ?? 0, 2),
    });
  },
};

export const constructorFrontRowLockouts: MetricDefinition = {
  name: 'constructor_front_row_lockouts',
  description: 'Number of races starting 1st and 2nd on the grid',
  unit: 'races',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: ['races', 'qualifying'],
  async calculate(views, params) {
    const qualifying = await views.getQualifyingWithConstructor(viewFilter(params));
    if (qualifying.length === 0) {
      return emptyResult(this.name, params, 'No qualifying data found');
    }

    const races = groupBy(qualifying, q => q.raceId);
    let lockouts = 0;
    for (const group of races.values()) {
      if (countWhere(group, q => q.position !== null && q.position <= 2) >= 2) {
        lockouts++;
      }
    }

    return metricResult(this.name, lockouts, params, {
      total_races: races.size,
      front_row_lockouts: lockouts,
    });
  },
};

export const constructorDoublePodiums: MetricDefinition = {
  name: 'constructor_double_podiums',
  description: 'Number of races with both cars finishing in top 3',
  unit: 'races',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: RESULT_TABLES,
  async calculate(views, params) {
    const results = await views.getConstructorResults(viewFilter(params));
    if (results.length === 0) {
      return emptyResult(this.name, params, 'No race results found');
    }

    const races = groupBy(results, r => r.raceId);
    let doubles = 0;
    for (const group of races.values()) {
      if (countWhere(group, r => r.position !== null && r.position <= 3) >= 2) {
        doubles++;
      }
    }

    return metricResult(this.name, doubles, params, {
      total_races: races.size,
      double_podiums: doubles,
      double_podium_rate: round(percentage(doubles, races.size), 1),
    });
  },
};

export const CONSTRUCTOR_RACE_METRICS: MetricDefinition[] = [
  constructorWinRate,
  constructorPodiumRate,
  constructorRaceWins,
  constructorPodiumLockouts,
  constructorAverageFinishPosition,
  constructorPointsScoringRate,
  constructorFrontRowLockouts,
  constructorDoublePodiums,
];
