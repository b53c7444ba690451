/**
 * Driver race metrics
 *
 * A DNF is a result without a classified position. DNFs count toward the
 * number of races but never toward position averages.
 */

import { countWhere, max, mean, min, percentage, present, round, sum } from '../../views/aggregate';
import { MetricDefinition, viewFilter } from '../definition';
import { emptyResult, metricResult } from '../result';

const RACE_TABLES: MetricDefinition['requiredTables'] = ['races', 'results', 'drivers'];

export const averageFinishPosition: MetricDefinition = {
  name: 'average_finish_position',
  description: 'Average race finish position (DNFs excluded from position calculation)',
  unit: 'position',
  scope: 'driver',
  requires: [],
  requiredTables: RACE_TABLES,
  async calculate(views, params) {
    const results = await views.getDriverResults(viewFilter(params));
    if (results.length === 0) {
      return emptyResult(this.name, params, 'No race results found');
    }

    const positions = present(results, r => r.position);
    const average = mean(positions);

    return metricResult(this.name, average === null ? null : round(average, 2), params, {
      total_races: results.length,
      finished_races: positions.length,
      dnf_count: results.length - positions.length,
      best_finish: min(positions),
      worst_finish: max(positions),
    });
  },
};

export const pointsPerRace: MetricDefinition = {
  name: 'points_per_race',
  description: 'Average championship points scored per race',
  unit: 'points/race',
  scope: 'driver',
  requires: [],
  requiredTables: RACE_TABLES,
  async calculate(views, params) {
    const results = await views.getDriverResults(viewFilter(params));
    if (results.length === 0) {
      return emptyResult(this.name, params, 'No race results found');
    }

    const points = results.map(r => r.points ?? 0);
    const total = sum(points);

    return metricResult(this.name, round(total / points.length, 2), params, {
      total_races: results.length,
      total_points: total,
      points_scoring_races: countWhere(points, p => p > 0),
      best_points_haul: max(points),
    });
  },
};

export const dnfRate: MetricDefinition = {
  name: 'dnf_rate',
  description: 'Percentage of races that ended in DNF (Did Not Finish)',
  unit: 'percentage',
  scope: 'driver',
  requires: [],
  requiredTables: RACE_TABLES,
  async calculate(views, params) {
    const results = await views.getDriverResults(viewFilter(params));
    if (results.length === 0) {
      return emptyResult(this.name, params, 'No race results found');
    }

    const dnfs = countWhere(results, r => r.position === null);
    const rate = percentage(dnfs, results.length);

    return metricResult(this.name, round(rate, 2), params, {
      total_races: results.length,
      dnf_count: dnfs,
      finish_rate: round(100 - rate, 2),
    });
  },
};

export const podiumRate: MetricDefinition = {
  name: 'podium_rate',
  description: 'Percentage of races resulting in podium finish (top 3)',
  unit: 'percentage',
  scope: 'driver',
  requires: [],
  requiredTables: RACE_TABLES,
  async calculate(views, params) {
    const results = await views.getDriverResults(viewFilter(params));
    if (results.length === 0) {
      return emptyResult(this.name, params, 'No race results found');
    }

    const total = results.length;
    const wins = countWhere(results, r => r.position === 1);
    const seconds = countWhere(results, r => r.position === 2);
    const thirds = countWhere(results, r => r.position === 3);
    const podiums = wins + seconds + thirds;

    return metricResult(this.name, round(percentage(podiums, total), 2), params, {
      total_races: total,
      podium_count: podiums,
      wins,
      second_places: seconds,
      third_places: thirds,
      win_rate: round(percentage(wins, total), 2),
    });
  },
};

export const DRIVER_RACE_METRICS: MetricDefinition[] = [
  averageFinishPosition,
  pointsPerRace,
  dnfRate,
  podiumRate,
];
