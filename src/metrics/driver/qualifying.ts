import { countWhere, max, mean, min, percentage, present, round, sampleStd } from '../../views/aggregate';
import { MetricDefinition, viewFilter } from '../definition';
import { emptyResult, metricResult } from '../result';

const QUALIFYING_TABLES: MetricDefinition['requiredTables'] = ['races', 'qualifying', 'drivers'];

export const qualifyingPositionAverage: MetricDefinition = {
  name: 'qualifying_position_average',
  description: 'Average qualifying position across selected races',
  unit: 'position',
  scope: 'driver',
  requires: [],
  requiredTables: QUALIFYING_TABLES,
  async calculate(views, params) {
    const qualifying = await views.getQualifyingWithConstructor(viewFilter(params));
    if (qualifying.length === 0) {
      return emptyResult(this.name, params, 'No qualifying data found');
    }

    const positions = present(qualifying, q => q.position);
    const average = mean(positions);

    return metricResult(this.name, average === null ? null : round(average, 2), params, {
      total_qualifyings: qualifying.length,
      valid_positions: positions.length,
      best_position: min(positions),
      worst_position: max(positions),
    });
  },
};

export const qualifyingConsistency: MetricDefinition = {
  name: 'qualifying_consistency',
  description: 'Standard deviation of qualifying positions (lower is more consistent)',
  unit: 'position_std',
  scope: 'driver',
  requires: [],
  requiredTables: QUALIFYING_TABLES,
  async calculate(views, params) {
    const qualifying = await views.getQualifyingWithConstructor(viewFilter(params));
    if (qualifying.length === 0) {
      return emptyResult(this.name, params, 'No qualifying data found');
    }

    const positions = present(qualifying, q => q.position);
    const std = sampleStd(positions);
    const best = min(positions);
    const worst = max(positions);

    return metricResult(this.name, std === null ? null : round(std, 2), params, {
      total_qualifyings: qualifying.length,
      valid_positions: positions.length,
      position_range: best === null || worst === null ? null : worst - best,
    });
  },
};

export const polePositionRate: MetricDefinition = {
  name: 'pole_position_rate',
  description: 'Percentage of qualifying sessions resulting in pole position',
  unit: 'percentage',
  scope: 'driver',
  requires: [],
  requiredTables: QUALIFYING_TABLES,
  async calculate(views, params) {
    const qualifying = await views.getQualifyingWithConstructor(viewFilter(params));
    if (qualifying.length === 0) {
      return emptyResult(this.name, params, 'No qualifying data found');
    }

    const positions = present(qualifying, q => q.position);
    const poles = countWhere(positions, p => p === 1);

    return metricResult(this.name, round(percentage(poles, positions.length), 2), params, {
      total_qualifyings: positions.length,
      pole_positions: poles,
    });
  },
};

export const DRIVER_QUALIFYING_METRICS: MetricDefinition[] = [
  qualifyingPositionAverage,
  qualifyingConsistency,
  polePositionRate,
];
