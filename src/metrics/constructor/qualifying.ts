import { QualifyingView } from '../../types/views';
import { countWhere, groupBy, max, mean, median, min, percentage, present, round, sampleStd } from '../../views/aggregate';
import { MetricDefinition, raceSetFilter, requireParam, viewFilter } from '../definition';
import { emptyResult, metricResult } from '../result';

const QUALIFYING_TABLES: MetricDefinition['requiredTables'] = ['races', 'qualifying', 'constructors'];

/** Minimum races before a spread is meaningful */
const MIN_RACES_FOR_CONSISTENCY = 3;

/** Best valid (positive) qualifying position per race; null when none */
function bestPerRace(qualifying: readonly QualifyingView[]): Array<number | null> {
  return [...groupBy(qualifying, q => q.raceId).values()].map(group =>
    min(present(group, q => q.position).filter(p => p > 0))
  );
}

function advantageLevel(advantage: number): string {
  if (advantage > 5) return 'Excellent';
  if (advantage > 2) return 'Good';
  if (advantage > -2) return 'Average';
  return 'Below Average';
}

function consistencyRating(std: number): string {
  if (std < 3) {
    return 'High';
  }
  return std < 6 ? 'Medium' : 'Low';
}

export const constructorPolePositionRate: MetricDefinition = {
  name: 'constructor_pole_position_rate',
  description: 'Percentage of races where constructor achieved pole position',
  unit: 'percentage',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: QUALIFYING_TABLES,
  async calculate(views, params) {
    const qualifying = await views.getQualifyingWithConstructor(viewFilter(params));
    if (qualifying.length === 0) {
      return emptyResult(this.name, params, 'No qualifying data found');
    }

    const best = bestPerRace(qualifying);
    const poles = countWhere(best, p => p === 1);
    const rate = round(percentage(poles, best.length), 1);

    return metricResult(this.name, rate, params, {
      total_races: best.length,
      pole_positions: poles,
      pole_percentage: rate,
    });
  },
};

export const constructorAverageQualifyingPosition: MetricDefinition = {
  name: 'constructor_average_qualifying_position',
  description: "Average qualifying position of constructor's best performing car per race",
  unit: 'position',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: QUALIFYING_TABLES,
  async calculate(views, params) {
    const qualifying = await views.getQualifyingWithConstructor(viewFilter(params));
    if (qualifying.length === 0) {
      return emptyResult(this.name, params, 'No qualifying data found');
    }

    const best = present(bestPerRace(qualifying), p => p);
    if (best.length === 0) {
      return emptyResult(this.name, params, 'No valid qualifying positions found');
    }

    return metricResult(this.name, round(mean(best) ?? 0, 2), params, {
      total_races: best.length,
      best_qualifying: min(best),
      median_position: median(best),
      total_qualifying_sessions: countWhere(qualifying, q => q.position !== null && q.position > 0),
    });
  },
};

export const constructorQualifyingConsistency: MetricDefinition = {
  name: 'constructor_qualifying_consistency',
  description: 'Qualifying consistency measured by standard deviation (lower is better)',
  unit: 'position_std',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: QUALIFYING_TABLES,
  async calculate(views, params) {
    const qualifying = await views.getQualifyingWithConstructor(viewFilter(params));
    if (qualifying.length === 0) {
      return emptyResult(this.name, params, 'No qualifying data found');
    }

    const best = present(bestPerRace(qualifying), p => p);
    const std = sampleStd(best);
    if (best.length < MIN_RACES_FOR_CONSISTENCY || std === null) {
      return emptyResult(this.name, params, 'Insufficient data for consistency calculation');
    }

    return metricResult(this.name, round(std, 2), params, {
      total_races: best.length,
      position_range: (max(best) ?? 0) - (min(best) ?? 0),
      avg_position: round(mean(best) ?? 0, 2),
      consistency_rating: consistencyRating(std),
    });
  },
};

export const constructorFrontRowStartRate: MetricDefinition = {
  name: 'constructor_front_row_start_rate',
  description: 'Percentage of races with at least one driver starting from front row (P1-P2)',
  unit: 'percentage',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: QUALIFYING_TABLES,
  async calculate(views, params) {
    const qualifying = await views.getQualifyingWithConstructor(viewFilter(params));
    if (qualifying.length === 0) {
      return emptyResult(this.name, params, 'No qualifying data found');
    }

    const best = bestPerRace(qualifying);
    const frontRow = countWhere(best, p => p !== null && p <= 2);

    return metricResult(this.name, round(percentage(frontRow, best.length), 1), params, {
      total_races: best.length,
      front_row_starts: frontRow,
      pole_positions: countWhere(best, p => p === 1),
      p2_starts: countWhere(best, p => p === 2),
    });
  },
};

export const constructorTopTenQualifyingRate: MetricDefinition = {
  name: 'constructor_top_ten_qualifying_rate',
  description: 'Percentage of races with at least one driver qualifying in top 10',
  unit: 'percentage',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: QUALIFYING_TABLES,
  async calculate(views, params) {
    const qualifying = await views.getQualifyingWithConstructor(viewFilter(params));
    if (qualifying.length === 0) {
      return emptyResult(this.name, params, 'No qualifying data found');
    }

    const best = bestPerRace(qualifying);
    const within = (limit: number) => countWhere(best, p => p !== null && p <= limit);

    return metricResult(this.name, round(percentage(within(10), best.length), 1), params, {
      total_races: best.length,
      top_ten_qualifying: within(10),
      position_breakdown: {
        pole: within(1),
        front_row: within(2),
        top_5: within(5),
        top_10: within(10),
      },
    });
  },
};

export const constructorQualifyingAdvantage: MetricDefinition = {
  name: 'constructor_qualifying_advantage',
  description: 'Average positions gained compared to grid average position',
  unit: 'positions',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: QUALIFYING_TABLES,
  async calculate(views, params) {
    const constructorId = requireParam(params, 'constructor_id');
    const field = await views.getQualifyingWithConstructor(raceSetFilter(params));
    const own = field.filter(q => q.constructorId === constructorId);
    if (own.length === 0) {
      return emptyResult(this.name, params, 'No qualifying data found');
    }

    const fieldByRace = groupBy(field, q => q.raceId);
    const advantages: number[] = [];

    for (const [raceId, entries] of groupBy(own, q => q.raceId)) {
      const gridAverage = mean(present(fieldByRace.get(raceId) ?? [], q => q.position).filter(p => p > 0));
      const ownBest = min(present(entries, q => q.position).filter(p => p > 0));
      // positive = ahead of the grid average
      if (gridAverage !== null && ownBest !== null) {
        advantages.push(gridAverage - ownBest);
      }
    }

    const average = mean(advantages);
    if (average === null) {
      return emptyResult(this.name, params, 'No valid comparative data found');
    }

    return metricResult(this.name, round(average, 2), params, {
      total_races_compared: advantages.length,
      performance_level: advantageLevel(average),
      best_advantage: round(max(advantages) ?? 0, 2),
      worst_advantage: round(min(advantages) ?? 0, 2),
    });
  },
};

export const CONSTRUCTOR_QUALIFYING_METRICS: MetricDefinition[] = [
  constructorPolePositionRate,
  constructorAverageQualifyingPosition,
  constructorQualifyingConsistency,
  constructorFrontRowStartRate,
  constructorTopTenQualifyingRate,
  constructorQualifyingAdvantage,
];
