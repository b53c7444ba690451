/**
 * Constructor reliability metrics
 *
 * An entry finished when it has a classified position.
 */

import { countWhere, groupBy, mean, percentage, round } from '../../views/aggregate';
import { MetricDefinition, viewFilter } from '../definition';
import { emptyResult, MetadataInputRecord, metricResult } from '../result';

const RESULT_TABLES: MetricDefinition['requiredTables'] = ['races', 'results', 'constructors'];

/** Status keywords counted as mechanical failures */
export const MECHANICAL_FAILURES = [
  'Engine', 'Gearbox', 'Transmission', 'Clutch', 'Hydraulics',
  'Electrical', 'Brakes', 'Suspension', 'Power Unit', 'ERS',
  'Turbo', 'Battery', 'MGU-K', 'MGU-H',
];

function reliabilityGrade(index: number): string {
  if (index >= 90) return 'Excellent';
  if (index >= 80) return 'Very Good';
  if (index >= 70) return 'Good';
  if (index >= 60) return 'Average';
  return 'Poor';
}

export const constructorDnfRate: MetricDefinition = {
  name: 'constructor_dnf_rate',
  description: 'Percentage of car entries that did not finish the race',
  unit: 'percentage',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: RESULT_TABLES,
  async calculate(views, params) {
    const results = await views.getConstructorResults(viewFilter(params));
    if (results.length === 0) {
      return emptyResult(this.name, params, 'No race results found');
    }

    const dnfs = countWhere(results, r => r.position === null);
    const rate = percentage(dnfs, results.length);

    return metricResult(this.name, round(rate, 1), params, {
      total_entries: results.length,
      dnfs,
      finishes: results.length - dnfs,
      finish_rate: round(100 - rate, 1),
    });
  },
};

export const constructorMechanicalFailureRate: MetricDefinition = {
  name: 'constructor_mechanical_failure_rate',
  description: 'Percentage of entries retired by a mechanical failure',
  unit: 'percentage',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: [...RESULT_TABLES, 'status'],
  async calculate(views, params) {
    const entries = await views.getConstructorReliability(viewFilter(params));
    if (entries.length === 0) {
      return emptyResult(this.name, params, 'No reliability data found');
    }

    const dnfs = entries.filter(e => e.position === null);
    const statuses = dnfs.map(e => (e.status ?? '').toLowerCase());
    const mechanical = countWhere(statuses, s => MECHANICAL_FAILURES.some(f => s.includes(f.toLowerCase())));

    const breakdown: MetadataInputRecord = {};
    for (const failure of MECHANICAL_FAILURES) {
      const count = countWhere(statuses, s => s.includes(failure.toLowerCase()));
      if (count > 0) {
        breakdown[failure.toLowerCase()] = count;
      }
    }

    return metricResult(this.name, round(percentage(mechanical, entries.length), 1), params, {
      total_entries: entries.length,
      mechanical_failures: mechanical,
      total_dnfs: dnfs.length,
      failure_breakdown: breakdown,
    });
  },
};

export const constructorFinishRate: MetricDefinition = {
  name: 'constructor_finish_rate',
  description: 'Percentage of races where both constructor cars finish',
  unit: 'percentage',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: RESULT_TABLES,
  async calculate(views, params) {
    const aggregates = await views.getConstructorRaceAggregates(viewFilter(params));
    if (aggregates.length === 0) {
      return emptyResult(this.name, params, 'No race results found');
    }

    const allFinished = countWhere(aggregates, a => a.classifiedCount === a.driversCount);

    return metricResult(this.name, round(percentage(allFinished, aggregates.length), 1), params, {
      total_races: aggregates.length,
      both_cars_finish: allFinished,
      at_least_one_finish: countWhere(aggregates, a => a.classifiedCount > 0),
      no_finishers: countWhere(aggregates, a => a.classifiedCount === 0),
    });
  },
};

export const constructorReliabilityIndex: MetricDefinition = {
  name: 'constructor_reliability_index',
  description: 'Composite reliability score (0-100, higher is better)',
  unit: 'index',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: RESULT_TABLES,
  async calculate(views, params) {
    const results = await views.getConstructorResults(viewFilter(params));
    if (results.length === 0) {
      return emptyResult(this.name, params, 'No race results found');
    }

    const total = results.length;
    const finishRate = percentage(countWhere(results, r => r.position !== null), total);
    const pointsRate = percentage(countWhere(results, r => r.points > 0), total);
    const competitiveRate = percentage(countWhere(results, r => r.position !== null && r.position <= 15), total);

    // weights: finishing 40%, scoring 35%, finishing inside the top 15 25%
    const index = finishRate * 0.4 + pointsRate * 0.35 + competitiveRate * 0.25;

    return metricResult(this.name, round(index, 1), params, {
      total_entries: total,
      finish_rate: round(finishRate, 1),
      points_reliability: round(pointsRate, 1),
      competitive_reliability: round(competitiveRate, 1),
      reliability_grade: reliabilityGrade(index),
    });
  },
};

export const constructorAverageReliability: MetricDefinition = {
  name: 'constructor_average_reliability',
  description: 'Average reliability performance across all seasons',
  unit: 'percentage',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: RESULT_TABLES,
  async calculate(views, params) {
    const results = await views.getConstructorResults(viewFilter(params));
    if (results.length === 0) {
      return emptyResult(this.name, params, 'No race results found');
    }

    if (params.season !== undefined && params.season !== null) {
      const finishes = countWhere(results, r => r.position !== null);
      return metricResult(this.name, round(percentage(finishes, results.length), 1), params, {
        season: params.season,
        total_entries: results.length,
        finishes,
      });
    }

    const seasons = [...groupBy(results, r => r.year)].map(([year, entries]) => ({
      year,
      reliability: percentage(countWhere(entries, r => r.position !== null), entries.length),
    }));

    const reliabilityByYear: MetadataInputRecord = {};
    let best = seasons[0];
    let worst = seasons[0];
    for (const season of seasons) {
      reliabilityByYear[String(season.year)] = round(season.reliability, 1);
      // first season wins ties
      if (season.reliability > best.reliability) {
        best = season;
      }
      if (season.reliability < worst.reliability) {
        worst = season;
      }
    }

    return metricResult(this.name, round(mean(seasons.map(s => s.reliability)) ?? 0, 1), params, {
      seasons_analyzed: seasons.length,
      reliability_by_year: reliabilityByYear,
      best_season: best.year,
      worst_season: worst.year,
    });
  },
};

export const CONSTRUCTOR_RELIABILITY_METRICS: MetricDefinition[] = [
  constructorDnfRate,
  constructorMechanicalFailureRate,
  constructorFinishRate,
  constructorReliabilityIndex,
  constructorAverageReliability,
];
