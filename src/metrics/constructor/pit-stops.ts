/**
 * Constructor pit stop metrics
 *
 * Stops longer than a minute are repairs or retirements rather than
 * racing stops and are left out of timing metrics.
 */

import { PitStopView } from '../../types/views';
import { countWhere, groupBy, linearSlope, max, mean, min, round, sampleStd, unique } from '../../views/aggregate';
import { MetricDefinition, raceSetFilter, requireParam, viewFilter } from '../definition';
import { emptyResult, metricResult } from '../result';

const PIT_STOP_TABLES: MetricDefinition['requiredTables'] = ['races', 'pit_stops', 'results'];

export const MAX_RACING_STOP_SECONDS = 60;

/** A stop slower than this multiple of the team average counts as problematic */
const PROBLEM_STOP_MULTIPLIER = 1.2;

/** Race phases by lap, for stop timing */
const EARLY_PHASE_LAST_LAP = 15;
const MID_PHASE_LAST_LAP = 40;

interface TimedStop {
  stop: PitStopView;
  seconds: number;
}

function timedStops(stops: readonly PitStopView[]): TimedStop[] {
  const timed: TimedStop[] = [];
  for (const stop of stops) {
    if (stop.milliseconds !== null) {
      timed.push({ stop, seconds: stop.milliseconds / 1000 });
    }
  }
  return timed;
}

function racingStops(stops: readonly PitStopView[]): TimedStop[] {
  return timedStops(stops).filter(s => s.seconds <= MAX_RACING_STOP_SECONDS);
}

function consistencyGrade(cv: number): string {
  if (cv < 5) return 'Excellent';
  if (cv < 10) return 'Good';
  if (cv < 15) return 'Average';
  return 'Poor';
}

export const constructorAveragePitStopTime: MetricDefinition = {
  name: 'constructor_average_pit_stop_time',
  description: 'Average pit stop duration across all stops',
  unit: 'seconds',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: PIT_STOP_TABLES,
  async calculate(views, params) {
    const stops = await views.getPitStopStats(viewFilter(params));
    if (stops.length === 0) {
      return emptyResult(this.name, params, 'No pit stop data found');
    }

    const timed = timedStops(stops);
    const racing = racingStops(stops);
    if (racing.length === 0) {
      return emptyResult(this.name, params, 'No valid pit stop data after filtering outliers');
    }

    const seconds = racing.map(s => s.seconds);

    return metricResult(this.name, round(mean(seconds) ?? 0, 3), params, {
      total_stops: racing.length,
      stops_before_filtering: timed.length,
      outliers_filtered: timed.length - racing.length,
      fastest_stop: round(min(seconds) ?? 0, 3),
      slowest_stop: round(max(seconds) ?? 0, 3),
      seasons_analyzed: unique(racing.map(s => s.stop.year)).length,
    });
  },
};

export const constructorFastestPitStop: MetricDefinition = {
  name: 'constructor_fastest_pit_stop',
  description: 'Fastest single pit stop time achieved',
  unit: 'seconds',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: PIT_STOP_TABLES,
  async calculate(views, params) {
    const stops = await views.getPitStopStats(viewFilter(params));
    if (stops.length === 0) {
      return emptyResult(this.name, params, 'No pit stop data found');
    }

    const racing = racingStops(stops);
    if (racing.length === 0) {
      return emptyResult(this.name, params, 'No valid pit stop data after filtering outliers');
    }

    // first occurrence wins ties, in race order
    let fastest = racing[0];
    for (const stop of racing) {
      if (stop.seconds < fastest.seconds) {
        fastest = stop;
      }
    }

    return metricResult(this.name, round(fastest.seconds, 3), params, {
      race_id: fastest.stop.raceId,
      lap: fastest.stop.lap,
      year: fastest.stop.year,
      driver_id: fastest.stop.driverId,
      total_stops: racing.length,
    });
  },
};

export const constructorPitStopConsistency: MetricDefinition = {
  name: 'constructor_pit_stop_consistency',
  description: 'Standard deviation of pit stop times (lower is more consistent)',
  unit: 'seconds',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: PIT_STOP_TABLES,
  async calculate(views, params) {
    const stops = await views.getPitStopStats(viewFilter(params));
    const seconds = racingStops(stops).map(s => s.seconds);
    const std = sampleStd(seconds);
    const average = mean(seconds);

    if (std === null || average === null) {
      return emptyResult(this.name, params, 'Insufficient pit stop data for consistency analysis');
    }

    const cv = average > 0 ? (std / average) * 100 : 0;

    return metricResult(this.name, round(std, 3), params, {
      mean_time: round(average, 3),
      coefficient_of_variation: round(cv, 1),
      total_stops: seconds.length,
      consistency_grade: consistencyGrade(cv),
    });
  },
};

export const constructorSubThreeSecondStops: MetricDefinition = {
  name: 'constructor_sub_three_second_stops',
  description: 'Percentage of pit stops completed in under 3 seconds',
  unit: 'percentage',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: PIT_STOP_TABLES,
  async calculate(views, params) {
    const stops = await views.getPitStopStats(viewFilter(params));
    const seconds = timedStops(stops).map(s => s.seconds);
    if (seconds.length === 0) {
      return emptyResult(this.name, params, 'No pit stop data found');
    }

    const subThree = countWhere(seconds, s => s < 3);

    return metricResult(this.name, round((subThree / seconds.length) * 100, 1), params, {
      sub_three_stops: subThree,
      total_stops: seconds.length,
      average_time: round(mean(seconds) ?? 0, 3),
    });
  },
};

export const constructorAveragePitStopsPerRace: MetricDefinition = {
  name: 'constructor_average_pit_stops_per_race',
  description: 'Average number of pit stops per race',
  unit: 'stops',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: PIT_STOP_TABLES,
  async calculate(views, params) {
    const stops = await views.getPitStopStats(viewFilter(params));
    if (stops.length === 0) {
      return emptyResult(this.name, params, 'No pit stop data found');
    }

    const perRace = [...groupBy(stops, s => s.raceId).values()].map(group => group.length);

    return metricResult(this.name, round(mean(perRace) ?? 0, 2), params, {
      total_races: perRace.length,
      total_stops: stops.length,
      max_stops_in_race: max(perRace),
      min_stops_in_race: min(perRace),
    });
  },
};

export const constructorPitStopEfficiency: MetricDefinition = {
  name: 'constructor_pit_stop_efficiency',
  description: 'Performance relative to average pit stop times in same races',
  unit: 'percentage',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: PIT_STOP_TABLES,
  async calculate(views, params) {
    const constructorId = requireParam(params, 'constructor_id');
    const field = timedStops(await views.getPitStopStats(raceSetFilter(params)));
    const own = field.filter(s => s.stop.constructorId === constructorId);
    if (own.length === 0) {
      return emptyResult(this.name, params, 'No pit stop data found');
    }

    const raceAverages = new Map<number, number>();
    for (const [raceId, stops] of groupBy(field, s => s.stop.raceId)) {
      raceAverages.set(raceId, mean(stops.map(s => s.seconds)) ?? 0);
    }

    const deltas: number[] = [];
    for (const stop of own) {
      const raceAverage = raceAverages.get(stop.stop.raceId) ?? 0;
      if (raceAverage > 0) {
        deltas.push(((stop.seconds - raceAverage) / raceAverage) * 100);
      }
    }

    // positive = faster than the field
    return metricResult(this.name, round(-(mean(deltas) ?? 0), 1), params, {
      interpretation: 'Positive values indicate faster than average',
      constructor_avg: round(mean(own.map(s => s.seconds)) ?? 0, 3),
      field_avg: round(mean(field.map(s => s.seconds)) ?? 0, 3),
      races_analyzed: unique(own.map(s => s.stop.raceId)).length,
    });
  },
};

export const constructorPitStopTimeImprovement: MetricDefinition = {
  name: 'constructor_pit_stop_time_improvement',
  description: 'Trend of pit stop times across the season (negative = improving)',
  unit: 'seconds per race',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: PIT_STOP_TABLES,
  async calculate(views, params) {
    if (params.season === undefined || params.season === null) {
      return emptyResult(this.name, params, 'Season parameter required for trend analysis');
    }

    const stops = timedStops(await views.getPitStopStats(viewFilter(params)));
    if (stops.length === 0) {
      return emptyResult(this.name, params, 'No pit stop data found');
    }

    const raceAverages = [...groupBy(stops, s => s.stop.raceId).values()]
      .map(group => ({ round: group[0].stop.round, seconds: mean(group.map(s => s.seconds)) ?? 0 }))
      .sort((a, b) => a.round - b.round)
      .map(r => r.seconds);

    const slope = linearSlope(raceAverages);
    if (raceAverages.length < 3 || slope === null) {
      return emptyResult(this.name, params, 'Insufficient races for trend analysis');
    }

    return metricResult(this.name, round(slope, 4), params, {
      season: params.season,
      races_analyzed: raceAverages.length,
      early_season_avg: round(mean(raceAverages.slice(0, 3)) ?? 0, 3),
      late_season_avg: round(mean(raceAverages.slice(-3)) ?? 0, 3),
      interpretation: 'Negative values indicate improvement over time',
    });
  },
};

export const constructorPitStopReliability: MetricDefinition = {
  name: 'constructor_pit_stop_reliability',
  description: 'Percentage of pit stops without major delays or issues',
  unit: 'percentage',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: PIT_STOP_TABLES,
  async calculate(views, params) {
    const stops = await views.getPitStopStats(viewFilter(params));
    if (stops.length === 0) {
      return emptyResult(this.name, params, 'No pit stop data found');
    }

    const timed = timedStops(stops);
    const seconds = racingStops(stops).map(s => s.seconds);
    const average = mean(seconds);
    if (average === null) {
      return emptyResult(this.name, params, 'No valid pit stop data after filtering outliers');
    }

    // relative to the team's own average
    const threshold = average * PROBLEM_STOP_MULTIPLIER;
    const successful = countWhere(seconds, s => s <= threshold);

    return metricResult(this.name, round((successful / seconds.length) * 100, 1), params, {
      successful_stops: successful,
      total_stops: seconds.length,
      problematic_stops: seconds.length - successful,
      threshold_seconds: round(threshold, 3),
      average_pit_stop_time: round(average, 3),
      threshold_multiplier: PROBLEM_STOP_MULTIPLIER,
      longest_stop: round(max(seconds) ?? 0, 3),
      stops_before_filtering: timed.length,
      outliers_filtered: timed.length - seconds.length,
    });
  },
};

export const constructorPitStopStrategicSuccess: MetricDefinition = {
  name: 'constructor_pit_stop_strategic_success',
  description: 'Effectiveness of pit stop strategy timing',
  unit: 'index',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: PIT_STOP_TABLES,
  async calculate(views, params) {
    const stops = await views.getPitStopStats(viewFilter(params));
    if (stops.length === 0) {
      return emptyResult(this.name, params, 'No pit stop data found');
    }

    const phases = [...groupBy(stops, s => s.raceId).values()].map(race => ({
      early: countWhere(race, s => s.lap <= EARLY_PHASE_LAST_LAP),
      mid: countWhere(race, s => s.lap > EARLY_PHASE_LAST_LAP && s.lap <= MID_PHASE_LAST_LAP),
      late: countWhere(race, s => s.lap > MID_PHASE_LAST_LAP),
    }));

    // spread of stops over the three phases, averaged over races
    const diversity = mean(phases.map(p => sampleStd([p.early, p.mid, p.late]) ?? 0)) ?? 0;

    return metricResult(this.name, round(diversity, 2), params, {
      races_analyzed: phases.length,
      avg_early_stops: round(mean(phases.map(p => p.early)) ?? 0, 1),
      avg_mid_stops: round(mean(phases.map(p => p.mid)) ?? 0, 1),
      avg_late_stops: round(mean(phases.map(p => p.late)) ?? 0, 1),
      interpretation: 'Higher values indicate more strategic variety',
    });
  },
};

export const CONSTRUCTOR_PIT_STOP_METRICS: MetricDefinition[] = [
  constructorAveragePitStopTime,
  constructorFastestPitStop,
  constructorPitStopConsistency,
  constructorSubThreeSecondStops,
  constructorAveragePitStopsPerRace,
  constructorPitStopEfficiency,
  constructorPitStopTimeImprovement,
  constructorPitStopReliability,
  constructorPitStopStrategicSuccess,
];
