import { ConstructorLapPerformance, LapTimeView } from '../../types/views';
import { countWhere, groupBy, linearSlope, max, mean, min, percentage, populationStd, round, sampleStd, unique } from '../../views/aggregate';
import { MetricDefinition, raceSetFilter, requireParam, viewFilter } from '../definition';
import { emptyResult, metricResult } from '../result';

const LAP_TABLES: MetricDefinition['requiredTables'] = ['races', 'lap_times', 'results'];

/** Laps needed before lap time spread is reported */
const MIN_LAPS_FOR_CONSISTENCY = 10;

/** Laps per race needed for in-race trends */
const MIN_RACE_LAPS = 10;
const MIN_STINT_LAPS = 20;

/** Laps at each end of a race compared for in-race improvement */
const RACE_END_LAPS = 5;

/** A lap within this multiple of the race's fastest lap is competitive */
const COMPETITIVE_LAP_RATIO = 1.03;

/** Seconds per kg of fuel times kg burned per lap */
const FUEL_EFFECT_PER_LAP = 0.035 * 1.5;

interface TimedLap {
  lap: LapTimeView;
  seconds: number;
}

function timedLaps(laps: readonly LapTimeView[]): TimedLap[] {
  const timed: TimedLap[] = [];
  for (const lap of laps) {
    if (lap.milliseconds !== null) {
      timed.push({ lap, seconds: lap.milliseconds / 1000 });
    }
  }
  return timed;
}

/** Per race, laps in lap order */
function lapsByRace(laps: readonly TimedLap[]): TimedLap[][] {
  return [...groupBy(laps, l => l.lap.raceId).values()].map(race =>
    [...race].sort((a, b) => a.lap.lap - b.lap.lap),
  );
}

function consistencyGrade(cv: number): string {
  if (cv < 2) return 'Excellent';
  if (cv < 3) return 'Good';
  if (cv < 4) return 'Average';
  return 'Poor';
}

export const constructorAverageLapTime: MetricDefinition = {
  name: 'constructor_average_lap_time',
  description: 'Average lap time across all races',
  unit: 'seconds',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: LAP_TABLES,
  async calculate(views, params) {
    const laps = timedLaps(await views.getLapTimesWithContext(viewFilter(params)));
    if (laps.length === 0) {
      return emptyResult(this.name, params, 'No lap time data found');
    }

    const seconds = laps.map(l => l.seconds);

    return metricResult(this.name, round(mean(seconds) ?? 0, 3), params, {
      total_laps: laps.length,
      fastest_lap: round(min(seconds) ?? 0, 3),
      slowest_lap: round(max(seconds) ?? 0, 3),
      races_analyzed: unique(laps.map(l => l.lap.raceId)).length,
    });
  },
};

export const constructorFastestLap: MetricDefinition = {
  name: 'constructor_fastest_lap',
  description: 'Fastest lap time achieved across all races',
  unit: 'seconds',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: LAP_TABLES,
  async calculate(views, params) {
    const laps = timedLaps(await views.getLapTimesWithContext(viewFilter(params)));
    if (laps.length === 0) {
      return emptyResult(this.name, params, 'No lap time data found');
    }

    let fastest = laps[0];
    for (const lap of laps) {
      if (lap.seconds < fastest.seconds) {
        fastest = lap;
      }
    }

    return metricResult(this.name, round(fastest.seconds, 3), params, {
      race_id: fastest.lap.raceId,
      lap: fastest.lap.lap,
      year: fastest.lap.year,
      driver_id: fastest.lap.driverId,
    });
  },
};

export const constructorLapTimeConsistency: MetricDefinition = {
  name: 'constructor_lap_time_consistency',
  description: 'Consistency of lap times across all laps (lower standard deviation is more consistent)',
  unit: 'seconds',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: LAP_TABLES,
  async calculate(views, params) {
    const laps = timedLaps(await views.getLapTimesWithContext(viewFilter(params)));
    const seconds = laps.map(l => l.seconds);
    const average = mean(seconds);
    const std = sampleStd(seconds);

    if (seconds.length < MIN_LAPS_FOR_CONSISTENCY || average === null || std === null) {
      return emptyResult(this.name, params, 'Insufficient lap time data for consistency analysis');
    }

    // drop laps beyond three standard deviations (safety cars, pit laps)
    const filtered = seconds.filter(s => Math.abs(s - average) <= 3 * std);
    const filteredStd = sampleStd(filtered) ?? 0;
    const filteredMean = mean(filtered) ?? average;
    const cv = filteredMean > 0 ? (filteredStd / filteredMean) * 100 : 0;

    return metricResult(this.name, round(filteredStd, 3), params, {
      coefficient_of_variation: round(cv, 2),
      total_laps: seconds.length,
      filtered_laps: filtered.length,
      mean_lap_time: round(filteredMean, 3),
      consistency_grade: consistencyGrade(cv),
    });
  },
};

export const constructorRacePace: MetricDefinition = {
  name: 'constructor_race_pace',
  description: 'Average race pace relative to field average',
  unit: 'percentage',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: LAP_TABLES,
  async calculate(views, params) {
    const constructorId = requireParam(params, 'constructor_id');
    const field = timedLaps(await views.getLapTimesWithContext(raceSetFilter(params)));
    const own = field.filter(l => l.lap.constructorId === constructorId);

    if (own.length === 0) {
      return emptyResult(this.name, params, 'No lap time data found');
    }

    const fieldByRace = groupBy(field, l => l.lap.raceId);
    const deltas: number[] = [];

    for (const [raceId, laps] of groupBy(own, l => l.lap.raceId)) {
      const ownAvg = mean(laps.map(l => l.seconds));
      const fieldAvg = mean((fieldByRace.get(raceId) ?? []).map(l => l.seconds));
      if (ownAvg !== null && fieldAvg !== null && fieldAvg > 0) {
        deltas.push(((ownAvg - fieldAvg) / fieldAvg) * 100);
      }
    }

    if (deltas.length === 0) {
      return emptyResult(this.name, params, 'No valid race comparisons available');
    }

    // positive = faster than the field
    return metricResult(this.name, round(-(mean(deltas) ?? 0), 2), params, {
      interpretation: 'Positive values indicate faster than average',
      races_analyzed: deltas.length,
      best_race_performance: round(-(min(deltas) ?? 0), 2),
      worst_race_performance: round(-(max(deltas) ?? 0), 2),
      consistency: round(populationStd(deltas) ?? 0, 2),
    });
  },
};

export const constructorLapTimeImprovement: MetricDefinition = {
  name: 'constructor_lap_time_improvement',
  description: 'Average lap time improvement throughout races',
  unit: 'seconds',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: LAP_TABLES,
  async calculate(views, params) {
    const laps = timedLaps(await views.getLapTimesWithContext(viewFilter(params)));
    if (laps.length === 0) {
      return emptyResult(this.name, params, 'No lap time data found');
    }

    const improvements: number[] = [];
    for (const race of lapsByRace(laps)) {
      if (race.length < MIN_RACE_LAPS) continue;
      const early = mean(race.slice(0, RACE_END_LAPS).map(l => l.seconds)) ?? 0;
      const late = mean(race.slice(-RACE_END_LAPS).map(l => l.seconds)) ?? 0;
      improvements.push(early - late);
    }

    if (improvements.length === 0) {
      return emptyResult(this.name, params, 'Insufficient data for improvement analysis');
    }

    return metricResult(this.name, round(mean(improvements) ?? 0, 3), params, {
      races_analyzed: improvements.length,
      positive_improvement_races: countWhere(improvements, i => i > 0),
      best_race_improvement: round(max(improvements) ?? 0, 3),
      worst_race_degradation: round(min(improvements) ?? 0, 3),
      interpretation: 'Positive values indicate improvement during races',
    });
  },
};

export const constructorTireManagement: MetricDefinition = {
  name: 'constructor_tire_management',
  description: 'Lap time degradation analysis (lower values indicate better tire management)',
  unit: 'seconds per 10 laps',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: LAP_TABLES,
  async calculate(views, params) {
    const laps = timedLaps(await views.getLapTimesWithContext(viewFilter(params)));
    if (laps.length === 0) {
      return emptyResult(this.name, params, 'No lap time data found');
    }

    const degradation: number[] = [];
    for (const race of lapsByRace(laps)) {
      const slope = race.length >= MIN_STINT_LAPS ? linearSlope(race.map(l => l.seconds)) : null;
      if (slope !== null) {
        degradation.push(slope * 10);
      }
    }

    if (degradation.length === 0) {
      return emptyResult(this.name, params, 'Insufficient data for tire management analysis');
    }

    return metricResult(this.name, round(mean(degradation) ?? 0, 3), params, {
      races_analyzed: degradation.length,
      best_tire_management: round(min(degradation) ?? 0, 3),
      worst_tire_management: round(max(degradation) ?? 0, 3),
      consistency: round(populationStd(degradation) ?? 0, 3),
      interpretation: 'Lower values indicate better tire management',
    });
  },
};

export const constructorCompetitiveLapRate: MetricDefinition = {
  name: 'constructor_competitive_lap_rate',
  description: 'Percentage of laps within 103% of fastest lap time in each race',
  unit: 'percentage',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: LAP_TABLES,
  async calculate(views, params) {
    const constructorId = requireParam(params, 'constructor_id');
    const field = timedLaps(await views.getLapTimesWithContext(raceSetFilter(params)));
    const own = field.filter(l => l.lap.constructorId === constructorId);
    if (own.length === 0) {
      return emptyResult(this.name, params, 'No lap time data found');
    }

    const fieldByRace = groupBy(field, l => l.lap.raceId);
    let competitive = 0;

    for (const [raceId, laps] of groupBy(own, l => l.lap.raceId)) {
      const fastest = min((fieldByRace.get(raceId) ?? []).map(l => l.seconds));
      if (fastest === null) continue;
      competitive += countWhere(laps, l => l.seconds <= fastest * COMPETITIVE_LAP_RATIO);
    }

    return metricResult(this.name, round(percentage(competitive, own.length), 1), params, {
      competitive_laps: competitive,
      total_laps: own.length,
      races_analyzed: unique(own.map(l => l.lap.raceId)).length,
      threshold: '103% of fastest lap',
    });
  },
};

export const constructorLapTimeVariability: MetricDefinition = {
  name: 'constructor_lap_time_variability',
  description: 'Lap time variability across different track conditions',
  unit: 'coefficient of variation',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: LAP_TABLES,
  async calculate(views, params) {
    const laps = timedLaps(await views.getLapTimesWithContext(viewFilter(params)));
    if (laps.length === 0) {
      return emptyResult(this.name, params, 'No lap time data found');
    }

    const variability: number[] = [];
    for (const race of groupBy(laps, l => l.lap.raceId).values()) {
      if (race.length < MIN_RACE_LAPS) continue;
      const seconds = race.map(l => l.seconds);
      const average = mean(seconds) ?? 0;
      if (average > 0) {
        variability.push(((sampleStd(seconds) ?? 0) / average) * 100);
      }
    }

    if (variability.length === 0) {
      return emptyResult(this.name, params, 'Insufficient data for variability analysis');
    }

    return metricResult(this.name, round(mean(variability) ?? 0, 2), params, {
      races_analyzed: variability.length,
      most_consistent_race: round(min(variability) ?? 0, 2),
      least_consistent_race: round(max(variability) ?? 0, 2),
      variability_std: round(populationStd(variability) ?? 0, 2),
      interpretation: 'Lower values indicate more consistent performance',
    });
  },
};

export const constructorPaceDominance: MetricDefinition = {
  name: 'constructor_pace_dominance',
  description: 'Percentage of races where constructor had the fastest average lap time',
  unit: 'percentage',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: LAP_TABLES,
  async calculate(views, params) {
    const constructorId = requireParam(params, 'constructor_id');
    const performance = await views.getConstructorLapPerformance(raceSetFilter(params));
    if (performance.length === 0) {
      return emptyResult(this.name, params, 'No lap performance data found');
    }

    const races = unique(performance.filter(p => p.constructorId === constructorId).map(p => p.raceId));
    if (races.length === 0) {
      return emptyResult(this.name, params, 'No races found for this constructor');
    }

    const byRace = groupBy(performance, p => p.raceId);
    let dominant = 0;

    for (const raceId of races) {
      // first row wins ties
      let fastest: ConstructorLapPerformance | undefined;
      for (const row of byRace.get(raceId) ?? []) {
        if (!fastest || row.avgLapTimeMs < fastest.avgLapTimeMs) {
          fastest = row;
        }
      }
      if (fastest?.constructorId === constructorId) {
        dominant++;
      }
    }

    return metricResult(this.name, round(percentage(dominant, races.length), 1), params, {
      dominant_races: dominant,
      total_races: races.length,
      races_analyzed: races.length,
    });
  },
};

export const constructorFuelAdjustedPace: MetricDefinition = {
  name: 'constructor_fuel_adjusted_pace',
  description: 'Estimated race pace adjusted for fuel load effects',
  unit: 'seconds',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: LAP_TABLES,
  async calculate(views, params) {
    const laps = timedLaps(await views.getLapTimesWithContext(viewFilter(params)));
    if (laps.length === 0) {
      return emptyResult(this.name, params, 'No lap time data found');
    }

    const adjusted: number[] = [];
    for (const race of lapsByRace(laps)) {
      if (race.length < MIN_RACE_LAPS) continue;
      // fuel still aboard, counted in laps to the race's last recorded lap
      const lastLap = race[race.length - 1].lap.lap;
      for (const lap of race) {
        adjusted.push(lap.seconds - (lastLap - lap.lap.lap + 1) * FUEL_EFFECT_PER_LAP);
      }
    }

    if (adjusted.length === 0) {
      return emptyResult(this.name, params, 'Insufficient data for fuel adjustment');
    }

    const adjustedAverage = mean(adjusted) ?? 0;
    const rawAverage = mean(laps.map(l => l.seconds)) ?? 0;

    return metricResult(this.name, round(adjustedAverage, 3), params, {
      total_adjusted_laps: adjusted.length,
      fuel_effect_assumption: `${FUEL_EFFECT_PER_LAP.toFixed(3)} seconds per lap`,
      raw_average: round(rawAverage, 3),
      adjustment_difference: round(adjustedAverage - rawAverage, 3),
      races_analyzed: unique(laps.map(l => l.lap.raceId)).length,
    });
  },
};

export const CONSTRUCTOR_LAP_METRICS: MetricDefinition[] = [
  constructorAverageLapTime,
  constructorFastestLap,
  constructorLapTimeConsistency,
  constructorRacePace,
  constructorLapTimeImprovement,
  constructorTireManagement,
  constructorCompetitiveLapRate,
  constructorLapTimeVariability,
  constructorPaceDominance,
  constructorFuelAdjustedPace,
];
