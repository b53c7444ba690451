/**
 * Constructor championship and points metrics
 */

import { countWhere, groupBy, max, mean, min, percentage, round, sum } from '../../views/aggregate';
import { MetricDefinition, viewFilter } from '../definition';
import { emptyResult, MetadataInputRecord, metricResult } from '../result';

const STANDINGS_TABLES: MetricDefinition['requiredTables'] = ['races', 'constructor_standings', 'constructors'];
const POINTS_TABLES: MetricDefinition['requiredTables'] = ['races', 'results', 'constructors'];

export const constructorChampionshipPosition: MetricDefinition = {
  name: 'constructor_championship_position',
  description: 'Final championship position for the season',
  unit: 'position',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: STANDINGS_TABLES,
  async calculate(views, params) {
    const standings = await views.getConstructorStandingsBySeason(viewFilter(params));
    if (standings.length === 0) {
      return emptyResult(this.name, params, 'Constructor not found in standings');
    }

    if (params.season !== undefined && params.season !== null) {
      const final = standings[0];
      return metricResult(this.name, final.position, params, {
        season: final.year,
        points: final.points,
        wins: final.wins ?? 0,
      });
    }

    const positions = standings.flatMap(s => (s.position === null ? [] : [s.position]));
    const best = min(positions);
    const bestSeason = best === null ? undefined : standings.find(s => s.position === best);

    const positionsByYear: MetadataInputRecord = {};
    for (const standing of standings) {
      positionsByYear[String(standing.year)] = standing.position;
    }

    return metricResult(this.name, best, params, {
      best_season: bestSeason ? bestSeason.year : null,
      positions_by_year: positionsByYear,
      championships: countWhere(standings, s => s.position === 1),
    });
  },
};

export const constructorChampionshipWins: MetricDefinition = {
  name: 'constructor_championship_wins',
  description: 'Number of constructor championships won',
  unit: 'championships',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: STANDINGS_TABLES,
  async calculate(views, params) {
    const standings = await views.getConstructorStandingsBySeason(viewFilter(params));
    const titleYears = standings.filter(s => s.position === 1).map(s => s.year);

    if (titleYears.length === 0) {
      return metricResult(this.name, 0, params, { note: 'No championships won' });
    }

    return metricResult(this.name, titleYears.length, params, {
      championship_years: titleYears,
      last_championship: max(titleYears),
    });
  },
};

export const constructorPointsPerSeason: MetricDefinition = {
  name: 'constructor_points_per_season',
  description: 'Average points scored per season',
  unit: 'points',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: POINTS_TABLES,
  async calculate(views, params) {
    const byRace = await views.getConstructorPointsByRace(viewFilter(params));
    if (byRace.length === 0) {
      return emptyResult(this.name, params, 'No points data found');
    }

    const seasons = [...groupBy(byRace, r => r.year)].map(([year, races]) => ({
      year,
      points: sum(races.map(r => r.totalPoints)),
      races: races.length,
    }));

    if (params.season !== undefined && params.season !== null) {
      const season = seasons[0];
      return metricResult(this.name, season.points, params, {
        season: season.year,
        races: season.races,
        points_per_race: round(season.points / season.races, 2),
      });
    }

    const totals = seasons.map(s => s.points);
    const pointsByYear: MetadataInputRecord = {};
    for (const season of seasons) {
      pointsByYear[String(season.year)] = season.points;
    }

    return metricResult(this.name, round(mean(totals) ?? 0, 1), params, {
      seasons_count: seasons.length,
      total_points: sum(totals),
      best_season: max(totals),
      points_by_year: pointsByYear,
    });
  },
};

export const constructorPointsPerRace: MetricDefinition = {
  name: 'constructor_points_per_race',
  description: 'Average points scored per race',
  unit: 'points/race',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: POINTS_TABLES,
  async calculate(views, params) {
    const byRace = await views.getConstructorPointsByRace(viewFilter(params));
    if (byRace.length === 0) {
      return emptyResult(this.name, params, 'No points data found');
    }

    const points = byRace.map(r => r.totalPoints);
    const zero = countWhere(points, p => p === 0);

    return metricResult(this.name, round(sum(points) / points.length, 2), params, {
      total_races: points.length,
      total_points: sum(points),
      max_points_race: max(points),
      points_scoring_rate: round(percentage(points.length - zero, points.length), 1),
      points_breakdown: {
        zero_points: zero,
        single_points: countWhere(points, p => p > 0 && p < 10),
        double_digit_points: countWhere(points, p => p >= 10),
      },
    });
  },
};

export const constructorTopThreeFinishes: MetricDefinition = {
  name: 'constructor_top_three_finishes',
  description: 'Percentage of seasons finishing in top 3 of championship',
  unit: 'percentage',
  scope: 'constructor',
  requires: ['constructor_id'],
  requiredTables: STANDINGS_TABLES,
  async calculate(views, params) {
    const standings = await views.getConstructorStandingsBySeason(viewFilter(params));
    if (standings.length === 0) {
      return emptyResult(this.name, params, 'Constructor not found in standings');
    }

    const topThree = countWhere(standings, s => s.position !== null && s.position <= 3);

    const breakdown: MetadataInputRecord = {};
    for (const place of [1, 2, 3]) {
      const years = standings.filter(s => s.position === place).map(s => s.year);
      if (years.length > 0) {
        breakdown[`P${place}`] = { count: years.length, years };
      }
    }

    return metricResult(this.name, round(percentage(topThree, standings.length), 1), params, {
      total_seasons: standings.length,
      top_three_count: topThree,
      position_breakdown: breakdown,
      best_position: min(standings.flatMap(s => (s.position === null ? [] : [s.position]))),
    });
  },
};

export const CONSTRUCTOR_CHAMPIONSHIP_METRICS: MetricDefinition[] = [
  constructorChampionshipPosition,
  constructorChampionshipWins,
  constructorPointsPerSeason,
  constructorPointsPerRace,
  constructorTopThreeFinishes,
];
