import { min } from '../../views/aggregate';
import { MetricDefinition, viewFilter } from '../definition';
import { emptyResult, MetadataInputRecord, metricResult } from '../result';

export const driverChampionshipPosition: MetricDefinition = {
  name: 'driver_championship_position',
  description: 'Final drivers championship position for the season (best position across seasons when no season is given)',
  unit: 'position',
  scope: 'driver',
  requires: ['driver_id'],
  requiredTables: ['races', 'driver_standings', 'drivers'],
  async calculate(views, params) {
    const standings = await views.getDriverStandingsBySeason(viewFilter(params));
    if (standings.length === 0) {
      return emptyResult(this.name, params, 'No championship standings found');
    }

    if (params.season !== undefined && params.season !== null) {
      const final = standings[0];
      return metricResult(this.name, final.position, params, {
        season: final.year,
        points: final.points,
        wins: final.wins ?? 0,
        after_round: final.round,
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
      championships: standings.filter(s => s.position === 1).length,
      seasons: standings.length,
    });
  },
};

export const DRIVER_CHAMPIONSHIP_METRICS: MetricDefinition[] = [driverChampionshipPosition];
