/**
 * Head-to-head metrics against the driver's teammate(s)
 *
 * The teammate of a race is whoever else drove for the same constructor in
 * that race, so a driver who changes team mid-career is compared against
 * the right person each time.
 */

import { DriverInfo } from '../../types/views';
import { groupBy, pairKey, percentage, round, unique } from '../../views/aggregate';
import { ViewBuilder } from '../../views/view-builder';
import { MetricDefinition, raceSetFilter, requireParam } from '../definition';
import { emptyResult, MetadataInputRecord, metricResult } from '../result';

interface Comparison {
  raceId: number;
  teammateId: number;
  driverBetter: boolean;
}

interface Entry {
  raceId: number;
  driverId: number;
  constructorId: number;
}

function teammateOf<T extends Entry>(entry: T, byRaceTeam: Map<string, T[]>): T | null {
  const group = byRaceTeam.get(pairKey(entry.raceId, entry.constructorId)) ?? [];
  return group.find(other => other.driverId !== entry.driverId) ?? null;
}

function driverLabel(drivers: Map<number, DriverInfo>, driverId: number): string {
  return drivers.get(driverId)?.fullName ?? `Driver ${driverId}`;
}

async function headToHead(views: ViewBuilder, comparisons: readonly Comparison[]): Promise<MetadataInputRecord> {
  const drivers = new Map((await views.getDrivers()).map(d => [d.driverId, d]));
  const wins = comparisons.filter(c => c.driverBetter).length;
  const total = comparisons.length;

  const breakdown: MetadataInputRecord = {};
  for (const [teammateId, rows] of groupBy(comparisons, c => c.teammateId)) {
    const teammateWins = rows.filter(c => c.driverBetter).length;
    breakdown[driverLabel(drivers, teammateId)] = {
      teammate_id: teammateId,
      wins: teammateWins,
      total: rows.length,
      win_rate: round(percentage(teammateWins, rows.length), 2),
    };
  }

  return {
    overall_win_rate: round(percentage(wins, total), 2),
    wins,
    total,
    losses: total - wins,
    record: `${wins}-${total - wins}`,
    teammate_breakdown: breakdown,
  };
}

export const teammateQualifyingComparison: MetricDefinition = {
  name: 'teammate_qualifying_comparison',
  description: 'Head-to-head qualifying record against teammates',
  unit: 'record',
  scope: 'driver',
  requires: ['driver_id'],
  requiredTables: ['races', 'qualifying', 'drivers'],
  async calculate(views, params) {
    const driverId = requireParam(params, 'driver_id');
    const qualifying = await views.getQualifyingWithConstructor(raceSetFilter(params));

    const driverRows = qualifying.filter(q => q.driverId === driverId);
    if (driverRows.length === 0) {
      return emptyResult(this.name, params, 'No qualifying data found for driver');
    }

    const byRaceTeam = groupBy(qualifying, q => pairKey(q.raceId, q.constructorId));
    const comparisons: Comparison[] = [];

    for (const row of driverRows) {
      const teammate = teammateOf(row, byRaceTeam);
      if (!teammate || row.position === null || teammate.position === null) {
        continue;
      }
      comparisons.push({
        raceId: row.raceId,
        teammateId: teammate.driverId,
        driverBetter: row.position < teammate.position,
      });
    }

    if (comparisons.length === 0) {
      return emptyResult(this.name, params, 'No valid teammate comparisons found');
    }

    return metricResult(this.name, await headToHead(views, comparisons), params, {
      total_comparisons: comparisons.length,
      unique_teammates: unique(comparisons.map(c => c.teammateId)).length,
    });
  },
};

export const teammateRaceComparison: MetricDefinition = {
  name: 'teammate_race_comparison',
  description: 'Head-to-head race finishing record against teammates',
  unit: 'record',
  scope: 'driver',
  requires: ['driver_id'],
  requiredTables: ['races', 'results', 'drivers'],
  async calculate(views, params) {
    const driverId = requireParam(params, 'driver_id');
    const results = await views.getDriverResults(raceSetFilter(params));

    const driverRows = results.filter(r => r.driverId === driverId);
    if (driverRows.length === 0) {
      return emptyResult(this.name, params, 'No race results found for driver');
    }

    const byRaceTeam = groupBy(results, r => pairKey(r.raceId, r.constructorId));
    const comparisons: Comparison[] = [];

    for (const row of driverRows) {
      const teammate = teammateOf(row, byRaceTeam);
      if (!teammate) {
        continue;
      }

      let driverBetter: boolean | null = null;
      if (row.position !== null && teammate.position !== null) {
        driverBetter = row.position < teammate.position;
      } else if (row.position !== null) {
        driverBetter = true;
      } else if (teammate.position !== null) {
        driverBetter = false;
      } else if (row.laps !== null && teammate.laps !== null && row.laps !== teammate.laps) {
        // both retired: whoever covered more laps
        driverBetter = row.laps > teammate.laps;
      }

      if (driverBetter !== null) {
        comparisons.push({ raceId: row.raceId, teammateId: teammate.driverId, driverBetter });
      }
    }

    if (comparisons.length === 0) {
      return emptyResult(this.name, params, 'No valid teammate race comparisons found');
    }

    return metricResult(this.name, await headToHead(views, comparisons), params, {
      total_comparisons: comparisons.length,
      unique_teammates: unique(comparisons.map(c => c.teammateId)).length,
    });
  },
};

export const DRIVER_TEAMMATE_METRICS: MetricDefinition[] = [
  teammateQualifyingComparison,
  teammateRaceComparison,
];
