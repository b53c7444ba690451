import { TableStore } from '../data/table-store';
import { DataUnavailableError, MalformedDataError, NotFoundError } from '../errors/metric-errors';
import {
  ConstructorRow,
  DriverRow,
  RaceRow,
  TableName,
  TableRowMap
} from '../types/tables';
import {
  ConstructorInfo,
  ConstructorLapPerformance,
  ConstructorPodiumLockout,
  ConstructorPointsByRace,
  ConstructorRaceAggregate,
  ConstructorReliabilityView,
  ConstructorResultView,
  ConstructorSeasonStanding,
  DriverInfo,
  DriverResultView,
  DriverSeasonStanding,
  LapTimeView,
  PitStopView,
  QualifyingView,
  SeasonStanding,
  TeammatePair,
  ViewFilter
} from '../types/views';
import { groupBy, max, mean, min, pairKey, present, sampleStd, sum } from './aggregate';

const PODIUM_POSITIONS = new Set([1, 2, 3]);

interface StandingSource {
  raceId: number;
  points: number;
  position: number | null;
  wins: number | null;
}

/** Id lookup for a loaded table, built once per row array */
export function indexById<R>(
  indexes: WeakMap<readonly R[], Map<number, R>>,
  rows: readonly R[],
  idOf: (row: R) => number
): Map<number, R> {
  let index = indexes.get(rows);
  if (!index) {
    index = new Map();
    for (const row of rows) {
      const id = idOf(row);
      // first row wins on a repeated id
      if (!index.has(id)) {
        index.set(id, row);
      }
    }
    indexes.set(rows, index);
  }
  return index;
}

function byRaceOrder(races: Map<number, RaceRow>) {
  return (a: { raceId: number }, b: { raceId: number }): number => {
    const raceA = races.get(a.raceId);
    const raceB = races.get(b.raceId);
    if (!raceA || !raceB) {
      return 0;
    }
    return raceA.year - raceB.year || raceA.round - raceB.round;
  };
}

function matches(value: number, wanted: number | null | undefined): boolean {
  return wanted === undefined || wanted === null || value === wanted;
}

function toDriverInfo(row: DriverRow): DriverInfo {
  return {
    driverId: row.driverId,
    driverRef: row.driverRef,
    code: row.code,
    number: row.number,
    forename: row.forename,
    surname: row.surname,
    fullName: `${row.forename} ${row.surname}`,
    dob: row.dob,
    nationality: row.nationality,
    url: row.url,
  };
}

function toConstructorInfo(row: ConstructorRow): ConstructorInfo {
  return {
    constructorId: row.constructorId,
    constructorRef: row.constructorRef,
    name: row.name,
    nationality: row.nationality,
    url: row.url,
  };
}

/**
 * View Builder
 *
 * Composes raw tables into derived views. Every race-derived view is
 * restricted to seasons at or after the configured floor, then to the
 * requested season, then to the intersection with an explicit race-id list.
 * Views never mutate the raw tables and return fresh arrays on every call.
 */
export class ViewBuilder {
  // keyed by the loaded row array, so a reloaded table gets a fresh index
  private readonly driverIndex = new WeakMap<readonly DriverRow[], Map<number, DriverRow>>();
  private readonly constructorIndex = new WeakMap<readonly ConstructorRow[], Map<number, ConstructorRow>>();

  constructor(
    private readonly store: TableStore,
    readonly minYear: number
  ) {}

  // ==========================================================================
  // RACES
  // ==========================================================================

  async getRaces(filter: Pick<ViewFilter, 'season' | 'raceIds'> = {}): Promise<RaceRow[]> {
    const races = await this.resolveRaces('races', filter);
    return [...races.values()];
  }

  // ==========================================================================
  // RESULTS
  // ==========================================================================

  async getDriverResults(filter: ViewFilter = {}): Promise<DriverResultView[]> {
    const view = 'driver_results';
    const races = await this.resolveRaces(view, filter);
    const results = await this.table(view, 'results');
    const drivers = new Map((await this.table(view, 'drivers')).map(d => [d.driverId, d]));

    const rows: DriverResultView[] = [];
    for (const result of results) {
      const race = races.get(result.raceId);
      if (!race || !matches(result.driverId, filter.driverId) || !matches(result.constructorId, filter.constructorId)) {
        continue;
      }
      const driver = drivers.get(result.driverId);
      rows.push({
        ...result,
        year: race.year,
        round: race.round,
        raceName: race.name,
        date: race.date,
        driverName: driver ? `${driver.forename} ${driver.surname}` : null,
      });
    }

    return rows.sort(byRaceOrder(races));
  }

  async getConstructorResults(filter: ViewFilter = {}): Promise<ConstructorResultView[]> {
    return this.constructorResults('constructor_results', filter);
  }

  async getConstructorReliability(filter: ViewFilter = {}): Promise<ConstructorReliabilityView[]> {
    const view = 'constructor_reliability';
    const results = await this.constructorResults(view, filter);
    const statuses = new Map((await this.table(view, 'status')).map(s => [s.statusId, s.status]));

    return results.map(result => ({
      ...result,
      status: result.statusId === null ? null : statuses.get(result.statusId) ?? null,
    }));
  }

  // ==========================================================================
  // CONSTRUCTOR AGGREGATES
  // ==========================================================================

  /**
   * One row per (race, constructor). Positions aggregate over classified
   * cars only; drivers_count counts every entry.
   */
  async getConstructorRaceAggregates(filter: ViewFilter = {}): Promise<ConstructorRaceAggregate[]> {
    const results = await this.constructorResults('constructor_race_aggregates', filter);
    return this.aggregateByRace(results);
  }

  /** Races where the constructor finished 1-2 with exactly two entries */
  async getConstructorRaceWins(filter: ViewFilter = {}): Promise<ConstructorRaceAggregate[]> {
    const aggregates = await this.getConstructorRaceAggregates(filter);
    return aggregates.filter(a => a.bestPosition === 1 && a.worstPosition === 2 && a.driversCount === 2);
  }

  /** Races where the constructor took the win and at least one more podium place */
  async getConstructorPodiumLockouts(filter: ViewFilter = {}): Promise<ConstructorPodiumLockout[]> {
    const results = await this.constructorResults('constructor_podium_lockouts', filter);
    const lockouts: ConstructorPodiumLockout[] = [];

    for (const group of groupBy(results, r => pairKey(r.raceId, r.constructorId)).values()) {
      const podium = present(group, r => r.position).filter(p => PODIUM_POSITIONS.has(p));
      const best = min(podium);
      if (podium.length >= 2 && best === 1) {
        const first = group[0];
        lockouts.push({
          raceId: first.raceId,
          constructorId: first.constructorId,
          year: first.year,
          round: first.round,
          bestPosition: best,
          podiumCars: podium.length,
        });
      }
    }

    return lockouts;
  }

  async getConstructorPointsByRace(filter: ViewFilter = {}): Promise<ConstructorPointsByRace[]> {
    const results = await this.constructorResults('constructor_points_by_race', filter);
    return this.aggregateByRace(results).map(a => ({
      raceId: a.raceId,
      constructorId: a.constructorId,
      year: a.year,
      round: a.round,
      totalPoints: a.totalPoints,
      bestFinish: a.bestPosition,
      avgFinish: a.avgPosition,
      carsFinished: a.classifiedCount,
    }));
  }

  // ==========================================================================
  // STANDINGS
  // ==========================================================================

  async getConstructorStandingsBySeason(filter: ViewFilter = {}): Promise<ConstructorSeasonStanding[]> {
    const view = 'constructor_standings_by_season';
    const races = await this.resolveRaces(view, filter);
    const standings = (await this.table(view, 'constructor_standings'))
      .filter(s => races.has(s.raceId) && matches(s.constructorId, filter.constructorId));

    return this.finalStandings(view, 'constructor_standings', standings, races, s => s.constructorId)
      .map(({ key, standing }) => ({ ...standing, constructorId: key }));
  }

  async getDriverStandingsBySeason(filter: ViewFilter = {}): Promise<DriverSeasonStanding[]> {
    const view = 'driver_standings_by_season';
    const races = await this.resolveRaces(view, filter);
    const standings = (await this.table(view, 'driver_standings'))
      .filter(s => races.has(s.raceId) && matches(s.driverId, filter.driverId));

    return this.finalStandings(view, 'driver_standings', standings, races, s => s.driverId)
      .map(({ key, standing }) => ({ ...standing, driverId: key }));
  }

  // ==========================================================================
  // QUALIFYING / LAPS / PIT STOPS
  // ==========================================================================

  /** Qualifying rows with race context; the team is the one on the qualifying row */
  async getQualifyingWithConstructor(filter: ViewFilter = {}): Promise<QualifyingView[]> {
    const view = 'qualifying_with_constructor';
    const races = await this.resolveRaces(view, filter);
    const qualifying = await this.table(view, 'qualifying');

    const rows: QualifyingView[] = [];
    for (const row of qualifying) {
      const race = races.get(row.raceId);
      if (!race || !matches(row.driverId, filter.driverId) || !matches(row.constructorId, filter.constructorId)) {
        continue;
      }
      rows.push({ ...row, year: race.year, round: race.round, raceName: race.name });
    }

    return rows.sort(byRaceOrder(races));
  }

  async getLapTimesWithContext(filter: ViewFilter = {}): Promise<LapTimeView[]> {
    const view = 'lap_times_with_context';
    const races = await this.resolveRaces(view, filter);
    const laps = await this.table(view, 'lap_times');
    const teams = await this.constructorByRaceDriver(view, races);

    const rows: LapTimeView[] = [];
    for (const lap of laps) {
      const race = races.get(lap.raceId);
      if (!race || !matches(lap.driverId, filter.driverId)) {
        continue;
      }
      const constructorId = teams.get(pairKey(lap.raceId, lap.driverId)) ?? null;
      if (filter.constructorId !== undefined && filter.constructorId !== null && constructorId !== filter.constructorId) {
        continue;
      }
      rows.push({
        ...lap,
        year: race.year,
        round: race.round,
        raceName: race.name,
        date: race.date,
        constructorId,
      });
    }

    return rows.sort(byRaceOrder(races));
  }

  /** Per (race, constructor) lap statistics over laps with a recorded time */
  async getConstructorLapPerformance(filter: ViewFilter = {}): Promise<ConstructorLapPerformance[]> {
    const laps = await this.getLapTimesWithContext(filter);
    const performance: ConstructorLapPerformance[] = [];

    const timed = laps.filter(l => l.milliseconds !== null && l.constructorId !== null);
    for (const group of groupBy(timed, l => pairKey(l.raceId, l.constructorId ?? 0)).values()) {
      const first = group[0];
      const times = present(group, l => l.milliseconds);
      const fastest = min(times);
      const slowest = max(times);
      const average = mean(times);
      if (first.constructorId === null || fastest === null || slowest === null || average === null) {
        continue;
      }
      performance.push({
        raceId: first.raceId,
        constructorId: first.constructorId,
        year: first.year,
        round: first.round,
        avgLapTimeMs: average,
        fastestLapMs: fastest,
        slowestLapMs: slowest,
        lapTimeStdMs: sampleStd(times),
        totalLaps: times.length,
      });
    }

    return performance;
  }

  async getPitStopStats(filter: ViewFilter = {}): Promise<PitStopView[]> {
    const view = 'pit_stop_stats';
    const races = await this.resolveRaces(view, filter);
    const stops = await this.table(view, 'pit_stops');
    const teams = await this.constructorByRaceDriver(view, races);

    const rows: PitStopView[] = [];
    for (const stop of stops) {
      const race = races.get(stop.raceId);
      if (!race || !matches(stop.driverId, filter.driverId)) {
        continue;
      }
      const constructorId = teams.get(pairKey(stop.raceId, stop.driverId)) ?? null;
      if (filter.constructorId !== undefined && filter.constructorId !== null && constructorId !== filter.constructorId) {
        continue;
      }
      rows.push({ ...stop, year: race.year, round: race.round, constructorId });
    }

    return rows.sort(byRaceOrder(races));
  }

  // ==========================================================================
  // TEAMMATES
  // ==========================================================================

  /** (race, constructor) groups with exactly two entries */
  async getTeammatePairs(filter: ViewFilter = {}): Promise<TeammatePair[]> {
    const view = 'teammate_pairs';
    const races = await this.resolveRaces(view, filter);
    const results = (await this.table(view, 'results'))
      .filter(r => races.has(r.raceId) && matches(r.constructorId, filter.constructorId))
      .sort(byRaceOrder(races));

    const pairs: TeammatePair[] = [];
    for (const group of groupBy(results, r => pairKey(r.raceId, r.constructorId)).values()) {
      if (group.length !== 2) {
        continue;
      }
      const [first, second] = group;
      const race = races.get(first.raceId);
      if (!race) {
        continue;
      }
      const pair: TeammatePair = {
        raceId: first.raceId,
        year: race.year,
        round: race.round,
        constructorId: first.constructorId,
        driverIds: [first.driverId, second.driverId],
      };
      if (filter.driverId === undefined || filter.driverId === null || pair.driverIds.includes(filter.driverId)) {
        pairs.push(pair);
      }
    }

    return pairs;
  }

  // ==========================================================================
  // DRIVERS / CONSTRUCTORS
  // ==========================================================================

  async getDriver(driverId: number): Promise<DriverInfo | null> {
    const drivers = await this.table('drivers', 'drivers');
    const row = indexById(this.driverIndex, drivers, d => d.driverId).get(driverId);
    return row ? toDriverInfo(row) : null;
  }

  async getDrivers(): Promise<DriverInfo[]> {
    const drivers = await this.table('drivers', 'drivers');
    return drivers.map(toDriverInfo);
  }

  /** Case-insensitive match on full name, reference or code */
  async searchDrivers(query: string): Promise<DriverInfo[]> {
    const needle = query.trim().toLowerCase();
    if (needle.length === 0) {
      return [];
    }
    const drivers = await this.getDrivers();
    return drivers.filter(d =>
      d.fullName.toLowerCase().includes(needle) ||
      d.driverRef.toLowerCase().includes(needle) ||
      (d.code !== null && d.code.toLowerCase() === needle)
    );
  }

  async getConstructor(constructorId: number): Promise<ConstructorInfo | null> {
    const constructors = await this.table('constructors', 'constructors');
    const row = indexById(this.constructorIndex, constructors, c => c.constructorId).get(constructorId);
    return row ? toConstructorInfo(row) : null;
  }

  async getConstructors(): Promise<ConstructorInfo[]> {
    const constructors = await this.table('constructors', 'constructors');
    return constructors.map(toConstructorInfo);
  }

  async searchConstructors(query: string): Promise<ConstructorInfo[]> {
    const needle = query.trim().toLowerCase();
    if (needle.length === 0) {
      return [];
    }
    const constructors = await this.getConstructors();
    return constructors.filter(c =>
      c.name.toLowerCase().includes(needle) || c.constructorRef.toLowerCase().includes(needle)
    );
  }

  /**
   * Drivers with at least one result in [startYear, endYear]; the season
   * floor still applies to startYear.
   */
  async getActiveDriverIds(startYear?: number | null, endYear?: number | null): Promise<number[]> {
    const results = await this.resultsInYears('active_drivers', startYear, endYear);
    return [...new Set(results.map(r => r.driverId))].sort((a, b) => a - b);
  }

  async getActiveConstructorIds(startYear?: number | null, endYear?: number | null): Promise<number[]> {
    const results = await this.resultsInYears('active_constructors', startYear, endYear);
    return [...new Set(results.map(r => r.constructorId))].sort((a, b) => a - b);
  }

  // ==========================================================================
  // INTERNALS
  // ==========================================================================

  private async table<K extends TableName>(view: string, name: K): Promise<readonly TableRowMap[K][]> {
    try {
      return await this.store.rows(name);
    } catch (err) {
      if (err instanceof NotFoundError) {
        throw new DataUnavailableError(view, name);
      }
      throw err;
    }
  }

  /**
   * Season floor, then season, then intersection with explicit race ids.
   * Returned in (year, round) order.
   */
  private async resolveRaces(view: string, filter: Pick<ViewFilter, 'season' | 'raceIds'>): Promise<Map<number, RaceRow>> {
    const races = await this.table(view, 'races');
    const season = filter.season ?? null;
    const explicit = filter.raceIds ? new Set(filter.raceIds) : null;

    const selected = races
      .filter(r => r.year >= this.minYear)
      .filter(r => season === null || r.year === season)
      .filter(r => explicit === null || explicit.has(r.raceId))
      .sort((a, b) => a.year - b.year || a.round - b.round);

    return new Map(selected.map(r => [r.raceId, r]));
  }

  private async constructorResults(view: string, filter: ViewFilter): Promise<ConstructorResultView[]> {
    const races = await this.resolveRaces(view, filter);
    const results = await this.table(view, 'results');
    const constructors = new Map((await this.table(view, 'constructors')).map(c => [c.constructorId, c]));

    const rows: ConstructorResultView[] = [];
    for (const result of results) {
      const race = races.get(result.raceId);
      if (!race || !matches(result.constructorId, filter.constructorId) || !matches(result.driverId, filter.driverId)) {
        continue;
      }
      rows.push({
        ...result,
        points: result.points ?? 0,
        year: race.year,
        round: race.round,
        raceName: race.name,
        date: race.date,
        constructorName: constructors.get(result.constructorId)?.name ?? null,
      });
    }

    return rows.sort(byRaceOrder(races));
  }

  private aggregateByRace(results: readonly ConstructorResultView[]): ConstructorRaceAggregate[] {
    const aggregates: ConstructorRaceAggregate[] = [];

    for (const group of groupBy(results, r => pairKey(r.raceId, r.constructorId)).values()) {
      const first = group[0];
      const positions = present(group, r => r.position);
      aggregates.push({
        raceId: first.raceId,
        constructorId: first.constructorId,
        year: first.year,
        round: first.round,
        bestPosition: min(positions),
        worstPosition: max(positions),
        avgPosition: mean(positions),
        driversCount: group.length,
        classifiedCount: positions.length,
        totalPoints: sum(group.map(r => r.points)),
      });
    }

    return aggregates;
  }

  /**
   * Last row by round per (season, key). A repeated round inside one group
   * is a data error: there is no "last" row to pick.
   */
  private finalStandings<T extends StandingSource>(
    view: string,
    table: TableName,
    rows: readonly T[],
    races: Map<number, RaceRow>,
    keyOf: (row: T) => number
  ): Array<{ key: number; standing: SeasonStanding }> {
    const groups = new Map<string, { key: number; year: number; rows: Array<{ row: T; race: RaceRow }> }>();

    for (const row of rows) {
      const race = races.get(row.raceId);
      if (!race) {
        continue;
      }
      const key = keyOf(row);
      const groupKey = pairKey(race.year, key);
      const group = groups.get(groupKey) ?? { key, year: race.year, rows: [] };
      group.rows.push({ row, race });
      groups.set(groupKey, group);
    }

    const finals: Array<{ key: number; standing: SeasonStanding }> = [];
    for (const group of groups.values()) {
      const seenRounds = new Set<number>();
      let last: { row: T; race: RaceRow } | null = null;

      for (const entry of group.rows) {
        if (seenRounds.has(entry.race.round)) {
          throw new MalformedDataError(
            table,
            `${view}: duplicate round ${entry.race.round} for id ${group.key} in ${group.year}`
          );
        }
        seenRounds.add(entry.race.round);
        if (last === null || entry.race.round > last.race.round) {
          last = entry;
        }
      }

      if (last) {
        finals.push({
          key: group.key,
          standing: {
            year: group.year,
            round: last.race.round,
            raceId: last.row.raceId,
            points: last.row.points,
            position: last.row.position,
            wins: last.row.wins,
          },
        });
      }
    }

    return finals.sort((a, b) => a.standing.year - b.standing.year || a.key - b.key);
  }

  /** Team of each (race, driver) entry, from the results table */
  private async constructorByRaceDriver(view: string, races: Map<number, RaceRow>): Promise<Map<string, number>> {
    const results = await this.table(view, 'results');
    const teams = new Map<string, number>();
    for (const result of results) {
      if (races.has(result.raceId)) {
        teams.set(pairKey(result.raceId, result.driverId), result.constructorId);
      }
    }
    return teams;
  }

  private async resultsInYears(view: string, startYear?: number | null, endYear?: number | null) {
    const races = await this.table(view, 'races');
    const from = Math.max(startYear ?? this.minYear, this.minYear);
    const raceIds = new Set(
      races
        .filter(r => r.year >= from && (endYear === undefined || endYear === null || r.year <= endYear))
        .map(r => r.raceId)
    );
    const results = await this.table(view, 'results');
    return results.filter(r => raceIds.has(r.raceId));
  }
}
