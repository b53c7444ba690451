/**
 * Small in-process race dataset
 *
 * Cells are strings, as the CSV source delivers them, so every test also
 * goes through coercion. "\N" marks a missing value.
 *
 * Seasons: 2010 (below the 2011 floor), 2020 (three rounds), 2021 (one round).
 * Constructors: 1 Arrow Racing (drivers 1, 2), 2 Bolt Motors (drivers 3, 4).
 */

import { MemoryCacheStore } from '../../src/cache/cache-store';
import { ServiceSettings } from '../../src/config/settings';
import { InMemoryTableSource } from '../../src/data/table-source';
import { buildServices, Services } from '../../src/services';
import { RawRecord } from '../../src/types/tables';

export type FixtureTables = Record<string, RawRecord[]>;

const NA = '\\N';

function cell(value: number | string | null): string {
  return value === null ? NA : String(value);
}

export function race(raceId: number, year: number, round: number, name: string): RawRecord {
  const month = String(Math.min(round + 2, 12)).padStart(2, '0');
  return {
    raceId: cell(raceId),
    year: cell(year),
    round: cell(round),
    circuitId: '1',
    name,
    date: `${year}-${month}-01`,
    time: NA,
  };
}

export interface ResultInput {
  resultId: number;
  raceId: number;
  driverId: number;
  constructorId: number;
  position: number | null;
  points: number;
  grid?: number;
  laps?: number;
  statusId?: number;
}

export function result(input: ResultInput): RawRecord {
  return {
    resultId: cell(input.resultId),
    raceId: cell(input.raceId),
    driverId: cell(input.driverId),
    constructorId: cell(input.constructorId),
    number: NA,
    grid: cell(input.grid ?? null),
    position: cell(input.position),
    positionText: input.position === null ? 'R' : String(input.position),
    positionOrder: NA,
    points: cell(input.points),
    laps: cell(input.laps ?? 50),
    time: NA,
    milliseconds: NA,
    fastestLap: NA,
    rank: NA,
    fastestLapTime: NA,
    fastestLapSpeed: NA,
    statusId: cell(input.statusId ?? 1),
  };
}

export function qualifying(qualifyId: number, raceId: number, driverId: number, constructorId: number, position: number): RawRecord {
  return {
    qualifyId: cell(qualifyId),
    raceId: cell(raceId),
    driverId: cell(driverId),
    constructorId: cell(constructorId),
    number: NA,
    position: cell(position),
    q1: NA,
    q2: NA,
    q3: NA,
  };
}

export function lapTime(raceId: number, driverId: number, lap: number, milliseconds: number): RawRecord {
  return {
    raceId: cell(raceId),
    driverId: cell(driverId),
    lap: cell(lap),
    position: NA,
    time: NA,
    milliseconds: cell(milliseconds),
  };
}

export function pitStop(raceId: number, driverId: number, stop: number, lap: number, milliseconds: number): RawRecord {
  return {
    raceId: cell(raceId),
    driverId: cell(driverId),
    stop: cell(stop),
    lap: cell(lap),
    time: NA,
    duration: String(milliseconds / 1000),
    milliseconds: cell(milliseconds),
  };
}

export function standing(
  idColumn: 'constructorId' | 'driverId',
  standingId: number,
  raceId: number,
  id: number,
  points: number,
  position: number,
  wins: number
): RawRecord {
  const idKey = idColumn === 'constructorId' ? 'constructorStandingsId' : 'driverStandingsId';
  return {
    [idKey]: cell(standingId),
    raceId: cell(raceId),
    [idColumn]: cell(id),
    points: cell(points),
    position: cell(position),
    positionText: cell(position),
    wins: cell(wins),
  };
}

export function baseTables(): FixtureTables {
  return {
    races: [
      race(1, 2010, 1, 'Old Grand Prix'),
      race(10, 2020, 1, 'Alpha Grand Prix'),
      race(11, 2020, 2, 'Beta Grand Prix'),
      race(12, 2020, 3, 'Gamma Grand Prix'),
      race(20, 2021, 1, 'Delta Grand Prix'),
    ],
    drivers: [
      { driverId: '1', driverRef: 'lane', number: '7', code: 'LAN', forename: 'Ada', surname: 'Lane', dob: '1990-01-01', nationality: 'Testland', url: NA },
      { driverId: '2', driverRef: 'ortiz', number: '8', code: 'ORT', forename: 'Ben', surname: 'Ortiz', dob: '1991-02-02', nationality: 'Testland', url: NA },
      { driverId: '3', driverRef: 'park', number: '9', code: 'PAR', forename: 'Cy', surname: 'Park', dob: '1992-03-03', nationality: 'Samplia', url: NA },
      { driverId: '4', driverRef: 'quinn', number: NA, code: NA, forename: 'Dee', surname: 'Quinn', dob: NA, nationality: NA, url: NA },
      { driverId: '5', driverRef: 'retired', number: NA, code: NA, forename: 'Old', surname: 'Timer', dob: NA, nationality: NA, url: NA },
    ],
    constructors: [
      { constructorId: '1', constructorRef: 'arrow', name: 'Arrow Racing', nationality: 'Testland', url: NA },
      { constructorId: '2', constructorRef: 'bolt', name: 'Bolt Motors', nationality: 'Samplia', url: NA },
    ],
    status: [
      { statusId: '1', status: 'Finished' },
      { statusId: '5', status: 'Engine' },
      { statusId: '20', status: 'Collision' },
    ],
    results: [
      // 2010, below the season floor
      result({ resultId: 1, raceId: 1, driverId: 1, constructorId: 1, position: 1, points: 10 }),
      result({ resultId: 2, raceId: 1, driverId: 5, constructorId: 1, position: 2, points: 8 }),
      // 2020 round 1: Arrow 1-2, Bolt 3 and an engine failure
      result({ resultId: 101, raceId: 10, driverId: 1, constructorId: 1, position: 1, points: 25, grid: 1 }),
      result({ resultId: 102, raceId: 10, driverId: 2, constructorId: 1, position: 2, points: 18, grid: 3 }),
      result({ resultId: 103, raceId: 10, driverId: 3, constructorId: 2, position: 3, points: 15, grid: 2 }),
      result({ resultId: 104, raceId: 10, driverId: 4, constructorId: 2, position: null, points: 0, grid: 4, laps: 30, statusId: 5 }),
      // 2020 round 2: driver 1 retires after a collision, Bolt 1-2
      result({ resultId: 111, raceId: 11, driverId: 1, constructorId: 1, position: null, points: 0, grid: 2, laps: 10, statusId: 20 }),
      result({ resultId: 112, raceId: 11, driverId: 2, constructorId: 1, position: 3, points: 15, grid: 1 }),
      result({ resultId: 113, raceId: 11, driverId: 3, constructorId: 2, position: 1, points: 25, grid: 3 }),
      result({ resultId: 114, raceId: 11, driverId: 4, constructorId: 2, position: 2, points: 18, grid: 4 }),
      // 2020 round 3
      result({ resultId: 121, raceId: 12, driverId: 1, constructorId: 1, position: 2, points: 18, grid: 1 }),
      result({ resultId: 122, raceId: 12, driverId: 2, constructorId: 1, position: 4, points: 12, grid: 2 }),
      result({ resultId: 123, raceId: 12, driverId: 3, constructorId: 2, position: 1, points: 25, grid: 3 }),
      result({ resultId: 124, raceId: 12, driverId: 4, constructorId: 2, position: 3, points: 15, grid: 4 }),
      // 2021 round 1: Arrow 1-2 again
      result({ resultId: 201, raceId: 20, driverId: 1, constructorId: 1, position: 1, points: 25, grid: 1 }),
      result({ resultId: 202, raceId: 20, driverId: 2, constructorId: 1, position: 2, points: 18, grid: 2 }),
      result({ resultId: 203, raceId: 20, driverId: 3, constructorId: 2, position: 3, points: 15, grid: 4 }),
      result({ resultId: 204, raceId: 20, driverId: 4, constructorId: 2, position: 4, points: 12, grid: 3 }),
    ],
    qualifying: [
      qualifying(1001, 10, 1, 1, 1),
      qualifying(1002, 10, 2, 1, 3),
      qualifying(1003, 10, 3, 2, 2),
      qualifying(1004, 10, 4, 2, 4),
      qualifying(1011, 11, 1, 1, 2),
      qualifying(1012, 11, 2, 1, 1),
      qualifying(1013, 11, 3, 2, 3),
      qualifying(1014, 11, 4, 2, 4),
      qualifying(1021, 12, 1, 1, 1),
      qualifying(1022, 12, 2, 1, 2),
      qualifying(1023, 12, 3, 2, 3),
      qualifying(1024, 12, 4, 2, 4),
      qualifying(1031, 20, 1, 1, 1),
      qualifying(1032, 20, 2, 1, 2),
      qualifying(1033, 20, 3, 2, 4),
      qualifying(1034, 20, 4, 2, 3),
    ],
    lap_times: [
      lapTime(10, 1, 1, 90000),
      lapTime(10, 1, 2, 91000),
      lapTime(10, 2, 1, 92000),
      lapTime(10, 3, 1, 95000),
      lapTime(10, 3, 2, 96000),
    ],
    pit_stops: [
      pitStop(10, 1, 1, 20, 2500),
      pitStop(10, 2, 1, 21, 3200),
      pitStop(10, 1, 2, 40, 2800),
      // red-flag stop, filtered from timing metrics
      pitStop(10, 2, 2, 41, 65000),
      pitStop(10, 3, 1, 22, 2600),
      pitStop(11, 2, 1, 18, 3000),
    ],
    constructor_standings: [
      standing('constructorId', 1, 1, 1, 18, 1, 1),
      standing('constructorId', 10, 10, 1, 43, 1, 1),
      standing('constructorId', 11, 10, 2, 15, 2, 0),
      standing('constructorId', 12, 11, 1, 58, 2, 1),
      standing('constructorId', 13, 11, 2, 58, 1, 1),
      standing('constructorId', 14, 12, 1, 88, 2, 1),
      standing('constructorId', 15, 12, 2, 98, 1, 2),
      standing('constructorId', 20, 20, 1, 43, 1, 1),
      standing('constructorId', 21, 20, 2, 27, 2, 0),
    ],
    driver_standings: [
      standing('driverId', 10, 10, 1, 25, 1, 1),
      standing('driverId', 11, 11, 1, 25, 3, 1),
      standing('driverId', 12, 12, 1, 43, 2, 1),
      standing('driverId', 13, 12, 3, 65, 1, 2),
      standing('driverId', 20, 20, 1, 25, 1, 1),
    ],
  };
}

export function testSettings(overrides: Partial<ServiceSettings> = {}): ServiceSettings {
  return {
    port: 0,
    requestTimeoutMs: 5000,
    rateLimitPerWindow: 300,
    corsOrigins: ['http://localhost:5173'],
    dataSource: 'csv',
    datasetDir: 'dataset',
    databaseUrl: null,
    minYear: 2011,
    cacheEnabled: true,
    cacheTtlSeconds: 3600,
    cacheBackend: 'file',
    cacheDir: 'cache',
    redisUrl: 'redis://localhost:6379',
    ...overrides,
  };
}

export interface TestServices extends Services {
  source: InMemoryTableSource;
  cacheStore: MemoryCacheStore;
}

export function createTestServices(
  tables: FixtureTables = baseTables(),
  overrides: Partial<ServiceSettings> = {},
  now?: () => number
): TestServices {
  const source = new InMemoryTableSource(tables);
  const cacheStore = new MemoryCacheStore();
  const services = buildServices(testSettings(overrides), { source, cacheStore, now });
  return { ...services, source, cacheStore };
}
