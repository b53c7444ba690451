/**
 * Raw table row types
 *
 * One interface per backing table. Nullable columns are `number | null` or
 * `string | null`; sentinel values ("\N", "Ret", empty) are already coerced
 * to null by the table store.
 */

export interface RaceRow {
  raceId: number;
  year: number;
  round: number;
  circuitId: number;
  name: string;
  date: string;
  time: string | null;
}

export interface ResultRow {
  resultId: number;
  raceId: number;
  driverId: number;
  constructorId: number;
  number: number | null;
  grid: number | null;
  /** Classified finishing position; null for DNF/DSQ/DNS */
  position: number | null;
  /** Display column; varies by era, never used for DNF detection */
  positionText: string;
  positionOrder: number | null;
  points: number | null;
  laps: number | null;
  time: string | null;
  milliseconds: number | null;
  fastestLap: number | null;
  rank: number | null;
  fastestLapTime: string | null;
  fastestLapSpeed: number | null;
  statusId: number | null;
}

export interface QualifyingRow {
  qualifyId: number;
  raceId: number;
  driverId: number;
  constructorId: number;
  number: number | null;
  position: number | null;
  q1: string | null;
  q2: string | null;
  q3: string | null;
}

export interface LapTimeRow {
  raceId: number;
  driverId: number;
  lap: number;
  position: number | null;
  time: string | null;
  milliseconds: number | null;
}

export interface PitStopRow {
  raceId: number;
  driverId: number;
  stop: number;
  lap: number;
  time: string | null;
  duration: string | null;
  milliseconds: number | null;
}

export interface DriverRow {
  driverId: number;
  driverRef: string;
  number: number | null;
  code: string | null;
  forename: string;
  surname: string;
  dob: string | null;
  nationality: string | null;
  url: string | null;
}

export interface ConstructorRow {
  constructorId: number;
  constructorRef: string;
  name: string;
  nationality: string | null;
  url: string | null;
}

export interface ConstructorStandingRow {
  constructorStandingsId: number;
  raceId: number;
  constructorId: number;
  points: number;
  position: number | null;
  positionText: string | null;
  wins: number | null;
}

export interface DriverStandingRow {
  driverStandingsId: number;
  raceId: number;
  driverId: number;
  points: number;
  position: number | null;
  positionText: string | null;
  wins: number | null;
}

export interface StatusRow {
  statusId: number;
  status: string;
}

/**
 * Table name → row type
 */
export interface TableRowMap {
  races: RaceRow;
  results: ResultRow;
  qualifying: QualifyingRow;
  lap_times: LapTimeRow;
  pit_stops: PitStopRow;
  drivers: DriverRow;
  constructors: ConstructorRow;
  constructor_standings: ConstructorStandingRow;
  driver_standings: DriverStandingRow;
  status: StatusRow;
}

export type TableName = keyof TableRowMap;

export const TABLE_NAMES: readonly TableName[] = [
  'races',
  'results',
  'qualifying',
  'lap_times',
  'pit_stops',
  'drivers',
  'constructors',
  'constructor_standings',
  'driver_standings',
  'status',
];

/**
 * A loaded table: all rows or nothing
 */
export interface RawTable<Row> {
  name: TableName;
  rows: readonly Row[];
  loadedAt: Date;
}

/**
 * A record as it comes out of a table source, before schema parsing
 */
export type RawRecord = Record<string, unknown>;
