import { MalformedDataError } from '../errors/metric-errors';
import {
  ConstructorRow,
  ConstructorStandingRow,
  DriverRow,
  DriverStandingRow,
  LapTimeRow,
  PitStopRow,
  QualifyingRow,
  RaceRow,
  RawRecord,
  ResultRow,
  StatusRow,
  TableName,
  TableRowMap
} from '../types/tables';
import { toNullableInt, toNullableNumber, toNullableString } from './coerce';

/**
 * Reads typed cells out of one raw record.
 *
 * Required columns (ids, integers, floats, strings) raise MalformedDataError
 * when missing or unparseable. Nullable columns never raise.
 */
export class RowReader {
  constructor(
    private readonly table: TableName,
    private readonly record: RawRecord,
    private readonly rowNumber: number
  ) {}

  id(column: string): number {
    const value = toNullableInt(this.record[column]);
    if (value === null || value < 0) {
      throw this.malformed(column, 'expected an integer id');
    }
    return value;
  }

  int(column: string): number {
    const value = toNullableInt(this.record[column]);
    if (value === null) {
      throw this.malformed(column, 'expected an integer');
    }
    return value;
  }

  float(column: string): number {
    const value = toNullableNumber(this.record[column]);
    if (value === null) {
      throw this.malformed(column, 'expected a number');
    }
    return value;
  }

  string(column: string): string {
    const value = toNullableString(this.record[column]);
    if (value === null) {
      throw this.malformed(column, 'expected a value');
    }
    return value;
  }

  /** Date columns stay ISO date strings */
  date(column: string): string {
    return this.string(column);
  }

  nullableInt(column: string): number | null {
    return toNullableInt(this.record[column]);
  }

  nullableFloat(column: string): number | null {
    return toNullableNumber(this.record[column]);
  }

  nullableString(column: string): string | null {
    return toNullableString(this.record[column]);
  }

  private malformed(column: string, expectation: string): MalformedDataError {
    const raw = this.record[column];
    const shown = raw === undefined ? 'missing' : JSON.stringify(raw);
    return new MalformedDataError(this.table, `row ${this.rowNumber}, column ${column}: ${expectation}, got ${shown}`);
  }
}

export interface TableDefinition<Row> {
  name: TableName;
  /** File name for the CSV source */
  file: string;
  /** Columns every record must carry */
  requiredColumns: readonly string[];
  parse(reader: RowReader): Row;
}

const races: TableDefinition<RaceRow> = {
  name: 'races',
  file: 'races.csv',
  requiredColumns: ['raceId', 'year', 'round', 'circuitId', 'name', 'date'],
  parse: (r) => ({
    raceId: r.id('raceId'),
    year: r.int('year'),
    round: r.int('round'),
    circuitId: r.id('circuitId'),
    name: r.string('name'),
    date: r.date('date'),
    time: r.nullableString('time'),
  }),
};

const results: TableDefinition<ResultRow> = {
  name: 'results',
  file: 'results.csv',
  requiredColumns: ['resultId', 'raceId', 'driverId', 'constructorId', 'position', 'points'],
  parse: (r) => ({
    resultId: r.id('resultId'),
    raceId: r.id('raceId'),
    driverId: r.id('driverId'),
    constructorId: r.id('constructorId'),
    number: r.nullableInt('number'),
    grid: r.nullableInt('grid'),
    position: r.nullableInt('position'),
    positionText: r.nullableString('positionText') ?? '',
    positionOrder: r.nullableInt('positionOrder'),
    points: r.nullableFloat('points'),
    laps: r.nullableInt('laps'),
    time: r.nullableString('time'),
    milliseconds: r.nullableInt('milliseconds'),
    fastestLap: r.nullableInt('fastestLap'),
    rank: r.nullableInt('rank'),
    fastestLapTime: r.nullableString('fastestLapTime'),
    fastestLapSpeed: r.nullableFloat('fastestLapSpeed'),
    statusId: r.nullableInt('statusId'),
  }),
};

const qualifying: TableDefinition<QualifyingRow> = {
  name: 'qualifying',
  file: 'qualifying.csv',
  requiredColumns: ['qualifyId', 'raceId', 'driverId', 'constructorId', 'position'],
  parse: (r) => ({
    qualifyId: r.id('qualifyId'),
    raceId: r.id('raceId'),
    driverId: r.id('driverId'),
    constructorId: r.id('constructorId'),
    number: r.nullableInt('number'),
    position: r.nullableInt('position'),
    q1: r.nullableString('q1'),
    q2: r.nullableString('q2'),
    q3: r.nullableString('q3'),
  }),
};

const lapTimes: TableDefinition<LapTimeRow> = {
  name: 'lap_times',
  file: 'lap_times.csv',
  requiredColumns: ['raceId', 'driverId', 'lap', 'milliseconds'],
  parse: (r) => ({
    raceId: r.id('raceId'),
    driverId: r.id('driverId'),
    lap: r.int('lap'),
    position: r.nullableInt('position'),
    time: r.nullableString('time'),
    milliseconds: r.nullableInt('milliseconds'),
  }),
};

const pitStops: TableDefinition<PitStopRow> = {
  name: 'pit_stops',
  file: 'pit_stops.csv',
  requiredColumns: ['raceId', 'driverId', 'stop', 'lap', 'milliseconds'],
  parse: (r) => ({
    raceId: r.id('raceId'),
    driverId: r.id('driverId'),
    stop: r.int('stop'),
    lap: r.int('lap'),
    time: r.nullableString('time'),
    duration: r.nullableString('duration'),
    milliseconds: r.nullableInt('milliseconds'),
  }),
};

const drivers: TableDefinition<DriverRow> = {
  name: 'drivers',
  file: 'drivers.csv',
  requiredColumns: ['driverId', 'forename', 'surname'],
  parse: (r) => ({
    driverId: r.id('driverId'),
    driverRef: r.nullableString('driverRef') ?? '',
    number: r.nullableInt('number'),
    code: r.nullableString('code'),
    forename: r.string('forename'),
    surname: r.string('surname'),
    dob: r.nullableString('dob'),
    nationality: r.nullableString('nationality'),
    url: r.nullableString('url'),
  }),
};

const constructors: TableDefinition<ConstructorRow> = {
  name: 'constructors',
  file: 'constructors.csv',
  requiredColumns: ['constructorId', 'name'],
  parse: (r) => ({
    constructorId: r.id('constructorId'),
    constructorRef: r.nullableString('constructorRef') ?? '',
    name: r.string('name'),
    nationality: r.nullableString('nationality'),
    url: r.nullableString('url'),
  }),
};

const constructorStandings: TableDefinition<ConstructorStandingRow> = {
  name: 'constructor_standings',
  file: 'constructor_standings.csv',
  requiredColumns: ['constructorStandingsId', 'raceId', 'constructorId', 'points'],
  parse: (r) => ({
    constructorStandingsId: r.id('constructorStandingsId'),
    raceId: r.id('raceId'),
    constructorId: r.id('constructorId'),
    points: r.float('points'),
    position: r.nullableInt('position'),
    positionText: r.nullableString('positionText'),
    wins: r.nullableInt('wins'),
  }),
};

const driverStandings: TableDefinition<DriverStandingRow> = {
  name: 'driver_standings',
  file: 'driver_standings.csv',
  requiredColumns: ['driverStandingsId', 'raceId', 'driverId', 'points'],
  parse: (r) => ({
    driverStandingsId: r.id('driverStandingsId'),
    raceId: r.id('raceId'),
    driverId: r.id('driverId'),
    points: r.float('points'),
    position: r.nullableInt('position'),
    positionText: r.nullableString('positionText'),
    wins: r.nullableInt('wins'),
  }),
};

const status: TableDefinition<StatusRow> = {
  name: 'status',
  file: 'status.csv',
  requiredColumns: ['statusId', 'status'],
  parse: (r) => ({
    statusId: r.id('statusId'),
    status: r.string('status'),
  }),
};

export const TABLE_DEFINITIONS: { [K in TableName]: TableDefinition<TableRowMap[K]> } = {
  races,
  results,
  qualifying,
  lap_times: lapTimes,
  pit_stops: pitStops,
  drivers,
  constructors,
  constructor_standings: constructorStandings,
  driver_standings: driverStandings,
  status,
};

/**
 * Parse all records of a table. Any malformed row fails the whole table.
 */
export function parseTable<K extends TableName>(name: K, records: readonly RawRecord[]): TableRowMap[K][] {
  const definition: TableDefinition<TableRowMap[K]> = TABLE_DEFINITIONS[name];

  if (records.length > 0) {
    const missing = definition.requiredColumns.filter(column => !(column in records[0]));
    if (missing.length > 0) {
      throw new MalformedDataError(name, `missing columns: ${missing.join(', ')}`);
    }
  }

  // header is row 1 in the CSV source, so data rows start at 2
  return records.map((record, index) => definition.parse(new RowReader(name, record, index + 2)));
}
