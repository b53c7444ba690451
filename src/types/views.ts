/**
 * Derived view row types
 *
 * Views are recomputed per call and returned as fresh arrays; callers may
 * sort or filter them without affecting anything cached.
 */

import { LapTimeRow, PitStopRow, QualifyingRow, RaceRow, ResultRow } from './tables';

/**
 * Parameters shared by every race-derived view.
 *
 * `raceIds` intersects the season-resolved race set; it never widens it.
 * An explicit empty list selects nothing.
 */
export interface ViewFilter {
  season?: number | null;
  raceIds?: readonly number[] | null;
  driverId?: number | null;
  constructorId?: number | null;
}

/** Race columns carried into joined views */
export interface RaceContext {
  year: number;
  round: number;
  raceName: string;
  date: string;
}

export interface DriverResultView extends ResultRow, RaceContext {
  driverName: string | null;
}

export interface ConstructorResultView extends ResultRow, RaceContext {
  constructorName: string | null;
  /** null points are filled with 0 */
  points: number;
}

export interface ConstructorReliabilityView extends ConstructorResultView {
  status: string | null;
}

/** One row per (race, constructor) */
export interface ConstructorRaceAggregate {
  raceId: number;
  constructorId: number;
  year: number;
  round: number;
  /** null when no car of the constructor was classified */
  bestPosition: number | null;
  worstPosition: number | null;
  avgPosition: number | null;
  /** Entries, classified or not */
  driversCount: number;
  classifiedCount: number;
  totalPoints: number;
}

export interface ConstructorPodiumLockout {
  raceId: number;
  constructorId: number;
  year: number;
  round: number;
  bestPosition: number;
  podiumCars: number;
}

export interface ConstructorPointsByRace {
  raceId: number;
  constructorId: number;
  year: number;
  round: number;
  totalPoints: number;
  bestFinish: number | null;
  avgFinish: number | null;
  carsFinished: number;
}

/** Final standing of a season: the row of the last round */
export interface SeasonStanding {
  year: number;
  round: number;
  raceId: number;
  points: number;
  position: number | null;
  wins: number | null;
}

export interface ConstructorSeasonStanding extends SeasonStanding {
  constructorId: number;
}

export interface DriverSeasonStanding extends SeasonStanding {
  driverId: number;
}

export interface QualifyingView extends QualifyingRow {
  year: number;
  round: number;
  raceName: string;
}

export interface LapTimeView extends LapTimeRow, RaceContext {
  /** Constructor the driver raced for in this race; null without a result row */
  constructorId: number | null;
}

export interface ConstructorLapPerformance {
  raceId: number;
  constructorId: number;
  year: number;
  round: number;
  avgLapTimeMs: number;
  fastestLapMs: number;
  slowestLapMs: number;
  /** Sample standard deviation; null with fewer than two laps */
  lapTimeStdMs: number | null;
  totalLaps: number;
}

export interface PitStopView extends PitStopRow {
  year: number;
  round: number;
  constructorId: number | null;
}

export interface TeammatePair {
  raceId: number;
  year: number;
  round: number;
  constructorId: number;
  driverIds: [number, number];
}

export type RaceView = RaceRow;

export interface DriverInfo {
  driverId: number;
  driverRef: string;
  code: string | null;
  number: number | null;
  forename: string;
  surname: string;
  fullName: string;
  dob: string | null;
  nationality: string | null;
  url: string | null;
}

export interface ConstructorInfo {
  constructorId: number;
  constructorRef: string;
  name: string;
  nationality: string | null;
  url: string | null;
}
