import { describe, it, expect } from 'vitest';
import { baseTables, createTestServices, pitStop } from '../helpers/fixtures';

const ARROW = 1;
const BOLT = 2;

describe('Constructor metrics', () => {
  describe('race performance', () => {
    it('counts wins on the best car per race', async () => {
      const { registry } = createTestServices();
      const result = await registry.calculate('constructor_win_rate', { constructor_id: ARROW, season: 2020 });

      expect(result).toEqual({
        metric_name: 'constructor_win_rate',
        value: 33.3,
        constructor_id: ARROW,
        constructor_name: 'Arrow Racing',
        season: 2020,
        metadata: { total_races: 3, wins: 1, win_percentage: 33.3 },
      });
    });

    it('counts 1-2 finishes', async () => {
      const { registry } = createTestServices();

      expect((await registry.calculate('constructor_race_wins', { constructor_id: ARROW })).value).toBe(2);
      expect((await registry.calculate('constructor_race_wins', { constructor_id: ARROW, season: 2020 })).value).toBe(1);

      const bolt = await registry.calculate('constructor_race_wins', { constructor_id: BOLT });
      expect(bolt.value).toBe(1);
      expect(bolt.metadata).toEqual({ race_wins: 1, seasons_with_wins: [2020] });

      const none = await registry.calculate('constructor_race_wins', { constructor_id: BOLT, season: 2021 });
      expect(none.value).toBe(0);
      expect(none.metadata).toEqual({ note: 'No 1-2 finishes achieved' });
    });

    it('counts podium lockouts', async () => {
      const { registry } = createTestServices();
      const result = await registry.calculate('constructor_podium_lockouts', { constructor_id: BOLT });

      expect(result.value).toBe(2);
      expect(result.metadata).toEqual({ podium_lockouts: 2, full_podium_lockouts: 0, seasons_with_lockouts: [2020] });
    });

    it('counts front row lockouts from qualifying', async () => {
      const { registry } = createTestServices();
      const result = await registry.calculate('constructor_front_row_lockouts', { constructor_id: ARROW, season: 2020 });

      expect(result.value).toBe(2);
      expect(result.metadata).toEqual({ total_races: 3, front_row_lockouts: 2 });
    });

    it('averages the best finish per race', async () => {
      const { registry } = createTestServices();
      const result = await registry.calculate('constructor_average_finish_position', {
        constructor_id: ARROW,
        season: 2020,
      });

      expect(result.value).toBe(2);
      expect(result.metadata).toEqual({ total_races: 3, best_finish: 1, races_finished: 5 });
    });
  });

  describe('championship', () => {
    it('returns the final standing of a season', async () => {
      const { registry } = createTestServices();
      const result = await registry.calculate('constructor_championship_position', {
        constructor_id: ARROW,
        season: 2020,
      });

      expect(result.value).toBe(2);
      expect(result.metadata).toEqual({ season: 2020, points: 88, wins: 1 });
    });

    it('returns the best standing across seasons', async () => {
      const { registry } = createTestServices();
      const result = await registry.calculate('constructor_championship_position', { constructor_id: ARROW });

      expect(result.value).toBe(1);
      expect(result.metadata).toEqual({
        best_season: 2021,
        positions_by_year: { '2020': 2, '2021': 1 },
        championships: 1,
      });
    });

    it('counts titles', async () => {
      const { registry } = createTestServices();
      const result = await registry.calculate('constructor_championship_wins', { constructor_id: ARROW });

      expect(result.value).toBe(1);
      expect(result.metadata).toEqual({ championship_years: [2021], last_championship: 2021 });
    });

    it('sums points per season', async () => {
      const { registry } = createTestServices();

      const season = await registry.calculate('constructor_points_per_season', { constructor_id: ARROW, season: 2020 });
      expect(season.value).toBe(88);
      expect(season.metadata).toEqual({ season: 2020, races: 3, points_per_race: 29.33 });

      const career = await registry.calculate('constructor_points_per_season', { constructor_id: ARROW });
      expect(career.value).toBe(65.5);
      expect(career.metadata).toMatchObject({ seasons_count: 2, total_points: 131, best_season: 88 });
    });
  });

  describe('qualifying', () => {
    it('computes the pole rate on the best car', async () => {
      const { registry } = createTestServices();
      const result = await registry.calculate('constructor_pole_position_rate', { constructor_id: ARROW, season: 2020 });

      expect(result.value).toBe(100);
    });

    it('rates qualifying consistency once there are enough races', async () => {
      const { registry } = createTestServices();

      const result = await registry.calculate('constructor_qualifying_consistency', { constructor_id: BOLT, season: 2020 });
      expect(result.value).toBe(0.58);
      expect(result.metadata).toEqual({
        total_races: 3,
        position_range: 1,
        avg_position: 2.67,
        consistency_rating: 'High',
      });

      const short = await registry.calculate('constructor_qualifying_consistency', { constructor_id: BOLT, season: 2021 });
      expect(short.value).toBeNull();
    });
  });

  describe('reliability', () => {
    it('computes the DNF rate over car entries', async () => {
      const { registry } = createTestServices();
      const result = await registry.calculate('constructor_dnf_rate', { constructor_id: ARROW, season: 2020 });

      expect(result.value).toBe(16.7);
      expect(result.metadata).toEqual({ total_entries: 6, dnfs: 1, finishes: 5, finish_rate: 83.3 });
    });

    it('separates mechanical failures from other retirements', async () => {
      const { registry } = createTestServices();

      const bolt = await registry.calculate('constructor_mechanical_failure_rate', { constructor_id: BOLT, season: 2020 });
      expect(bolt.value).toBe(16.7);
      expect(bolt.metadata).toEqual({
        total_entries: 6,
        mechanical_failures: 1,
        total_dnfs: 1,
        failure_breakdown: { engine: 1 },
      });

      const arrow = await registry.calculate('constructor_mechanical_failure_rate', { constructor_id: ARROW, season: 2020 });
      expect(arrow.value).toBe(0);
      expect(arrow.metadata).toEqual({
        total_entries: 6,
        mechanical_failures: 0,
        total_dnfs: 1,
        failure_breakdown: {},
      });
    });

    it('counts races where every car finished', async () => {
      const { registry } = createTestServices();
      const result = await registry.calculate('constructor_finish_rate', { constructor_id: ARROW, season: 2020 });

      expect(result.value).toBe(66.7);
      expect(result.metadata).toEqual({
        total_races: 3,
        both_cars_finish: 2,
        at_least_one_finish: 3,
        no_finishers: 0,
      });
    });
  });

  describe('pit stops', () => {
    it('averages racing stops and filters repairs', async () => {
      const { registry } = createTestServices();
      const result = await registry.calculate('constructor_average_pit_stop_time', { constructor_id: ARROW });

      expect(result.value).toBe(2.875);
      expect(result.metadata).toEqual({
        total_stops: 4,
        stops_before_filtering: 5,
        outliers_filtered: 1,
        fastest_stop: 2.5,
        slowest_stop: 3.2,
        seasons_analyzed: 1,
      });
    });

    it('locates the fastest stop', async () => {
      const { registry } = createTestServices();
      const result = await registry.calculate('constructor_fastest_pit_stop', { constructor_id: ARROW });

      expect(result.value).toBe(2.5);
      expect(result.metadata).toEqual({ race_id: 10, lap: 20, year: 2020, driver_id: 1, total_stops: 4 });
    });

    it('grades stop consistency by coefficient of variation', async () => {
      const { registry } = createTestServices();
      const result = await registry.calculate('constructor_pit_stop_consistency', { constructor_id: ARROW });

      expect(result.value).toBe(0.299);
      expect(result.metadata).toEqual({
        mean_time: 2.875,
        coefficient_of_variation: 10.4,
        total_stops: 4,
        consistency_grade: 'Average',
      });
    });

    it('counts sub three second stops over every timed stop', async () => {
      const { registry } = createTestServices();
      const result = await registry.calculate('constructor_sub_three_second_stops', { constructor_id: ARROW });

      expect(result.value).toBe(40);
      expect(result.metadata).toEqual({ sub_three_stops: 2, total_stops: 5, average_time: 15.3 });
    });

    it('averages stops per race', async () => {
      const { registry } = createTestServices();
      const result = await registry.calculate('constructor_average_pit_stops_per_race', { constructor_id: ARROW });

      expect(result.value).toBe(2.5);
      expect(result.metadata).toEqual({ total_races: 2, total_stops: 5, max_stops_in_race: 4, min_stops_in_race: 1 });
    });

    it('reports no result when every stop is an outlier', async () => {
      const tables = baseTables();
      tables.pit_stops = [pitStop(10, 3, 1, 22, 70000)];
      const { registry } = createTestServices(tables);

      const result = await registry.calculate('constructor_average_pit_stop_time', { constructor_id: BOLT });
      expect(result.value).toBeNull();
      expect(result.metadata).toEqual({ message: 'No valid pit stop data after filtering outliers' });
    });
  });

  describe('lap times', () => {
    it('averages lap times in seconds', async () => {
      const { registry } = createTestServices();
      const result = await registry.calculate('constructor_average_lap_time', { constructor_id: ARROW });

      expect(result.value).toBe(91);
      expect(result.metadata).toEqual({ total_laps: 3, fastest_lap: 90, slowest_lap: 92, races_analyzed: 1 });
    });

    it('locates the fastest lap', async () => {
      const { registry } = createTestServices();
      const result = await registry.calculate('constructor_fastest_lap', { constructor_id: ARROW });

      expect(result.value).toBe(90);
      expect(result.metadata).toEqual({ race_id: 10, lap: 1, year: 2020, driver_id: 1 });
    });

    it('needs at least ten laps for consistency', async () => {
      const { registry } = createTestServices();
      const result = await registry.calculate('constructor_lap_time_consistency', { constructor_id: ARROW });

      expect(result.value).toBeNull();
      expect(result.metadata).toEqual({ message: 'Insufficient lap time data for consistency analysis' });
    });

    it('compares race pace with the field average, faster is positive', async () => {
      const { registry } = createTestServices();

      expect((await registry.calculate('constructor_race_pace', { constructor_id: ARROW })).value).toBe(1.94);
      expect((await registry.calculate('constructor_race_pace', { constructor_id: BOLT })).value).toBe(-2.91);
    });
  });
});
