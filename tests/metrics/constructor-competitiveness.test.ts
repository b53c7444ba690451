import { describe, it, expect } from 'vitest';
import { baseTables, createTestServices, lapTime, pitStop, race, result } from '../helpers/fixtures';

const ARROW = 1;
const BOLT = 2;

/** Arrow driver 1, race 10: five laps from 95s down to 91s, then five at 90s */
function closingPaceTables() {
  const tables = baseTables();
  const times = [95000, 94000, 93000, 92000, 91000, 90000, 90000, 90000, 90000, 90000];
  tables.lap_times = times.map((ms, i) => lapTime(10, 1, i + 1, ms));
  return tables;
}

describe('Constructor competitiveness metrics', () => {
  describe('season dominance', () => {
    it('weights wins, points share and final position', async () => {
      const { registry } = createTestServices();

      const bolt = await registry.calculate('constructor_season_dominance', { constructor_id: BOLT, season: 2020 });
      expect(bolt.value).toBe(77.7);
      expect(bolt.metadata).toEqual({
        season: 2020,
        final_position: 1,
        total_points: 98,
        wins: 2,
        win_rate: 66.7,
        championship_margin: 10,
        dominance_level: 'Very Strong',
      });

      const arrow = await registry.calculate('constructor_season_dominance', { constructor_id: ARROW, season: 2020 });
      expect(arrow.value).toBe(56.7);
      expect(arrow.metadata).toMatchObject({ final_position: 2, championship_margin: -10, dominance_level: 'Competitive' });
    });

    it('needs a season', async () => {
      const { registry } = createTestServices();
      const result = await registry.calculate('constructor_season_dominance', { constructor_id: BOLT });

      expect(result.value).toBeNull();
      expect(result.metadata).toEqual({ message: 'Season parameter required for dominance calculation' });
    });
  });

  describe('points consistency', () => {
    it('scores the spread of points per race', async () => {
      const { registry } = createTestServices();
      const result = await registry.calculate('constructor_consistency_index', { constructor_id: ARROW });

      expect(result.value).toBe(59.3);
      expect(result.metadata).toEqual({
        total_races: 4,
        mean_points: 32.75,
        std_points: 13.33,
        points_scoring_rate: 100,
        consistency_level: 'Moderately Consistent',
      });
    });

    it('needs three races', async () => {
      const { registry } = createTestServices();
      const result = await registry.calculate('constructor_consistency_index', { constructor_id: BOLT, season: 2021 });

      expect(result.value).toBeNull();
      expect(result.metadata).toEqual({ message: 'Insufficient races for consistency calculation' });
    });

    it('reports quartiles of points per race', async () => {
      const { registry } = createTestServices();
      const result = await registry.calculate('constructor_performance_consistency', { constructor_id: BOLT });

      expect(result.value).toBe(73.2);
      expect(result.metadata).toEqual({
        total_races: 4,
        performance_median: 33.5,
        performance_iqr: 16.75,
        performance_range: 28,
        high_performance_races: 1,
        consistent_races: 2,
        low_performance_races: 1,
      });
    });
  });

  describe('competitiveness rating', () => {
    it('counts podiums and wins per car', async () => {
      const { registry } = createTestServices();
      const result = await registry.calculate('constructor_competitiveness_rating', { constructor_id: ARROW, season: 2020 });

      expect(result.value).toBe(98.3);
      expect(result.metadata).toEqual({
        total_races: 3,
        avg_points_per_race: 29.33,
        best_finish: 1,
        podiums: 4,
        wins: 1,
        category: 'Dominant',
      });
    });

    it('rates a winless season lower', async () => {
      const { registry } = createTestServices();
      const result = await registry.calculate('constructor_competitiveness_rating', { constructor_id: BOLT, season: 2021 });

      expect(result.value).toBe(82.5);
      expect(result.metadata).toMatchObject({ best_finish: 3, podiums: 1, wins: 0, category: 'Very Competitive' });
    });
  });

  describe('race win streak', () => {
    it('finds consecutive wins in race order', async () => {
      const { registry } = createTestServices();

      const bolt = await registry.calculate('constructor_race_win_streak', { constructor_id: BOLT });
      expect(bolt.value).toBe(2);
      expect(bolt.metadata).toEqual({ total_races: 4, total_wins: 2, win_streaks: [2], number_of_streaks: 1 });

      const arrow = await registry.calculate('constructor_race_win_streak', { constructor_id: ARROW });
      expect(arrow.value).toBe(1);
      expect(arrow.metadata).toEqual({ total_races: 4, total_wins: 2, win_streaks: [1, 1], number_of_streaks: 2 });
    });
  });

  describe('seasonal improvement', () => {
    it('fits a trend through points per round', async () => {
      const tables = baseTables();
      const points = [5, 10, 10, 15, 20];
      points.forEach((p, i) => {
        tables.races.push(race(30 + i, 2022, i + 1, `Round ${i + 1}`));
        tables.results.push(result({ resultId: 300 + i, raceId: 30 + i, driverId: 1, constructorId: ARROW, position: 5, points: p }));
      });
      const { registry } = createTestServices(tables);

      const trend = await registry.calculate('constructor_seasonal_improvement', { constructor_id: ARROW, season: 2022 });
      expect(trend.value).toBe(3.5);
      expect(trend.metadata).toEqual({
        season: 2022,
        total_races: 5,
        trend_category: 'Strong Improvement',
        first_half_avg: 7.5,
        second_half_avg: 15,
        improvement_percentage: 100,
      });
    });

    it('needs five races in the season', async () => {
      const { registry } = createTestServices();
      const result = await registry.calculate('constructor_seasonal_improvement', { constructor_id: ARROW, season: 2020 });

      expect(result.value).toBeNull();
      expect(result.metadata).toEqual({ message: 'Insufficient data for trend analysis' });
    });
  });

  describe('qualifying advantage', () => {
    it('compares the best car with the grid average', async () => {
      const { registry } = createTestServices();

      const arrow = await registry.calculate('constructor_qualifying_advantage', { constructor_id: ARROW, season: 2020 });
      expect(arrow.value).toBe(1.5);
      expect(arrow.metadata).toEqual({
        total_races_compared: 3,
        performance_level: 'Average',
        best_advantage: 1.5,
        worst_advantage: 1.5,
      });

      const bolt = await registry.calculate('constructor_qualifying_advantage', { constructor_id: BOLT });
      expect(bolt.value).toBe(-0.25);
      expect(bolt.metadata).toMatchObject({ total_races_compared: 4, best_advantage: 0.5, worst_advantage: -0.5 });
    });
  });

  describe('average reliability', () => {
    it('averages finish rates over seasons', async () => {
      const { registry } = createTestServices();
      const result = await registry.calculate('constructor_average_reliability', { constructor_id: ARROW });

      expect(result.value).toBe(91.7);
      expect(result.metadata).toEqual({
        seasons_analyzed: 2,
        reliability_by_year: { '2020': 83.3, '2021': 100 },
        best_season: 2021,
        worst_season: 2020,
      });
    });

    it('reports one season directly', async () => {
      const { registry } = createTestServices();
      const result = await registry.calculate('constructor_average_reliability', { constructor_id: ARROW, season: 2021 });

      expect(result.value).toBe(100);
      expect(result.metadata).toEqual({ season: 2021, total_entries: 2, finishes: 2 });
    });
  });

  describe('pit stop efficiency and strategy', () => {
    it('compares stops with the race average', async () => {
      const { registry } = createTestServices();

      const bolt = await registry.calculate('constructor_pit_stop_efficiency', { constructor_id: BOLT });
      expect(bolt.value).toBe(82.9);
      expect(bolt.metadata).toEqual({
        interpretation: 'Positive values indicate faster than average',
        constructor_avg: 2.6,
        field_avg: 13.183,
        races_analyzed: 1,
      });

      const arrow = await registry.calculate('constructor_pit_stop_efficiency', { constructor_id: ARROW });
      expect(arrow.value).toBe(-16.6);
      expect(arrow.metadata).toMatchObject({ constructor_avg: 15.3, races_analyzed: 2 });
    });

    it('counts stops within 120% of the team average', async () => {
      const { registry } = createTestServices();
      const result = await registry.calculate('constructor_pit_stop_reliability', { constructor_id: ARROW });

      expect(result.value).toBe(100);
      expect(result.metadata).toEqual({
        successful_stops: 4,
        total_stops: 4,
        problematic_stops: 0,
        threshold_seconds: 3.45,
        average_pit_stop_time: 2.875,
        threshold_multiplier: 1.2,
        longest_stop: 3.2,
        stops_before_filtering: 5,
        outliers_filtered: 1,
      });
    });

    it('measures how stops spread over race phases', async () => {
      const { registry } = createTestServices();
      const result = await registry.calculate('constructor_pit_stop_strategic_success', { constructor_id: ARROW });

      expect(result.value).toBe(1.05);
      expect(result.metadata).toEqual({
        races_analyzed: 2,
        avg_early_stops: 0,
        avg_mid_stops: 2,
        avg_late_stops: 0.5,
        interpretation: 'Higher values indicate more strategic variety',
      });
    });

    it('fits a trend through race averages within a season', async () => {
      const tables = baseTables();
      tables.pit_stops = [pitStop(10, 1, 1, 20, 3000), pitStop(11, 1, 1, 20, 2800), pitStop(12, 1, 1, 20, 2600)];
      const { registry } = createTestServices(tables);

      const result = await registry.calculate('constructor_pit_stop_time_improvement', { constructor_id: ARROW, season: 2020 });
      expect(result.value).toBe(-0.2);
      expect(result.metadata).toEqual({
        season: 2020,
        races_analyzed: 3,
        early_season_avg: 2.8,
        late_season_avg: 2.8,
        interpretation: 'Negative values indicate improvement over time',
      });

      const anySeason = await registry.calculate('constructor_pit_stop_time_improvement', { constructor_id: ARROW });
      expect(anySeason.metadata).toEqual({ message: 'Season parameter required for trend analysis' });
    });

    it('needs three races for a stop trend', async () => {
      const { registry } = createTestServices();
      const result = await registry.calculate('constructor_pit_stop_time_improvement', { constructor_id: ARROW, season: 2020 });

      expect(result.value).toBeNull();
      expect(result.metadata).toEqual({ message: 'Insufficient races for trend analysis' });
    });
  });

  describe('lap pace', () => {
    it('finds the constructor with the fastest average lap', async () => {
      const { registry } = createTestServices();

      const arrow = await registry.calculate('constructor_pace_dominance', { constructor_id: ARROW });
      expect(arrow.value).toBe(100);
      expect(arrow.metadata).toEqual({ dominant_races: 1, total_races: 1, races_analyzed: 1 });

      expect((await registry.calculate('constructor_pace_dominance', { constructor_id: BOLT })).value).toBe(0);
    });

    it('counts laps within 103% of the fastest lap', async () => {
      const { registry } = createTestServices();

      expect((await registry.calculate('constructor_competitive_lap_rate', { constructor_id: ARROW })).value).toBe(100);

      const bolt = await registry.calculate('constructor_competitive_lap_rate', { constructor_id: BOLT });
      expect(bolt.value).toBe(0);
      expect(bolt.metadata).toEqual({
        competitive_laps: 0,
        total_laps: 2,
        races_analyzed: 1,
        threshold: '103% of fastest lap',
      });
    });

    it('compares the opening and closing laps of a race', async () => {
      const { registry } = createTestServices(closingPaceTables());
      const result = await registry.calculate('constructor_lap_time_improvement', { constructor_id: ARROW });

      expect(result.value).toBe(3);
      expect(result.metadata).toEqual({
        races_analyzed: 1,
        positive_improvement_races: 1,
        best_race_improvement: 3,
        worst_race_degradation: 3,
        interpretation: 'Positive values indicate improvement during races',
      });
    });

    it('needs ten laps in a race', async () => {
      const { registry } = createTestServices();

      const improvement = await registry.calculate('constructor_lap_time_improvement', { constructor_id: ARROW });
      expect(improvement.metadata).toEqual({ message: 'Insufficient data for improvement analysis' });

      const variability = await registry.calculate('constructor_lap_time_variability', { constructor_id: ARROW });
      expect(variability.metadata).toEqual({ message: 'Insufficient data for variability analysis' });
    });

    it('measures lap time variation per race', async () => {
      const { registry } = createTestServices(closingPaceTables());
      const result = await registry.calculate('constructor_lap_time_variability', { constructor_id: ARROW });

      expect(result.value).toBe(2.08);
      expect(result.metadata).toEqual({
        races_analyzed: 1,
        most_consistent_race: 2.08,
        least_consistent_race: 2.08,
        variability_std: 0,
        interpretation: 'Lower values indicate more consistent performance',
      });
    });

    it('subtracts the fuel still aboard from each lap', async () => {
      const { registry } = createTestServices(closingPaceTables());
      const result = await registry.calculate('constructor_fuel_adjusted_pace', { constructor_id: ARROW });

      expect(result.value).toBe(91.211);
      expect(result.metadata).toEqual({
        total_adjusted_laps: 10,
        fuel_effect_assumption: '0.053 seconds per lap',
        raw_average: 91.5,
        adjustment_difference: -0.289,
        races_analyzed: 1,
      });
    });

    it('fits lap time degradation over a stint', async () => {
      const tables = baseTables();
      tables.lap_times = Array.from({ length: 20 }, (_, i) => lapTime(10, 1, i + 1, 90000 + 100 * i));
      const { registry } = createTestServices(tables);

      const result = await registry.calculate('constructor_tire_management', { constructor_id: ARROW });
      expect(result.value).toBe(1);
      expect(result.metadata).toEqual({
        races_analyzed: 1,
        best_tire_management: 1,
        worst_tire_management: 1,
        consistency: 0,
        interpretation: 'Lower values indicate better tire management',
      });
    });
  });
});
