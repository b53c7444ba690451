import { Router, Request, Response } from 'express';
import { ConstructorInfo, ConstructorResultView } from '../../types/views';
import { groupBy, sum } from '../../views/aggregate';
import { ViewBuilder } from '../../views/view-builder';
import { sendError, sendServiceError } from '../http-errors';
import { booleanQuery, optionalLimitQuery, optionalSeasonQuery, parsePositiveId, yearRange } from '../params';

function serializeConstructor(constructor: ConstructorInfo) {
  return {
    constructor_id: constructor.constructorId,
    constructor_ref: constructor.constructorRef,
    name: constructor.name,
    nationality: constructor.nationality,
    url: constructor.url,
  };
}

/** One entry per race, with every car the constructor entered */
function serializeRaces(results: readonly ConstructorResultView[]) {
  return [...groupBy(results, r => r.raceId).values()].map(entries => {
    const first = entries[0];
    return {
      race_id: first.raceId,
      year: first.year,
      round: first.round,
      race_name: first.raceName,
      date: first.date,
      total_points: sum(entries.map(e => e.points)),
      entries: entries.map(e => ({
        driver_id: e.driverId,
        grid: e.grid,
        position: e.position,
        position_text: e.positionText,
        points: e.points,
      })),
    };
  });
}

export function createConstructorRoutes(views: ViewBuilder): Router {
  const router = Router();

  router.get('/', async (req: Request, res: Response) => {
    try {
      const { startYear, endYear } = yearRange(req.query);
      const activeOnly = booleanQuery(req.query, 'active_only');

      let constructors = await views.getConstructors();
      if (activeOnly || startYear !== null || endYear !== null) {
        const active = new Set(await views.getActiveConstructorIds(startYear, endYear));
        constructors = constructors.filter(c => active.has(c.constructorId));
      }

      res.status(200).json({
        constructors: constructors.map(serializeConstructor),
        count: constructors.length,
      });
    } catch (err) {
      sendServiceError(res, err, { route: 'constructors_list' });
    }
  });

  router.get('/search/:query', async (req: Request, res: Response) => {
    try {
      const constructors = await views.searchConstructors(req.params.query);
      res.status(200).json({
        query: req.params.query,
        constructors: constructors.map(serializeConstructor),
        count: constructors.length,
      });
    } catch (err) {
      sendServiceError(res, err, { route: 'constructors_search' });
    }
  });

  router.get('/:constructor_id', async (req: Request, res: Response) => {
    try {
      const constructorId = parsePositiveId(req.params.constructor_id, 'constructor_id');
      const team = await views.getConstructor(constructorId);
      if (!team) {
        sendError(res, 404, { error: 'not_found', reason: `Constructor ${constructorId} not found` });
        return;
      }
      res.status(200).json(serializeConstructor(team));
    } catch (err) {
      sendServiceError(res, err, { route: 'constructor_get' });
    }
  });

  router.get('/:constructor_id/races', async (req: Request, res: Response) => {
    try {
      const constructorId = parsePositiveId(req.params.constructor_id, 'constructor_id');
      const season = optionalSeasonQuery(req.query, 'season');
      const limit = optionalLimitQuery(req.query);

      const team = await views.getConstructor(constructorId);
      if (!team) {
        sendError(res, 404, { error: 'not_found', reason: `Constructor ${constructorId} not found` });
        return;
      }

      const races = serializeRaces(await views.getConstructorResults({ constructorId, season }));
      const selected = limit === null ? races : races.slice(-limit);

      res.status(200).json({
        constructor_id: constructorId,
        constructor_name: team.name,
        season,
        races: selected,
        count: selected.length,
      });
    } catch (err) {
      sendServiceError(res, err, { route: 'constructor_races' });
    }
  });

  return router;
}
