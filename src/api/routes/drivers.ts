import { Router, Request, Response } from 'express';
import { DriverInfo, DriverResultView } from '../../types/views';
import { ViewBuilder } from '../../views/view-builder';
import { sendError, sendServiceError } from '../http-errors';
import { booleanQuery, optionalLimitQuery, optionalSeasonQuery, parsePositiveId, yearRange } from '../params';

function serializeDriver(driver: DriverInfo) {
  return {
    driver_id: driver.driverId,
    driver_ref: driver.driverRef,
    code: driver.code,
    number: driver.number,
    forename: driver.forename,
    surname: driver.surname,
    full_name: driver.fullName,
    dob: driver.dob,
    nationality: driver.nationality,
    url: driver.url,
  };
}

function serializeRace(result: DriverResultView) {
  return {
    race_id: result.raceId,
    year: result.year,
    round: result.round,
    race_name: result.raceName,
    date: result.date,
    constructor_id: result.constructorId,
    grid: result.grid,
    position: result.position,
    position_text: result.positionText,
    points: result.points,
    laps: result.laps,
  };
}

export function createDriverRoutes(views: ViewBuilder): Router {
  const router = Router();

  router.get('/', async (req: Request, res: Response) => {
    try {
      const { startYear, endYear } = yearRange(req.query);
      const activeOnly = booleanQuery(req.query, 'active_only');

      let drivers = await views.getDrivers();
      if (activeOnly || startYear !== null || endYear !== null) {
        const active = new Set(await views.getActiveDriverIds(startYear, endYear));
        drivers = drivers.filter(d => active.has(d.driverId));
      }

      res.status(200).json({
        drivers: drivers.map(serializeDriver),
        count: drivers.length,
      });
    } catch (err) {
      sendServiceError(res, err, { route: 'drivers_list' });
    }
  });

  router.get('/search/:query', async (req: Request, res: Response) => {
    try {
      const drivers = await views.searchDrivers(req.params.query);
      res.status(200).json({
        query: req.params.query,
        drivers: drivers.map(serializeDriver),
        count: drivers.length,
      });
    } catch (err) {
      sendServiceError(res, err, { route: 'drivers_search' });
    }
  });

  router.get('/:driver_id', async (req: Request, res: Response) => {
    try {
      const driverId = parsePositiveId(req.params.driver_id, 'driver_id');
      const driver = await views.getDriver(driverId);
      if (!driver) {
        sendError(res, 404, { error: 'not_found', reason: `Driver ${driverId} not found` });
        return;
      }
      res.status(200).json(serializeDriver(driver));
    } catch (err) {
      sendServiceError(res, err, { route: 'driver_get' });
    }
  });

  router.get('/:driver_id/races', async (req: Request, res: Response) => {
    try {
      const driverId = parsePositiveId(req.params.driver_id, 'driver_id');
      const season = optionalSeasonQuery(req.query, 'season');
      const limit = optionalLimitQuery(req.query);

      const driver = await views.getDriver(driverId);
      if (!driver) {
        sendError(res, 404, { error: 'not_found', reason: `Driver ${driverId} not found` });
        return;
      }

      const results = await views.getDriverResults({ driverId, season });
      const races = limit === null ? results : results.slice(-limit);

      res.status(200).json({
        driver_id: driverId,
        driver_name: driver.fullName,
        season,
        races: races.map(serializeRace),
        count: races.length,
      });
    } catch (err) {
      sendServiceError(res, err, { route: 'driver_races' });
    }
  });

  return router;
}
