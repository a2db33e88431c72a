import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import type { PlannerConfig } from './config';
import type { PathResult } from './types';
import { buildKillTable, createBattleRules } from './types';
import { findBestPath } from './search';
import { findBestLinearPath } from './linear';
import { parsePathRequest } from './validation';
import { MalformedInputError } from './errors';

export const LOG_PREFIX = '[PATH]';

const PLANNER_VERSION = '1.0';

/**
 * Solve one `POST /path` body. Request options override the configured
 * policies; supplied rules replace the stock kill table.
 */
export function createPathHandler(config: PlannerConfig) {
  return (req: Request, res: Response) => {
    try {
      const request = parsePathRequest(req.body, config.maxGroups);
      const { options } = request;
      const rules = createBattleRules({
        rounding: options.rounding ?? config.rounding,
        unmatched: options.unmatched ?? config.unmatched,
        ...(request.rules ? { killTable: buildKillTable(request.rules) } : {}),
      });
      const searchOptions = { rules, favoredTeam: options.favoredTeam ?? config.favoredTeam };
      const mode = options.mode ?? config.mode;

      const result: PathResult = mode === 'linear'
        ? findBestLinearPath(request.groups, searchOptions)
        : findBestPath(request.groups, searchOptions);

      console.log(
        `${LOG_PREFIX} ${mode} search over ${request.groups.length} groups: advantage ${result.advantage} in ${result.steps.length} steps (${result.stats.statesExplored} states)`
      );
      res.json(result);
    } catch (err) {
      if (err instanceof MalformedInputError) {
        res.status(400).json({ error: 'Malformed input', issues: err.issues });
        return;
      }
      throw err;
    }
  };
}

export function createApp(config: PlannerConfig): Express {
  const app = express();

  app.use(express.json());
  app.use(cors());

  /** Log every request with the [PATH] prefix for the log collector. */
  app.use((req: Request, _res: Response, next: NextFunction) => {
    console.log(`${LOG_PREFIX} ${req.method} ${req.path}`);
    next();
  });

  app.get('/', (_req: Request, res: Response) => {
    res.send('battle path planner');
  });

  app.get('/healthz', (_req: Request, res: Response) => {
    res.json({ status: 'OK' });
  });

  app.get('/info', createInfoHandler(config));

  app.post('/path', createPathHandler(config));

  app.use(errorHandler);

  return app;
}

export function createInfoHandler(config: PlannerConfig) {
  return (_req: Request, res: Response) => {
    res.json({
      name: config.name,
      version: PLANNER_VERSION,
      mode: config.mode,
      rounding: config.rounding,
      unmatched: config.unmatched,
    });
  };
}

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction) {
  console.error(`${LOG_PREFIX} Global error handler caught:`, err.message);
  res.status(500).json({
    error: 'Internal Server Error',
    message: err.message
  });
}
