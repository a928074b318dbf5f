import {ScanSettings} from '../domain';
import {AppEffects} from '../pure/effects';
import {
  HttpResult,
  handleDeleteScan,
  handleListScans,
  handleScan,
  handleTagSummary,
  handleUpdateScan,
  requestErrorResult,
} from './handlers';
import express, {ErrorRequestHandler, Express, NextFunction, Request, Response} from 'express';

function send(res: Response): (result: HttpResult) => void {
  return (result) => {
    if (result.body === undefined) {
      res.status(result.status).end();
    } else {
      res.status(result.status).json(result.body);
    }
  };
}

type Handler = (req: Request) => (appEffects: AppEffects) => Promise<HttpResult>;

function route(appEffects: AppEffects, handler: Handler) {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req)(appEffects).then(send(res)).catch(next);
  };
}

// express.json() rejects bodies with errors carrying an HTTP status (400, 413, 415)
const bodyErrors: ErrorRequestHandler = (err, req, res, next) => {
  send(res)(requestErrorResult(err));
};

/**
 * Build the scan API. Listening is left to the caller.
 */
export function createServer(appEffects: AppEffects, settings: ScanSettings): Express {
  const app = express();

  // Parse JSON bodies
  app.use(express.json());

  app.get('/health', (req, res) => {
    res.json({ok: true});
  });

  app.post('/scan', route(appEffects, req => {
    console.log(`📨 Scan received: ${JSON.stringify(req.body?.barcode ?? null)}`);
    return handleScan(req.body, settings);
  }));

  app.get('/scans', route(appEffects, req => handleListScans(req.query)));
  app.patch('/scans/:id', route(appEffects, req => handleUpdateScan(req.params.id, req.body)));
  app.delete('/scans/:id', route(appEffects, req => handleDeleteScan(req.params.id)));

  app.get('/tag-summary', route(appEffects, req => handleTagSummary(req.query, false)));
  app.get('/tag-summary/by-store', route(appEffects, req => handleTagSummary(req.query, true)));

  app.use(bodyErrors);

  return app;
}
