import { NextFunction, Request, Response } from 'express';
import { parseInput } from '../middleware/validate';
import PlotService from '../services/plotService';
import ApiError from '../utils/ApiError';
import { PlotCreateInput, plotIdParamSchema, plotListQuerySchema } from '../validators/plot';

// Body has already been replaced by validateBody with the parsed payload.
type PlotBodyRequest = Request<Record<string, string>, unknown, PlotCreateInput>;

function getPlotService(req: Pick<Request, 'app'>): PlotService {
  const plotService: PlotService | undefined = req.app.get('plotService');
  if (!plotService) {
    throw new ApiError(500, 'Plot service not initialised');
  }
  return plotService;
}

export async function listPlots(req: Request, res: Response, next: NextFunction) {
  try {
    const filters = parseInput(plotListQuerySchema, req.query);
    const plots = await getPlotService(req).list(filters);
    res.status(200).json(plots);
  } catch (error) {
    next(error);
  }
}

export async function getPlot(req: Request, res: Response, next: NextFunction) {
  try {
    const { id } = parseInput(plotIdParamSchema, req.params);
    const plot = await getPlotService(req).get(id);
    res.status(200).json(plot);
  } catch (error) {
    next(error);
  }
}

export async function createPlot(req: PlotBodyRequest, res: Response, next: NextFunction) {
  try {
    const plot = await getPlotService(req).create(req.body);
    res.status(200).json(plot);
  } catch (error) {
    next(error);
  }
}

export async function updatePlot(req: PlotBodyRequest, res: Response, next: NextFunction) {
  try {
    const { id } = parseInput(plotIdParamSchema, req.params);
    const plot = await getPlotService(req).update(id, req.body);
    res.status(200).json(plot);
  } catch (error) {
    next(error);
  }
}

export async function deletePlot(req: Request, res: Response, next: NextFunction) {
  try {
    const { id } = parseInput(plotIdParamSchema, req.params);
    const result = await getPlotService(req).delete(id);
    res.status(200).json(result);
  } catch (error) {
    next(error);
  }
}

export function ping(_req: Request, res: Response) {
  res.status(200).json({ message: 'pong' });
}

export async function health(req: Request, res: Response, next: NextFunction) {
  try {
    const healthy = await getPlotService(req).isDatabaseReachable();
    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'ok' : 'unhealthy',
      database: healthy ? 'connected' : 'unreachable',
    });
  } catch (error) {
    next(error);
  }
}
