import type { Logger } from 'pino';
import { Plot, PlotInput } from '../models/Plot';
import ApiError from '../utils/ApiError';
import { getLogger } from '../utils/logger';
import type { PlotFilters } from './plotQuery';
import type { PlotStore } from './plotStore';

export interface PlotDeletionResult {
  message: 'deleted';
  id: number;
}

interface PlotServiceOptions {
  store: PlotStore;
  logger?: Logger;
}

class PlotService {
  private store: PlotStore;

  private logger: Logger;

  constructor({ store, logger }: PlotServiceOptions) {
    this.store = store;
    this.logger = logger ?? getLogger({ module: 'plot-service' });
  }

  list(filters: PlotFilters): Promise<Plot[]> {
    return this.store.list(filters);
  }

  async get(id: number): Promise<Plot> {
    const plot = await this.store.findById(id);
    if (!plot) {
      throw ApiError.notFound('Plot');
    }
    return plot;
  }

  async create(input: PlotInput): Promise<Plot> {
    const plot = await this.store.create(input);
    this.logger.info({ plotId: plot.id }, 'plot created');
    return plot;
  }

  async update(id: number, input: PlotInput): Promise<Plot> {
    const plot = await this.store.replace(id, input);
    if (!plot) {
      throw ApiError.notFound('Plot');
    }
    this.logger.info({ plotId: plot.id }, 'plot updated');
    return plot;
  }

  async delete(id: number): Promise<PlotDeletionResult> {
    const deletedId = await this.store.remove(id);
    if (deletedId === null) {
      throw ApiError.notFound('Plot');
    }
    this.logger.info({ plotId: deletedId }, 'plot deleted');
    return { message: 'deleted', id: deletedId };
  }

  async isDatabaseReachable(): Promise<boolean> {
    try {
      await this.store.ping();
      return true;
    } catch (error) {
      this.logger.warn({ err: error }, 'database ping failed');
      return false;
    }
  }
}

export default PlotService;
