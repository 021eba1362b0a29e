import { Database, withConnection } from '../config/database';
import {
  PLOT_COLUMNS,
  PLOT_TABLE,
  Plot,
  PlotInput,
  PlotRow,
  isStorablePlotId,
  rowToPlot,
} from '../models/Plot';
import { PlotFilters, buildPlotListQuery } from './plotQuery';

/**
 * Persistence seam for plots. Lookups by id resolve to `null` when the row is
 * absent; deciding that this is an error belongs to the caller.
 */
export interface PlotStore {
  list(filters: PlotFilters): Promise<Plot[]>;
  findById(id: number): Promise<Plot | null>;
  create(input: PlotInput): Promise<Plot>;
  replace(id: number, input: PlotInput): Promise<Plot | null>;
  remove(id: number): Promise<number | null>;
  ping(): Promise<void>;
}

export class PostgresPlotStore implements PlotStore {
  private readonly database: Database;

  constructor(database: Database) {
    this.database = database;
  }

  async list(filters: PlotFilters): Promise<Plot[]> {
    const { text, values } = buildPlotListQuery(filters);
    const result = await withConnection(this.database, (client) => client.query<PlotRow>(text, values));
    return result.rows.map(rowToPlot);
  }

  async findById(id: number): Promise<Plot | null> {
    if (!isStorablePlotId(id)) {
      return null;
    }
    const result = await withConnection(this.database, (client) =>
      client.query<PlotRow>(`SELECT ${PLOT_COLUMNS} FROM ${PLOT_TABLE} WHERE id = $1`, [id])
    );
    const [row] = result.rows;
    return row ? rowToPlot(row) : null;
  }

  async create(input: PlotInput): Promise<Plot> {
    const result = await withConnection(this.database, (client) =>
      client.query<PlotRow>(
        `INSERT INTO ${PLOT_TABLE} (title, work, status, summary) VALUES ($1, $2, $3, $4) RETURNING ${PLOT_COLUMNS}`,
        [input.title, input.work, input.status, input.summary]
      )
    );
    const [row] = result.rows;
    if (!row) {
      throw new Error('INSERT into plots returned no row');
    }
    return rowToPlot(row);
  }

  async replace(id: number, input: PlotInput): Promise<Plot | null> {
    if (!isStorablePlotId(id)) {
      return null;
    }
    const result = await withConnection(this.database, (client) =>
      client.query<PlotRow>(
        `UPDATE ${PLOT_TABLE} SET title = $2, work = $3, status = $4, summary = $5 WHERE id = $1 RETURNING ${PLOT_COLUMNS}`,
        [id, input.title, input.work, input.status, input.summary]
      )
    );
    const [row] = result.rows;
    return row ? rowToPlot(row) : null;
  }

  async remove(id: number): Promise<number | null> {
    if (!isStorablePlotId(id)) {
      return null;
    }
    const result = await withConnection(this.database, (client) =>
      client.query<Pick<PlotRow, 'id'>>(`DELETE FROM ${PLOT_TABLE} WHERE id = $1 RETURNING id`, [id])
    );
    const [row] = result.rows;
    return row ? Number(row.id) : null;
  }

  async ping(): Promise<void> {
    await withConnection(this.database, (client) => client.query('SELECT 1'));
  }
}
