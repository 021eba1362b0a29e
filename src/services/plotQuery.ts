import { PLOT_COLUMNS, PLOT_TABLE } from '../models/Plot';

export interface PlotFilters {
  work?: string;
  status?: string;
  q?: string;
}

export interface SqlQuery {
  text: string;
  values: unknown[];
}

/**
 * Builds the list statement. Each filter that is present contributes one
 * predicate; the predicates are joined with AND and bound as positional
 * parameters in the order they were added.
 */
export function buildPlotListQuery(filters: PlotFilters): SqlQuery {
  const values: unknown[] = [];
  const conditions: string[] = [];

  const bind = (value: unknown): string => {
    values.push(value);
    return `$${values.length}`;
  };

  if (filters.work) {
    conditions.push(`work = ${bind(filters.work)}`);
  }

  if (filters.status) {
    conditions.push(`status = ${bind(filters.status)}`);
  }

  if (filters.q) {
    const pattern = bind(`%${filters.q}%`);
    conditions.push(`(title ILIKE ${pattern} OR summary ILIKE ${pattern})`);
  }

  const where = conditions.length ? ` WHERE ${conditions.join(' AND ')}` : '';

  return {
    text: `SELECT ${PLOT_COLUMNS} FROM ${PLOT_TABLE}${where} ORDER BY id ASC`,
    values,
  };
}
