export const PLOT_TABLE = 'plots';

export const PLOT_FIELD_LIMITS = {
  title: 200,
  work: 100,
  status: 50,
} as const;

// Postgres SERIAL is a 4-byte signed integer; ids outside this range cannot exist.
export const PLOT_ID_MAX = 2_147_483_647;

export interface Plot {
  id: number;
  title: string;
  work: string;
  status: string;
  summary: string | null;
}

export type PlotInput = Omit<Plot, 'id'>;

export interface PlotRow {
  id: number;
  title: string;
  work: string;
  status: string;
  summary: string | null;
}

export const PLOT_COLUMNS = 'id, title, work, status, summary';

export const PLOT_SCHEMA_STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS ${PLOT_TABLE} (
    id      SERIAL PRIMARY KEY,
    title   VARCHAR(${PLOT_FIELD_LIMITS.title}) NOT NULL,
    work    VARCHAR(${PLOT_FIELD_LIMITS.work}) NOT NULL,
    status  VARCHAR(${PLOT_FIELD_LIMITS.status}) NOT NULL,
    summary TEXT
  )`,
  `CREATE INDEX IF NOT EXISTS ix_${PLOT_TABLE}_id ON ${PLOT_TABLE} (id)`,
];

export function isStorablePlotId(id: number): boolean {
  return Number.isSafeInteger(id) && id >= 1 && id <= PLOT_ID_MAX;
}

export function rowToPlot(row: PlotRow): Plot {
  return {
    id: Number(row.id),
    title: row.title,
    work: row.work,
    status: row.status,
    summary: row.summary ?? null,
  };
}
