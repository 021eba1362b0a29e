import { buildPlotListQuery } from '../../src/services/plotQuery';

describe('buildPlotListQuery', () => {
  it('selects every plot ordered by id when no filter is set', () => {
    expect(buildPlotListQuery({})).toEqual({
      text: 'SELECT id, title, work, status, summary FROM plots ORDER BY id ASC',
      values: [],
    });
  });

  it('binds a single filter as $1', () => {
    expect(buildPlotListQuery({ status: 'open' })).toEqual({
      text: 'SELECT id, title, work, status, summary FROM plots WHERE status = $1 ORDER BY id ASC',
      values: ['open'],
    });
  });

  it('joins all filters with AND and reuses the search parameter for title and summary', () => {
    expect(buildPlotListQuery({ work: 'A', status: 'open', q: 'dragon' })).toEqual({
      text:
        'SELECT id, title, work, status, summary FROM plots ' +
        'WHERE work = $1 AND status = $2 AND (title ILIKE $3 OR summary ILIKE $3) ORDER BY id ASC',
      values: ['A', 'open', '%dragon%'],
    });
  });

  it('passes wildcards in q through unescaped', () => {
    expect(buildPlotListQuery({ q: '50%_off' }).values).toEqual(['%50%_off%']);
  });

  it('skips empty strings', () => {
    expect(buildPlotListQuery({ work: '', q: 'tide' })).toEqual({
      text: 'SELECT id, title, work, status, summary FROM plots WHERE (title ILIKE $1 OR summary ILIKE $1) ORDER BY id ASC',
      values: ['%tide%'],
    });
  });
});
