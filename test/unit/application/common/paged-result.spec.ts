import { toPagedResult } from '@application/common';

describe('toPagedResult', () => {
  it('should describe the first of several pages', () => {
    const page = toPagedResult(['a', 'b'], 5, { page: 0, pageSize: 2 });

    expect(page).toEqual({
      items: ['a', 'b'],
      totalCount: 5,
      page: 0,
      pageSize: 2,
      totalPages: 3,
      hasNextPage: true,
      hasPreviousPage: false,
    });
  });

  it('should describe the last page', () => {
    const page = toPagedResult(['e'], 5, { page: 2, pageSize: 2 });

    expect(page.hasNextPage).toBe(false);
    expect(page.hasPreviousPage).toBe(true);
  });

  it('should report no pages for an empty set', () => {
    const page = toPagedResult([], 0, { page: 0, pageSize: 25 });

    expect(page.totalPages).toBe(0);
    expect(page.hasNextPage).toBe(false);
    expect(page.hasPreviousPage).toBe(false);
  });
});
