import { DEFAULT_PAGE_SIZE, paginatedFetch } from '../../shared/paginated-fetch';

function pagedSource(total: number) {
  const rows = Array.from({ length: total }, (_, i) => i + 1);
  return jest.fn((offset: number, limit: number) =>
    Promise.resolve(rows.slice(offset, offset + limit))
  );
}

describe('paginatedFetch', () => {
  it('concatenates pages until a short page', async () => {
    const fetchPage = pagedSource(5);

    const rows = await paginatedFetch(fetchPage, 2);

    expect(rows).toEqual([1, 2, 3, 4, 5]);
    expect(fetchPage).toHaveBeenCalledTimes(3);
    expect(fetchPage.mock.calls).toEqual([
      [0, 2],
      [2, 2],
      [4, 2],
    ]);
  });

  it('asks for one extra empty page when the total is a multiple of the page size', async () => {
    const fetchPage = pagedSource(4);

    const rows = await paginatedFetch(fetchPage, 2);

    expect(rows).toEqual([1, 2, 3, 4]);
    expect(fetchPage).toHaveBeenCalledTimes(3);
  });

  it('returns an empty list for an empty source', async () => {
    const fetchPage = pagedSource(0);

    await expect(paginatedFetch(fetchPage, 10)).resolves.toEqual([]);
    expect(fetchPage).toHaveBeenCalledTimes(1);
  });

  it('is not capped at a single page', async () => {
    const fetchPage = pagedSource(2500);

    const rows = await paginatedFetch(fetchPage);

    expect(rows).toHaveLength(2500);
    expect(fetchPage).toHaveBeenCalledWith(2000, DEFAULT_PAGE_SIZE);
  });

  it('rejects a non-positive page size', async () => {
    const fetchPage = pagedSource(3);

    await expect(paginatedFetch(fetchPage, 0)).rejects.toThrow(RangeError);
    await expect(paginatedFetch(fetchPage, 1.5)).rejects.toThrow(RangeError);
    expect(fetchPage).not.toHaveBeenCalled();
  });

  it('propagates a failing page', async () => {
    const fetchPage = jest
      .fn()
      .mockResolvedValueOnce([1, 2])
      .mockRejectedValueOnce(new Error('connection reset'));

    await expect(paginatedFetch(fetchPage, 2)).rejects.toThrow('connection reset');
  });
});
