import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ScheduleService } from '../../core/schedule/ScheduleService.js';
import { GridParser } from '../../core/calendar/GridParser.js';
import type { Grid } from '../../core/calendar/types.js';
import type { GridSourcePort } from '../../ports/GridSourcePort.js';
import { SheetFetchError } from '../../utils/errors.js';

const JULY: Grid = [
  ['ИЮЛЬ'],
  ['', '1', '2', '3'],
  ['A', 'x', 'y', ''],
  ['B', '', '', 'z'],
];

function createSource(grid: Grid = JULY) {
  const fetchGrid = vi.fn<() => Promise<Grid>>().mockResolvedValue(grid);
  const source: GridSourcePort = {
    fetchGrid,
    isConnected: () => fetchGrid.mock.calls.length > 0,
    describe: () => 'fake',
  };
  return { source, fetchGrid };
}

describe('ScheduleService', () => {
  let clock: number;
  const now = () => clock;

  beforeEach(() => {
    clock = 1_000_000;
  });

  it('filters parsed events by date range', async () => {
    const { source } = createSource();
    const service = new ScheduleService(source, new GridParser(), { ttlSeconds: 60, now });

    await expect(service.getEvents({ startDate: '2025-07-02', endDate: '2025-07-03' })).resolves.toEqual([
      { project: 'A', date: '2025-07-02', activity: 'y' },
      { project: 'B', date: '2025-07-03', activity: 'z' },
    ]);
    await expect(service.getEventsForDay('2025-07-01')).resolves.toEqual([
      { project: 'A', date: '2025-07-01', activity: 'x' },
    ]);
  });

  it('serves from cache until the TTL expires', async () => {
    const { source, fetchGrid } = createSource();
    const service = new ScheduleService(source, new GridParser(), { ttlSeconds: 60, now });

    await service.getEvents();
    clock += 59_000;
    await service.getEvents();
    expect(fetchGrid).toHaveBeenCalledTimes(1);

    clock += 1_000;
    await service.getEvents();
    expect(fetchGrid).toHaveBeenCalledTimes(2);
  });

  it('does not cache with a zero TTL', async () => {
    const { source, fetchGrid } = createSource();
    const service = new ScheduleService(source, new GridParser(), { ttlSeconds: 0, now });

    await service.getEvents();
    await service.getEvents();
    expect(fetchGrid).toHaveBeenCalledTimes(2);
  });

  it('shares a fetch between concurrent callers', async () => {
    const { source, fetchGrid } = createSource();
    const service = new ScheduleService(source, new GridParser(), { ttlSeconds: 60, now });

    const [first, second] = await Promise.all([service.getEvents(), service.getEvents()]);
    expect(fetchGrid).toHaveBeenCalledTimes(1);
    expect(first).toEqual(second);
  });

  it('returns copies that callers cannot use to alter the cache', async () => {
    const { source } = createSource();
    const service = new ScheduleService(source, new GridParser(), { ttlSeconds: 60, now });

    const events = await service.getEvents();
    events.length = 0;
    await expect(service.getEvents()).resolves.toHaveLength(3);
  });

  it('refreshEvents bypasses the cache and returns everything', async () => {
    const { source, fetchGrid } = createSource();
    const service = new ScheduleService(source, new GridParser(), { ttlSeconds: 60, now });

    await service.getEvents();
    const refreshed = await service.refreshEvents();
    expect(fetchGrid).toHaveBeenCalledTimes(2);
    expect(refreshed).toHaveLength(3);
  });

  it('propagates source failures and keeps the previous cache', async () => {
    const { source, fetchGrid } = createSource();
    const service = new ScheduleService(source, new GridParser(), { ttlSeconds: 60, now });

    await service.getEvents();
    fetchGrid.mockRejectedValueOnce(new SheetFetchError('boom'));
    await expect(service.refreshEvents()).rejects.toBeInstanceOf(SheetFetchError);

    await expect(service.getEvents()).resolves.toHaveLength(3);
    expect(fetchGrid).toHaveBeenCalledTimes(2);
  });

  it('retries after a failed first load', async () => {
    const { source, fetchGrid } = createSource();
    fetchGrid.mockRejectedValueOnce(new SheetFetchError('boom'));
    const service = new ScheduleService(source, new GridParser(), { ttlSeconds: 60, now });

    await expect(service.getEvents()).rejects.toThrow('boom');
    await expect(service.getEvents()).resolves.toHaveLength(3);
  });

  it('keeps refreshed events when an older fetch finishes later', async () => {
    const oldGrid: Grid = [['ИЮЛЬ'], ['', '1'], ['A', 'old']];
    const newGrid: Grid = [['ИЮЛЬ'], ['', '1'], ['A', 'new']];
    let releaseSlowFetch: (grid: Grid) => void = () => undefined;
    const { source, fetchGrid } = createSource();
    fetchGrid
      .mockImplementationOnce(
        () =>
          new Promise<Grid>((resolve) => {
            releaseSlowFetch = resolve;
          })
      )
      .mockResolvedValueOnce(newGrid);
    const service = new ScheduleService(source, new GridParser(), { ttlSeconds: 60, now });

    const slow = service.getEvents();
    const refreshed = await service.refreshEvents();
    expect(refreshed[0]?.activity).toBe('new');

    releaseSlowFetch(oldGrid);
    await expect(slow).resolves.toEqual([{ project: 'A', date: '2025-07-01', activity: 'old' }]);

    const after = await service.getEvents();
    expect(fetchGrid).toHaveBeenCalledTimes(2);
    expect(after).toEqual([{ project: 'A', date: '2025-07-01', activity: 'new' }]);
  });

  it('reports the source connection state', async () => {
    const { source } = createSource();
    const service = new ScheduleService(source, new GridParser(), { ttlSeconds: 60, now });

    expect(service.isConnected()).toBe(false);
    await service.getEvents();
    expect(service.isConnected()).toBe(true);
  });
});
