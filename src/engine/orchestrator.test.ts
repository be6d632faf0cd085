import { InvalidDateError, InvalidRangeError } from './errors';
import { InMemoryEventSource, InMemoryObjectSink } from './fixtures';
import { blockingFailures, Orchestrator } from './orchestrator';

const events = (count: number) =>
  Array.from({ length: count }, (_, i) => ({ event_name: 'page_view', event_timestamp: 1_700_000_000 + i }));

describe('Orchestrator.runDaily', () => {
  it('extracts and uploads a day that is not in the sink yet', async () => {
    const source = new InMemoryEventSource({ '2024-01-02': events(2) });
    const sink = new InMemoryObjectSink();
    const orchestrator = new Orchestrator(source, sink);

    const result = await orchestrator.runDaily('2024-01-02');

    expect(result).toEqual({
      status: 'success',
      date: '2024-01-02',
      success: true,
      skipped: false,
      recordsExtracted: 2,
      sinkLocation: 'memory://2024-01-02/data.parquet',
    });
    expect(sink.uploads).toHaveLength(1);
    expect(await sink.exists('2024-01-02')).toBe(true);
  });

  it('skips the second run of the same day without extracting again', async () => {
    const source = new InMemoryEventSource({ '2024-01-02': events(3) });
    const orchestrator = new Orchestrator(source, new InMemoryObjectSink());

    await orchestrator.runDaily('2024-01-02', true);
    const second = await orchestrator.runDaily('2024-01-02', true);

    expect(second).toEqual({
      status: 'skipped',
      date: '2024-01-02',
      success: true,
      skipped: true,
      recordsExtracted: 0,
    });
    expect(source.extractCalls).toEqual(['2024-01-02']);
  });

  it('reloads an existing day when skipExisting is false', async () => {
    const source = new InMemoryEventSource({ '2024-01-02': events(1) });
    const sink = new InMemoryObjectSink(['2024-01-02']);
    const orchestrator = new Orchestrator(source, sink);

    const result = await orchestrator.runDaily('2024-01-02', false);

    expect(result.status).toBe('success');
    expect(source.extractCalls).toEqual(['2024-01-02']);
  });

  it('reports a day without data as no-data', async () => {
    const orchestrator = new Orchestrator(new InMemoryEventSource(), new InMemoryObjectSink());

    const result = await orchestrator.runDaily('2024-01-04');

    expect(result).toEqual({
      status: 'no-data',
      date: '2024-01-04',
      success: false,
      skipped: false,
      recordsExtracted: 0,
      error: 'No data found',
    });
  });

  it('treats an empty day table as no-data', async () => {
    const orchestrator = new Orchestrator(new InMemoryEventSource({ '2024-01-04': [] }), new InMemoryObjectSink());

    const result = await orchestrator.runDaily('2024-01-04');

    expect(result.status).toBe('no-data');
  });

  it('captures a source failure as a failed result', async () => {
    const source = new InMemoryEventSource({}, { '2024-01-02': 'quota exceeded' });
    const sink = new InMemoryObjectSink();
    const orchestrator = new Orchestrator(source, sink);

    const result = await orchestrator.runDaily('2024-01-02');

    expect(result).toEqual({
      status: 'failed',
      date: '2024-01-02',
      success: false,
      skipped: false,
      recordsExtracted: 0,
      error: 'quota exceeded',
    });
    expect(sink.uploads).toHaveLength(0);
  });

  it('captures an upload failure and keeps the extracted count', async () => {
    const source = new InMemoryEventSource({ '2024-01-02': events(2) });
    const sink = new InMemoryObjectSink([], ['2024-01-02']);
    const orchestrator = new Orchestrator(source, sink);

    const result = await orchestrator.runDaily('2024-01-02');

    expect(result).toEqual({
      status: 'failed',
      date: '2024-01-02',
      success: false,
      skipped: false,
      recordsExtracted: 2,
      error: 'upload rejected for 2024-01-02',
    });
    expect(await sink.exists('2024-01-02')).toBe(false);
  });

  it('fails the day without extracting when the existence check errors', async () => {
    const source = new InMemoryEventSource({ '2024-01-02': events(2) });
    const sink = new InMemoryObjectSink();
    sink.failExists = true;
    const orchestrator = new Orchestrator(source, sink);

    const result = await orchestrator.runDaily('2024-01-02');

    expect(result.status).toBe('failed');
    expect(result.success).toBe(false);
    expect(source.extractCalls).toEqual([]);
  });

  it('defaults to the calendar day before now', async () => {
    const source = new InMemoryEventSource({ '2024-02-29': events(1) });
    const orchestrator = new Orchestrator(source, new InMemoryObjectSink(), {
      now: () => new Date(2024, 2, 1, 0, 15),
    });

    const result = await orchestrator.runDaily();

    expect(result.date).toBe('2024-02-29');
    expect(result.status).toBe('success');
  });

  it('returns a failed result for a malformed date', async () => {
    const source = new InMemoryEventSource();
    const orchestrator = new Orchestrator(source, new InMemoryObjectSink());

    const result = await orchestrator.runDaily('2024-02-30');

    expect(result).toEqual({
      status: 'failed',
      date: '2024-02-30',
      success: false,
      skipped: false,
      recordsExtracted: 0,
      error: 'Invalid date "2024-02-30": expected YYYY-MM-DD',
    });
    expect(source.extractCalls).toEqual([]);
  });
});

describe('Orchestrator.backfill', () => {
  it('skips loaded days, loads the rest and records days without data', async () => {
    const source = new InMemoryEventSource({
      '2024-01-01': events(1),
      '2024-01-02': events(2),
      '2024-01-03': events(3),
    });
    const sink = new InMemoryObjectSink(['2024-01-01']);
    const orchestrator = new Orchestrator(source, sink);

    const report = await orchestrator.backfill('2024-01-01', '2024-01-04', true);

    expect(report).toEqual({
      start: '2024-01-01',
      end: '2024-01-04',
      totalDays: 4,
      successful: ['2024-01-02', '2024-01-03'],
      skipped: ['2024-01-01'],
      failed: [{ date: '2024-01-04', reason: 'no-data', error: 'No data found' }],
      totalRecords: 5,
    });
  });

  it('keeps going after a failing day', async () => {
    const source = new InMemoryEventSource(
      { '2024-01-01': events(1), '2024-01-03': events(1) },
      { '2024-01-02': 'quota exceeded' }
    );
    const orchestrator = new Orchestrator(source, new InMemoryObjectSink());

    const report = await orchestrator.backfill('2024-01-01', '2024-01-03');

    expect(source.extractCalls).toEqual(['2024-01-01', '2024-01-02', '2024-01-03']);
    expect(report.successful).toEqual(['2024-01-01', '2024-01-03']);
    expect(report.skipped).toEqual([]);
    expect(report.failed).toEqual([{ date: '2024-01-02', reason: 'error', error: 'quota exceeded' }]);
    expect(report.totalRecords).toBe(2);
  });

  it('counts every calendar day across month and leap-day boundaries', async () => {
    const orchestrator = new Orchestrator(new InMemoryEventSource(), new InMemoryObjectSink());

    const report = await orchestrator.backfill('2024-02-27', '2024-03-02');

    expect(report.totalDays).toBe(5);
    expect(report.successful.length + report.skipped.length + report.failed.length).toBe(report.totalDays);
    expect(report.failed.map((failure) => failure.date)).toEqual([
      '2024-02-27',
      '2024-02-28',
      '2024-02-29',
      '2024-03-01',
      '2024-03-02',
    ]);
  });

  it('handles a single-day range', async () => {
    const orchestrator = new Orchestrator(
      new InMemoryEventSource({ '2024-01-01': events(4) }),
      new InMemoryObjectSink()
    );

    const report = await orchestrator.backfill('2024-01-01', '2024-01-01');

    expect(report.totalDays).toBe(1);
    expect(report.successful).toEqual(['2024-01-01']);
    expect(report.totalRecords).toBe(4);
  });

  it('does not count records of skipped days', async () => {
    const source = new InMemoryEventSource({ '2024-01-01': events(7), '2024-01-02': events(2) });
    const orchestrator = new Orchestrator(source, new InMemoryObjectSink(['2024-01-01']));

    const report = await orchestrator.backfill('2024-01-01', '2024-01-02');

    expect(report.totalRecords).toBe(2);
  });

  it('rejects a range whose start is after its end before running any day', async () => {
    const source = new InMemoryEventSource({ '2024-01-01': events(1) });
    const orchestrator = new Orchestrator(source, new InMemoryObjectSink());

    await expect(orchestrator.backfill('2024-01-05', '2024-01-01')).rejects.toBeInstanceOf(InvalidRangeError);
    expect(source.extractCalls).toEqual([]);
  });

  it('rejects malformed bounds', async () => {
    const orchestrator = new Orchestrator(new InMemoryEventSource(), new InMemoryObjectSink());

    await expect(orchestrator.backfill('2024-01-01', '2024/01/05')).rejects.toBeInstanceOf(InvalidDateError);
  });

  it('records an error escaping the day as a failure and continues', async () => {
    const source = new InMemoryEventSource({ '2024-01-01': events(1), '2024-01-02': events(1) });
    const orchestrator = new Orchestrator(source, new InMemoryObjectSink());
    jest.spyOn(orchestrator, 'runDaily').mockRejectedValueOnce(new Error('boom'));

    const report = await orchestrator.backfill('2024-01-01', '2024-01-02');

    expect(report.failed).toEqual([{ date: '2024-01-01', reason: 'error', error: 'boom' }]);
    expect(report.successful).toEqual(['2024-01-02']);
  });
});

describe('blockingFailures', () => {
  it('leaves out days without data but keeps errors that read like them', async () => {
    const source = new InMemoryEventSource({ '2024-01-01': events(1) }, { '2024-01-02': 'No data found' });
    const orchestrator = new Orchestrator(source, new InMemoryObjectSink());

    const report = await orchestrator.backfill('2024-01-01', '2024-01-03');

    expect(report.failed).toEqual([
      { date: '2024-01-02', reason: 'error', error: 'No data found' },
      { date: '2024-01-03', reason: 'no-data', error: 'No data found' },
    ]);
    expect(blockingFailures(report)).toEqual([{ date: '2024-01-02', reason: 'error', error: 'No data found' }]);
  });
});

describe('Orchestrator.testConnections', () => {
  it('reports a throwing probe as unreachable without raising', async () => {
    const source = new InMemoryEventSource();
    source.reachable = false;
    const orchestrator = new Orchestrator(source, new InMemoryObjectSink());

    await expect(orchestrator.testConnections()).resolves.toEqual({ source: false, sink: true });
  });

  it('passes through probe results', async () => {
    const sink = new InMemoryObjectSink();
    sink.reachable = false;
    const orchestrator = new Orchestrator(new InMemoryEventSource(), sink);

    await expect(orchestrator.testConnections()).resolves.toEqual({ source: true, sink: false });
  });
});

describe('Orchestrator.getPipelineStatus', () => {
  const sourceDays = {
    '2024-01-01': events(1),
    '2024-01-02': events(1),
    '2024-01-03': events(1),
  };

  it('lists the source dates missing from the sink', async () => {
    const orchestrator = new Orchestrator(
      new InMemoryEventSource(sourceDays),
      new InMemoryObjectSink(['2024-01-01', '2024-01-05'])
    );

    const status = await orchestrator.getPipelineStatus();

    expect(status.connectivity).toEqual({ source: true, sink: true });
    expect(Array.from(status.sourceDates).sort()).toEqual(['2024-01-01', '2024-01-02', '2024-01-03']);
    expect(Array.from(status.sinkDates).sort()).toEqual(['2024-01-01', '2024-01-05']);
    expect(Array.from(status.missingDates).sort()).toEqual(['2024-01-02', '2024-01-03']);
  });

  it('leaves the source set empty when the source listing fails', async () => {
    const source = new InMemoryEventSource(sourceDays);
    source.failListing = true;
    const orchestrator = new Orchestrator(source, new InMemoryObjectSink(['2024-01-01']));

    const status = await orchestrator.getPipelineStatus();

    expect(status.sourceDates.size).toBe(0);
    expect(Array.from(status.sinkDates)).toEqual(['2024-01-01']);
    expect(status.missingDates.size).toBe(0);
  });

  it('treats every source date as missing when the sink listing fails', async () => {
    const sink = new InMemoryObjectSink(['2024-01-01']);
    sink.failListing = true;
    const orchestrator = new Orchestrator(new InMemoryEventSource(sourceDays), sink);

    const status = await orchestrator.getPipelineStatus();

    expect(status.sinkDates.size).toBe(0);
    expect(Array.from(status.missingDates).sort()).toEqual(['2024-01-01', '2024-01-02', '2024-01-03']);
  });
});

describe('Orchestrator.close', () => {
  it('closes collaborators that hold resources', async () => {
    const sink = new InMemoryObjectSink();
    const orchestrator = new Orchestrator(new InMemoryEventSource(), sink);

    await orchestrator.close();

    expect(sink.closed).toBe(true);
  });
});
