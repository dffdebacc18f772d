import { TopNPipeline, ParseFailure } from './top-n-pipeline';
import { LateRecord } from './window-aggregator';
import { AccessLogRecord, EmittedReport, LogSourceAdapter, PipelineError, RecordParser } from './types';

describe('TopNPipeline', () => {
  // Lines look like "<eventTime> <path>"
  const stubParser: RecordParser = {
    parse(line: string): AccessLogRecord {
      const match = line.match(/^(\d+) (\S+)$/);
      if (!match) {
        throw new PipelineError(`Unparseable line: ${line}`, 'PARSE_ERROR', { line });
      }
      return {
        clientIp: '192.0.2.1',
        eventTime: parseInt(match[1], 10),
        requestPath: match[2],
        statusCode: '200',
        bodyBytes: '128',
        referer: '-',
        userAgent: 'test-agent'
      };
    }
  };

  async function* fromArray<T>(items: T[]): AsyncGenerator<T> {
    for (const item of items) {
      yield item;
    }
  }

  async function collect<T>(stream: AsyncIterable<T>): Promise<T[]> {
    const items: T[] = [];
    for await (const item of stream) {
      items.push(item);
    }
    return items;
  }

  const SEPARATOR = '='.repeat(36);

  let pipeline: TopNPipeline;

  beforeEach(() => {
    pipeline = new TopNPipeline({ parser: stubParser });
  });

  afterEach(async () => {
    await pipeline.destroy();
  });

  describe('processLines', () => {
    it('should rank a window and render its text report', async () => {
      const reports = await collect(pipeline.processLines(fromArray([
        '1001 /a',
        '1003 /a',
        '1009 /a',
        '1005 /b'
      ])));

      expect(reports).toHaveLength(1);
      expect(reports[0].report).toEqual({
        windowEnd: 1010,
        entries: [
          { requestPath: '/a', count: 3 },
          { requestPath: '/b', count: 1 }
        ]
      });
      expect(reports[0].text).toBe(
        `${SEPARATOR}\n` +
        '时间: 1970年01月01日 00时 16分 49秒\n' +
        'No0:  请求URL=/a  请求量=3\n' +
        'No1:  请求URL=/b  请求量=1\n' +
        `${SEPARATOR}\n\n`
      );
    });

    it('should count out-of-order records that stay within the lateness bound', async () => {
      const reports = await collect(pipeline.processLines(fromArray([
        '1008 /a',
        '1001 /a',
        '1012 /b',
        '1000 /a'
      ])));

      expect(reports.map(({ report }) => report)).toEqual([
        { windowEnd: 1010, entries: [{ requestPath: '/a', count: 3 }] },
        { windowEnd: 1020, entries: [{ requestPath: '/b', count: 1 }] }
      ]);
    });

    it('should drop records whose window already closed', async () => {
      pipeline = new TopNPipeline({ parser: stubParser, allowedLateness: 0 });
      const dropped: LateRecord[] = [];
      pipeline.on('lateRecordDropped', (late) => dropped.push(late));

      const reports = await collect(pipeline.processLines(fromArray([
        '992 /a',
        '1001 /x',
        '995 /a',
        '1004 /a'
      ])));

      expect(reports[0].report).toEqual({ windowEnd: 1000, entries: [{ requestPath: '/a', count: 1 }] });
      expect(reports[1].report.windowEnd).toBe(1010);
      expect(reports[1].report.entries).toHaveLength(2);
      expect(reports[1].report.entries.every((entry) => entry.count === 1)).toBe(true);
      expect(dropped).toEqual([
        { key: '/a', eventTime: 995, window: { start: 990, end: 1000 }, watermark: 1001 }
      ]);
      expect(pipeline.getMetrics().lateRecordsDropped).toBe(1);
    });

    it('should keep only the top entries when keys tie', async () => {
      pipeline = new TopNPipeline({ parser: stubParser, topSize: 2 });
      const lines = [
        ...Array.from({ length: 5 }, () => '1001 /five'),
        ...Array.from({ length: 3 }, () => '1002 /three-a'),
        ...Array.from({ length: 3 }, () => '1003 /three-b')
      ];

      const [{ report }] = await collect(pipeline.processLines(fromArray(lines)));

      expect(report.entries).toHaveLength(2);
      expect(report.entries[0]).toEqual({ requestPath: '/five', count: 5 });
      expect(report.entries[1].count).toBe(3);
      expect(['/three-a', '/three-b']).toContain(report.entries[1].requestPath);
    });

    it('should produce nothing for empty input', async () => {
      expect(await collect(pipeline.processLines(fromArray([])))).toEqual([]);
    });

    it('should skip unparseable lines and report them', async () => {
      const failures: ParseFailure[] = [];
      pipeline.on('parseError', (failure) => failures.push(failure));

      const reports = await collect(pipeline.processLines(fromArray([
        '1001 /a',
        'not a log line',
        '1002 /a'
      ])));

      expect(reports[0].report.entries).toEqual([{ requestPath: '/a', count: 2 }]);
      expect(failures).toHaveLength(1);
      expect(failures[0].line).toBe('not a log line');
      expect(failures[0].error.code).toBe('PARSE_ERROR');
      expect(pipeline.getMetrics().parseErrors).toBe(1);
    });

    it('should wrap parser failures that are not pipeline errors', async () => {
      pipeline = new TopNPipeline({
        parser: {
          parse(): AccessLogRecord {
            throw new TypeError('boom');
          }
        }
      });
      const failures: ParseFailure[] = [];
      pipeline.on('parseError', (failure) => failures.push(failure));

      await collect(pipeline.processLines(fromArray(['anything'])));

      expect(failures[0].error).toBeInstanceOf(PipelineError);
      expect(failures[0].error).toMatchObject({ message: 'boom', code: 'PARSE_ERROR', details: { line: 'anything' } });
    });

    it('should require a parser', async () => {
      pipeline = new TopNPipeline();

      await expect(collect(pipeline.processLines(fromArray(['1001 /a'])))).rejects.toMatchObject({
        code: 'INVALID_CONFIG',
        message: 'A record parser is required to process raw lines'
      });
    });
  });

  describe('processRecords', () => {
    it('should group by a custom key selector', async () => {
      pipeline = new TopNPipeline({ keySelector: (record) => record.statusCode });
      const records = ['1001 /a', '1002 /b'].map((line) => stubParser.parse(line));

      const reports = await collect(pipeline.processRecords(fromArray(records)));

      expect(reports[0].report.entries).toEqual([{ requestPath: '200', count: 2 }]);
    });
  });

  describe('events and metrics', () => {
    it('should emit each report and count processed records', async () => {
      const emitted: EmittedReport[] = [];
      pipeline.on('report', (report) => emitted.push(report));

      const reports = await collect(pipeline.processLines(fromArray(['1001 /a', '1015 /b'])));

      expect(emitted).toEqual(reports);
      const metrics = pipeline.getMetrics();
      expect(metrics.recordsProcessed).toBe(2);
      expect(metrics.reportsEmitted).toBe(2);
    });
  });

  describe('adapters', () => {
    const createAdapter = (lines: string[]): LogSourceAdapter => ({
      createStream: jest.fn(() => fromArray(lines)),
      validateQuery: jest.fn(() => true),
      getName: () => 'fake',
      destroy: jest.fn(async () => undefined)
    });

    it('should run lines from a registered adapter', async () => {
      const adapter = createAdapter(['1001 /a', '1002 /b', '1003 /a']);
      pipeline.addAdapter('fake', adapter);

      const reports = await collect(pipeline.run('FAKE', 'access.log', { follow: false }));

      expect(adapter.createStream).toHaveBeenCalledWith('access.log', { follow: false });
      expect(reports[0].report.entries).toEqual([
        { requestPath: '/a', count: 2 },
        { requestPath: '/b', count: 1 }
      ]);
    });

    it('should reject duplicate adapter names', () => {
      pipeline.addAdapter('fake', createAdapter([]));

      expect(() => pipeline.addAdapter('fake', createAdapter([]))).toThrow('Adapter fake already registered');
    });

    it('should fail for an unknown source', async () => {
      pipeline.addAdapter('fake', createAdapter([]));

      await expect(collect(pipeline.run('missing', 'q'))).rejects.toMatchObject({
        code: 'ADAPTER_NOT_FOUND',
        details: { source: 'missing', availableAdapters: ['fake'] }
      });
    });

    it('should refuse queries the adapter rejects', async () => {
      const adapter = createAdapter([]);
      adapter.validateQuery = jest.fn(() => false);
      pipeline.addAdapter('fake', adapter);

      await expect(collect(pipeline.run('fake', ''))).rejects.toMatchObject({
        code: 'INVALID_CONFIG',
        message: 'Invalid query for source fake: '
      });
      expect(adapter.createStream).not.toHaveBeenCalled();
    });

    it('should destroy registered adapters', async () => {
      const adapter = createAdapter([]);
      pipeline.addAdapter('fake', adapter);

      await pipeline.destroy();

      expect(adapter.destroy).toHaveBeenCalledTimes(1);
      expect(pipeline.getAdapter('fake')).toBeUndefined();
    });
  });
});
