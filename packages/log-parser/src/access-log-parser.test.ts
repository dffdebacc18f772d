import { AccessLogParser } from './access-log-parser';
import { PipelineError } from '@hotpath/core';

describe('AccessLogParser', () => {
  let parser: AccessLogParser;

  const combinedLine =
    '203.0.113.7 - - [10/Oct/2023:13:55:36 +0800] "GET /api/items?page=2 HTTP/1.1" 200 2326 ' +
    '"https://example.com/start" "Mozilla/5.0 (X11; Linux x86_64)"';

  const captureError = (fn: () => unknown): unknown => {
    try {
      fn();
    } catch (error) {
      return error;
    }
    return undefined;
  };

  beforeEach(() => {
    parser = new AccessLogParser();
  });

  describe('Combined format', () => {
    it('should parse every field', () => {
      expect(parser.parse(combinedLine)).toEqual({
        clientIp: '203.0.113.7',
        eventTime: 1696917336,
        requestPath: '/api/items?page=2',
        statusCode: '200',
        bodyBytes: '2326',
        referer: 'https://example.com/start',
        userAgent: 'Mozilla/5.0 (X11; Linux x86_64)',
        method: 'GET',
        httpVersion: '1.1'
      });
    });

    it('should honor the UTC offset of the timestamp', () => {
      const west = combinedLine.replace('+0800', '-0700');
      const india = combinedLine.replace('+0800', '+0530');

      expect(parser.parse(west).eventTime).toBe(1696971336);
      expect(parser.parse(india).eventTime).toBe(1696926336);
    });

    it('should treat a timestamp without offset as UTC', () => {
      const line = combinedLine.replace(' +0800]', ']');

      expect(parser.parse(line).eventTime).toBe(1696946136);
    });

    it('should keep escaped quotes inside quoted fields', () => {
      const line = combinedLine.replace(
        '"Mozilla/5.0 (X11; Linux x86_64)"',
        '"Mozilla/5.0 \\"compatible\\""'
      );

      expect(parser.parse(line).userAgent).toBe('Mozilla/5.0 \\"compatible\\"');
    });

    it('should accept extra quoted fields after the user agent', () => {
      const line = '192.0.2.7 - - [10/Oct/2023:13:55:36 +0000] "GET /index.html HTTP/1.1" 200 612 "-" "curl/8.0" "-"';

      expect(parser.validate(line)).toEqual({ valid: true });
      expect(parser.parse(line)).toMatchObject({
        requestPath: '/index.html',
        referer: '-',
        userAgent: 'curl/8.0'
      });
    });

    it('should keep years below 100 as written', () => {
      const line = combinedLine.replace('10/Oct/2023:13:55:36 +0800', '10/Oct/0050:13:55:36 +0000');

      expect(parser.parse(line).eventTime).toBe(-60564881064);
    });

    it('should strip a trailing line break', () => {
      const record = parser.parse(`${combinedLine}\r\n`);

      expect(record.userAgent).toBe('Mozilla/5.0 (X11; Linux x86_64)');
    });
  });

  describe('Common format', () => {
    it('should parse lines without referer and user agent', () => {
      const record = parser.parse('192.0.2.9 - frank [29/Feb/2024:00:00:05 +0000] "POST /login HTTP/1.0" 302 -');

      expect(record).toMatchObject({
        clientIp: '192.0.2.9',
        eventTime: 1709164805,
        requestPath: '/login',
        statusCode: '302',
        bodyBytes: '-',
        referer: '',
        userAgent: '',
        method: 'POST',
        httpVersion: '1.0'
      });
    });

    it('should use a malformed request as the path', () => {
      const record = parser.parse('192.0.2.9 - - [29/Feb/2024:00:00:05 +0000] "-" 400 0 "-" "-"');

      expect(record.requestPath).toBe('-');
      expect(record.method).toBeUndefined();
      expect(record.httpVersion).toBeUndefined();
    });

    it('should accept a request without protocol version', () => {
      const record = parser.parse('192.0.2.9 - - [29/Feb/2024:00:00:05 +0000] "GET /ping" 200 4');

      expect(record.requestPath).toBe('/ping');
      expect(record.httpVersion).toBeUndefined();
    });
  });

  describe('Errors', () => {
    it('should reject dates that do not exist', () => {
      const error = captureError(() =>
        parser.parse('192.0.2.9 - - [31/Feb/2023:10:00:00 +0000] "GET / HTTP/1.1" 200 1')
      );

      expect(error).toBeInstanceOf(PipelineError);
      expect(error).toMatchObject({
        code: 'INVALID_TIMESTAMP',
        message: 'Invalid timestamp: 31/Feb/2023:10:00:00 +0000'
      });
    });

    it('should reject out-of-range clock values', () => {
      expect(() => parser.parse('192.0.2.9 - - [01/Mar/2023:25:00:00 +0000] "GET / HTTP/1.1" 200 1'))
        .toThrow('Invalid timestamp: 01/Mar/2023:25:00:00 +0000');
    });

    it('should reject unknown month names with a position', () => {
      const error = captureError(() =>
        parser.parse('192.0.2.9 - - [10/Foo/2023:10:00:00 +0000] "GET / HTTP/1.1" 200 1')
      );

      expect(error).toBeInstanceOf(PipelineError);
      expect(error).toMatchObject({
        code: 'PARSE_ERROR',
        details: {
          input: '192.0.2.9 - - [10/Foo/2023:10:00:00 +0000] "GET / HTTP/1.1" 200 1',
          line: 1,
          column: expect.any(Number)
        }
      });
      expect(error instanceof Error ? error.message : '').toMatch(/^Access log parse error at line 1, column \d+: /);
    });

    it('should reject lines that are not access log lines', () => {
      expect(() => parser.parse('hello world')).toThrow(PipelineError);
      expect(() => parser.parse('')).toThrow(PipelineError);
    });

    it('should reject a grammar result of the wrong shape', () => {
      const custom = new AccessLogParser({ grammar: 'Line = "x" { return { clientIp: "x" }; }' });

      expect(() => custom.parse('x')).toThrow('Access log grammar produced an unexpected value');
    });
  });

  describe('validate', () => {
    it('should report valid lines', () => {
      expect(parser.validate(combinedLine)).toEqual({ valid: true });
    });

    it('should report the parse error for invalid lines', () => {
      const result = parser.validate('not a log line');

      expect(result.valid).toBe(false);
      expect(result.error).toMatch(/^Access log parse error/);
    });
  });

  it('should give the same event time for repeated timestamps', () => {
    const first = parser.parse(combinedLine).eventTime;
    const second = parser.parse(combinedLine.replace('/api/items?page=2', '/other')).eventTime;

    expect(second).toBe(first);
  });
});
