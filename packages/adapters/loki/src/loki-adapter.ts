import { LogSourceAdapter, PipelineError, StreamOptions, parseTimeWindow } from '@hotpath/core';
import fetch from 'node-fetch';
import WebSocket from 'ws';

export interface LokiAdapterOptions {
  url: string;
  websocket?: boolean;
  pollInterval?: number;
  timeout?: number;
  maxRetries?: number;
  authToken?: string;
  headers?: Record<string, string>;
  limit?: number;
}

type LokiStream = {
  stream: Record<string, string>;
  values: Array<[string, string]>; // [timestamp_ns, log_line]
};

interface LogEntry {
  timestamp: bigint;
  line: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isLokiStream(value: unknown): value is LokiStream {
  return isRecord(value) &&
    isRecord(value.stream) &&
    Array.isArray(value.values) &&
    value.values.every((entry: unknown) =>
      Array.isArray(entry) &&
      entry.length >= 2 &&
      typeof entry[0] === 'string' &&
      /^\d+$/.test(entry[0]) &&
      typeof entry[1] === 'string'
    );
}

function nowNs(): bigint {
  return BigInt(Date.now()) * 1000000n;
}

/**
 * Reads raw access log lines from Loki, either by polling query_range or by
 * tailing over a WebSocket. The query is a LogQL stream selector such as {job="nginx"}.
 */
export class LokiAdapter implements LogSourceAdapter {
  private options: Required<Omit<LokiAdapterOptions, 'authToken'>> & Pick<LokiAdapterOptions, 'authToken'>;
  private activeStreams: Set<AbortController> = new Set();
  private sockets: Set<WebSocket> = new Set();
  private destroyed = false;

  constructor(options: LokiAdapterOptions) {
    this.options = {
      websocket: false,
      pollInterval: 1000,
      timeout: 30000,
      maxRetries: 3,
      headers: {},
      limit: 1000,
      ...options
    };
  }

  getName(): string {
    return 'loki';
  }

  async *createStream(query: string, options?: StreamOptions): AsyncIterable<string> {
    const timeRange = typeof options?.timeRange === 'string' ? options.timeRange : '5m';
    const start = nowNs() - BigInt(parseTimeWindow(timeRange)) * 1000000n;
    this.destroyed = false;

    if (this.options.websocket) {
      yield* this.createTailStream(query, start);
    } else {
      yield* this.createPollingStream(query, start);
    }
  }

  private async *createTailStream(query: string, from: bigint): AsyncIterable<string> {
    const maxReconnectDelay = 30000;
    const baseReconnectDelay = 1000;
    let start = from;
    let attempts = 0;

    while (!this.destroyed) {
      try {
        for await (const entry of this.connectAndTail(query, start)) {
          attempts = 0;
          if (entry.timestamp >= start) {
            start = entry.timestamp + 1n;
          }
          yield entry.line;
        }
        // Server closed the tail normally
        return;
      } catch (error) {
        if (this.destroyed) return;
        attempts++;
        console.error(`Loki tail error (attempt ${attempts}):`, error);

        if (attempts >= this.options.maxRetries) {
          throw new PipelineError(
            'Loki tail failed after max retries',
            'LOKI_TAIL_FAILED',
            { error: error instanceof Error ? error.message : String(error) }
          );
        }

        // Exponential backoff with jitter
        const delay = Math.min(
          baseReconnectDelay * Math.pow(2, attempts - 1) + Math.random() * 1000,
          maxReconnectDelay
        );
        console.log(`Reconnecting in ${Math.round(delay)}ms...`);

        const controller = new AbortController();
        this.activeStreams.add(controller);
        try {
          await this.sleep(delay, controller.signal);
        } finally {
          this.activeStreams.delete(controller);
        }
      }
    }
  }

  private async *connectAndTail(query: string, start: bigint): AsyncGenerator<LogEntry> {
    const wsUrl = this.options.url.replace(/^http/, 'ws');
    const params = new URLSearchParams({
      query,
      start: start.toString(),
      limit: String(this.options.limit)
    });

    const ws = new WebSocket(`${wsUrl}/loki/api/v1/tail?${params}`, {
      headers: this.buildHeaders(),
      handshakeTimeout: this.options.timeout
    });
    this.sockets.add(ws);

    const queue: LogEntry[] = [];
    let closed = false;
    let failure: Error | undefined;
    let wake: (() => void) | undefined;

    const notify = () => {
      const resume = wake;
      wake = undefined;
      resume?.();
    };

    ws.on('message', (data: WebSocket.RawData) => {
      try {
        queue.push(...this.parseStreams(JSON.parse(data.toString())));
      } catch (error) {
        failure = error instanceof Error ? error : new Error(String(error));
      }
      notify();
    });

    ws.on('error', (error: Error) => {
      failure = error;
      notify();
    });

    ws.on('close', (code: number, reason: Buffer) => {
      console.log(`Loki tail closed: code=${code}, reason=${reason.toString()}`);
      closed = true;
      notify();
    });

    try {
      while (true) {
        const next = queue.shift();
        if (next !== undefined) {
          yield next;
          continue;
        }
        if (failure) throw failure;
        if (closed) return;

        await new Promise<void>((resolve) => {
          wake = resolve;
        });
      }
    } finally {
      this.sockets.delete(ws);
      if (ws.readyState === WebSocket.OPEN || ws.readyState === WebSocket.CONNECTING) {
        ws.close();
      }
    }
  }

  private async *createPollingStream(query: string, from: bigint): AsyncIterable<string> {
    const controller = new AbortController();
    this.activeStreams.add(controller);

    try {
      let lastTimestamp = from - 1n;

      while (!controller.signal.aborted) {
        const url = `${this.options.url}/loki/api/v1/query_range`;
        const params = new URLSearchParams({
          query,
          start: (lastTimestamp + 1n).toString(),
          end: nowNs().toString(),
          limit: String(this.options.limit),
          direction: 'forward'
        });

        let entries: LogEntry[] = [];
        try {
          const response = await fetch(`${url}?${params}`, {
            method: 'GET',
            headers: this.buildHeaders(),
            timeout: this.options.timeout
          });

          if (!response.ok) {
            throw new PipelineError(
              `Loki query failed: ${response.statusText}`,
              'LOKI_QUERY_ERROR',
              { status: response.status }
            );
          }

          const body: unknown = await response.json();
          entries = isRecord(body) && body.status === 'success' && isRecord(body.data)
            ? this.parseStreams({ streams: body.data.result })
            : [];
        } catch (error) {
          if (controller.signal.aborted) break;
          console.error('Loki polling error:', error);
        }

        for (const entry of entries) {
          if (controller.signal.aborted) return;
          if (entry.timestamp > lastTimestamp) {
            lastTimestamp = entry.timestamp;
          }
          yield entry.line;
        }

        await this.sleep(this.options.pollInterval, controller.signal);
      }
    } finally {
      this.activeStreams.delete(controller);
    }
  }

  private parseStreams(message: unknown): LogEntry[] {
    if (!isRecord(message) || !Array.isArray(message.streams)) {
      return [];
    }

    const entries: LogEntry[] = [];
    for (const stream of message.streams) {
      if (!isLokiStream(stream)) continue;
      for (const [timestamp, line] of stream.values) {
        entries.push({ timestamp: BigInt(timestamp), line });
      }
    }
    return entries;
  }

  private sleep(ms: number, signal: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      if (signal.aborted) {
        resolve();
        return;
      }
      const timer = setTimeout(() => {
        signal.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      const onAbort = () => {
        clearTimeout(timer);
        resolve();
      };
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      ...this.options.headers
    };

    if (this.options.authToken) {
      headers['Authorization'] = this.options.authToken.startsWith('Bearer ')
        ? this.options.authToken
        : `Bearer ${this.options.authToken}`;
    }

    return headers;
  }

  validateQuery(query: string): boolean {
    // A LogQL stream selector needs at least one label matcher
    return /\{\s*[a-zA-Z_][a-zA-Z0-9_]*\s*(=|!=|=~|!~)\s*"[^"]*"/.test(query);
  }

  async getAvailableStreams(): Promise<string[]> {
    const url = `${this.options.url}/loki/api/v1/labels`;

    try {
      const response = await fetch(url, {
        headers: this.buildHeaders(),
        timeout: this.options.timeout
      });

      if (!response.ok) {
        throw new PipelineError(
          'Failed to fetch available streams',
          'LOKI_QUERY_ERROR',
          { status: response.status }
        );
      }

      const body: unknown = await response.json();
      if (!isRecord(body) || !Array.isArray(body.data)) {
        return [];
      }
      return body.data.filter((label: unknown): label is string => typeof label === 'string');
    } catch (error) {
      console.error('Failed to get available streams:', error);
      return [];
    }
  }

  async destroy(): Promise<void> {
    this.destroyed = true;

    for (const ws of this.sockets) {
      ws.close();
    }
    this.sockets.clear();

    // Cancel polling loops and pending reconnect delays
    for (const controller of this.activeStreams) {
      controller.abort();
    }
    this.activeStreams.clear();
  }
}
