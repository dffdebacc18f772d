import * as fs from 'fs';
import * as readline from 'readline';
import { LogSourceAdapter, PipelineError, StreamOptions } from '@hotpath/core';

export interface FileAdapterOptions {
  encoding?: BufferEncoding;
  /** Skip lines that are empty after trimming */
  skipBlankLines?: boolean;
}

/**
 * Reads a log file line by line. The query is the file path.
 */
export class FileAdapter implements LogSourceAdapter {
  private activeStreams: Set<fs.ReadStream> = new Set();
  private options: Required<FileAdapterOptions>;

  constructor(options: FileAdapterOptions = {}) {
    this.options = {
      encoding: 'utf8',
      skipBlankLines: true,
      ...options
    };
  }

  getName(): string {
    return 'file';
  }

  validateQuery(query: string): boolean {
    return query.trim().length > 0;
  }

  async *createStream(query: string, _options?: StreamOptions): AsyncIterable<string> {
    const filePath = query.trim();

    try {
      const stat = await fs.promises.stat(filePath);
      if (!stat.isFile()) {
        throw new PipelineError(`Not a regular file: ${filePath}`, 'SOURCE_NOT_FOUND', { path: filePath });
      }
    } catch (error) {
      if (error instanceof PipelineError) throw error;
      throw new PipelineError(`Log file not found: ${filePath}`, 'SOURCE_NOT_FOUND', {
        path: filePath,
        error: error instanceof Error ? error.message : String(error)
      });
    }

    const stream = fs.createReadStream(filePath, { encoding: this.options.encoding });
    this.activeStreams.add(stream);
    const lines = readline.createInterface({ input: stream, crlfDelay: Infinity });

    try {
      for await (const line of lines) {
        if (this.options.skipBlankLines && line.trim() === '') continue;
        yield line;
      }
    } finally {
      lines.close();
      stream.destroy();
      this.activeStreams.delete(stream);
    }
  }

  async destroy(): Promise<void> {
    for (const stream of this.activeStreams) {
      stream.destroy();
    }
    this.activeStreams.clear();
  }
}
