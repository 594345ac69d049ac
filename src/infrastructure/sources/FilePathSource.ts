import { createReadStream } from 'node:fs';
import { basename } from 'node:path';

export interface FilePathSourceOptions {
  /** Encoding for reading the file. Default: 'utf-8'. */
  readonly encoding?: BufferEncoding;
  /** Chunk size in bytes for streaming reads. Default: 65536 (64KB). */
  readonly highWaterMark?: number;
}

/** Reads a local sequence file using `createReadStream`. Node.js only. */
export class FilePathSource {
  readonly filePath: string;
  private readonly encoding: BufferEncoding;
  private readonly highWaterMark: number;

  constructor(filePath: string, options?: FilePathSourceOptions) {
    this.filePath = filePath;
    this.encoding = options?.encoding ?? 'utf-8';
    this.highWaterMark = options?.highWaterMark ?? 65536;
  }

  get fileName(): string {
    return basename(this.filePath);
  }

  async *read(): AsyncIterable<string> {
    const stream = createReadStream(this.filePath, {
      encoding: this.encoding,
      highWaterMark: this.highWaterMark,
    });

    for await (const chunk of stream) {
      yield typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString(this.encoding);
    }
  }

  /** Read the whole file as text. */
  async text(): Promise<string> {
    let content = '';
    for await (const chunk of this.read()) {
      content += chunk;
    }
    return content;
  }
}
