import { type } from 'arktype';
import type { Database } from '../../domain/model/Accession.js';
import type {
  ContinuationContext,
  RecordStream,
  SearchResult,
  SequenceDatabaseClient,
} from '../../domain/ports/SequenceDatabaseClient.js';

export const ENTREZ_BASE_URL = 'https://eutils.ncbi.nlm.nih.gov/entrez/eutils/';

export interface EntrezClientOptions {
  /** Contact address NCBI asks every E-utilities client to send. */
  readonly email: string;
  /** Tool name sent with every request. Default: `'isolation-sources'`. */
  readonly tool?: string;
  /** NCBI API key; raises the service's rate ceiling when set. */
  readonly apiKey?: string;
  /** Per-request timeout in milliseconds, body download included. Default: `60000`. */
  readonly timeout?: number;
  /** E-utilities base URL. Default: `ENTREZ_BASE_URL`. */
  readonly baseUrl?: string;
}

const ESearchResponse = type({
  esearchresult: {
    'count?': 'string',
    'idlist?': 'string[]',
    'webenv?': 'string',
    'querykey?': 'string',
    'ERROR?': 'string',
  },
});

interface Timer {
  readonly signal: AbortSignal;
  clear(): void;
}

/** An efetch response body, decoded lazily as UTF-8. */
class EntrezRecordStream implements RecordStream {
  private reader: { cancel(): Promise<void>; releaseLock(): void } | null = null;
  private settled = false;

  constructor(
    private readonly response: Response,
    private readonly timer: Timer,
    private readonly explain: (error: unknown) => Error,
  ) {}

  async *read(): AsyncIterable<string> {
    const body = this.response.body;
    if (!body) {
      let text: string;
      try {
        text = await this.response.text();
      } catch (error) {
        throw this.explain(error);
      } finally {
        this.settled = true;
      }
      yield text;
      return;
    }

    const reader = body.getReader();
    this.reader = reader;
    const decoder = new TextDecoder('utf-8');

    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        yield decoder.decode(value, { stream: true });
      }
      // Flush remaining bytes
      const final = decoder.decode();
      this.settled = true;
      if (final) yield final;
    } catch (error) {
      this.settled = true;
      throw this.explain(error);
    }
  }

  async close(): Promise<void> {
    this.timer.clear();
    if (this.reader) {
      if (!this.settled) await this.reader.cancel();
      this.reader.releaseLock();
    } else if (this.response.body && !this.response.bodyUsed) {
      await this.response.body.cancel();
    }
  }
}

/**
 * NCBI Entrez E-utilities client (esearch + efetch over the history server).
 *
 * Requires a runtime with global `fetch` (Node.js >= 18). Every call is bounded
 * by `timeout`; a stalled request fails instead of hanging, and the caller retries it.
 */
export class EntrezClient implements SequenceDatabaseClient {
  private readonly email: string;
  private readonly tool: string;
  private readonly apiKey: string | undefined;
  private readonly timeout: number;
  private readonly baseUrl: string;

  constructor(options: EntrezClientOptions) {
    if (options.email.trim() === '') {
      throw new Error('EntrezClient: a contact email is required');
    }
    this.email = options.email;
    this.tool = options.tool ?? 'isolation-sources';
    this.apiKey = options.apiKey;
    this.timeout = options.timeout ?? 60000;
    this.baseUrl = options.baseUrl ?? ENTREZ_BASE_URL;
  }

  async search(database: Database, query: string, retmax: number): Promise<SearchResult> {
    const url = this.buildUrl('esearch.fcgi', {
      db: database,
      term: query,
      usehistory: 'y',
      retmode: 'json',
      retmax: String(retmax),
    });
    const timer = this.startTimer();

    try {
      const response = await this.send(url, 'esearch', timer);
      const parsed = ESearchResponse(await response.json());
      if (parsed instanceof type.errors) {
        throw new Error(`EntrezClient: unexpected esearch response: ${parsed.summary}`);
      }

      const result = parsed.esearchresult;
      if (result.ERROR) {
        throw new Error(`EntrezClient: esearch error: ${result.ERROR}`);
      }

      const ids = result.idlist ?? [];
      if (ids.length > 0 && (!result.webenv || !result.querykey)) {
        throw new Error('EntrezClient: esearch response has no history context');
      }

      return {
        count: Number(result.count ?? ids.length) || 0,
        ids,
        context: { webEnv: result.webenv ?? '', queryKey: result.querykey ?? '' },
      };
    } catch (error) {
      throw this.explain(error, 'esearch', timer);
    } finally {
      timer.clear();
    }
  }

  async fetch(database: Database, context: ContinuationContext, retmax: number): Promise<RecordStream> {
    const url = this.buildUrl('efetch.fcgi', {
      db: database,
      query_key: context.queryKey,
      WebEnv: context.webEnv,
      rettype: 'gb',
      retmode: 'text',
      retstart: '0',
      retmax: String(retmax),
    });
    const timer = this.startTimer();

    try {
      const response = await this.send(url, 'efetch', timer);
      return new EntrezRecordStream(response, timer, (error) => this.explain(error, 'efetch', timer));
    } catch (error) {
      timer.clear();
      throw this.explain(error, 'efetch', timer);
    }
  }

  private buildUrl(endpoint: string, params: Readonly<Record<string, string>>): string {
    const search = new URLSearchParams({ ...params, tool: this.tool, email: this.email });
    if (this.apiKey) search.set('api_key', this.apiKey);
    return `${this.baseUrl}${endpoint}?${search.toString()}`;
  }

  private async send(url: string, endpoint: string, timer: Timer): Promise<Response> {
    const response = await fetch(url, { signal: timer.signal });
    if (!response.ok) {
      throw new Error(`EntrezClient: HTTP ${String(response.status)} ${response.statusText} for ${endpoint}`);
    }
    return response;
  }

  private startTimer(): Timer {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort();
    }, this.timeout);
    return {
      signal: controller.signal,
      clear: () => {
        clearTimeout(timeoutId);
      },
    };
  }

  private explain(error: unknown, endpoint: string, timer: Timer): Error {
    if (timer.signal.aborted) {
      return new Error(`EntrezClient: ${endpoint} timed out after ${String(this.timeout)} ms`);
    }
    return error instanceof Error ? error : new Error(String(error));
  }
}
