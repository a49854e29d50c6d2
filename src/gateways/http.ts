import { Buffer } from "node:buffer";

/** Error code emitted when the remote responds with a non-success status. */
const ERROR_HTTP_STATUS = "E-HTTP-STATUS" as const;
/** Error code emitted when the request fails due to network errors or timeouts. */
const ERROR_HTTP_NETWORK = "E-HTTP-NETWORK" as const;

type HttpErrorCode = typeof ERROR_HTTP_STATUS | typeof ERROR_HTTP_NETWORK;

/** Error thrown when a remote resource cannot be retrieved. */
export class HttpGatewayError extends Error {
  public readonly code: HttpErrorCode;
  public readonly status: number | null;
  public readonly url: string;

  constructor(message: string, options: { code: HttpErrorCode; url: string; status?: number | null; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = "HttpGatewayError";
    this.code = options.code;
    this.url = options.url;
    this.status = options.status ?? null;
  }
}

/**
 * Read-only HTTP access used by the FASTA acquisition strategies. A single
 * attempt is made per call: the pipeline never retries on its own, operators
 * re-run the stage instead.
 */
export interface HttpGateway {
  getText(url: string): Promise<string>;
  getBuffer(url: string): Promise<Buffer>;
  getJson(url: string): Promise<unknown>;
}

export interface FetchHttpGatewayOptions {
  readonly timeoutMs: number;
  readonly userAgent?: string;
  readonly fetchImpl?: typeof fetch;
}

/** {@link HttpGateway} backed by the WHATWG `fetch` API with a per-request timeout. */
export class FetchHttpGateway implements HttpGateway {
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: FetchHttpGatewayOptions) {
    this.timeoutMs = options.timeoutMs;
    this.userAgent = options.userAgent ?? "xlink-trainer/0.1";
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  getText(url: string): Promise<string> {
    return this.performRequest(url, "text/plain, */*", (response) => response.text());
  }

  getBuffer(url: string): Promise<Buffer> {
    return this.performRequest(url, "*/*", async (response) => Buffer.from(await response.arrayBuffer()));
  }

  getJson(url: string): Promise<unknown> {
    return this.performRequest(url, "application/json", (response): Promise<unknown> => response.json());
  }

  /** The timeout covers both the response headers and the body download. */
  private async performRequest<T>(url: string, accept: string, readBody: (response: Response) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          method: "GET",
          headers: { Accept: accept, "User-Agent": this.userAgent },
          signal: controller.signal,
        });
      } catch (error) {
        throw this.networkError(url, controller.signal, error);
      }

      if (!response.ok) {
        throw new HttpGatewayError(`GET ${url} returned HTTP ${response.status}`, {
          code: ERROR_HTTP_STATUS,
          url,
          status: response.status,
        });
      }

      try {
        return await readBody(response);
      } catch (error) {
        throw this.networkError(url, controller.signal, error);
      }
    } finally {
      clearTimeout(timeout);
    }
  }

  private networkError(url: string, signal: AbortSignal, cause: unknown): HttpGatewayError {
    const reason = signal.aborted ? `timed out after ${this.timeoutMs}ms` : "network failure";
    return new HttpGatewayError(`GET ${url} failed: ${reason}`, { code: ERROR_HTTP_NETWORK, url, cause });
  }
}
