/**
 * Client for the remote JavaScript-to-bytecode compiler.
 */

import { RemoteCompileError } from '../exceptions';
import { COMPILER_URL } from '../protocol/constants';

/**
 * Minimal fetch signature used by the client.
 */
export type FetchLike = (
  url: string,
  init: { method: string; headers: Record<string, string>; body: string }
) => Promise<Response>;

export interface CompilerClientOptions {
  /** Compiler endpoint (default: COMPILER_URL) */
  url?: string;

  /** Fetch implementation (default: global fetch) */
  fetch?: FetchLike;

  /** Clock used for cache-busting source URLs (default: Date.now) */
  now?: () => number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstServerError(body: Record<string, unknown>): string | undefined {
  const errors = body.serverErrors;
  if (!Array.isArray(errors) || errors.length === 0) {
    return undefined;
  }
  const first: unknown = errors[0];
  if (isRecord(first) && typeof first.error === 'string') {
    return first.error;
  }
  return undefined;
}

/**
 * Parse a JSON compiler response.
 *
 * Format:
 *   { "compiledCode": "<compiled script text>" }
 *   { "serverErrors": [{ "error": "<message>" }] }
 *
 * @param body - Parsed JSON body
 * @returns Compiled code as UTF-8 bytes
 * @throws {RemoteCompileError} If the body carries an error or no compiled code
 */
export function parseCompilerResponse(body: unknown): Uint8Array {
  if (!isRecord(body)) {
    throw new RemoteCompileError('Failed to load script, unknown error occurred.');
  }

  const serverError = firstServerError(body);
  if (serverError !== undefined) {
    throw new RemoteCompileError(`Failed to load script, ${serverError}.`);
  }

  if (typeof body.compiledCode === 'string') {
    return new TextEncoder().encode(body.compiledCode);
  }

  throw new RemoteCompileError('Failed to load script, unknown error occurred.');
}

/**
 * Compiles JavaScript into device bytecode over HTTP.
 *
 * The compiler answers either with the raw bytecode stream or with a JSON
 * document (see {@link parseCompilerResponse}).
 *
 * @example
 * ```typescript
 * const compiler = new CompilerClient();
 * const bytecode = await compiler.compileSource("Moment.on('timertick', function () { Moment.uptime(); });");
 * ```
 */
export class CompilerClient {
  private readonly url: string;
  private readonly fetchImpl: FetchLike;
  private readonly now: () => number;

  constructor(options: CompilerClientOptions = {}) {
    this.url = options.url ?? COMPILER_URL;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.now = options.now ?? Date.now;
  }

  /**
   * Compile inline JavaScript source.
   *
   * @throws {RemoteCompileError} If the request or compilation fails
   */
  async compileSource(source: string): Promise<Uint8Array> {
    return this.request({ js: source });
  }

  /**
   * Compile the JavaScript hosted at a URL.
   *
   * A timestamp query is appended so the compiler does not fetch a cached
   * copy of the script.
   *
   * @throws {RemoteCompileError} If the request or compilation fails
   */
  async compileUrl(sourceUrl: string): Promise<Uint8Array> {
    const separator = sourceUrl.includes('?') ? '&' : '?';
    const timestamp = Math.floor(this.now() / 1000);
    return this.request({ src: `${sourceUrl}${separator}${timestamp}` });
  }

  private async request(params: Record<string, string>): Promise<Uint8Array> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: new URLSearchParams(params).toString(),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new RemoteCompileError(`Compiler request failed: ${message}`, { cause: error });
    }

    if (!response.ok) {
      throw new RemoteCompileError(`Compiler responded with HTTP ${response.status}`);
    }

    const contentType = response.headers.get('content-type') ?? '';
    if (contentType.includes('application/json')) {
      let body: unknown;
      try {
        body = await response.json();
      } catch (error) {
        throw new RemoteCompileError('Compiler returned invalid JSON.', { cause: error });
      }
      return parseCompilerResponse(body);
    }

    const bytecode = new Uint8Array(await response.arrayBuffer());
    console.debug(`Compiled ${bytecode.length} bytes of bytecode`);
    return bytecode;
  }
}
