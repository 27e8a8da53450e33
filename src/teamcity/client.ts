import { RemoteQueryError, TransportError, type QueryError } from '../core/errors.js';
import { fail, ok, type Result } from '../core/result.js';
import { buildServerRequestsTotal } from '../metrics/index.js';
import { getLogger } from '../utils/logging.js';
import { parseDocument, type XmlElement } from './document.js';

/** What the detection logic needs from the build server. */
export interface BuildServerQuery {
  query(path: string, queryString?: string): Promise<Result<XmlElement, QueryError>>;
}

export interface BuildServerCredential {
  username: string;
  password: string;
}

export interface BuildServerClientOptions {
  serverBaseUrl: string;
  contextRoot?: string;
  credential: BuildServerCredential;
  /** 0 or undefined means wait indefinitely. */
  timeoutMs?: number;
  fetch?: typeof fetch;
}

/**
 * Accepts either a clean resource path or a relative URI carrying its own
 * query; an embedded query wins over the explicit one.
 */
export function splitQuery(path: string, queryString?: string): { path: string; query?: string } {
  const idx = path.indexOf('?');
  if (idx === -1) return { path, query: queryString };
  return { path: path.slice(0, idx), query: path.slice(idx + 1) };
}

export function basicAuthHeader(credential: BuildServerCredential): string {
  const token = Buffer.from(`${credential.username}:${credential.password}`).toString('base64');
  return `Basic ${token}`;
}

/**
 * TeamCity REST client. Stateless: every call sends the credential again and
 * no session cookie is kept.
 */
export class BuildServerClient implements BuildServerQuery {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly opts: BuildServerClientOptions) {
    this.fetchImpl = opts.fetch ?? ((input, init) => fetch(input, init));
  }

  urlFor(path: string, queryString?: string): string {
    const split = splitQuery(path, queryString);
    const base = `${this.opts.serverBaseUrl}${this.opts.contextRoot ?? ''}${split.path}`;
    return split.query ? `${base}?${split.query}` : base;
  }

  async query(path: string, queryString?: string): Promise<Result<XmlElement, QueryError>> {
    const url = this.urlFor(path, queryString);
    const timeoutMs = this.opts.timeoutMs ?? 0;
    let res: Response;
    let body: string;
    try {
      res = await this.fetchImpl(url, {
        method: 'GET',
        headers: {
          Authorization: basicAuthHeader(this.opts.credential),
          Accept: 'application/xml',
        },
        signal: timeoutMs > 0 ? AbortSignal.timeout(timeoutMs) : undefined,
      });
      body = await res.text();
    } catch (err) {
      buildServerRequestsTotal.inc({ outcome: 'transport_error' });
      return fail(
        new TransportError(
          `Build server unreachable: ${err instanceof Error ? err.message : String(err)}`,
          path,
          err,
        ),
      );
    }

    if (!res.ok) {
      buildServerRequestsTotal.inc({ outcome: 'http_error' });
      return fail(
        new RemoteQueryError(`Build server responded with error code: ${res.status}`, path, res.status),
      );
    }

    const parsed = parseDocument(body);
    if (parsed.kind !== 'document') {
      buildServerRequestsTotal.inc({ outcome: 'invalid_document' });
      const detail = parsed.kind === 'malformed' ? `malformed XML: ${parsed.reason}` : 'no XML data';
      return fail(new RemoteQueryError(`Build server returned ${detail}`, path, res.status));
    }
    buildServerRequestsTotal.inc({ outcome: 'success' });
    getLogger().trace({ url, status: res.status, root: parsed.root.name }, 'build-server-query');
    return ok(parsed.root);
  }
}
