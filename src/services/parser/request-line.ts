export interface RequestParts {
  method: string;
  uri: string;
  path: string;
  query: string;
  proto: string;
}

const SCHEME_RE = /^[A-Za-z][A-Za-z0-9+.-]*:/;

function stripParams(path: string): string {
  const lastSlash = path.lastIndexOf('/');
  const semi = path.indexOf(';', lastSlash < 0 ? 0 : lastSlash);
  return semi < 0 ? path : path.slice(0, semi);
}

/**
 * Splits an absolute URL into path and query. The scheme and authority are
 * dropped, as are the fragment and `;params` of the last path segment.
 */
export function splitAbsoluteUri(uri: string): { path: string; query: string } {
  let rest = uri;
  const scheme = SCHEME_RE.exec(rest);
  if (scheme) rest = rest.slice(scheme[0].length);

  if (rest.startsWith('//')) {
    const authorityEnd = rest.slice(2).search(/[/?#]/);
    rest = authorityEnd < 0 ? '' : rest.slice(2 + authorityEnd);
  }

  const hash = rest.indexOf('#');
  if (hash >= 0) rest = rest.slice(0, hash);

  const q = rest.indexOf('?');
  const path = q >= 0 ? rest.slice(0, q) : rest;
  const query = q >= 0 ? rest.slice(q + 1) : '';
  return { path: stripParams(path), query };
}

/** `"GET /path?x=1 HTTP/2.0"` → method, uri, path, query, proto. */
export function splitRequest(request: string): RequestParts {
  const parts = request.split(/\s+/).filter((p) => p.length > 0);
  const method = parts[0] ?? '';
  const uri = parts[1] ?? '';
  const proto = parts[2] ?? '';

  let path = uri;
  let query = '';
  if (uri.includes('://')) {
    ({ path, query } = splitAbsoluteUri(uri));
  } else if (uri.includes('?')) {
    const q = uri.indexOf('?');
    path = uri.slice(0, q);
    query = uri.slice(q + 1);
  }

  return { method, uri, path, query, proto };
}

const ESCAPE_RUN = /(?:%[0-9A-Fa-f]{2})+/g;

// Each run of %XX escapes is decoded as UTF-8 on its own; invalid byte
// sequences become U+FFFD and stray `%` signs stay as they are.
function decodeQueryName(raw: string): string {
  return raw
    .replace(/\+/g, ' ')
    .replace(ESCAPE_RUN, (run) =>
      Buffer.from(run.replace(/%/g, ''), 'hex').toString('utf8'),
    );
}

/**
 * Number of distinct query parameter names that carry a non-empty value.
 * Bare names (`?debug`) and empty values (`?a=`) are not counted.
 */
export function countQueryKeys(query: string): number {
  if (!query) return 0;
  const names = new Set<string>();
  for (const piece of query.split('&')) {
    if (!piece) continue;
    const eq = piece.indexOf('=');
    if (eq < 0) continue;
    if (eq === piece.length - 1) continue;
    names.add(decodeQueryName(piece.slice(0, eq)));
  }
  return names.size;
}
