import type { IncomingHttpHeaders } from 'node:http';
import { HOP_BY_HOP_HEADERS } from './proxy.constants';

type HeaderValue = string | string[];

/** Headers listed in `Connection` are hop-by-hop too. */
function connectionTokens(headers: IncomingHttpHeaders): Set<string> {
  const connection = headers.connection;
  if (!connection) return new Set();

  return new Set(
    connection
      .split(',')
      .map((token) => token.trim().toLowerCase())
      .filter(Boolean),
  );
}

function withoutHopByHop(
  headers: IncomingHttpHeaders,
  alsoDrop: ReadonlySet<string>,
): Record<string, HeaderValue> {
  const dropped = connectionTokens(headers);
  const result: Record<string, HeaderValue> = {};

  for (const [name, value] of Object.entries(headers)) {
    const lowerName = name.toLowerCase();
    if (value === undefined) continue;
    if (HOP_BY_HOP_HEADERS.has(lowerName) || dropped.has(lowerName) || alsoDrop.has(lowerName)) {
      continue;
    }
    result[lowerName] = value;
  }

  return result;
}

const REQUEST_ONLY_DROPS: ReadonlySet<string> = new Set(['host', 'content-length', 'authorization']);
const NO_DROPS: ReadonlySet<string> = new Set();

export function buildUpstreamRequestHeaders(
  inbound: IncomingHttpHeaders,
  token: string,
): Record<string, HeaderValue> {
  return {
    ...withoutHopByHop(inbound, REQUEST_ONLY_DROPS),
    authorization: `Bearer ${token}`,
  };
}

export function buildDownstreamResponseHeaders(
  upstream: IncomingHttpHeaders,
): Record<string, HeaderValue> {
  return withoutHopByHop(upstream, NO_DROPS);
}
