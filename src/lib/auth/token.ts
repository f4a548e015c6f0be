import { timingSafeEqual } from 'node:crypto';

function toPaddedBuffer(value: string, length: number): Buffer {
  const source = Buffer.from(value, 'utf8');
  const padded = Buffer.alloc(length);
  source.copy(padded);
  return padded;
}

export function constantTimeEquals(a: string, b: string): boolean {
  const maxLen = Math.max(
    Buffer.byteLength(a, 'utf8'),
    Buffer.byteLength(b, 'utf8'),
  );
  const aBuf = toPaddedBuffer(a, maxLen);
  const bBuf = toPaddedBuffer(b, maxLen);
  const equal = timingSafeEqual(aBuf, bBuf);
  return equal && a.length === b.length;
}

export function readBearerToken(request: Request): string | null {
  const header = request.headers.get('authorization');
  if (!header) return null;
  const match = header.match(/^Bearer\s+(\S+)\s*$/i);
  return match ? match[1] : null;
}

/** Ingestion is disabled when no token is configured. */
export function isIngestAuthorized(
  request: Request,
  expected: string | undefined,
): boolean {
  if (!expected) return false;
  const token = readBearerToken(request);
  return token !== null && constantTimeEquals(token, expected);
}
