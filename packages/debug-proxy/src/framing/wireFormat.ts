export const TWO_CRLF = '\r\n\r\n';

/**
 * `framed`: `Content-Length: n\r\n\r\n` followed by an n-byte JSON body (DAP).
 * `bare`: self-delimited brace-balanced JSON objects (Delve JSON-RPC).
 */
export type WireFormat = 'framed' | 'bare';

/**
 * Decides the wire format from the first bytes a client sends.
 * Returns undefined while only whitespace has arrived.
 */
export function detectWireFormat(bytes: Buffer): WireFormat | undefined {
  for (const byte of bytes) {
    switch (byte) {
      case 0x20: // ' '
      case 0x09: // '\t'
      case 0x0a: // '\n'
      case 0x0d: // '\r'
        continue;
      case 0x43: // 'C'
      case 0x63: // 'c'
        return 'framed';
      default:
        return 'bare';
    }
  }
  return undefined;
}

export function encodeFrame(format: WireFormat, body: Buffer | string): Buffer {
  const payload = typeof body === 'string' ? Buffer.from(body, 'utf8') : body;
  if (format === 'bare') {
    return payload;
  }
  const header = Buffer.from(
    `Content-Length: ${payload.length}${TWO_CRLF}`,
    'ascii',
  );
  return Buffer.concat([header, payload]);
}
