export type PayloadRow = Record<string, string>;

/** Thrown by a parser when a body does not have the shape its endpoint serves. */
export class PayloadShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PayloadShapeError';
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseJsonBody(body: string): unknown {
  try {
    return JSON.parse(body) as unknown;
  } catch (err) {
    throw new PayloadShapeError(`invalid json: ${err instanceof Error ? err.message : String(err)}`);
  }
}

export function requireRecord(value: unknown, what: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new PayloadShapeError(`expected ${what} to be an object`);
  }
  return value;
}

export function requireArray(value: unknown, what: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new PayloadShapeError(`expected ${what} to be an array`);
  }
  return value;
}

export function valueAtPath(source: unknown, path: string): unknown {
  let current: unknown = source;
  for (const segment of path.split('.')) {
    if (!isRecord(current)) return undefined;
    current = current[segment];
  }
  return current;
}

function isHostPort(value: unknown): value is { host: unknown; port: unknown } {
  return isRecord(value) && 'host' in value && 'port' in value;
}

/**
 * Renders any JSON value as a single cell. Address lists (`[{host, port}]`) are
 * written as `host:port,host:port`.
 */
export function toCell(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  if (Array.isArray(value)) {
    return value
      .map((item) => (isHostPort(item) ? `${toCell(item.host)}:${toCell(item.port)}` : toCell(item)))
      .join(',');
  }
  return JSON.stringify(value);
}

export function toFiniteNumber(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

export function decodeHtmlEntities(text: string): string {
  return text
    .replace(/&nbsp;/g, ' ')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&#(\d+);/g, (_match, code: string) => String.fromCharCode(parseInt(code, 10)))
    .replace(/&amp;/g, '&');
}
