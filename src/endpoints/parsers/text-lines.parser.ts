import { PayloadRow, PayloadShapeError } from './payload-values';

const FLAG_LINE = /^--([^=\s]+)=(.*)$/;

/** `/varz?raw`: one `--name=value` line per flag. */
export function parseFlagLines(body: string): PayloadRow[] {
  const rows: PayloadRow[] = [];
  for (const line of body.split('\n')) {
    const match = FLAG_LINE.exec(line.trim());
    if (match) rows.push({ name: match[1], value: match[2] });
  }
  if (rows.length === 0 && body.trim().length > 0) {
    throw new PayloadShapeError('no --flag=value lines found');
  }
  return rows;
}

const GLOG_LINE = /^([IWEF])(\d{4} \d{2}:\d{2}:\d{2}\.\d{6})\s+(\d+)\s+([^\]\s]+)\]\s?(.*)$/;

/**
 * `/logs?raw`: glog formatted lines. A line without a glog prefix continues
 * the message of the line before it; anything before the first entry is the
 * log file banner and is skipped.
 */
export function parseGlogLines(body: string): PayloadRow[] {
  const rows: PayloadRow[] = [];
  let current: PayloadRow | undefined;

  for (const line of body.split('\n')) {
    const match = GLOG_LINE.exec(line);
    if (match) {
      current = {
        severity: match[1],
        log_time: match[2],
        thread_id: match[3],
        source: match[4],
        message: match[5],
      };
      rows.push(current);
      continue;
    }
    if (current && line.length > 0) {
      current.message = `${current.message}\n${line}`;
    }
  }

  return rows;
}
