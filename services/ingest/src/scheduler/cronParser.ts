import { parseExpression } from 'cron-parser';
import type { CronExpression, ParserOptions } from 'cron-parser';

export function parseCronExpression(expression: string, options: ParserOptions = {}): CronExpression {
  const trimmed = expression.trim();
  if (trimmed.length === 0) {
    throw new Error('Cron expression must be a non-empty string');
  }
  const normalized: ParserOptions = { ...options };
  if (typeof normalized.tz === 'string') {
    const tz = normalized.tz.trim();
    if (tz.length === 0) {
      delete normalized.tz;
    } else {
      normalized.tz = tz;
    }
  }
  return parseExpression(trimmed, normalized);
}

export function nextRunAt(cron: string, timezone: string, after: Date): Date {
  return parseCronExpression(cron, { currentDate: after, tz: timezone }).next().toDate();
}
