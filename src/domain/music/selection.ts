import type { NotificationRecord } from '@/domain/music/types';

/**
 * Picks the most recently posted notification that carries a media session
 * token. With an allow-list, only listed packages qualify. On equal post
 * times the record seen first wins.
 */
export function selectActiveNotification(
  records: readonly NotificationRecord[],
  allowList: ReadonlySet<string> | null,
): NotificationRecord | null {
  let winner: NotificationRecord | null = null;
  for (const record of records) {
    if (!carriesSession(record)) continue;
    if (allowList && !allowList.has(record.packageIdentifier)) continue;
    if (!winner || record.postTime > winner.postTime) {
      winner = record;
    }
  }
  return winner;
}

export function carriesSession(record: NotificationRecord): boolean {
  return (
    record.sessionTokenPresent &&
    record.rawSessionToken !== null &&
    record.rawSessionToken !== undefined
  );
}

/**
 * Two selections are the same when they point at the same package and token.
 */
export function isSameSelection(
  left: NotificationRecord | null,
  right: NotificationRecord | null,
): boolean {
  if (left === right) return true;
  if (!left || !right) return false;
  return (
    left.packageIdentifier === right.packageIdentifier &&
    Object.is(left.rawSessionToken, right.rawSessionToken)
  );
}

/**
 * Positive durations are known; everything else (0, negative, NaN) is unknown.
 */
export function normalizeDuration(value: number | null | undefined): number | null {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    return null;
  }
  return value;
}

export function formatDefaultTitle(template: string, appLabel: string): string {
  return template.split('{app}').join(appLabel);
}
