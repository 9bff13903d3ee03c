import type { NotificationRecord } from '@/domain/music/types';
import type { NotificationSourcePort, Unsubscribe } from '@/ports/NotificationSourcePort';
import { ReplayValue } from '@/shared/reactive/replayValue';

/**
 * Notification source fed by the host: each `publish` replaces the current set.
 */
export class InMemoryNotificationFeed implements NotificationSourcePort {
  private readonly current = new ReplayValue<readonly NotificationRecord[]>('notifications');

  public publish(records: readonly NotificationRecord[]): void {
    this.current.emit(Object.freeze([...records]));
  }

  public subscribe(listener: (records: readonly NotificationRecord[]) => void): Unsubscribe {
    return this.current.subscribe(listener);
  }
}
