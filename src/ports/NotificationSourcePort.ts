import type { NotificationRecord } from '@/domain/music/types';

export type Unsubscribe = () => void;

/**
 * Live feed of the host's currently posted notifications. Each call of the
 * listener carries the complete current set, replacing the previous one.
 */
export interface NotificationSourcePort {
  subscribe(listener: (records: readonly NotificationRecord[]) => void): Unsubscribe;
}

/**
 * User setting restricting discovery to known music apps.
 */
export interface SourceFilterPort {
  subscribe(listener: (enabled: boolean) => void): Unsubscribe;
}
