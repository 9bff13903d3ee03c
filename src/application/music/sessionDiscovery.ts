import type { NotificationRecord } from '@/domain/music/types';
import { isSameSelection, selectActiveNotification } from '@/domain/music/selection';
import type { AppCatalogPort } from '@/ports/AppCatalogPort';
import type {
  NotificationSourcePort,
  SourceFilterPort,
  Unsubscribe,
} from '@/ports/NotificationSourcePort';
import { bestEffort } from '@/shared/bestEffort';
import { createLogger, type Logger } from '@/shared/logging/logger';
import { ReplayValue, type ReadableValue } from '@/shared/reactive/replayValue';

type DiscoveryDeps = {
  notifications: NotificationSourcePort;
  sourceFilter: SourceFilterPort;
  appCatalog: AppCatalogPort;
  log?: Logger;
};

/**
 * Combines the notification feed with the source filter and publishes the
 * notification whose session should be controlled, or `null`.
 *
 * Nothing is published until both inputs have delivered a value. Consecutive
 * equal selections are published once.
 */
export class SessionDiscovery {
  private readonly log: Logger;
  private readonly selection: ReplayValue<NotificationRecord | null>;
  private records: readonly NotificationRecord[] | null = null;
  private filterEnabled: boolean | null = null;
  private allowList: ReadonlySet<string> | null = null;
  private sequence = 0;
  private subscriptions: Unsubscribe[] = [];

  constructor(private readonly deps: DiscoveryDeps) {
    this.log = deps.log ?? createLogger('Music', 'Discovery');
    this.selection = new ReplayValue('selection', { equals: isSameSelection, log: this.log });
  }

  public get selected(): ReadableValue<NotificationRecord | null> {
    return this.selection;
  }

  public start(): void {
    if (this.subscriptions.length > 0) return;
    this.subscriptions = [
      this.deps.notifications.subscribe((records) => {
        this.records = records;
        this.recompute();
      }),
      this.deps.sourceFilter.subscribe((enabled) => {
        if (enabled && this.filterEnabled !== true) {
          // Re-read on every switch-on; the catalog may have changed.
          this.allowList = null;
        }
        this.filterEnabled = enabled;
        this.recompute();
      }),
    ];
  }

  public stop(): void {
    for (const unsubscribe of this.subscriptions) {
      unsubscribe();
    }
    this.subscriptions = [];
    this.filterEnabled = null;
    this.allowList = null;
    this.sequence += 1;
  }

  private recompute(): void {
    const records = this.records;
    const filterEnabled = this.filterEnabled;
    if (records === null || filterEnabled === null) return;

    const sequence = ++this.sequence;
    if (!filterEnabled) {
      this.publish(selectActiveNotification(records, null));
      return;
    }
    if (this.allowList) {
      this.publish(selectActiveNotification(records, this.allowList));
      return;
    }
    void this.loadAllowList().then((allowList) => {
      // Inputs changed while the allow-list was loading; that run publishes.
      if (sequence !== this.sequence) return;
      this.publish(selectActiveNotification(records, allowList));
    });
  }

  private publish(record: NotificationRecord | null): void {
    if (this.selection.emit(record)) {
      this.log.debug('active session changed', {
        packageIdentifier: record?.packageIdentifier ?? null,
        postTime: record?.postTime ?? null,
      });
    }
  }

  /**
   * Loads the music-app allow-list, kept until the filter is next switched on.
   * A failed lookup disables filtering for this run and is retried on the next
   * change.
   */
  private async loadAllowList(): Promise<ReadonlySet<string> | null> {
    const apps = await bestEffort<readonly string[] | null>(() => this.deps.appCatalog.listMusicApps(), {
      fallback: null,
      onError: 'warn',
      log: this.log,
      label: 'music app lookup failed; source filter ignored',
    });
    if (apps === null) {
      return null;
    }
    this.allowList = new Set(apps);
    return this.allowList;
  }
}
