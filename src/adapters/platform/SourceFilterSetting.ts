import type { SourceFilterPort, Unsubscribe } from '@/ports/NotificationSourcePort';
import { ReplayValue } from '@/shared/reactive/replayValue';

export class SourceFilterSetting implements SourceFilterPort {
  private readonly value = new ReplayValue<boolean>('sourceFilter', {
    equals: (left, right) => left === right,
  });

  constructor(initial: boolean) {
    this.value.emit(initial);
  }

  public get enabled(): boolean {
    return this.value.peek() ?? false;
  }

  public set(enabled: boolean): void {
    this.value.emit(enabled);
  }

  public subscribe(listener: (enabled: boolean) => void): Unsubscribe {
    return this.value.subscribe(listener);
  }
}
