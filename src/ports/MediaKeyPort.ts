import type { MediaKeyAction, MediaKeyCode } from '@/domain/music/types';

export interface MediaKeyPort {
  dispatch(keyCode: MediaKeyCode, action: MediaKeyAction): void | Promise<void>;
}
