import { ProtocolError } from '@/domain/errors';
import type { Track } from '@/domain/playback/types';

/**
 * FIFO of pending tracks. Unbounded; insertion order is playback order.
 */
export class TrackQueue {
  private readonly items: Track[] = [];

  public get length(): number {
    return this.items.length;
  }

  public enqueue(track: Track): number {
    if (!track.locator) {
      throw new ProtocolError('track locator must be a non-empty string');
    }
    this.items.push(track);
    return this.items.length;
  }

  public shift(): Track | undefined {
    return this.items.shift();
  }

  public locators(): string[] {
    return this.items.map((item) => item.locator);
  }
}
