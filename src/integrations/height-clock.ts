import { badRequest } from '../core/errors.js';
import { currentUnixTime, elapsedIntervals } from '../utils/datetime.js';

/** Monotonically advancing integer clock used for policy expiry. */
export interface HeightClock {
  currentHeight(): Promise<number>;
}

/** Durable home of an operator-driven height, so a restart resumes where it stopped. */
export interface HeightStore {
  loadHeight(): Promise<number | null>;
  saveHeight(height: number): Promise<void>;
}

/** Height that only moves when an operator advances it. */
export class ManualHeightClock implements HeightClock {
  /** Resumes from the stored height, never below `initialHeight`. */
  static async restore(store: HeightStore, initialHeight = 0): Promise<ManualHeightClock> {
    const stored = await store.loadHeight();
    return new ManualHeightClock(Math.max(stored ?? 0, initialHeight));
  }

  private height: number;

  constructor(initialHeight = 0) {
    if (!Number.isSafeInteger(initialHeight) || initialHeight < 0) {
      throw badRequest('INVALID_HEIGHT', 'Initial height must be a non-negative integer.');
    }
    this.height = initialHeight;
  }

  async currentHeight(): Promise<number> {
    return this.height;
  }

  /** Height the clock would show after `blocks` more blocks. */
  heightAfter(blocks = 1): number {
    if (!Number.isSafeInteger(blocks) || blocks < 1) {
      throw badRequest('INVALID_BLOCK_COUNT', 'Clock can only advance by a positive number of blocks.');
    }
    const next = this.height + blocks;
    if (!Number.isSafeInteger(next)) {
      throw badRequest('INVALID_BLOCK_COUNT', 'Clock cannot advance past the largest representable height.');
    }
    return next;
  }

  advance(blocks = 1): number {
    this.height = this.heightAfter(blocks);
    return this.height;
  }
}

export interface BlockTimeHeightClockOptions {
  genesisUnixTime: number;
  blockIntervalSeconds: number;
  initialHeight?: number;
  now?: () => number;
}

/** Height derived from wall time: one block per interval since genesis. */
export class BlockTimeHeightClock implements HeightClock {
  private readonly now: () => number;
  private lastHeight = 0;

  constructor(private readonly options: BlockTimeHeightClockOptions) {
    this.now = options.now ?? currentUnixTime;
  }

  async currentHeight(): Promise<number> {
    const height =
      (this.options.initialHeight ?? 0) +
      elapsedIntervals(this.options.genesisUnixTime, this.now(), this.options.blockIntervalSeconds);
    // wall clocks can step backwards
    this.lastHeight = Math.max(this.lastHeight, height);
    return this.lastHeight;
  }
}
