import { InvalidParameterError } from '../utils/errors';

/** Monotonic block height counter read at call time. */
export interface HeightSource {
  currentHeight(): Promise<bigint>;
}

/**
 * Derives height from wall-clock time: one block every `blockTimeMs` since
 * `genesisMs`. Never reports a lower height than it reported before, even if
 * the system clock steps backwards.
 */
export class ClockHeightSource implements HeightSource {
  private highest = 0n;

  constructor(
    private readonly genesisMs: number,
    private readonly blockTimeMs: number,
    private readonly now: () => number = Date.now
  ) {
    if (blockTimeMs <= 0) {
      throw new InvalidParameterError('Block time must be positive');
    }
  }

  async currentHeight(): Promise<bigint> {
    const elapsed = Math.max(0, this.now() - this.genesisMs);
    const height = BigInt(Math.floor(elapsed / this.blockTimeMs));
    if (height > this.highest) {
      this.highest = height;
    }
    return this.highest;
  }
}

export class ManualHeightSource implements HeightSource {
  constructor(private height: bigint = 0n) {}

  async currentHeight(): Promise<bigint> {
    return this.height;
  }

  setHeight(height: bigint): void {
    if (height < this.height) {
      throw new InvalidParameterError(`Height cannot move backwards from ${this.height} to ${height}`);
    }
    this.height = height;
  }

  advance(blocks: bigint = 1n): bigint {
    this.setHeight(this.height + blocks);
    return this.height;
  }
}
