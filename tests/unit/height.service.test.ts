import { ClockHeightSource, ManualHeightSource } from '../../src/services/height.service';
import { InvalidParameterError } from '../../src/utils/errors';

describe('ClockHeightSource', () => {
  it('counts whole blocks since genesis', async () => {
    let now = 1_000;
    const source = new ClockHeightSource(1_000, 100, () => now);

    expect(await source.currentHeight()).toBe(0n);
    now = 1_250;
    expect(await source.currentHeight()).toBe(2n);
  });

  it('reports zero before genesis', async () => {
    const source = new ClockHeightSource(5_000, 100, () => 1_000);

    expect(await source.currentHeight()).toBe(0n);
  });

  it('never goes backwards when the clock does', async () => {
    let now = 1_500;
    const source = new ClockHeightSource(1_000, 100, () => now);

    expect(await source.currentHeight()).toBe(5n);
    now = 1_100;
    expect(await source.currentHeight()).toBe(5n);
  });

  it('requires a positive block time', () => {
    expect(() => new ClockHeightSource(0, 0)).toThrow(InvalidParameterError);
  });
});

describe('ManualHeightSource', () => {
  it('moves forward only', async () => {
    const source = new ManualHeightSource(3n);

    expect(source.advance()).toBe(4n);
    expect(source.advance(6n)).toBe(10n);
    expect(await source.currentHeight()).toBe(10n);
    expect(() => source.setHeight(9n)).toThrow(InvalidParameterError);
  });
});
