import { describe, expect, it } from '@jest/globals';
import { DivisionByZeroError, ValidationError } from '../errors/CustomError';
import { StatSeries } from '../stats/StatSeries';

describe('StatSeries', () => {
  it('does not store the first rate sample', () => {
    const series = new StatSeries('rate', 'spam msg/sec', 4);
    expect(series.update(123456, 1000)).toBeNull();
    expect(series.history).toEqual([]);
    expect(series.last()).toBeUndefined();
  });

  it('stores (v[i+1] - v[i]) / elapsed for consecutive updates', () => {
    const series = new StatSeries('rate', 'spam msg/sec', 5);
    const raw = [0, 2000, 6000, 6000, 7000];
    raw.forEach(v => series.update(v, 1000));
    expect(series.history).toEqual([2, 4, 0, 1]);
    expect(series.last()).toBe(1);
  });

  it('evicts the oldest value once the window is full', () => {
    const series = new StatSeries('rate', 'ham msg/sec', 3);
    // derived: 1, 2, 3, 4
    [0, 1000, 3000, 6000, 10000].forEach(v => series.update(v, 1000));
    expect(series.history).toEqual([2, 3, 4]);
    expect(series.history.length).toBe(series.capacity);
  });

  it('keeps the second update value first after capacity + 1 derived values', () => {
    const series = new StatSeries('gauge', 'average_time sec', 2);
    series.update(1, 1000);
    series.update(2, 1000);
    series.update(3, 1000);
    expect(series.history).toEqual([2, 3]);
  });

  it('leaves history untouched on DivisionByZeroError', () => {
    const series = new StatSeries('rate', 'junk msg/sec', 3);
    series.update(0, 1000);
    series.update(1000, 1000);
    expect(() => series.update(5000, 0)).toThrow(DivisionByZeroError);
    expect(series.history).toEqual([1]);
    expect(series.previousRawValue).toBe(5000);
  });

  it('stores gauge values from the first update on', () => {
    const series = new StatSeries('gauge', 'average_time sec', 3);
    expect(series.update(0.5, 0)).toBe(0.5);
    expect(series.history).toEqual([0.5]);
  });

  it('summarises the window', () => {
    const series = new StatSeries('gauge', 'average_time sec', 10);
    expect(series.summary()).toBeNull();
    [4, 1, 7].forEach(v => series.update(v, 1000));
    expect(series.summary()).toEqual({ last: 7, avg: 4, min: 1, max: 7, count: 3 });
  });

  it('reset clears the window and the previous raw value', () => {
    const series = new StatSeries('rate', 'spam msg/sec', 3);
    [0, 1000, 2000].forEach(v => series.update(v, 1000));
    series.reset();
    expect(series.history).toEqual([]);
    expect(series.previousRawValue).toBeUndefined();
    expect(series.update(9000, 1000)).toBeNull();
  });

  it.each([0, -1, 2.5, Number.NaN])('rejects capacity %p', capacity => {
    expect(() => new StatSeries('rate', 'x', capacity)).toThrow(ValidationError);
  });
});
