import { describe, it, expect } from 'vitest';
import { nextUpdatedAt } from './clock';

const previous = new Date('2025-01-01T12:00:00.000Z');

describe('nextUpdatedAt', () => {
  it('should use the clock when it is ahead of the previous stamp', () => {
    const later = new Date('2025-01-01T12:00:01.000Z');

    expect(nextUpdatedAt(previous, () => later)).toBe(later);
  });

  it('should keep the previous stamp when the clock is behind', () => {
    const earlier = new Date('2025-01-01T11:59:55.000Z');

    expect(nextUpdatedAt(previous, () => earlier)).toBe(previous);
  });

  it('should accept a clock equal to the previous stamp', () => {
    const same = new Date(previous.getTime());

    expect(nextUpdatedAt(previous, () => same).getTime()).toBe(previous.getTime());
  });
});
