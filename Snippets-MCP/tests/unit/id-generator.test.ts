import { describe, it, expect } from 'vitest';
import { generateExecutionId } from '../../src/utils/id-generator.js';

describe('generateExecutionId', () => {
  it('should encode the start time ahead of the random part', () => {
    expect(generateExecutionId(0)).toMatch(/^run_000000000[0-9a-f]{8}$/);
    expect(generateExecutionId(36 ** 3)).toMatch(/^run_000001000[0-9a-f]{8}$/);
  });

  it('should sort by start time', () => {
    const ids = [generateExecutionId(1_700_000_000_000), generateExecutionId(1_699_999_999_999)];
    expect([...ids].sort()).toEqual([ids[1], ids[0]]);
  });

  it('should differ between calls at the same time', () => {
    expect(generateExecutionId(5)).not.toBe(generateExecutionId(5));
  });
});
