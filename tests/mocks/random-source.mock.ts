import { vi, type Mock } from 'vitest';

export type MockRandomSource = Mock<(size: number) => Buffer>;

/**
 * Random source returning `fill` repeated, so written content is predictable
 */
export function createMockRandomSource(fill = 0xab): MockRandomSource {
  return vi.fn((size: number) => Buffer.alloc(size, fill));
}

/**
 * Random source that returns `okCalls` chunks and then throws `error`
 */
export function createFailingRandomSource(okCalls: number, error: Error): MockRandomSource {
  let calls = 0;
  return vi.fn((size: number) => {
    calls++;
    if (calls > okCalls) {
      throw error;
    }
    return Buffer.alloc(size, 0xcd);
  });
}
