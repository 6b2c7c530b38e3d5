import { vi, type Mock } from 'vitest';

type ChainStep = Mock<(...args: unknown[]) => MockQueryChain>;

/**
 * Stand-in for a drizzle query builder: every builder call returns the same
 * chain and awaiting it at any point settles with the configured outcome.
 */
export interface MockQueryChain extends PromiseLike<unknown> {
  from: ChainStep;
  where: ChainStep;
  limit: ChainStep;
  orderBy: ChainStep;
  values: ChainStep;
  set: ChainStep;
  onConflictDoNothing: ChainStep;
  onConflictDoUpdate: ChainStep;
  returning: ChainStep;
}

export function createQueryChain(result: unknown): MockQueryChain {
  return buildChain(() => Promise.resolve(result));
}

export function createFailingQueryChain(error: unknown): MockQueryChain {
  return buildChain(() => Promise.reject(error));
}

function buildChain(settle: () => Promise<unknown>): MockQueryChain {
  const step = (): ChainStep => vi.fn<(...args: unknown[]) => MockQueryChain>(() => chain);
  const chain: MockQueryChain = {
    from: step(),
    where: step(),
    limit: step(),
    orderBy: step(),
    values: step(),
    set: step(),
    onConflictDoNothing: step(),
    onConflictDoUpdate: step(),
    returning: step(),
    then<R1 = unknown, R2 = never>(
      onFulfilled?: ((value: unknown) => R1 | PromiseLike<R1>) | null,
      onRejected?: ((reason: unknown) => R2 | PromiseLike<R2>) | null
    ): Promise<R1 | R2> {
      return settle().then(onFulfilled, onRejected);
    },
  };
  return chain;
}

export interface MockDb {
  select: Mock<(...args: unknown[]) => MockQueryChain>;
  insert: Mock<(...args: unknown[]) => MockQueryChain>;
  update: Mock<(...args: unknown[]) => MockQueryChain>;
  delete: Mock<(...args: unknown[]) => MockQueryChain>;
}

/** Each entry point defaults to an empty result; tests queue their own chains */
export function createMockDb(): MockDb {
  return {
    select: vi.fn<(...args: unknown[]) => MockQueryChain>(() => createQueryChain([])),
    insert: vi.fn<(...args: unknown[]) => MockQueryChain>(() => createQueryChain([])),
    update: vi.fn<(...args: unknown[]) => MockQueryChain>(() => createQueryChain([])),
    delete: vi.fn<(...args: unknown[]) => MockQueryChain>(() => createQueryChain([])),
  };
}
