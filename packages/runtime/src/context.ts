/**
 * Generation context
 *
 * Every generated `getGenerator(context)` / `applyDefaults(value, context)`
 * receives one of these and hands it, unchanged or descended, to every
 * nested call. Nothing in the runtime reads ambient state.
 */

export type StringStyle = 'arbitrary' | 'lorem';

export interface TestDataContext {
  /** Seed hint for drivers that sample outside the fast-check runner */
  readonly seed?: number;
  /** Entity boundaries crossed so far (0 at the entity being drawn) */
  readonly depth: number;
  /** From this depth on, optional fields stay absent and containers stay empty */
  readonly maxDepth: number;
  /** Upper bound for list/set/map sizes and string length hints */
  readonly maxCollectionSize: number;
  readonly strings: StringStyle;
}

export const DEFAULT_CONTEXT: TestDataContext = Object.freeze({
  depth: 0,
  maxDepth: 4,
  maxCollectionSize: 5,
  strings: 'arbitrary' as const,
});

/**
 * Extra levels a chain of required references may go past `maxDepth`
 * before the draw is declared unbounded.
 */
export const REQUIRED_DEPTH_ALLOWANCE = 64;

export class RecursionLimitError extends Error {
  constructor(
    public readonly entity: string,
    public readonly depth: number
  ) {
    super(
      `Recursion limit reached while building a generator for ${entity} (depth ${depth}); ` +
        'a cycle of required fields cannot be drawn finitely'
    );
    this.name = 'RecursionLimitError';
  }
}

export function createContext(
  overrides: Partial<TestDataContext> = {}
): TestDataContext {
  const merged: TestDataContext = { ...DEFAULT_CONTEXT, ...overrides };
  if (!Number.isInteger(merged.maxDepth) || merged.maxDepth < 0) {
    throw new RangeError(`maxDepth must be a non-negative integer, got ${merged.maxDepth}`);
  }
  if (
    !Number.isInteger(merged.maxCollectionSize) ||
    merged.maxCollectionSize < 0
  ) {
    throw new RangeError(
      `maxCollectionSize must be a non-negative integer, got ${merged.maxCollectionSize}`
    );
  }
  return Object.freeze(merged);
}

/** Context for the fields of an entity reached from the current one. */
export function descend(context: TestDataContext): TestDataContext {
  return Object.freeze({ ...context, depth: context.depth + 1 });
}

export function atDepthLimit(context: TestDataContext): boolean {
  return context.depth >= context.maxDepth;
}

export function assertWithinDepth(
  context: TestDataContext,
  entity: string
): void {
  if (context.depth > context.maxDepth + REQUIRED_DEPTH_ALLOWANCE) {
    throw new RecursionLimitError(entity, context.depth);
  }
}
