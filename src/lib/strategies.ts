export interface Strategy<T> {
  name: string;
  run: () => Promise<T | undefined>;
}

export interface StrategyOutcome<T> {
  value: T;
  strategy: string;
}

/**
 * Tries each strategy in order and returns the first defined value. A strategy
 * fails by returning undefined or by throwing; `shouldAbort` lets a thrown error
 * stop the whole list instead of moving on.
 */
export async function runStrategies<T>(
  strategies: Strategy<T>[],
  opts?: {
    onFailure?: (strategy: string, error: unknown) => void;
    shouldAbort?: (error: unknown) => boolean;
  }
): Promise<StrategyOutcome<T> | undefined> {
  for (const strategy of strategies) {
    try {
      const value = await strategy.run();
      if (value !== undefined) {
        return { value, strategy: strategy.name };
      }
      opts?.onFailure?.(strategy.name, undefined);
    } catch (error) {
      opts?.onFailure?.(strategy.name, error);
      if (opts?.shouldAbort?.(error)) {
        throw error;
      }
    }
  }
  return undefined;
}
