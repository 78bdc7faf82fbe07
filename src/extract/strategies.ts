import type { Logger } from '../utils/logger.js';

export type Strategy<T> = () => T | Promise<T>;

export interface NamedStrategy<T> {
  name: string;
  run: Strategy<T>;
}

/**
 * Runs strategies in order and returns the first result that is not the
 * fallback. A strategy that throws is logged and treated as a miss.
 */
export async function firstSuccess<T>(
  strategies: Array<NamedStrategy<T>>,
  fallback: T,
  logger?: Logger,
  isMiss: (value: T) => boolean = (value) => value === fallback,
): Promise<T> {
  for (const strategy of strategies) {
    try {
      const value = await strategy.run();
      if (!isMiss(value)) {
        return value;
      }
    } catch (error) {
      logger?.debug(`Strategy ${strategy.name} failed: ${String(error)}`);
    }
  }
  return fallback;
}

/** Awaits `action`, logging and returning `fallback` if it throws. */
export async function orDefault<T>(action: Strategy<T>, fallback: T, label: string, logger?: Logger): Promise<T> {
  try {
    return await action();
  } catch (error) {
    logger?.debug(`${label} failed: ${String(error)}`);
    return fallback;
  }
}
