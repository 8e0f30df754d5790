import type { GeneratorConfig } from './config.js';

/**
 * Produces the reading for a sensor `elapsedMs` after its stream started.
 */
export type ValueGenerator = (elapsedMs: number) => number;

export function createGenerator(
  config: GeneratorConfig,
  random: () => number = Math.random
): ValueGenerator {
  switch (config.kind) {
    case 'constant':
      return () => config.value;

    case 'random':
      return () => config.min + random() * (config.max - config.min);

    case 'sine': {
      const mid = (config.min + config.max) / 2;
      const amplitude = (config.max - config.min) / 2;
      return (elapsedMs) => mid + amplitude * Math.sin((2 * Math.PI * elapsedMs) / config.periodMs);
    }
  }
}
