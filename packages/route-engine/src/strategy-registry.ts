import { UnknownStrategyError } from "./errors.js";
import {
  NearestNeighborStrategy,
  TwoOptStrategy,
  type RouteStrategy,
  type StrategyOptions
} from "./strategies.js";

export type StrategyFactory = (options: StrategyOptions) => RouteStrategy;

export class StrategyRegistry {
  private readonly factories = new Map<string, StrategyFactory>();

  register(name: string, factory: StrategyFactory): this {
    this.factories.set(name, factory);
    return this;
  }

  names(): string[] {
    return [...this.factories.keys()];
  }

  create(name: string, options: StrategyOptions): RouteStrategy {
    const factory = this.factories.get(name);
    if (!factory) {
      throw new UnknownStrategyError(name, this.names());
    }
    return factory(options);
  }
}

export function createDefaultStrategyRegistry(): StrategyRegistry {
  return new StrategyRegistry()
    .register("nearest_neighbor", (options) => new NearestNeighborStrategy(options))
    .register("2opt", (options) => new TwoOptStrategy(options));
}
