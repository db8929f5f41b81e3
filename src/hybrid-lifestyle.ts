import { Lifestyle } from "./lifestyle";
import type { Registration } from "./registration";
import { TCachingFactory, TLifestyleSelector } from "./types";
import { requireNotNull } from "./utils";

/**
 * Picks one of two lifestyles on every request. Both caching factories are
 * built up front, with the registration.
 */
export class HybridLifestyle extends Lifestyle {
  private readonly _selector: TLifestyleSelector;
  private readonly _trueLifestyle: Lifestyle;
  private readonly _falseLifestyle: Lifestyle;

  public constructor(
    selector: TLifestyleSelector,
    trueLifestyle: Lifestyle,
    falseLifestyle: Lifestyle
  ) {
    super(hybridName(selector, trueLifestyle, falseLifestyle));
    this._selector = selector;
    this._trueLifestyle = trueLifestyle;
    this._falseLifestyle = falseLifestyle;
  }

  public get componentLength(): number {
    return Math.max(
      this._trueLifestyle.componentLength,
      this._falseLifestyle.componentLength
    );
  }

  public get dependencyLength(): number {
    return Math.min(
      this._trueLifestyle.dependencyLength,
      this._falseLifestyle.dependencyLength
    );
  }

  protected get length(): number {
    return this.componentLength;
  }

  protected createRegistrationCore<T>(
    registration: Registration<T>
  ): TCachingFactory<T> {
    return createHybridCachingFactory(
      this._selector,
      Lifestyle.createCachingFactoryFor(this._trueLifestyle, registration),
      Lifestyle.createCachingFactoryFor(this._falseLifestyle, registration)
    );
  }
}

export function createHybridCachingFactory<T>(
  selector: TLifestyleSelector,
  trueFactory: TCachingFactory<T>,
  falseFactory: TCachingFactory<T>
): TCachingFactory<T> {
  return async () =>
    selector() ? await trueFactory() : await falseFactory();
}

/**
 * Validates the hybrid's arguments and names it after its inner lifestyles.
 */
export function hybridName(
  selector: TLifestyleSelector,
  trueLifestyle: Lifestyle,
  falseLifestyle: Lifestyle
): string {
  requireNotNull(selector, "lifestyleSelector");
  requireNotNull(trueLifestyle, "trueLifestyle");
  requireNotNull(falseLifestyle, "falseLifestyle");
  return `Hybrid ${trueLifestyle.name} / ${falseLifestyle.name}`;
}
