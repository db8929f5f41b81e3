import { Lifestyle } from "./lifestyle";
import { TransientLifestyle } from "./transient-lifestyle";
import { SingletonLifestyle } from "./singleton-lifestyle";
import { CustomLifestyle } from "./custom-lifestyle";
import { HybridLifestyle } from "./hybrid-lifestyle";
import { ScopedLifestyle } from "./scoped-lifestyle";
import { ScopedHybridLifestyle } from "./scoped-hybrid-lifestyle";
import { AsyncScopedLifestyle } from "./async-scoped-lifestyle";
import {
  ICustomLifestyleOptions,
  TLifestyleApplierFactory,
  TLifestyleSelector,
} from "./types";

/**
 * Picks `trueLifestyle` when `selector` returns true and `falseLifestyle`
 * otherwise. The selector runs on every request. Two scoped lifestyles give a
 * scoped lifestyle.
 *
 * @example
 * const perRequestOrSingleton = createHybrid(
 *   () => container.isInScope(),
 *   Lifestyles.scoped,
 *   Lifestyles.singleton
 * );
 */
export function createHybrid(
  selector: TLifestyleSelector,
  trueLifestyle: ScopedLifestyle,
  falseLifestyle: ScopedLifestyle
): ScopedLifestyle;
export function createHybrid(
  selector: TLifestyleSelector,
  trueLifestyle: Lifestyle,
  falseLifestyle: Lifestyle
): Lifestyle;
export function createHybrid(
  selector: TLifestyleSelector,
  trueLifestyle: Lifestyle,
  falseLifestyle: Lifestyle
): Lifestyle {
  if (
    trueLifestyle instanceof ScopedLifestyle &&
    falseLifestyle instanceof ScopedLifestyle
  ) {
    return new ScopedHybridLifestyle(selector, trueLifestyle, falseLifestyle);
  }

  return new HybridLifestyle(selector, trueLifestyle, falseLifestyle);
}

export function createCustom(
  name: string,
  applierFactory: TLifestyleApplierFactory,
  options?: ICustomLifestyleOptions
): Lifestyle {
  return new CustomLifestyle(name, applierFactory, options);
}

export const Lifestyles = {
  transient: new TransientLifestyle(),
  singleton: new SingletonLifestyle(),
  scoped: new AsyncScopedLifestyle(),
  createCustom,
  createHybrid,
} as const;
