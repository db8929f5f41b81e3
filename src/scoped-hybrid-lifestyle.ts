import { Lifestyle } from "./lifestyle";
import { ScopedLifestyle } from "./scoped-lifestyle";
import type { Registration } from "./registration";
import type { Scope } from "./scope";
import { createHybridCachingFactory, hybridName } from "./hybrid-lifestyle";
import { IContainer, TCachingFactory, TLifestyleSelector } from "./types";

/**
 * A hybrid of two scoped lifestyles, itself usable wherever a scoped lifestyle
 * is expected.
 */
export class ScopedHybridLifestyle extends ScopedLifestyle {
  private readonly _selector: TLifestyleSelector;
  private readonly _trueLifestyle: ScopedLifestyle;
  private readonly _falseLifestyle: ScopedLifestyle;

  public constructor(
    selector: TLifestyleSelector,
    trueLifestyle: ScopedLifestyle,
    falseLifestyle: ScopedLifestyle
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

  public getCurrentScope(container: IContainer): Scope | undefined {
    return this._selector()
      ? this._trueLifestyle.getCurrentScope(container)
      : this._falseLifestyle.getCurrentScope(container);
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
