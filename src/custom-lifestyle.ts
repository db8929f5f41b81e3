import { Lifestyle } from "./lifestyle";
import type { Registration } from "./registration";
import {
  ICustomLifestyleOptions,
  TCachingFactory,
  TLifestyleApplierFactory,
} from "./types";
import { SINGLETON_LENGTH, TRANSIENT_LENGTH } from "./constants";
import { requireNotNull } from "./utils";

/**
 * A lifestyle whose caching is defined by the embedder. The applier factory
 * runs once per registration, so whatever state it closes over is private to
 * that registration.
 *
 * Unless lengths are given, a custom lifestyle is never reported in a
 * lifestyle mismatch, neither as a component nor as a dependency.
 */
export class CustomLifestyle extends Lifestyle {
  private readonly _componentLength: number;
  private readonly _dependencyLength: number;

  public constructor(
    name: string,
    private readonly _applierFactory: TLifestyleApplierFactory,
    options: ICustomLifestyleOptions = {}
  ) {
    super(name);
    requireNotNull(_applierFactory, "applierFactory");
    this._componentLength = options.componentLength ?? TRANSIENT_LENGTH;
    this._dependencyLength = options.dependencyLength ?? SINGLETON_LENGTH;
  }

  public get componentLength(): number {
    return this._componentLength;
  }

  public get dependencyLength(): number {
    return this._dependencyLength;
  }

  protected get length(): number {
    return this._componentLength;
  }

  protected createRegistrationCore<T>(
    registration: Registration<T>
  ): TCachingFactory<T> {
    return this._applierFactory(registration.instanceCreator);
  }
}
