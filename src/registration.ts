import type { Lifestyle } from "./lifestyle";
import { CycleGuard } from "./cycle-guard";
import type { ResolutionChain } from "./resolution-chain";
import { ArgumentError, RegistrationError } from "./errors";
import {
  IContainer,
  IParameterOverride,
  TCachingFactory,
  TClassType,
  TInstanceCreator,
  TServiceToken,
} from "./types";

export type TRegistrationProps<T> = {
  serviceType: TServiceToken<T>;
  container: IContainer;
} & (
  | { implementationType: TClassType<T> }
  | { instanceCreator: TInstanceCreator<T> }
);

/**
 * Binds a service to the caching factory its lifestyle built for it. A new
 * registration is created for every registered service and never shared, since
 * the caching state (singleton cell, scope caches, custom policy state) lives in
 * the closures of its caching factory.
 */
export class Registration<T = any> {
  public readonly serviceType: TServiceToken<T>;
  public readonly implementationType: TClassType<T> | undefined;
  public readonly wrapsInstanceCreator: boolean;
  public readonly container: IContainer;
  public readonly cycleGuard: CycleGuard;
  /**
   * The raw instance creator wrapped by this registration's cycle guard.
   */
  public readonly instanceCreator: TCachingFactory<T>;
  public readonly cachingFactory: TCachingFactory<T>;

  /**
   * Pure metadata: scopes and diagnostics skip disposal of instances of
   * registrations that set it.
   */
  public suppressDisposal = false;

  private readonly _rawCreator: TInstanceCreator<T>;
  private _parameterOverrides: readonly IParameterOverride[] = [];
  private _hasParameterOverrides = false;

  public constructor(
    public readonly lifestyle: Lifestyle,
    props: TRegistrationProps<T>,
    buildCachingFactory: (registration: Registration<T>) => TCachingFactory<T>
  ) {
    this.serviceType = props.serviceType;
    this.container = props.container;

    let rawCreator: TInstanceCreator<T>;
    if ("implementationType" in props) {
      const implementationType = props.implementationType;
      this.implementationType = implementationType;
      this.wrapsInstanceCreator = false;
      rawCreator = () =>
        this.container.createInstance(
          implementationType,
          this._parameterOverrides
        );
    } else {
      this.implementationType = undefined;
      this.wrapsInstanceCreator = true;
      rawCreator = props.instanceCreator;
    }

    this._rawCreator = rawCreator;
    this.cycleGuard = new CycleGuard(this);
    this.instanceCreator = () => this.createInstance();
    this.cachingFactory = buildCachingFactory(this);
  }

  public get parameterOverrides(): readonly IParameterOverride[] {
    return this._parameterOverrides;
  }

  public setParameterOverrides(overrides: IParameterOverride[]): void {
    if (this.wrapsInstanceCreator) {
      throw new RegistrationError(
        this.serviceType,
        "parameter overrides require an implementation type"
      );
    }

    if (this._hasParameterOverrides) {
      throw new RegistrationError(
        this.serviceType,
        "parameter overrides can only be set once"
      );
    }

    for (const override of overrides) {
      if (!Number.isInteger(override.index) || override.index < 0) {
        throw new ArgumentError(
          "overrides",
          `Parameter index ${override.index} is not a valid position.`
        );
      }
    }

    this._parameterOverrides = Object.freeze([...overrides]);
    this._hasParameterOverrides = true;
  }

  /**
   * Builds an instance through the cycle guard. `onEnter` receives the link
   * the construction runs in.
   */
  public createInstance(
    onEnter?: (link: ResolutionChain) => void
  ): Promise<T> {
    return this.cycleGuard.run(this._rawCreator, onEnter);
  }

  public getInstance(): Promise<T> {
    return this.cachingFactory();
  }
}
