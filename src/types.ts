import type { DiContainer } from "./di-container";
import type { Lifestyle } from "./lifestyle";
import type { Registration } from "./registration";

export type TClassType<T = any> = new (...args: any[]) => T;

export type TAbstractClassType<T = any> = abstract new (...args: any[]) => T;

/**
 * A service token can be a string, symbol, or a (possibly abstract) class constructor.
 */
export type TServiceToken<T = any> =
  | string
  | symbol
  | TClassType<T>
  | TAbstractClassType<T>;

export type TNormalizedServiceToken = string | symbol;

/**
 * Builds a fresh instance. Supplied by the resolution layer or by the user.
 */
export type TInstanceCreator<T> = () => Promise<T> | T;

/**
 * An instance creator with a lifestyle's caching applied to it.
 */
export type TCachingFactory<T> = () => Promise<T>;

export type TUseFactory<T> = (container: DiContainer) => Promise<T> | T;

export type TLifestyleSelector = () => boolean;

/**
 * Receives the guarded instance creator of one registration and returns the
 * factory that applies the custom caching policy to it.
 */
export type TLifestyleApplierFactory = <T>(
  instanceCreator: TCachingFactory<T>
) => TCachingFactory<T>;

/**
 * All services can be initialized.
 */
export interface IOnConstruct {
  onConstruct(): Promise<void> | void;
}

/**
 * Scoped services are disposed when their scope ends.
 */
export interface IOnDispose {
  onDispose(): Promise<void> | void;
}

export interface IParameterOverride {
  /** Zero-based constructor parameter position. */
  index: number;
  creator: () => unknown;
}

/**
 * The part of the container the lifestyles depend on. Everything else about a
 * container is opaque to them; the handle doubles as a cache scope key.
 */
export interface IContainer {
  createInstance<T>(
    implementationType: TClassType<T>,
    parameterOverrides: readonly IParameterOverride[]
  ): Promise<T> | T;
}

export type TLifestyleMismatchBehavior = "warn" | "throw" | "ignore";

export interface IContainerOptions {
  /**
   * Lifestyle used when a registration does not name one
   */
  defaultLifestyle?: Lifestyle;
  /**
   * What to do when a component depends on a service with a shorter lifestyle
   */
  lifestyleMismatch?: TLifestyleMismatchBehavior;
  logger?: Pick<Console, "warn">;
}

export interface IRegistrationOptions {
  lifestyle?: Lifestyle;
  parameterOverrides?: IParameterOverride[];
  suppressDisposal?: boolean;
}

export interface ICustomLifestyleOptions {
  componentLength?: number;
  dependencyLength?: number;
}

export interface IDiDiscoveryService {
  getAll(): Registration[];
  getByServiceType(serviceType: TServiceToken): Registration[];
  getByLifestyle(lifestyle: Lifestyle): Registration[];
}
