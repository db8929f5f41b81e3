import { InstanceProducer } from "./instance-producer";
import { Registration, TRegistrationProps } from "./registration";
import { ArgumentError } from "./errors";
import {
  IContainer,
  TCachingFactory,
  TClassType,
  TInstanceCreator,
  TServiceToken,
} from "./types";
import {
  isAssignableTo,
  isClass,
  isServiceToken,
  requireNotNull,
  requireNotNullOrEmpty,
  tokenToString,
} from "./utils";

/**
 * A caching policy applied to a registration: decides how many instances of a
 * service exist and when a cached one may be reused instead of constructing.
 *
 * Implement {@link Lifestyle.createRegistrationCore} to add a policy.
 */
export abstract class Lifestyle {
  public readonly name: string;

  protected constructor(name: string) {
    requireNotNullOrEmpty(name, "name");
    this.name = name;
  }

  public get componentLength(): number {
    return this.length;
  }

  public get dependencyLength(): number {
    return this.length;
  }

  /**
   * Relative lifetime, only used to compare lifestyles with each other.
   */
  protected abstract get length(): number;

  /**
   * A component should not outlive the dependencies it holds on to.
   */
  public static isCompatibleDependency(
    dependent: Lifestyle,
    dependency: Lifestyle
  ): boolean {
    return dependent.componentLength <= dependency.dependencyLength;
  }

  /**
   * Builds `lifestyle`'s caching factory for `registration`. Lets composite
   * lifestyles reach the protected core of the lifestyles they wrap.
   */
  protected static createCachingFactoryFor<T>(
    lifestyle: Lifestyle,
    registration: Registration<T>
  ): TCachingFactory<T> {
    return lifestyle.createRegistrationCore(registration);
  }

  public createRegistration<T>(
    serviceType: TServiceToken<T>,
    implementationType: TClassType<T>,
    container: IContainer
  ): Registration<T>;
  public createRegistration<T>(
    serviceType: TServiceToken<T>,
    instanceCreator: TInstanceCreator<T>,
    container: IContainer
  ): Registration<T>;
  public createRegistration<T>(
    serviceType: TServiceToken<T>,
    implementationTypeOrCreator: TClassType<T> | TInstanceCreator<T>,
    container: IContainer
  ): Registration<T> {
    return this.buildRegistration(
      serviceType,
      implementationTypeOrCreator,
      container
    );
  }

  public createProducer<T>(
    serviceType: TServiceToken<T>,
    implementationType: TClassType<T>,
    container: IContainer
  ): InstanceProducer<T>;
  public createProducer<T>(
    serviceType: TServiceToken<T>,
    instanceCreator: TInstanceCreator<T>,
    container: IContainer
  ): InstanceProducer<T>;
  public createProducer<T>(
    serviceType: TServiceToken<T>,
    implementationTypeOrCreator: TClassType<T> | TInstanceCreator<T>,
    container: IContainer
  ): InstanceProducer<T> {
    return new InstanceProducer(
      serviceType,
      this.buildRegistration(serviceType, implementationTypeOrCreator, container)
    );
  }

  public toString(): string {
    return this.name;
  }

  /**
   * Returns the factory that applies this lifestyle's caching to
   * `registration.instanceCreator`. Called once, while `registration` is being
   * built; per-registration caching state belongs in the returned closure.
   */
  protected abstract createRegistrationCore<T>(
    registration: Registration<T>
  ): TCachingFactory<T>;

  private buildRegistration<T>(
    serviceType: TServiceToken<T>,
    implementationTypeOrCreator: TClassType<T> | TInstanceCreator<T>,
    container: IContainer
  ): Registration<T> {
    return new Registration<T>(
      this,
      this.validateRegistrationArguments(
        serviceType,
        implementationTypeOrCreator,
        container
      ),
      (registration) => this.createRegistrationCore(registration)
    );
  }

  private validateRegistrationArguments<T>(
    serviceType: TServiceToken<T>,
    implementationTypeOrCreator: TClassType<T> | TInstanceCreator<T>,
    container: IContainer
  ): TRegistrationProps<T> {
    requireNotNull(serviceType, "serviceType");
    requireNotNull(implementationTypeOrCreator, "implementationType");
    requireNotNull(container, "container");

    if (!isServiceToken(serviceType)) {
      throw new ArgumentError(
        "serviceType",
        "The service type must be a non-empty string, a symbol or a class."
      );
    }

    if (typeof implementationTypeOrCreator !== "function") {
      throw new ArgumentError(
        "implementationType",
        "The implementation must be a class or an instance creator function."
      );
    }

    if (!isImplementationType(implementationTypeOrCreator)) {
      return {
        serviceType,
        container,
        instanceCreator: implementationTypeOrCreator,
      };
    }

    if (!isAssignableTo(implementationTypeOrCreator, serviceType)) {
      throw new ArgumentError(
        "implementationType",
        `The supplied type ${implementationTypeOrCreator.name} does not inherit from ${tokenToString(
          serviceType
        )}.`
      );
    }

    return {
      serviceType,
      container,
      implementationType: implementationTypeOrCreator,
    };
  }
}

function isImplementationType<T>(
  v: TClassType<T> | TInstanceCreator<T>
): v is TClassType<T> {
  return isClass(v);
}
