import { InstanceProducer } from "./instance-producer";
import { Lifestyle } from "./lifestyle";
import { Lifestyles } from "./lifestyles";
import type { Registration } from "./registration";
import { TransientLifestyle } from "./transient-lifestyle";
import { AsyncScopedLifestyle } from "./async-scoped-lifestyle";
import { ResolutionChain } from "./resolution-chain";
import { DiDiscoveryService } from "./di-discovery-service";
import {
  LifestyleMismatchError,
  RegistrationError,
  UnregisteredDependencyError,
} from "./errors";
import {
  IContainer,
  IContainerOptions,
  IParameterOverride,
  IRegistrationOptions,
  TClassType,
  TLifestyleMismatchBehavior,
  TServiceToken,
  TUseFactory,
} from "./types";
import {
  isConstructable,
  isDisposable,
  isServiceToken,
  tokenToString,
} from "./utils";
import { LOG_PREFIX } from "./constants";

/**
 * A small container around the lifestyles: keeps one producer per service
 * token and builds implementation types from their `static inject` token list.
 *
 * @example
 * class UserService {
 *   static inject = [UserRepository];
 *   constructor(private readonly _repository: UserRepository) {}
 * }
 *
 * const container = new DiContainer()
 *   .register(UserRepository, UserRepository, { lifestyle: Lifestyles.singleton })
 *   .register(UserService, UserService);
 *
 * const service = await container.resolveRequired(UserService);
 */
export class DiContainer implements IContainer {
  private readonly _producers = new Map<TServiceToken, InstanceProducer>();
  private readonly _discoveryService = new DiDiscoveryService(() =>
    this.listRegistrations()
  );
  private readonly _defaultLifestyle: Lifestyle;
  private readonly _lifestyleMismatch: TLifestyleMismatchBehavior;
  private readonly _logger: Pick<Console, "warn">;

  public constructor(options: IContainerOptions = {}) {
    this._defaultLifestyle = options.defaultLifestyle ?? Lifestyles.transient;
    this._lifestyleMismatch = options.lifestyleMismatch ?? "warn";
    this._logger = options.logger ?? console;
  }

  /**
   * Registers `implementationType` for `serviceType`. The last registration of
   * a service wins.
   */
  public register<T>(
    serviceType: TServiceToken<T>,
    implementationType: TClassType<T>,
    options?: IRegistrationOptions
  ): this {
    const lifestyle = options?.lifestyle ?? this._defaultLifestyle;
    const producer = lifestyle.createProducer(
      serviceType,
      implementationType,
      this
    );

    if (options?.parameterOverrides) {
      producer.registration.setParameterOverrides(options.parameterOverrides);
    }

    return this.addProducer(producer, options);
  }

  public registerFactory<T>(
    serviceType: TServiceToken<T>,
    factory: TUseFactory<T>,
    options?: Omit<IRegistrationOptions, "parameterOverrides">
  ): this {
    const lifestyle = options?.lifestyle ?? this._defaultLifestyle;
    const producer = lifestyle.createProducer(
      serviceType,
      () => factory(this),
      this
    );

    return this.addProducer(producer, options);
  }

  public registerInstance<T>(serviceType: TServiceToken<T>, instance: T): this {
    return this.addProducer(
      Lifestyles.singleton.createProducer(serviceType, () => instance, this)
    );
  }

  public getProducer<T>(
    serviceType: TServiceToken<T>
  ): InstanceProducer<T> | undefined {
    return this._producers.get(serviceType);
  }

  public async resolve<T>(serviceType: TServiceToken<T>): Promise<T | undefined> {
    const producer = this.getProducer(serviceType);
    if (!producer) {
      return;
    }

    this.checkLifestyleMismatch(producer.registration);
    return await producer.getInstance();
  }

  public async resolveRequired<T>(serviceType: TServiceToken<T>): Promise<T> {
    const producer = this.getProducer(serviceType);
    if (!producer) {
      throw new UnregisteredDependencyError(serviceType);
    }

    this.checkLifestyleMismatch(producer.registration);
    return await producer.getInstance();
  }

  public async runWithNewScope<R>(
    callback: (container: DiContainer) => Promise<R> | R
  ): Promise<R> {
    return await AsyncScopedLifestyle.runWithNewScope(this, () =>
      callback(this)
    );
  }

  public isInScope(): boolean {
    return Lifestyles.scoped.getCurrentScope(this) !== undefined;
  }

  /**
   * Builds every registration once, inside a scope, and reports transient
   * registrations whose instances need disposal.
   */
  public async verify(): Promise<void> {
    await this.runWithNewScope(async () => {
      for (const producer of this._producers.values()) {
        const instance = await producer.getInstance();
        const registration = producer.registration;

        if (
          registration.lifestyle instanceof TransientLifestyle &&
          isDisposable(instance) &&
          !registration.suppressDisposal
        ) {
          this._logger.warn(
            `${LOG_PREFIX} Disposable transient component: '${tokenToString(
              producer.serviceType
            )}' implements onDispose, but transient instances are never disposed. Register it with a scoped lifestyle or set suppressDisposal.`
          );
        }
      }
    });
  }

  public async createInstance<T>(
    implementationType: TClassType<T>,
    parameterOverrides: readonly IParameterOverride[]
  ): Promise<T> {
    const dependencies = getInjectTokens(implementationType);
    const argumentCount = Math.max(
      dependencies.length,
      ...parameterOverrides.map((override) => override.index + 1)
    );

    const args: unknown[] = [];
    for (let index = 0; index < argumentCount; index++) {
      const override = parameterOverrides.find((o) => o.index === index);
      if (override) {
        args.push(await override.creator());
        continue;
      }

      const dependency = dependencies[index];
      args.push(
        dependency === undefined
          ? undefined
          : await this.resolveRequired(dependency)
      );
    }

    const instance = new implementationType(...args);
    if (isConstructable(instance)) {
      await instance.onConstruct();
    }

    return instance;
  }

  public getDiscoveryService(): DiDiscoveryService {
    return this._discoveryService;
  }

  private addProducer(
    producer: InstanceProducer,
    options?: Pick<IRegistrationOptions, "suppressDisposal">
  ): this {
    producer.registration.suppressDisposal = options?.suppressDisposal ?? false;
    this._producers.set(producer.serviceType, producer);
    return this;
  }

  private checkLifestyleMismatch(dependency: Registration): void {
    const dependent = ResolutionChain.current()?.registration;
    if (
      !dependent ||
      this._lifestyleMismatch === "ignore" ||
      Lifestyle.isCompatibleDependency(dependent.lifestyle, dependency.lifestyle)
    ) {
      return;
    }

    const error = new LifestyleMismatchError(
      dependent.serviceType,
      dependent.lifestyle,
      dependency.serviceType,
      dependency.lifestyle
    );

    if (this._lifestyleMismatch === "throw") {
      throw error;
    }

    this._logger.warn(`${LOG_PREFIX} ${error.message}`);
  }

  private listRegistrations(): Registration[] {
    return Array.from(
      this._producers.values(),
      (producer) => producer.registration
    );
  }
}

function getInjectTokens(implementationType: TClassType): TServiceToken[] {
  const inject: unknown = Reflect.get(implementationType, "inject");
  if (inject === undefined) {
    return [];
  }

  if (!Array.isArray(inject) || !inject.every(isServiceToken)) {
    throw new RegistrationError(
      implementationType,
      "static inject must be an array of service tokens"
    );
  }

  return inject;
}
