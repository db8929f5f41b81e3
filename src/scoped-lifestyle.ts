import { Lifestyle } from "./lifestyle";
import type { Registration } from "./registration";
import { InstanceCell } from "./instance-cell";
import { Scope } from "./scope";
import { ScopeDisposedError, ScopeResolutionError } from "./errors";
import { IContainer, TCachingFactory } from "./types";
import { SCOPED_LENGTH } from "./constants";

/**
 * One instance per registration per active scope. What "active" means is up to
 * the subclass.
 */
export abstract class ScopedLifestyle extends Lifestyle {
  protected constructor(name: string) {
    super(name);
  }

  protected get length(): number {
    return SCOPED_LENGTH;
  }

  public abstract getCurrentScope(container: IContainer): Scope | undefined;

  protected createRegistrationCore<T>(
    registration: Registration<T>
  ): TCachingFactory<T> {
    // Keyed weakly so a finished scope does not keep its instances alive.
    const cells = new WeakMap<Scope, InstanceCell<T>>();

    return async () => {
      const scope = this.getCurrentScope(registration.container);
      if (!scope) {
        throw new ScopeResolutionError(registration.serviceType, this.name);
      }

      if (scope.isDisposed) {
        throw new ScopeDisposedError(registration.serviceType);
      }

      let cell = cells.get(scope);
      if (!cell) {
        cell = new InstanceCell<T>();
        cells.set(scope, cell);
      }

      return await cell.getOrCreate(registration, (instance) =>
        scope.registerForDisposal(instance, registration)
      );
    };
  }
}
