import { AsyncContext } from "@apiratorjs/async-context";
import { ScopedLifestyle } from "./scoped-lifestyle";
import { Scope } from "./scope";
import { IContainer } from "./types";
import { DI_CONTAINER_SCOPE_NAMESPACE } from "./constants";

/**
 * Scopes that flow with the asynchronous call chain started by
 * {@link AsyncScopedLifestyle.runWithNewScope}.
 */
export class AsyncScopedLifestyle extends ScopedLifestyle {
  public constructor() {
    super("Async Scoped");
  }

  public static async runWithNewScope<R>(
    container: IContainer,
    callback: (scope: Scope) => Promise<R> | R
  ): Promise<R> {
    const scope = new Scope(container, AsyncScopedLifestyle.activeScope());

    return await AsyncContext.withContext(
      DI_CONTAINER_SCOPE_NAMESPACE,
      scope,
      async () => {
        try {
          return await callback(scope);
        } finally {
          await scope.dispose();
        }
      }
    );
  }

  private static activeScope(): Scope | undefined {
    const scope = AsyncContext.getContext(DI_CONTAINER_SCOPE_NAMESPACE);
    return scope instanceof Scope ? scope : undefined;
  }

  public getCurrentScope(container: IContainer): Scope | undefined {
    return AsyncScopedLifestyle.activeScope()?.findFor(container);
  }
}
