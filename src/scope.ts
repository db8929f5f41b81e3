import type { Registration } from "./registration";
import { IContainer, IOnDispose } from "./types";
import { isDisposable } from "./utils";

/**
 * A unit of work for scoped lifestyles. Scoped instances that implement
 * `onDispose` are disposed when the scope ends.
 */
export class Scope {
  private readonly _disposables: IOnDispose[] = [];
  private _isDisposed = false;

  public constructor(
    public readonly container: IContainer,
    public readonly parent?: Scope
  ) {}

  public get isDisposed(): boolean {
    return this._isDisposed;
  }

  /**
   * Innermost active scope that belongs to `container`.
   */
  public findFor(container: IContainer): Scope | undefined {
    for (let scope: Scope | undefined = this; scope; scope = scope.parent) {
      if (scope.container === container) {
        return scope;
      }
    }

    return undefined;
  }

  /**
   * Tracks `instance` for disposal at scope end. An instance that finishes
   * building after the scope has ended is disposed right away.
   */
  public async registerForDisposal(
    instance: unknown,
    registration: Registration
  ): Promise<void> {
    if (registration.suppressDisposal || !isDisposable(instance)) {
      return;
    }

    if (this._isDisposed) {
      await instance.onDispose();
      return;
    }

    this._disposables.push(instance);
  }

  public async dispose(): Promise<void> {
    if (this._isDisposed) {
      return;
    }

    this._isDisposed = true;
    const disposables = this._disposables.splice(0);
    await Promise.all(disposables.map(async (instance) => instance.onDispose()));
  }
}
