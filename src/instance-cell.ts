import { Mutex } from "@apiratorjs/locking";
import type { Registration } from "./registration";
import { ResolutionChain } from "./resolution-chain";
import { CyclicDependencyError } from "./errors";
import { tokenToString } from "./utils";

interface ILockOwner {
  /** The construction link that currently holds the lock. */
  link?: ResolutionChain;
}

interface IWaiter {
  chain: ResolutionChain;
  owner: ILockOwner;
}

// Chains waiting for a cell lock, across all cells.
const waiters = new Set<IWaiter>();

/**
 * Write-once holder for a cached instance, with the lock that makes sure only
 * one construction wins. `undefined` is a valid instance, so the state is
 * tracked apart from the value.
 */
export class InstanceCell<T> {
  private readonly _mutex = new Mutex();
  private readonly _owner: ILockOwner = {};
  private _state: { value: T } | undefined;

  /**
   * Returns the cached instance or builds it with the registration's guarded
   * creator. A failed construction leaves the cell empty, so the next call
   * tries again.
   */
  public async getOrCreate(
    registration: Registration<T>,
    onCreated?: (instance: T) => Promise<void> | void
  ): Promise<T> {
    // Written once, and only before the winning construction's promise
    // settles, so any later read sees it.
    const cached = this._state;
    if (cached) {
      return cached.value;
    }

    // The mutex is not reentrant: a chain waiting on its own construction
    // would never wake up.
    const chain = ResolutionChain.current();
    registration.cycleGuard.verifyNotReentered(chain);

    if (!chain) {
      return await this._mutex.runExclusive(() =>
        this.create(registration, onCreated)
      );
    }

    this.verifyNotDeadlocked(registration, chain);

    const waiter: IWaiter = { chain, owner: this._owner };
    waiters.add(waiter);
    try {
      return await this._mutex.runExclusive(() => {
        waiters.delete(waiter);
        return this.create(registration, onCreated);
      });
    } finally {
      waiters.delete(waiter);
    }
  }

  private async create(
    registration: Registration<T>,
    onCreated?: (instance: T) => Promise<void> | void
  ): Promise<T> {
    // Double check if the instance was built while waiting for the lock
    if (this._state) {
      return this._state.value;
    }

    try {
      const instance = await registration.createInstance((link) => {
        this._owner.link = link;
      });
      this._state = { value: instance };
      await onCreated?.(instance);
      return instance;
    } finally {
      this._owner.link = undefined;
    }
  }

  /**
   * Follows the locks the holder of this cell is waiting for. Reaching a lock
   * held by `chain` means the two chains would wait on each other forever.
   */
  private verifyNotDeadlocked(
    registration: Registration<T>,
    chain: ResolutionChain
  ): void {
    const ours = new Set(chain.links());
    const seen = new Set<ILockOwner>();
    const stack = [
      {
        owner: this._owner,
        path: [tokenToString(registration.serviceType)],
      },
    ];

    for (let entry = stack.pop(); entry; entry = stack.pop()) {
      const holder = entry.owner.link;
      if (!holder || seen.has(entry.owner)) {
        continue;
      }
      seen.add(entry.owner);

      if (ours.has(holder)) {
        throw new CyclicDependencyError(
          registration.serviceType,
          chain.toPath().concat(entry.path)
        );
      }

      for (const waiter of waiters) {
        const blocking = waiter.owner.link;
        if (blocking && Array.from(waiter.chain.links()).includes(holder)) {
          stack.push({
            owner: waiter.owner,
            path: entry.path.concat(
              tokenToString(blocking.registration.serviceType)
            ),
          });
        }
      }
    }
  }
}
