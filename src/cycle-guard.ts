import type { Registration } from "./registration";
import { ResolutionChain } from "./resolution-chain";
import { CyclicDependencyError } from "./errors";
import { tokenToString } from "./utils";

/**
 * Detects a construction chain that re-enters the registration it is already
 * building. Belongs to exactly one registration.
 *
 * The in-flight set holds the links this guard created. A chain is re-entering
 * when one of its ancestors is in that set; unrelated chains, including siblings
 * started from the same parent, never share a link and pass.
 */
export class CycleGuard {
  // Allocated on first entry, dropped again when the last construction exits.
  private _inFlight: Set<ResolutionChain> | undefined;

  public constructor(private readonly _registration: Registration) {}

  public get isIdle(): boolean {
    return this._inFlight === undefined;
  }

  public verifyNotReentered(chain: ResolutionChain | undefined): void {
    if (!chain || !this._inFlight) {
      return;
    }

    for (const link of chain.links()) {
      if (this._inFlight.has(link)) {
        throw new CyclicDependencyError(
          this._registration.serviceType,
          chain
            .toPath()
            .concat(tokenToString(this._registration.serviceType))
        );
      }
    }
  }

  public enter(chain: ResolutionChain | undefined): ResolutionChain {
    this.verifyNotReentered(chain);

    const link = new ResolutionChain(this._registration, chain);
    (this._inFlight ??= new Set()).add(link);
    return link;
  }

  public exit(link: ResolutionChain): void {
    if (!this._inFlight) {
      return;
    }

    this._inFlight.delete(link);
    if (this._inFlight.size === 0) {
      this._inFlight = undefined;
    }
  }

  /**
   * Runs `creator` inside a new link of the current chain. `onEnter` receives
   * that link before `creator` starts.
   */
  public async run<T>(
    creator: () => Promise<T> | T,
    onEnter?: (link: ResolutionChain) => void
  ): Promise<T> {
    const link = this.enter(ResolutionChain.current());
    try {
      onEnter?.(link);
      return await link.run(creator);
    } finally {
      this.exit(link);
    }
  }
}
