import { AsyncContext } from "@apiratorjs/async-context";
import type { Registration } from "./registration";
import { DI_CONTAINER_RESOLUTION_CHAIN_NAMESPACE } from "./constants";
import { tokenToString } from "./utils";

/**
 * One link per construction in progress. The current link lives in the async
 * context, so it follows a logical call chain across awaits; two calls started
 * side by side from the same parent get two different links.
 */
export class ResolutionChain {
  public constructor(
    public readonly registration: Registration,
    public readonly parent: ResolutionChain | undefined
  ) {}

  public static current(): ResolutionChain | undefined {
    const chain = AsyncContext.getContext(
      DI_CONTAINER_RESOLUTION_CHAIN_NAMESPACE
    );
    return chain instanceof ResolutionChain ? chain : undefined;
  }

  public async run<T>(callback: () => Promise<T> | T): Promise<T> {
    return await AsyncContext.withContext(
      DI_CONTAINER_RESOLUTION_CHAIN_NAMESPACE,
      this,
      async () => {
        return await callback();
      }
    );
  }

  public *links(): IterableIterator<ResolutionChain> {
    for (
      let link: ResolutionChain | undefined = this;
      link;
      link = link.parent
    ) {
      yield link;
    }
  }

  /**
   * Service names from the outermost construction to this one.
   */
  public toPath(): string[] {
    return Array.from(this.links(), (link) =>
      tokenToString(link.registration.serviceType)
    ).reverse();
  }
}
