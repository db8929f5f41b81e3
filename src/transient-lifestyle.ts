import { Lifestyle } from "./lifestyle";
import type { Registration } from "./registration";
import { TCachingFactory } from "./types";
import { TRANSIENT_LENGTH } from "./constants";

/**
 * No caching: every request builds a new instance.
 */
export class TransientLifestyle extends Lifestyle {
  public constructor() {
    super("Transient");
  }

  protected get length(): number {
    return TRANSIENT_LENGTH;
  }

  protected createRegistrationCore<T>(
    registration: Registration<T>
  ): TCachingFactory<T> {
    return registration.instanceCreator;
  }
}
