import { Lifestyle } from "./lifestyle";
import type { Registration } from "./registration";
import { InstanceCell } from "./instance-cell";
import { TCachingFactory } from "./types";
import { SINGLETON_LENGTH } from "./constants";

/**
 * One instance per registration, and so per container, for the container's
 * lifetime.
 */
export class SingletonLifestyle extends Lifestyle {
  public constructor() {
    super("Singleton");
  }

  protected get length(): number {
    return SINGLETON_LENGTH;
  }

  protected createRegistrationCore<T>(
    registration: Registration<T>
  ): TCachingFactory<T> {
    const cell = new InstanceCell<T>();
    return () => cell.getOrCreate(registration);
  }
}
