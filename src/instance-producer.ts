import type { Lifestyle } from "./lifestyle";
import type { Registration } from "./registration";
import { TServiceToken } from "./types";

/**
 * The handle client code resolves a service through.
 */
export class InstanceProducer<T = any> {
  public constructor(
    public readonly serviceType: TServiceToken<T>,
    public readonly registration: Registration<T>
  ) {}

  public get lifestyle(): Lifestyle {
    return this.registration.lifestyle;
  }

  public getInstance(): Promise<T> {
    return this.registration.getInstance();
  }
}
