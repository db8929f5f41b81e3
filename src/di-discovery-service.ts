import type { Lifestyle } from "./lifestyle";
import type { Registration } from "./registration";
import { IDiDiscoveryService, TServiceToken } from "./types";

export class DiDiscoveryService implements IDiDiscoveryService {
  constructor(private readonly _registrationsGetter: () => Registration[]) {}

  public getAll(): Registration[] {
    return this._registrationsGetter();
  }

  public getByServiceType(serviceType: TServiceToken): Registration[] {
    return this._registrationsGetter().filter(
      (registration) => registration.serviceType === serviceType
    );
  }

  public getByLifestyle(lifestyle: Lifestyle): Registration[] {
    return this._registrationsGetter().filter(
      (registration) => registration.lifestyle === lifestyle
    );
  }
}
