import { DiContainer } from "./di-container";
import { DiDiscoveryService } from "./di-discovery-service";
import { Lifestyle } from "./lifestyle";
import { TransientLifestyle } from "./transient-lifestyle";
import { SingletonLifestyle } from "./singleton-lifestyle";
import { CustomLifestyle } from "./custom-lifestyle";
import { HybridLifestyle } from "./hybrid-lifestyle";
import { ScopedLifestyle } from "./scoped-lifestyle";
import { ScopedHybridLifestyle } from "./scoped-hybrid-lifestyle";
import { AsyncScopedLifestyle } from "./async-scoped-lifestyle";
import { Lifestyles, createCustom, createHybrid } from "./lifestyles";
import { Registration } from "./registration";
import { InstanceProducer } from "./instance-producer";
import { CycleGuard } from "./cycle-guard";
import { ResolutionChain } from "./resolution-chain";
import { Scope } from "./scope";

export * from "./types";
export * from "./errors";

export {
  DiContainer,
  DiDiscoveryService,
  Lifestyle,
  TransientLifestyle,
  SingletonLifestyle,
  CustomLifestyle,
  HybridLifestyle,
  ScopedLifestyle,
  ScopedHybridLifestyle,
  AsyncScopedLifestyle,
  Lifestyles,
  createCustom,
  createHybrid,
  Registration,
  InstanceProducer,
  CycleGuard,
  ResolutionChain,
  Scope,
};
