import type { Lifestyle } from "./lifestyle";
import { TServiceToken } from "./types";
import { normalizeToken } from "./utils";

export class DependencyInjectionError extends Error {
  constructor(message: string, public readonly cause?: string) {
    super(message);
    this.name = this.constructor.name;
    this.cause = cause;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ArgumentError extends DependencyInjectionError {
  constructor(public readonly paramName: string, message: string) {
    super(`${message} (Parameter '${paramName}')`);
  }
}

export class CyclicDependencyError extends DependencyInjectionError {
  constructor(public readonly token: TServiceToken, public readonly chain: string[]) {
    super(
      `Cyclic dependency detected: the type ${describeToken(token)} directly or indirectly depends on itself`,
      chain.join(" -> ")
    );
  }
}

export class UnregisteredDependencyError extends DependencyInjectionError {
  constructor(token: TServiceToken, public readonly cause?: string) {
    super(`Service for token ${describeToken(token)} is not registered`, cause);
  }
}

export class ScopeResolutionError extends DependencyInjectionError {
  constructor(token: TServiceToken, lifestyleName: string) {
    super(
      `Cannot resolve ${lifestyleName} service for token ${describeToken(token)} outside of an active scope. Wrap the call in runWithNewScope().`
    );
  }
}

export class ScopeDisposedError extends DependencyInjectionError {
  constructor(token: TServiceToken) {
    super(
      `Cannot resolve service for token ${describeToken(token)} because its scope has already been disposed`
    );
  }
}

export class RegistrationError extends DependencyInjectionError {
  constructor(token: TServiceToken, message: string) {
    super(`Invalid registration for token ${describeToken(token)}: ${message}`);
  }
}

export class LifestyleMismatchError extends DependencyInjectionError {
  constructor(
    public readonly dependentToken: TServiceToken,
    public readonly dependentLifestyle: Lifestyle,
    public readonly dependencyToken: TServiceToken,
    public readonly dependencyLifestyle: Lifestyle
  ) {
    super(
      `Lifestyle mismatch: ${dependentLifestyle.name} service ${describeToken(
        dependentToken
      )} depends on ${dependencyLifestyle.name} service ${describeToken(
        dependencyToken
      )}, which has a shorter lifestyle.`
    );
  }
}

function describeToken(token: TServiceToken): string {
  return `'${normalizeToken(token).toString()}'`;
}
