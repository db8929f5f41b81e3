import { ArgumentError } from "./errors";
import {
  IOnConstruct,
  IOnDispose,
  TNormalizedServiceToken,
  TServiceToken,
} from "./types";

export function tokenToString(token: TServiceToken): string {
  if (typeof token === "string") return token;
  if (typeof token === "symbol") return token.toString();
  if (typeof token === "function") return token.name;
  return "unknown token";
}

export function isClass(v: unknown): boolean {
  return (
    typeof v === "function" &&
    /^class[\s{]/.test(Function.prototype.toString.call(v))
  );
}

export function normalizeToken(token: TServiceToken): TNormalizedServiceToken {
  if (typeof token === "function") {
    return isClass(token) ? `class ${token.name}` : token.name;
  }

  return token;
}

export function isServiceToken(v: unknown): v is TServiceToken {
  return (
    (typeof v === "string" && v.length > 0) ||
    typeof v === "symbol" ||
    typeof v === "function"
  );
}

/**
 * Constructor services accept an implementation from their own prototype
 * chain; string and symbol services accept any implementation.
 */
export function isAssignableTo(
  implementationType: Function,
  serviceType: TServiceToken
): boolean {
  if (typeof serviceType !== "function") {
    return true;
  }

  return (
    implementationType === serviceType ||
    implementationType.prototype instanceof serviceType
  );
}

export function requireNotNull(value: unknown, paramName: string): void {
  if (value === null || value === undefined) {
    throw new ArgumentError(paramName, `Value cannot be null or undefined.`);
  }
}

export function requireNotNullOrEmpty(value: unknown, paramName: string): void {
  requireNotNull(value, paramName);
  if (typeof value !== "string" || value.length === 0) {
    throw new ArgumentError(paramName, `Value cannot be an empty string.`);
  }
}

export function isDisposable(instance: unknown): instance is IOnDispose {
  return (
    typeof instance === "object" &&
    instance !== null &&
    "onDispose" in instance &&
    typeof instance.onDispose === "function"
  );
}

export function isConstructable(instance: unknown): instance is IOnConstruct {
  return (
    typeof instance === "object" &&
    instance !== null &&
    "onConstruct" in instance &&
    typeof instance.onConstruct === "function"
  );
}
