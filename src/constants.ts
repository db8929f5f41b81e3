export const DI_CONTAINER_SCOPE_NAMESPACE = "di-container:scope";
export const DI_CONTAINER_RESOLUTION_CHAIN_NAMESPACE =
  "di-container:resolution-chain";

export const LOG_PREFIX = "[DI Container]";

export const TRANSIENT_LENGTH = 1;
export const SCOPED_LENGTH = 500;
export const SINGLETON_LENGTH = 1000;
