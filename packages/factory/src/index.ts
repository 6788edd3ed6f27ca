/**
 * @lpvault/factory — Vault deployment, protocol fees and the manager registry.
 */

export { VaultFactory } from "./factory.js";
export type { CreateVaultRequest, VaultFactoryDependencies } from "./factory.js";
export { ManagerRegistry } from "./registry.js";
export type { ManagerRegistryOptions } from "./registry.js";
export { ProtocolFeeSchema, FactoryConfigSchema } from "./config.js";
export type { FactoryConfig, FactoryConfigInput, ProtocolFeeInput } from "./config.js";
