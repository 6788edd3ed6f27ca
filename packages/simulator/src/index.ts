/**
 * @lpvault/simulator — In-process chain for tests and the demo.
 */

export { SimulatedChain, SIMULATOR_DEPLOYER } from "./chain.js";
export type { SimulatedChainOptions, TokenReceiptHook, TokenTransfer } from "./chain.js";
export { SimulatedPositionManager } from "./position-manager.js";
export { SimulatedSwapRouter } from "./swap-router.js";
export { SimulatedWrappedNative } from "./wrapped-native.js";
export { SimulatorError } from "./errors.js";
export type { SimulatorErrorCode } from "./errors.js";
export type { ChainState, SimulatedPosition } from "./state.js";
