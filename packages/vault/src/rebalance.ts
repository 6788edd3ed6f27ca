/**
 * Rebalance Gate
 *
 * Swaps between the vault's two tokens through the swap engine. The
 * output always lands in the vault, and the engine's allowance is reset
 * to zero before being set to exactly the input amount.
 */

import { assertRecipient, isPoolPair } from "./addresses.js";
import { grantExactAllowance } from "./allowance.js";
import { VaultError, callEngine } from "./errors.js";
import type { RebalanceParams, VaultContext } from "./types.js";

export class RebalanceGate {
  constructor(private readonly ctx: VaultContext) {}

  async rebalance(params: RebalanceParams): Promise<bigint> {
    const { chain, pool, address } = this.ctx;

    assertRecipient(params.recipient, address, "rebalance");
    if (!isPoolPair(pool, params.tokenIn, params.tokenOut)) {
      throw new VaultError(
        "INVALID_REFERENCE",
        `rebalance: ${params.tokenIn} -> ${params.tokenOut} is not the vault's pair`,
        { operation: "rebalance" },
      );
    }

    await grantExactAllowance(chain.tokens, params.tokenIn, chain.swap.address, params.amountIn);

    const amountOut = await callEngine("rebalance", () =>
      chain.swap.exactInputSingle({
        tokenIn: params.tokenIn,
        tokenOut: params.tokenOut,
        fee: params.fee,
        recipient: address,
        amountIn: params.amountIn,
        amountOutMinimum: params.amountOutMinimum,
        sqrtPriceLimitX96: params.sqrtPriceLimitX96,
      }),
    );

    this.ctx.emit("rebalanced", {
      tokenIn: params.tokenIn,
      tokenOut: params.tokenOut,
      amountIn: params.amountIn.toString(),
      amountOut: amountOut.toString(),
    });
    return amountOut;
  }
}
