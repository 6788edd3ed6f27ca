/**
 * Simulated Swap Router
 *
 * Exact-input single-pool swaps at a 1:1 price less the pool fee
 * (fee in hundredths of a basis point, as pool fee tiers are quoted).
 * The router takes the input through the caller's allowance and pays
 * the output from an unlimited reserve.
 */

import { zeroAddress } from "viem";
import { SlippageRejection } from "@lpvault/types";
import type { Address, ExactInputSingleRequest, SwapEngine } from "@lpvault/types";
import type { SimulatedChain } from "./chain.js";
import { SimulatorError } from "./errors.js";

const FEE_DENOMINATOR = 1_000_000n;

export class SimulatedSwapRouter {
  constructor(
    private readonly chain: SimulatedChain,
    readonly address: Address,
  ) {}

  bind(caller: Address): SwapEngine {
    return {
      address: this.address,
      exactInputSingle: (request) => this.exactInputSingle(caller, request),
    };
  }

  /** Output for `amountIn` through a pool with fee tier `fee`. */
  quote(amountIn: bigint, fee: number): bigint {
    return (amountIn * (FEE_DENOMINATOR - BigInt(fee))) / FEE_DENOMINATOR;
  }

  async exactInputSingle(caller: Address, request: ExactInputSingleRequest): Promise<bigint> {
    const pool = await this.chain.getPool(request.tokenIn, request.tokenOut, request.fee);
    if (pool === zeroAddress) {
      throw new SimulatorError(
        "UNKNOWN_POOL",
        `No pool for ${request.tokenIn}/${request.tokenOut}/${request.fee}`,
      );
    }
    if (request.amountIn <= 0n) {
      throw new SimulatorError("INVALID_REQUEST", "amountIn must be positive");
    }

    const amountOut = this.quote(request.amountIn, request.fee);
    if (amountOut < request.amountOutMinimum) {
      throw new SlippageRejection("Too little received", request.amountOutMinimum, amountOut);
    }

    await this.chain.transferFrom(
      this.address,
      request.tokenIn,
      caller,
      this.address,
      request.amountIn,
    );
    this.chain.mintTokens(request.tokenOut, this.address, amountOut);
    await this.chain.transfer(request.tokenOut, this.address, request.recipient, amountOut);
    return amountOut;
  }

  /**
   * Return native currency the router holds to `to`, as a router does
   * with unspent native input.
   */
  async refundNative(to: Address, amount: bigint): Promise<void> {
    await this.chain.payNative(this.address, to, amount);
  }
}
