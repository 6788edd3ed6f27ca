import type { Address, TokenClient } from "@lpvault/types";

/**
 * Reset `spender`'s allowance to zero, then grant exactly `amount`.
 */
export async function grantExactAllowance(
  tokens: TokenClient,
  token: Address,
  spender: Address,
  amount: bigint,
): Promise<void> {
  await tokens.approve(token, spender, 0n);
  if (amount > 0n) {
    await tokens.approve(token, spender, amount);
  }
}

export async function revokeAllowance(
  tokens: TokenClient,
  token: Address,
  spender: Address,
): Promise<void> {
  await tokens.approve(token, spender, 0n);
}
