/**
 * @lpvault/demo — Scripted walkthrough.
 *
 * Deploys a factory, a registry and one vault on the simulated chain,
 * then plays the trust-model scenarios against it:
 * slippage floor -> fee on income only -> revoked manager ->
 * adversarial manager -> reentrant fee recipient -> owner exit
 */

import type { Logger } from "pino";
import { SimulatedChain } from "@lpvault/simulator";
import { InMemoryEventStore } from "@lpvault/event-store";
import { ManagerRegistry, VaultFactory } from "@lpvault/factory";
import { isVaultError } from "@lpvault/vault";
import type { MintParams, Vault, VaultError, VaultErrorCode } from "@lpvault/vault";
import type { Address, TokenAmounts } from "@lpvault/types";

// =============================================================================
// Types
// =============================================================================

export interface Reporter {
  step(title: string): Promise<void>;
  ok(message: string): void;
  info(label: string, value: string): void;
  rejected(message: string): void;
}

export interface WalkthroughOptions {
  readonly protocolFeeBps: number;
  readonly logger: Logger;
  readonly reporter: Reporter;
}

export interface WalkthroughResult {
  readonly vault: Address;
  /** Codes of the rejections the scenarios provoked, in order */
  readonly rejections: readonly VaultErrorCode[];
  readonly ownerBalance: TokenAmounts;
  readonly feeRecipientBalance: TokenAmounts;
  readonly eventCount: number;
  readonly integrityValid: boolean;
}

// =============================================================================
// Cast
// =============================================================================

export const FACTORY: Address = "0x6000000000000000000000000000000000000006";
export const REGISTRY: Address = "0x6100000000000000000000000000000000000006";
export const ADMIN: Address = "0x7000000000000000000000000000000000000007";
export const OWNER: Address = "0x1000000000000000000000000000000000000001";
export const MANAGER: Address = "0x2000000000000000000000000000000000000002";
export const ADVERSARY: Address = "0x4000000000000000000000000000000000000004";
export const FEE_RECIPIENT: Address = "0x5000000000000000000000000000000000000005";
export const TOKEN0: Address = "0x1100000000000000000000000000000000000011";
export const TOKEN1: Address = "0x2200000000000000000000000000000000000022";

const POOL_FEE = 3000;
const DEPOSIT = 5_000n;

// =============================================================================
// Walkthrough
// =============================================================================

export async function runWalkthrough(options: WalkthroughOptions): Promise<WalkthroughResult> {
  const { reporter, logger } = options;
  const rejections: VaultErrorCode[] = [];

  async function expectRejection(label: string, attempt: Promise<unknown>): Promise<void> {
    const err = await rejectionOf(attempt);
    rejections.push(err.code);
    reporter.rejected(`${label}: ${err.code} (${err.message})`);
  }

  // ─── Deploy ───────────────────────────────────────────────────────────

  await reporter.step("Deploy");

  const chain = new SimulatedChain();
  const notifications = new InMemoryEventStore();
  const registry = new ManagerRegistry({ address: REGISTRY, admin: ADMIN, notifications, logger });
  const factory = new VaultFactory(
    {
      address: FACTORY,
      admin: ADMIN,
      liquidityEngine: chain.positionManager.address,
      swapEngine: chain.swapRouter.address,
      wrappedNative: chain.wrappedNative.address,
      protocolFee: { feeBps: options.protocolFeeBps, recipient: FEE_RECIPIENT },
    },
    { connector: chain, directory: chain, registry, notifications, logger },
  );
  const pool = chain.createPool(TOKEN0, TOKEN1, POOL_FEE);
  reporter.info("pool", pool);
  reporter.info("protocol fee", `${options.protocolFeeBps} bps`);

  registry.setApproved(ADMIN, MANAGER, true);
  const vault = await factory.createVault(OWNER, { pool, manager: MANAGER });
  reporter.ok(`Vault ${vault.address} created for ${OWNER}`);

  for (const token of [TOKEN0, TOKEN1]) {
    chain.mintTokens(token, OWNER, DEPOSIT);
    chain.approve(token, OWNER, vault.address, DEPOSIT);
    await vault.deposit(OWNER, token, DEPOSIT);
  }
  reporter.ok(`Owner deposited ${DEPOSIT} of each token`);

  const mintParams = (overrides: Partial<MintParams> = {}): MintParams => ({
    token0: TOKEN0,
    token1: TOKEN1,
    fee: POOL_FEE,
    tickLower: -600,
    tickUpper: 600,
    amount0Desired: 1_000n,
    amount1Desired: 1_000n,
    amount0Min: 1n,
    amount1Min: 1n,
    recipient: vault.address,
    deadline: chain.now() + 600n,
    ...overrides,
  });

  // ─── Slippage floor ───────────────────────────────────────────────────

  await reporter.step("Slippage floor");

  await expectRejection("Manager mint without a minimum", vault.mint(MANAGER, mintParams({ amount0Min: 0n })));
  const opened = await vault.mint(MANAGER, mintParams());
  reporter.ok(`Manager opened position ${opened.positionId} with liquidity ${opened.liquidity}`);

  // ─── Fee on income only ───────────────────────────────────────────────

  await reporter.step("Fee on income only");

  chain.positionManager.accrueFees(opened.positionId, 200n, 100n);
  reporter.info("swap income", "200 / 100");
  const closed = await vault.closePosition(OWNER);
  reporter.ok(`Closed in order: ${closed.steps.join(" -> ")}`);
  reporter.info("protocol fee", formatAmounts(closed.settlement.fee));
  reporter.info("principal", formatAmounts(closed.principal));
  reportBalances(reporter, chain, vault);

  // ─── Revoked manager ──────────────────────────────────────────────────

  await reporter.step("Revoked manager");

  registry.setApproved(ADMIN, MANAGER, false);
  reporter.info("manager field", vault.manager);
  await expectRejection("Revoked manager mint", vault.mint(MANAGER, mintParams()));

  // ─── Adversarial manager ──────────────────────────────────────────────

  await reporter.step("Adversarial manager");

  await vault.setManager(OWNER, ADVERSARY);
  reporter.ok(`Owner reassigned the manager to ${ADVERSARY}`);
  await expectRejection("Manager withdrawal", vault.withdrawAll(ADVERSARY));
  reportBalances(reporter, chain, vault);

  // ─── Reentrant fee recipient ──────────────────────────────────────────

  await reporter.step("Reentrant fee recipient");

  const second = await vault.mint(OWNER, mintParams());
  chain.positionManager.accrueFees(second.positionId, 100n, 100n);
  chain.onTokenReceived(FEE_RECIPIENT, async () => {
    await vault.withdrawAll(OWNER);
  });
  await expectRejection("Close with a reentrant recipient", vault.closePosition(OWNER));
  reporter.info("position", `${vault.positionId} still ${vault.positionState.status}`);

  chain.clearTokenHook(FEE_RECIPIENT);
  const retried = await vault.closePosition(OWNER);
  reporter.ok(`Retried close settled ${formatAmounts(retried.settlement.fee)} in fees`);

  // ─── Owner exit ───────────────────────────────────────────────────────

  await reporter.step("Owner exit");

  const withdrawal = await vault.withdrawAll(OWNER);
  for (const sweep of withdrawal.sweeps) {
    reporter.info(sweep.token, sweep.kind === "skipped" ? "nothing to sweep" : `${sweep.amount} to owner`);
  }

  const integrity = notifications.verifyIntegrity();
  const eventCount = notifications.readAll().length;
  if (integrity.valid) {
    reporter.ok(`Notification log verified (${eventCount} events)`);
  } else {
    reporter.rejected(`Notification log broken: ${integrity.errors.map((e) => `#${e.position} ${e.reason}`).join("; ")}`);
  }

  return {
    vault: vault.address,
    rejections,
    ownerBalance: balancesOf(chain, OWNER),
    feeRecipientBalance: balancesOf(chain, FEE_RECIPIENT),
    eventCount,
    integrityValid: integrity.valid,
  };
}

// =============================================================================
// Helpers
// =============================================================================

async function rejectionOf(attempt: Promise<unknown>): Promise<VaultError> {
  try {
    await attempt;
  } catch (err) {
    if (isVaultError(err)) return err;
    throw err;
  }
  throw new Error("Expected the vault to reject the call");
}

function balancesOf(chain: SimulatedChain, account: Address): TokenAmounts {
  return { amount0: chain.balanceOf(TOKEN0, account), amount1: chain.balanceOf(TOKEN1, account) };
}

function formatAmounts(amounts: TokenAmounts): string {
  return `${amounts.amount0} / ${amounts.amount1}`;
}

function reportBalances(reporter: Reporter, chain: SimulatedChain, vault: Vault): void {
  reporter.info("vault balance", formatAmounts(balancesOf(chain, vault.address)));
}
