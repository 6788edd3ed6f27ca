/**
 * Vault
 *
 * A non-custodial wrapper around one concentrated-liquidity position.
 * The owner may do anything; an approved manager may operate the
 * position but never move capital out.
 *
 * Every guarded operation runs the same envelope:
 *
 *   reentrancy lock → checkpoint → transaction boundary
 *     → authorization → operation → ledger settled check
 *     → publish buffered notifications
 *   → unlock
 *
 * On any error, publishing included, the checkpoint is restored and the
 * transaction boundary rolls back external effects.
 */

import { randomUUID } from "node:crypto";
import pino from "pino";
import type { Logger } from "pino";
import { getAddress, isAddress } from "viem";
import { InMemoryEventStore, createEvent, streamIdFor } from "@lpvault/event-store";
import type { EventPayloads, EventStore, EventType, StoredEvent } from "@lpvault/event-store";
import { FeeLedger } from "@lpvault/ledger";
import type { FeeSettlement, LedgerSnapshot } from "@lpvault/ledger";
import type {
  Address,
  BoundPool,
  ChainConnections,
  DomainEvent,
  FeeConfigSource,
  ManagerRegistryReader,
  NativeReceiver,
  PositionId,
  TokenAmounts,
} from "@lpvault/types";
import { AuthorizationGate } from "./authorization.js";
import type { Authority } from "./authorization.js";
import { VaultConfigSchema, VaultSnapshotSchema, parseConfig } from "./config.js";
import type { VaultConfigInput, VaultSnapshot } from "./config.js";
import { VaultError } from "./errors.js";
import { NativeReceiptGuard } from "./native-receipt.js";
import { PositionLifecycle } from "./position-lifecycle.js";
import { RebalanceGate } from "./rebalance.js";
import { ReentrancyGuard } from "./reentrancy-guard.js";
import { TeardownSequence } from "./teardown.js";
import type {
  DecreaseLiquidityParams,
  IncreaseLiquidityParams,
  MintOutcome,
  MintParams,
  PositionState,
  RebalanceParams,
  TeardownReport,
  VaultContext,
  VaultOperation,
  VaultSettings,
  WithdrawalReport,
} from "./types.js";
import { WithdrawalOrchestrator } from "./withdrawal.js";

// =============================================================================
// Dependencies
// =============================================================================

export interface VaultDependencies {
  /** Clients bound to the vault's own address */
  readonly chain: ChainConnections;
  readonly registry: ManagerRegistryReader;
  readonly feeSource: FeeConfigSource;
  /** Where committed notifications go. Defaults to a private in-memory store. */
  readonly notifications?: EventStore;
  readonly logger?: Logger;
}

interface OperationFrame {
  readonly operation: VaultOperation;
  readonly caller: Address;
  readonly correlationId: string;
  readonly outbox: DomainEvent[];
}

interface Checkpoint {
  readonly positionId: PositionId;
  readonly manager: Address;
  readonly unwrapNative: boolean;
  readonly ledger: LedgerSnapshot;
}

// =============================================================================
// Vault
// =============================================================================

export class Vault implements NativeReceiver {
  readonly address: Address;
  readonly owner: Address;
  readonly pool: BoundPool;

  private readonly settings: VaultSettings;
  private readonly chain: ChainConnections;
  private readonly ledger = new FeeLedger();
  private readonly guard = new ReentrancyGuard();
  private readonly gate: AuthorizationGate;
  private readonly lifecycle: PositionLifecycle;
  private readonly withdrawal: WithdrawalOrchestrator;
  private readonly rebalancer: RebalanceGate;
  private readonly receipts: NativeReceiptGuard;
  private readonly notifications: EventStore;
  private readonly logger: Logger;
  private frame: OperationFrame | undefined;

  constructor(config: VaultConfigInput, deps: VaultDependencies) {
    const parsed = parseConfig(VaultConfigSchema, config, "vault configuration");

    this.address = parsed.address;
    this.owner = parsed.owner;
    this.pool = parsed.pool;
    this.settings = { manager: parsed.manager, unwrapNative: parsed.unwrapNative };
    this.chain = deps.chain;
    this.notifications = deps.notifications ?? new InMemoryEventStore();
    this.logger = (deps.logger ?? pino({ level: "silent" })).child({
      component: "vault",
      vault: this.address,
    });

    const ctx: VaultContext = {
      address: this.address,
      owner: this.owner,
      pool: this.pool,
      chain: deps.chain,
      feeSource: deps.feeSource,
      ledger: this.ledger,
      settings: this.settings,
      logger: this.logger,
      emit: <T extends EventType>(type: T, payload: EventPayloads[T]) => {
        this.emit(type, payload);
      },
    };

    this.gate = new AuthorizationGate(this.owner, () => this.settings.manager, deps.registry);
    const teardown = new TeardownSequence(ctx);
    this.lifecycle = new PositionLifecycle(ctx, teardown);
    this.withdrawal = new WithdrawalOrchestrator(ctx, this.lifecycle);
    this.rebalancer = new RebalanceGate(ctx);
    this.receipts = new NativeReceiptGuard(ctx);
  }

  /**
   * Rebuild a vault from `snapshot()` output.
   */
  static restore(snapshot: unknown, deps: VaultDependencies): Vault {
    const parsed = parseConfig(VaultSnapshotSchema, snapshot, "vault snapshot");
    const vault = new Vault(
      {
        address: parsed.address,
        owner: parsed.owner,
        manager: parsed.manager,
        pool: parsed.pool,
        unwrapNative: parsed.unwrapNative,
      },
      deps,
    );
    vault.lifecycle.restore(BigInt(parsed.positionId));
    vault.ledger.restore(parsed.ledger);
    return vault;
  }

  // ─── Queries ──────────────────────────────────────────────────────────

  get manager(): Address {
    return this.settings.manager;
  }

  get unwrapNative(): boolean {
    return this.settings.unwrapNative;
  }

  get positionId(): PositionId {
    return this.lifecycle.positionId;
  }

  get positionState(): PositionState {
    return this.lifecycle.state;
  }

  get accruedFees(): TokenAmounts {
    return this.ledger.accrued;
  }

  get owedPrincipal(): TokenAmounts {
    return this.ledger.owedPrincipal;
  }

  /** True while a guarded operation is executing. */
  get locked(): boolean {
    return this.guard.locked;
  }

  get notificationStreamId(): string {
    return streamIdFor("vault", this.address);
  }

  /** Committed notifications, oldest first. */
  history(): readonly StoredEvent[] {
    return this.notifications.read(this.notificationStreamId);
  }

  /** The caller's standing right now. */
  authorityOf(caller: Address): Promise<Authority> {
    return this.gate.authorize(caller);
  }

  snapshot(): VaultSnapshot {
    if (this.guard.locked) {
      throw new VaultError(
        "INVALID_STATE",
        `Cannot snapshot while ${this.guard.holder ?? "an operation"} is executing`,
      );
    }
    return {
      version: 1,
      address: this.address,
      owner: this.owner,
      manager: this.settings.manager,
      pool: { ...this.pool },
      positionId: this.lifecycle.positionId.toString(),
      ledger: this.ledger.snapshot(),
      unwrapNative: this.settings.unwrapNative,
      savedAt: new Date().toISOString(),
    };
  }

  // ─── Position lifecycle ───────────────────────────────────────────────

  mint(caller: Address, params: MintParams): Promise<MintOutcome> {
    return this.execute("mint", caller, () => this.lifecycle.mint(params));
  }

  increaseLiquidity(caller: Address, params: IncreaseLiquidityParams): Promise<MintOutcome> {
    return this.execute("increaseLiquidity", caller, () =>
      this.lifecycle.increaseLiquidity(params),
    );
  }

  decreaseLiquidity(caller: Address, params: DecreaseLiquidityParams): Promise<TokenAmounts> {
    return this.execute("decreaseLiquidity", caller, () =>
      this.lifecycle.decreaseLiquidity(params),
    );
  }

  collectFees(caller: Address): Promise<FeeSettlement> {
    return this.execute("collectFees", caller, () => this.lifecycle.collectFees());
  }

  burn(caller: Address, tokenId: PositionId): Promise<void> {
    return this.execute("burn", caller, () => this.lifecycle.burn(tokenId));
  }

  closePosition(caller: Address): Promise<TeardownReport> {
    return this.execute("closePosition", caller, () => this.lifecycle.closePosition());
  }

  rebalance(caller: Address, params: RebalanceParams): Promise<bigint> {
    return this.execute("rebalance", caller, () => this.rebalancer.rebalance(params));
  }

  // ─── Capital ──────────────────────────────────────────────────────────

  withdrawAll(caller: Address): Promise<WithdrawalReport> {
    return this.execute("withdrawAll", caller, () => this.withdrawal.withdrawAll());
  }

  deposit(caller: Address, token: Address, amount: bigint): Promise<void> {
    return this.execute("deposit", caller, () => this.withdrawal.deposit(token, amount));
  }

  setManager(caller: Address, manager: Address): Promise<void> {
    return this.execute("setManager", caller, async () => {
      if (!isAddress(manager, { strict: false })) {
        throw new VaultError("INVALID_REFERENCE", `setManager: ${manager} is not an address`, {
          operation: "setManager",
        });
      }
      const previousManager = this.settings.manager;
      this.settings.manager = getAddress(manager);
      this.emit("manager.changed", { previousManager, newManager: this.settings.manager });
    });
  }

  setUnwrapNative(caller: Address, enabled: boolean): Promise<void> {
    return this.execute("setUnwrapNative", caller, async () => {
      this.settings.unwrapNative = enabled;
      this.emit("unwrap.preference.changed", { enabled });
    });
  }

  // ─── Native receipt ───────────────────────────────────────────────────

  async receiveNative(sender: Address, amount: bigint): Promise<void> {
    const outcome = await this.receipts.receive(sender, amount);
    this.logger.debug({ sender, amount: amount.toString(), outcome }, "native currency received");
  }

  // ─── Envelope ─────────────────────────────────────────────────────────

  private execute<T>(
    operation: VaultOperation,
    caller: Address,
    body: () => Promise<T>,
  ): Promise<T> {
    // The lock is taken before the checkpoint so the running operation's state is untouched
    return this.guard.run(operation, async () => {
      const checkpoint = this.checkpoint();
      const frame: OperationFrame = {
        operation,
        caller,
        correlationId: randomUUID(),
        outbox: [],
      };
      this.frame = frame;

      try {
        const result = await this.chain.boundary.transact(async () => {
          await this.gate.require(caller, operation);
          const value = await body();
          this.ledger.assertSettled(operation);
          // Last step inside the boundary: a failed append reverts the chain too
          if (frame.outbox.length > 0) {
            this.notifications.append(this.notificationStreamId, frame.outbox);
          }
          return value;
        });

        this.logger.debug(
          { operation, caller, correlationId: frame.correlationId, notifications: frame.outbox.length },
          "operation committed",
        );
        return result;
      } catch (err) {
        this.rollback(checkpoint);
        this.logger.warn(
          {
            operation,
            caller,
            correlationId: frame.correlationId,
            code: err instanceof VaultError ? err.code : undefined,
            err,
          },
          "operation reverted",
        );
        throw err;
      } finally {
        this.frame = undefined;
      }
    });
  }

  private emit<T extends EventType>(type: T, payload: EventPayloads[T]): void {
    const frame = this.frame;
    if (frame === undefined) {
      throw new VaultError("INVALID_STATE", `Notification ${type} emitted outside an operation`);
    }
    frame.outbox.push(createEvent(type, payload, frame.caller, frame.correlationId));
  }

  private checkpoint(): Checkpoint {
    return {
      positionId: this.lifecycle.positionId,
      manager: this.settings.manager,
      unwrapNative: this.settings.unwrapNative,
      ledger: this.ledger.snapshot(),
    };
  }

  private rollback(checkpoint: Checkpoint): void {
    this.lifecycle.restore(checkpoint.positionId);
    this.settings.manager = checkpoint.manager;
    this.settings.unwrapNative = checkpoint.unwrapNative;
    this.ledger.restore(checkpoint.ledger);
  }
}
