import { decodeMessage, encodeMessage } from "../codec/message";
import { BridgeError, ErrorCode } from "../errors";
import type { Chain, Slot, Table } from "../infra/chain";
import { resolveMailbox, type MessageRecipient } from "../infra/mailbox";
import { parseAddress, parseAmount, parseDomain } from "../schema";
import {
  MessageKind,
  type Address,
  type Bytes32,
  type ChainEndpoint,
  type DispatchReceipt,
  type Domain,
  type HubConfig,
  type MessageId,
  type TokenMapping,
  type UnmappedTokenPolicy,
} from "../types";
import { addressToBytes32, isZeroAddress } from "../utils/bytes";
import type { IChainRegistry } from "./chainRegistry";
import { Ownable, sameAddress, unauthorized } from "./contract";
import { messageIdOf } from "./hash";
import { isMintableAsset, type IMintableAsset } from "./syntheticAsset";
import type { ITokenRegistry } from "./tokenRegistry";

const CONFIG = "current";

export interface HubLedgerOptions {
  owner: Address;
  chainRegistry: IChainRegistry;
  tokenRegistry: ITokenRegistry;
  unmappedTokenPolicy?: UnmappedTokenPolicy;
}

const ledgerKey = (user: Address, asset: Address): string => `${user.toLowerCase()}:${asset.toLowerCase()}`;

/**
 * Hub-side custodian. Applies DEPOSIT messages at most once, keeps the
 * per-user synthetic ledger, and originates RELEASE messages on withdrawal.
 *
 * Custody invariant: for every synthetic, `balanceOf(this)` equals the sum
 * of ledger balances in that asset (tracked as `getTotalCredited`).
 */
export class HubLedger extends Ownable implements MessageRecipient {
  readonly chainRegistry: IChainRegistry;
  private readonly tokenRegistrySlot: Slot<ITokenRegistry>;
  private readonly policy: Slot<UnmappedTokenPolicy>;
  private readonly config: Table<HubConfig> = this.table<HubConfig>("config");
  private readonly balances: Table<bigint> = this.table<bigint>("balances");
  private readonly totals: Table<bigint> = this.table<bigint>("totals");
  private readonly processed: Table<true> = this.table<true>("processed");
  private readonly processedCount: Table<number> = this.table<number>("processedCount");
  private readonly withdrawNonces: Table<bigint> = this.table<bigint>("withdrawNonces");
  private readonly operators: Table<true> = this.table<true>("operators");

  constructor(chain: Chain, opts: HubLedgerOptions) {
    super(chain, "hub-ledger", opts.owner);
    this.chainRegistry = opts.chainRegistry;
    this.tokenRegistrySlot = this.slot("tokenRegistry", opts.tokenRegistry);
    this.policy = this.slot("unmappedTokenPolicy", opts.unmappedTokenPolicy ?? "reject");
  }

  get tokenRegistry(): ITokenRegistry {
    return this.tokenRegistrySlot.get();
  }

  /* ── inbound DEPOSIT ─────────────────────────────────── */
  handle(caller: Address, originDomain: Domain, sender: Bytes32, body: Uint8Array): void {
    this.transact(() => {
      const cfg = this.requireConfig();
      if (!sameAddress(caller, cfg.mailbox)) throw unauthorized(caller, "deliver messages");
      if (!this.chainRegistry.isTrusted(originDomain, sender)) {
        this.log.warn({ originDomain, sender }, "deposit from untrusted origin");
        throw new BridgeError(ErrorCode.UNTRUSTED_ORIGIN, `untrusted origin ${originDomain}/${sender}`, {
          originDomain,
          sender,
        });
      }

      const messageId = messageIdOf(originDomain, sender, body);
      if (this.processed.has(messageId)) {
        this.log.debug({ messageId }, "duplicate deposit ignored");
        return;
      }

      const message = decodeMessage(body);
      if (message.kind !== MessageKind.Deposit) {
        throw new BridgeError(ErrorCode.INVALID_MESSAGE_KIND, "hub only accepts DEPOSIT messages", {
          messageId,
          kind: message.kind,
        });
      }
      if (message.originDomain !== originDomain) {
        throw new BridgeError(ErrorCode.MALFORMED_MESSAGE, "origin domain does not match the delivering origin", {
          messageId,
          claimed: message.originDomain,
          originDomain,
        });
      }

      const mapping = this.tokenRegistry.getTokenMapping(originDomain, message.token, cfg.localDomain);
      const asset = mapping?.active ? this.assetAt(mapping.syntheticAsset) : undefined;
      if (!mapping?.active || !asset) {
        const fields = { messageId, originDomain, token: message.token, amount: message.amount };
        if (this.policy.get() === "reject") {
          this.log.warn(fields, "deposit for unmapped token rejected");
          throw new BridgeError(
            ErrorCode.UNMAPPED_TOKEN,
            `no active mapping for ${message.token} from domain ${originDomain}`,
            { messageId, originDomain, token: message.token },
          );
        }
        this.processed.insertUnique(messageId, true);
        this.emit({
          type: "UnmappedDepositAbsorbed",
          recipient: message.recipient,
          sourceToken: message.token,
          originDomain,
          amount: message.amount,
          messageId,
        });
        this.log.error(fields, "deposit for unmapped token absorbed without credit");
        return;
      }

      asset.mint(this.address, this.address, message.amount);
      this.credit(message.recipient, asset.address, message.amount);
      this.processedCount.set(message.recipient, this.getUserProcessedCount(message.recipient) + 1);
      this.processed.insertUnique(messageId, true);
      this.emit({
        type: "DepositCredited",
        recipient: message.recipient,
        syntheticAsset: asset.address,
        sourceToken: message.token,
        originDomain,
        amount: message.amount,
        messageId,
      });
      this.log.info(
        { messageId, recipient: message.recipient, asset: asset.address, amount: message.amount },
        "deposit credited",
      );
    });
  }

  /* ── withdrawal ──────────────────────────────────────── */
  requestWithdraw(
    caller: Address,
    synthetic: Address,
    amount: bigint,
    targetDomain: Domain,
    recipient: Address = caller,
  ): DispatchReceipt {
    return this.transact(() => {
      const user = parseAddress(caller, "caller");
      const syn = parseAddress(synthetic, "synthetic");
      const value = parseAmount(amount);
      const target = parseDomain(targetDomain, "targetDomain");
      const to = parseAddress(recipient, "recipient");
      if (isZeroAddress(to)) throw new BridgeError(ErrorCode.INVALID_ARGUMENT, "recipient is the zero address");
      const cfg = this.requireConfig();

      const endpoint = this.chainRegistry.getChainEndpoint(target);
      if (!endpoint?.active) {
        throw new BridgeError(ErrorCode.UNTRUSTED_ORIGIN, `no active endpoint for domain ${target}`, {
          targetDomain: target,
        });
      }
      const mapping = this.withdrawMapping(target, syn, cfg.localDomain);
      const asset = this.assetAt(syn);
      if (!mapping || !asset) {
        throw new BridgeError(ErrorCode.UNMAPPED_TOKEN, `${syn} has no active mapping to domain ${target}`, {
          synthetic: syn,
          targetDomain: target,
        });
      }

      this.debit(user, syn, value);
      this.totals.set(syn, this.getTotalCredited(syn) - value);
      asset.burn(this.address, this.address, value);

      const sequence = this.getWithdrawNonce(to);
      this.withdrawNonces.set(to, sequence + 1n);
      const body = encodeMessage({
        kind: MessageKind.Release,
        token: mapping.sourceToken,
        recipient: to,
        amount: value,
        originDomain: cfg.localDomain,
        sequence,
      });
      const messageId = messageIdOf(cfg.localDomain, addressToBytes32(this.address), body);
      const transportId = resolveMailbox(this.chain, cfg.mailbox).dispatch(
        this.address,
        target,
        addressToBytes32(endpoint.gateway),
        body,
      );
      this.emit({
        type: "WithdrawRequested",
        user,
        recipient: to,
        syntheticAsset: syn,
        sourceToken: mapping.sourceToken,
        targetDomain: target,
        amount: value,
        sequence,
        messageId,
      });
      this.log.info({ messageId, user, asset: syn, amount: value, targetDomain: target }, "withdrawal dispatched");
      return { messageId, transportId, sequence };
    });
  }

  /* ── trading collaborator surface ────────────────────── */
  transferBalance(caller: Address, from: Address, to: Address, asset: Address, amount: bigint): void {
    this.transact(() => {
      if (!this.isAuthorizedOperator(caller)) throw unauthorized(caller, "move ledger balances");
      const src = parseAddress(from, "from");
      const dst = parseAddress(to, "to");
      const a = parseAddress(asset, "asset");
      const value = parseAmount(amount);
      if (isZeroAddress(dst)) throw new BridgeError(ErrorCode.INVALID_ARGUMENT, "transfer to the zero address");
      this.debit(src, a, value);
      this.balances.set(ledgerKey(dst, a), this.getBalance(dst, a) + value);
      this.emit({ type: "LedgerTransfer", from: src, to: dst, asset: a, amount: value });
    });
  }

  /* ── admin ───────────────────────────────────────────── */
  setChainEndpoint(caller: Address, domain: Domain, gateway: Address, name?: string): void {
    this.transact(() => {
      this.onlyOwner(caller, "set chain endpoints");
      this.chainRegistry.setChainEndpoint(caller, domain, gateway, name);
    });
  }

  setChainStatus(caller: Address, domain: Domain, active: boolean): void {
    this.transact(() => {
      this.onlyOwner(caller, "change chain status");
      this.chainRegistry.setChainStatus(caller, domain, active);
    });
  }

  setTokenRegistry(caller: Address, registry: ITokenRegistry): void {
    this.transact(() => {
      this.onlyOwner(caller, "set the token registry");
      this.tokenRegistrySlot.set(registry);
      this.emit({ type: "TokenRegistrySet", registry: registry.address });
      this.log.info({ registry: registry.address }, "token registry set");
    });
  }

  updateCrossChainConfig(caller: Address, mailbox: Address): HubConfig {
    return this.transact(() => {
      this.onlyOwner(caller, "update cross-chain config");
      const config: HubConfig = {
        mailbox: resolveMailbox(this.chain, parseAddress(mailbox, "mailbox")).address,
        localDomain: this.chain.domain,
      };
      this.config.set(CONFIG, config);
      this.emit({ type: "HubConfigUpdated", config });
      this.log.info({ ...config }, "cross-chain config updated");
      return config;
    });
  }

  setUnmappedTokenPolicy(caller: Address, policy: UnmappedTokenPolicy): void {
    this.transact(() => {
      this.onlyOwner(caller, "set the unmapped token policy");
      this.policy.set(policy);
      this.emit({ type: "UnmappedTokenPolicySet", policy });
    });
  }

  setAuthorizedOperator(caller: Address, operator: Address, allowed: boolean): void {
    this.transact(() => {
      this.onlyOwner(caller, "authorize operators");
      const op = parseAddress(operator, "operator");
      if (allowed) this.operators.set(op, true);
      else this.operators.delete(op);
      this.emit({ type: "OperatorSet", operator: op, allowed });
    });
  }

  /* ── reads ───────────────────────────────────────────── */
  getBalance(user: Address, asset: Address): bigint {
    return this.balances.get(ledgerKey(user, asset)) ?? 0n;
  }

  getTotalCredited(asset: Address): bigint {
    return this.totals.get(asset.toLowerCase()) ?? 0n;
  }

  isMessageProcessed(id: MessageId): boolean {
    return this.processed.has(id);
  }

  getChainEndpoint(domain: Domain): ChainEndpoint | undefined {
    return this.chainRegistry.getChainEndpoint(domain);
  }

  getCrossChainConfig(): HubConfig | undefined {
    return this.config.get(CONFIG);
  }

  /** Diagnostic only; dedupe is keyed on MessageId. */
  getUserProcessedCount(user: Address): number {
    return this.processedCount.get(user.toLowerCase()) ?? 0;
  }

  /** Releases addressed to `user` so far. */
  getWithdrawNonce(user: Address): bigint {
    return this.withdrawNonces.get(user.toLowerCase()) ?? 0n;
  }

  isAuthorizedOperator(address: Address): boolean {
    return this.operators.has(address.toLowerCase());
  }

  getUnmappedTokenPolicy(): UnmappedTokenPolicy {
    return this.policy.get();
  }

  /* ── internals ───────────────────────────────────────── */
  private requireConfig(): HubConfig {
    const cfg = this.config.get(CONFIG);
    if (!cfg) throw new BridgeError(ErrorCode.NOT_CONFIGURED, "cross-chain config not set");
    return cfg;
  }

  private assetAt(address: Address): IMintableAsset | undefined {
    const c = this.chain.contractAt(address);
    return isMintableAsset(c) && sameAddress(c.minter, this.address) ? c : undefined;
  }

  // The reverse index survives remaps, so a retired synthetic still withdraws
  // as long as its source token's mapping is active.
  private withdrawMapping(targetDomain: Domain, synthetic: Address, hubDomain: Domain): TokenMapping | undefined {
    const sourceToken = this.tokenRegistry.getSourceToken(targetDomain, synthetic);
    if (isZeroAddress(sourceToken)) return undefined;
    const mapping = this.tokenRegistry.getTokenMapping(targetDomain, sourceToken, hubDomain);
    return mapping?.active ? mapping : undefined;
  }

  private credit(user: Address, asset: Address, amount: bigint): void {
    this.balances.set(ledgerKey(user, asset), this.getBalance(user, asset) + amount);
    this.totals.set(asset.toLowerCase(), this.getTotalCredited(asset) + amount);
  }

  private debit(user: Address, asset: Address, amount: bigint): void {
    const balance = this.getBalance(user, asset);
    if (balance < amount) {
      throw new BridgeError(ErrorCode.INSUFFICIENT_BALANCE, `balance ${balance} < ${amount}`, {
        user,
        asset,
        balance: balance.toString(),
      });
    }
    this.balances.set(ledgerKey(user, asset), balance - amount);
  }
}
