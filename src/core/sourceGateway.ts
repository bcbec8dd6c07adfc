import { decodeMessage, encodeMessage } from "../codec/message";
import { BridgeError, ErrorCode } from "../errors";
import type { Chain, Table } from "../infra/chain";
import { resolveMailbox, type MessageRecipient } from "../infra/mailbox";
import { parseAddress, parseAmount, parseDomain } from "../schema";
import {
  MessageKind,
  type Address,
  type Bytes32,
  type DispatchReceipt,
  type Domain,
  type GatewayConfig,
  type MessageId,
} from "../types";
import { ZERO_ADDRESS, addressToBytes32, isZeroAddress } from "../utils/bytes";
import { Ownable, sameAddress, unauthorized } from "./contract";
import { messageIdOf } from "./hash";
import { isFungibleToken, type IFungibleToken } from "./token";

const CONFIG = "current";

export interface CrossChainConfigInput {
  mailbox: Address;
  destinationDomain: Domain;
  destinationGateway: Address;
}

/**
 * Custody point on a source network. Locks collateral and dispatches DEPOSIT
 * messages to the hub; releases collateral on RELEASE messages from it.
 */
export class SourceGateway extends Ownable implements MessageRecipient {
  private readonly config: Table<GatewayConfig> = this.table<GatewayConfig>("config");
  private readonly whitelist: Table<true> = this.table<true>("whitelist");
  private readonly hints: Table<Address> = this.table<Address>("hints");
  private readonly reverseHints: Table<Address> = this.table<Address>("reverseHints");
  private readonly nonces: Table<bigint> = this.table<bigint>("nonces");
  private readonly processed: Table<true> = this.table<true>("processed");

  constructor(chain: Chain, owner: Address) {
    super(chain, "source-gateway", owner);
  }

  /* ── deposit ─────────────────────────────────────────── */
  deposit(caller: Address, token: Address, amount: bigint, recipient: Address): DispatchReceipt {
    return this.transact(() => {
      const from = parseAddress(caller, "caller");
      const t = parseAddress(token, "token");
      const value = parseAmount(amount);
      const to = parseAddress(recipient, "recipient");
      if (isZeroAddress(to)) throw new BridgeError(ErrorCode.INVALID_ARGUMENT, "recipient is the zero address");
      const cfg = this.requireConfig();
      if (!this.whitelist.has(t)) {
        throw new BridgeError(ErrorCode.NOT_WHITELISTED, `token ${t} is not whitelisted`, { token: t });
      }

      this.tokenAt(t).transferFrom(this.address, from, this.address, value);

      const sequence = this.getUserNonce(to);
      this.nonces.set(to, sequence + 1n);

      const body = encodeMessage({
        kind: MessageKind.Deposit,
        token: t,
        recipient: to,
        amount: value,
        originDomain: cfg.localDomain,
        sequence,
      });
      const messageId = messageIdOf(cfg.localDomain, addressToBytes32(this.address), body);
      const transportId = resolveMailbox(this.chain, cfg.mailbox).dispatch(
        this.address,
        cfg.destinationDomain,
        addressToBytes32(cfg.destinationGateway),
        body,
      );

      this.emit({
        type: "Deposit",
        from,
        recipient: to,
        token: t,
        syntheticHint: this.getTokenMapping(t),
        amount: value,
        sequence,
        messageId,
      });
      this.log.info({ messageId, from, recipient: to, token: t, amount: value, sequence }, "deposit dispatched");
      return { messageId, transportId, sequence };
    });
  }

  /* ── inbound RELEASE ─────────────────────────────────── */
  handle(caller: Address, originDomain: Domain, sender: Bytes32, body: Uint8Array): void {
    this.handleRelease(caller, originDomain, sender, body);
  }

  handleRelease(caller: Address, originDomain: Domain, sender: Bytes32, body: Uint8Array): void {
    this.transact(() => {
      const cfg = this.requireConfig();
      if (!sameAddress(caller, cfg.mailbox)) throw unauthorized(caller, "deliver messages");
      if (originDomain !== cfg.destinationDomain || sender.toLowerCase() !== addressToBytes32(cfg.destinationGateway)) {
        this.log.warn({ originDomain, sender }, "release from untrusted origin");
        throw new BridgeError(ErrorCode.UNTRUSTED_ORIGIN, `untrusted origin ${originDomain}/${sender}`, {
          originDomain,
          sender,
        });
      }

      const messageId = messageIdOf(originDomain, sender, body);
      if (this.processed.has(messageId)) {
        this.log.debug({ messageId }, "duplicate release ignored");
        return;
      }

      const message = decodeMessage(body);
      if (message.kind !== MessageKind.Release) {
        throw new BridgeError(ErrorCode.INVALID_MESSAGE_KIND, "gateway only accepts RELEASE messages", {
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

      // custody shortfall throws InsufficientFunds and the delivery can be retried
      this.tokenAt(message.token).transfer(this.address, message.recipient, message.amount);
      this.processed.insertUnique(messageId, true);
      this.emit({
        type: "Release",
        recipient: message.recipient,
        token: message.token,
        amount: message.amount,
        messageId,
      });
      this.log.info(
        { messageId, recipient: message.recipient, token: message.token, amount: message.amount },
        "collateral released",
      );
    });
  }

  /* ── admin ───────────────────────────────────────────── */
  addWhitelistedToken(caller: Address, token: Address): void {
    this.transact(() => {
      this.onlyOwner(caller, "whitelist tokens");
      const t = parseAddress(token, "token");
      this.tokenAt(t);
      if (this.whitelist.has(t)) throw new BridgeError(ErrorCode.CONFLICT, `token ${t} already whitelisted`);
      this.whitelist.set(t, true);
      this.emit({ type: "TokenWhitelisted", token: t });
    });
  }

  removeWhitelistedToken(caller: Address, token: Address): void {
    this.transact(() => {
      this.onlyOwner(caller, "remove tokens");
      const t = parseAddress(token, "token");
      if (!this.whitelist.delete(t)) throw new BridgeError(ErrorCode.NOT_FOUND, `token ${t} is not whitelisted`);
      this.emit({ type: "TokenRemoved", token: t });
    });
  }

  setTokenMapping(caller: Address, sourceToken: Address, syntheticToken: Address): void {
    this.transact(() => {
      this.onlyOwner(caller, "set token mappings");
      const src = parseAddress(sourceToken, "sourceToken");
      const syn = parseAddress(syntheticToken, "syntheticToken");
      const old = this.hints.get(src);
      if (old !== undefined) this.reverseHints.delete(old);
      this.hints.set(src, syn);
      this.reverseHints.set(syn, src);
      this.emit({ type: "TokenHintSet", sourceToken: src, syntheticToken: syn });
    });
  }

  updateCrossChainConfig(caller: Address, input: CrossChainConfigInput): GatewayConfig {
    return this.transact(() => {
      this.onlyOwner(caller, "update cross-chain config");
      const mailbox = resolveMailbox(this.chain, parseAddress(input.mailbox, "mailbox")).address;
      const destinationDomain = parseDomain(input.destinationDomain, "destinationDomain");
      const destinationGateway = parseAddress(input.destinationGateway, "destinationGateway");
      if (destinationDomain === this.chain.domain) {
        throw new BridgeError(ErrorCode.INVALID_ARGUMENT, "destination domain equals the local domain");
      }
      if (isZeroAddress(destinationGateway)) {
        throw new BridgeError(ErrorCode.INVALID_ARGUMENT, "destination gateway is the zero address");
      }
      const config: GatewayConfig = { mailbox, localDomain: this.chain.domain, destinationDomain, destinationGateway };
      this.config.set(CONFIG, config);
      this.emit({ type: "GatewayConfigUpdated", config });
      this.log.info({ ...config }, "cross-chain config updated");
      return config;
    });
  }

  /* ── reads ───────────────────────────────────────────── */
  isTokenWhitelisted(token: Address): boolean {
    return this.whitelist.has(token.toLowerCase());
  }

  getWhitelistedTokens(): Address[] {
    return this.whitelist.keys().map((k) => parseAddress(k, "token"));
  }

  getTokenMapping(sourceToken: Address): Address {
    return this.hints.get(sourceToken.toLowerCase()) ?? ZERO_ADDRESS;
  }

  getReverseTokenMapping(syntheticToken: Address): Address {
    return this.reverseHints.get(syntheticToken.toLowerCase()) ?? ZERO_ADDRESS;
  }

  /** Deposits sent so far to `user`; the next deposit to them carries this sequence. */
  getUserNonce(user: Address): bigint {
    return this.nonces.get(user.toLowerCase()) ?? 0n;
  }

  isMessageProcessed(id: MessageId): boolean {
    return this.processed.has(id);
  }

  getCustodyBalance(token: Address): bigint {
    const c = this.chain.contractAt(token);
    return isFungibleToken(c) ? c.balanceOf(this.address) : 0n;
  }

  getCrossChainConfig(): GatewayConfig | undefined {
    return this.config.get(CONFIG);
  }

  private requireConfig(): GatewayConfig {
    const cfg = this.config.get(CONFIG);
    if (!cfg) throw new BridgeError(ErrorCode.NOT_CONFIGURED, "cross-chain config not set");
    return cfg;
  }

  private tokenAt(token: Address): IFungibleToken {
    const c = this.chain.contractAt(token);
    if (!isFungibleToken(c)) {
      throw new BridgeError(ErrorCode.INVALID_ARGUMENT, `${token} is not a token on ${this.chain.name}`, { token });
    }
    return c;
  }
}
