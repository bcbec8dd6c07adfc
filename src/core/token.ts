import { BridgeError, ErrorCode } from "../errors";
import type { Chain, Slot, Table } from "../infra/chain";
import { parseAddress, parseDecimals } from "../schema";
import type { Address } from "../types";
import { ZERO_ADDRESS, isZeroAddress } from "../utils/bytes";
import { Contract, sameAddress, unauthorized } from "./contract";

export interface TokenMetadata {
  name: string;
  symbol: string;
  decimals: number;
}

/** Read surface every bridged token exposes. */
export interface IFungibleToken {
  readonly address: Address;
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
  balanceOf(account: Address): bigint;
  totalSupply(): bigint;
  allowance(owner: Address, spender: Address): bigint;
  transfer(caller: Address, to: Address, amount: bigint): void;
  transferFrom(caller: Address, from: Address, to: Address, amount: bigint): void;
}

export const isFungibleToken = (c: Contract | undefined): c is Contract & IFungibleToken =>
  c !== undefined && "transferFrom" in c && "balanceOf" in c && typeof c.transferFrom === "function";

const nonNegative = (amount: bigint): bigint => {
  if (amount < 0n) throw new BridgeError(ErrorCode.INVALID_ARGUMENT, "amount must not be negative");
  return amount;
};

export class FungibleToken extends Contract implements IFungibleToken {
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
  private readonly balances: Table<bigint> = this.table<bigint>("balances");
  private readonly allowances: Table<bigint> = this.table<bigint>("allowances");
  private readonly supply: Slot<bigint> = this.slot<bigint>("supply", 0n);

  constructor(chain: Chain, meta: TokenMetadata, component = "token") {
    super(chain, component);
    this.name = meta.name;
    this.symbol = meta.symbol;
    this.decimals = parseDecimals(meta.decimals);
  }

  /* ── reads ── */
  balanceOf(account: Address): bigint {
    return this.balances.get(account.toLowerCase()) ?? 0n;
  }

  totalSupply(): bigint {
    return this.supply.get();
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.allowances.get(allowanceKey(owner, spender)) ?? 0n;
  }

  /* ── ERC-20 style mutations ── */
  transfer(caller: Address, to: Address, amount: bigint): void {
    this.transact(() => this.move(caller, to, nonNegative(amount)));
  }

  approve(caller: Address, spender: Address, amount: bigint): void {
    this.transact(() => {
      const owner = parseAddress(caller, "caller");
      const s = parseAddress(spender, "spender");
      this.allowances.set(allowanceKey(owner, s), nonNegative(amount));
      this.emit({ type: "Approval", owner, spender: s, amount });
    });
  }

  transferFrom(caller: Address, from: Address, to: Address, amount: bigint): void {
    this.transact(() => {
      nonNegative(amount);
      if (!sameAddress(caller, from)) {
        const key = allowanceKey(from, caller);
        const allowed = this.allowances.get(key) ?? 0n;
        if (allowed < amount) {
          throw new BridgeError(ErrorCode.INSUFFICIENT_FUNDS, `allowance ${allowed} < ${amount}`, {
            token: this.address,
            owner: from,
            spender: caller,
          });
        }
        this.allowances.set(key, allowed - amount);
      }
      this.move(from, to, amount);
    });
  }

  /* ── supply changes, gated by subclasses ── */
  protected mintTo(to: Address, amount: bigint): void {
    const recipient = parseAddress(to, "to");
    if (isZeroAddress(recipient)) throw new BridgeError(ErrorCode.INVALID_ARGUMENT, "mint to the zero address");
    this.balances.set(recipient, this.balanceOf(recipient) + nonNegative(amount));
    this.supply.set(this.supply.get() + amount);
    this.emit({ type: "Transfer", from: ZERO_ADDRESS, to: recipient, amount });
  }

  protected burnFrom(from: Address, amount: bigint): void {
    const holder = parseAddress(from, "from");
    this.debit(holder, nonNegative(amount));
    this.supply.set(this.supply.get() - amount);
    this.emit({ type: "Transfer", from: holder, to: ZERO_ADDRESS, amount });
  }

  private move(from: Address, to: Address, amount: bigint): void {
    const src = parseAddress(from, "from");
    const dst = parseAddress(to, "to");
    if (isZeroAddress(dst)) throw new BridgeError(ErrorCode.INVALID_ARGUMENT, "transfer to the zero address");
    this.debit(src, amount);
    this.balances.set(dst, this.balanceOf(dst) + amount);
    this.emit({ type: "Transfer", from: src, to: dst, amount });
  }

  private debit(account: Address, amount: bigint): void {
    const balance = this.balanceOf(account);
    if (balance < amount) {
      throw new BridgeError(ErrorCode.INSUFFICIENT_FUNDS, `balance ${balance} < ${amount}`, {
        token: this.address,
        account,
      });
    }
    this.balances.set(account, balance - amount);
  }
}

const allowanceKey = (owner: Address, spender: Address): string =>
  `${owner.toLowerCase()}:${spender.toLowerCase()}`;

/** Collateral on a source network; the deployer may mint. */
export class CollateralToken extends FungibleToken {
  readonly owner: Address;

  constructor(chain: Chain, meta: TokenMetadata & { owner: Address }) {
    super(chain, meta, "collateral");
    this.owner = parseAddress(meta.owner, "owner");
  }

  mint(caller: Address, to: Address, amount: bigint): void {
    this.transact(() => {
      if (!sameAddress(caller, this.owner)) throw unauthorized(caller, "mint");
      this.mintTo(to, amount);
    });
  }
}
