import type { Chain } from "../infra/chain";
import { parseAddress } from "../schema";
import type { Address } from "../types";
import { sameAddress, unauthorized, type Contract } from "./contract";
import { FungibleToken, type IFungibleToken, type TokenMetadata } from "./token";

/** What the hub ledger needs from a synthetic: supply control by its minter. */
export interface IMintableAsset extends IFungibleToken {
  readonly minter: Address;
  mint(caller: Address, to: Address, amount: bigint): void;
  burn(caller: Address, from: Address, amount: bigint): void;
}

export const isMintableAsset = (c: Contract | undefined): c is Contract & IMintableAsset =>
  c !== undefined && "minter" in c && "mint" in c && "burn" in c && typeof c.mint === "function";

// Custodial synthetic. The minter is fixed at creation and is the only
// address that can change supply.
export class SyntheticAsset extends FungibleToken implements IMintableAsset {
  readonly minter: Address;

  constructor(chain: Chain, meta: TokenMetadata & { minter: Address }) {
    super(chain, meta, "synthetic");
    this.minter = parseAddress(meta.minter, "minter");
  }

  mint(caller: Address, to: Address, amount: bigint): void {
    this.transact(() => {
      this.onlyMinter(caller, "mint");
      this.mintTo(to, amount);
    });
  }

  burn(caller: Address, from: Address, amount: bigint): void {
    this.transact(() => {
      this.onlyMinter(caller, "burn");
      this.burnFrom(from, amount);
    });
  }

  private onlyMinter(caller: Address, action: string): void {
    if (!sameAddress(caller, this.minter)) throw unauthorized(caller, action);
  }
}
