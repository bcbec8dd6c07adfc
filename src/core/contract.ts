import { BridgeError, ErrorCode } from "../errors";
import type { Chain, Slot, Table } from "../infra/chain";
import type { Logger } from "../logging";
import { parseAddress } from "../schema";
import type { Address, BridgeEvent } from "../types";
import { isZeroAddress } from "../utils/bytes";

/**
 * Base for everything deployed on a chain: an address, namespaced storage and
 * an event emitter. Mutating entry points wrap their body in `transact`.
 */
export abstract class Contract {
  readonly address: Address;
  protected readonly log: Logger;

  protected constructor(
    readonly chain: Chain,
    component: string,
  ) {
    this.address = chain.nextAddress();
    this.log = chain.log.child({ component, address: this.address });
    chain.register(this);
  }

  protected table<V extends {}>(name: string): Table<V> {
    return this.chain.table<V>(`${this.address}.${name}`);
  }

  protected slot<V extends {}>(name: string, initial: V): Slot<V> {
    return this.chain.slot<V>(`${this.address}.${name}`, initial);
  }

  protected emit(event: BridgeEvent): void {
    this.chain.emit(this.address, event);
  }

  protected transact<T>(fn: () => T): T {
    return this.chain.transact(fn);
  }
}

export const sameAddress = (a: Address, b: Address): boolean => a.toLowerCase() === b.toLowerCase();

export const unauthorized = (caller: Address, action: string): BridgeError =>
  new BridgeError(ErrorCode.UNAUTHORIZED, `${caller} may not ${action}`, { caller, action });

export abstract class Ownable extends Contract {
  private readonly ownerSlot: Slot<Address>;

  protected constructor(chain: Chain, component: string, owner: Address) {
    super(chain, component);
    this.ownerSlot = this.slot("owner", parseAddress(owner, "owner"));
  }

  owner(): Address {
    return this.ownerSlot.get();
  }

  transferOwnership(caller: Address, newOwner: Address): void {
    this.transact(() => {
      this.onlyOwner(caller, "transfer ownership");
      const next = parseAddress(newOwner, "newOwner");
      if (isZeroAddress(next)) {
        throw new BridgeError(ErrorCode.INVALID_ARGUMENT, "new owner is the zero address");
      }
      const previousOwner = this.owner();
      this.ownerSlot.set(next);
      this.emit({ type: "OwnershipTransferred", previousOwner, newOwner: next });
    });
  }

  protected onlyOwner(caller: Address, action: string): void {
    if (!sameAddress(caller, this.owner())) throw unauthorized(caller, action);
  }
}
