import { BridgeError, ErrorCode } from "../errors";
import type { Chain, Table } from "../infra/chain";
import { parseAddress, parseDomain } from "../schema";
import type { Address, Bytes32, ChainEndpoint, Domain } from "../types";
import { addressToBytes32, isZeroAddress } from "../utils/bytes";
import { Ownable } from "./contract";

export interface IChainRegistry {
  readonly address: Address;
  owner(): Address;
  setChainEndpoint(caller: Address, domain: Domain, gateway: Address, name?: string): void;
  setChainStatus(caller: Address, domain: Domain, active: boolean): void;
  getChainEndpoint(domain: Domain): ChainEndpoint | undefined;
  listChainEndpoints(): ChainEndpoint[];
  listActiveChainEndpoints(): ChainEndpoint[];
  isTrusted(domain: Domain, sender: Bytes32): boolean;
}

/**
 * The single trusted gateway per remote domain. Endpoints are only ever set
 * by the owner; an inactive endpoint is treated as absent.
 */
export class ChainRegistry extends Ownable implements IChainRegistry {
  private readonly endpoints: Table<ChainEndpoint> = this.table<ChainEndpoint>("endpoints");

  constructor(chain: Chain, owner: Address) {
    super(chain, "chain-registry", owner);
  }

  setChainEndpoint(caller: Address, domain: Domain, gateway: Address, name?: string): void {
    this.transact(() => {
      this.onlyOwner(caller, "set chain endpoints");
      const d = parseDomain(domain);
      const g = parseAddress(gateway, "gateway");
      if (isZeroAddress(g)) throw new BridgeError(ErrorCode.INVALID_ARGUMENT, "gateway is the zero address");
      const endpoint: ChainEndpoint = {
        domain: d,
        gateway: g,
        name: name ?? this.endpoints.get(String(d))?.name ?? `domain-${d}`,
        active: true,
      };
      this.endpoints.set(String(d), endpoint);
      this.emit({ type: "ChainEndpointSet", domain: d, gateway: g, name: endpoint.name });
      this.log.info({ domain: d, gateway: g }, "chain endpoint set");
    });
  }

  setChainStatus(caller: Address, domain: Domain, active: boolean): void {
    this.transact(() => {
      this.onlyOwner(caller, "change chain status");
      const d = parseDomain(domain);
      const current = this.endpoints.get(String(d));
      if (!current) throw new BridgeError(ErrorCode.NOT_FOUND, `no endpoint for domain ${d}`, { domain: d });
      if (current.active === active) return;
      this.endpoints.set(String(d), { ...current, active });
      this.emit({ type: "ChainStatusChanged", domain: d, active });
      this.log.info({ domain: d, active }, "chain status changed");
    });
  }

  getChainEndpoint(domain: Domain): ChainEndpoint | undefined {
    return this.endpoints.get(String(domain));
  }

  listChainEndpoints(): ChainEndpoint[] {
    return this.endpoints.values().sort((a, b) => a.domain - b.domain);
  }

  /** The live trust set: endpoints whose gateway is currently accepted. */
  listActiveChainEndpoints(): ChainEndpoint[] {
    return this.listChainEndpoints().filter((e) => e.active);
  }

  isTrusted(domain: Domain, sender: Bytes32): boolean {
    const endpoint = this.endpoints.get(String(domain));
    return endpoint !== undefined && endpoint.active && addressToBytes32(endpoint.gateway) === sender.toLowerCase();
  }
}
