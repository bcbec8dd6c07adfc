import { BridgeError, ErrorCode } from "../errors";
import type { Chain, Table } from "../infra/chain";
import { parseAddress, parseDecimals, parseDomain } from "../schema";
import type { Address, Domain, SourceTokenRef, TokenMapping, TokenMappingKey } from "../types";
import { ZERO_ADDRESS, isZeroAddress } from "../utils/bytes";
import { Ownable } from "./contract";

export interface RegisterTokenMapping extends TokenMappingKey {
  syntheticAsset: Address;
  syntheticDecimals: number;
  symbol?: string;
  sourceDecimals?: number;
}

export interface ITokenRegistry {
  readonly address: Address;
  owner(): Address;
  registerTokenMapping(caller: Address, input: RegisterTokenMapping): TokenMapping;
  updateTokenMapping(
    caller: Address,
    sourceDomain: Domain,
    sourceToken: Address,
    targetDomain: Domain,
    newSynthetic: Address,
    newDecimals: number,
  ): TokenMapping;
  setTokenMappingStatus(caller: Address, key: TokenMappingKey, active: boolean): void;
  getTokenMapping(sourceDomain: Domain, sourceToken: Address, targetDomain: Domain): TokenMapping | undefined;
  getSyntheticToken(sourceDomain: Domain, sourceToken: Address, targetDomain: Domain): Address;
  getSourceToken(sourceDomain: Domain, synthetic: Address): Address;
  getChainTokens(sourceDomain: Domain): Address[];
}

export const mappingKey = (k: TokenMappingKey): string =>
  `${k.sourceDomain}:${k.sourceToken.toLowerCase()}:${k.targetDomain}`;

const reverseKey = (sourceDomain: Domain, synthetic: Address): string =>
  `${sourceDomain}:${synthetic.toLowerCase()}`;

/**
 * (sourceDomain, sourceToken, targetDomain) -> synthetic. Keys are never
 * removed. Decimals are recorded for audit; amounts are never rescaled.
 *
 * The reverse index (sourceDomain, synthetic) -> sourceToken is append-only
 * so a synthetic that was remapped away from still resolves to its collateral.
 */
export class TokenRegistry extends Ownable implements ITokenRegistry {
  private readonly mappings: Table<TokenMapping> = this.table<TokenMapping>("mappings");
  private readonly reverse: Table<SourceTokenRef> = this.table<SourceTokenRef>("reverse");
  private readonly chainTokens: Table<readonly Address[]> = this.table<readonly Address[]>("chainTokens");

  constructor(chain: Chain, owner: Address) {
    super(chain, "token-registry", owner);
  }

  registerTokenMapping(caller: Address, input: RegisterTokenMapping): TokenMapping {
    return this.transact(() => {
      this.onlyOwner(caller, "register token mappings");
      const key = normalizeKey(input);
      const syntheticAsset = nonZero(parseAddress(input.syntheticAsset, "syntheticAsset"), "syntheticAsset");
      const syntheticDecimals = parseDecimals(input.syntheticDecimals, "syntheticDecimals");
      const sourceDecimals =
        input.sourceDecimals === undefined ? syntheticDecimals : parseDecimals(input.sourceDecimals, "sourceDecimals");
      if (sourceDecimals !== syntheticDecimals) {
        throw new BridgeError(
          ErrorCode.INVALID_ARGUMENT,
          `decimal mismatch: source ${sourceDecimals}, synthetic ${syntheticDecimals}`,
          { sourceDecimals, syntheticDecimals },
        );
      }

      const previous = this.mappings.get(mappingKey(key));
      const mapping: TokenMapping = {
        ...key,
        syntheticAsset,
        symbol: input.symbol ?? previous?.symbol ?? "",
        sourceDecimals,
        syntheticDecimals,
        active: previous?.active ?? true,
        revision: (previous?.revision ?? 0) + 1,
      };
      this.store(mapping, previous === undefined);
      this.emit({ type: "TokenMappingRegistered", mapping });
      this.log.info(
        { key: mappingKey(key), syntheticAsset, revision: mapping.revision },
        "token mapping registered",
      );
      return mapping;
    });
  }

  updateTokenMapping(
    caller: Address,
    sourceDomain: Domain,
    sourceToken: Address,
    targetDomain: Domain,
    newSynthetic: Address,
    newDecimals: number,
  ): TokenMapping {
    return this.transact(() => {
      this.onlyOwner(caller, "update token mappings");
      const key = normalizeKey({ sourceDomain, sourceToken, targetDomain });
      const previous = this.mappings.get(mappingKey(key));
      if (!previous) {
        throw new BridgeError(ErrorCode.NOT_FOUND, `no token mapping for ${mappingKey(key)}`, { ...key });
      }
      const decimals = parseDecimals(newDecimals, "newDecimals");
      const mapping: TokenMapping = {
        ...previous,
        syntheticAsset: nonZero(parseAddress(newSynthetic, "newSynthetic"), "newSynthetic"),
        sourceDecimals: decimals,
        syntheticDecimals: decimals,
        revision: previous.revision + 1,
      };
      this.store(mapping, false);
      this.emit({
        type: "TokenMappingUpdated",
        key,
        oldSynthetic: previous.syntheticAsset,
        newSynthetic: mapping.syntheticAsset,
      });
      // balances credited under the old synthetic stay where they are
      this.log.warn(
        { key: mappingKey(key), from: previous.syntheticAsset, to: mapping.syntheticAsset },
        "token mapping updated",
      );
      return mapping;
    });
  }

  setTokenMappingStatus(caller: Address, key: TokenMappingKey, active: boolean): void {
    this.transact(() => {
      this.onlyOwner(caller, "change token mapping status");
      const k = normalizeKey(key);
      const current = this.mappings.get(mappingKey(k));
      if (!current) throw new BridgeError(ErrorCode.NOT_FOUND, `no token mapping for ${mappingKey(k)}`, { ...k });
      if (current.active === active) return;
      this.mappings.set(mappingKey(k), { ...current, active });
      this.emit({ type: "TokenMappingStatusChanged", key: k, active });
    });
  }

  /* ── reads ── */
  getTokenMapping(sourceDomain: Domain, sourceToken: Address, targetDomain: Domain): TokenMapping | undefined {
    return this.mappings.get(mappingKey({ sourceDomain, sourceToken, targetDomain }));
  }

  getSyntheticToken(sourceDomain: Domain, sourceToken: Address, targetDomain: Domain): Address {
    return this.getTokenMapping(sourceDomain, sourceToken, targetDomain)?.syntheticAsset ?? ZERO_ADDRESS;
  }

  getSourceToken(sourceDomain: Domain, synthetic: Address): Address {
    return this.reverse.get(reverseKey(sourceDomain, synthetic))?.sourceToken ?? ZERO_ADDRESS;
  }

  getChainTokens(sourceDomain: Domain): Address[] {
    return [...(this.chainTokens.get(String(sourceDomain)) ?? [])];
  }

  private store(mapping: TokenMapping, isNew: boolean): void {
    const rk = reverseKey(mapping.sourceDomain, mapping.syntheticAsset);
    const owner = this.reverse.get(rk);
    if (owner && owner.sourceToken !== mapping.sourceToken) {
      throw new BridgeError(
        ErrorCode.CONFLICT,
        `synthetic ${mapping.syntheticAsset} already backs ${owner.sourceToken} on domain ${mapping.sourceDomain}`,
        { synthetic: mapping.syntheticAsset, sourceToken: owner.sourceToken },
      );
    }
    this.mappings.set(mappingKey(mapping), mapping);
    if (!owner) this.reverse.set(rk, { sourceDomain: mapping.sourceDomain, sourceToken: mapping.sourceToken });
    if (isNew) {
      const listed = this.chainTokens.get(String(mapping.sourceDomain)) ?? [];
      if (!listed.includes(mapping.sourceToken)) {
        this.chainTokens.set(String(mapping.sourceDomain), [...listed, mapping.sourceToken]);
      }
    }
  }
}

const nonZero = (address: Address, field: string): Address => {
  if (isZeroAddress(address)) throw new BridgeError(ErrorCode.INVALID_ARGUMENT, `${field} is the zero address`);
  return address;
};

const normalizeKey = (k: TokenMappingKey): TokenMappingKey => {
  const key = {
    sourceDomain: parseDomain(k.sourceDomain, "sourceDomain"),
    sourceToken: nonZero(parseAddress(k.sourceToken, "sourceToken"), "sourceToken"),
    targetDomain: parseDomain(k.targetDomain, "targetDomain"),
  };
  if (key.sourceDomain === key.targetDomain) {
    throw new BridgeError(ErrorCode.INVALID_ARGUMENT, "source and target domain are equal", { ...key });
  }
  return key;
};
