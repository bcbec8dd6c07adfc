import type { BridgeConfig } from "../config";
import { ChainRegistry } from "../core/chainRegistry";
import { HubLedger } from "../core/hubLedger";
import { SyntheticAsset } from "../core/syntheticAsset";
import { CollateralToken, isFungibleToken, type TokenMetadata } from "../core/token";
import { TokenRegistry } from "../core/tokenRegistry";
import { SourceGateway } from "../core/sourceGateway";
import { BridgeError, ErrorCode } from "../errors";
import { makeLogger, silentLogger, type Logger } from "../logging";
import { parseAddress, parseDomain } from "../schema";
import type { Address, Domain, TokenMapping, UnmappedTokenPolicy } from "../types";
import { Chain } from "./chain";
import { Mailbox } from "./mailbox";
import { Relayer, type DeliveryOrder, type PassReport } from "./relayer";

export interface Hub {
  chain: Chain;
  mailbox: Mailbox;
  chainRegistry: ChainRegistry;
  tokenRegistry: TokenRegistry;
  ledger: HubLedger;
}

export interface Spoke {
  domain: Domain;
  chain: Chain;
  mailbox: Mailbox;
  gateway: SourceGateway;
}

export interface BridgeRuntimeOptions {
  owner: Address;
  hubDomain?: Domain;
  unmappedTokenPolicy?: UnmappedTokenPolicy;
  maxAttempts?: number;
  logger?: Logger;
}

/* ──────────── runtime shell ──────────── */
// One hub plus any number of source networks, joined by a relayer.
export class BridgeRuntime {
  readonly owner: Address;
  readonly hub: Hub;
  readonly relayer: Relayer;
  private readonly spokes = new Map<Domain, Spoke>();
  private readonly log: Logger;

  constructor(opts: BridgeRuntimeOptions) {
    this.owner = parseAddress(opts.owner, "owner");
    this.log = opts.logger ?? silentLogger();
    this.relayer = new Relayer({ maxAttempts: opts.maxAttempts, logger: this.log });

    const chain = new Chain(parseDomain(opts.hubDomain ?? 31337, "hubDomain"), "hub", { logger: this.log });
    const mailbox = new Mailbox(chain);
    const chainRegistry = new ChainRegistry(chain, this.owner);
    const tokenRegistry = new TokenRegistry(chain, this.owner);
    const ledger = new HubLedger(chain, {
      owner: this.owner,
      chainRegistry,
      tokenRegistry,
      unmappedTokenPolicy: opts.unmappedTokenPolicy,
    });
    ledger.updateCrossChainConfig(this.owner, mailbox.address);
    this.relayer.connect(mailbox);
    this.hub = { chain, mailbox, chainRegistry, tokenRegistry, ledger };
    this.log.info({ hubDomain: chain.domain, ledger: ledger.address }, "hub ready");
  }

  static fromConfig(config: BridgeConfig, owner: Address): BridgeRuntime {
    return new BridgeRuntime({
      owner,
      hubDomain: config.hubDomain,
      unmappedTokenPolicy: config.unmappedTokenPolicy,
      maxAttempts: config.relayerMaxAttempts,
      logger: makeLogger(config.logLevel, { pretty: config.logPretty }),
    });
  }

  get hubDomain(): Domain {
    return this.hub.chain.domain;
  }

  /** Stand up a source network and register its gateway with the hub. */
  addSpoke(domain: Domain, name = `domain-${domain}`): Spoke {
    const d = parseDomain(domain);
    if (d === this.hubDomain || this.spokes.has(d)) {
      throw new BridgeError(ErrorCode.CONFLICT, `domain ${d} is already part of the bridge`);
    }
    const chain = new Chain(d, name, { logger: this.log });
    const mailbox = new Mailbox(chain);
    const gateway = new SourceGateway(chain, this.owner);
    gateway.updateCrossChainConfig(this.owner, {
      mailbox: mailbox.address,
      destinationDomain: this.hubDomain,
      destinationGateway: this.hub.ledger.address,
    });
    this.relayer.connect(mailbox);
    this.hub.ledger.setChainEndpoint(this.owner, d, gateway.address, name);

    const spoke: Spoke = { domain: d, chain, mailbox, gateway };
    this.spokes.set(d, spoke);
    this.log.info({ domain: d, gateway: gateway.address }, "spoke added");
    return spoke;
  }

  spoke(domain: Domain): Spoke {
    const spoke = this.spokes.get(domain);
    if (!spoke) throw new BridgeError(ErrorCode.NOT_FOUND, `no spoke for domain ${domain}`);
    return spoke;
  }

  listSpokes(): Spoke[] {
    return [...this.spokes.values()];
  }

  createSyntheticAsset(meta: TokenMetadata): SyntheticAsset {
    return new SyntheticAsset(this.hub.chain, { ...meta, minter: this.hub.ledger.address });
  }

  createCollateralToken(domain: Domain, meta: TokenMetadata): CollateralToken {
    return new CollateralToken(this.spoke(domain).chain, { ...meta, owner: this.owner });
  }

  /** Whitelist on the gateway, register in the token registry and set the gateway hint. */
  bridgeToken(domain: Domain, sourceToken: Address, synthetic: SyntheticAsset): TokenMapping {
    const { chain, gateway } = this.spoke(domain);
    const token = chain.contractAt(sourceToken);
    if (!isFungibleToken(token)) {
      throw new BridgeError(ErrorCode.INVALID_ARGUMENT, `${sourceToken} is not a token on ${chain.name}`);
    }
    if (!gateway.isTokenWhitelisted(token.address)) gateway.addWhitelistedToken(this.owner, token.address);
    const mapping = this.hub.tokenRegistry.registerTokenMapping(this.owner, {
      sourceDomain: domain,
      sourceToken: token.address,
      targetDomain: this.hubDomain,
      syntheticAsset: synthetic.address,
      syntheticDecimals: synthetic.decimals,
      sourceDecimals: token.decimals,
      symbol: synthetic.symbol,
    });
    gateway.setTokenMapping(this.owner, token.address, synthetic.address);
    return mapping;
  }

  /** One relayer pass. */
  settle(order?: DeliveryOrder): PassReport {
    return this.relayer.deliverAll({ order });
  }
}
