/* ─── Bridge data model ─── */
import type { MessageId, TransportId } from "./types/brands";

export type { MessageId, TransportId } from "./types/brands";

/* ─── Primitives ─── */
export type Hex = `0x${string}`;
export type Address = Hex; // 20 bytes, lower-case
export type Bytes32 = Hex; // left-padded address as carried by the transport
export type Domain = number; // u32 network identifier

/* ─── Wire message ─── */
export enum MessageKind {
  Deposit = 1,
  Release = 2,
}

export interface BridgeMessage {
  kind: MessageKind;
  token: Address; // source-side token for both kinds
  recipient: Address;
  amount: bigint; // sender's native precision, never rescaled
  originDomain: Domain;
  sequence: bigint; // per-recipient counter of the originating component
}

/* ─── Registries ─── */
export interface ChainEndpoint {
  domain: Domain;
  gateway: Address;
  name: string;
  active: boolean;
}

export interface TokenMappingKey {
  sourceDomain: Domain;
  sourceToken: Address;
  targetDomain: Domain;
}

export interface TokenMapping extends TokenMappingKey {
  syntheticAsset: Address;
  symbol: string;
  sourceDecimals: number;
  syntheticDecimals: number;
  active: boolean;
  revision: number;
}

export interface SourceTokenRef {
  sourceDomain: Domain;
  sourceToken: Address;
}

/* ─── Cross-chain configuration ─── */
export interface GatewayConfig {
  mailbox: Address;
  localDomain: Domain;
  destinationDomain: Domain;
  destinationGateway: Address;
}

export interface HubConfig {
  mailbox: Address;
  localDomain: Domain;
}

export type UnmappedTokenPolicy = "reject" | "absorb";

export interface DispatchReceipt {
  messageId: MessageId;
  transportId: TransportId;
  sequence: bigint;
}

/* ─── Events ─── */
export type BridgeEvent =
  // fungible tokens
  | { type: "Transfer"; from: Address; to: Address; amount: bigint }
  | { type: "Approval"; owner: Address; spender: Address; amount: bigint }
  // ownership / roles
  | { type: "OwnershipTransferred"; previousOwner: Address; newOwner: Address }
  | { type: "OperatorSet"; operator: Address; allowed: boolean }
  // transport
  | { type: "Dispatch"; transportId: TransportId; destination: Domain; recipient: Bytes32 }
  | { type: "Process"; transportId: TransportId; origin: Domain; sender: Bytes32 }
  // registries
  | { type: "ChainEndpointSet"; domain: Domain; gateway: Address; name: string }
  | { type: "ChainStatusChanged"; domain: Domain; active: boolean }
  | { type: "TokenMappingRegistered"; mapping: TokenMapping }
  | {
      type: "TokenMappingUpdated";
      key: TokenMappingKey;
      oldSynthetic: Address;
      newSynthetic: Address;
    }
  | { type: "TokenMappingStatusChanged"; key: TokenMappingKey; active: boolean }
  // source gateway
  | { type: "TokenWhitelisted"; token: Address }
  | { type: "TokenRemoved"; token: Address }
  | { type: "TokenHintSet"; sourceToken: Address; syntheticToken: Address }
  | { type: "GatewayConfigUpdated"; config: GatewayConfig }
  | {
      type: "Deposit";
      from: Address;
      recipient: Address;
      token: Address;
      syntheticHint: Address;
      amount: bigint;
      sequence: bigint;
      messageId: MessageId;
    }
  | { type: "Release"; recipient: Address; token: Address; amount: bigint; messageId: MessageId }
  // hub ledger
  | { type: "HubConfigUpdated"; config: HubConfig }
  | { type: "TokenRegistrySet"; registry: Address }
  | { type: "UnmappedTokenPolicySet"; policy: UnmappedTokenPolicy }
  | {
      type: "DepositCredited";
      recipient: Address;
      syntheticAsset: Address;
      sourceToken: Address;
      originDomain: Domain;
      amount: bigint;
      messageId: MessageId;
    }
  | {
      type: "UnmappedDepositAbsorbed";
      recipient: Address;
      sourceToken: Address;
      originDomain: Domain;
      amount: bigint;
      messageId: MessageId;
    }
  | {
      type: "WithdrawRequested";
      user: Address;
      recipient: Address;
      syntheticAsset: Address;
      sourceToken: Address;
      targetDomain: Domain;
      amount: bigint;
      sequence: bigint;
      messageId: MessageId;
    }
  | { type: "LedgerTransfer"; from: Address; to: Address; asset: Address; amount: bigint };

export type BridgeEventType = BridgeEvent["type"];
export type EventOf<T extends BridgeEventType> = Extract<BridgeEvent, { type: T }>;

export interface ChainLog {
  index: number;
  emitter: Address;
  event: BridgeEvent;
}
