export * from "./types";
export * from "./errors";
export { loadConfig, type BridgeConfig } from "./config";
export { makeLogger, silentLogger, type Logger, type LogLevel } from "./logging";
export * from "./schema";
export * from "./utils/bytes";

export { decodeMessage, encodeMessage } from "./codec/message";
export { deriveAddress, keccakHex, messageIdOf, transportIdOf } from "./core/hash";
export { Contract, Ownable } from "./core/contract";
export { CollateralToken, FungibleToken, isFungibleToken, type IFungibleToken, type TokenMetadata } from "./core/token";
export { SyntheticAsset, isMintableAsset, type IMintableAsset } from "./core/syntheticAsset";
export { ChainRegistry, type IChainRegistry } from "./core/chainRegistry";
export { TokenRegistry, mappingKey, type ITokenRegistry, type RegisterTokenMapping } from "./core/tokenRegistry";
export { SourceGateway, type CrossChainConfigInput } from "./core/sourceGateway";
export { HubLedger, type HubLedgerOptions } from "./core/hubLedger";

export { Chain, Journal, Slot, Table, type ChainOptions } from "./infra/chain";
export {
  Mailbox,
  isMailbox,
  isMessageRecipient,
  resolveMailbox,
  type IMailbox,
  type MessageRecipient,
  type TransportMessage,
} from "./infra/mailbox";
export {
  Relayer,
  type DeliveryOrder,
  type DeliveryResult,
  type DeliveryStatus,
  type DeliveryTask,
  type PassReport,
  type RelayerOptions,
} from "./infra/relayer";
export { BridgeRuntime, type BridgeRuntimeOptions, type Hub, type Spoke } from "./infra/runtime";
