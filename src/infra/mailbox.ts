import { transportIdOf } from "../core/hash";
import { Contract } from "../core/contract";
import { BridgeError, ErrorCode } from "../errors";
import { parseBytes32, parseDomain } from "../schema";
import type { Address, Bytes32, Domain, TransportId } from "../types";
import { addressToBytes32, bytes32ToAddress } from "../utils/bytes";
import type { Chain, Table } from "./chain";

/* ── capability interfaces ──────────────────────────────── */
export interface MessageRecipient {
  handle(caller: Address, originDomain: Domain, sender: Bytes32, body: Uint8Array): void;
}

export const isMessageRecipient = (c: unknown): c is MessageRecipient =>
  typeof c === "object" && c !== null && "handle" in c && typeof c.handle === "function";

export interface IMailbox {
  readonly address: Address;
  readonly localDomain: Domain;
  dispatch(caller: Address, destinationDomain: Domain, recipient: Bytes32, body: Uint8Array): TransportId;
}

export const isMailbox = (c: Contract | undefined): c is Contract & IMailbox =>
  c !== undefined && "dispatch" in c && "localDomain" in c && typeof c.dispatch === "function";

/** Resolves the mailbox a component is configured with on its own chain. */
export const resolveMailbox = (chain: Chain, address: Address): IMailbox => {
  const c = chain.contractAt(address);
  if (!isMailbox(c)) {
    throw new BridgeError(ErrorCode.INVALID_ARGUMENT, `${address} is not a mailbox on ${chain.name}`, {
      mailbox: address,
      domain: chain.domain,
    });
  }
  return c;
};

/** A dispatched message as it sits in the origin outbox. */
export interface TransportMessage {
  id: TransportId;
  nonce: number;
  origin: Domain;
  sender: Bytes32;
  destination: Domain;
  recipient: Bytes32;
  body: Uint8Array;
}

/**
 * Per-chain transport endpoint. `dispatch` appends to a journaled outbox, so
 * a reverted call leaves nothing to relay. `process` performs no dedupe: the
 * transport is at-least-once and recipients are expected to be idempotent.
 */
export class Mailbox extends Contract implements IMailbox {
  private readonly outbox: Table<TransportMessage> = this.table<TransportMessage>("outbox");

  constructor(chain: Chain) {
    super(chain, "mailbox");
  }

  get localDomain(): Domain {
    return this.chain.domain;
  }

  dispatch(caller: Address, destinationDomain: Domain, recipient: Bytes32, body: Uint8Array): TransportId {
    return this.transact(() => {
      const destination = parseDomain(destinationDomain, "destinationDomain");
      const message: Omit<TransportMessage, "id"> = {
        nonce: this.outbox.size,
        origin: this.localDomain,
        sender: addressToBytes32(caller),
        destination,
        recipient: parseBytes32(recipient, "recipient"),
        body: Uint8Array.from(body),
      };
      const id = transportIdOf(message);
      this.outbox.set(String(message.nonce), { ...message, id });
      this.emit({ type: "Dispatch", transportId: id, destination, recipient: message.recipient });
      this.log.debug({ transportId: id, destination }, "dispatch");
      return id;
    });
  }

  /** Outbox in dispatch order. */
  dispatched(fromNonce = 0): TransportMessage[] {
    const out: TransportMessage[] = [];
    for (let n = fromNonce; n < this.outbox.size; n++) {
      const m = this.outbox.get(String(n));
      if (m) out.push(m);
    }
    return out;
  }

  get count(): number {
    return this.outbox.size;
  }

  /** Deliver one message to its recipient on this chain. */
  process(message: TransportMessage): void {
    this.transact(() => {
      if (message.destination !== this.localDomain) {
        throw new BridgeError(
          ErrorCode.INVALID_ARGUMENT,
          `message for domain ${message.destination} delivered to ${this.localDomain}`,
          { transportId: message.id },
        );
      }
      const target = this.chain.contractAt(bytes32ToAddress(message.recipient));
      if (!isMessageRecipient(target)) {
        throw new BridgeError(ErrorCode.NOT_FOUND, `no message recipient at ${message.recipient}`, {
          transportId: message.id,
        });
      }
      target.handle(this.address, message.origin, message.sender, message.body);
      this.emit({ type: "Process", transportId: message.id, origin: message.origin, sender: message.sender });
    });
  }
}
