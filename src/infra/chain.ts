import { deriveAddress } from "../core/hash";
import type { Contract } from "../core/contract";
import { BridgeError, ErrorCode } from "../errors";
import { silentLogger, type Logger } from "../logging";
import type { Address, BridgeEvent, BridgeEventType, ChainLog, Domain, EventOf } from "../types";

/* ── undo journal ───────────────────────────────────────── */
type Undo = () => void;

/**
 * Undo log for one chain. Every table write records its inverse; a failing
 * transaction replays the inverses back to its savepoint. Nested `run` calls
 * take their own savepoint and roll back only their own writes.
 */
export class Journal {
  private undo: Undo[] = [];
  private depth = 0;

  get active(): boolean {
    return this.depth > 0;
  }

  record(fn: Undo, what: string): void {
    if (!this.active) {
      throw new BridgeError(ErrorCode.INVALID_ARGUMENT, `write to ${what} outside a transaction`);
    }
    this.undo.push(fn);
  }

  run<T>(fn: () => T): T {
    const mark = this.undo.length;
    this.depth++;
    try {
      return fn();
    } catch (err) {
      this.rollbackTo(mark);
      throw err;
    } finally {
      this.depth--;
      if (this.depth === 0) this.undo = [];
    }
  }

  private rollbackTo(mark: number): void {
    for (let i = this.undo.length - 1; i >= mark; i--) this.undo[i]();
    this.undo.length = mark;
  }
}

/* ── journaled storage ──────────────────────────────────── */
// Values are replaced, never mutated in place.
export class Table<V extends {}> {
  private readonly rows = new Map<string, V>();

  constructor(
    private readonly journal: Journal,
    readonly name: string,
  ) {}

  get size(): number {
    return this.rows.size;
  }

  get(key: string): V | undefined {
    return this.rows.get(key);
  }

  has(key: string): boolean {
    return this.rows.has(key);
  }

  set(key: string, value: V): void {
    this.journal.record(this.restore(key), this.name);
    this.rows.set(key, value);
  }

  delete(key: string): boolean {
    if (!this.rows.has(key)) return false;
    this.journal.record(this.restore(key), this.name);
    return this.rows.delete(key);
  }

  /** Unique-key insert; an existing key means the guarded mutation already ran. */
  insertUnique(key: string, value: V): void {
    if (this.rows.has(key)) {
      throw new BridgeError(ErrorCode.ALREADY_PROCESSED, `${this.name}: ${key} already present`, {
        table: this.name,
        key,
      });
    }
    this.set(key, value);
  }

  entries(): [string, V][] {
    return [...this.rows.entries()];
  }

  keys(): string[] {
    return [...this.rows.keys()];
  }

  values(): V[] {
    return [...this.rows.values()];
  }

  private restore(key: string): Undo {
    const prev = this.rows.get(key);
    return prev === undefined ? () => void this.rows.delete(key) : () => void this.rows.set(key, prev);
  }
}

/** Single journaled value; the initial value is set at construction. */
export class Slot<V extends {}> {
  constructor(
    private readonly journal: Journal,
    readonly name: string,
    private value: V,
  ) {}

  get(): V {
    return this.value;
  }

  set(value: V): void {
    const prev = this.value;
    this.journal.record(() => {
      this.value = prev;
    }, this.name);
    this.value = value;
  }
}

/* ── chain ──────────────────────────────────────────────── */
export interface ChainOptions {
  logger?: Logger;
}

/**
 * One network. Serializes the contracts deployed on it, owns their storage and
 * the event log, and runs each external call through `transact`.
 */
export class Chain {
  readonly journal = new Journal();
  readonly log: Logger;
  private readonly contracts = new Map<Address, Contract>();
  private readonly logs: ChainLog[] = [];
  private deployNonce = 0;

  constructor(
    readonly domain: Domain,
    readonly name: string,
    opts: ChainOptions = {},
  ) {
    this.log = (opts.logger ?? silentLogger()).child({ chain: name, domain });
  }

  transact<T>(fn: () => T): T {
    return this.journal.run(fn);
  }

  get inTransaction(): boolean {
    return this.journal.active;
  }

  table<V extends {}>(name: string): Table<V> {
    return new Table<V>(this.journal, name);
  }

  slot<V extends {}>(name: string, initial: V): Slot<V> {
    return new Slot<V>(this.journal, name, initial);
  }

  /* contracts */
  nextAddress(): Address {
    return deriveAddress(this.domain, this.deployNonce++);
  }

  register(contract: Contract): void {
    if (this.contracts.has(contract.address)) {
      throw new BridgeError(ErrorCode.CONFLICT, `address ${contract.address} already in use`);
    }
    this.contracts.set(contract.address, contract);
  }

  contractAt(address: Address): Contract | undefined {
    return this.contracts.get(`0x${address.slice(2).toLowerCase()}`);
  }

  /* events */
  emit(emitter: Address, event: BridgeEvent): void {
    const length = this.logs.length;
    this.journal.record(() => {
      this.logs.length = length;
    }, "events");
    this.logs.push({ index: length, emitter, event });
  }

  events(): readonly ChainLog[] {
    return this.logs;
  }

  eventsOf<T extends BridgeEventType>(type: T, emitter?: Address): EventOf<T>[] {
    const out: EventOf<T>[] = [];
    for (const log of this.logs) {
      if (emitter !== undefined && log.emitter !== emitter) continue;
      if (isEventOf(log.event, type)) out.push(log.event);
    }
    return out;
  }
}

const isEventOf = <T extends BridgeEventType>(event: BridgeEvent, type: T): event is EventOf<T> =>
  event.type === type;
