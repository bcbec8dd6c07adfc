import { BridgeError, ErrorCode, describeError, errorCodeOf } from "../errors";
import { silentLogger, type Logger } from "../logging";
import type { Domain, TransportId } from "../types";
import type { Mailbox, TransportMessage } from "./mailbox";

export type DeliveryStatus = "pending" | "delivered" | "failed" | "dropped";

export interface DeliveryTask {
  readonly message: TransportMessage;
  status: DeliveryStatus;
  attempts: number;
  deliveries: number; // successful process() calls, duplicates included
  lastError?: string;
  lastErrorCode?: string;
}

export type DeliveryResult =
  | { ok: true; id: TransportId }
  | { ok: false; id: TransportId; error: string; terminal: boolean };

/** Order in which a pass visits pending messages. */
export type DeliveryOrder = "fifo" | "reverse" | ((pending: readonly TransportMessage[]) => TransportMessage[]);

export interface RelayerOptions {
  maxAttempts?: number;
  logger?: Logger;
}

export interface PassReport {
  delivered: number;
  failed: number;
  terminal: number;
}

/**
 * Moves messages between mailboxes. Delivery is at-least-once and unordered:
 * callers choose the order, may redeliver a delivered message, and may drop
 * one. A failing delivery stays pending until `maxAttempts`, then becomes
 * terminal; it is never discarded silently.
 */
export class Relayer {
  private readonly mailboxes = new Map<Domain, Mailbox>();
  private readonly cursors = new Map<Domain, number>();
  private readonly tasks = new Map<TransportId, DeliveryTask>();
  private readonly maxAttempts: number;
  private readonly log: Logger;

  constructor(opts: RelayerOptions = {}) {
    this.maxAttempts = opts.maxAttempts ?? 20;
    if (!Number.isInteger(this.maxAttempts) || this.maxAttempts < 1) {
      throw new BridgeError(ErrorCode.INVALID_ARGUMENT, "maxAttempts must be a positive integer");
    }
    this.log = (opts.logger ?? silentLogger()).child({ component: "relayer" });
  }

  connect(mailbox: Mailbox): void {
    if (this.mailboxes.has(mailbox.localDomain)) {
      throw new BridgeError(ErrorCode.CONFLICT, `domain ${mailbox.localDomain} already connected`);
    }
    this.mailboxes.set(mailbox.localDomain, mailbox);
    this.cursors.set(mailbox.localDomain, 0);
  }

  /** Pick up everything dispatched since the last poll. Returns the count. */
  poll(): number {
    let found = 0;
    for (const [domain, mailbox] of this.mailboxes) {
      const cursor = this.cursors.get(domain) ?? 0;
      for (const message of mailbox.dispatched(cursor)) {
        this.tasks.set(message.id, { message, status: "pending", attempts: 0, deliveries: 0 });
        found++;
      }
      this.cursors.set(domain, mailbox.count);
    }
    if (found > 0) this.log.debug({ found }, "polled outboxes");
    return found;
  }

  pending(): TransportMessage[] {
    return [...this.tasks.values()].filter((t) => t.status === "pending").map((t) => t.message);
  }

  task(id: TransportId): DeliveryTask | undefined {
    return this.tasks.get(id);
  }

  tasksWith(status: DeliveryStatus): DeliveryTask[] {
    return [...this.tasks.values()].filter((t) => t.status === status);
  }

  deliver(id: TransportId): DeliveryResult {
    const task = this.require(id);
    if (task.status !== "pending") {
      throw new BridgeError(ErrorCode.CONFLICT, `message ${id} is ${task.status}, not pending`);
    }
    return this.attempt(task);
  }

  /** Deliver again a message that already went through; simulates a transport retry. */
  redeliver(id: TransportId): DeliveryResult {
    const task = this.require(id);
    if (task.status !== "delivered") {
      throw new BridgeError(ErrorCode.CONFLICT, `message ${id} is ${task.status}, not delivered`);
    }
    return this.attempt(task);
  }

  /** Never deliver this message; simulates loss. */
  drop(id: TransportId): void {
    const task = this.require(id);
    if (task.status !== "pending") {
      throw new BridgeError(ErrorCode.CONFLICT, `message ${id} is ${task.status}, not pending`);
    }
    task.status = "dropped";
    this.log.warn({ transportId: id }, "message dropped");
  }

  /** One pass over the pending set after polling. */
  deliverAll(opts: { order?: DeliveryOrder } = {}): PassReport {
    this.poll();
    const report: PassReport = { delivered: 0, failed: 0, terminal: 0 };
    for (const message of arrange(this.pending(), opts.order ?? "fifo")) {
      const task = this.tasks.get(message.id);
      if (task?.status !== "pending") continue;
      const result = this.attempt(task);
      if (result.ok) report.delivered++;
      else if (result.terminal) report.terminal++;
      else report.failed++;
    }
    return report;
  }

  private attempt(task: DeliveryTask): DeliveryResult {
    const { message } = task;
    const id = message.id;
    const target = this.mailboxes.get(message.destination);
    try {
      if (!target) {
        throw new BridgeError(ErrorCode.NOT_FOUND, `no mailbox connected for domain ${message.destination}`);
      }
      target.process(message);
    } catch (err) {
      // a failed duplicate leaves the earlier delivery standing
      if (task.status === "delivered") {
        this.log.warn({ transportId: id, err: describeError(err) }, "redelivery failed");
        return { ok: false, id, error: describeError(err), terminal: false };
      }
      task.attempts++;
      task.lastError = describeError(err);
      task.lastErrorCode = errorCodeOf(err);
      const terminal = task.attempts >= this.maxAttempts;
      if (terminal) {
        task.status = "failed";
        this.log.error(
          { transportId: id, attempts: task.attempts, err: task.lastError },
          "delivery failed permanently",
        );
      } else {
        this.log.warn({ transportId: id, attempts: task.attempts, err: task.lastError }, "delivery failed");
      }
      return { ok: false, id, error: task.lastError, terminal };
    }
    task.status = "delivered";
    task.deliveries++;
    this.log.debug({ transportId: id, deliveries: task.deliveries }, "delivered");
    return { ok: true, id };
  }

  private require(id: TransportId): DeliveryTask {
    const task = this.tasks.get(id);
    if (!task) throw new BridgeError(ErrorCode.NOT_FOUND, `unknown message ${id}`);
    return task;
  }
}

const arrange = (pending: readonly TransportMessage[], order: DeliveryOrder): TransportMessage[] => {
  if (order === "fifo") return [...pending];
  if (order === "reverse") return [...pending].reverse();
  return order(pending);
};
