import { ensureLogger, type LoggerLike } from "@/infra/observability";

import { BoundedQueue } from "./boundedQueue";
import {
  HubClosedError,
  SlowConsumerError,
  type RealtimeError,
} from "./realtime.errors";
import type { HubPayload } from "./realtime.transport";

/**
 * What the hub needs from a connection. The hub never touches the transport.
 */
export interface HubMember {
  readonly id: string;
  /** Non-blocking enqueue onto the member's outbound queue. */
  offer(message: HubPayload): boolean;
  /** Closes the outbound queue; the member's writer drains it and hangs up. */
  closeOutbound(cause?: RealtimeError): void;
}

export type HubPort = Pick<RealtimeHub, "register" | "unregister" | "broadcast">;

export type HubStats = {
  connections: number;
  registered: number;
  unregistered: number;
  evicted: number;
  broadcasts: number;
  delivered: number;
};

export type HubState = "running" | "stopping" | "stopped" | "crashed";

export type RealtimeHubOptions = {
  name?: string;
  /** Broadcasts accepted before `broadcast()` waits for the loop to catch up. */
  broadcastQueueCapacity?: number;
  /** Stop the hub once its last member leaves and no register is queued. */
  stopWhenIdle?: boolean;
  log?: LoggerLike;
};

type HubCommand =
  | { type: "register"; member: HubMember }
  | { type: "unregister"; member: HubMember; cause?: RealtimeError }
  | { type: "broadcast"; message: HubPayload }
  | { type: "count"; resolve: (count: number) => void }
  | { type: "idle" }
  | { type: "stop" };

type SlotWaiter = {
  resolve: () => void;
  reject: (err: Error) => void;
};

/**
 * Connection registry for one room.
 *
 * Every mutation of the member set happens inside `run()`, fed by a FIFO
 * mailbox; callers only enqueue commands. Broadcasting offers the message to
 * each member without waiting, and a member whose queue is full is evicted in
 * the same pass.
 */
export class RealtimeHub {
  readonly name: string;
  /** Settles once the loop has exited (stopped or crashed). Never rejects. */
  readonly done: Promise<void>;

  private readonly log: LoggerLike;
  private readonly capacity: number;
  private readonly stopWhenIdle: boolean;
  private readonly connections = new Set<HubMember>();
  private readonly retired = new WeakSet<HubMember>();
  private readonly mailbox = new BoundedQueue<HubCommand>(Number.POSITIVE_INFINITY);
  private readonly slotWaiters: SlotWaiter[] = [];
  private pendingBroadcasts = 0;
  private queuedRegisters = 0;
  private idleCheckQueued = false;
  private currentState: HubState = "running";
  private readonly counters: Omit<HubStats, "connections"> = {
    registered: 0,
    unregistered: 0,
    evicted: 0,
    broadcasts: 0,
    delivered: 0,
  };

  constructor(options: RealtimeHubOptions = {}) {
    this.name = options.name ?? "default";
    this.capacity = options.broadcastQueueCapacity ?? 1024;
    this.stopWhenIdle = options.stopWhenIdle ?? false;
    this.log = ensureLogger(options.log);

    if (!(this.capacity > 0)) {
      throw new RangeError(`broadcastQueueCapacity must be positive (got ${this.capacity})`);
    }

    this.done = this.run();
  }

  get state(): HubState {
    return this.currentState;
  }

  register(member: HubMember): void {
    if (this.isClosed()) {
      member.closeOutbound(new HubClosedError(this.name, this.closedReason()));
      return;
    }
    this.queuedRegisters += 1;
    this.mailbox.tryPush({ type: "register", member });
  }

  unregister(member: HubMember, cause?: RealtimeError): void {
    if (this.isClosed()) return;
    this.mailbox.tryPush({ type: "unregister", member, cause });
  }

  /**
   * Resolves once the message is queued for fan-out. Waits while the
   * broadcast backlog is full; rejects with `HubClosedError` once the hub
   * stops accepting.
   */
  async broadcast(message: HubPayload): Promise<void> {
    this.assertAccepting();

    if (this.pendingBroadcasts < this.capacity && this.slotWaiters.length === 0) {
      this.pendingBroadcasts += 1;
    } else {
      // the slot is handed over by releaseBroadcastSlot()
      await new Promise<void>((resolve, reject) => {
        this.slotWaiters.push({ resolve, reject });
      });
      this.assertAccepting();
    }

    this.mailbox.tryPush({ type: "broadcast", message });
  }

  count(): Promise<number> {
    if (this.isClosed()) return Promise.resolve(0);

    return new Promise<number>((resolve) => {
      this.mailbox.tryPush({ type: "count", resolve });
    });
  }

  /**
   * Eventually consistent counters, read outside the loop.
   */
  stats(): HubStats {
    return { connections: this.connections.size, ...this.counters };
  }

  /**
   * Drain-then-stop: commands queued before this call (broadcasts included)
   * are processed, then every member's outbound queue is closed.
   */
  async stop(): Promise<void> {
    if (this.currentState === "running") {
      this.currentState = "stopping";
      this.rejectSlotWaiters(new HubClosedError(this.name, "stopped"));
      this.mailbox.tryPush({ type: "stop" });
    }
    await this.done;
  }

  private async run(): Promise<void> {
    try {
      for (;;) {
        const command = await this.mailbox.shift();
        if (command === undefined) return;

        if (command.type === "stop") {
          this.shutdown();
          return;
        }

        if (command.type === "idle") {
          if (this.stopIfIdle()) return;
          continue;
        }

        this.dispatch(command);
      }
    } catch (err) {
      this.crash(err);
    }
  }

  private dispatch(command: Exclude<HubCommand, { type: "stop" | "idle" }>): void {
    switch (command.type) {
      case "register":
        this.queuedRegisters -= 1;
        this.add(command.member);
        return;
      case "unregister":
        this.remove(command.member, command.cause);
        return;
      case "broadcast":
        this.releaseBroadcastSlot();
        this.fanOut(command.message);
        return;
      case "count":
        command.resolve(this.connections.size);
        return;
    }
  }

  private add(member: HubMember): void {
    if (this.retired.has(member)) {
      // identities are single-use: a member that left must rejoin as a new one
      this.log.debug({ hub: this.name, connId: member.id }, "Ignoring re-registration of a retired member");
      member.closeOutbound();
      return;
    }
    if (this.connections.has(member)) return;

    this.connections.add(member);
    this.counters.registered += 1;
    this.log.debug(
      { hub: this.name, connId: member.id, connections: this.connections.size },
      "Member registered"
    );
  }

  private remove(member: HubMember, cause?: RealtimeError): void {
    this.retired.add(member);
    if (!this.connections.delete(member)) return;

    this.counters.unregistered += 1;
    member.closeOutbound(cause);
    this.log.debug(
      {
        hub: this.name,
        connId: member.id,
        cause: cause?.code ?? null,
        connections: this.connections.size,
      },
      "Member unregistered"
    );
    this.queueIdleCheck();
  }

  private fanOut(message: HubPayload): void {
    this.counters.broadcasts += 1;

    // deleting the current entry while iterating a Set is safe
    for (const member of this.connections) {
      if (member.offer(message)) {
        this.counters.delivered += 1;
        continue;
      }
      this.evict(member);
    }
  }

  private evict(member: HubMember): void {
    this.connections.delete(member);
    this.retired.add(member);
    this.counters.evicted += 1;

    const cause = new SlowConsumerError(member.id);
    this.log.warn(
      { hub: this.name, connId: member.id, connections: this.connections.size },
      "Evicting slow consumer"
    );
    member.closeOutbound(cause);
    this.queueIdleCheck();
  }

  // queued behind whatever is already in the mailbox, so a rejoin that raced
  // the last leave is seen first
  private queueIdleCheck(): void {
    if (!this.stopWhenIdle || this.idleCheckQueued) return;
    if (this.connections.size > 0 || this.currentState !== "running") return;

    this.idleCheckQueued = true;
    this.mailbox.tryPush({ type: "idle" });
  }

  private stopIfIdle(): boolean {
    this.idleCheckQueued = false;
    if (this.connections.size > 0 || this.queuedRegisters > 0) return false;
    if (this.currentState !== "running") return false;

    this.log.debug({ hub: this.name }, "Last member left; stopping idle hub");
    this.currentState = "stopping";
    this.rejectSlotWaiters(new HubClosedError(this.name, "stopped"));
    this.shutdown();
    return true;
  }

  private releaseBroadcastSlot(): void {
    const next = this.slotWaiters.shift();
    if (next) {
      next.resolve();
      return;
    }
    this.pendingBroadcasts -= 1;
  }

  private shutdown(): void {
    this.currentState = "stopped";
    this.closeEverything(new HubClosedError(this.name, "stopped"));
    this.log.info({ hub: this.name, stats: this.stats() }, "Hub stopped");
  }

  private crash(err: unknown): void {
    this.currentState = "crashed";
    this.log.error({ err, hub: this.name }, "Hub loop crashed; closing every member");
    this.rejectSlotWaiters(new HubClosedError(this.name, "crashed"));
    this.closeEverything(new HubClosedError(this.name, "crashed"));
  }

  private closeEverything(cause: HubClosedError): void {
    this.mailbox.close();

    // commands that arrived after the stop marker
    for (const command of this.mailbox.drain()) {
      if (command.type === "register") command.member.closeOutbound(cause);
      if (command.type === "count") command.resolve(0);
    }

    for (const member of this.connections) {
      this.retired.add(member);
      member.closeOutbound(cause);
    }
    this.connections.clear();
  }

  private rejectSlotWaiters(err: HubClosedError): void {
    for (const waiter of this.slotWaiters.splice(0)) waiter.reject(err);
  }

  private isClosed(): boolean {
    return this.currentState === "stopped" || this.currentState === "crashed";
  }

  private closedReason(): "stopped" | "crashed" {
    return this.currentState === "crashed" ? "crashed" : "stopped";
  }

  private assertAccepting(): void {
    if (this.currentState !== "running") {
      throw new HubClosedError(this.name, this.closedReason());
    }
  }
}
