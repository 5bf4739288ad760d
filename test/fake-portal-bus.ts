import type {
  BusCallT,
  BusSignalT,
  PortalBus,
  SignalHandlerT,
  SignalMatchT,
} from "../src/portal/portal-bus.js";

export type FakeReplyT =
  | unknown[]
  | Error
  | ((call: BusCallT) => unknown[] | Promise<unknown[]>);

type SubscriptionT = {
  match: SignalMatchT;
  handler: SignalHandlerT;
};

export const PORTAL_SENDER = ":1.7";

/**
 * In-process PortalBus. Records calls, answers them from scripted
 * replies and delivers signals emitted by the test.
 */
export class FakePortalBus implements PortalBus {
  readonly uniqueName: string;
  readonly calls: BusCallT[] = [];
  readonly subscribed: SignalMatchT[] = [];
  readonly unsubscribed: SignalMatchT[] = [];
  private queuedReplies = new Map<string, FakeReplyT[]>();
  private standingReplies = new Map<string, FakeReplyT>();
  private subscriptions = new Map<number, SubscriptionT>();
  private nextSubscriptionId = 1;

  constructor(uniqueName = ":1.42") {
    this.uniqueName = uniqueName;
  }

  /**
   * Answer the next call of `member` with `reply`
   */
  reply(member: string, reply: FakeReplyT): this {
    const queue = this.queuedReplies.get(member) ?? [];
    queue.push(reply);
    this.queuedReplies.set(member, queue);
    return this;
  }

  /**
   * Answer every call of `member` that has no queued reply
   */
  replyAlways(member: string, reply: FakeReplyT): this {
    this.standingReplies.set(member, reply);
    return this;
  }

  async call(call: BusCallT): Promise<unknown[]> {
    this.calls.push(call);
    const reply =
      this.queuedReplies.get(call.member)?.shift() ??
      this.standingReplies.get(call.member);
    if (reply === undefined) {
      return [];
    }
    if (reply instanceof Error) {
      throw reply;
    }
    if (typeof reply === "function") {
      return reply(call);
    }
    return reply;
  }

  subscribeSignal(match: SignalMatchT, handler: SignalHandlerT): number {
    const id = this.nextSubscriptionId++;
    this.subscriptions.set(id, { match, handler });
    this.subscribed.push(match);
    return id;
  }

  unsubscribeSignal(id: number): void {
    const subscription = this.subscriptions.get(id);
    if (subscription) {
      this.subscriptions.delete(id);
      this.unsubscribed.push(subscription.match);
    }
  }

  /**
   * Deliver a signal to matching subscribers
   * @returns Number of handlers that received it
   */
  emitSignal(signal: Omit<BusSignalT, "sender">): number {
    const matching = [...this.subscriptions.values()].filter(
      ({ match }) =>
        match.interface === signal.interface &&
        match.member === signal.member &&
        (match.path === undefined || match.path === signal.path)
    );
    for (const { handler } of matching) {
      handler({ ...signal, sender: PORTAL_SENDER });
    }
    return matching.length;
  }

  callsTo(member: string): BusCallT[] {
    return this.calls.filter((call) => call.member === member);
  }

  activeSubscriptions(): SignalMatchT[] {
    return [...this.subscriptions.values()].map(({ match }) => match);
  }

  unsubscribedFrom(member: string): number {
    return this.unsubscribed.filter((match) => match.member === member).length;
  }
}
