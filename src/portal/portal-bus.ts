/**
 * Method call addressed to the portal service.
 */
export type BusCallT = {
  path: string;
  interface: string;
  member: string;
  signature?: string;
  body?: unknown[];
};

/**
 * Signal received from the portal service.
 */
export type BusSignalT = {
  sender: string;
  path: string;
  interface: string;
  member: string;
  body: unknown[];
};

/**
 * Signal filter. Omitting `path` matches every object path.
 */
export type SignalMatchT = {
  interface: string;
  member: string;
  path?: string;
};

export type SignalHandlerT = (signal: BusSignalT) => void;

/**
 * Transport contract between the portal client and the message bus.
 *
 * Calls are non-blocking; a rejected promise is a transport failure.
 * Subscription ids are positive and never reused by one bus.
 */
export interface PortalBus {
  /**
   * Unique connection name of this client, e.g. ":1.42"
   */
  readonly uniqueName: string;

  /**
   * Invoke a method on the portal and resolve with the reply body
   */
  call(call: BusCallT): Promise<unknown[]>;

  /**
   * Subscribe to signals from the portal
   *
   * @returns Subscription id, always > 0
   */
  subscribeSignal(match: SignalMatchT, handler: SignalHandlerT): number;

  /**
   * Drop a subscription. Unknown ids are ignored.
   */
  unsubscribeSignal(id: number): void;
}
