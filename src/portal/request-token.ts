import { randomBytes } from "node:crypto";
import { REQUEST_PATH_PREFIX, SESSION_PATH_PREFIX } from "./portal-constants.js";

/**
 * Produces handle tokens for one portal client.
 *
 * Tokens combine a per-client counter with a random suffix so concurrent
 * calls from one connection never share a request path. Every token is a
 * valid object path element ([A-Za-z0-9_]).
 */
export class RequestTokenSource {
  private counter = 0;
  private readonly prefix: string;
  private readonly randomSuffix: () => string;

  constructor(
    prefix = "usbportal",
    randomSuffix: () => string = () => randomBytes(4).toString("hex")
  ) {
    if (!/^[A-Za-z0-9_]+$/.test(prefix)) {
      throw new Error(`Invalid token prefix "${prefix}"`);
    }
    this.prefix = prefix;
    this.randomSuffix = randomSuffix;
  }

  next(): string {
    this.counter++;
    return `${this.prefix}_${this.counter}_${this.randomSuffix()}`;
  }
}

/**
 * Object path element for a unique bus name: ":1.42" -> "1_42"
 */
export function senderPathElement(uniqueName: string): string {
  return uniqueName.replace(/^:/, "").replace(/\./g, "_");
}

/**
 * Path on which the portal emits Response for a request token
 */
export function requestPathFor(uniqueName: string, token: string): string {
  return `${REQUEST_PATH_PREFIX}${senderPathElement(uniqueName)}/${token}`;
}

/**
 * Path the portal will give a session created with a session token
 */
export function sessionPathFor(uniqueName: string, token: string): string {
  return `${SESSION_PATH_PREFIX}${senderPathElement(uniqueName)}/${token}`;
}
