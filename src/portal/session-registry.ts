import type { PortalSession } from "./portal-session.js";
import type { UsbSession } from "./usb-session.js";

type SessionEntryT = {
  session: PortalSession;
  usbSession: UsbSession | null;
};

/**
 * Sessions of one portal client, keyed by session path.
 *
 * A PortalSession never references its UsbSession; it asks the registry.
 * The UsbSession is the only owner of its PortalSession.
 */
export class SessionRegistry {
  private entries = new Map<string, SessionEntryT>();

  register(session: PortalSession): void {
    if (this.entries.has(session.path)) {
      throw new Error(`Session ${session.path} is already registered`);
    }
    this.entries.set(session.path, { session, usbSession: null });
  }

  unregister(sessionPath: string): boolean {
    return this.entries.delete(sessionPath);
  }

  getSession(sessionPath: string): PortalSession | null {
    return this.entries.get(sessionPath)?.session ?? null;
  }

  attachUsbSession(sessionPath: string, usbSession: UsbSession): void {
    const entry = this.entries.get(sessionPath);
    if (!entry) {
      throw new Error(`Session ${sessionPath} is not registered`);
    }
    if (entry.usbSession && entry.usbSession !== usbSession) {
      throw new Error(`Session ${sessionPath} already has a USB session`);
    }
    entry.usbSession = usbSession;
  }

  /**
   * Clear the backlink if it still points at `usbSession`
   */
  detachUsbSession(sessionPath: string, usbSession: UsbSession): boolean {
    const entry = this.entries.get(sessionPath);
    if (!entry || entry.usbSession !== usbSession) {
      return false;
    }
    entry.usbSession = null;
    return true;
  }

  getUsbSession(sessionPath: string): UsbSession | null {
    return this.entries.get(sessionPath)?.usbSession ?? null;
  }

  getSessionPaths(): string[] {
    return [...this.entries.keys()];
  }

  get size(): number {
    return this.entries.size;
  }
}
