/**
 * Window the portal dialog should be attached to.
 *
 * The portal identifies parents by an exported handle string such as
 * "x11:1a00004" or "wayland:<token>".
 */
export interface ParentWindow {
  /**
   * Handle exported earlier, if any. When set, no export is done.
   */
  readonly exportedHandle?: string;

  /**
   * Export the window and resolve with its handle
   */
  export(): Promise<string>;

  /**
   * Revoke a handle obtained from export()
   */
  unexport?(): void;
}

/**
 * Parent whose handle is already known, e.g. an X11 window id.
 */
export function parentFromHandle(handle: string): ParentWindow {
  return {
    exportedHandle: handle,
    export: async () => handle,
  };
}
