/**
 * Well-known names of the desktop portal on the session bus.
 */
export const PORTAL_BUS_NAME = "org.freedesktop.portal.Desktop";
export const PORTAL_OBJECT_PATH = "/org/freedesktop/portal/desktop";

export const USB_INTERFACE = "org.freedesktop.portal.Usb";
export const REQUEST_INTERFACE = "org.freedesktop.portal.Request";
export const SESSION_INTERFACE = "org.freedesktop.portal.Session";

export const REQUEST_PATH_PREFIX = "/org/freedesktop/portal/desktop/request/";
export const SESSION_PATH_PREFIX = "/org/freedesktop/portal/desktop/session/";

/**
 * Response signal status codes
 */
export const RESPONSE_SUCCESS = 0;
export const RESPONSE_CANCELLED = 1;

export const DEFAULT_FINISH_MAX_PAGES = 1024;
