export { UsbPortal } from "./usb-portal.js";
export type { UsbPortalOptionsT, CallOptionsT } from "./usb-portal.js";
export { UsbSession } from "./usb-session.js";
export type { UsbSessionStateT } from "./usb-session.js";
export { PortalSession } from "./portal-session.js";
export type { PortalSessionStateT } from "./portal-session.js";
export { SessionRegistry } from "./session-registry.js";
export { RequestTokenSource } from "./request-token.js";
export { DbusNextBus } from "./dbus-next-bus.js";
export type {
  BusCallT,
  BusSignalT,
  PortalBus,
  SignalHandlerT,
  SignalMatchT,
} from "./portal-bus.js";
export type { PortalLoggerT } from "./portal-logger.js";
export type { ParentWindow } from "./parent-window.js";
export { parentFromHandle } from "./parent-window.js";
export {
  DeviceAcquireRequest,
  NO_FD,
} from "./usb-device.js";
export type {
  AcquireDevicesRequestT,
  AcquiredDeviceT,
  UsbDeviceEventT,
  UsbDeviceInfoT,
} from "./usb-device.js";
export {
  PortalError,
  PortalErrorCode,
  getCollectedDevices,
  isPortalError,
} from "./portal-errors.js";
