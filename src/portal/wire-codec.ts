import dbus from "dbus-next";
import type { Variant } from "dbus-next";
import { z } from "zod";
import { createInvalidResponseError } from "./portal-errors.js";
import {
  DeviceAcquireRequest,
  failedDevice,
  grantedDevice,
  NO_FD,
  type AcquiredDeviceT,
  type UsbDeviceEventT,
  type UsbDeviceInfoT,
} from "./usb-device.js";

/**
 * a{sv} as handed to the bus
 */
export type VariantDictT = Record<string, Variant>;

/**
 * a(sa{sv}) device batch as handed to the bus
 */
export type WireDeviceBatchT = Array<[string, VariantDictT]>;

export const stringVariant = (value: string): Variant =>
  new dbus.Variant("s", value);

export const booleanVariant = (value: boolean): Variant =>
  new dbus.Variant("b", value);

/**
 * Recursively replace variants by their values.
 *
 * Buffers (`ay`) are kept as they are.
 */
export function unwrapVariants(value: unknown): unknown {
  if (value instanceof dbus.Variant) {
    return unwrapVariants(value.value);
  }
  if (Array.isArray(value)) {
    return value.map(unwrapVariants);
  }
  if (Buffer.isBuffer(value)) {
    return value;
  }
  if (value !== null && typeof value === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = unwrapVariants(entry);
    }
    return result;
  }
  return value;
}

const VardictSchema = z.record(z.unknown());

const DeviceResultSchema = z
  .object({
    success: z.boolean().optional(),
    fd: z.number().int().optional(),
    error: z.string().optional(),
  })
  .passthrough();

type DeviceResultT = z.infer<typeof DeviceResultSchema>;

const DeviceEntrySchema = z.tuple([z.string(), VardictSchema]);

const ObjectPathReplySchema = z.tuple([z.string().min(1)]).rest(z.unknown());

const EnumerateReplySchema = z
  .tuple([z.array(DeviceEntrySchema)])
  .rest(z.unknown());

const ResponseSignalSchema = z
  .tuple([z.number().int().nonnegative(), VardictSchema])
  .rest(z.unknown());

const SingleDevicePageSchema = z.tuple([z.string(), VardictSchema, z.boolean()]);
const DeviceListPageSchema = z.tuple([z.array(DeviceEntrySchema), z.boolean()]);

const DeviceEventEntrySchema = z.union([
  z.tuple([z.string(), z.string(), VardictSchema]),
  z.tuple([z.string(), VardictSchema]),
]);

const DeviceEventsSignalSchema = z
  .tuple([z.string(), z.array(DeviceEventEntrySchema)])
  .rest(z.unknown());

const AcquireBatchSchema = z.array(DeviceEntrySchema);

function parsePayload<T>(
  schema: z.ZodType<T>,
  member: string,
  payload: unknown
): T {
  const parsed = schema.safeParse(unwrapVariants(payload));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw createInvalidResponseError(
      member,
      `${issue ? issue.message : "unexpected shape"}${where}`
    );
  }
  return parsed.data;
}

function toAcquiredDevice(id: string, result: DeviceResultT): AcquiredDeviceT {
  if (result.success === true) {
    return grantedDevice(id, result.fd ?? NO_FD);
  }
  return failedDevice(id, result.error);
}

function decodeDeviceResult(
  member: string,
  id: string,
  result: Record<string, unknown>
): AcquiredDeviceT {
  return toAcquiredDevice(id, parsePayload(DeviceResultSchema, member, result));
}

/**
 * Encode a device batch as a(sa{sv}).
 */
export function encodeAcquireRequests(
  requests: readonly DeviceAcquireRequest[]
): WireDeviceBatchT {
  return requests.map((request) => [
    request.id,
    { writable: booleanVariant(request.writable) },
  ]);
}

/**
 * Decode an a(sa{sv}) device batch back into requests.
 *
 * A missing `writable` entry means read-only.
 */
export function decodeAcquireRequests(payload: unknown): DeviceAcquireRequest[] {
  const entries = parsePayload(AcquireBatchSchema, "AcquireDevices", payload);
  return entries.map(([id, options]) => {
    const writable = options.writable;
    return new DeviceAcquireRequest(id, writable === true);
  });
}

/**
 * Object path from a CreateSession or AcquireDevices reply.
 */
export function decodeObjectPathReply(member: string, body: unknown[]): string {
  const [path] = parsePayload(ObjectPathReplySchema, member, body);
  return path;
}

export function decodeEnumerateReply(body: unknown[]): UsbDeviceInfoT[] {
  const [devices] = parsePayload(EnumerateReplySchema, "EnumerateDevices", body);
  return devices.map(([id, properties]) => ({ id, properties }));
}

export type ResponseSignalT = {
  status: number;
  results: Record<string, unknown>;
};

export function decodeResponseSignal(body: unknown[]): ResponseSignalT {
  const [status, results] = parsePayload(ResponseSignalSchema, "Response", body);
  return { status, results };
}

/**
 * Per-device outcomes of an AcquireDevices Response, one per requested id.
 *
 * Results are keyed by device id, or carried as an a(sa{sv}) `devices`
 * entry. Ids that were not requested are returned in `unexpected`.
 */
export function decodeAcquireResults(
  requested: readonly string[],
  results: Record<string, unknown>
): { devices: AcquiredDeviceT[]; unexpected: string[] } {
  const byId = new Map<string, Record<string, unknown>>();

  const listed = AcquireBatchSchema.safeParse(results.devices);
  if (listed.success) {
    for (const [id, result] of listed.data) {
      byId.set(id, result);
    }
  } else {
    for (const [id, result] of Object.entries(results)) {
      const dict = VardictSchema.safeParse(result);
      if (dict.success) {
        byId.set(id, dict.data);
      }
    }
  }

  const devices = requested.map((id) => {
    const result = byId.get(id);
    return result
      ? decodeDeviceResult("Response", id, result)
      : failedDevice(id, "No result reported for device");
  });
  const requestedIds = new Set(requested);
  const unexpected = [...byId.keys()].filter((id) => !requestedIds.has(id));

  return { devices, unexpected };
}

export type FinishPageT = {
  devices: AcquiredDeviceT[];
  finished: boolean;
};

/**
 * Decode one AcquireDevicesFinish reply.
 *
 * Accepts (s a{sv} b) for one device per page and (a(sa{sv}) b) for many.
 */
export function decodeFinishPage(body: unknown[]): FinishPageT {
  const unwrapped = unwrapVariants(body);

  const single = SingleDevicePageSchema.safeParse(unwrapped);
  if (single.success) {
    const [id, result, finished] = single.data;
    return {
      devices:
        id === "" ? [] : [decodeDeviceResult("AcquireDevicesFinish", id, result)],
      finished,
    };
  }

  const [entries, finished] = parsePayload(
    DeviceListPageSchema,
    "AcquireDevicesFinish",
    unwrapped
  );
  return {
    devices: entries.map(([id, result]) =>
      decodeDeviceResult("AcquireDevicesFinish", id, result)
    ),
    finished,
  };
}

export type DeviceEventsSignalT = {
  sessionPath: string;
  events: UsbDeviceEventT[];
};

/**
 * Decode DeviceEvents. Entries without an action are reported as "change".
 */
export function decodeDeviceEvents(body: unknown[]): DeviceEventsSignalT {
  const [sessionPath, entries] = parsePayload(
    DeviceEventsSignalSchema,
    "DeviceEvents",
    body
  );
  const events = entries.map((entry): UsbDeviceEventT => {
    if (entry.length === 3) {
      const [action, id, properties] = entry;
      return { action, id, properties };
    }
    const [id, properties] = entry;
    return { action: "change", id, properties };
  });
  return { sessionPath, events };
}
