import type {
  FastifyInstance,
  FastifyPluginOptions,
  FastifyReply,
} from "fastify";
import {
  getCollectedDevices,
  isPortalError,
  PortalErrorCode,
} from "../portal/portal-errors.js";
import {
  DeviceAcquireRequest,
  type AcquiredDeviceT,
} from "../portal/usb-device.js";
import type { UsbPortal } from "../portal/usb-portal.js";
import type { AcquiredDeviceStore } from "../services/acquired-device-store.js";
import { toJsonObject } from "../utils/json-value.js";
import { AcquireBodySchema, parseBody, ReleaseBodySchema } from "./device-schemas.js";
import { enforceLocalOrToken } from "./route-guards.js";

export type DevicesRouteOptionsT = FastifyPluginOptions & {
  portal: Pick<
    UsbPortal,
    | "enumerateDevices"
    | "acquireDevices"
    | "finishAcquireDevices"
    | "releaseDevices"
  >;
  store: AcquiredDeviceStore;
};

/**
 * HTTP status for a failed portal operation
 */
export function statusForPortalError(error: unknown): number {
  if (!isPortalError(error)) {
    return 500;
  }
  switch (error.code) {
    case PortalErrorCode.CANCELLED:
      return 409;
    case PortalErrorCode.REQUEST_FAILED:
      return 403;
    default:
      return 502;
  }
}

function sendPortalError(
  reply: FastifyReply,
  error: unknown,
  fallbackMessage: string
) {
  const status = statusForPortalError(error);
  if (isPortalError(error)) {
    return reply.code(status).send({ success: false, error: error.toJSON() });
  }
  return reply.code(status).send({
    success: false,
    error: {
      message: error instanceof Error ? error.message : fallbackMessage,
    },
  });
}

/**
 * Register devices route
 *
 * GET  /devices          - Devices the portal exposes
 * GET  /devices/acquired - Devices this bridge holds fds for
 * POST /devices/acquire  - Acquire a batch, then collect the fds
 * POST /devices/release  - Release devices and close their fds
 */
export async function registerDevicesRoute(
  fastify: FastifyInstance,
  options: DevicesRouteOptionsT
): Promise<void> {
  const { portal, store } = options;

  // Fds granted by finish pages before a later page failed
  const releaseCollected = async (collected: AcquiredDeviceT[]) => {
    const deviceIds = store.discard(collected);
    if (deviceIds.length === 0) {
      return;
    }
    fastify.log.warn(
      { deviceIds },
      "[Devices] Releasing devices granted before the acquire failed"
    );
    try {
      await portal.releaseDevices(deviceIds);
    } catch (error: unknown) {
      fastify.log.warn(
        { err: error, deviceIds },
        "[Devices] Releasing partially acquired devices failed"
      );
    }
  };

  fastify.get("/devices", async (request, reply) => {
    if (!enforceLocalOrToken(request, reply)) {
      return reply;
    }
    try {
      const devices = await portal.enumerateDevices();
      return devices.map((device) => ({
        id: device.id,
        properties: toJsonObject(device.properties),
      }));
    } catch (error: unknown) {
      fastify.log.error({ err: error }, "[Devices] Error enumerating devices");
      return sendPortalError(reply, error, "Failed to enumerate devices");
    }
  });

  fastify.get("/devices/acquired", async (request, reply) => {
    if (!enforceLocalOrToken(request, reply)) {
      return reply;
    }
    return store.list();
  });

  fastify.post("/devices/acquire", async (request, reply) => {
    if (!enforceLocalOrToken(request, reply)) {
      return reply;
    }
    const body = parseBody(AcquireBodySchema, request.body);
    if (!body.success) {
      return reply.code(400).send({
        success: false,
        error: { message: "Invalid request body", issues: body.issues },
      });
    }

    const requests = body.data.devices.map(
      (device) => new DeviceAcquireRequest(device.id, device.writable)
    );

    try {
      const handle = await portal.acquireDevices(null, requests);
      const devices = await portal.finishAcquireDevices(handle);
      const stored = store.add(devices);
      fastify.log.info(
        {
          requestPath: handle.requestPath,
          requested: handle.requested.length,
          granted: stored.length,
        },
        "[Devices] Acquire finished"
      );
      return {
        success: true,
        requestPath: handle.requestPath,
        results: handle.devices,
        devices,
      };
    } catch (error: unknown) {
      await releaseCollected(getCollectedDevices(error));
      if (statusForPortalError(error) >= 500) {
        fastify.log.error({ err: error }, "[Devices] Error acquiring devices");
      } else {
        fastify.log.info({ err: error }, "[Devices] Acquire not granted");
      }
      return sendPortalError(reply, error, "Failed to acquire devices");
    }
  });

  fastify.post("/devices/release", async (request, reply) => {
    if (!enforceLocalOrToken(request, reply)) {
      return reply;
    }
    const body = parseBody(ReleaseBodySchema, request.body);
    if (!body.success) {
      return reply.code(400).send({
        success: false,
        error: { message: "Invalid request body", issues: body.issues },
      });
    }

    try {
      await portal.releaseDevices(body.data.ids);
    } catch (error: unknown) {
      fastify.log.error({ err: error }, "[Devices] Error releasing devices");
      return sendPortalError(reply, error, "Failed to release devices");
    }

    const closed = store.remove(body.data.ids);
    return { success: true, released: body.data.ids, closed };
  });
}
