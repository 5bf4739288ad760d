import type { BaseLogger } from "pino";

/**
 * Logger surface used by the portal client.
 *
 * Satisfied by a pino logger and by fastify's `server.log`.
 */
export type PortalLoggerT = Pick<BaseLogger, "debug" | "info" | "warn" | "error">;
