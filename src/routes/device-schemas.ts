import { z } from "zod";

/**
 * Zod schemas for device route bodies.
 */
const DeviceIdSchema = z.string().trim().min(1).max(512);

export const AcquireBodySchema = z
  .object({
    devices: z
      .array(
        z
          .object({
            id: DeviceIdSchema,
            writable: z.boolean().default(false),
          })
          .strict()
      )
      .min(1)
      .max(64),
  })
  .strict();

export const ReleaseBodySchema = z
  .object({
    ids: z.array(DeviceIdSchema).min(1).max(64),
  })
  .strict();

export type AcquireBodyT = z.infer<typeof AcquireBodySchema>;
export type ReleaseBodyT = z.infer<typeof ReleaseBodySchema>;

export type BodyParseResultT<T> =
  | { success: true; data: T }
  | { success: false; issues: string[] };

/**
 * Parse a request body and flatten zod issues into "path: message" strings.
 */
export const parseBody = <T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  body: unknown
): BodyParseResultT<T> => {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    return {
      success: false,
      issues: parsed.error.issues.map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join(".")}: ${issue.message}`
          : issue.message
      ),
    };
  }
  return { success: true, data: parsed.data };
};
