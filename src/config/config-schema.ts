import { z } from "zod";

const positiveMs = z.number().int().positive();

const injected = (what: string) =>
  z
    .unknown()
    .refine((v) => v === undefined || (typeof v === "object" && v !== null), `must be a ${what}`)
    .optional();

export const killSignalSchema = z.enum(["SIGTERM", "SIGKILL", "SIGINT"]);

export const launcherOptionsSchema = z.object({
  cwd: z.string().min(1).optional(),

  // Termination
  killSignal: killSignalSchema.optional(),
  killGracePeriodMs: positiveMs.optional(),

  // Collaborators
  logger: injected("Logger"),
  spawner: injected("ProcessSpawner"),
  resolver: injected("PathResolver"),
});

/** `KEY=VALUE`; the key is non-empty and neither part contains NUL. */
export const envEntrySchema = z
  .string()
  .regex(/^[^=\0]+=[^\0]*$/, "environment entries must have the form KEY=VALUE");
