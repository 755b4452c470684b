import { z } from "zod";

const EnvSchema = z.object({
  HOST: z.string().min(1).default("0.0.0.0"),
  PORT: z.coerce.number().int().min(0).max(65_535).default(3000),
  MAX_FRAME_BYTES: z.coerce.number().int().positive().default(64 * 1024),
  BATTLEFIELD_LENGTH: z.coerce.number().int().min(5).max(26).default(10),
});

export type ServerEnv = z.infer<typeof EnvSchema>;

export function loadConfig(env: Record<string, string | undefined> = process.env) {
  const parsed = EnvSchema.parse(env);

  return Object.freeze({
    SERVER: Object.freeze({
      HOST: parsed.HOST,
      PORT: parsed.PORT,
      PING_INTERVAL_MS: 10_000,
    }),

    PROTOCOL: Object.freeze({
      MAX_FRAME_BYTES: parsed.MAX_FRAME_BYTES,
    }),

    GAME: Object.freeze({
      BATTLEFIELD_LENGTH: parsed.BATTLEFIELD_LENGTH,
    }),
  });
}

export type ServerConfig = ReturnType<typeof loadConfig>;

