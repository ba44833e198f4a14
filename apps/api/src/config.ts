import { z } from "zod";

const apiEnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  DEFAULT_STRATEGY: z.string().min(1).default("nearest_neighbor"),
  // 2-opt round cap for requests without max_iterations
  MAX_ITERATIONS: z.coerce.number().int().positive().default(1000)
});

export type ApiConfig = z.infer<typeof apiEnvSchema>;

/** Reads the service settings from an environment map, listing every invalid variable. */
export function parseApiConfig(env: Record<string, string | undefined>): ApiConfig {
  const parsed = apiEnvSchema.safeParse(env);
  if (parsed.success) {
    return parsed.data;
  }
  const problems = parsed.error.issues.map((issue) => `  ${issue.path.join(".")}: ${issue.message}`);
  throw new Error(["Invalid API environment:", ...problems].join("\n"));
}

let current: ApiConfig | undefined;

export function getConfig(): ApiConfig {
  current ??= parseApiConfig(process.env);
  return current;
}

/** Drops the cached settings so the next `getConfig` call re-reads `process.env`. */
export function resetConfig() {
  current = undefined;
}
