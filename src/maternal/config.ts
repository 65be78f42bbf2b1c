import { z } from "zod";
import { ConfigurationError } from "./errors";

const MaternalEnvSchema = z.object({
  PORT: z
    .string()
    .default("4180")
    .transform(Number)
    .pipe(z.number().int().min(0).max(65535)),
  HOST: z.string().default("127.0.0.1"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info"),
  MATERNAL_DB_PATH: z.string().min(1).default("data/maternal.db"),
  MATERNAL_RULES_PATH: z.string().min(1).default("src/config/rules.maternal.v1.json"),
});

export type MaternalConfig = z.infer<typeof MaternalEnvSchema>;

export function loadConfig(env: Record<string, string | undefined> = process.env): MaternalConfig {
  const parsed = MaternalEnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid environment: ${problems}`);
  }
  return parsed.data;
}
