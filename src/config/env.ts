import dotenv from "dotenv";
import { z } from "zod";

// Load environment variables from .env files
// Priority: .env.<env>.local > .env.<env> > .env.local > .env
const env = process.env.NODE_ENV || "development";
const envFiles = [
  `.env.${env}.local`,
  `.env.${env}`,
  ".env.local",
  ".env",
];

for (const file of envFiles) {
  dotenv.config({ path: file });
}

// Define the environment variable schema
const envSchema = z
  .object({
    // Application
    NODE_ENV: z
      .enum(["development", "test", "production"])
      .default("development"),

    // AWS Configuration
    AWS_REGION: z.string().min(1).default("us-west-2"),
    AWS_ACCESS_KEY_ID: z.string().min(1).optional(),
    AWS_SECRET_ACCESS_KEY: z.string().min(1).optional(),
    AWS_SESSION_TOKEN: z.string().min(1).optional(),

    // Device Farm Configuration
    DEVICE_FARM_ROLE_ARN: z
      .string()
      .regex(/^arn:aws[\w-]*:iam::\d{12}:role\/.+$/, "must be an IAM role ARN")
      .optional(),
    DEVICE_FARM_USER_AGENT: z.string().default("device-farm-runner/1.0"),
    UPLOAD_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(5000),
    UPLOAD_TIMEOUT_MS: z.coerce.number().int().min(0).default(1800000),

    // Logging Configuration
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
    LOG_FILE: z.string().optional(),
    LOG_FORMAT: z.enum(["json", "text"]).default("json"),
  })
  .passthrough();

// Type for validated environment variables
export type Env = z.infer<typeof envSchema>;

// Parse and validate environment variables
function parseEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const formattedErrors: string[] = [];

    for (const issue of result.error.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "unknown";
      formattedErrors.push(`  - ${path}: ${issue.message}`);
    }

    const errors = formattedErrors.length > 0 ? formattedErrors.join("\n") : "  - Unknown validation error";

    throw new Error(
      `Environment variable validation failed:\n${errors}\n\n` +
        `Please check your .env file or set the required environment variables.`
    );
  }

  return result.data;
}

// Export validated configuration
export const config = parseEnv();

// Export helper function to reload configuration (useful for testing)
export function reloadConfig(): Env {
  return parseEnv();
}
