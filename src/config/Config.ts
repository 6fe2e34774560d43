import { z } from "zod";

const optionalSecret = z
  .string()
  .optional()
  .transform(x => (x === undefined || x.trim() === "" ? undefined : x));

export const configSchema = z.object({
  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().int().min(1).max(65535).default(5000),
  MAX_UPLOAD_BYTES: z.coerce
    .number()
    .int()
    .positive()
    .default(16 * 1024 * 1024),
  OPENAI_API_KEY: optionalSecret,
  OPENAI_MODEL: z.string().min(1).default("gpt-4o")
});

export type Config = z.infer<typeof configSchema>;

export namespace Config {
  /**
   * @throws Error listing every invalid variable.
   */
  export function fromEnvironment(env: NodeJS.ProcessEnv): Config {
    const result = configSchema.safeParse(env);
    if (!result.success) {
      const issues = result.error.issues.map(x => `${x.path.join(".")}: ${x.message}`).join("; ");
      throw new Error(`Invalid configuration: ${issues}`);
    }
    return result.data;
  }
}
