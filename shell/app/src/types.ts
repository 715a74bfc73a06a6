import { blogConfigSchema } from "@inkpost/blog";
import { z } from "@inkpost/utils";

/**
 * Application configuration: blog settings plus runtime options
 */
export const appConfigSchema = blogConfigSchema.extend({
  logLevel: z
    .enum(["silly", "verbose", "debug", "info", "warn", "error", "none"])
    .default("info"),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type AppConfigInput = z.input<typeof appConfigSchema>;

/**
 * Output sinks and environment for one CLI run
 */
export interface CLIIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  cwd: string;
  env: Record<string, string | undefined>;
}
