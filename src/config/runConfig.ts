import { z } from "zod";

export const USER_AGENT_ENV = "CARD_SCRAPER_USER_AGENT";

export const RunConfigSchema = z.object({
  urlListPath: z.string().min(1),
  outputDir: z.string().min(1).default("./output"),
  imageDir: z.string().min(1).default("./image"),
  delayMs: z.number().int().min(0).default(1000),
  timeoutMs: z.number().int().positive().default(30000),
  userAgent: z.string().min(1).optional(),
  reportPath: z.string().min(1).optional()
});

export type RunConfig = z.infer<typeof RunConfigSchema>;
export type RunConfigInput = z.input<typeof RunConfigSchema>;

export function loadRunConfig(input: RunConfigInput, env: NodeJS.ProcessEnv = process.env): RunConfig {
  return RunConfigSchema.parse({
    ...input,
    userAgent: input.userAgent ?? (env[USER_AGENT_ENV] || undefined)
  });
}
