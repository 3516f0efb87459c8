import { z } from "zod";

export const MiddlewareConfigEntrySchema = z.object({
  /** Package name, or a path to a module, whose default export is a middleware factory */
  package: z.string().min(1),
  enabled: z.boolean().default(true),
  config: z.record(z.unknown()).default({}),
});

export const ProxyConfigSchema = z.object({
  externalPort: z.number().int().min(1).max(65535).default(18789),
  internalPort: z.number().int().min(1).max(65535).default(18790),
  internalHost: z.string().default("127.0.0.1"),
  middlewares: z.array(MiddlewareConfigEntrySchema).default([]),
});

export type ProxyConfig = z.infer<typeof ProxyConfigSchema>;
export type ProxyConfigInput = z.input<typeof ProxyConfigSchema>;
export type MiddlewareConfigEntry = z.infer<typeof MiddlewareConfigEntrySchema>;

/** Parses the JSON held in the config environment variable. */
export function parseProxyConfig(json: string): ProxyConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new Error(`Proxy config is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  const result = ProxyConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid proxy config: ${issues}`);
  }
  return result.data;
}
