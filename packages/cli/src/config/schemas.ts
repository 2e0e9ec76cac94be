import * as z from "zod";

export const DEFAULT_TABLE_NAME = "session-tokens";
export const DEFAULT_REGION = "us-east-1";

export const configSchema = z.object({
  tableName: z.string().min(1).optional(),
  endpoint: z.url().optional(),
  region: z.string().min(1).optional(),
  ttlSeconds: z.number().int().optional(),
  renewThresholdSeconds: z.number().int().optional(),
});

export type Config = z.infer<typeof configSchema>;

export type ConnectionOptions = {
  table?: string;
  endpoint?: string;
  region?: string;
  configDir?: string;
};

export type ResolvedConfig = {
  tableName: string;
  endpoint?: string;
  region: string;
  ttlSeconds: number;
  renewThresholdSeconds: number;
  secret: string;
};
