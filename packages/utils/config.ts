import fs from "fs";
import * as yaml from "js-yaml";
import { z } from "zod";

export const DEFAULT_CONFIG_PATH = "config/config.yml";

const ConfigSchema = z.object({
  api_key: z.string().trim().optional(),
  input_file: z.string().trim().min(1).optional(),
  output_file: z.string().trim().min(1).optional(),
  sheet_name: z.string().min(1).optional(),
  url_column: z.string().min(1).optional(),
  // segundos, como en el config original
  rate_limit_delay: z.number().nonnegative().optional(),
});

export type EnrichConfig = z.infer<typeof ConfigSchema>;

export function parseConfig(raw: string, source = "config"): EnrichConfig {
  const data = yaml.load(raw) ?? {};
  const parsed = ConfigSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new Error(`Invalid ${source}: ${issues.join("; ")}`);
  }
  return parsed.data;
}

export function loadConfig(path = DEFAULT_CONFIG_PATH): EnrichConfig {
  return parseConfig(fs.readFileSync(path, "utf-8"), path);
}
