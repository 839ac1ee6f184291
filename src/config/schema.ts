import { z } from "zod";

export const DEFAULT_IMAGES_SECTION = "镜像";

export const SwrSchema = z.object({
  endpoint: z.string().min(1),
  org: z.string().min(1)
});

export const AppConfigSchema = z.object({
  assets_file: z.string().min(1, "'assets_file' not set in config"),
  swr: SwrSchema.optional(),
  cleanup_after_push: z.boolean().optional().default(false),
  images_section: z.string().min(1).optional().default(DEFAULT_IMAGES_SECTION),
  docker_bin: z.string().min(1).optional().default("docker")
});

export type SwrConfig = z.infer<typeof SwrSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;
