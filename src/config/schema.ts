import { z } from 'zod';

const CorsOriginSchema = z.union([z.string().min(1), z.array(z.string().min(1))]);

const ServerConfigSchema = z.object({
  port: z.number().int().min(0).max(65535),
  host: z.string().min(1),
  corsOrigin: CorsOriginSchema,
});

const ExecutorConfigSchema = z.object({
  image: z.string().min(1),
  memory: z.string().min(1),
  cpus: z.string().min(1),
  workDir: z.string().min(1),
});

const StoreConfigSchema = z.object({
  path: z.string().min(1).optional(),
});

export const PipesmithConfigSchema = z.object({
  server: ServerConfigSchema,
  executor: ExecutorConfigSchema,
  store: StoreConfigSchema,
});

/** Shape accepted from a config file; numbers may be written as strings */
export const ConfigFileSchema = z
  .object({
    server: z
      .object({
        port: z.coerce.number().int(),
        host: z.string(),
        corsOrigin: CorsOriginSchema,
      })
      .partial()
      .strict(),
    executor: z
      .object({
        image: z.string(),
        memory: z.union([z.string(), z.number()]).transform(String),
        cpus: z.union([z.string(), z.number()]).transform(String),
        workDir: z.string(),
      })
      .partial()
      .strict(),
    store: StoreConfigSchema.strict(),
  })
  .partial()
  .strict();
