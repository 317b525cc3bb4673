/**
 * Library configuration
 * Read once from process.env; an unusable value falls back to its default.
 */

import { z } from 'zod';

const ConfigSchema = z.object({
  // Logging
  TYPED_DATA_LOG_LEVEL: z
    .enum(['error', 'warn', 'info', 'verbose', 'debug', 'silly'])
    .catch('warn'),
});

export type Config = z.infer<typeof ConfigSchema>;

export type LogLevel = Config['TYPED_DATA_LOG_LEVEL'];

let _config: Config | null = null;

export function getConfig(): Config {
  if (!_config) {
    _config = ConfigSchema.parse(process.env);
  }
  return _config;
}

/** Drop the cached config so the next getConfig() re-reads process.env */
export function resetConfig(): void {
  _config = null;
}
