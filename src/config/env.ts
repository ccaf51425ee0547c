import dotenv from 'dotenv';
import path from 'path';

// .env and every relative path below resolve from the working directory
dotenv.config({ path: path.resolve('.env') });

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  return val ? parseInt(val, 10) : fallback;
}

export const env = {
  nodeEnv: optional('NODE_ENV', 'development'),
  port: optionalInt('PORT', 3000),
  host: optional('HOST', '0.0.0.0'),
  logLevel: optional('LOG_LEVEL', 'info'),
  bodyLimitBytes: optionalInt('BODY_LIMIT_BYTES', 1_048_576),

  // ───── Configuration files ─────
  configDir: path.resolve(optional('CONFIG_DIR', 'config')),

  // ───── Batch run ─────
  batch: {
    datasetPath: path.resolve(optional('DATASET_PATH', 'dataset.json')),
    outputPath: path.resolve(optional('OUTPUT_PATH', 'output_result.json')),
  },
};
