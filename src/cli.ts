#!/usr/bin/env node
import { env } from './config/env';
import { createAssignmentService } from './service/assignment-service';
import { runBatch, DatasetNotFoundError } from './batch/batch-runner';
import { ValidationError, ConfigError } from './assignment/errors';
import { logger } from './observability/logger';

function main(): number {
  try {
    runBatch(createAssignmentService(), env.batch);
    return 0;
  } catch (err) {
    if (err instanceof DatasetNotFoundError) {
      logger.error({ datasetPath: err.datasetPath }, 'Dataset file not found');
    } else if (err instanceof ValidationError) {
      logger.fatal({ issues: err.issues }, 'Dataset failed validation');
    } else if (err instanceof ConfigError) {
      logger.fatal({ file: err.file, err }, 'Configuration failed to load');
    } else {
      logger.fatal({ err }, 'Assignment run failed');
    }
    return 1;
  }
}

process.exitCode = main();
