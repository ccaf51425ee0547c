import * as fs from 'fs';
import * as path from 'path';
import { AssignmentService } from '../service/assignment-service';
import { AssignmentOutput } from '../dataset/types';
import { logger } from '../observability/logger';

export interface BatchPaths {
  datasetPath: string;
  outputPath: string;
}

export class DatasetNotFoundError extends Error {
  constructor(readonly datasetPath: string) {
    super(`Dataset not found: ${datasetPath}`);
    this.name = 'DatasetNotFoundError';
  }
}

/** Read the dataset file, allocate, write the result as indented JSON */
export function runBatch(service: AssignmentService, paths: BatchPaths): AssignmentOutput {
  const log = logger.child({ component: 'batch' });

  if (!fs.existsSync(paths.datasetPath)) {
    throw new DatasetNotFoundError(paths.datasetPath);
  }
  const body: unknown = JSON.parse(fs.readFileSync(paths.datasetPath, 'utf-8'));

  const output = service.run(body, 'cli');

  fs.mkdirSync(path.dirname(paths.outputPath), { recursive: true });
  fs.writeFileSync(paths.outputPath, JSON.stringify(output, null, 2) + '\n', 'utf-8');

  log.info({ assigned: output.assignments.length, outputPath: paths.outputPath }, 'Assignments written');
  for (const entry of output.distribution) {
    log.info(
      { agentId: entry.agent_id, name: entry.name, assigned: entry.assigned, finalLoad: entry.final_load },
      'Assignment distribution',
    );
  }
  return output;
}
