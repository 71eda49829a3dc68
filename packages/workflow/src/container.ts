/**
 * Wires the workflow services over one set of repositories and one validated config.
 */

import { AdminService } from './admin-service.js';
import { loadWorkflowConfig, validateWorkflowConfig, type WorkflowConfig } from './config.js';
import { IngestionService } from './ingestion-service.js';
import { createLogger } from './logger.js';
import { PlanService } from './plan-service.js';
import type { Repositories } from './repositories.js';

export interface Workflow {
  config: WorkflowConfig;
  ingestion: IngestionService;
  plans: PlanService;
  admin: AdminService;
}

export interface WorkflowOptions {
  repos: Repositories;
  /** Read from the environment when absent. */
  config?: WorkflowConfig;
}

export function createWorkflow(options: WorkflowOptions): Workflow {
  const config = options.config ?? loadWorkflowConfig();

  const errors = validateWorkflowConfig(config);
  if (errors.length > 0) {
    throw new Error(`Invalid configuration:\n${errors.map((error) => `- ${error}`).join('\n')}`);
  }

  return {
    config,
    ingestion: new IngestionService(
      options.repos,
      config,
      createLogger('Ingestion', config.logging)
    ),
    plans: new PlanService(options.repos, config, createLogger('Plans', config.logging)),
    admin: new AdminService(options.repos, createLogger('Admin', config.logging)),
  };
}
