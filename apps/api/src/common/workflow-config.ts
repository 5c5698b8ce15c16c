import type { AppEnv } from '@shootline/config';
import { resolveVocabulary, type TaskVocabulary } from '@shootline/common';

export interface WorkflowConfig {
  vocabulary: TaskVocabulary;
  /** Task titles seeded on every job created from a Won deal. */
  jobSeedTasks: string[];
  profitSharePolicy: 'permissive' | 'strict';
}

export const loadWorkflowConfig = (
  env: Pick<AppEnv, 'TASK_WORKFLOW' | 'TASK_STATUSES' | 'JOB_SEED_TASKS' | 'PROFIT_SHARE_POLICY'>
): WorkflowConfig => ({
  vocabulary: resolveVocabulary(env.TASK_WORKFLOW, env.TASK_STATUSES),
  jobSeedTasks: env.JOB_SEED_TASKS ?? [],
  profitSharePolicy: env.PROFIT_SHARE_POLICY
});
