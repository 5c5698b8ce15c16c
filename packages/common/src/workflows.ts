export const DEAL_STAGES = ['New', 'Proposal', 'Negotiation', 'Won', 'Lost'] as const;
export type DealStage = (typeof DEAL_STAGES)[number];

export const JOB_STATUSES = ['Active', 'Completed'] as const;
export type JobStatus = (typeof JOB_STATUSES)[number];

export const USER_ROLES = ['admin', 'contributor'] as const;
export type UserRole = (typeof USER_ROLES)[number];

export const isDealStage = (value: string): value is DealStage =>
  (DEAL_STAGES as readonly string[]).includes(value);

/**
 * Named task status lists. Products differ in the working states between the
 * initial and the terminal status; the shape is always initial → ... → terminal.
 */
export const TASK_VOCABULARIES = {
  task: ['To Do', 'In Progress', 'Review', 'Done'],
  deliverable: ['To Do', 'Shooting', 'Editing', 'Review', 'Done']
} as const;

export type VocabularyName = keyof typeof TASK_VOCABULARIES;

export interface TaskVocabulary {
  name: string;
  statuses: readonly string[];
  initial: string;
  terminal: string;
}

export const buildVocabulary = (name: string, statuses: readonly string[]): TaskVocabulary => {
  const unique = new Set(statuses);
  if (statuses.length < 2 || unique.size !== statuses.length) {
    throw new Error(`vocabulary ${name} needs at least two distinct statuses`);
  }

  return {
    name,
    statuses,
    initial: statuses[0] ?? '',
    terminal: statuses[statuses.length - 1] ?? ''
  };
};

export const resolveVocabulary = (name: VocabularyName, override?: readonly string[]): TaskVocabulary => {
  if (override && override.length > 0) {
    return buildVocabulary('custom', override);
  }
  return buildVocabulary(name, TASK_VOCABULARIES[name]);
};

export const isKnownStatus = (vocabulary: TaskVocabulary, value: string): boolean =>
  vocabulary.statuses.includes(value);
