/**
 * Processing tracker shown to managers while an upload moves through the pipeline.
 */

import { InspectionStatus, type Inspection } from '@vistoria/domain/inspection';

export type TrackerStepKey = 'upload' | 'ai_process' | 'db_save' | 'plan_gen' | 'analysis';
export type TrackerStepStatus = 'pending' | 'current' | 'completed' | 'error';

export interface TrackerStep {
  status: TrackerStepStatus;
  label: string;
}

export type TrackerSteps = Record<TrackerStepKey, TrackerStep>;

export interface TrackerData {
  id: string;
  filename: string;
  status: InspectionStatus;
  steps: TrackerSteps;
  logs: string[];
}

export const TRACKER_STEP_ORDER: readonly TrackerStepKey[] = [
  'upload',
  'ai_process',
  'db_save',
  'plan_gen',
  'analysis',
];

const REVIEWED_STATUSES: readonly InspectionStatus[] = [
  InspectionStatus.APPROVED,
  InspectionStatus.PENDING_CONSULTANT_VERIFICATION,
  InspectionStatus.COMPLETED,
];

const RECENT_LOG_COUNT = 5;

export function getTrackerSteps(inspection: Inspection, hasPlan: boolean): TrackerSteps {
  const steps: TrackerSteps = {
    upload: { status: 'completed', label: 'Upload Recebido' },
    ai_process: { status: 'pending', label: 'Processamento IA' },
    db_save: { status: 'pending', label: 'Estruturação de Dados' },
    plan_gen: { status: 'pending', label: 'Geração do Plano' },
    analysis: { status: 'pending', label: 'Análise do Gestor' },
  };

  const status = inspection.status;
  const stages = new Set(inspection.processingLogs.map((entry) => entry.stage));

  // A rejection without a scoring log stopped at the scoring step.
  if (
    stages.has('ai_process') ||
    (status !== InspectionStatus.PROCESSING && status !== InspectionStatus.REJECTED)
  ) {
    steps.ai_process.status = 'completed';
  }
  if (hasPlan || stages.has('db_save')) {
    steps.ai_process.status = 'completed';
    steps.db_save.status = 'completed';
  }
  if (hasPlan) {
    steps.plan_gen.status = 'completed';
  }

  if (status === InspectionStatus.PENDING_MANAGER_REVIEW || REVIEWED_STATUSES.includes(status)) {
    steps.db_save.status = 'completed';
    steps.plan_gen.status = 'completed';
    if (REVIEWED_STATUSES.includes(status)) {
      steps.analysis.status = 'completed';
      if (status === InspectionStatus.APPROVED) {
        steps.analysis.label = 'Aprovado';
      }
    } else {
      steps.analysis.status = 'current';
    }
  }

  const firstIncomplete = TRACKER_STEP_ORDER.find((key) => steps[key].status !== 'completed');
  if (firstIncomplete) {
    if (status === InspectionStatus.REJECTED) {
      steps[firstIncomplete].status = 'error';
    } else if (status === InspectionStatus.PROCESSING) {
      steps[firstIncomplete].status = 'current';
    }
  }

  return steps;
}

export function getTrackerData(inspection: Inspection, hasPlan: boolean): TrackerData {
  return {
    id: inspection.id,
    filename: inspection.processedFilename || 'Arquivo',
    status: inspection.status,
    steps: getTrackerSteps(inspection, hasPlan),
    logs: inspection.processingLogs.slice(-RECENT_LOG_COUNT).map((entry) => entry.message),
  };
}
