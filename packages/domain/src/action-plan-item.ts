/**
 * ActionPlanItem Entity
 *
 * One non-compliance finding and its corrective action.
 * originalScore/originalStatus hold what the scoring step reported, verbatim, for audit and
 * model retraining; status changes never touch them.
 *
 * Status moves are operator-driven corrections, so resolve/reopen/startProgress are
 * unguarded toggles, unlike the Inspection workflow.
 */

import { Entity } from './entity.js';
import { ValidationError } from './errors.js';
import { Score, SeverityLevel, severityFromScore } from './score.js';
import type { EntitySnapshot, ISODate } from './types.js';

export enum ActionPlanItemStatus {
  OPEN = 'OPEN',
  IN_PROGRESS = 'IN_PROGRESS',
  RESOLVED = 'RESOLVED',
}

const ITEM_STATUS_LABELS: Record<ActionPlanItemStatus, string> = {
  [ActionPlanItemStatus.OPEN]: 'Pendente',
  [ActionPlanItemStatus.IN_PROGRESS]: 'Em Andamento',
  [ActionPlanItemStatus.RESOLVED]: 'Corrigido',
};

export function itemStatusLabel(status: ActionPlanItemStatus): string {
  return ITEM_STATUS_LABELS[status];
}

export interface ActionPlanItemProps {
  problemDescription: string;
  correctiveAction: string;
  legalBasis?: string | null;
  deadlineDate?: ISODate | null;
  deadlineText?: string | null;
  aiSuggestedDeadline?: string | null;
  severity?: SeverityLevel;
  sector?: string | null;
  orderIndex?: number;
  status?: ActionPlanItemStatus;
  currentStatus?: string | null;
  originalStatus?: string | null;
  originalScore?: number | null;
  managerNotes?: string | null;
  evidenceImageUrl?: string | null;
}

/**
 * A scored finding as produced by the external scoring step.
 */
export interface AiFinding {
  problem: string;
  action: string;
  sector?: string | null;
  legalBasis?: string | null;
  deadline?: string | null;
  status?: string | null;
  score?: number | null;
  order?: number;
}

function requireText(value: string | undefined, message: string, field: string): string {
  if (!value || !value.trim()) {
    throw new ValidationError(message, field);
  }
  return value.trim();
}

export class ActionPlanItem extends Entity {
  problemDescription: string;
  correctiveAction: string;
  legalBasis: string | null;
  deadlineDate: ISODate | null;
  deadlineText: string | null;
  readonly aiSuggestedDeadline: string | null;
  severity: SeverityLevel;
  sector: string | null;
  status: ActionPlanItemStatus;
  currentStatus: string | null;
  readonly originalStatus: string | null;
  readonly originalScore: number | null;
  managerNotes: string | null;
  evidenceImageUrl: string | null;
  private _orderIndex: number;

  constructor(props: ActionPlanItemProps, snapshot?: EntitySnapshot) {
    super(snapshot);
    this.problemDescription = requireText(
      props.problemDescription,
      'Descrição do problema é obrigatória',
      'problem_description'
    );
    this.correctiveAction = requireText(
      props.correctiveAction,
      'Ação corretiva é obrigatória',
      'corrective_action'
    );
    this.legalBasis = props.legalBasis ?? null;
    this.deadlineDate = props.deadlineDate ?? null;
    this.deadlineText = props.deadlineText ?? null;
    this.aiSuggestedDeadline = props.aiSuggestedDeadline ?? null;
    this.severity = props.severity ?? SeverityLevel.MEDIUM;
    this.sector = props.sector ?? null;
    this._orderIndex = props.orderIndex ?? 0;
    this.status = props.status ?? ActionPlanItemStatus.OPEN;
    this.currentStatus = props.currentStatus ?? null;
    this.originalStatus = props.originalStatus ?? null;
    this.originalScore = props.originalScore ?? null;
    this.managerNotes = props.managerNotes ?? null;
    this.evidenceImageUrl = props.evidenceImageUrl ?? null;
  }

  /**
   * Builds an item from a scored finding. Severity follows the score (MEDIUM without one);
   * a score outside 0-10 is rejected here rather than stored.
   */
  static fromAiResponse(finding: AiFinding): ActionPlanItem {
    let severity = SeverityLevel.MEDIUM;
    if (finding.score !== undefined && finding.score !== null) {
      severity = new Score(finding.score, finding.status).severity;
    }

    return new ActionPlanItem({
      problemDescription: finding.problem,
      correctiveAction: finding.action,
      sector: finding.sector,
      legalBasis: finding.legalBasis,
      aiSuggestedDeadline: finding.deadline,
      deadlineText: finding.deadline,
      originalStatus: finding.status,
      originalScore: finding.score,
      severity,
      orderIndex: finding.order ?? 0,
    });
  }

  get orderIndex(): number {
    return this._orderIndex;
  }

  /**
   * @internal Position is owned by the containing ActionPlan, which re-stamps it from the
   * item's place in the plan whenever its items are read.
   */
  assignOrder(index: number): void {
    this._orderIndex = index;
  }

  get isResolved(): boolean {
    return this.status === ActionPlanItemStatus.RESOLVED;
  }

  get isOpen(): boolean {
    return this.status === ActionPlanItemStatus.OPEN;
  }

  get isInProgress(): boolean {
    return this.status === ActionPlanItemStatus.IN_PROGRESS;
  }

  get hasEvidence(): boolean {
    return Boolean(this.evidenceImageUrl);
  }

  /**
   * Throws ValidationError for a stored score outside 0-10.
   */
  get score(): Score | null {
    if (this.originalScore === null) return null;
    return new Score(this.originalScore, this.originalStatus);
  }

  resolve(notes?: string): void {
    this.status = ActionPlanItemStatus.RESOLVED;
    this.currentStatus = 'Corrigido';
    if (notes) {
      this.managerNotes = notes;
    }
    this.markUpdated();
  }

  reopen(): void {
    this.status = ActionPlanItemStatus.OPEN;
    this.currentStatus = 'Reaberto';
    this.markUpdated();
  }

  startProgress(): void {
    this.status = ActionPlanItemStatus.IN_PROGRESS;
    this.currentStatus = 'Em Verificação';
    this.markUpdated();
  }

  addEvidence(imageUrl: string): void {
    if (!imageUrl) {
      throw new ValidationError('URL da evidência não pode ser vazia', 'evidence_image_url');
    }
    this.evidenceImageUrl = imageUrl;
    this.markUpdated();
  }

  setSeverity(severity: SeverityLevel): void {
    this.severity = severity;
    this.markUpdated();
  }

  /**
   * Text that matches the original suggestion is not recorded as an edit.
   */
  setDeadline(text: string, date: ISODate | null): void {
    if (text !== this.aiSuggestedDeadline) {
      this.deadlineText = text;
    }
    this.deadlineDate = date;
    this.markUpdated();
  }

  /**
   * Manager edits. Only supplied fields change; blank problem or action is rejected
   * before anything is assigned.
   */
  updateContent(changes: {
    problem?: string;
    action?: string;
    deadlineText?: string;
    notes?: string;
  }): void {
    const problem =
      changes.problem === undefined
        ? this.problemDescription
        : requireText(changes.problem, 'Descrição do problema não pode ser vazia', 'problem_description');
    const action =
      changes.action === undefined
        ? this.correctiveAction
        : requireText(changes.action, 'Ação corretiva não pode ser vazia', 'corrective_action');

    this.problemDescription = problem;
    this.correctiveAction = action;
    if (changes.deadlineText !== undefined) {
      this.deadlineText = changes.deadlineText;
    }
    if (changes.notes !== undefined) {
      this.managerNotes = changes.notes;
    }
    this.markUpdated();
  }

  toString(): string {
    const sector = this.sector ? `[${this.sector}] ` : '';
    return `ActionPlanItem(${sector}${this.problemDescription.slice(0, 30)}...)`;
  }
}
