/**
 * Plan Service
 *
 * Manager edits and approval of an action plan, consultant review of the approved plan,
 * and final verification. Every operation loads the inspection, its plan and its
 * establishment, checks the actor, mutates the aggregates and saves them.
 */

import type { ActionPlan } from '@vistoria/domain/action-plan';
import { ActionPlanItem, ActionPlanItemStatus } from '@vistoria/domain/action-plan-item';
import { Email } from '@vistoria/domain/email';
import type { Establishment } from '@vistoria/domain/establishment';
import {
  ActionPlanNotFoundError,
  BusinessRuleViolationError,
  EstablishmentNotFoundError,
  InspectionNotFoundError,
  InvalidStatusTransitionError,
  NotFoundError,
  UnauthorizedError,
  ValidationError,
} from '@vistoria/domain/errors';
import { InspectionStatus, canTransition, type Inspection } from '@vistoria/domain/inspection';
import { Phone } from '@vistoria/domain/phone';
import { SeverityLevel, isSeverityLevel } from '@vistoria/domain/score';
import type { ActionPlanItemId, ISODate, InspectionId } from '@vistoria/domain/types';
import type { User } from '@vistoria/domain/user';
import type { WorkflowConfig } from './config.js';
import type { Logger } from './logger.js';
import type { Repositories } from './repositories.js';

export interface PlanItemEdit {
  /** Absent for a new item. */
  id?: ActionPlanItemId;
  problem?: string;
  action?: string;
  legalBasis?: string | null;
  severity?: string;
  deadline?: string;
  currentStatus?: string;
  notes?: string;
  sector?: string | null;
}

export interface PlanEdits {
  summary?: string;
  strengths?: string;
  items?: PlanItemEdit[];
  removedItemIds?: ActionPlanItemId[];
  responsibleName?: string;
  responsibleEmail?: string;
  responsiblePhone?: string;
}

export interface ReviewUpdate {
  id: ActionPlanItemId;
  status?: ActionPlanItemStatus;
  notes?: string;
  currentStatus?: string;
  evidenceImageUrl?: string;
}

export interface ApprovalResult {
  plan: ActionPlan;
  inspection: Inspection;
  whatsappLink: string | null;
}

interface PlanContext {
  inspection: Inspection;
  plan: ActionPlan;
  establishment: Establishment;
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const BR_DATE = /^(\d{2})\/(\d{2})\/(\d{4})$/;

/**
 * Reads "2024-03-15" or "15/03/2024" as an ISO date. Free text ("30 dias") yields null.
 */
export function parseDeadlineDate(text: string | null | undefined): ISODate | null {
  if (!text) return null;
  const value = text.trim();

  let year: number;
  let month: number;
  let day: number;
  const iso = ISO_DATE.exec(value);
  const br = BR_DATE.exec(value);
  if (iso) {
    [year, month, day] = [Number(iso[1]), Number(iso[2]), Number(iso[3])];
  } else if (br) {
    [day, month, year] = [Number(br[1]), Number(br[2]), Number(br[3])];
  } else {
    return null;
  }

  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date.toISOString().slice(0, 10);
}

function parseSeverity(value: string): SeverityLevel {
  const normalized = value.trim().toUpperCase();
  return isSeverityLevel(normalized) ? normalized : SeverityLevel.MEDIUM;
}

/**
 * Admins reach every establishment; managers those of their company;
 * consultants those assigned to them.
 */
export function canActOn(actor: User, establishment: Establishment): boolean {
  if (!actor.isActive) return false;
  if (actor.isAdmin) return true;
  if (actor.isManager) {
    return actor.companyId !== null && actor.companyId === establishment.companyId;
  }
  return actor.canAccessEstablishment(establishment.id);
}

export class PlanService {
  constructor(
    private readonly repos: Repositories,
    private readonly config: WorkflowConfig,
    private readonly logger: Logger
  ) {}

  async savePlan(inspectionId: InspectionId, edits: PlanEdits, actor: User): Promise<ActionPlan> {
    const { inspection, plan, establishment } = await this.load(inspectionId);
    this.authorize(actor, establishment, false);

    if (plan.isApproved) {
      throw new BusinessRuleViolationError(
        'Este plano já foi aprovado e não pode mais ser editado.',
        'ALREADY_APPROVED'
      );
    }
    if (!inspection.isEditable) {
      throw new BusinessRuleViolationError(
        `Inspeção com status '${inspection.status}' não pode ser editada`,
        'NOT_EDITABLE'
      );
    }

    // Everything that can fail is checked here, before the first mutation.
    const itemEdits = edits.items ?? [];
    const updated = itemEdits.flatMap((edit) => {
      if (!edit.id) return [];
      const item = this.requireItem(plan, edit.id);
      checkItemText(edit);
      return [{ edit, item }];
    });
    const created = itemEdits.filter((edit) => !edit.id).map(createItem);
    const removedIds = edits.removedItemIds ?? [];
    removedIds.forEach((itemId) => this.requireItem(plan, itemId));
    const responsibleEmail =
      edits.responsibleEmail ? new Email(edits.responsibleEmail) : edits.responsibleEmail;
    const responsiblePhone =
      edits.responsiblePhone ? new Phone(edits.responsiblePhone) : edits.responsiblePhone;

    if (edits.summary !== undefined) {
      plan.setSummary(edits.summary, edits.strengths);
    } else if (edits.strengths !== undefined) {
      plan.strengthsText = edits.strengths;
    }

    for (const { edit, item } of updated) {
      applyItemEdit(item, edit);
    }
    created.forEach((item) => plan.addItem(item));
    removedIds.forEach((itemId) => plan.removeItem(itemId));

    if (
      edits.responsibleName !== undefined ||
      edits.responsibleEmail !== undefined ||
      edits.responsiblePhone !== undefined
    ) {
      establishment.updateResponsible({
        name: edits.responsibleName,
        email: responsibleEmail,
        phone: responsiblePhone,
      });
      await this.repos.establishments.save(establishment);
    }

    plan.calculateStats();
    await this.repos.actionPlans.save(plan);

    this.logger.info('Plan saved', {
      inspectionId,
      planId: plan.id,
      items: plan.itemCount,
      actorId: actor.id,
    });
    return plan;
  }

  async approvePlan(inspectionId: InspectionId, actor: User): Promise<ApprovalResult> {
    const { inspection, plan, establishment } = await this.load(inspectionId);
    this.authorize(actor, establishment, true);

    if (!canTransition(inspection.status, InspectionStatus.APPROVED)) {
      throw new InvalidStatusTransitionError(
        inspection.status,
        InspectionStatus.APPROVED,
        'Inspection'
      );
    }

    plan.approve(actor.id);
    inspection.approve();
    if (this.config.approval.sendForVerification) {
      inspection.sendForVerification();
    }
    plan.calculateStats();

    await this.repos.actionPlans.save(plan);
    await this.repos.inspections.save(inspection);

    const whatsappLink = this.buildWhatsappLink(inspection, plan, establishment);
    this.logger.info('Plan approved', {
      inspectionId,
      planId: plan.id,
      actorId: actor.id,
      status: inspection.status,
    });

    return { plan, inspection, whatsappLink };
  }

  async rejectInspection(inspectionId: InspectionId, actor: User): Promise<Inspection> {
    const inspection = await this.requireInspection(inspectionId);
    const establishment = await this.requireEstablishment(inspection);
    this.authorize(actor, establishment, true);

    inspection.reject();
    await this.repos.inspections.save(inspection);

    this.logger.warn('Inspection rejected', { inspectionId, actorId: actor.id });
    return inspection;
  }

  /**
   * Consultant review of an approved plan. Item ids and evidence URLs are checked before any
   * change is made.
   */
  async saveReview(
    inspectionId: InspectionId,
    updates: ReviewUpdate[],
    actor: User
  ): Promise<ActionPlan> {
    const { inspection, plan, establishment } = await this.load(inspectionId);
    this.authorize(actor, establishment, false);

    if (
      inspection.status !== InspectionStatus.APPROVED &&
      inspection.status !== InspectionStatus.PENDING_CONSULTANT_VERIFICATION
    ) {
      throw new BusinessRuleViolationError(
        `Inspeção com status '${inspection.status}' não está em verificação`,
        'REVIEW_NOT_OPEN'
      );
    }

    const targets = updates.map((update) => {
      const item = this.requireItem(plan, update.id);
      if (update.evidenceImageUrl !== undefined && !update.evidenceImageUrl) {
        throw new ValidationError('URL da evidência não pode ser vazia', 'evidence_image_url');
      }
      return { update, item };
    });

    for (const { update, item } of targets) {
      if (update.status === ActionPlanItemStatus.RESOLVED) {
        item.resolve(update.notes);
      } else {
        if (update.status === ActionPlanItemStatus.OPEN) item.reopen();
        if (update.status === ActionPlanItemStatus.IN_PROGRESS) item.startProgress();
        if (update.notes !== undefined) item.updateContent({ notes: update.notes });
      }
      if (update.currentStatus !== undefined) {
        item.currentStatus = update.currentStatus;
      }
      if (update.evidenceImageUrl !== undefined) {
        item.addEvidence(update.evidenceImageUrl);
      }
    }

    plan.calculateStats();
    await this.repos.actionPlans.save(plan);

    this.logger.info('Review saved', {
      inspectionId,
      updated: targets.length,
      resolved: plan.resolvedItemsCount,
    });
    return plan;
  }

  async finalizeVerification(inspectionId: InspectionId, actor: User): Promise<Inspection> {
    const { inspection, plan, establishment } = await this.load(inspectionId);
    this.authorize(actor, establishment, false);

    inspection.complete();
    plan.calculateStats();

    await this.repos.inspections.save(inspection);
    await this.repos.actionPlans.save(plan);

    this.logger.info('Verification finalized', { inspectionId, actorId: actor.id });
    return inspection;
  }

  private buildWhatsappLink(
    inspection: Inspection,
    plan: ActionPlan,
    establishment: Establishment
  ): string | null {
    const phone = establishment.responsiblePhone;
    if (!phone) return null;

    const accessUrl = plan.finalPdfUrl ?? this.shareUrl(inspection.id);
    const name = establishment.responsibleName || 'Responsável';
    const message = `Olá ${name}, seu Plano de Ação para ${establishment.name} foi aprovado. Acesso: ${accessUrl}`;

    return `https://wa.me/${phone.whatsapp}?text=${encodeURIComponent(message)}`;
  }

  private shareUrl(inspectionId: InspectionId): string {
    const base = this.config.approval.shareBaseUrl;
    if (!base) return '';
    return `${base.replace(/\/+$/, '')}/plans/${inspectionId}`;
  }

  private authorize(actor: User, establishment: Establishment, approving: boolean): void {
    if (approving && !actor.canApprovePlans) {
      throw new UnauthorizedError('Apenas gestores podem aprovar ou rejeitar planos');
    }
    if (!canActOn(actor, establishment)) {
      throw new UnauthorizedError();
    }
  }

  private requireItem(plan: ActionPlan, itemId: ActionPlanItemId): ActionPlanItem {
    const item = plan.getItem(itemId);
    if (!item) {
      throw new NotFoundError('ActionPlanItem', itemId, 'Item do plano');
    }
    return item;
  }

  private async load(inspectionId: InspectionId): Promise<PlanContext> {
    const inspection = await this.requireInspection(inspectionId);
    const plan = await this.repos.actionPlans.findByInspectionId(inspection.id);
    if (!plan) {
      throw new ActionPlanNotFoundError();
    }
    const establishment = await this.requireEstablishment(inspection);
    return { inspection, plan, establishment };
  }

  private async requireInspection(inspectionId: InspectionId): Promise<Inspection> {
    const inspection = await this.repos.inspections.findById(inspectionId);
    if (!inspection) {
      throw new InspectionNotFoundError(inspectionId);
    }
    return inspection;
  }

  private async requireEstablishment(inspection: Inspection): Promise<Establishment> {
    if (!inspection.establishmentId) {
      throw new EstablishmentNotFoundError();
    }
    const establishment = await this.repos.establishments.findById(inspection.establishmentId);
    if (!establishment) {
      throw new EstablishmentNotFoundError(inspection.establishmentId);
    }
    return establishment;
  }
}

/**
 * Same rules as ActionPlanItem.updateContent, applied ahead of time.
 */
function checkItemText(edit: PlanItemEdit): void {
  if (edit.problem !== undefined && !edit.problem.trim()) {
    throw new ValidationError('Descrição do problema não pode ser vazia', 'problem_description');
  }
  if (edit.action !== undefined && !edit.action.trim()) {
    throw new ValidationError('Ação corretiva não pode ser vazia', 'corrective_action');
  }
}

function applyItemEdit(item: ActionPlanItem, edit: PlanItemEdit): void {
  if (edit.problem !== undefined || edit.action !== undefined || edit.notes !== undefined) {
    item.updateContent({ problem: edit.problem, action: edit.action, notes: edit.notes });
  }
  if (edit.legalBasis !== undefined) item.legalBasis = edit.legalBasis;
  if (edit.sector !== undefined) item.sector = edit.sector;
  if (edit.currentStatus !== undefined) item.currentStatus = edit.currentStatus;
  if (edit.severity !== undefined) item.setSeverity(parseSeverity(edit.severity));
  if (edit.deadline) item.setDeadline(edit.deadline, parseDeadlineDate(edit.deadline));
}

function createItem(edit: PlanItemEdit): ActionPlanItem {
  return new ActionPlanItem({
    problemDescription: edit.problem ?? '',
    correctiveAction: edit.action ?? '',
    legalBasis: edit.legalBasis,
    sector: edit.sector,
    severity: edit.severity ? parseSeverity(edit.severity) : SeverityLevel.MEDIUM,
    deadlineText: edit.deadline || null,
    deadlineDate: parseDeadlineDate(edit.deadline),
    managerNotes: edit.notes,
    currentStatus: edit.currentStatus ?? 'Pendente',
  });
}
