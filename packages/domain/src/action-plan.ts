/**
 * ActionPlan Aggregate
 *
 * The corrective-action plan of one inspection. Owns its items: they are added, removed and
 * looked up only through the plan, which keeps orderIndex a contiguous 0-based sequence.
 *
 * statsJson is a cache. Only calculateStats() and setStats() write it; item mutations leave
 * it stale until the caller recomputes.
 */

import { Entity } from './entity.js';
import { BusinessRuleViolationError, ValidationError } from './errors.js';
import { SeverityLevel } from './score.js';
import { ActionPlanItem } from './action-plan-item.js';
import type {
  ActionPlanItemId,
  EntitySnapshot,
  ISOTimestamp,
  InspectionId,
  UserId,
} from './types.js';

export const DEFAULT_SECTOR = 'Geral';

export interface SeverityBreakdown {
  total: number;
  resolved: number;
}

export interface SectorBreakdown {
  total: number;
  resolved: number;
  avg_score: number | null;
}

/**
 * Shape consumed by report renderers; keys are part of the contract.
 */
export interface ActionPlanStats {
  total_items: number;
  resolved_items: number;
  resolution_percentage: number;
  by_severity: Partial<Record<SeverityLevel, SeverityBreakdown>>;
  by_sector: Record<string, SectorBreakdown>;
  // Overall figures stored by the scoring step, when present.
  score?: number | null;
  percentage?: number | null;
}

export type EmptyStats = Record<string, never>;

export function hasStats(stats: ActionPlanStats | EmptyStats | null): stats is ActionPlanStats {
  return stats !== null && 'total_items' in stats;
}

export interface ActionPlanProps {
  inspectionId: InspectionId;
  summaryText?: string | null;
  strengthsText?: string | null;
  statsJson?: ActionPlanStats | null;
  approvedById?: UserId | null;
  approvedAt?: ISOTimestamp | null;
  finalPdfUrl?: string | null;
  items?: ActionPlanItem[];
}

export class ActionPlan extends Entity {
  readonly inspectionId: InspectionId;
  summaryText: string | null;
  strengthsText: string | null;
  finalPdfUrl: string | null;
  private _statsJson: ActionPlanStats | null;
  private _approvedById: UserId | null;
  private _approvedAt: ISOTimestamp | null;
  private _items: ActionPlanItem[];

  constructor(props: ActionPlanProps, snapshot?: EntitySnapshot) {
    super(snapshot);
    if (!props.inspectionId) {
      throw new ValidationError('ID da inspeção é obrigatório', 'inspection_id');
    }
    this.inspectionId = props.inspectionId;
    this.summaryText = props.summaryText ?? null;
    this.strengthsText = props.strengthsText ?? null;
    this.finalPdfUrl = props.finalPdfUrl ?? null;
    this._statsJson = props.statsJson ?? null;
    this._approvedById = props.approvedById ?? null;
    this._approvedAt = props.approvedAt ?? null;
    // Stored orderIndex decides the rehydrated sequence; gaps and duplicates are renumbered.
    this._items = [...(props.items ?? [])].sort((a, b) => a.orderIndex - b.orderIndex);
    this.renumber();
  }

  static create(inspectionId: InspectionId): ActionPlan {
    return new ActionPlan({ inspectionId });
  }

  /**
   * Sorted by (sector or "", orderIndex). Unsectored items come first.
   */
  get items(): ActionPlanItem[] {
    this.renumber();
    return [...this._items].sort((a, b) => {
      const sectorA = a.sector ?? '';
      const sectorB = b.sector ?? '';
      if (sectorA !== sectorB) return sectorA < sectorB ? -1 : 1;
      return a.orderIndex - b.orderIndex;
    });
  }

  get itemCount(): number {
    return this._items.length;
  }

  get openItemsCount(): number {
    return this._items.filter((item) => item.isOpen).length;
  }

  get resolvedItemsCount(): number {
    return this._items.filter((item) => item.isResolved).length;
  }

  /**
   * Always computed from the live items, independent of statsJson.
   */
  get resolutionPercentage(): number {
    if (this._items.length === 0) return 0;
    return (this.resolvedItemsCount / this._items.length) * 100;
  }

  get statsJson(): ActionPlanStats | null {
    return this._statsJson;
  }

  get approvedById(): UserId | null {
    return this._approvedById;
  }

  get approvedAt(): ISOTimestamp | null {
    return this._approvedAt;
  }

  get isApproved(): boolean {
    return this._approvedById !== null;
  }

  get hasPdf(): boolean {
    return Boolean(this.finalPdfUrl);
  }

  get sectors(): string[] {
    const sectors = new Set<string>();
    for (const item of this._items) {
      if (item.sector) sectors.add(item.sector);
    }
    return [...sectors].sort();
  }

  get itemsBySector(): Record<string, ActionPlanItem[]> {
    const grouped: Record<string, ActionPlanItem[]> = {};
    for (const item of this.items) {
      const sector = item.sector || DEFAULT_SECTOR;
      if (!grouped[sector]) {
        grouped[sector] = [];
      }
      grouped[sector].push(item);
    }
    return grouped;
  }

  get overallScore(): number | null {
    return this._statsJson?.score ?? null;
  }

  get overallPercentage(): number | null {
    return this._statsJson?.percentage ?? null;
  }

  addItem(item: ActionPlanItem): void {
    item.assignOrder(this._items.length);
    this._items.push(item);
    this.markUpdated();
  }

  /**
   * Removes by id and renumbers the remaining items 0..n-1.
   */
  removeItem(itemId: ActionPlanItemId): void {
    this._items = this._items.filter((item) => item.id !== itemId);
    this.renumber();
    this.markUpdated();
  }

  getItem(itemId: ActionPlanItemId): ActionPlanItem | null {
    this.renumber();
    return this._items.find((item) => item.id === itemId) ?? null;
  }

  /**
   * Position in the plan is the source of truth for orderIndex.
   */
  private renumber(): void {
    this._items.forEach((item, index) => {
      if (item.orderIndex !== index) item.assignOrder(index);
    });
  }

  /**
   * One-shot: a second approval fails whoever the approver is.
   */
  approve(approverId: UserId): void {
    if (this.isApproved) {
      throw new BusinessRuleViolationError('Plano já foi aprovado', 'ALREADY_APPROVED');
    }
    this._approvedById = approverId;
    this._approvedAt = new Date().toISOString();
    this.markUpdated();
  }

  setStats(stats: ActionPlanStats): void {
    this._statsJson = stats;
    this.markUpdated();
  }

  setSummary(summary: string, strengths?: string): void {
    this.summaryText = summary;
    if (strengths) {
      this.strengthsText = strengths;
    }
    this.markUpdated();
  }

  setPdfUrl(url: string): void {
    this.finalPdfUrl = url;
    this.markUpdated();
  }

  /**
   * Recomputes statistics from the current items and replaces statsJson.
   * With no items, returns an empty object and leaves statsJson untouched.
   * Overall score/percentage already stored are carried over.
   */
  calculateStats(): ActionPlanStats | EmptyStats {
    if (this._items.length === 0) return {};

    const bySeverity: Partial<Record<SeverityLevel, SeverityBreakdown>> = {};
    const sectorScores: Record<string, { total: number; resolved: number; scores: number[] }> = {};
    let resolved = 0;

    for (const item of this._items) {
      if (item.isResolved) resolved += 1;

      const severity = bySeverity[item.severity] ?? { total: 0, resolved: 0 };
      severity.total += 1;
      if (item.isResolved) severity.resolved += 1;
      bySeverity[item.severity] = severity;

      const sectorName = item.sector || DEFAULT_SECTOR;
      const sector = sectorScores[sectorName] ?? { total: 0, resolved: 0, scores: [] };
      sectorScores[sectorName] = sector;
      sector.total += 1;
      if (item.isResolved) sector.resolved += 1;
      if (item.originalScore !== null) sector.scores.push(item.originalScore);
    }

    const bySector: Record<string, SectorBreakdown> = {};
    for (const [name, data] of Object.entries(sectorScores)) {
      bySector[name] = {
        total: data.total,
        resolved: data.resolved,
        avg_score:
          data.scores.length > 0
            ? data.scores.reduce((sum, score) => sum + score, 0) / data.scores.length
            : null,
      };
    }

    const total = this._items.length;
    const stats: ActionPlanStats = {
      total_items: total,
      resolved_items: resolved,
      resolution_percentage: (resolved / total) * 100,
      by_severity: bySeverity,
      by_sector: bySector,
    };
    if (this._statsJson?.score !== undefined) stats.score = this._statsJson.score;
    if (this._statsJson?.percentage !== undefined) stats.percentage = this._statsJson.percentage;

    this._statsJson = stats;
    return stats;
  }

  toString(): string {
    return `ActionPlan(${this.itemCount} itens, ${this.isApproved ? 'Aprovado' : 'Pendente'})`;
  }
}
