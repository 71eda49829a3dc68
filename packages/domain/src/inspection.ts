/**
 * Inspection Entity
 *
 * One uploaded sanitary-inspection report moving through the review workflow:
 * PROCESSING → PENDING_MANAGER_REVIEW → APPROVED → PENDING_CONSULTANT_VERIFICATION → COMPLETED
 * REJECTED is reachable from PROCESSING and PENDING_MANAGER_REVIEW.
 * Every status change is checked against INSPECTION_TRANSITIONS before it is applied.
 */

import { Entity } from './entity.js';
import { InvalidStatusTransitionError, ValidationError } from './errors.js';
import type { ContentHash, EntitySnapshot, EstablishmentId, ISOTimestamp } from './types.js';

export enum InspectionStatus {
  PROCESSING = 'PROCESSING',
  PENDING_MANAGER_REVIEW = 'PENDING_MANAGER_REVIEW',
  APPROVED = 'APPROVED',
  PENDING_CONSULTANT_VERIFICATION = 'PENDING_CONSULTANT_VERIFICATION',
  COMPLETED = 'COMPLETED',
  REJECTED = 'REJECTED',
}

export const INSPECTION_TRANSITIONS: Readonly<Record<InspectionStatus, readonly InspectionStatus[]>> = {
  [InspectionStatus.PROCESSING]: [InspectionStatus.PENDING_MANAGER_REVIEW, InspectionStatus.REJECTED],
  [InspectionStatus.PENDING_MANAGER_REVIEW]: [InspectionStatus.APPROVED, InspectionStatus.REJECTED],
  [InspectionStatus.APPROVED]: [
    InspectionStatus.PENDING_CONSULTANT_VERIFICATION,
    InspectionStatus.COMPLETED,
  ],
  [InspectionStatus.PENDING_CONSULTANT_VERIFICATION]: [InspectionStatus.COMPLETED],
  [InspectionStatus.COMPLETED]: [],
  [InspectionStatus.REJECTED]: [],
};

const STATUS_LABELS: Record<InspectionStatus, string> = {
  [InspectionStatus.PROCESSING]: 'Processando',
  [InspectionStatus.PENDING_MANAGER_REVIEW]: 'Aguardando Revisão',
  [InspectionStatus.APPROVED]: 'Aprovado',
  [InspectionStatus.PENDING_CONSULTANT_VERIFICATION]: 'Aguardando Verificação',
  [InspectionStatus.COMPLETED]: 'Concluído',
  [InspectionStatus.REJECTED]: 'Rejeitado',
};

// complete() accepts both predecessors of COMPLETED explicitly.
const COMPLETABLE_FROM: readonly InspectionStatus[] = [
  InspectionStatus.APPROVED,
  InspectionStatus.PENDING_CONSULTANT_VERIFICATION,
];

export function statusLabel(status: InspectionStatus): string {
  return STATUS_LABELS[status];
}

export function canTransition(from: InspectionStatus, to: InspectionStatus): boolean {
  return INSPECTION_TRANSITIONS[from].includes(to);
}

export function isTerminalStatus(status: InspectionStatus): boolean {
  return INSPECTION_TRANSITIONS[status].length === 0;
}

export function isEditableStatus(status: InspectionStatus): boolean {
  return (
    status === InspectionStatus.PENDING_MANAGER_REVIEW || status === InspectionStatus.APPROVED
  );
}

export interface ProcessingLogEntry {
  message: string;
  timestamp: ISOTimestamp;
  stage: string | null;
}

export interface InspectionProps {
  driveFileId: string;
  establishmentId?: EstablishmentId | null;
  status?: InspectionStatus;
  driveWebLink?: string | null;
  fileHash?: ContentHash | null;
  aiRawResponse?: Record<string, unknown> | null;
  processingLogs?: ProcessingLogEntry[];
  processedFilename?: string | null;
}

export class Inspection extends Entity {
  readonly driveFileId: string;
  establishmentId: EstablishmentId | null;
  driveWebLink: string | null;
  fileHash: ContentHash | null;
  processedFilename: string | null;
  private _status: InspectionStatus;
  private _aiRawResponse: Record<string, unknown> | null;
  private readonly _processingLogs: ProcessingLogEntry[];

  constructor(props: InspectionProps, snapshot?: EntitySnapshot) {
    super(snapshot);
    if (!props.driveFileId) {
      throw new ValidationError('ID do arquivo no Drive é obrigatório', 'drive_file_id');
    }
    this.driveFileId = props.driveFileId;
    this.establishmentId = props.establishmentId ?? null;
    this.driveWebLink = props.driveWebLink ?? null;
    this.fileHash = props.fileHash ?? null;
    this.processedFilename = props.processedFilename ?? null;
    this._status = props.status ?? InspectionStatus.PROCESSING;
    this._aiRawResponse = props.aiRawResponse ?? null;
    this._processingLogs = [...(props.processingLogs ?? [])];
  }

  /**
   * New inspections always start in PROCESSING.
   */
  static create(input: {
    driveFileId: string;
    establishmentId: EstablishmentId;
    fileHash?: ContentHash;
    driveWebLink?: string;
    processedFilename?: string;
  }): Inspection {
    return new Inspection({ ...input, status: InspectionStatus.PROCESSING });
  }

  get status(): InspectionStatus {
    return this._status;
  }

  get aiRawResponse(): Record<string, unknown> | null {
    return this._aiRawResponse;
  }

  get processingLogs(): ProcessingLogEntry[] {
    return this._processingLogs.map((entry) => ({ ...entry }));
  }

  get isProcessing(): boolean {
    return this._status === InspectionStatus.PROCESSING;
  }

  get isPendingReview(): boolean {
    return this._status === InspectionStatus.PENDING_MANAGER_REVIEW;
  }

  get isApproved(): boolean {
    return this._status === InspectionStatus.APPROVED;
  }

  get isCompleted(): boolean {
    return this._status === InspectionStatus.COMPLETED;
  }

  get isRejected(): boolean {
    return this._status === InspectionStatus.REJECTED;
  }

  get isEditable(): boolean {
    return isEditableStatus(this._status);
  }

  get isTerminal(): boolean {
    return isTerminalStatus(this._status);
  }

  transitionTo(newStatus: InspectionStatus): void {
    if (!canTransition(this._status, newStatus)) {
      throw new InvalidStatusTransitionError(this._status, newStatus, 'Inspection');
    }
    this._status = newStatus;
    this.markUpdated();
  }

  markProcessingComplete(): void {
    this.transitionTo(InspectionStatus.PENDING_MANAGER_REVIEW);
  }

  approve(): void {
    this.transitionTo(InspectionStatus.APPROVED);
  }

  reject(): void {
    this.transitionTo(InspectionStatus.REJECTED);
  }

  sendForVerification(): void {
    this.transitionTo(InspectionStatus.PENDING_CONSULTANT_VERIFICATION);
  }

  complete(): void {
    if (!COMPLETABLE_FROM.includes(this._status)) {
      throw new InvalidStatusTransitionError(
        this._status,
        InspectionStatus.COMPLETED,
        'Inspection'
      );
    }
    this._status = InspectionStatus.COMPLETED;
    this.markUpdated();
  }

  /**
   * Append-only; does not touch updatedAt.
   */
  addProcessingLog(message: string, stage?: string | null): void {
    this._processingLogs.push({
      message,
      timestamp: new Date().toISOString(),
      stage: stage ?? null,
    });
  }

  setAiResponse(response: Record<string, unknown>): void {
    this._aiRawResponse = response;
    this.markUpdated();
  }

  /**
   * An inspection without a hash is never a duplicate.
   */
  isDuplicateOf(fileHash: ContentHash): boolean {
    return this.fileHash ? this.fileHash === fileHash : false;
  }

  toString(): string {
    return `Inspection(${this.driveFileId.slice(0, 8)}..., ${statusLabel(this._status)})`;
  }
}
