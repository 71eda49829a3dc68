/**
 * Ingestion Service
 *
 * Turns an uploaded PDF report into an Inspection, refuses duplicates by content hash, and
 * records the outcome of the external scoring step (a plan, or a rejection).
 */

import { createHash, randomUUID } from 'node:crypto';
import { Inspection } from '@vistoria/domain/inspection';
import type { ActionPlan } from '@vistoria/domain/action-plan';
import {
  BusinessRuleViolationError,
  DuplicateFileError,
  EstablishmentNotFoundError,
  InspectionAlreadyProcessedError,
  InspectionNotFoundError,
  ValidationError,
} from '@vistoria/domain/errors';
import type { ContentHash, EstablishmentId, InspectionId } from '@vistoria/domain/types';
import { buildActionPlan, parseAiAnalysis } from './ai-findings.js';
import type { WorkflowConfig } from './config.js';
import type { Logger } from './logger.js';
import type { Repositories } from './repositories.js';

export interface IngestInput {
  content: Uint8Array;
  filename: string;
  establishmentId: EstablishmentId;
  driveFileId?: string;
  driveWebLink?: string;
}

const PDF_SIGNATURE = [0x25, 0x50, 0x44, 0x46]; // %PDF

/**
 * True when the content starts with the PDF header, whatever the filename says.
 */
export function isPdf(content: Uint8Array): boolean {
  return (
    content.byteLength >= PDF_SIGNATURE.length &&
    PDF_SIGNATURE.every((byte, index) => content[index] === byte)
  );
}

function extensionOf(filename: string): string {
  const dot = filename.lastIndexOf('.');
  return dot > 0 ? filename.slice(dot).toLowerCase() : '';
}

/**
 * SHA-256 of the raw file bytes.
 */
export function computeFileHash(content: Uint8Array): ContentHash {
  return createHash('sha256').update(content).digest('hex');
}

export class IngestionService {
  constructor(
    private readonly repos: Repositories,
    private readonly config: WorkflowConfig,
    private readonly logger: Logger
  ) {}

  async ingest(input: IngestInput): Promise<Inspection> {
    if (input.content.byteLength === 0) {
      throw new ValidationError('Arquivo vazio', 'file');
    }
    if (input.content.byteLength > this.config.upload.maxBytes) {
      throw new ValidationError(
        `Arquivo excede o limite de ${this.config.upload.maxBytes} bytes`,
        'file'
      );
    }
    if (!isPdf(input.content)) {
      this.logger.warn('Unrecognized file type', { filename: input.filename });
      throw new ValidationError('Tipo de arquivo não reconhecido. Envie um PDF válido.', 'file');
    }
    const extension = extensionOf(input.filename);
    if (extension !== '.pdf') {
      throw new ValidationError(
        extension
          ? `Extensão do arquivo (${extension}) não corresponde ao conteúdo (pdf)`
          : 'Arquivo sem extensão',
        'file'
      );
    }

    const establishment = await this.repos.establishments.findById(input.establishmentId);
    if (!establishment) {
      throw new EstablishmentNotFoundError(input.establishmentId);
    }
    if (!establishment.isActive) {
      throw new BusinessRuleViolationError(
        `Estabelecimento '${establishment.name}' está inativo`,
        'ESTABLISHMENT_INACTIVE'
      );
    }

    const fileHash = computeFileHash(input.content);
    const existing = await this.repos.inspections.findByFileHash(fileHash);
    const duplicate = existing.find(
      (inspection) => !inspection.isRejected && inspection.isDuplicateOf(fileHash)
    );
    if (duplicate) {
      this.logger.warn('Duplicate upload skipped', {
        filename: input.filename,
        existingInspectionId: duplicate.id,
      });
      throw new DuplicateFileError(fileHash);
    }

    const inspection = Inspection.create({
      driveFileId: input.driveFileId ?? `upload:${randomUUID()}`,
      establishmentId: establishment.id,
      fileHash,
      driveWebLink: input.driveWebLink,
      processedFilename: input.filename,
    });
    inspection.addProcessingLog('Upload recebido', 'upload');

    await this.repos.inspections.save(inspection);
    this.logger.info('Inspection created', {
      inspectionId: inspection.id,
      establishmentId: establishment.id,
      filename: input.filename,
    });

    return inspection;
  }

  /**
   * Stores the scoring payload, builds the action plan and hands the inspection to
   * manager review. Only a PROCESSING inspection accepts an analysis.
   */
  async recordAnalysis(
    inspectionId: InspectionId,
    rawResponse: Record<string, unknown>
  ): Promise<ActionPlan> {
    const inspection = await this.requireInspection(inspectionId);
    if (!inspection.isProcessing) {
      throw new InspectionAlreadyProcessedError(inspectionId);
    }

    inspection.setAiResponse(rawResponse);
    inspection.addProcessingLog('Resposta da IA recebida', 'ai_process');

    const analysis = parseAiAnalysis(rawResponse);
    const plan = buildActionPlan(inspection.id, analysis);
    await this.repos.actionPlans.save(plan);
    inspection.addProcessingLog(`Plano salvo com ${plan.itemCount} itens`, 'db_save');

    inspection.markProcessingComplete();
    inspection.addProcessingLog('Plano gerado', 'plan_gen');
    await this.repos.inspections.save(inspection);

    this.logger.info('Analysis recorded', {
      inspectionId: inspection.id,
      planId: plan.id,
      items: plan.itemCount,
    });

    return plan;
  }

  async recordFailure(inspectionId: InspectionId, reason: string): Promise<Inspection> {
    const inspection = await this.requireInspection(inspectionId);

    inspection.addProcessingLog(`Falha no processamento: ${reason}`, 'error');
    inspection.reject();
    await this.repos.inspections.save(inspection);

    this.logger.error('Processing failed', { inspectionId, reason });
    return inspection;
  }

  private async requireInspection(inspectionId: InspectionId): Promise<Inspection> {
    const inspection = await this.repos.inspections.findById(inspectionId);
    if (!inspection) {
      throw new InspectionNotFoundError(inspectionId);
    }
    return inspection;
  }
}
