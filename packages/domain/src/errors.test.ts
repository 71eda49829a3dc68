import { describe, it, expect } from 'vitest';
import {
  DomainError,
  ValidationError,
  NotFoundError,
  InspectionNotFoundError,
  ActionPlanNotFoundError,
  UnauthorizedError,
  BusinessRuleViolationError,
  InvalidStatusTransitionError,
  InspectionAlreadyProcessedError,
  DuplicateFileError,
} from './errors.js';

describe('domain errors', () => {
  it('tags validation errors with the failing field', () => {
    const error = new ValidationError('Nome é obrigatório', 'name');

    expect(error).toBeInstanceOf(DomainError);
    expect(error).toBeInstanceOf(Error);
    expect(error.field).toBe('name');
    expect(error.code).toBe('VALIDATION_ERROR_NAME');
    expect(error.name).toBe('ValidationError');
  });

  it('uses a generic code without a field', () => {
    const error = new ValidationError('inválido');
    expect(error.field).toBeNull();
    expect(error.code).toBe('VALIDATION_ERROR');
  });

  it('names the entity and identifier in not-found errors', () => {
    const error = new InspectionNotFoundError('insp-1');

    expect(error).toBeInstanceOf(NotFoundError);
    expect(error.message).toBe("Inspeção 'insp-1' não encontrado");
    expect(error.code).toBe('INSPECTION_NOT_FOUND');
    expect(error.identifier).toBe('insp-1');

    const plan = new ActionPlanNotFoundError();
    expect(plan.message).toBe('Plano de Ação não encontrado');
    expect(plan.code).toBe('ACTION_PLAN_NOT_FOUND');
  });

  it('keeps subclass identity through the hierarchy', () => {
    const error = new InvalidStatusTransitionError('COMPLETED', 'APPROVED', 'Inspection');

    expect(error).toBeInstanceOf(InvalidStatusTransitionError);
    expect(error).toBeInstanceOf(BusinessRuleViolationError);
    expect(error).toBeInstanceOf(DomainError);
    expect(error.code).toBe('BUSINESS_RULE_STATUS_TRANSITION');
    expect(error.currentStatus).toBe('COMPLETED');
    expect(error.newStatus).toBe('APPROVED');
    expect(error.message).toBe("Não é possível mudar Inspection de 'COMPLETED' para 'APPROVED'");
  });

  it('exposes ingestion errors as business rule violations', () => {
    const duplicate = new DuplicateFileError('abc123');
    expect(duplicate).toBeInstanceOf(BusinessRuleViolationError);
    expect(duplicate.code).toBe('BUSINESS_RULE_DUPLICATE_FILE');
    expect(duplicate.fileHash).toBe('abc123');

    const processed = new InspectionAlreadyProcessedError('insp-9');
    expect(processed.rule).toBe('ALREADY_PROCESSED');
    expect(processed.message).toBe("Inspeção 'insp-9' já foi processada");
  });

  it('defaults unauthorized and business rule codes', () => {
    expect(new UnauthorizedError().code).toBe('UNAUTHORIZED');
    expect(new UnauthorizedError().message).toBe('Acesso não autorizado');
    expect(new BusinessRuleViolationError('x').code).toBe('BUSINESS_RULE_GENERAL');
  });
});
