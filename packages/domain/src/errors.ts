/**
 * Domain Errors
 *
 * Business-level failures raised by value objects and entities.
 * The application layer translates them into responses; nothing here logs or retries.
 */

export class DomainError extends Error {
  readonly code: string;

  constructor(message: string, code = 'DOMAIN_ERROR') {
    super(message);
    this.name = 'DomainError';
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Malformed input to a constructor or setter.
 */
export class ValidationError extends DomainError {
  readonly field: string | null;

  constructor(message: string, field?: string) {
    super(message, field ? `VALIDATION_ERROR_${field.toUpperCase()}` : 'VALIDATION_ERROR');
    this.name = 'ValidationError';
    this.field = field ?? null;
  }
}

/**
 * Raised by collaborators that look entities up; entities never raise it.
 */
export class NotFoundError extends DomainError {
  readonly entityType: string;
  readonly identifier: string | null;

  constructor(entityType: string, identifier?: string, label: string = entityType) {
    super(
      identifier ? `${label} '${identifier}' não encontrado` : `${label} não encontrado`,
      `${toConstantCase(entityType)}_NOT_FOUND`
    );
    this.name = 'NotFoundError';
    this.entityType = entityType;
    this.identifier = identifier ?? null;
  }
}

export class InspectionNotFoundError extends NotFoundError {
  constructor(inspectionId?: string) {
    super('Inspection', inspectionId, 'Inspeção');
    this.name = 'InspectionNotFoundError';
  }
}

export class EstablishmentNotFoundError extends NotFoundError {
  constructor(establishmentId?: string) {
    super('Establishment', establishmentId, 'Estabelecimento');
    this.name = 'EstablishmentNotFoundError';
  }
}

export class UserNotFoundError extends NotFoundError {
  constructor(userId?: string) {
    super('User', userId, 'Usuário');
    this.name = 'UserNotFoundError';
  }
}

export class CompanyNotFoundError extends NotFoundError {
  constructor(companyId?: string) {
    super('Company', companyId, 'Empresa');
    this.name = 'CompanyNotFoundError';
  }
}

export class ActionPlanNotFoundError extends NotFoundError {
  constructor(planId?: string) {
    super('ActionPlan', planId, 'Plano de Ação');
    this.name = 'ActionPlanNotFoundError';
  }
}

/**
 * Reserved for calling code that checks role capabilities.
 */
export class UnauthorizedError extends DomainError {
  constructor(message = 'Acesso não autorizado') {
    super(message, 'UNAUTHORIZED');
    this.name = 'UnauthorizedError';
  }
}

/**
 * A state-dependent rule was broken.
 */
export class BusinessRuleViolationError extends DomainError {
  readonly rule: string;

  constructor(message: string, rule = 'GENERAL') {
    super(message, `BUSINESS_RULE_${rule.toUpperCase()}`);
    this.name = 'BusinessRuleViolationError';
    this.rule = rule;
  }
}

export class InvalidStatusTransitionError extends BusinessRuleViolationError {
  readonly currentStatus: string;
  readonly newStatus: string;
  readonly entityType: string;

  constructor(currentStatus: string, newStatus: string, entityType = 'Entity') {
    super(
      `Não é possível mudar ${entityType} de '${currentStatus}' para '${newStatus}'`,
      'STATUS_TRANSITION'
    );
    this.name = 'InvalidStatusTransitionError';
    this.currentStatus = currentStatus;
    this.newStatus = newStatus;
    this.entityType = entityType;
  }
}

export class InspectionAlreadyProcessedError extends BusinessRuleViolationError {
  readonly inspectionId: string;

  constructor(inspectionId: string) {
    super(`Inspeção '${inspectionId}' já foi processada`, 'ALREADY_PROCESSED');
    this.name = 'InspectionAlreadyProcessedError';
    this.inspectionId = inspectionId;
  }
}

export class DuplicateFileError extends BusinessRuleViolationError {
  readonly fileHash: string;

  constructor(fileHash: string) {
    super('Este arquivo já foi enviado anteriormente', 'DUPLICATE_FILE');
    this.name = 'DuplicateFileError';
    this.fileHash = fileHash;
  }
}

function toConstantCase(value: string): string {
  return value
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/[\s-]+/g, '_')
    .toUpperCase();
}
