/**
 * Score and SeverityLevel
 *
 * A 0-10 compliance score with an optional free-text status from the inspection report.
 * Severity and compliance are derived on access, never stored.
 */

import { ValidationError } from './errors.js';

export enum SeverityLevel {
  LOW = 'LOW',
  MEDIUM = 'MEDIUM',
  HIGH = 'HIGH',
  CRITICAL = 'CRITICAL',
}

const SEVERITY_WEIGHTS: Record<SeverityLevel, number> = {
  [SeverityLevel.LOW]: 1,
  [SeverityLevel.MEDIUM]: 2,
  [SeverityLevel.HIGH]: 3,
  [SeverityLevel.CRITICAL]: 4,
};

const SEVERITY_LABELS: Record<SeverityLevel, string> = {
  [SeverityLevel.LOW]: 'Baixa',
  [SeverityLevel.MEDIUM]: 'Média',
  [SeverityLevel.HIGH]: 'Alta',
  [SeverityLevel.CRITICAL]: 'Crítica',
};

/**
 * >= 8 LOW, >= 5 MEDIUM, >= 2 HIGH, below that CRITICAL.
 */
export function severityFromScore(score: number): SeverityLevel {
  if (score >= 8) return SeverityLevel.LOW;
  if (score >= 5) return SeverityLevel.MEDIUM;
  if (score >= 2) return SeverityLevel.HIGH;
  return SeverityLevel.CRITICAL;
}

export function severityWeight(level: SeverityLevel): number {
  return SEVERITY_WEIGHTS[level];
}

export function severityLabel(level: SeverityLevel): string {
  return SEVERITY_LABELS[level];
}

export function isSeverityLevel(value: string): value is SeverityLevel {
  return Object.prototype.hasOwnProperty.call(SEVERITY_WEIGHTS, value);
}

const COMPLIANT_STATUSES: ReadonlySet<string> = new Set([
  'conforme',
  'ok',
  'adequado',
  'atende',
  'regular',
  'satisfatório',
  'satisfatorio',
  'aprovado',
]);

const NON_COMPLIANT_STATUSES: ReadonlySet<string> = new Set([
  'não conforme',
  'nao conforme',
  'inadequado',
  'irregular',
  'reprovado',
  'crítico',
  'critico',
  'grave',
]);

const COMPLIANCE_THRESHOLD = 7.0;

export class Score {
  readonly value: number;
  readonly status: string | null;

  constructor(value: number, status?: string | null) {
    if (!Number.isFinite(value) || value < 0 || value > 10) {
      throw new ValidationError(`Pontuação deve estar entre 0 e 10, recebido: ${value}`, 'score');
    }

    this.value = value;
    this.status = status ?? null;
    Object.freeze(this);
  }

  static perfect(): Score {
    return new Score(10, 'Conforme');
  }

  static zero(): Score {
    return new Score(0, 'Não Conforme');
  }

  static fromPercentage(percentage: number, status?: string | null): Score {
    return new Score(percentage / 10, status);
  }

  get percentage(): number {
    return this.value * 10;
  }

  /**
   * A recognised status wins; otherwise value >= 7 counts as compliant.
   */
  get isCompliant(): boolean {
    if (this.status) {
      const normalized = this.status.trim().toLowerCase();
      if (COMPLIANT_STATUSES.has(normalized)) return true;
      if (NON_COMPLIANT_STATUSES.has(normalized)) return false;
    }
    return this.value >= COMPLIANCE_THRESHOLD;
  }

  get severity(): SeverityLevel {
    return severityFromScore(this.value);
  }

  get statusNormalized(): string {
    if (this.isCompliant) return 'Conforme';
    if (this.status && this.status.toLowerCase().includes('parcial')) {
      return 'Parcialmente Conforme';
    }
    return 'Não Conforme';
  }

  equals(other: Score | number): boolean {
    return this.value === (other instanceof Score ? other.value : other);
  }

  compareTo(other: Score | number): number {
    return this.value - (other instanceof Score ? other.value : other);
  }

  toString(): string {
    return `${this.value.toFixed(1)}/10`;
  }
}
