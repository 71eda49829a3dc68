/**
 * Company Entity
 *
 * A client organization owning establishments and users.
 */

import { Entity } from './entity.js';
import { BusinessRuleViolationError, ValidationError } from './errors.js';
import type { EntitySnapshot } from './types.js';

export interface CompanyProps {
  name: string;
  cnpj?: string | null;
  isActive?: boolean;
  driveFolderId?: string | null;
  establishmentCount?: number;
  userCount?: number;
}

export function normalizeCnpj(cnpj: string): string {
  return cnpj.replace(/\D/g, '');
}

/**
 * NN.NNN.NNN/NNNN-NN when the value has exactly 14 digits, otherwise unchanged.
 */
export function formatCnpj(cnpj: string | null): string {
  if (!cnpj || cnpj.length !== 14) {
    return cnpj ?? '';
  }
  return `${cnpj.slice(0, 2)}.${cnpj.slice(2, 5)}.${cnpj.slice(5, 8)}/${cnpj.slice(8, 12)}-${cnpj.slice(12)}`;
}

export class Company extends Entity {
  name: string;
  cnpj: string | null;
  isActive: boolean;
  driveFolderId: string | null;
  // Informational, populated by the persistence layer.
  private _establishmentCount: number;
  private _userCount: number;

  constructor(props: CompanyProps, snapshot?: EntitySnapshot) {
    super(snapshot);
    if (!props.name || !props.name.trim()) {
      throw new ValidationError('Nome da empresa é obrigatório', 'name');
    }
    this.name = props.name.trim();
    this.cnpj = props.cnpj ? normalizeCnpj(props.cnpj) : null;
    this.isActive = props.isActive ?? true;
    this.driveFolderId = props.driveFolderId ?? null;
    this._establishmentCount = props.establishmentCount ?? 0;
    this._userCount = props.userCount ?? 0;
  }

  static create(name: string, cnpj?: string | null): Company {
    return new Company({ name, cnpj });
  }

  get cnpjFormatted(): string {
    return this.cnpj ? formatCnpj(this.cnpj) : '';
  }

  get hasDriveFolder(): boolean {
    return Boolean(this.driveFolderId);
  }

  get establishmentCount(): number {
    return this._establishmentCount;
  }

  get userCount(): number {
    return this._userCount;
  }

  setCounts(counts: { establishments: number; users: number }): void {
    this._establishmentCount = counts.establishments;
    this._userCount = counts.users;
  }

  setDriveFolder(folderId: string): void {
    if (!folderId) {
      throw new ValidationError('ID da pasta do Drive não pode ser vazio', 'drive_folder_id');
    }
    this.driveFolderId = folderId;
    this.markUpdated();
  }

  deactivate(): void {
    if (!this.isActive) {
      throw new BusinessRuleViolationError('Empresa já está inativa');
    }
    this.isActive = false;
    this.markUpdated();
  }

  activate(): void {
    if (this.isActive) {
      throw new BusinessRuleViolationError('Empresa já está ativa');
    }
    this.isActive = true;
    this.markUpdated();
  }

  /**
   * Undefined leaves a field alone; an empty cnpj clears it.
   */
  updateInfo(changes: { name?: string; cnpj?: string | null }): void {
    if (changes.name !== undefined) {
      if (!changes.name.trim()) {
        throw new ValidationError('Nome da empresa não pode ser vazio', 'name');
      }
      this.name = changes.name.trim();
    }

    if (changes.cnpj !== undefined) {
      this.cnpj = changes.cnpj ? normalizeCnpj(changes.cnpj) : null;
    }

    this.markUpdated();
  }

  canBeDeleted(): boolean {
    return this._establishmentCount === 0 && this._userCount === 0;
  }

  toString(): string {
    return `Company(${this.name}, ${this.isActive ? 'Ativa' : 'Inativa'})`;
  }
}
