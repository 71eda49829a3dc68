/**
 * User Entity
 *
 * Consultants, managers and admins. Consultants are scoped to the establishments
 * assigned to them; admins see everything.
 */

import { Entity } from './entity.js';
import { Email } from './email.js';
import { Phone } from './phone.js';
import { BusinessRuleViolationError } from './errors.js';
import type { CompanyId, EntitySnapshot, EstablishmentId } from './types.js';

export enum UserRole {
  CONSULTANT = 'CONSULTANT',
  MANAGER = 'MANAGER',
  ADMIN = 'ADMIN',
}

interface RoleCapabilities {
  label: string;
  canApprovePlans: boolean;
  canManageUsers: boolean;
  canAccessAdmin: boolean;
}

export const ROLE_CAPABILITIES: Readonly<Record<UserRole, RoleCapabilities>> = {
  [UserRole.CONSULTANT]: {
    label: 'Consultor',
    canApprovePlans: false,
    canManageUsers: false,
    canAccessAdmin: false,
  },
  [UserRole.MANAGER]: {
    label: 'Gestor',
    canApprovePlans: true,
    canManageUsers: true,
    canAccessAdmin: false,
  },
  [UserRole.ADMIN]: {
    label: 'Administrador',
    canApprovePlans: true,
    canManageUsers: true,
    canAccessAdmin: true,
  },
};

export function roleLabel(role: UserRole): string {
  return ROLE_CAPABILITIES[role].label;
}

export function canApprovePlans(role: UserRole): boolean {
  return ROLE_CAPABILITIES[role].canApprovePlans;
}

export function canManageUsers(role: UserRole): boolean {
  return ROLE_CAPABILITIES[role].canManageUsers;
}

export function canAccessAdmin(role: UserRole): boolean {
  return ROLE_CAPABILITIES[role].canAccessAdmin;
}

export interface UserProps {
  email: Email;
  name?: string | null;
  role?: UserRole;
  isActive?: boolean;
  mustChangePassword?: boolean;
  companyId?: CompanyId | null;
  whatsapp?: Phone | null;
  establishmentIds?: EstablishmentId[];
}

export class User extends Entity {
  email: Email;
  name: string | null;
  role: UserRole;
  isActive: boolean;
  mustChangePassword: boolean;
  companyId: CompanyId | null;
  whatsapp: Phone | null;
  private _establishmentIds: EstablishmentId[];

  constructor(props: UserProps, snapshot?: EntitySnapshot) {
    super(snapshot);
    this.email = props.email;
    this.name = props.name ?? null;
    this.role = props.role ?? UserRole.CONSULTANT;
    this.isActive = props.isActive ?? true;
    this.mustChangePassword = props.mustChangePassword ?? false;
    this.companyId = props.companyId ?? null;
    this.whatsapp = props.whatsapp ?? null;
    this._establishmentIds = [...new Set(props.establishmentIds ?? [])];
  }

  static createConsultant(input: {
    email: string;
    name: string;
    companyId: CompanyId;
    establishmentIds?: EstablishmentId[];
  }): User {
    return new User({
      email: new Email(input.email),
      name: input.name,
      role: UserRole.CONSULTANT,
      companyId: input.companyId,
      mustChangePassword: true,
      establishmentIds: input.establishmentIds,
    });
  }

  static createManager(input: { email: string; name: string; companyId: CompanyId }): User {
    return new User({
      email: new Email(input.email),
      name: input.name,
      role: UserRole.MANAGER,
      companyId: input.companyId,
      mustChangePassword: true,
    });
  }

  static createAdmin(input: { email: string; name: string }): User {
    return new User({
      email: new Email(input.email),
      name: input.name,
      role: UserRole.ADMIN,
      mustChangePassword: true,
    });
  }

  get isConsultant(): boolean {
    return this.role === UserRole.CONSULTANT;
  }

  get isManager(): boolean {
    return this.role === UserRole.MANAGER;
  }

  get isAdmin(): boolean {
    return this.role === UserRole.ADMIN;
  }

  get canApprovePlans(): boolean {
    return canApprovePlans(this.role);
  }

  get canManageUsers(): boolean {
    return canManageUsers(this.role);
  }

  get canAccessAdmin(): boolean {
    return canAccessAdmin(this.role);
  }

  get displayName(): string {
    return this.name || this.email.toString();
  }

  get establishmentIds(): EstablishmentId[] {
    return [...this._establishmentIds];
  }

  deactivate(): void {
    if (!this.isActive) {
      throw new BusinessRuleViolationError('Usuário já está inativo');
    }
    this.isActive = false;
    this.markUpdated();
  }

  activate(): void {
    if (this.isActive) {
      throw new BusinessRuleViolationError('Usuário já está ativo');
    }
    this.isActive = true;
    this.markUpdated();
  }

  /**
   * Undefined leaves a field alone; a blank name clears it.
   */
  updateProfile(changes: { name?: string; email?: string }): void {
    const email = changes.email !== undefined ? new Email(changes.email) : this.email;
    if (changes.name !== undefined) {
      this.name = changes.name.trim() || null;
    }
    this.email = email;
    this.markUpdated();
  }

  requirePasswordChange(): void {
    this.mustChangePassword = true;
    this.markUpdated();
  }

  passwordChanged(): void {
    this.mustChangePassword = false;
    this.markUpdated();
  }

  canAccessEstablishment(establishmentId: EstablishmentId): boolean {
    if (this.isAdmin) return true;
    return this._establishmentIds.includes(establishmentId);
  }

  assignEstablishment(establishmentId: EstablishmentId): void {
    if (!this.isConsultant) {
      throw new BusinessRuleViolationError(
        'Apenas consultores podem ser atribuídos a estabelecimentos'
      );
    }
    if (!this._establishmentIds.includes(establishmentId)) {
      this._establishmentIds.push(establishmentId);
      this.markUpdated();
    }
  }

  removeEstablishment(establishmentId: EstablishmentId): void {
    const index = this._establishmentIds.indexOf(establishmentId);
    if (index >= 0) {
      this._establishmentIds.splice(index, 1);
      this.markUpdated();
    }
  }

  /**
   * Leaving CONSULTANT drops every establishment assignment.
   */
  changeRole(newRole: UserRole): void {
    if (this.role === newRole) return;

    if (this.role === UserRole.CONSULTANT) {
      this._establishmentIds = [];
    }

    this.role = newRole;
    this.markUpdated();
  }

  toString(): string {
    return `User(${this.displayName}, ${roleLabel(this.role)})`;
  }
}
